import { Router, Request, Response } from 'express';
import { CreateCampaignSchema, UpdateCampaignSchema } from '../schemas/requests';
import { CampaignService } from '../services/campaign/campaign_service';
import { sendError } from './errors';
import { presentCampaign } from './presenters';

export function campaignRouter(campaigns: CampaignService): Router {
    const router = Router();

    router.post('/', async (req: Request, res: Response) => {
        try {
            const body = CreateCampaignSchema.parse(req.body);
            const campaign = await campaigns.createCampaign({
                brandId: body.brand_id,
                marketCode: body.market_code,
                platformCode: body.platform_code,
                label: body.label,
                year: body.year,
                budget: body.budget,
                status: body.status
            });
            res.status(201).json(presentCampaign(campaign));
        } catch (err) {
            sendError(req, res, err);
        }
    });

    router.get('/:id', async (req: Request, res: Response) => {
        try {
            res.json(presentCampaign(await campaigns.getCampaign(req.params.id)));
        } catch (err) {
            sendError(req, res, err);
        }
    });

    router.patch('/:id', async (req: Request, res: Response) => {
        try {
            const body = UpdateCampaignSchema.parse(req.body);
            const campaign = await campaigns.updateCampaign(req.params.id, body);
            res.json(presentCampaign(campaign));
        } catch (err) {
            sendError(req, res, err);
        }
    });

    return router;
}
