import { Router, Request, Response } from 'express';
import { CreateTicketSchema } from '../schemas/requests';
import { ReviewService } from '../services/review/review_service';
import { TicketService } from '../services/ticket/ticket_service';
import { sendError } from './errors';
import { presentAttempt, presentReview, presentTicket } from './presenters';

export function ticketRouter(tickets: TicketService, review: ReviewService): Router {
    const router = Router();

    router.post('/', async (req: Request, res: Response) => {
        try {
            const body = CreateTicketSchema.parse(req.body);
            const ticket = await tickets.createTicket({
                campaignId: body.campaign_id,
                channelId: body.channel_id,
                requestType: body.request_type,
                payload: body.payload
            });
            res.status(201).json(presentTicket(ticket));
        } catch (err) {
            sendError(req, res, err);
        }
    });

    router.get('/:id', async (req: Request, res: Response) => {
        try {
            res.json(presentTicket(await tickets.getTicket(req.params.id)));
        } catch (err) {
            sendError(req, res, err);
        }
    });

    router.post('/:id/submit', async (req: Request, res: Response) => {
        try {
            res.json(presentTicket(await tickets.submitForReview(req.params.id)));
        } catch (err) {
            sendError(req, res, err);
        }
    });

    // ?dry_run=true evaluates without persisting a verdict
    router.post('/:id/review', async (req: Request, res: Response) => {
        try {
            if (req.query.dry_run === 'true') {
                const result = await review.preview(req.params.id);
                res.json({ dry_run: true, ...presentReview(result) });
                return;
            }
            const { result, ticket } = await review.record(req.params.id);
            res.json({ dry_run: false, ...presentReview(result), ticket: presentTicket(ticket) });
        } catch (err) {
            sendError(req, res, err);
        }
    });

    router.get('/:id/attempts', async (req: Request, res: Response) => {
        try {
            const attempts = await tickets.listAttempts(req.params.id);
            res.json({ ticket_id: req.params.id, attempts: attempts.map(presentAttempt) });
        } catch (err) {
            sendError(req, res, err);
        }
    });

    return router;
}
