import { Router, Request, Response } from 'express';
import { DeploySchema } from '../schemas/requests';
import { DispatchCoordinator } from '../services/dispatch/dispatch_coordinator';
import { sendError } from './errors';
import { presentDispatch } from './presenters';

export function dispatchRouter(dispatch: DispatchCoordinator): Router {
    const router = Router();

    // Accepted, not completed: poll /deploy/status/:handleId
    router.post('/', async (req: Request, res: Response) => {
        try {
            const { ticket_id } = DeploySchema.parse(req.body);
            const handle = await dispatch.submitDispatch(ticket_id);
            res.status(202).json({
                handle_id: handle.handleId,
                ticket_id: handle.ticketId,
                status_url: `/deploy/status/${handle.handleId}`
            });
        } catch (err) {
            sendError(req, res, err);
        }
    });

    router.get('/status/:handleId', (req: Request, res: Response) => {
        try {
            res.json(presentDispatch(dispatch.getDispatchStatus(req.params.handleId)));
        } catch (err) {
            sendError(req, res, err);
        }
    });

    router.post('/:handleId/cancel', (req: Request, res: Response) => {
        try {
            res.json(presentDispatch(dispatch.cancelDispatch(req.params.handleId)));
        } catch (err) {
            sendError(req, res, err);
        }
    });

    return router;
}
