import { Router, Request, Response } from 'express';
import { SessionPool, withSession } from '../store/session_pool';
import { logger } from '../utils/logger';

export function healthRouter(sessions: SessionPool): Router {
    const router = Router();

    // Liveness Probe (Is process running?)
    router.get('/health', (req: Request, res: Response) => {
        res.status(200).json({ status: 'ok', uptime: process.uptime() });
    });

    // Readiness Probe (Can we serve traffic?)
    router.get('/ready', async (req: Request, res: Response) => {
        const checks: Record<string, string> = {
            database: 'pending',
            config: 'ok' // validated at startup
        };

        let isReady = true;
        try {
            await withSession(sessions, store => store.ping());
            checks.database = 'ok';
        } catch (e) {
            checks.database = 'failed';
            isReady = false;
            logger.error('Readiness: Database check failed', { error: e, correlationId: req.correlationId });
        }

        const body = { checks, active_sessions: sessions.activeCount };
        if (isReady) {
            res.status(200).json({ status: 'ready', ...body });
        } else {
            res.status(503).json({ status: 'not_ready', ...body });
        }
    });

    return router;
}
