import { Request, Response } from 'express';
import { ZodError } from 'zod';
import {
    ConflictError, InvalidStateError, NotFoundError, ValidationError
} from '../core/errors';
import { logger } from '../utils/logger';

/** Map a service error onto an HTTP response. Unknown errors become 500. */
export function sendError(req: Request, res: Response, err: unknown): void {
    if (err instanceof ZodError) {
        res.status(400).json({ error: 'Invalid Schema', details: err.issues });
        return;
    }
    if (err instanceof ValidationError || err instanceof InvalidStateError) {
        res.status(400).json({ error: err.message, code: err.code });
        return;
    }
    if (err instanceof NotFoundError) {
        res.status(404).json({ error: err.message, code: err.code });
        return;
    }
    if (err instanceof ConflictError) {
        res.status(409).json({ error: err.message, code: err.code });
        return;
    }

    logger.error(`Unhandled error on ${req.method} ${req.path}`, {
        error: err,
        correlationId: req.correlationId
    });
    res.status(500).json({ error: 'Internal Server Error', correlation_id: req.correlationId });
}
