import { v4 as uuidv4 } from 'uuid';
import { Request, Response, NextFunction } from 'express';
import { config, LogLevel } from '../config';

// Extend Express Request type
declare global {
    namespace Express {
        interface Request {
            correlationId: string;
        }
    }
}

export type LogMeta = Record<string, unknown>;

const LEVEL_RANK: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100
};

class Logger {
    constructor(private readonly minLevel: LogLevel) {}

    private enabled(level: Exclude<LogLevel, 'silent'>): boolean {
        return LEVEL_RANK[level] >= LEVEL_RANK[this.minLevel];
    }

    private formatMessage(level: string, message: string, meta?: LogMeta): string {
        const timestamp = new Date().toISOString();
        const logObject = {
            timestamp,
            level,
            message,
            env: config.env,
            ...normalizeMeta(meta)
        };
        return JSON.stringify(logObject);
    }

    info(message: string, meta?: LogMeta) {
        if (this.enabled('info')) console.log(this.formatMessage('INFO', message, meta));
    }

    error(message: string, meta?: LogMeta) {
        if (this.enabled('error')) console.error(this.formatMessage('ERROR', message, meta));
    }

    warn(message: string, meta?: LogMeta) {
        if (this.enabled('warn')) console.warn(this.formatMessage('WARN', message, meta));
    }

    debug(message: string, meta?: LogMeta) {
        if (this.enabled('debug')) console.debug(this.formatMessage('DEBUG', message, meta));
    }
}

// Errors don't survive JSON.stringify
function normalizeMeta(meta?: LogMeta): LogMeta {
    if (!meta) return {};
    const out: LogMeta = {};
    for (const [key, value] of Object.entries(meta)) {
        out[key] = value instanceof Error ? { name: value.name, message: value.message } : value;
    }
    return out;
}

export const logger = new Logger(config.logLevel);

// Middleware: Correlation ID Propagation
export const correlationMiddleware = (req: Request, res: Response, next: NextFunction) => {
    // 1. Check header, generate if missing
    const header = req.headers['x-correlation-id'];
    const correlationId = typeof header === 'string' && header.length > 0 ? header : uuidv4();

    // 2. Attach to request and response
    req.correlationId = correlationId;
    res.setHeader('X-Correlation-Id', correlationId);

    logger.info(`Incoming Request: ${req.method} ${req.url}`, {
        correlationId,
        ip: req.ip,
        userAgent: req.get('user-agent')
    });

    next();
};
