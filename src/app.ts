import express, { Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import { config } from './config';
import { campaignRouter } from './api/campaigns';
import { dispatchRouter } from './api/dispatch';
import { healthRouter } from './api/health';
import { ticketRouter } from './api/tickets';
import { ServiceRegistry } from './services/registry';
import { correlationMiddleware } from './utils/logger';

export function createApp(services: ServiceRegistry): Express {
    const app = express();

    app.use(helmet());
    app.use(cors());
    app.use(express.json()); // JSON parsing first
    app.use(correlationMiddleware);

    if (config.env !== 'test') {
        app.use(morgan('dev'));
    }

    app.use('/', healthRouter(services.sessions)); // Health & Ready
    app.use('/campaigns', campaignRouter(services.campaigns));
    app.use('/tickets', ticketRouter(services.tickets, services.review));
    app.use('/deploy', dispatchRouter(services.dispatch));

    return app;
}
