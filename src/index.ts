import { config } from './config'; // Validate config first
import { createApp } from './app';
import { openDatabase } from './db';
import { applySchema } from './db/migrate';
import { DenylistConfigService } from './services/review/denylist_config';
import { buildServices } from './services/registry';
import { logger } from './utils/logger';

const database = openDatabase();
applySchema(database);

// Load the denylist at boot so a malformed file stops startup
DenylistConfigService.getInstance();

const services = buildServices(database.db);
const app = createApp(services);

const server = app.listen(config.port, () => {
    logger.info(`Ticket orchestration service running on port ${config.port}`);
});

async function shutdown(signal: string): Promise<void> {
    logger.info(`[Shutdown] ${signal} received, draining dispatch jobs`);
    server.close();
    await services.dispatch.drain();
    database.close();
    logger.info('[Shutdown] Complete');
    process.exit(0);
}

for (const signal of ['SIGTERM', 'SIGINT'] as const) {
    process.once(signal, () => {
        shutdown(signal).catch(err => {
            logger.error('[Shutdown] Failed', { error: err });
            process.exit(1);
        });
    });
}
