import fs from 'fs';
import { config } from '../config';
import { logger } from '../utils/logger';
import { DatabaseHandle } from './index';

/** Apply the idempotent DDL in db/schema.sql. */
export function applySchema(handle: DatabaseHandle, schemaPath: string = config.schemaSqlPath): void {
    const ddl = fs.readFileSync(schemaPath, 'utf-8');
    handle.raw.exec(ddl);
    logger.debug('[DB] Schema applied', { schemaPath });
}
