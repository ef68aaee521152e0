import Database from 'better-sqlite3';
import { drizzle, BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import { config } from '../config';
import * as schema from './schema';

export type AppDatabase = BetterSQLite3Database<typeof schema>;

export interface DatabaseHandle {
    db: AppDatabase;
    raw: Database.Database;
    close(): void;
}

// DATABASE_URL accepts "file:./dev.db", a bare path, or ":memory:"
function toFilename(url: string): string {
    return url.startsWith('file:') ? url.slice('file:'.length) : url;
}

export function openDatabase(url: string = config.dbUrl): DatabaseHandle {
    const sqlite = new Database(toFilename(url));
    sqlite.pragma('journal_mode = WAL');
    sqlite.pragma('busy_timeout = 10000');
    sqlite.pragma('foreign_keys = ON');

    const db = drizzle(sqlite, {
        schema,
        logger: config.env === 'development' && config.logLevel === 'debug'
    });

    return {
        db,
        raw: sqlite,
        close: () => sqlite.close()
    };
}

export * from './schema';
