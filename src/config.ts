import dotenv from 'dotenv';
import path from 'path';
import { z } from 'zod';

// Resolve .env from CWD (root of service)
dotenv.config({ path: path.resolve(process.cwd(), '.env') });

const numberFromEnv = (fallback: number) =>
    z.coerce.number().int().positive().default(fallback);

const EnvSchema = z.object({
    PORT: numberFromEnv(3006),
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
    DATABASE_URL: z.string().min(1, 'DATABASE_URL is required'),
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),

    META_API_BASE_URL: z.string().url().default('https://graph.facebook.com/v18.0'),
    META_AD_ACCOUNT_ID: z.string().optional(),
    META_ACCESS_TOKEN: z.string().optional(),
    TIKTOK_API_BASE_URL: z.string().url().default('https://business-api.tiktok.com/open_api/v1.3'),
    TIKTOK_ACCESS_TOKEN: z.string().optional(),
    GOOGLE_ADS_API_BASE_URL: z.string().url().default('https://googleads.googleapis.com/v14'),
    GOOGLE_ADS_CUSTOMER_ID: z.string().optional(),
    GOOGLE_ADS_ACCESS_TOKEN: z.string().optional(),

    TARGETING_DENYLIST_PATH: z.string().default('config/targeting_denylists.json'),
    SCHEMA_SQL_PATH: z.string().default('db/schema.sql'),

    DISPATCH_MAX_ATTEMPTS: numberFromEnv(5),
    DISPATCH_SOFT_TIMEOUT_MS: numberFromEnv(4 * 60 * 1000),
    DISPATCH_HARD_TIMEOUT_MS: numberFromEnv(5 * 60 * 1000),
    DISPATCH_HANDLE_RETENTION_MS: numberFromEnv(60 * 60 * 1000)
});

export type Env = z.infer<typeof EnvSchema>;
export type LogLevel = Env['LOG_LEVEL'];

// Fail fast: a service without a store or with malformed settings must not boot
function loadEnv(): Env {
    const parsed = EnvSchema.safeParse(process.env);
    if (!parsed.success) {
        const problems = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
        console.error(`[Fatal] Invalid configuration: ${problems.join('; ')}`);
        process.exit(1);
    }
    return parsed.data;
}

const env = loadEnv();

export interface PlatformCredentials {
    baseUrl: string;
    token: string | undefined;
}

export const config = {
    port: env.PORT,
    env: env.NODE_ENV,
    dbUrl: env.DATABASE_URL,
    logLevel: env.LOG_LEVEL,
    // Relative paths resolve against the service root
    denylistPath: path.resolve(process.cwd(), env.TARGETING_DENYLIST_PATH),
    schemaSqlPath: path.resolve(process.cwd(), env.SCHEMA_SQL_PATH),
    platforms: {
        // Meta scopes every object under the ad account
        meta: {
            baseUrl: env.META_AD_ACCOUNT_ID
                ? `${env.META_API_BASE_URL}/act_${env.META_AD_ACCOUNT_ID}`
                : env.META_API_BASE_URL,
            token: env.META_ACCESS_TOKEN
        },
        tiktok: {
            baseUrl: env.TIKTOK_API_BASE_URL,
            token: env.TIKTOK_ACCESS_TOKEN
        },
        google: {
            baseUrl: env.GOOGLE_ADS_CUSTOMER_ID
                ? `${env.GOOGLE_ADS_API_BASE_URL}/customers/${env.GOOGLE_ADS_CUSTOMER_ID}`
                : env.GOOGLE_ADS_API_BASE_URL,
            token: env.GOOGLE_ADS_ACCESS_TOKEN
        }
    } satisfies Record<string, PlatformCredentials>,
    dispatch: {
        maxAttempts: env.DISPATCH_MAX_ATTEMPTS,
        softTimeoutMs: env.DISPATCH_SOFT_TIMEOUT_MS,
        hardTimeoutMs: env.DISPATCH_HARD_TIMEOUT_MS,
        handleRetentionMs: env.DISPATCH_HANDLE_RETENTION_MS
    }
};
