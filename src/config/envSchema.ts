import { z } from 'zod';

const boolStrictTrue = z.preprocess((v) => {
    if (v === undefined) return undefined;
    if (typeof v === 'string') return v.trim().toLowerCase() === 'true';
    return v;
}, z.boolean());

const boolUnlessFalse = z.preprocess((v) => {
    if (v === undefined) return undefined;
    if (typeof v === 'string') return v.trim().toLowerCase() !== 'false';
    return v;
}, z.boolean());

const numFromEnv = z.preprocess((v) => {
    if (v === undefined || v === '') return undefined;
    if (typeof v === 'string') return Number(v);
    return v;
}, z.number().finite());

const logLevel = z.preprocess((v) => {
    if (v === undefined || v === '') return undefined;
    if (typeof v === 'string') return v.trim().toUpperCase();
    return v;
}, z.enum(['DEBUG', 'INFO', 'WARNING', 'ERROR', 'OFF']));

export const envSchema = z.object({
    DATABASE_URL: z.string().optional(),
    PGHOST: z.string().default('localhost'),
    PGPORT: z.coerce.number().int().min(1).max(65535).default(5432),
    PGUSER: z.string().optional(),
    PGPASSWORD: z.string().optional(),
    PGDATABASE: z.string().default('job_market'),
    PGSSL: boolStrictTrue.default(false),
    PG_POOL_MAX: numFromEnv.pipe(z.number().int().positive()).default(10),

    API_ENABLED: boolUnlessFalse.default(true),
    API_PORT: z.coerce.number().int().min(0).max(65535).default(3000),

    CRAWL_ENABLED: boolUnlessFalse.default(true),
    CRAWL_INTERVAL_MINUTES: numFromEnv.pipe(z.number().positive()).default(30),
    CRAWL_INITIAL_DELAY_MS: numFromEnv.pipe(z.number().min(0)).default(60_000),
    FETCH_TIMEOUT_MS: numFromEnv.pipe(z.number().positive()).default(15_000),
    BACKOFF_BASE_MS: numFromEnv.pipe(z.number().min(0)).default(2_000),
    USER_AGENT: z.string().default(
        'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/125.0.0.0 Safari/537.36'
    ),

    NEW_JOBS_WINDOW_HOURS: numFromEnv.pipe(z.number().positive()).default(24),

    CRAWLEE_LOG_LEVEL: logLevel.default('INFO'),
}).passthrough();

export type Env = z.infer<typeof envSchema>;
