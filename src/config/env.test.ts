import { describe, it, expect } from 'vitest';
import { loadEnv } from './env.js';

describe('loadEnv', () => {
    it('applies defaults to an empty environment', () => {
        expect(loadEnv({})).toMatchObject({
            PGHOST: 'localhost',
            PGPORT: 5432,
            PGDATABASE: 'job_market',
            PGSSL: false,
            PG_POOL_MAX: 10,
            API_ENABLED: true,
            API_PORT: 3000,
            CRAWL_ENABLED: true,
            CRAWL_INTERVAL_MINUTES: 30,
            CRAWL_INITIAL_DELAY_MS: 60_000,
            FETCH_TIMEOUT_MS: 15_000,
            BACKOFF_BASE_MS: 2_000,
            NEW_JOBS_WINDOW_HOURS: 24,
            CRAWLEE_LOG_LEVEL: 'INFO',
        });
    });

    it('accepts DB_* aliases without overriding PG* keys', () => {
        const env = loadEnv({ DB_HOST: 'db.internal', DB_PORT: '6543', DB_NAME: 'observer', PGHOST: 'primary' });
        expect(env.PGHOST).toBe('primary');
        expect(env.PGPORT).toBe(6543);
        expect(env.PGDATABASE).toBe('observer');
    });

    it('parses flags and log levels leniently', () => {
        const env = loadEnv({ CRAWL_ENABLED: 'FALSE', API_ENABLED: 'yes', PGSSL: 'True', CRAWLEE_LOG_LEVEL: 'debug' });
        expect(env.CRAWL_ENABLED).toBe(false);
        expect(env.API_ENABLED).toBe(true);
        expect(env.PGSSL).toBe(true);
        expect(env.CRAWLEE_LOG_LEVEL).toBe('DEBUG');
    });

    it('lists every invalid key', () => {
        const load = () => loadEnv({ PGPORT: '70000', CRAWLEE_LOG_LEVEL: 'chatty' });
        expect(load).toThrow(/^Invalid environment variables:\n/);
        expect(load).toThrow(/- PGPORT: Number must be less than or equal to 65535/);
        expect(load).toThrow(/- CRAWLEE_LOG_LEVEL: /);
    });
});
