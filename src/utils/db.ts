/**
 * src/utils/db.ts
 *
 * PostgreSQL connection pool factory.
 *
 * The pool is lazy: it does NOT connect until the first query is made, so
 * creating one never blocks startup.
 *
 * Connection settings come from the parsed env:
 *   DATABASE_URL – full connection string, takes priority when set
 *   PGHOST       – default: localhost
 *   PGPORT       – default: 5432
 *   PGUSER / PGPASSWORD
 *   PGDATABASE   – default: job_market
 *   PGSSL        – "true" to enable TLS (managed DBs like Supabase, RDS)
 */

import pkg from 'pg';
import { log } from 'crawlee';
import type { Env } from '../config/envSchema.js';

const { Pool } = pkg;

export type DbPool = pkg.Pool;

type PoolSettings = Pick<
    Env,
    'DATABASE_URL' | 'PGHOST' | 'PGPORT' | 'PGUSER' | 'PGPASSWORD' | 'PGDATABASE' | 'PGSSL' | 'PG_POOL_MAX'
>;

export function createPool(settings: PoolSettings): DbPool {
    const connectionString = settings.DATABASE_URL;
    const sslWanted = settings.PGSSL || (connectionString?.includes('sslmode=require') ?? false);
    const shared = {
        ssl: sslWanted ? { rejectUnauthorized: false } : undefined,
        max: settings.PG_POOL_MAX,
        idleTimeoutMillis: 30_000,
        connectionTimeoutMillis: 5_000,
    };

    const pool = connectionString
        ? new Pool({ connectionString, ...shared })
        : new Pool({
            host: settings.PGHOST,
            port: settings.PGPORT,
            user: settings.PGUSER,
            password: settings.PGPASSWORD,
            database: settings.PGDATABASE,
            ...shared,
        });

    // Idle-client errors would otherwise crash the process
    pool.on('error', (err) => {
        log.error(`[DB] Unexpected pool error: ${err.message}`);
    });

    return pool;
}

/**
 * Quick connectivity smoke-test.
 * Returns true if the DB is reachable, false otherwise.
 */
export async function pingDb(pool: DbPool): Promise<boolean> {
    try {
        await pool.query('SELECT 1');
        return true;
    } catch (err) {
        log.debug(`[DB] Ping failed: ${err instanceof Error ? err.message : String(err)}`);
        return false;
    }
}
