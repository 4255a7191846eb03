/**
 * src/db/migrate.ts
 *
 * Idempotent database migration for the job-market observer.
 *
 * Run:  npm run db:migrate
 *
 * Uses CREATE TABLE IF NOT EXISTS / CREATE INDEX IF NOT EXISTS, so it is
 * safe to run on every deploy without data loss.
 */

import { env } from '../config/env.js';
import { createPool, pingDb, type DbPool } from '../utils/db.js';
import { CREATE_TABLES, INDEXES } from './schema.js';

async function applySchema(pool: DbPool): Promise<void> {
    for (const ddl of CREATE_TABLES) {
        await pool.query(ddl);
    }
    for (const idx of INDEXES) {
        await pool.query(idx);
    }
}

async function migrate(): Promise<void> {
    const pool = createPool(env);
    console.log('[migrate] Checking database connectivity…');

    const alive = await pingDb(pool);
    if (!alive) {
        console.error('[migrate] ✗ Cannot reach PostgreSQL. Check PGHOST / PGUSER / PGPASSWORD / PGDATABASE in .env');
        console.error('[migrate]   Current PGDATABASE:', env.PGDATABASE);
        await pool.end();
        process.exit(1);
    }
    console.log(`[migrate] ✓ Connected to "${env.PGDATABASE}".`);

    console.log(`[migrate] Creating ${CREATE_TABLES.length} tables and ${INDEXES.length} indexes…`);
    await applySchema(pool);
    console.log('[migrate] ✓ Schema in place.');

    await pool.end();
    console.log('[migrate] Done. Database is ready for the observer.');
}

migrate().catch((err: unknown) => {
    console.error('[migrate] Fatal error:', err instanceof Error ? err.message : String(err));
    process.exit(1);
});
