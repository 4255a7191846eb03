/**
 * src/db/seed.ts
 *
 * Seeds source sites, crawl targets and company aliases from data/seed.json.
 *
 * Run:  npm run db:seed            (after npm run db:migrate)
 *       npm run db:seed -- ./other-seed.json
 */

import { resolve } from 'node:path';
import { env } from '../config/env.js';
import { createPool, pingDb } from '../utils/db.js';
import { PgStore } from './pgStore.js';
import { applySeed, DEFAULT_SEED_PATH, loadSeedFile } from './seedData.js';

async function seed(): Promise<void> {
    const pathArg = process.argv[2];
    const seedPath = pathArg ? resolve(pathArg) : DEFAULT_SEED_PATH;

    const pool = createPool(env);
    if (!(await pingDb(pool))) {
        console.error('[seed] ✗ Cannot reach PostgreSQL. Run npm run db:migrate first and check .env');
        await pool.end();
        process.exit(1);
    }

    const data = await loadSeedFile(seedPath);
    console.log(`[seed] Loaded ${data.sites.length} sites and ${data.companies.length} companies from ${String(seedPath)}`);

    const store = new PgStore(pool);
    const summary = await applySeed(store, data);
    console.log(
        `[seed] ✓ sites +${summary.sitesCreated}, targets +${summary.targetsCreated}, ` +
        `companies +${summary.companiesCreated}, aliases +${summary.aliasesCreated}`
    );

    await store.close();
}

seed().catch((err: unknown) => {
    console.error('[seed] Fatal error:', err instanceof Error ? err.message : String(err));
    process.exit(1);
});
