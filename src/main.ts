/**
 * src/main.ts
 *
 * ENTRY POINT: Job Market Observer
 *
 * Wires the store, the crawl pipeline and the read API, then runs until
 * SIGINT/SIGTERM.
 *
 * FLAGS
 * ─────
 *  --verbose, -v   log at DEBUG regardless of CRAWLEE_LOG_LEVEL
 *  --memory        keep everything in process (no PostgreSQL); the seed file
 *                  is applied at startup. Useful for dry runs.
 *
 * SHUTDOWN
 * ────────
 *  stop scheduler (aborts an in-flight crawl) → close API server → close store
 */

import { log } from 'crawlee';
import { env } from './config/env.js';
import type { Store } from './db/store.js';
import { MemoryStore } from './db/memoryStore.js';
import { PgStore } from './db/pgStore.js';
import { applySeed, loadSeedFile } from './db/seedData.js';
import { createPool, pingDb } from './utils/db.js';
import { SkillExtractor } from './analytics/skillExtractor.js';
import { InsightService } from './analytics/insights.js';
import { HttpPageFetcher } from './crawler/fetcher.js';
import { CrawlWorker } from './crawler/crawlWorker.js';
import { CrawlScheduler } from './crawler/crawlScheduler.js';
import { startApiServer, stopApiServer } from './api/server.js';

// ─── Logging ──────────────────────────────────────────────────────────────────

const isVerbose = process.argv.includes('--verbose') || process.argv.includes('-v');
const useMemoryStore = process.argv.includes('--memory');

log.setLevel(log.LEVELS[isVerbose ? 'DEBUG' : env.CRAWLEE_LOG_LEVEL]);

// ─── Store ────────────────────────────────────────────────────────────────────

async function openStore(): Promise<Store> {
    if (useMemoryStore) {
        const store = new MemoryStore();
        const summary = await applySeed(store, await loadSeedFile());
        log.info(`[Main] In-memory store seeded: ${summary.sitesCreated} sites, ${summary.targetsCreated} targets`);
        return store;
    }

    const pool = createPool(env);
    if (!(await pingDb(pool))) {
        await pool.end();
        throw new Error('PostgreSQL is not reachable. Check PG* / DATABASE_URL and run `npm run db:migrate`.');
    }
    log.info('[Main] PostgreSQL connection OK');
    return new PgStore(pool);
}

// ─── Run ──────────────────────────────────────────────────────────────────────

async function run(): Promise<void> {
    log.info('█'.repeat(60));
    log.info('  JOB MARKET OBSERVER');
    log.info(`  Store   : ${useMemoryStore ? 'in-memory (--memory)' : 'PostgreSQL'}`);
    log.info(`  Crawler : ${env.CRAWL_ENABLED ? `every ${env.CRAWL_INTERVAL_MINUTES} min` : 'disabled'}`);
    log.info(`  API     : ${env.API_ENABLED ? `port ${env.API_PORT}` : 'disabled'}`);
    log.info('█'.repeat(60));

    const store = await openStore();

    const worker = new CrawlWorker(store, {
        fetcher: new HttpPageFetcher({ timeoutMs: env.FETCH_TIMEOUT_MS, userAgent: env.USER_AGENT }),
        skills: new SkillExtractor(store),
        backoffBaseMs: env.BACKOFF_BASE_MS,
    });
    const scheduler = new CrawlScheduler(store, worker, {
        intervalMs: env.CRAWL_INTERVAL_MINUTES * 60_000,
        initialDelayMs: env.CRAWL_INITIAL_DELAY_MS,
    });
    const insights = new InsightService(store, { newJobsWindowHours: env.NEW_JOBS_WINDOW_HOURS });

    if (env.CRAWL_ENABLED) scheduler.start();
    const server = env.API_ENABLED ? await startApiServer({ insights }, env.API_PORT) : null;

    // ── Termination Handling ──────────────────────────────────────────────────
    let isShuttingDown = false;
    const shutdown = async (signal: string): Promise<void> => {
        if (isShuttingDown) return;
        isShuttingDown = true;
        log.info(`[Main] Received ${signal}. Shutting down...`);

        let exitCode = 0;
        try {
            scheduler.stop();
            if (server) await stopApiServer(server);
            await store.close();
            log.info('[Main] Cleanup complete. Exiting.');
        } catch (err) {
            console.error('[Main] Cleanup failed during shutdown:', err);
            exitCode = 1;
        }
        process.exit(exitCode);
    };

    process.on('SIGINT', () => void shutdown('SIGINT'));
    process.on('SIGTERM', () => void shutdown('SIGTERM'));
}

run().catch((err: unknown) => {
    console.error('[FATAL]', err);
    process.exit(1);
});
