/**
 * src/crawler/crawlScheduler.ts
 *
 * Fixed-delay crawl loop. The next cycle is due `intervalMs` after the
 * previous one FINISHED, so cycles never overlap however long a crawl
 * takes. Before the first cycle the scheduler waits `initialDelayMs` from
 * its own creation.
 *
 * `tick()` is the whole decision; `start()` only arms a timer that calls
 * it. Tests drive `tick()` directly with an injected clock.
 */

import { log } from 'crawlee';
import type { Store } from '../db/store.js';
import type { CrawlAttempt, CrawlTarget, SourceSite } from '../db/types.js';

export interface CycleSummary {
    targets: number;
    succeeded: number;
    failed: number;
    skipped: number;
    durationMs: number;
}

/** The part of CrawlWorker the scheduler depends on. */
export interface TargetProcessor {
    process(target: CrawlTarget, site: SourceSite, signal?: AbortSignal): Promise<CrawlAttempt>;
}

export interface SchedulerOptions {
    intervalMs: number;
    initialDelayMs?: number;
    clock?: () => Date;
    /** When the last cycle finished, if one ran before this process started. */
    lastCompletedAt?: Date | null;
}

export class CrawlScheduler {
    private readonly intervalMs: number;
    private readonly initialDelayMs: number;
    private readonly clock: () => Date;
    private readonly createdAt: Date;

    private lastCompletedAt: Date | null;
    private running = false;
    private started = false;
    private timer: NodeJS.Timeout | null = null;
    private controller: AbortController | null = null;

    constructor(
        private readonly store: Store,
        private readonly worker: TargetProcessor,
        options: SchedulerOptions
    ) {
        this.intervalMs = options.intervalMs;
        this.initialDelayMs = options.initialDelayMs ?? 0;
        this.clock = options.clock ?? (() => new Date());
        this.createdAt = this.clock();
        this.lastCompletedAt = options.lastCompletedAt ?? null;
    }

    get isRunning(): boolean {
        return this.running;
    }

    get lastCompleted(): Date | null {
        return this.lastCompletedAt;
    }

    nextRunAt(): Date {
        if (this.lastCompletedAt) return new Date(this.lastCompletedAt.getTime() + this.intervalMs);
        return new Date(this.createdAt.getTime() + this.initialDelayMs);
    }

    /** Runs a cycle if one is due and none is in flight; otherwise returns null. */
    async tick(): Promise<CycleSummary | null> {
        if (this.running) return null;
        if (this.clock().getTime() < this.nextRunAt().getTime()) return null;

        this.running = true;
        this.controller = new AbortController();
        try {
            return await this.runCycle(this.controller.signal);
        } finally {
            this.running = false;
            this.controller = null;
            this.lastCompletedAt = this.clock();
        }
    }

    async runCycle(signal?: AbortSignal): Promise<CycleSummary> {
        const startedAt = this.clock().getTime();
        const targets = await this.store.repo.listActiveTargets();
        const sites = new Map<string, SourceSite | null>();

        log.info(`[Scheduler] Crawl cycle started: ${targets.length} active targets`);

        let succeeded = 0;
        let failed = 0;
        let skipped = 0;

        for (const target of targets) {
            if (signal?.aborted) {
                skipped++;
                continue;
            }

            let site = sites.get(target.sourceSiteId);
            if (site === undefined) {
                site = await this.store.repo.findSourceSiteById(target.sourceSiteId);
                sites.set(target.sourceSiteId, site);
            }
            if (!site) {
                log.warning(`[Scheduler] Target ${target.id} references missing site ${target.sourceSiteId}; skipping`);
                skipped++;
                continue;
            }
            if (!site.crawlEnabled) {
                log.debug(`[Scheduler] Site ${site.name} is disabled; skipping ${target.url}`);
                skipped++;
                continue;
            }

            try {
                const attempt = await this.worker.process(target, site, signal);
                if (attempt.status === 'SUCCESS') succeeded++;
                else failed++;
            } catch (err) {
                log.exception(err instanceof Error ? err : new Error(String(err)), `[Scheduler] Target ${target.url} failed`);
                failed++;
            }
        }

        const summary: CycleSummary = {
            targets: targets.length,
            succeeded,
            failed,
            skipped,
            durationMs: this.clock().getTime() - startedAt,
        };

        log.info(`\n${'─'.repeat(60)}`);
        log.info(`  CRAWL CYCLE COMPLETE`);
        log.info(`  Targets   : ${summary.targets}`);
        log.info(`  Succeeded : ${summary.succeeded}`);
        log.info(`  Failed    : ${summary.failed}`);
        log.info(`  Skipped   : ${summary.skipped}`);
        log.info(`  Duration  : ${(summary.durationMs / 1000).toFixed(1)}s`);
        log.info(`${'─'.repeat(60)}`);

        return summary;
    }

    start(): void {
        if (this.started) return;
        this.started = true;
        log.info(`[Scheduler] Started; first cycle at ${this.nextRunAt().toISOString()}`);
        this.arm();
    }

    stop(): void {
        this.started = false;
        if (this.timer) {
            clearTimeout(this.timer);
            this.timer = null;
        }
        if (this.controller) {
            log.info('[Scheduler] Aborting in-flight crawl');
            this.controller.abort();
        }
    }

    private arm(): void {
        const delay = Math.max(0, this.nextRunAt().getTime() - this.clock().getTime());
        if (this.timer) clearTimeout(this.timer);
        this.timer = setTimeout(() => {
            this.timer = null;
            this.tick()
                .catch((err: unknown) => {
                    log.exception(err instanceof Error ? err : new Error(String(err)), '[Scheduler] Crawl cycle failed');
                })
                .finally(() => {
                    // A restart during this cycle has already armed its own timer.
                    if (this.started && !this.timer) this.arm();
                });
        }, delay);
    }
}
