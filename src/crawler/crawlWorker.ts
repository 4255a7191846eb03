/**
 * src/crawler/crawlWorker.ts
 *
 * Processes one CrawlTarget end to end and leaves exactly one completed
 * CrawlAttempt behind.
 *
 * PHASES
 * ──────
 *  1. Attempt-open    insert the attempt as HTTP_FAIL, autocommitted, so a
 *                     crash mid-crawl still reads as a failed fetch.
 *  2. Fetch           up to maxRetries + 1 tries. crawlDelaySeconds before
 *                     each; backoffBaseMs × 2^i after failure i. Non-2xx is
 *                     a failure. Exhaustion → HTTP_FAIL, nothing recorded.
 *  3. Extract         missing extractor or a thrown error → PARSE_FAIL.
 *                     An empty result is a SUCCESS with 0 jobs.
 *  4. Record          per card: validate → resolve → record, then skills.
 *                     A failing card is logged and skipped; a skill
 *                     failure is logged and the card still counts.
 *  5. Attempt-close   SUCCESS with the number of recorded cards.
 *
 * OUTCOMES
 * ────────
 *   HTTP_FAIL   the site could not be reached; says nothing about its jobs
 *   PARSE_FAIL  the site answered but its markup no longer matches
 *   SUCCESS     evidence was recorded (possibly none)
 */

import { log } from 'crawlee';
import type { Store } from '../db/store.js';
import type { AttemptCompletion, CrawlAttempt, CrawlTarget, Job, SourceSite } from '../db/types.js';
import { JobResolver } from '../resolver/jobResolver.js';
import { ObservationRecorder } from '../resolver/observationRecorder.js';
import type { SkillExtractor } from '../analytics/skillExtractor.js';
import { sleep as realSleep, type Sleep } from '../utils/sleep.js';
import type { FetchedPage, PageFetcher } from './fetcher.js';
import { getExtractor, type ExtractorLookup } from './extractors/index.js';
import { rawJobRecordSchema, type RawJobRecord } from './extractors/types.js';

export interface CrawlWorkerOptions {
    fetcher: PageFetcher;
    extractors?: ExtractorLookup;
    /** Attached after each recorded card that carries a description. */
    skills?: SkillExtractor;
    backoffBaseMs?: number;
    sleep?: Sleep;
    clock?: () => Date;
}

type FetchOutcome =
    | { ok: true; page: FetchedPage }
    | { ok: false; httpCode: number | null; message: string };

const ABORTED = 'Crawl aborted';

function describe(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

export class CrawlWorker {
    private readonly resolver: JobResolver;
    private readonly recorder: ObservationRecorder;
    private readonly extractors: ExtractorLookup;
    private readonly backoffBaseMs: number;
    private readonly sleep: Sleep;
    private readonly clock: () => Date;

    constructor(
        private readonly store: Store,
        private readonly options: CrawlWorkerOptions
    ) {
        this.resolver = new JobResolver(store);
        this.recorder = new ObservationRecorder(store);
        this.extractors = options.extractors ?? getExtractor;
        this.backoffBaseMs = options.backoffBaseMs ?? 2_000;
        this.sleep = options.sleep ?? realSleep;
        this.clock = options.clock ?? (() => new Date());
    }

    async process(target: CrawlTarget, site: SourceSite, signal?: AbortSignal): Promise<CrawlAttempt> {
        const tag = `[${site.name}]`;
        log.info(`${tag} Starting crawl: ${target.url}`);

        const attempt = await this.store.repo.insertCrawlAttempt({
            crawlTargetId: target.id,
            startedAt: this.clock(),
        });

        // ── Fetch
        const fetched = await this.fetchWithRetry(target, site, signal);
        if (!fetched.ok) {
            log.error(`${tag} ${fetched.message}`);
            return this.complete(attempt, 'HTTP_FAIL', fetched.httpCode, fetched.message, 0);
        }
        const { page } = fetched;

        // ── Extract
        const extractor = this.extractors(site.name);
        if (!extractor) {
            const message = `No extractor registered for site "${site.name}"`;
            log.error(`${tag} ${message}`);
            return this.complete(attempt, 'PARSE_FAIL', page.statusCode, message, 0);
        }

        let records: unknown[];
        try {
            records = extractor.extract(page.body, { siteName: site.name, baseUrl: page.url || target.url });
        } catch (err) {
            log.error(`${tag} Extraction failed: ${describe(err)}`);
            return this.complete(attempt, 'PARSE_FAIL', page.statusCode, describe(err), 0);
        }

        if (records.length === 0) {
            log.warning(`${tag} Parsed 0 jobs. The page may have changed structure; verify the card selector.`);
        }

        // ── Record
        let recorded = 0;
        for (const [index, candidate] of records.entries()) {
            if (signal?.aborted) {
                log.warning(`${tag} Aborted after ${recorded}/${records.length} records`);
                break;
            }
            let record: RawJobRecord;
            let job: Job;
            try {
                record = rawJobRecordSchema.parse(candidate);
                const seenAt = this.clock();
                job = await this.resolver.resolve(record, seenAt);
                await this.recorder.record({
                    job,
                    site,
                    attempt,
                    sourceUrl: record.listingUrl,
                    rawTitle: record.rawTitle,
                    salaryText: record.salaryText ?? null,
                    observedAt: seenAt,
                });
                recorded++;
            } catch (err) {
                log.warning(`${tag} Skipping record ${index + 1}/${records.length}: ${describe(err)}`);
                continue;
            }

            // Evidence is committed at this point; skills are analytics only.
            const description = record.description;
            if (this.options.skills && description) {
                try {
                    await this.options.skills.extractAndAttach(job, description);
                } catch (err) {
                    log.warning(`${tag} Skill extraction failed for job ${job.id}: ${describe(err)}`);
                }
            }
            await this.sleep(site.crawlDelaySeconds * 200, signal);
        }

        log.info(`${tag} Crawl complete: recorded ${recorded}/${records.length} jobs`);
        return this.complete(attempt, 'SUCCESS', page.statusCode, null, recorded);
    }

    private async fetchWithRetry(target: CrawlTarget, site: SourceSite, signal?: AbortSignal): Promise<FetchOutcome> {
        const tag = `[${site.name}]`;
        const tries = site.maxRetries + 1;
        let lastCode: number | null = null;
        let lastError = 'no response';

        for (let i = 0; i < tries; i++) {
            await this.sleep(site.crawlDelaySeconds * 1000, signal);
            if (signal?.aborted) return { ok: false, httpCode: lastCode, message: ABORTED };

            try {
                const page = await this.options.fetcher.fetch(target.url, signal);
                if (page.statusCode >= 200 && page.statusCode < 300) {
                    log.debug(`${tag} Fetch succeeded on try ${i + 1}`);
                    return { ok: true, page };
                }
                lastCode = page.statusCode;
                lastError = `HTTP ${page.statusCode}`;
            } catch (err) {
                if (signal?.aborted) return { ok: false, httpCode: lastCode, message: ABORTED };
                lastError = describe(err);
            }

            log.warning(`${tag} Fetch failed (try ${i + 1}/${tries}): ${lastError}`);
            if (i < tries - 1) {
                const backoffMs = this.backoffBaseMs * 2 ** i;
                log.debug(`${tag} Backing off ${backoffMs}ms`);
                await this.sleep(backoffMs, signal);
            }
        }

        return { ok: false, httpCode: lastCode, message: `All ${tries} fetch attempts failed: ${lastError}` };
    }

    private complete(
        attempt: CrawlAttempt,
        status: AttemptCompletion['status'],
        httpCode: number | null,
        errorMessage: string | null,
        jobsFoundCount: number
    ): Promise<CrawlAttempt> {
        return this.store.repo.completeCrawlAttempt(attempt.id, {
            status,
            httpCode,
            errorMessage,
            jobsFoundCount,
            finishedAt: this.clock(),
        });
    }
}
