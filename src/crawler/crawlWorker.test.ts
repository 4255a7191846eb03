import { describe, it, expect, beforeEach } from 'vitest';
import { MemoryStore } from '../db/memoryStore.js';
import { SkillExtractor } from '../analytics/skillExtractor.js';
import { T0, addSite } from '../testing/fixtures.js';
import type { Sleep } from '../utils/sleep.js';
import type { FetchedPage, PageFetcher } from './fetcher.js';
import type { RawJobRecord, SiteExtractor } from './extractors/index.js';
import { CrawlWorker, type CrawlWorkerOptions } from './crawlWorker.js';

type Response = FetchedPage | Error | number;

/** Plays back one scripted response per call; the last one repeats. */
class ScriptedFetcher implements PageFetcher {
    readonly calls: string[] = [];

    constructor(private readonly script: Response[]) {}

    async fetch(url: string): Promise<FetchedPage> {
        this.calls.push(url);
        const next = this.script[Math.min(this.calls.length - 1, this.script.length - 1)];
        if (next instanceof Error) throw next;
        if (typeof next === 'number') return { url, statusCode: next, body: '' };
        return next;
    }
}

function page(body: string, url = 'https://jobs.test/freshersworld/search'): FetchedPage {
    return { url, statusCode: 200, body };
}

function stubExtractor(records: RawJobRecord[]): SiteExtractor {
    return { siteName: 'freshersworld', extract: () => records };
}

/** Fails every attach, as a lost connection to the skill tables would. */
class FailingSkillExtractor extends SkillExtractor {
    override async extractAndAttach(): Promise<string[]> {
        throw new Error('skill tables unavailable');
    }
}

function card(n: number, title: string): RawJobRecord {
    return {
        rawTitle: title,
        rawCompany: 'Zoho',
        rawLocation: 'Chennai',
        listingUrl: `https://jobs.test/listing/${n}`,
        salaryText: null,
        description: null,
    };
}

describe('CrawlWorker', () => {
    let store: MemoryStore;
    let delays: number[];
    let recordingSleep: Sleep;

    beforeEach(() => {
        store = new MemoryStore();
        delays = [];
        recordingSleep = async (ms) => {
            delays.push(ms);
        };
    });

    function worker(options: CrawlWorkerOptions): CrawlWorker {
        return new CrawlWorker(store, { backoffBaseMs: 2000, sleep: recordingSleep, clock: () => T0, ...options });
    }

    // ─── Fetch ────────────────────────────────────────────────────────────────

    it('halts with HTTP_FAIL and writes no evidence when every fetch fails', async () => {
        const { site, target } = await addSite(store);
        const fetcher = new ScriptedFetcher([503]);

        const attempt = await worker({ fetcher, extractors: () => stubExtractor([card(1, 'Java Developer')]) })
            .process(target, site);

        expect(attempt.status).toBe('HTTP_FAIL');
        expect(attempt.httpCode).toBe(503);
        expect(attempt.errorMessage).toBe('All 3 fetch attempts failed: HTTP 503');
        expect(attempt.jobsFoundCount).toBe(0);
        expect(attempt.finishedAt).toEqual(T0);
        expect(fetcher.calls).toHaveLength(3);
        expect(delays).toEqual([3000, 2000, 3000, 4000, 3000]);
        expect(await store.repo.countJobs()).toBe(0);
        expect(await store.repo.countObservations()).toBe(0);
    });

    it('reports a transport error without an HTTP code', async () => {
        const { site, target } = await addSite(store, { maxRetries: 0 });

        const attempt = await worker({ fetcher: new ScriptedFetcher([new Error('ECONNRESET')]) })
            .process(target, site);

        expect(attempt.status).toBe('HTTP_FAIL');
        expect(attempt.httpCode).toBeNull();
        expect(attempt.errorMessage).toBe('All 1 fetch attempts failed: ECONNRESET');
        expect(delays).toEqual([3000]);
    });

    it('retries after a server error and records the page once it loads', async () => {
        const { site, target } = await addSite(store);
        const fetcher = new ScriptedFetcher([500, page('<html></html>')]);

        const attempt = await worker({ fetcher, extractors: () => stubExtractor([card(1, 'Java Developer')]) })
            .process(target, site);

        expect(attempt.status).toBe('SUCCESS');
        expect(attempt.httpCode).toBe(200);
        expect(attempt.jobsFoundCount).toBe(1);
        expect(fetcher.calls).toHaveLength(2);
        expect(delays).toEqual([3000, 2000, 3000, 600]);
    });

    it('stops retrying when aborted during the courtesy delay', async () => {
        const { site, target } = await addSite(store);
        const controller = new AbortController();
        const fetcher = new ScriptedFetcher([page('<html></html>')]);
        const abortingSleep: Sleep = async () => {
            controller.abort();
        };

        const attempt = await worker({ fetcher, sleep: abortingSleep }).process(target, site, controller.signal);

        expect(attempt.status).toBe('HTTP_FAIL');
        expect(attempt.errorMessage).toBe('Crawl aborted');
        expect(fetcher.calls).toHaveLength(0);
    });

    // ─── Extraction ───────────────────────────────────────────────────────────

    it('marks a page whose structure changed as PARSE_FAIL', async () => {
        const { site, target } = await addSite(store, { name: 'timesjobs' });
        const fetcher = new ScriptedFetcher([
            page('<html><body><p>Access denied</p></body></html>', target.url),
        ]);

        const attempt = await worker({ fetcher }).process(target, site);

        expect(attempt.status).toBe('PARSE_FAIL');
        expect(attempt.httpCode).toBe(200);
        expect(attempt.errorMessage).toBe(
            '[timesjobs] Listing container "ul.new-joblist" not found on https://jobs.test/timesjobs/search'
        );
        expect(await store.repo.countObservations()).toBe(0);
    });

    it('marks a Freshersworld page without its job list container as PARSE_FAIL', async () => {
        const { site, target } = await addSite(store);
        const fetcher = new ScriptedFetcher([
            page('<html><body><div class="new-layout"><p>Jobs moved</p></div></body></html>'),
        ]);

        const attempt = await worker({ fetcher }).process(target, site);

        expect(attempt.status).toBe('PARSE_FAIL');
        expect(attempt.httpCode).toBe(200);
        expect(attempt.jobsFoundCount).toBe(0);
        expect(attempt.errorMessage).toBe(
            '[freshersworld] Listing container "#all-jobs-append" not found on https://jobs.test/freshersworld/search'
        );
        expect(await store.repo.countObservations()).toBe(0);
    });

    it('marks a site without an extractor as PARSE_FAIL', async () => {
        const { site, target } = await addSite(store, { name: 'naukri' });

        const attempt = await worker({ fetcher: new ScriptedFetcher([page('<html></html>')]) }).process(target, site);

        expect(attempt.status).toBe('PARSE_FAIL');
        expect(attempt.errorMessage).toBe('No extractor registered for site "naukri"');
    });

    it('treats a page without cards as a successful crawl of zero jobs', async () => {
        const { site, target } = await addSite(store, { name: 'timesjobs' });
        const fetcher = new ScriptedFetcher([
            page('<html><body><ul class="new-joblist"></ul></body></html>', target.url),
        ]);

        const attempt = await worker({ fetcher }).process(target, site);

        expect(attempt.status).toBe('SUCCESS');
        expect(attempt.jobsFoundCount).toBe(0);
        expect(attempt.errorMessage).toBeNull();
    });

    // ─── Records ──────────────────────────────────────────────────────────────

    it('skips a malformed record and records the other four', async () => {
        const { site, target } = await addSite(store);
        const records = [
            card(1, 'Java Developer'),
            card(2, 'Frontend Developer'),
            { ...card(3, 'Data Engineer'), listingUrl: 'not a url' },
            card(4, 'QA Engineer'),
            card(5, 'DevOps Engineer'),
        ];

        const attempt = await worker({
            fetcher: new ScriptedFetcher([page('<html></html>')]),
            extractors: () => stubExtractor(records),
        }).process(target, site);

        expect(attempt.status).toBe('SUCCESS');
        expect(attempt.jobsFoundCount).toBe(4);
        expect(await store.repo.countObservations()).toBe(4);
        expect(store.state.sources.size).toBe(4);
        expect(await store.repo.findJobSourceByUrl('not a url')).toBeNull();
    });

    it('finishes what it recorded when aborted between records', async () => {
        const { site, target } = await addSite(store);
        const controller = new AbortController();
        const abortAfterFirstRecord: Sleep = async (ms) => {
            delays.push(ms);
            if (ms === 600) controller.abort();
        };

        const attempt = await worker({
            fetcher: new ScriptedFetcher([page('<html></html>')]),
            extractors: () => stubExtractor([card(1, 'Java Developer'), card(2, 'QA Engineer'), card(3, 'Chef')]),
            sleep: abortAfterFirstRecord,
        }).process(target, site, controller.signal);

        expect(attempt.status).toBe('SUCCESS');
        expect(attempt.jobsFoundCount).toBe(1);
        expect(delays).toEqual([3000, 600]);
    });

    it('attaches skills from record descriptions', async () => {
        const { site, target } = await addSite(store);
        const record = { ...card(1, 'Java Developer'), description: 'Java services shipped in Docker' };

        await worker({
            fetcher: new ScriptedFetcher([page('<html></html>')]),
            extractors: () => stubExtractor([record]),
            skills: new SkillExtractor(store, ['java', 'docker', 'kafka']),
        }).process(target, site);

        const [job] = [...store.state.jobs.values()];
        expect(await store.repo.listSkillNamesForJob(job.id)).toEqual(['docker', 'java']);
    });

    it('still counts a recorded job when attaching its skills fails', async () => {
        const { site, target } = await addSite(store);
        const record = { ...card(1, 'Java Developer'), description: 'Java services shipped in Docker' };

        const attempt = await worker({
            fetcher: new ScriptedFetcher([page('<html></html>')]),
            extractors: () => stubExtractor([record, card(2, 'QA Engineer')]),
            skills: new FailingSkillExtractor(store, ['java']),
        }).process(target, site);

        expect(attempt.status).toBe('SUCCESS');
        expect(attempt.jobsFoundCount).toBe(2);
        expect(await store.repo.countObservations()).toBe(2);
        expect(delays).toEqual([3000, 600, 600]);
    });

    it('runs a real listing page through resolution and recording', async () => {
        const { site, target } = await addSite(store, { name: 'timesjobs' });
        const html = `
            <ul class="new-joblist">
              <li class="clearfix job-bx">
                <h3 class="joblist-comp-name">Infosys Ltd</h3>
                <h2><a class="jobTitle" href="/job-detail/1">Java Backend Developer</a></h2>
                <ul class="top-jd-dtl"><li><span>Pune</span></li><li class="sal">4 - 6 Lacs p.a.</li></ul>
              </li>
            </ul>`;

        const attempt = await worker({ fetcher: new ScriptedFetcher([page(html, target.url)]) }).process(target, site);

        expect(attempt.jobsFoundCount).toBe(1);
        const source = await store.repo.findJobSourceByUrl('https://jobs.test/job-detail/1');
        expect(source?.salaryText).toBe('4 - 6 Lacs p.a.');
        expect((await store.repo.findCompanyByNormalizedName('infosys'))?.displayName).toBe('Infosys Ltd');
    });
});
