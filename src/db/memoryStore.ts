/**
 * src/db/memoryStore.ts
 *
 * In-process Store used by the test suite and by `--memory` dry runs.
 *
 * Tables are plain Maps keyed by id. Unique keys are enforced on insert the
 * same way the PostgreSQL indexes are, and `…IfAbsent` inserts return null
 * on conflict.
 *
 * Transactions
 * ────────────
 *  • Units of work run one at a time (a promise chain acts as the lock).
 *    This mirrors how a Postgres writer blocks on a unique index entry held
 *    by an uncommitted transaction.
 *  • Each write inside a unit pushes an undo step; a rejected unit replays
 *    them in reverse.
 *  • Autocommit calls through `repo` are not queued behind the lock.
 */

import {
    AttemptAlreadyCompletedError,
    RecordNotFoundError,
    type Repository,
    type Store,
} from './store.js';
import type {
    AttemptCompletion,
    Company,
    CompanyAlias,
    CrawlAttempt,
    CrawlTarget,
    Job,
    JobObservation,
    JobSource,
    NewCompany,
    NewCrawlAttempt,
    NewCrawlTarget,
    NewJob,
    NewJobObservation,
    NewJobSource,
    NewSourceSite,
    Skill,
    SourceSite,
    TimelineRow,
} from './types.js';

// ─── State ────────────────────────────────────────────────────────────────────

interface JobSkillRow {
    jobId: string;
    skillId: string;
}

export class MemoryState {
    readonly companies = new Map<string, Company>();
    readonly aliases = new Map<string, CompanyAlias>();
    readonly jobs = new Map<string, Job>();
    readonly skills = new Map<string, Skill>();
    readonly jobSkills = new Map<string, JobSkillRow>();
    readonly sites = new Map<string, SourceSite>();
    readonly targets = new Map<string, CrawlTarget>();
    readonly attempts = new Map<string, CrawlAttempt>();
    readonly sources = new Map<string, JobSource>();
    readonly observations = new Map<string, JobObservation>();

    private sequence = 0;

    nextId(): string {
        this.sequence += 1;
        return String(this.sequence);
    }
}

type UndoStep = () => void;

function findOne<T>(table: Map<string, T>, predicate: (row: T) => boolean): T | null {
    for (const row of table.values()) {
        if (predicate(row)) return { ...row };
    }
    return null;
}

function findAll<T>(table: Map<string, T>, predicate: (row: T) => boolean): T[] {
    const rows: T[] = [];
    for (const row of table.values()) {
        if (predicate(row)) rows.push({ ...row });
    }
    return rows;
}

function later(a: Date, b: Date): Date {
    return b.getTime() > a.getTime() ? b : a;
}

// ─── Repository ───────────────────────────────────────────────────────────────

export class MemoryRepository implements Repository {
    constructor(
        private readonly state: MemoryState,
        private readonly journal: UndoStep[] | null = null,
    ) {}

    private insert<T extends { id: string }>(table: Map<string, T>, row: T): T {
        table.set(row.id, row);
        this.journal?.push(() => table.delete(row.id));
        return { ...row };
    }

    private replace<T extends { id: string }>(table: Map<string, T>, row: T): T {
        const previous = table.get(row.id);
        table.set(row.id, row);
        if (previous) {
            this.journal?.push(() => table.set(row.id, previous));
        }
        return { ...row };
    }

    // ── Companies

    async findCompanyById(id: string): Promise<Company | null> {
        return findOne(this.state.companies, (c) => c.id === id);
    }

    async findCompanyByNormalizedName(normalizedName: string): Promise<Company | null> {
        return findOne(this.state.companies, (c) => c.normalizedName === normalizedName);
    }

    async insertCompanyIfAbsent(company: NewCompany): Promise<Company | null> {
        if (await this.findCompanyByNormalizedName(company.normalizedName)) return null;
        return this.insert(this.state.companies, { id: this.state.nextId(), ...company });
    }

    async findCanonicalNameByAlias(alias: string): Promise<string | null> {
        const row = findOne(this.state.aliases, (a) => a.alias === alias);
        if (!row) return null;
        return this.state.companies.get(row.companyId)?.normalizedName ?? null;
    }

    async insertCompanyAliasIfAbsent(alias: string, companyId: string): Promise<boolean> {
        if (!this.state.companies.has(companyId)) {
            throw new RecordNotFoundError('Company', companyId);
        }
        if (findOne(this.state.aliases, (a) => a.alias === alias)) return false;
        this.insert(this.state.aliases, { id: this.state.nextId(), alias, companyId });
        return true;
    }

    // ── Jobs

    async findJobById(id: string): Promise<Job | null> {
        return findOne(this.state.jobs, (j) => j.id === id);
    }

    async findJobByFingerprint(fingerprint: string): Promise<Job | null> {
        return findOne(this.state.jobs, (j) => j.fingerprint === fingerprint);
    }

    async insertJobIfAbsent(job: NewJob): Promise<Job | null> {
        if (!this.state.companies.has(job.companyId)) {
            throw new RecordNotFoundError('Company', job.companyId);
        }
        if (findOne(this.state.jobs, (j) => j.fingerprint === job.fingerprint)) return null;
        return this.insert(this.state.jobs, { id: this.state.nextId(), ...job });
    }

    async advanceJobLastSeen(jobId: string, seenAt: Date): Promise<Job> {
        const current = this.state.jobs.get(jobId);
        if (!current) throw new RecordNotFoundError('Job', jobId);
        return this.replace(this.state.jobs, { ...current, lastSeenAt: later(current.lastSeenAt, seenAt) });
    }

    async listJobsSeenSince(since: Date): Promise<Job[]> {
        return findAll(this.state.jobs, (j) => j.lastSeenAt.getTime() > since.getTime());
    }

    async countJobs(): Promise<number> {
        return this.state.jobs.size;
    }

    // ── Skills

    async findOrCreateSkill(name: string): Promise<Skill> {
        const existing = findOne(this.state.skills, (s) => s.name === name);
        if (existing) return existing;
        return this.insert(this.state.skills, { id: this.state.nextId(), name });
    }

    async attachSkill(jobId: string, skillId: string): Promise<boolean> {
        const key = `${jobId}:${skillId}`;
        if (this.state.jobSkills.has(key)) return false;
        this.state.jobSkills.set(key, { jobId, skillId });
        this.journal?.push(() => this.state.jobSkills.delete(key));
        return true;
    }

    async listSkillNamesForJob(jobId: string): Promise<string[]> {
        const names: string[] = [];
        for (const row of this.state.jobSkills.values()) {
            if (row.jobId !== jobId) continue;
            const skill = this.state.skills.get(row.skillId);
            if (skill) names.push(skill.name);
        }
        return names.sort();
    }

    // ── Sites and targets

    async findSourceSiteById(id: string): Promise<SourceSite | null> {
        return findOne(this.state.sites, (s) => s.id === id);
    }

    async findSourceSiteByName(name: string): Promise<SourceSite | null> {
        return findOne(this.state.sites, (s) => s.name === name);
    }

    async listSourceSites(): Promise<SourceSite[]> {
        return findAll(this.state.sites, () => true);
    }

    async insertSourceSiteIfAbsent(site: NewSourceSite): Promise<SourceSite | null> {
        if (await this.findSourceSiteByName(site.name)) return null;
        return this.insert(this.state.sites, { id: this.state.nextId(), createdAt: new Date(), ...site });
    }

    async listActiveTargets(): Promise<CrawlTarget[]> {
        return findAll(this.state.targets, (t) => t.active);
    }

    async insertCrawlTargetIfAbsent(target: NewCrawlTarget): Promise<CrawlTarget | null> {
        if (!this.state.sites.has(target.sourceSiteId)) {
            throw new RecordNotFoundError('SourceSite', target.sourceSiteId);
        }
        if (findOne(this.state.targets, (t) => t.url === target.url)) return null;
        return this.insert(this.state.targets, { id: this.state.nextId(), ...target });
    }

    // ── Attempts

    async insertCrawlAttempt(attempt: NewCrawlAttempt): Promise<CrawlAttempt> {
        const row: CrawlAttempt = {
            id: this.state.nextId(),
            ...attempt,
            finishedAt: null,
            status: 'HTTP_FAIL',
            httpCode: null,
            errorMessage: null,
            jobsFoundCount: 0,
        };
        return this.insert(this.state.attempts, row);
    }

    async completeCrawlAttempt(id: string, completion: AttemptCompletion): Promise<CrawlAttempt> {
        const current = this.state.attempts.get(id);
        if (!current) throw new RecordNotFoundError('CrawlAttempt', id);
        if (current.finishedAt !== null) throw new AttemptAlreadyCompletedError(id);
        return this.replace(this.state.attempts, { ...current, ...completion });
    }

    async findCrawlAttemptById(id: string): Promise<CrawlAttempt | null> {
        return findOne(this.state.attempts, (a) => a.id === id);
    }

    // ── Sources

    async findJobSourceByUrl(sourceUrl: string): Promise<JobSource | null> {
        return findOne(this.state.sources, (s) => s.sourceUrl === sourceUrl);
    }

    async insertJobSourceIfAbsent(source: NewJobSource): Promise<JobSource | null> {
        if (!this.state.jobs.has(source.jobId)) throw new RecordNotFoundError('Job', source.jobId);
        if (await this.findJobSourceByUrl(source.sourceUrl)) return null;
        return this.insert(this.state.sources, { id: this.state.nextId(), ...source });
    }

    async advanceJobSourceLastSeen(jobSourceId: string, seenAt: Date): Promise<JobSource> {
        const current = this.state.sources.get(jobSourceId);
        if (!current) throw new RecordNotFoundError('JobSource', jobSourceId);
        return this.replace(this.state.sources, { ...current, lastSeenAt: later(current.lastSeenAt, seenAt) });
    }

    async listJobSourcesForJob(jobId: string): Promise<JobSource[]> {
        return findAll(this.state.sources, (s) => s.jobId === jobId);
    }

    // ── Observations

    async insertObservation(observation: NewJobObservation): Promise<JobObservation> {
        if (!this.state.sources.has(observation.jobSourceId)) {
            throw new RecordNotFoundError('JobSource', observation.jobSourceId);
        }
        if (!this.state.attempts.has(observation.crawlAttemptId)) {
            throw new RecordNotFoundError('CrawlAttempt', observation.crawlAttemptId);
        }
        return this.insert(this.state.observations, { id: this.state.nextId(), ...observation });
    }

    async latestObservationAt(jobSourceId: string): Promise<Date | null> {
        let latest: Date | null = null;
        for (const row of this.state.observations.values()) {
            if (row.jobSourceId !== jobSourceId) continue;
            if (!latest || row.observedAt.getTime() > latest.getTime()) latest = row.observedAt;
        }
        return latest;
    }

    async listTimelineForJob(jobId: string): Promise<TimelineRow[]> {
        const observations = [...this.state.observations.values()].sort(
            (a, b) => b.observedAt.getTime() - a.observedAt.getTime() || Number(b.id) - Number(a.id)
        );
        const rows: TimelineRow[] = [];
        for (const obs of observations) {
            const source = this.state.sources.get(obs.jobSourceId);
            if (!source || source.jobId !== jobId) continue;
            const site = this.state.sites.get(source.sourceSiteId);
            const attempt = this.state.attempts.get(obs.crawlAttemptId);
            rows.push({
                observedAt: obs.observedAt,
                sourceSite: site?.name ?? 'unknown',
                sourceUrl: source.sourceUrl,
                rawTitle: obs.rawTitle,
                crawlStatus: attempt?.status ?? 'HTTP_FAIL',
            });
        }
        return rows;
    }

    async countObservations(): Promise<number> {
        return this.state.observations.size;
    }
}

// ─── Store ────────────────────────────────────────────────────────────────────

export class MemoryStore implements Store {
    readonly state = new MemoryState();
    readonly repo: Repository = new MemoryRepository(this.state);

    private tail: Promise<void> = Promise.resolve();

    transaction<T>(work: (repo: Repository) => Promise<T>): Promise<T> {
        const run = this.tail.then(() => this.runUnit(work));
        this.tail = run.then(
            () => undefined,
            () => undefined,
        );
        return run;
    }

    private async runUnit<T>(work: (repo: Repository) => Promise<T>): Promise<T> {
        const journal: UndoStep[] = [];
        try {
            return await work(new MemoryRepository(this.state, journal));
        } catch (err) {
            for (const undo of journal.reverse()) undo();
            throw err;
        }
    }

    async close(): Promise<void> {
        await this.tail;
    }
}
