/**
 * src/db/store.ts
 *
 * Storage contract shared by the PostgreSQL store and the in-process store.
 *
 * Every `insert…IfAbsent` method relies on the table's unique constraint:
 * it returns the new row, or `null` when another writer already owns the key
 * (INSERT … ON CONFLICT DO NOTHING). Callers treat `null` as "lost the race"
 * and fall back to a lookup; it is never an error.
 *
 * `advance…LastSeen` methods are monotonic: the stored value becomes
 * max(stored, seenAt).
 *
 * Observations have an insert method and no update or delete method.
 */

import type {
    AttemptCompletion,
    Company,
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

export interface Repository {
    // ── Companies
    findCompanyById(id: string): Promise<Company | null>;
    findCompanyByNormalizedName(normalizedName: string): Promise<Company | null>;
    insertCompanyIfAbsent(company: NewCompany): Promise<Company | null>;
    /** Returns the canonical `normalizedName` the alias points at. */
    findCanonicalNameByAlias(alias: string): Promise<string | null>;
    insertCompanyAliasIfAbsent(alias: string, companyId: string): Promise<boolean>;

    // ── Jobs
    findJobById(id: string): Promise<Job | null>;
    findJobByFingerprint(fingerprint: string): Promise<Job | null>;
    insertJobIfAbsent(job: NewJob): Promise<Job | null>;
    advanceJobLastSeen(jobId: string, seenAt: Date): Promise<Job>;
    listJobsSeenSince(since: Date): Promise<Job[]>;
    countJobs(): Promise<number>;

    // ── Skills
    findOrCreateSkill(name: string): Promise<Skill>;
    /** Returns false when the pair already existed. */
    attachSkill(jobId: string, skillId: string): Promise<boolean>;
    listSkillNamesForJob(jobId: string): Promise<string[]>;

    // ── Sites and targets
    findSourceSiteById(id: string): Promise<SourceSite | null>;
    findSourceSiteByName(name: string): Promise<SourceSite | null>;
    listSourceSites(): Promise<SourceSite[]>;
    insertSourceSiteIfAbsent(site: NewSourceSite): Promise<SourceSite | null>;
    listActiveTargets(): Promise<CrawlTarget[]>;
    insertCrawlTargetIfAbsent(target: NewCrawlTarget): Promise<CrawlTarget | null>;

    // ── Attempts
    insertCrawlAttempt(attempt: NewCrawlAttempt): Promise<CrawlAttempt>;
    /** Terminal transition. Throws if the attempt is unknown or already finished. */
    completeCrawlAttempt(id: string, completion: AttemptCompletion): Promise<CrawlAttempt>;
    findCrawlAttemptById(id: string): Promise<CrawlAttempt | null>;

    // ── Sources
    findJobSourceByUrl(sourceUrl: string): Promise<JobSource | null>;
    insertJobSourceIfAbsent(source: NewJobSource): Promise<JobSource | null>;
    advanceJobSourceLastSeen(jobSourceId: string, seenAt: Date): Promise<JobSource>;
    listJobSourcesForJob(jobId: string): Promise<JobSource[]>;

    // ── Observations
    insertObservation(observation: NewJobObservation): Promise<JobObservation>;
    latestObservationAt(jobSourceId: string): Promise<Date | null>;
    /** Most recent first. */
    listTimelineForJob(jobId: string): Promise<TimelineRow[]>;
    countObservations(): Promise<number>;
}

export interface Store {
    /** Autocommit access: each call stands alone. */
    readonly repo: Repository;
    /**
     * Runs `work` as one unit: every write commits together or none does.
     * A rejected `work` rolls back and rethrows.
     */
    transaction<T>(work: (repo: Repository) => Promise<T>): Promise<T>;
    close(): Promise<void>;
}

/** Raised when a row the caller relies on does not exist. */
export class RecordNotFoundError extends Error {
    constructor(entity: string, id: string) {
        super(`${entity} ${id} not found`);
        this.name = 'RecordNotFoundError';
    }
}

/** Raised when a finished crawl attempt is completed a second time. */
export class AttemptAlreadyCompletedError extends Error {
    constructor(id: string) {
        super(`Crawl attempt ${id} is already complete`);
        this.name = 'AttemptAlreadyCompletedError';
    }
}
