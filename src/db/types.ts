/**
 * src/db/types.ts
 *
 * Record shapes for every table the observer owns.
 *
 * Records reference each other by id only (`companyId`, `jobSourceId`, …);
 * related rows are fetched through the Repository when needed, never held
 * as live object references. Ids are opaque strings.
 */

// ─── Identity ─────────────────────────────────────────────────────────────────

export interface Company {
    id: string;
    normalizedName: string;
    displayName: string;
    createdAt: Date;
}

export interface CompanyAlias {
    id: string;
    alias: string;
    companyId: string;
}

export interface Job {
    id: string;
    companyId: string;
    normalizedRole: string;
    normalizedLocation: string;
    fingerprint: string;
    firstSeenAt: Date;
    /** The only mutable column. Advanced, never lowered. */
    lastSeenAt: Date;
    createdAt: Date;
}

export interface Skill {
    id: string;
    name: string;
}

// ─── Crawl configuration ──────────────────────────────────────────────────────

export interface SourceSite {
    id: string;
    name: string;
    inactiveThresholdDays: number;
    repostThresholdDays: number;
    crawlDelaySeconds: number;
    maxRetries: number;
    crawlEnabled: boolean;
    reliabilityWeight: number;
    createdAt: Date;
}

export interface CrawlTarget {
    id: string;
    sourceSiteId: string;
    url: string;
    active: boolean;
}

// ─── Evidence ─────────────────────────────────────────────────────────────────

export type CrawlStatus = 'SUCCESS' | 'HTTP_FAIL' | 'PARSE_FAIL';

export interface CrawlAttempt {
    id: string;
    crawlTargetId: string;
    startedAt: Date;
    finishedAt: Date | null;
    status: CrawlStatus;
    httpCode: number | null;
    errorMessage: string | null;
    jobsFoundCount: number;
}

export interface AttemptCompletion {
    status: CrawlStatus;
    httpCode: number | null;
    errorMessage: string | null;
    jobsFoundCount: number;
    finishedAt: Date;
}

export interface JobSource {
    id: string;
    jobId: string;
    sourceSiteId: string;
    sourceUrl: string;
    /** A claim made by this listing, not part of the job's identity. */
    salaryText: string | null;
    firstSeenAt: Date;
    lastSeenAt: Date;
}

export interface JobObservation {
    id: string;
    jobSourceId: string;
    crawlAttemptId: string;
    observedAt: Date;
    rawTitle: string;
}

/** One observation joined with the rows needed to present it. */
export interface TimelineRow {
    observedAt: Date;
    sourceSite: string;
    sourceUrl: string;
    rawTitle: string;
    crawlStatus: CrawlStatus;
}

// ─── Insert shapes ────────────────────────────────────────────────────────────

export type NewCompany = Omit<Company, 'id'>;
export type NewJob = Omit<Job, 'id'>;
export type NewSourceSite = Omit<SourceSite, 'id' | 'createdAt'>;
export type NewCrawlTarget = Omit<CrawlTarget, 'id'>;
export type NewCrawlAttempt = Pick<CrawlAttempt, 'crawlTargetId' | 'startedAt'>;
export type NewJobSource = Omit<JobSource, 'id'>;
export type NewJobObservation = Omit<JobObservation, 'id'>;
