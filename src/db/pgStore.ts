/**
 * src/db/pgStore.ts
 *
 * PostgreSQL implementation of the Store.
 *
 * • Autocommit calls go straight to the pool.
 * • transaction() checks out one client and wraps the unit in
 *   BEGIN / COMMIT, issuing ROLLBACK when the unit rejects.
 * • Inserts on unique keys use INSERT … ON CONFLICT DO NOTHING RETURNING *.
 *   An empty RETURNING set means a concurrent writer owns the key; the
 *   caller looks the row up instead. Under READ COMMITTED the insert waits
 *   for the competing transaction, so the follow-up lookup sees its row.
 */

import pkg from 'pg';
import { log } from 'crawlee';
import {
    AttemptAlreadyCompletedError,
    RecordNotFoundError,
    type Repository,
    type Store,
} from './store.js';
import type {
    AttemptCompletion,
    Company,
    CrawlAttempt,
    CrawlStatus,
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

type Executor = <R extends pkg.QueryResultRow>(sql: string, values?: unknown[]) => Promise<R[]>;

// ─── Row shapes ───────────────────────────────────────────────────────────────

interface CompanyRow {
    id: string;
    normalized_name: string;
    display_name: string;
    created_at: Date;
}

interface JobRow {
    id: string;
    company_id: string;
    normalized_role: string;
    normalized_location: string;
    fingerprint: string;
    first_seen_at: Date;
    last_seen_at: Date;
    created_at: Date;
}

interface SkillRow {
    id: string;
    name: string;
}

interface SourceSiteRow {
    id: string;
    name: string;
    inactive_threshold_days: number;
    repost_threshold_days: number;
    reliability_weight: number;
    crawl_delay_seconds: number;
    max_retries: number;
    crawl_enabled: boolean;
    created_at: Date;
}

interface CrawlTargetRow {
    id: string;
    source_site_id: string;
    url: string;
    active: boolean;
}

interface CrawlAttemptRow {
    id: string;
    crawl_target_id: string;
    started_at: Date;
    finished_at: Date | null;
    status: CrawlStatus;
    http_code: number | null;
    error_message: string | null;
    jobs_found_count: number;
}

interface JobSourceRow {
    id: string;
    job_id: string;
    source_site_id: string;
    source_url: string;
    salary_text: string | null;
    first_seen_at: Date;
    last_seen_at: Date;
}

interface ObservationRow {
    id: string;
    job_source_id: string;
    crawl_attempt_id: string;
    observed_at: Date;
    raw_title: string;
}

interface TimelineDbRow {
    observed_at: Date;
    source_site: string;
    source_url: string;
    raw_title: string;
    crawl_status: CrawlStatus;
}

// ─── Mappers ──────────────────────────────────────────────────────────────────

const toCompany = (r: CompanyRow): Company => ({
    id: r.id,
    normalizedName: r.normalized_name,
    displayName: r.display_name,
    createdAt: r.created_at,
});

const toJob = (r: JobRow): Job => ({
    id: r.id,
    companyId: r.company_id,
    normalizedRole: r.normalized_role,
    normalizedLocation: r.normalized_location,
    fingerprint: r.fingerprint,
    firstSeenAt: r.first_seen_at,
    lastSeenAt: r.last_seen_at,
    createdAt: r.created_at,
});

const toSite = (r: SourceSiteRow): SourceSite => ({
    id: r.id,
    name: r.name,
    inactiveThresholdDays: r.inactive_threshold_days,
    repostThresholdDays: r.repost_threshold_days,
    reliabilityWeight: r.reliability_weight,
    crawlDelaySeconds: r.crawl_delay_seconds,
    maxRetries: r.max_retries,
    crawlEnabled: r.crawl_enabled,
    createdAt: r.created_at,
});

const toTarget = (r: CrawlTargetRow): CrawlTarget => ({
    id: r.id,
    sourceSiteId: r.source_site_id,
    url: r.url,
    active: r.active,
});

const toAttempt = (r: CrawlAttemptRow): CrawlAttempt => ({
    id: r.id,
    crawlTargetId: r.crawl_target_id,
    startedAt: r.started_at,
    finishedAt: r.finished_at,
    status: r.status,
    httpCode: r.http_code,
    errorMessage: r.error_message,
    jobsFoundCount: r.jobs_found_count,
});

const toSource = (r: JobSourceRow): JobSource => ({
    id: r.id,
    jobId: r.job_id,
    sourceSiteId: r.source_site_id,
    sourceUrl: r.source_url,
    salaryText: r.salary_text,
    firstSeenAt: r.first_seen_at,
    lastSeenAt: r.last_seen_at,
});

const toObservation = (r: ObservationRow): JobObservation => ({
    id: r.id,
    jobSourceId: r.job_source_id,
    crawlAttemptId: r.crawl_attempt_id,
    observedAt: r.observed_at,
    rawTitle: r.raw_title,
});

function firstOrNull<R, T>(rows: R[], map: (row: R) => T): T | null {
    const row = rows[0];
    return row === undefined ? null : map(row);
}

function firstOrThrow<R, T>(rows: R[], map: (row: R) => T, entity: string, id: string): T {
    const row = rows[0];
    if (row === undefined) throw new RecordNotFoundError(entity, id);
    return map(row);
}

// ─── Repository ───────────────────────────────────────────────────────────────

export class PgRepository implements Repository {
    constructor(private readonly exec: Executor) {}

    // ── Companies

    async findCompanyById(id: string): Promise<Company | null> {
        const rows = await this.exec<CompanyRow>('SELECT * FROM company WHERE id = $1', [id]);
        return firstOrNull(rows, toCompany);
    }

    async findCompanyByNormalizedName(normalizedName: string): Promise<Company | null> {
        const rows = await this.exec<CompanyRow>(
            'SELECT * FROM company WHERE normalized_name = $1',
            [normalizedName]
        );
        return firstOrNull(rows, toCompany);
    }

    async insertCompanyIfAbsent(company: NewCompany): Promise<Company | null> {
        const rows = await this.exec<CompanyRow>(
            `INSERT INTO company (normalized_name, display_name, created_at)
             VALUES ($1, $2, $3)
             ON CONFLICT (normalized_name) DO NOTHING
             RETURNING *`,
            [company.normalizedName, company.displayName, company.createdAt]
        );
        return firstOrNull(rows, toCompany);
    }

    async findCanonicalNameByAlias(alias: string): Promise<string | null> {
        const rows = await this.exec<{ normalized_name: string }>(
            `SELECT c.normalized_name
             FROM company_alias a
             JOIN company c ON c.id = a.company_id
             WHERE a.alias = $1`,
            [alias]
        );
        return rows[0]?.normalized_name ?? null;
    }

    async insertCompanyAliasIfAbsent(alias: string, companyId: string): Promise<boolean> {
        const rows = await this.exec<{ id: string }>(
            `INSERT INTO company_alias (alias, company_id)
             VALUES ($1, $2)
             ON CONFLICT (alias) DO NOTHING
             RETURNING id`,
            [alias, companyId]
        );
        return rows.length > 0;
    }

    // ── Jobs

    async findJobById(id: string): Promise<Job | null> {
        const rows = await this.exec<JobRow>('SELECT * FROM job WHERE id = $1', [id]);
        return firstOrNull(rows, toJob);
    }

    async findJobByFingerprint(fingerprint: string): Promise<Job | null> {
        const rows = await this.exec<JobRow>('SELECT * FROM job WHERE fingerprint = $1', [fingerprint]);
        return firstOrNull(rows, toJob);
    }

    async insertJobIfAbsent(job: NewJob): Promise<Job | null> {
        const rows = await this.exec<JobRow>(
            `INSERT INTO job
                (company_id, normalized_role, normalized_location, fingerprint,
                 first_seen_at, last_seen_at, created_at)
             VALUES ($1, $2, $3, $4, $5, $6, $7)
             ON CONFLICT (fingerprint) DO NOTHING
             RETURNING *`,
            [
                job.companyId,
                job.normalizedRole,
                job.normalizedLocation,
                job.fingerprint,
                job.firstSeenAt,
                job.lastSeenAt,
                job.createdAt,
            ]
        );
        return firstOrNull(rows, toJob);
    }

    async advanceJobLastSeen(jobId: string, seenAt: Date): Promise<Job> {
        const rows = await this.exec<JobRow>(
            `UPDATE job SET last_seen_at = GREATEST(last_seen_at, $2)
             WHERE id = $1
             RETURNING *`,
            [jobId, seenAt]
        );
        return firstOrThrow(rows, toJob, 'Job', jobId);
    }

    async listJobsSeenSince(since: Date): Promise<Job[]> {
        const rows = await this.exec<JobRow>(
            'SELECT * FROM job WHERE last_seen_at > $1 ORDER BY last_seen_at DESC',
            [since]
        );
        return rows.map(toJob);
    }

    async countJobs(): Promise<number> {
        const rows = await this.exec<{ count: number }>('SELECT COUNT(*)::int AS count FROM job');
        return rows[0]?.count ?? 0;
    }

    // ── Skills

    async findOrCreateSkill(name: string): Promise<Skill> {
        const inserted = await this.exec<SkillRow>(
            'INSERT INTO skill (name) VALUES ($1) ON CONFLICT (name) DO NOTHING RETURNING *',
            [name]
        );
        const row = inserted[0] ?? (await this.exec<SkillRow>('SELECT * FROM skill WHERE name = $1', [name]))[0];
        if (row === undefined) throw new RecordNotFoundError('Skill', name);
        return { id: row.id, name: row.name };
    }

    async attachSkill(jobId: string, skillId: string): Promise<boolean> {
        const rows = await this.exec<{ job_id: string }>(
            `INSERT INTO job_skill (job_id, skill_id)
             VALUES ($1, $2)
             ON CONFLICT DO NOTHING
             RETURNING job_id`,
            [jobId, skillId]
        );
        return rows.length > 0;
    }

    async listSkillNamesForJob(jobId: string): Promise<string[]> {
        const rows = await this.exec<{ name: string }>(
            `SELECT s.name
             FROM job_skill js
             JOIN skill s ON s.id = js.skill_id
             WHERE js.job_id = $1
             ORDER BY s.name`,
            [jobId]
        );
        return rows.map((r) => r.name);
    }

    // ── Sites and targets

    async findSourceSiteById(id: string): Promise<SourceSite | null> {
        const rows = await this.exec<SourceSiteRow>('SELECT * FROM source_site WHERE id = $1', [id]);
        return firstOrNull(rows, toSite);
    }

    async findSourceSiteByName(name: string): Promise<SourceSite | null> {
        const rows = await this.exec<SourceSiteRow>('SELECT * FROM source_site WHERE name = $1', [name]);
        return firstOrNull(rows, toSite);
    }

    async listSourceSites(): Promise<SourceSite[]> {
        const rows = await this.exec<SourceSiteRow>('SELECT * FROM source_site ORDER BY id');
        return rows.map(toSite);
    }

    async insertSourceSiteIfAbsent(site: NewSourceSite): Promise<SourceSite | null> {
        const rows = await this.exec<SourceSiteRow>(
            `INSERT INTO source_site
                (name, inactive_threshold_days, repost_threshold_days, reliability_weight,
                 crawl_delay_seconds, max_retries, crawl_enabled)
             VALUES ($1, $2, $3, $4, $5, $6, $7)
             ON CONFLICT (name) DO NOTHING
             RETURNING *`,
            [
                site.name,
                site.inactiveThresholdDays,
                site.repostThresholdDays,
                site.reliabilityWeight,
                site.crawlDelaySeconds,
                site.maxRetries,
                site.crawlEnabled,
            ]
        );
        return firstOrNull(rows, toSite);
    }

    async listActiveTargets(): Promise<CrawlTarget[]> {
        const rows = await this.exec<CrawlTargetRow>('SELECT * FROM crawl_target WHERE active ORDER BY id');
        return rows.map(toTarget);
    }

    async insertCrawlTargetIfAbsent(target: NewCrawlTarget): Promise<CrawlTarget | null> {
        const rows = await this.exec<CrawlTargetRow>(
            `INSERT INTO crawl_target (source_site_id, url, active)
             VALUES ($1, $2, $3)
             ON CONFLICT (url) DO NOTHING
             RETURNING *`,
            [target.sourceSiteId, target.url, target.active]
        );
        return firstOrNull(rows, toTarget);
    }

    // ── Attempts

    async insertCrawlAttempt(attempt: NewCrawlAttempt): Promise<CrawlAttempt> {
        const rows = await this.exec<CrawlAttemptRow>(
            `INSERT INTO crawl_attempt (crawl_target_id, started_at, status, jobs_found_count)
             VALUES ($1, $2, 'HTTP_FAIL', 0)
             RETURNING *`,
            [attempt.crawlTargetId, attempt.startedAt]
        );
        return firstOrThrow(rows, toAttempt, 'CrawlAttempt', 'new');
    }

    async completeCrawlAttempt(id: string, completion: AttemptCompletion): Promise<CrawlAttempt> {
        const rows = await this.exec<CrawlAttemptRow>(
            `UPDATE crawl_attempt
             SET finished_at = $2, status = $3, http_code = $4, error_message = $5, jobs_found_count = $6
             WHERE id = $1 AND finished_at IS NULL
             RETURNING *`,
            [
                id,
                completion.finishedAt,
                completion.status,
                completion.httpCode,
                completion.errorMessage?.slice(0, 1000) ?? null,
                completion.jobsFoundCount,
            ]
        );
        const updated = firstOrNull(rows, toAttempt);
        if (updated) return updated;
        if (await this.findCrawlAttemptById(id)) throw new AttemptAlreadyCompletedError(id);
        throw new RecordNotFoundError('CrawlAttempt', id);
    }

    async findCrawlAttemptById(id: string): Promise<CrawlAttempt | null> {
        const rows = await this.exec<CrawlAttemptRow>('SELECT * FROM crawl_attempt WHERE id = $1', [id]);
        return firstOrNull(rows, toAttempt);
    }

    // ── Sources

    async findJobSourceByUrl(sourceUrl: string): Promise<JobSource | null> {
        const rows = await this.exec<JobSourceRow>('SELECT * FROM job_source WHERE source_url = $1', [sourceUrl]);
        return firstOrNull(rows, toSource);
    }

    async insertJobSourceIfAbsent(source: NewJobSource): Promise<JobSource | null> {
        const rows = await this.exec<JobSourceRow>(
            `INSERT INTO job_source
                (job_id, source_site_id, source_url, salary_text, first_seen_at, last_seen_at)
             VALUES ($1, $2, $3, $4, $5, $6)
             ON CONFLICT (source_url) DO NOTHING
             RETURNING *`,
            [
                source.jobId,
                source.sourceSiteId,
                source.sourceUrl,
                source.salaryText,
                source.firstSeenAt,
                source.lastSeenAt,
            ]
        );
        return firstOrNull(rows, toSource);
    }

    async advanceJobSourceLastSeen(jobSourceId: string, seenAt: Date): Promise<JobSource> {
        const rows = await this.exec<JobSourceRow>(
            `UPDATE job_source SET last_seen_at = GREATEST(last_seen_at, $2)
             WHERE id = $1
             RETURNING *`,
            [jobSourceId, seenAt]
        );
        return firstOrThrow(rows, toSource, 'JobSource', jobSourceId);
    }

    async listJobSourcesForJob(jobId: string): Promise<JobSource[]> {
        const rows = await this.exec<JobSourceRow>('SELECT * FROM job_source WHERE job_id = $1 ORDER BY id', [jobId]);
        return rows.map(toSource);
    }

    // ── Observations

    async insertObservation(observation: NewJobObservation): Promise<JobObservation> {
        const rows = await this.exec<ObservationRow>(
            `INSERT INTO job_observation (job_source_id, crawl_attempt_id, observed_at, raw_title)
             VALUES ($1, $2, $3, $4)
             RETURNING *`,
            [observation.jobSourceId, observation.crawlAttemptId, observation.observedAt, observation.rawTitle]
        );
        return firstOrThrow(rows, toObservation, 'JobObservation', 'new');
    }

    async latestObservationAt(jobSourceId: string): Promise<Date | null> {
        const rows = await this.exec<{ latest: Date | null }>(
            'SELECT MAX(observed_at) AS latest FROM job_observation WHERE job_source_id = $1',
            [jobSourceId]
        );
        return rows[0]?.latest ?? null;
    }

    async listTimelineForJob(jobId: string): Promise<TimelineRow[]> {
        const rows = await this.exec<TimelineDbRow>(
            `SELECT o.observed_at,
                    s.name      AS source_site,
                    js.source_url,
                    o.raw_title,
                    a.status    AS crawl_status
             FROM job_observation o
             JOIN job_source js   ON js.id = o.job_source_id
             JOIN source_site s   ON s.id = js.source_site_id
             JOIN crawl_attempt a ON a.id = o.crawl_attempt_id
             WHERE js.job_id = $1
             ORDER BY o.observed_at DESC, o.id DESC`,
            [jobId]
        );
        return rows.map((r) => ({
            observedAt: r.observed_at,
            sourceSite: r.source_site,
            sourceUrl: r.source_url,
            rawTitle: r.raw_title,
            crawlStatus: r.crawl_status,
        }));
    }

    async countObservations(): Promise<number> {
        const rows = await this.exec<{ count: number }>('SELECT COUNT(*)::int AS count FROM job_observation');
        return rows[0]?.count ?? 0;
    }
}

// ─── Store ────────────────────────────────────────────────────────────────────

export class PgStore implements Store {
    readonly repo: Repository;

    constructor(private readonly pool: pkg.Pool) {
        this.repo = new PgRepository(async (sql, values) => (await pool.query(sql, values)).rows);
    }

    async transaction<T>(work: (repo: Repository) => Promise<T>): Promise<T> {
        const client = await this.pool.connect();
        try {
            await client.query('BEGIN');
            const result = await work(new PgRepository(async (sql, values) => (await client.query(sql, values)).rows));
            await client.query('COMMIT');
            return result;
        } catch (err) {
            try {
                await client.query('ROLLBACK');
            } catch (rollbackErr) {
                log.error(`[PgStore] Rollback failed: ${rollbackErr instanceof Error ? rollbackErr.message : String(rollbackErr)}`);
            }
            throw err;
        } finally {
            client.release();
        }
    }

    async close(): Promise<void> {
        await this.pool.end();
    }
}
