/**
 * src/db/schema.ts
 *
 * DDL for the observer's tables. Every statement is idempotent
 * (CREATE … IF NOT EXISTS) so migrations can run on every deploy.
 *
 * The UNIQUE constraints here are what make concurrent resolution safe:
 * job.fingerprint, company.normalized_name, job_source.source_url.
 * job_observation has no update path in the application.
 */

export const CREATE_TABLES: string[] = [
    `CREATE TABLE IF NOT EXISTS company (
        id               BIGSERIAL PRIMARY KEY,
        normalized_name  TEXT        NOT NULL UNIQUE,
        display_name     TEXT        NOT NULL,
        created_at       TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );`,
    `CREATE TABLE IF NOT EXISTS company_alias (
        id          BIGSERIAL PRIMARY KEY,
        alias       TEXT   NOT NULL UNIQUE,
        company_id  BIGINT NOT NULL REFERENCES company(id)
    );`,
    `CREATE TABLE IF NOT EXISTS job (
        id                   BIGSERIAL PRIMARY KEY,
        company_id           BIGINT      NOT NULL REFERENCES company(id),
        normalized_role      TEXT        NOT NULL,
        normalized_location  TEXT        NOT NULL,
        fingerprint          CHAR(64)    NOT NULL UNIQUE,
        first_seen_at        TIMESTAMPTZ NOT NULL,
        last_seen_at         TIMESTAMPTZ NOT NULL,
        created_at           TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );`,
    `CREATE TABLE IF NOT EXISTS skill (
        id    BIGSERIAL PRIMARY KEY,
        name  TEXT NOT NULL UNIQUE
    );`,
    `CREATE TABLE IF NOT EXISTS job_skill (
        job_id    BIGINT NOT NULL REFERENCES job(id),
        skill_id  BIGINT NOT NULL REFERENCES skill(id),
        PRIMARY KEY (job_id, skill_id)
    );`,
    `CREATE TABLE IF NOT EXISTS source_site (
        id                       BIGSERIAL PRIMARY KEY,
        name                     TEXT             NOT NULL UNIQUE,
        inactive_threshold_days  INTEGER          NOT NULL,
        repost_threshold_days    INTEGER          NOT NULL,
        reliability_weight       DOUBLE PRECISION NOT NULL,
        crawl_delay_seconds      INTEGER          NOT NULL,
        max_retries              INTEGER          NOT NULL,
        crawl_enabled            BOOLEAN          NOT NULL,
        created_at               TIMESTAMPTZ      NOT NULL DEFAULT NOW()
    );`,
    `CREATE TABLE IF NOT EXISTS crawl_target (
        id              BIGSERIAL PRIMARY KEY,
        source_site_id  BIGINT  NOT NULL REFERENCES source_site(id),
        url             TEXT    NOT NULL UNIQUE,
        active          BOOLEAN NOT NULL DEFAULT TRUE
    );`,
    `CREATE TABLE IF NOT EXISTS crawl_attempt (
        id                BIGSERIAL PRIMARY KEY,
        crawl_target_id   BIGINT        NOT NULL REFERENCES crawl_target(id),
        started_at        TIMESTAMPTZ   NOT NULL,
        finished_at       TIMESTAMPTZ,
        status            TEXT          NOT NULL CHECK (status IN ('SUCCESS', 'HTTP_FAIL', 'PARSE_FAIL')),
        http_code         INTEGER,
        error_message     VARCHAR(1000),
        jobs_found_count  INTEGER       NOT NULL DEFAULT 0
    );`,
    `CREATE TABLE IF NOT EXISTS job_source (
        id              BIGSERIAL PRIMARY KEY,
        job_id          BIGINT      NOT NULL REFERENCES job(id),
        source_site_id  BIGINT      NOT NULL REFERENCES source_site(id),
        source_url      TEXT        NOT NULL UNIQUE,
        salary_text     TEXT,
        first_seen_at   TIMESTAMPTZ NOT NULL,
        last_seen_at    TIMESTAMPTZ NOT NULL
    );`,
    `CREATE TABLE IF NOT EXISTS job_observation (
        id                BIGSERIAL PRIMARY KEY,
        job_source_id     BIGINT      NOT NULL REFERENCES job_source(id),
        crawl_attempt_id  BIGINT      NOT NULL REFERENCES crawl_attempt(id),
        observed_at       TIMESTAMPTZ NOT NULL,
        raw_title         TEXT        NOT NULL
    );`,
];

export const INDEXES: string[] = [
    `CREATE INDEX IF NOT EXISTS idx_job_last_seen          ON job(last_seen_at DESC);`,
    `CREATE INDEX IF NOT EXISTS idx_job_company            ON job(company_id);`,
    `CREATE INDEX IF NOT EXISTS idx_job_source_job         ON job_source(job_id);`,
    `CREATE INDEX IF NOT EXISTS idx_observation_source_at  ON job_observation(job_source_id, observed_at DESC);`,
    `CREATE INDEX IF NOT EXISTS idx_attempt_target         ON crawl_attempt(crawl_target_id, started_at DESC);`,
];
