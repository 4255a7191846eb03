/**
 * src/resolver/observationRecorder.ts
 *
 * Binds a resolved Job to the listing it was seen on and appends the
 * evidence row.
 *
 *   JobSource      one per listing URL, lastSeenAt advanced on every sighting
 *   JobObservation one per sighting, never updated or deduplicated
 *
 * The Job's own lastSeenAt is advanced in the same transaction so it never
 * trails its newest observation.
 */

import { log } from 'crawlee';
import type { Repository, Store } from '../db/store.js';
import type { CrawlAttempt, Job, JobObservation, JobSource, SourceSite } from '../db/types.js';
import { ResolutionConflictError } from './jobResolver.js';

export interface SightingEvidence {
    job: Job;
    site: SourceSite;
    attempt: CrawlAttempt;
    sourceUrl: string;
    rawTitle: string;
    salaryText?: string | null;
    observedAt?: Date;
}

export class ObservationRecorder {
    constructor(private readonly store: Store) {}

    async record(evidence: SightingEvidence): Promise<JobObservation> {
        const observedAt = evidence.observedAt ?? new Date();
        return this.store.transaction(async (repo) => {
            const source = await this.bindSource(repo, evidence, observedAt);
            await repo.advanceJobLastSeen(evidence.job.id, observedAt);
            return repo.insertObservation({
                jobSourceId: source.id,
                crawlAttemptId: evidence.attempt.id,
                observedAt,
                rawTitle: evidence.rawTitle,
            });
        });
    }

    private async bindSource(repo: Repository, evidence: SightingEvidence, seenAt: Date): Promise<JobSource> {
        const { job, site, sourceUrl } = evidence;

        const existing = await repo.findJobSourceByUrl(sourceUrl);
        if (existing) {
            if (existing.jobId !== job.id) {
                // The listing now resolves to a different identity; the URL stays bound to its first job
                log.debug(`[Recorder] ${sourceUrl} is bound to job ${existing.jobId}, sighting resolved to ${job.id}`);
            }
            return repo.advanceJobSourceLastSeen(existing.id, seenAt);
        }

        const inserted = await repo.insertJobSourceIfAbsent({
            jobId: job.id,
            sourceSiteId: site.id,
            sourceUrl,
            salaryText: evidence.salaryText ?? null,
            firstSeenAt: seenAt,
            lastSeenAt: seenAt,
        });
        if (inserted) {
            log.debug(`[Recorder] New source for job ${job.id} on ${site.name}: ${sourceUrl}`);
            return inserted;
        }

        const winner = await repo.findJobSourceByUrl(sourceUrl);
        if (!winner) throw new ResolutionConflictError('JobSource', sourceUrl);
        return repo.advanceJobSourceLastSeen(winner.id, seenAt);
    }
}
