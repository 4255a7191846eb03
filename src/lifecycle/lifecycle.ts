/**
 * src/lifecycle/lifecycle.ts
 *
 * Derives a job's lifecycle state from its observation history at read time.
 * Nothing here is persisted; the same history and clock always give the
 * same answer.
 *
 *   ACTIVE     seen within the inactive threshold
 *   INACTIVE   past the inactive threshold, within the repost threshold
 *   NEW_CYCLE  past the repost threshold (a later sighting is a repost)
 *   UNKNOWN    no sources or no observations
 *
 * With several sources the strictest site wins: both thresholds are the
 * minimum across the job's sources.
 */

import { RecordNotFoundError, type Repository } from '../db/store.js';
import type { Job } from '../db/types.js';

export type LifecycleState = 'ACTIVE' | 'INACTIVE' | 'NEW_CYCLE' | 'UNKNOWN';

const DAY_MS = 86_400_000;

/** Whole days elapsed, rounded down. */
export function wholeDaysBetween(from: Date, to: Date): number {
    return Math.floor((to.getTime() - from.getTime()) / DAY_MS);
}

export class LifecycleEngine {
    constructor(private readonly repo: Repository) {}

    async computeState(job: Job, now: Date = new Date()): Promise<LifecycleState> {
        const sources = await this.repo.listJobSourcesForJob(job.id);
        if (sources.length === 0) return 'UNKNOWN';

        let latest: Date | null = null;
        for (const source of sources) {
            const seen = await this.repo.latestObservationAt(source.id);
            if (seen && (!latest || seen.getTime() > latest.getTime())) latest = seen;
        }
        if (!latest) return 'UNKNOWN';

        const siteIds = [...new Set(sources.map((s) => s.sourceSiteId))];
        let inactive = Number.POSITIVE_INFINITY;
        let repost = Number.POSITIVE_INFINITY;
        for (const siteId of siteIds) {
            const site = await this.repo.findSourceSiteById(siteId);
            if (!site) throw new RecordNotFoundError('SourceSite', siteId);
            inactive = Math.min(inactive, site.inactiveThresholdDays);
            repost = Math.min(repost, site.repostThresholdDays);
        }

        const days = wholeDaysBetween(latest, now);
        if (days <= inactive) return 'ACTIVE';
        if (days > repost) return 'NEW_CYCLE';
        return 'INACTIVE';
    }

    daysSinceLastSeen(job: Job, now: Date = new Date()): number {
        return wholeDaysBetween(job.lastSeenAt, now);
    }

    observationSpanDays(job: Job): number {
        return wholeDaysBetween(job.firstSeenAt, job.lastSeenAt);
    }

    async confirmedSourceCount(job: Job): Promise<number> {
        return (await this.repo.listJobSourcesForJob(job.id)).length;
    }
}
