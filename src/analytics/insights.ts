/**
 * src/analytics/insights.ts
 *
 * Read views over the evidence store. Every lifecycle state shown here is
 * computed at request time by the LifecycleEngine.
 */

import { log } from 'crawlee';
import type { Store } from '../db/store.js';
import type { Job, TimelineRow } from '../db/types.js';
import { LifecycleEngine, type LifecycleState } from '../lifecycle/lifecycle.js';
import { UNKNOWN_ROLE } from '../normalize/roleNormalizer.js';

const HOUR_MS = 3_600_000;
const DAY_MS = 24 * HOUR_MS;

export interface JobSummary {
    jobId: string;
    company: string;
    role: string;
    location: string;
    lifecycleState: LifecycleState;
    daysSinceLastSeen: number;
    /** Whole days between the first and the latest sighting. */
    observationSpanDays: number;
    sourceCount: number;
    firstSeenAt: Date;
    lastSeenAt: Date;
    skills: string[];
}

export interface SkillFrequency {
    skillName: string;
    /** Active jobs carrying the skill. */
    jobCount: number;
    /** jobCount / active jobs × 100, one decimal. */
    percentageShare: number;
}

export interface InsightOptions {
    newJobsWindowHours: number;
}

export class InsightService {
    private readonly lifecycle: LifecycleEngine;

    constructor(
        private readonly store: Store,
        private readonly options: InsightOptions = { newJobsWindowHours: 24 }
    ) {
        this.lifecycle = new LifecycleEngine(store.repo);
    }

    /** Jobs whose lastSeenAt falls inside the new-jobs window. Most recent first. */
    async newJobs(now: Date = new Date()): Promise<JobSummary[]> {
        const since = new Date(now.getTime() - this.options.newJobsWindowHours * HOUR_MS);
        const jobs = await this.store.repo.listJobsSeenSince(since);
        log.debug(`[Insights] ${jobs.length} jobs seen in the last ${this.options.newJobsWindowHours}h`);
        return this.summarize(jobs, now);
    }

    async activeJobs(now: Date = new Date()): Promise<JobSummary[]> {
        const active = await this.activeJobRecords(now);
        return this.summarize(active, now);
    }

    async skillFrequency(now: Date = new Date()): Promise<SkillFrequency[]> {
        const active = (await this.activeJobRecords(now)).filter((j) => j.normalizedRole !== UNKNOWN_ROLE);
        if (active.length === 0) {
            log.warning('[Insights] No active jobs, skill frequency is empty');
            return [];
        }

        const counts = new Map<string, number>();
        for (const job of active) {
            for (const name of await this.store.repo.listSkillNamesForJob(job.id)) {
                counts.set(name, (counts.get(name) ?? 0) + 1);
            }
        }

        return [...counts.entries()]
            .map(([skillName, jobCount]) => ({
                skillName,
                jobCount,
                percentageShare: Math.round(((jobCount * 100) / active.length) * 10) / 10,
            }))
            .sort((a, b) => b.jobCount - a.jobCount || a.skillName.localeCompare(b.skillName));
    }

    /** Every observation of the job, most recent first. Empty when the job is unknown. */
    async timeline(jobId: string): Promise<TimelineRow[]> {
        return this.store.repo.listTimelineForJob(jobId);
    }

    async counts(): Promise<{ jobs: number; observations: number }> {
        const [jobs, observations] = await Promise.all([
            this.store.repo.countJobs(),
            this.store.repo.countObservations(),
        ]);
        return { jobs, observations };
    }

    /**
     * A job seen longer ago than every site's inactive threshold cannot be
     * ACTIVE, so candidates are limited to that window before the
     * per-job state is computed.
     */
    private async activeJobRecords(now: Date): Promise<Job[]> {
        const sites = await this.store.repo.listSourceSites();
        if (sites.length === 0) return [];
        const widest = Math.max(...sites.map((s) => s.inactiveThresholdDays));
        const since = new Date(now.getTime() - (widest + 1) * DAY_MS);

        const active: Job[] = [];
        for (const job of await this.store.repo.listJobsSeenSince(since)) {
            if ((await this.lifecycle.computeState(job, now)) === 'ACTIVE') active.push(job);
        }
        return active;
    }

    private async summarize(jobs: Job[], now: Date): Promise<JobSummary[]> {
        const summaries: JobSummary[] = [];
        for (const job of jobs) {
            const company = await this.store.repo.findCompanyById(job.companyId);
            summaries.push({
                jobId: job.id,
                company: company?.displayName ?? 'Unknown Company',
                role: job.normalizedRole,
                location: job.normalizedLocation,
                lifecycleState: await this.lifecycle.computeState(job, now),
                daysSinceLastSeen: this.lifecycle.daysSinceLastSeen(job, now),
                observationSpanDays: this.lifecycle.observationSpanDays(job),
                sourceCount: await this.lifecycle.confirmedSourceCount(job),
                firstSeenAt: job.firstSeenAt,
                lastSeenAt: job.lastSeenAt,
                skills: await this.store.repo.listSkillNamesForJob(job.id),
            });
        }
        return summaries.sort((a, b) => b.lastSeenAt.getTime() - a.lastSeenAt.getTime());
    }
}
