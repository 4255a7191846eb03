/**
 * src/testing/fixtures.ts
 *
 * Shared builders for the test suite.
 */

import type { MemoryStore } from '../db/memoryStore.js';
import type { CrawlAttempt, CrawlTarget, NewSourceSite, SourceSite } from '../db/types.js';

export const DAY_MS = 86_400_000;

export const T0 = new Date('2026-03-01T09:00:00.000Z');

export function daysAfter(base: Date, days: number): Date {
    return new Date(base.getTime() + days * DAY_MS);
}

export async function addSite(
    store: MemoryStore,
    overrides: Partial<NewSourceSite> = {},
    url?: string
): Promise<{ site: SourceSite; target: CrawlTarget }> {
    const policy: NewSourceSite = {
        name: 'freshersworld',
        inactiveThresholdDays: 7,
        repostThresholdDays: 30,
        reliabilityWeight: 0.7,
        crawlDelaySeconds: 3,
        maxRetries: 2,
        crawlEnabled: true,
        ...overrides,
    };
    const site = await store.repo.insertSourceSiteIfAbsent(policy);
    if (!site) throw new Error(`site ${policy.name} already exists`);
    const target = await store.repo.insertCrawlTargetIfAbsent({
        sourceSiteId: site.id,
        url: url ?? `https://jobs.test/${policy.name}/search`,
        active: true,
    });
    if (!target) throw new Error(`target for ${policy.name} already exists`);
    return { site, target };
}

export async function openAttempt(store: MemoryStore, target: CrawlTarget, at: Date = T0): Promise<CrawlAttempt> {
    return store.repo.insertCrawlAttempt({ crawlTargetId: target.id, startedAt: at });
}
