/**
 * src/db/seedData.ts
 *
 * Crawl configuration seeding: source sites with their targets, plus
 * canonical companies and the aliases that point at them.
 *
 * Everything is insert-if-absent, so re-seeding never overwrites policy
 * edited in the database.
 */

import { readFile } from 'node:fs/promises';
import { log } from 'crawlee';
import { z } from 'zod';
import { cleanCompanyName } from '../normalize/companyNormalizer.js';
import type { Repository, Store } from './store.js';

export const DEFAULT_SEED_PATH = new URL('../../data/seed.json', import.meta.url);

const siteSeedSchema = z.object({
    name: z.string().trim().min(1),
    inactiveThresholdDays: z.number().int().min(0),
    repostThresholdDays: z.number().int().min(0),
    reliabilityWeight: z.number().min(0).max(1),
    crawlDelaySeconds: z.number().min(0),
    maxRetries: z.number().int().min(0),
    crawlEnabled: z.boolean().default(true),
    targets: z.array(z.string().url()).default([]),
});

const companySeedSchema = z.object({
    normalizedName: z.string().trim().min(1),
    displayName: z.string().trim().min(1),
    aliases: z.array(z.string()).default([]),
});

export const seedSchema = z.object({
    sites: z.array(siteSeedSchema).default([]),
    companies: z.array(companySeedSchema).default([]),
});

export type SeedData = z.infer<typeof seedSchema>;

export interface SeedSummary {
    sitesCreated: number;
    targetsCreated: number;
    companiesCreated: number;
    aliasesCreated: number;
}

export async function loadSeedFile(path: string | URL = DEFAULT_SEED_PATH): Promise<SeedData> {
    const raw = await readFile(path, 'utf8');
    return seedSchema.parse(JSON.parse(raw));
}

async function ensureCompany(
    repo: Repository,
    normalizedName: string,
    displayName: string,
    now: Date
): Promise<{ id: string; created: boolean }> {
    const inserted = await repo.insertCompanyIfAbsent({ normalizedName, displayName, createdAt: now });
    if (inserted) return { id: inserted.id, created: true };
    const existing = await repo.findCompanyByNormalizedName(normalizedName);
    if (!existing) throw new Error(`Company "${normalizedName}" vanished during seeding`);
    return { id: existing.id, created: false };
}

export async function applySeed(store: Store, seed: SeedData, now: Date = new Date()): Promise<SeedSummary> {
    return store.transaction(async (repo) => {
        const summary: SeedSummary = { sitesCreated: 0, targetsCreated: 0, companiesCreated: 0, aliasesCreated: 0 };

        for (const { targets, ...policy } of seed.sites) {
            const inserted = await repo.insertSourceSiteIfAbsent(policy);
            const site = inserted ?? (await repo.findSourceSiteByName(policy.name));
            if (!site) throw new Error(`Source site "${policy.name}" vanished during seeding`);
            if (inserted) {
                summary.sitesCreated++;
                log.info(`[Seed] Source site "${site.name}" created with id=${site.id}`);
            } else {
                log.debug(`[Seed] Source site "${site.name}" already present, keeping stored policy`);
            }

            for (const url of targets) {
                if (await repo.insertCrawlTargetIfAbsent({ sourceSiteId: site.id, url, active: true })) {
                    summary.targetsCreated++;
                    log.info(`[Seed] Crawl target seeded: ${url}`);
                }
            }
        }

        for (const company of seed.companies) {
            const { id, created } = await ensureCompany(repo, company.normalizedName, company.displayName, now);
            if (created) summary.companiesCreated++;

            for (const alias of company.aliases) {
                // Aliases are stored in the same cleaned form the normalizer looks up
                const key = cleanCompanyName(alias);
                if (key === 'unknown') continue;
                if (await repo.insertCompanyAliasIfAbsent(key, id)) summary.aliasesCreated++;
            }
        }

        return summary;
    });
}
