import { describe, it, expect } from 'vitest';
import { MemoryStore } from './memoryStore.js';
import { applySeed, loadSeedFile, seedSchema, type SeedData } from './seedData.js';
import { JobResolver } from '../resolver/jobResolver.js';
import { T0 } from '../testing/fixtures.js';

describe('seed data', () => {
    it('loads the bundled seed file', async () => {
        const seed = await loadSeedFile();
        expect(seed.sites.map((s) => s.name)).toEqual(['freshersworld', 'timesjobs']);
        expect(seed.companies[0]?.aliases).toEqual(['tcs']);
    });

    it('seeds once and leaves existing rows alone on a second run', async () => {
        const store = new MemoryStore();
        const seed = await loadSeedFile();

        expect(await applySeed(store, seed, T0)).toEqual({
            sitesCreated: 2,
            targetsCreated: 2,
            companiesCreated: 1,
            aliasesCreated: 1,
        });
        expect(await applySeed(store, seed, T0)).toEqual({
            sitesCreated: 0,
            targetsCreated: 0,
            companiesCreated: 0,
            aliasesCreated: 0,
        });
        expect(await store.repo.listActiveTargets()).toHaveLength(2);
        expect((await store.repo.findSourceSiteByName('timesjobs'))?.crawlDelaySeconds).toBe(4);
    });

    it('makes seeded aliases resolve to the canonical company', async () => {
        const store = new MemoryStore();
        await applySeed(store, await loadSeedFile(), T0);

        const job = await new JobResolver(store).resolve(
            { rawCompany: 'TCS', rawTitle: 'Java Developer', rawLocation: 'Chennai' },
            T0
        );

        const company = await store.repo.findCompanyById(job.companyId);
        expect(company?.normalizedName).toBe('tata consultancy');
        expect(company?.displayName).toBe('Tata Consultancy Services');
    });

    it('skips aliases that clean down to nothing', async () => {
        const store = new MemoryStore();
        const seed: SeedData = seedSchema.parse({
            companies: [{ normalizedName: 'zoho', displayName: 'Zoho', aliases: ['!!!', 'Zoho Payments Pvt Ltd'] }],
        });

        const summary = await applySeed(store, seed, T0);

        expect(summary.aliasesCreated).toBe(1);
        expect(await store.repo.findCanonicalNameByAlias('zoho payments')).toBe('zoho');
    });

    it('rejects a site with an invalid target URL', () => {
        const result = seedSchema.safeParse({
            sites: [{
                name: 'naukri',
                inactiveThresholdDays: 7,
                repostThresholdDays: 30,
                reliabilityWeight: 0.5,
                crawlDelaySeconds: 2,
                maxRetries: 1,
                targets: ['not a url'],
            }],
        });
        expect(result.success).toBe(false);
    });
});
