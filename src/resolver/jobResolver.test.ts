import { afterEach, describe, it, expect, vi } from 'vitest';
import { MemoryRepository, MemoryStore } from '../db/memoryStore.js';
import { JobResolver } from './jobResolver.js';
import { daysAfter, T0 } from '../testing/fixtures.js';

const sighting = {
    rawCompany: 'Acme Software Pvt Ltd',
    rawTitle: 'Java Backend Engineer',
    rawLocation: 'Bengaluru',
};

afterEach(() => {
    vi.restoreAllMocks();
});

describe('JobResolver.resolve', () => {
    it('creates a job and its company on first sight', async () => {
        const store = new MemoryStore();
        const job = await new JobResolver(store).resolve(sighting, T0);

        expect(job.normalizedRole).toBe('BACKEND');
        expect(job.normalizedLocation).toBe('BANGALORE');
        expect(job.firstSeenAt).toEqual(T0);
        expect(job.lastSeenAt).toEqual(T0);

        const company = await store.repo.findCompanyById(job.companyId);
        expect(company?.normalizedName).toBe('acme');
        expect(company?.displayName).toBe('Acme Software Pvt Ltd');
    });

    it('returns the same job for a repeated sighting and advances lastSeenAt', async () => {
        const store = new MemoryStore();
        const resolver = new JobResolver(store);
        const first = await resolver.resolve(sighting, T0);
        const later = daysAfter(T0, 2);
        const second = await resolver.resolve({ ...sighting, rawCompany: 'ACME SOFTWARE' }, later);

        expect(second.id).toBe(first.id);
        expect(second.firstSeenAt).toEqual(T0);
        expect(second.lastSeenAt).toEqual(later);
        expect(await store.repo.countJobs()).toBe(1);
    });

    it('never moves lastSeenAt backwards', async () => {
        const store = new MemoryStore();
        const resolver = new JobResolver(store);
        await resolver.resolve(sighting, daysAfter(T0, 5));
        const job = await resolver.resolve(sighting, T0);
        expect(job.lastSeenAt).toEqual(daysAfter(T0, 5));
    });

    it('converges aliases onto one company and one job', async () => {
        const store = new MemoryStore();
        const tcs = await store.repo.insertCompanyIfAbsent({
            normalizedName: 'tata consultancy',
            displayName: 'Tata Consultancy Services',
            createdAt: T0,
        });
        if (!tcs) throw new Error('seed failed');
        await store.repo.insertCompanyAliasIfAbsent('tcs', tcs.id);

        const resolver = new JobResolver(store);
        const a = await resolver.resolve({ rawCompany: 'TCS', rawTitle: 'Software Engineer', rawLocation: 'Pune' }, T0);
        const b = await resolver.resolve(
            { rawCompany: 'Tata Consultancy Services', rawTitle: 'Software Engineer', rawLocation: 'Pune' },
            T0
        );

        expect(a.id).toBe(b.id);
        expect(a.companyId).toBe(tcs.id);
        expect(store.state.companies.size).toBe(1);
    });

    it('keeps different locations as different jobs', async () => {
        const store = new MemoryStore();
        const resolver = new JobResolver(store);
        const blr = await resolver.resolve(sighting, T0);
        const pune = await resolver.resolve({ ...sighting, rawLocation: 'Pune' }, T0);
        expect(pune.id).not.toBe(blr.id);
        expect(pune.companyId).toBe(blr.companyId);
    });

    it('yields exactly one job under concurrent resolution', async () => {
        const store = new MemoryStore();
        const resolver = new JobResolver(store);
        const jobs = await Promise.all(Array.from({ length: 10 }, () => resolver.resolve(sighting, T0)));

        expect(new Set(jobs.map((j) => j.id)).size).toBe(1);
        expect(await store.repo.countJobs()).toBe(1);
        expect(store.state.companies.size).toBe(1);
    });

    it('falls back to the existing job when the insert loses a race', async () => {
        const store = new MemoryStore();
        const resolver = new JobResolver(store);
        const original = await resolver.resolve(sighting, T0);

        // The first lookup misses, as if the winner had not committed yet
        vi.spyOn(MemoryRepository.prototype, 'findJobByFingerprint').mockResolvedValueOnce(null);
        const later = daysAfter(T0, 1);
        const job = await resolver.resolve(sighting, later);

        expect(job.id).toBe(original.id);
        expect(job.lastSeenAt).toEqual(later);
        expect(await store.repo.countJobs()).toBe(1);
    });

    it('rolls back the new company when the job insert fails', async () => {
        const store = new MemoryStore();
        vi.spyOn(MemoryRepository.prototype, 'insertJobIfAbsent').mockRejectedValueOnce(new Error('disk full'));

        await expect(new JobResolver(store).resolve(sighting, T0)).rejects.toThrow('disk full');
        expect(store.state.companies.size).toBe(0);
        expect(store.state.jobs.size).toBe(0);
    });

    it('stores a placeholder display name for a blank company', async () => {
        const store = new MemoryStore();
        const job = await new JobResolver(store).resolve({ ...sighting, rawCompany: '   ' }, T0);
        const company = await store.repo.findCompanyById(job.companyId);
        expect(company?.normalizedName).toBe('unknown');
        expect(company?.displayName).toBe('Unknown Company');
    });
});
