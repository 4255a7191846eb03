/**
 * src/resolver/jobResolver.ts
 *
 * Raw sighting (company, title, location) → logical Job.
 *
 * Flow, inside one transaction:
 *   normalize → fingerprint → find by fingerprint
 *     found     → advance lastSeenAt, return it
 *     not found → resolve-or-create Company, insert Job
 *
 * Two workers can see the same new fingerprint at once. Both inserts go
 * through ON CONFLICT DO NOTHING; the loser gets no row back and re-reads
 * the winner's Job. The same holds for Company.normalized_name.
 */

import { log } from 'crawlee';
import { normalizeCompany } from '../normalize/companyNormalizer.js';
import { normalizeRole } from '../normalize/roleNormalizer.js';
import { normalizeLocation } from '../normalize/locationNormalizer.js';
import { fingerprint } from '../normalize/fingerprint.js';
import type { Repository, Store } from '../db/store.js';
import type { Company, Job } from '../db/types.js';

export interface RawSighting {
    rawCompany: string | null | undefined;
    rawTitle: string | null | undefined;
    rawLocation: string | null | undefined;
}

const UNKNOWN_DISPLAY_NAME = 'Unknown Company';

/** Raised when a uniqueness conflict was reported but the winning row cannot be read. */
export class ResolutionConflictError extends Error {
    constructor(entity: string, key: string) {
        super(`${entity} with key "${key}" conflicted on insert but was not found on re-read`);
        this.name = 'ResolutionConflictError';
    }
}

export class JobResolver {
    constructor(private readonly store: Store) {}

    async resolve(sighting: RawSighting, seenAt: Date = new Date()): Promise<Job> {
        return this.store.transaction((repo) => this.resolveWith(repo, sighting, seenAt));
    }

    private async resolveWith(repo: Repository, sighting: RawSighting, seenAt: Date): Promise<Job> {
        const company = await normalizeCompany(sighting.rawCompany, (name) => repo.findCanonicalNameByAlias(name));
        const role = normalizeRole(sighting.rawTitle);
        const location = normalizeLocation(sighting.rawLocation);
        const key = fingerprint(company, role, location);

        log.debug(`[Resolver] ${company} | ${role} | ${location} → ${key.slice(0, 12)}…`);

        const existing = await repo.findJobByFingerprint(key);
        if (existing) return repo.advanceJobLastSeen(existing.id, seenAt);

        const owner = await this.resolveCompany(repo, company, sighting.rawCompany, seenAt);
        const inserted = await repo.insertJobIfAbsent({
            companyId: owner.id,
            normalizedRole: role,
            normalizedLocation: location,
            fingerprint: key,
            firstSeenAt: seenAt,
            lastSeenAt: seenAt,
            createdAt: seenAt,
        });

        if (inserted) {
            log.info(`[Resolver] New job: company="${company}" role=${role} location=${location}`);
            return inserted;
        }

        log.debug(`[Resolver] Lost insert race for ${key.slice(0, 12)}…, re-reading`);
        const winner = await repo.findJobByFingerprint(key);
        if (!winner) throw new ResolutionConflictError('Job', key);
        return repo.advanceJobLastSeen(winner.id, seenAt);
    }

    private async resolveCompany(
        repo: Repository,
        normalizedName: string,
        rawName: string | null | undefined,
        now: Date
    ): Promise<Company> {
        const found = await repo.findCompanyByNormalizedName(normalizedName);
        if (found) return found;

        const displayName = rawName?.trim() || UNKNOWN_DISPLAY_NAME;
        const inserted = await repo.insertCompanyIfAbsent({ normalizedName, displayName, createdAt: now });
        if (inserted) {
            log.info(`[Resolver] New company: "${normalizedName}" (${displayName})`);
            return inserted;
        }

        const winner = await repo.findCompanyByNormalizedName(normalizedName);
        if (!winner) throw new ResolutionConflictError('Company', normalizedName);
        return winner;
    }
}
