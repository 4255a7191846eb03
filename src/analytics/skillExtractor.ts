/**
 * src/analytics/skillExtractor.ts
 *
 * Dictionary scan of a job description → JobSkill rows.
 *
 * Skills are metadata about a job. They are attached after the job is
 * resolved and never take part in its fingerprint.
 *
 * Matching is case-insensitive:
 *   • single-word skills match as whole words ("java" does not match "javascript")
 *   • multi-word skills match as substrings ("spring boot")
 */

import { readFileSync } from 'node:fs';
import { log } from 'crawlee';
import { z } from 'zod';
import { wordPattern } from '../normalize/keywordMatch.js';
import type { Store } from '../db/store.js';
import type { Job } from '../db/types.js';

export const DEFAULT_SKILLS_PATH = new URL('../../data/skills.json', import.meta.url);

const dictionarySchema = z.object({
    skills: z.array(z.string().trim().toLowerCase().min(1)).min(1),
});

export function loadSkillDictionary(path: string | URL = DEFAULT_SKILLS_PATH): string[] {
    const parsed = dictionarySchema.parse(JSON.parse(readFileSync(path, 'utf8')));
    return [...new Set(parsed.skills)];
}

interface SkillMatcher {
    name: string;
    test: (text: string) => boolean;
}

function compile(name: string): SkillMatcher {
    if (/\s/.test(name)) return { name, test: (text) => text.includes(name) };
    const pattern = wordPattern(name);
    return { name, test: (text) => pattern.test(text) };
}

export class SkillExtractor {
    private readonly matchers: SkillMatcher[];

    constructor(
        private readonly store: Store,
        dictionary: readonly string[] = loadSkillDictionary()
    ) {
        this.matchers = dictionary.map((name) => compile(name.toLowerCase()));
    }

    /** Dictionary skills present in `description`, in dictionary order. */
    detect(description: string | null | undefined): string[] {
        if (!description || !description.trim()) return [];
        const text = description.toLowerCase();
        return this.matchers.filter((m) => m.test(text)).map((m) => m.name);
    }

    /**
     * Attaches every detected skill to the job.
     * Returns only the skills newly attached by this call.
     */
    async extractAndAttach(job: Job, description: string | null | undefined): Promise<string[]> {
        const found = this.detect(description);
        if (found.length === 0) {
            log.debug(`[Skills] No dictionary skills for job ${job.id}`);
            return [];
        }

        const attached = await this.store.transaction(async (repo) => {
            const added: string[] = [];
            for (const name of found) {
                const skill = await repo.findOrCreateSkill(name);
                if (await repo.attachSkill(job.id, skill.id)) added.push(name);
            }
            return added;
        });

        if (attached.length > 0) {
            log.info(`[Skills] Attached ${attached.length} skills to job ${job.id}: ${attached.join(', ')}`);
        }
        return attached;
    }
}
