import { describe, it, expect } from 'vitest';
import { MemoryStore } from '../db/memoryStore.js';
import { JobResolver } from '../resolver/jobResolver.js';
import { loadSkillDictionary, SkillExtractor } from './skillExtractor.js';
import { T0 } from '../testing/fixtures.js';

async function jobIn(store: MemoryStore) {
    return new JobResolver(store).resolve(
        { rawCompany: 'Razorpay', rawTitle: 'Backend Engineer', rawLocation: 'Bangalore' },
        T0
    );
}

describe('loadSkillDictionary', () => {
    it('reads the bundled dictionary', () => {
        const skills = loadSkillDictionary();
        expect(skills).toHaveLength(52);
        expect(skills).toContain('spring boot');
        expect(skills).toContain('node.js');
    });
});

describe('SkillExtractor.detect', () => {
    const extractor = new SkillExtractor(new MemoryStore());

    it('finds single and multi-word skills in dictionary order', () => {
        expect(extractor.detect('We need Java, Spring Boot and JavaScript; Node.js is a plus')).toEqual([
            'java',
            'spring',
            'spring boot',
            'javascript',
            'node.js',
        ]);
    });

    it('does not match a skill inside a longer word', () => {
        expect(extractor.detect('Strong JavaScript fundamentals')).toEqual(['javascript']);
    });

    it('returns nothing for a blank description', () => {
        expect(extractor.detect('')).toEqual([]);
        expect(extractor.detect(null)).toEqual([]);
    });
});

describe('SkillExtractor.extractAndAttach', () => {
    it('attaches detected skills and reports only new ones on repeat', async () => {
        const store = new MemoryStore();
        const job = await jobIn(store);
        const extractor = new SkillExtractor(store, ['java', 'docker', 'rest api']);

        expect(await extractor.extractAndAttach(job, 'Java services behind a REST API')).toEqual(['java', 'rest api']);
        expect(await extractor.extractAndAttach(job, 'Java and Docker')).toEqual(['docker']);
        expect(await store.repo.listSkillNamesForJob(job.id)).toEqual(['docker', 'java', 'rest api']);
        expect(store.state.skills.size).toBe(3);
    });

    it('writes nothing when no skill matches', async () => {
        const store = new MemoryStore();
        const job = await jobIn(store);
        expect(await new SkillExtractor(store, ['java']).extractAndAttach(job, 'Golang only')).toEqual([]);
        expect(store.state.jobSkills.size).toBe(0);
    });
});
