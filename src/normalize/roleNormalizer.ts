/**
 * src/normalize/roleNormalizer.ts
 *
 * Job title → role cluster. Determined from what the role does, not from
 * the tech stack: "Java Backend Engineer" is BACKEND, not "java".
 *
 * Rules are evaluated top to bottom and the first match wins, so hybrid and
 * specific clusters sit above the generic ones.
 *
 * Keywords match as substrings of the lowercased title: "Test Engineers"
 * hits "test engineer" and "SpringBoot Developer" hits "spring".
 */

export type RoleCluster =
    | 'BACKEND'
    | 'FRONTEND'
    | 'FULLSTACK'
    | 'DATA_ENGINEER'
    | 'BACKEND_DATA'
    | 'DEVOPS'
    | 'MOBILE'
    | 'GENERIC_SE'
    | 'QA'
    | 'UNKNOWN';

export const UNKNOWN_ROLE: RoleCluster = 'UNKNOWN';

interface RoleRule {
    cluster: RoleCluster;
    /** `all`: every keyword must appear. `any`: one is enough. */
    mode: 'all' | 'any';
    keywords: readonly string[];
}

const rule = (cluster: RoleCluster, mode: RoleRule['mode'], keywords: string[]): RoleRule => ({
    cluster,
    mode,
    keywords,
});

export const ROLE_RULES: readonly RoleRule[] = [
    rule('BACKEND_DATA', 'all', ['backend', 'data']),
    rule('DEVOPS', 'any', ['devops', 'sre', 'platform', 'infrastructure', 'cloud']),
    rule('MOBILE', 'any', ['android', 'ios', 'mobile', 'flutter', 'react native']),
    rule('DATA_ENGINEER', 'any', ['data engineer', 'pipeline', 'spark', 'kafka', 'airflow']),
    rule('FULLSTACK', 'any', ['fullstack', 'full stack', 'full-stack']),
    rule('FRONTEND', 'any', [
        'frontend', 'front end', 'front-end', 'ui developer',
        'react developer', 'angular developer', 'vue',
    ]),
    rule('BACKEND', 'any', [
        'backend', 'back end', 'back-end', 'api developer', 'server side',
        'java developer', 'spring', 'node developer', 'python developer', 'golang',
    ]),
    rule('QA', 'any', ['qa', 'quality assurance', 'test engineer', 'automation engineer', 'sdet']),
    rule('GENERIC_SE', 'any', ['software engineer', 'software developer', 'sde', 'swe', 'programmer']),
];

export function normalizeRole(rawTitle: string | null | undefined): RoleCluster {
    if (!rawTitle || !rawTitle.trim()) return UNKNOWN_ROLE;

    const title = rawTitle.toLowerCase().trim();
    for (const { cluster, mode, keywords } of ROLE_RULES) {
        const matched = mode === 'all'
            ? keywords.every((kw) => title.includes(kw))
            : keywords.some((kw) => title.includes(kw));
        if (matched) return cluster;
    }
    return UNKNOWN_ROLE;
}
