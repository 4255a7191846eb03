/**
 * src/normalize/keywordMatch.ts
 *
 * Whole-word keyword matching for the location normalizer and the skill
 * extractor. "us" matches "remote (us)" but not "australia"; "react native"
 * matches as a phrase.
 */

function escapeRegExp(text: string): string {
    return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Compiles a case-insensitive matcher bounded by non-alphanumerics. */
export function wordPattern(keyword: string): RegExp {
    return new RegExp(`(?<![a-z0-9])${escapeRegExp(keyword.toLowerCase())}(?![a-z0-9])`, 'i');
}

export class KeywordSet {
    private readonly patterns: RegExp[];

    constructor(readonly keywords: readonly string[]) {
        this.patterns = keywords.map(wordPattern);
    }

    anyIn(text: string): boolean {
        return this.patterns.some((p) => p.test(text));
    }
}
