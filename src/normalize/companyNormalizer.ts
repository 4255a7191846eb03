/**
 * src/normalize/companyNormalizer.ts
 *
 * Raw company string → canonical company token.
 *
 * Steps run in a fixed order:
 *   1. lowercase + trim
 *   2. drop every character outside [a-z0-9\s]
 *   3. drop legal/filler suffix words
 *   4. collapse whitespace
 *   5. alias lookup (store-backed)
 *
 * Examples:
 *   "Tata Consultancy Services" → "tata consultancy"
 *   "  Google   Inc.  "         → "google"
 *   "TCS"                       → "tcs" → alias → "tata consultancy"
 */

import { log } from 'crawlee';

export const UNKNOWN_COMPANY = 'unknown';

const SUFFIX_WORDS: ReadonlySet<string> = new Set([
    'ltd', 'limited', 'pvt', 'private', 'inc', 'llc',
    'corp', 'corporation', 'co', 'company', 'india',
    'technologies', 'technology', 'solutions', 'services',
    'software', 'systems', 'global', 'consulting',
]);

/** Resolves a cleaned name to the canonical name it is an alias of, if any. */
export type AliasLookup = (cleanedName: string) => Promise<string | null>;

function collapse(text: string): string {
    return text.split(/\s+/).filter(Boolean).join(' ');
}

/**
 * Steps 1–4. Pure.
 *
 * A name made only of suffix words ("Solutions Ltd") keeps its step-2 text
 * rather than becoming empty, so two such names never share a token.
 */
export function cleanCompanyName(raw: string | null | undefined): string {
    if (!raw || !raw.trim()) return UNKNOWN_COMPANY;

    const lowered = raw.toLowerCase().trim();
    const stripped = lowered.replace(/[^a-z0-9\s]/g, '');
    const kept = stripped.split(/\s+/).filter((word) => word && !SUFFIX_WORDS.has(word));
    const cleaned = collapse(kept.join(' '));

    if (cleaned) return cleaned;
    return collapse(stripped) || UNKNOWN_COMPANY;
}

export async function normalizeCompany(
    raw: string | null | undefined,
    lookupAlias: AliasLookup
): Promise<string> {
    const cleaned = cleanCompanyName(raw);
    if (cleaned === UNKNOWN_COMPANY) {
        log.debug(`[CompanyNormalizer] Blank or symbol-only company "${raw ?? ''}" → ${UNKNOWN_COMPANY}`);
        return UNKNOWN_COMPANY;
    }

    const canonical = await lookupAlias(cleaned);
    if (canonical) {
        log.debug(`[CompanyNormalizer] Alias "${cleaned}" → "${canonical}"`);
        return canonical;
    }
    return cleaned;
}
