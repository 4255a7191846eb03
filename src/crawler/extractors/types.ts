/**
 * src/crawler/extractors/types.ts
 */

import { z } from 'zod';

/** One job card as a site showed it, before any normalization. */
export const rawJobRecordSchema = z.object({
    rawTitle: z.string().trim().min(1),
    rawCompany: z.string().trim().min(1),
    rawLocation: z.string().trim(),
    listingUrl: z.string().url(),
    salaryText: z.string().trim().min(1).nullish(),
    description: z.string().nullish(),
});

export type RawJobRecord = z.infer<typeof rawJobRecordSchema>;

export interface ExtractionContext {
    siteName: string;
    /** The fetched page URL; relative links resolve against it. */
    baseUrl: string;
}

/**
 * Turns a listing page into raw records.
 * Returns [] when the page simply has no cards; throws ExtractionError when
 * the page no longer has the structure the extractor expects.
 */
export interface SiteExtractor {
    readonly siteName: string;
    extract(html: string, context: ExtractionContext): RawJobRecord[];
}

export class ExtractionError extends Error {
    constructor(siteName: string, detail: string) {
        super(`[${siteName}] ${detail}`);
        this.name = 'ExtractionError';
    }
}

/** CSS selectors for a card-list page. */
export interface CardSelectors {
    /** Container that must exist on a well-formed page. */
    anchor?: string;
    card: string;
    /** Tried in order; first non-empty wins. */
    title: string[];
    company: string;
    location: string;
    /** Card attribute holding the listing URL, checked before `link`. */
    urlAttribute?: string;
    link: string;
    salary?: string;
    description?: string;
}
