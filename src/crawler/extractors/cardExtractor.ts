/**
 * src/crawler/extractors/cardExtractor.ts
 *
 * Generic Cheerio extractor for listing pages that render one card per job.
 * A site plugs in by supplying a CardSelectors config.
 *
 * Per card:
 *   • title, company and URL are required; incomplete cards are skipped
 *   • a blank location becomes "India"
 *   • relative URLs resolve against the page URL
 */

import * as cheerio from 'cheerio';
import { log } from 'crawlee';
import {
    ExtractionError,
    type CardSelectors,
    type ExtractionContext,
    type RawJobRecord,
    type SiteExtractor,
} from './types.js';

const DEFAULT_LOCATION = 'India';

function absoluteUrl(href: string, baseUrl: string): string | null {
    try {
        const url = new URL(href, baseUrl);
        return url.protocol === 'http:' || url.protocol === 'https:' ? url.toString() : null;
    } catch {
        return null;
    }
}

function squash(text: string): string {
    return text.replace(/\s+/g, ' ').trim();
}

export class CardListExtractor implements SiteExtractor {
    constructor(
        readonly siteName: string,
        private readonly selectors: CardSelectors
    ) {}

    extract(html: string, { baseUrl }: ExtractionContext): RawJobRecord[] {
        const tag = `[${this.siteName}]`;
        const sel = this.selectors;
        const $ = cheerio.load(html);

        if (sel.anchor && $(sel.anchor).length === 0) {
            throw new ExtractionError(this.siteName, `Listing container "${sel.anchor}" not found on ${baseUrl}`);
        }

        const cards = $(sel.card);
        log.info(`${tag} Found ${cards.length} card elements with selector "${sel.card}"`);

        const records: RawJobRecord[] = [];
        cards.each((_, element) => {
            const card = $(element);
            const textOf = (selector: string): string => squash(card.find(selector).first().text());

            const title = sel.title.map(textOf).find((t) => t.length > 0) ?? '';
            const company = textOf(sel.company);
            const location = textOf(sel.location) || DEFAULT_LOCATION;
            const href = (sel.urlAttribute ? card.attr(sel.urlAttribute)?.trim() : undefined)
                || card.find(sel.link).first().attr('href')?.trim()
                || '';
            const listingUrl = href ? absoluteUrl(href, baseUrl) : null;

            if (!title || !company || !listingUrl) {
                log.debug(`${tag} Skipping incomplete card: title="${title}" company="${company}" url="${href}"`);
                return;
            }

            const salary = sel.salary ? textOf(sel.salary) : '';
            const description = sel.description
                ? squash(card.find(sel.description).map((__, el) => $(el).text()).get().join(' '))
                : '';

            records.push({
                rawTitle: title,
                rawCompany: company,
                rawLocation: location,
                listingUrl,
                salaryText: salary || null,
                description: description || null,
            });
        });

        log.info(`${tag} Extracted ${records.length} of ${cards.length} cards`);
        return records;
    }
}
