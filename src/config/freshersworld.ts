/**
 * src/config/freshersworld.ts — CSS selectors for Freshersworld search result pages
 *
 * Cards carry the canonical listing URL in a `job_display_url` attribute;
 * the title link is the fallback. Cards are appended into `#all-jobs-append`;
 * a page without it no longer has the listing layout.
 */

import type { CardSelectors } from '../crawler/extractors/types.js';

export const FreshersworldSelectors: CardSelectors = {
    anchor: '#all-jobs-append',
    card: '.job-container',
    title: ['h3.latest-jobs-title a'],
    company: '.company-name',
    location: '.job-location, .location, .jobs-location',
    urlAttribute: 'job_display_url',
    link: 'h3.latest-jobs-title a',
    description: '.qualifications, .desc',
};
