/**
 * src/config/timesjobs.ts — CSS selectors for TimesJobs search result pages
 */

import type { CardSelectors } from '../crawler/extractors/types.js';

export const TimesJobsSelectors: CardSelectors = {
    anchor: 'ul.new-joblist',
    card: 'li.clearfix.job-bx',
    title: ['h2 a.jobTitle', 'h2.job-tittle a'],
    company: 'h3.joblist-comp-name',
    location: 'ul.top-jd-dtl li span',
    link: 'h2 a.jobTitle, h2.job-tittle a',
    salary: 'ul.top-jd-dtl li.sal, li[title="salary"] i',
    description: 'ul.list-job-dtl li, span.srp-skills',
};
