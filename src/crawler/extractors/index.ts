/**
 * src/crawler/extractors/index.ts
 *
 * Site name → extractor. Adding a site:
 *   1. Create src/config/<site>.ts with its CardSelectors.
 *   2. Register it below under the SourceSite name used in the seed file.
 */

import { FreshersworldSelectors } from '../../config/freshersworld.js';
import { TimesJobsSelectors } from '../../config/timesjobs.js';
import { CardListExtractor } from './cardExtractor.js';
import type { SiteExtractor } from './types.js';

const REGISTRY: ReadonlyMap<string, SiteExtractor> = new Map<string, SiteExtractor>([
    ['freshersworld', new CardListExtractor('freshersworld', FreshersworldSelectors)],
    ['timesjobs', new CardListExtractor('timesjobs', TimesJobsSelectors)],
]);

export type ExtractorLookup = (siteName: string) => SiteExtractor | undefined;

export const getExtractor: ExtractorLookup = (siteName) => REGISTRY.get(siteName.trim().toLowerCase());

export { CardListExtractor } from './cardExtractor.js';
export * from './types.js';
