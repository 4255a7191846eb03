/**
 * src/normalize/locationNormalizer.ts
 *
 * Raw location → hiring-eligibility cluster. A different hiring pool means a
 * different cluster, and so a different job fingerprint.
 *
 *   "Bangalore"          → BANGALORE
 *   "Bengaluru"          → BANGALORE
 *   "Remote - India"     → REMOTE_INDIA
 *   "Bangalore / Remote" → BANGALORE_OR_REMOTE
 *   "Coimbatore"         → COIMBATORE   (unrecognised, kept verbatim)
 */

import { KeywordSet } from './keywordMatch.js';

export const UNKNOWN_LOCATION = 'UNKNOWN';

const REMOTE = new KeywordSet(['remote', 'work from home', 'wfh', 'anywhere']);
const REMOTE_US = new KeywordSet(['us', 'usa', 'united states']);
const REMOTE_GLOBAL = new KeywordSet(['global', 'worldwide', 'anywhere']);

/** First matching city wins. */
const CITIES: ReadonlyArray<readonly [string, KeywordSet]> = [
    ['BANGALORE', new KeywordSet(['bangalore', 'bengaluru'])],
    ['MUMBAI', new KeywordSet(['mumbai', 'bombay'])],
    ['DELHI_NCR', new KeywordSet(['delhi', 'ncr', 'gurugram', 'gurgaon', 'noida'])],
    ['HYDERABAD', new KeywordSet(['hyderabad', 'hyd'])],
    ['CHENNAI', new KeywordSet(['chennai', 'madras'])],
    ['PUNE', new KeywordSet(['pune'])],
    ['KOLKATA', new KeywordSet(['kolkata', 'calcutta'])],
    ['AHMEDABAD', new KeywordSet(['ahmedabad'])],
    ['INDORE', new KeywordSet(['indore'])],
];

function detectCity(loc: string): string | null {
    for (const [city, names] of CITIES) {
        if (names.anyIn(loc)) return city;
    }
    return null;
}

function fallbackToken(raw: string): string {
    const token = raw.trim().toUpperCase().replace(/\s+/g, '_').replace(/[\u0000-\u001f\u007f]/g, '');
    return token || UNKNOWN_LOCATION;
}

export function normalizeLocation(rawLocation: string | null | undefined): string {
    if (!rawLocation || !rawLocation.trim()) return UNKNOWN_LOCATION;

    const loc = rawLocation.toLowerCase().trim();
    const isRemote = REMOTE.anyIn(loc);
    const city = detectCity(loc);

    if (isRemote && city) return `${city}_OR_REMOTE`;
    if (isRemote) {
        if (REMOTE_US.anyIn(loc)) return 'REMOTE_US';
        if (REMOTE_GLOBAL.anyIn(loc)) return 'REMOTE_GLOBAL';
        return 'REMOTE_INDIA';
    }
    if (city) return city;

    return fallbackToken(rawLocation);
}
