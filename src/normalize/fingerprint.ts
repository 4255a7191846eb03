/**
 * src/normalize/fingerprint.ts
 *
 * Job identity key: SHA-256 over the three canonical tokens.
 *
 * Only company, role cluster and location cluster take part. Skills, salary,
 * description, posting date and source URL are not part of identity.
 */

import { createHash } from 'node:crypto';

/** U+001F UNIT SEPARATOR. Never produced by the normalizers. */
export const TOKEN_SEPARATOR = '\u001f';

export class FingerprintInputError extends Error {
    constructor(field: string) {
        super(`Fingerprint token "${field}" contains the reserved separator U+001F`);
        this.name = 'FingerprintInputError';
    }
}

export function fingerprint(company: string, role: string, location: string): string {
    const tokens = { company, role, location };
    for (const [field, value] of Object.entries(tokens)) {
        if (value.includes(TOKEN_SEPARATOR)) throw new FingerprintInputError(field);
    }
    return createHash('sha256')
        .update([company, role, location].join(TOKEN_SEPARATOR), 'utf8')
        .digest('hex');
}
