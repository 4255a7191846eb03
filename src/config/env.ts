import 'dotenv/config';
import { ZodError } from 'zod';
import { envSchema, type Env } from './envSchema.js';

function withDbAliases(raw: NodeJS.ProcessEnv): NodeJS.ProcessEnv {
    const next = { ...raw };
    if (!next.PGHOST && next.DB_HOST) next.PGHOST = next.DB_HOST;
    if (!next.PGPORT && next.DB_PORT) next.PGPORT = next.DB_PORT;
    if (!next.PGUSER && next.DB_USER) next.PGUSER = next.DB_USER;
    if (!next.PGPASSWORD && next.DB_PASSWORD) next.PGPASSWORD = next.DB_PASSWORD;
    if (!next.PGDATABASE && next.DB_NAME) next.PGDATABASE = next.DB_NAME;
    return next;
}

/**
 * Parses a raw environment into a typed config.
 * Throws an Error listing every invalid key, one per line.
 */
export function loadEnv(raw: NodeJS.ProcessEnv): Env {
    try {
        return envSchema.parse(withDbAliases(raw));
    } catch (err) {
        if (err instanceof ZodError) {
            const lines = err.issues.map((i) => {
                const key = i.path.join('.') || '(root)';
                return `- ${key}: ${i.message}`;
            });
            throw new Error('Invalid environment variables:\n' + lines.join('\n'));
        }
        throw err;
    }
}

let env: Env;
try {
    env = loadEnv(process.env);
} catch (err) {
    console.error(err instanceof Error ? err.message : String(err));
    process.exit(1);
}

export { env };
export type { Env };
