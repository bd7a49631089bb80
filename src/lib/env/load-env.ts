/**
 * Environment Variable Loader
 *
 * Loads KEY=VALUE pairs from .env files into an environment object
 * (process.env by default). Existing variables win unless `override` is set.
 *
 * Supports comments, blank lines, single or double quoted values and
 * inline comments after unquoted values.
 */

import { readFileSync, existsSync } from 'fs';

export interface LoadEnvOptions {
    /** Path to .env file (default: '.env') */
    path?: string;
    /** Override existing env vars (default: false) */
    override?: boolean;
    /** Target environment (default: process.env) */
    env?: NodeJS.ProcessEnv;
}

export interface LoadEnvResult {
    loaded: number;
    skipped: number;
}

/**
 * Parse a single line from .env file
 * Returns [key, value] tuple or null if line should be skipped
 */
export function parseLine(line: string): [string, string] | null {
    const trimmed = line.trim();

    if (!trimmed || trimmed.startsWith('#')) {
        return null;
    }

    const eqIndex = trimmed.indexOf('=');
    if (eqIndex === -1) {
        return null;
    }

    const key = trimmed.slice(0, eqIndex).trim();
    let value = trimmed.slice(eqIndex + 1).trim();

    if (!key) {
        return null;
    }

    if (value.length >= 2 &&
        ((value.startsWith('"') && value.endsWith('"')) ||
         (value.startsWith("'") && value.endsWith("'")))) {
        value = value.slice(1, -1);
    } else {
        // Inline comments only count on unquoted values
        const hashIndex = value.indexOf('#');
        if (hashIndex !== -1) {
            value = value.slice(0, hashIndex).trim();
        }
    }

    return [key, value];
}

/**
 * Parse the full text of a .env file
 */
export function parseEnv(content: string): Array<[string, string]> {
    const entries: Array<[string, string]> = [];
    for (const line of content.split(/\r?\n/)) {
        const parsed = parseLine(line);
        if (parsed) {
            entries.push(parsed);
        }
    }
    return entries;
}

/**
 * Load environment variables from a .env file
 *
 * A missing file is not an error: the process environment alone is used.
 */
export function loadEnv(options: LoadEnvOptions = {}): LoadEnvResult {
    const {
        path = '.env',
        override = false,
        env = process.env,
    } = options;

    if (!existsSync(path)) {
        return { loaded: 0, skipped: 0 };
    }

    let loaded = 0;
    let skipped = 0;

    for (const [key, value] of parseEnv(readFileSync(path, 'utf-8'))) {
        if (env[key] !== undefined && !override) {
            skipped++;
            continue;
        }

        env[key] = value;
        loaded++;
    }

    return { loaded, skipped };
}
