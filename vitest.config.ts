/**
 * Vitest Configuration
 *
 * All specs run in-process against a fake database adapter, so no global
 * setup, running server or PostgreSQL instance is needed.
 */

import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';
import { dirname, resolve } from 'path';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export default defineConfig({
    resolve: {
        alias: {
            '@src': resolve(__dirname, './src'),
            '@spec': resolve(__dirname, './spec'),
        },
    },
    test: {
        globals: false,
        environment: 'node',

        // Only run tests in spec/ matching *.test.ts
        include: ['spec/**/*.test.ts'],
        exclude: ['**/node_modules/**', '**/dist/**'],

        testTimeout: 5000,
        hookTimeout: 5000,
    },
});
