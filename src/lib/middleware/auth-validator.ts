/**
 * Auth Validator Middleware
 *
 * Static bearer-token authentication for the /api/* routes:
 * - Authorization: Bearer <api_token>
 *
 * The presented credential is compared to the configured token in constant
 * time. An empty configured token rejects every request.
 */

import type { MiddlewareHandler } from 'hono';
import { createHash, timingSafeEqual } from 'crypto';
import { UnauthorizedError } from '@src/lib/errors/warehouse-error.js';

const BEARER_PREFIX = /^Bearer\s+/i;

/**
 * Extract the credential from an Authorization header value
 */
export function extractBearerToken(header: string | undefined): string | null {
    if (!header || !BEARER_PREFIX.test(header)) {
        return null;
    }

    const token = header.replace(BEARER_PREFIX, '').trim();
    return token || null;
}

/**
 * Constant-time string equality
 *
 * Both sides are hashed first so the comparison length never depends on
 * the presented value.
 */
export function tokensMatch(presented: string, expected: string): boolean {
    const a = createHash('sha256').update(presented).digest();
    const b = createHash('sha256').update(expected).digest();
    return timingSafeEqual(a, b);
}

export function authValidatorMiddleware(apiToken: string): MiddlewareHandler {
    return async (context, next) => {
        const token = extractBearerToken(context.req.header('Authorization'));

        if (!apiToken || !token || !tokensMatch(token, apiToken)) {
            throw new UnauthorizedError();
        }

        await next();
    };
}
