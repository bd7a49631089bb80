import type { Context } from 'hono';
import type { z } from 'zod';
import { HttpErrors } from '@src/lib/errors/http-error.js';
import { ValidationError } from '@src/lib/errors/warehouse-error.js';
import { logger } from '@src/lib/logger.js';

/**
 * API Request/Response Helpers
 *
 * Parameter validation for route handlers and the single place where
 * thrown errors become HTTP responses.
 */

/**
 * Validate a query-string record against a zod schema
 *
 * @throws ValidationError listing each failing parameter
 */
export function parseQuery<S extends z.ZodTypeAny>(schema: S, query: Record<string, string>): z.output<S> {
    const parsed = schema.safeParse(query);

    if (!parsed.success) {
        const issues = parsed.error.issues.map(issue => {
            const field = issue.path.join('.');
            return issue.message.startsWith(field) ? issue.message : `${field}: ${issue.message}`;
        });
        throw new ValidationError(issues.join('; '), issues);
    }

    return parsed.data;
}

/**
 * Render any thrown value as `{ detail }` with the mapped status
 *
 * Used as the app's onError handler.
 */
export function createErrorResponse(context: Context, error: unknown) {
    const httpError = HttpErrors.from(error);

    if (httpError.statusCode >= 500) {
        logger.error('Request failed', {
            method: context.req.method,
            path: context.req.path,
            error: httpError.message,
        });
    }

    for (const [name, value] of Object.entries(httpError.headers)) {
        context.header(name, value);
    }

    return context.json(httpError.toJSON(), httpError.statusCode);
}
