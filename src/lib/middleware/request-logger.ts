/**
 * Request Logging Middleware
 *
 * Logs each request once it completes, with status and duration.
 */

import type { MiddlewareHandler } from 'hono';
import type { Logger } from '@src/lib/logger.js';

export function requestLoggerMiddleware(logger: Logger): MiddlewareHandler {
    return async (context, next) => {
        const start = Date.now();

        await next();

        logger.info('Request completed', {
            method: context.req.method,
            path: context.req.path,
            status: context.res.status,
            duration: Date.now() - start,
        });
    };
}
