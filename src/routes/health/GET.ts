import type { Context } from 'hono';

/**
 * GET /health - Health check endpoint
 *
 * Public endpoint, no authentication required. Does not touch the database.
 */
export default function (context: Context) {
    return context.json({ status: 'ok' });
}
