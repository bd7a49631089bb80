/**
 * HTTP Server
 *
 * Hono-based HTTP API server for the warehouse read API.
 */

import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { serve } from '@hono/node-server';

import { createErrorResponse } from '@src/lib/api-helpers.js';
import type { AppConfig } from '@src/lib/config.js';
import type { AdapterFactory } from '@src/lib/database/index.js';
import { HttpErrors } from '@src/lib/errors/http-error.js';
import { logger as defaultLogger, type Logger } from '@src/lib/logger.js';
import * as middleware from '@src/lib/middleware/index.js';
import { SchemaIntrospector } from '@src/lib/schema-introspector.js';
import { TableDataService } from '@src/lib/table-data-service.js';
import { TableQuery } from '@src/lib/table-query.js';
import type { AppEnv } from '@src/lib/types/hono.js';

// Route handlers
import * as dataRoutes from '@src/routes/api/data/routes.js';

// Public endpoints
import HealthGet from '@src/routes/health/GET.js';

const CORS_METHODS = ['GET', 'HEAD', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'];

export interface HttpAppDeps {
    config: AppConfig;
    adapters: AdapterFactory;
    logger?: Logger;
}

/**
 * Wire introspector, query builder and service from config + adapters
 */
export function createTableDataService(config: AppConfig, adapters: AdapterFactory): TableDataService {
    return new TableDataService(
        new SchemaIntrospector(adapters),
        new TableQuery(adapters, config.db.paginationColumn)
    );
}

/**
 * Create and configure the Hono HTTP app
 */
export function createHttpApp(deps: HttpAppDeps): Hono<AppEnv> {
    const { config, adapters, logger = defaultLogger } = deps;
    const tableDataService = createTableDataService(config, adapters);
    const app = new Hono<AppEnv>();

    // Request logging middleware
    app.use('*', middleware.requestLoggerMiddleware(logger));

    // Credentials cannot pair with '*': echo the caller's origin. Requested headers are reflected.
    app.use('*', cors({
        origin: origin => origin,
        credentials: true,
        allowMethods: CORS_METHODS,
    }));

    // Health check endpoint (public, no authentication required)
    app.get('/health', HealthGet);

    // Protected API routes - require authentication
    app.use('/api/*', middleware.authValidatorMiddleware(config.api.token));
    app.use('/api/*', async (context, next) => {
        context.set('tableDataService', tableDataService);
        await next();
    });

    // Data API routes
    app.get('/api/data', dataRoutes.DataGet);

    // Error handling
    app.onError((err, c) => createErrorResponse(c, err));

    // 404 handler
    app.notFound((c) => createErrorResponse(c, HttpErrors.notFound()));

    return app;
}

export interface HttpServerHandle {
    app: Hono<AppEnv>;
    server: ReturnType<typeof serve>;
    stop: () => Promise<void>;
}

/**
 * Start the HTTP server
 */
export function startHttpServer(deps: HttpAppDeps): HttpServerHandle {
    const { config } = deps;
    const log = deps.logger ?? defaultLogger;
    const app = createHttpApp(deps);

    const server = serve({
        fetch: app.fetch,
        port: config.server.port,
        hostname: config.server.host,
    });

    log.info('HTTP server running', {
        host: config.server.host,
        port: config.server.port,
        url: `http://localhost:${config.server.port}`,
    });

    return {
        app,
        server,
        stop: () => new Promise<void>((resolve, reject) => {
            server.close(error => {
                if (error) {
                    reject(error);
                    return;
                }
                log.info('HTTP server stopped');
                resolve();
            });
        }),
    };
}
