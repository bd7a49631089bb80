/**
 * Warehouse API - Main Entry Point
 *
 * Orchestrates server startup:
 * - Environment loading and validation
 * - Database pool creation and connectivity check
 * - HTTP server startup
 * - Graceful shutdown coordination
 */

import { loadEnv } from '@src/lib/env/load-env.js';
import { loadConfig } from '@src/lib/config.js';
import { DatabaseConnection } from '@src/lib/database-connection.js';
import { createAdapterFactory } from '@src/lib/database/index.js';
import { logger } from '@src/lib/logger.js';
import { startHttpServer } from '@src/servers/http.js';

// Load environment-specific .env file, then the plain one; neither overrides the process env
if (process.env.NODE_ENV) {
    loadEnv({ path: `.env.${process.env.NODE_ENV}` });
}
loadEnv({ path: '.env' });

const config = loadConfig();

logger.info('Starting warehouse API', {
    nodeEnv: config.server.nodeEnv,
    database: `${config.db.user}@${config.db.host}:${config.db.port}/${config.db.name}`,
    paginationColumn: config.db.paginationColumn,
});

if (!config.api.token) {
    logger.warn('API_TOKEN is empty; every /api request will be rejected');
}

const connection = new DatabaseConnection(config.db);

// Report connectivity but start regardless: requests surface database errors as 500s
const health = await connection.healthCheck();
if (health.success) {
    logger.info('Database connection ready');
} else {
    logger.warn('Database connection check failed', { error: health.error });
}

const httpServer = startHttpServer({
    config,
    adapters: createAdapterFactory(connection),
});

// Graceful shutdown
const gracefulShutdown = async (signal: string) => {
    logger.info('Shutting down gracefully', { signal });

    try {
        await httpServer.stop();
        await connection.close();
        process.exit(0);
    } catch (error) {
        logger.error('Shutdown failed', { error: error instanceof Error ? error.message : String(error) });
        process.exit(1);
    }
};

process.once('SIGINT', () => void gracefulShutdown('SIGINT'));
process.once('SIGTERM', () => void gracefulShutdown('SIGTERM'));
