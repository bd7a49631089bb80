import pg from 'pg';

import type { DatabaseConfig } from '@src/lib/config.js';
import { getDatabaseUrl } from '@src/lib/config.js';
import { logger } from '@src/lib/logger.js';

const { Pool } = pg;

/**
 * Database Connection Manager
 *
 * Owns the single pg.Pool for the warehouse database. This is the only
 * place that constructs a pool; adapters borrow clients from it one
 * operation at a time.
 */
export class DatabaseConnection {
    private pool: pg.Pool | null = null;

    constructor(private readonly config: DatabaseConfig) {}

    /** Get (or lazily create) the warehouse pool */
    getPool(): pg.Pool {
        if (!this.pool) {
            const connectionString = getDatabaseUrl(this.config);
            this.pool = new Pool(this.getPoolConfig(connectionString));

            // Idle clients that lose their backend emit here; unhandled it would crash the process
            this.pool.on('error', error => {
                logger.warn('Idle database client error', { error: error.message });
            });

            logger.info('Database pool created', {
                host: this.config.host,
                port: this.config.port,
                database: this.config.name,
            });
        }

        return this.pool;
    }

    /** Round-trip a trivial query through the pool */
    async healthCheck(): Promise<{ success: boolean; error?: string }> {
        try {
            const client = await this.getPool().connect();
            try {
                await client.query('SELECT 1');
            } finally {
                client.release();
            }
            return { success: true };
        } catch (error) {
            return {
                success: false,
                error: error instanceof Error ? error.message : 'Unknown database error',
            };
        }
    }

    /** Close pooled connections - used during shutdown */
    async close(): Promise<void> {
        if (!this.pool) {
            return;
        }

        const pool = this.pool;
        this.pool = null;
        await pool.end();
        logger.info('Database pool closed', { database: this.config.name });
    }

    /** Translate connection string into pg.Pool configuration */
    private getPoolConfig(connectionString: string): pg.PoolConfig {
        return {
            connectionString,
            idleTimeoutMillis: 30000,
            connectionTimeoutMillis: 5000,
            ssl: connectionString.includes('sslmode=require') ? { rejectUnauthorized: false } : false,
        };
    }
}
