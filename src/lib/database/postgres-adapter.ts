/**
 * PostgreSQL Database Adapter
 *
 * Wraps a pg.PoolClient borrowed from the warehouse pool with the
 * DatabaseAdapter interface.
 */

import type pg from 'pg';
import type { DatabaseAdapter, QueryResult, QueryRow } from './adapter.js';

/**
 * Lifecycle:
 * 1. connect() - Acquires client from pool
 * 2. query() - Executes queries through client
 * 3. disconnect() - Releases client back to pool
 */
export class PostgresAdapter implements DatabaseAdapter {
    private client: pg.PoolClient | null = null;

    constructor(private readonly pool: pg.Pool) {}

    async connect(): Promise<void> {
        if (this.client) {
            return; // Already connected
        }

        this.client = await this.pool.connect();
    }

    async disconnect(): Promise<void> {
        if (!this.client) {
            return; // Not connected
        }

        this.client.release();
        this.client = null;
    }

    isConnected(): boolean {
        return this.client !== null;
    }

    /**
     * Execute SQL query
     *
     * PostgreSQL uses $1, $2, $3... for parameter placeholders.
     */
    async query<T extends QueryRow = QueryRow>(sql: string, params: unknown[] = []): Promise<QueryResult<T>> {
        if (!this.client) {
            throw new Error('PostgresAdapter: Not connected. Call connect() first.');
        }

        const result = await this.client.query<T>(sql, params);

        return {
            rows: result.rows,
            rowCount: result.rowCount ?? 0,
            fields: result.fields.map(f => ({
                name: f.name,
                dataTypeID: f.dataTypeID,
            })),
        };
    }
}
