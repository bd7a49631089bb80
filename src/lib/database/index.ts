/**
 * Database Module
 *
 * Exports the adapter interface, the PostgreSQL adapter and the scoped
 * acquisition helper every database operation goes through.
 */

export type { DatabaseAdapter, AdapterFactory, QueryResult, QueryRow } from './adapter.js';
export { PostgresAdapter } from './postgres-adapter.js';

import type { DatabaseAdapter, AdapterFactory } from './adapter.js';
import { PostgresAdapter } from './postgres-adapter.js';
import type { DatabaseConnection } from '@src/lib/database-connection.js';

/**
 * Adapter factory bound to the warehouse pool
 */
export function createAdapterFactory(connection: DatabaseConnection): AdapterFactory {
    return () => new PostgresAdapter(connection.getPool());
}

/**
 * Run `handler` on a freshly connected adapter and release it afterwards,
 * whether the handler resolves or throws.
 *
 * @example
 * const count = await withAdapter(factory, adapter =>
 *     adapter.query('SELECT COUNT(*) FROM "public"."stores"'));
 */
export async function withAdapter<T>(
    factory: AdapterFactory,
    handler: (adapter: DatabaseAdapter) => Promise<T>
): Promise<T> {
    const adapter = factory();
    await adapter.connect();

    try {
        return await handler(adapter);
    } finally {
        await adapter.disconnect();
    }
}
