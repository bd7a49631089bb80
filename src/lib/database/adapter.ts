/**
 * Database Adapter Interface
 *
 * Adapters are per-operation instances: connect, run one or more queries,
 * disconnect. The query interface mirrors pg.PoolClient.
 */

export type QueryRow = Record<string, unknown>;

/**
 * Query result matching pg.QueryResult structure
 */
export interface QueryResult<T extends QueryRow = QueryRow> {
    /** Array of result rows */
    rows: T[];
    /** Number of rows returned or affected */
    rowCount: number;
    /** Projected fields, in SELECT order */
    fields: Array<{
        name: string;
        dataTypeID?: number;
    }>;
}

export interface DatabaseAdapter {
    /**
     * Acquire a connection
     */
    connect(): Promise<void>;

    /**
     * Release the connection. Safe to call when not connected.
     */
    disconnect(): Promise<void>;

    isConnected(): boolean;

    /**
     * Execute SQL with PostgreSQL-style placeholders ($1, $2, ...)
     */
    query<T extends QueryRow = QueryRow>(sql: string, params?: unknown[]): Promise<QueryResult<T>>;
}

/**
 * Produces a fresh, unconnected adapter per operation
 */
export type AdapterFactory = () => DatabaseAdapter;
