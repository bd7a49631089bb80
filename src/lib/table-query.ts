import type { AdapterFactory, QueryResult } from '@src/lib/database/index.js';
import { withAdapter } from '@src/lib/database/index.js';
import { ConfigError, QueryError } from '@src/lib/errors/warehouse-error.js';
import { pageOffset } from '@src/lib/pagination.js';
import { qualifiedName, quoteIdentifier } from '@src/lib/sql-identifier.js';
import type { ColumnDescriptor, PageResult, TableRow } from '@src/lib/types/api.js';

/** Column that, when present, enables the district equality filter */
export const DISTRICT_COLUMN = 'district';

export interface TablePageOptions {
    schemaName: string;
    tableName: string;
    columns: ColumnDescriptor[];
    district?: string;
    page: number;
    pageSize: number;
}

export interface SqlStatement {
    sql: string;
    params: unknown[];
}

export interface TableQueries {
    count: SqlStatement;
    data: SqlStatement;
}

type CountRow = {
    total: string | number;
};

/**
 * Build the COUNT and page SELECT for one table page
 *
 * Both statements share the same WHERE clause. Identifiers are quoted,
 * values (district, limit, offset) are always bound.
 *
 * @throws ConfigError when the pagination column is not one of `columns`
 */
export function buildTableQueries(options: TablePageOptions, paginationColumn: string): TableQueries {
    const { schemaName, tableName, columns, district, page, pageSize } = options;

    const columnNames = columns.map(column => column.name);
    if (!columnNames.includes(paginationColumn)) {
        throw new ConfigError(`Pagination column '${paginationColumn}' not found in table columns`);
    }

    const relation = qualifiedName(schemaName, tableName);
    const params: unknown[] = [];
    let whereClause = '';

    if (district && columnNames.includes(DISTRICT_COLUMN)) {
        params.push(district);
        whereClause = ` WHERE ${quoteIdentifier(DISTRICT_COLUMN)} = $${params.length}`;
    }

    const limitIndex = params.length + 1;
    const offsetIndex = params.length + 2;

    return {
        count: {
            sql: `SELECT COUNT(*) AS total FROM ${relation}${whereClause}`,
            params: [...params],
        },
        data: {
            sql: `SELECT * FROM ${relation}${whereClause}` +
                ` ORDER BY ${quoteIdentifier(paginationColumn)}` +
                ` LIMIT $${limitIndex} OFFSET $${offsetIndex}`,
            params: [...params, pageSize, pageOffset(page, pageSize)],
        },
    };
}

/**
 * Copy rows into plain objects keyed in projected column order
 */
export function mapRows(result: QueryResult): TableRow[] {
    return result.rows.map(row => {
        const mapped: TableRow = {};
        for (const field of result.fields) {
            mapped[field.name] = row[field.name];
        }
        return mapped;
    });
}

/**
 * TableQuery - Executes paginated reads against one table
 *
 * COUNT runs first, then the page SELECT, on one borrowed connection.
 * No transaction wraps them, so a concurrent write may skew the total
 * against the rows returned.
 */
export class TableQuery {
    constructor(
        private readonly adapters: AdapterFactory,
        private readonly paginationColumn: string
    ) {}

    async run(options: TablePageOptions): Promise<PageResult> {
        // Validation (and ConfigError) happens before any connection is taken
        const queries = buildTableQueries(options, this.paginationColumn);

        try {
            return await withAdapter(this.adapters, async adapter => {
                const countResult = await adapter.query<CountRow>(queries.count.sql, queries.count.params);
                const dataResult = await adapter.query(queries.data.sql, queries.data.params);

                return {
                    rows: mapRows(dataResult),
                    totalCount: Number(countResult.rows[0]?.total ?? 0),
                };
            });
        } catch (error) {
            throw QueryError.wrap('Error querying table data', error);
        }
    }
}
