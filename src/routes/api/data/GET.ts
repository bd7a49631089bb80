import type { Context } from 'hono';
import { parseQuery } from '@src/lib/api-helpers.js';
import type { AppEnv } from '@src/lib/types/hono.js';
import { tableDataQuerySchema } from '@src/lib/types/api.js';

/**
 * GET /api/data - Paginated rows and column metadata for one table
 *
 * Query: schema_name, table_name, district?, page (default 1),
 * page_size (default 100, max 1000).
 *
 * The district filter only applies when the table has a `district` column.
 * Rows are ordered by the configured pagination column.
 */
export default async function (context: Context<AppEnv>) {
    const query = parseQuery(tableDataQuerySchema, context.req.query());
    const service = context.get('tableDataService');

    const result = await service.getTableData({
        schemaName: query.schema_name,
        tableName: query.table_name,
        district: query.district,
        page: query.page,
        pageSize: query.page_size,
    });

    return context.json(result);
}
