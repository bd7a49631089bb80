import { NotFoundError } from '@src/lib/errors/warehouse-error.js';
import { buildPagination, clampPageSize, normalizePage } from '@src/lib/pagination.js';
import type { SchemaIntrospector } from '@src/lib/schema-introspector.js';
import type { TableQuery } from '@src/lib/table-query.js';
import type { TableDataRequest, TableDataResponse } from '@src/lib/types/api.js';

/**
 * TableDataService - Orchestrates one paginated table read
 *
 * existence check -> column lookup -> count + page -> envelope.
 * Holds no state between calls.
 */
export class TableDataService {
    constructor(
        private readonly introspector: SchemaIntrospector,
        private readonly tableQuery: TableQuery
    ) {}

    async getTableData(request: TableDataRequest): Promise<TableDataResponse> {
        const { schemaName, tableName, district } = request;
        const page = normalizePage(request.page);
        const pageSize = clampPageSize(request.pageSize);
        const label = `${schemaName}.${tableName}`;

        if (!(await this.introspector.tableExists(schemaName, tableName))) {
            throw new NotFoundError(`Table '${label}' not found`);
        }

        const columns = await this.introspector.getColumns(schemaName, tableName);
        if (columns.length === 0) {
            throw new NotFoundError(`No columns found for table '${label}'`);
        }

        const { rows, totalCount } = await this.tableQuery.run({
            schemaName,
            tableName,
            columns,
            district,
            page,
            pageSize,
        });

        return {
            data: rows,
            columns,
            pagination: buildPagination(totalCount, page, pageSize),
        };
    }
}
