import type { AdapterFactory } from '@src/lib/database/index.js';
import { withAdapter } from '@src/lib/database/index.js';
import { QueryError } from '@src/lib/errors/warehouse-error.js';
import type { ColumnDescriptor } from '@src/lib/types/api.js';

type ColumnRow = {
    column_name: string;
    data_type: string;
    is_nullable: string;
};

type ExistsRow = {
    exists: boolean;
};

const COLUMNS_SQL = `
    SELECT column_name, data_type, is_nullable
    FROM information_schema.columns
    WHERE table_schema = $1 AND table_name = $2
    ORDER BY ordinal_position`;

const TABLE_EXISTS_SQL = `
    SELECT EXISTS (
        SELECT 1
        FROM information_schema.tables
        WHERE table_schema = $1 AND table_name = $2
    ) AS exists`;

/**
 * SchemaIntrospector - Reads table shape from the PostgreSQL catalog
 *
 * Names are bound as parameters here; only names the catalog reports back
 * are ever interpolated into data queries.
 */
export class SchemaIntrospector {
    constructor(private readonly adapters: AdapterFactory) {}

    /**
     * Columns of schema.table in ordinal order; empty when nothing matches
     */
    async getColumns(schemaName: string, tableName: string): Promise<ColumnDescriptor[]> {
        try {
            const result = await withAdapter(this.adapters, adapter =>
                adapter.query<ColumnRow>(COLUMNS_SQL, [schemaName, tableName])
            );

            return result.rows.map(row => ({
                name: row.column_name,
                type: row.data_type,
                nullable: row.is_nullable === 'YES',
            }));
        } catch (error) {
            throw QueryError.wrap('Error fetching column information', error);
        }
    }

    async tableExists(schemaName: string, tableName: string): Promise<boolean> {
        try {
            const result = await withAdapter(this.adapters, adapter =>
                adapter.query<ExistsRow>(TABLE_EXISTS_SQL, [schemaName, tableName])
            );

            return result.rows[0]?.exists === true;
        } catch (error) {
            throw QueryError.wrap('Error checking table existence', error);
        }
    }
}
