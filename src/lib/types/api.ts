import { z } from 'zod';
import { isValidIdentifier } from '@src/lib/sql-identifier.js';
import { MAX_PAGE, DEFAULT_PAGE_SIZE, MAX_PAGE_SIZE } from '@src/lib/pagination.js';

const identifier = (label: string) =>
    z
        .string({ required_error: `${label} is required` })
        .min(1, `${label} is required`)
        .refine(isValidIdentifier, { message: `${label} must be a plain SQL identifier` });

/**
 * Query string of GET /api/data
 *
 * Values arrive as strings; page numbers are coerced and range-checked.
 * An empty district counts as no filter.
 */
export const tableDataQuerySchema = z.object({
    schema_name: identifier('schema_name'),
    table_name: identifier('table_name'),
    district: z
        .string()
        .optional()
        .transform(value => (value ? value : undefined)),
    page: z.coerce.number().int().min(1).max(MAX_PAGE).default(1),
    page_size: z.coerce.number().int().min(1).max(MAX_PAGE_SIZE).default(DEFAULT_PAGE_SIZE),
});

/**
 * Column metadata from information_schema.columns, in ordinal order
 */
export type ColumnDescriptor = {
    name: string;
    type: string;
    nullable: boolean;
};

export type TableRow = Record<string, unknown>;

export type PageResult = {
    rows: TableRow[];
    totalCount: number;
};

export type TableDataRequest = {
    schemaName: string;
    tableName: string;
    district?: string;
    page: number;
    pageSize: number;
};

export type PaginationMetadata = {
    total_items: number;
    page: number;
    page_size: number;
    total_pages: number;
};

export type TableDataResponse = {
    data: TableRow[];
    columns: ColumnDescriptor[];
    pagination: PaginationMetadata;
};

export type ErrorResponse = {
    detail: string;
};
