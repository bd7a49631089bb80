/**
 * SQL identifier handling
 *
 * Schema, table and column names cannot be bound as query parameters, so they
 * are interpolated. Every interpolated name must pass isValidIdentifier() and
 * is then double-quoted; the allow-list admits no quote characters.
 */

import { ValidationError } from '@src/lib/errors/warehouse-error.js';

/** PostgreSQL truncates identifiers beyond NAMEDATALEN - 1 bytes */
export const MAX_IDENTIFIER_LENGTH = 63;

const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_$]*$/;

export function isValidIdentifier(name: string): boolean {
    return name.length > 0 &&
        Buffer.byteLength(name, 'utf8') <= MAX_IDENTIFIER_LENGTH &&
        IDENTIFIER_PATTERN.test(name);
}

/**
 * Quote an identifier for interpolation
 *
 * @throws ValidationError when the name fails the allow-list
 */
export function quoteIdentifier(name: string): string {
    if (!isValidIdentifier(name)) {
        throw new ValidationError(`Invalid SQL identifier: '${name}'`);
    }
    return `"${name}"`;
}

/**
 * Quote a schema-qualified relation name: "schema"."table"
 */
export function qualifiedName(schemaName: string, tableName: string): string {
    return `${quoteIdentifier(schemaName)}.${quoteIdentifier(tableName)}`;
}
