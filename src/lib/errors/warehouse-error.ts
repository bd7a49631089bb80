/**
 * Warehouse Error Types
 *
 * Domain errors raised by the introspector, query builder and service.
 * Each carries a kind; the HTTP layer maps kinds to status codes in one place.
 */

export type WarehouseErrorKind =
    | 'UNAUTHORIZED'
    | 'NOT_FOUND'
    | 'VALIDATION_ERROR'
    | 'CONFIG_ERROR'
    | 'QUERY_ERROR';

/**
 * Base class for all domain errors
 */
export abstract class WarehouseError extends Error {
    abstract readonly kind: WarehouseErrorKind;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = this.constructor.name;
        Error.captureStackTrace?.(this, this.constructor);
    }
}

/**
 * Missing or mismatched bearer credential
 */
export class UnauthorizedError extends WarehouseError {
    readonly kind = 'UNAUTHORIZED';

    constructor(message = 'Invalid authentication token') {
        super(message);
    }
}

/**
 * Table absent from the catalog, or present with zero columns
 */
export class NotFoundError extends WarehouseError {
    readonly kind = 'NOT_FOUND';
}

/**
 * Request parameters outside their accepted shape
 */
export class ValidationError extends WarehouseError {
    readonly kind = 'VALIDATION_ERROR';

    constructor(
        message: string,
        public readonly issues: string[] = []
    ) {
        super(message);
    }
}

/**
 * Process configuration that does not fit the table being queried
 * (or does not parse at startup)
 */
export class ConfigError extends WarehouseError {
    readonly kind = 'CONFIG_ERROR';
}

/**
 * Any failure surfaced by the database driver: SQL, connectivity, permissions
 */
export class QueryError extends WarehouseError {
    readonly kind = 'QUERY_ERROR';

    /**
     * Wrap a driver failure under a fixed prefix, keeping the driver text
     */
    static wrap(prefix: string, error: unknown): QueryError {
        const message = error instanceof Error ? error.message : String(error);
        return new QueryError(`${prefix}: ${message}`, { cause: error });
    }
}

/**
 * Type guard for domain errors
 */
export function isWarehouseError(error: unknown): error is WarehouseError {
    return error instanceof WarehouseError;
}
