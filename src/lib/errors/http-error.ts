/**
 * HttpError - Structured HTTP error handling for API responses
 *
 * Separates business logic errors from HTTP transport concerns.
 * Business logic throws WarehouseError kinds, the app error handler
 * converts them here and renders `{ detail }`.
 */

import type { WarehouseErrorKind } from '@src/lib/errors/warehouse-error.js';
import type { ErrorResponse } from '@src/lib/types/api.js';
import { isWarehouseError } from '@src/lib/errors/warehouse-error.js';

export type HttpErrorStatus = 401 | 404 | 422 | 500;

export class HttpError extends Error {
    public readonly name = 'HttpError';

    constructor(
        public readonly statusCode: HttpErrorStatus,
        message: string,
        public readonly headers: Record<string, string> = {}
    ) {
        super(message);

        // Maintain proper prototype chain for instanceof checks
        Object.setPrototypeOf(this, HttpError.prototype);
    }

    /**
     * Convert to JSON-serializable object for API responses
     */
    toJSON(): ErrorResponse {
        return { detail: this.message };
    }
}

const STATUS_BY_KIND: Record<WarehouseErrorKind, HttpErrorStatus> = {
    UNAUTHORIZED: 401,
    NOT_FOUND: 404,
    VALIDATION_ERROR: 422,
    CONFIG_ERROR: 500,
    QUERY_ERROR: 500,
};

/**
 * Factory methods for common HTTP error scenarios
 */
export class HttpErrors {
    static unauthorized(message = 'Invalid authentication token') {
        return new HttpError(401, message, { 'WWW-Authenticate': 'Bearer' });
    }

    static notFound(message = 'Not Found') {
        return new HttpError(404, message);
    }

    static unprocessableEntity(message: string) {
        return new HttpError(422, message);
    }

    static internal(message = 'Internal server error') {
        return new HttpError(500, message);
    }

    /**
     * Map any thrown value onto an HttpError
     *
     * Domain errors keep their message; anything else becomes a 500 with
     * a generic prefix.
     */
    static from(error: unknown): HttpError {
        if (isHttpError(error)) {
            return error;
        }

        if (isWarehouseError(error)) {
            switch (STATUS_BY_KIND[error.kind]) {
                case 401:
                    return HttpErrors.unauthorized(error.message);
                case 404:
                    return HttpErrors.notFound(error.message);
                case 422:
                    return HttpErrors.unprocessableEntity(error.message);
                case 500:
                    return HttpErrors.internal(error.message);
            }
        }

        const message = error instanceof Error ? error.message : String(error);
        return HttpErrors.internal(`An unexpected error occurred: ${message}`);
    }
}

/**
 * Type guard for HttpError instances
 */
export function isHttpError(error: unknown): error is HttpError {
    return error instanceof HttpError;
}
