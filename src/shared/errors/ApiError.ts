/**
 * ApiError - an error that maps onto an HTTP answer.
 */

import { ErrorCode, ErrorCodes, ERROR_CODE_TO_STATUS } from './ErrorCodes.js';

/**
 * Error envelope sent to clients.
 */
export interface ApiErrorResponse {
    error: {
        code: ErrorCode;
        message: string;
        details?: unknown;
        correlationId: string;
    };
}

export class ApiError extends Error {
    readonly statusCode: number;

    constructor(
        readonly code: ErrorCode,
        message: string,
        readonly details?: unknown,
        /** Extra response headers, such as `Allow` on a 405 */
        readonly headers: Record<string, string> = {}
    ) {
        super(message);
        this.name = 'ApiError';
        this.statusCode = ERROR_CODE_TO_STATUS[code];
        Object.setPrototypeOf(this, ApiError.prototype);
    }

    toResponse(correlationId: string): ApiErrorResponse {
        const { code, message, details } = this;
        return {
            error: details === undefined
                ? { code, message, correlationId }
                : { code, message, details, correlationId },
        };
    }

    static validation(message: string, details?: unknown): ApiError {
        return new ApiError(ErrorCodes.VALIDATION_ERROR, message, details);
    }

    static notFound(resource: string, id?: string): ApiError {
        return new ApiError(ErrorCodes.NOT_FOUND, id ? `${resource} not found: ${id}` : `${resource} not found`);
    }

    static methodNotAllowed(method: string, allowed: readonly string[]): ApiError {
        return new ApiError(
            ErrorCodes.METHOD_NOT_ALLOWED,
            `Method ${method} is not allowed; use ${allowed.join(', ')}`,
            undefined,
            { Allow: allowed.join(', ') }
        );
    }

    static payloadTooLarge(limitBytes: number): ApiError {
        return new ApiError(ErrorCodes.PAYLOAD_TOO_LARGE, `Request body exceeds ${limitBytes} bytes`);
    }

    static timeout(message = 'Request timeout'): ApiError {
        return new ApiError(ErrorCodes.TIMEOUT, message);
    }

    static internal(message = 'Internal server error'): ApiError {
        return new ApiError(ErrorCodes.INTERNAL_ERROR, message);
    }
}
