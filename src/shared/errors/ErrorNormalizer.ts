/**
 * ErrorNormalizer - every thrown value becomes an ApiError, and every
 * answer goes out in the same JSON envelope.
 */

import { ServerResponse } from 'http';
import { ApiError } from './ApiError.js';
import { ValidationError } from '../validation/ValidationError.js';
import { InvalidInputError } from '../../domain/errors/InvalidInputError.js';

/**
 * Map a thrown value to an ApiError. Unexpected failures keep their
 * message out of the response; callers log them.
 */
export function normalizeError(error: unknown): ApiError {
    if (error instanceof ApiError) {
        return error;
    }
    if (error instanceof InvalidInputError) {
        return ValidationError.fromInvalidInput(error);
    }
    return ApiError.internal();
}

export function sendJson(
    res: ServerResponse,
    statusCode: number,
    body: unknown,
    headers: Record<string, string> = {}
): void {
    res.writeHead(statusCode, { ...headers, 'Content-Type': 'application/json' });
    res.end(JSON.stringify(body));
}

export function sendErrorResponse(res: ServerResponse, error: unknown, correlationId: string): void {
    sendApiError(res, normalizeError(error), correlationId);
}

export function sendApiError(res: ServerResponse, error: ApiError, correlationId: string): void {
    sendJson(res, error.statusCode, error.toResponse(correlationId), error.headers);
}

/**
 * Success envelope.
 */
export interface SuccessResponse<T> {
    data: T;
    correlationId: string;
}

export function sendSuccessResponse<T>(
    res: ServerResponse,
    data: T,
    correlationId: string,
    statusCode = 200
): void {
    const response: SuccessResponse<T> = { data, correlationId };
    sendJson(res, statusCode, response);
}
