/**
 * ValidationError - a 400 carrying the fields that failed.
 */

import { ApiError } from '../errors/ApiError.js';
import { ErrorCodes } from '../errors/ErrorCodes.js';
import { ValidationFieldError } from './ValidationSchema.js';
import { InvalidInputError } from '../../domain/errors/InvalidInputError.js';

function summarize(fieldErrors: readonly ValidationFieldError[]): string {
    switch (fieldErrors.length) {
        case 0:
            return 'Validation failed';
        case 1:
            return fieldErrors[0].message;
        default:
            return `Validation failed: ${fieldErrors.map(e => e.message).join('; ')}`;
    }
}

export class ValidationError extends ApiError {
    constructor(readonly fieldErrors: readonly ValidationFieldError[], message = summarize(fieldErrors)) {
        super(ErrorCodes.VALIDATION_ERROR, message, {
            fields: fieldErrors.map(({ field, message: reason }) => ({ field, message: reason })),
        });
        this.name = 'ValidationError';
        Object.setPrototypeOf(this, ValidationError.prototype);
    }

    static fromFieldErrors(fieldErrors: readonly ValidationFieldError[]): ValidationError {
        return new ValidationError(fieldErrors);
    }

    /**
     * A domain input failure, reported against the field it names.
     */
    static fromInvalidInput(error: InvalidInputError): ValidationError {
        return new ValidationError([{ field: error.field ?? '$root', message: error.message, value: error.value }]);
    }
}
