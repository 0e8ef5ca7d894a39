/**
 * CommonSchemas - reusable field definitions and patterns.
 */

import { stringField, numberField, unionField } from '../ValidationSchema.js';

/**
 * Calendar date `YYYY-MM-DD`. Range checks happen in the domain.
 */
export const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Longest accepted date-time string.
 */
export const MAX_DATE_STRING_LENGTH = 64;

/**
 * A date string or epoch milliseconds.
 */
export const dateInputField = unionField(
    [stringField({ min: 1, max: MAX_DATE_STRING_LENGTH }), numberField()],
    { message: 'Must be a date string or epoch milliseconds' }
);

/**
 * Optional `YYYY-MM-DD` query parameter.
 */
export const optionalDateField = stringField({
    required: false,
    pattern: DATE_PATTERN,
    message: 'Must be a calendar date in YYYY-MM-DD format',
});
