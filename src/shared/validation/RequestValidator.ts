/**
 * RequestValidator - checks request bodies and query strings against
 * declarative schemas and collects every failing field.
 */

import {
    FieldRule,
    FieldType,
    SchemaOptions,
    ValidationFieldError,
    ValidationResult,
    ValidationSchema,
} from './ValidationSchema.js';
import { ValidationError } from './ValidationError.js';
import { PaginationQuery, readPaginationQuery } from '../types/Pagination.js';

const MAX_STRING_LENGTH = 500;
const MAX_ARRAY_LENGTH = 100;

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function typeOf(value: unknown): string {
    return Array.isArray(value) ? 'array' : typeof value;
}

type Check<T> = (field: string, value: T, rule: FieldRule) => ValidationFieldError[];

function problem(field: string, rule: FieldRule, fallback: string, value?: unknown): ValidationFieldError {
    const error: ValidationFieldError = { field, message: rule.message ?? fallback };
    if (value !== undefined) {
        error.value = value;
    }
    return error;
}

const checkString: Check<string> = (field, value, rule) => {
    const errors: ValidationFieldError[] = [];
    const max = rule.max ?? MAX_STRING_LENGTH;
    if (rule.min !== undefined && value.length < rule.min) {
        errors.push(problem(field, rule, `${field} must be at least ${rule.min} characters`, value));
    }
    if (value.length > max) {
        // Long input is summarized, not echoed
        errors.push(problem(field, rule, `${field} must be at most ${max} characters`, `(${value.length} chars)`));
    }
    if (rule.pattern && !rule.pattern.test(value)) {
        errors.push(problem(field, rule, `${field} has invalid format`, value));
    }
    return errors;
};

const checkNumber: Check<number> = (field, value, rule) => {
    if (!Number.isFinite(value)) {
        return [problem(field, rule, `${field} must be a finite number`, value)];
    }
    const errors: ValidationFieldError[] = [];
    if (rule.integer && !Number.isInteger(value)) {
        errors.push(problem(field, rule, `${field} must be an integer`, value));
    }
    if (rule.min !== undefined && value < rule.min) {
        errors.push(problem(field, rule, `${field} must be at least ${rule.min}`, value));
    }
    if (rule.max !== undefined && value > rule.max) {
        errors.push(problem(field, rule, `${field} must be at most ${rule.max}`, value));
    }
    return errors;
};

const checkArray: Check<unknown[]> = (field, value, rule) => {
    const size = `(${value.length} items)`;
    const max = rule.max ?? MAX_ARRAY_LENGTH;
    if (value.length > max) {
        // Item errors past the cap are noise
        return [problem(field, rule, `${field} must have at most ${max} items`, size)];
    }
    const errors: ValidationFieldError[] = [];
    if (rule.min !== undefined && value.length < rule.min) {
        errors.push(problem(field, rule, `${field} must have at least ${rule.min} items`, size));
    }
    const { items } = rule;
    if (items) {
        value.forEach((item, index) => errors.push(...checkField(`${field}[${index}]`, item, items)));
    }
    return errors;
};

const checkObject: Check<Record<string, unknown>> = (field, value, rule) => {
    const properties = rule.properties;
    if (!properties) {
        return [];
    }
    const errors: ValidationFieldError[] = [];
    if (rule.allowAdditional === false) {
        for (const key of Object.keys(value).filter(key => !Object.hasOwn(properties, key))) {
            errors.push({ field: `${field}.${key}`, message: `Unknown field: ${field}.${key}` });
        }
    }
    for (const [key, nested] of Object.entries(properties)) {
        errors.push(...checkField(`${field}.${key}`, value[key], nested));
    }
    return errors;
};

function checkUnion(field: string, value: unknown, rule: FieldRule): ValidationFieldError[] {
    const matches = (rule.anyOf ?? []).some(
        alternative => checkField(field, value, { ...alternative, required: false }).length === 0
    );
    return matches ? [] : [problem(field, rule, `${field} does not match any accepted shape`, value)];
}

/**
 * Type-specific checks, run once the value has the rule's type.
 */
function checkTyped(field: string, value: unknown, rule: FieldRule): ValidationFieldError[] {
    if (typeof value === 'string') return checkString(field, value, rule);
    if (typeof value === 'number') return checkNumber(field, value, rule);
    if (Array.isArray(value)) return checkArray(field, value, rule);
    if (isRecord(value)) return checkObject(field, value, rule);
    return [];
}

function checkField(field: string, value: unknown, rule: FieldRule): ValidationFieldError[] {
    if (value === undefined || value === null || (rule.required && value === '')) {
        return rule.required ? [problem(field, rule, `${field} is required`)] : [];
    }
    if (rule.type === 'union') {
        return checkUnion(field, value, rule);
    }

    const actual = typeOf(value);
    const expected: FieldType = rule.type;
    if (actual !== expected) {
        return [problem(field, rule, `${field} must be a ${expected}, got ${actual}`, value)];
    }

    const errors = checkTyped(field, value, rule);
    if (rule.enum && !rule.enum.some(allowed => allowed === value)) {
        errors.push(problem(field, rule, `${field} must be one of [${rule.enum.join(', ')}]`, value));
    }
    return errors;
}

/**
 * Validate `data` against `schema`, collecting every failing field.
 */
export function validate(data: unknown, schema: ValidationSchema, options: SchemaOptions = {}): ValidationResult {
    if (!isRecord(data)) {
        return {
            valid: false,
            errors: [{ field: '$root', message: 'Request body must be an object', value: data }],
        };
    }

    const errors: ValidationFieldError[] = [];

    if (options.rejectUnknown) {
        for (const key of Object.keys(data).filter(key => !Object.hasOwn(schema, key))) {
            errors.push({ field: key, message: `Unknown field: ${key}` });
        }
    }
    for (const [field, rule] of Object.entries(schema)) {
        errors.push(...checkField(field, data[field], rule));
    }

    return { valid: errors.length === 0, errors };
}

/**
 * Validate and narrow `data`, throwing ValidationError on failure.
 */
export function validateOrThrow(
    data: unknown,
    schema: ValidationSchema,
    options: SchemaOptions = {}
): asserts data is Record<string, unknown> {
    const result = validate(data, schema, options);
    if (!result.valid || !isRecord(data)) {
        throw ValidationError.fromFieldErrors(result.errors);
    }
}

/**
 * Validated `page` and `pageSize`; throws ValidationError when either is
 * out of range.
 */
export function validatePaginationOrThrow(query: Record<string, string | undefined>): Required<PaginationQuery> {
    const { query: pagination, problems } = readPaginationQuery(query);
    if (problems.length > 0) {
        throw ValidationError.fromFieldErrors(problems);
    }
    return pagination;
}
