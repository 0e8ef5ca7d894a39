/**
 * Declarative rules for request bodies and query strings.
 */

export type FieldType = 'string' | 'number' | 'boolean' | 'array' | 'object' | 'union';

export interface FieldRule {
    type: FieldType;
    required?: boolean;
    /** String length or numeric bound, depending on `type` */
    min?: number;
    max?: number;
    /** Reject fractional numbers */
    integer?: boolean;
    pattern?: RegExp;
    enum?: readonly (string | number | boolean)[];
    /** Rule every array element must satisfy */
    items?: FieldRule;
    /** Nested schema of an object field */
    properties?: ValidationSchema;
    /** Objects only: false rejects keys `properties` does not name */
    allowAdditional?: boolean;
    /** Union alternatives; the first match wins */
    anyOf?: readonly FieldRule[];
    /** Replaces the generated message for this field */
    message?: string;
}

export type ValidationSchema = Record<string, FieldRule>;

export interface SchemaOptions {
    /** Report top-level keys the schema does not name. Off by default. */
    rejectUnknown?: boolean;
}

export interface ValidationFieldError {
    field: string;
    message: string;
    value?: unknown;
}

export interface ValidationResult {
    valid: boolean;
    errors: ValidationFieldError[];
}

type RuleOptions<K extends keyof FieldRule = 'type'> = Omit<FieldRule, 'type' | K>;

export const stringField = (options: RuleOptions = {}): FieldRule => ({ type: 'string', ...options });

export const numberField = (options: RuleOptions = {}): FieldRule => ({ type: 'number', ...options });

export const booleanField = (options: RuleOptions = {}): FieldRule => ({ type: 'boolean', ...options });

export const objectField = (properties: ValidationSchema, options: RuleOptions<'properties'> = {}): FieldRule =>
    ({ type: 'object', properties, ...options });

export const unionField = (anyOf: readonly FieldRule[], options: RuleOptions<'anyOf'> = {}): FieldRule =>
    ({ type: 'union', anyOf, ...options });
