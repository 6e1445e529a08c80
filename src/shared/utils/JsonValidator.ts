/**
 * JSON Validator
 *
 * JSON parsing with shape validation through type guards.
 */

import * as fs from 'fs';
import { ErrorHandler, ErrorSeverity, ErrorContext } from './ErrorHandler.js';

export type Validator<T> = (value: unknown) => value is T;

/** One validator per property of T */
export type Shape<T> = { [K in keyof T]-?: Validator<T[K]> };

export interface ValidationResult<T> {
    success: boolean;
    data?: T;
    error?: string;
}

export const Validators = {
    string: (value: unknown): value is string => typeof value === 'string',
    boolean: (value: unknown): value is boolean => typeof value === 'boolean',
    positiveInt: (value: unknown): value is number =>
        typeof value === 'number' && Number.isInteger(value) && value > 0,
    nonNegativeInt: (value: unknown): value is number =>
        typeof value === 'number' && Number.isInteger(value) && value >= 0,
    fraction: (value: unknown): value is number =>
        typeof value === 'number' && value >= 0 && value <= 1,
    array: <T>(itemValidator?: Validator<T>) => (value: unknown): value is T[] => {
        if (!Array.isArray(value)) return false;
        if (itemValidator) {
            return value.every(item => itemValidator(item));
        }
        return true;
    },
    object: (value: unknown): value is Record<string, unknown> =>
        typeof value === 'object' && value !== null && !Array.isArray(value),
    record: <T>(valueValidator: Validator<T>) => (value: unknown): value is Record<string, T> =>
        Validators.object(value) && Object.values(value).every(v => valueValidator(v)),
    optional: <T>(validator: Validator<T>) => (value: unknown): value is T | undefined =>
        value === undefined || validator(value),
};

/**
 * Create a validator for an object shape. Keys outside the shape are allowed.
 */
export function createObjectValidator<T extends object>(shape: Shape<T>): Validator<T> {
    const entries: Array<[string, (value: unknown) => boolean]> = Object.entries(shape);

    return (value: unknown): value is T => {
        if (!Validators.object(value)) return false;
        const record = value;
        return entries.every(([key, check]) => check(record[key]));
    };
}

/**
 * Name of the first property that fails its validator, or null
 */
export function findInvalidKey<T extends object>(value: Record<string, unknown>, shape: Shape<T>): string | null {
    const entries: Array<[string, (value: unknown) => boolean]> = Object.entries(shape);
    const bad = entries.find(([key, check]) => !check(value[key]));
    return bad ? bad[0] : null;
}

/**
 * First property of value that the shape does not declare, or null
 */
export function findUnknownKey<T extends object>(value: Record<string, unknown>, shape: Shape<T>): string | null {
    const known = new Set(Object.keys(shape));
    return Object.keys(value).find(key => !known.has(key)) ?? null;
}

export class JsonValidator {
    /**
     * Parse a JSON string and check it against a validator
     */
    static parse<T>(jsonString: string, validator: Validator<T>, context?: string): ValidationResult<T> {
        const errorContext: ErrorContext = {
            component: 'JsonValidator',
            operation: 'parse',
            data: context ? { context } : undefined
        };

        let parsed: unknown;
        try {
            parsed = JSON.parse(jsonString);
        } catch (error) {
            const info = ErrorHandler.handle(error, errorContext, ErrorSeverity.SILENT);
            return { success: false, error: `Invalid JSON: ${info.message}` };
        }

        if (!validator(parsed)) {
            return {
                success: false,
                error: 'Validation failed: data does not match expected shape'
            };
        }
        return { success: true, data: parsed };
    }

    /**
     * Parse an object-shaped JSON file, naming the offending or undeclared property on failure
     */
    static parseFile<T extends object>(filePath: string, shape: Shape<T>): ValidationResult<T> {
        if (!fs.existsSync(filePath)) {
            return { success: false, error: `File not found: ${filePath}` };
        }

        const content = fs.readFileSync(filePath, 'utf-8');
        const result = this.parse(content, Validators.object, filePath);
        if (!result.success || result.data === undefined) {
            return { success: false, error: result.error ?? `Expected a JSON object in ${filePath}` };
        }

        const unknownKey = findUnknownKey(result.data, shape);
        if (unknownKey !== null) {
            return { success: false, error: `Unknown key "${unknownKey}" in ${filePath}` };
        }

        const badKey = findInvalidKey(result.data, shape);
        if (badKey !== null) {
            return { success: false, error: `Invalid value for "${badKey}" in ${filePath}` };
        }

        const validate = createObjectValidator(shape);
        const data = result.data;
        if (!validate(data)) {
            return { success: false, error: `Validation failed for ${filePath}` };
        }
        return { success: true, data };
    }
}
