import { ApplicationError, ErrorCodes } from './errors';
import { logger } from './logger';

export type FieldType = 'string' | 'object' | 'buffer';

// Validation rule definitions
export interface FieldRule {
    type: FieldType;
    required?: boolean;
    min?: number;
    pattern?: RegExp;
    custom?: (value: unknown) => { valid: boolean; message: string };
}

export interface ValidationSchema {
    [field: string]: FieldRule;
}

export interface ValidationErrors {
    [field: string]: string;
}

/**
 * Checks `data` against `schema` and returns one message per failing field.
 */
export function validateInput(data: Record<string, unknown>, schema: ValidationSchema): ValidationErrors {
    const errors: ValidationErrors = {};

    for (const [field, rules] of Object.entries(schema)) {
        const value = data[field];
        const isBlank = typeof value === 'string' && value.trim() === '';

        if (rules.required && (value === undefined || value === null || isBlank)) {
            errors[field] = `${field} is required`;
            continue;
        }

        // Optional and absent
        if (value === undefined || value === null) {
            continue;
        }

        if (!validateType(value, rules.type)) {
            errors[field] = `${field} must be of type ${rules.type}`;
            continue;
        }

        if (typeof value === 'string') {
            if (rules.min !== undefined && value.length < rules.min) {
                errors[field] = `${field} must be at least ${rules.min} characters`;
                continue;
            }
            if (rules.pattern && !rules.pattern.test(value)) {
                errors[field] = `${field} has an invalid format`;
                continue;
            }
        }

        if (rules.custom) {
            const result = rules.custom(value);

            if (!result.valid) {
                errors[field] = result.message || `${field} is invalid`;
            }
        }
    }

    return errors;
}

/**
 * Throws a VALIDATION_ERROR carrying the field messages when `data` fails `schema`.
 */
export function assertValid(data: Record<string, unknown>, schema: ValidationSchema, context: string): void {
    const errors = validateInput(data, schema);

    if (Object.keys(errors).length > 0) {
        logger.warn('Input validation failed', { context, errors });
        throw new ApplicationError(
            ErrorCodes.VALIDATION_ERROR,
            `Invalid ${context} input`,
            400,
            errors
        );
    }
}

function validateType(value: unknown, type: FieldType): boolean {
    switch (type) {
        case 'string':
            return typeof value === 'string';
        case 'object':
            return typeof value === 'object' && !Array.isArray(value) && value !== null;
        case 'buffer':
            return Buffer.isBuffer(value);
    }
}
