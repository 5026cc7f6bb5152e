import { Request, Response, NextFunction } from 'express';
import { createErrorResponse } from '../utils/apiResponse';
import { ErrorCodes } from '../utils/errors';
import { logger } from '../utils/logger';
import { ValidationErrors, ValidationSchema, validateInput } from '../utils/validateInput';

function asRecord(value: unknown): Record<string, unknown> {
    return typeof value === 'object' && value !== null ? { ...value } : {};
}

/**
 * Request validation middleware over params, query and body.
 */
export function validateRequest(schema: {
    params?: ValidationSchema;
    query?: ValidationSchema;
    body?: ValidationSchema;
}) {
    return (req: Request, res: Response, next: NextFunction) => {
        const errors: ValidationErrors = {};

        if (schema.params) {
            Object.assign(errors, validateInput(asRecord(req.params), schema.params));
        }

        if (schema.query) {
            Object.assign(errors, validateInput(asRecord(req.query), schema.query));
        }

        if (schema.body) {
            Object.assign(errors, validateInput(asRecord(req.body), schema.body));
        }

        if (Object.keys(errors).length > 0) {
            logger.warn('Request validation failed', {
                method: req.method,
                path: req.path,
                errors
            });

            res.status(400).json(
                createErrorResponse(ErrorCodes.VALIDATION_ERROR, 'Request validation failed', errors)
            );
            return;
        }

        next();
    };
}
