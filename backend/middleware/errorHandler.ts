import { Request, Response, NextFunction, RequestHandler } from 'express';
import { MulterError } from 'multer';
import { config } from '../config/app';
import { createErrorResponse } from '../utils/apiResponse';
import { AppError, ApplicationError, ErrorCodes } from '../utils/errors';
import { logger } from '../utils/logger';

/**
 * Forwards rejections from async route handlers to the error middleware.
 */
export const asyncHandler =
    (fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>): RequestHandler =>
    (req, res, next) => {
        Promise.resolve(fn(req, res, next)).catch(next);
    };

export const notFoundHandler = (req: Request, res: Response, next: NextFunction): void => {
    next(new ApplicationError(ErrorCodes.NOT_FOUND, `Route not found: ${req.originalUrl}`, 404));
};

/**
 * Upload limit errors become FILE_TOO_LARGE; anything else without a status
 * is a server error.
 */
export function normalizeError(err: unknown): AppError {
    if (err instanceof MulterError) {
        return err.code === 'LIMIT_FILE_SIZE'
            ? new ApplicationError(
                  ErrorCodes.FILE_TOO_LARGE,
                  `File exceeds the ${config.upload.maxFileSize / (1024 * 1024)}MB limit`,
                  413
              )
            : new ApplicationError(ErrorCodes.VALIDATION_ERROR, err.message, 400, { field: err.field });
    }
    if (err instanceof Error) {
        return err;
    }
    return new Error(String(err));
}

export const errorHandler = (
    error: unknown,
    req: Request,
    res: Response,
    next: NextFunction // eslint-disable-line @typescript-eslint/no-unused-vars
): void => {
    const err = normalizeError(error);
    const statusCode = err.statusCode || 500;
    const errorCode = err.code || ErrorCodes.SERVER_ERROR;

    if (statusCode >= 500) {
        logger.error('Server error', {
            path: req.path,
            method: req.method,
            error: err.message,
            stack: err.stack
        });
    } else {
        logger.warn('Client error', {
            path: req.path,
            method: req.method,
            error: err.message,
            code: errorCode,
            details: err.details
        });
    }

    // Internal messages stay private outside development
    const message = statusCode >= 500 && !config.server.isDevelopment ? 'Internal server error' : err.message;

    res.status(statusCode).json(
        createErrorResponse(errorCode, message, config.server.isDevelopment ? err.details ?? err.stack : err.details)
    );
};

export const setupUncaughtExceptionHandling = (): void => {
    process.on('uncaughtException', (error: Error) => {
        logger.error('Uncaught exception', error);

        setTimeout(() => {
            process.exit(1);
        }, 1000);
    });

    process.on('unhandledRejection', (reason: unknown) => {
        logger.error('Unhandled promise rejection', reason instanceof Error ? reason : { reason: String(reason) });
        throw reason;
    });
};
