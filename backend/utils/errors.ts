// Error code constants
export const ErrorCodes = {
    NOT_FOUND: 'NOT_FOUND',
    VALIDATION_ERROR: 'VALIDATION_ERROR',
    SERVER_ERROR: 'SERVER_ERROR',
    RATE_LIMIT_EXCEEDED: 'RATE_LIMIT_EXCEEDED',
    CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
    RESUME_PARSING_FAILED: 'RESUME_PARSING_FAILED',
    FILE_TOO_LARGE: 'FILE_TOO_LARGE',
    UNSUPPORTED_FILE_TYPE: 'UNSUPPORTED_FILE_TYPE'
} as const;

export type ErrorCode = typeof ErrorCodes[keyof typeof ErrorCodes];

export interface AppError extends Error {
    statusCode?: number;
    code?: string;
    details?: unknown;
    isOperational?: boolean;
}

/**
 * Operational error raised by the engine. `statusCode` is a hint for the
 * enclosing service; the engine itself never builds responses.
 */
export class ApplicationError extends Error implements AppError {
    statusCode: number;
    code: ErrorCode;
    details?: unknown;
    isOperational: boolean;

    constructor(code: ErrorCode, message: string, statusCode: number = 400, details?: unknown) {
        super(message);
        this.name = 'ApplicationError';
        this.statusCode = statusCode;
        this.code = code;
        this.details = details;
        this.isOperational = true;

        // Keep instanceof working for compiled subclasses
        Object.setPrototypeOf(this, ApplicationError.prototype);
    }
}

/**
 * Unsupported file type or unreadable document bytes. No partial document is
 * produced when this is thrown.
 */
export class ExtractionError extends ApplicationError {
    constructor(
        message: string,
        code: ErrorCode = ErrorCodes.RESUME_PARSING_FAILED,
        details?: unknown
    ) {
        super(code, message, code === ErrorCodes.UNSUPPORTED_FILE_TYPE ? 400 : 422, details);
        this.name = 'ExtractionError';
        Object.setPrototypeOf(this, ExtractionError.prototype);
    }
}

/**
 * Process-level misconfiguration, e.g. the NLP model could not be loaded.
 */
export class ConfigurationError extends ApplicationError {
    constructor(message: string, details?: unknown) {
        super(ErrorCodes.CONFIGURATION_ERROR, message, 500, details);
        this.name = 'ConfigurationError';
        this.isOperational = false;
        Object.setPrototypeOf(this, ConfigurationError.prototype);
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
