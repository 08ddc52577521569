// src/core/common/errors.ts

/**
 * Base class for custom application errors.
 * Allows for operational errors (expected, like validation) vs programmer errors.
 */
export class AppError extends Error {
    public readonly statusCode: number;
    public readonly isOperational: boolean;

    constructor(
        name: string,
        message: string,
        statusCode: number = 500, // Default to Internal Server Error
        isOperational: boolean = true // Assume operational unless specified
        ) {
        super(message);
        this.name = name;
        this.statusCode = statusCode;
        this.isOperational = isOperational;

        // Maintain proper stack trace (only available on V8)
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, this.constructor);
        }

        // Set the prototype explicitly for extending built-in classes
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * Error for issues during configuration loading or validation.
 */
export class ConfigurationError extends AppError {
    constructor(message: string) {
        // Configuration errors are typically not operational; they prevent startup.
        super('ConfigurationError', message, 500, false);
    }
}

/**
 * Error for malformed requests (missing uploads, bad parameters).
 * Not used for per-record rule failures, which are regular outcomes.
 */
export class ValidationError extends AppError {
    constructor(message: string = 'Request validation failed') {
        super('ValidationError', message, 400, true); // 400 Bad Request
    }
}

/**
 * Error specifically for failures during file parsing.
 */
export class FileParsingError extends AppError {
    constructor(message: string, originalError?: Error) {
        const fullMessage = originalError
            ? `${message}: ${originalError.message}`
            : message;
        super('FileParsingError', fullMessage, 400, true); // 400 Bad Request often suitable
        if (originalError) {
            this.stack = originalError.stack; // Preserve original stack if available
        }
    }
}

/**
 * The batch lacks one or more required columns. Raised before any record is
 * classified; a run that hits it produces no partial results.
 */
export class MissingColumnsError extends AppError {
    public readonly missingColumns: readonly string[];

    constructor(missingColumns: readonly string[]) {
        super('MissingColumnsError', `Missing columns: ${missingColumns.join(', ')}`, 422, true);
        this.missingColumns = missingColumns;
    }
}
