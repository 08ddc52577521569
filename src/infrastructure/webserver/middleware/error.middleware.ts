// src/infrastructure/webserver/middleware/error.middleware.ts
import { NextFunction, Request, Response } from 'express';
import { container } from 'tsyringe';
import { Logger } from 'winston';
import config from '../../../config';
import { AppError, MissingColumnsError } from '../../../core/common/errors';
import { LOGGER_TOKEN } from '../../logger';

interface ErrorResponse {
    message: string;
    missingColumns?: readonly string[];
    error?: string;
    stack?: string;
}

/**
 * Express error handling middleware function.
 * Must be registered AFTER all other routes and middleware.
 */
export const errorHandler = (
    err: Error,
    req: Request,
    res: Response,
    next: NextFunction // required for Express to recognize this as an error handler
): void => {
    const logger = container.resolve<Logger>(LOGGER_TOKEN);

    logger.error(`[ErrorHandler] ${err.name}: ${err.message}`, {
        error: {
            name: err.name,
            message: err.message,
            stack: err.stack,
            ...(err instanceof AppError && {
                statusCode: err.statusCode,
                isOperational: err.isOperational,
            }),
        },
        request: {
            method: req.method,
            url: req.originalUrl,
            ip: req.ip,
        },
    });

    // Determine status code and response message
    let statusCode = 500;
    let message = 'An unexpected internal server error occurred.';

    if (err instanceof AppError && err.isOperational) {
        statusCode = err.statusCode;
        message = err.message;
    }
    else if (err.name === 'MulterError') {
        statusCode = 400; // Bad Request for upload errors
        message = `File upload error: ${err.message}`;
    }

    const responseJson: ErrorResponse = { message };

    if (err instanceof MissingColumnsError) {
        responseJson.missingColumns = err.missingColumns;
    }

    // Include error details only in non-production environments for debugging
    if (config.nodeEnv !== 'production') {
        responseJson.error = err.message;
        responseJson.stack = err.stack;
    }

    if (res.headersSent) {
       logger.warn('[ErrorHandler] Headers already sent, cannot send error response.');
       return;
    }

    res.status(statusCode).json(responseJson);
};
