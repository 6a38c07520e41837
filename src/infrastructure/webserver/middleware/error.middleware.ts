// src/infrastructure/webserver/middleware/error.middleware.ts
import { NextFunction, Request, Response } from 'express';
import { container } from 'tsyringe';
import { Logger } from 'winston';
import config from '../../../config';
import { AppError } from '../../../core/common/errors';
import { LOGGER_TOKEN } from '../../logger';

/**
 * Express error handling middleware function.
 * Must be registered AFTER all other routes and middleware.
 */
export const errorHandler = (
    err: Error,
    req: Request,
    res: Response,
    next: NextFunction // required for Express to recognize an error handler
): void => {
    const logger = container.resolve<Logger>(LOGGER_TOKEN);
    const isOperational = err instanceof AppError && err.isOperational;

    const logDetails = {
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
    };
    if (isOperational && err.statusCode < 500) {
        logger.warn(`[ErrorHandler] ${err.name}: ${err.message}`, logDetails);
    } else {
        logger.error(`[ErrorHandler] ${err.name}: ${err.message}`, logDetails);
    }

    // Operational AppErrors carry a safe message; anything else is hidden
    const statusCode = isOperational ? err.statusCode : 500;
    const responseJson: { error: string; stack?: string } = {
        error: isOperational ? err.message : 'An unexpected internal server error occurred.',
    };

    if (config.nodeEnv !== 'production') {
        responseJson.stack = err.stack;
    }

    if (res.headersSent) {
        logger.warn('[ErrorHandler] Headers already sent, cannot send error response.');
        return;
    }

    res.status(statusCode).json(responseJson);
};
