import { Request, Response, NextFunction } from 'express';
import { AppError, ValidationError } from '../utils/errors';
import { createLogger } from '../utils/logger';

const logger = createLogger('http');

/**
 * Errors raised by express.json carry an HTTP status and a `type` such as
 * `entity.parse.failed` or `entity.too.large`.
 */
const fromBodyParser = (error: Error): AppError | null => {
    const type = 'type' in error && typeof error.type === 'string' ? error.type : undefined;
    if (type === 'entity.parse.failed') {
        return new ValidationError('Malformed JSON body', [{ path: 'body', message: error.message }]);
    }

    const status =
        'status' in error && typeof error.status === 'number' ? error.status
        : 'statusCode' in error && typeof error.statusCode === 'number' ? error.statusCode
        : undefined;
    if (type && status !== undefined && status >= 400 && status < 500) {
        return new AppError(status, status === 413 ? 'Request body too large' : error.message);
    }
    return null;
};

export const errorHandler = (
    thrown: Error,
    req: Request,
    res: Response,
    // Express recognises error middleware by its four parameters
    _next: NextFunction
) => {
    const error = fromBodyParser(thrown) ?? thrown;
    const isAppError = error instanceof AppError;
    const statusCode = isAppError ? error.statusCode : 500;
    const isOperational = isAppError && error.isOperational;

    const meta = {
        errorType: error.name,
        errorMessage: error.message,
        attemptedAction: `${req.method} ${req.path}`,
        statusCode,
    };
    if (statusCode >= 500) {
        logger.error('Request failed', { ...meta, stackTrace: error.stack });
    } else {
        logger.warn('Request rejected', meta);
    }

    if (error instanceof ValidationError) {
        res.status(statusCode).json({ error: error.message, details: error.details });
        return;
    }

    res.status(statusCode).json({
        error: isOperational ? error.message : 'Internal server error',
        ...(isOperational ? {} : { message: error.message })
    });
};

export const notFoundHandler = (req: Request, res: Response) => {
    res.status(404).json({ error: `Route not found: ${req.method} ${req.path}` });
};

/**
 * Wraps an async route handler so a rejection reaches errorHandler.
 */
export const asyncHandler = (
    fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
) => {
    return (req: Request, res: Response, next: NextFunction) => {
        fn(req, res, next).catch(next);
    };
};
