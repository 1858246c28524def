import type { Request, Response, NextFunction } from "express";
import multer from "multer";
import { ZodError } from "zod";
import { logger, ILogger } from "../config/logger";
import { ApiException, errorResponse } from "../utils/api-response";

function isBodyParseError(error: unknown): boolean {
    return typeof error === 'object'
        && error !== null
        && 'type' in error
        && error.type === 'entity.parse.failed';
}

/**
 * Renders every error that reaches Express as the error envelope.
 * Unknown errors are logged and hidden behind a generic 500.
 */
export function createErrorHandler(log: ILogger = logger) {
    return (error: unknown, req: Request, res: Response, next: NextFunction): void => {
        if (res.headersSent) {
            next(error);
            return;
        }

        if (error instanceof ApiException) {
            res.set(error.headers);
            res.status(error.statusCode).json(errorResponse(error.message, error.details));
            return;
        }

        if (error instanceof ZodError) {
            res.status(400).json(errorResponse('Validation failed', error.errors));
            return;
        }

        if (error instanceof multer.MulterError) {
            if (error.code === 'LIMIT_FILE_SIZE') {
                res.status(413).json(errorResponse('File too large'));
                return;
            }
            res.status(400).json(errorResponse(error.message, { field: error.field }));
            return;
        }

        if (isBodyParseError(error)) {
            res.status(400).json(errorResponse('Malformed request body'));
            return;
        }

        log.error({
            err: error,
            method: req.method,
            path: req.originalUrl
        }, 'Unhandled request error');

        res.status(500).json(errorResponse('Internal server error'));
    };
}

export function notFoundHandler(req: Request, res: Response): void {
    res.status(404).json(errorResponse(`Route ${req.method} ${req.path} not found`));
}
