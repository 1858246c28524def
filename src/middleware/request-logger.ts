import type { Request, Response, NextFunction, RequestHandler } from "express";
import { logger, ILogger } from "../config/logger";

export function createRequestLogger(log: ILogger = logger): RequestHandler {
    return (req: Request, res: Response, next: NextFunction) => {
        const start = Date.now();
        res.on('finish', () => {
            log.info({
                method: req.method,
                path: req.originalUrl,
                status: res.statusCode,
                durationMs: Date.now() - start
            }, 'Request completed');
        });
        next();
    };
}
