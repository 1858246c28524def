import pino from 'pino';

/**
 * Logger Interface
 *
 * Contract for logging across services. Matches pino's `(obj, msg)`
 * call shape so the real logger can be injected directly.
 */
export interface ILogger {
    info(obj: object, msg?: string): void;
    error(obj: object, msg?: string): void;
    warn(obj: object, msg?: string): void;
    debug(obj: object, msg?: string): void;
}

const env = process.env.NODE_ENV;
const pretty = env !== 'production' && env !== 'test';

/**
 * Logger Configuration
 *
 * Structured JSON logger for the document service. Pretty-printed
 * while developing, plain JSON lines in production.
 */
export const logger = pino({
    level: process.env.LOG_LEVEL || 'info',
    transport: pretty
        ? {
            target: 'pino-pretty',
            options: {
                colorize: true,
                translateTime: 'SYS:standard',
                ignore: 'pid,hostname',
                singleLine: false
            }
        }
        : undefined,
    serializers: {
        req: pino.stdSerializers.req,
        res: pino.stdSerializers.res,
        err: pino.stdSerializers.err
    }
});
