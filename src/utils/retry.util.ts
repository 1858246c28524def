import { logger } from '../config/logger';

export interface RetryOptions {
    maxAttempts?: number;
    baseDelay?: number;
    maxDelay?: number;
    backoffMultiplier?: number;
    operationName?: string;
}

export interface IRetryUtil {
    executeWithRetry<T>(operation: () => Promise<T>, options?: RetryOptions): Promise<T>;
}

const RETRYABLE_NETWORK_CODES = new Set([
    'ECONNRESET',
    'ENOTFOUND',
    'ECONNREFUSED',
    'ETIMEDOUT',
    'EPIPE',
    'EAI_AGAIN'
]);

// S3 error codes that signal a transient server-side condition
const RETRYABLE_S3_CODES = new Set([
    'InternalError',
    'SlowDown',
    'ServiceUnavailable',
    'RequestTimeout',
    'RequestTimeTooSkewed'
]);

function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

function errorCode(error: unknown): string | undefined {
    if (typeof error === 'object' && error !== null && 'code' in error) {
        const { code } = error;
        return typeof code === 'string' ? code : undefined;
    }
    return undefined;
}

function errorStatus(error: unknown): number | undefined {
    if (typeof error === 'object' && error !== null) {
        const status = 'statusCode' in error ? error.statusCode : 'status' in error ? error.status : undefined;
        return typeof status === 'number' ? status : undefined;
    }
    return undefined;
}

/**
 * Retry Utility
 *
 * Runs an async operation with exponential backoff. Used around
 * object-store calls, which fail transiently under load.
 */
export class RetryUtil {
    /**
     * Execute function with retry logic
     */
    static async executeWithRetry<T>(
        operation: () => Promise<T>,
        options: RetryOptions = {}
    ): Promise<T> {
        const {
            maxAttempts = 3,
            baseDelay = 1000,
            maxDelay = 10000,
            backoffMultiplier = 2,
            operationName = 'operation'
        } = options;

        let lastError: unknown = null;

        for (let attempt = 1; attempt <= maxAttempts; attempt++) {
            try {
                logger.debug({
                    operation: operationName,
                    attempt,
                    maxAttempts
                }, `Executing ${operationName} (attempt ${attempt}/${maxAttempts})`);

                const result = await operation();

                if (attempt > 1) {
                    logger.info({
                        operation: operationName,
                        attempt,
                        maxAttempts
                    }, `${operationName} succeeded on attempt ${attempt}`);
                }

                return result;

            } catch (error) {
                lastError = error;
                const retryable = this.isRetryableError(error);

                logger.warn({
                    operation: operationName,
                    attempt,
                    maxAttempts,
                    error: errorMessage(error),
                    isRetryable: retryable
                }, `${operationName} failed on attempt ${attempt}`);

                if (attempt === maxAttempts) {
                    break;
                }

                if (!retryable) {
                    logger.error({
                        operation: operationName,
                        error: errorMessage(error)
                    }, `${operationName} failed with non-retryable error`);
                    break;
                }

                const delay = Math.min(
                    baseDelay * Math.pow(backoffMultiplier, attempt - 1),
                    maxDelay
                );

                logger.info({
                    operation: operationName,
                    attempt,
                    delay
                }, `Retrying ${operationName} in ${delay}ms`);

                await this.sleep(delay);
            }
        }

        logger.error({
            operation: operationName,
            maxAttempts,
            error: lastError === null ? undefined : errorMessage(lastError)
        }, `${operationName} failed after ${maxAttempts} attempts`);

        throw lastError ?? new Error(`${operationName} failed after ${maxAttempts} attempts`);
    }

    /**
     * Check if error is retryable
     */
    static isRetryableError(error: unknown): boolean {
        const code = errorCode(error);
        if (code && (RETRYABLE_NETWORK_CODES.has(code) || RETRYABLE_S3_CODES.has(code))) {
            return true;
        }

        const status = errorStatus(error);
        if (status === 429 || status === 500 || status === 502 || status === 503 || status === 504) {
            return true;
        }

        const message = errorMessage(error).toLowerCase();
        return message.includes('timeout')
            || message.includes('socket hang up')
            || message.includes('connection')
            || message.includes('network');
    }

    private static sleep(ms: number): Promise<void> {
        return new Promise(resolve => setTimeout(resolve, ms));
    }
}
