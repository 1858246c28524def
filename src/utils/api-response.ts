/**
 * Response envelope helpers.
 *
 * Every JSON response is either `{ success: true, message, data }`
 * or `{ success: false, message, details? }`.
 */
export interface SuccessEnvelope<T> {
    success: true;
    message: string;
    data: T;
}

export interface ErrorEnvelope {
    success: false;
    message: string;
    details?: unknown;
}

export function successResponse<T>(data: T, message: string = 'Success'): SuccessEnvelope<T> {
    return { success: true, message, data };
}

export function errorResponse(message: string, details?: unknown): ErrorEnvelope {
    return details === undefined
        ? { success: false, message }
        : { success: false, message, details };
}

/**
 * Domain error carrying the HTTP status it should be rendered with.
 */
export class ApiException extends Error {
    constructor(
        public readonly statusCode: number,
        message: string,
        public readonly details?: unknown,
        public readonly headers: Record<string, string> = {}
    ) {
        super(message);
        this.name = 'ApiException';
    }
}
