import { ApiException } from "../utils/api-response";

/**
 * Parse a positive integer route parameter, 400 otherwise.
 */
export function parseIdParam(value: string | undefined, label: string = 'document'): number {
    const id = Number(value);
    if (!value || !Number.isInteger(id) || id <= 0) {
        throw new ApiException(400, `Invalid ${label} ID`);
    }
    return id;
}
