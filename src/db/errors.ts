import { QueryFailedError } from "typeorm";

// Error codes we might receive from PostgreSQL
export const PG_ERROR_CODES = {
    UNIQUE_VIOLATION: '23505',
    FOREIGN_KEY_VIOLATION: '23503',
    NOT_NULL_VIOLATION: '23502',
} as const;

function driverCode(error: QueryFailedError): string | undefined {
    const driverError: unknown = error.driverError;
    if (typeof driverError === 'object' && driverError !== null && 'code' in driverError) {
        const { code } = driverError;
        return typeof code === 'string' ? code : undefined;
    }
    return undefined;
}

export function isUniqueViolation(error: unknown): boolean {
    return error instanceof QueryFailedError && driverCode(error) === PG_ERROR_CODES.UNIQUE_VIOLATION;
}

/**
 * Name of the violated constraint, when the driver reports one.
 */
export function violatedConstraint(error: unknown): string | undefined {
    if (!(error instanceof QueryFailedError)) {
        return undefined;
    }
    const driverError: unknown = error.driverError;
    if (typeof driverError === 'object' && driverError !== null && 'constraint' in driverError) {
        const { constraint } = driverError;
        return typeof constraint === 'string' ? constraint : undefined;
    }
    return undefined;
}
