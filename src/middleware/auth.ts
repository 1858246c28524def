import type { Request, Response, NextFunction, RequestHandler } from "express";
import { getAuthService } from "../services/auth.service";
import { ApiException } from "../utils/api-response";
import type { AuthenticatedUser } from "../types/document";

export interface ITokenAuthenticator {
    authenticate(token: string): Promise<AuthenticatedUser>;
}

export function extractBearerToken(header: string | undefined): string | null {
    if (!header) {
        return null;
    }
    const [scheme, token] = header.trim().split(/\s+/, 2);
    if (!scheme || scheme.toLowerCase() !== 'bearer' || !token) {
        return null;
    }
    return token;
}

/**
 * Build a middleware that resolves the bearer token to `req.user`.
 * The authenticator is looked up per request so the service is only
 * constructed once the app is actually serving.
 */
export function createAuthMiddleware(getAuthenticator: () => ITokenAuthenticator): RequestHandler {
    return (req: Request, res: Response, next: NextFunction) => {
        const token = extractBearerToken(req.headers.authorization);
        if (!token) {
            next(new ApiException(401, 'Not authenticated', undefined, { 'WWW-Authenticate': 'Bearer' }));
            return;
        }

        getAuthenticator()
            .authenticate(token)
            .then(user => {
                req.user = { id: user.id, email: user.email, is_admin: user.is_admin };
                next();
            })
            .catch(next);
    };
}

export const requireAuth = createAuthMiddleware(getAuthService);

export function requireAdmin(req: Request, res: Response, next: NextFunction): void {
    if (!req.user?.is_admin) {
        next(new ApiException(403, 'Not authorized'));
        return;
    }
    next();
}

/**
 * The authenticated caller; only valid behind `requireAuth`.
 */
export function currentUser(req: Request): AuthenticatedUser {
    if (!req.user) {
        throw new ApiException(401, 'Not authenticated', undefined, { 'WWW-Authenticate': 'Bearer' });
    }
    return req.user;
}
