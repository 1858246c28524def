import bcrypt from 'bcryptjs';
import jwt, { type JwtPayload } from 'jsonwebtoken';
import { z } from 'zod';
import { AppDataSource } from '../db/data-source';
import { User } from '../db/entities/user.entity';
import { IRepository } from '../db/interfaces';
import { isUniqueViolation } from '../db/errors';
import { logger, ILogger } from '../config/logger';
import { getSettings } from '../config/settings';
import { ApiException } from '../utils/api-response';
import type { AuthenticatedUser, PublicUser, TokenResponse } from '../types/document';

export const PASSWORD_SALT_ROUNDS = 10;

export interface AuthConfig {
    secret: string;
    algorithm: 'HS256' | 'HS384' | 'HS512';
    expireMinutes: number;
    adminEmails: string[];
}

export interface IPasswordHasher {
    hash(password: string, rounds: number): Promise<string>;
    compare(password: string, hash: string): Promise<boolean>;
}

export interface RegisterInput {
    email: string;
    password: string;
    full_name?: string | null;
}

export interface UserUpdateInput {
    is_active?: boolean;
    is_admin?: boolean;
}

const tokenPayloadSchema = z.object({
    sub: z.string().regex(/^\d+$/),
    email: z.string()
});

export function toPublicUser(user: User): PublicUser {
    return {
        id: user.id,
        email: user.email,
        full_name: user.full_name,
        is_active: user.is_active,
        is_admin: user.is_admin,
        created_at: user.created_at
    };
}

function credentialsError(): ApiException {
    return new ApiException(401, 'Could not validate credentials', undefined, {
        'WWW-Authenticate': 'Bearer'
    });
}

/**
 * Auth Service with Dependency Injection
 *
 * Registration, password login and JWT access tokens.
 */
export class AuthService {
    constructor(
        private userRepository: IRepository<User>,
        private config: AuthConfig,
        private hasher: IPasswordHasher,
        private logger: ILogger
    ) { }

    /**
     * Factory method for production use
     */
    static create(): AuthService {
        const settings = getSettings();
        return new AuthService(
            AppDataSource.getRepository(User),
            {
                secret: settings.JWT_SECRET_KEY,
                algorithm: settings.JWT_ALGORITHM,
                expireMinutes: settings.ACCESS_TOKEN_EXPIRE_MINUTES,
                adminEmails: settings.ADMIN_EMAILS
            },
            bcrypt,
            logger
        );
    }

    async register(input: RegisterInput): Promise<PublicUser> {
        const email = input.email.trim().toLowerCase();

        const existing = await this.userRepository.findOne({ where: { email } });
        if (existing) {
            throw new ApiException(409, 'Email already registered');
        }

        const user = this.userRepository.create({
            email,
            hashed_password: await this.hasher.hash(input.password, PASSWORD_SALT_ROUNDS),
            full_name: input.full_name ?? null,
            is_active: true,
            is_admin: this.config.adminEmails.includes(email)
        });

        let saved: User;
        try {
            saved = await this.userRepository.save(user);
        } catch (error) {
            // two registrations raced past the lookup above
            if (isUniqueViolation(error)) {
                throw new ApiException(409, 'Email already registered');
            }
            throw error;
        }

        this.logger.info({ userId: saved.id, isAdmin: saved.is_admin }, 'User registered');
        return toPublicUser(saved);
    }

    async login(username: string, password: string): Promise<TokenResponse> {
        const email = username.trim().toLowerCase();
        const user = await this.userRepository.findOne({ where: { email } });

        if (!user || !(await this.hasher.compare(password, user.hashed_password))) {
            this.logger.warn({ email }, 'Failed login attempt');
            throw new ApiException(401, 'Incorrect email or password', undefined, {
                'WWW-Authenticate': 'Bearer'
            });
        }

        if (!user.is_active) {
            throw new ApiException(403, 'Inactive user');
        }

        this.logger.info({ userId: user.id }, 'User logged in');

        return {
            access_token: this.issueToken(user),
            token_type: 'bearer',
            user: toPublicUser(user)
        };
    }

    issueToken(user: Pick<User, 'id' | 'email'>): string {
        return jwt.sign(
            { email: user.email },
            this.config.secret,
            {
                algorithm: this.config.algorithm,
                subject: String(user.id),
                expiresIn: this.config.expireMinutes * 60
            }
        );
    }

    /**
     * Resolve a bearer token to the active user it was issued for
     */
    async authenticate(token: string): Promise<User> {
        let decoded: string | JwtPayload;
        try {
            decoded = jwt.verify(token, this.config.secret, { algorithms: [this.config.algorithm] });
        } catch (error) {
            this.logger.debug({ error: error instanceof Error ? error.message : String(error) }, 'Token rejected');
            throw credentialsError();
        }

        const payload = tokenPayloadSchema.safeParse(decoded);
        if (!payload.success) {
            throw credentialsError();
        }

        const user = await this.userRepository.findOne({ where: { id: Number(payload.data.sub) } });
        if (!user) {
            throw credentialsError();
        }
        if (!user.is_active) {
            throw new ApiException(403, 'Inactive user');
        }

        return user;
    }

    async getUser(id: number): Promise<PublicUser> {
        const user = await this.userRepository.findOne({ where: { id } });
        if (!user) {
            throw new ApiException(404, 'User not found');
        }
        return toPublicUser(user);
    }

    async listUsers(): Promise<PublicUser[]> {
        const users = await this.userRepository.find({ order: { created_at: 'ASC' } });
        return users.map(toPublicUser);
    }

    async updateUser(actor: AuthenticatedUser, id: number, changes: UserUpdateInput): Promise<PublicUser> {
        const user = await this.userRepository.findOne({ where: { id } });
        if (!user) {
            throw new ApiException(404, 'User not found');
        }

        if (actor.id === id && (changes.is_admin === false || changes.is_active === false)) {
            throw new ApiException(400, 'Administrators cannot demote or deactivate themselves');
        }

        if (changes.is_active !== undefined) {
            user.is_active = changes.is_active;
        }
        if (changes.is_admin !== undefined) {
            user.is_admin = changes.is_admin;
        }

        const saved = await this.userRepository.save(user);

        this.logger.info({
            actorId: actor.id,
            userId: saved.id,
            isActive: saved.is_active,
            isAdmin: saved.is_admin
        }, 'User updated');

        return toPublicUser(saved);
    }
}

// Singleton instance
let authService: AuthService | null = null;

export function getAuthService(): AuthService {
    if (!authService) {
        authService = AuthService.create();
    }
    return authService;
}
