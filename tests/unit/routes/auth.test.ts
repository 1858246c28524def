import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import express from 'express';
import { authRoutes } from '../../../src/routes/auth';
import { createErrorHandler } from '../../../src/middleware/error-handler';
import { startTestServer, TestServer } from '../../helpers/http';

const { authService } = vi.hoisted(() => ({
    authService: {
        register: vi.fn(),
        login: vi.fn(),
        authenticate: vi.fn(),
        getUser: vi.fn(),
        listUsers: vi.fn(),
        updateUser: vi.fn()
    }
}));

vi.mock('../../../src/services/auth.service', () => ({
    getAuthService: () => authService
}));

const AUTH = { Authorization: 'Bearer test-token' };

const TOKEN_BODY = {
    access_token: 'test-token',
    token_type: 'bearer',
    user: { id: 1, email: 'owner@example.com', full_name: 'Document Owner', is_active: true, is_admin: false }
};

describe('auth routes', () => {
    let server: TestServer;

    beforeEach(async () => {
        vi.clearAllMocks();
        authService.authenticate.mockResolvedValue(globalThis.testUtils.makeUser());
        authService.login.mockResolvedValue(TOKEN_BODY);

        const app = express();
        app.use(express.json());
        app.use(express.urlencoded({ extended: true }));
        app.use('/', authRoutes);
        app.use(createErrorHandler(globalThis.testUtils.createMockLogger()));

        server = await startTestServer(app);
    });

    afterEach(async () => {
        await server.close();
    });

    describe('POST /token', () => {
        it('should accept a multipart login form and return the bare token body', async () => {
            const form = new FormData();
            form.append('username', 'owner@example.com');
            form.append('password', 'correct-password');

            const response = await fetch(`${server.url}/token`, { method: 'POST', body: form });

            expect(response.status).toBe(200);
            expect(await response.json()).toEqual(TOKEN_BODY);
            expect(authService.login).toHaveBeenCalledWith('owner@example.com', 'correct-password');
        });

        it('should accept a urlencoded password grant', async () => {
            const response = await fetch(`${server.url}/token`, {
                method: 'POST',
                body: new URLSearchParams({
                    grant_type: 'password',
                    username: 'owner@example.com',
                    password: 'correct-password'
                })
            });

            expect(response.status).toBe(200);
            expect(await response.json()).toEqual(TOKEN_BODY);
            expect(authService.login).toHaveBeenCalledWith('owner@example.com', 'correct-password');
        });

        it('should accept a JSON body', async () => {
            const response = await fetch(`${server.url}/token`, {
                method: 'POST',
                headers: { 'Content-Type': 'application/json' },
                body: JSON.stringify({ username: 'owner@example.com', password: 'correct-password' })
            });

            expect(response.status).toBe(200);
            expect(await response.json()).toEqual(TOKEN_BODY);
        });

        it('should reject a login without a password', async () => {
            const response = await fetch(`${server.url}/token`, {
                method: 'POST',
                body: new URLSearchParams({ username: 'owner@example.com' })
            });

            expect(response.status).toBe(400);
            expect(await response.json()).toMatchObject({ success: false, message: 'Validation failed' });
            expect(authService.login).not.toHaveBeenCalled();
        });

        it('should reject a grant type other than password', async () => {
            const response = await fetch(`${server.url}/token`, {
                method: 'POST',
                body: new URLSearchParams({
                    grant_type: 'client_credentials',
                    username: 'owner@example.com',
                    password: 'correct-password'
                })
            });

            expect(response.status).toBe(400);
            expect(authService.login).not.toHaveBeenCalled();
        });
    });

    describe('POST /auth/register', () => {
        it('should register a user and answer 201', async () => {
            authService.register.mockResolvedValue(TOKEN_BODY.user);

            const response = await fetch(`${server.url}/auth/register`, {
                method: 'POST',
                headers: { 'Content-Type': 'application/json' },
                body: JSON.stringify({ email: ' owner@example.com ', password: 'correct-password' })
            });

            expect(response.status).toBe(201);
            expect(await response.json()).toEqual({
                success: true,
                message: 'User registered successfully',
                data: TOKEN_BODY.user
            });
            expect(authService.register).toHaveBeenCalledWith({
                email: 'owner@example.com',
                password: 'correct-password'
            });
        });

        it('should reject a short password', async () => {
            const response = await fetch(`${server.url}/auth/register`, {
                method: 'POST',
                headers: { 'Content-Type': 'application/json' },
                body: JSON.stringify({ email: 'owner@example.com', password: 'short' })
            });

            expect(response.status).toBe(400);
            expect(authService.register).not.toHaveBeenCalled();
        });
    });

    describe('user routes', () => {
        it('should return the caller on GET /users/me', async () => {
            authService.getUser.mockResolvedValue(TOKEN_BODY.user);

            const response = await fetch(`${server.url}/users/me`, { headers: AUTH });

            expect(response.status).toBe(200);
            expect(authService.getUser).toHaveBeenCalledWith(1);
        });

        it('should require a token on GET /users/me', async () => {
            const response = await fetch(`${server.url}/users/me`);

            expect(response.status).toBe(401);
            expect(response.headers.get('www-authenticate')).toBe('Bearer');
        });

        it('should keep user administration to admins', async () => {
            const response = await fetch(`${server.url}/users/1`, {
                method: 'PATCH',
                headers: { ...AUTH, 'Content-Type': 'application/json' },
                body: JSON.stringify({ is_active: false })
            });

            expect(response.status).toBe(403);
            expect(await response.json()).toEqual({ success: false, message: 'Not authorized' });
            expect(authService.updateUser).not.toHaveBeenCalled();
        });

        it('should pass an admin update through to the service', async () => {
            authService.authenticate.mockResolvedValue(
                globalThis.testUtils.makeUser({ id: 2, email: 'admin@example.com', is_admin: true })
            );
            authService.updateUser.mockResolvedValue({ ...TOKEN_BODY.user, is_active: false });

            const response = await fetch(`${server.url}/users/1`, {
                method: 'PATCH',
                headers: { ...AUTH, 'Content-Type': 'application/json' },
                body: JSON.stringify({ is_active: false })
            });

            expect(response.status).toBe(200);
            expect(authService.updateUser).toHaveBeenCalledWith(
                { id: 2, email: 'admin@example.com', is_admin: true },
                1,
                { is_active: false }
            );
        });
    });
});
