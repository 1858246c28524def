import { Router, Request, Response, NextFunction } from "express";
import multer from "multer";
import { z } from "zod";
import { getAuthService } from "../services/auth.service";
import { requireAuth, requireAdmin, currentUser } from "../middleware/auth";
import { successResponse } from "../utils/api-response";
import { parseIdParam } from "./params";

const router = Router();

// The login form is posted as multipart FormData
const formFields = multer().none();

const registerSchema = z.object({
    email: z.string().trim().email("A valid email is required"),
    password: z.string().min(8, "Password must be at least 8 characters").max(128),
    full_name: z.string().trim().min(1).max(100).nullish()
});

const tokenSchema = z.object({
    username: z.string().min(1, "Username is required"),
    password: z.string().min(1, "Password is required"),
    grant_type: z.literal("password").optional()
});

const userUpdateSchema = z.object({
    is_active: z.boolean().optional(),
    is_admin: z.boolean().optional()
}).refine(
    changes => changes.is_active !== undefined || changes.is_admin !== undefined,
    { message: "Nothing to update" }
);

/**
 * POST /auth/register
 *
 * Body: { email, password, full_name? }
 */
router.post('/auth/register', async (req: Request, res: Response, next: NextFunction) => {
    try {
        const input = registerSchema.parse(req.body);
        const user = await getAuthService().register(input);
        res.status(201).json(successResponse(user, 'User registered successfully'));
    } catch (error) {
        next(error);
    }
});

/**
 * POST /token
 *
 * OAuth2 password grant. Form fields: username (email), password.
 * Returns the bare token response the login form expects.
 */
router.post('/token', formFields, async (req: Request, res: Response, next: NextFunction) => {
    try {
        const { username, password } = tokenSchema.parse(req.body);
        const token = await getAuthService().login(username, password);
        res.json(token);
    } catch (error) {
        next(error);
    }
});

router.get('/users/me', requireAuth, async (req: Request, res: Response, next: NextFunction) => {
    try {
        const user = await getAuthService().getUser(currentUser(req).id);
        res.json(successResponse(user, 'User retrieved successfully'));
    } catch (error) {
        next(error);
    }
});

router.get('/users', requireAuth, requireAdmin, async (req: Request, res: Response, next: NextFunction) => {
    try {
        const users = await getAuthService().listUsers();
        res.json(successResponse(users, 'Users retrieved successfully'));
    } catch (error) {
        next(error);
    }
});

/**
 * PATCH /users/:id
 *
 * Admin only. Body: { is_active?, is_admin? }
 */
router.patch('/users/:id', requireAuth, requireAdmin, async (req: Request, res: Response, next: NextFunction) => {
    try {
        const userId = parseIdParam(req.params.id, 'user');
        const changes = userUpdateSchema.parse(req.body);
        const user = await getAuthService().updateUser(currentUser(req), userId, changes);
        res.json(successResponse(user, 'User updated successfully'));
    } catch (error) {
        next(error);
    }
});

export { router as authRoutes };
