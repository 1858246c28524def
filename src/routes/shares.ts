import { Router, Request, Response, NextFunction } from "express";
import { z } from "zod";
import { getShareService } from "../services/share.service";
import { requireAuth, currentUser } from "../middleware/auth";
import { successResponse } from "../utils/api-response";
import { SHARE_TYPES } from "../types/document";
import { parseIdParam } from "./params";

const router = Router();

const shareCreateSchema = z.object({
    share_type: z.enum(SHARE_TYPES),
    share_code: z.string().nullish()
});

const shareUpdateSchema = shareCreateSchema.extend({
    expire_days: z.number().int().min(1).max(365).nullish()
});

const shareAccessSchema = z.object({
    share_code: z.string().optional()
});

/**
 * GET /documents/shared
 *
 * The caller's active share links.
 */
router.get('/shared', requireAuth, async (req: Request, res: Response, next: NextFunction) => {
    try {
        const shares = await getShareService().listShared(currentUser(req));
        res.json(successResponse(shares, 'Shared documents retrieved successfully'));
    } catch (error) {
        next(error);
    }
});

/**
 * GET /documents/shared/:shareUuid/check
 *
 * Public. Tells the share page whether to ask for a code.
 */
router.get('/shared/:shareUuid/check', async (req: Request, res: Response, next: NextFunction) => {
    try {
        const check = await getShareService().checkShare(req.params.shareUuid);
        res.json(successResponse(check, 'Share type checked successfully'));
    } catch (error) {
        next(error);
    }
});

/**
 * GET /documents/shared/:shareUuid?share_code=1234
 *
 * Public. Returns a presigned URL for the shared file.
 */
router.get('/shared/:shareUuid', async (req: Request, res: Response, next: NextFunction) => {
    try {
        const { share_code } = shareAccessSchema.parse(req.query);
        const access = await getShareService().accessShare(req.params.shareUuid, share_code);
        res.json(successResponse(access, 'Document accessed successfully'));
    } catch (error) {
        next(error);
    }
});

router.get('/share/:shareUuid', requireAuth, async (req: Request, res: Response, next: NextFunction) => {
    try {
        const share = await getShareService().getShareByUuid(currentUser(req), req.params.shareUuid);
        res.json(successResponse(share, 'Share info retrieved successfully'));
    } catch (error) {
        next(error);
    }
});

/**
 * POST /documents/:id/share
 *
 * Body: { share_type: 'public' | 'with_password', share_code? }
 */
router.post('/:id/share', requireAuth, async (req: Request, res: Response, next: NextFunction) => {
    try {
        const input = shareCreateSchema.parse(req.body);
        const share = await getShareService().share(currentUser(req), parseIdParam(req.params.id), input);
        res.json(successResponse(share, 'Document shared successfully'));
    } catch (error) {
        next(error);
    }
});

/**
 * PUT /documents/:id/share
 *
 * Body: { share_type, share_code?, expire_days? }; no expire_days
 * makes the link permanent.
 */
router.put('/:id/share', requireAuth, async (req: Request, res: Response, next: NextFunction) => {
    try {
        const input = shareUpdateSchema.parse(req.body);
        const share = await getShareService().updateShare(currentUser(req), parseIdParam(req.params.id), input);
        res.json(successResponse(share, 'Share code updated successfully'));
    } catch (error) {
        next(error);
    }
});

router.get('/:id/share', requireAuth, async (req: Request, res: Response, next: NextFunction) => {
    try {
        const share = await getShareService().getShareInfo(currentUser(req), parseIdParam(req.params.id));
        res.json(successResponse(share, 'Share info retrieved successfully'));
    } catch (error) {
        next(error);
    }
});

router.delete('/:id/share', requireAuth, async (req: Request, res: Response, next: NextFunction) => {
    try {
        const share = await getShareService().cancelShare(currentUser(req), parseIdParam(req.params.id));
        res.json(successResponse(share, 'Share cancelled successfully'));
    } catch (error) {
        next(error);
    }
});

export { router as shareRoutes };
