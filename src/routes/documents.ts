import { Router, Request, Response, NextFunction } from "express";
import multer from "multer";
import { pipeline } from "stream/promises";
import { z } from "zod";
import { getDocumentService } from "../services/document.service";
import { requireAuth, currentUser } from "../middleware/auth";
import { getSettings } from "../config/settings";
import { logger } from "../config/logger";
import { ApiException, successResponse } from "../utils/api-response";
import { decodeUploadFilename } from "../utils/storage-path.util";
import { parseIdParam } from "./params";

const router = Router();

// Files are hashed and forwarded to object storage, so keep them in memory
const upload = multer({
    storage: multer.memoryStorage(),
    limits: {
        fileSize: getSettings().MAX_UPLOAD_BYTES,
        files: 1
    }
});

const visibilitySchema = z.object({
    is_public: z.boolean()
});

/**
 * POST /documents/upload
 *
 * Multipart upload, field name `file`.
 */
router.post('/upload', requireAuth, upload.single('file'), async (req: Request, res: Response, next: NextFunction) => {
    try {
        if (!req.file) {
            throw new ApiException(400, 'File is required');
        }

        const document = await getDocumentService().upload(currentUser(req), {
            originalname: decodeUploadFilename(req.file.originalname),
            mimetype: req.file.mimetype,
            buffer: req.file.buffer
        });

        res.json(successResponse(document, 'File uploaded successfully'));
    } catch (error) {
        next(error);
    }
});

/**
 * GET /documents/my-documents
 *
 * The caller's uploads, newest first.
 */
router.get('/my-documents', requireAuth, async (req: Request, res: Response, next: NextFunction) => {
    try {
        const documents = await getDocumentService().listMine(currentUser(req));
        res.json(successResponse(documents, 'Documents retrieved successfully'));
    } catch (error) {
        next(error);
    }
});

/**
 * GET /documents/preview/:id
 *
 * Short-lived presigned URL for viewing the file in the browser.
 */
router.get('/preview/:id', requireAuth, async (req: Request, res: Response, next: NextFunction) => {
    try {
        const preview = await getDocumentService().preview(currentUser(req), parseIdParam(req.params.id));
        res.json(successResponse(preview, 'Preview URL generated successfully'));
    } catch (error) {
        next(error);
    }
});

function isPrematureClose(error: unknown): boolean {
    return typeof error === 'object'
        && error !== null
        && 'code' in error
        && error.code === 'ERR_STREAM_PREMATURE_CLOSE';
}

/**
 * HEAD /documents/download/:id
 *
 * Download headers only; the object is not opened and not counted.
 */
router.head('/download/:id', requireAuth, async (req: Request, res: Response, next: NextFunction) => {
    try {
        const head = await getDocumentService().inspectDownload(
            currentUser(req),
            parseIdParam(req.params.id),
            req.headers.range
        );
        res.status(head.status).set(head.headers).end();
    } catch (error) {
        next(error);
    }
});

/**
 * GET /documents/download/:id
 *
 * Streams the file. Supports a single `Range: bytes=...` header for
 * resumable downloads.
 */
router.get('/download/:id', requireAuth, async (req: Request, res: Response, next: NextFunction) => {
    try {
        const documentId = parseIdParam(req.params.id);
        const result = await getDocumentService().download(currentUser(req), documentId, req.headers.range);

        res.status(result.status).set(result.headers);
        try {
            await pipeline(result.stream, res);
        } catch (error) {
            if (!isPrematureClose(error)) {
                throw error;
            }
            logger.debug({ documentId, userId: currentUser(req).id }, 'Download aborted by client');
        }
    } catch (error) {
        next(error);
    }
});

/**
 * PATCH /documents/:id
 *
 * Body: { is_public: boolean }
 */
router.patch('/:id', requireAuth, async (req: Request, res: Response, next: NextFunction) => {
    try {
        const { is_public } = visibilitySchema.parse(req.body);
        const document = await getDocumentService().setVisibility(
            currentUser(req),
            parseIdParam(req.params.id),
            is_public
        );
        res.json(successResponse(document, 'Document updated successfully'));
    } catch (error) {
        next(error);
    }
});

router.delete('/:id', requireAuth, async (req: Request, res: Response, next: NextFunction) => {
    try {
        const documentId = parseIdParam(req.params.id);
        await getDocumentService().remove(currentUser(req), documentId);
        res.json(successResponse({ id: documentId }, 'Document deleted successfully'));
    } catch (error) {
        next(error);
    }
});

export { router as documentRoutes };
