import { randomUUID } from 'crypto';
import type { Readable } from 'stream';
import { AppDataSource } from '../db/data-source';
import { Document } from '../db/entities/document.entity';
import { IRepository } from '../db/interfaces';
import { isUniqueViolation, violatedConstraint } from '../db/errors';
import { logger, ILogger } from '../config/logger';
import { getSettings } from '../config/settings';
import { getMinioService, IStorageService, DEFAULT_PRESIGN_SECONDS } from './minio.service';
import { getQueueConfig, IMaintenanceQueue } from '../queue/queue-config';
import { ApiException } from '../utils/api-response';
import { parseRangeHeader, contentRange, ByteRange } from '../utils/range.util';
import { attachmentDisposition, buildObjectPath, md5Hex } from '../utils/storage-path.util';
import type { AuthenticatedUser, DocumentResponse, PreviewResponse } from '../types/document';

export const DEFAULT_MIME_TYPE = 'application/octet-stream';

export interface UploadedFile {
    originalname: string;
    mimetype: string;
    buffer: Buffer;
}

export interface DocumentServiceOptions {
    uploadAdminOnly: boolean;
}

export interface DownloadHead {
    status: 200 | 206;
    headers: Record<string, string>;
}

export interface DownloadResult extends DownloadHead {
    stream: Readable;
}

interface DownloadPlan extends DownloadHead {
    document: Document;
    range: ByteRange | null;
}

export function toDocumentResponse(document: Document): DocumentResponse {
    return {
        id: document.id,
        filename: document.filename,
        file_md5: document.file_md5,
        file_size: document.file_size,
        mime_type: document.mime_type,
        file_uuid: document.file_uuid,
        uploader_id: document.uploader_id,
        is_public: document.is_public,
        download_count: document.download_count,
        is_shared: document.is_shared,
        created_at: document.created_at,
        updated_at: document.updated_at
    };
}

/**
 * Document Service with Dependency Injection
 *
 * Upload, listing, preview, download and deletion of documents.
 * Bytes go to the object store, metadata to the documents table.
 */
export class DocumentService {
    constructor(
        private documentRepository: IRepository<Document>,
        private storage: IStorageService,
        private maintenance: IMaintenanceQueue,
        private logger: ILogger,
        private options: DocumentServiceOptions = { uploadAdminOnly: true }
    ) { }

    /**
     * Factory method for production use
     */
    static create(): DocumentService {
        return new DocumentService(
            AppDataSource.getRepository(Document),
            getMinioService(),
            getQueueConfig(),
            logger,
            { uploadAdminOnly: getSettings().UPLOAD_ADMIN_ONLY }
        );
    }

    async upload(user: AuthenticatedUser, file: UploadedFile): Promise<DocumentResponse> {
        if (this.options.uploadAdminOnly && !user.is_admin) {
            throw new ApiException(403, 'Not authorized');
        }

        if (!file.originalname) {
            throw new ApiException(400, 'Filename is required');
        }

        const fileUuid = randomUUID();
        const objectPath = buildObjectPath(user.email, fileUuid, file.originalname);
        const mimeType = file.mimetype || DEFAULT_MIME_TYPE;

        await this.storage.uploadFile(objectPath, file.buffer, mimeType);

        const document = this.documentRepository.create({
            filename: file.originalname,
            file_md5: md5Hex(file.buffer),
            file_size: file.buffer.length,
            mime_type: mimeType,
            minio_path: objectPath,
            file_uuid: fileUuid,
            uploader_id: user.id
        });

        let saved: Document;
        try {
            saved = await this.documentRepository.save(document);
        } catch (error) {
            await this.discardObject(objectPath);
            if (isUniqueViolation(error)) {
                this.logger.warn({ objectPath, constraint: violatedConstraint(error) }, 'Document insert hit a unique constraint');
                throw new ApiException(400, 'File UUID already exists, please try again', {
                    error: 'Database constraint violation'
                });
            }
            throw error;
        }

        this.logger.info({
            documentId: saved.id,
            uploaderId: user.id,
            size: saved.file_size,
            objectPath
        }, 'Document uploaded');

        return toDocumentResponse(saved);
    }

    async listMine(user: AuthenticatedUser): Promise<DocumentResponse[]> {
        const documents = await this.documentRepository.find({
            where: { uploader_id: user.id },
            order: { created_at: 'DESC' }
        });
        return documents.map(toDocumentResponse);
    }

    async preview(user: AuthenticatedUser, documentId: number): Promise<PreviewResponse> {
        const document = await this.findReadable(user, documentId, 'Not authorized to preview this document');

        const previewUrl = await this.storage.getPresignedUrl(document.minio_path, DEFAULT_PRESIGN_SECONDS);

        return {
            preview_url: previewUrl,
            mime_type: document.mime_type,
            filename: document.filename
        };
    }

    /**
     * Status and headers of a download without opening the object,
     * for HEAD requests. Does not count as a download.
     */
    async inspectDownload(user: AuthenticatedUser, documentId: number, rangeHeader?: string): Promise<DownloadHead> {
        const { status, headers } = await this.planDownload(user, documentId, rangeHeader);
        return { status, headers };
    }

    /**
     * Open a document for download, honouring a single byte range.
     * The download counter moves once per download: ranged requests
     * that resume mid-file do not count again.
     */
    async download(user: AuthenticatedUser, documentId: number, rangeHeader?: string): Promise<DownloadResult> {
        const { document, status, headers, range } = await this.planDownload(user, documentId, rangeHeader);

        const stream = range
            ? await this.storage.getPartialFile(document.minio_path, range.start, range.end - range.start + 1)
            : await this.storage.getFile(document.minio_path);

        if (!range || range.start === 0) {
            await this.documentRepository.increment({ id: document.id }, 'download_count', 1);
        }

        this.logger.info({
            documentId: document.id,
            userId: user.id,
            status,
            range: rangeHeader
        }, 'Document download started');

        return { status, headers, stream };
    }

    async setVisibility(user: AuthenticatedUser, documentId: number, isPublic: boolean): Promise<DocumentResponse> {
        const document = await this.findManageable(user, documentId);
        document.is_public = isPublic;
        const saved = await this.documentRepository.save(document);

        this.logger.info({ documentId, userId: user.id, isPublic }, 'Document visibility changed');
        return toDocumentResponse(saved);
    }

    /**
     * Delete the row now; the object is removed by the maintenance worker
     */
    async remove(user: AuthenticatedUser, documentId: number): Promise<void> {
        const document = await this.findManageable(user, documentId);
        const objectPath = document.minio_path;

        await this.documentRepository.remove(document);
        await this.releaseObject(objectPath);

        this.logger.info({ documentId, userId: user.id, objectPath }, 'Document deleted');
    }

    private async planDownload(user: AuthenticatedUser, documentId: number, rangeHeader?: string): Promise<DownloadPlan> {
        const document = await this.findReadable(user, documentId, 'Not authorized to download this document');
        const size = document.file_size;

        const headers: Record<string, string> = {
            'Content-Disposition': attachmentDisposition(document.filename),
            'Accept-Ranges': 'bytes',
            'Content-Type': document.mime_type,
            'Cache-Control': 'no-cache'
        };

        const parsed = parseRangeHeader(rangeHeader, size);

        if (parsed.kind === 'unsatisfiable') {
            throw new ApiException(416, 'Requested range not satisfiable', undefined, {
                'Content-Range': `bytes */${size}`
            });
        }

        if (parsed.kind === 'range') {
            const { range } = parsed;
            return {
                document,
                status: 206,
                headers: {
                    ...headers,
                    'Content-Range': contentRange(range, size),
                    'Content-Length': String(range.end - range.start + 1)
                },
                range
            };
        }

        return {
            document,
            status: 200,
            headers: { ...headers, 'Content-Length': String(size) },
            range: null
        };
    }

    private async findReadable(user: AuthenticatedUser, documentId: number, forbiddenMessage: string): Promise<Document> {
        const document = await this.documentRepository.findOne({ where: { id: documentId } });
        if (!document) {
            throw new ApiException(404, 'Document not found');
        }
        if (!document.is_public && document.uploader_id !== user.id && !user.is_admin) {
            throw new ApiException(403, forbiddenMessage);
        }
        return document;
    }

    private async findManageable(user: AuthenticatedUser, documentId: number): Promise<Document> {
        const document = await this.documentRepository.findOne({ where: { id: documentId } });
        if (!document) {
            throw new ApiException(404, 'Document not found');
        }
        if (document.uploader_id !== user.id && !user.is_admin) {
            throw new ApiException(403, 'Not authorized');
        }
        return document;
    }

    /**
     * Hand the object of a deleted row to the maintenance queue, or remove
     * it inline when the queue is unreachable. The row is already gone, so
     * a failure here is logged, not raised.
     */
    private async releaseObject(objectPath: string): Promise<void> {
        try {
            await this.maintenance.enqueueObjectRemoval(objectPath);
            return;
        } catch (error) {
            this.logger.warn({
                objectPath,
                error: error instanceof Error ? error.message : String(error)
            }, 'Could not queue object removal, removing inline');
        }

        try {
            await this.storage.removeFile(objectPath);
        } catch (error) {
            this.logger.error({
                objectPath,
                error: error instanceof Error ? error.message : String(error)
            }, 'Object of deleted document could not be removed');
        }
    }

    private async discardObject(objectPath: string): Promise<void> {
        try {
            await this.storage.removeFile(objectPath);
        } catch (error) {
            this.logger.warn({
                objectPath,
                error: error instanceof Error ? error.message : String(error)
            }, 'Could not remove object after failed insert, queueing removal');
            await this.maintenance.enqueueObjectRemoval(objectPath);
        }
    }
}

// Singleton instance
let documentService: DocumentService | null = null;

export function getDocumentService(): DocumentService {
    if (!documentService) {
        documentService = DocumentService.create();
    }
    return documentService;
}
