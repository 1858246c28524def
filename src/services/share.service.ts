import { randomUUID } from 'crypto';
import { IsNull, LessThan, MoreThan } from 'typeorm';
import { AppDataSource } from '../db/data-source';
import { Document } from '../db/entities/document.entity';
import { IRepository } from '../db/interfaces';
import { logger, ILogger } from '../config/logger';
import { getMinioService, IStorageService } from './minio.service';
import { ApiException } from '../utils/api-response';
import {
    DEFAULT_SHARE_DAYS,
    addDays,
    generateShareCode,
    isShareActive,
    isShareExpired,
    isValidShareCode,
    shareCodesMatch,
    sharedUrlExpiry
} from '../utils/share.util';
import type {
    AuthenticatedUser,
    ShareCheckResponse,
    SharedAccessResponse,
    SharedDocumentSummary,
    ShareResponse,
    ShareType
} from '../types/document';

export interface ShareCreateInput {
    share_type: ShareType;
    share_code?: string | null;
}

export interface ShareUpdateInput extends ShareCreateInput {
    expire_days?: number | null;
}

export function toShareResponse(document: Document): ShareResponse {
    return {
        filename: document.filename,
        share_uuid: document.share_uuid,
        share_type: document.share_type,
        share_code: document.share_code,
        share_expired_at: document.share_expired_at,
        is_shared: document.is_shared
    };
}

export function toSharedSummary(document: Document): SharedDocumentSummary {
    return {
        id: document.id,
        filename: document.filename,
        share_uuid: document.share_uuid,
        share_type: document.share_type,
        share_code: document.share_code,
        share_expired_at: document.share_expired_at,
        created_at: document.created_at,
        updated_at: document.updated_at,
        download_count: document.download_count,
        file_size: document.file_size,
        mime_type: document.mime_type
    };
}

function clearShare(document: Document): void {
    document.is_shared = false;
    document.share_uuid = null;
    document.share_type = null;
    document.share_code = null;
    document.share_expired_at = null;
}

/**
 * Share code to store for the requested share type: the caller's code
 * when valid, a random one when omitted, none for public shares.
 */
function resolveShareCode(input: ShareCreateInput): string | null {
    if (input.share_type !== 'with_password') {
        return null;
    }
    if (input.share_code === undefined || input.share_code === null || input.share_code === '') {
        return generateShareCode();
    }
    if (!isValidShareCode(input.share_code)) {
        throw new ApiException(400, 'Share code must be 4 digits');
    }
    return input.share_code;
}

/**
 * Share Service with Dependency Injection
 *
 * Share links for documents: issuing, updating and cancelling them
 * for owners, and the public check/access endpoints behind a link.
 */
export class ShareService {
    constructor(
        private documentRepository: IRepository<Document>,
        private storage: IStorageService,
        private logger: ILogger,
        private clock: () => Date = () => new Date()
    ) { }

    /**
     * Factory method for production use
     */
    static create(): ShareService {
        return new ShareService(
            AppDataSource.getRepository(Document),
            getMinioService(),
            logger
        );
    }

    /**
     * Share a document for seven days. An existing, unexpired link keeps
     * its uuid so links already handed out stay valid.
     */
    async share(user: AuthenticatedUser, documentId: number, input: ShareCreateInput): Promise<ShareResponse> {
        const document = await this.findOwned(user, documentId);
        const shareCode = resolveShareCode(input);
        const now = this.clock();

        if (!document.share_uuid || isShareExpired(document.share_expired_at, now)) {
            document.share_uuid = randomUUID();
        }

        document.share_type = input.share_type;
        document.share_code = shareCode;
        document.share_expired_at = addDays(now, DEFAULT_SHARE_DAYS);
        document.is_shared = true;

        const saved = await this.documentRepository.save(document);

        this.logger.info({
            documentId,
            userId: user.id,
            shareType: saved.share_type,
            expiresAt: saved.share_expired_at
        }, 'Document shared');

        return toShareResponse(saved);
    }

    async updateShare(user: AuthenticatedUser, documentId: number, input: ShareUpdateInput): Promise<ShareResponse> {
        const document = await this.documentRepository.findOne({
            where: { id: documentId, uploader_id: user.id, is_shared: true }
        });
        if (!document) {
            throw new ApiException(404, 'Document not found or not shared');
        }

        document.share_type = input.share_type;
        document.share_code = resolveShareCode(input);
        document.share_expired_at = input.expire_days === undefined || input.expire_days === null
            ? null
            : addDays(this.clock(), input.expire_days);

        const saved = await this.documentRepository.save(document);

        this.logger.info({
            documentId,
            userId: user.id,
            shareType: saved.share_type,
            expiresAt: saved.share_expired_at
        }, 'Share updated');

        return toShareResponse(saved);
    }

    async getShareInfo(user: AuthenticatedUser, documentId: number): Promise<ShareResponse> {
        const document = await this.documentRepository.findOne({
            where: { id: documentId, uploader_id: user.id }
        });
        if (!document) {
            throw new ApiException(404, 'Document not found');
        }
        return toShareResponse(document);
    }

    async getShareByUuid(user: AuthenticatedUser, shareUuid: string): Promise<ShareResponse> {
        const document = await this.findActiveShare(shareUuid);
        if (document.uploader_id !== user.id) {
            throw new ApiException(403, 'Not authorized');
        }
        return toShareResponse(document);
    }

    async cancelShare(user: AuthenticatedUser, documentId: number): Promise<ShareResponse> {
        const document = await this.documentRepository.findOne({
            where: { id: documentId, uploader_id: user.id }
        });
        if (!document) {
            throw new ApiException(404, 'Document not found');
        }

        clearShare(document);
        const saved = await this.documentRepository.save(document);

        this.logger.info({ documentId, userId: user.id }, 'Share cancelled');

        return { filename: saved.filename, is_shared: false };
    }

    /**
     * The caller's live shares, most recently changed first
     */
    async listShared(user: AuthenticatedUser): Promise<SharedDocumentSummary[]> {
        const now = this.clock();
        const documents = await this.documentRepository.find({
            where: [
                { uploader_id: user.id, is_shared: true, share_expired_at: IsNull() },
                { uploader_id: user.id, is_shared: true, share_expired_at: MoreThan(now) }
            ],
            order: { updated_at: 'DESC' }
        });
        return documents.map(toSharedSummary);
    }

    async checkShare(shareUuid: string): Promise<ShareCheckResponse> {
        const document = await this.findActiveShare(shareUuid);
        return {
            requires_password: document.share_type === 'with_password',
            filename: document.filename
        };
    }

    /**
     * Open a share link. Password-protected links need the matching code.
     */
    async accessShare(shareUuid: string, shareCode?: string): Promise<SharedAccessResponse> {
        const document = await this.findActiveShare(shareUuid);

        if (document.share_type === 'with_password') {
            if (!shareCode) {
                throw new ApiException(403, 'Share code required');
            }
            if (!shareCodesMatch(document.share_code, shareCode)) {
                this.logger.warn({ documentId: document.id, shareUuid }, 'Invalid share code');
                throw new ApiException(403, 'Invalid share code');
            }
        }

        const expires = sharedUrlExpiry(document.share_expired_at, this.clock());
        const previewUrl = await this.storage.getPresignedUrl(document.minio_path, expires);

        await this.documentRepository.increment({ id: document.id }, 'download_count', 1);

        this.logger.info({ documentId: document.id, shareUuid, expires }, 'Shared document accessed');

        return {
            filename: document.filename,
            preview_url: previewUrl,
            mime_type: document.mime_type,
            file_size: document.file_size
        };
    }

    /**
     * Clear the share fields of every document whose link has expired.
     * One conditional UPDATE, so a share renewed meanwhile is left alone.
     */
    async expireStaleShares(): Promise<number> {
        const result = await this.documentRepository.update(
            { is_shared: true, share_expired_at: LessThan(this.clock()) },
            {
                is_shared: false,
                share_uuid: null,
                share_type: null,
                share_code: null,
                share_expired_at: null
            }
        );
        const count = result.affected ?? 0;

        if (count > 0) {
            this.logger.info({ count }, 'Expired shares cleared');
        }

        return count;
    }

    private async findOwned(user: AuthenticatedUser, documentId: number): Promise<Document> {
        const document = await this.documentRepository.findOne({ where: { id: documentId } });
        if (!document) {
            throw new ApiException(404, 'Document not found');
        }
        if (document.uploader_id !== user.id) {
            throw new ApiException(403, 'Not authorized');
        }
        return document;
    }

    private async findActiveShare(shareUuid: string): Promise<Document> {
        const document = await this.documentRepository.findOne({
            where: { share_uuid: shareUuid, is_shared: true }
        });
        if (!document || !isShareActive(document, this.clock())) {
            throw new ApiException(404, 'Share not found or expired');
        }
        return document;
    }
}

// Singleton instance
let shareService: ShareService | null = null;

export function getShareService(): ShareService {
    if (!shareService) {
        shareService = ShareService.create();
    }
    return shareService;
}
