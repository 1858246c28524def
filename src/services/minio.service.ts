import { Client } from 'minio';
import type { Readable } from 'stream';
import { logger, ILogger } from '../config/logger';
import { getSettings, Settings } from '../config/settings';
import { RetryUtil, IRetryUtil } from '../utils/retry.util';

/** S3 refuses presigned URLs that live longer than seven days. */
export const MAX_PRESIGN_SECONDS = 7 * 24 * 60 * 60;

export const DEFAULT_PRESIGN_SECONDS = 600;

// Interfaces for better testability
export interface IObjectStorageClient {
    bucketExists(bucketName: string): Promise<boolean>;
    makeBucket(bucketName: string, region?: string): Promise<void>;
    putObject(
        bucketName: string,
        objectName: string,
        data: Buffer,
        size: number,
        metaData: Record<string, string>
    ): Promise<unknown>;
    getObject(bucketName: string, objectName: string): Promise<Readable>;
    getPartialObject(bucketName: string, objectName: string, offset: number, length: number): Promise<Readable>;
    presignedGetObject(bucketName: string, objectName: string, expires: number): Promise<string>;
    removeObject(bucketName: string, objectName: string): Promise<void>;
}

export interface IStorageService {
    ensureBucket(): Promise<void>;
    uploadFile(objectPath: string, content: Buffer, contentType: string): Promise<string>;
    getFile(objectPath: string): Promise<Readable>;
    getPartialFile(objectPath: string, offset: number, length: number): Promise<Readable>;
    removeFile(objectPath: string): Promise<void>;
    getPresignedUrl(objectPath: string, expires?: number): Promise<string>;
}

export interface EndpointConfig {
    endPoint: string;
    port?: number;
    useSSL: boolean;
}

/**
 * Split `host[:port]` or `scheme://host[:port]` into client options.
 * Without a scheme, `secureDefault` decides SSL. Returns null for an
 * empty value.
 */
export function parseEndpoint(value: string, secureDefault: boolean): EndpointConfig | null {
    const trimmed = value.trim();
    if (!trimmed) {
        return null;
    }

    const hasScheme = /^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed);
    const url = new URL(hasScheme ? trimmed : `http://${trimmed}`);
    if (!url.hostname) {
        return null;
    }

    return {
        endPoint: url.hostname,
        port: url.port ? Number(url.port) : undefined,
        useSSL: hasScheme ? url.protocol === 'https:' : secureDefault
    };
}

/**
 * MinIO Service with Dependency Injection
 *
 * Wraps the S3-compatible object store that holds document bytes.
 * A separate client, pointed at the externally reachable host, signs
 * presigned URLs so their signatures match the host the browser uses.
 */
export class MinioService implements IStorageService {
    constructor(
        private client: IObjectStorageClient,
        private bucketName: string,
        private retryUtil: IRetryUtil,
        private logger: ILogger,
        private presignClient: IObjectStorageClient | null = null,
        private region: string = 'us-east-1'
    ) { }

    /**
     * Factory method for production use
     */
    static create(settings: Settings = getSettings()): MinioService {
        const internal = parseEndpoint(settings.MINIO_ENDPOINT, settings.MINIO_SECURE);
        if (!internal) {
            throw new Error('MINIO_ENDPOINT is not a valid host');
        }

        const build = (endpoint: EndpointConfig) => new Client({
            ...endpoint,
            accessKey: settings.MINIO_ACCESS_KEY,
            secretKey: settings.MINIO_SECRET_KEY,
            region: settings.MINIO_REGION
        });

        const external = parseEndpoint(settings.MINIO_EXTERNAL_URL, settings.MINIO_SECURE);

        return new MinioService(
            build(internal),
            settings.MINIO_BUCKET_NAME,
            RetryUtil,
            logger,
            external ? build(external) : null,
            settings.MINIO_REGION
        );
    }

    /**
     * Create the bucket if it does not exist yet
     */
    async ensureBucket(): Promise<void> {
        const exists = await this.client.bucketExists(this.bucketName);
        if (exists) {
            this.logger.info({ bucket: this.bucketName }, 'Bucket already exists');
            return;
        }

        await this.client.makeBucket(this.bucketName, this.region);
        this.logger.info({ bucket: this.bucketName, region: this.region }, 'Bucket created');
    }

    async uploadFile(objectPath: string, content: Buffer, contentType: string): Promise<string> {
        await this.retryUtil.executeWithRetry(
            () => this.client.putObject(
                this.bucketName,
                objectPath,
                content,
                content.length,
                { 'Content-Type': contentType }
            ),
            {
                maxAttempts: 3,
                baseDelay: 500,
                maxDelay: 4000,
                operationName: 'MinIO upload'
            }
        );

        this.logger.info({
            bucket: this.bucketName,
            objectPath,
            size: content.length
        }, 'Object uploaded');

        return objectPath;
    }

    async getFile(objectPath: string): Promise<Readable> {
        return await this.retryUtil.executeWithRetry(
            () => this.client.getObject(this.bucketName, objectPath),
            { maxAttempts: 3, baseDelay: 500, operationName: 'MinIO get' }
        );
    }

    async getPartialFile(objectPath: string, offset: number, length: number): Promise<Readable> {
        return await this.retryUtil.executeWithRetry(
            () => this.client.getPartialObject(this.bucketName, objectPath, offset, length),
            { maxAttempts: 3, baseDelay: 500, operationName: 'MinIO partial get' }
        );
    }

    async removeFile(objectPath: string): Promise<void> {
        await this.retryUtil.executeWithRetry(
            () => this.client.removeObject(this.bucketName, objectPath),
            { maxAttempts: 3, baseDelay: 500, operationName: 'MinIO remove' }
        );

        this.logger.info({ bucket: this.bucketName, objectPath }, 'Object removed');
    }

    /**
     * Presigned GET URL, valid for `expires` seconds (clamped to 1s..7d)
     */
    async getPresignedUrl(objectPath: string, expires: number = DEFAULT_PRESIGN_SECONDS): Promise<string> {
        const seconds = Math.min(Math.max(Math.floor(expires), 1), MAX_PRESIGN_SECONDS);
        const signer = this.presignClient ?? this.client;
        return await signer.presignedGetObject(this.bucketName, objectPath, seconds);
    }
}

// Singleton instance
let minioService: MinioService | null = null;

export function getMinioService(): MinioService {
    if (!minioService) {
        minioService = MinioService.create();
    }
    return minioService;
}
