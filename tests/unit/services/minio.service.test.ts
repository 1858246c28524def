import { describe, it, expect, beforeEach, vi } from 'vitest';
import { Readable } from 'stream';
import { MinioService, parseEndpoint, MAX_PRESIGN_SECONDS } from '../../../src/services/minio.service';
import type { IRetryUtil } from '../../../src/utils/retry.util';
import type { MockLogger } from '../../setup';

function createMockClient() {
    return {
        bucketExists: vi.fn(),
        makeBucket: vi.fn().mockResolvedValue(undefined),
        putObject: vi.fn().mockResolvedValue({ etag: 'etag-1' }),
        getObject: vi.fn(),
        getPartialObject: vi.fn(),
        presignedGetObject: vi.fn().mockResolvedValue('http://localhost:9000/documents-test/signed'),
        removeObject: vi.fn().mockResolvedValue(undefined)
    };
}

describe('MinioService - Dependency Injection Tests', () => {
    let client: ReturnType<typeof createMockClient>;
    let retryUtil: IRetryUtil;
    let mockLogger: MockLogger;
    let service: MinioService;

    beforeEach(() => {
        client = createMockClient();
        retryUtil = {
            executeWithRetry: <T>(operation: () => Promise<T>): Promise<T> => operation()
        };
        mockLogger = globalThis.testUtils.createMockLogger();
        service = new MinioService(client, 'documents-test', retryUtil, mockLogger, null, 'eu-central-1');
    });

    describe('ensureBucket', () => {
        it('should leave an existing bucket alone', async () => {
            client.bucketExists.mockResolvedValue(true);

            await service.ensureBucket();

            expect(client.makeBucket).not.toHaveBeenCalled();
            expect(mockLogger.info).toHaveBeenCalledWith({ bucket: 'documents-test' }, 'Bucket already exists');
        });

        it('should create a missing bucket in the configured region', async () => {
            client.bucketExists.mockResolvedValue(false);

            await service.ensureBucket();

            expect(client.makeBucket).toHaveBeenCalledWith('documents-test', 'eu-central-1');
            expect(mockLogger.info).toHaveBeenCalledWith(
                { bucket: 'documents-test', region: 'eu-central-1' },
                'Bucket created'
            );
        });
    });

    describe('uploadFile', () => {
        it('should put the object with its content type through the retry helper', async () => {
            const spy = vi.spyOn(retryUtil, 'executeWithRetry');
            const content = Buffer.from('hello');

            const result = await service.uploadFile('2026/01/15/abcd1234/doc.pdf', content, 'application/pdf');

            expect(result).toBe('2026/01/15/abcd1234/doc.pdf');
            expect(client.putObject).toHaveBeenCalledWith(
                'documents-test',
                '2026/01/15/abcd1234/doc.pdf',
                content,
                5,
                { 'Content-Type': 'application/pdf' }
            );
            expect(spy).toHaveBeenCalledWith(expect.any(Function), expect.objectContaining({
                operationName: 'MinIO upload',
                maxAttempts: 3
            }));
        });

        it('should propagate a failed upload', async () => {
            client.putObject.mockRejectedValue(new Error('Access Denied.'));

            await expect(service.uploadFile('a/b.pdf', Buffer.from('x'), 'application/pdf'))
                .rejects.toThrow('Access Denied.');
            expect(mockLogger.info).not.toHaveBeenCalled();
        });
    });

    describe('reading objects', () => {
        it('should return the object stream', async () => {
            const stream = Readable.from(['bytes']);
            client.getObject.mockResolvedValue(stream);

            await expect(service.getFile('a/b.pdf')).resolves.toBe(stream);
            expect(client.getObject).toHaveBeenCalledWith('documents-test', 'a/b.pdf');
        });

        it('should request a byte range by offset and length', async () => {
            const stream = Readable.from(['part']);
            client.getPartialObject.mockResolvedValue(stream);

            await expect(service.getPartialFile('a/b.pdf', 100, 50)).resolves.toBe(stream);
            expect(client.getPartialObject).toHaveBeenCalledWith('documents-test', 'a/b.pdf', 100, 50);
        });
    });

    describe('removeFile', () => {
        it('should remove the object and log it', async () => {
            await service.removeFile('a/b.pdf');

            expect(client.removeObject).toHaveBeenCalledWith('documents-test', 'a/b.pdf');
            expect(mockLogger.info).toHaveBeenCalledWith(
                { bucket: 'documents-test', objectPath: 'a/b.pdf' },
                'Object removed'
            );
        });
    });

    describe('getPresignedUrl', () => {
        it('should default to ten minutes', async () => {
            const url = await service.getPresignedUrl('a/b.pdf');

            expect(url).toBe('http://localhost:9000/documents-test/signed');
            expect(client.presignedGetObject).toHaveBeenCalledWith('documents-test', 'a/b.pdf', 600);
        });

        it('should clamp the lifetime to the range the store accepts', async () => {
            await service.getPresignedUrl('a/b.pdf', 0);
            await service.getPresignedUrl('a/b.pdf', 30 * 24 * 60 * 60);
            await service.getPresignedUrl('a/b.pdf', 12.7);

            expect(client.presignedGetObject).toHaveBeenNthCalledWith(1, 'documents-test', 'a/b.pdf', 1);
            expect(client.presignedGetObject).toHaveBeenNthCalledWith(2, 'documents-test', 'a/b.pdf', MAX_PRESIGN_SECONDS);
            expect(client.presignedGetObject).toHaveBeenNthCalledWith(3, 'documents-test', 'a/b.pdf', 12);
        });

        it('should sign with the external client when one is configured', async () => {
            const external = createMockClient();
            external.presignedGetObject.mockResolvedValue('https://files.example.com/documents-test/signed');
            const withExternal = new MinioService(client, 'documents-test', retryUtil, mockLogger, external);

            const url = await withExternal.getPresignedUrl('a/b.pdf', 3600);

            expect(url).toBe('https://files.example.com/documents-test/signed');
            expect(external.presignedGetObject).toHaveBeenCalledWith('documents-test', 'a/b.pdf', 3600);
            expect(client.presignedGetObject).not.toHaveBeenCalled();
        });
    });
});

describe('parseEndpoint', () => {
    it('should read host and port without a scheme', () => {
        expect(parseEndpoint('localhost:9000', false)).toEqual({
            endPoint: 'localhost',
            port: 9000,
            useSSL: false
        });
    });

    it('should fall back to the secure flag without a scheme', () => {
        expect(parseEndpoint('minio.internal', true)).toEqual({
            endPoint: 'minio.internal',
            port: undefined,
            useSSL: true
        });
    });

    it('should let the scheme decide SSL', () => {
        expect(parseEndpoint('https://files.example.com', false)).toEqual({
            endPoint: 'files.example.com',
            port: undefined,
            useSSL: true
        });
        expect(parseEndpoint('http://minio:9000', true)).toEqual({
            endPoint: 'minio',
            port: 9000,
            useSSL: false
        });
    });

    it('should return null for an empty value', () => {
        expect(parseEndpoint('', false)).toBeNull();
        expect(parseEndpoint('   ', true)).toBeNull();
    });
});
