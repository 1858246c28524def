import { describe, it, expect, beforeEach, vi } from 'vitest';
import { MaintenanceWorker } from '../../../src/workers/maintenance-worker';
import type { MockLogger } from '../../setup';

vi.mock('../../../src/db/data-source', () => ({
    AppDataSource: {
        getRepository: vi.fn()
    }
}));

describe('MaintenanceWorker - Dependency Injection Tests', () => {
    let storage: {
        ensureBucket: ReturnType<typeof vi.fn>;
        uploadFile: ReturnType<typeof vi.fn>;
        getFile: ReturnType<typeof vi.fn>;
        getPartialFile: ReturnType<typeof vi.fn>;
        removeFile: ReturnType<typeof vi.fn>;
        getPresignedUrl: ReturnType<typeof vi.fn>;
    };
    let shares: { expireStaleShares: ReturnType<typeof vi.fn> };
    let mockLogger: MockLogger;
    let worker: MaintenanceWorker;

    beforeEach(() => {
        storage = {
            ensureBucket: vi.fn(),
            uploadFile: vi.fn(),
            getFile: vi.fn(),
            getPartialFile: vi.fn(),
            removeFile: vi.fn().mockResolvedValue(undefined),
            getPresignedUrl: vi.fn()
        };
        shares = { expireStaleShares: vi.fn().mockResolvedValue(3) };
        mockLogger = globalThis.testUtils.createMockLogger();
        worker = new MaintenanceWorker(storage, shares, mockLogger);
    });

    it('should remove the object named by the job', async () => {
        const result = await worker.process({
            id: 'job-1',
            name: 'remove-object',
            data: { objectPath: '2026/01/15/abcd1234/doc.pdf' }
        });

        expect(storage.removeFile).toHaveBeenCalledWith('2026/01/15/abcd1234/doc.pdf');
        expect(result).toEqual({ removed: '2026/01/15/abcd1234/doc.pdf' });
    });

    it('should fail a removal job without an object path', async () => {
        await expect(worker.process({ id: 'job-2', name: 'remove-object', data: {} }))
            .rejects.toThrow('Job job-2 has no objectPath');
        expect(storage.removeFile).not.toHaveBeenCalled();
    });

    it('should let storage errors propagate so the job is retried', async () => {
        storage.removeFile.mockRejectedValue(new Error('socket hang up'));

        await expect(worker.process({
            id: 'job-3',
            name: 'remove-object',
            data: { objectPath: 'a/b.pdf' }
        })).rejects.toThrow('socket hang up');
    });

    it('should sweep expired shares', async () => {
        const result = await worker.process({ id: 'repeat:expire-shares:1', name: 'expire-shares', data: {} });

        expect(shares.expireStaleShares).toHaveBeenCalledTimes(1);
        expect(result).toEqual({ expiredShares: 3 });
        expect(mockLogger.debug).toHaveBeenCalledWith(
            { jobId: 'repeat:expire-shares:1', expiredShares: 3 },
            'Share sweep finished'
        );
    });
});
