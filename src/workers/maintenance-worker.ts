import { logger, ILogger } from '../config/logger';
import { getMinioService, IStorageService } from '../services/minio.service';
import { getShareService } from '../services/share.service';
import {
    EXPIRE_SHARES_JOB,
    REMOVE_OBJECT_JOB,
    MaintenanceJob,
    MaintenanceJobResult
} from '../queue/queue-config';

export interface IShareSweeper {
    expireStaleShares(): Promise<number>;
}

/**
 * Maintenance Worker with Dependency Injection
 *
 * Processes storage-maintenance jobs:
 * - remove-object: delete the bytes of a deleted document
 * - expire-shares: clear share links past their expiry
 *
 * Errors propagate so BullMQ retries the job with backoff.
 */
export class MaintenanceWorker {
    constructor(
        private storage: IStorageService,
        private shares: IShareSweeper,
        private logger: ILogger
    ) { }

    /**
     * Factory method for production use
     */
    static create(): MaintenanceWorker {
        return new MaintenanceWorker(
            getMinioService(),
            getShareService(),
            logger
        );
    }

    async process(job: Pick<MaintenanceJob, 'id' | 'name' | 'data'>): Promise<MaintenanceJobResult> {
        switch (job.name) {
            case REMOVE_OBJECT_JOB: {
                const { objectPath } = job.data;
                if (!objectPath) {
                    throw new Error(`Job ${job.id ?? 'unknown'} has no objectPath`);
                }
                await this.storage.removeFile(objectPath);
                return { removed: objectPath };
            }
            case EXPIRE_SHARES_JOB: {
                const expiredShares = await this.shares.expireStaleShares();
                this.logger.debug({ jobId: job.id, expiredShares }, 'Share sweep finished');
                return { expiredShares };
            }
            default: {
                const unknownName: never = job.name;
                throw new Error(`Unknown maintenance job: ${String(unknownName)}`);
            }
        }
    }
}

// Export worker function for BullMQ
let maintenanceWorker: MaintenanceWorker | null = null;

export async function maintenanceProcessor(job: MaintenanceJob): Promise<MaintenanceJobResult> {
    if (!maintenanceWorker) {
        maintenanceWorker = MaintenanceWorker.create();
    }
    return await maintenanceWorker.process(job);
}
