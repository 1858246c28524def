import { Queue, Worker, QueueEvents, Job } from 'bullmq';
import { Redis } from 'ioredis';
import { logger } from '../config/logger';
import { getSettings, Settings } from '../config/settings';

export const MAINTENANCE_QUEUE = 'storage-maintenance';

export const REMOVE_OBJECT_JOB = 'remove-object';
export const EXPIRE_SHARES_JOB = 'expire-shares';

export type MaintenanceJobName = typeof REMOVE_OBJECT_JOB | typeof EXPIRE_SHARES_JOB;

export interface MaintenanceJobData {
    objectPath?: string;
}

export interface MaintenanceJobResult {
    removed?: string;
    expiredShares?: number;
}

export type MaintenanceJob = Job<MaintenanceJobData, MaintenanceJobResult, MaintenanceJobName>;

export interface IMaintenanceQueue {
    enqueueObjectRemoval(objectPath: string): Promise<void>;
}

/**
 * Queue Configuration
 *
 * BullMQ setup for storage housekeeping: deleting objects of removed
 * documents and sweeping expired share links.
 */
export class QueueConfig implements IMaintenanceQueue {
    private redis: Redis;
    private eventsRedis: Redis;
    private maintenanceQueue: Queue<MaintenanceJobData, MaintenanceJobResult, MaintenanceJobName>;
    private maintenanceWorker: Worker<MaintenanceJobData, MaintenanceJobResult, MaintenanceJobName> | null = null;
    private queueEvents: QueueEvents;

    constructor(private settings: Settings = getSettings()) {
        // Redis connection
        this.redis = new Redis(settings.REDIS_URL, {
            enableReadyCheck: false,
            maxRetriesPerRequest: null,
        });

        this.maintenanceQueue = new Queue(MAINTENANCE_QUEUE, {
            connection: this.redis,
            defaultJobOptions: {
                removeOnComplete: 50,
                removeOnFail: 20,
                attempts: settings.MAINTENANCE_MAX_ATTEMPTS,
                backoff: {
                    type: 'exponential',
                    delay: settings.MAINTENANCE_BACKOFF_MS,
                },
            },
        });

        // Queue events block on their connection, so they get their own
        this.eventsRedis = this.redis.duplicate();
        this.queueEvents = new QueueEvents(MAINTENANCE_QUEUE, {
            connection: this.eventsRedis,
        });

        this.setupEventListeners();
    }

    getMaintenanceQueue(): Queue<MaintenanceJobData, MaintenanceJobResult, MaintenanceJobName> {
        return this.maintenanceQueue;
    }

    async enqueueObjectRemoval(objectPath: string): Promise<void> {
        const job = await this.maintenanceQueue.add(REMOVE_OBJECT_JOB, { objectPath });
        logger.info({ jobId: job.id, objectPath }, 'Object removal queued');
    }

    /**
     * Register the repeatable sweep of expired shares
     */
    async scheduleShareSweep(): Promise<void> {
        await this.maintenanceQueue.add(EXPIRE_SHARES_JOB, {}, {
            repeat: { every: this.settings.SHARE_SWEEP_INTERVAL_MS },
            jobId: EXPIRE_SHARES_JOB,
        });
        logger.info({ every: this.settings.SHARE_SWEEP_INTERVAL_MS }, 'Share expiry sweep scheduled');
    }

    /**
     * Start the maintenance worker
     */
    startWorker(processor: (job: MaintenanceJob) => Promise<MaintenanceJobResult>): void {
        const worker = new Worker<MaintenanceJobData, MaintenanceJobResult, MaintenanceJobName>(
            MAINTENANCE_QUEUE,
            processor,
            {
                connection: this.redis,
                concurrency: 2,
            }
        );

        worker.on('completed', (job) => {
            logger.info({
                jobId: job.id,
                jobName: job.name,
                duration: job.processedOn === undefined ? undefined : job.processedOn - job.timestamp
            }, 'Maintenance job completed');
        });

        worker.on('failed', (job, err) => {
            logger.error({
                jobId: job?.id,
                jobName: job?.name,
                error: err.message,
                attempts: job?.attemptsMade
            }, 'Maintenance job failed');
        });

        worker.on('stalled', (jobId) => {
            logger.warn({ jobId }, 'Maintenance job stalled');
        });

        this.maintenanceWorker = worker;
    }

    private setupEventListeners(): void {
        this.queueEvents.on('active', ({ jobId }) => {
            logger.debug({ jobId }, 'Job started processing');
        });

        this.queueEvents.on('failed', ({ jobId, failedReason }) => {
            logger.error({ jobId, failedReason }, 'Job failed');
        });
    }

    /**
     * Close all connections
     */
    async close(): Promise<void> {
        await this.maintenanceWorker?.close();
        await this.maintenanceQueue.close();
        await this.queueEvents.close();
        await this.eventsRedis.quit();
        await this.redis.quit();
    }
}

// Singleton instance
let queueConfig: QueueConfig | null = null;

export function getQueueConfig(): QueueConfig {
    if (!queueConfig) {
        queueConfig = new QueueConfig();
    }
    return queueConfig;
}
