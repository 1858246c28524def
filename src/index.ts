import "reflect-metadata";
import { AppDataSource } from "./db/data-source";
import { createApp } from "./app";
import { logger } from "./config/logger";
import { getSettings } from "./config/settings";
import { getMinioService } from "./services/minio.service";
import { getQueueConfig } from "./queue/queue-config";
import { maintenanceProcessor } from "./workers/maintenance-worker";

// Initialize database, storage and queue, then start server
async function startServer(): Promise<void> {
    const settings = getSettings();

    // Initialize database connection
    await AppDataSource.initialize();
    logger.info({}, "Database connection established");

    if (settings.RUN_MIGRATIONS) {
        const migrations = await AppDataSource.runMigrations();
        logger.info({ applied: migrations.map(m => m.name) }, "Migrations up to date");
    }

    // Make sure the bucket exists before accepting uploads
    await getMinioService().ensureBucket();
    logger.info({ bucket: settings.MINIO_BUCKET_NAME }, "Object storage ready");

    // Initialize queue system
    const queueConfig = getQueueConfig();
    queueConfig.startWorker(maintenanceProcessor);
    await queueConfig.scheduleShareSweep();
    logger.info({}, "Maintenance queue initialized and worker started");

    const app = createApp();
    const server = app.listen(settings.PORT, () => {
        logger.info({ port: settings.PORT }, `Server running at http://localhost:${settings.PORT}`);
    });

    const shutdown = (signal: string) => {
        logger.info({ signal }, "Shutting down");
        server.close();
        Promise.all([queueConfig.close(), AppDataSource.destroy()])
            .then(() => process.exit(0))
            .catch((error: unknown) => {
                logger.error({ err: error }, "Error during shutdown");
                process.exit(1);
            });
    };

    process.on("SIGTERM", () => shutdown("SIGTERM"));
    process.on("SIGINT", () => shutdown("SIGINT"));
}

startServer().catch((error: unknown) => {
    logger.error({ err: error }, "Failed to start server");
    process.exit(1);
});
