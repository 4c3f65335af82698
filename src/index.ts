import config from './utils/config';
import logger from './utils/logger';
import { createApp } from './app';
import { AttendanceService } from './services/attendance.service';
import { ApiTokenAuthorizer } from './services/auth.service';
import { BackendService } from './services/backend.service';
import { DeviceRegistryService } from './services/device-registry.service';
import { ProtocolService } from './services/protocol.service';
import { QueueService } from './services/queue.service';
import { startDeviceStatusJob } from './jobs/device-status.job';
import { startQueueRetryJob } from './jobs/queue-retry.job';

const backend = new BackendService({
    url: config.backend.url,
    apiToken: config.backend.apiToken,
    email: config.backend.email,
    password: config.backend.password,
    timeoutMs: config.backend.timeoutMs,
    cacheSeconds: config.backend.cacheSeconds,
});
const retryQueue = new QueueService(config.queue.dir);
const registry = new DeviceRegistryService({ maxPendingCommands: config.devices.maxPendingCommands });
const attendance = new AttendanceService(backend, {
    recentLimit: config.diagnostics.recentLogLimit,
    retryQueue,
    batchTimeoutMs: config.ingest.batchTimeoutMs,
    dedupeLimit: config.ingest.dedupeKeyLimit,
    timezone: config.org.timezone,
});
const protocol = new ProtocolService(registry, attendance, {
    timezone: config.org.timezone,
    journalLimit: config.diagnostics.debugRequestLimit,
});

const app = createApp({
    registry,
    protocol,
    attendance,
    store: backend,
    backend,
    retryQueue,
    authorizer: new ApiTokenAuthorizer(config.admin.apiToken),
    timezone: config.org.timezone,
    orgName: config.org.name,
    nodeEnv: config.nodeEnv,
});

// Start server
const PORT = config.port;

const server = app.listen(PORT, () => {
    logger.info(`ADMS Bridge started on port ${PORT}`, {
        nodeEnv: config.nodeEnv,
        organization: config.org.name,
        timezone: config.org.timezone,
        backendUrl: config.backend.url,
    });

    if (!config.admin.apiToken) {
        logger.warn('ADMIN_API_TOKEN is not set; admin API is open to every caller');
    }
});

// Start cron jobs
const jobs = [
    startQueueRetryJob({ store: backend, retryQueue, maxRetries: config.queue.maxRetries }, config.queue.retryInterval),
    startDeviceStatusJob(registry, config.devices.offlineMinutes, config.devices.statusInterval),
];
logger.info('All cron jobs started');

// Graceful shutdown
function shutdown(signal: string): void {
    logger.info(`${signal} received, shutting down gracefully...`);
    for (const job of jobs) {
        job.stop();
    }
    server.close(() => process.exit(0));
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));

// Unhandled rejection handler
process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled Rejection', { reason });
});

export default app;
