import cron, { ScheduledTask } from 'node-cron';
import type { DeviceRegistryService } from '../services/device-registry.service';
import logger from '../utils/logger';

/**
 * Mark terminals that stopped polling as offline
 */
export function markSilentDevices(registry: DeviceRegistryService, offlineMinutes: number): string[] {
    const changed = registry.markOffline(offlineMinutes * 60 * 1000);
    if (changed.length > 0) {
        logger.warn(`[CRON] ${changed.length} device(s) went offline`, { devices: changed });
    }
    return changed;
}

/**
 * Start device status cron job
 */
export function startDeviceStatusJob(
    registry: DeviceRegistryService,
    offlineMinutes: number,
    interval: number
): ScheduledTask {
    const schedule = `*/${interval} * * * *`; // Every N minutes

    const task = cron.schedule(schedule, () => {
        markSilentDevices(registry, offlineMinutes);
    });
    logger.info(`Device status job scheduled (every ${interval} minutes, offline after ${offlineMinutes} minutes)`);
    return task;
}
