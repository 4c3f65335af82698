import cron, { ScheduledTask } from 'node-cron';
import type { QueueService } from '../services/queue.service';
import type { AttendanceStore } from '../types';
import logger, { errorMessage } from '../utils/logger';

export interface QueueRetryDeps {
    store: AttendanceStore;
    retryQueue: QueueService;
    maxRetries: number;
}

// Runs in progress per queue; a run still going when the next tick fires is joined, not repeated
const runsInFlight = new WeakMap<QueueService, Promise<void>>();

/**
 * Retry queued punches. Calls overlapping a run on the same queue share that run.
 */
export function retryQueue(deps: QueueRetryDeps): Promise<void> {
    const running = runsInFlight.get(deps.retryQueue);
    if (running) {
        logger.info('[CRON] Queue retry still running, skipping this tick');
        return running;
    }

    const run = drainQueue(deps).finally(() => {
        runsInFlight.delete(deps.retryQueue);
    });
    runsInFlight.set(deps.retryQueue, run);
    return run;
}

async function drainQueue({ store, retryQueue: queue, maxRetries }: QueueRetryDeps): Promise<void> {
    try {
        const items = await queue.getAll();

        if (items.length === 0) {
            return;
        }

        logger.info(`[CRON] Processing ${items.length} queued items...`);

        let successful = 0;
        let failed = 0;

        for (const item of items) {
            try {
                await store.append(item.data);
                await queue.dequeue(item.id);
                successful++;
                logger.info('[CRON] Queued attendance processed', { id: item.id });
            } catch (error) {
                const newRetries = item.retries + 1;

                // Remove from queue after too many failed retries
                if (newRetries >= maxRetries) {
                    await queue.dequeue(item.id);
                    logger.error(`[CRON] Queued item removed after ${maxRetries} retries`, {
                        id: item.id,
                        pin: item.data.pin,
                        error: errorMessage(error),
                    });
                } else {
                    await queue.updateRetries(item.id, newRetries);
                }

                failed++;
            }
        }

        logger.info('[CRON] Queue retry job completed', { successful, failed });
    } catch (error) {
        logger.error('[CRON] Queue retry job failed', { error: errorMessage(error) });
    }
}

/**
 * Start queue retry cron job
 */
export function startQueueRetryJob(deps: QueueRetryDeps, interval: number): ScheduledTask {
    const schedule = `*/${interval} * * * *`; // Every N minutes

    const task = cron.schedule(schedule, () => retryQueue(deps));
    logger.info(`Queue retry job scheduled (every ${interval} minutes)`);
    return task;
}
