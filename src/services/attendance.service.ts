import type { AttendanceRecord, AttendanceStore, PunchEvent, TimeWindow } from '../types';
import { withTimeout } from '../utils/deadline';
import { bodyLines, deviceStatusToPunchType, parseAttendanceLine } from '../utils/log-parser';
import { classify } from '../utils/punch-classifier';
import { punchKey, RecentKeys } from '../utils/punch-keys';
import { RingBuffer } from '../utils/ring-buffer';
import logger, { errorMessage } from '../utils/logger';

export interface RetryQueue {
    enqueue(event: PunchEvent): Promise<string>;
}

export interface AttendanceServiceOptions {
    recentLimit: number;
    /** Receives events the store rejected or had no time left for */
    retryQueue?: RetryQueue;
    /** Upper bound on store calls for one ATTLOG batch */
    batchTimeoutMs?: number;
    /** How many recently handled punch keys are remembered for duplicate detection */
    dedupeLimit?: number;
    /** Zone of the terminals' clocks, for punches without a usable date */
    timezone?: string;
    now?: () => Date;
}

export interface IngestResult {
    total: number;
    stored: number;
    queued: number;
    failed: number;
    duplicates: number;
    events: PunchEvent[];
}

type PersistOutcome = 'stored' | 'queued' | 'failed';

interface ClassificationSettings {
    autoEnabled: boolean;
    windows: TimeWindow[];
}

const DEFAULT_BATCH_TIMEOUT_MS = 5000;
const DEFAULT_DEDUPE_LIMIT = 10000;

/**
 * Turns ATTLOG push bodies into classified punch events and appends them to the store
 */
export class AttendanceService {
    private readonly recentEvents: RingBuffer<PunchEvent>;
    private readonly handledKeys: RecentKeys;
    private readonly retryQueue?: RetryQueue;
    private readonly batchTimeoutMs: number;
    private readonly timezone?: string;
    private readonly now: () => Date;

    constructor(
        private readonly store: AttendanceStore,
        options: AttendanceServiceOptions
    ) {
        this.recentEvents = new RingBuffer(options.recentLimit);
        this.handledKeys = new RecentKeys(options.dedupeLimit ?? DEFAULT_DEDUPE_LIMIT);
        this.retryQueue = options.retryQueue;
        this.batchTimeoutMs = options.batchTimeoutMs ?? DEFAULT_BATCH_TIMEOUT_MS;
        this.timezone = options.timezone;
        this.now = options.now ?? (() => new Date());
    }

    /**
     * Auto mode and active windows for one batch. Without them every punch
     * keeps the type its terminal reported.
     */
    async loadClassificationSettings(timeoutMs = this.batchTimeoutMs): Promise<ClassificationSettings> {
        try {
            const [autoEnabled, windows] = await withTimeout(
                Promise.all([this.store.isAutoClassificationEnabled(), this.store.getActiveTimeWindows()]),
                timeoutMs
            );
            return { autoEnabled, windows };
        } catch (error) {
            logger.error('[ADMS] Could not load time windows, using device status', { error: errorMessage(error) });
            return { autoEnabled: false, windows: [] };
        }
    }

    /**
     * Process every non-blank line of an ATTLOG body in order. A bad line is
     * logged and skipped; the rest of the batch still goes through.
     *
     * Store calls share one deadline. Once the store fails or the deadline
     * passes, the remaining punches go straight to the retry queue.
     * Punches already stored or queued recently are skipped.
     */
    async ingest(deviceSn: string, body: string): Promise<IngestResult> {
        const lines = bodyLines(body);
        const result: IngestResult = {
            total: lines.length,
            stored: 0,
            queued: 0,
            failed: 0,
            duplicates: 0,
            events: [],
        };
        if (lines.length === 0) {
            return result;
        }

        const deadline = Date.now() + this.batchTimeoutMs;
        const settings = await this.loadClassificationSettings();
        let storeAvailable = true;

        for (const line of lines) {
            try {
                const parsed = parseAttendanceLine(line);
                if (!parsed.ok) {
                    result.failed++;
                    logger.warn('[ADMS] Skipping unparseable ATTLOG line', {
                        deviceSn,
                        reason: parsed.reason,
                        line,
                    });
                    continue;
                }

                const key = punchKey(deviceSn, parsed.record);
                if (this.handledKeys.has(key)) {
                    result.duplicates++;
                    logger.info('[ADMS] Skipping duplicate punch', { deviceSn, pin: parsed.record.pin });
                    continue;
                }
                // Claimed before the first await so a concurrent re-push skips it
                this.handledKeys.add(key);

                const event = this.toPunchEvent(deviceSn, parsed.record, settings);
                this.recentEvents.push(event);
                result.events.push(event);

                const remainingMs = storeAvailable ? deadline - Date.now() : 0;
                const outcome = await this.persist(event, remainingMs);
                if (outcome !== 'stored') {
                    storeAvailable = false;
                }
                if (outcome === 'failed') {
                    this.handledKeys.delete(key);
                }
                result[outcome]++;
            } catch (error) {
                result.failed++;
                logger.error('[ADMS] Failed to process ATTLOG line', { deviceSn, line, error: errorMessage(error) });
            }
        }

        logger.info(`[ADMS] ATTLOG batch from ${deviceSn} processed`, {
            total: result.total,
            stored: result.stored,
            queued: result.queued,
            failed: result.failed,
            duplicates: result.duplicates,
        });
        return result;
    }

    private toPunchEvent(deviceSn: string, record: AttendanceRecord, settings: ClassificationSettings): PunchEvent {
        const receivedAt = this.now();
        const { punchType, source } = classify(record.dateTime, record.status, settings.autoEnabled, settings.windows, {
            now: receivedAt,
            timezone: this.timezone,
        });

        logger.debug(`[ADMS] PIN ${record.pin} classified as ${punchType}`, { source, dateTime: record.dateTime });

        return {
            ...record,
            deviceSn,
            receivedAt: receivedAt.toISOString(),
            devicePunchType: deviceStatusToPunchType(record.status),
            punchType,
            punchTypeSource: source,
        };
    }

    private async persist(event: PunchEvent, remainingMs: number): Promise<PersistOutcome> {
        if (remainingMs > 0) {
            try {
                await withTimeout(this.store.append(event), remainingMs);
                return 'stored';
            } catch (error) {
                logger.error('[ADMS] Attendance store rejected punch', {
                    pin: event.pin,
                    deviceSn: event.deviceSn,
                    error: errorMessage(error),
                });
            }
        }

        if (!this.retryQueue) {
            return 'failed';
        }

        try {
            await this.retryQueue.enqueue(event);
            return 'queued';
        } catch (error) {
            logger.error('[ADMS] Failed to queue punch for retry', { pin: event.pin, error: errorMessage(error) });
            return 'failed';
        }
    }

    /**
     * Most recent punch events, oldest first
     */
    recent(limit?: number): PunchEvent[] {
        return this.recentEvents.toArray(limit);
    }

    clearRecent(): number {
        return this.recentEvents.clear();
    }
}
