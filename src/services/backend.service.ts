import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import type { AttendanceStore, PunchEvent, TimeWindow, Weekday } from '../types';
import { punchTypeSchema } from '../types/schemas';
import { findOverlappingWindows } from '../utils/punch-classifier';
import { punchKey } from '../utils/punch-keys';
import logger, { errorMessage } from '../utils/logger';

export interface BackendOptions {
    url: string;
    apiToken?: string;
    email?: string;
    password?: string;
    timeoutMs: number;
    cacheSeconds: number;
    /** Preconfigured client, e.g. with a custom adapter */
    client?: AxiosInstance;
    now?: () => number;
}

const AUTO_PUNCH_SETTING = 'auto_punch_type_enabled';

const weekdaySchema = z.union([
    z.literal(0),
    z.literal(1),
    z.literal(2),
    z.literal(3),
    z.literal(4),
    z.literal(5),
    z.literal(6),
]);

const daysOfWeekSchema = z
    .union([z.string(), z.array(weekdaySchema)])
    .nullish()
    .transform((value, ctx): Weekday[] => {
        if (value === null || value === undefined) {
            return [];
        }
        if (Array.isArray(value)) {
            return value;
        }
        const days: Weekday[] = [];
        for (const part of value.split(',')) {
            if (!part.trim()) {
                continue;
            }
            const parsed = weekdaySchema.safeParse(Number(part.trim()));
            if (!parsed.success) {
                ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid weekday "${part}"` });
                return z.NEVER;
            }
            days.push(parsed.data);
        }
        return days;
    });

// The backend stores times as HH:mm:ss.SSS; windows compare on HH:MM
const timeOfDaySchema = z
    .string()
    .regex(/^\d{2}:\d{2}/, 'Expected HH:MM')
    .transform((value) => value.slice(0, 5));

const timeWindowEntrySchema = z.object({
    id: z.number(),
    attributes: z.object({
        punchType: punchTypeSchema,
        startTime: timeOfDaySchema,
        endTime: timeOfDaySchema,
        daysOfWeek: daysOfWeekSchema,
        priority: z.number().int().nullish(),
        active: z.boolean().nullish(),
        description: z.string().nullish(),
    }),
});

const collectionSchema = z.object({
    data: z.array(z.unknown()).nullish(),
});

const settingEntrySchema = z.object({
    id: z.number(),
    attributes: z.object({
        key: z.string(),
        value: z.string().nullish(),
    }),
});

const loginResponseSchema = z.object({
    jwt: z.string(),
});

interface Cached<T> {
    value: T;
    fetchedAt: number;
}

/**
 * Attendance store backed by a Strapi-style REST backend
 */
export class BackendService implements AttendanceStore {
    private client: AxiosInstance;
    private jwt: string | null = null;
    private authenticating: Promise<void> | null = null;
    private windowsCache: Cached<TimeWindow[]> | null = null;
    private autoCache: Cached<boolean> | null = null;
    private reportedOverlaps = '';
    private readonly now: () => number;

    constructor(private readonly options: BackendOptions) {
        this.client =
            options.client ??
            axios.create({
                baseURL: options.url,
                timeout: options.timeoutMs,
            });
        this.now = options.now ?? Date.now;
    }

    /**
     * Authenticate with the backend
     */
    async authenticate(): Promise<void> {
        try {
            if (this.options.apiToken) {
                // Use API token
                this.jwt = this.options.apiToken;
                logger.info('Authenticated with backend using API token');
            } else if (this.options.email && this.options.password) {
                // Use email/password
                const response = await this.client.post('/api/auth/local', {
                    identifier: this.options.email,
                    password: this.options.password,
                });
                this.jwt = loginResponseSchema.parse(response.data).jwt;
                logger.info('Authenticated with backend using email/password');
            } else {
                // Open backend, nothing to send
                this.jwt = '';
                return;
            }
            this.client.defaults.headers.common['Authorization'] = `Bearer ${this.jwt}`;
        } catch (error) {
            logger.error('Backend authentication failed', { error: errorMessage(error) });
            throw new Error(`Backend authentication failed: ${errorMessage(error)}`);
        }
    }

    // Concurrent callers share one login
    private async ensureAuthenticated(): Promise<void> {
        if (this.jwt !== null) {
            return;
        }
        if (!this.authenticating) {
            this.authenticating = this.authenticate().finally(() => {
                this.authenticating = null;
            });
        }
        await this.authenticating;
    }

    /**
     * Test connection to the backend
     */
    async testConnection(): Promise<boolean> {
        try {
            await this.ensureAuthenticated();
            const response = await this.client.get('/api/punch-time-windows', {
                params: { 'pagination[pageSize]': 1 },
            });
            return response.status === 200;
        } catch (error) {
            logger.error('Backend connection failed', { error: errorMessage(error) });
            throw new Error(`Backend connection failed: ${errorMessage(error)}`);
        }
    }

    /**
     * Create attendance log record. The backend keeps `dedupeKey` unique and
     * answers 409 for a punch it already holds, which counts as stored.
     */
    async append(event: PunchEvent): Promise<void> {
        await this.ensureAuthenticated();
        try {
            await this.client.post('/api/attendance-logs', {
                data: {
                    dedupeKey: punchKey(event.deviceSn, event),
                    pin: event.pin,
                    deviceSn: event.deviceSn,
                    punchTime: event.dateTime ? event.dateTime.replace(' ', 'T') : event.receivedAt,
                    punchType: event.punchType,
                    punchTypeSource: event.punchTypeSource,
                    devicePunchType: event.devicePunchType,
                    verifyMethod: event.verifyMethod ?? null,
                    workCode: event.workCode ?? null,
                    receivedAt: event.receivedAt,
                    rawData: event.rawLine,
                    extra: event.extra,
                },
            });
        } catch (error) {
            if (axios.isAxiosError(error) && error.response?.status === 409) {
                logger.info(`Attendance log for PIN ${event.pin} already stored`, { deviceSn: event.deviceSn });
                return;
            }
            throw error;
        }
        logger.info(`Attendance log saved for PIN ${event.pin}`, { deviceSn: event.deviceSn });
    }

    async isAutoClassificationEnabled(): Promise<boolean> {
        return this.cached(
            () => this.autoCache,
            (value) => (this.autoCache = value),
            () => this.fetchAutoSetting()
        );
    }

    async getActiveTimeWindows(): Promise<TimeWindow[]> {
        return this.cached(
            () => this.windowsCache,
            (value) => (this.windowsCache = value),
            () => this.fetchActiveWindows()
        );
    }

    private async cached<T>(
        read: () => Cached<T> | null,
        write: (value: Cached<T>) => void,
        fetch: () => Promise<T>
    ): Promise<T> {
        const current = read();
        if (current && this.now() - current.fetchedAt < this.options.cacheSeconds * 1000) {
            return current.value;
        }

        try {
            const value = await fetch();
            write({ value, fetchedAt: this.now() });
            return value;
        } catch (error) {
            if (current) {
                logger.warn('Backend refresh failed, serving cached value', { error: errorMessage(error) });
                return current.value;
            }
            throw error;
        }
    }

    private async fetchAutoSetting(): Promise<boolean> {
        await this.ensureAuthenticated();
        const response = await this.client.get('/api/system-settings', {
            params: { 'filters[key][$eq]': AUTO_PUNCH_SETTING },
        });
        const entries = collectionSchema.parse(response.data).data ?? [];
        const setting = entries.length > 0 ? settingEntrySchema.parse(entries[0]) : null;
        return setting?.attributes.value?.toLowerCase() === 'true';
    }

    private async fetchActiveWindows(): Promise<TimeWindow[]> {
        await this.ensureAuthenticated();
        const response = await this.client.get('/api/punch-time-windows', {
            params: {
                'filters[active][$eq]': true,
                'sort': 'priority:asc',
                'pagination[pageSize]': 100,
            },
        });

        const windows: TimeWindow[] = [];
        for (const entry of collectionSchema.parse(response.data).data ?? []) {
            const parsed = timeWindowEntrySchema.safeParse(entry);
            if (!parsed.success) {
                logger.warn('Skipping invalid time window from backend', { issues: parsed.error.issues });
                continue;
            }
            const { id, attributes } = parsed.data;
            windows.push({
                id,
                punchType: attributes.punchType,
                startTime: attributes.startTime,
                endTime: attributes.endTime,
                daysOfWeek: attributes.daysOfWeek,
                priority: attributes.priority ?? 0,
                active: attributes.active ?? true,
                description: attributes.description ?? undefined,
            });
        }

        this.reportOverlaps(windows);

        logger.info(`Retrieved ${windows.length} active time windows from backend`);
        return windows;
    }

    // Warn once per distinct set of overlaps, not on every cache refresh
    private reportOverlaps(windows: TimeWindow[]): void {
        const overlaps = findOverlappingWindows(windows);
        const key = overlaps.map(({ first, second }) => `${first.id}/${second.id}`).join(',');
        if (key === this.reportedOverlaps) {
            return;
        }
        this.reportedOverlaps = key;
        for (const { first, second, days } of overlaps) {
            logger.warn(`Time windows ${first.id} and ${second.id} overlap; window ${first.id} wins`, { days });
        }
    }
}
