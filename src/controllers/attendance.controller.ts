import { Request, RequestHandler, Response } from 'express';
import type { AttendanceService } from '../services/attendance.service';
import type { QueueService } from '../services/queue.service';
import type { AttendanceStore } from '../types';
import { findOverlappingWindows, matchTimeWindow, WEEKDAY_NAMES, weekdayOf } from '../utils/punch-classifier';
import { zonedTime } from '../utils/time';
import logger from '../utils/logger';
import { sendError } from './respond';

export interface AttendanceControllerDeps {
    attendance: AttendanceService;
    store: AttendanceStore;
    retryQueue: QueueService;
    timezone: string;
}

export interface AttendanceController {
    getRecentLogs: RequestHandler;
    clearRecentLogs: RequestHandler;
    getTimeWindows: RequestHandler;
    testPunchType: RequestHandler;
    getRetryQueue: RequestHandler;
}

function queryString(req: Request, key: string): string | undefined {
    const value = req.query[key];
    return typeof value === 'string' && value.trim() ? value.trim() : undefined;
}

export function createAttendanceController(deps: AttendanceControllerDeps): AttendanceController {
    const { attendance, store, retryQueue, timezone } = deps;

    return {
        /**
         * Recent punches received from terminals, newest first
         */
        getRecentLogs(req: Request, res: Response): void {
            const limit = parseInt(queryString(req, 'limit') ?? '50', 10);
            const logs = attendance.recent(isNaN(limit) || limit < 1 ? 50 : limit).reverse();
            res.json({ logs, total: logs.length, source: 'memory' });
        },

        clearRecentLogs(req: Request, res: Response): void {
            const count = attendance.clearRecent();
            logger.info(`Cleared ${count} recent logs`);
            res.json({ status: 'cleared', count });
        },

        /**
         * Active time windows, whether they are applied, and where they overlap
         */
        async getTimeWindows(req: Request, res: Response): Promise<void> {
            try {
                const [windows, autoEnabled] = await Promise.all([
                    store.getActiveTimeWindows(),
                    store.isAutoClassificationEnabled(),
                ]);
                const overlaps = findOverlappingWindows(windows).map(({ first, second, days }) => ({
                    windowIds: [first.id, second.id],
                    winner: first.id,
                    days,
                }));
                res.json({ windows, autoEnabled, overlaps });
            } catch (error) {
                sendError(res, error, 'Failed to get time windows');
            }
        },

        /**
         * Punch type a punch at `time` on `date` would get. Defaults to now.
         */
        async testPunchType(req: Request, res: Response): Promise<void> {
            try {
                const clock = new Date();
                const now = zonedTime(clock, timezone);
                const date = queryString(req, 'date') ?? now.date;
                let time = queryString(req, 'time') ?? now.time.slice(0, 5);
                if (time.split(':').length === 2) {
                    time = `${time}:00`;
                }

                const [windows, autoEnabled] = await Promise.all([
                    store.getActiveTimeWindows(),
                    store.isAutoClassificationEnabled(),
                ]);
                const window = matchTimeWindow(`${date} ${time}`, windows, { now: clock, timezone });
                // Matching falls back to today's weekday when the date is unreadable
                const dayOfWeek = weekdayOf(date) ?? weekdayOf(now.date);

                res.json({
                    inputTime: time,
                    inputDate: date,
                    dayOfWeek,
                    dayName: dayOfWeek === null ? 'Unknown' : WEEKDAY_NAMES[dayOfWeek],
                    matchedWindow: window,
                    determinedPunchType: window?.punchType ?? null,
                    autoPunchEnabled: autoEnabled,
                    wouldUse: autoEnabled && window ? window.punchType : 'DEVICE_STATUS',
                });
            } catch (error) {
                sendError(res, error, 'Failed to test punch type');
            }
        },

        /**
         * Punches waiting to be re-sent to the backend
         */
        async getRetryQueue(req: Request, res: Response): Promise<void> {
            try {
                const items = await retryQueue.getAll();
                res.json({ success: true, queueSize: items.length, items });
            } catch (error) {
                sendError(res, error, 'Failed to get queued attendance');
            }
        },
    };
}
