import type { PunchType, PunchTypeSource, TimeWindow, UnknownCode, Weekday } from '../types';
import { deviceStatusToPunchType } from './log-parser';
import { zonedTime } from './time';

export interface Classification {
    punchType: PunchType | UnknownCode;
    source: PunchTypeSource;
}

export interface ClassifyOptions {
    /** YYYY-MM-DD used when the punch carries only a time */
    checkDate?: string;
    /** Server clock, for punches without a usable date */
    now?: Date;
    /** IANA zone giving the server's current date; host local time when unset */
    timezone?: string;
}

interface PunchMoment {
    weekday: Weekday;
    /** HH:MM */
    time: string;
}

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

export const WEEKDAY_NAMES = ['Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday', 'Sunday'];

function toWeekday(jsDay: number): Weekday {
    // Date#getDay counts from Sunday
    const weekdays: Weekday[] = [6, 0, 1, 2, 3, 4, 5];
    return weekdays[jsDay];
}

function formatLocalDate(date: Date): string {
    const month = String(date.getMonth() + 1).padStart(2, '0');
    const day = String(date.getDate()).padStart(2, '0');
    return `${date.getFullYear()}-${month}-${day}`;
}

/**
 * Day of week for a YYYY-MM-DD date, or null when it is not a real calendar date
 */
export function weekdayOf(date: string): Weekday | null {
    const match = DATE_PATTERN.exec(date.trim());
    if (!match) {
        return null;
    }
    const year = Number(match[1]);
    const month = Number(match[2]);
    const day = Number(match[3]);
    const parsed = new Date(Date.UTC(year, month - 1, day));
    if (parsed.getUTCFullYear() !== year || parsed.getUTCMonth() !== month - 1 || parsed.getUTCDate() !== day) {
        return null;
    }
    return toWeekday(parsed.getUTCDay());
}

function resolveMoment(rawDatetime: string, options: ClassifyOptions): PunchMoment | null {
    if (!rawDatetime || rawDatetime === '0' || rawDatetime.length < 5) {
        return null;
    }

    const now = options.now ?? new Date();
    const today = options.timezone ? zonedTime(now, options.timezone).date : formatLocalDate(now);
    const space = rawDatetime.indexOf(' ');
    const datePart = space === -1 ? options.checkDate ?? today : rawDatetime.slice(0, space);
    const timePart = space === -1 ? rawDatetime : rawDatetime.slice(space + 1);

    if (!timePart.includes(':')) {
        return null;
    }

    // An unreadable date falls back to today's weekday on the server clock
    const weekday = weekdayOf(datePart) ?? weekdayOf(today) ?? toWeekday(now.getDay());

    const [hours, minutes] = timePart.trim().split(':');
    return {
        weekday,
        time: `${hours.padStart(2, '0')}:${minutes.padStart(2, '0')}`,
    };
}

function appliesOn(window: TimeWindow, weekday: Weekday): boolean {
    return window.daysOfWeek.length === 0 || window.daysOfWeek.includes(weekday);
}

function containsTime(window: TimeWindow, time: string): boolean {
    const { startTime: start, endTime: end } = window;
    if (start <= end) {
        return start <= time && time <= end;
    }
    // Overnight, e.g. 22:00-06:00
    return time >= start || time <= end;
}

/**
 * Active windows in evaluation order. Equal priorities keep their given order.
 */
export function orderWindows(windows: TimeWindow[]): TimeWindow[] {
    return windows
        .filter((window) => window.active)
        .map((window, index) => ({ window, index }))
        .sort((a, b) => a.window.priority - b.window.priority || a.index - b.index)
        .map(({ window }) => window);
}

/**
 * First active window, by ascending priority, that covers the punch's weekday
 * and time of day. Seconds are ignored.
 */
export function matchTimeWindow(
    rawDatetime: string,
    windows: TimeWindow[],
    options: ClassifyOptions = {}
): TimeWindow | null {
    const moment = resolveMoment(rawDatetime, options);
    if (!moment) {
        return null;
    }

    for (const window of orderWindows(windows)) {
        if (!appliesOn(window, moment.weekday)) {
            continue;
        }
        if (containsTime(window, moment.time)) {
            return window;
        }
    }
    return null;
}

/**
 * Final punch type for a terminal punch: the matching time window when
 * automatic mode is on, otherwise the type the terminal's status code implies.
 */
export function classify(
    rawDatetime: string,
    fallbackDeviceStatus: string | undefined,
    isAutoModeEnabled: boolean,
    activeWindows: TimeWindow[],
    options: ClassifyOptions = {}
): Classification {
    const fallback: Classification = {
        punchType: deviceStatusToPunchType(fallbackDeviceStatus),
        source: 'DEVICE_STATUS',
    };

    if (!isAutoModeEnabled) {
        return fallback;
    }

    const window = matchTimeWindow(rawDatetime, activeWindows, options);
    return window ? { punchType: window.punchType, source: 'TIME_WINDOW' } : fallback;
}

export interface WindowOverlap {
    /** Evaluated first, so it wins the shared minutes */
    first: TimeWindow;
    second: TimeWindow;
    days: Weekday[];
}

function toMinutes(time: string): number {
    const [hours, minutes] = time.split(':');
    return Number(hours) * 60 + Number(minutes);
}

// Inclusive minute ranges within one day
function minuteRanges(window: TimeWindow): Array<[number, number]> {
    const start = toMinutes(window.startTime);
    const end = toMinutes(window.endTime);
    return start <= end ? [[start, end]] : [[start, 24 * 60 - 1], [0, end]];
}

function sharedDays(a: TimeWindow, b: TimeWindow): Weekday[] {
    const all: Weekday[] = [0, 1, 2, 3, 4, 5, 6];
    return all.filter((day) => appliesOn(a, day) && appliesOn(b, day));
}

/**
 * Pairs of active windows that can both match the same punch. Matching stays
 * first-wins by priority; this only reports where that tie-break decides.
 */
export function findOverlappingWindows(windows: TimeWindow[]): WindowOverlap[] {
    const ordered = orderWindows(windows);
    const overlaps: WindowOverlap[] = [];

    for (let i = 0; i < ordered.length; i++) {
        for (let j = i + 1; j < ordered.length; j++) {
            const first = ordered[i];
            const second = ordered[j];
            const days = sharedDays(first, second);
            if (days.length === 0) {
                continue;
            }
            const intersects = minuteRanges(first).some(([aStart, aEnd]) =>
                minuteRanges(second).some(([bStart, bEnd]) => aStart <= bEnd && bStart <= aEnd)
            );
            if (intersects) {
                overlaps.push({ first, second, days });
            }
        }
    }

    return overlaps;
}
