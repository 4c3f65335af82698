import logger, { errorMessage } from './logger';

export interface ZonedTime {
    timezone: string;
    /** YYYY-MM-DD HH:MM:SS */
    formatted: string;
    date: string;
    time: string;
}

function partsIn(date: Date, timezone: string): Record<string, string> {
    const formatter = new Intl.DateTimeFormat('en-US', {
        timeZone: timezone,
        year: 'numeric',
        month: '2-digit',
        day: '2-digit',
        hour: '2-digit',
        minute: '2-digit',
        second: '2-digit',
        hourCycle: 'h23',
    });
    const parts: Record<string, string> = {};
    for (const part of formatter.formatToParts(date)) {
        parts[part.type] = part.value;
    }
    return parts;
}

/**
 * Wall-clock time of `date` in an IANA time zone. An unknown zone falls back to UTC.
 */
export function zonedTime(date: Date, timezone: string): ZonedTime {
    let zone = timezone || 'UTC';
    let parts: Record<string, string>;
    try {
        parts = partsIn(date, zone);
    } catch (error) {
        logger.warn(`Invalid time zone "${timezone}", using UTC`, { error: errorMessage(error) });
        zone = 'UTC';
        parts = partsIn(date, zone);
    }

    const day = `${parts.year}-${parts.month}-${parts.day}`;
    const time = `${parts.hour}:${parts.minute}:${parts.second}`;
    return { timezone: zone, formatted: `${day} ${time}`, date: day, time };
}
