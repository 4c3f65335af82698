import { describe, expect, it } from 'vitest';
import { zonedTime } from './time';

const INSTANT = new Date(Date.UTC(2025, 0, 15, 23, 5, 7));

describe('zonedTime', () => {
    it('formats the wall clock of the given zone', () => {
        expect(zonedTime(INSTANT, 'Asia/Kolkata')).toEqual({
            timezone: 'Asia/Kolkata',
            formatted: '2025-01-16 04:35:07',
            date: '2025-01-16',
            time: '04:35:07',
        });
    });

    it('uses two-digit hours around midnight', () => {
        expect(zonedTime(new Date(Date.UTC(2025, 0, 15, 0, 0, 0)), 'UTC').formatted).toBe('2025-01-15 00:00:00');
    });

    it('falls back to UTC for an unknown zone', () => {
        expect(zonedTime(INSTANT, 'Mars/Olympus')).toEqual({
            timezone: 'UTC',
            formatted: '2025-01-15 23:05:07',
            date: '2025-01-15',
            time: '23:05:07',
        });
    });
});
