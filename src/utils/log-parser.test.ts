import { describe, expect, it } from 'vitest';
import {
    bodyLines,
    deviceStatusToPunchType,
    parseAttendanceLine,
    parseUserLine,
    verifyMethodLabel,
} from './log-parser';

describe('parseAttendanceLine', () => {
    it('reads positional lines in PIN, DateTime, Status, Verified order', () => {
        const result = parseAttendanceLine('7\t2025-01-15 09:05:00\t0\t1');

        expect(result).toEqual({
            ok: true,
            record: {
                pin: '7',
                dateTime: '2025-01-15 09:05:00',
                status: '0',
                verified: '1',
                workCode: undefined,
                verifyMethod: 'FINGERPRINT',
                extra: {},
                rawLine: '7\t2025-01-15 09:05:00\t0\t1',
            },
        });
        expect(deviceStatusToPunchType('0')).toBe('CHECK_IN');
    });

    it('takes the fifth positional field as the work code and ignores reserved fields', () => {
        const result = parseAttendanceLine('12\t2025-01-15 18:02:11\t1\t4\t3\t0\t0\t0\t0\t0');

        expect(result.ok).toBe(true);
        if (result.ok) {
            expect(result.record.workCode).toBe('3');
            expect(result.record.status).toBe('1');
            expect(result.record.verifyMethod).toBe('FACE');
        }
    });

    it('reads key=value lines', () => {
        const result = parseAttendanceLine('PIN=7\tDateTime=2025-01-15 09:05:00\tVerified=4');

        expect(result.ok).toBe(true);
        if (result.ok) {
            expect(result.record.pin).toBe('7');
            expect(result.record.dateTime).toBe('2025-01-15 09:05:00');
            expect(result.record.status).toBeUndefined();
            expect(result.record.verifyMethod).toBe('FACE');
        }
    });

    it('keeps unknown keys and splits each field on its first equals sign', () => {
        const result = parseAttendanceLine('PIN=9\tDateTime=2025-01-15 09:05:00\tMaskFlag=1\tNote=a=b');

        expect(result.ok).toBe(true);
        if (result.ok) {
            expect(result.record.extra).toEqual({ MaskFlag: '1', Note: 'a=b' });
        }
    });

    it('rejects positional lines with fewer than four fields', () => {
        expect(parseAttendanceLine('7\t2025-01-15 09:05:00')).toEqual({
            ok: false,
            reason: 'expected at least 4 tab-separated fields, got 2',
            rawLine: '7\t2025-01-15 09:05:00',
        });
    });

    it('rejects key=value lines without a PIN', () => {
        const result = parseAttendanceLine('DateTime=2025-01-15 09:05:00\tVerified=1');

        expect(result.ok).toBe(false);
        if (!result.ok) {
            expect(result.reason).toBe('missing PIN field');
        }
    });

    it('rejects operation log lines pushed as attendance', () => {
        const result = parseAttendanceLine('OPLOG 4\t0\t2025-01-15 09:05:00\t0\t0\t0\t0');

        expect(result.ok).toBe(false);
    });
});

describe('verifyMethodLabel', () => {
    it('maps the known verification codes', () => {
        expect(verifyMethodLabel('0')).toBe('PASSWORD');
        expect(verifyMethodLabel('1')).toBe('FINGERPRINT');
        expect(verifyMethodLabel('2')).toBe('CARD');
        expect(verifyMethodLabel('3')).toBe('CARD');
        expect(verifyMethodLabel('4')).toBe('FACE');
        expect(verifyMethodLabel('15')).toBe('PALM');
    });

    it('labels other codes instead of dropping them', () => {
        expect(verifyMethodLabel('9')).toBe('UNKNOWN(9)');
    });
});

describe('deviceStatusToPunchType', () => {
    it('maps terminal status codes', () => {
        expect(deviceStatusToPunchType('1')).toBe('CHECK_OUT');
        expect(deviceStatusToPunchType('2')).toBe('BREAK_OUT');
        expect(deviceStatusToPunchType('3')).toBe('BREAK_IN');
        expect(deviceStatusToPunchType('4')).toBe('OVERTIME_IN');
        expect(deviceStatusToPunchType('5')).toBe('OVERTIME_OUT');
    });

    it('treats a missing status as check-in and labels unknown ones', () => {
        expect(deviceStatusToPunchType(undefined)).toBe('CHECK_IN');
        expect(deviceStatusToPunchType('255')).toBe('UNKNOWN(255)');
    });
});

describe('parseUserLine', () => {
    it('adds a privilege label', () => {
        expect(parseUserLine('PIN=1001\tName=Jane Roe\tPrivilege=14\tCard=555')).toEqual({
            fields: { PIN: '1001', Name: 'Jane Roe', Privilege: '14', Card: '555' },
            privilegeName: 'ADMIN',
        });
    });
});

describe('bodyLines', () => {
    it('drops blank lines and carriage returns', () => {
        expect(bodyLines('a\r\n\r\n   \nb\n')).toEqual(['a', 'b']);
    });
});
