import type { AttendanceRecord, PunchType, UnknownCode } from '../types';

export type ParseResult =
    | { ok: true; record: AttendanceRecord }
    | { ok: false; reason: string; rawLine: string };

const VERIFY_METHODS: Record<string, string> = {
    '0': 'PASSWORD',
    '1': 'FINGERPRINT',
    '2': 'CARD',
    '3': 'CARD',
    '4': 'FACE',
    '15': 'PALM',
};

const DEVICE_STATUS_TYPES: Record<string, PunchType> = {
    '0': 'CHECK_IN',
    '1': 'CHECK_OUT',
    '2': 'BREAK_OUT',
    '3': 'BREAK_IN',
    '4': 'OVERTIME_IN',
    '5': 'OVERTIME_OUT',
};

const PRIVILEGES: Record<string, string> = {
    '0': 'USER',
    '14': 'ADMIN',
};

const KNOWN_KEYS = new Set(['PIN', 'DateTime', 'Status', 'Verified', 'WorkCode']);

/**
 * Human-readable verification method for a terminal's Verified code
 */
export function verifyMethodLabel(code: string): string {
    return VERIFY_METHODS[code] ?? `UNKNOWN(${code})`;
}

/**
 * Punch type a terminal suggests through its Status code.
 * Terminals that omit Status are treated as a check-in.
 */
export function deviceStatusToPunchType(status: string | undefined): PunchType | UnknownCode {
    if (status === undefined || status === '') {
        return 'CHECK_IN';
    }
    return DEVICE_STATUS_TYPES[status] ?? `UNKNOWN(${status})`;
}

/**
 * Split tab-separated `key=value` segments on the first `=`.
 * Segments without `=` are dropped.
 */
export function parseKeyValueFields(line: string): Record<string, string> {
    const fields: Record<string, string> = {};
    for (const part of line.split('\t')) {
        const separator = part.indexOf('=');
        if (separator === -1) {
            continue;
        }
        fields[part.slice(0, separator).trim()] = part.slice(separator + 1).trim();
    }
    return fields;
}

function parseKeyValueLine(line: string): ParseResult {
    const fields = parseKeyValueFields(line);
    const extra: Record<string, string> = {};
    for (const [key, value] of Object.entries(fields)) {
        if (!KNOWN_KEYS.has(key)) {
            extra[key] = value;
        }
    }

    const pin = fields.PIN;
    if (!pin) {
        return { ok: false, reason: 'missing PIN field', rawLine: line };
    }

    return {
        ok: true,
        record: {
            pin,
            dateTime: fields.DateTime ?? '',
            status: fields.Status,
            verified: fields.Verified,
            workCode: fields.WorkCode,
            extra,
            rawLine: line,
        },
    };
}

// PIN, DateTime, Status, Verified, WorkCode, then reserved fields
function parsePositionalLine(line: string): ParseResult {
    const parts = line.split('\t').map((part) => part.trim());
    if (parts.length < 4) {
        return {
            ok: false,
            reason: `expected at least 4 tab-separated fields, got ${parts.length}`,
            rawLine: line,
        };
    }

    const [pin, dateTime, status, verified, workCode] = parts;
    return {
        ok: true,
        record: {
            pin,
            dateTime,
            status,
            verified,
            workCode,
            extra: {},
            rawLine: line,
        },
    };
}

/**
 * Decode one ATTLOG line. Lines containing `=` are read as key=value pairs,
 * anything else as positional fields.
 */
export function parseAttendanceLine(line: string): ParseResult {
    if (line.trimStart().startsWith('OPLOG')) {
        return { ok: false, reason: 'operation log line in attendance data', rawLine: line };
    }

    const result = line.includes('=') ? parseKeyValueLine(line) : parsePositionalLine(line);
    if (result.ok && result.record.verified !== undefined) {
        result.record.verifyMethod = verifyMethodLabel(result.record.verified);
    }
    return result;
}

export interface UserLine {
    fields: Record<string, string>;
    privilegeName?: string;
}

/**
 * Decode one USER line (`PIN=1001\tName=...\tPrivilege=0\tCard=...`)
 */
export function parseUserLine(line: string): UserLine {
    const fields = parseKeyValueFields(line);
    const privilege = fields.Privilege;
    return {
        fields,
        privilegeName: privilege === undefined ? undefined : PRIVILEGES[privilege] ?? `UNKNOWN(${privilege})`,
    };
}

/**
 * Non-blank lines of a push body, in order
 */
export function bodyLines(body: string): string[] {
    return body.split(/\r?\n/).filter((line) => line.trim() !== '');
}
