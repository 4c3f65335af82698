export const PUNCH_TYPES = [
    'CHECK_IN',
    'CHECK_OUT',
    'BREAK_OUT',
    'BREAK_IN',
    'OVERTIME_IN',
    'OVERTIME_OUT',
] as const;

export type PunchType = (typeof PUNCH_TYPES)[number];

/**
 * Label for a device code outside the known tables, e.g. `UNKNOWN(7)`
 */
export type UnknownCode = `UNKNOWN(${string})`;

export type PunchTypeSource = 'TIME_WINDOW' | 'DEVICE_STATUS';

export type DeviceStatus = 'online' | 'offline';

/**
 * Serial number used when a terminal sends no SN parameter
 */
export const UNKNOWN_SERIAL = 'UNKNOWN';

export interface Device {
    serialNumber: string;
    status: DeviceStatus;
    firstSeen: Date;
    lastSeen: Date;
    lastTable: string;
    lastCommand: string;
    lastPath: string;
}

export interface Command {
    deviceSn: string;
    command: string;
    enqueuedAt: Date;
}

/** Day of week, Monday = 0 through Sunday = 6 */
export type Weekday = 0 | 1 | 2 | 3 | 4 | 5 | 6;

export interface TimeWindow {
    id: number;
    punchType: PunchType;
    /** HH:MM, inclusive */
    startTime: string;
    /** HH:MM, inclusive; earlier than startTime for overnight windows */
    endTime: string;
    /** Empty means every day */
    daysOfWeek: Weekday[];
    priority: number;
    active: boolean;
    description?: string;
}

/**
 * One ATTLOG line as decoded from the wire, before classification
 */
export interface AttendanceRecord {
    pin: string;
    dateTime: string;
    status?: string;
    verified?: string;
    workCode?: string;
    verifyMethod?: string;
    /** key=value fields with no typed counterpart */
    extra: Record<string, string>;
    rawLine: string;
}

export interface PunchEvent extends AttendanceRecord {
    deviceSn: string;
    receivedAt: string;
    devicePunchType: PunchType | UnknownCode;
    punchType: PunchType | UnknownCode;
    punchTypeSource: PunchTypeSource;
}

/**
 * Record sink and classification settings source behind the protocol handler
 */
export interface AttendanceStore {
    append(event: PunchEvent): Promise<void>;
    isAutoClassificationEnabled(): Promise<boolean>;
    getActiveTimeWindows(): Promise<TimeWindow[]>;
}

/**
 * Capability check for operator-facing routes
 */
export interface Authorizer {
    authorize(identity: string | null, permission: string): Promise<boolean>;
}
