import type { DeviceRegistryService } from './device-registry.service';
import type { AttendanceService } from './attendance.service';
import { UNKNOWN_SERIAL } from '../types';
import { bodyLines, parseUserLine } from '../utils/log-parser';
import { RingBuffer } from '../utils/ring-buffer';
import { zonedTime } from '../utils/time';
import logger, { errorMessage } from '../utils/logger';

/** Acknowledgement terminals expect for every push and for empty polls */
export const ACK = 'OK';

export type IclockEndpoint = 'cdata' | 'getrequest' | 'devicecmd' | 'other';

export type RequestKind =
    | 'registry'
    | 'attendanceLog'
    | 'userLog'
    | 'operationLog'
    | 'options'
    | 'firstData'
    | 'poll'
    | 'commandResult'
    | 'unknown';

export interface TerminalRequest {
    endpoint: IclockEndpoint;
    /** Path below the /iclock prefix */
    path: string;
    method: string;
    serialNumber: string;
    table: string;
    command: string;
    body: string;
}

export interface RequestJournalEntry {
    time: string;
    kind: RequestKind;
    path: string;
    method: string;
    serialNumber: string;
    table: string;
    command: string;
    bodyLength: number;
    bodyPreview: string;
}

export interface ProtocolServiceOptions {
    timezone: string;
    journalLimit: number;
    now?: () => Date;
}

const PREVIEW_LENGTH = 500;

function tableKind(table: string): RequestKind {
    switch (table.toUpperCase()) {
        case 'ATTLOG':
            return 'attendanceLog';
        case 'USER':
            return 'userLog';
        case 'OPERLOG':
            return 'operationLog';
        case 'OPTIONS':
            return 'options';
        case 'FIRSTDATA':
            return 'firstData';
        default:
            return 'unknown';
    }
}

/**
 * Decide what a terminal request is asking for. Paths outside the known
 * endpoints still poll when they mention getrequest and still deliver
 * attendance when the table says ATTLOG.
 */
export function resolveRequestKind(request: TerminalRequest): RequestKind {
    switch (request.endpoint) {
        case 'getrequest':
            return 'poll';
        case 'devicecmd':
            return 'commandResult';
        case 'cdata':
            return request.command === 'registry' ? 'registry' : tableKind(request.table);
        case 'other':
            if (request.path.toLowerCase().includes('getrequest')) {
                return 'poll';
            }
            return request.table.toUpperCase() === 'ATTLOG' ? 'attendanceLog' : 'unknown';
    }
}

/**
 * Terminal-facing side of the ADMS protocol: liveness, pushes, polls and clock sync
 */
export class ProtocolService {
    private readonly journal: RingBuffer<RequestJournalEntry>;
    private readonly timezone: string;
    private readonly now: () => Date;

    constructor(
        private readonly registry: DeviceRegistryService,
        private readonly attendance: AttendanceService,
        options: ProtocolServiceOptions
    ) {
        this.journal = new RingBuffer(options.journalLimit);
        this.timezone = options.timezone;
        this.now = options.now ?? (() => new Date());
    }

    /**
     * Answer a terminal request. Always resolves with text the terminal accepts;
     * failures are only logged.
     */
    async handle(request: TerminalRequest): Promise<string> {
        const kind = resolveRequestKind(request);
        try {
            this.registry.touch(request.serialNumber, request.table, request.command, request.path);
            this.record(request, kind);
            return await this.dispatch(kind, request);
        } catch (error) {
            logger.error('[ADMS] Terminal request failed, acknowledging anyway', {
                serialNumber: request.serialNumber,
                kind,
                error: errorMessage(error),
            });
            return ACK;
        }
    }

    private async dispatch(kind: RequestKind, request: TerminalRequest): Promise<string> {
        const { serialNumber: sn } = request;

        switch (kind) {
            case 'registry':
                logger.info(`[ADMS] Device ${sn} registered`);
                return ACK;

            case 'attendanceLog':
                if (request.body.trim()) {
                    await this.attendance.ingest(sn, request.body);
                }
                return ACK;

            case 'userLog':
                for (const line of bodyLines(request.body)) {
                    logger.info(`[ADMS] User data from ${sn}`, parseUserLine(line));
                }
                return ACK;

            case 'operationLog':
                for (const line of bodyLines(request.body)) {
                    logger.info(`[ADMS] Operation log from ${sn}`, { line });
                }
                return ACK;

            case 'options':
                return this.optionsResponse(sn);

            case 'firstData':
                logger.info(`[ADMS] Device ${sn} requesting first data sync`);
                return ACK;

            case 'poll':
                return this.poll(sn);

            case 'commandResult':
                logger.info(`[ADMS] Device ${sn} command result`, { result: request.body.trim() });
                return ACK;

            case 'unknown':
                logger.info(`[ADMS] Unhandled request from ${sn}`, {
                    path: request.path,
                    table: request.table,
                    body: request.body.slice(0, PREVIEW_LENGTH),
                });
                return ACK;
        }
    }

    private poll(serialNumber: string): string {
        if (serialNumber === UNKNOWN_SERIAL) {
            return ACK;
        }
        const command = this.registry.dequeueCommand(serialNumber);
        if (!command) {
            return ACK;
        }
        logger.info(`[ADMS] Sending command to ${serialNumber}`, { command: command.command });
        return command.command;
    }

    /**
     * Clock sync block for `table=options`, read from the wall clock on every call
     */
    optionsResponse(serialNumber: string): string {
        const { formatted, timezone } = zonedTime(this.now(), this.timezone);
        logger.info(`[ADMS] Device ${serialNumber} options sync`, { serverTime: formatted, timezone });
        return `GET OPTION FROM: ${serialNumber}\r\nServerTime=${formatted}\r\nStamp=0`;
    }

    private record(request: TerminalRequest, kind: RequestKind): void {
        this.journal.push({
            time: this.now().toISOString(),
            kind,
            path: request.path,
            method: request.method,
            serialNumber: request.serialNumber,
            table: request.table,
            command: request.command,
            bodyLength: request.body.length,
            bodyPreview: request.body.slice(0, PREVIEW_LENGTH),
        });
    }

    /**
     * Most recent terminal requests, oldest first
     */
    recentRequests(limit?: number): RequestJournalEntry[] {
        return this.journal.toArray(limit);
    }
}
