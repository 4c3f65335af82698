import type { Command, Device } from '../types';
import { UNKNOWN_SERIAL } from '../types';
import { InvalidDeviceError, QueueCapacityError } from '../utils/errors';
import logger from '../utils/logger';

export interface DeviceRegistryOptions {
    maxPendingCommands: number;
    now?: () => Date;
}

/**
 * Known terminals and their outbound command queues.
 *
 * Every method runs to completion on the event loop without awaiting, so a
 * push and a pop on the same queue never interleave and a command is handed
 * out at most once.
 */
export class DeviceRegistryService {
    private devices = new Map<string, Device>();
    private queues = new Map<string, Command[]>();
    private readonly maxPendingCommands: number;
    private readonly now: () => Date;

    constructor(options: DeviceRegistryOptions) {
        this.maxPendingCommands = options.maxPendingCommands;
        this.now = options.now ?? (() => new Date());
    }

    /**
     * Record a request from a terminal. Requests without a serial number are ignored.
     */
    touch(serialNumber: string, table: string, command: string, path = ''): Device | undefined {
        if (!serialNumber || serialNumber === UNKNOWN_SERIAL) {
            return undefined;
        }

        const seenAt = this.now();
        const existing = this.devices.get(serialNumber);
        if (existing) {
            existing.status = 'online';
            existing.lastSeen = seenAt;
            existing.lastTable = table;
            existing.lastCommand = command;
            existing.lastPath = path;
            return { ...existing };
        }

        const device: Device = {
            serialNumber,
            status: 'online',
            firstSeen: seenAt,
            lastSeen: seenAt,
            lastTable: table,
            lastCommand: command,
            lastPath: path,
        };
        this.devices.set(serialNumber, device);
        logger.info(`[ADMS] New device registered: ${serialNumber}`);
        return { ...device };
    }

    getDevice(serialNumber: string): Device | undefined {
        const device = this.devices.get(serialNumber);
        return device ? { ...device } : undefined;
    }

    /**
     * Snapshot of all devices, most recently seen first
     */
    listDevices(): Device[] {
        return Array.from(this.devices.values(), (device) => ({ ...device })).sort(
            (a, b) => b.lastSeen.getTime() - a.lastSeen.getTime()
        );
    }

    get size(): number {
        return this.devices.size;
    }

    /**
     * Mark devices silent for longer than `olderThanMs` as offline.
     * Returns the serial numbers whose status changed.
     */
    markOffline(olderThanMs: number): string[] {
        const cutoff = this.now().getTime() - olderThanMs;
        const changed: string[] = [];
        for (const device of this.devices.values()) {
            if (device.status === 'online' && device.lastSeen.getTime() < cutoff) {
                device.status = 'offline';
                changed.push(device.serialNumber);
            }
        }
        return changed;
    }

    enqueueCommand(serialNumber: string, commandText: string): Command {
        if (!serialNumber || serialNumber === UNKNOWN_SERIAL) {
            throw new InvalidDeviceError(serialNumber);
        }
        const queue = this.queues.get(serialNumber) ?? [];
        if (queue.length >= this.maxPendingCommands) {
            throw new QueueCapacityError(serialNumber, this.maxPendingCommands);
        }

        const command: Command = {
            deviceSn: serialNumber,
            command: commandText,
            enqueuedAt: this.now(),
        };
        queue.push(command);
        this.queues.set(serialNumber, queue);
        logger.info(`Queued command for ${serialNumber}`, { command: commandText, pending: queue.length });
        return command;
    }

    /**
     * Pop the oldest pending command; once returned it is no longer tracked
     */
    dequeueCommand(serialNumber: string): Command | undefined {
        const queue = this.queues.get(serialNumber);
        if (!queue || queue.length === 0) {
            return undefined;
        }
        const command = queue.shift();
        if (queue.length === 0) {
            this.queues.delete(serialNumber);
        }
        return command;
    }

    peekPendingCommands(serialNumber: string): Command[] {
        return (this.queues.get(serialNumber) ?? []).map((command) => ({ ...command }));
    }

    allPendingCommands(): Record<string, Command[]> {
        const pending: Record<string, Command[]> = {};
        for (const serialNumber of this.queues.keys()) {
            pending[serialNumber] = this.peekPendingCommands(serialNumber);
        }
        return pending;
    }
}
