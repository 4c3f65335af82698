import { describe, expect, it } from 'vitest';
import { InvalidDeviceError, QueueCapacityError } from '../utils/errors';
import { DeviceRegistryService } from './device-registry.service';

function clock(start: number) {
    let current = start;
    return {
        now: () => new Date(current),
        advance: (ms: number) => {
            current += ms;
        },
    };
}

describe('DeviceRegistryService', () => {
    it('hands out commands in the order they were queued, once each', () => {
        const registry = new DeviceRegistryService({ maxPendingCommands: 10 });
        registry.enqueueCommand('SN1', 'A');
        registry.enqueueCommand('SN1', 'B');

        expect(registry.dequeueCommand('SN1')?.command).toBe('A');
        expect(registry.dequeueCommand('SN1')?.command).toBe('B');
        expect(registry.dequeueCommand('SN1')).toBeUndefined();
    });

    it('keeps queues of different devices apart', () => {
        const registry = new DeviceRegistryService({ maxPendingCommands: 10 });
        registry.enqueueCommand('SN1', 'A');

        expect(registry.dequeueCommand('SN2')).toBeUndefined();
        expect(registry.dequeueCommand('SN1')?.command).toBe('A');
    });

    it('creates one entry per serial number and refreshes it on later requests', () => {
        const time = clock(Date.UTC(2025, 0, 15, 9, 0, 0));
        const registry = new DeviceRegistryService({ maxPendingCommands: 10, now: time.now });

        registry.touch('SN1', '', 'registry', 'cdata');
        time.advance(60_000);
        registry.touch('SN1', 'ATTLOG', '', 'cdata');

        expect(registry.size).toBe(1);
        expect(registry.getDevice('SN1')).toEqual({
            serialNumber: 'SN1',
            status: 'online',
            firstSeen: new Date(Date.UTC(2025, 0, 15, 9, 0, 0)),
            lastSeen: new Date(Date.UTC(2025, 0, 15, 9, 1, 0)),
            lastTable: 'ATTLOG',
            lastCommand: '',
            lastPath: 'cdata',
        });
    });

    it('ignores requests without a serial number', () => {
        const registry = new DeviceRegistryService({ maxPendingCommands: 10 });

        expect(registry.touch('UNKNOWN', '', '')).toBeUndefined();
        expect(registry.touch('', '', '')).toBeUndefined();
        expect(registry.size).toBe(0);
    });

    it('returns copies that do not change the registry', () => {
        const registry = new DeviceRegistryService({ maxPendingCommands: 10 });
        const device = registry.touch('SN1', '', '');
        if (device) {
            device.status = 'offline';
        }

        expect(registry.getDevice('SN1')?.status).toBe('online');
    });

    it('lists the most recently seen device first', () => {
        const time = clock(Date.UTC(2025, 0, 15, 9, 0, 0));
        const registry = new DeviceRegistryService({ maxPendingCommands: 10, now: time.now });

        registry.touch('SN1', '', '');
        time.advance(1000);
        registry.touch('SN2', '', '');
        time.advance(1000);
        registry.touch('SN3', '', '');
        time.advance(1000);
        registry.touch('SN1', '', '');

        expect(registry.listDevices().map((device) => device.serialNumber)).toEqual(['SN1', 'SN3', 'SN2']);
    });

    it('rejects commands once a queue is full', () => {
        const registry = new DeviceRegistryService({ maxPendingCommands: 2 });
        registry.enqueueCommand('SN1', 'A');
        registry.enqueueCommand('SN1', 'B');

        expect(() => registry.enqueueCommand('SN1', 'C')).toThrow(QueueCapacityError);
        expect(registry.peekPendingCommands('SN1').map((command) => command.command)).toEqual(['A', 'B']);
    });

    it('refuses commands for terminals without a serial number', () => {
        const registry = new DeviceRegistryService({ maxPendingCommands: 10 });

        expect(() => registry.enqueueCommand('UNKNOWN', 'A')).toThrow(InvalidDeviceError);
        expect(() => registry.enqueueCommand('', 'A')).toThrow(InvalidDeviceError);
        expect(registry.allPendingCommands()).toEqual({});
    });

    it('peeks without consuming', () => {
        const registry = new DeviceRegistryService({ maxPendingCommands: 10 });
        registry.enqueueCommand('SN1', 'A');

        expect(registry.peekPendingCommands('SN1')).toHaveLength(1);
        expect(registry.peekPendingCommands('SN1')).toHaveLength(1);
        expect(registry.dequeueCommand('SN1')?.command).toBe('A');
        expect(registry.peekPendingCommands('SN1')).toEqual([]);
    });

    it('lists pending commands per device and drops drained queues', () => {
        const registry = new DeviceRegistryService({ maxPendingCommands: 10 });
        registry.enqueueCommand('SN1', 'A');
        registry.enqueueCommand('SN2', 'B');
        registry.dequeueCommand('SN2');

        expect(Object.keys(registry.allPendingCommands())).toEqual(['SN1']);
        expect(registry.allPendingCommands().SN1[0].command).toBe('A');
    });

    it('marks devices silent past the cutoff as offline and reports them once', () => {
        const time = clock(Date.UTC(2025, 0, 15, 9, 0, 0));
        const registry = new DeviceRegistryService({ maxPendingCommands: 10, now: time.now });

        registry.touch('SN1', '', '');
        time.advance(4 * 60_000);
        registry.touch('SN2', '', '');
        time.advance(2 * 60_000);

        expect(registry.markOffline(5 * 60_000)).toEqual(['SN1']);
        expect(registry.markOffline(5 * 60_000)).toEqual([]);
        expect(registry.getDevice('SN1')?.status).toBe('offline');
        expect(registry.getDevice('SN2')?.status).toBe('online');

        registry.touch('SN1', '', '');
        expect(registry.getDevice('SN1')?.status).toBe('online');
    });
});
