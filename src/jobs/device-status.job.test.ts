import { describe, expect, it } from 'vitest';
import { DeviceRegistryService } from '../services/device-registry.service';
import { markSilentDevices } from './device-status.job';

describe('markSilentDevices', () => {
    it('marks devices silent for longer than the threshold', () => {
        let time = Date.UTC(2025, 0, 15, 9, 0, 0);
        const registry = new DeviceRegistryService({ maxPendingCommands: 10, now: () => new Date(time) });
        registry.touch('SN1', '', '');
        time += 6 * 60_000;

        expect(markSilentDevices(registry, 5)).toEqual(['SN1']);
        expect(registry.getDevice('SN1')?.status).toBe('offline');
    });
});
