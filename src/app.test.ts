import fs from 'fs';
import os from 'os';
import path from 'path';
import type { Server } from 'http';
import axios from 'axios';
import { afterEach, describe, expect, it } from 'vitest';
import { createApp } from './app';
import { AttendanceService } from './services/attendance.service';
import { ApiTokenAuthorizer } from './services/auth.service';
import { DeviceRegistryService } from './services/device-registry.service';
import { ProtocolService } from './services/protocol.service';
import { QueueService } from './services/queue.service';
import { MemoryAttendanceStore, timeWindow } from './testing/memory-attendance-store';
import { WEEKDAY_NAMES } from './utils/punch-classifier';

interface Running {
    baseUrl: string;
    store: MemoryAttendanceStore;
    registry: DeviceRegistryService;
}

const cleanups: Array<() => Promise<void>> = [];

async function start(adminToken?: string): Promise<Running> {
    const queueDir = fs.mkdtempSync(path.join(os.tmpdir(), 'adms-app-'));
    const store = new MemoryAttendanceStore();
    const registry = new DeviceRegistryService({ maxPendingCommands: 10 });
    const attendance = new AttendanceService(store, { recentLimit: 10 });
    const protocol = new ProtocolService(registry, attendance, { timezone: 'UTC', journalLimit: 10 });

    const app = createApp({
        registry,
        protocol,
        attendance,
        store,
        backend: { testConnection: async () => true },
        retryQueue: new QueueService(queueDir),
        authorizer: new ApiTokenAuthorizer(adminToken),
        timezone: 'UTC',
        orgName: 'Test Org',
        nodeEnv: 'test',
    });

    const server = await new Promise<Server>((resolve) => {
        const listening = app.listen(0, () => resolve(listening));
    });
    cleanups.push(
        () =>
            new Promise<void>((resolve, reject) => {
                server.close((error) => (error ? reject(error) : resolve()));
                fs.rmSync(queueDir, { recursive: true, force: true });
            })
    );

    const address = server.address();
    if (address === null || typeof address === 'string') {
        throw new Error('server is not listening on a TCP port');
    }
    return { baseUrl: `http://127.0.0.1:${address.port}`, store, registry };
}

const http = axios.create({ validateStatus: () => true });

function terminal(baseUrl: string) {
    return axios.create({ baseURL: `${baseUrl}/iclock`, responseType: 'text', validateStatus: () => true });
}

afterEach(async () => {
    while (cleanups.length > 0) {
        const cleanup = cleanups.pop();
        if (cleanup) {
            await cleanup();
        }
    }
});

describe('terminal protocol', () => {
    it('stores pushed attendance and answers OK', async () => {
        const { baseUrl, store } = await start();
        store.windows = [timeWindow({ punchType: 'CHECK_IN', startTime: '09:00', endTime: '10:00' })];

        const res = await terminal(baseUrl).post('/cdata?SN=SN1&table=ATTLOG&Stamp=1', '7\t2025-01-15 09:05:00\t1\t1\n', {
            headers: { 'Content-Type': 'text/plain' },
        });

        expect(res.status).toBe(200);
        expect(res.data).toBe('OK');
        expect(res.headers['content-type']).toMatch(/^text\/plain/);
        expect(store.events).toHaveLength(1);
        expect(store.events[0].punchType).toBe('CHECK_IN');
        expect(store.events[0].devicePunchType).toBe('CHECK_OUT');
    });

    it('accepts bodies under any content type', async () => {
        const { baseUrl, store } = await start();

        await terminal(baseUrl).post('/cdata?SN=SN1&table=ATTLOG', '8\t2025-01-15 09:05:00\t0\t1', {
            headers: { 'Content-Type': 'application/octet-stream' },
        });

        expect(store.events.map((event) => event.pin)).toEqual(['8']);
    });

    it('answers the options request with the server clock', async () => {
        const { baseUrl } = await start();

        const res = await terminal(baseUrl).get('/cdata?SN=SN1&options=all&table=options');

        expect(res.status).toBe(200);
        expect(res.data).toMatch(/^GET OPTION FROM: SN1\r\nServerTime=\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}\r\nStamp=0$/);
    });

    it('delivers an enrolled user on the next poll', async () => {
        const { baseUrl } = await start();
        const device = terminal(baseUrl);

        expect((await device.get('/cdata?SN=SN1&c=registry')).data).toBe('OK');

        const queued = await http.post(`${baseUrl}/api/device/add-user`, { pin: 1001, name: 'Test User' });
        expect(queued.status).toBe(200);
        expect(queued.data).toEqual({
            status: 'queued',
            device: 'SN1',
            command: 'C:1001:DATA USER PIN=1001\tName=Test User\tPri=0',
            message: 'User Test User (PIN=1001) will be added when device polls',
        });

        expect((await device.get('/getrequest?SN=SN1')).data).toBe('C:1001:DATA USER PIN=1001\tName=Test User\tPri=0');
        expect((await device.get('/getrequest?SN=SN1')).data).toBe('OK');
    });

    it('polls through unrecognized paths', async () => {
        const { baseUrl, registry } = await start();
        registry.enqueueCommand('SN1', 'C:5:DATA DEL USER PIN=5');

        const res = await terminal(baseUrl).get('/legacy/getrequest.aspx?SN=SN1');

        expect(res.status).toBe(200);
        expect(res.data).toBe('C:5:DATA DEL USER PIN=5');
    });

    it('acknowledges unknown paths', async () => {
        const { baseUrl } = await start();

        const res = await terminal(baseUrl).post('/ping', 'hello');

        expect(res.status).toBe(200);
        expect(res.data).toBe('OK');
    });
});

describe('admin API', () => {
    it('rejects commands when no device has connected', async () => {
        const { baseUrl } = await start();

        const res = await http.post(`${baseUrl}/api/device/add-user`, { pin: '1', name: 'Test User' });

        expect(res.status).toBe(400);
        expect(res.data).toEqual({ success: false, error: 'No devices connected' });
    });

    it('validates request bodies', async () => {
        const { baseUrl } = await start();

        const res = await http.post(`${baseUrl}/api/device/add-user`, { pin: '1', device_sn: 'SN1' });

        expect(res.status).toBe(400);
        expect(res.data).toEqual({ success: false, error: 'name: Required' });
    });

    it('rejects user fields that would change the command text', async () => {
        const { baseUrl, registry } = await start();
        const addUser = (body: object) => http.post(`${baseUrl}/api/device/add-user`, { device_sn: 'SN1', ...body });

        const tabbed = await addUser({ pin: '7', name: 'Bob\tPri=14' });
        expect(tabbed.status).toBe(400);
        expect(tabbed.data).toEqual({ success: false, error: 'name: name must not contain tabs or line breaks' });

        const multiline = await addUser({ pin: '7', name: 'Bob\nC:8:DATA DEL USER PIN=8' });
        expect(multiline.status).toBe(400);

        const card = await addUser({ pin: '7', name: 'Bob', card: '1\t2' });
        expect(card.data).toEqual({ success: false, error: 'card: card must not contain tabs or line breaks' });

        const pin = await http.post(`${baseUrl}/api/device/delete-user`, { device_sn: 'SN1', pin: '7\tX=1' });
        expect(pin.status).toBe(400);
        expect(pin.data).toEqual({ success: false, error: 'pin: PIN must contain digits only' });

        expect(registry.allPendingCommands()).toEqual({});
    });

    it('rejects raw commands spanning several lines', async () => {
        const { baseUrl } = await start();

        const res = await http.post(`${baseUrl}/api/device/command`, { device_sn: 'SN1', command: 'C:1:INFO\nC:2:REBOOT' });

        expect(res.status).toBe(400);
        expect(res.data).toEqual({ success: false, error: 'command: command must be a single line' });
    });

    it('refuses to queue commands for the unknown serial', async () => {
        const { baseUrl } = await start();

        const res = await http.post(`${baseUrl}/api/device/command`, { device_sn: 'UNKNOWN', command: 'C:1:INFO' });

        expect(res.status).toBe(400);
        expect(res.data).toEqual({
            success: false,
            error: 'Cannot queue commands for device "UNKNOWN": terminals without a serial number never poll',
        });
    });

    it('requires the admin token when one is configured', async () => {
        const { baseUrl } = await start('test-secret');

        expect((await http.get(`${baseUrl}/api/devices`)).status).toBe(401);
        expect((await http.get(`${baseUrl}/api/devices`, { headers: { Authorization: 'Bearer wrong' } })).status).toBe(401);

        const allowed = await http.get(`${baseUrl}/api/devices`, { headers: { Authorization: 'Bearer test-secret' } });
        expect(allowed.status).toBe(200);
        expect(allowed.data).toEqual({ devices: [], total: 0 });
    });

    it('leaves the terminal protocol open when a token is configured', async () => {
        const { baseUrl } = await start('test-secret');

        expect((await terminal(baseUrl).get('/getrequest?SN=SN1')).data).toBe('OK');
    });

    it('explains which window a test punch would match', async () => {
        const { baseUrl, store } = await start();
        store.windows = [timeWindow({ id: 4, punchType: 'BREAK_OUT', startTime: '12:00', endTime: '13:00', daysOfWeek: [2] })];

        const res = await http.get(`${baseUrl}/api/test-punch-type`, { params: { time: '12:30', date: '2025-01-15' } });

        expect(res.data).toEqual({
            inputTime: '12:30:00',
            inputDate: '2025-01-15',
            dayOfWeek: 2,
            dayName: 'Wednesday',
            matchedWindow: { id: 4, punchType: 'BREAK_OUT', startTime: '12:00', endTime: '13:00', daysOfWeek: [2], priority: 0, active: true },
            determinedPunchType: 'BREAK_OUT',
            autoPunchEnabled: true,
            wouldUse: 'BREAK_OUT',
        });
    });

    it('uses today in the organization zone for an unreadable date', async () => {
        const { baseUrl, store } = await start();
        store.windows = [timeWindow({ id: 6, punchType: 'CHECK_IN', startTime: '00:00', endTime: '23:59' })];

        const res = await http.get(`${baseUrl}/api/test-punch-type`, { params: { time: '08:15', date: 'soon' } });

        expect(res.data.matchedWindow.id).toBe(6);
        expect(WEEKDAY_NAMES[res.data.dayOfWeek]).toBe(res.data.dayName);
    });

    it('lists recent punches newest first', async () => {
        const { baseUrl } = await start();
        await terminal(baseUrl).post('/cdata?SN=SN1&table=ATTLOG', '1\t2025-01-15 09:01:00\t0\t1\n2\t2025-01-15 09:02:00\t0\t1');

        const res = await http.get(`${baseUrl}/api/logs`);

        expect(res.data.total).toBe(2);
        expect(res.data.logs.map((log: { pin: string }) => log.pin)).toEqual(['2', '1']);
    });

    it('reports health', async () => {
        const { baseUrl } = await start();

        const res = await http.get(`${baseUrl}/health`);

        expect(res.status).toBe(200);
        expect(res.data).toMatchObject({
            status: 'healthy',
            organization: 'Test Org',
            services: { backend: 'healthy' },
            devices: { total: 0, online: 0 },
            queue: { size: 0 },
        });
    });

    it('answers unknown routes with JSON 404', async () => {
        const { baseUrl } = await start();

        const res = await http.get(`${baseUrl}/nope`);

        expect(res.status).toBe(404);
        expect(res.data).toEqual({ success: false, error: 'Not found' });
    });
});
