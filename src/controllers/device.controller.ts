import { Request, RequestHandler, Response } from 'express';
import { z } from 'zod';
import type { DeviceRegistryService } from '../services/device-registry.service';
import type { ProtocolService } from '../services/protocol.service';
import { buildAddUserCommand, buildDeleteUserCommand } from '../utils/device-commands';
import { NoDeviceError } from '../utils/errors';
import logger from '../utils/logger';
import { sendError } from './respond';

const NO_SEPARATORS = /^[^\t\r\n]*$/;

const pinSchema = z
    .union([z.string(), z.number()])
    .transform((value) => String(value).trim())
    .refine((value) => value.length > 0, 'PIN is required')
    .refine((value) => /^\d+$/.test(value), 'PIN must contain digits only');

const deviceSnSchema = z.string().trim().min(1).optional();

const addUserSchema = z.object({
    pin: pinSchema,
    name: z.string().trim().min(1, 'name is required').regex(NO_SEPARATORS, 'name must not contain tabs or line breaks'),
    card: z
        .union([z.string(), z.number()])
        .transform((value) => String(value).trim())
        .refine((value) => NO_SEPARATORS.test(value), 'card must not contain tabs or line breaks')
        .optional(),
    privilege: z.number().int().min(0).optional(),
    device_sn: deviceSnSchema,
});

const deleteUserSchema = z.object({
    pin: pinSchema,
    device_sn: deviceSnSchema,
});

const rawCommandSchema = z.object({
    device_sn: z.string().trim().min(1, 'device_sn is required'),
    command: z.string().min(1, 'command is required').regex(/^[^\r\n]*$/, 'command must be a single line'),
});

export interface DeviceController {
    listDevices: RequestHandler;
    getPendingCommands: RequestHandler;
    addUser: RequestHandler;
    deleteUser: RequestHandler;
    sendCommand: RequestHandler;
    getDebugRequests: RequestHandler;
}

export function createDeviceController(registry: DeviceRegistryService, protocol: ProtocolService): DeviceController {
    // Commands without a target go to the most recently seen terminal
    function targetDevice(deviceSn: string | undefined): string {
        if (deviceSn) {
            return deviceSn;
        }
        const [latest] = registry.listDevices();
        if (!latest) {
            throw new NoDeviceError();
        }
        return latest.serialNumber;
    }

    return {
        /**
         * List registered devices
         */
        listDevices(req: Request, res: Response): void {
            const devices = registry.listDevices();
            res.json({ devices, total: devices.length });
        },

        /**
         * View pending commands for one device, or for all
         */
        getPendingCommands(req: Request, res: Response): void {
            const deviceSn = typeof req.query.device_sn === 'string' ? req.query.device_sn : '';
            if (deviceSn) {
                res.json({ device: deviceSn, commands: registry.peekPendingCommands(deviceSn) });
                return;
            }
            res.json({ allCommands: registry.allPendingCommands() });
        },

        /**
         * Queue a user enrollment for the device's next poll
         */
        addUser(req: Request, res: Response): void {
            try {
                const body = addUserSchema.parse(req.body);
                const deviceSn = targetDevice(body.device_sn);
                const command = buildAddUserCommand(body);
                registry.enqueueCommand(deviceSn, command);

                logger.info(`Queued USER ADD for ${deviceSn}`, { pin: body.pin, name: body.name });
                res.json({
                    status: 'queued',
                    device: deviceSn,
                    command,
                    message: `User ${body.name} (PIN=${body.pin}) will be added when device polls`,
                });
            } catch (error) {
                sendError(res, error, 'Failed to queue user add');
            }
        },

        /**
         * Queue a user removal for the device's next poll
         */
        deleteUser(req: Request, res: Response): void {
            try {
                const body = deleteUserSchema.parse(req.body);
                const deviceSn = targetDevice(body.device_sn);
                const command = buildDeleteUserCommand(body.pin);
                registry.enqueueCommand(deviceSn, command);

                logger.info(`Queued USER DEL for ${deviceSn}`, { pin: body.pin });
                res.json({ status: 'queued', device: deviceSn, command });
            } catch (error) {
                sendError(res, error, 'Failed to queue user delete');
            }
        },

        /**
         * Queue a raw protocol command
         */
        sendCommand(req: Request, res: Response): void {
            try {
                const body = rawCommandSchema.parse(req.body);
                registry.enqueueCommand(body.device_sn, body.command);
                res.json({ status: 'queued', device: body.device_sn, command: body.command });
            } catch (error) {
                sendError(res, error, 'Failed to queue command');
            }
        },

        /**
         * Recent terminal requests as received
         */
        getDebugRequests(req: Request, res: Response): void {
            const requests = protocol.recentRequests(50);
            res.json({ requests, total: requests.length });
        },
    };
}
