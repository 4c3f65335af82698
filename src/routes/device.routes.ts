import { Router } from 'express';
import type { DeviceController } from '../controllers/device.controller';
import { requirePermission } from '../middleware/auth.middleware';
import type { Authorizer } from '../types';

export function createDeviceRoutes(controller: DeviceController, authorizer: Authorizer): Router {
    const router = Router();
    const canRead = requirePermission(authorizer, 'devices:read');
    const canWrite = requirePermission(authorizer, 'devices:write');

    // Registered devices
    router.get('/devices', canRead, controller.listDevices);

    // Queued commands
    router.get('/device/pending-commands', canRead, controller.getPendingCommands);

    // Enroll or remove a user on a terminal
    router.post('/device/add-user', canWrite, controller.addUser);
    router.post('/device/delete-user', canWrite, controller.deleteUser);

    // Raw protocol command
    router.post('/device/command', canWrite, controller.sendCommand);

    // Recent terminal requests
    router.get('/debug', canRead, controller.getDebugRequests);

    return router;
}
