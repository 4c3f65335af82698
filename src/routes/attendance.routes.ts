import { Router } from 'express';
import type { AttendanceController } from '../controllers/attendance.controller';
import { requirePermission } from '../middleware/auth.middleware';
import type { Authorizer } from '../types';

export function createAttendanceRoutes(controller: AttendanceController, authorizer: Authorizer): Router {
    const router = Router();
    const canRead = requirePermission(authorizer, 'attendance:read');
    const canWrite = requirePermission(authorizer, 'attendance:write');

    // Recent punches held in memory
    router.get('/logs', canRead, controller.getRecentLogs);
    router.post('/logs/clear', canWrite, controller.clearRecentLogs);

    // Time window configuration as the classifier sees it
    router.get('/time-windows', canRead, controller.getTimeWindows);
    router.get('/test-punch-type', canRead, controller.testPunchType);

    // Punches waiting for the backend
    router.get('/retry-queue', canRead, controller.getRetryQueue);

    return router;
}
