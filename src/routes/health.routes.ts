import { Router } from 'express';
import type { HealthController } from '../controllers/health.controller';
import { requirePermission } from '../middleware/auth.middleware';
import type { Authorizer } from '../types';

export function createHealthRoutes(controller: HealthController): Router {
    const router = Router();

    // Overall health check
    router.get('/', controller.getHealth);

    // Check backend connectivity
    router.get('/backend', controller.checkBackend);

    return router;
}

export function createServerTimeRoutes(controller: HealthController, authorizer: Authorizer): Router {
    const router = Router();

    // Server clock in the organization's time zone
    router.get('/server-time', requirePermission(authorizer, 'attendance:read'), controller.getServerTime);

    return router;
}
