import { Request, RequestHandler, Response } from 'express';
import type { DeviceRegistryService } from '../services/device-registry.service';
import type { QueueService } from '../services/queue.service';
import { zonedTime } from '../utils/time';
import logger, { errorMessage } from '../utils/logger';

export interface BackendProbe {
    testConnection(): Promise<boolean>;
}

export interface HealthControllerDeps {
    registry: DeviceRegistryService;
    retryQueue: QueueService;
    backend: BackendProbe;
    timezone: string;
    orgName: string;
}

export interface HealthController {
    getHealth: RequestHandler;
    checkBackend: RequestHandler;
    getServerTime: RequestHandler;
}

export function createHealthController(deps: HealthControllerDeps): HealthController {
    const { registry, retryQueue, backend, timezone, orgName } = deps;

    return {
        /**
         * Overall health check
         */
        async getHealth(req: Request, res: Response): Promise<void> {
            const health = {
                status: 'healthy',
                timestamp: new Date().toISOString(),
                uptime: process.uptime(),
                organization: orgName,
                services: {
                    backend: 'unknown',
                },
                devices: {
                    total: registry.size,
                    online: 0,
                },
                queue: {
                    size: 0,
                },
            };

            try {
                // Check backend
                try {
                    await backend.testConnection();
                    health.services.backend = 'healthy';
                } catch (error) {
                    logger.warn('Backend unreachable during health check', { error: errorMessage(error) });
                    health.services.backend = 'unhealthy';
                    health.status = 'degraded';
                }

                health.devices.online = registry.listDevices().filter((device) => device.status === 'online').length;
                health.queue.size = await retryQueue.size();

                res.json(health);
            } catch (error) {
                logger.error('Health check failed', { error: errorMessage(error) });
                res.status(500).json({
                    status: 'unhealthy',
                    error: errorMessage(error),
                });
            }
        },

        /**
         * Check backend connectivity
         */
        async checkBackend(req: Request, res: Response): Promise<void> {
            try {
                await backend.testConnection();
                res.json({
                    success: true,
                    message: 'Backend is reachable',
                });
            } catch (error) {
                res.status(503).json({
                    success: false,
                    error: errorMessage(error),
                });
            }
        },

        /**
         * Current time in the organization's time zone
         */
        getServerTime(req: Request, res: Response): void {
            const now = new Date();
            const local = zonedTime(now, timezone);
            res.json({
                datetime: now.toISOString(),
                timezone: local.timezone,
                formatted: local.formatted,
                date: local.date,
                time: local.time,
            });
        },
    };
}
