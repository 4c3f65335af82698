import express, { Express, NextFunction, Request, Response } from 'express';
import { createAttendanceController } from './controllers/attendance.controller';
import { createDeviceController } from './controllers/device.controller';
import { BackendProbe, createHealthController } from './controllers/health.controller';
import { createIclockController } from './controllers/iclock.controller';
import { createAttendanceRoutes } from './routes/attendance.routes';
import { createDeviceRoutes } from './routes/device.routes';
import { createHealthRoutes, createServerTimeRoutes } from './routes/health.routes';
import { createIclockRoutes } from './routes/iclock.routes';
import type { AttendanceService } from './services/attendance.service';
import type { DeviceRegistryService } from './services/device-registry.service';
import type { ProtocolService } from './services/protocol.service';
import type { QueueService } from './services/queue.service';
import type { AttendanceStore, Authorizer } from './types';
import logger from './utils/logger';

export interface AppDependencies {
    registry: DeviceRegistryService;
    protocol: ProtocolService;
    attendance: AttendanceService;
    store: AttendanceStore;
    backend: BackendProbe;
    retryQueue: QueueService;
    authorizer: Authorizer;
    timezone: string;
    orgName: string;
    nodeEnv: string;
}

export function createApp(deps: AppDependencies): Express {
    const app = express();

    // Request logging; terminals poll every few seconds, so theirs go to debug
    app.use((req: Request, res: Response, next: NextFunction) => {
        const level = req.path.startsWith('/iclock') ? 'debug' : 'info';
        logger.log(level, `${req.method} ${req.path}`, {
            ip: req.ip,
            userAgent: req.get('user-agent'),
        });
        next();
    });

    // Terminal protocol, with its own text body parser
    app.use('/iclock', createIclockRoutes(createIclockController(deps.protocol)));

    // Middleware
    app.use(express.json());
    app.use(express.urlencoded({ extended: true }));

    const healthController = createHealthController(deps);

    // Routes
    app.use('/health', createHealthRoutes(healthController));
    app.use('/api', createServerTimeRoutes(healthController, deps.authorizer));
    app.use('/api', createDeviceRoutes(createDeviceController(deps.registry, deps.protocol), deps.authorizer));
    app.use(
        '/api',
        createAttendanceRoutes(
            createAttendanceController({
                attendance: deps.attendance,
                store: deps.store,
                retryQueue: deps.retryQueue,
                timezone: deps.timezone,
            }),
            deps.authorizer
        )
    );

    // Root endpoint
    app.get('/', (req: Request, res: Response) => {
        res.json({
            name: 'ADMS Bridge',
            version: '1.0.0',
            status: 'running',
            organization: deps.orgName,
            endpoints: {
                health: '/health',
                iclock: '/iclock',
                api: '/api',
            },
        });
    });

    // Error handling middleware
    app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
        logger.error('Unhandled error', {
            error: err.message,
            stack: err.stack,
            path: req.path,
        });

        res.status(500).json({
            success: false,
            error: 'Internal server error',
            message: deps.nodeEnv === 'development' ? err.message : undefined,
        });
    });

    // 404 handler
    app.use((req: Request, res: Response) => {
        res.status(404).json({
            success: false,
            error: 'Not found',
        });
    });

    return app;
}
