import express, { NextFunction, Request, Response, Router } from 'express';
import type { IclockController } from '../controllers/iclock.controller';
import { ACK } from '../services/protocol.service';
import logger, { errorMessage } from '../utils/logger';

export function createIclockRoutes(controller: IclockController): Router {
    const router = Router();

    // Terminals post plain text with whatever content type their firmware picks
    router.use(express.text({ type: () => true, limit: '10mb' }));

    // Attendance, user and operation log pushes, registration and options sync
    router.all('/cdata', controller.cdata);

    // Command poll
    router.all('/getrequest', controller.getRequest);

    // Command result report
    router.all('/devicecmd', controller.deviceCmd);

    // Any other path under /iclock still gets an acknowledgement
    router.all('*', controller.catchAll);

    // Unreadable bodies are dropped, never answered with an error status
    router.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
        logger.error('[ADMS] Could not read terminal request', {
            path: req.path,
            serialNumber: req.query.SN,
            error: errorMessage(err),
        });
        res.status(200).type('text/plain').send(ACK);
    });

    return router;
}
