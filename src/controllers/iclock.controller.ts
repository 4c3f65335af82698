import { Request, RequestHandler, Response } from 'express';
import type { IclockEndpoint, ProtocolService, TerminalRequest } from '../services/protocol.service';
import { ACK } from '../services/protocol.service';
import { UNKNOWN_SERIAL } from '../types';
import logger, { errorMessage } from '../utils/logger';

function queryValue(req: Request, key: string): string {
    const value = req.query[key];
    if (typeof value === 'string') {
        return value.trim();
    }
    if (Array.isArray(value) && typeof value[0] === 'string') {
        return value[0].trim();
    }
    return '';
}

function toTerminalRequest(req: Request, endpoint: IclockEndpoint): TerminalRequest {
    return {
        endpoint,
        path: req.path.replace(/^\/+/, ''),
        method: req.method,
        serialNumber: queryValue(req, 'SN') || UNKNOWN_SERIAL,
        table: queryValue(req, 'table'),
        command: queryValue(req, 'c'),
        body: typeof req.body === 'string' ? req.body : '',
    };
}

export interface IclockController {
    cdata: RequestHandler;
    getRequest: RequestHandler;
    deviceCmd: RequestHandler;
    catchAll: RequestHandler;
}

/**
 * Terminal-facing handlers. Every response is 200 text/plain.
 */
export function createIclockController(protocol: ProtocolService): IclockController {
    function handler(endpoint: IclockEndpoint): RequestHandler {
        return async (req: Request, res: Response): Promise<void> => {
            let reply = ACK;
            try {
                reply = await protocol.handle(toTerminalRequest(req, endpoint));
            } catch (error) {
                logger.error('[ADMS] Failed to handle terminal request', { path: req.path, error: errorMessage(error) });
            }
            res.status(200).type('text/plain').send(reply);
        };
    }

    return {
        cdata: handler('cdata'),
        getRequest: handler('getrequest'),
        deviceCmd: handler('devicecmd'),
        catchAll: handler('other'),
    };
}
