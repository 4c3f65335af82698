import { NextFunction, Request, RequestHandler, Response } from 'express';
import type { Authorizer } from '../types';
import logger from '../utils/logger';

function bearerToken(req: Request): string | null {
    const header = req.get('authorization');
    if (!header || !header.startsWith('Bearer ')) {
        return null;
    }
    return header.slice('Bearer '.length).trim() || null;
}

/**
 * Reject callers the authorizer does not grant `permission`
 */
export function requirePermission(authorizer: Authorizer, permission: string): RequestHandler {
    return (req: Request, res: Response, next: NextFunction) => {
        authorizer
            .authorize(bearerToken(req), permission)
            .then((allowed) => {
                if (!allowed) {
                    logger.warn('Permission denied', { path: req.path, permission, ip: req.ip });
                    res.status(401).json({
                        success: false,
                        error: 'Unauthorized',
                    });
                    return;
                }
                next();
            })
            .catch(next);
    };
}
