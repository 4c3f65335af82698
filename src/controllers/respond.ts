import { Response } from 'express';
import { ZodError } from 'zod';
import { CommandFieldError, InvalidDeviceError, NoDeviceError, QueueCapacityError } from '../utils/errors';
import logger, { errorMessage } from '../utils/logger';

/**
 * Map an admin-route failure to a JSON error response
 */
export function sendError(res: Response, error: unknown, context: string): void {
    if (error instanceof ZodError) {
        res.status(400).json({
            success: false,
            error: error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`).join('; '),
        });
        return;
    }

    if (error instanceof NoDeviceError || error instanceof InvalidDeviceError || error instanceof CommandFieldError) {
        res.status(400).json({ success: false, error: error.message });
        return;
    }

    if (error instanceof QueueCapacityError) {
        logger.warn(context, { error: error.message });
        res.status(429).json({ success: false, error: error.message });
        return;
    }

    logger.error(context, { error: errorMessage(error) });
    res.status(500).json({
        success: false,
        error: errorMessage(error),
    });
}
