import { z } from 'zod';
import type { UnknownCode } from './index';
import { PUNCH_TYPES } from './index';

const unknownCodeSchema = z.custom<UnknownCode>(
    (value) => typeof value === 'string' && /^UNKNOWN\(.*\)$/.test(value),
    { message: 'Expected UNKNOWN(<code>)' }
);

export const punchTypeSchema = z.enum(PUNCH_TYPES);

const classifiedTypeSchema = z.union([punchTypeSchema, unknownCodeSchema]);

export const punchEventSchema = z.object({
    pin: z.string().min(1),
    dateTime: z.string(),
    status: z.string().optional(),
    verified: z.string().optional(),
    workCode: z.string().optional(),
    verifyMethod: z.string().optional(),
    extra: z.record(z.string()),
    rawLine: z.string(),
    deviceSn: z.string(),
    receivedAt: z.string(),
    devicePunchType: classifiedTypeSchema,
    punchType: classifiedTypeSchema,
    punchTypeSource: z.enum(['TIME_WINDOW', 'DEVICE_STATUS']),
});
