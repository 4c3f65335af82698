import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import type { PunchEvent } from '../types';
import { punchEventSchema } from '../types/schemas';
import logger, { errorMessage } from '../utils/logger';

const queueItemSchema = z.object({
    id: z.string(),
    type: z.literal('attendance'),
    data: punchEventSchema,
    timestamp: z.number(),
    retries: z.number().int().nonnegative(),
});

export type QueueItem = z.infer<typeof queueItemSchema>;

/**
 * File-backed queue of punch events the backend did not accept.
 * One JSON file per item, so a crash loses at most the write in flight.
 */
export class QueueService {
    constructor(private readonly queueDir: string) {
        this.ensureQueueDir();
    }

    /**
     * Ensure queue directory exists
     */
    private ensureQueueDir(): void {
        if (!fs.existsSync(this.queueDir)) {
            fs.mkdirSync(this.queueDir, { recursive: true });
            logger.info('Queue directory created', { dir: this.queueDir });
        }
    }

    private itemPath(id: string): string {
        return path.join(this.queueDir, `${id}.json`);
    }

    private listFiles(): string[] {
        return fs.readdirSync(this.queueDir).filter((f) => f.endsWith('.json'));
    }

    /**
     * Add punch event to queue
     */
    async enqueue(event: PunchEvent): Promise<string> {
        const item: QueueItem = {
            id: `${Date.now()}-${Math.random().toString(36).slice(2, 11)}`,
            type: 'attendance',
            data: event,
            timestamp: Date.now(),
            retries: 0,
        };

        fs.writeFileSync(this.itemPath(item.id), JSON.stringify(item, null, 2));
        logger.info('Item added to queue', { id: item.id, pin: event.pin, deviceSn: event.deviceSn });
        return item.id;
    }

    /**
     * Get all queued items, oldest first
     */
    async getAll(): Promise<QueueItem[]> {
        const items: QueueItem[] = [];

        for (const file of this.listFiles()) {
            try {
                const content = fs.readFileSync(path.join(this.queueDir, file), 'utf-8');
                const parsed = queueItemSchema.safeParse(JSON.parse(content));
                if (!parsed.success) {
                    logger.error('Invalid queue item skipped', { file, issues: parsed.error.issues });
                    continue;
                }
                items.push(parsed.data);
            } catch (error) {
                logger.error('Failed to read queue item', { file, error: errorMessage(error) });
            }
        }

        return items.sort((a, b) => a.timestamp - b.timestamp);
    }

    /**
     * Remove item from queue
     */
    async dequeue(id: string): Promise<void> {
        const filePath = this.itemPath(id);
        if (fs.existsSync(filePath)) {
            fs.unlinkSync(filePath);
            logger.info('Item removed from queue', { id });
        }
    }

    /**
     * Update item retry count
     */
    async updateRetries(id: string, retries: number): Promise<void> {
        const filePath = this.itemPath(id);
        if (!fs.existsSync(filePath)) {
            return;
        }
        const parsed = queueItemSchema.safeParse(JSON.parse(fs.readFileSync(filePath, 'utf-8')));
        if (!parsed.success) {
            logger.error('Invalid queue item left untouched', { id });
            return;
        }
        fs.writeFileSync(filePath, JSON.stringify({ ...parsed.data, retries }, null, 2));
    }

    /**
     * Get queue size
     */
    async size(): Promise<number> {
        return this.listFiles().length;
    }

    /**
     * Clear all items from queue
     */
    async clear(): Promise<void> {
        for (const file of this.listFiles()) {
            fs.unlinkSync(path.join(this.queueDir, file));
        }
        logger.info('Queue cleared');
    }
}
