import type { AttendanceRecord } from '../types';

/** Identity of a punch: one user on one terminal at one moment */
export function punchKey(deviceSn: string, record: Pick<AttendanceRecord, 'pin' | 'dateTime'>): string {
    return `${deviceSn}:${record.pin}:${record.dateTime}`;
}

/**
 * Insertion-ordered set that forgets its oldest keys beyond `capacity`
 */
export class RecentKeys {
    private keys = new Set<string>();

    constructor(private readonly capacity: number) {
        if (capacity < 1) {
            throw new Error('RecentKeys capacity must be at least 1');
        }
    }

    has(key: string): boolean {
        return this.keys.has(key);
    }

    add(key: string): void {
        this.keys.delete(key);
        this.keys.add(key);
        for (const oldest of this.keys) {
            if (this.keys.size <= this.capacity) {
                break;
            }
            this.keys.delete(oldest);
        }
    }

    delete(key: string): void {
        this.keys.delete(key);
    }

    get size(): number {
        return this.keys.size;
    }
}
