/**
 * Keeps the most recent `capacity` items; older ones fall off the front.
 */
export class RingBuffer<T> {
    private items: T[] = [];

    constructor(private readonly capacity: number) {
        if (capacity < 1) {
            throw new Error('RingBuffer capacity must be at least 1');
        }
    }

    push(item: T): void {
        this.items.push(item);
        if (this.items.length > this.capacity) {
            this.items.splice(0, this.items.length - this.capacity);
        }
    }

    /**
     * Oldest first; `limit` keeps only the newest entries
     */
    toArray(limit?: number): T[] {
        return limit === undefined ? [...this.items] : this.items.slice(-limit);
    }

    get size(): number {
        return this.items.length;
    }

    clear(): number {
        const count = this.items.length;
        this.items = [];
        return count;
    }
}
