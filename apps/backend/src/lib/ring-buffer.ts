/**
 * Fixed-capacity FIFO that evicts the oldest entry on overflow.
 */
export class RingBuffer<T> {
    private readonly slots: Array<T | undefined>;
    private start = 0;
    private count = 0;
    private evictedCount = 0;

    constructor(public readonly capacity: number) {
        if (!Number.isInteger(capacity) || capacity <= 0) {
            throw new RangeError(`RingBuffer capacity must be a positive integer, got ${capacity}`);
        }
        this.slots = new Array<T | undefined>(capacity);
    }

    push(item: T): void {
        const index = (this.start + this.count) % this.capacity;
        this.slots[index] = item;
        if (this.count < this.capacity) {
            this.count += 1;
        } else {
            this.start = (this.start + 1) % this.capacity;
            this.evictedCount += 1;
        }
    }

    get size(): number {
        return this.count;
    }

    get evicted(): number {
        return this.evictedCount;
    }

    /**
     * Entries oldest first. With `limit`, only the newest `limit` entries.
     */
    toArray(limit?: number): T[] {
        const take = limit === undefined ? this.count : Math.max(0, Math.min(limit, this.count));
        const result: T[] = [];
        for (let i = this.count - take; i < this.count; i += 1) {
            const item = this.slots[(this.start + i) % this.capacity];
            if (item !== undefined) {
                result.push(item);
            }
        }
        return result;
    }

    clear(): void {
        this.slots.fill(undefined);
        this.start = 0;
        this.count = 0;
    }
}
