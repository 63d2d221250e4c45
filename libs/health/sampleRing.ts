/**
 * Fixed-capacity history; the oldest entry is dropped on overflow.
 */
export class SampleRing<T> {
    private readonly items: T[] = [];

    constructor(private readonly capacity: number) {
        if (!Number.isInteger(capacity) || capacity < 1) {
            throw new RangeError(`Sample ring capacity must be a positive integer, got ${capacity}`);
        }
    }

    public push(item: T): void {
        this.items.push(item);
        if (this.items.length > this.capacity) {
            this.items.shift();
        }
    }

    public latest(): T | null {
        return this.items[this.items.length - 1] ?? null;
    }

    /** Oldest first */
    public toArray(): T[] {
        return [...this.items];
    }

    public get size(): number {
        return this.items.length;
    }
}
