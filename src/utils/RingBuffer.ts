/**
 * Fixed-capacity FIFO used as the router's inbound frame queue.
 * When full, pushing evicts the oldest entry and hands it back to the caller.
 */
export class RingBuffer<T> {
    private buffer: (T | undefined)[];
    private head = 0;
    private _size = 0;

    constructor(private readonly capacity: number) {
        if (!Number.isInteger(capacity) || capacity <= 0) {
            throw new Error("RingBuffer capacity must be a positive integer");
        }
        this.buffer = new Array(capacity);
    }

    /**
     * Append an item. Returns the evicted oldest item when the buffer was full.
     */
    push(item: T): T | undefined {
        let evicted: T | undefined;
        if (this._size === this.capacity) {
            evicted = this.shift();
        }
        const tail = (this.head + this._size) % this.capacity;
        this.buffer[tail] = item;
        this._size++;
        return evicted;
    }

    /**
     * Remove and return the oldest item.
     */
    shift(): T | undefined {
        if (this._size === 0) return undefined;
        const item = this.buffer[this.head];
        this.buffer[this.head] = undefined;
        this.head = (this.head + 1) % this.capacity;
        this._size--;
        return item;
    }

    /**
     * Oldest item without removing it.
     */
    peek(): T | undefined {
        return this._size === 0 ? undefined : this.buffer[this.head];
    }

    toArray(): T[] {
        const result: T[] = [];
        for (let i = 0; i < this._size; i++) {
            const item = this.buffer[(this.head + i) % this.capacity];
            if (item !== undefined) result.push(item);
        }
        return result;
    }

    get size(): number {
        return this._size;
    }

    get maxSize(): number {
        return this.capacity;
    }

    isFull(): boolean {
        return this._size === this.capacity;
    }

    clear(): void {
        this.buffer = new Array(this.capacity);
        this.head = 0;
        this._size = 0;
    }
}

export default RingBuffer;
