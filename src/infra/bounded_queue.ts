/**
 * What `push` does when the queue is at capacity.
 * - `drop-oldest`: evict the head, accept the new item
 * - `reject`: keep the queue as is, refuse the new item
 */
export type OverflowPolicy = 'drop-oldest' | 'reject';

interface Waiter<T> {
    resolve: (item: T | undefined) => void;
    cleanup: () => void;
}

/**
 * FIFO queue with a hard capacity. `push` never blocks; overflow is counted
 * in `dropped`. Consumers either drain synchronously or await `take`.
 */
export class BoundedQueue<T> {
    private items: T[] = [];
    private head = 0;
    private waiters: Waiter<T>[] = [];
    private droppedCount = 0;

    constructor(
        private readonly capacity: number,
        private readonly policy: OverflowPolicy = 'drop-oldest'
    ) {
        if (!Number.isInteger(capacity) || capacity <= 0) {
            throw new RangeError(`BoundedQueue capacity must be a positive integer, got ${capacity}`);
        }
    }

    get size(): number {
        return this.items.length - this.head;
    }

    /** Items evicted or refused because the queue was full */
    get dropped(): number {
        return this.droppedCount;
    }

    /**
     * Returns false only when the item was refused under the `reject` policy.
     */
    push(item: T): boolean {
        const waiter = this.waiters.shift();
        if (waiter) {
            waiter.cleanup();
            waiter.resolve(item);
            return true;
        }

        if (this.size >= this.capacity) {
            this.droppedCount++;
            if (this.policy === 'reject') {
                return false;
            }
            this.head++;
        }

        this.items.push(item);
        this.compact();
        return true;
    }

    shift(): T | undefined {
        if (this.size === 0) {
            return undefined;
        }
        const item = this.items[this.head];
        this.head++;
        this.compact();
        return item;
    }

    /**
     * Removes and returns up to `max` items in arrival order.
     */
    drain(max: number = Infinity): T[] {
        const count = Math.min(max, this.size);
        if (count <= 0) {
            return [];
        }
        const out = this.items.slice(this.head, this.head + count);
        this.head += count;
        this.compact();
        return out;
    }

    /**
     * Waits up to `timeoutMs` for an item. Resolves `undefined` on timeout or abort.
     */
    take(timeoutMs: number, signal?: AbortSignal): Promise<T | undefined> {
        if (this.size > 0) {
            return Promise.resolve(this.shift());
        }
        if (signal?.aborted) {
            return Promise.resolve(undefined);
        }

        return new Promise(resolve => {
            const waiter: Waiter<T> = {
                resolve,
                cleanup: () => {
                    clearTimeout(timer);
                    signal?.removeEventListener('abort', onAbort);
                },
            };
            const release = () => {
                this.waiters = this.waiters.filter(w => w !== waiter);
                waiter.cleanup();
                resolve(undefined);
            };
            const onAbort = () => release();
            const timer = setTimeout(release, timeoutMs);
            signal?.addEventListener('abort', onAbort, { once: true });
            this.waiters.push(waiter);
        });
    }

    private compact(): void {
        if (this.head === this.items.length) {
            this.items = [];
            this.head = 0;
        } else if (this.head > 1024 && this.head * 2 > this.items.length) {
            this.items = this.items.slice(this.head);
            this.head = 0;
        }
    }
}
