/**
 * Ordered, bounded, single-reader mailbox.
 *
 * Producers `push` without ever waiting. The reader pulls with `next()` or
 * `for await`. When the buffer is full the oldest buffered item is dropped
 * and counted in `dropped`.
 */
export class EventMailbox<T> implements AsyncIterable<T> {
    private buffer: T[] = [];
    private waiters: Array<(result: IteratorResult<T, undefined>) => void> = [];
    private closed = false;
    private droppedCount = 0;

    constructor(private readonly capacity: number = Number.POSITIVE_INFINITY) {
        if (!(capacity > 0)) {
            throw new Error("Mailbox capacity must be positive");
        }
    }

    get size(): number {
        return this.buffer.length;
    }

    get dropped(): number {
        return this.droppedCount;
    }

    get isClosed(): boolean {
        return this.closed;
    }

    /** Returns false when the mailbox is closed and the item was discarded. */
    push(item: T): boolean {
        if (this.closed) {
            return false;
        }

        const waiter = this.waiters.shift();
        if (waiter) {
            waiter({ value: item, done: false });
            return true;
        }

        if (this.buffer.length >= this.capacity) {
            this.buffer.shift();
            this.droppedCount++;
        }
        this.buffer.push(item);
        return true;
    }

    next(): Promise<IteratorResult<T, undefined>> {
        if (this.buffer.length > 0) {
            const value = this.buffer[0];
            this.buffer.splice(0, 1);
            return Promise.resolve({ value, done: false });
        }

        if (this.closed) {
            return Promise.resolve({ value: undefined, done: true });
        }

        return new Promise((resolve) => {
            this.waiters.push(resolve);
        });
    }

    /** Removes and returns everything currently buffered. */
    takeAll(): T[] {
        const items = this.buffer;
        this.buffer = [];
        return items;
    }

    /** Buffered items stay readable; pending readers are released. */
    close(): void {
        if (this.closed) {
            return;
        }
        this.closed = true;
        const waiters = this.waiters;
        this.waiters = [];
        for (const waiter of waiters) {
            waiter({ value: undefined, done: true });
        }
    }

    [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
        return {
            next: () => this.next(),
            return: async () => {
                this.close();
                return { value: undefined, done: true };
            },
        };
    }
}
