interface Waiter<T> {
    resolve: (value: T) => void;
}

/**
 * Bounded async FIFO between one side that pushes and one or more sides
 * that iterate.
 *
 * `push` waits while the buffer is full and resolves false once the queue
 * is closed. Iterators drain what is buffered, then finish after `close()`.
 */
export class AsyncQueue<T> implements AsyncIterable<T> {
    private readonly buffer: T[] = [];
    private readonly pushers: Array<Waiter<boolean> & { item: T }> = [];
    private readonly takers: Array<Waiter<IteratorResult<T, undefined>>> = [];
    private closed = false;

    constructor(private readonly capacity: number) {
        if (!Number.isInteger(capacity) || capacity < 1) {
            throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
        }
    }

    get isClosed(): boolean {
        return this.closed;
    }

    get size(): number {
        return this.buffer.length;
    }

    push(item: T): Promise<boolean> {
        if (this.closed) return Promise.resolve(false);

        const taker = this.takers.shift();
        if (taker) {
            taker.resolve({ value: item, done: false });
            return Promise.resolve(true);
        }

        if (this.buffer.length < this.capacity) {
            this.buffer.push(item);
            return Promise.resolve(true);
        }

        return new Promise<boolean>(resolve => {
            this.pushers.push({ item, resolve });
        });
    }

    /**
     * Stops accepting items. With `discard`, buffered items are dropped too
     * and iterators finish right away.
     */
    close(options: { discard?: boolean } = {}): void {
        if (options.discard) {
            this.buffer.length = 0;
        }
        if (this.closed) return;
        this.closed = true;

        for (const pusher of this.pushers.splice(0)) {
            pusher.resolve(false);
        }
        for (const taker of this.takers.splice(0)) {
            taker.resolve({ value: undefined, done: true });
        }
    }

    private take(): Promise<IteratorResult<T, undefined>> {
        if (this.buffer.length > 0) {
            const [value] = this.buffer.splice(0, 1);
            // A slot just opened for the oldest waiting pusher
            const pusher = this.pushers.shift();
            if (pusher) {
                this.buffer.push(pusher.item);
                pusher.resolve(true);
            }
            return Promise.resolve({ value, done: false });
        }

        if (this.closed) {
            return Promise.resolve({ value: undefined, done: true });
        }

        return new Promise(resolve => {
            this.takers.push({ resolve });
        });
    }

    [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
        return {
            next: () => this.take(),
        };
    }
}
