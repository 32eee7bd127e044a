/**
 * Unbounded FIFO handing values from producers to a single async consumer.
 *
 * ```ts
 * const channel = new AsyncChannel<EventBatch>();
 * for await (const batch of channel) { … }
 * ```
 *
 * `close()` discards anything still queued and ends iteration.
 */
export class AsyncChannel<T> implements AsyncIterable<T> {
    readonly #queue: T[] = [];
    readonly #waiters: ((result: IteratorResult<T, undefined>) => void)[] = [];
    #closed = false;

    get closed(): boolean {
        return this.#closed;
    }

    get size(): number {
        return this.#queue.length;
    }

    /** Returns false when the channel is already closed. */
    push(value: T): boolean {
        if (this.#closed) return false;

        const waiter = this.#waiters.shift();
        if (waiter) {
            waiter({ value, done: false });
        } else {
            this.#queue.push(value);
        }
        return true;
    }

    close(): void {
        if (this.#closed) return;
        this.#closed = true;
        this.#queue.length = 0;
        for (const waiter of this.#waiters.splice(0)) {
            waiter({ value: undefined, done: true });
        }
    }

    next(): Promise<IteratorResult<T, undefined>> {
        if (this.#queue.length > 0) {
            const [value] = this.#queue.splice(0, 1);
            return Promise.resolve({ value, done: false });
        }
        if (this.#closed) {
            return Promise.resolve({ value: undefined, done: true });
        }
        return new Promise((resolve) => {
            this.#waiters.push(resolve);
        });
    }

    [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
        return {
            next: () => this.next(),
        };
    }
}
