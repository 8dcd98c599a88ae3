interface PendingPush<T> {
    value: T,
    resolve: (accepted: boolean) => void,
}

/**
 * Bounded channel with many producers and one consumer.
 *
 * Producers `push` and wait while the buffer is full. The consumer drains it with `next()` or `for await`.
 * Once the consumer cancels, buffered values are dropped and every push, pending or new, resolves `false`.
 */
export class ResultStream<T> implements AsyncIterableIterator<T> {
    private readonly _capacity: number;
    private readonly _buffer: T[] = [];
    private readonly _pendingPushes: PendingPush<T>[] = [];
    private readonly _pendingReads: ((result: IteratorResult<T>) => void)[] = [];
    private readonly _abort = new AbortController();

    private _closed = false;
    private _delivered = 0;

    constructor(capacity: number) {
        if (!Number.isInteger(capacity) || capacity < 1) {
            throw new RangeError(`capacity must be a positive integer, got ${ capacity }`);
        }

        this._capacity = capacity;
    }

    // Aborted when the consumer cancels.
    public get signal(): AbortSignal {
        return this._abort.signal;
    }

    public get isCancelled(): boolean {
        return this._abort.signal.aborted;
    }

    public get isClosed(): boolean {
        return this._closed;
    }

    // Values handed to the consumer so far.
    public get delivered(): number {
        return this._delivered;
    }

    public get buffered(): number {
        return this._buffer.length;
    }

    public push(value: T): Promise<boolean> {
        if (this._closed || this.isCancelled) return Promise.resolve(false);

        const read = this._pendingReads.shift();

        if (read) {
            this._delivered++;
            read({ done: false, value });

            return Promise.resolve(true);
        }

        if (this._buffer.length < this._capacity) {
            this._buffer.push(value);

            return Promise.resolve(true);
        }

        return new Promise((resolve) => {
            this._pendingPushes.push({ value, resolve });
        });
    }

    /**
     * End of stream for the consumer once the buffer drains. Called by the producer side, once.
     */
    public close(): void {
        if (this._closed) return;

        this._closed = true;

        // Nobody is left to make room for these.
        for (const pending of this._pendingPushes.splice(0)) {
            pending.resolve(false);
        }

        if (this._buffer.length === 0) {
            for (const read of this._pendingReads.splice(0)) {
                read({ done: true, value: undefined });
            }
        }
    }

    public cancel(): void {
        if (this.isCancelled) return;

        this._abort.abort();
        this._buffer.length = 0;

        for (const pending of this._pendingPushes.splice(0)) {
            pending.resolve(false);
        }

        for (const read of this._pendingReads.splice(0)) {
            read({ done: true, value: undefined });
        }
    }

    public next(): Promise<IteratorResult<T>> {
        if (this.isCancelled) return Promise.resolve({ done: true, value: undefined });

        if (this._buffer.length > 0) {
            const [ value ] = this._buffer.splice(0, 1);

            this._refill();
            this._delivered++;

            return Promise.resolve({ done: false, value });
        }

        if (this._closed) return Promise.resolve({ done: true, value: undefined });

        return new Promise((resolve) => {
            this._pendingReads.push(resolve);
        });
    }

    // `break` inside `for await` lands here.
    public return(): Promise<IteratorResult<T>> {
        this.cancel();

        return Promise.resolve({ done: true, value: undefined });
    }

    public [Symbol.asyncIterator](): AsyncIterableIterator<T> {
        return this;
    }

    private _refill(): void {
        const pending = this._pendingPushes.shift();

        if (!pending) return;

        this._buffer.push(pending.value);
        pending.resolve(true);
    }
}
