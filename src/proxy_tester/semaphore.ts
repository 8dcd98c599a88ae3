import { GateClosedError } from '~/proxy_tester/errors';

export interface Permit {
    // Idempotent.
    release(): void;
}

interface Waiter {
    resolve: (permit: Permit) => void,
    reject: (e: Error) => void,
}

/**
 * Counting permit pool. Waiters are served in arrival order.
 */
export class Semaphore {
    private readonly _permits: number;
    private _available: number;
    private _closed = false;
    private readonly _waiters: Waiter[] = [];

    constructor(permits: number) {
        if (!Number.isInteger(permits) || permits < 1) {
            throw new RangeError(`permits must be a positive integer, got ${ permits }`);
        }

        this._permits = permits;
        this._available = permits;
    }

    public get available(): number {
        return this._available;
    }

    public get inFlight(): number {
        return this._permits - this._available;
    }

    public get waiting(): number {
        return this._waiters.length;
    }

    public get isClosed(): boolean {
        return this._closed;
    }

    public acquire(): Promise<Permit> {
        if (this._closed) return Promise.reject(new GateClosedError());

        if (this._available > 0) {
            this._available--;

            return Promise.resolve(this._createPermit());
        }

        return new Promise((resolve, reject) => {
            this._waiters.push({ resolve, reject });
        });
    }

    public async use<T>(fn: () => Promise<T>): Promise<T> {
        const permit = await this.acquire();

        try {
            return await fn();
        } finally {
            permit.release();
        }
    }

    /**
     * Rejects everyone still waiting. Held permits can still be released.
     */
    public close(): void {
        if (this._closed) return;

        this._closed = true;

        for (const waiter of this._waiters.splice(0)) {
            waiter.reject(new GateClosedError());
        }
    }

    private _createPermit(): Permit {
        let released = false;

        return {
            release: () => {
                if (released) return;

                released = true;
                this._release();
            },
        };
    }

    private _release(): void {
        const next = this._waiters.shift();

        // Hand the slot straight to the next waiter, the in-flight count stays the same.
        if (next) {
            next.resolve(this._createPermit());
            return;
        }

        this._available++;
    }
}
