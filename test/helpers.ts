import net from 'net';
import { Probe, type ProbeOptions } from '~/probe/Probe';
import { CanceledProbeError } from '~/proxy_tester/errors';
import type { ProbeResult } from '~/proxy_tester/types';
import type { Proxy } from '~/types';

export type ProbeBehaviour = (proxy: Proxy, options: ProbeOptions) => Promise<ProbeResult>;

export function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

export function succeedAfter(ms: number, duration: number = ms): Promise<ProbeResult> {
    return sleep(ms).then((): ProbeResult => ({ status: 'success', duration }));
}

// Resolves only once the campaign is cancelled.
export function untilCancelled(options: ProbeOptions): Promise<ProbeResult> {
    return new Promise((resolve) => {
        options.signal?.addEventListener('abort', () => {
            resolve({ status: 'failure', error: new CanceledProbeError() });
        }, { once: true });
    });
}

/**
 * Records what the engine asks of it and how many checks overlap.
 */
export class FakeProbe extends Probe {
    public readonly calls: Proxy[] = [];
    public inFlight = 0;
    public maxInFlight = 0;

    private readonly _behaviour: ProbeBehaviour;

    constructor(behaviour: ProbeBehaviour) {
        super();

        this._behaviour = behaviour;
    }

    public async check(proxy: Proxy, options: ProbeOptions): Promise<ProbeResult> {
        this.calls.push(proxy);
        this.inFlight++;
        this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);

        try {
            return await this._behaviour(proxy, options);
        } finally {
            this.inFlight--;
        }
    }
}

/**
 * A local port nothing listens on: bound once, then released.
 */
export function refusedPort(): Promise<number> {
    return new Promise((resolve, reject) => {
        const server = net.createServer();

        server.once('error', reject);
        server.listen(0, '127.0.0.1', () => {
            const address = server.address();

            if (address === null || typeof address === 'string') {
                reject(new Error('expected a TCP address'));
                return;
            }

            server.close(() => resolve(address.port));
        });
    });
}
