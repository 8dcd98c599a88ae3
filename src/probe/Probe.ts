import type { ProbeResult } from '~/proxy_tester/types';
import type { Proxy } from '~/types';

export interface ProbeOptions {
    url: string,
    // milliseconds, wall clock
    timeout: number,
    // Aborts the request when the campaign is cancelled.
    signal?: AbortSignal,
}

/**
 * One attempt through one proxy. Implementations resolve failures as data and never reject.
 */
export abstract class Probe {
    public abstract check(proxy: Proxy, options: ProbeOptions): Promise<ProbeResult>;
}
