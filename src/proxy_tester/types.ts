import type { ProbeError } from '~/proxy_tester/errors';
import type { Proxy } from '~/types';

export interface CampaignConfig {
    readonly url: string,
    // probes allowed in flight at once
    readonly workers: number,
    // per probe, milliseconds
    readonly timeout: number,
}

export interface ProbeSuccess {
    status: 'success',
    // milliseconds from dispatch to response
    duration: number,
}

export interface ProbeFailure {
    status: 'failure',
    error: ProbeError,
}

export type ProbeResult = ProbeSuccess | ProbeFailure;

export interface ProbeOutcome {
    readonly proxy: Proxy,
    readonly result: ProbeResult,
}

export interface CampaignSummary {
    total: number,
    succeeded: number,
    failed: number,
    outcomes: ProbeOutcome[],
}
