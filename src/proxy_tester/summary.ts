import type { ResultStream } from '~/proxy_tester/result-stream';
import type { CampaignSummary, ProbeOutcome } from '~/proxy_tester/types';

export function summarize(outcomes: ProbeOutcome[]): CampaignSummary {
    const succeeded = outcomes.filter((o) => o.result.status === 'success').length;

    return {
        total: outcomes.length,
        succeeded,
        failed: outcomes.length - succeeded,
        outcomes,
    };
}

/**
 * Drains the stream until it closes. An empty summary means nothing was tested,
 * a summary with `succeeded === 0` means everything was tested and nothing worked.
 * The next outcome is read only once `onOutcome` has settled.
 */
export async function collectOutcomes(
    stream: ResultStream<ProbeOutcome>,
    onOutcome?: (outcome: ProbeOutcome) => void | Promise<void>,
): Promise<CampaignSummary> {
    const outcomes: ProbeOutcome[] = [];

    for await (const outcome of stream) {
        outcomes.push(outcome);
        await onOutcome?.(outcome);
    }

    return summarize(outcomes);
}
