import { Logger, type LoggerCounter } from '~/logger';
import type { CampaignConfig, CampaignSummary, ProbeOutcome } from '~/proxy_tester/types';
import { formatDuration, parseProxyToUrl } from '~/utils';

export type OutcomeRow = [ proxy: string, status: string, duration: string ];

export function formatOutcomeRow(outcome: ProbeOutcome): OutcomeRow {
    const proxy = parseProxyToUrl(outcome.proxy);

    if (outcome.result.status === 'success') {
        return [ proxy, 'Success', formatDuration(outcome.result.duration) ];
    }

    return [ proxy, outcome.result.error.message, 'N/A' ];
}

/**
 * Prints the campaign as it runs: a header, one `i/count` line per outcome, then the totals.
 */
export class ConsoleReporter {
    private readonly _logger: Logger;
    private readonly _counter: LoggerCounter;
    private readonly _config: CampaignConfig;
    private readonly _count: number;

    constructor(config: CampaignConfig, count: number, logger: Logger = new Logger('Results')) {
        this._config = config;
        this._count = count;
        this._logger = logger;
        this._counter = logger.createCounter(count);
    }

    public get reported(): number {
        return this._counter.count;
    }

    public printHeader(): void {
        this._logger.log(`Proxies: ${ this._count }`);
        this._logger.log(`URL: ${ this._config.url }`);
        this._logger.log(`Workers: ${ this._config.workers }`);
        this._logger.log(`Timeout: ${ formatDuration(this._config.timeout) }`);
    }

    public report(outcome: ProbeOutcome): void {
        const [ proxy, status, duration ] = formatOutcomeRow(outcome);

        if (outcome.result.status === 'success') this._counter.happy(proxy, status, duration);
        else this._counter.error(proxy, status, duration);
    }

    public printSummary(summary: CampaignSummary, cancelled: boolean = false): void {
        if (cancelled) {
            this._logger.warning(`Cancelled after ${ summary.total } of ${ this._count } proxies`);
        }

        const line = `${ summary.succeeded } of ${ summary.total } tested proxies are working, ${ summary.failed } failed`;

        if (summary.succeeded > 0) this._logger.happy(line);
        else this._logger.error(line);
    }
}
