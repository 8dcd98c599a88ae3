import { PROXY_FORMAT, RESULT_STREAM_CAPACITY } from '~/config';
import { Logger } from '~/logger';
import { HttpProbe } from '~/probe/http.probe';
import type { Probe } from '~/probe/Probe';
import { type LineParseError, loadProxiesFromFile } from '~/proxy_parser/file.loader';
import { CampaignStateError, GateClosedError, GateError, UnknownProbeError } from '~/proxy_tester/errors';
import { ResultStream } from '~/proxy_tester/result-stream';
import { Semaphore } from '~/proxy_tester/semaphore';
import type { CampaignConfig, ProbeFailure, ProbeOutcome, ProbeResult } from '~/proxy_tester/types';
import type { Proxy, ProxyFormat } from '~/types';

/**
 * Runs one probe per loaded proxy, at most `workers` at a time, and streams every outcome
 * as soon as its probe finishes. Outcomes arrive in completion order.
 *
 * @example
 * const result = createCampaignConfig({ url: 'https://example.com', workers: 10, timeout: 5000 });
 * if (!result.ok) throw result.error;
 *
 * const tester = new ProxyTester(result.config);
 * await tester.loadFromFile('proxies.txt');
 *
 * for await (const outcome of tester.run()) {
 *     console.log(parseProxyToUrl(outcome.proxy), outcome.result.status);
 * }
 */
export class ProxyTester {
    private readonly _config: CampaignConfig;
    private readonly _probe: Probe;
    private readonly _proxies: Proxy[] = [];
    private readonly _logger: Logger;

    private _isStarted: boolean = false;

    constructor(config: CampaignConfig, probe: Probe = new HttpProbe()) {
        this._config = config;
        this._probe = probe;
        this._logger = new Logger('ProxyTester');
    }

    public get config(): CampaignConfig {
        return this._config;
    }

    public get url(): string {
        return this._config.url;
    }

    public get workers(): number {
        return this._config.workers;
    }

    public get timeout(): number {
        return this._config.timeout;
    }

    public get count(): number {
        return this._proxies.length;
    }

    public get isEmpty(): boolean {
        return this._proxies.length === 0;
    }

    public get isStarted(): boolean {
        return this._isStarted;
    }

    public get proxies(): readonly Proxy[] {
        return this._proxies;
    }

    public load(...proxies: Proxy[]): void {
        this._append(proxies);
    }

    /**
     * Appends every line of the file that parses. The ones that don't are returned, not thrown.
     */
    public async loadFromFile(path: string, format: ProxyFormat = PROXY_FORMAT): Promise<LineParseError[]> {
        this._assertNotStarted('load proxies into');

        const { proxies, errors } = await loadProxiesFromFile(path, format);

        this._append(proxies);
        this._logger.log(`Loaded ${ proxies.length } proxies from ${ Logger.makeUnderline(path) }`);

        return errors;
    }

    /**
     * Starts the campaign and returns the live stream right away. The stream closes once every
     * probe has finished; cancelling it aborts requests still in flight.
     */
    public run(): ResultStream<ProbeOutcome> {
        this._assertNotStarted('run');
        this._isStarted = true;

        const stream = new ResultStream<ProbeOutcome>(RESULT_STREAM_CAPACITY);

        if (this.isEmpty) {
            this._logger.warning('No proxies loaded, nothing to test');
            stream.close();

            return stream;
        }

        const gate = new Semaphore(this._config.workers);

        this._logger.log(
            `Testing ${ this.count } proxies against ${ Logger.makeUnderline(this.url) } with ${ this.workers } workers`
        );

        const units = this._proxies.map((proxy) => this._runUnit(proxy, gate, stream));

        this._join(units, gate, stream).catch((e) => {
            this._logger.error('Failed to finish the campaign:', e instanceof Error ? e.message : e);
        });

        return stream;
    }

    private _append(proxies: readonly Proxy[]): void {
        this._assertNotStarted('load proxies into');

        for (const proxy of proxies) {
            this._proxies.push(proxy);
        }
    }

    private async _runUnit(proxy: Proxy, gate: Semaphore, stream: ResultStream<ProbeOutcome>): Promise<void> {
        let result: ProbeResult | undefined;

        try {
            result = await gate.use(async () => {
                if (stream.isCancelled) return undefined;

                return Promise.resolve()
                .then(() => this._probe.check(proxy, {
                    url: this._config.url,
                    timeout: this._config.timeout,
                    signal: stream.signal,
                }))
                .catch((e: unknown): ProbeFailure => ({ status: 'failure', error: new UnknownProbeError(e) }));
            });
        } catch (e) {
            if (!(e instanceof GateClosedError)) throw e;

            this._logger.error('Semaphore was closed while a probe was waiting, this should never happen');
            result = { status: 'failure', error: new GateError(e) };
        }

        if (!result) return;

        await stream.push(Object.freeze({ proxy, result }));
    }

    // The only place the gate and the stream get closed.
    private async _join(units: Promise<void>[], gate: Semaphore, stream: ResultStream<ProbeOutcome>): Promise<void> {
        try {
            const settled = await Promise.allSettled(units);

            settled.forEach((r) => {
                if (r.status === 'rejected') {
                    this._logger.error('Probe unit failed:', r.reason instanceof Error ? r.reason.message : r.reason);
                }
            });

            if (stream.isCancelled) {
                this._logger.warning(`Cancelled after ${ stream.delivered } of ${ this.count } outcomes`);
            } else {
                this._logger.log(`All ${ this.count } probes finished`);
            }
        } finally {
            gate.close();
            stream.close();
        }
    }

    private _assertNotStarted(action: string): void {
        if (this._isStarted) {
            throw new CampaignStateError(`cannot ${ action } a campaign that has already started`);
        }
    }
}
