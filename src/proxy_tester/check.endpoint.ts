import type { RequestHandler } from 'express';
import type { Writable } from 'stream';
import { PROXY_FORMAT } from '~/config';
import { Logger } from '~/logger';
import type { Probe } from '~/probe/Probe';
import { parseLineToProxy } from '~/proxy_parser';
import { ProxyParseError, type ProxyParseErrorReason } from '~/proxy_parser/errors';
import { ProxyTester } from '~/proxy_tester';
import { type CampaignConfigInput, createCampaignConfig } from '~/proxy_tester/config';
import type { ProbeErrorKind } from '~/proxy_tester/errors';
import { collectOutcomes } from '~/proxy_tester/summary';
import type { ProbeOutcome } from '~/proxy_tester/types';
import type { AddEndpointInterface, ServerError } from '~/server/types';
import { parseProxyToUrl } from '~/utils';

export type OutcomeLine =
    | { proxy: string, status: 'success', duration: number }
    | { proxy: string, status: 'failure', kind: ProbeErrorKind, error: string };

export interface RejectedLine {
    // 1-based index into the request body
    line: number,
    content: string,
    reason: ProxyParseErrorReason,
}

export interface SummaryLine {
    summary: {
        total: number,
        succeeded: number,
        failed: number,
        rejected: RejectedLine[],
    },
}

export function toOutcomeLine(outcome: ProbeOutcome): OutcomeLine {
    const proxy = parseProxyToUrl(outcome.proxy);

    if (outcome.result.status === 'success') {
        return { proxy, status: 'success', duration: outcome.result.duration };
    }

    return {
        proxy,
        status: 'failure',
        kind: outcome.result.error.kind,
        error: outcome.result.error.message,
    };
}

/**
 * Writes one NDJSON line and resolves once the destination can take more, or is gone.
 */
export function writeLine(out: Writable, value: unknown): Promise<void> {
    if (out.destroyed) return Promise.resolve();
    if (out.write(JSON.stringify(value) + '\n')) return Promise.resolve();
    if (out.destroyed) return Promise.resolve();

    return new Promise((resolve) => {
        const done = () => {
            out.off('drain', done);
            out.off('close', done);
            resolve();
        };

        out.on('drain', done);
        out.on('close', done);
    });
}

// Repeated or nested query params are ignored.
function queryString(value: unknown): string | undefined {
    return typeof value === 'string' ? value : undefined;
}

function queryNumber(value: unknown, fallback: number | undefined): number | undefined {
    const raw = queryString(value);

    return raw === undefined ? fallback : +raw;
}

function isLineArray(body: unknown): body is string[] {
    return Array.isArray(body) && body.every((line) => typeof line === 'string');
}

/**
 * `POST /check` runs a campaign over the posted proxy lines and streams one NDJSON line per outcome,
 * followed by a summary line. A client that hangs up cancels the campaign.
 */
export class CheckEndpoint {
    private _logger: Logger;
    private readonly _defaults: CampaignConfigInput;
    private readonly _probe: Probe | undefined;

    constructor(defaults: CampaignConfigInput = {}, probe?: Probe) {
        this._logger = new Logger('CheckEndpoint');
        this._defaults = defaults;
        this._probe = probe;
    }

    public getEndpoints(): AddEndpointInterface[] {
        return [
            {
                path: '/check',
                method: 'post',
                handler: this._checkEndpointHandler,
            },
        ];
    }

    private _checkEndpointHandler: RequestHandler = async (req, res) => {
        const body: unknown = req.body;

        if (!isLineArray(body)) {
            const error: ServerError = { msg: 'body must be an array of proxy lines' };

            res.status(400);
            res.send(error);
            return;
        }

        const config = createCampaignConfig({
            url: queryString(req.query.url) ?? this._defaults.url,
            workers: queryNumber(req.query.workers, this._defaults.workers),
            timeout: queryNumber(req.query.timeout, this._defaults.timeout),
        });

        if (!config.ok) {
            const error: ServerError = { msg: config.error.message, issues: config.error.issues };

            res.status(400);
            res.send(error);
            return;
        }

        const tester = new ProxyTester(config.config, this._probe);
        const rejected: RejectedLine[] = [];

        body.forEach((content, i) => {
            try {
                tester.load(parseLineToProxy(content.trim(), PROXY_FORMAT));
            } catch (e) {
                if (!(e instanceof ProxyParseError)) throw e;

                rejected.push({ line: i + 1, content, reason: e.reason });
            }
        });

        this._logger.log(`Checking ${ tester.count } proxies, ${ rejected.length } lines rejected`);

        const stream = tester.run();

        res.on('close', () => {
            if (!res.writableFinished) stream.cancel();
        });

        try {
            res.status(200);
            res.appendHeader('content-type', 'application/x-ndjson');

            const summary = await collectOutcomes(stream, (outcome) => writeLine(res, toOutcomeLine(outcome)));

            // The client hung up.
            if (res.destroyed) return;

            const summary_line: SummaryLine = {
                summary: {
                    total: summary.total,
                    succeeded: summary.succeeded,
                    failed: summary.failed,
                    rejected,
                },
            };

            res.end(JSON.stringify(summary_line) + '\n');

        } catch (e) {
            stream.cancel();

            if (e instanceof Error) {
                this._logger.error('Failed streaming outcomes:', e.message);
                res.end();
            } else throw e;
        }
    };
}
