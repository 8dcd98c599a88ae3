import { parseArgs } from 'util';
import type { CampaignConfigInput } from '~/proxy_tester/config';

export const USAGE = `Usage: proxy-probe [options] FILE...
       proxy-probe --serve [options]

Tests every proxy listed in FILE (one host:port:username:password per line)
against a target URL and prints each result as soon as it is known.

Options:
  -u, --url <url>        URL to test the proxies against       (env PROBE_URL)
  -w, --workers <n>      how many proxies to test at once      (env PROBE_WORKERS)
  -t, --timeout <ms>     timeout for each request, in ms       (env PROBE_TIMEOUT_MS)
      --serve            serve POST /check on $PORT instead of reading files
  -h, --help             show this help`;

export interface CliOptions {
    files: string[],
    serve: boolean,
    help: boolean,
    input: CampaignConfigInput,
}

export type CliEnv = Partial<Record<'PROBE_URL' | 'PROBE_WORKERS' | 'PROBE_TIMEOUT_MS', string>>;

export class CliUsageError extends Error {
    constructor(message: string) {
        super(`${ CliUsageError.name }: ${ message }`);

        this.name = CliUsageError.name;
    }
}

function toNumber(raw: string | undefined): number | undefined {
    if (raw === undefined || raw.trim() === '') return undefined;

    return Number(raw);
}

function nonEmpty(raw: string | undefined): string | undefined {
    return raw === undefined || raw === '' ? undefined : raw;
}

function readArgs(argv: string[]) {
    try {
        return parseArgs({
            args: argv,
            allowPositionals: true,
            options: {
                url: { type: 'string', short: 'u' },
                workers: { type: 'string', short: 'w' },
                timeout: { type: 'string', short: 't' },
                serve: { type: 'boolean', default: false },
                help: { type: 'boolean', short: 'h', default: false },
            },
        });
    } catch (e) {
        if (e instanceof TypeError) throw new CliUsageError(e.message);

        throw e;
    }
}

/**
 * Flags win over the environment. Values are not validated here, that is `createCampaignConfig`'s job.
 */
export function parseCliArgs(argv: string[], env: CliEnv = {}): CliOptions {
    const { values, positionals } = readArgs(argv);
    const options: CliOptions = {
        files: positionals,
        serve: values.serve ?? false,
        help: values.help ?? false,
        input: {
            url: nonEmpty(values.url ?? env.PROBE_URL),
            workers: toNumber(values.workers ?? env.PROBE_WORKERS),
            timeout: toNumber(values.timeout ?? env.PROBE_TIMEOUT_MS),
        },
    };

    if (!options.help && !options.serve && options.files.length === 0) {
        throw new CliUsageError('at least one proxy file is required');
    }

    return options;
}
