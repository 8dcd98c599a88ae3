import fs from 'fs';
import readline from 'readline';
import { Logger } from '~/logger';
import { parseLineToProxy } from '~/proxy_parser';
import { ProxyParseError } from '~/proxy_parser/errors';
import type { Proxy, ProxyFormat } from '~/types';

export interface LineParseError {
    path: string,
    // 1-based
    line: number,
    content: string,
    error: ProxyParseError,
}

export interface LoadedProxies {
    proxies: Proxy[],
    errors: LineParseError[],
}

const logger = new Logger('ProxiesFile_reader');

/**
 * Reads one proxy per line. A line that does not parse is logged and collected,
 * the rest of the file still loads. Blank lines are skipped.
 */
export function loadProxiesFromFile(path: string, format: ProxyFormat): Promise<LoadedProxies> {
    return new Promise((resolve, reject) => {
        const readStream = fs.createReadStream(path, { autoClose: true });

        const rl = readline.createInterface({
            input: readStream,
            crlfDelay: Infinity,
        });

        const onError = (e: Error) => {
            logger.error(e.message);
            rl.close();
            reject(e);
        };

        readStream.on('error', onError);
        rl.on('error', onError);

        const proxies: Proxy[] = [];
        const errors: LineParseError[] = [];
        let line_number = 0;

        rl.on('line', (line) => {
            line_number++;

            const _line = line.trim();

            if (!_line) return;

            try {
                proxies.push(parseLineToProxy(_line, format));
            } catch (e) {
                if (e instanceof ProxyParseError) {
                    logger.warning(`${ path }:${ line_number }`, e.message);
                    errors.push({ path, line: line_number, content: _line, error: e });
                } else {
                    rl.close();
                    reject(e);
                }
            }
        });

        rl.on('close', () => {
            resolve({ proxies, errors });
        });
    });
}
