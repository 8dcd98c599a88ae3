import axios, { type AxiosRequestConfig } from 'axios';
import { HttpsProxyAgent } from 'hpagent';
import type { OutgoingHttpHeaders } from 'http';
import { performance } from 'perf_hooks';
import type { Readable } from 'stream';
import { Probe, type ProbeOptions } from '~/probe/Probe';
import { CanceledProbeError, type ProbeError, ProbeTimeoutError, TransportError } from '~/proxy_tester/errors';
import type { ProbeResult } from '~/proxy_tester/types';
import type { Proxy } from '~/types';
import { encodeProxyUrl } from '~/utils';

const TIMEOUT_CODES = [ 'ECONNABORTED', 'ETIMEDOUT' ];

// Options hpagent spreads into its CONNECT request to the proxy.
interface TunnelRequestOptions {
    headers: OutgoingHttpHeaders,
    signal: AbortSignal,
}

/**
 * GETs the target through the proxy. Plain http targets go through the proxy as an absolute-URI request,
 * https targets through a CONNECT tunnel. Any status code is a success, and the body is never read.
 */
export class HttpProbe extends Probe {
    public async check(proxy: Proxy, options: ProbeOptions): Promise<ProbeResult> {
        if (options.signal?.aborted) {
            return { status: 'failure', error: new CanceledProbeError() };
        }

        const controller = new AbortController();
        let timed_out = false;

        const timer = setTimeout(() => {
            timed_out = true;
            controller.abort();
        }, options.timeout);

        const onCancel = () => controller.abort();
        options.signal?.addEventListener('abort', onCancel, { once: true });

        const started = performance.now();

        try {
            const response = await axios.get<Readable>(options.url, {
                ...HttpProbe._routeThrough(proxy, options.url, options.timeout, controller.signal),
                timeout: options.timeout,
                signal: controller.signal,
                responseType: 'stream',
                maxRedirects: 0,
                validateStatus: () => true,
            });

            const duration = performance.now() - started;

            response.data.destroy();

            return { status: 'success', duration };

        } catch (e) {
            let error: ProbeError;

            if (options.signal?.aborted) error = new CanceledProbeError();
            else if (timed_out) error = new ProbeTimeoutError(options.timeout, e);
            else error = HttpProbe._toTransportError(e, options.timeout);

            return { status: 'failure', error };

        } finally {
            clearTimeout(timer);
            options.signal?.removeEventListener('abort', onCancel);
        }
    }

    private static _routeThrough(proxy: Proxy, url: string, timeout: number, signal: AbortSignal): AxiosRequestConfig {
        if (new URL(url).protocol === 'https:') {
            // The CONNECT request is the agent's own, aborting axios alone leaves it open.
            const tunnel: TunnelRequestOptions = { headers: {}, signal };

            return {
                proxy: false,
                httpsAgent: new HttpsProxyAgent({
                    proxy: encodeProxyUrl(proxy),
                    timeout,
                    proxyRequestOptions: tunnel,
                }),
            };
        }

        const has_auth = !!(proxy.username || proxy.password);

        return {
            proxy: {
                protocol: 'http',
                host: proxy.host,
                port: proxy.port,
                auth: has_auth ? { username: proxy.username ?? '', password: proxy.password ?? '' } : undefined,
            },
        };
    }

    private static _toTransportError(e: unknown, timeout: number): TransportError {
        if (axios.isAxiosError(e)) {
            if (e.code && TIMEOUT_CODES.includes(e.code)) return new ProbeTimeoutError(timeout, e);

            return new TransportError(e.message, e, e.code);
        }

        if (e instanceof Error) return new TransportError(e.message, e);

        return new TransportError(String(e), e);
    }
}
