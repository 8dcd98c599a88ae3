import type { Proxy } from '~/types';

export function createProxy(host: string, port: number, username?: string, password?: string): Proxy {
    return Object.freeze({ host, port, username, password });
}

export function parseProxyToUrl(proxy: Proxy): string {
    return `http://${ proxy.username ?? '' }:${ proxy.password ?? '' }@${ proxy.host }:${ proxy.port }`;
}

/**
 * Same shape as `parseProxyToUrl`, with the credentials percent-encoded so that `new URL` takes them as they are.
 */
export function encodeProxyUrl(proxy: Proxy): string {
    const username = encodeURIComponent(proxy.username ?? '');
    const password = encodeURIComponent(proxy.password ?? '');

    return `http://${ username }:${ password }@${ proxy.host }:${ proxy.port }`;
}

/**
 * Milliseconds to a short human string, e.g. `84.120ms` or `1.503s`.
 */
export function formatDuration(ms: number): string {
    if (ms < 1000) return `${ ms.toFixed(3) }ms`;

    return `${ (ms / 1000).toFixed(3) }s`;
}
