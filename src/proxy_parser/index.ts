import { ProxyParseError } from '~/proxy_parser/errors';
import type { Proxy, ProxyFormat } from '~/types';
import { createProxy } from '~/utils';

const MAX_PORT = 65535;

export function parseLineToProxy(line: string, format: ProxyFormat): Proxy {
    switch (format) {
        case 'host:port:username:password': {
            const parts = line.split(':');

            if (parts.length !== 4) throw new ProxyParseError('invalid_part_count');

            const [ host, port, username, password ] = parts;

            if (!/^\d+$/.test(port) || +port > MAX_PORT) throw new ProxyParseError('port_not_a_number');

            return createProxy(host, +port, username, password);
        }
    }
}
