import appRootPath from 'app-root-path';
import * as path from 'path';
import type { ProxyFormat } from '~/types';

export const ENV_PATH = path.resolve(appRootPath.path, '.env');

export const ENV_EXAMPLE_PATH = path.resolve(appRootPath.path, '.env.example');

// Outcomes buffered before producers start waiting on the consumer.
export const RESULT_STREAM_CAPACITY = 100;

export const PROXY_FORMAT: ProxyFormat = 'host:port:username:password';
