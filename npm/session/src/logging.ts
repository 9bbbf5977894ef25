/**
 * Request logging.
 */

import {
  isAxiosError,
  type AxiosInstance,
  type InternalAxiosRequestConfig,
} from 'axios';
import type { Logger } from './types';

const PREFIX = '[graphql-session]';

/**
 * Logs every request the transport dispatches, and its outcome.
 *
 * @example
 * ```typescript
 * const session = createSession({
 *   url: 'http://localhost:4000/graphql',
 *   logger: (message, data) => console.debug(message, data),
 * });
 * ```
 */
export function installLogging(transport: AxiosInstance, logger: Logger): void {
  const startTimes = new WeakMap<InternalAxiosRequestConfig, number>();

  // Failures raised before dispatch, e.g. by an auth hook, carry no config.
  const describe = (config: InternalAxiosRequestConfig | undefined): string =>
    config ? `${(config.method ?? 'get').toUpperCase()} ${config.url ?? ''}` : 'request';

  const elapsed = (config: InternalAxiosRequestConfig | undefined): number => {
    const start = config ? startTimes.get(config) : undefined;
    return start === undefined ? 0 : Date.now() - start;
  };

  transport.interceptors.request.use((config) => {
    startTimes.set(config, Date.now());
    logger(`${PREFIX} ${describe(config)}`);
    return config;
  });

  transport.interceptors.response.use(
    (response) => {
      logger(
        `${PREFIX} ${describe(response.config)} ${response.status} in ${elapsed(response.config)}ms`
      );
      return response;
    },
    (error: unknown) => {
      const config = isAxiosError(error) ? error.config : undefined;
      logger(`${PREFIX} ${describe(config)} failed after ${elapsed(config)}ms`, {
        error,
      });
      throw error;
    }
  );
}
