import type { Logger } from 'pino';
import { getClientConfig, type ClientConfig } from '../../config/index.js';
import { createCache } from '../../lib/cache/create-cache.js';
import type { ResponseCache } from '../../lib/cache/cache.types.js';
import { logger as rootLogger } from '../../lib/logger/structured-logger.js';
import type { RetryHooks } from '../../lib/reliability/retry-policy.js';
import { createFetchTransport, type HttpTransport } from '../../utils/fetch-with-timeout.js';
import { TabelogFetcher } from './fetcher.js';
import { RestaurantSearchService } from './search.service.js';

export interface SearchServiceOverrides {
  transport?: HttpTransport;
  /** `null` disables caching regardless of config. */
  cache?: ResponseCache | null;
  retryHooks?: Pick<RetryHooks, 'sleep' | 'random'>;
  logger?: Logger;
}

/**
 * Wire config → cache + transport + fetcher → service.
 */
export function createSearchService(
  config: ClientConfig = getClientConfig(),
  overrides: SearchServiceOverrides = {}
): RestaurantSearchService {
  const logger = overrides.logger ?? rootLogger;
  const cache = overrides.cache === undefined ? createCache(config.cache) : overrides.cache;
  const transport =
    overrides.transport ?? createFetchTransport({ timeoutMs: config.httpTimeoutMs, userAgent: config.userAgent });

  const fetcher = new TabelogFetcher({
    transport,
    cache,
    retry: config.retry,
    retryHooks: overrides.retryHooks,
    logger,
  });

  logger.debug({ cacheBackend: cache?.name ?? 'off', baseUrl: config.baseUrl }, '[Client] search service ready');

  return new RestaurantSearchService(fetcher, {
    baseUrl: config.baseUrl,
    searchTtlSeconds: config.cache.searchTtlSeconds,
    suggestTtlSeconds: config.cache.suggestTtlSeconds,
    logger,
  });
}
