/**
 * Fetcher
 *
 * Cache-then-retry GET:
 * 1. derive the cache key from (url, normalized params)
 * 2. return the cached body on a hit
 * 3. otherwise GET under the retry policy and store the body with its TTL
 *
 * `fetchParsed` runs the parser before the write, so a body the parser
 * rejects (maintenance page, truncated JSON) is never cached.
 *
 * Cache failures never fail a request: they are logged and the cache is
 * bypassed. A request that cannot be completed raises FETCH with the URL,
 * the attempt count and the last underlying error as `cause`.
 */

import type { Logger } from 'pino';
import { buildCacheKey, type QueryParams } from '../../lib/cache/cache-key.js';
import type { ResponseCache } from '../../lib/cache/cache.types.js';
import { fetchError, isGurumeError } from '../../lib/errors/gurume-error.js';
import {
  DEFAULT_RETRY_POLICY,
  RetryOutcome,
  runWithRetry,
  type RetryHooks,
  type RetryPolicy,
} from '../../lib/reliability/retry-policy.js';
import { logger as rootLogger } from '../../lib/logger/structured-logger.js';
import type { HttpTransport } from '../../utils/fetch-with-timeout.js';

export interface FetcherDeps {
  transport: HttpTransport;
  cache: ResponseCache | null;
  retry?: RetryPolicy;
  /** Clock and randomness for backoff; tests replace both. */
  retryHooks?: Pick<RetryHooks, 'sleep' | 'random'>;
  logger?: Logger;
}

export interface FetchOptions {
  ttlSeconds: number;
}

export class TabelogFetcher {
  private readonly transport: HttpTransport;
  private readonly cache: ResponseCache | null;
  private readonly retry: RetryPolicy;
  private readonly retryHooks: Pick<RetryHooks, 'sleep' | 'random'>;
  private readonly logger: Logger;

  constructor(deps: FetcherDeps) {
    this.transport = deps.transport;
    this.cache = deps.cache;
    this.retry = deps.retry ?? DEFAULT_RETRY_POLICY;
    this.retryHooks = deps.retryHooks ?? {};
    this.logger = (deps.logger ?? rootLogger).child({ component: 'fetcher' });
  }

  fetch(url: string, params: QueryParams, options: FetchOptions): Promise<string> {
    return this.fetchParsed(url, params, options, (body) => body);
  }

  async fetchParsed<T>(
    url: string,
    params: QueryParams,
    options: FetchOptions,
    parse: (body: string) => T
  ): Promise<T> {
    const key = buildCacheKey(url, params);

    const cached = await this.readCache(key);
    if (cached !== null) {
      this.logger.debug({ url, cacheBackend: this.cache?.name }, '[Fetcher] cache hit');
      return parse(cached);
    }

    const startTime = Date.now();
    const outcome = await runWithRetry(() => this.transport({ url, params }), this.retry, {
      ...this.retryHooks,
      onRetry: (error, attempt, delayMs) => {
        this.logger.warn(
          { url, attempt, delayMs, error: error instanceof Error ? error.message : String(error) },
          '[Fetcher] retrying request'
        );
      },
    });

    if (outcome instanceof RetryOutcome) {
      const { lastError, attempts } = outcome;
      if (isGurumeError(lastError, 'INPUT') || isGurumeError(lastError, 'PARSE')) {
        throw lastError;
      }
      this.logger.error(
        { url, attempts, durationMs: Date.now() - startTime, error: lastError instanceof Error ? lastError.message : String(lastError) },
        '[Fetcher] request failed'
      );
      throw fetchError(url, attempts, lastError);
    }

    this.logger.info(
      { url, status: outcome.value.status, attempts: outcome.attempts, durationMs: Date.now() - startTime },
      '[Fetcher] fetched'
    );
    const parsed = parse(outcome.value.body);
    await this.writeCache(key, outcome.value.body, options.ttlSeconds);
    return parsed;
  }

  private async readCache(key: string): Promise<string | null> {
    if (!this.cache) return null;
    try {
      return await this.cache.get(key);
    } catch (error) {
      this.logger.warn(
        { cacheBackend: this.cache.name, error: error instanceof Error ? error.message : String(error) },
        '[Fetcher] cache read failed, bypassing cache'
      );
      return null;
    }
  }

  private async writeCache(key: string, body: string, ttlSeconds: number): Promise<void> {
    if (!this.cache || ttlSeconds <= 0) return;
    try {
      await this.cache.set(key, body, ttlSeconds);
    } catch (error) {
      this.logger.warn(
        { cacheBackend: this.cache.name, error: error instanceof Error ? error.message : String(error) },
        '[Fetcher] cache write failed, bypassing cache'
      );
    }
  }
}
