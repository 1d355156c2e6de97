/**
 * Centralized configuration for the search client.
 * Values that depend on the environment are resolved once from env.ts;
 * upstream constants (paths, page size, limits) live here as plain exports.
 */

import { getEnv, type Env } from './env.js';
import type { RetryPolicy } from '../lib/reliability/retry-policy.js';

// === Upstream ===

export const DEFAULT_BASE_URL = 'https://tabelog.com';

/** Path of the autocomplete endpoint (area uses `sa`, keyword uses `sk`). */
export const SUGGEST_PATH = '/internal_api/suggest_form_words';

/** Listings rendered per search-results page. */
export const RESULTS_PER_PAGE = 20;

/** Bounds for the `limit` of a search request. */
export const MIN_SEARCH_LIMIT = 1;
export const MAX_SEARCH_LIMIT = 60;
export const DEFAULT_SEARCH_LIMIT = 20;

// === Client ===

export type CacheBackend = Env['GURUME_CACHE_BACKEND'];

export interface ClientConfig {
  baseUrl: string;
  userAgent: string;
  httpTimeoutMs: number;
  cache: {
    backend: CacheBackend;
    dir: string;
    maxEntries: number;
    searchTtlSeconds: number;
    suggestTtlSeconds: number;
  };
  retry: RetryPolicy;
}

export function getClientConfig(env: Env = getEnv()): ClientConfig {
  return {
    baseUrl: env.GURUME_BASE_URL.replace(/\/+$/, ''),
    userAgent: env.GURUME_USER_AGENT,
    httpTimeoutMs: env.GURUME_HTTP_TIMEOUT_MS,
    cache: {
      backend: env.GURUME_CACHE_BACKEND,
      dir: env.GURUME_CACHE_DIR,
      maxEntries: env.GURUME_CACHE_MAX_ENTRIES,
      searchTtlSeconds: env.GURUME_SEARCH_TTL_SECONDS,
      suggestTtlSeconds: env.GURUME_SUGGEST_TTL_SECONDS,
    },
    retry: {
      maxAttempts: env.GURUME_RETRY_MAX_ATTEMPTS,
      baseDelayMs: env.GURUME_RETRY_BASE_DELAY_MS,
      maxJitterMs: env.GURUME_RETRY_MAX_JITTER_MS,
      maxDelayMs: 30_000,
    },
  };
}

// === LLM ===

export interface LlmConfig {
  apiKey: string | undefined;
  model: string;
  timeoutMs: number;
}

export function getLlmConfig(env: Env = getEnv()): LlmConfig {
  return {
    apiKey: env.OPENAI_API_KEY,
    model: env.OPENAI_MODEL,
    timeoutMs: env.OPENAI_TIMEOUT_MS,
  };
}
