/**
 * Fetch with Timeout
 *
 * Wraps native fetch with an AbortController so no request hangs past
 * `timeoutMs`, and maps every outcome onto the error taxonomy:
 *
 * - 2xx            → body text
 * - 429            → RATE_LIMIT (Retry-After honored when present)
 * - 5xx            → NETWORK (retryable)
 * - other non-2xx  → FETCH (fatal)
 * - abort/timeout (headers or body), DNS, connection failures → NETWORK
 */

import { GurumeError, networkError, rateLimitError } from '../lib/errors/gurume-error.js';
import type { QueryParams } from '../lib/cache/cache-key.js';

export interface HttpRequest {
  url: string;
  params: QueryParams;
  headers?: Record<string, string>;
}

export interface HttpResponse {
  status: number;
  body: string;
}

/**
 * Seam for the network: production uses fetch, tests pass a fake.
 */
export type HttpTransport = (request: HttpRequest) => Promise<HttpResponse>;

export interface FetchTransportConfig {
  timeoutMs: number;
  userAgent: string;
}

export type FetchErrorKind = 'TIMEOUT' | 'DNS_FAIL' | 'NETWORK_ERROR';

export function buildRequestUrl(url: string, params: QueryParams): string {
  const target = new URL(url);
  for (const [name, value] of params) {
    target.searchParams.append(name, value);
  }
  return target.toString();
}

/**
 * Parse a Retry-After header (delta-seconds or HTTP date) into milliseconds.
 */
export function parseRetryAfter(header: string | null, now: number = Date.now()): number | undefined {
  if (!header) return undefined;
  const seconds = Number(header);
  if (Number.isFinite(seconds) && seconds >= 0) {
    return seconds * 1000;
  }
  const date = Date.parse(header);
  if (Number.isNaN(date)) return undefined;
  return Math.max(0, date - now);
}

export function classifyFetchFailure(err: unknown, aborted: boolean): FetchErrorKind {
  if (aborted || (err instanceof Error && err.name === 'AbortError')) {
    return 'TIMEOUT';
  }
  const text = err instanceof Error ? `${err.message} ${String(err.cause ?? '')}` : String(err);
  if (text.includes('ENOTFOUND') || text.includes('getaddrinfo')) {
    return 'DNS_FAIL';
  }
  return 'NETWORK_ERROR';
}

export function createFetchTransport(config: FetchTransportConfig): HttpTransport {
  return async (request) => {
    const url = buildRequestUrl(request.url, request.params);
    const controller = new AbortController();
    // Covers the body read as well as the headers.
    const timeoutId = setTimeout(() => controller.abort(), config.timeoutMs);

    try {
      let response: Response;
      try {
        response = await fetch(url, {
          method: 'GET',
          headers: {
            'User-Agent': config.userAgent,
            'Accept-Language': 'ja,en;q=0.8',
            ...request.headers,
          },
          signal: controller.signal,
        });
      } catch (err) {
        const kind = classifyFetchFailure(err, controller.signal.aborted);
        const reason = kind === 'TIMEOUT'
          ? `timed out after ${config.timeoutMs}ms`
          : kind === 'DNS_FAIL'
            ? 'DNS lookup failed'
            : err instanceof Error ? err.message : String(err);
        throw networkError(`GET ${request.url} ${reason}`, { url: request.url }, err);
      }

      if (response.status === 429) {
        throw rateLimitError(request.url, parseRetryAfter(response.headers.get('retry-after')));
      }
      if (response.status >= 500) {
        throw networkError(`GET ${request.url} returned HTTP ${response.status}`, {
          url: request.url,
          status: response.status,
        });
      }
      if (!response.ok) {
        throw new GurumeError('FETCH', `GET ${request.url} returned HTTP ${response.status}`, {
          url: request.url,
          status: response.status,
          attempts: 1,
        });
      }

      try {
        return { status: response.status, body: await response.text() };
      } catch (err) {
        const reason = controller.signal.aborted ? `timed out after ${config.timeoutMs}ms` : 'body could not be read';
        throw networkError(`GET ${request.url} ${reason}`, { url: request.url }, err);
      }
    } finally {
      clearTimeout(timeoutId);
    }
  };
}
