/**
 * Error taxonomy for the search client.
 *
 * One class, discriminated by `kind`. Callers branch on the kind, never on
 * subclasses:
 *
 * - INPUT       bad filter values, surfaced before any network call
 * - NETWORK     transport failure, timeout or 5xx (retryable)
 * - RATE_LIMIT  upstream answered 429 (retryable)
 * - PARSE       upstream markup or payload not recognized (fatal per request)
 * - CACHE       cache backend failure (non-fatal, fetcher bypasses the cache)
 * - FETCH       request abandoned: retries exhausted or fatal HTTP status
 */

export type GurumeErrorKind = 'INPUT' | 'NETWORK' | 'RATE_LIMIT' | 'PARSE' | 'CACHE' | 'FETCH';

export interface GurumeErrorDetails {
  /** Offending filter field or tool argument (INPUT). */
  parameter?: string;
  /** Suggested next step shown to users (INPUT, PARSE). */
  hint?: string;
  url?: string;
  status?: number;
  retryAfterMs?: number;
  attempts?: number;
}

export class GurumeError extends Error {
  constructor(
    public readonly kind: GurumeErrorKind,
    message: string,
    public readonly details: GurumeErrorDetails = {},
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'GurumeError';
  }
}

export function inputError(message: string, details: Pick<GurumeErrorDetails, 'parameter' | 'hint'> = {}): GurumeError {
  return new GurumeError('INPUT', message, details);
}

export function networkError(
  message: string,
  details: Pick<GurumeErrorDetails, 'url' | 'status'> = {},
  cause?: unknown
): GurumeError {
  return new GurumeError('NETWORK', message, details, { cause });
}

export function rateLimitError(url: string, retryAfterMs?: number): GurumeError {
  return new GurumeError(
    'RATE_LIMIT',
    `Rate limited by upstream (${url})`,
    retryAfterMs === undefined ? { url, status: 429 } : { url, status: 429, retryAfterMs }
  );
}

export function parseError(message: string, details: Pick<GurumeErrorDetails, 'url' | 'hint'> = {}): GurumeError {
  return new GurumeError('PARSE', message, details);
}

export function cacheError(message: string, cause?: unknown): GurumeError {
  return new GurumeError('CACHE', message, {}, { cause });
}

export function fetchError(url: string, attempts: number, cause: unknown): GurumeError {
  const reason = cause instanceof Error ? cause.message : String(cause);
  const status = isGurumeError(cause) ? cause.details.status : undefined;
  return new GurumeError(
    'FETCH',
    `GET ${url} failed after ${attempts} attempt(s): ${reason}`,
    status === undefined ? { url, attempts } : { url, attempts, status },
    { cause }
  );
}

export function isGurumeError(error: unknown, kind?: GurumeErrorKind): error is GurumeError {
  return error instanceof GurumeError && (kind === undefined || error.kind === kind);
}

/**
 * NETWORK and RATE_LIMIT are transient; everything else fails fast.
 */
export function isRetryableError(error: unknown): boolean {
  return isGurumeError(error) && (error.kind === 'NETWORK' || error.kind === 'RATE_LIMIT');
}
