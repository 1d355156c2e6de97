import { isGurumeError } from './gurume-error.js';

/**
 * Render an error as a single actionable line for CLI, TUI and tool output.
 */
export function toUserMessage(error: unknown): string {
  if (!isGurumeError(error)) {
    return `Unexpected error: ${error instanceof Error ? error.message : String(error)}`;
  }

  const { hint, parameter, url } = error.details;

  switch (error.kind) {
    case 'INPUT': {
      const prefix = parameter ? `Invalid ${parameter}: ` : 'Invalid input: ';
      return hint ? `${prefix}${error.message}; ${hint}` : `${prefix}${error.message}`;
    }
    case 'PARSE':
      return `Could not read the results page${url ? ` (${url})` : ''}: ${error.message}. ` +
        (hint ?? 'The site layout may have changed; retrying will not help.');
    case 'RATE_LIMIT':
      return 'The restaurant site is rate limiting requests; wait a minute and try again.';
    case 'NETWORK':
    case 'FETCH':
      return `The restaurant site is unreachable: ${error.message}. Check your connection and try again.`;
    case 'CACHE':
      return `Cache problem: ${error.message}. Run with --cache off to bypass the cache.`;
  }
}
