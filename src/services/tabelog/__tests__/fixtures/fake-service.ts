import { mock } from 'node:test';
import pino from 'pino';
import { MemoryCache } from '../../../../lib/cache/cache-manager.js';
import type { HttpRequest, HttpResponse } from '../../../../utils/fetch-with-timeout.js';
import { TabelogFetcher } from '../../fetcher.js';
import { RestaurantSearchService } from '../../search.service.js';

export const silentLogger = pino({ level: 'silent' });

/**
 * Search service over an in-process transport that answers every GET with
 * `respond(request)`. Backoff never sleeps.
 */
export function createFakeService(respond: (request: HttpRequest) => string) {
  const transport = mock.fn(async (request: HttpRequest): Promise<HttpResponse> => ({
    status: 200,
    body: respond(request),
  }));
  const fetcher = new TabelogFetcher({
    transport,
    cache: new MemoryCache({ maxEntries: 50 }),
    logger: silentLogger,
    retryHooks: { sleep: async () => undefined, random: () => 0 },
  });
  const service = new RestaurantSearchService(fetcher, {
    searchTtlSeconds: 60,
    suggestTtlSeconds: 60,
    logger: silentLogger,
  });
  return { service, transport };
}

export function requestedUrls(transport: ReturnType<typeof createFakeService>['transport']): string[] {
  return transport.mock.calls.map((call) => call.arguments[0].url);
}
