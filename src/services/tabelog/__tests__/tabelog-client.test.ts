import { describe, it, mock } from 'node:test';
import assert from 'node:assert/strict';
import { getClientConfig } from '../../../config/index.js';
import { parseEnv } from '../../../config/env.js';
import { isGurumeError, networkError } from '../../../lib/errors/gurume-error.js';
import type { HttpRequest, HttpResponse } from '../../../utils/fetch-with-timeout.js';
import { createSearchService } from '../tabelog-client.js';
import { silentLogger } from './fixtures/fake-service.js';
import { listingPage, numberedListings } from './fixtures/listing-page.js';

describe('createSearchService', () => {
  it('builds URLs from the configured base URL', async () => {
    const config = getClientConfig(parseEnv({ GURUME_BASE_URL: 'http://localhost:8080/' }));
    const transport = mock.fn(async (_request: HttpRequest): Promise<HttpResponse> => ({
      status: 200,
      body: listingPage(numberedListings(1)),
    }));
    const service = createSearchService(config, { transport, cache: null, logger: silentLogger });

    const result = await service.searchRestaurants({ area: '京都', limit: 1 });

    assert.equal(transport.mock.calls[0]?.arguments[0].url, 'http://localhost:8080/kyoto/rstLst/');
    assert.equal(result.restaurants[0]?.url, 'http://localhost:8080/tokyo/A1301/A130101/13000001/');
  });

  it('applies the configured retry budget', async () => {
    const config = getClientConfig(parseEnv({ GURUME_RETRY_MAX_ATTEMPTS: '2' }));
    const transport = mock.fn(async (request: HttpRequest): Promise<HttpResponse> => {
      throw networkError(`GET ${request.url} timed out after 15000ms`, { url: request.url });
    });
    const service = createSearchService(config, {
      transport,
      cache: null,
      logger: silentLogger,
      retryHooks: { sleep: async () => undefined },
    });

    await assert.rejects(
      service.getAreaSuggestions('渋谷'),
      (error: unknown) => isGurumeError(error, 'FETCH') && error.details.attempts === 2
    );
    assert.equal(transport.mock.callCount(), 2);
  });
});
