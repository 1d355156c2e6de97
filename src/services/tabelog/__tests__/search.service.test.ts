/**
 * Search Service Tests
 * End-to-end through builder, fetcher and parser against a fake transport.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { isGurumeError } from '../../../lib/errors/gurume-error.js';
import { createFakeService as createService, requestedUrls } from './fixtures/fake-service.js';
import { listingPage, numberedListings } from './fixtures/listing-page.js';

describe('RestaurantSearchService.searchRestaurants', () => {
  it('returns the requested number of restaurants from one page', async () => {
    const { service, transport } = createService(() => listingPage(numberedListings(5)));

    const result = await service.searchRestaurants({ area: '東京', cuisine: '寿司', limit: 5 });

    assert.equal(result.restaurants.length, 5);
    for (const restaurant of result.restaurants) {
      assert.ok(restaurant.name.length > 0);
      assert.ok(restaurant.url.startsWith('https://tabelog.com/tokyo/'));
    }
    assert.deepEqual(result.warnings, []);
    assert.equal(result.pagesFetched, 1);
    assert.deepEqual(requestedUrls(transport), ['https://tabelog.com/tokyo/rstLst/RC0201/']);
  });

  it('rejects an unknown cuisine before any request', async () => {
    const { service, transport } = createService(() => listingPage(numberedListings(1)));

    await assert.rejects(
      service.searchRestaurants({ area: '東京', cuisine: 'not-a-cuisine' }),
      (error: unknown) => isGurumeError(error, 'INPUT') && error.details.parameter === 'cuisine'
    );
    assert.equal(transport.mock.callCount(), 0);
  });

  it('follows pagination until the limit is reached', async () => {
    const { service, transport } = createService((request) => {
      const page = /\/(\d+)\/$/.exec(request.url)?.[1] ?? '1';
      const start = (Number(page) - 1) * 20 + 1;
      return listingPage(numberedListings(20, start), { next: true });
    });

    const result = await service.searchRestaurants({ area: '東京', limit: 45 });

    assert.equal(result.restaurants.length, 45);
    assert.equal(result.pagesFetched, 3);
    assert.equal(result.restaurants[44]?.name, '寿司 45');
    assert.deepEqual(requestedUrls(transport), [
      'https://tabelog.com/tokyo/rstLst/',
      'https://tabelog.com/tokyo/rstLst/2/',
      'https://tabelog.com/tokyo/rstLst/3/',
    ]);
  });

  it('stops at the last page', async () => {
    const { service, transport } = createService(() => listingPage(numberedListings(3)));

    const result = await service.searchRestaurants({ keyword: '寿司', limit: 60 });

    assert.equal(result.restaurants.length, 3);
    assert.equal(result.pagesFetched, 1);
    assert.equal(transport.mock.callCount(), 1);
  });

  it('drops restaurants repeated across pages', async () => {
    const { service } = createService((request) =>
      request.url.endsWith('/2/')
        ? listingPage(numberedListings(2, 2))
        : listingPage(numberedListings(2, 1), { next: true })
    );

    const result = await service.searchRestaurants({ area: '東京', limit: 10 });

    assert.deepEqual(
      result.restaurants.map((r) => r.name),
      ['寿司 1', '寿司 2', '寿司 3']
    );
  });

  it('prefixes parser warnings with the page number', async () => {
    const html = `
      <div class="list-rst"><a class="list-rst__rst-name-target" href="/a/">店A</a></div>
      <div class="list-rst"><span>no name</span></div>`;
    const { service } = createService(() => html);

    const result = await service.searchRestaurants({ area: '東京' });

    assert.equal(result.restaurants.length, 1);
    assert.deepEqual(result.warnings, ['page 1: skipped result 2: missing name']);
  });

  it('returns an empty result for a search without matches', async () => {
    const { service } = createService(() => '<div class="rstlist-notfound">見つかりません</div>');

    const result = await service.searchRestaurants({ area: '東京', keyword: 'zzz' });

    assert.deepEqual(result, { restaurants: [], warnings: [], pagesFetched: 1 });
  });

  it('serves a repeated search from the cache', async () => {
    const { service, transport } = createService(() => listingPage(numberedListings(2)));

    await service.searchRestaurants({ area: '東京', limit: 2 });
    await service.searchRestaurants({ area: ' 東京 ', limit: 2 });

    assert.equal(transport.mock.callCount(), 1);
  });

  it('fetches again after an unrecognized page instead of serving it from the cache', async () => {
    const pages = ['<html><body>メンテナンス中</body></html>', listingPage(numberedListings(2))];
    let served = 0;
    const { service, transport } = createService(() => pages[served++] ?? '');

    await assert.rejects(service.searchRestaurants({ area: '東京', limit: 2 }), (error: unknown) =>
      isGurumeError(error, 'PARSE')
    );
    const result = await service.searchRestaurants({ area: '東京', limit: 2 });

    assert.equal(result.restaurants.length, 2);
    assert.equal(transport.mock.callCount(), 2);
  });
});

describe('RestaurantSearchService suggestions', () => {
  it('queries the area endpoint with sa', async () => {
    const { service, transport } = createService(() =>
      JSON.stringify([{ name: '渋谷', datatype: 'AddressMaster', id_in_datatype: 1303, lat: 35.65, lng: 139.7 }])
    );

    const suggestions = await service.getAreaSuggestions(' 渋谷 ');

    assert.deepEqual(suggestions, [
      { label: '渋谷', kind: 'area', datatype: 'AddressMaster', id: 1303, lat: 35.65, lng: 139.7 },
    ]);
    assert.deepEqual(transport.mock.calls[0]?.arguments[0], {
      url: 'https://tabelog.com/internal_api/suggest_form_words',
      params: [['sa', '渋谷']],
    });
  });

  it('queries the keyword endpoint with sk', async () => {
    const { service, transport } = createService(() => JSON.stringify([{ name: 'すき焼き', datatype: 'Genre2' }]));

    const suggestions = await service.getKeywordSuggestions('すき');

    assert.equal(suggestions[0]?.kind, 'cuisine');
    assert.deepEqual(transport.mock.calls[0]?.arguments[0].params, [['sk', 'すき']]);
  });

  it('returns nothing for a blank query without a request', async () => {
    const { service, transport } = createService(() => '[]');

    assert.deepEqual(await service.getAreaSuggestions('   '), []);
    assert.deepEqual(await service.getKeywordSuggestions(''), []);
    assert.equal(transport.mock.callCount(), 0);
  });
});

describe('RestaurantSearchService.listCuisines', () => {
  it('lists the cuisine table without network access', () => {
    const { service, transport } = createService(() => '');

    const cuisines = service.listCuisines();

    assert.equal(cuisines.length, 29);
    assert.ok(cuisines.some((c) => c.name === 'すき焼き' && c.code === 'RC0107'));
    assert.equal(transport.mock.callCount(), 0);
  });
});
