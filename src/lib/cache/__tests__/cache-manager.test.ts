/**
 * MemoryCache Tests
 * TTL expiry, LRU ordering and stats, driven by a fake clock
 */

import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert/strict';
import { MemoryCache } from '../cache-manager.js';

describe('MemoryCache', () => {
  let now: number;
  let cache: MemoryCache;

  beforeEach(() => {
    now = 1_000_000;
    cache = new MemoryCache({ maxEntries: 3, now: () => now });
  });

  it('returns a value set immediately before', async () => {
    await cache.set('k', 'v', 60);
    assert.equal(await cache.get('k'), 'v');
  });

  it('returns null once the TTL has elapsed', async () => {
    await cache.set('k', 'v', 60);

    now += 59_999;
    assert.equal(await cache.get('k'), 'v');

    now += 1;
    assert.equal(await cache.get('k'), null);
    assert.equal(cache.stats().size, 0, 'expired entry should be removed on access');
  });

  it('evicts the least recently used entry on overflow', async () => {
    await cache.set('a', '1', 60);
    await cache.set('b', '2', 60);
    await cache.set('c', '3', 60);

    // Touch "a" so "b" becomes the oldest
    assert.equal(await cache.get('a'), '1');
    await cache.set('d', '4', 60);

    assert.deepEqual(cache.keys(), ['c', 'a', 'd']);
    assert.equal(await cache.get('b'), null);
    assert.equal(cache.stats().evictions, 1);
  });

  it('overwriting a key does not evict others', async () => {
    await cache.set('a', '1', 60);
    await cache.set('b', '2', 60);
    await cache.set('c', '3', 60);
    await cache.set('a', 'updated', 60);

    assert.deepEqual(cache.keys(), ['b', 'c', 'a']);
    assert.equal(await cache.get('a'), 'updated');
    assert.equal(cache.stats().evictions, 0);
  });

  it('tracks hits and misses', async () => {
    await cache.set('k', 'v', 60);
    await cache.get('k');
    await cache.get('k');
    await cache.get('missing');

    const stats = cache.stats();
    assert.equal(stats.hits, 2);
    assert.equal(stats.misses, 1);
    assert.equal(stats.hitRate, 2 / 3);
  });

  it('delete and clear remove entries', async () => {
    await cache.set('a', '1', 60);
    await cache.set('b', '2', 60);

    assert.equal(await cache.delete('a'), true);
    assert.equal(await cache.delete('a'), false);

    await cache.clear();
    assert.equal(cache.stats().size, 0);
    assert.equal(await cache.get('b'), null);
  });

  it('cleanup drops only expired entries', async () => {
    await cache.set('short', '1', 10);
    await cache.set('long', '2', 100);

    now += 10_000;
    assert.equal(cache.cleanup(), 1);
    assert.deepEqual(cache.keys(), ['long']);
  });

  it('rejects a non-positive capacity', () => {
    assert.throws(() => new MemoryCache({ maxEntries: 0 }), RangeError);
  });
});
