import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { buildCacheKey, normalizeParams } from '../cache-key.js';

describe('buildCacheKey', () => {
  const url = 'https://tabelog.com/tokyo/rstLst/';

  it('sorts, trims and drops empty parameters', () => {
    assert.equal(
      buildCacheKey(url, [['sk', ' 寿司 '], ['SrtT', 'rt'], ['LstCos', '']]),
      'v1:GET https://tabelog.com/tokyo/rstLst/?SrtT=rt&sk=%E5%AF%BF%E5%8F%B8'
    );
  });

  it('is independent of parameter order', () => {
    const a = buildCacheKey(url, [['b', '2'], ['a', '1']]);
    const b = buildCacheKey(url, [['a', '1'], ['b', '2']]);
    assert.equal(a, b);
  });

  it('omits the query string when there are no parameters', () => {
    assert.equal(buildCacheKey(url, []), 'v1:GET https://tabelog.com/tokyo/rstLst/');
  });

  it('distinguishes different values', () => {
    assert.notEqual(buildCacheKey(url, [['sk', 'a']]), buildCacheKey(url, [['sk', 'b']]));
  });
});

describe('normalizeParams', () => {
  it('orders repeated names by value', () => {
    assert.deepEqual(normalizeParams([['f', '2'], ['f', '1'], [' e ', 'x']]), [
      ['e', 'x'],
      ['f', '1'],
      ['f', '2'],
    ]);
  });
});
