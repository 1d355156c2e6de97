import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { isGurumeError } from '../../../lib/errors/gurume-error.js';
import { parseSuggestions, suggestionKind } from '../suggestion-parser.js';

describe('parseSuggestions', () => {
  it('maps area items to records', () => {
    const json = JSON.stringify([
      { name: '渋谷', datatype: 'AddressMaster', id_in_datatype: 1303, lat: 35.658, lng: 139.7016 },
      { name: '渋谷駅', datatype: 'RailroadStation', id_in_datatype: 4698, lat: 35.6581, lng: 139.7014 },
    ]);
    const { suggestions, warnings } = parseSuggestions(json, 'area');
    assert.deepEqual(warnings, []);
    assert.deepEqual(suggestions, [
      { label: '渋谷', kind: 'area', datatype: 'AddressMaster', id: 1303, lat: 35.658, lng: 139.7016 },
      { label: '渋谷駅', kind: 'area', datatype: 'RailroadStation', id: 4698, lat: 35.6581, lng: 139.7014 },
    ]);
  });

  it('classifies keyword items by datatype', () => {
    const json = JSON.stringify([
      { name: 'すき焼き', datatype: 'Genre2', id_in_datatype: 107 },
      { name: '和田金', datatype: 'Restaurant', id_in_datatype: '24000001' },
      { name: 'すき焼き 個室', datatype: 'Genre2 DetailCondition', id_in_datatype: 'RC0107-private' },
    ]);
    const { suggestions } = parseSuggestions(json, 'keyword');
    assert.deepEqual(
      suggestions.map((s) => [s.label, s.kind, s.id]),
      [
        ['すき焼き', 'cuisine', 107],
        ['和田金', 'restaurant', '24000001'],
        ['すき焼き 個室', 'keyword', 'RC0107-private'],
      ]
    );
  });

  it('defaults missing or malformed optional fields', () => {
    const json = JSON.stringify([{ name: ' 新宿 ', lat: 'north', id_in_datatype: null }]);
    assert.deepEqual(parseSuggestions(json, 'area').suggestions, [
      { label: '新宿', kind: 'area', datatype: '', id: null, lat: null, lng: null },
    ]);
  });

  it('skips items without a name', () => {
    const json = JSON.stringify([{ datatype: 'Genre2' }, { name: '' }, { name: '寿司', datatype: 'Genre2' }, 'oops']);
    const { suggestions, warnings } = parseSuggestions(json, 'keyword');
    assert.equal(suggestions.length, 1);
    assert.deepEqual(warnings, [
      'skipped suggestion 1: missing name',
      'skipped suggestion 2: missing name',
      'skipped suggestion 4: missing name',
    ]);
  });

  it('returns nothing for an empty list', () => {
    assert.deepEqual(parseSuggestions('[]', 'area'), { suggestions: [], warnings: [] });
  });

  it('rejects payloads that are not a JSON list', () => {
    assert.throws(
      () => parseSuggestions('<html>', 'area', 'https://tabelog.com/internal_api/suggest_form_words'),
      (error: unknown) =>
        isGurumeError(error, 'PARSE') &&
        error.message === 'autocomplete response is not JSON' &&
        error.details.url === 'https://tabelog.com/internal_api/suggest_form_words'
    );
    assert.throws(
      () => parseSuggestions('{"name":"渋谷"}', 'area'),
      (error: unknown) => isGurumeError(error, 'PARSE') && error.message === 'autocomplete response is not a list'
    );
  });
});

describe('suggestionKind', () => {
  it('falls back by endpoint for unknown datatypes', () => {
    assert.equal(suggestionKind('Landmark', 'area'), 'area');
    assert.equal(suggestionKind('Landmark', 'keyword'), 'keyword');
    assert.equal(suggestionKind('', 'keyword'), 'keyword');
    assert.equal(suggestionKind('Restaurant', 'area'), 'restaurant');
  });
});
