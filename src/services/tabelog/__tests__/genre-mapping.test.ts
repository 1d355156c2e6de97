import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
  GENRE_CODE_MAPPING,
  getAllGenres,
  getGenreCode,
  getGenreNameByCode,
  listCuisineEntries,
} from '../genre-mapping.js';

describe('genre mapping', () => {
  it('looks up codes by exact name', () => {
    assert.equal(getGenreCode('すき焼き'), 'RC0107');
    assert.equal(getGenreCode('寿司'), 'RC0201');
    assert.equal(getGenreCode('ラーメン'), 'RC0501');
  });

  it('is exact-match only', () => {
    assert.equal(getGenreCode('らーめん'), null);
    assert.equal(getGenreCode(' 寿司'), null);
    assert.equal(getGenreCode('not-a-cuisine'), null);
    assert.equal(getGenreCode(''), null);
  });

  it('reverses codes to names', () => {
    assert.equal(getGenreNameByCode('RC0107'), 'すき焼き');
    assert.equal(getGenreNameByCode('RC9999'), null);
  });

  it('has 29 entries with unique RC codes', () => {
    const codes = Object.values(GENRE_CODE_MAPPING);
    assert.equal(codes.length, 29);
    assert.equal(new Set(codes).size, 29);
    assert.ok(codes.every((code) => /^RC\d{4}$/.test(code)));
  });

  it('returns a sorted copy of the names', () => {
    const genres = getAllGenres();
    assert.deepEqual(genres, [...genres].sort());
    genres.pop();
    assert.equal(getAllGenres().length, 29);
  });

  it('lists cuisine entries with their codes', () => {
    const entries = listCuisineEntries();
    assert.equal(entries.length, 29);
    assert.ok(entries.some((entry) => entry.name === '焼肉' && entry.code === 'RC1501'));
  });

  it('freezes the table', () => {
    assert.ok(Object.isFrozen(GENRE_CODE_MAPPING));
  });
});
