import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import type { RestaurantRecord } from '../../services/tabelog/types.js';
import {
  formatCuisines,
  formatRating,
  formatRestaurantDetail,
  formatRestaurantTable,
  formatSuggestions,
} from '../format.js';

const SUKIYAKI: RestaurantRecord = {
  name: '和田金',
  url: 'https://tabelog.com/mie/A2404/A240401/24000001/',
  area: '三重',
  station: '松阪駅',
  distance: '450m',
  genres: ['すき焼き', 'ステーキ'],
  cuisine: 'すき焼き',
  rating: 3.9,
  reviewCount: 1234,
  saveCount: 15000,
  lunchPrice: null,
  dinnerPrice: '￥15,000～￥19,999',
  features: { onlineReservation: true },
};

const SPARSE: RestaurantRecord = {
  ...SUKIYAKI,
  name: '名無しの店',
  area: null,
  station: null,
  distance: null,
  genres: [],
  cuisine: null,
  rating: null,
  reviewCount: null,
  saveCount: null,
  dinnerPrice: null,
  features: { onlineReservation: false },
};

describe('format', () => {
  it('renders ratings with two decimals', () => {
    assert.equal(formatRating(3.9), '3.90');
    assert.equal(formatRating(null), '-');
  });

  it('renders one numbered line per restaurant', () => {
    assert.deepEqual(formatRestaurantTable([SUKIYAKI, SPARSE]), [
      '1. 和田金  ★3.90  (1,234 reviews)  松阪駅 450m  すき焼き、ステーキ',
      '2. 名無しの店  ★-  (- reviews)',
    ]);
    assert.deepEqual(formatRestaurantTable([]), ['No restaurants found.']);
  });

  it('renders the detail view', () => {
    assert.deepEqual(formatRestaurantDetail(SUKIYAKI), [
      '和田金',
      '  Rating:       3.90',
      '  Reviews:      1234',
      '  Saved:        15000',
      '  Area:         三重',
      '  Station:      松阪駅 450m',
      '  Genres:       すき焼き、ステーキ',
      '  Lunch:        -',
      '  Dinner:       ￥15,000～￥19,999',
      '  Net booking:  yes',
      '  URL:          https://tabelog.com/mie/A2404/A240401/24000001/',
    ]);
    assert.equal(formatRestaurantDetail(SPARSE)[5], '  Station:      -');
  });

  it('renders cuisines and suggestions', () => {
    assert.deepEqual(formatCuisines([{ name: 'すき焼き', code: 'RC0107' }]), ['RC0107  すき焼き']);
    assert.deepEqual(
      formatSuggestions([
        { label: '渋谷駅', kind: 'area', datatype: 'RailroadStation', id: 4698, lat: null, lng: null },
        { label: 'しぶや', kind: 'area', datatype: '', id: null, lat: null, lng: null },
      ]),
      ['渋谷駅  [area: RailroadStation]', 'しぶや  [area]']
    );
    assert.deepEqual(formatSuggestions([]), ['No suggestions.']);
  });
});
