/**
 * Plain-text rendering shared by the CLI and the TUI.
 */

import type { CuisineEntry } from '../services/tabelog/genre-mapping.js';
import type { RestaurantRecord, SuggestionRecord } from '../services/tabelog/types.js';

const UNKNOWN = '-';

export function formatRating(rating: number | null): string {
  return rating === null ? UNKNOWN : rating.toFixed(2);
}

/**
 * One numbered line per restaurant:
 *   " 1. 鮨 さいとう  ★4.52  (1,234 reviews)  渋谷駅 350m  寿司"
 */
export function formatRestaurantTable(restaurants: readonly RestaurantRecord[]): string[] {
  if (restaurants.length === 0) return ['No restaurants found.'];

  const width = String(restaurants.length).length;
  return restaurants.map((r, index) => {
    const parts = [
      `${String(index + 1).padStart(width)}. ${r.name}`,
      `★${formatRating(r.rating)}`,
      `(${r.reviewCount === null ? UNKNOWN : r.reviewCount.toLocaleString('en-US')} reviews)`,
    ];
    const location = [r.station ?? r.area, r.distance].filter((part) => part !== null).join(' ');
    if (location) parts.push(location);
    if (r.genres.length > 0) parts.push(r.genres.join('、'));
    return parts.join('  ');
  });
}

export function formatRestaurantDetail(r: RestaurantRecord): string[] {
  return [
    r.name,
    `  Rating:       ${formatRating(r.rating)}`,
    `  Reviews:      ${r.reviewCount ?? UNKNOWN}`,
    `  Saved:        ${r.saveCount ?? UNKNOWN}`,
    `  Area:         ${r.area ?? UNKNOWN}`,
    `  Station:      ${[r.station, r.distance].filter((part) => part !== null).join(' ') || UNKNOWN}`,
    `  Genres:       ${r.genres.length > 0 ? r.genres.join('、') : UNKNOWN}`,
    `  Lunch:        ${r.lunchPrice ?? UNKNOWN}`,
    `  Dinner:       ${r.dinnerPrice ?? UNKNOWN}`,
    `  Net booking:  ${r.features.onlineReservation ? 'yes' : 'no'}`,
    `  URL:          ${r.url}`,
  ];
}

export function formatCuisines(cuisines: readonly CuisineEntry[]): string[] {
  return cuisines.map((c) => `${c.code}  ${c.name}`);
}

export function formatSuggestions(suggestions: readonly SuggestionRecord[]): string[] {
  if (suggestions.length === 0) return ['No suggestions.'];
  return suggestions.map((s) => `${s.label}  [${s.kind}${s.datatype ? `: ${s.datatype}` : ''}]`);
}
