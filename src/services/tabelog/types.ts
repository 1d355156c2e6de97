/**
 * Search client data model.
 * Values the upstream page does not carry are `null` (the explicit unknown marker).
 */

import { z } from 'zod';
import { DEFAULT_SEARCH_LIMIT, MAX_SEARCH_LIMIT, MIN_SEARCH_LIMIT } from '../../config/index.js';

export const SORT_KEYS = ['ranking', 'review-count', 'new-open', 'standard'] as const;
export type SortKey = (typeof SORT_KEYS)[number];

export const PRICE_TIMES = ['dinner', 'lunch'] as const;
export type PriceTime = (typeof PRICE_TIMES)[number];

export const FEATURE_FLAGS = ['onlineReservation', 'privateRoom', 'nonSmoking', 'parking', 'creditCard'] as const;
export type FeatureFlag = (typeof FEATURE_FLAGS)[number];

const optionalText = z
  .string()
  .trim()
  .transform((value) => (value.length > 0 ? value : undefined))
  .optional();

export const SearchFilterSchema = z.object({
  area: optionalText,
  keyword: optionalText,
  cuisine: optionalText,
  sort: z.enum(SORT_KEYS).optional(),
  priceMin: z.number().int().min(0).optional(),
  priceMax: z.number().int().min(0).optional(),
  priceTime: z.enum(PRICE_TIMES).optional(),
  features: z.array(z.enum(FEATURE_FLAGS)).optional(),
  limit: z.number().int().min(MIN_SEARCH_LIMIT).max(MAX_SEARCH_LIMIT).default(DEFAULT_SEARCH_LIMIT),
});

export type SearchFilterInput = z.input<typeof SearchFilterSchema>;
export type SearchFilter = Readonly<z.output<typeof SearchFilterSchema>>;

export interface RestaurantRecord {
  readonly name: string;
  readonly url: string;
  readonly area: string | null;
  readonly station: string | null;
  readonly distance: string | null;
  readonly genres: readonly string[];
  /** First listed genre. */
  readonly cuisine: string | null;
  readonly rating: number | null;
  readonly reviewCount: number | null;
  readonly saveCount: number | null;
  readonly lunchPrice: string | null;
  readonly dinnerPrice: string | null;
  readonly features: Readonly<{
    onlineReservation: boolean;
  }>;
}

export type SuggestionKind = 'area' | 'cuisine' | 'restaurant' | 'keyword';

export interface SuggestionRecord {
  readonly label: string;
  readonly kind: SuggestionKind;
  /** Upstream type tag, e.g. AddressMaster, RailroadStation, Genre2. */
  readonly datatype: string;
  /** Identifier within the datatype; usually numeric, occasionally a string. */
  readonly id: number | string | null;
  readonly lat: number | null;
  readonly lng: number | null;
}

export interface SearchResult {
  readonly restaurants: readonly RestaurantRecord[];
  readonly warnings: readonly string[];
  readonly pagesFetched: number;
}
