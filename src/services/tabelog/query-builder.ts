/**
 * Query Builder
 *
 * Maps a SearchFilter onto the listing site's URL schema:
 *
 *   {baseUrl}/{areaSlug}/rstLst/{genreCode}/{page}/?sk=...&SrtT=...
 *
 * Area and cuisine go in the path; every other field becomes a query
 * parameter. Fields absent from the filter produce nothing. All validation
 * happens here, so a bad filter fails before any request is made.
 */

import { ZodError } from 'zod';
import { DEFAULT_BASE_URL, MAX_SEARCH_LIMIT, MIN_SEARCH_LIMIT, SUGGEST_PATH } from '../../config/index.js';
import { inputError, type GurumeError } from '../../lib/errors/gurume-error.js';
import type { QueryParams } from '../../lib/cache/cache-key.js';
import { getAreaSlug } from './area-mapping.js';
import { getGenreCode } from './genre-mapping.js';
import {
  FEATURE_FLAGS,
  SearchFilterSchema,
  SORT_KEYS,
  type FeatureFlag,
  type PriceTime,
  type SearchFilter,
  type SearchFilterInput,
  type SortKey,
} from './types.js';

export interface UpstreamQuery {
  url: string;
  params: QueryParams;
}

export type SuggestEndpoint = 'area' | 'keyword';

export const SORT_PARAM: Readonly<Record<SortKey, string>> = {
  ranking: 'rt',
  'review-count': 'rvcn',
  'new-open': 'nod',
  standard: 'trend',
};

export const FEATURE_PARAM: Readonly<Record<FeatureFlag, readonly [string, string]>> = {
  onlineReservation: ['vac_net', '1'],
  privateRoom: ['ChkRoom', '1'],
  nonSmoking: ['LstSmoking', '1'],
  parking: ['ChkParking', '1'],
  creditCard: ['ChkCard', '1'],
};

const PRICE_TIME_PARAM: Readonly<Record<PriceTime, string>> = {
  lunch: '1',
  dinner: '2',
};

/**
 * Budget bands, in yen. The band code is the 1-based index.
 */
export const PRICE_BANDS: readonly number[] = [
  1000, 2000, 3000, 4000, 5000, 6000, 8000, 10000, 15000, 20000, 30000,
];

const CUISINE_HINT = 'call list_cuisines to see the supported cuisine names';
const AREA_HINT = 'use a prefecture name such as 東京都 or 三重, or call get_area_suggestions';

/**
 * Validate raw filter input. Throws INPUT naming the first offending field.
 */
export function normalizeSearchFilter(input: SearchFilterInput): SearchFilter {
  let filter: SearchFilter;
  try {
    filter = SearchFilterSchema.parse(input);
  } catch (error) {
    if (error instanceof ZodError) {
      throw filterIssueToError(error);
    }
    throw error;
  }

  if (filter.priceMin !== undefined && filter.priceMax !== undefined && filter.priceMin > filter.priceMax) {
    throw inputError(`priceMin (${filter.priceMin}) is greater than priceMax (${filter.priceMax})`, {
      parameter: 'priceMin',
      hint: 'swap the bounds or drop one of them',
    });
  }
  if (filter.cuisine !== undefined && getGenreCode(filter.cuisine) === null) {
    throw inputError(`Unknown cuisine type: ${filter.cuisine}`, { parameter: 'cuisine', hint: CUISINE_HINT });
  }
  if (filter.area !== undefined && getAreaSlug(filter.area) === null) {
    throw inputError(`Unknown area: ${filter.area}`, { parameter: 'area', hint: AREA_HINT });
  }
  return filter;
}

export function buildSearchQuery(
  input: SearchFilterInput,
  page: number = 1,
  baseUrl: string = DEFAULT_BASE_URL
): UpstreamQuery {
  if (!Number.isInteger(page) || page < 1) {
    throw inputError(`page must be a positive integer, got ${page}`, { parameter: 'page' });
  }
  const filter = normalizeSearchFilter(input);

  const segments: string[] = [];
  if (filter.area !== undefined) {
    segments.push(requireLookup(getAreaSlug(filter.area), 'area'));
  }
  segments.push('rstLst');
  if (filter.cuisine !== undefined) {
    segments.push(requireLookup(getGenreCode(filter.cuisine), 'cuisine'));
  }
  if (page > 1) {
    segments.push(String(page));
  }

  const params: Array<readonly [string, string]> = [];
  if (filter.keyword !== undefined) {
    params.push(['sk', filter.keyword]);
  }
  if (filter.sort !== undefined) {
    params.push(['SrtT', SORT_PARAM[filter.sort]]);
  }
  if (filter.priceMin !== undefined || filter.priceMax !== undefined) {
    params.push(['RdoCosTp', PRICE_TIME_PARAM[filter.priceTime ?? 'dinner']]);
    const lower = filter.priceMin === undefined ? null : lowerBandCode(filter.priceMin);
    const upper = filter.priceMax === undefined ? null : upperBandCode(filter.priceMax);
    if (lower !== null) params.push(['LstCosT', String(lower)]);
    if (upper !== null) params.push(['LstCos', String(upper)]);
  }
  for (const feature of FEATURE_FLAGS) {
    if (filter.features?.includes(feature)) {
      params.push(FEATURE_PARAM[feature]);
    }
  }

  return { url: `${baseUrl}/${segments.join('/')}/`, params };
}

export function buildSuggestQuery(
  endpoint: SuggestEndpoint,
  query: string,
  baseUrl: string = DEFAULT_BASE_URL
): UpstreamQuery {
  return {
    url: `${baseUrl}${SUGGEST_PATH}`,
    params: [[endpoint === 'area' ? 'sa' : 'sk', query]],
  };
}

/**
 * Highest band at or below the amount; null when the amount is under the first band.
 */
export function lowerBandCode(yen: number): number | null {
  let code: number | null = null;
  for (let index = 0; index < PRICE_BANDS.length; index++) {
    const band = PRICE_BANDS[index];
    if (band !== undefined && band <= yen) code = index + 1;
  }
  return code;
}

/**
 * Lowest band at or above the amount; null when the amount exceeds every band.
 */
export function upperBandCode(yen: number): number | null {
  const index = PRICE_BANDS.findIndex((band) => band >= yen);
  return index === -1 ? null : index + 1;
}

function requireLookup(value: string | null, parameter: 'area' | 'cuisine'): string {
  if (value === null) {
    throw inputError(`Unknown ${parameter}`, {
      parameter,
      hint: parameter === 'cuisine' ? CUISINE_HINT : AREA_HINT,
    });
  }
  return value;
}

function filterIssueToError(error: ZodError): GurumeError {
  const issue = error.issues[0];
  const parameter = issue === undefined ? 'filter' : String(issue.path[0] ?? 'filter');

  switch (parameter) {
    case 'limit':
      return inputError(`limit must be between ${MIN_SEARCH_LIMIT} and ${MAX_SEARCH_LIMIT}`, { parameter });
    case 'sort':
      return inputError('Invalid sort type', { parameter, hint: `use one of: ${SORT_KEYS.join(', ')}` });
    case 'features':
      return inputError('Unknown feature', { parameter, hint: `use any of: ${FEATURE_FLAGS.join(', ')}` });
    case 'priceMin':
    case 'priceMax':
      return inputError('price bounds must be non-negative whole yen amounts', { parameter });
    default:
      return inputError(issue?.message ?? 'invalid filter', { parameter });
  }
}
