/**
 * Search Results Parser
 *
 * Turns a listing page into RestaurantRecords. Each `.list-rst` block is
 * parsed on its own: a block without a name or URL is skipped and reported
 * in `warnings`, while missing optional fields (rating, prices, counts) are
 * recorded as null.
 *
 * A page is unrecognized (PARSE) when it has no result blocks and no
 * "no results" marker, or when every block it has is malformed.
 */

import * as cheerio from 'cheerio';
import type { Cheerio, CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import { DEFAULT_BASE_URL } from '../../config/index.js';
import { parseError } from '../../lib/errors/gurume-error.js';
import type { RestaurantRecord } from './types.js';

export const SELECTORS = {
  block: '.list-rst',
  name: '.list-rst__rst-name-target',
  rating: '.c-rating__val, .list-rst__rating-val',
  reviewCount: '.list-rst__rvw-count-num',
  saveCount: '.list-rst__save-count-num',
  areaGenre: '.list-rst__area-genre',
  priceItem: '.c-rating-v3',
  priceValue: '.c-rating-v3__val',
  dinnerMarker: '.c-rating-v3__time--dinner',
  lunchMarker: '.c-rating-v3__time--lunch',
  reservation: 'a[href*="yoyaku.tabelog.com"]',
  nextPage: 'a.c-pagination__arrow--next',
  noResults: '.rstlist-notfound, .list-rst-notfound',
} as const;

export interface ParseOptions {
  /** Base for resolving relative restaurant links. */
  baseUrl?: string;
  /** Page the HTML came from; attached to PARSE errors. */
  pageUrl?: string;
}

export interface SearchPage {
  restaurants: RestaurantRecord[];
  warnings: string[];
  hasNextPage: boolean;
}

export interface AreaGenre {
  area: string | null;
  station: string | null;
  distance: string | null;
  genres: string[];
}

const LAYOUT_HINT = 'the listing page layout may have changed; retry later or report the query';

export function parseSearchResults(html: string, options: ParseOptions = {}): SearchPage {
  const baseUrl = options.baseUrl ?? DEFAULT_BASE_URL;
  const $ = cheerio.load(html);
  const blocks = $(SELECTORS.block).toArray();
  const hasNextPage = $(SELECTORS.nextPage).length > 0;

  if (blocks.length === 0) {
    if ($(SELECTORS.noResults).length > 0) {
      return { restaurants: [], warnings: [], hasNextPage: false };
    }
    throw parseError('no result blocks found on the listing page', { url: options.pageUrl, hint: LAYOUT_HINT });
  }

  const restaurants: RestaurantRecord[] = [];
  const warnings: string[] = [];

  blocks.forEach((element, index) => {
    const outcome = parseBlock($, $(element), baseUrl);
    if (typeof outcome === 'string') {
      warnings.push(`skipped result ${index + 1}: ${outcome}`);
    } else {
      restaurants.push(outcome);
    }
  });

  if (restaurants.length === 0) {
    throw parseError(`all ${blocks.length} result blocks were malformed`, { url: options.pageUrl, hint: LAYOUT_HINT });
  }

  return { restaurants, warnings, hasNextPage };
}

/**
 * Returns the record, or the reason the block was skipped.
 */
function parseBlock($: CheerioAPI, item: Cheerio<Element>, baseUrl: string): RestaurantRecord | string {
  const nameEl = item.find(SELECTORS.name).first();
  const name = collapse(nameEl.text());
  if (!name) return 'missing name';

  const href = nameEl.attr('href')?.trim();
  if (!href) return `missing url for "${name}"`;
  const url = resolveUrl(href, baseUrl);
  if (url === null) return `invalid url "${href}" for "${name}"`;

  const { area, station, distance, genres } = parseAreaGenre(item.find(SELECTORS.areaGenre).first().text());

  let lunchPrice: string | null = null;
  let dinnerPrice: string | null = null;
  for (const priceEl of item.find(SELECTORS.priceItem).toArray()) {
    const entry = $(priceEl);
    const value = collapse(entry.find(SELECTORS.priceValue).first().text());
    if (!value || value === '-') continue;
    if (dinnerPrice === null && entry.find(SELECTORS.dinnerMarker).length > 0) dinnerPrice = value;
    else if (lunchPrice === null && entry.find(SELECTORS.lunchMarker).length > 0) lunchPrice = value;
  }

  return {
    name,
    url,
    area,
    station,
    distance,
    genres,
    cuisine: genres[0] ?? null,
    rating: parseRating(item.find(SELECTORS.rating).first().text()),
    reviewCount: parseCount(item.find(SELECTORS.reviewCount).first().text()),
    saveCount: parseCount(item.find(SELECTORS.saveCount).first().text()),
    lunchPrice,
    dinnerPrice,
    features: {
      onlineReservation: item.find(SELECTORS.reservation).length > 0 || /ネット予約/.test(item.text()),
    },
  };
}

/**
 * Split the "[area] station distance / genre、genre" line.
 *
 * @example
 * parseAreaGenre('[東京] 渋谷駅 350m / 寿司、海鮮')
 * // { area: '東京', station: '渋谷駅', distance: '350m', genres: ['寿司', '海鮮'] }
 */
export function parseAreaGenre(text: string): AreaGenre {
  const line = collapse(text);
  const slash = line.indexOf('/');
  const location = (slash === -1 ? line : line.slice(0, slash)).trim();
  const genreText = slash === -1 ? '' : line.slice(slash + 1);

  const bracket = /^\[([^\]]+)\]\s*(.*)$/.exec(location);
  const bracketArea = bracket?.[1]?.trim() || null;
  const rest = bracket ? (bracket[2] ?? '').trim() : location;

  let station: string | null = rest || null;
  let distance: string | null = null;
  const withDistance = /^(.*?)\s*(\d+(?:\.\d+)?k?m)$/.exec(rest);
  if (withDistance) {
    station = withDistance[1]?.trim() || null;
    distance = withDistance[2] ?? null;
  }

  const genres = genreText
    .split(/[、,，]/)
    .map((genre) => genre.trim())
    .filter((genre) => genre.length > 0);

  return { area: bracketArea ?? station, station, distance, genres };
}

export function parseRating(text: string): number | null {
  const value = Number.parseFloat(collapse(text));
  return Number.isFinite(value) && value > 0 && value <= 5 ? value : null;
}

export function parseCount(text: string): number | null {
  const digits = collapse(text).replace(/[,件人]/g, '');
  if (!/^\d+$/.test(digits)) return null;
  return Number.parseInt(digits, 10);
}

function resolveUrl(href: string, baseUrl: string): string | null {
  try {
    return new URL(href, `${baseUrl}/`).toString();
  } catch {
    return null;
  }
}

function collapse(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}
