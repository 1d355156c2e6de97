/**
 * Restaurant Search Service
 *
 * Orchestrates query builder → fetcher → parser for the four read-only
 * operations every surface (CLI, TUI, MCP) exposes:
 * - searchRestaurants: paginates until `limit` records or the last page
 * - listCuisines: static table, no network
 * - getAreaSuggestions / getKeywordSuggestions: autocomplete endpoint
 */

import type { Logger } from 'pino';
import { DEFAULT_BASE_URL, MAX_SEARCH_LIMIT, RESULTS_PER_PAGE } from '../../config/index.js';
import { logger as rootLogger } from '../../lib/logger/structured-logger.js';
import type { TabelogFetcher } from './fetcher.js';
import { listCuisineEntries, type CuisineEntry } from './genre-mapping.js';
import { buildSearchQuery, buildSuggestQuery, normalizeSearchFilter, type SuggestEndpoint } from './query-builder.js';
import { parseSearchResults } from './results-parser.js';
import { parseSuggestions } from './suggestion-parser.js';
import type { RestaurantRecord, SearchFilterInput, SearchResult, SuggestionRecord } from './types.js';

export interface SearchServiceOptions {
  baseUrl?: string;
  searchTtlSeconds: number;
  suggestTtlSeconds: number;
  logger?: Logger;
}

const MAX_PAGES = Math.ceil(MAX_SEARCH_LIMIT / RESULTS_PER_PAGE);

export class RestaurantSearchService {
  private readonly baseUrl: string;
  private readonly logger: Logger;

  constructor(
    private readonly fetcher: TabelogFetcher,
    private readonly options: SearchServiceOptions
  ) {
    this.baseUrl = options.baseUrl ?? DEFAULT_BASE_URL;
    this.logger = (options.logger ?? rootLogger).child({ component: 'search' });
  }

  async searchRestaurants(input: SearchFilterInput): Promise<SearchResult> {
    const filter = normalizeSearchFilter(input);
    const restaurants: RestaurantRecord[] = [];
    const warnings: string[] = [];
    const seen = new Set<string>();
    let pagesFetched = 0;

    for (let page = 1; page <= MAX_PAGES && restaurants.length < filter.limit; page++) {
      const { url, params } = buildSearchQuery(filter, page, this.baseUrl);
      const parsed = await this.fetcher.fetchParsed(url, params, { ttlSeconds: this.options.searchTtlSeconds }, (html) =>
        parseSearchResults(html, { baseUrl: this.baseUrl, pageUrl: url })
      );
      pagesFetched++;

      warnings.push(...parsed.warnings.map((warning) => `page ${page}: ${warning}`));

      for (const restaurant of parsed.restaurants) {
        if (restaurants.length >= filter.limit) break;
        if (seen.has(restaurant.url)) continue;
        seen.add(restaurant.url);
        restaurants.push(restaurant);
      }

      if (!parsed.hasNextPage) break;
    }

    if (warnings.length > 0) {
      this.logger.warn({ warnings: warnings.length, first: warnings[0] }, '[Search] skipped malformed results');
    }
    this.logger.info(
      { area: filter.area, cuisine: filter.cuisine, keyword: filter.keyword, limit: filter.limit, results: restaurants.length, pagesFetched },
      '[Search] completed'
    );

    return { restaurants, warnings, pagesFetched };
  }

  listCuisines(): CuisineEntry[] {
    return listCuisineEntries();
  }

  getAreaSuggestions(query: string): Promise<SuggestionRecord[]> {
    return this.suggest('area', query);
  }

  getKeywordSuggestions(query: string): Promise<SuggestionRecord[]> {
    return this.suggest('keyword', query);
  }

  private async suggest(endpoint: SuggestEndpoint, query: string): Promise<SuggestionRecord[]> {
    const trimmed = query.trim();
    if (!trimmed) return [];

    const { url, params } = buildSuggestQuery(endpoint, trimmed, this.baseUrl);
    const { suggestions, warnings } = await this.fetcher.fetchParsed(
      url,
      params,
      { ttlSeconds: this.options.suggestTtlSeconds },
      (json) => parseSuggestions(json, endpoint, url)
    );

    if (warnings.length > 0) {
      this.logger.warn({ endpoint, warnings }, '[Suggest] skipped malformed suggestions');
    }
    this.logger.debug({ endpoint, query: trimmed, results: suggestions.length }, '[Suggest] completed');
    return suggestions;
  }
}
