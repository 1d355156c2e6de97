/**
 * MCP tool definitions
 *
 * Four read-only tools over the search service. Handlers never throw:
 * failures come back as `isError` results carrying the user-facing message,
 * so the calling agent can correct its arguments.
 */

import { z } from 'zod';
import { inputError } from '../lib/errors/gurume-error.js';
import { toUserMessage } from '../lib/errors/user-message.js';
import { logger } from '../lib/logger/structured-logger.js';
import type { RestaurantSearchService } from '../services/tabelog/search.service.js';
import type { RestaurantRecord, SearchFilterInput, SortKey, SuggestionRecord } from '../services/tabelog/types.js';
import { SORT_KEYS } from '../services/tabelog/types.js';

export type ToolResult = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

export const TOOL_ANNOTATIONS = {
  readOnlyHint: true,
  idempotentHint: true,
  openWorldHint: true,
} as const;

// Ranges are checked by the query builder so the agent sees the same messages as CLI users
export const searchRestaurantsShape = {
  area: z
    .string()
    .optional()
    .describe("Prefecture or major city in Japanese, e.g. '東京', '大阪府', '三重'. Call get_area_suggestions when unsure."),
  keyword: z
    .string()
    .optional()
    .describe("Free keyword: restaurant name, dish, station or district, e.g. '和田金'. Prefer `cuisine` for cuisine types."),
  cuisine: z
    .string()
    .optional()
    .describe("Cuisine type in Japanese, e.g. 'すき焼き', '寿司', 'ラーメン'. Must be one of the names list_cuisines returns."),
  sort: z
    .string()
    .optional()
    .describe(`Result order, one of ${SORT_KEYS.join(', ')}. Defaults to ranking (highest rated first).`),
  limit: z.number().int().optional().describe('Maximum number of results, 1 to 60 (default 20).'),
};

export const suggestionShape = {
  query: z.string().describe('Partial or complete text in Japanese, hiragana or romaji, e.g. 渋谷, しぶや, shibuya.'),
};

export const TOOL_DESCRIPTIONS = {
  search_restaurants: [
    'Search Tabelog restaurants by area, cuisine type and keyword.',
    'Combine `area` + `cuisine` for the most precise results; use `keyword` only for names or non-cuisine terms.',
    'Returns a JSON array of { name, rating, reviewCount, area, station, genres, url, lunchPrice, dinnerPrice }; missing values are null.',
  ].join('\n'),
  list_cuisines: [
    'List every cuisine type `search_restaurants` accepts in its `cuisine` parameter.',
    'Returns a JSON array of { name, code }, e.g. { name: "すき焼き", code: "RC0107" }. Takes no parameters.',
  ].join('\n'),
  get_area_suggestions: [
    'Autocomplete area and station names from Tabelog.',
    'Returns a JSON array of { name, kind, datatype, id, lat, lng }; datatype is AddressMaster (prefecture, city, district) or RailroadStation.',
  ].join('\n'),
  get_keyword_suggestions: [
    'Autocomplete cuisine, restaurant and keyword terms from Tabelog.',
    'Returns a JSON array of { name, kind, datatype, id, lat, lng }; datatype is Genre2 (use as `cuisine`), Restaurant (use as `keyword`) or "Genre2 DetailCondition" (cuisine plus a condition).',
  ].join('\n'),
} as const;

export type SearchRestaurantsArgs = z.infer<z.ZodObject<typeof searchRestaurantsShape>>;
export type SuggestionArgs = z.infer<z.ZodObject<typeof suggestionShape>>;

export interface ToolHandlers {
  searchRestaurants(args: SearchRestaurantsArgs): Promise<ToolResult>;
  listCuisines(): Promise<ToolResult>;
  getAreaSuggestions(args: SuggestionArgs): Promise<ToolResult>;
  getKeywordSuggestions(args: SuggestionArgs): Promise<ToolResult>;
}

export function createToolHandlers(service: RestaurantSearchService): ToolHandlers {
  return {
    searchRestaurants: (args) =>
      respond('search_restaurants', async () => {
        const result = await service.searchRestaurants(toFilter(args));
        return result.restaurants.map(toRestaurantJson);
      }),

    listCuisines: () => respond('list_cuisines', async () => service.listCuisines()),

    getAreaSuggestions: ({ query }) =>
      respond('get_area_suggestions', async () => (await service.getAreaSuggestions(requireQuery(query))).map(toSuggestionJson)),

    getKeywordSuggestions: ({ query }) =>
      respond('get_keyword_suggestions', async () => (await service.getKeywordSuggestions(requireQuery(query))).map(toSuggestionJson)),
  };
}

function toFilter(args: SearchRestaurantsArgs): SearchFilterInput {
  const sort = args.sort?.trim().toLowerCase() || 'ranking';
  if (!isSortKey(sort)) {
    throw inputError('Invalid sort type', { parameter: 'sort', hint: `use one of: ${SORT_KEYS.join(', ')}` });
  }
  const filter: SearchFilterInput = { sort };
  if (args.area !== undefined) filter.area = args.area;
  if (args.keyword !== undefined) filter.keyword = args.keyword;
  if (args.cuisine !== undefined) filter.cuisine = args.cuisine;
  if (args.limit !== undefined) filter.limit = args.limit;
  return filter;
}

function isSortKey(value: string): value is SortKey {
  return SORT_KEYS.some((key) => key === value);
}

function requireQuery(query: string): string {
  if (!query.trim()) {
    throw inputError('query parameter cannot be empty', { parameter: 'query' });
  }
  return query;
}

function toRestaurantJson(r: RestaurantRecord) {
  return {
    name: r.name,
    rating: r.rating,
    reviewCount: r.reviewCount,
    area: r.area,
    station: r.station,
    genres: r.genres,
    url: r.url,
    lunchPrice: r.lunchPrice,
    dinnerPrice: r.dinnerPrice,
  };
}

function toSuggestionJson(s: SuggestionRecord) {
  return { name: s.label, kind: s.kind, datatype: s.datatype, id: s.id, lat: s.lat, lng: s.lng };
}

async function respond(tool: string, run: () => Promise<unknown>): Promise<ToolResult> {
  try {
    const data = await run();
    return { content: [{ type: 'text', text: JSON.stringify(data, null, 2) }] };
  } catch (error) {
    logger.warn({ tool, error: error instanceof Error ? error.message : String(error) }, '[MCP] tool call failed');
    return { content: [{ type: 'text', text: toUserMessage(error) }], isError: true };
  }
}
