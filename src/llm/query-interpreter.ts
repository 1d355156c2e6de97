/**
 * Query Interpreter
 *
 * Free text ("東京で安いラーメン") → partial SearchFilter, via the LLM.
 * The model answers with JSON validated by zod. Names the fixed tables do
 * not know are folded into the keyword, which the listing site matches
 * against station names, districts and dishes.
 */

import type { Logger } from 'pino';
import { z } from 'zod';
import { inputError, isGurumeError, networkError } from '../lib/errors/gurume-error.js';
import { logger as rootLogger } from '../lib/logger/structured-logger.js';
import { getAreaSlug } from '../services/tabelog/area-mapping.js';
import { getAllGenres, getGenreCode } from '../services/tabelog/genre-mapping.js';
import { PRICE_TIMES, SORT_KEYS, type SearchFilterInput } from '../services/tabelog/types.js';
import { buildLLMJsonSchema, type LLMProvider, type Message } from './types.js';

export const InterpretedQuerySchema = z.object({
  area: z.string().nullable(),
  keyword: z.string().nullable(),
  cuisine: z.string().nullable(),
  sort: z.enum(SORT_KEYS).nullable(),
  priceMin: z.number().int().min(0).nullable(),
  priceMax: z.number().int().min(0).nullable(),
  priceTime: z.enum(PRICE_TIMES).nullable(),
});

export type InterpretedQuery = z.infer<typeof InterpretedQuerySchema>;

const INTERPRETER_SCHEMA = buildLLMJsonSchema(InterpretedQuerySchema);

const QUERY_HINT = 'rephrase the query, or pass --area, --cuisine and --keyword directly';

export function buildInterpreterPrompt(text: string): Message[] {
  const { schema } = INTERPRETER_SCHEMA;
  return [
    {
      role: 'system',
      content: [
        'You convert restaurant search requests for Japan into a JSON search filter.',
        'Reply with a single JSON object and nothing else. Use null for anything the request does not mention.',
        '- area: a Japanese prefecture or city name written in Japanese (東京, 大阪府, 三重)',
        `- cuisine: exactly one of: ${getAllGenres().join(', ')}`,
        '- keyword: anything else worth searching for (station, district, dish, restaurant name)',
        '- priceMin / priceMax: budget per person in yen',
        `JSON Schema: ${JSON.stringify(schema)}`,
      ].join('\n'),
    },
    { role: 'user', content: text },
  ];
}

/**
 * Map a validated model answer onto filter input. Unknown area and cuisine
 * names move into the keyword.
 */
export function toSearchFilter(answer: InterpretedQuery): SearchFilterInput {
  const keywords: string[] = [];
  if (answer.keyword?.trim()) keywords.push(answer.keyword.trim());

  let area: string | undefined;
  if (answer.area?.trim()) {
    const name = answer.area.trim();
    if (getAreaSlug(name) !== null) area = name;
    else keywords.unshift(name);
  }

  let cuisine: string | undefined;
  if (answer.cuisine?.trim()) {
    const name = answer.cuisine.trim();
    if (getGenreCode(name) !== null) cuisine = name;
    else keywords.push(name);
  }

  const filter: SearchFilterInput = {};
  if (area !== undefined) filter.area = area;
  if (cuisine !== undefined) filter.cuisine = cuisine;
  if (keywords.length > 0) filter.keyword = keywords.join(' ');
  if (answer.sort !== null) filter.sort = answer.sort;
  if (answer.priceMin !== null) filter.priceMin = answer.priceMin;
  if (answer.priceMax !== null) filter.priceMax = answer.priceMax;
  if (answer.priceTime !== null) filter.priceTime = answer.priceTime;
  return filter;
}

export async function interpretQuery(
  text: string,
  provider: LLMProvider | null,
  logger: Logger = rootLogger
): Promise<SearchFilterInput> {
  const query = text.trim();
  if (!query) {
    throw inputError('query cannot be empty', { parameter: 'query' });
  }
  if (!provider) {
    throw inputError('natural-language queries need OPENAI_API_KEY to be set', {
      parameter: 'query',
      hint: QUERY_HINT,
    });
  }

  let answer: InterpretedQuery;
  try {
    const startTime = Date.now();
    const result = await provider.completeJSON(buildInterpreterPrompt(query), InterpretedQuerySchema);
    answer = result.data;
    logger.info(
      {
        schemaHash: INTERPRETER_SCHEMA.schemaHash,
        model: result.model,
        usage: result.usage,
        durationMs: Date.now() - startTime,
      },
      '[Query] interpreted'
    );
  } catch (error) {
    if (error instanceof z.ZodError || error instanceof SyntaxError) {
      throw inputError(`could not interpret "${query}"`, { parameter: 'query', hint: QUERY_HINT });
    }
    if (isGurumeError(error)) throw error;
    throw networkError(`LLM request failed: ${error instanceof Error ? error.message : String(error)}`, {}, error);
  }

  return toSearchFilter(answer);
}
