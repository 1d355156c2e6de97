/**
 * Command-line parsing (node:util parseArgs).
 *
 *   gurume [--cache memory|file|off] <command> [options]
 *
 * Every malformed flag becomes an INPUT error naming the flag.
 */

import { parseArgs } from 'node:util';
import type { CacheBackend } from '../config/index.js';
import { inputError } from '../lib/errors/gurume-error.js';
import {
  FEATURE_FLAGS,
  PRICE_TIMES,
  SORT_KEYS,
  type FeatureFlag,
  type PriceTime,
  type SearchFilterInput,
  type SortKey,
} from '../services/tabelog/types.js';

export const COMMANDS = ['search', 'cuisines', 'suggest-area', 'suggest-keyword', 'tui', 'mcp', 'help'] as const;
export type CommandName = (typeof COMMANDS)[number];

const CACHE_BACKENDS = ['memory', 'file', 'off'] as const;

interface CommonOptions {
  cache?: CacheBackend;
  json: boolean;
}

export type CliCommand =
  | (CommonOptions & { command: 'search'; filter: SearchFilterInput; query?: string })
  | (CommonOptions & { command: 'cuisines' })
  | (CommonOptions & { command: 'suggest-area' | 'suggest-keyword'; query: string })
  | (CommonOptions & { command: 'tui' | 'mcp' | 'help' });

export const USAGE = `Usage: gurume [--cache memory|file|off] <command> [options]

Commands:
  search             Search restaurants
    --area <name>        prefecture or city, e.g. 東京, 大阪府, 三重
    --keyword <text>     restaurant name, dish, station
    --cuisine <name>     cuisine type (see \`gurume cuisines\`)
    --sort <key>         ${SORT_KEYS.join(' | ')}
    --limit <n>          1-60 (default 20)
    --price-min <yen>    --price-max <yen>    --price-time dinner|lunch
    --feature <flag>     repeatable: ${FEATURE_FLAGS.join(', ')}
    --query <text>       free-text request, interpreted by the LLM (needs OPENAI_API_KEY)
  cuisines           List supported cuisine types
  suggest-area <q>   Autocomplete area and station names
  suggest-keyword <q>
                     Autocomplete cuisine, restaurant and keyword terms
  tui                Interactive search
  mcp                Serve the MCP tools over stdio

Options:
  --json             Print JSON instead of text
  --cache <backend>  Override GURUME_CACHE_BACKEND
  -h, --help         Show this help`;

function readArgs(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      allowPositionals: true,
      strict: true,
      options: {
        area: { type: 'string' },
        keyword: { type: 'string' },
        cuisine: { type: 'string' },
        sort: { type: 'string' },
        limit: { type: 'string' },
        'price-min': { type: 'string' },
        'price-max': { type: 'string' },
        'price-time': { type: 'string' },
        feature: { type: 'string', multiple: true },
        query: { type: 'string', short: 'q' },
        json: { type: 'boolean', default: false },
        cache: { type: 'string' },
        help: { type: 'boolean', short: 'h', default: false },
      },
    });
  } catch (error) {
    throw inputError(error instanceof Error ? error.message : String(error), { hint: 'run gurume --help' });
  }
}

export function parseCli(argv: readonly string[]): CliCommand {
  const { values, positionals } = readArgs(argv);
  const common: CommonOptions = { json: values.json ?? false };
  if (values.cache !== undefined) common.cache = oneOf(values.cache, CACHE_BACKENDS, 'cache');

  const [name, ...rest] = positionals;
  if (values.help || name === undefined) return { ...common, command: 'help' };

  const command = oneOf(name, COMMANDS, 'command');
  switch (command) {
    case 'search': {
      if (rest.length > 0) {
        throw inputError(`unexpected argument "${rest[0]}"`, { parameter: 'search', hint: 'use --keyword for free text' });
      }
      const filter: SearchFilterInput = {};
      if (values.area !== undefined) filter.area = values.area;
      if (values.keyword !== undefined) filter.keyword = values.keyword;
      if (values.cuisine !== undefined) filter.cuisine = values.cuisine;
      if (values.sort !== undefined) filter.sort = oneOf<SortKey>(values.sort.trim().toLowerCase(), SORT_KEYS, 'sort');
      if (values.limit !== undefined) filter.limit = toInteger(values.limit, 'limit');
      if (values['price-min'] !== undefined) filter.priceMin = toInteger(values['price-min'], 'price-min');
      if (values['price-max'] !== undefined) filter.priceMax = toInteger(values['price-max'], 'price-max');
      if (values['price-time'] !== undefined) {
        filter.priceTime = oneOf<PriceTime>(values['price-time'], PRICE_TIMES, 'price-time');
      }
      if (values.feature !== undefined) {
        filter.features = values.feature.map((flag) => oneOf<FeatureFlag>(flag, FEATURE_FLAGS, 'feature'));
      }
      return values.query === undefined
        ? { ...common, command, filter }
        : { ...common, command, filter, query: values.query };
    }
    case 'suggest-area':
    case 'suggest-keyword': {
      const query = rest.join(' ').trim();
      if (!query) {
        throw inputError('query parameter cannot be empty', { parameter: 'query', hint: `usage: gurume ${command} <query>` });
      }
      return { ...common, command, query };
    }
    case 'cuisines':
    case 'tui':
    case 'mcp':
    case 'help':
      return { ...common, command };
  }
}

function oneOf<T extends string>(value: string, allowed: readonly T[], parameter: string): T {
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw inputError(`"${value}" is not one of ${allowed.join(', ')}`, { parameter });
  }
  return match;
}

function toInteger(value: string, parameter: string): number {
  const trimmed = value.trim();
  if (!/^-?\d+$/.test(trimmed)) {
    throw inputError(`"${value}" is not a whole number`, { parameter });
  }
  return Number.parseInt(trimmed, 10);
}
