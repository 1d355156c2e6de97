/**
 * CLI entry: parse → build the service → run one command.
 * Exit codes: 0 success, 2 input error, 1 anything else.
 * Results go to stdout; errors and logs go to stderr.
 */

import { getClientConfig, getLlmConfig, type ClientConfig } from '../config/index.js';
import { isGurumeError } from '../lib/errors/gurume-error.js';
import { toUserMessage } from '../lib/errors/user-message.js';
import { logger } from '../lib/logger/structured-logger.js';
import { createLLMProvider } from '../llm/factory.js';
import { interpretQuery } from '../llm/query-interpreter.js';
import type { LLMProvider } from '../llm/types.js';
import { runMcpServer } from '../mcp/server.js';
import type { RestaurantSearchService } from '../services/tabelog/search.service.js';
import { createSearchService } from '../services/tabelog/tabelog-client.js';
import { runTui } from '../tui/tui.js';
import { USAGE, parseCli, type CliCommand } from './args.js';
import { formatCuisines, formatRestaurantTable, formatSuggestions } from './format.js';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_INPUT = 2;

export interface CliIO {
  out(line: string): void;
  err(line: string): void;
}

export interface CliDeps {
  io?: CliIO;
  createService?: (config: ClientConfig) => RestaurantSearchService;
  llm?: LLMProvider | null;
}

const processIO: CliIO = {
  out: (line) => process.stdout.write(`${line}\n`),
  err: (line) => process.stderr.write(`${line}\n`),
};

export async function main(argv: readonly string[], deps: CliDeps = {}): Promise<number> {
  const io = deps.io ?? processIO;
  try {
    const command = parseCli(argv);
    if (command.command === 'help') {
      io.out(USAGE);
      return EXIT_OK;
    }

    const config = getClientConfig();
    const effective: ClientConfig = command.cache
      ? { ...config, cache: { ...config.cache, backend: command.cache } }
      : config;
    const service = (deps.createService ?? createSearchService)(effective);

    await run(command, service, io, deps);
    return EXIT_OK;
  } catch (error) {
    io.err(toUserMessage(error));
    if (isGurumeError(error, 'INPUT')) return EXIT_INPUT;
    logger.debug({ err: error }, '[CLI] command failed');
    return EXIT_FAILURE;
  }
}

async function run(command: CliCommand, service: RestaurantSearchService, io: CliIO, deps: CliDeps): Promise<void> {
  const print = (data: unknown, lines: () => string[]) => {
    if (command.json) io.out(JSON.stringify(data, null, 2));
    else lines().forEach((line) => io.out(line));
  };

  switch (command.command) {
    case 'search': {
      let filter = command.filter;
      if (command.query !== undefined) {
        const llm = deps.llm === undefined ? createLLMProvider(getLlmConfig()) : deps.llm;
        // Explicit flags win over what the model inferred
        filter = { ...(await interpretQuery(command.query, llm)), ...command.filter };
      }
      const result = await service.searchRestaurants(filter);
      print(result.restaurants, () => formatRestaurantTable(result.restaurants));
      for (const warning of result.warnings) io.err(`warning: ${warning}`);
      return;
    }
    case 'cuisines': {
      const cuisines = service.listCuisines();
      print(cuisines, () => formatCuisines(cuisines));
      return;
    }
    case 'suggest-area':
    case 'suggest-keyword': {
      const suggestions =
        command.command === 'suggest-area'
          ? await service.getAreaSuggestions(command.query)
          : await service.getKeywordSuggestions(command.query);
      print(suggestions, () => formatSuggestions(suggestions));
      return;
    }
    case 'tui':
      await runTui(service);
      return;
    case 'mcp':
      await runMcpServer(service);
      return;
    case 'help':
      io.out(USAGE);
      return;
  }
}
