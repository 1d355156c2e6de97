/**
 * MCP server over stdio.
 * stdout is the protocol channel: all logging goes to stderr.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { logger } from '../lib/logger/structured-logger.js';
import type { RestaurantSearchService } from '../services/tabelog/search.service.js';
import {
  TOOL_ANNOTATIONS,
  TOOL_DESCRIPTIONS,
  createToolHandlers,
  searchRestaurantsShape,
  suggestionShape,
} from './tools.js';

export const SERVER_INFO = { name: 'gurume', version: '0.1.0' } as const;

export function createMcpServer(service: RestaurantSearchService): McpServer {
  const server = new McpServer(SERVER_INFO);
  const handlers = createToolHandlers(service);

  server.tool(
    'search_restaurants',
    TOOL_DESCRIPTIONS.search_restaurants,
    searchRestaurantsShape,
    TOOL_ANNOTATIONS,
    (args) => handlers.searchRestaurants(args)
  );
  server.tool('list_cuisines', TOOL_DESCRIPTIONS.list_cuisines, TOOL_ANNOTATIONS, () => handlers.listCuisines());
  server.tool(
    'get_area_suggestions',
    TOOL_DESCRIPTIONS.get_area_suggestions,
    suggestionShape,
    TOOL_ANNOTATIONS,
    (args) => handlers.getAreaSuggestions(args)
  );
  server.tool(
    'get_keyword_suggestions',
    TOOL_DESCRIPTIONS.get_keyword_suggestions,
    suggestionShape,
    TOOL_ANNOTATIONS,
    (args) => handlers.getKeywordSuggestions(args)
  );

  return server;
}

/**
 * Resolves once connected; the open stdin keeps the process serving.
 */
export async function runMcpServer(service: RestaurantSearchService): Promise<McpServer> {
  const server = createMcpServer(service);
  await server.connect(new StdioServerTransport());
  logger.info({ transport: 'stdio' }, '[MCP] server connected');
  return server;
}
