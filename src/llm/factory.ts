import type { Logger } from 'pino';
import type { LlmConfig } from '../config/index.js';
import { OpenAiProvider } from './openai.provider.js';
import type { LLMProvider } from './types.js';

/**
 * Null when no API key is configured; callers report that as an input problem.
 */
export function createLLMProvider(config: LlmConfig, logger?: Logger): LLMProvider | null {
  const apiKey = config.apiKey;
  if (!apiKey) return null;
  return new OpenAiProvider({ ...config, apiKey }, logger);
}
