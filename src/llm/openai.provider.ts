import OpenAI from 'openai';
import type { Logger } from 'pino';
import type { z } from 'zod';
import type { LlmConfig } from '../config/index.js';
import { logger as rootLogger } from '../lib/logger/structured-logger.js';
import type { LLMCompletionResult, LLMProvider, Message } from './types.js';

function toInput(messages: Message[]) {
  return messages.map((m) => ({ role: m.role, content: m.content }));
}

/**
 * Pull a JSON value out of model text: the whole text, a ```json fence,
 * or the first balanced {...} object that parses.
 */
export function extractJsonLoose(text: string): unknown {
  if (!text) return null;
  const raw = text.trim();
  const fence = raw.match(/```(?:json)?\n([\s\S]*?)```/i);
  const candidate = fence?.[1]?.trim() ?? raw;

  const direct = tryParse(candidate);
  if (direct !== undefined) return direct;

  let depth = 0;
  let start = -1;
  let inStr = false;
  let esc = false;
  for (let i = 0; i < candidate.length; i++) {
    const ch = candidate[i];
    if (inStr) {
      if (esc) esc = false;
      else if (ch === '\\') esc = true;
      else if (ch === '"') inStr = false;
      continue;
    }
    if (ch === '"') {
      inStr = true;
    } else if (ch === '{') {
      if (depth === 0) start = i;
      depth++;
    } else if (ch === '}') {
      if (depth > 0) depth--;
      if (depth === 0 && start !== -1) {
        const parsed = tryParse(candidate.slice(start, i + 1));
        if (parsed !== undefined) return parsed;
        start = -1;
      }
    }
  }
  return null;
}

function tryParse(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

export class OpenAiProvider implements LLMProvider {
  private readonly client: OpenAI;
  private readonly logger: Logger;

  constructor(
    private readonly config: LlmConfig & { apiKey: string },
    logger: Logger = rootLogger
  ) {
    this.client = new OpenAI({ apiKey: config.apiKey, maxRetries: 1 });
    this.logger = logger.child({ component: 'llm' });
  }

  async completeJSON<T extends z.ZodTypeAny>(
    messages: Message[],
    schema: T,
    opts?: { model?: string; temperature?: number; timeout?: number }
  ): Promise<LLMCompletionResult<z.infer<T>>> {
    const model = opts?.model ?? this.config.model;
    const timeoutMs = opts?.timeout ?? this.config.timeoutMs;
    const tStart = Date.now();

    const controller = new AbortController();
    const t = setTimeout(() => controller.abort(), timeoutMs);
    try {
      const resp = await this.client.responses.create(
        {
          model,
          input: toInput(messages),
          temperature: opts?.temperature ?? 0,
        },
        { signal: controller.signal }
      );

      const raw = resp.output_text || '';
      // Strict parse first, loose extraction second; zod validates either way
      const candidate = tryParse(raw) ?? extractJsonLoose(raw);
      const data: z.infer<T> = schema.parse(candidate);

      this.logger.info({ model, durationMs: Date.now() - tStart, usage: resp.usage }, '[LLM] completeJSON ok');
      return {
        data,
        model: resp.model,
        usage: resp.usage
          ? {
              input_tokens: resp.usage.input_tokens,
              output_tokens: resp.usage.output_tokens,
              total_tokens: resp.usage.total_tokens,
            }
          : undefined,
      };
    } catch (error) {
      this.logger.warn(
        { model, durationMs: Date.now() - tStart, error: error instanceof Error ? error.message : String(error) },
        '[LLM] completeJSON failed'
      );
      throw error;
    } finally {
      clearTimeout(t);
    }
  }
}
