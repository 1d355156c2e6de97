import { createHash } from 'node:crypto';
import type { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';

export type Message = {
  role: 'system' | 'user' | 'assistant';
  content: string;
};

export interface LLMCompletionResult<T> {
  data: T;
  usage?: {
    input_tokens?: number;
    output_tokens?: number;
    total_tokens?: number;
  };
  model?: string;
}

export interface LLMProvider {
  completeJSON<T extends z.ZodTypeAny>(
    messages: Message[],
    schema: T,
    opts?: {
      model?: string;
      temperature?: number;
      timeout?: number;
    }
  ): Promise<LLMCompletionResult<z.infer<T>>>;
}

/**
 * Result from building LLM JSON Schema
 */
export interface LLMJsonSchemaResult {
  schema: Record<string, unknown>;
  schemaHash: string;
}

/**
 * Build a JSON Schema from a zod schema (the source of truth), for embedding
 * in prompts. The 12-char hash identifies the schema in logs.
 */
export function buildLLMJsonSchema<T extends z.ZodTypeAny>(zodSchema: T): LLMJsonSchemaResult {
  const cleaned = removeMetadata(
    zodToJsonSchema(zodSchema, {
      target: 'openApi3',
      $refStrategy: 'none',
    })
  );

  if (!isRecord(cleaned) || cleaned['type'] !== 'object') {
    throw new Error('buildLLMJsonSchema: root must be an object schema');
  }

  const schemaHash = createHash('sha256').update(stableStringify(cleaned), 'utf8').digest('hex').slice(0, 12);
  return { schema: cleaned, schemaHash };
}

/**
 * Remove non-functional metadata fields from a JSON schema.
 */
function removeMetadata(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(removeMetadata);
  if (!isRecord(value)) return value;

  const cleaned: Record<string, unknown> = {};
  for (const [key, v] of Object.entries(value)) {
    if (key === '$schema' || key === '$id') continue;
    cleaned[key] = removeMetadata(v);
  }
  return cleaned;
}

/**
 * Deterministic JSON stringify (sorts keys recursively).
 */
function stableStringify(value: unknown): string {
  return JSON.stringify(sortKeysDeep(value));
}

function sortKeysDeep(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(sortKeysDeep);
  if (!isRecord(value)) return value;

  const out: Record<string, unknown> = {};
  for (const key of Object.keys(value).sort()) {
    out[key] = sortKeysDeep(value[key]);
  }
  return out;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
