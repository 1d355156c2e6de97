/**
 * Environment Configuration
 * Single typed view over process.env (after .env is loaded)
 *
 * Every knob has a default so the CLI works with zero configuration.
 */

import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config({ quiet: true });

const booleanFlag = z
  .enum(['true', 'false'])
  .transform((value) => value === 'true');

const EnvSchema = z.object({
  NODE_ENV: z.string().default('development'),

  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  LOG_PRETTY: booleanFlag.optional(),

  GURUME_BASE_URL: z.string().url().default('https://tabelog.com'),
  GURUME_USER_AGENT: z
    .string()
    .default('Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36'),
  GURUME_HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),

  GURUME_CACHE_BACKEND: z.enum(['memory', 'file', 'off']).default('memory'),
  GURUME_CACHE_DIR: z.string().default('.cache/gurume'),
  GURUME_CACHE_MAX_ENTRIES: z.coerce.number().int().positive().default(500),
  GURUME_SEARCH_TTL_SECONDS: z.coerce.number().int().positive().default(1800),
  GURUME_SUGGEST_TTL_SECONDS: z.coerce.number().int().positive().default(3600),

  GURUME_RETRY_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(3),
  GURUME_RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(1000),
  GURUME_RETRY_MAX_JITTER_MS: z.coerce.number().int().min(0).default(250),

  OPENAI_API_KEY: z.string().min(1).optional(),
  OPENAI_MODEL: z.string().default('gpt-4o-mini'),
  OPENAI_TIMEOUT_MS: z.coerce.number().int().positive().default(20_000),
});

export type Env = z.infer<typeof EnvSchema>;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Parse an environment map. Empty strings count as unset.
 */
export function parseEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(source)) {
    if (value !== undefined && value.trim() !== '') {
      cleaned[key] = value;
    }
  }

  const result = EnvSchema.safeParse(cleaned);
  if (!result.success) {
    const problems = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${problems}`);
  }
  return result.data;
}

let cached: Env | undefined;

export function getEnv(): Env {
  cached ??= parseEnv();
  return cached;
}
