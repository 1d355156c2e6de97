/**
 * Logging Configuration
 * Single source of truth for logging behavior
 */

import { getEnv, type Env } from './env.js';

export interface LoggingConfig {
  level: Env['LOG_LEVEL'];
  pretty: boolean;
  redactFields: string[];
}

export function getLoggingConfig(env: Env = getEnv()): LoggingConfig {
  const isDev = env.NODE_ENV !== 'production';

  return {
    level: env.LOG_LEVEL,
    pretty: env.LOG_PRETTY ?? isDev,
    redactFields: [
      'apiKey',
      'api_key',
      'authorization',
      'cookie',
      'token',
      'password',
      'secret',
      '*.apiKey',
      'headers.authorization',
      'headers.cookie',
    ],
  };
}
