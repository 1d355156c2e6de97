/**
 * Structured Logger with Pino
 *
 * Features:
 * - Fast JSON logging with Pino
 * - Pretty output in DEV
 * - Automatic secret redaction
 * - Component tagging via child loggers
 *
 * Everything goes to stderr: stdout carries CLI results and the MCP stdio channel.
 */

import pino from 'pino';
import pinoPretty from 'pino-pretty';
import { getLoggingConfig } from '../../config/logging.config.js';

const config = getLoggingConfig();

export const logger = pino(
  {
    level: config.level,
    redact: {
      paths: config.redactFields,
      censor: '[REDACTED]',
    },
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  },
  config.pretty
    ? pinoPretty({
        colorize: true,
        translateTime: 'SYS:HH:MM:ss',
        ignore: 'pid,hostname',
        destination: 2,
      })
    : pino.destination(2)
);

export type Logger = typeof logger;
