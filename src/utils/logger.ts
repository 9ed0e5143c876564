/**
 * Structured logging utility using pino
 *
 * - Environment-based log levels
 * - Structured JSON logging for production
 * - Pretty printing for development
 * - Component-based context
 *
 * Logs always go to stderr; stdout is reserved for command output.
 */

import pino from 'pino';
import { sanitizeForLogging } from './sanitize.js';
import { config } from '../config/index.js';

// Suppress logs under test to keep output clean
const isTest = process.env.NODE_ENV === 'test' || process.env.VITEST !== undefined;

const sanitizingSerializer = (obj: unknown) => sanitizeForLogging(obj);

const pinoOptions: pino.LoggerOptions = {
  level: config.logging.level,
  enabled: !isTest,
  redact: {
    paths: [
      'apiKey',
      'openaiApiKey',
      'anthropicApiKey',
      'OPENAI_API_KEY',
      'ANTHROPIC_API_KEY',
      'authorization',
      '*.apiKey',
      '*.openaiApiKey',
      '*.anthropicApiKey',
    ],
    censor: '***REDACTED***',
  },
  serializers: {
    err: pino.stdSerializers.err,
    error: sanitizingSerializer,
  },
};

export const logger =
  config.runtime.nodeEnv === 'production'
    ? pino(pinoOptions, pino.destination({ dest: 2, sync: false }))
    : pino({
        ...pinoOptions,
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'HH:MM:ss.l',
            ignore: 'pid,hostname',
            destination: 2,
          },
        },
      });

/**
 * Create a child logger with component context
 *
 * @param component - Component name (e.g., 'chunk-packer', 'batch-optimizer')
 */
export function createComponentLogger(component: string): pino.Logger {
  return logger.child({ component });
}
