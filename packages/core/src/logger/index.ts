/**
 * Clinical Pino logger with PHI redaction
 *
 * - PHI redaction on every log object
 * - Correlation ID support for request tracing
 * - Pretty printing in development, structured JSON elsewhere
 */

import pino, { type Logger, type LoggerOptions } from 'pino';
import { v4 as uuidv4 } from 'uuid';

import { createCensor, REDACTION_PATHS } from './redaction.js';

export { REDACTION_PATHS, redactString, shouldRedactPath, createCensor } from './redaction.js';

/**
 * Logger configuration options
 */
export interface CreateLoggerOptions {
  /** Component name, emitted as `name` on every line */
  name: string;
  /** Log level (default: LOG_LEVEL, then derived from NODE_ENV) */
  level?: string;
  /** Enable pretty printing (default: true in development) */
  pretty?: boolean;
  /** Additional redaction paths */
  additionalRedactionPaths?: string[];
}

function getDefaultLevel(): string {
  const envLevel = process.env.LOG_LEVEL;
  if (envLevel) {
    return envLevel;
  }

  switch (process.env.NODE_ENV) {
    case 'production':
      return 'info';
    case 'test':
      return 'silent';
    default:
      return 'debug';
  }
}

function isDevelopment(): boolean {
  return process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test';
}

/**
 * Build the pino options shared by every logger of the process
 */
export function createLoggerOptions(options: CreateLoggerOptions): LoggerOptions {
  const { name, level = getDefaultLevel(), additionalRedactionPaths = [] } = options;

  return {
    name,
    level,
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      service: process.env.SERVICE_NAME ?? 'ehr-backend',
      env: process.env.NODE_ENV ?? 'development',
    },
    formatters: {
      level: (label) => ({ level: label }),
    },
    messageKey: 'msg',
    redact: {
      paths: [...REDACTION_PATHS, ...additionalRedactionPaths],
      censor: createCensor,
    },
    serializers: {
      err: pino.stdSerializers.err,
    },
  };
}

/**
 * Create a logger instance with PHI redaction
 */
export function createLogger(options: CreateLoggerOptions): Logger {
  const loggerOptions = createLoggerOptions(options);
  const pretty = options.pretty ?? isDevelopment();

  if (pretty) {
    const transport = pino.transport({
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
      },
    }) as pino.DestinationStream;
    return pino(loggerOptions, transport);
  }

  return pino(loggerOptions);
}

/**
 * Generate a correlation ID
 */
export function generateCorrelationId(): string {
  return uuidv4();
}

export type { Logger, LoggerOptions } from 'pino';
