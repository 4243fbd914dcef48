/**
 * Structured logger bound to one service or job.
 *
 * Adds to the base logger:
 * - service name on every line
 * - minimum level filtering (LOG_LEVEL, else 'info' in production and 'debug' elsewhere)
 * - a run id that tags every line of one collect or audit run
 * - redaction of secret-looking metadata keys
 */

import { log as baseLog, type LogLevel } from './logger.js';

export type ExtendedLogLevel = LogLevel;

export interface ServiceLoggerConfig {
  /** Service name injected into every log line. */
  service: string;
  minLevel?: ExtendedLogLevel;
  /** Metadata keys to redact (matched case-insensitively as substrings). */
  redactFields?: string[];
}

export interface ServiceLogger {
  setRunId(id: string | undefined): void;
  debug(message: string, metadata?: Record<string, unknown>): void;
  info(message: string, metadata?: Record<string, unknown>): void;
  warn(message: string, metadata?: Record<string, unknown>): void;
  error(message: string, metadata?: Record<string, unknown>): void;
}

const LOG_LEVEL_ORDER: Record<ExtendedLogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
};

const DEFAULT_REDACT_FIELDS = ['password', 'token', 'secret', 'authorization', 'cookie', 'apiKey', 'api_key'];

function isLogLevel(value: string | undefined): value is ExtendedLogLevel {
  return value !== undefined && value in LOG_LEVEL_ORDER;
}

function redactMetadata(metadata: Record<string, unknown>, redactFields: string[]): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(metadata)) {
    if (redactFields.some((f) => key.toLowerCase().includes(f.toLowerCase()))) {
      result[key] = '[REDACTED]';
    } else if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
      result[key] = redactMetadata(Object.fromEntries(Object.entries(value)), redactFields);
    } else {
      result[key] = value;
    }
  }
  return result;
}

function resolveMinLevel(configured: ExtendedLogLevel | undefined): ExtendedLogLevel {
  if (configured) {
    return configured;
  }
  const fromEnv = process.env.LOG_LEVEL;
  if (isLogLevel(fromEnv)) {
    return fromEnv;
  }
  return process.env.NODE_ENV === 'production' ? 'info' : 'debug';
}

export function createServiceLogger(config: ServiceLoggerConfig): ServiceLogger {
  const minLevelOrder = LOG_LEVEL_ORDER[resolveMinLevel(config.minLevel)];
  const redactFields = config.redactFields ?? DEFAULT_REDACT_FIELDS;

  let currentRunId: string | undefined;

  const emit = (level: LogLevel, message: string, metadata?: Record<string, unknown>): void => {
    if (LOG_LEVEL_ORDER[level] < minLevelOrder) return;

    const enriched: Record<string, unknown> = {
      service: config.service,
      ...(currentRunId ? { runId: currentRunId } : {}),
      ...(metadata ? redactMetadata(metadata, redactFields) : {})
    };

    baseLog(level, message, enriched);
  };

  return {
    setRunId(id) {
      currentRunId = id;
    },
    debug: (message, metadata) => emit('debug', message, metadata),
    info: (message, metadata) => emit('info', message, metadata),
    warn: (message, metadata) => emit('warn', message, metadata),
    error: (message, metadata) => emit('error', message, metadata)
  };
}
