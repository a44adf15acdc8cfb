/**
 * Pino Logger Implementation
 *
 * - One cached pino instance per component name
 * - BigInt-safe formatting of log objects
 * - Redaction of credentials and webhook URLs
 * - JSON output in production, pino-pretty in development
 */

import pino, { Logger as PinoLoggerType, LoggerOptions } from 'pino';
import type { ILogger, LoggerConfig, LogLevel, LogMeta } from './types';

const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace'];

const loggerCache = new Map<string, ILogger>();

/**
 * Drop all cached loggers. Used by tests and on shutdown.
 */
export function resetLoggerCache(): void {
  loggerCache.clear();
}

// =============================================================================
// Formatting
// =============================================================================

const MAX_FORMAT_DEPTH = 10;

function needsFormatting(value: unknown, seen: WeakSet<object>, depth: number): boolean {
  if (typeof value === 'bigint') return true;
  if (value === null || typeof value !== 'object') return false;
  // Too deep to scan: format anyway so a nested BigInt cannot reach JSON.stringify
  if (depth >= MAX_FORMAT_DEPTH) return true;
  if (seen.has(value)) return false;
  seen.add(value);

  const children: unknown[] = Array.isArray(value) ? value : Object.values(value);
  return children.some(child => needsFormatting(child, seen, depth + 1));
}

function formatValue(value: unknown, seen: WeakSet<object>, depth: number): unknown {
  if (typeof value === 'bigint') return value.toString();
  if (value === null || typeof value !== 'object') return value;
  if (seen.has(value)) return '[Circular]';
  if (depth >= MAX_FORMAT_DEPTH) return '[Max Depth]';
  seen.add(value);

  if (Array.isArray(value)) {
    return value.map(item => formatValue(item, seen, depth + 1));
  }
  if (value instanceof Date || value instanceof Error) {
    return value;
  }

  const formatted: Record<string, unknown> = {};
  for (const [key, val] of Object.entries(value)) {
    formatted[key] = formatValue(val, seen, depth + 1);
  }
  return formatted;
}

/**
 * Convert BigInt values in a log object to strings. Returns the input
 * unchanged when it holds no BigInt.
 */
export function formatLogObject(obj: Record<string, unknown>): Record<string, unknown> {
  if (!needsFormatting(obj, new WeakSet<object>(), 0)) {
    return obj;
  }

  const seen = new WeakSet<object>([obj]);
  const formatted: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    formatted[key] = formatValue(value, seen, 1);
  }
  return formatted;
}

function resolveLevel(level: string | undefined): LogLevel {
  const match = LOG_LEVELS.find(candidate => candidate === level);
  return match ?? 'info';
}

// =============================================================================
// Wrapper
// =============================================================================

class PinoLoggerWrapper implements ILogger {
  constructor(private readonly pino: PinoLoggerType) {}

  fatal(msg: string, meta?: LogMeta): void {
    if (meta) this.pino.fatal(meta, msg);
    else this.pino.fatal(msg);
  }

  error(msg: string, meta?: LogMeta): void {
    if (meta) this.pino.error(meta, msg);
    else this.pino.error(msg);
  }

  warn(msg: string, meta?: LogMeta): void {
    if (meta) this.pino.warn(meta, msg);
    else this.pino.warn(msg);
  }

  info(msg: string, meta?: LogMeta): void {
    if (meta) this.pino.info(meta, msg);
    else this.pino.info(msg);
  }

  debug(msg: string, meta?: LogMeta): void {
    if (meta) this.pino.debug(meta, msg);
    else this.pino.debug(msg);
  }

  trace(msg: string, meta?: LogMeta): void {
    if (meta) this.pino.trace(meta, msg);
    else this.pino.trace(msg);
  }

  child(bindings: LogMeta): ILogger {
    return new PinoLoggerWrapper(this.pino.child(bindings));
  }

  isLevelEnabled(level: LogLevel): boolean {
    return this.pino.isLevelEnabled(level);
  }
}

// =============================================================================
// Factory
// =============================================================================

/**
 * Create (or fetch from cache) the pino logger for a component.
 *
 * @example
 * ```typescript
 * const logger = createPinoLogger('orchestrator');
 * const verbose = createPinoLogger({ name: 'submission-engine', level: 'debug' });
 * ```
 */
export function createPinoLogger(config: string | LoggerConfig): ILogger {
  const { name, level, pretty, bindings }: LoggerConfig = typeof config === 'string' ? { name: config } : config;

  const cached = loggerCache.get(name);
  if (cached) {
    return bindings ? cached.child(bindings) : cached;
  }

  const usePretty = pretty ?? (process.env.LOG_FORMAT !== 'json' && process.env.NODE_ENV === 'development');

  const options: LoggerOptions = {
    name,
    level: level ?? resolveLevel(process.env.LOG_LEVEL),
    serializers: {
      err: pino.stdSerializers.err,
      error: pino.stdSerializers.err,
    },
    formatters: {
      log: formatLogObject,
      level(label: string) {
        return { level: label };
      },
    },
    base: {
      service: name,
      pid: process.pid,
    },
    redact: {
      paths: [
        'webhookUrl', '*.webhookUrl',
        'redisUrl', '*.redisUrl',
        'apiKey', '*.apiKey',
        'secret', '*.secret',
        'password', '*.password',
        'authorization', '*.authorization',
        'token', '*.token',
        'headers.authorization',
      ],
      censor: '[REDACTED]',
    },
  };

  if (usePretty) {
    options.transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss',
        ignore: 'pid,hostname,service',
      },
    };
  }

  const logger = new PinoLoggerWrapper(pino(options));
  loggerCache.set(name, logger);

  return bindings ? logger.child(bindings) : logger;
}

/**
 * Cached logger by component name.
 */
export function getLogger(name: string): ILogger {
  return createPinoLogger(name);
}

/** Alias kept for call sites that read better with "create". */
export const createLogger = getLogger;
