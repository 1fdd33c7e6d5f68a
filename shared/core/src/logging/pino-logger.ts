/**
 * Pino Logger Implementation
 *
 * - Singleton cache per logger name
 * - BigInt-safe formatting (amounts on the ledger are bigint)
 * - JSON output by default, pino-pretty when NODE_ENV=development
 * - Child loggers for per-contract or per-transaction context
 */

import pino, { Logger as PinoLoggerType, LoggerOptions } from 'pino';
import type { ILogger, LoggerConfig, LogLevel, LogMeta } from './types';

// =============================================================================
// Singleton Cache
// =============================================================================

const loggerCache = new Map<string, ILogger>();

/**
 * Reset all cached loggers. Used by tests.
 */
export function resetLoggerCache(): void {
  loggerCache.clear();
}

// =============================================================================
// Formatting
// =============================================================================

const MAX_FORMAT_DEPTH = 10;

const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace'];

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function formatValue(value: unknown, seen: WeakSet<object>, depth: number): unknown {
  if (typeof value === 'bigint') {
    return value.toString();
  }
  if (!value || typeof value !== 'object') {
    return value;
  }
  if (seen.has(value)) {
    return '[Circular]';
  }
  if (depth >= MAX_FORMAT_DEPTH) {
    return '[Max Depth]';
  }
  seen.add(value);

  if (Array.isArray(value)) {
    return value.map((item: unknown) => formatValue(item, seen, depth + 1));
  }
  // Errors, dates and byte arrays go to pino's own serializers untouched
  if (value instanceof Error || value instanceof Date || value instanceof Uint8Array) {
    return value;
  }

  const formatted: Record<string, unknown> = {};
  for (const [key, val] of Object.entries(value)) {
    formatted[key] = formatValue(val, seen, depth + 1);
  }
  return formatted;
}

/**
 * Convert BigInt values anywhere in a log object to decimal strings.
 * Circular references become "[Circular]", nesting past ten levels "[Max Depth]".
 */
export function formatLogObject(obj: Record<string, unknown>): Record<string, unknown> {
  const seen = new WeakSet<object>();
  seen.add(obj);

  const formatted: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    formatted[key] = formatValue(value, seen, 1);
  }
  return formatted;
}

// =============================================================================
// Pino Logger Wrapper
// =============================================================================

/**
 * Adapts pino's (meta, msg) argument order to ILogger's (msg, meta).
 */
class PinoLoggerWrapper implements ILogger {
  constructor(private readonly pino: PinoLoggerType) {}

  fatal(msg: string, meta?: LogMeta): void {
    this.write('fatal', msg, meta);
  }

  error(msg: string, meta?: LogMeta): void {
    this.write('error', msg, meta);
  }

  warn(msg: string, meta?: LogMeta): void {
    this.write('warn', msg, meta);
  }

  info(msg: string, meta?: LogMeta): void {
    this.write('info', msg, meta);
  }

  debug(msg: string, meta?: LogMeta): void {
    this.write('debug', msg, meta);
  }

  trace(msg: string, meta?: LogMeta): void {
    this.write('trace', msg, meta);
  }

  child(bindings: LogMeta): ILogger {
    return new PinoLoggerWrapper(this.pino.child(formatLogObject(bindings)));
  }

  isLevelEnabled(level: LogLevel): boolean {
    return this.pino.isLevelEnabled(level);
  }

  private write(level: LogLevel, msg: string, meta?: LogMeta): void {
    if (meta) {
      this.pino[level](meta, msg);
    } else {
      this.pino[level](msg);
    }
  }
}

// =============================================================================
// Factory Functions
// =============================================================================

/**
 * Create (or fetch from cache) a pino-backed logger.
 *
 * @example
 * ```typescript
 * const logger = createLogger('ledger');
 * const verbose = createLogger({ name: 'simulate-bridge', level: 'debug' });
 * ```
 */
export function createLogger(config: string | LoggerConfig): ILogger {
  const { name, level, pretty, bindings }: LoggerConfig =
    typeof config === 'string' ? { name: config } : config;

  const cached = loggerCache.get(name);
  if (cached) {
    return bindings ? cached.child(bindings) : cached;
  }

  const envLevel = process.env.LOG_LEVEL;
  const logLevel: LogLevel = level ?? (isLogLevel(envLevel) ? envLevel : 'info');
  const usePretty =
    pretty ?? (process.env.LOG_FORMAT !== 'json' && process.env.NODE_ENV === 'development');

  const options: LoggerOptions = {
    name,
    level: logLevel,
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
      paths: ['privateKey', '*.privateKey', 'secret', '*.secret', 'password', '*.password'],
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
 * Alias of createLogger for DI call sites.
 */
export function getLogger(name: string): ILogger {
  return createLogger(name);
}
