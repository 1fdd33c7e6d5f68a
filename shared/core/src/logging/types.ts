/**
 * Logger Type Definitions
 *
 * ILogger decouples the ledger and contract tooling from pino so that tests
 * can inject RecordingLogger or NullLogger instead of mocking modules.
 */

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

/**
 * Metadata attached to a log entry. BigInt values are serialized as strings.
 */
export type LogMeta = Record<string, unknown>;

/**
 * Core logger interface. Constructors take this type, never a concrete logger.
 *
 * @example
 * ```typescript
 * const ledger = new Ledger({ logger: createLogger('ledger') });
 *
 * // Test
 * const logger = new RecordingLogger();
 * const ledger = new Ledger({ logger });
 * expect(logger.getWarnings()).toHaveLength(0);
 * ```
 */
export interface ILogger {
  fatal(msg: string, meta?: LogMeta): void;
  error(msg: string, meta?: LogMeta): void;
  warn(msg: string, meta?: LogMeta): void;
  info(msg: string, meta?: LogMeta): void;
  debug(msg: string, meta?: LogMeta): void;
  trace?(msg: string, meta?: LogMeta): void;

  /**
   * Create a child logger whose entries all carry `bindings`.
   */
  child(bindings: LogMeta): ILogger;

  isLevelEnabled?(level: LogLevel): boolean;
}

export interface LoggerConfig {
  /** Service/module name, also the cache key */
  name: string;
  /** @default process.env.LOG_LEVEL ?? 'info' */
  level?: LogLevel;
  /** @default process.env.NODE_ENV === 'development' */
  pretty?: boolean;
  /** Context added to every entry */
  bindings?: LogMeta;
}
