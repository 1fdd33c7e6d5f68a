/**
 * Logging Module
 *
 * Production code uses createLogger()/getLogger() (pino). Tests inject
 * RecordingLogger or NullLogger.
 */

export type { ILogger, LoggerConfig, LogLevel, LogMeta } from './types';

export { createLogger, getLogger, formatLogObject, resetLoggerCache } from './pino-logger';

export { RecordingLogger, NullLogger } from './testing-logger';
export type { LogEntry } from './testing-logger';
