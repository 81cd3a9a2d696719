/**
 * Logging Module
 *
 * Production code: createLogger() (cached Pino logger).
 * Tests: RecordingLogger / NullLogger.
 */

export type { ILogger, LoggerConfig, LogLevel, LogMeta } from './types';

export { createLogger, formatLogObject, resetLoggerCache } from './pino-logger';

export { RecordingLogger, NullLogger } from './testing-logger';
export type { LogEntry } from './testing-logger';
