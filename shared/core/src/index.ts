/**
 * @txcore/core
 *
 * Ambient building blocks shared by every package: logging, async
 * primitives, the error taxonomy, retry classification and env parsing.
 */

// Logging
export { createLogger, formatLogObject, resetLoggerCache, RecordingLogger, NullLogger } from './logging';
export type { ILogger, LoggerConfig, LogLevel, LogMeta, LogEntry } from './logging';

// Async primitives
export {
  AsyncMutex,
  withTimeout,
  createDeferred,
  TimeoutError,
  clearIntervalSafe,
} from './async';
export type { Deferred } from './async';

// Errors and retry
export {
  SubmissionCoreError,
  NonceExhaustedError,
  NonceReleaseError,
  UnknownChainError,
  AuthUnavailableError,
  BroadcastRejectedError,
  CancellationRejectedError,
  QueueFullError,
  ServiceNotRunningError,
  ConfigValidationError,
  ErrorCode,
  ErrorSeverity,
  getErrorMessage,
  ErrorCategory,
  classifyError,
  isRetryableError,
  calculateBackoffDelay,
  DEFAULT_BACKOFF,
} from './resilience';
export type { BackoffConfig } from './resilience';

// Environment
export { parseEnvInt } from './utils/env-utils';
