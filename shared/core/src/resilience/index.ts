/**
 * Resilience Module
 *
 * - Error handling: submission-core error taxonomy
 * - Retry mechanism: error classification and exponential backoff
 *
 * @module resilience
 */

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
  getErrorMessage
} from './error-handling';

export {
  ErrorCategory,
  classifyError,
  isRetryableError,
  calculateBackoffDelay,
  DEFAULT_BACKOFF
} from './retry-mechanism';
export type { BackoffConfig } from './retry-mechanism';
