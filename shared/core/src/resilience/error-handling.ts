/**
 * Error Handling
 *
 * Error taxonomy of the submission core. Terminal submission outcomes
 * (rejected, dropped) travel in CompletionEvents; these classes cover what is
 * thrown across component seams.
 */

export enum ErrorCode {
  // General (1000-1999)
  UNKNOWN_ERROR = 1000,
  INVALID_ARGUMENT = 1001,
  NOT_FOUND = 1002,
  INVALID_STATE = 1005,
  OPERATION_CANCELLED = 1006,

  // Chain / RPC (4000-4999)
  RPC_ERROR = 4000,
  RPC_TIMEOUT = 4001,
  BROADCAST_REJECTED = 4004,
  CHAIN_REORG = 4006,

  // Submission (5000-5999)
  NONCE_EXHAUSTED = 5000,
  NONCE_RELEASE_INVALID = 5001,
  UNKNOWN_CHAIN = 5002,
  AUTH_UNAVAILABLE = 5003,
  CANCELLATION_REJECTED = 5004,
  QUEUE_FULL = 5005,

  // Validation (6000-6999)
  VALIDATION_FAILED = 6000,
  INVALID_CONFIG = 6002,

  // Service lifecycle (7000-7999)
  SERVICE_NOT_STARTED = 7000,
  SERVICE_STOPPING = 7002,
  INITIALIZATION_FAILED = 7004,
}

export enum ErrorSeverity {
  /** Expected errors that don't require action (backpressure, cancellations) */
  INFO = 'info',
  WARNING = 'warning',
  ERROR = 'error',
  CRITICAL = 'critical',
}

/**
 * Base error for the submission core.
 */
export class SubmissionCoreError extends Error {
  readonly code: ErrorCode;
  readonly severity: ErrorSeverity;
  readonly timestamp: number;
  readonly context?: Record<string, unknown>;
  readonly cause?: Error;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    options: {
      severity?: ErrorSeverity;
      context?: Record<string, unknown>;
      cause?: Error;
    } = {}
  ) {
    super(message);
    this.name = 'SubmissionCoreError';
    this.code = code;
    this.severity = options.severity ?? ErrorSeverity.ERROR;
    this.timestamp = Date.now();
    this.context = options.context;
    this.cause = options.cause;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      severity: this.severity,
      timestamp: this.timestamp,
      context: this.context,
      cause: this.cause?.message,
    };
  }
}

/**
 * Too many unconfirmed reservations on a slot. Backpressure: retry later.
 */
export class NonceExhaustedError extends SubmissionCoreError {
  constructor(
    readonly chainId: string,
    readonly account: string,
    readonly outstanding: number,
    readonly limit: number
  ) {
    super(
      `Nonce slot exhausted for ${account} on chain ${chainId}: ${outstanding} unconfirmed reservations (limit ${limit})`,
      ErrorCode.NONCE_EXHAUSTED,
      { severity: ErrorSeverity.INFO, context: { chainId, account, outstanding, limit } }
    );
    this.name = 'NonceExhaustedError';
  }
}

/**
 * release() called for a nonce that is not (or no longer) reserved.
 */
export class NonceReleaseError extends SubmissionCoreError {
  constructor(readonly chainId: string, readonly account: string, readonly nonce: number) {
    super(
      `Nonce ${nonce} for ${account} on chain ${chainId} is not an outstanding reservation`,
      ErrorCode.NONCE_RELEASE_INVALID,
      { severity: ErrorSeverity.CRITICAL, context: { chainId, account, nonce } }
    );
    this.name = 'NonceReleaseError';
  }
}

export class UnknownChainError extends SubmissionCoreError {
  constructor(readonly chainId: string) {
    super(`Chain ${chainId} is not configured`, ErrorCode.UNKNOWN_CHAIN, {
      severity: ErrorSeverity.WARNING,
      context: { chainId },
    });
    this.name = 'UnknownChainError';
  }
}

/**
 * The secret collaborator could not produce a signer handle.
 */
export class AuthUnavailableError extends SubmissionCoreError {
  constructor(readonly chainId: string, readonly account: string, cause?: Error) {
    super(`No signer available for ${account} on chain ${chainId}`, ErrorCode.AUTH_UNAVAILABLE, {
      severity: ErrorSeverity.ERROR,
      context: { chainId, account },
      cause,
    });
    this.name = 'AuthUnavailableError';
  }
}

/**
 * The network refused the transaction at broadcast time (underpriced,
 * nonce too low, insufficient funds). Never retried.
 */
export class BroadcastRejectedError extends SubmissionCoreError {
  constructor(readonly reason: string, cause?: Error) {
    super(`Broadcast rejected: ${reason}`, ErrorCode.BROADCAST_REJECTED, {
      severity: ErrorSeverity.WARNING,
      context: { reason },
      cause,
    });
    this.name = 'BroadcastRejectedError';
  }
}

/**
 * Cancel requested after the transaction may already be in the network.
 */
export class CancellationRejectedError extends SubmissionCoreError {
  constructor(readonly requestId: string, readonly state: string) {
    super(`Request ${requestId} cannot be cancelled in state ${state}`, ErrorCode.CANCELLATION_REJECTED, {
      severity: ErrorSeverity.INFO,
      context: { requestId, state },
    });
    this.name = 'CancellationRejectedError';
  }
}

export class QueueFullError extends SubmissionCoreError {
  constructor(readonly chainId: string, readonly maxQueueSize: number) {
    super(`Intake queue for chain ${chainId} is full (${maxQueueSize})`, ErrorCode.QUEUE_FULL, {
      severity: ErrorSeverity.WARNING,
      context: { chainId, maxQueueSize },
    });
    this.name = 'QueueFullError';
  }
}

export class ServiceNotRunningError extends SubmissionCoreError {
  constructor(readonly serviceName: string, readonly currentState: string) {
    super(`${serviceName} is not accepting work (state: ${currentState})`, ErrorCode.SERVICE_NOT_STARTED, {
      severity: ErrorSeverity.WARNING,
      context: { serviceName, currentState },
    });
    this.name = 'ServiceNotRunningError';
  }
}

export class ConfigValidationError extends SubmissionCoreError {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`, ErrorCode.INVALID_CONFIG, {
      severity: ErrorSeverity.CRITICAL,
      context: { issues },
    });
    this.name = 'ConfigValidationError';
  }
}

/**
 * Safe message extraction from an unknown thrown value.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  if (error && typeof error === 'object' && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}
