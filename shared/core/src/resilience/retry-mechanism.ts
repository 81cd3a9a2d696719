// Exponential Backoff and Error Classification
// Retry decisions for RPC calls made by the submission pipeline

import { TimeoutError } from '@txcore/types';

/**
 * Error classification for determining retry behavior.
 */
export enum ErrorCategory {
  TRANSIENT = 'transient',     // Temporary errors - retry
  PERMANENT = 'permanent',     // Permanent errors - don't retry
  UNKNOWN = 'unknown'          // Unknown - retry with caution
}

interface ErrorShape {
  name: string;
  code: string | number | undefined;
  statusCode: number | undefined;
  message: string;
}

function readErrorShape(error: object): ErrorShape {
  const name = error instanceof Error ? error.name : '';
  const code = 'code' in error && (typeof error.code === 'string' || typeof error.code === 'number')
    ? error.code
    : undefined;
  let statusCode: number | undefined;
  if ('status' in error && typeof error.status === 'number') {
    statusCode = error.status;
  } else if ('statusCode' in error && typeof error.statusCode === 'number') {
    statusCode = error.statusCode;
  }
  const message = 'message' in error && typeof error.message === 'string' ? error.message.toLowerCase() : '';
  return { name, code, statusCode, message };
}

// Exact class names; substring matching would misfire on wrapper names
const PERMANENT_ERROR_NAMES = [
  'ValidationError', 'AuthUnavailableError', 'BroadcastRejectedError',
  'NonceReleaseError', 'UnknownChainError', 'ConfigValidationError',
  'CancellationRejectedError'
];

// ethers v6 error codes (ErrorCode union in ethers/lib.commonjs/utils/errors)
const ETHERS_PERMANENT_CODES = [
  'CALL_EXCEPTION', 'INSUFFICIENT_FUNDS', 'NONCE_EXPIRED',
  'REPLACEMENT_UNDERPRICED', 'TRANSACTION_REPLACED', 'INVALID_ARGUMENT',
  'MISSING_ARGUMENT', 'UNSUPPORTED_OPERATION', 'ACTION_REJECTED'
];
const ETHERS_TRANSIENT_CODES = ['TIMEOUT', 'NETWORK_ERROR', 'SERVER_ERROR', 'BAD_DATA'];

const NETWORK_TRANSIENT_CODES = [
  'ECONNRESET', 'ETIMEDOUT', 'ENOTFOUND', 'ECONNREFUSED',
  'EAI_AGAIN', 'EPIPE', 'EHOSTUNREACH', 'ENETUNREACH'
];

const TRANSIENT_STATUSES = [429, 500, 502, 503, 504];

const TRANSIENT_MESSAGES = [
  'timeout', 'timed out', 'connection', 'network', 'temporary',
  'rate limit', 'too many requests', 'service unavailable', 'header not found'
];

// JSON-RPC 2.0 error codes seen during node sync or overload
const RPC_TRANSIENT_CODES = [
  -32700, // Parse error (malformed JSON - may be transient network issue)
  -32600, // Invalid request (can occur during node sync)
  -32000, // Server error (generic - often transient)
  -32005, // Rate limit exceeded
  -32603  // Internal error (often transient node issues)
];

/**
 * Classify an error to determine if it should be retried.
 */
export function classifyError(error: unknown): ErrorCategory {
  if (error === null || error === undefined) return ErrorCategory.PERMANENT;
  if (error instanceof TimeoutError) return ErrorCategory.TRANSIENT;
  if (typeof error !== 'object') {
    return typeof error === 'string' && TRANSIENT_MESSAGES.some(msg => error.toLowerCase().includes(msg))
      ? ErrorCategory.TRANSIENT
      : ErrorCategory.UNKNOWN;
  }

  const { name, code, statusCode, message } = readErrorShape(error);

  if (PERMANENT_ERROR_NAMES.includes(name)) {
    return ErrorCategory.PERMANENT;
  }

  if (typeof code === 'string') {
    if (ETHERS_PERMANENT_CODES.includes(code)) return ErrorCategory.PERMANENT;
    if (ETHERS_TRANSIENT_CODES.includes(code)) return ErrorCategory.TRANSIENT;
    if (NETWORK_TRANSIENT_CODES.includes(code)) return ErrorCategory.TRANSIENT;
  }

  // 4xx client errors are permanent, except 429
  if (statusCode !== undefined && statusCode >= 400 && statusCode < 500 && statusCode !== 429) {
    return ErrorCategory.PERMANENT;
  }
  if (statusCode !== undefined && TRANSIENT_STATUSES.includes(statusCode)) {
    return ErrorCategory.TRANSIENT;
  }

  if (typeof code === 'number' && RPC_TRANSIENT_CODES.includes(code)) {
    return ErrorCategory.TRANSIENT;
  }

  if (TRANSIENT_MESSAGES.some(msg => message.includes(msg))) {
    return ErrorCategory.TRANSIENT;
  }

  return ErrorCategory.UNKNOWN;
}

export function isRetryableError(error: unknown): boolean {
  return classifyError(error) !== ErrorCategory.PERMANENT;
}

export interface BackoffConfig {
  initialDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
  /** Add 0-25% random jitter so concurrent retries spread out */
  jitter: boolean;
}

export const DEFAULT_BACKOFF: BackoffConfig = {
  initialDelayMs: 100,
  maxDelayMs: 5000,
  backoffMultiplier: 2,
  jitter: true,
};

/**
 * Delay before retry `attempt` (1-based): initial * multiplier^(attempt-1),
 * capped at maxDelayMs, plus optional jitter.
 */
export function calculateBackoffDelay(attempt: number, config: Partial<BackoffConfig> = {}): number {
  const { initialDelayMs, maxDelayMs, backoffMultiplier, jitter } = { ...DEFAULT_BACKOFF, ...config };
  let delay = initialDelayMs * Math.pow(backoffMultiplier, Math.max(0, attempt - 1));
  delay = Math.min(delay, maxDelayMs);

  if (jitter) {
    delay += delay * 0.25 * Math.random();
  }

  return Math.floor(delay);
}
