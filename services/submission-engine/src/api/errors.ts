import type { Response } from 'express';
import { ZodError } from 'zod';
import { ErrorCode, SubmissionCoreError, getErrorMessage, type ILogger } from '@txcore/core';
import { formatIssues } from '@txcore/config';

const STATUS_BY_CODE: Partial<Record<ErrorCode, number>> = {
  [ErrorCode.UNKNOWN_CHAIN]: 400,
  [ErrorCode.VALIDATION_FAILED]: 409,
  [ErrorCode.CANCELLATION_REJECTED]: 409,
  [ErrorCode.QUEUE_FULL]: 429,
  [ErrorCode.SERVICE_NOT_STARTED]: 503,
};

/**
 * Map a thrown error onto an HTTP response.
 */
export function sendError(res: Response, error: unknown, logger: ILogger): void {
  if (error instanceof ZodError) {
    res.status(400).json({ error: 'Invalid request body', issues: formatIssues(error) });
    return;
  }
  if (error instanceof SubmissionCoreError) {
    const status = STATUS_BY_CODE[error.code] ?? 500;
    if (status >= 500) {
      logger.error('Request failed', { error: error.message, code: error.code });
    }
    res.status(status).json({ error: error.message, code: error.code });
    return;
  }
  logger.error('Unhandled API error', { error: getErrorMessage(error) });
  res.status(500).json({ error: 'Internal server error' });
}
