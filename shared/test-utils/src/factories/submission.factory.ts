/**
 * Submission Test Factory
 *
 * Factory functions for SubmissionInput and TransactionRequest test data.
 */

import type { SubmissionInput, TransactionRequest } from '@txcore/types';

export const TEST_ACCOUNT_A = '0x00000000000000000000000000000000000000a1';
export const TEST_ACCOUNT_B = '0x00000000000000000000000000000000000000b2';
export const TEST_RECIPIENT = '0x00000000000000000000000000000000000000c3';

// Counter for unique IDs
let requestCounter = 0;

export function createSubmissionInput(overrides: Partial<SubmissionInput> = {}): SubmissionInput {
  return {
    chainId: '1',
    account: TEST_ACCOUNT_A,
    payload: { to: TEST_RECIPIENT, value: 1_000n },
    ...overrides,
  };
}

export function createTransactionRequest(overrides: Partial<TransactionRequest> = {}): TransactionRequest {
  requestCounter++;
  return {
    id: `test-req-${requestCounter}`,
    chainId: '1',
    account: TEST_ACCOUNT_A,
    payload: { to: TEST_RECIPIENT, value: 1_000n },
    constraints: {},
    submittedAt: Date.now(),
    ...overrides,
  };
}
