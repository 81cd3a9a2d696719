/**
 * Test Utilities for the Transaction Submission Core
 *
 * In-process stand-ins for the chain RPC and the secret store, plus
 * factories and async helpers.
 *
 * ## Usage
 *
 * ```typescript
 * import {
 *   FakeChainEndpoint, FakeSignerProvider,
 *   createSubmissionInput, TEST_ACCOUNT_A,
 *   waitFor,
 * } from '@txcore/test-utils';
 * ```
 */

// Mocks
export {
  FakeChainEndpoint,
  DEFAULT_FAKE_GAS,
  DEFAULT_FAKE_GAS_PRICE,
} from './mocks/chain-endpoint.mock';
export type { FakeConfirmationMode, BroadcastRecord, FakeEndpointCalls } from './mocks/chain-endpoint.mock';
export {
  FakeSignerProvider,
  FAKE_SIGNATURE_PREFIX,
  encodeFakeTransaction,
  decodeFakeTransaction,
} from './mocks/signer.mock';
export type { DecodedFakeTransaction } from './mocks/signer.mock';

// Factories
export {
  createSubmissionInput,
  createTransactionRequest,
  TEST_ACCOUNT_A,
  TEST_ACCOUNT_B,
  TEST_RECIPIENT,
} from './factories/submission.factory';

// Helpers
export { waitFor } from './helpers/wait-for';
