/**
 * Submission Engine Types
 *
 * Settings and handles shared by the pool, the pipeline and the orchestrator.
 */

import type { ChainConfig } from '@txcore/config';
import type { ChainId, CompletionEvent, SimulationResult } from '@txcore/types';

/**
 * Per-chain knobs the pipeline reads. A slice of ChainConfig so pools can
 * hand their resolved config straight through.
 */
export type PipelineSettings = Pick<
  ChainConfig,
  | 'reserveRetryAttempts'
  | 'simulationRetryCap'
  | 'broadcastRetryCap'
  | 'retryBackoff'
  | 'broadcastTimeoutMs'
  | 'pollIntervalMs'
  | 'pollTimeoutMs'
  | 'confirmationTimeoutMs'
>;

export interface SubmissionHandle {
  requestId: string;
  chainId: ChainId;
  /** Resolves with the request's single CompletionEvent */
  completion: Promise<CompletionEvent>;
}

export type PoolState = 'stopped' | 'starting' | 'running' | 'stopping';

/**
 * Result of a dry run that reserves nothing.
 */
export interface DryRunResult {
  chainId: ChainId;
  account: string;
  /** Next nonce according to the chain's confirmed count */
  nonce: number;
  result: SimulationResult;
  /** Gas limit a real submission would use; only for safe results */
  gasLimit?: bigint;
}
