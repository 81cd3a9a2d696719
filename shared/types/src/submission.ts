/**
 * Submission lifecycle types
 *
 * A SubmissionRecord is created when the Orchestrator accepts a request,
 * owned by exactly one SubmissionPipeline until it reaches a terminal state,
 * and read-only afterwards.
 */

import type {
  ChainId,
  ChainTxHandle,
  TransactionConstraints,
  TransactionPayload,
} from './chain';

/**
 * A request as handed to the Orchestrator. The Orchestrator assigns `id`
 * (unless the caller supplied one) and `submittedAt`.
 */
export interface SubmissionInput {
  id?: string;
  chainId: ChainId;
  /** Sender address */
  account: string;
  payload: TransactionPayload;
  constraints?: TransactionConstraints;
}

/**
 * Accepted, immutable transaction request.
 */
export interface TransactionRequest {
  readonly id: string;
  readonly chainId: ChainId;
  readonly account: string;
  readonly payload: Readonly<TransactionPayload>;
  readonly constraints: Readonly<TransactionConstraints>;
  readonly submittedAt: number;
}

/**
 * Pipeline states. The last four are terminal.
 */
export type SubmissionState =
  | 'intake'
  | 'reserving'
  | 'simulating'
  | 'submitting'
  | 'awaiting_confirmation'
  | 'confirmed'
  | 'reverted'
  | 'dropped'
  | 'rejected';

export type TerminalOutcome = 'confirmed' | 'reverted' | 'dropped' | 'rejected';

/**
 * Why a submission ended in `rejected`.
 */
export type RejectionReason =
  | 'auth_unavailable'
  | 'exhausted'
  | 'simulation_rejected'
  | 'simulation_timeout'
  | 'broadcast_rejected'
  | 'broadcast_timeout'
  | 'cancelled'
  | 'internal_error';

/**
 * Why a submission ended in `dropped`.
 */
export type DropReason = 'confirmation_timeout' | 'reservation_invalidated';

export interface StateTransition {
  from: SubmissionState | null;
  to: SubmissionState;
  at: number;
  note?: string;
}

export interface SubmissionRecord {
  readonly request: TransactionRequest;
  state: SubmissionState;
  assignedNonce?: number;
  /** Attempts per retrying stage */
  attempts: {
    reserve: number;
    simulate: number;
    broadcast: number;
    poll: number;
  };
  lastError?: string;
  chainTxHandle?: ChainTxHandle;
  terminalOutcome?: TerminalOutcome;
  /** Rejection or drop reason once terminal */
  terminalReason?: RejectionReason | DropReason;
  /** Human-readable detail (revert reason, RPC message) */
  terminalDetail?: string;
  history: StateTransition[];
}

/**
 * Emitted exactly once per SubmissionRecord, on entering a terminal state.
 */
export interface CompletionEvent {
  requestId: string;
  chainId: ChainId;
  account: string;
  outcome: TerminalOutcome;
  reason?: RejectionReason | DropReason;
  detail?: string;
  nonce?: number;
  chainTxHandle?: ChainTxHandle;
  /** Time from submittedAt to completion */
  durationMs: number;
  completedAt: number;
}
