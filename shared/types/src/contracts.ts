/**
 * Collaborator contracts
 *
 * Seams between the submission core and the outside world. Production
 * implementations live in the submission-engine service; tests use the
 * in-process fakes from @txcore/test-utils.
 */

import type {
  ChainId,
  ChainTxHandle,
  ConfirmationStatus,
  SafeSimulation,
  SignedTransaction,
  SimulationResult,
  UnsignedTransaction,
} from './chain';
import type { CompletionEvent, TransactionRequest } from './submission';

// =============================================================================
// Chain RPC
// =============================================================================

export interface EndpointHealth {
  healthy: boolean;
  latencyMs: number;
  blockNumber?: number;
  error?: string;
}

/**
 * Uniform view of one chain's RPC. Shared by every pipeline of the chain.
 *
 * Error contract:
 * - broadcast() throws BroadcastRejectedError when the network refuses the
 *   transaction deterministically; anything else it throws is treated as
 *   transient and may be retried.
 * - simulate() classifies the outcomes it understands; what it throws is
 *   classified by the caller.
 */
export interface ChainEndpoint {
  readonly chainId: ChainId;

  /**
   * Highest nonce included on-chain for `address`, or -1 if the account has
   * never sent a transaction.
   */
  getConfirmedNonce(address: string): Promise<number>;

  simulate(request: TransactionRequest, nonce: number): Promise<SimulationResult>;

  /**
   * Build the transaction to sign. Pure: no RPC.
   */
  prepareTransaction(
    request: TransactionRequest,
    nonce: number,
    gasLimit: bigint,
    simulation: SafeSimulation
  ): UnsignedTransaction;

  broadcast(signedTx: SignedTransaction): Promise<ChainTxHandle>;

  pollConfirmation(handle: ChainTxHandle): Promise<ConfirmationStatus>;

  healthCheck(): Promise<EndpointHealth>;
}

// =============================================================================
// Secrets
// =============================================================================

/**
 * Opaque signing capability. Key material never leaves the handle.
 */
export interface SignerHandle {
  readonly address: string;
  signTransaction(tx: UnsignedTransaction): Promise<SignedTransaction>;
}

export interface SignerProvider {
  /**
   * @throws when no signer can be produced for the account
   */
  getSigner(chainId: ChainId, address: string): Promise<SignerHandle>;
}

// =============================================================================
// Reporting
// =============================================================================

export type AlertSeverity = 'low' | 'warning' | 'high' | 'critical';

export interface Alert {
  type: string;
  service?: string;
  message?: string;
  severity?: AlertSeverity;
  data?: Record<string, unknown>;
  timestamp: number;
}

export interface AlertSink {
  notify(alert: Alert): Promise<void>;
}

export interface MetricsSink {
  recordCompletion(event: CompletionEvent): void | Promise<void>;
}
