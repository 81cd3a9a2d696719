/**
 * Chain-facing types
 *
 * The uniform transaction-request contract every ChainEndpoint adapter speaks.
 * Chain-specific encoding (fee models, envelope variants) stays inside the
 * adapter; the submission core only ever sees these shapes.
 */

/**
 * Opaque network identifier (e.g. '1', '137'). Immutable once configured.
 */
export type ChainId = string;

/**
 * What the transaction does: destination, calldata and native value.
 */
export interface TransactionPayload {
  to: string;
  /** Hex-encoded calldata. Omitted for plain value transfers. */
  data?: string;
  /** Native value in the chain's smallest unit (wei). */
  value?: bigint;
}

/**
 * Caller-supplied ceilings checked before anything is broadcast.
 */
export interface TransactionConstraints {
  /** Upper bound on payload.value */
  maxValue?: bigint;
  /** Upper bound on the gas limit of the real transaction */
  gasCeiling?: bigint;
  /** Upper bound on estimated execution cost (gas * price, in wei) */
  maxCost?: bigint;
}

/**
 * Fully-specified transaction ready for signing.
 * Built by the endpoint from a request, an assigned nonce and a simulation.
 */
export interface UnsignedTransaction {
  chainId: ChainId;
  from: string;
  nonce: number;
  to: string;
  data: string;
  value: bigint;
  gasLimit: bigint;
  /** Max price per gas unit the sender accepts */
  maxFeePerGas: bigint;
  /** Priority fee; undefined on chains with legacy pricing */
  maxPriorityFeePerGas?: bigint;
}

/**
 * Serialized, signed transaction as accepted by the chain's broadcast RPC.
 */
export type SignedTransaction = string;

/**
 * Handle identifying a broadcast transaction on-chain (a tx hash on EVM).
 */
export type ChainTxHandle = string;

/**
 * Result of one confirmation poll.
 */
export type ConfirmationStatus =
  | { status: 'pending' }
  | { status: 'not_found' }
  | { status: 'included'; success: boolean; blockNumber?: number; gasUsed?: bigint };

/**
 * Effects predicted by a dry run. Adapters fill what their RPC exposes.
 */
export interface EffectsPreview {
  returnData?: string;
  /** Free-form notes from the adapter (e.g. decoded logs) */
  notes?: string[];
}

/**
 * Outcome of a dry run against current chain state.
 *
 * - safe: execution succeeded; cost estimate sets the real ceiling
 * - rejected: deterministic failure (revert, insufficient balance, policy)
 * - inconclusive: transient failure (timeout, node lag); caller may retry
 */
export type SimulationResult =
  | {
      outcome: 'safe';
      estimatedGas: bigint;
      gasPrice: bigint;
      estimatedCost: bigint;
      /** Tip quoted with gasPrice on fee-market chains; absent for legacy pricing */
      priorityFee?: bigint;
      effects: EffectsPreview;
    }
  | { outcome: 'rejected'; reason: string }
  | { outcome: 'inconclusive'; reason: string };

/**
 * The `safe` branch, required to build the real transaction.
 */
export type SafeSimulation = Extract<SimulationResult, { outcome: 'safe' }>;
