// Shared types for the transaction submission core

export type {
  ChainId,
  TransactionPayload,
  TransactionConstraints,
  UnsignedTransaction,
  SignedTransaction,
  ChainTxHandle,
  ConfirmationStatus,
  EffectsPreview,
  SimulationResult,
  SafeSimulation,
} from './chain';

export type {
  SubmissionInput,
  TransactionRequest,
  SubmissionState,
  TerminalOutcome,
  RejectionReason,
  DropReason,
  StateTransition,
  SubmissionRecord,
  CompletionEvent,
} from './submission';

export type {
  ChainEndpoint,
  EndpointHealth,
  SignerHandle,
  SignerProvider,
  Alert,
  AlertSeverity,
  AlertSink,
  MetricsSink,
} from './contracts';

/**
 * Canonical timeout error. Thrown by withTimeout() and recognised by the
 * error classifier as transient.
 */
export class TimeoutError extends Error {
  constructor(
    /** What operation timed out */
    public readonly operation: string,
    /** The timeout duration in milliseconds */
    public readonly timeoutMs: number,
    /** Optional service name for context */
    public readonly service?: string
  ) {
    super(`Timeout: ${operation} exceeded ${timeoutMs}ms${service ? ` in ${service}` : ''}`);
    this.name = 'TimeoutError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
