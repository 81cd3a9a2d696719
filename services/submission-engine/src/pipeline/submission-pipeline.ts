/**
 * Submission Pipeline
 *
 * Drives one TransactionRequest through
 *   intake -> reserving -> simulating -> submitting -> awaiting_confirmation
 * to exactly one terminal state (confirmed, reverted, dropped, rejected).
 *
 * The pipeline owns its SubmissionRecord until the terminal transition, at
 * which point the record is frozen and a single CompletionEvent is produced.
 * Every reservation it takes is released exactly once:
 * - rollback when nothing reached the network
 * - confirm when the transaction was included (success or revert)
 * - drop when it was broadcast but never seen included
 *
 * Cancellation is honoured only before a nonce is committed to a broadcast,
 * i.e. in intake and reserving.
 */

import type {
  ChainEndpoint,
  CompletionEvent,
  ConfirmationStatus,
  DropReason,
  RejectionReason,
  SafeSimulation,
  SignerHandle,
  SignerProvider,
  SubmissionRecord,
  SubmissionState,
  TerminalOutcome,
  TransactionRequest,
} from '@txcore/types';
import {
  BroadcastRejectedError,
  CancellationRejectedError,
  ErrorCategory,
  NonceExhaustedError,
  calculateBackoffDelay,
  classifyError,
  getErrorMessage,
  isRetryableError,
  withTimeout,
  type ILogger,
} from '@txcore/core';
import type { NonceAllocator, NonceReservation, ReleaseOutcome } from '../nonce/nonce-allocator';
import type { TransactionSimulator } from '../simulation/transaction-simulator';
import type { PipelineSettings } from '../types';

// =============================================================================
// Types
// =============================================================================

export interface SubmissionPipelineDeps {
  endpoint: ChainEndpoint;
  allocator: NonceAllocator;
  simulator: TransactionSimulator;
  signers: SignerProvider;
  settings: PipelineSettings;
  logger: ILogger;
}

interface Termination {
  outcome: TerminalOutcome;
  reason?: RejectionReason | DropReason;
  detail?: string;
}

const CANCELLABLE_STATES: ReadonlySet<SubmissionState> = new Set<SubmissionState>(['intake', 'reserving']);

function rejected(reason: RejectionReason, detail?: string): Termination {
  return { outcome: 'rejected', reason, detail };
}

function dropped(reason: DropReason, detail?: string): Termination {
  return { outcome: 'dropped', reason, detail };
}

// =============================================================================
// SubmissionPipeline
// =============================================================================

export class SubmissionPipeline {
  readonly request: TransactionRequest;
  private readonly deps: SubmissionPipelineDeps;
  private readonly logger: ILogger;
  private readonly record: SubmissionRecord;

  private runPromise: Promise<CompletionEvent> | null = null;
  private cancelRequested = false;
  private reservation: NonceReservation | null = null;
  private broadcasted = false;
  /** Wakes a backoff pause early on cancel */
  private wake: (() => void) | null = null;

  constructor(request: TransactionRequest, deps: SubmissionPipelineDeps) {
    this.request = request;
    this.deps = deps;
    this.logger = deps.logger.child({ requestId: request.id, account: request.account });
    this.record = {
      request,
      state: 'intake',
      attempts: { reserve: 0, simulate: 0, broadcast: 0, poll: 0 },
      history: [{ from: null, to: 'intake', at: Date.now() }],
    };
  }

  get state(): SubmissionState {
    return this.record.state;
  }

  /**
   * Live record while running, frozen once terminal.
   */
  getRecord(): Readonly<SubmissionRecord> {
    return this.record;
  }

  /**
   * Run to completion. Idempotent: later calls return the same promise.
   */
  run(): Promise<CompletionEvent> {
    if (!this.runPromise) {
      this.runPromise = this.execute();
    }
    return this.runPromise;
  }

  /**
   * Request cancellation.
   *
   * @throws CancellationRejectedError once the request is past reserving
   */
  cancel(): void {
    if (!CANCELLABLE_STATES.has(this.record.state)) {
      throw new CancellationRejectedError(this.request.id, this.record.state);
    }
    this.cancelRequested = true;
    this.wake?.();
    this.logger.info('Cancellation requested', { state: this.record.state });
  }

  // ===========================================================================
  // Stages
  // ===========================================================================

  private async execute(): Promise<CompletionEvent> {
    let termination: Termination;
    try {
      termination = await this.advance();
    } catch (error) {
      this.record.lastError = getErrorMessage(error);
      this.logger.error('Pipeline failed unexpectedly', { state: this.record.state, error: this.record.lastError });
      termination = rejected('internal_error', this.record.lastError);
    }

    // Anything still held is settled on the way out
    if (this.reservation) {
      await this.releaseNonce(this.broadcasted ? 'drop' : 'rollback');
    }
    return this.finish(termination);
  }

  private async advance(): Promise<Termination> {
    if (this.cancelRequested) return rejected('cancelled');

    let signer: SignerHandle;
    try {
      signer = await this.deps.signers.getSigner(this.request.chainId, this.request.account);
    } catch (error) {
      this.record.lastError = getErrorMessage(error);
      return rejected('auth_unavailable', this.record.lastError);
    }
    if (this.cancelRequested) return rejected('cancelled');

    this.transition('reserving');
    const reserveFailure = await this.reserve();
    if (reserveFailure) return reserveFailure;
    const reservation = this.reservation;
    if (!reservation) return rejected('internal_error', 'reservation missing after reserve');
    if (this.cancelRequested) return rejected('cancelled');

    this.transition('simulating');
    const simulation = await this.simulate(reservation);
    if (simulation.outcome !== 'safe') return simulation;

    this.transition('submitting');
    const handleOrFailure = await this.submit(reservation, simulation, signer);
    if (typeof handleOrFailure !== 'string') return handleOrFailure;

    this.transition('awaiting_confirmation', handleOrFailure);
    return this.awaitConfirmation(reservation, handleOrFailure);
  }

  private async reserve(): Promise<Termination | null> {
    const { reserveRetryAttempts, retryBackoff } = this.deps.settings;

    for (let attempt = 1; ; attempt++) {
      if (this.cancelRequested) return rejected('cancelled');
      this.record.attempts.reserve = attempt;

      try {
        const reservation = await this.deps.allocator.reserve(
          this.request.chainId,
          this.request.account,
          this.request.id
        );
        this.reservation = reservation;
        this.record.assignedNonce = reservation.nonce;
        // Cancel may have landed while reserve() was in flight
        if (this.cancelRequested) return rejected('cancelled');
        return null;
      } catch (error) {
        this.record.lastError = getErrorMessage(error);
        const exhausted = error instanceof NonceExhaustedError;
        if (!exhausted && !isRetryableError(error)) {
          return rejected('internal_error', this.record.lastError);
        }
        if (attempt > reserveRetryAttempts) {
          return rejected(exhausted ? 'exhausted' : 'internal_error', this.record.lastError);
        }
        this.logger.debug('Reserve failed, backing off', { attempt, error: this.record.lastError });
        await this.pause(calculateBackoffDelay(attempt, retryBackoff));
      }
    }
  }

  private async simulate(reservation: NonceReservation): Promise<SafeSimulation | Termination> {
    const { simulationRetryCap, retryBackoff } = this.deps.settings;

    for (let attempt = 1; ; attempt++) {
      if (this.deps.allocator.isInvalidated(reservation)) {
        return dropped('reservation_invalidated');
      }
      this.record.attempts.simulate = attempt;

      const result = await this.deps.simulator.simulate(this.request, reservation.nonce);
      if (result.outcome === 'safe') {
        return result;
      }

      this.record.lastError = result.reason;
      if (result.outcome === 'rejected') {
        return rejected('simulation_rejected', result.reason);
      }
      if (attempt >= simulationRetryCap) {
        return rejected('simulation_timeout', result.reason);
      }
      this.logger.debug('Simulation inconclusive, retrying', { attempt, reason: result.reason });
      await this.pause(calculateBackoffDelay(attempt, retryBackoff));
    }
  }

  private async submit(
    reservation: NonceReservation,
    simulation: SafeSimulation,
    signer: SignerHandle
  ): Promise<string | Termination> {
    const { broadcastRetryCap, broadcastTimeoutMs, retryBackoff } = this.deps.settings;

    const gasLimit = this.deps.simulator.computeGasLimit(simulation, this.request.constraints);
    const unsigned = this.deps.endpoint.prepareTransaction(this.request, reservation.nonce, gasLimit, simulation);

    let signed: string;
    try {
      signed = await signer.signTransaction(unsigned);
    } catch (error) {
      this.record.lastError = getErrorMessage(error);
      return rejected('auth_unavailable', this.record.lastError);
    }

    for (let attempt = 1; ; attempt++) {
      if (this.deps.allocator.isInvalidated(reservation)) {
        return dropped('reservation_invalidated');
      }
      this.record.attempts.broadcast = attempt;

      try {
        const handle = await withTimeout(this.deps.endpoint.broadcast(signed), broadcastTimeoutMs, 'broadcast');
        this.broadcasted = true;
        this.record.chainTxHandle = handle;
        this.logger.info('Transaction broadcast', { nonce: reservation.nonce, handle, attempt });
        return handle;
      } catch (error) {
        this.record.lastError = getErrorMessage(error);
        if (error instanceof BroadcastRejectedError || classifyError(error) === ErrorCategory.PERMANENT) {
          return rejected('broadcast_rejected', this.record.lastError);
        }
        if (attempt >= broadcastRetryCap) {
          return rejected('broadcast_timeout', this.record.lastError);
        }
        this.logger.debug('Broadcast failed, retrying', { attempt, error: this.record.lastError });
        await this.pause(calculateBackoffDelay(attempt, retryBackoff));
      }
    }
  }

  private async awaitConfirmation(reservation: NonceReservation, handle: string): Promise<Termination> {
    const { pollIntervalMs, pollTimeoutMs, confirmationTimeoutMs } = this.deps.settings;
    const deadline = Date.now() + confirmationTimeoutMs;

    for (;;) {
      if (this.deps.allocator.isInvalidated(reservation)) {
        return dropped('reservation_invalidated');
      }

      let status: ConfirmationStatus | null = null;
      this.record.attempts.poll++;
      try {
        status = await withTimeout(this.deps.endpoint.pollConfirmation(handle), pollTimeoutMs, 'pollConfirmation');
      } catch (error) {
        this.record.lastError = getErrorMessage(error);
        this.logger.debug('Confirmation poll failed', { handle, error: this.record.lastError });
      }

      // Reconciliation may have voided the nonce while the poll was in flight
      if (this.deps.allocator.isInvalidated(reservation)) {
        return dropped('reservation_invalidated');
      }

      if (status?.status === 'included') {
        const released = await this.releaseNonce('confirm');
        if (released === 'invalidated') {
          return dropped('reservation_invalidated');
        }
        return status.success
          ? { outcome: 'confirmed' }
          : { outcome: 'reverted', detail: 'execution reverted' };
      }

      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        this.logger.warn('Transaction not confirmed in time', {
          handle,
          nonce: reservation.nonce,
          lastStatus: status?.status ?? 'error',
        });
        await this.releaseNonce('drop');
        return dropped('confirmation_timeout', `last status: ${status?.status ?? 'error'}`);
      }
      await this.pause(Math.min(pollIntervalMs, remaining));
    }
  }

  // ===========================================================================
  // Helpers
  // ===========================================================================

  private async releaseNonce(outcome: ReleaseOutcome): Promise<'released' | 'invalidated' | 'failed'> {
    const reservation = this.reservation;
    if (!reservation) return 'failed';
    this.reservation = null;

    try {
      return await this.deps.allocator.release(reservation, outcome);
    } catch (error) {
      this.logger.error('Nonce release failed', { nonce: reservation.nonce, outcome, error: getErrorMessage(error) });
      return 'failed';
    }
  }

  private transition(to: SubmissionState, note?: string): void {
    const from = this.record.state;
    this.record.state = to;
    this.record.history.push({ from, to, at: Date.now(), note });
    this.logger.debug('State transition', { from, to });
  }

  private finish(termination: Termination): CompletionEvent {
    const completedAt = Date.now();
    this.transition(termination.outcome, termination.reason);
    this.record.terminalOutcome = termination.outcome;
    this.record.terminalReason = termination.reason;
    this.record.terminalDetail = termination.detail;
    Object.freeze(this.record.attempts);
    Object.freeze(this.record.history);
    Object.freeze(this.record);

    const event: CompletionEvent = {
      requestId: this.request.id,
      chainId: this.request.chainId,
      account: this.request.account,
      outcome: termination.outcome,
      reason: termination.reason,
      detail: termination.detail,
      nonce: this.record.assignedNonce,
      chainTxHandle: this.record.chainTxHandle,
      durationMs: completedAt - this.request.submittedAt,
      completedAt,
    };

    const log = termination.outcome === 'confirmed' ? 'info' : 'warn';
    this.logger[log]('Submission completed', {
      outcome: termination.outcome,
      reason: termination.reason,
      nonce: event.nonce,
      durationMs: event.durationMs,
    });
    return event;
  }

  private pause(ms: number): Promise<void> {
    if (this.cancelRequested && CANCELLABLE_STATES.has(this.record.state)) {
      return Promise.resolve();
    }
    return new Promise(resolve => {
      let timer: NodeJS.Timeout | undefined;
      const done = (): void => {
        clearTimeout(timer);
        this.wake = null;
        resolve();
      };
      timer = setTimeout(done, ms);
      this.wake = done;
    });
  }
}
