/**
 * Orchestrator
 *
 * Front door of the submission core: accepts requests, routes them to the
 * ChainWorkerPool of their chain, collects CompletionEvents and republishes
 * them to the alert and metrics sinks without ever blocking a pool.
 *
 * Completed records are kept in a bounded archive (oldest evicted first)
 * for status queries.
 */

import { randomUUID } from 'crypto';
import type { ChainConfig } from '@txcore/config';
import type {
  AlertSink,
  ChainEndpoint,
  ChainId,
  CompletionEvent,
  MetricsSink,
  SignerProvider,
  SubmissionInput,
  SubmissionRecord,
  TransactionRequest,
} from '@txcore/types';
import {
  CancellationRejectedError,
  ErrorCode,
  SubmissionCoreError,
  UnknownChainError,
  createLogger,
  getErrorMessage,
  type ILogger,
} from '@txcore/core';
import { ChainWorkerPool, type ChainWorkerPoolStats } from './workers/chain-worker-pool';
import { completionAlert } from './reporting/alert-notifier';
import type { DryRunResult, SubmissionHandle } from './types';

// =============================================================================
// Types
// =============================================================================

export interface OrchestratorConfig {
  chains: ChainConfig[];
  /** Builds the endpoint of each configured chain */
  createEndpoint: (chain: ChainConfig) => ChainEndpoint;
  signers: SignerProvider;
  alertSink?: AlertSink;
  metricsSink?: MetricsSink;
  /** Completed records kept for getRecord() */
  archiveSize?: number;
  logger?: ILogger;
}

export interface OrchestratorStatus {
  running: boolean;
  archived: number;
  chains: ChainWorkerPoolStats[];
}

// =============================================================================
// Orchestrator
// =============================================================================

export class Orchestrator {
  private readonly pools = new Map<ChainId, ChainWorkerPool>();
  private readonly archive = new Map<string, Readonly<SubmissionRecord>>();
  private readonly archiveSize: number;
  private readonly alertSink?: AlertSink;
  private readonly metricsSink?: MetricsSink;
  private readonly logger: ILogger;
  private running = false;

  constructor(config: OrchestratorConfig) {
    this.logger = config.logger ?? createLogger('orchestrator');
    this.archiveSize = config.archiveSize ?? 1000;
    this.alertSink = config.alertSink;
    this.metricsSink = config.metricsSink;

    for (const chain of config.chains) {
      const pool = new ChainWorkerPool({
        chain,
        endpoint: config.createEndpoint(chain),
        signers: config.signers,
        logger: this.logger.child({ chainId: chain.chainId }),
      });
      pool.on('completion', (event: CompletionEvent, record: Readonly<SubmissionRecord>) => {
        this.onCompletion(event, record);
      });
      this.pools.set(chain.chainId, pool);
    }
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  /**
   * Start every pool in parallel. A chain whose pool fails to start stays
   * stopped while the others serve.
   *
   * @throws SubmissionCoreError (SERVICE_NOT_STARTED) when no pool started
   */
  async start(): Promise<void> {
    const entries = Array.from(this.pools.entries());
    const results = await Promise.allSettled(entries.map(([, pool]) => pool.start()));

    const started: ChainId[] = [];
    const failed: ChainId[] = [];
    results.forEach((result, index) => {
      const [chainId] = entries[index];
      if (result.status === 'fulfilled') {
        started.push(chainId);
      } else {
        failed.push(chainId);
        this.logger.error('Pool failed to start', { chainId, error: getErrorMessage(result.reason) });
      }
    });

    if (entries.length > 0 && started.length === 0) {
      throw new SubmissionCoreError('No chain worker pool started', ErrorCode.SERVICE_NOT_STARTED, {
        context: { failed },
      });
    }

    this.running = true;
    this.logger.info('Orchestrator started', { chains: started, failed });
  }

  async stop(): Promise<void> {
    this.running = false;
    const results = await Promise.allSettled(Array.from(this.pools.values(), pool => pool.stop()));
    results.forEach(result => {
      if (result.status === 'rejected') {
        this.logger.error('Pool failed to stop cleanly', { error: getErrorMessage(result.reason) });
      }
    });
    this.logger.info('Orchestrator stopped');
  }

  isRunning(): boolean {
    return this.running;
  }

  // ===========================================================================
  // Operations
  // ===========================================================================

  /**
   * Accept a request and route it to its chain.
   *
   * @throws UnknownChainError when the chain is not configured
   * @throws SubmissionCoreError (VALIDATION_FAILED) for a reused request id
   * @throws ServiceNotRunningError or QueueFullError from the pool
   */
  submit(input: SubmissionInput): SubmissionHandle {
    const pool = this.getPool(input.chainId);
    const request = this.freezeRequest(input);

    if (this.archive.has(request.id) || this.isInFlight(request.id)) {
      throw new SubmissionCoreError(`Request id ${request.id} was already submitted`, ErrorCode.VALIDATION_FAILED, {
        context: { requestId: request.id },
      });
    }

    const completion = pool.submit(request);
    this.logger.debug('Request accepted', { requestId: request.id, chainId: request.chainId, account: request.account });
    return { requestId: request.id, chainId: request.chainId, completion };
  }

  /**
   * @returns false for an unknown request id
   * @throws CancellationRejectedError when the request is past reserving or complete
   */
  cancel(requestId: string): boolean {
    const archived = this.archive.get(requestId);
    if (archived) {
      throw new CancellationRejectedError(requestId, archived.state);
    }
    for (const pool of this.pools.values()) {
      if (pool.has(requestId)) {
        return pool.cancel(requestId);
      }
    }
    return false;
  }

  getRecord(requestId: string): Readonly<SubmissionRecord> | undefined {
    const archived = this.archive.get(requestId);
    if (archived) return archived;
    for (const pool of this.pools.values()) {
      const record = pool.getRecord(requestId);
      if (record) return record;
    }
    return undefined;
  }

  /**
   * Dry run without reserving a nonce.
   */
  async simulate(input: SubmissionInput): Promise<DryRunResult> {
    const pool = this.getPool(input.chainId);
    return pool.dryRun(this.freezeRequest(input));
  }

  getStatus(): OrchestratorStatus {
    return {
      running: this.running,
      archived: this.archive.size,
      chains: Array.from(this.pools.values(), pool => pool.getStats()),
    };
  }

  // ===========================================================================
  // Completion fan-out
  // ===========================================================================

  private onCompletion(event: CompletionEvent, record: Readonly<SubmissionRecord>): void {
    this.archive.set(event.requestId, record);
    if (this.archive.size > this.archiveSize) {
      const oldest = this.archive.keys().next();
      if (!oldest.done) this.archive.delete(oldest.value);
    }

    const metricsSink = this.metricsSink;
    if (metricsSink) {
      Promise.resolve()
        .then(() => metricsSink.recordCompletion(event))
        .catch(error => {
          this.logger.error('Metrics publication failed', { requestId: event.requestId, error: getErrorMessage(error) });
        });
    }

    const alert = completionAlert(event);
    const alertSink = this.alertSink;
    if (alert && alertSink) {
      Promise.resolve()
        .then(() => alertSink.notify(alert))
        .catch(error => {
          this.logger.error('Alert publication failed', { requestId: event.requestId, error: getErrorMessage(error) });
        });
    }
  }

  // ===========================================================================
  // Helpers
  // ===========================================================================

  private getPool(chainId: ChainId): ChainWorkerPool {
    const pool = this.pools.get(chainId);
    if (!pool) {
      throw new UnknownChainError(chainId);
    }
    return pool;
  }

  private isInFlight(requestId: string): boolean {
    for (const pool of this.pools.values()) {
      if (pool.has(requestId)) return true;
    }
    return false;
  }

  private freezeRequest(input: SubmissionInput): TransactionRequest {
    return Object.freeze({
      id: input.id ?? randomUUID(),
      chainId: input.chainId,
      account: input.account,
      payload: Object.freeze({ ...input.payload }),
      constraints: Object.freeze({ ...input.constraints }),
      submittedAt: Date.now(),
    });
  }
}
