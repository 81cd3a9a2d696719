/**
 * Chain Worker Pool
 *
 * One pool per configured chain. Owns the chain's endpoint, NonceAllocator,
 * TransactionSimulator and an ordered intake queue; pools share nothing.
 *
 * Dispatch scans the queue in FIFO order and starts an entry when its account
 * has fewer than `perAccountConcurrency` active pipelines (and the chain is
 * under `maxConcurrent`, when set). Entries for a busy account are skipped,
 * so accounts never block one another.
 *
 * Events:
 * - 'completion' (CompletionEvent, SubmissionRecord): a request reached a terminal state
 */

import { EventEmitter } from 'events';
import type { ChainConfig } from '@txcore/config';
import type {
  ChainEndpoint,
  ChainId,
  CompletionEvent,
  SignerProvider,
  SubmissionRecord,
  TerminalOutcome,
  TransactionRequest,
} from '@txcore/types';
import {
  QueueFullError,
  ServiceNotRunningError,
  SubmissionCoreError,
  ErrorCode,
  UnknownChainError,
  createDeferred,
  createLogger,
  getErrorMessage,
  type Deferred,
  type ILogger,
} from '@txcore/core';
import { NonceAllocator, type InvalidationEvent, type NonceSlotState } from '../nonce/nonce-allocator';
import { TransactionSimulator } from '../simulation/transaction-simulator';
import { SubmissionPipeline } from '../pipeline/submission-pipeline';
import type { DryRunResult, PoolState } from '../types';

// =============================================================================
// Types
// =============================================================================

export interface ChainWorkerPoolConfig {
  chain: ChainConfig;
  endpoint: ChainEndpoint;
  signers: SignerProvider;
  logger?: ILogger;
}

export interface ChainWorkerPoolStats {
  chainId: ChainId;
  name?: string;
  state: PoolState;
  queueDepth: number;
  active: number;
  totals: Record<TerminalOutcome, number>;
  slots: NonceSlotState[];
}

interface PoolEntry {
  pipeline: SubmissionPipeline;
  completion: Deferred<CompletionEvent>;
}

// =============================================================================
// ChainWorkerPool
// =============================================================================

export class ChainWorkerPool extends EventEmitter {
  readonly chainId: ChainId;
  readonly allocator: NonceAllocator;
  readonly simulator: TransactionSimulator;

  private readonly chain: ChainConfig;
  private readonly endpoint: ChainEndpoint;
  private readonly signers: SignerProvider;
  private readonly logger: ILogger;

  private state: PoolState = 'stopped';
  private startPromise: Promise<void> | null = null;
  private readonly queue: PoolEntry[] = [];
  private readonly active = new Map<string, { entry: PoolEntry; done: Promise<void> }>();
  private readonly activeByAccount = new Map<string, number>();
  private isDispatching = false;
  private readonly totals: Record<TerminalOutcome, number> = {
    confirmed: 0,
    reverted: 0,
    dropped: 0,
    rejected: 0,
  };

  constructor(config: ChainWorkerPoolConfig) {
    super();
    if (config.endpoint.chainId !== config.chain.chainId) {
      throw new SubmissionCoreError(
        `Endpoint serves chain ${config.endpoint.chainId}, pool is configured for ${config.chain.chainId}`,
        ErrorCode.INVALID_CONFIG
      );
    }
    this.chain = config.chain;
    this.chainId = config.chain.chainId;
    this.endpoint = config.endpoint;
    this.signers = config.signers;
    this.logger = config.logger ?? createLogger(`chain-worker-pool:${this.chainId}`);

    this.allocator = new NonceAllocator({
      endpoint: this.endpoint,
      maxUnconfirmedReservations: this.chain.maxUnconfirmedReservations,
      reconcileIntervalMs: this.chain.reconcileIntervalMs,
      reconcileTimeoutMs: this.chain.reconcileTimeoutMs,
      logger: this.logger.child({ component: 'nonce-allocator' }),
    });
    this.simulator = new TransactionSimulator({
      endpoint: this.endpoint,
      simulationTimeoutMs: this.chain.simulationTimeoutMs,
      gasBufferBps: this.chain.gasBufferBps,
      logger: this.logger.child({ component: 'simulator' }),
    });

    this.allocator.on('invalidated', (event: InvalidationEvent) => {
      this.logger.warn('Reservation invalidated by reconciliation', {
        requestId: event.reservation.requestId,
        nonce: event.reservation.nonce,
        authoritativeNonce: event.authoritativeNonce,
        reason: event.reason,
      });
    });
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  /**
   * Verify the endpoint and warm configured accounts, then accept work.
   * Concurrent calls share one start.
   */
  start(): Promise<void> {
    if (this.state === 'running') return Promise.resolve();
    if (!this.startPromise) {
      this.startPromise = this.doStart().finally(() => {
        this.startPromise = null;
      });
    }
    return this.startPromise;
  }

  private async doStart(): Promise<void> {
    this.state = 'starting';

    const health = await this.endpoint.healthCheck().catch((error: unknown) => ({
      healthy: false,
      latencyMs: 0,
      error: getErrorMessage(error),
    }));
    if (!health.healthy) {
      this.state = 'stopped';
      throw new SubmissionCoreError(
        `Endpoint for chain ${this.chainId} is unhealthy: ${health.error ?? 'unknown error'}`,
        ErrorCode.SERVICE_NOT_STARTED
      );
    }

    const warm = await Promise.allSettled(
      this.chain.warmAccounts.map(account => this.allocator.reconcile(this.chainId, account))
    );
    warm.forEach((result, index) => {
      if (result.status === 'rejected') {
        // The slot reconciles again on first reserve
        this.logger.warn('Failed to warm nonce slot', {
          account: this.chain.warmAccounts[index],
          error: getErrorMessage(result.reason),
        });
      }
    });

    this.allocator.start();
    this.state = 'running';
    this.logger.info('Chain worker pool started', {
      chainId: this.chainId,
      latencyMs: health.latencyMs,
      warmAccounts: this.chain.warmAccounts.length,
    });
    this.dispatch();
  }

  /**
   * Stop accepting work, cancel queued requests and wait for active
   * pipelines, bounded by drainTimeoutMs.
   */
  async stop(): Promise<void> {
    if (this.state === 'stopped' || this.state === 'stopping') return;
    if (this.startPromise) {
      await this.startPromise.catch(() => undefined);
    }
    this.state = 'stopping';

    const queued = this.queue.splice(0, this.queue.length);
    for (const entry of queued) {
      entry.pipeline.cancel();
      this.launch(entry);
    }

    const pending = Array.from(this.active.values(), active => active.done);
    if (pending.length > 0) {
      this.logger.info('Draining active pipelines', { count: pending.length, drainTimeoutMs: this.chain.drainTimeoutMs });
      let timer: NodeJS.Timeout | undefined;
      const timedOut = new Promise<boolean>(resolve => {
        timer = setTimeout(() => resolve(true), this.chain.drainTimeoutMs);
      });
      const drained = Promise.allSettled(pending).then(() => false);
      const didTimeOut = await Promise.race([drained, timedOut]);
      clearTimeout(timer);
      if (didTimeOut) {
        this.logger.warn('Drain timeout reached with pipelines still active', { active: this.active.size });
      }
    }

    this.allocator.stop();
    this.state = 'stopped';
    this.logger.info('Chain worker pool stopped', { chainId: this.chainId });
  }

  isRunning(): boolean {
    return this.state === 'running';
  }

  // ===========================================================================
  // Intake
  // ===========================================================================

  /**
   * Queue a request. Resolves with its CompletionEvent.
   *
   * @throws ServiceNotRunningError before start() or after stop()
   * @throws UnknownChainError for a request addressed to another chain
   * @throws QueueFullError when maxQueueSize entries are waiting
   */
  submit(request: TransactionRequest): Promise<CompletionEvent> {
    if (request.chainId !== this.chainId) {
      throw new UnknownChainError(request.chainId);
    }
    if (this.state !== 'running') {
      throw new ServiceNotRunningError(`chain-worker-pool:${this.chainId}`, this.state);
    }
    if (this.chain.maxQueueSize !== undefined && this.queue.length >= this.chain.maxQueueSize) {
      throw new QueueFullError(this.chainId, this.chain.maxQueueSize);
    }

    const entry: PoolEntry = {
      pipeline: new SubmissionPipeline(request, {
        endpoint: this.endpoint,
        allocator: this.allocator,
        simulator: this.simulator,
        signers: this.signers,
        settings: this.chain,
        logger: this.logger,
      }),
      completion: createDeferred<CompletionEvent>(),
    };
    this.queue.push(entry);
    this.dispatch();
    return entry.completion.promise;
  }

  /**
   * Cancel a queued or early-stage request.
   *
   * @returns false when the request is not held by this pool
   * @throws CancellationRejectedError once the request is past reserving
   */
  cancel(requestId: string): boolean {
    const index = this.queue.findIndex(entry => entry.pipeline.request.id === requestId);
    if (index >= 0) {
      const [entry] = this.queue.splice(index, 1);
      entry.pipeline.cancel();
      this.launch(entry);
      return true;
    }

    const active = this.active.get(requestId);
    if (!active) return false;
    active.entry.pipeline.cancel();
    return true;
  }

  has(requestId: string): boolean {
    return this.active.has(requestId) || this.queue.some(entry => entry.pipeline.request.id === requestId);
  }

  /**
   * Record of a queued or active request.
   */
  getRecord(requestId: string): Readonly<SubmissionRecord> | undefined {
    const active = this.active.get(requestId);
    if (active) return active.entry.pipeline.getRecord();
    return this.queue.find(entry => entry.pipeline.request.id === requestId)?.pipeline.getRecord();
  }

  /**
   * Simulate without reserving. The nonce is the chain's next one, which may
   * already be held by an in-flight reservation.
   */
  async dryRun(request: TransactionRequest): Promise<DryRunResult> {
    if (request.chainId !== this.chainId) {
      throw new UnknownChainError(request.chainId);
    }
    const nonce = (await this.endpoint.getConfirmedNonce(request.account)) + 1;
    const result = await this.simulator.simulate(request, nonce);
    return {
      chainId: this.chainId,
      account: request.account,
      nonce,
      result,
      gasLimit: result.outcome === 'safe' ? this.simulator.computeGasLimit(result, request.constraints) : undefined,
    };
  }

  getStats(): ChainWorkerPoolStats {
    return {
      chainId: this.chainId,
      name: this.chain.name,
      state: this.state,
      queueDepth: this.queue.length,
      active: this.active.size,
      totals: { ...this.totals },
      slots: this.allocator.getAllSlotStates(),
    };
  }

  // ===========================================================================
  // Dispatch
  // ===========================================================================

  private dispatch(): void {
    if (this.state !== 'running') return;
    if (this.isDispatching) return;
    this.isDispatching = true;

    try {
      let index = 0;
      while (index < this.queue.length) {
        if (this.chain.maxConcurrent !== undefined && this.active.size >= this.chain.maxConcurrent) break;

        const entry = this.queue[index];
        const accountKey = entry.pipeline.request.account.toLowerCase();
        if ((this.activeByAccount.get(accountKey) ?? 0) >= this.chain.perAccountConcurrency) {
          index++;
          continue;
        }

        this.queue.splice(index, 1);
        this.launch(entry);
      }
    } finally {
      this.isDispatching = false;
    }
  }

  private launch(entry: PoolEntry): void {
    const { pipeline } = entry;
    const requestId = pipeline.request.id;
    const accountKey = pipeline.request.account.toLowerCase();
    this.activeByAccount.set(accountKey, (this.activeByAccount.get(accountKey) ?? 0) + 1);

    const done = pipeline
      .run()
      .then(event => {
        this.totals[event.outcome]++;
        entry.completion.resolve(event);
        this.emit('completion', event, pipeline.getRecord());
      })
      .catch(error => {
        this.logger.error('Pipeline completion handling failed', { requestId, error: getErrorMessage(error) });
        entry.completion.reject(error);
      })
      .finally(() => {
        this.active.delete(requestId);
        const remaining = (this.activeByAccount.get(accountKey) ?? 1) - 1;
        if (remaining > 0) {
          this.activeByAccount.set(accountKey, remaining);
        } else {
          this.activeByAccount.delete(accountKey);
        }
        if (this.state === 'running' && this.queue.length > 0) {
          setImmediate(() => this.dispatch());
        }
      });

    this.active.set(requestId, { entry, done });
  }
}
