/**
 * Fake Chain Endpoint
 *
 * In-process stand-in for one chain's RPC. Keeps an authoritative nonce per
 * account, records every broadcast in order, and lets tests script
 * simulation, broadcast and confirmation behaviour.
 *
 * Usage:
 * ```typescript
 * const endpoint = new FakeChainEndpoint('1');
 * endpoint.setConfirmedNonce(ACCOUNT_A, 5);
 * endpoint.queueSimulation({ outcome: 'rejected', reason: 'execution reverted' });
 * endpoint.confirmationMode = 'manual';
 * // ...
 * endpoint.mine(hash);
 * ```
 */

import type {
  ChainEndpoint,
  ChainTxHandle,
  ConfirmationStatus,
  EndpointHealth,
  SafeSimulation,
  SignedTransaction,
  SimulationResult,
  TransactionRequest,
  UnsignedTransaction,
} from '@txcore/types';
import { decodeFakeTransaction, DecodedFakeTransaction } from './signer.mock';

/**
 * - auto-success / auto-revert: included on the first poll
 * - manual: pending until mine() or revert()
 * - lost: every poll answers not_found
 */
export type FakeConfirmationMode = 'auto-success' | 'auto-revert' | 'manual' | 'lost';

export interface BroadcastRecord extends DecodedFakeTransaction {
  hash: ChainTxHandle;
  at: number;
}

interface TrackedTransaction {
  tx: BroadcastRecord;
  status: ConfirmationStatus;
}

export interface FakeEndpointCalls {
  getConfirmedNonce: number;
  simulate: number;
  broadcast: number;
  pollConfirmation: number;
  healthCheck: number;
}

export const DEFAULT_FAKE_GAS = 21_000n;
export const DEFAULT_FAKE_GAS_PRICE = 1_000_000_000n;

type Scripted<T> = T | Error | (() => T | Promise<T>);

export class FakeChainEndpoint implements ChainEndpoint {
  confirmationMode: FakeConfirmationMode = 'auto-success';
  /** Artificial latency on every RPC */
  latencyMs = 0;
  healthy = true;

  readonly calls: FakeEndpointCalls = {
    getConfirmedNonce: 0,
    simulate: 0,
    broadcast: 0,
    pollConfirmation: 0,
    healthCheck: 0,
  };

  private readonly confirmed = new Map<string, number>();
  private readonly transactions = new Map<ChainTxHandle, TrackedTransaction>();
  private readonly broadcastLog: BroadcastRecord[] = [];
  private readonly simulationScript: Array<() => Promise<SimulationResult>> = [];
  private readonly simulationByNonce = new Map<number, () => Promise<SimulationResult>>();
  private readonly broadcastScript: Array<Error | null> = [];
  private readonly nonceScript: Array<() => Promise<number>> = [];
  private hashCounter = 0;

  constructor(readonly chainId: string) {}

  // ===========================================================================
  // Test controls
  // ===========================================================================

  setConfirmedNonce(address: string, nonce: number): void {
    this.confirmed.set(address.toLowerCase(), nonce);
  }

  getAuthoritativeNonce(address: string): number {
    return this.confirmed.get(address.toLowerCase()) ?? -1;
  }

  /** Next simulate() calls consume these in order, then fall back to safe */
  queueSimulation(...results: Array<Scripted<SimulationResult>>): void {
    for (const result of results) {
      this.simulationScript.push(toSimulationScript(result));
    }
  }

  /** The next simulate() at `nonce` answers `result`, ahead of the queue */
  scriptSimulationAt(nonce: number, result: Scripted<SimulationResult>): void {
    this.simulationByNonce.set(nonce, toSimulationScript(result));
  }

  /** Next broadcast() calls throw these in order (null accepts) */
  queueBroadcastError(...errors: Array<Error | null>): void {
    this.broadcastScript.push(...errors);
  }

  /** Next getConfirmedNonce() calls answer these in order */
  queueNonceResponse(...responses: Array<Scripted<number>>): void {
    for (const response of responses) {
      if (response instanceof Error) {
        this.nonceScript.push(async () => { throw response; });
      } else if (typeof response === 'function') {
        this.nonceScript.push(async () => response());
      } else {
        this.nonceScript.push(async () => response);
      }
    }
  }

  getBroadcasts(): ReadonlyArray<BroadcastRecord> {
    return [...this.broadcastLog];
  }

  getBroadcastNonces(address?: string): number[] {
    return this.broadcastLog
      .filter(record => !address || record.from.toLowerCase() === address.toLowerCase())
      .map(record => record.nonce);
  }

  mine(hash: ChainTxHandle, success = true): void {
    const tracked = this.transactions.get(hash);
    if (!tracked) {
      throw new Error(`Unknown transaction ${hash}`);
    }
    this.include(tracked, success);
  }

  /** Include every pending transaction, oldest first */
  mineAll(success = true): void {
    for (const tracked of this.transactions.values()) {
      if (tracked.status.status !== 'included') {
        this.include(tracked, success);
      }
    }
  }

  // ===========================================================================
  // ChainEndpoint
  // ===========================================================================

  async getConfirmedNonce(address: string): Promise<number> {
    this.calls.getConfirmedNonce++;
    await this.delay();
    const scripted = this.nonceScript.shift();
    if (scripted) {
      return scripted();
    }
    return this.getAuthoritativeNonce(address);
  }

  async simulate(request: TransactionRequest, nonce: number): Promise<SimulationResult> {
    this.calls.simulate++;
    await this.delay();
    const atNonce = this.simulationByNonce.get(nonce);
    if (atNonce) {
      this.simulationByNonce.delete(nonce);
      return atNonce();
    }
    const scripted = this.simulationScript.shift();
    if (scripted) {
      return scripted();
    }
    const estimatedGas = request.payload.data && request.payload.data !== '0x' ? 100_000n : DEFAULT_FAKE_GAS;
    return {
      outcome: 'safe',
      estimatedGas,
      gasPrice: DEFAULT_FAKE_GAS_PRICE,
      estimatedCost: estimatedGas * DEFAULT_FAKE_GAS_PRICE,
      effects: {},
    };
  }

  prepareTransaction(
    request: TransactionRequest,
    nonce: number,
    gasLimit: bigint,
    simulation: SafeSimulation
  ): UnsignedTransaction {
    return {
      chainId: this.chainId,
      from: request.account,
      nonce,
      to: request.payload.to,
      data: request.payload.data ?? '0x',
      value: request.payload.value ?? 0n,
      gasLimit,
      maxFeePerGas: simulation.gasPrice,
    };
  }

  async broadcast(signedTx: SignedTransaction): Promise<ChainTxHandle> {
    this.calls.broadcast++;
    await this.delay();
    const scripted = this.broadcastScript.shift();
    if (scripted) {
      throw scripted;
    }

    const decoded = decodeFakeTransaction(signedTx);
    this.hashCounter++;
    const hash = `0x${this.hashCounter.toString(16).padStart(64, '0')}`;
    const record: BroadcastRecord = { ...decoded, hash, at: Date.now() };
    this.broadcastLog.push(record);
    this.transactions.set(hash, { tx: record, status: { status: 'pending' } });
    return hash;
  }

  async pollConfirmation(handle: ChainTxHandle): Promise<ConfirmationStatus> {
    this.calls.pollConfirmation++;
    await this.delay();
    const tracked = this.transactions.get(handle);
    if (!tracked || this.confirmationMode === 'lost') {
      return { status: 'not_found' };
    }
    if (tracked.status.status === 'pending') {
      if (this.confirmationMode === 'auto-success') this.include(tracked, true);
      if (this.confirmationMode === 'auto-revert') this.include(tracked, false);
    }
    return tracked.status;
  }

  async healthCheck(): Promise<EndpointHealth> {
    this.calls.healthCheck++;
    await this.delay();
    return this.healthy
      ? { healthy: true, latencyMs: this.latencyMs, blockNumber: this.hashCounter }
      : { healthy: false, latencyMs: this.latencyMs, error: 'endpoint marked unhealthy' };
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private include(tracked: TrackedTransaction, success: boolean): void {
    tracked.status = { status: 'included', success, blockNumber: this.hashCounter, gasUsed: tracked.tx.gasLimit };
    // Included transactions consume their nonce whether or not they revert
    const key = tracked.tx.from.toLowerCase();
    this.confirmed.set(key, Math.max(this.confirmed.get(key) ?? -1, tracked.tx.nonce));
  }

  private async delay(): Promise<void> {
    if (this.latencyMs > 0) {
      await new Promise(resolve => setTimeout(resolve, this.latencyMs));
    }
  }
}

function toSimulationScript(result: Scripted<SimulationResult>): () => Promise<SimulationResult> {
  if (result instanceof Error) {
    return async () => { throw result; };
  }
  if (typeof result === 'function') {
    return async () => result();
  }
  return async () => result;
}
