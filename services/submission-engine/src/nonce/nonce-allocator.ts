/**
 * Nonce Allocator
 *
 * Hands out per-account sequence numbers for one chain under concurrency.
 * Every (chain, account) pair owns a NonceSlot guarded by an AsyncMutex, so
 * reserve, release and reconcile on the same slot never interleave.
 *
 * Numbering:
 * - confirmedNonce: highest nonce known to be included (-1 for a fresh account)
 * - reservedHighWatermark: highest nonce handed out; next reservation is +1
 *
 * A slot is poisoned when a gap may exist below the watermark (a dropped
 * transaction, or a rollback that was not the newest reservation). The next
 * reserve() reconciles a poisoned slot with the chain before handing out
 * anything, invalidating reservations the chain will never accept.
 */

import { EventEmitter } from 'events';
import type { ChainEndpoint, ChainId } from '@txcore/types';
import {
  AsyncMutex,
  NonceExhaustedError,
  NonceReleaseError,
  UnknownChainError,
  clearIntervalSafe,
  createLogger,
  getErrorMessage,
  withTimeout,
  type ILogger,
} from '@txcore/core';

// =============================================================================
// Types
// =============================================================================

export interface NonceReservation {
  readonly chainId: ChainId;
  readonly account: string;
  readonly nonce: number;
  readonly reservedAt: number;
  readonly requestId?: string;
}

export type ReleaseOutcome = 'confirm' | 'rollback' | 'drop';

/** 'invalidated' when reconciliation voided the reservation first */
export type ReleaseResult = 'released' | 'invalidated';

export interface NonceSlotState {
  chainId: ChainId;
  account: string;
  confirmedNonce: number;
  reservedHighWatermark: number;
  poisoned: boolean;
  outstanding: number[];
  lastReconciledAt: number;
}

export interface InvalidationEvent {
  reservation: NonceReservation;
  authoritativeNonce: number;
  reason: 'poisoned' | 'reorg';
}

interface NonceSlot {
  account: string;
  initialized: boolean;
  confirmedNonce: number;
  reservedHighWatermark: number;
  poisoned: boolean;
  outstanding: Map<number, NonceReservation>;
  /** Confirmed above confirmedNonce, waiting for the gap below to close */
  confirmedAhead: Set<number>;
  mutex: AsyncMutex;
  lastReconciledAt: number;
}

export interface NonceAllocatorConfig {
  endpoint: ChainEndpoint;
  maxUnconfirmedReservations: number;
  reconcileTimeoutMs: number;
  /** Periodic reconciliation of every slot while started */
  reconcileIntervalMs: number;
  logger?: ILogger;
}

// =============================================================================
// NonceAllocator
// =============================================================================

/**
 * Events:
 * - 'invalidated' (InvalidationEvent): a reservation was voided by reconciliation
 */
export class NonceAllocator extends EventEmitter {
  private readonly endpoint: ChainEndpoint;
  private readonly config: Omit<NonceAllocatorConfig, 'endpoint' | 'logger'>;
  private readonly logger: ILogger;
  private readonly slots = new Map<string, NonceSlot>();
  private readonly invalidated = new WeakSet<NonceReservation>();
  private readonly released = new WeakSet<NonceReservation>();
  private reconcileInterval: NodeJS.Timeout | null = null;

  constructor(config: NonceAllocatorConfig) {
    super();
    this.endpoint = config.endpoint;
    this.config = {
      maxUnconfirmedReservations: config.maxUnconfirmedReservations,
      reconcileTimeoutMs: config.reconcileTimeoutMs,
      reconcileIntervalMs: config.reconcileIntervalMs,
    };
    this.logger = config.logger ?? createLogger(`nonce-allocator:${config.endpoint.chainId}`);
  }

  get chainId(): ChainId {
    return this.endpoint.chainId;
  }

  // ===========================================================================
  // Reservation
  // ===========================================================================

  /**
   * Reserve the next nonce for `account`.
   *
   * @throws NonceExhaustedError when too many reservations are unconfirmed
   * @throws TimeoutError or the RPC error when a required reconciliation fails
   */
  async reserve(chainId: ChainId, account: string, requestId?: string): Promise<NonceReservation> {
    const slot = this.getSlot(chainId, account);

    return slot.mutex.runExclusive(async () => {
      if (!slot.initialized || slot.poisoned) {
        await this.reconcileLocked(slot);
      }

      const unconfirmed = slot.reservedHighWatermark - slot.confirmedNonce;
      if (unconfirmed >= this.config.maxUnconfirmedReservations) {
        throw new NonceExhaustedError(chainId, slot.account, unconfirmed, this.config.maxUnconfirmedReservations);
      }

      const nonce = slot.reservedHighWatermark + 1;
      slot.reservedHighWatermark = nonce;

      const reservation: NonceReservation = Object.freeze({
        chainId,
        account: slot.account,
        nonce,
        reservedAt: Date.now(),
        requestId,
      });
      slot.outstanding.set(nonce, reservation);

      this.logger.debug('Nonce reserved', { account: slot.account, nonce, requestId });
      return reservation;
    });
  }

  /**
   * Settle a reservation. Exactly once per reservation.
   *
   * - confirm: the transaction was included (success or revert)
   * - rollback: nothing was broadcast; the number may be reused
   * - drop: broadcast but never seen included; poisons the slot
   *
   * @throws NonceReleaseError on a second release or an unknown reservation
   */
  async release(reservation: NonceReservation, outcome: ReleaseOutcome): Promise<ReleaseResult> {
    const slot = this.getSlot(reservation.chainId, reservation.account);

    return slot.mutex.runExclusive(async () => {
      if (this.released.has(reservation)) {
        throw new NonceReleaseError(reservation.chainId, reservation.account, reservation.nonce);
      }
      if (this.invalidated.has(reservation)) {
        this.released.add(reservation);
        this.logger.debug('Release of invalidated reservation ignored', {
          account: slot.account,
          nonce: reservation.nonce,
          outcome,
        });
        return 'invalidated';
      }
      if (slot.outstanding.get(reservation.nonce) !== reservation) {
        throw new NonceReleaseError(reservation.chainId, reservation.account, reservation.nonce);
      }

      slot.outstanding.delete(reservation.nonce);
      this.released.add(reservation);

      switch (outcome) {
        case 'confirm':
          this.confirmLocked(slot, reservation.nonce);
          break;
        case 'rollback':
          this.rollbackLocked(slot, reservation.nonce);
          break;
        case 'drop':
          slot.poisoned = true;
          this.logger.warn('Nonce dropped, slot poisoned until reconciled', {
            account: slot.account,
            nonce: reservation.nonce,
          });
          break;
      }

      return 'released';
    });
  }

  isInvalidated(reservation: NonceReservation): boolean {
    return this.invalidated.has(reservation);
  }

  // ===========================================================================
  // Reconciliation
  // ===========================================================================

  /**
   * Align the slot with the chain's authoritative confirmed nonce.
   */
  async reconcile(chainId: ChainId, account: string): Promise<NonceSlotState> {
    const slot = this.getSlot(chainId, account);
    await slot.mutex.runExclusive(() => this.reconcileLocked(slot));
    return this.toState(slot);
  }

  getSlotState(chainId: ChainId, account: string): NonceSlotState | null {
    this.assertChain(chainId);
    const slot = this.slots.get(account.toLowerCase());
    return slot ? this.toState(slot) : null;
  }

  getAllSlotStates(): NonceSlotState[] {
    return Array.from(this.slots.values(), slot => this.toState(slot));
  }

  /**
   * Start periodic reconciliation of every known slot.
   */
  start(): void {
    if (this.reconcileInterval) return;

    this.reconcileInterval = setInterval(() => {
      this.reconcileAll().catch(error => {
        this.logger.error('Periodic reconciliation failed', { error: getErrorMessage(error) });
      });
    }, this.config.reconcileIntervalMs);
    this.reconcileInterval.unref();

    this.logger.info('NonceAllocator started', { reconcileIntervalMs: this.config.reconcileIntervalMs });
  }

  stop(): void {
    this.reconcileInterval = clearIntervalSafe(this.reconcileInterval);
    this.logger.info('NonceAllocator stopped');
  }

  async reconcileAll(): Promise<void> {
    const slots = Array.from(this.slots.values());
    const results = await Promise.allSettled(
      slots.map(slot => slot.mutex.runExclusive(() => this.reconcileLocked(slot)))
    );
    results.forEach((result, index) => {
      if (result.status === 'rejected') {
        this.logger.warn('Slot reconciliation failed', {
          account: slots[index].account,
          error: getErrorMessage(result.reason),
        });
      }
    });
  }

  // ===========================================================================
  // Private Methods (caller holds the slot mutex)
  // ===========================================================================

  private async reconcileLocked(slot: NonceSlot): Promise<void> {
    const authoritative = await withTimeout(
      this.endpoint.getConfirmedNonce(slot.account),
      this.config.reconcileTimeoutMs,
      'getConfirmedNonce'
    );

    if (!slot.initialized) {
      slot.confirmedNonce = authoritative;
      slot.reservedHighWatermark = authoritative;
      slot.initialized = true;
      this.logger.info('Nonce slot initialised', { account: slot.account, confirmedNonce: authoritative });
    } else if (slot.poisoned || authoritative < slot.confirmedNonce) {
      const reason = slot.poisoned ? 'poisoned' : 'reorg';
      const voided: NonceReservation[] = [];
      for (const [nonce, reservation] of slot.outstanding) {
        if (nonce > authoritative) {
          slot.outstanding.delete(nonce);
          this.invalidated.add(reservation);
          voided.push(reservation);
        }
      }

      this.logger.warn('Nonce slot reset to chain state', {
        account: slot.account,
        reason,
        localConfirmed: slot.confirmedNonce,
        authoritative,
        previousWatermark: slot.reservedHighWatermark,
        invalidated: voided.map(r => r.nonce),
      });

      slot.confirmedNonce = authoritative;
      slot.reservedHighWatermark = authoritative;
      slot.confirmedAhead.clear();
      slot.poisoned = false;

      for (const reservation of voided) {
        const event: InvalidationEvent = { reservation, authoritativeNonce: authoritative, reason };
        this.emit('invalidated', event);
      }
    } else {
      slot.confirmedNonce = Math.max(slot.confirmedNonce, authoritative);
      for (const nonce of slot.confirmedAhead) {
        if (nonce <= slot.confirmedNonce) slot.confirmedAhead.delete(nonce);
      }
      this.advanceConfirmedNonce(slot);
      slot.reservedHighWatermark = Math.max(slot.reservedHighWatermark, slot.confirmedNonce);
    }

    slot.lastReconciledAt = Date.now();
  }

  private confirmLocked(slot: NonceSlot, nonce: number): void {
    if (nonce > slot.confirmedNonce) {
      slot.confirmedAhead.add(nonce);
      this.advanceConfirmedNonce(slot);
    }
    slot.reservedHighWatermark = Math.max(slot.reservedHighWatermark, slot.confirmedNonce);
    this.logger.debug('Nonce confirmed', { account: slot.account, nonce, confirmedNonce: slot.confirmedNonce });
  }

  private rollbackLocked(slot: NonceSlot, nonce: number): void {
    if (nonce <= slot.confirmedNonce) {
      // Chain already counts this number as used; nothing to give back
      this.logger.warn('Rollback of a nonce the chain already confirmed', { account: slot.account, nonce });
      return;
    }
    if (nonce === slot.reservedHighWatermark) {
      slot.reservedHighWatermark = nonce - 1;
      this.logger.debug('Nonce rolled back', { account: slot.account, nonce });
      return;
    }
    slot.poisoned = true;
    this.logger.warn('Rollback below watermark, slot poisoned until reconciled', {
      account: slot.account,
      nonce,
      reservedHighWatermark: slot.reservedHighWatermark,
    });
  }

  private advanceConfirmedNonce(slot: NonceSlot): void {
    while (slot.confirmedAhead.has(slot.confirmedNonce + 1)) {
      slot.confirmedAhead.delete(slot.confirmedNonce + 1);
      slot.confirmedNonce++;
    }
  }

  private getSlot(chainId: ChainId, account: string): NonceSlot {
    this.assertChain(chainId);
    const key = account.toLowerCase();
    let slot = this.slots.get(key);
    if (!slot) {
      slot = {
        account,
        initialized: false,
        confirmedNonce: -1,
        reservedHighWatermark: -1,
        poisoned: false,
        outstanding: new Map(),
        confirmedAhead: new Set(),
        mutex: new AsyncMutex(),
        lastReconciledAt: 0,
      };
      this.slots.set(key, slot);
    }
    return slot;
  }

  private assertChain(chainId: ChainId): void {
    if (chainId !== this.endpoint.chainId) {
      throw new UnknownChainError(chainId);
    }
  }

  private toState(slot: NonceSlot): NonceSlotState {
    return {
      chainId: this.endpoint.chainId,
      account: slot.account,
      confirmedNonce: slot.confirmedNonce,
      reservedHighWatermark: slot.reservedHighWatermark,
      poisoned: slot.poisoned,
      outstanding: Array.from(slot.outstanding.keys()).sort((a, b) => a - b),
      lastReconciledAt: slot.lastReconciledAt,
    };
  }
}
