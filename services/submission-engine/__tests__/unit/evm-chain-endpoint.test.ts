/**
 * EvmChainEndpoint Unit Tests
 *
 * Runs against a stub provider; errors carry ethers v6 codes so they are
 * recognised by ethers' isError().
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import { ethers } from 'ethers';
import { BroadcastRejectedError, NullLogger } from '@txcore/core';
import { createTransactionRequest, TEST_ACCOUNT_A, TEST_RECIPIENT } from '@txcore/test-utils';
import type { SafeSimulation } from '@txcore/types';
import { EvmChainEndpoint, type EvmProvider } from '../../src/endpoint/evm-chain-endpoint';

const GWEI = 1_000_000_000n;

function ethersError(code: string, message: string, extra: Record<string, unknown> = {}): Error {
  return Object.assign(new Error(message), { code, shortMessage: message, ...extra });
}

class StubProvider implements EvmProvider {
  transactionCount = 0;
  gas: bigint | Error = 50_000n;
  callResult: string | Error = '0x';
  feeData: { gasPrice: bigint | null; maxFeePerGas: bigint | null; maxPriorityFeePerGas: bigint | null } = {
    gasPrice: null,
    maxFeePerGas: 30n * GWEI,
    maxPriorityFeePerGas: 2n * GWEI,
  };
  broadcastResult: string | Error = '0xabc';
  receipt: { status: number | null; blockNumber: number; gasUsed: bigint } | null = null;
  pendingTx: { hash: string } | null = null;
  blockNumber: number | Error = 100;
  readonly countCalls: Array<[string, string]> = [];

  async getTransactionCount(address: string, blockTag: 'latest' | 'pending'): Promise<number> {
    this.countCalls.push([address, blockTag]);
    return this.transactionCount;
  }

  async estimateGas(): Promise<bigint> {
    if (this.gas instanceof Error) throw this.gas;
    return this.gas;
  }

  async call(): Promise<string> {
    if (this.callResult instanceof Error) throw this.callResult;
    return this.callResult;
  }

  async getFeeData(): Promise<{ gasPrice: bigint | null; maxFeePerGas: bigint | null; maxPriorityFeePerGas: bigint | null }> {
    return this.feeData;
  }

  async broadcastTransaction(): Promise<{ hash: string }> {
    if (this.broadcastResult instanceof Error) throw this.broadcastResult;
    return { hash: this.broadcastResult };
  }

  async getTransactionReceipt(): Promise<{ status: number | null; blockNumber: number; gasUsed: bigint } | null> {
    return this.receipt;
  }

  async getTransaction(): Promise<{ hash: string } | null> {
    return this.pendingTx;
  }

  async getBlockNumber(): Promise<number> {
    if (this.blockNumber instanceof Error) throw this.blockNumber;
    return this.blockNumber;
  }
}

describe('EvmChainEndpoint', () => {
  let provider: StubProvider;
  let endpoint: EvmChainEndpoint;

  beforeEach(() => {
    provider = new StubProvider();
    endpoint = new EvmChainEndpoint({
      chainId: '1',
      rpcUrl: 'http://localhost:8545',
      provider,
      logger: new NullLogger(),
    });
  });

  describe('getConfirmedNonce', () => {
    it('returns one below the latest transaction count', async () => {
      provider.transactionCount = 7;

      await expect(endpoint.getConfirmedNonce(TEST_ACCOUNT_A)).resolves.toBe(6);
      expect(provider.countCalls).toEqual([[TEST_ACCOUNT_A, 'latest']]);
    });

    it('returns -1 for a fresh account', async () => {
      await expect(endpoint.getConfirmedNonce(TEST_ACCOUNT_A)).resolves.toBe(-1);
    });
  });

  describe('simulate', () => {
    it('prices an EIP-1559 transaction from maxFeePerGas', async () => {
      provider.callResult = '0x01';

      const result = await endpoint.simulate(createTransactionRequest(), 6);

      expect(result).toEqual({
        outcome: 'safe',
        estimatedGas: 50_000n,
        gasPrice: 30n * GWEI,
        estimatedCost: 50_000n * 30n * GWEI,
        priorityFee: 2n * GWEI,
        effects: { returnData: '0x01' },
      });
    });

    it('falls back to the legacy gas price', async () => {
      provider.feeData = { gasPrice: 5n * GWEI, maxFeePerGas: null, maxPriorityFeePerGas: null };

      const result = await endpoint.simulate(createTransactionRequest(), 6);

      expect(result).toMatchObject({ outcome: 'safe', gasPrice: 5n * GWEI });
      expect(result).not.toHaveProperty('priorityFee');
    });

    it('is inconclusive without any fee data', async () => {
      provider.feeData = { gasPrice: null, maxFeePerGas: null, maxPriorityFeePerGas: null };

      await expect(endpoint.simulate(createTransactionRequest(), 6)).resolves.toEqual({
        outcome: 'inconclusive',
        reason: 'fee data unavailable',
      });
    });

    it('rejects on a revert with its reason', async () => {
      provider.gas = ethersError('CALL_EXCEPTION', 'execution reverted', { reason: 'Ownable: caller is not the owner' });

      await expect(endpoint.simulate(createTransactionRequest(), 6)).resolves.toEqual({
        outcome: 'rejected',
        reason: 'Ownable: caller is not the owner',
      });
    });

    it('rejects on insufficient funds', async () => {
      provider.callResult = ethersError('INSUFFICIENT_FUNDS', 'insufficient funds for intrinsic transaction cost');

      await expect(endpoint.simulate(createTransactionRequest(), 6)).resolves.toEqual({
        outcome: 'rejected',
        reason: 'insufficient funds',
      });
    });

    it('rethrows errors it cannot classify', async () => {
      const error = ethersError('SERVER_ERROR', 'bad gateway');
      provider.gas = error;

      await expect(endpoint.simulate(createTransactionRequest(), 6)).rejects.toBe(error);
    });
  });

  describe('prepareTransaction', () => {
    const simulation: SafeSimulation = {
      outcome: 'safe',
      estimatedGas: 50_000n,
      gasPrice: 30n * GWEI,
      estimatedCost: 50_000n * 30n * GWEI,
      effects: {},
    };

    it('builds the transaction with the priority fee of its own simulation', () => {
      const request = createTransactionRequest({ payload: { to: TEST_RECIPIENT, value: 5n } });

      expect(endpoint.prepareTransaction(request, 6, 60_000n, { ...simulation, priorityFee: 2n * GWEI })).toEqual({
        chainId: '1',
        from: TEST_ACCOUNT_A,
        nonce: 6,
        to: TEST_RECIPIENT,
        data: '0x',
        value: 5n,
        gasLimit: 60_000n,
        maxFeePerGas: 30n * GWEI,
        maxPriorityFeePerGas: 2n * GWEI,
      });
    });

    it('keeps concurrent simulations from sharing a priority fee', async () => {
      const request = createTransactionRequest();
      const first = await endpoint.simulate(request, 6);
      provider.feeData = { gasPrice: null, maxFeePerGas: 40n * GWEI, maxPriorityFeePerGas: 7n * GWEI };
      const second = await endpoint.simulate(request, 7);
      if (first.outcome !== 'safe' || second.outcome !== 'safe') {
        throw new Error('expected safe simulations');
      }

      expect(endpoint.prepareTransaction(request, 6, 60_000n, first).maxPriorityFeePerGas).toBe(2n * GWEI);
      expect(endpoint.prepareTransaction(request, 7, 60_000n, second).maxPriorityFeePerGas).toBe(7n * GWEI);
    });

    it('omits the priority fee on legacy chains', () => {
      const request = createTransactionRequest();

      expect(endpoint.prepareTransaction(request, 6, 60_000n, simulation).maxPriorityFeePerGas).toBeUndefined();
    });
  });

  describe('broadcast', () => {
    it('returns the transaction hash', async () => {
      await expect(endpoint.broadcast('0xdeadbeef')).resolves.toBe('0xabc');
    });

    it('turns deterministic refusals into BroadcastRejectedError', async () => {
      provider.broadcastResult = ethersError('REPLACEMENT_UNDERPRICED', 'replacement fee too low');

      const failure = endpoint.broadcast('0xdeadbeef');

      await expect(failure).rejects.toBeInstanceOf(BroadcastRejectedError);
      await expect(failure).rejects.toThrow('Broadcast rejected: replacement fee too low');
    });

    it('passes transport failures through', async () => {
      const error = ethersError('NETWORK_ERROR', 'socket hang up');
      provider.broadcastResult = error;

      await expect(endpoint.broadcast('0xdeadbeef')).rejects.toBe(error);
    });

    it('treats an already known transaction as broadcast', async () => {
      const wallet = new ethers.Wallet('0x' + '11'.repeat(32));
      const signed = await wallet.signTransaction({
        type: 2,
        chainId: 1n,
        nonce: 0,
        to: TEST_RECIPIENT,
        value: 0n,
        gasLimit: 21_000n,
        maxFeePerGas: GWEI,
        maxPriorityFeePerGas: GWEI,
      });
      provider.broadcastResult = ethersError('UNKNOWN_ERROR', 'already known');

      await expect(endpoint.broadcast(signed)).resolves.toBe(ethers.keccak256(signed));
    });
  });

  describe('pollConfirmation', () => {
    it('reports a successful receipt as included', async () => {
      provider.receipt = { status: 1, blockNumber: 120, gasUsed: 21_000n };

      await expect(endpoint.pollConfirmation('0xabc')).resolves.toEqual({
        status: 'included',
        success: true,
        blockNumber: 120,
        gasUsed: 21_000n,
      });
    });

    it('reports a reverted receipt as included without success', async () => {
      provider.receipt = { status: 0, blockNumber: 120, gasUsed: 30_000n };

      await expect(endpoint.pollConfirmation('0xabc')).resolves.toMatchObject({ status: 'included', success: false });
    });

    it('distinguishes pending from unknown transactions', async () => {
      await expect(endpoint.pollConfirmation('0xabc')).resolves.toEqual({ status: 'not_found' });

      provider.pendingTx = { hash: '0xabc' };
      await expect(endpoint.pollConfirmation('0xabc')).resolves.toEqual({ status: 'pending' });
    });
  });

  describe('healthCheck', () => {
    it('reports the latest block', async () => {
      await expect(endpoint.healthCheck()).resolves.toMatchObject({ healthy: true, blockNumber: 100 });
    });

    it('reports an unreachable node as unhealthy', async () => {
      provider.blockNumber = new Error('connect ECONNREFUSED 127.0.0.1:8545');

      await expect(endpoint.healthCheck()).resolves.toMatchObject({
        healthy: false,
        error: 'connect ECONNREFUSED 127.0.0.1:8545',
      });
    });
  });
});
