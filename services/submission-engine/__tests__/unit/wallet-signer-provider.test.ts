import { describe, it, expect, beforeEach } from '@jest/globals';
import { ethers } from 'ethers';
import { NullLogger, RecordingLogger } from '@txcore/core';
import { TEST_RECIPIENT } from '@txcore/test-utils';
import type { UnsignedTransaction } from '@txcore/types';
import {
  WalletSignerProvider,
  createEnvKeyResolver,
  toEthersTransaction,
  type KeyResolver,
} from '../../src/signing/wallet-signer-provider';

// Placeholder keys, not funded anywhere
const TEST_KEY = '0x' + '11'.repeat(32);
const OTHER_KEY = '0x' + '22'.repeat(32);
const TEST_ADDRESS = new ethers.Wallet(TEST_KEY).address;
const OTHER_ADDRESS = new ethers.Wallet(OTHER_KEY).address;

function unsigned(overrides: Partial<UnsignedTransaction> = {}): UnsignedTransaction {
  return {
    chainId: '1',
    from: TEST_ADDRESS,
    nonce: 6,
    to: TEST_RECIPIENT,
    data: '0x',
    value: 1_000n,
    gasLimit: 25_200n,
    maxFeePerGas: 30_000_000_000n,
    maxPriorityFeePerGas: 2_000_000_000n,
    ...overrides,
  };
}

describe('createEnvKeyResolver', () => {
  const env: NodeJS.ProcessEnv = {
    [`SIGNER_KEY_1_${TEST_ADDRESS.toUpperCase()}`]: 'chain-specific',
    [`SIGNER_KEY_${TEST_ADDRESS.toUpperCase()}`]: 'any-chain',
  };

  it('prefers the chain-specific variable', () => {
    expect(createEnvKeyResolver(env)('1', TEST_ADDRESS)).toBe('chain-specific');
  });

  it('falls back to the account-wide variable', () => {
    expect(createEnvKeyResolver(env)('137', TEST_ADDRESS.toLowerCase())).toBe('any-chain');
  });

  it('returns undefined when nothing is configured', () => {
    expect(createEnvKeyResolver(env)('1', OTHER_ADDRESS)).toBeUndefined();
  });
});

describe('toEthersTransaction', () => {
  it('builds a type 2 request when a priority fee is known', () => {
    expect(toEthersTransaction(unsigned())).toEqual({
      chainId: 1n,
      nonce: 6,
      to: TEST_RECIPIENT,
      data: '0x',
      value: 1_000n,
      gasLimit: 25_200n,
      type: 2,
      maxFeePerGas: 30_000_000_000n,
      maxPriorityFeePerGas: 2_000_000_000n,
    });
  });

  it('builds a legacy request without one', () => {
    expect(toEthersTransaction(unsigned({ maxPriorityFeePerGas: undefined }))).toMatchObject({
      type: 0,
      gasPrice: 30_000_000_000n,
    });
  });
});

describe('WalletSignerProvider', () => {
  let resolved: Array<[string, string]>;
  let keys: Map<string, string>;
  let resolveKey: KeyResolver;

  beforeEach(() => {
    resolved = [];
    keys = new Map([[TEST_ADDRESS.toLowerCase(), TEST_KEY]]);
    resolveKey = (chainId, address) => {
      resolved.push([chainId, address]);
      return keys.get(address.toLowerCase());
    };
  });

  it('signs transactions that recover to the account', async () => {
    const provider = new WalletSignerProvider({ resolveKey, logger: new NullLogger() });
    const signer = await provider.getSigner('1', TEST_ADDRESS);

    const signed = await signer.signTransaction(unsigned());
    const parsed = ethers.Transaction.from(signed);

    expect(signer.address).toBe(TEST_ADDRESS);
    expect(parsed.from).toBe(TEST_ADDRESS);
    expect(parsed.nonce).toBe(6);
    expect(parsed.chainId).toBe(1n);
    expect(parsed.type).toBe(2);
    expect(parsed.gasLimit).toBe(25_200n);
  });

  it('caches the handle per chain and account', async () => {
    const provider = new WalletSignerProvider({ resolveKey, logger: new NullLogger() });

    const first = await provider.getSigner('1', TEST_ADDRESS);
    const second = await provider.getSigner('1', TEST_ADDRESS.toLowerCase());
    await provider.getSigner('137', TEST_ADDRESS);

    expect(second).toBe(first);
    expect(resolved).toEqual([['1', TEST_ADDRESS], ['137', TEST_ADDRESS]]);
  });

  it('throws when no key is configured', async () => {
    const provider = new WalletSignerProvider({ resolveKey, logger: new NullLogger() });

    await expect(provider.getSigner('1', OTHER_ADDRESS)).rejects.toThrow(
      `No signing key configured for ${OTHER_ADDRESS} on chain 1`
    );
  });

  it('reports a malformed key without logging it', async () => {
    keys.set(OTHER_ADDRESS.toLowerCase(), 'not-a-key');
    const logger = new RecordingLogger();
    const provider = new WalletSignerProvider({ resolveKey, logger });

    await expect(provider.getSigner('1', OTHER_ADDRESS)).rejects.toThrow(
      `Signing key for ${OTHER_ADDRESS} on chain 1 is malformed`
    );
    expect(logger.getErrors()).toHaveLength(1);
    expect(JSON.stringify(logger.getAllLogs())).not.toContain('not-a-key');
  });

  it('refuses a key that belongs to another account', async () => {
    keys.set(OTHER_ADDRESS.toLowerCase(), TEST_KEY);
    const provider = new WalletSignerProvider({ resolveKey, logger: new NullLogger() });

    await expect(provider.getSigner('1', OTHER_ADDRESS)).rejects.toThrow(
      `Signing key for ${OTHER_ADDRESS} on chain 1 belongs to ${TEST_ADDRESS}`
    );
  });
});
