/**
 * Wallet Signer Provider
 *
 * SignerProvider backed by ethers Wallets. Keys come from a resolver; the
 * default reads environment variables:
 * - SIGNER_KEY_<CHAINID>_<ADDRESS>: key for one account on one chain
 * - SIGNER_KEY_<ADDRESS>: key for the account on every chain
 *
 * ADDRESS is the 0x-prefixed address in upper case. Key material stays
 * inside the Wallet and is never logged.
 */

import { ethers } from 'ethers';
import type { ChainId, SignedTransaction, SignerHandle, SignerProvider, UnsignedTransaction } from '@txcore/types';
import { createLogger, type ILogger } from '@txcore/core';

export type KeyResolver = (chainId: ChainId, address: string) => string | undefined;

export function createEnvKeyResolver(env: NodeJS.ProcessEnv = process.env): KeyResolver {
  return (chainId, address) => {
    const suffix = address.toUpperCase();
    return env[`SIGNER_KEY_${chainId}_${suffix}`] ?? env[`SIGNER_KEY_${suffix}`];
  };
}

/**
 * Map the uniform transaction shape onto an ethers request. A missing
 * priority fee means legacy (type 0) pricing.
 */
export function toEthersTransaction(tx: UnsignedTransaction): ethers.TransactionRequest {
  const base = {
    chainId: BigInt(tx.chainId),
    nonce: tx.nonce,
    to: tx.to,
    data: tx.data,
    value: tx.value,
    gasLimit: tx.gasLimit,
  };
  if (tx.maxPriorityFeePerGas === undefined) {
    return { ...base, type: 0, gasPrice: tx.maxFeePerGas };
  }
  return {
    ...base,
    type: 2,
    maxFeePerGas: tx.maxFeePerGas,
    maxPriorityFeePerGas: tx.maxPriorityFeePerGas,
  };
}

class WalletSignerHandle implements SignerHandle {
  constructor(private readonly wallet: ethers.Wallet) {}

  get address(): string {
    return this.wallet.address;
  }

  async signTransaction(tx: UnsignedTransaction): Promise<SignedTransaction> {
    return this.wallet.signTransaction(toEthersTransaction(tx));
  }
}

export class WalletSignerProvider implements SignerProvider {
  private readonly resolveKey: KeyResolver;
  private readonly logger: ILogger;
  private readonly handles = new Map<string, SignerHandle>();

  constructor(options: { resolveKey?: KeyResolver; logger?: ILogger } = {}) {
    this.resolveKey = options.resolveKey ?? createEnvKeyResolver();
    this.logger = options.logger ?? createLogger('wallet-signer-provider');
  }

  async getSigner(chainId: ChainId, address: string): Promise<SignerHandle> {
    const cacheKey = `${chainId}:${address.toLowerCase()}`;
    const cached = this.handles.get(cacheKey);
    if (cached) return cached;

    const key = this.resolveKey(chainId, address);
    if (!key) {
      throw new Error(`No signing key configured for ${address} on chain ${chainId}`);
    }

    let wallet: ethers.Wallet;
    try {
      wallet = new ethers.Wallet(key);
    } catch (error) {
      // The ethers message may quote the input; keep it out of the error
      this.logger.error('Signing key could not be loaded', { chainId, address, errorType: getErrorName(error) });
      throw new Error(`Signing key for ${address} on chain ${chainId} is malformed`);
    }

    if (wallet.address.toLowerCase() !== address.toLowerCase()) {
      throw new Error(`Signing key for ${address} on chain ${chainId} belongs to ${wallet.address}`);
    }

    const handle = new WalletSignerHandle(wallet);
    this.handles.set(cacheKey, handle);
    this.logger.info('Signer loaded', { chainId, address: wallet.address });
    return handle;
  }
}

function getErrorName(error: unknown): string {
  return error instanceof Error ? error.name : typeof error;
}
