/**
 * Fake Signer Provider
 *
 * Signs by serialising the transaction with a marker prefix, which
 * FakeChainEndpoint decodes to learn sender and nonce of each broadcast.
 *
 * Usage:
 * ```typescript
 * const signers = new FakeSignerProvider();
 * signers.revoke(ACCOUNT_A); // getSigner now throws for ACCOUNT_A
 * ```
 */

import type { ChainId, SignedTransaction, SignerHandle, SignerProvider, UnsignedTransaction } from '@txcore/types';

export const FAKE_SIGNATURE_PREFIX = 'fake-signed:';

export interface DecodedFakeTransaction {
  chainId: string;
  from: string;
  nonce: number;
  to: string;
  data: string;
  value: bigint;
  gasLimit: bigint;
  maxFeePerGas: bigint;
}

export function encodeFakeTransaction(tx: UnsignedTransaction): SignedTransaction {
  return FAKE_SIGNATURE_PREFIX + JSON.stringify({
    chainId: tx.chainId,
    from: tx.from,
    nonce: tx.nonce,
    to: tx.to,
    data: tx.data,
    value: tx.value.toString(),
    gasLimit: tx.gasLimit.toString(),
    maxFeePerGas: tx.maxFeePerGas.toString(),
  });
}

function readString(obj: object, key: string): string {
  const value: unknown = Reflect.get(obj, key);
  if (typeof value !== 'string') {
    throw new Error(`Malformed fake transaction: ${key} must be a string`);
  }
  return value;
}

export function decodeFakeTransaction(signed: SignedTransaction): DecodedFakeTransaction {
  if (!signed.startsWith(FAKE_SIGNATURE_PREFIX)) {
    throw new Error('Not a fake-signed transaction');
  }
  const parsed: unknown = JSON.parse(signed.slice(FAKE_SIGNATURE_PREFIX.length));
  if (typeof parsed !== 'object' || parsed === null) {
    throw new Error('Malformed fake transaction');
  }
  const nonce: unknown = Reflect.get(parsed, 'nonce');
  if (typeof nonce !== 'number') {
    throw new Error('Malformed fake transaction: nonce must be a number');
  }
  return {
    chainId: readString(parsed, 'chainId'),
    from: readString(parsed, 'from'),
    nonce,
    to: readString(parsed, 'to'),
    data: readString(parsed, 'data'),
    value: BigInt(readString(parsed, 'value')),
    gasLimit: BigInt(readString(parsed, 'gasLimit')),
    maxFeePerGas: BigInt(readString(parsed, 'maxFeePerGas')),
  };
}

class FakeSignerHandle implements SignerHandle {
  constructor(readonly address: string, private readonly provider: FakeSignerProvider) {}

  async signTransaction(tx: UnsignedTransaction): Promise<SignedTransaction> {
    this.provider.signedCount++;
    return encodeFakeTransaction(tx);
  }
}

export class FakeSignerProvider implements SignerProvider {
  private readonly revoked = new Set<string>();
  /** Total getSigner calls, successful or not */
  requests = 0;
  signedCount = 0;

  async getSigner(chainId: ChainId, address: string): Promise<SignerHandle> {
    this.requests++;
    if (this.revoked.has(address.toLowerCase())) {
      throw new Error(`No key for ${address} on chain ${chainId}`);
    }
    return new FakeSignerHandle(address, this);
  }

  revoke(address: string): void {
    this.revoked.add(address.toLowerCase());
  }

  restore(address: string): void {
    this.revoked.delete(address.toLowerCase());
  }
}
