/**
 * EVM Chain Endpoint
 *
 * ChainEndpoint over an ethers v6 JsonRpcProvider. Fee data is read during
 * simulation; on EIP-1559 chains the last seen priority fee is reused when
 * the transaction is prepared.
 */

import { JsonRpcProvider, Transaction, isError, type FeeData, type TransactionRequest as EthersTransactionRequest } from 'ethers';
import type {
  ChainEndpoint,
  ChainId,
  ChainTxHandle,
  ConfirmationStatus,
  EndpointHealth,
  SafeSimulation,
  SignedTransaction,
  SimulationResult,
  TransactionRequest,
  UnsignedTransaction,
} from '@txcore/types';
import { BroadcastRejectedError, createLogger, getErrorMessage, type ILogger } from '@txcore/core';

/**
 * The provider calls the endpoint makes, narrowed to the fields it reads.
 * JsonRpcProvider satisfies it; tests pass a stub.
 */
export interface EvmProvider {
  getTransactionCount(address: string, blockTag: 'latest' | 'pending'): Promise<number>;
  estimateGas(tx: EthersTransactionRequest): Promise<bigint>;
  call(tx: EthersTransactionRequest): Promise<string>;
  getFeeData(): Promise<Pick<FeeData, 'gasPrice' | 'maxFeePerGas' | 'maxPriorityFeePerGas'>>;
  broadcastTransaction(signedTx: string): Promise<{ hash: string }>;
  getTransactionReceipt(hash: string): Promise<{ status: number | null; blockNumber: number; gasUsed: bigint } | null>;
  getTransaction(hash: string): Promise<{ hash: string } | null>;
  getBlockNumber(): Promise<number>;
}

export interface EvmChainEndpointConfig {
  chainId: ChainId;
  rpcUrl: string;
  provider?: EvmProvider;
  logger?: ILogger;
}

// Refusals the node will repeat no matter how often the same bytes are sent
const REJECTION_CODES = ['NONCE_EXPIRED', 'REPLACEMENT_UNDERPRICED', 'INSUFFICIENT_FUNDS', 'CALL_EXCEPTION'] as const;

export class EvmChainEndpoint implements ChainEndpoint {
  readonly chainId: ChainId;
  private readonly provider: EvmProvider;
  private readonly logger: ILogger;

  constructor(config: EvmChainEndpointConfig) {
    this.chainId = config.chainId;
    this.logger = config.logger ?? createLogger(`evm-endpoint:${config.chainId}`);
    this.provider = config.provider ?? createProvider(config.chainId, config.rpcUrl);
  }

  async getConfirmedNonce(address: string): Promise<number> {
    // Transaction count is the next nonce; the highest included is one below
    const count = await this.provider.getTransactionCount(address, 'latest');
    return count - 1;
  }

  async simulate(request: TransactionRequest, nonce: number): Promise<SimulationResult> {
    const tx = {
      from: request.account,
      to: request.payload.to,
      data: request.payload.data,
      value: request.payload.value ?? 0n,
      nonce,
    };

    try {
      const [estimatedGas, feeData, returnData] = await Promise.all([
        this.provider.estimateGas(tx),
        this.provider.getFeeData(),
        this.provider.call(tx),
      ]);

      const gasPrice = feeData.maxFeePerGas ?? feeData.gasPrice;
      if (gasPrice === null) {
        return { outcome: 'inconclusive', reason: 'fee data unavailable' };
      }
      const result: SafeSimulation = {
        outcome: 'safe',
        estimatedGas,
        gasPrice,
        estimatedCost: estimatedGas * gasPrice,
        effects: { returnData },
      };
      if (feeData.maxPriorityFeePerGas !== null) {
        result.priorityFee = feeData.maxPriorityFeePerGas;
      }
      return result;
    } catch (error) {
      if (isError(error, 'CALL_EXCEPTION')) {
        return { outcome: 'rejected', reason: error.reason ?? error.shortMessage };
      }
      if (isError(error, 'INSUFFICIENT_FUNDS')) {
        return { outcome: 'rejected', reason: 'insufficient funds' };
      }
      throw error;
    }
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
      maxPriorityFeePerGas: simulation.priorityFee,
    };
  }

  async broadcast(signedTx: SignedTransaction): Promise<ChainTxHandle> {
    try {
      const response = await this.provider.broadcastTransaction(signedTx);
      return response.hash;
    } catch (error) {
      // A retry after a lost response finds the transaction already pooled
      if (getErrorMessage(error).toLowerCase().includes('already known')) {
        const hash = Transaction.from(signedTx).hash;
        if (hash) {
          this.logger.debug('Transaction already known to node', { hash });
          return hash;
        }
      }
      for (const code of REJECTION_CODES) {
        if (isError(error, code)) {
          throw new BroadcastRejectedError(error.shortMessage, error);
        }
      }
      throw error;
    }
  }

  async pollConfirmation(handle: ChainTxHandle): Promise<ConfirmationStatus> {
    const receipt = await this.provider.getTransactionReceipt(handle);
    if (receipt) {
      return {
        status: 'included',
        success: receipt.status === 1,
        blockNumber: receipt.blockNumber,
        gasUsed: receipt.gasUsed,
      };
    }
    const pending = await this.provider.getTransaction(handle);
    return pending ? { status: 'pending' } : { status: 'not_found' };
  }

  async healthCheck(): Promise<EndpointHealth> {
    const start = Date.now();
    try {
      const blockNumber = await this.provider.getBlockNumber();
      return { healthy: true, latencyMs: Date.now() - start, blockNumber };
    } catch (error) {
      return { healthy: false, latencyMs: Date.now() - start, error: getErrorMessage(error) };
    }
  }
}

function createProvider(chainId: ChainId, rpcUrl: string): JsonRpcProvider {
  // Numeric ids pin the network so ethers skips eth_chainId detection
  if (/^\d+$/.test(chainId)) {
    return new JsonRpcProvider(rpcUrl, Number(chainId), { staticNetwork: true });
  }
  return new JsonRpcProvider(rpcUrl);
}
