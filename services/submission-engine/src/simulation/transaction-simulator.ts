/**
 * Transaction Simulator
 *
 * One dry run of a request against current chain state, classified into
 * safe / rejected / inconclusive, followed by the caller's constraint policy.
 * Retrying inconclusive results is left to the pipeline.
 */

import type {
  ChainEndpoint,
  SafeSimulation,
  SimulationResult,
  TransactionConstraints,
  TransactionRequest,
} from '@txcore/types';
import {
  ErrorCategory,
  classifyError,
  createLogger,
  getErrorMessage,
  withTimeout,
  type ILogger,
} from '@txcore/core';

export interface TransactionSimulatorConfig {
  endpoint: ChainEndpoint;
  simulationTimeoutMs: number;
  /** Headroom added to the estimate when sizing the gas limit */
  gasBufferBps: number;
  logger?: ILogger;
}

const BPS_DENOMINATOR = 10_000n;

export class TransactionSimulator {
  private readonly endpoint: ChainEndpoint;
  private readonly simulationTimeoutMs: number;
  private readonly gasBufferBps: bigint;
  private readonly logger: ILogger;

  constructor(config: TransactionSimulatorConfig) {
    this.endpoint = config.endpoint;
    this.simulationTimeoutMs = config.simulationTimeoutMs;
    this.gasBufferBps = BigInt(config.gasBufferBps);
    this.logger = config.logger ?? createLogger(`transaction-simulator:${config.endpoint.chainId}`);
  }

  /**
   * Dry-run `request` at `assignedNonce`. Never throws: RPC failures are
   * folded into the result.
   */
  async simulate(request: TransactionRequest, assignedNonce: number): Promise<SimulationResult> {
    const { maxValue } = request.constraints;
    const value = request.payload.value ?? 0n;
    if (maxValue !== undefined && value > maxValue) {
      return { outcome: 'rejected', reason: 'value ceiling exceeded' };
    }

    let result: SimulationResult;
    try {
      result = await withTimeout(
        this.endpoint.simulate(request, assignedNonce),
        this.simulationTimeoutMs,
        'simulate'
      );
    } catch (error) {
      const reason = getErrorMessage(error);
      if (classifyError(error) === ErrorCategory.PERMANENT) {
        this.logger.debug('Simulation failed permanently', { requestId: request.id, reason });
        return { outcome: 'rejected', reason };
      }
      this.logger.debug('Simulation inconclusive', { requestId: request.id, reason });
      return { outcome: 'inconclusive', reason };
    }

    if (result.outcome !== 'safe') {
      return result;
    }
    return this.applyConstraints(result, request.constraints);
  }

  /**
   * Estimated gas plus the configured buffer, capped at the gas ceiling and
   * at the gas `maxCost` buys at the simulated price.
   */
  computeGasLimit(result: SafeSimulation, constraints: TransactionConstraints = {}): bigint {
    let limit = result.estimatedGas + (result.estimatedGas * this.gasBufferBps) / BPS_DENOMINATOR;
    if (constraints.gasCeiling !== undefined && limit > constraints.gasCeiling) {
      limit = constraints.gasCeiling;
    }
    const affordable = affordableGas(result, constraints);
    if (affordable !== undefined && limit > affordable) {
      limit = affordable;
    }
    return limit;
  }

  private applyConstraints(result: SafeSimulation, constraints: TransactionConstraints): SimulationResult {
    if (constraints.gasCeiling !== undefined && result.estimatedGas > constraints.gasCeiling) {
      return { outcome: 'rejected', reason: 'gas ceiling exceeded' };
    }
    if (constraints.maxCost !== undefined && result.estimatedCost > constraints.maxCost) {
      return { outcome: 'rejected', reason: 'cost ceiling exceeded' };
    }
    const affordable = affordableGas(result, constraints);
    if (affordable !== undefined && affordable < result.estimatedGas) {
      return { outcome: 'rejected', reason: 'cost ceiling exceeded' };
    }
    return result;
  }
}

/** Gas units `maxCost` pays for at the simulated price; undefined when uncapped */
function affordableGas(result: SafeSimulation, constraints: TransactionConstraints): bigint | undefined {
  if (constraints.maxCost === undefined || result.gasPrice <= 0n) return undefined;
  return constraints.maxCost / result.gasPrice;
}
