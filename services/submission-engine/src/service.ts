/**
 * Submission Engine Assembly
 *
 * Wires a validated EngineConfig into running components: one EVM endpoint
 * per chain, the wallet signer provider, the reporting sinks, the
 * Orchestrator and the HTTP app.
 */

import type { Server } from 'http';
import type { Application } from 'express';
import type { EngineConfig, ChainConfig } from '@txcore/config';
import type { ChainEndpoint, SignerProvider } from '@txcore/types';
import { createLogger, type ILogger } from '@txcore/core';
import { InMemoryMetricsCollector, PrometheusExporter } from '@txcore/metrics';
import { Orchestrator } from './orchestrator';
import { EvmChainEndpoint } from './endpoint/evm-chain-endpoint';
import { WalletSignerProvider } from './signing/wallet-signer-provider';
import { AlertNotifier } from './reporting/alert-notifier';
import { SubmissionMetrics } from './reporting/submission-metrics';
import { createApiApp, createEngineStateProvider } from './api';

export interface SubmissionEngineOptions {
  /** Defaults to an EvmChainEndpoint per chain */
  createEndpoint?: (chain: ChainConfig) => ChainEndpoint;
  /** Defaults to WalletSignerProvider reading SIGNER_KEY_* variables */
  signers?: SignerProvider;
  notifier?: AlertNotifier;
  logger?: ILogger;
}

export interface SubmissionEngine {
  orchestrator: Orchestrator;
  notifier: AlertNotifier;
  collector: InMemoryMetricsCollector;
  app: Application;
  /** Start the orchestrator, then serve the API on `port` (config.port by default) */
  start(port?: number): Promise<Server>;
  stop(): Promise<void>;
}

export function createSubmissionEngine(config: EngineConfig, options: SubmissionEngineOptions = {}): SubmissionEngine {
  const logger = options.logger ?? createLogger({ name: 'submission-engine', level: config.logLevel });

  const collector = new InMemoryMetricsCollector();
  const exporter = new PrometheusExporter(collector);
  const notifier = options.notifier ?? new AlertNotifier({
    slackWebhookUrl: config.alerts.slackWebhookUrl,
    discordWebhookUrl: config.alerts.discordWebhookUrl,
    historySize: config.alerts.historySize,
    circuit: {
      failureThreshold: config.alerts.circuitFailureThreshold,
      resetTimeoutMs: config.alerts.circuitResetMs,
    },
    logger: logger.child({ component: 'alert-notifier' }),
  });

  const orchestrator = new Orchestrator({
    chains: config.chains,
    createEndpoint: options.createEndpoint ?? (chain => new EvmChainEndpoint({
      chainId: chain.chainId,
      rpcUrl: chain.rpcUrl,
      logger: logger.child({ component: 'endpoint', chainId: chain.chainId }),
    })),
    signers: options.signers ?? new WalletSignerProvider({ logger: logger.child({ component: 'signers' }) }),
    alertSink: notifier,
    metricsSink: new SubmissionMetrics(collector),
    archiveSize: config.archiveSize,
    logger,
  });

  const app = createApiApp(createEngineStateProvider({ orchestrator, exporter, notifier, logger }));
  let server: Server | null = null;

  return {
    orchestrator,
    notifier,
    collector,
    app,
    async start(port = config.port): Promise<Server> {
      await orchestrator.start();
      const listening = await new Promise<Server>((resolve, reject) => {
        const candidate = app.listen(port, () => resolve(candidate));
        candidate.once('error', reject);
      });
      server = listening;
      logger.info('Submission engine listening', { port });
      return listening;
    },
    async stop(): Promise<void> {
      const current = server;
      server = null;
      if (current) {
        await new Promise<void>((resolve, reject) => {
          current.close(error => (error ? reject(error) : resolve()));
        });
      }
      await orchestrator.stop();
    },
  };
}
