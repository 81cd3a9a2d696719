/**
 * Submission Engine Service Entry Point
 *
 * Environment Variables:
 * - TXCORE_CONFIG_PATH: chain configuration file (default: config/chains.json)
 * - PORT: HTTP port, overrides the file
 * - LOG_LEVEL: overrides the file
 * - RPC_URL_<CHAINID>: per-chain RPC override
 * - SLACK_WEBHOOK_URL / DISCORD_WEBHOOK_URL: alert channels
 * - SIGNER_KEY_<CHAINID>_<ADDRESS> / SIGNER_KEY_<ADDRESS>: account keys
 */

import { loadEngineConfig } from '@txcore/config';
import { createLogger, getErrorMessage } from '@txcore/core';
import { createSubmissionEngine } from './service';

const logger = createLogger('submission-engine:main');

async function main(): Promise<void> {
  try {
    const config = loadEngineConfig();
    logger.info('Starting Submission Engine', {
      chains: config.chains.map(chain => chain.chainId),
      port: config.port,
    });

    const engine = createSubmissionEngine(config);
    await engine.start();

    let shuttingDown = false;
    const shutdown = async (signal: string): Promise<void> => {
      if (shuttingDown) return;
      shuttingDown = true;
      logger.info(`Received ${signal}, shutting down gracefully`);
      try {
        await engine.stop();
        process.exit(0);
      } catch (error) {
        logger.error('Shutdown failed', { error: getErrorMessage(error) });
        process.exit(1);
      }
    };

    process.on('SIGTERM', () => void shutdown('SIGTERM'));
    process.on('SIGINT', () => void shutdown('SIGINT'));

    logger.info('Submission Engine is running');
  } catch (error) {
    logger.error('Failed to start Submission Engine', { error: getErrorMessage(error) });
    process.exit(1);
  }
}

main().catch((error) => {
  console.error('Unhandled error in Submission Engine:', error);
  process.exit(1);
});
