/**
 * Engine Config Loader
 *
 * Reads the chain configuration file, applies environment overrides and
 * validates the result. Invalid input fails fast with every issue listed.
 *
 * Environment:
 * - TXCORE_CONFIG_PATH: config file (default config/chains.json under cwd)
 * - PORT, LOG_LEVEL: HTTP port and log level
 * - RPC_URL_<CHAINID>: per-chain RPC override, keeps provider keys out of the file
 * - SLACK_WEBHOOK_URL, DISCORD_WEBHOOK_URL: alert channels
 */

import * as fs from 'fs';
import * as path from 'path';
import { ConfigValidationError, getErrorMessage, parseEnvInt } from '@txcore/core';
import {
  ChainConfigSchema,
  EngineConfigSchema,
  formatIssues,
  type ChainConfig,
  type ChainConfigInput,
  type EngineConfig,
} from './schemas';

export const DEFAULT_CONFIG_PATH = path.join('config', 'chains.json');

export interface LoadEngineConfigOptions {
  /** Overrides TXCORE_CONFIG_PATH */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate a raw config object.
 *
 * @throws ConfigValidationError listing every issue
 */
export function parseEngineConfig(raw: unknown): EngineConfig {
  const result = EngineConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigValidationError(formatIssues(result.error));
  }
  return result.data;
}

/**
 * Apply defaults to a single chain entry built in code.
 */
export function resolveChainConfig(input: ChainConfigInput): ChainConfig {
  const result = ChainConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigValidationError(formatIssues(result.error));
  }
  return result.data;
}

function applyEnvOverrides(raw: Record<string, unknown>, env: NodeJS.ProcessEnv): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...raw };

  if (env.PORT) {
    merged.port = parseEnvInt('PORT', 3000, 1, 65535, env);
  }
  if (env.LOG_LEVEL) {
    merged.logLevel = env.LOG_LEVEL;
  }

  const alerts: Record<string, unknown> = isRecord(raw.alerts) ? { ...raw.alerts } : {};
  if (env.SLACK_WEBHOOK_URL) alerts.slackWebhookUrl = env.SLACK_WEBHOOK_URL;
  if (env.DISCORD_WEBHOOK_URL) alerts.discordWebhookUrl = env.DISCORD_WEBHOOK_URL;
  merged.alerts = alerts;

  if (Array.isArray(raw.chains)) {
    merged.chains = raw.chains.map((chain: unknown) => {
      if (!isRecord(chain)) return chain;
      const override = env[`RPC_URL_${String(chain.chainId)}`];
      return override ? { ...chain, rpcUrl: override } : chain;
    });
  }

  return merged;
}

/**
 * Load, merge and validate the engine configuration.
 *
 * @throws ConfigValidationError if the file is missing, unreadable or invalid
 */
export function loadEngineConfig(options: LoadEngineConfigOptions = {}): EngineConfig {
  const env = options.env ?? process.env;
  const configPath = path.resolve(options.configPath ?? env.TXCORE_CONFIG_PATH ?? DEFAULT_CONFIG_PATH);

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, 'utf8'));
  } catch (error) {
    throw new ConfigValidationError([`${configPath}: ${getErrorMessage(error)}`]);
  }

  if (!isRecord(raw)) {
    throw new ConfigValidationError([`${configPath}: expected a JSON object`]);
  }

  return parseEngineConfig(applyEnvOverrides(raw, env));
}
