/**
 * Engine config schema and loader tests
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

import { ConfigValidationError } from '@txcore/core';
import {
  loadEngineConfig,
  parseEngineConfig,
  resolveChainConfig,
} from '../../src';

const ACCOUNT = '0x1111111111111111111111111111111111111111';

describe('resolveChainConfig', () => {
  it('applies defaults to a minimal entry', () => {
    const chain = resolveChainConfig({ chainId: 137, rpcUrl: 'http://localhost:8545' });

    expect(chain.chainId).toBe('137');
    expect(chain.perAccountConcurrency).toBe(1);
    expect(chain.maxUnconfirmedReservations).toBe(16);
    expect(chain.simulationRetryCap).toBe(3);
    expect(chain.confirmationTimeoutMs).toBe(120_000);
    expect(chain.retryBackoff).toEqual({ initialDelayMs: 100, maxDelayMs: 5000, backoffMultiplier: 2 });
    expect(chain.warmAccounts).toEqual([]);
    expect(chain.maxConcurrent).toBeUndefined();
  });

  it('keeps explicit values', () => {
    const chain = resolveChainConfig({
      chainId: '1',
      rpcUrl: 'https://rpc.example.org',
      perAccountConcurrency: 2,
      warmAccounts: [ACCOUNT],
      gasBufferBps: 500,
    });

    expect(chain.perAccountConcurrency).toBe(2);
    expect(chain.warmAccounts).toEqual([ACCOUNT]);
    expect(chain.gasBufferBps).toBe(500);
  });

  it('rejects a non-http rpc url', () => {
    expect(() => resolveChainConfig({ chainId: '1', rpcUrl: 'ws://localhost:8546' })).toThrow(
      'rpcUrl: RPC URL must start with http:// or https://'
    );
  });
});

describe('parseEngineConfig', () => {
  it('requires at least one chain', () => {
    expect(() => parseEngineConfig({ chains: [] })).toThrow(ConfigValidationError);
  });

  it('rejects duplicate chain ids', () => {
    try {
      parseEngineConfig({
        chains: [
          { chainId: '1', rpcUrl: 'http://a.local' },
          { chainId: 1, rpcUrl: 'http://b.local' },
        ],
      });
      throw new Error('expected validation failure');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigValidationError);
      if (error instanceof ConfigValidationError) {
        expect(error.issues).toEqual(['chains.1.chainId: Duplicate chain id 1']);
      }
    }
  });

  it('lists every issue', () => {
    try {
      parseEngineConfig({ port: 0, chains: [{ chainId: '1', rpcUrl: 'nope', perAccountConcurrency: 0 }] });
      throw new Error('expected validation failure');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigValidationError);
      if (error instanceof ConfigValidationError) {
        expect(error.issues).toHaveLength(3);
      }
    }
  });

  it('fills engine defaults', () => {
    const config = parseEngineConfig({ chains: [{ chainId: '1', rpcUrl: 'http://a.local' }] });

    expect(config.port).toBe(3000);
    expect(config.logLevel).toBe('info');
    expect(config.archiveSize).toBe(1000);
    expect(config.alerts.circuitFailureThreshold).toBe(3);
  });
});

describe('loadEngineConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'txcore-config-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function writeConfig(content: unknown): string {
    const file = path.join(dir, 'chains.json');
    fs.writeFileSync(file, JSON.stringify(content));
    return file;
  }

  it('reads the file named by TXCORE_CONFIG_PATH', () => {
    const file = writeConfig({ chains: [{ chainId: '10', rpcUrl: 'http://op.local' }] });

    const config = loadEngineConfig({ env: { TXCORE_CONFIG_PATH: file } });

    expect(config.chains).toHaveLength(1);
    expect(config.chains[0].chainId).toBe('10');
  });

  it('applies environment overrides', () => {
    const file = writeConfig({ chains: [{ chainId: '10', rpcUrl: 'http://op.local' }] });

    const config = loadEngineConfig({
      configPath: file,
      env: {
        PORT: '8080',
        LOG_LEVEL: 'debug',
        RPC_URL_10: 'https://op.override.local',
        SLACK_WEBHOOK_URL: 'https://hooks.slack.test/services/test',
      },
    });

    expect(config.port).toBe(8080);
    expect(config.logLevel).toBe('debug');
    expect(config.chains[0].rpcUrl).toBe('https://op.override.local');
    expect(config.alerts.slackWebhookUrl).toBe('https://hooks.slack.test/services/test');
  });

  it('fails with ConfigValidationError when the file is missing', () => {
    expect(() => loadEngineConfig({ configPath: path.join(dir, 'missing.json'), env: {} })).toThrow(
      ConfigValidationError
    );
  });

  it('fails when the file is not an object', () => {
    const file = writeConfig([1, 2]);
    expect(() => loadEngineConfig({ configPath: file, env: {} })).toThrow('expected a JSON object');
  });

  it('rejects an invalid PORT', () => {
    const file = writeConfig({ chains: [{ chainId: '10', rpcUrl: 'http://op.local' }] });
    expect(() => loadEngineConfig({ configPath: file, env: { PORT: 'http' } })).toThrow(
      'Invalid PORT: "http" is not a valid integer'
    );
  });
});
