/**
 * Logging Tests
 *
 * The Pino wrapper itself writes to stdout, so its behaviour is checked
 * through formatLogObject and the cache; the recording loggers are
 * checked directly.
 */

import { describe, it, expect, beforeEach } from '@jest/globals';

import { createLogger, formatLogObject, resetLoggerCache, RecordingLogger, NullLogger } from '@txcore/core';

describe('formatLogObject', () => {
  it('should return the same object when no BigInt is present', () => {
    const obj = { chainId: '1', nonce: 6 };
    expect(formatLogObject(obj)).toBe(obj);
  });

  it('should convert nested BigInt values to strings', () => {
    const formatted = formatLogObject({
      estimatedCost: 21000000000000n,
      tx: { gasLimit: 21000n, values: [1n, 2n] },
    });

    expect(formatted).toEqual({
      estimatedCost: '21000000000000',
      tx: { gasLimit: '21000', values: ['1', '2'] },
    });
  });

  it('should mark circular references', () => {
    const node: Record<string, unknown> = { gas: 1n };
    node.self = node;

    const formatted = formatLogObject({ node });
    expect(formatted.node).toEqual({ gas: '1', self: '[Circular]' });
  });
});

describe('createLogger', () => {
  beforeEach(() => {
    resetLoggerCache();
  });

  it('should cache loggers per name', () => {
    const first = createLogger({ name: 'cache-test', level: 'fatal' });
    const second = createLogger('cache-test');

    expect(second).toBe(first);
  });

  it('should honour the configured level', () => {
    const logger = createLogger({ name: 'level-test', level: 'warn' });

    expect(logger.isLevelEnabled?.('warn')).toBe(true);
    expect(logger.isLevelEnabled?.('info')).toBe(false);
  });
});

describe('RecordingLogger', () => {
  it('should record entries with level and meta', () => {
    const logger = new RecordingLogger();
    logger.info('Nonce reserved', { chainId: '1', nonce: 6 });
    logger.warn('Slot poisoned');

    expect(logger.getAllLogs()).toHaveLength(2);
    expect(logger.hasLogMatching('info', /reserved/)).toBe(true);
    expect(logger.hasLogWithMeta('info', { nonce: 6 })).toBe(true);
    expect(logger.getLogs('warn')).toHaveLength(1);
  });

  it('should share the buffer with children and keep bindings', () => {
    const parent = new RecordingLogger();
    const child = parent.child({ chainId: '137' });

    child.error('Broadcast failed');

    const errors = parent.getErrors();
    expect(errors).toHaveLength(1);
    expect(errors[0].msg).toBe('Broadcast failed');
    expect(errors[0].bindings).toEqual({ chainId: '137' });
  });
});

describe('NullLogger', () => {
  it('should discard everything', () => {
    const logger = new NullLogger();
    logger.error('ignored');
    expect(logger.child({ a: 1 })).toBe(logger);
    expect(logger.isLevelEnabled('error')).toBe(false);
  });
});
