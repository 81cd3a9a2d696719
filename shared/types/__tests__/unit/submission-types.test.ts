import { describe, it, expect } from '@jest/globals';
import { TimeoutError } from '../../src/index';

describe('TimeoutError', () => {
  it('builds its message from operation and duration', () => {
    const err = new TimeoutError('simulate', 250);
    expect(err.message).toBe('Timeout: simulate exceeded 250ms');
    expect(err.operation).toBe('simulate');
    expect(err.timeoutMs).toBe(250);
    expect(err.name).toBe('TimeoutError');
  });

  it('includes the service name when given', () => {
    const err = new TimeoutError('broadcast', 1000, 'chain-1');
    expect(err.message).toBe('Timeout: broadcast exceeded 1000ms in chain-1');
  });

  it('is instanceof Error', () => {
    expect(new TimeoutError('op', 1)).toBeInstanceOf(Error);
  });
});
