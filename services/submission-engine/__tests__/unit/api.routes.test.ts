/**
 * HTTP API Tests
 *
 * Runs the assembled engine over in-process fakes on an ephemeral port and
 * talks to it with fetch.
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { parseEngineConfig } from '@txcore/config';
import { ErrorCode, NullLogger } from '@txcore/core';
import {
  FakeChainEndpoint,
  FakeSignerProvider,
  TEST_ACCOUNT_A,
  TEST_RECIPIENT,
  waitFor,
} from '@txcore/test-utils';
import { createSubmissionEngine, type SubmissionEngine } from '../../src/service';
import { AlertNotifier } from '../../src/reporting/alert-notifier';

const config = parseEngineConfig({
  port: 3000,
  chains: [{
    chainId: 1,
    name: 'testnet',
    rpcUrl: 'http://localhost:8545',
    reserveRetryAttempts: 0,
    retryBackoff: { initialDelayMs: 1, maxDelayMs: 5 },
    pollIntervalMs: 5,
    pollTimeoutMs: 100,
    drainTimeoutMs: 500,
  }],
});

function submissionBody(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    chainId: '1',
    account: TEST_ACCOUNT_A,
    payload: { to: TEST_RECIPIENT, value: '1000' },
    ...overrides,
  };
}

describe('Submission engine HTTP API', () => {
  let endpoint: FakeChainEndpoint;
  let engine: SubmissionEngine;
  let baseUrl: string;

  beforeEach(async () => {
    endpoint = new FakeChainEndpoint('1');
    endpoint.setConfirmedNonce(TEST_ACCOUNT_A, 5);
    const logger = new NullLogger();
    engine = createSubmissionEngine(config, {
      createEndpoint: () => endpoint,
      signers: new FakeSignerProvider(),
      notifier: new AlertNotifier({ channels: [], logger }),
      logger,
    });

    const server = await engine.start(0);
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('expected a TCP address');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    await engine.stop();
  });

  function post(path: string, body: unknown): Promise<Response> {
    return fetch(`${baseUrl}${path}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: typeof body === 'string' ? body : JSON.stringify(body),
    });
  }

  describe('health', () => {
    it('reports healthy once every chain runs', async () => {
      const res = await fetch(`${baseUrl}/health`);

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({ status: 'healthy', chains: 1, runningChains: 1 });
    });

    it('reports unhealthy and not ready after the orchestrator stops', async () => {
      await engine.orchestrator.stop();

      const health = await fetch(`${baseUrl}/health`);
      expect(health.status).toBe(503);
      expect(await health.json()).toMatchObject({ status: 'unhealthy' });

      const ready = await fetch(`${baseUrl}/health/ready`);
      expect(ready.status).toBe(503);
      expect(await ready.json()).toMatchObject({ status: 'not_ready', isRunning: false });
    });

    it('answers the liveness check', async () => {
      const res = await fetch(`${baseUrl}/health/live`);

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({ status: 'alive' });
    });

    it('exposes engine status', async () => {
      const res = await fetch(`${baseUrl}/status`);

      expect(await res.json()).toMatchObject({
        running: true,
        archived: 0,
        chains: [{ chainId: '1', name: 'testnet', state: 'running', queueDepth: 0, active: 0 }],
      });
    });
  });

  describe('lifecycle controls', () => {
    it('refuses to start an engine that is already running', async () => {
      const res = await post('/start', {});

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: 'Engine is already running' });
    });

    it('stops and restarts the engine', async () => {
      const stopped = await post('/stop', {});
      expect(stopped.status).toBe(200);
      expect(await stopped.json()).toEqual({ status: 'stopped' });
      expect(engine.orchestrator.isRunning()).toBe(false);

      const again = await post('/stop', {});
      expect(again.status).toBe(400);
      expect(await again.json()).toEqual({ error: 'Engine is not running' });

      const started = await post('/start', {});
      expect(started.status).toBe(200);
      expect(await started.json()).toEqual({ status: 'running' });

      const res = await post('/api/submissions?wait=true', submissionBody({ id: 'api-restarted' }));
      expect(await res.json()).toMatchObject({ requestId: 'api-restarted', outcome: 'confirmed' });
    });

    it('answers 503 when submitting to a stopped engine', async () => {
      await post('/stop', {});

      const res = await post('/api/submissions', submissionBody());

      expect(res.status).toBe(503);
      expect(await res.json()).toMatchObject({ code: ErrorCode.SERVICE_NOT_STARTED });
    });
  });

  describe('POST /api/submissions', () => {
    it('accepts a request and completes it in the background', async () => {
      const res = await post('/api/submissions', submissionBody({ id: 'api-req-1' }));

      expect(res.status).toBe(202);
      expect(await res.json()).toEqual({ requestId: 'api-req-1', chainId: '1', status: 'accepted' });

      await waitFor(() => engine.orchestrator.getRecord('api-req-1')?.terminalOutcome === 'confirmed');
      const record = await fetch(`${baseUrl}/api/submissions/api-req-1`);
      expect(record.status).toBe(200);
      expect(await record.json()).toMatchObject({
        request: { id: 'api-req-1', chainId: '1', payload: { to: TEST_RECIPIENT, value: '1000' } },
        state: 'confirmed',
        assignedNonce: 6,
        terminalOutcome: 'confirmed',
      });
    });

    it('waits for the completion event when asked to', async () => {
      const res = await post('/api/submissions?wait=true', submissionBody({ id: 'api-req-2' }));

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        requestId: 'api-req-2',
        chainId: '1',
        outcome: 'confirmed',
        nonce: 6,
        chainTxHandle: endpoint.getBroadcasts()[0].hash,
      });
    });

    it('rejects an invalid body with the failing fields', async () => {
      const res = await post('/api/submissions', submissionBody({ account: 'not-an-address' }));

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: 'Invalid request body',
        issues: ['account: Invalid Ethereum address format'],
      });
    });

    it('rejects malformed JSON', async () => {
      const res = await post('/api/submissions', '{"chainId":');

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: 'Malformed request body' });
    });

    it('maps an unknown chain to 400', async () => {
      const res = await post('/api/submissions', submissionBody({ chainId: '999' }));

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: 'Chain 999 is not configured', code: ErrorCode.UNKNOWN_CHAIN });
    });

    it('maps a reused request id to 409', async () => {
      await post('/api/submissions?wait=true', submissionBody({ id: 'api-dup' }));

      const res = await post('/api/submissions', submissionBody({ id: 'api-dup' }));

      expect(res.status).toBe(409);
      expect(await res.json()).toMatchObject({ code: ErrorCode.VALIDATION_FAILED });
    });
  });

  describe('records and cancellation', () => {
    it('answers 404 for an unknown request', async () => {
      const res = await fetch(`${baseUrl}/api/submissions/nope`);

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ error: 'Request nope not found' });
    });

    it('answers 404 when cancelling an unknown request', async () => {
      const res = await post('/api/submissions/nope/cancel', {});

      expect(res.status).toBe(404);
    });

    it('answers 409 when cancelling a completed request', async () => {
      await post('/api/submissions?wait=true', submissionBody({ id: 'api-done' }));

      const res = await post('/api/submissions/api-done/cancel', {});

      expect(res.status).toBe(409);
      expect(await res.json()).toEqual({
        error: 'Request api-done cannot be cancelled in state confirmed',
        code: ErrorCode.CANCELLATION_REJECTED,
      });
    });
  });

  describe('POST /api/simulate', () => {
    it('returns the dry run with amounts as strings', async () => {
      const res = await post('/api/simulate', submissionBody());

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        chainId: '1',
        account: TEST_ACCOUNT_A,
        nonce: 6,
        result: { outcome: 'safe', estimatedGas: '21000', gasPrice: '1000000000' },
        gasLimit: '25200',
      });
      expect(endpoint.calls.broadcast).toBe(0);
    });
  });

  describe('alerts', () => {
    it('records a test alert in the history', async () => {
      const sent = await post('/api/test-alert', {});
      expect(await sent.json()).toEqual({ sent: true });

      const res = await fetch(`${baseUrl}/api/alerts?limit=5`);
      expect(await res.json()).toMatchObject({
        alerts: [{
          type: 'TEST_ALERT',
          service: 'submission-engine',
          message: 'Test alert from submission engine',
          severity: 'low',
        }],
      });
    });
  });

  describe('GET /metrics', () => {
    it('serves completion counters as Prometheus text', async () => {
      await post('/api/submissions?wait=true', submissionBody());

      const res = await fetch(`${baseUrl}/metrics`);

      expect(res.headers.get('content-type')).toMatch(/^text\/plain/);
      const lines = (await res.text()).split('\n');
      expect(lines).toContain('txcore_submissions_total{chain="1",outcome="confirmed"} 1');
    });
  });

  it('answers 404 for unknown routes', async () => {
    const res = await fetch(`${baseUrl}/nowhere`);

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'Not found' });
  });
});

describe('Submission engine HTTP API with an unhealthy chain', () => {
  let engine: SubmissionEngine;

  afterEach(async () => {
    await engine.stop();
  });

  it('starts the healthy chains and reports degraded health', async () => {
    const endpoints = new Map([
      ['1', new FakeChainEndpoint('1')],
      ['137', new FakeChainEndpoint('137')],
    ]);
    const unhealthy = endpoints.get('137');
    if (unhealthy) unhealthy.healthy = false;
    const logger = new NullLogger();
    engine = createSubmissionEngine(
      parseEngineConfig({
        chains: [
          { chainId: 1, rpcUrl: 'http://localhost:8545' },
          { chainId: 137, rpcUrl: 'http://localhost:8546' },
        ],
      }),
      {
        createEndpoint: chain => endpoints.get(chain.chainId) ?? new FakeChainEndpoint(chain.chainId),
        signers: new FakeSignerProvider(),
        notifier: new AlertNotifier({ channels: [], logger }),
        logger,
      }
    );

    const server = await engine.start(0);
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('expected a TCP address');
    }

    const res = await fetch(`http://127.0.0.1:${address.port}/health`);

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: 'degraded', chains: 2, runningChains: 1 });
  });
});
