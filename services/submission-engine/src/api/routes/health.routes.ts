/**
 * Health Check Routes
 *
 * Public endpoints for load balancer checks, engine status and metrics
 * scraping. No authentication.
 */

import { Router, Request, Response } from 'express';
import { getErrorMessage } from '@txcore/core';
import type { EngineStateProvider } from '../types';
import { toJsonSafe } from '../serialization';

export function createHealthRoutes(state: EngineStateProvider): Router {
  const router = Router();

  /**
   * GET /health
   * healthy when every chain pool is running, degraded when some are not,
   * unhealthy (503) before start or after stop.
   */
  router.get('/health', (_req: Request, res: Response) => {
    const isRunning = state.getIsRunning();
    const chains = state.getStatus().chains;
    const runningChains = chains.filter(chain => chain.state === 'running').length;

    const status = !isRunning ? 'unhealthy' : runningChains === chains.length ? 'healthy' : 'degraded';
    res.status(status === 'unhealthy' ? 503 : 200).json({
      status,
      chains: chains.length,
      runningChains,
      timestamp: Date.now(),
    });
  });

  /**
   * GET /health/live
   * Liveness check: 200 while the process is serving requests.
   */
  router.get('/health/live', (_req: Request, res: Response) => {
    res.json({ status: 'alive', timestamp: Date.now() });
  });

  /**
   * GET /health/ready
   * Readiness check: 200 only once the engine accepts submissions.
   */
  router.get('/health/ready', (_req: Request, res: Response) => {
    const isReady = state.getIsRunning();
    res.status(isReady ? 200 : 503).json({
      status: isReady ? 'ready' : 'not_ready',
      isRunning: isReady,
      timestamp: Date.now(),
    });
  });

  router.get('/status', (_req: Request, res: Response) => {
    res.json(toJsonSafe(state.getStatus()));
  });

  router.get('/metrics', (_req: Request, res: Response) => {
    state
      .getMetricsText()
      .then(text => {
        res.type('text/plain; version=0.0.4').send(text);
      })
      .catch(error => {
        state.getLogger().error('Metrics export failed', { error: getErrorMessage(error) });
        res.status(500).json({ error: 'Metrics export failed' });
      });
  });

  return router;
}
