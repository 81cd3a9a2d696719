/**
 * Admin Routes
 *
 * POST /start  start every chain pool (400 when already running)
 * POST /stop   drain and stop every chain pool (400 when not running)
 */

import { Router, Request, Response } from 'express';
import type { EngineStateProvider } from '../types';
import { sendError } from '../errors';

export function createAdminRoutes(state: EngineStateProvider): Router {
  const router = Router();
  const logger = state.getLogger();

  router.post('/start', async (_req: Request, res: Response) => {
    if (state.getIsRunning()) {
      res.status(400).json({ error: 'Engine is already running' });
      return;
    }
    try {
      logger.info('Start requested over the API');
      await state.start();
      res.json({ status: 'running' });
    } catch (error) {
      sendError(res, error, logger);
    }
  });

  router.post('/stop', async (_req: Request, res: Response) => {
    if (!state.getIsRunning()) {
      res.status(400).json({ error: 'Engine is not running' });
      return;
    }
    try {
      logger.info('Stop requested over the API');
      await state.stop();
      res.json({ status: 'stopped' });
    } catch (error) {
      sendError(res, error, logger);
    }
  });

  return router;
}
