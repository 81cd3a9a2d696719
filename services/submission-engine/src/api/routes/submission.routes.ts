/**
 * Submission Routes
 *
 * POST /api/submissions            accept a request (?wait=true answers with its CompletionEvent)
 * GET  /api/submissions/:id        record of a queued, active or archived request
 * POST /api/submissions/:id/cancel cancel before broadcast
 * POST /api/simulate               dry run without reserving a nonce
 * POST /api/test-alert             push a test alert through the channels
 * GET  /api/alerts                 recent alerts
 */

import { Router, Request, Response } from 'express';
import { getErrorMessage } from '@txcore/core';
import type { EngineStateProvider } from '../types';
import { SubmissionBodySchema, TestAlertBodySchema, toSubmissionInput } from '../schemas';
import { sendError } from '../errors';
import { toJsonSafe } from '../serialization';

const MAX_ALERT_HISTORY = 500;

export function createSubmissionRoutes(state: EngineStateProvider): Router {
  const router = Router();
  const logger = state.getLogger();

  router.post('/submissions', async (req: Request, res: Response) => {
    try {
      const input = toSubmissionInput(SubmissionBodySchema.parse(req.body));
      const handle = state.submit(input);

      if (req.query.wait === 'true') {
        const event = await handle.completion;
        res.status(200).json(toJsonSafe(event));
        return;
      }

      handle.completion.catch(error => {
        logger.error('Submission completion failed', { requestId: handle.requestId, error: getErrorMessage(error) });
      });
      res.status(202).json({ requestId: handle.requestId, chainId: handle.chainId, status: 'accepted' });
    } catch (error) {
      sendError(res, error, logger);
    }
  });

  router.get('/submissions/:id', (req: Request, res: Response) => {
    const record = state.getRecord(req.params.id);
    if (!record) {
      res.status(404).json({ error: `Request ${req.params.id} not found` });
      return;
    }
    res.json(toJsonSafe(record));
  });

  router.post('/submissions/:id/cancel', (req: Request, res: Response) => {
    try {
      if (!state.cancel(req.params.id)) {
        res.status(404).json({ error: `Request ${req.params.id} not found` });
        return;
      }
      res.json({ requestId: req.params.id, cancelled: true });
    } catch (error) {
      sendError(res, error, logger);
    }
  });

  router.post('/simulate', async (req: Request, res: Response) => {
    try {
      const input = toSubmissionInput(SubmissionBodySchema.parse(req.body));
      const result = await state.simulate(input);
      res.json(toJsonSafe(result));
    } catch (error) {
      sendError(res, error, logger);
    }
  });

  router.post('/test-alert', async (req: Request, res: Response) => {
    try {
      const body = TestAlertBodySchema.parse(req.body ?? {});
      await state.sendAlert({
        type: 'TEST_ALERT',
        service: 'submission-engine',
        message: body.message,
        severity: body.severity,
        timestamp: Date.now(),
      });
      res.json({ sent: true });
    } catch (error) {
      sendError(res, error, logger);
    }
  });

  router.get('/alerts', (req: Request, res: Response) => {
    const requested = typeof req.query.limit === 'string' ? Number.parseInt(req.query.limit, 10) : 100;
    const limit = Number.isFinite(requested) && requested > 0 ? Math.min(requested, MAX_ALERT_HISTORY) : 100;
    res.json({ alerts: state.getAlertHistory(limit) });
  });

  return router;
}
