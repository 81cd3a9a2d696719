/**
 * API Module
 *
 * Builds the express application over an EngineStateProvider.
 */

import express, { type Application, type NextFunction, type Request, type Response } from 'express';
import type { Alert } from '@txcore/types';
import type { ILogger } from '@txcore/core';
import type { PrometheusExporter } from '@txcore/metrics';
import type { Orchestrator } from '../orchestrator';
import type { AlertNotifier } from '../reporting/alert-notifier';
import type { EngineStateProvider } from './types';
import { createHealthRoutes } from './routes/health.routes';
import { createSubmissionRoutes } from './routes/submission.routes';
import { createAdminRoutes } from './routes/admin.routes';

export type { EngineStateProvider } from './types';
export { createHealthRoutes } from './routes/health.routes';
export { createSubmissionRoutes } from './routes/submission.routes';
export { createAdminRoutes } from './routes/admin.routes';
export { toJsonSafe } from './serialization';

/**
 * Adapt the running components to the provider the routes read.
 */
export function createEngineStateProvider(deps: {
  orchestrator: Orchestrator;
  exporter: PrometheusExporter;
  notifier: AlertNotifier;
  logger: ILogger;
}): EngineStateProvider {
  const { orchestrator, exporter, notifier, logger } = deps;
  return {
    getIsRunning: () => orchestrator.isRunning(),
    getStatus: () => orchestrator.getStatus(),
    start: () => orchestrator.start(),
    stop: () => orchestrator.stop(),
    getMetricsText: async () => {
      const result = await exporter.export();
      if (!result.success) {
        throw new Error(result.errors?.join('; ') ?? 'metrics export failed');
      }
      return result.data;
    },
    submit: input => orchestrator.submit(input),
    cancel: requestId => orchestrator.cancel(requestId),
    getRecord: requestId => orchestrator.getRecord(requestId),
    simulate: input => orchestrator.simulate(input),
    sendAlert: (alert: Alert) => notifier.notify(alert),
    getAlertHistory: limit => notifier.getAlertHistory(limit),
    getLogger: () => logger,
  };
}

export function createApiApp(state: EngineStateProvider): Application {
  const app = express();
  app.use(express.json({ limit: '100kb' }));

  app.use('/', createHealthRoutes(state));
  app.use('/', createAdminRoutes(state));
  app.use('/api', createSubmissionRoutes(state));

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'Not found' });
  });

  // Malformed JSON bodies land here
  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = readStatus(error);
    if (status >= 500) {
      state.getLogger().error('Unhandled request error', { error: String(error) });
    }
    res.status(status).json({ error: status === 400 ? 'Malformed request body' : 'Internal server error' });
  });

  return app;
}

function readStatus(error: unknown): number {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return 500;
}
