/**
 * API Types for the Submission Engine
 *
 * Route factories read engine state only through EngineStateProvider, so
 * tests can mount them over a hand-built provider.
 */

import type { Alert, SubmissionInput, SubmissionRecord } from '@txcore/types';
import type { ILogger } from '@txcore/core';
import type { OrchestratorStatus } from '../orchestrator';
import type { DryRunResult, SubmissionHandle } from '../types';

export interface EngineStateProvider {
  /** Whether the orchestrator has started and not stopped */
  getIsRunning(): boolean;

  getStatus(): OrchestratorStatus;

  /** Start every chain pool; resolves once at least one runs */
  start(): Promise<void>;

  /** Drain and stop every chain pool */
  stop(): Promise<void>;

  /** Prometheus text exposition of every collected metric */
  getMetricsText(): Promise<string>;

  submit(input: SubmissionInput): SubmissionHandle;

  cancel(requestId: string): boolean;

  getRecord(requestId: string): Readonly<SubmissionRecord> | undefined;

  simulate(input: SubmissionInput): Promise<DryRunResult>;

  /** Deliver an alert through the configured channels */
  sendAlert(alert: Alert): Promise<void>;

  /** Most recent alerts first */
  getAlertHistory(limit?: number): Alert[];

  getLogger(): ILogger;
}
