/**
 * Submission Metrics
 *
 * MetricsSink that records every CompletionEvent into the shared collector:
 * - txcore_submissions_total{chain,outcome}
 * - txcore_submission_duration_ms{chain,outcome} (histogram)
 * - txcore_submission_rejections_total{chain,reason}
 */

import type { CompletionEvent, MetricsSink } from '@txcore/types';
import { MetricType, type IMetricsCollector } from '@txcore/metrics';

export const SUBMISSIONS_TOTAL = 'txcore_submissions_total';
export const SUBMISSION_DURATION_MS = 'txcore_submission_duration_ms';
export const SUBMISSION_REJECTIONS_TOTAL = 'txcore_submission_rejections_total';

export class SubmissionMetrics implements MetricsSink {
  constructor(private readonly collector: IMetricsCollector) {
    collector.defineMetric({
      name: SUBMISSIONS_TOTAL,
      type: MetricType.COUNTER,
      description: 'Submissions that reached a terminal state',
      labelNames: ['chain', 'outcome'],
    });
    collector.defineMetric({
      name: SUBMISSION_DURATION_MS,
      type: MetricType.HISTOGRAM,
      description: 'Time from acceptance to terminal state in milliseconds',
      labelNames: ['chain', 'outcome'],
    });
    collector.defineMetric({
      name: SUBMISSION_REJECTIONS_TOTAL,
      type: MetricType.COUNTER,
      description: 'Rejected and dropped submissions by reason',
      labelNames: ['chain', 'reason'],
    });
  }

  recordCompletion(event: CompletionEvent): void {
    const labels = { chain: event.chainId, outcome: event.outcome };
    this.collector.incrementCounter(SUBMISSIONS_TOTAL, labels);
    this.collector.recordHistogram(SUBMISSION_DURATION_MS, event.durationMs, labels);
    if (event.reason) {
      this.collector.incrementCounter(SUBMISSION_REJECTIONS_TOTAL, { chain: event.chainId, reason: event.reason });
    }
  }
}
