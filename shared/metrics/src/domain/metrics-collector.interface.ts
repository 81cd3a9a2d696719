/**
 * Metrics Collector Contract
 *
 * @package @txcore/metrics
 * @module metrics/domain
 */

export enum MetricType {
  COUNTER = 'counter',
  GAUGE = 'gauge',
  /** Observations summarised as count/sum and quantiles */
  HISTOGRAM = 'histogram',
}

export type MetricLabels = Record<string, string>;

export interface MetricDefinition {
  name: string;
  type: MetricType;
  description: string;
  /** Label names every observation must carry */
  labelNames?: string[];
}

export interface MetricDistribution {
  count: number;
  sum: number;
  min: number;
  max: number;
  p50: number;
  p95: number;
  p99: number;
}

/**
 * Point-in-time view of one metric/label combination.
 * Counters and gauges carry `value`; histograms carry `distribution`.
 */
export interface MetricSnapshot {
  name: string;
  type: MetricType;
  description?: string;
  labels: MetricLabels;
  value?: number;
  distribution?: MetricDistribution;
  timestamp: number;
}

export interface IMetricsCollector {
  defineMetric(definition: MetricDefinition): void;
  incrementCounter(name: string, labels?: MetricLabels, delta?: number): void;
  setGauge(name: string, value: number, labels?: MetricLabels): void;
  recordHistogram(name: string, value: number, labels?: MetricLabels): void;
  getSnapshot(): MetricSnapshot[];
  getMetricSnapshot(name: string, labels?: MetricLabels): MetricSnapshot | undefined;
}
