/**
 * InMemoryMetricsCollector - Infrastructure Layer
 *
 * Keeps one series per (metric, label set). Histograms keep a bounded window
 * of recent observations for quantiles; count and sum are cumulative.
 *
 * @package @txcore/metrics
 * @module metrics/infrastructure
 */

import {
  IMetricsCollector,
  MetricDefinition,
  MetricDistribution,
  MetricLabels,
  MetricSnapshot,
  MetricType,
} from '../domain/metrics-collector.interface';

interface Series {
  labels: MetricLabels;
  value: number;
  count: number;
  sum: number;
  min: number;
  max: number;
  samples: number[];
  updatedAt: number;
}

interface MetricState {
  definition: MetricDefinition;
  series: Map<string, Series>;
}

export interface InMemoryCollectorConfig {
  /** Samples retained per histogram series for quantiles */
  maxSamplesPerSeries: number;
}

const DEFAULT_CONFIG: InMemoryCollectorConfig = {
  maxSamplesPerSeries: 1000,
};

function labelKey(labels: MetricLabels): string {
  return Object.keys(labels)
    .sort()
    .map(key => `${key}=${labels[key]}`)
    .join(',');
}

function percentile(sorted: number[], p: number): number {
  if (sorted.length === 0) return 0;
  const index = Math.min(sorted.length - 1, Math.ceil((p / 100) * sorted.length) - 1);
  return sorted[Math.max(0, index)];
}

export class InMemoryMetricsCollector implements IMetricsCollector {
  private readonly metrics = new Map<string, MetricState>();
  private readonly config: InMemoryCollectorConfig;

  constructor(config: Partial<InMemoryCollectorConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  defineMetric(definition: MetricDefinition): void {
    const existing = this.metrics.get(definition.name);
    if (existing) {
      if (existing.definition.type !== definition.type) {
        throw new Error(
          `Metric ${definition.name} already defined as ${existing.definition.type}, cannot redefine as ${definition.type}`
        );
      }
      return;
    }
    this.metrics.set(definition.name, { definition, series: new Map() });
  }

  incrementCounter(name: string, labels: MetricLabels = {}, delta = 1): void {
    if (delta < 0) {
      throw new Error(`Counter ${name} cannot decrease (delta ${delta})`);
    }
    const series = this.getSeries(name, MetricType.COUNTER, labels);
    series.value += delta;
    this.touch(series);
  }

  setGauge(name: string, value: number, labels: MetricLabels = {}): void {
    const series = this.getSeries(name, MetricType.GAUGE, labels);
    series.value = value;
    this.touch(series);
  }

  recordHistogram(name: string, value: number, labels: MetricLabels = {}): void {
    const series = this.getSeries(name, MetricType.HISTOGRAM, labels);
    series.count++;
    series.sum += value;
    series.min = series.count === 1 ? value : Math.min(series.min, value);
    series.max = series.count === 1 ? value : Math.max(series.max, value);
    series.samples.push(value);
    if (series.samples.length > this.config.maxSamplesPerSeries) {
      series.samples.shift();
    }
    this.touch(series);
  }

  getSnapshot(): MetricSnapshot[] {
    const snapshots: MetricSnapshot[] = [];
    for (const state of this.metrics.values()) {
      for (const series of state.series.values()) {
        snapshots.push(this.toSnapshot(state.definition, series));
      }
    }
    return snapshots;
  }

  getMetricSnapshot(name: string, labels: MetricLabels = {}): MetricSnapshot | undefined {
    const state = this.metrics.get(name);
    const series = state?.series.get(labelKey(labels));
    if (!state || !series) return undefined;
    return this.toSnapshot(state.definition, series);
  }

  private getSeries(name: string, type: MetricType, labels: MetricLabels): Series {
    const state = this.metrics.get(name);
    if (!state) {
      throw new Error(`Metric ${name} is not defined`);
    }
    if (state.definition.type !== type) {
      throw new Error(`Metric ${name} is a ${state.definition.type}, not a ${type}`);
    }

    const missing = (state.definition.labelNames ?? []).filter(labelName => !(labelName in labels));
    if (missing.length > 0) {
      throw new Error(`Metric ${name} is missing labels: ${missing.join(', ')}`);
    }

    const key = labelKey(labels);
    let series = state.series.get(key);
    if (!series) {
      series = { labels: { ...labels }, value: 0, count: 0, sum: 0, min: 0, max: 0, samples: [], updatedAt: 0 };
      state.series.set(key, series);
    }
    return series;
  }

  private touch(series: Series): void {
    series.updatedAt = Date.now();
  }

  private toSnapshot(definition: MetricDefinition, series: Series): MetricSnapshot {
    const base = {
      name: definition.name,
      type: definition.type,
      description: definition.description,
      labels: { ...series.labels },
      timestamp: series.updatedAt,
    };

    if (definition.type !== MetricType.HISTOGRAM) {
      return { ...base, value: series.value };
    }

    const sorted = [...series.samples].sort((a, b) => a - b);
    const distribution: MetricDistribution = {
      count: series.count,
      sum: series.sum,
      min: series.min,
      max: series.max,
      p50: percentile(sorted, 50),
      p95: percentile(sorted, 95),
      p99: percentile(sorted, 99),
    };
    return { ...base, distribution };
  }
}
