/**
 * PrometheusExporter - Infrastructure Layer
 *
 * Renders collector snapshots in the Prometheus text exposition format for
 * the /metrics endpoint.
 *
 * @see https://prometheus.io/docs/instrumenting/exposition_formats/ - Prometheus format
 *
 * @package @txcore/metrics
 * @module metrics/infrastructure
 */

import { getErrorMessage } from '@txcore/core';
import {
  IMetricsCollector,
  MetricLabels,
  MetricSnapshot,
  MetricType,
} from '../domain/metrics-collector.interface';

export interface ExportConfig {
  includeTimestamps: boolean;
  /** Emit # HELP and # TYPE lines */
  includeMetadata: boolean;
  metricPrefix: string;
  /** Labels added to every series */
  defaultLabels: MetricLabels;
}

export interface ExportResult {
  success: boolean;
  data: string;
  metricsExported: number;
  durationMs: number;
  timestamp: number;
  errors?: string[];
}

const DEFAULT_CONFIG: ExportConfig = {
  includeTimestamps: false,
  includeMetadata: true,
  metricPrefix: '',
  defaultLabels: {},
};

/**
 * @example
 * ```typescript
 * const collector = new InMemoryMetricsCollector();
 * const exporter = new PrometheusExporter(collector);
 *
 * const result = await exporter.export();
 * res.type('text/plain').send(result.data);
 * ```
 */
export class PrometheusExporter {
  private readonly config: ExportConfig;
  private readonly helpers = new PrometheusHelpers();

  constructor(
    private readonly collector: IMetricsCollector,
    config: Partial<ExportConfig> = {}
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  async export(): Promise<ExportResult> {
    const startTime = performance.now();

    try {
      const snapshot = this.collector.getSnapshot();
      const data = this.exportPrometheus(snapshot);

      return {
        success: true,
        data,
        metricsExported: snapshot.length,
        durationMs: performance.now() - startTime,
        timestamp: Date.now(),
      };
    } catch (error) {
      return {
        success: false,
        data: '',
        metricsExported: 0,
        durationMs: performance.now() - startTime,
        timestamp: Date.now(),
        errors: [getErrorMessage(error)],
      };
    }
  }

  private exportPrometheus(snapshot: MetricSnapshot[]): string {
    const lines: string[] = [];

    // Group by metric name
    const grouped = new Map<string, MetricSnapshot[]>();
    for (const metric of snapshot) {
      const name = this.helpers.formatMetricName(this.config.metricPrefix + metric.name);
      const group = grouped.get(name);
      if (group) {
        group.push(metric);
      } else {
        grouped.set(name, [metric]);
      }
    }

    for (const [name, metrics] of grouped) {
      const first = metrics[0];

      if (this.config.includeMetadata) {
        lines.push(this.helpers.generateHelpText(name, first.description ?? `${first.type} metric`));
        lines.push(this.helpers.generateTypeText(name, this.prometheusType(first.type)));
      }

      for (const metric of metrics) {
        const labels = { ...this.config.defaultLabels, ...metric.labels };
        const labelsStr = this.formatPrometheusLabels(labels);
        const timestamp = this.config.includeTimestamps ? ` ${metric.timestamp}` : '';

        if (metric.value !== undefined) {
          lines.push(`${name}${labelsStr} ${metric.value}${timestamp}`);
        } else if (metric.distribution) {
          const dist = metric.distribution;
          for (const [quantile, value] of [['0.5', dist.p50], ['0.95', dist.p95], ['0.99', dist.p99]] as const) {
            lines.push(`${name}${this.formatPrometheusLabels({ ...labels, quantile })} ${value}${timestamp}`);
          }
          lines.push(`${name}_sum${labelsStr} ${dist.sum}${timestamp}`);
          lines.push(`${name}_count${labelsStr} ${dist.count}${timestamp}`);
        }
      }

      lines.push('');
    }

    return lines.join('\n');
  }

  private formatPrometheusLabels(labels: MetricLabels): string {
    const entries = Object.entries(labels);
    if (entries.length === 0) return '';
    const formatted = entries
      .map(([key, value]) => `${key}="${this.helpers.escapeLabelValue(value)}"`)
      .join(',');
    return `{${formatted}}`;
  }

  // Histograms are exposed with quantiles, which Prometheus calls a summary
  private prometheusType(type: MetricType): string {
    switch (type) {
      case MetricType.COUNTER:
        return 'counter';
      case MetricType.GAUGE:
        return 'gauge';
      case MetricType.HISTOGRAM:
        return 'summary';
    }
  }
}

export class PrometheusHelpers {
  /**
   * Escapes: \, ", \n
   */
  escapeLabelValue(value: string): string {
    return value
      .replace(/\\/g, '\\\\')
      .replace(/"/g, '\\"')
      .replace(/\n/g, '\\n');
  }

  /**
   * Format metric name (lowercase, underscores)
   */
  formatMetricName(name: string): string {
    return name
      .toLowerCase()
      .replace(/[^a-z0-9_]/g, '_')
      .replace(/_+/g, '_');
  }

  generateHelpText(name: string, description: string): string {
    return `# HELP ${name} ${description}`;
  }

  generateTypeText(name: string, type: string): string {
    return `# TYPE ${name} ${type}`;
  }
}
