/**
 * Metrics Infrastructure Layer
 *
 * @package @txcore/metrics
 * @module metrics/infrastructure
 */

export * from './in-memory-metrics-collector.impl';
export * from './prometheus-exporter.impl';
