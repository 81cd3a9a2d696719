/**
 * @txcore/metrics - Metrics Collection and Export
 *
 * In-process metrics collection with Prometheus text export.
 *
 * @package @txcore/metrics
 */

// Domain Layer
export * from './domain';

// Infrastructure Layer
export * from './infrastructure';
