export * from './metrics-collector.interface';
