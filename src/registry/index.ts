/**
 * Registry module.
 * Provides the central metric registry and its per-metric series.
 */

export { MetricRegistry, type RegistryConfig } from './registry';
export { MetricSeries, labelSignature, type SeriesOrigin } from './series';
