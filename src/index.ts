/**
 * Command Exporter
 *
 * Runs external commands on fixed intervals, turns their output into
 * gauge or counter values and serves them in the Prometheus text format.
 */

// Re-export types
export * from './types';

// Re-export errors
export {
  ExporterError,
  ConfigurationError,
  CommandLaunchError,
  CommandExitError,
  CommandTimeoutError,
  OutputParseError,
  LabelMismatchError,
  RegistrationError,
  isExporterError,
  formatError,
  type ErrorCategory,
  type ExecutionError,
} from './errors';

// Re-export labels
export * from './labels';

// Re-export registry components
export { MetricRegistry, MetricSeries, labelSignature, type RegistryConfig } from './registry';

// Re-export serialization components
export * from './serialization';

// Re-export executor components
export * from './executor';

// Re-export scheduling components
export * from './scheduler';

// Re-export configuration
export * from './config';

// Re-export HTTP components
export * from './http';

// Re-export collectors
export { ProcessCollector, type ProcessCollectorConfig } from './collectors';

// Re-export observability
export * from './observability';

export { CommandExporter, type CommandExporterOptions } from './exporter';
