import {
  DEFAULT_INTERVAL_SECONDS,
  DEFAULT_METRIC_HELP,
  MetricKind,
  type Job,
  type Labels,
} from '../types';
import { ConfigurationError } from '../errors';
import { isValidMetricName, validateLabelSet } from '../labels';

/**
 * Job fields as supplied by a caller; omitted fields take their defaults.
 */
export interface JobDefinition {
  id: string;
  command: readonly string[];
  metric: string;
  /** Seconds (default: 600) */
  interval?: number;
  /** Default: "Generic metric HELP" */
  help?: string;
  /** Default: gauge */
  kind?: MetricKind;
  labels?: Labels;
  globalLabels?: Labels;
  timeoutMs?: number;
}

/**
 * Build an immutable job, applying defaults and checking names.
 *
 * @throws ConfigurationError on an empty command, a bad metric or label name, or a non-positive interval
 */
export function defineJob(definition: JobDefinition): Job {
  const interval = definition.interval ?? DEFAULT_INTERVAL_SECONDS;
  const labels = { ...definition.labels };
  const globalLabels = { ...definition.globalLabels };

  if (definition.command.length === 0 || definition.command[0] === '') {
    throw new ConfigurationError(`Job ${definition.id} has an empty command`);
  }

  if (!isValidMetricName(definition.metric)) {
    throw new ConfigurationError(
      `Invalid metric name for job ${definition.id}: "${definition.metric}". ` +
      'Metric names must match [a-zA-Z_:][a-zA-Z0-9_:]*'
    );
  }

  if (!Number.isInteger(interval) || interval <= 0) {
    throw new ConfigurationError(`Interval of job ${definition.id} must be a positive integer, got ${interval}`);
  }

  if (definition.timeoutMs !== undefined && definition.timeoutMs <= 0) {
    throw new ConfigurationError(`Timeout of job ${definition.id} must be positive`);
  }

  const validation = validateLabelSet({ ...globalLabels, ...labels });
  if (!validation.valid) {
    throw new ConfigurationError(`Invalid labels for job ${definition.id}: ${validation.errors.join('; ')}`);
  }

  const job: Job = {
    id: definition.id,
    command: Object.freeze([...definition.command]),
    interval,
    metric: definition.metric,
    help: definition.help ?? DEFAULT_METRIC_HELP,
    kind: definition.kind ?? MetricKind.Gauge,
    labels: Object.freeze(labels),
    globalLabels: Object.freeze(globalLabels),
    ...(definition.timeoutMs !== undefined ? { timeoutMs: definition.timeoutMs } : {}),
  };
  return Object.freeze(job);
}
