import { MAIN_COMPONENT, type Job, type Observation, type Result } from '../types';
import { formatError, isExporterError, type ExecutionError } from '../errors';
import { resolveLabels } from '../labels';
import { NoopLogger, type Logger } from '../observability';
import type { MetricRegistry } from '../registry';

/**
 * Anything able to execute a job, normally a {@link JobExecutor}.
 */
export interface Executor {
  execute(job: Job): Promise<Result<Observation[], ExecutionError>>;
}

export interface JobRunnerConfig {
  executor: Executor;
  registry: MetricRegistry;
  logger?: Logger;
}

/**
 * Outcome of one job execution.
 */
export interface JobRunSummary {
  jobId: string;
  /** Observations written to the registry */
  written: number;
  /** Observations the registry refused */
  rejected: number;
  error?: ExecutionError;
}

/**
 * Suffix of the counter tracking a metric's failed runs
 */
export const ERROR_METRIC_SUFFIX = '_errors_total';

/**
 * Per-execution pipeline: executor, label resolution, registry writes.
 *
 * A failed run is logged and counted in `<metric>_errors_total`; the values
 * from the last good run stay in the registry.
 */
export class JobRunner {
  private readonly executor: Executor;
  private readonly registry: MetricRegistry;
  private readonly logger: Logger;

  constructor(config: JobRunnerConfig) {
    this.executor = config.executor;
    this.registry = config.registry;
    this.logger = config.logger ?? new NoopLogger();
  }

  async run(job: Job): Promise<JobRunSummary> {
    const log = this.logger.child({ jobId: job.id, metric: job.metric });
    const result = await this.executor.execute(job);

    if (!result.success) {
      log.warn('Job run failed', { error: formatError(result.error), ...result.error.context });
      this.countFailure(job, log);
      return { jobId: job.id, written: 0, rejected: 0, error: result.error };
    }

    let written = 0;
    let rejected = 0;
    for (const observation of result.data) {
      const labels = resolveLabels(job.globalLabels, job.labels, observation.component);
      try {
        this.registry.observe(job.metric, job.help, job.kind, labels, observation.value);
        written++;
      } catch (error) {
        if (!isExporterError(error)) {
          throw error;
        }
        rejected++;
        log.error('Observation rejected', {
          component: observation.component,
          labels,
          error: formatError(error),
        });
      }
    }

    log.debug('Job run complete', { written, rejected });
    return { jobId: job.id, written, rejected };
  }

  private countFailure(job: Job, log: Logger): void {
    const labels = resolveLabels(job.globalLabels, job.labels, MAIN_COMPONENT);
    try {
      this.registry.increment(`${job.metric}${ERROR_METRIC_SUFFIX}`, job.help, labels);
    } catch (error) {
      if (!isExporterError(error)) {
        throw error;
      }
      log.error('Error counter rejected', { error: formatError(error) });
    }
  }
}
