/**
 * Composition of the exporter: registry, executor, job runner, scheduler
 * and HTTP server built from one {@link ExporterConfig}.
 */

import { ProcessCollector } from './collectors';
import { loadJobs, type ExporterConfig } from './config';
import { JobExecutor, ProcessRunner, type CommandRunner } from './executor';
import { MetricsServer } from './http';
import { NoopLogger, type Logger } from './observability';
import { MetricRegistry } from './registry';
import { JobRunner, Scheduler, type Clock } from './scheduler';
import type { Job } from './types';

export interface CommandExporterOptions {
  logger?: Logger;
  /** Replaces the process runner built from the configuration */
  runner?: CommandRunner;
  clock?: Clock;
}

export class CommandExporter {
  readonly registry: MetricRegistry;
  readonly scheduler: Scheduler;
  readonly server: MetricsServer;
  private readonly config: ExporterConfig;
  private readonly logger: Logger;

  constructor(config: ExporterConfig, options: CommandExporterOptions = {}) {
    this.config = config;
    this.logger = options.logger ?? new NoopLogger();

    this.registry = new MetricRegistry({ logger: this.logger.child({ module: 'registry' }) });
    if (config.enableProcessMetrics) {
      this.registry.register(new ProcessCollector());
    }

    const executor = new JobExecutor({
      runner: options.runner ?? new ProcessRunner({ timeoutMs: config.commandTimeoutMs }),
      logger: this.logger.child({ module: 'executor' }),
    });
    const jobRunner = new JobRunner({
      executor,
      registry: this.registry,
      logger: this.logger.child({ module: 'job-runner' }),
    });

    this.scheduler = new Scheduler({
      handler: (job) => jobRunner.run(job),
      clock: options.clock,
      tickMs: config.tickMs,
      logger: this.logger.child({ module: 'scheduler' }),
    });

    this.server = new MetricsServer({
      registry: this.registry,
      readiness: this.scheduler,
      host: config.host,
      port: config.port,
      path: config.path,
      logger: this.logger.child({ module: 'http' }),
    });
  }

  /**
   * Load every job file of the configured directory into the scheduler.
   *
   * @returns the jobs loaded
   */
  async loadJobs(): Promise<Job[]> {
    const jobs = await loadJobs(this.config.configDir, {
      defaultLabels: { ...this.config.globalLabels },
      logger: this.logger.child({ module: 'config' }),
    });

    if (jobs.length === 0) {
      this.logger.error('No valid jobs loaded, only exporter metrics will be served', {
        configDir: this.config.configDir,
      });
    }

    this.scheduler.addAll(jobs);
    return jobs;
  }

  /**
   * Serve metrics and run jobs until `signal` aborts, then drain running
   * jobs and close the server.
   */
  async run(signal: AbortSignal): Promise<void> {
    await this.server.listen();
    try {
      await this.scheduler.run(signal);
    } finally {
      await this.server.close();
    }
  }
}
