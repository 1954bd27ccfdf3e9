#!/usr/bin/env node
/**
 * Entry point: reads the environment, loads the job files and runs the
 * exporter until SIGINT or SIGTERM.
 */

import { ExporterConfig } from '../config';
import { formatError } from '../errors';
import { ConsoleLogger, LogLevel } from '../observability';
import { CommandExporter } from '../exporter';

export async function main(env: NodeJS.ProcessEnv = process.env): Promise<number> {
  let config: ExporterConfig;
  try {
    config = ExporterConfig.fromEnv(env);
  } catch (error) {
    new ConsoleLogger({ level: LogLevel.Error }).error('Invalid configuration', { error: formatError(error) });
    return 1;
  }

  const logger = new ConsoleLogger({ level: config.logLevel, format: config.logFormat });
  logger.info('Starting command exporter', {
    configDir: config.configDir,
    host: config.host,
    port: config.port,
  });

  const exporter = new CommandExporter(config, { logger });
  const jobs = await exporter.loadJobs();
  logger.info('Jobs loaded', { count: jobs.length });

  const controller = new AbortController();
  const shutdown = (signal: NodeJS.Signals): void => {
    if (controller.signal.aborted) {
      return;
    }
    logger.info('Shutdown requested', { signal });
    controller.abort();
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  try {
    await exporter.run(controller.signal);
  } catch (error) {
    logger.error('Exporter failed', { error: formatError(error) });
    return 1;
  } finally {
    process.removeListener('SIGINT', shutdown);
    process.removeListener('SIGTERM', shutdown);
  }

  logger.info('Command exporter stopped');
  return 0;
}

if (require.main === module) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error(formatError(error));
      process.exitCode = 1;
    }
  );
}
