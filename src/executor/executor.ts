import { err, ok, type Job, type Observation, type Result } from '../types';
import {
  CommandExitError,
  CommandLaunchError,
  CommandTimeoutError,
  OutputParseError,
  type ExecutionError,
} from '../errors';
import { NoopLogger, type Logger } from '../observability';
import { parseOutput, toObservations } from './output-parser';
import { ProcessRunner, type CommandRunner, type ProcessResult } from './process-runner';

export interface ExecutorConfig {
  /** Runs the commands (default: a ProcessRunner with default settings) */
  runner?: CommandRunner;
  logger?: Logger;
}

/**
 * Runs one job's command and turns its output into observations.
 *
 * Never throws: launch, exit, timeout and parse failures come back as the
 * error side of the result.
 */
export class JobExecutor {
  private readonly runner: CommandRunner;
  private readonly logger: Logger;

  constructor(config: ExecutorConfig = {}) {
    this.runner = config.runner ?? new ProcessRunner();
    this.logger = config.logger ?? new NoopLogger();
  }

  async execute(job: Job): Promise<Result<Observation[], ExecutionError>> {
    this.logger.debug('Executing command', { jobId: job.id, command: job.command.join(' ') });

    let result: ProcessResult;
    try {
      result = await this.runner.run(
        job.command,
        job.timeoutMs !== undefined ? { timeoutMs: job.timeoutMs } : {}
      );
    } catch (error) {
      return err(toExecutionError(job, error));
    }

    this.logger.debug('Command finished', {
      jobId: job.id,
      durationMs: result.durationMs,
      stdout: result.stdout,
    });

    const parsed = parseOutput(result.stdout);
    if (parsed.kind === 'parse-failure') {
      return err(new OutputParseError(parsed.reason, result.stdout.trim()));
    }

    return ok(toObservations(parsed));
  }
}

function toExecutionError(job: Job, error: unknown): ExecutionError {
  if (
    error instanceof CommandLaunchError ||
    error instanceof CommandExitError ||
    error instanceof CommandTimeoutError ||
    error instanceof OutputParseError
  ) {
    return error;
  }
  return new CommandLaunchError(
    job.command.join(' '),
    error instanceof Error ? error.message : String(error),
    error instanceof Error ? error : undefined
  );
}
