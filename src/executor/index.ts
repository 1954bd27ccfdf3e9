/**
 * Executor module: runs job commands and classifies their output.
 */

export { JobExecutor, type ExecutorConfig } from './executor';
export {
  ProcessRunner,
  DEFAULT_COMMAND_TIMEOUT_MS,
  type CommandRunner,
  type ProcessResult,
  type RunOptions,
  type ProcessRunnerConfig,
  type ChildProcessLike,
  type SpawnFunction,
} from './process-runner';
export { parseOutput, toObservations } from './output-parser';
