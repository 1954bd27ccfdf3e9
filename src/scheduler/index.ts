/**
 * Scheduling module: the dispatch loop and the per-run pipeline.
 */

export { Scheduler, DEFAULT_TICK_MS, type SchedulerConfig, type JobHandler } from './scheduler';
export {
  JobRunner,
  ERROR_METRIC_SUFFIX,
  type Executor,
  type JobRunnerConfig,
  type JobRunSummary,
} from './job-runner';
export { ScheduleQueue, type ScheduleEntry } from './schedule-queue';
export { systemClock, type Clock } from './clock';
