import type { Job } from '../types';
import { formatError } from '../errors';
import { NoopLogger, type Logger } from '../observability';
import { systemClock, type Clock } from './clock';
import { ScheduleQueue, type ScheduleEntry } from './schedule-queue';

/**
 * Work done for one due job. Rejections are logged, never propagated.
 */
export type JobHandler = (job: Job) => Promise<unknown>;

export interface SchedulerConfig {
  handler: JobHandler;
  clock?: Clock;
  /** Upper bound of one idle sleep in milliseconds (default: 1000) */
  tickMs?: number;
  logger?: Logger;
}

export const DEFAULT_TICK_MS = 1000;

/**
 * Owns the jobs and dispatches each one when it is due.
 *
 * Jobs sit in a min-heap keyed by next-due time. Every wake pops the due
 * jobs, starts one execution per job without awaiting it, and reschedules
 * the job at `now + interval`. Missed runs are not caught up.
 *
 * @example
 * ```typescript
 * const scheduler = new Scheduler({ handler: (job) => runner.run(job) });
 * scheduler.addAll(jobs);
 * const controller = new AbortController();
 * process.once('SIGTERM', () => controller.abort());
 * await scheduler.run(controller.signal); // returns after in-flight runs finish
 * ```
 */
export class Scheduler {
  private readonly queue = new ScheduleQueue();
  private readonly running: Set<Promise<void>> = new Set();
  private readonly handler: JobHandler;
  private readonly clock: Clock;
  private readonly tickMs: number;
  private readonly logger: Logger;
  private sequence = 0;
  private loopActive = false;
  private dispatchCount = 0;

  constructor(config: SchedulerConfig) {
    this.handler = config.handler;
    this.clock = config.clock ?? systemClock;
    this.tickMs = config.tickMs ?? DEFAULT_TICK_MS;
    this.logger = config.logger ?? new NoopLogger();

    if (this.tickMs <= 0) {
      throw new Error('tickMs must be > 0');
    }
  }

  /**
   * Schedule a job, due immediately.
   */
  add(job: Job): void {
    if (!Number.isInteger(job.interval) || job.interval <= 0) {
      throw new Error(`Job ${job.id} has an invalid interval: ${job.interval}`);
    }
    const entry: ScheduleEntry = {
      job,
      nextDue: this.clock.now(),
      sequence: this.sequence++,
    };
    this.queue.push(entry);
    this.logger.debug('Job scheduled', { jobId: job.id, interval: job.interval });
  }

  addAll(jobs: readonly Job[]): void {
    for (const job of jobs) {
      this.add(job);
    }
  }

  /**
   * Start every job due at `now` and reschedule it one interval later.
   *
   * @returns the dispatched jobs, earliest due first
   */
  dispatchDue(now: number = this.clock.now()): Job[] {
    const due = this.queue.popDue(now);

    for (const entry of due) {
      entry.nextDue = now + entry.job.interval * 1000;
      this.queue.push(entry);
      this.start(entry.job);
    }

    if (due.length > 0) {
      this.dispatchCount += due.length;
      this.logger.trace('Dispatched due jobs', { count: due.length, inFlight: this.running.size });
    }

    return due.map((entry) => entry.job);
  }

  /**
   * Dispatch jobs until `signal` aborts, then wait for in-flight runs.
   */
  async run(signal: AbortSignal): Promise<void> {
    if (this.loopActive) {
      throw new Error('Scheduler is already running');
    }
    this.loopActive = true;
    this.logger.info('Scheduler started', { jobs: this.queue.size, tickMs: this.tickMs });

    try {
      while (!signal.aborted) {
        this.dispatchDue();
        await this.clock.sleep(this.idleTime(), signal);
      }
    } finally {
      this.loopActive = false;
    }

    this.logger.info('Scheduler stopping, waiting for running jobs', { inFlight: this.running.size });
    await this.drain();
    this.logger.info('Scheduler stopped');
  }

  /**
   * Resolve once every in-flight run has settled.
   */
  async drain(): Promise<void> {
    while (this.running.size > 0) {
      await Promise.all([...this.running]);
    }
  }

  /**
   * Earliest next-due time, if any job is scheduled.
   */
  nextDueAt(): number | undefined {
    return this.queue.peek()?.nextDue;
  }

  /**
   * Scheduled jobs with their next-due times, earliest first.
   */
  schedule(): Array<{ jobId: string; nextDue: number }> {
    return this.queue.entries().map((entry) => ({ jobId: entry.job.id, nextDue: entry.nextDue }));
  }

  get size(): number {
    return this.queue.size;
  }

  get inFlight(): number {
    return this.running.size;
  }

  /**
   * Total number of runs started so far.
   */
  get dispatched(): number {
    return this.dispatchCount;
  }

  get isRunning(): boolean {
    return this.loopActive;
  }

  private idleTime(): number {
    const next = this.nextDueAt();
    if (next === undefined) {
      return this.tickMs;
    }
    return Math.min(Math.max(next - this.clock.now(), 0), this.tickMs);
  }

  private start(job: Job): void {
    const execution: Promise<void> = this.execute(job).finally(() => {
      this.running.delete(execution);
    });
    this.running.add(execution);
  }

  private async execute(job: Job): Promise<void> {
    try {
      await this.handler(job);
    } catch (error) {
      this.logger.error('Job handler failed', { jobId: job.id, error: formatError(error) });
    }
  }
}
