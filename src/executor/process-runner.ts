/**
 * Process Runner
 *
 * Spawns a command without a shell, captures its output and enforces a
 * timeout. Failures are thrown as typed errors:
 *
 * - {@link CommandLaunchError} when the program cannot be started
 * - {@link CommandExitError} on a non-zero exit or a terminating signal
 * - {@link CommandTimeoutError} when the timeout expires (SIGTERM, then SIGKILL)
 *
 * @example
 * ```typescript
 * const runner = new ProcessRunner({ timeoutMs: 30000 });
 * const result = await runner.run(['/usr/local/bin/check_disk.sh', '-p', '/var']);
 * console.log(result.stdout);
 * ```
 */

import { spawn, type SpawnOptions } from 'child_process';
import {
  CommandExitError,
  CommandLaunchError,
  CommandTimeoutError,
} from '../errors';

/**
 * Output of a command that exited with status 0
 */
export interface ProcessResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  durationMs: number;
}

export interface RunOptions {
  /** Overrides the runner's default timeout; 0 disables it */
  timeoutMs?: number;
  /** Kills the command with SIGTERM when aborted */
  signal?: AbortSignal;
}

/**
 * Anything able to run a command to completion.
 */
export interface CommandRunner {
  run(command: readonly string[], options?: RunOptions): Promise<ProcessResult>;
}

/**
 * The parts of a child process the runner relies on.
 */
export interface ChildProcessLike {
  readonly stdout: { on(event: 'data', listener: (chunk: Buffer) => void): unknown } | null;
  readonly stderr: { on(event: 'data', listener: (chunk: Buffer) => void): unknown } | null;
  kill(signal?: NodeJS.Signals): boolean;
  once(event: 'close', listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
  on(event: 'error', listener: (error: Error) => void): unknown;
}

export type SpawnFunction = (
  command: string,
  args: readonly string[],
  options: SpawnOptions
) => ChildProcessLike;

export interface ProcessRunnerConfig {
  /** Default timeout in milliseconds, 0 disables it (default: 60000) */
  timeoutMs?: number;
  /** Delay between SIGTERM and SIGKILL on timeout (default: 5000) */
  killGracePeriodMs?: number;
  /** Working directory of spawned commands */
  cwd?: string;
  /** Extra environment variables merged over the exporter's own */
  env?: Record<string, string>;
  /** Replaces child_process.spawn */
  spawn?: SpawnFunction;
}

export const DEFAULT_COMMAND_TIMEOUT_MS = 60000;

/**
 * Grace period before SIGKILL after SIGTERM
 */
const KILL_GRACE_PERIOD_MS = 5000;

/**
 * Runs commands as child processes.
 */
export class ProcessRunner implements CommandRunner {
  private readonly timeoutMs: number;
  private readonly killGracePeriodMs: number;
  private readonly cwd: string | undefined;
  private readonly env: Record<string, string> | undefined;
  private readonly spawnFn: SpawnFunction;
  private active = 0;

  constructor(config: ProcessRunnerConfig = {}) {
    this.timeoutMs = config.timeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS;
    this.killGracePeriodMs = config.killGracePeriodMs ?? KILL_GRACE_PERIOD_MS;
    this.cwd = config.cwd;
    this.env = config.env;
    this.spawnFn = config.spawn ?? spawn;
  }

  /**
   * Run a command and resolve with its output once it exits with status 0.
   */
  async run(command: readonly string[], options: RunOptions = {}): Promise<ProcessResult> {
    const [program, ...args] = command;
    const display = command.join(' ');

    if (program === undefined || program.length === 0) {
      throw new CommandLaunchError(display, 'empty command');
    }

    const timeout = options.timeoutMs ?? this.timeoutMs;
    const startTime = Date.now();

    let proc: ChildProcessLike;
    try {
      proc = this.spawnFn(program, args, {
        cwd: this.cwd,
        env: this.env ? { ...process.env, ...this.env } : process.env,
        stdio: ['ignore', 'pipe', 'pipe'],
      });
    } catch (error) {
      throw new CommandLaunchError(
        display,
        error instanceof Error ? error.message : String(error),
        error instanceof Error ? error : undefined
      );
    }

    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];
    proc.stdout?.on('data', (chunk: Buffer) => {
      stdoutChunks.push(chunk);
    });
    proc.stderr?.on('data', (chunk: Buffer) => {
      stderrChunks.push(chunk);
    });

    let timeoutId: NodeJS.Timeout | undefined;
    let forceKillId: NodeJS.Timeout | undefined;
    let wasTimedOut = false;

    if (timeout > 0) {
      timeoutId = setTimeout(() => {
        wasTimedOut = true;
        proc.kill('SIGTERM');
        forceKillId = setTimeout(() => {
          proc.kill('SIGKILL');
        }, this.killGracePeriodMs);
      }, timeout);
    }

    const onAbort = (): void => {
      proc.kill('SIGTERM');
    };
    if (options.signal?.aborted) {
      onAbort();
    } else {
      options.signal?.addEventListener('abort', onAbort, { once: true });
    }

    this.active++;
    try {
      const { exitCode, signal } = await waitForClose(proc, display);
      const stdout = Buffer.concat(stdoutChunks).toString();
      const stderr = Buffer.concat(stderrChunks).toString();

      if (wasTimedOut) {
        throw new CommandTimeoutError(display, timeout);
      }

      if (signal !== null || (exitCode !== null && exitCode !== 0)) {
        throw new CommandExitError(display, { exitCode, signal, stderr: stderr.trimEnd() });
      }

      return {
        exitCode: exitCode ?? 0,
        stdout,
        stderr,
        durationMs: Date.now() - startTime,
      };
    } finally {
      this.active--;
      if (timeoutId) clearTimeout(timeoutId);
      if (forceKillId) clearTimeout(forceKillId);
      options.signal?.removeEventListener('abort', onAbort);
    }
  }

  /**
   * Number of commands currently running
   */
  getActiveCount(): number {
    return this.active;
  }
}

/**
 * Resolve when the process and its stdio have closed; reject if it never started.
 */
function waitForClose(
  proc: ChildProcessLike,
  display: string
): Promise<{ exitCode: number | null; signal: NodeJS.Signals | null }> {
  return new Promise((resolve, reject) => {
    let settled = false;

    proc.once('close', (code, signal) => {
      if (settled) return;
      settled = true;
      resolve({ exitCode: code, signal });
    });

    proc.on('error', (error) => {
      if (settled) return;
      settled = true;
      reject(new CommandLaunchError(display, error.message, error));
    });
  });
}
