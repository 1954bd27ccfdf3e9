import { EventEmitter } from 'events';
import type { SpawnOptions } from 'child_process';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { ProcessRunner, type SpawnFunction } from '../process-runner';
import { CommandExitError, CommandLaunchError, CommandTimeoutError } from '../../errors';

class FakeChild extends EventEmitter {
  readonly stdout = new EventEmitter();
  readonly stderr = new EventEmitter();
  readonly signals: NodeJS.Signals[] = [];

  kill(signal?: NodeJS.Signals): boolean {
    this.signals.push(signal ?? 'SIGTERM');
    return true;
  }

  finish(stdout: string, code: number | null = 0, signal: NodeJS.Signals | null = null): void {
    if (stdout) {
      this.stdout.emit('data', Buffer.from(stdout));
    }
    this.emit('close', code, signal);
  }
}

interface SpawnCall {
  command: string;
  args: readonly string[];
  options: SpawnOptions;
}

describe('ProcessRunner', () => {
  let child: FakeChild;
  let calls: SpawnCall[];
  let spawn: SpawnFunction;

  beforeEach(() => {
    child = new FakeChild();
    calls = [];
    spawn = (command, args, options) => {
      calls.push({ command, args, options });
      return child;
    };
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should spawn the program with its arguments and no shell', async () => {
    const runner = new ProcessRunner({ spawn });
    const running = runner.run(['/opt/checks/disk.sh', '-p', '/var']);
    child.finish('42\n');

    const result = await running;

    expect(calls).toHaveLength(1);
    expect(calls[0].command).toBe('/opt/checks/disk.sh');
    expect(calls[0].args).toEqual(['-p', '/var']);
    expect(calls[0].options.stdio).toEqual(['ignore', 'pipe', 'pipe']);
    expect(calls[0].options.shell).toBeUndefined();
    expect(result.exitCode).toBe(0);
    expect(result.stdout).toBe('42\n');
  });

  it('should concatenate output chunks', async () => {
    const runner = new ProcessRunner({ spawn });
    const running = runner.run(['check']);
    child.stdout.emit('data', Buffer.from('{"a":'));
    child.stdout.emit('data', Buffer.from('1}'));
    child.stderr.emit('data', Buffer.from('note'));
    child.emit('close', 0, null);

    const result = await running;

    expect(result.stdout).toBe('{"a":1}');
    expect(result.stderr).toBe('note');
  });

  it('should merge extra environment variables', async () => {
    const runner = new ProcessRunner({ spawn, env: { CHECK_MODE: 'fast' }, cwd: '/tmp' });
    const running = runner.run(['check']);
    child.finish('1');
    await running;

    expect(calls[0].options.cwd).toBe('/tmp');
    expect(calls[0].options.env?.['CHECK_MODE']).toBe('fast');
  });

  it('should reject an empty command without spawning', async () => {
    const runner = new ProcessRunner({ spawn });

    await expect(runner.run([])).rejects.toThrow(CommandLaunchError);
    expect(calls).toHaveLength(0);
  });

  it('should report a spawn failure as a launch error', async () => {
    const runner = new ProcessRunner({
      spawn: () => {
        throw new Error('EACCES');
      },
    });

    await expect(runner.run(['check'])).rejects.toThrow("Failed to launch command 'check': EACCES");
  });

  it('should report an error event as a launch error', async () => {
    const runner = new ProcessRunner({ spawn });
    const running = runner.run(['missing-binary']);
    child.emit('error', new Error('spawn missing-binary ENOENT'));

    const error = await running.catch((e: unknown) => e);

    expect(error).toBeInstanceOf(CommandLaunchError);
    expect(error).toMatchObject({ code: 'COMMAND_LAUNCH_FAILED', command: 'missing-binary' });
  });

  it('should reject a non-zero exit with the trimmed stderr', async () => {
    const runner = new ProcessRunner({ spawn });
    const running = runner.run(['check', '--x']);
    child.stderr.emit('data', Buffer.from('boom\n'));
    child.emit('close', 2, null);

    const error = await running.catch((e: unknown) => e);

    expect(error).toBeInstanceOf(CommandExitError);
    expect(error).toMatchObject({
      message: "Command 'check --x' exited with code 2",
      code: 'COMMAND_NON_ZERO_EXIT',
      exitCode: 2,
      stderr: 'boom',
    });
  });

  it('should reject a command killed by a signal', async () => {
    const runner = new ProcessRunner({ spawn });
    const running = runner.run(['check']);
    child.emit('close', null, 'SIGKILL');

    await expect(running).rejects.toMatchObject({
      message: "Command 'check' was terminated by SIGKILL",
      code: 'COMMAND_SIGNALED',
    });
  });

  it('should terminate a command that exceeds its timeout', async () => {
    vi.useFakeTimers();
    const runner = new ProcessRunner({ spawn, timeoutMs: 1000, killGracePeriodMs: 500 });
    const running = runner.run(['slow']);

    vi.advanceTimersByTime(999);
    expect(child.signals).toEqual([]);

    vi.advanceTimersByTime(1);
    expect(child.signals).toEqual(['SIGTERM']);

    child.emit('close', null, 'SIGTERM');
    const error = await running.catch((e: unknown) => e);

    expect(error).toBeInstanceOf(CommandTimeoutError);
    expect(error).toMatchObject({ message: "Command 'slow' timed out after 1000ms", timeoutMs: 1000 });
  });

  it('should force kill a command that ignores SIGTERM', async () => {
    vi.useFakeTimers();
    const runner = new ProcessRunner({ spawn, timeoutMs: 1000, killGracePeriodMs: 500 });
    const running = runner.run(['stubborn']);

    vi.advanceTimersByTime(1500);
    expect(child.signals).toEqual(['SIGTERM', 'SIGKILL']);

    child.emit('close', null, 'SIGKILL');
    await expect(running).rejects.toThrow(CommandTimeoutError);
  });

  it('should prefer the per-run timeout', async () => {
    vi.useFakeTimers();
    const runner = new ProcessRunner({ spawn, timeoutMs: 60000 });
    const running = runner.run(['slow'], { timeoutMs: 200 });

    vi.advanceTimersByTime(200);
    child.emit('close', null, 'SIGTERM');

    await expect(running).rejects.toThrow("Command 'slow' timed out after 200ms");
  });

  it('should not time out when the timeout is 0', async () => {
    vi.useFakeTimers();
    const runner = new ProcessRunner({ spawn, timeoutMs: 0 });
    const running = runner.run(['slow']);

    vi.advanceTimersByTime(3_600_000);
    expect(child.signals).toEqual([]);

    child.finish('5');
    await expect(running).resolves.toMatchObject({ stdout: '5' });
  });

  it('should terminate the command when the signal aborts', async () => {
    const runner = new ProcessRunner({ spawn });
    const controller = new AbortController();
    const running = runner.run(['check'], { signal: controller.signal });

    controller.abort();
    expect(child.signals).toEqual(['SIGTERM']);

    child.emit('close', null, 'SIGTERM');
    await expect(running).rejects.toThrow(CommandExitError);
  });

  it('should track active commands', async () => {
    const runner = new ProcessRunner({ spawn });
    const running = runner.run(['check']);

    expect(runner.getActiveCount()).toBe(1);

    child.finish('1');
    await running;

    expect(runner.getActiveCount()).toBe(0);
  });
});
