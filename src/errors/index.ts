/**
 * Error types for the command exporter.
 *
 * Every failure the exporter recovers from (a command that cannot start,
 * exits badly, times out, prints something unparsable, or an observation
 * that conflicts with a registered series) has its own class so callers
 * can log and count it without inspecting messages.
 */

/**
 * Error category for classification
 */
export type ErrorCategory =
  | 'configuration'
  | 'execution'
  | 'parse'
  | 'registration';

/**
 * Base error class for all exporter errors
 */
export abstract class ExporterError extends Error {
  abstract readonly category: ErrorCategory;
  /** Unique error code identifying the specific error type */
  readonly code: string;
  /** Additional contextual information about the error */
  readonly context: Record<string, unknown>;

  constructor(
    message: string,
    options: { code: string; context?: Record<string, unknown>; cause?: Error | undefined }
  ) {
    super(message, options.cause ? { cause: options.cause } : undefined);
    this.name = this.constructor.name;
    this.code = options.code;
    this.context = options.context ?? {};
    Error.captureStackTrace?.(this, this.constructor);
  }

  /**
   * Returns a JSON representation of the error
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      category: this.category,
      code: this.code,
      message: this.message,
      context: this.context,
      cause: this.cause instanceof Error ? this.cause.message : undefined,
    };
  }
}

/**
 * Configuration error - invalid or missing configuration
 */
export class ConfigurationError extends ExporterError {
  readonly category = 'configuration' as const;

  constructor(message: string, options?: { context?: Record<string, unknown>; cause?: Error | undefined }) {
    super(message, { code: 'INVALID_CONFIGURATION', ...options });
  }
}

// ==================== Execution Errors ====================

/**
 * The command could not be started (missing binary, permissions, ...)
 */
export class CommandLaunchError extends ExporterError {
  readonly category = 'execution' as const;
  readonly command: string;

  constructor(command: string, reason: string, cause?: Error) {
    super(`Failed to launch command '${command}': ${reason}`, {
      code: 'COMMAND_LAUNCH_FAILED',
      context: { command, reason },
      cause,
    });
    this.command = command;
  }
}

/**
 * The command ran but exited with a non-zero status or was killed by a signal
 */
export class CommandExitError extends ExporterError {
  readonly category = 'execution' as const;
  readonly command: string;
  readonly exitCode: number | null;
  readonly signal: NodeJS.Signals | null;
  readonly stderr: string;

  constructor(
    command: string,
    outcome: { exitCode: number | null; signal: NodeJS.Signals | null; stderr: string }
  ) {
    const status = outcome.signal !== null
      ? `was terminated by ${outcome.signal}`
      : `exited with code ${outcome.exitCode}`;
    super(`Command '${command}' ${status}`, {
      code: outcome.signal !== null ? 'COMMAND_SIGNALED' : 'COMMAND_NON_ZERO_EXIT',
      context: { command, ...outcome },
    });
    this.command = command;
    this.exitCode = outcome.exitCode;
    this.signal = outcome.signal;
    this.stderr = outcome.stderr;
  }
}

/**
 * The command did not finish within its timeout and was killed
 */
export class CommandTimeoutError extends ExporterError {
  readonly category = 'execution' as const;
  readonly command: string;
  readonly timeoutMs: number;

  constructor(command: string, timeoutMs: number) {
    super(`Command '${command}' timed out after ${timeoutMs}ms`, {
      code: 'COMMAND_TIMEOUT',
      context: { command, timeoutMs },
    });
    this.command = command;
    this.timeoutMs = timeoutMs;
  }
}

// ==================== Parse Errors ====================

/**
 * Output was neither a plain number nor a JSON object of numbers
 */
export class OutputParseError extends ExporterError {
  readonly category = 'parse' as const;
  readonly output: string;

  constructor(reason: string, output: string) {
    super(`Unsupported command output: ${reason}`, {
      code: 'UNSUPPORTED_OUTPUT',
      context: { reason, output: truncate(output, 200) },
    });
    this.output = output;
  }
}

// ==================== Registration Errors ====================

/**
 * An observation's label keys disagree with the series' canonical keys
 */
export class LabelMismatchError extends ExporterError {
  readonly category = 'registration' as const;
  readonly metricName: string;
  readonly expected: readonly string[];
  readonly received: readonly string[];

  constructor(metricName: string, expected: readonly string[], received: readonly string[]) {
    super(
      `Label mismatch for metric "${metricName}": expected [${expected.join(', ')}], got [${received.join(', ')}]`,
      {
        code: 'LABEL_MISMATCH',
        context: { metricName, expected: [...expected], received: [...received] },
      }
    );
    this.metricName = metricName;
    this.expected = expected;
    this.received = received;
  }
}

/**
 * A metric name is already registered with another kind
 */
export class RegistrationError extends ExporterError {
  readonly category = 'registration' as const;
  readonly metricName: string;

  constructor(message: string, metricName: string) {
    super(message, { code: 'REGISTRATION_CONFLICT', context: { metricName } });
    this.metricName = metricName;
  }
}

/**
 * Union of the errors a single job execution can end with
 */
export type ExecutionError =
  | CommandLaunchError
  | CommandExitError
  | CommandTimeoutError
  | OutputParseError;

/**
 * Check if an error is an exporter error
 */
export function isExporterError(error: unknown): error is ExporterError {
  return error instanceof ExporterError;
}

/**
 * Format error for logging
 */
export function formatError(error: unknown): string {
  if (error instanceof ExporterError) {
    return `[${error.category.toUpperCase()}] ${error.name} (${error.code}): ${error.message}`;
  }

  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }

  return String(error);
}

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}
