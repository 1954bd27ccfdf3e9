/**
 * Logging for the command exporter.
 *
 * Components receive a {@link Logger} through their options and derive
 * children carrying job or module context.
 */

/**
 * Log levels in order of severity.
 */
export enum LogLevel {
  Trace = 0,
  Debug = 1,
  Info = 2,
  Warn = 3,
  Error = 4,
}

export type LogFormat = 'json' | 'pretty';

export interface Logger {
  trace(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  child(context: Record<string, unknown>): Logger;
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  context: Record<string, unknown>;
  timestamp: Date;
}

const LEVEL_NAMES: ReadonlyMap<string, LogLevel> = new Map([
  ['TRACE', LogLevel.Trace],
  ['DEBUG', LogLevel.Debug],
  ['INFO', LogLevel.Info],
  ['WARN', LogLevel.Warn],
  ['WARNING', LogLevel.Warn],
  ['ERROR', LogLevel.Error],
  ['CRITICAL', LogLevel.Error],
]);

/**
 * Parse a level name such as `INFO` or `warning`. Returns undefined for unknown names.
 */
export function parseLogLevel(name: string): LogLevel | undefined {
  return LEVEL_NAMES.get(name.trim().toUpperCase());
}

const REDACTED_KEYS = new Set(['token', 'authorization', 'secret', 'password', 'apikey', 'api_key']);

function redact(context: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(context).map(([key, value]): [string, unknown] => {
      if (REDACTED_KEYS.has(key.toLowerCase())) {
        return [key, '[REDACTED]'];
      }
      return [key, isPlainObject(value) ? redact(value) : value];
    })
  );
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Error);
}

/**
 * Level methods and context merging shared by the loggers below.
 */
export abstract class ContextLogger implements Logger {
  protected readonly context: Record<string, unknown>;

  protected constructor(context: Record<string, unknown>) {
    this.context = context;
  }

  trace(message: string, context?: Record<string, unknown>): void {
    this.record(LogLevel.Trace, message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.record(LogLevel.Debug, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.record(LogLevel.Info, message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.record(LogLevel.Warn, message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.record(LogLevel.Error, message, context);
  }

  abstract child(context: Record<string, unknown>): Logger;

  protected abstract accepts(level: LogLevel): boolean;

  protected abstract emit(entry: LogEntry): void;

  private record(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (!this.accepts(level)) {
      return;
    }
    this.emit({ level, message, context: { ...this.context, ...context }, timestamp: new Date() });
  }
}

export interface ConsoleLoggerOptions {
  /** Minimum level written (default: Info) */
  level?: LogLevel;
  context?: Record<string, unknown>;
  format?: LogFormat;
  /** Line sink (default: console.log) */
  write?: (line: string) => void;
}

/**
 * Writes one line per entry, either `[time] [LEVEL] message {context}` or a
 * JSON object. Secret-looking keys are redacted at any depth.
 */
export class ConsoleLogger extends ContextLogger {
  private readonly level: LogLevel;
  private readonly format: LogFormat;
  private readonly write: (line: string) => void;

  constructor(options: ConsoleLoggerOptions = {}) {
    super(options.context ?? {});
    this.level = options.level ?? LogLevel.Info;
    this.format = options.format ?? 'pretty';
    this.write = options.write ?? ((line) => console.log(line));
  }

  override child(context: Record<string, unknown>): Logger {
    return new ConsoleLogger({
      level: this.level,
      format: this.format,
      write: this.write,
      context: { ...this.context, ...context },
    });
  }

  protected override accepts(level: LogLevel): boolean {
    return level >= this.level;
  }

  protected override emit(entry: LogEntry): void {
    const context = redact(entry.context);
    const time = entry.timestamp.toISOString();
    const level = LogLevel[entry.level].toUpperCase();

    if (this.format === 'json') {
      this.write(JSON.stringify({ ...context, timestamp: time, level, message: entry.message }));
      return;
    }

    const suffix = Object.keys(context).length > 0 ? ` ${JSON.stringify(context)}` : '';
    this.write(`[${time}] [${level}] ${entry.message}${suffix}`);
  }
}

/**
 * Discards everything.
 */
export class NoopLogger implements Logger {
  trace(): void { /* noop */ }
  debug(): void { /* noop */ }
  info(): void { /* noop */ }
  warn(): void { /* noop */ }
  error(): void { /* noop */ }
  child(_context?: Record<string, unknown>): Logger { return this; }
}

/**
 * Keeps every entry in memory; children append to their parent's list.
 */
export class InMemoryLogger extends ContextLogger {
  private readonly entries: LogEntry[];

  constructor(context: Record<string, unknown> = {}, entries: LogEntry[] = []) {
    super(context);
    this.entries = entries;
  }

  override child(context: Record<string, unknown>): Logger {
    return new InMemoryLogger({ ...this.context, ...context }, this.entries);
  }

  getLogs(): LogEntry[] {
    return [...this.entries];
  }

  getLogsByLevel(level: LogLevel): LogEntry[] {
    return this.entries.filter((entry) => entry.level === level);
  }

  clear(): void {
    this.entries.length = 0;
  }

  protected override accepts(): boolean {
    return true;
  }

  protected override emit(entry: LogEntry): void {
    this.entries.push(entry);
  }
}
