/**
 * Observability components for the command exporter.
 */

export {
  LogLevel,
  ConsoleLogger,
  NoopLogger,
  InMemoryLogger,
  parseLogLevel,
  type Logger,
  type LogEntry,
  type LogFormat,
  type ConsoleLoggerOptions,
} from './logger';
