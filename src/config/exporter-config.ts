/**
 * Exporter settings, with a builder and an environment loader.
 */

import { ConfigurationError } from '../errors';
import { validateLabelSet } from '../labels';
import { LogLevel, parseLogLevel, type LogFormat } from '../observability';
import type { Labels } from '../types';

/**
 * Configuration options for the exporter
 */
export interface ExporterConfigOptions {
  /** Port to listen on (default: 8000) */
  port?: number;
  /** Address to bind (default: 0.0.0.0) */
  host?: string;
  /** HTTP path for the metrics endpoint (default: /metrics) */
  path?: string;
  /** Directory holding the job-definition files (default: configs) */
  configDir?: string;
  /** Minimum level written to the log (default: Info) */
  logLevel?: LogLevel;
  /** Log line format (default: pretty) */
  logFormat?: LogFormat;
  /** Default command timeout in milliseconds, 0 disables it (default: 60000) */
  commandTimeoutMs?: number;
  /** Upper bound of one scheduler sleep in milliseconds (default: 1000) */
  tickMs?: number;
  /** Labels applied to every job, under each file's global labels */
  globalLabels?: Labels;
  /** Expose process CPU, memory and descriptor metrics (default: true) */
  enableProcessMetrics?: boolean;
}

const DEFAULT_CONFIG: Required<ExporterConfigOptions> = {
  port: 8000,
  host: '0.0.0.0',
  path: '/metrics',
  configDir: 'configs',
  logLevel: LogLevel.Info,
  logFormat: 'pretty',
  commandTimeoutMs: 60000,
  tickMs: 1000,
  globalLabels: {},
  enableProcessMetrics: true,
};

/**
 * Validated exporter configuration
 */
export class ExporterConfig {
  readonly port: number;
  readonly host: string;
  readonly path: string;
  readonly configDir: string;
  readonly logLevel: LogLevel;
  readonly logFormat: LogFormat;
  readonly commandTimeoutMs: number;
  readonly tickMs: number;
  readonly globalLabels: Readonly<Labels>;
  readonly enableProcessMetrics: boolean;

  private constructor(options: Required<ExporterConfigOptions>) {
    this.port = options.port;
    this.host = options.host;
    this.path = options.path;
    this.configDir = options.configDir;
    this.logLevel = options.logLevel;
    this.logFormat = options.logFormat;
    this.commandTimeoutMs = options.commandTimeoutMs;
    this.tickMs = options.tickMs;
    this.globalLabels = Object.freeze({ ...options.globalLabels });
    this.enableProcessMetrics = options.enableProcessMetrics;
  }

  /**
   * Create configuration from options
   */
  static create(options: ExporterConfigOptions = {}): ExporterConfig {
    const config = new ExporterConfig({
      port: options.port ?? DEFAULT_CONFIG.port,
      host: options.host ?? DEFAULT_CONFIG.host,
      path: options.path ?? DEFAULT_CONFIG.path,
      configDir: options.configDir ?? DEFAULT_CONFIG.configDir,
      logLevel: options.logLevel ?? DEFAULT_CONFIG.logLevel,
      logFormat: options.logFormat ?? DEFAULT_CONFIG.logFormat,
      commandTimeoutMs: options.commandTimeoutMs ?? DEFAULT_CONFIG.commandTimeoutMs,
      tickMs: options.tickMs ?? DEFAULT_CONFIG.tickMs,
      globalLabels: options.globalLabels ?? DEFAULT_CONFIG.globalLabels,
      enableProcessMetrics: options.enableProcessMetrics ?? DEFAULT_CONFIG.enableProcessMetrics,
    });
    config.validate();
    return config;
  }

  /**
   * Create configuration from environment variables
   *
   * Environment variables:
   * - METRICS_PORT: Port to listen on
   * - METRICS_HOST: Address to bind
   * - METRICS_PATH: HTTP path for the metrics endpoint
   * - CONFIG_DIR: Directory of job-definition files
   * - LOG_LEVEL: TRACE, DEBUG, INFO, WARNING, ERROR
   * - LOG_FORMAT: pretty or json
   * - COMMAND_TIMEOUT_MS: Default command timeout, 0 disables it
   * - SCHEDULER_TICK_MS: Upper bound of one scheduler sleep
   * - GLOBAL_LABELS: JSON object of labels applied to every job
   * - ENABLE_PROCESS_METRICS: Expose process metrics (true/false)
   */
  static fromEnv(env: NodeJS.ProcessEnv = process.env): ExporterConfig {
    const options: ExporterConfigOptions = {};

    if (env['METRICS_PORT']) {
      options.port = parseInteger('METRICS_PORT', env['METRICS_PORT']);
    }

    if (env['METRICS_HOST']) {
      options.host = env['METRICS_HOST'];
    }

    if (env['METRICS_PATH']) {
      options.path = env['METRICS_PATH'];
    }

    if (env['CONFIG_DIR']) {
      options.configDir = env['CONFIG_DIR'];
    }

    if (env['LOG_LEVEL']) {
      const level = parseLogLevel(env['LOG_LEVEL']);
      if (level === undefined) {
        throw new ConfigurationError(`LOG_LEVEL must be one of TRACE, DEBUG, INFO, WARNING, ERROR, got ${env['LOG_LEVEL']}`);
      }
      options.logLevel = level;
    }

    if (env['LOG_FORMAT']) {
      const format = env['LOG_FORMAT'].toLowerCase();
      if (format !== 'json' && format !== 'pretty') {
        throw new ConfigurationError('LOG_FORMAT must be "json" or "pretty"');
      }
      options.logFormat = format;
    }

    if (env['COMMAND_TIMEOUT_MS']) {
      options.commandTimeoutMs = parseInteger('COMMAND_TIMEOUT_MS', env['COMMAND_TIMEOUT_MS']);
    }

    if (env['SCHEDULER_TICK_MS']) {
      options.tickMs = parseInteger('SCHEDULER_TICK_MS', env['SCHEDULER_TICK_MS']);
    }

    if (env['GLOBAL_LABELS']) {
      options.globalLabels = parseLabels(env['GLOBAL_LABELS']);
    }

    if (env['ENABLE_PROCESS_METRICS']) {
      options.enableProcessMetrics = env['ENABLE_PROCESS_METRICS'] === 'true';
    }

    return ExporterConfig.create(options);
  }

  /**
   * Validate the configuration
   */
  validate(): void {
    if (!Number.isInteger(this.port) || this.port <= 0 || this.port > 65535) {
      throw new ConfigurationError('Port must be between 1 and 65535');
    }

    if (!this.path.startsWith('/')) {
      throw new ConfigurationError('Metrics path must start with "/"');
    }

    if (this.configDir.trim() === '') {
      throw new ConfigurationError('Config directory is required');
    }

    if (!Number.isInteger(this.commandTimeoutMs) || this.commandTimeoutMs < 0) {
      throw new ConfigurationError('Command timeout must be a non-negative integer');
    }

    if (!Number.isInteger(this.tickMs) || this.tickMs <= 0) {
      throw new ConfigurationError('Scheduler tick must be a positive integer');
    }

    const labels = validateLabelSet({ ...this.globalLabels });
    if (!labels.valid) {
      throw new ConfigurationError(`Invalid global labels: ${labels.errors.join('; ')}`);
    }
  }
}

/**
 * Builder for creating exporter configuration with fluent API
 */
export class ExporterConfigBuilder {
  private options: ExporterConfigOptions = {};

  port(port: number): this {
    this.options.port = port;
    return this;
  }

  host(host: string): this {
    this.options.host = host;
    return this;
  }

  path(path: string): this {
    this.options.path = path;
    return this;
  }

  configDir(directory: string): this {
    this.options.configDir = directory;
    return this;
  }

  logLevel(level: LogLevel): this {
    this.options.logLevel = level;
    return this;
  }

  logFormat(format: LogFormat): this {
    this.options.logFormat = format;
    return this;
  }

  commandTimeoutMs(timeout: number): this {
    this.options.commandTimeoutMs = timeout;
    return this;
  }

  tickMs(tick: number): this {
    this.options.tickMs = tick;
    return this;
  }

  /**
   * Add a label applied to every job
   */
  addGlobalLabel(key: string, value: string): this {
    this.options.globalLabels = { ...this.options.globalLabels, [key]: value };
    return this;
  }

  enableProcessMetrics(enabled: boolean): this {
    this.options.enableProcessMetrics = enabled;
    return this;
  }

  build(): ExporterConfig {
    return ExporterConfig.create(this.options);
  }
}

function parseInteger(name: string, raw: string): number {
  const value = Number(raw);
  if (raw.trim() === '' || !Number.isInteger(value)) {
    throw new ConfigurationError(`${name} must be a valid integer`);
  }
  return value;
}

function parseLabels(raw: string): Labels {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError('GLOBAL_LABELS must be valid JSON', {
      cause: error instanceof Error ? error : undefined,
    });
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ConfigurationError('GLOBAL_LABELS must be a JSON object');
  }

  const labels: Labels = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (typeof value !== 'string' && typeof value !== 'number' && typeof value !== 'boolean') {
      throw new ConfigurationError(`GLOBAL_LABELS value of "${key}" must be a string, number or boolean`);
    }
    labels[key] = String(value);
  }
  return labels;
}
