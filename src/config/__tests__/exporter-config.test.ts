import { describe, it, expect } from 'vitest';
import { ExporterConfig, ExporterConfigBuilder } from '../exporter-config';
import { ConfigurationError } from '../../errors';
import { LogLevel } from '../../observability';

describe('ExporterConfig', () => {
  describe('fromEnv', () => {
    it('should use defaults for an empty environment', () => {
      const config = ExporterConfig.fromEnv({});

      expect(config.port).toBe(8000);
      expect(config.host).toBe('0.0.0.0');
      expect(config.path).toBe('/metrics');
      expect(config.configDir).toBe('configs');
      expect(config.logLevel).toBe(LogLevel.Info);
      expect(config.logFormat).toBe('pretty');
      expect(config.commandTimeoutMs).toBe(60000);
      expect(config.tickMs).toBe(1000);
      expect(config.globalLabels).toEqual({});
      expect(config.enableProcessMetrics).toBe(true);
    });

    it('should read every variable', () => {
      const config = ExporterConfig.fromEnv({
        METRICS_PORT: '9100',
        METRICS_HOST: '127.0.0.1',
        METRICS_PATH: '/probe',
        CONFIG_DIR: '/etc/exporter',
        LOG_LEVEL: 'warning',
        LOG_FORMAT: 'JSON',
        COMMAND_TIMEOUT_MS: '0',
        SCHEDULER_TICK_MS: '250',
        GLOBAL_LABELS: '{"dc":"eu-1","rack":7}',
        ENABLE_PROCESS_METRICS: 'false',
      });

      expect(config.port).toBe(9100);
      expect(config.host).toBe('127.0.0.1');
      expect(config.path).toBe('/probe');
      expect(config.configDir).toBe('/etc/exporter');
      expect(config.logLevel).toBe(LogLevel.Warn);
      expect(config.logFormat).toBe('json');
      expect(config.commandTimeoutMs).toBe(0);
      expect(config.tickMs).toBe(250);
      expect(config.globalLabels).toEqual({ dc: 'eu-1', rack: '7' });
      expect(config.enableProcessMetrics).toBe(false);
    });

    it('should reject a non-numeric port', () => {
      expect(() => ExporterConfig.fromEnv({ METRICS_PORT: 'http' })).toThrow('METRICS_PORT must be a valid integer');
    });

    it('should reject an out-of-range port', () => {
      expect(() => ExporterConfig.fromEnv({ METRICS_PORT: '70000' })).toThrow('Port must be between 1 and 65535');
    });

    it('should reject an unknown log level', () => {
      expect(() => ExporterConfig.fromEnv({ LOG_LEVEL: 'LOUD' })).toThrow(ConfigurationError);
    });

    it('should reject an unknown log format', () => {
      expect(() => ExporterConfig.fromEnv({ LOG_FORMAT: 'xml' })).toThrow('LOG_FORMAT must be "json" or "pretty"');
    });

    it('should reject a negative timeout', () => {
      expect(() => ExporterConfig.fromEnv({ COMMAND_TIMEOUT_MS: '-1' })).toThrow(
        'Command timeout must be a non-negative integer'
      );
    });

    it('should reject malformed global labels', () => {
      expect(() => ExporterConfig.fromEnv({ GLOBAL_LABELS: 'dc=eu-1' })).toThrow('GLOBAL_LABELS must be valid JSON');
      expect(() => ExporterConfig.fromEnv({ GLOBAL_LABELS: '["dc"]' })).toThrow('GLOBAL_LABELS must be a JSON object');
      expect(() => ExporterConfig.fromEnv({ GLOBAL_LABELS: '{"dc":{"a":1}}' })).toThrow(
        'GLOBAL_LABELS value of "dc" must be a string, number or boolean'
      );
      expect(() => ExporterConfig.fromEnv({ GLOBAL_LABELS: '{"__dc":"x"}' })).toThrow(
        'Invalid global labels: Invalid label name: __dc (reserved prefix)'
      );
    });
  });

  describe('builder', () => {
    it('should build a configuration', () => {
      const config = new ExporterConfigBuilder()
        .port(9200)
        .host('localhost')
        .path('/metrics')
        .configDir('jobs')
        .logLevel(LogLevel.Debug)
        .logFormat('json')
        .commandTimeoutMs(5000)
        .tickMs(100)
        .addGlobalLabel('dc', 'X')
        .addGlobalLabel('env', 'test')
        .enableProcessMetrics(false)
        .build();

      expect(config.port).toBe(9200);
      expect(config.host).toBe('localhost');
      expect(config.configDir).toBe('jobs');
      expect(config.logLevel).toBe(LogLevel.Debug);
      expect(config.commandTimeoutMs).toBe(5000);
      expect(config.tickMs).toBe(100);
      expect(config.globalLabels).toEqual({ dc: 'X', env: 'test' });
      expect(config.enableProcessMetrics).toBe(false);
    });

    it('should validate on build', () => {
      expect(() => new ExporterConfigBuilder().path('metrics').build()).toThrow('Metrics path must start with "/"');
      expect(() => new ExporterConfigBuilder().tickMs(0).build()).toThrow('Scheduler tick must be a positive integer');
      expect(() => new ExporterConfigBuilder().configDir(' ').build()).toThrow('Config directory is required');
    });

    it('should freeze global labels', () => {
      const config = new ExporterConfigBuilder().addGlobalLabel('dc', 'X').build();

      expect(Object.isFrozen(config.globalLabels)).toBe(true);
    });
  });
});
