import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { buildCommand, loadJobFile, loadJobs, parseJobFile } from '../job-loader';
import { ConfigurationError } from '../../errors';
import { InMemoryLogger, LogLevel } from '../../observability';
import { MetricKind } from '../../types';

const sampleFile = JSON.stringify({
  global_labels: { dc: 'eu-1', region: 'us' },
  scripts: [
    {
      script: '/opt/checks/disk.sh',
      params: ['-p', '/var'],
      metric: 'disk_free_bytes',
      interval: 60,
      HELP: 'Free disk space',
      TYPE: 'GAUGE',
      labels: { team: 'storage', replicas: 3, primary: true },
      timeout: 30,
    },
    { script: '/opt/checks/up.sh', metric: 'service_up' },
    { script: '', metric: 'empty_script' },
    { script: 'check', metric: 'bad-name' },
    { script: 'echo 1', params: [2], metric: 'echo_value', interval: '120', TYPE: 'counter' },
  ],
});

describe('parseJobFile', () => {
  let logger: InMemoryLogger;

  beforeEach(() => {
    logger = new InMemoryLogger();
  });

  it('should build jobs from valid entries and skip invalid ones', () => {
    const jobs = parseJobFile(sampleFile, 'disk.json', { logger });

    expect(jobs.map((job) => job.id)).toEqual(['disk.json:0', 'disk.json:1', 'disk.json:4']);
    expect(logger.getLogsByLevel(LogLevel.Error).map((entry) => entry.context['jobId'])).toEqual([
      'disk.json:2',
      'disk.json:3',
    ]);
  });

  it('should map every field of an entry', () => {
    const [disk] = parseJobFile(sampleFile, 'disk.json', { logger });

    expect(disk).toEqual({
      id: 'disk.json:0',
      command: ['/opt/checks/disk.sh', '-p', '/var'],
      interval: 60,
      metric: 'disk_free_bytes',
      help: 'Free disk space',
      kind: MetricKind.Gauge,
      labels: { team: 'storage', replicas: '3', primary: 'true' },
      globalLabels: { dc: 'eu-1', region: 'us' },
      timeoutMs: 30000,
    });
  });

  it('should apply defaults to omitted fields', () => {
    const jobs = parseJobFile(sampleFile, 'disk.json', { logger });
    const up = jobs[1];

    expect(up.interval).toBe(600);
    expect(up.help).toBe('Generic metric HELP');
    expect(up.kind).toBe(MetricKind.Gauge);
    expect(up.labels).toEqual({});
    expect(up.timeoutMs).toBeUndefined();
  });

  it('should accept numeric strings as intervals and split script text', () => {
    const jobs = parseJobFile(sampleFile, 'disk.json', { logger });
    const echo = jobs[2];

    expect(echo.command).toEqual(['echo', '1', '2']);
    expect(echo.interval).toBe(120);
    expect(echo.kind).toBe(MetricKind.Counter);
  });

  it('should overlay file global labels on default labels', () => {
    const [disk] = parseJobFile(sampleFile, 'disk.json', { defaultLabels: { region: 'eu', host: 'a1' } });

    expect(disk.globalLabels).toEqual({ region: 'us', host: 'a1', dc: 'eu-1' });
  });

  it('should skip entries with an invalid interval', () => {
    const content = JSON.stringify({
      scripts: [
        { script: 'a', metric: 'a', interval: 0 },
        { script: 'b', metric: 'b', interval: '10s' },
        { script: 'c', metric: 'c', interval: 2.5 },
      ],
    });

    expect(parseJobFile(content, 'f.json', { logger })).toEqual([]);
    expect(logger.getLogsByLevel(LogLevel.Error)).toHaveLength(3);
  });

  it('should skip entries with an unknown type', () => {
    const content = JSON.stringify({ scripts: [{ script: 'a', metric: 'a', TYPE: 'histogram' }] });

    expect(parseJobFile(content, 'f.json', { logger })).toEqual([]);
  });

  it('should warn about component labels', () => {
    const content = JSON.stringify({
      global_labels: { component: 'shared' },
      scripts: [{ script: 'a', metric: 'a', labels: { component: 'custom' } }],
    });

    const jobs = parseJobFile(content, 'f.json', { logger });

    expect(jobs).toHaveLength(1);
    expect(logger.getLogsByLevel(LogLevel.Warn).map((entry) => entry.message)).toEqual([
      'Found <component> label in global labels, it will be renamed to <user_defined_component>',
      'Found <component> label defined in config file, it will be renamed to <user_defined_component>',
    ]);
  });

  it('should reject text that is not JSON', () => {
    expect(() => parseJobFile('{ scripts: ', 'broken.json')).toThrow(
      new ConfigurationError('Config file broken.json is not a valid JSON file')
    );
  });

  it('should reject a file without a scripts list', () => {
    expect(() => parseJobFile('{"scripts": {}}', 'shape.json')).toThrow(
      'Config file shape.json does not have the proper structure'
    );
    expect(() => parseJobFile('[]', 'shape.json')).toThrow(ConfigurationError);
  });

  it('should reject invalid global label names', () => {
    expect(() => parseJobFile('{"global_labels": {"bad-name": "x"}, "scripts": []}', 'g.json')).toThrow(
      ConfigurationError
    );
  });
});

describe('loadJobs', () => {
  let directory: string;
  let logger: InMemoryLogger;

  beforeEach(() => {
    directory = mkdtempSync(join(tmpdir(), 'command-exporter-'));
    logger = new InMemoryLogger();
  });

  afterEach(() => {
    rmSync(directory, { recursive: true, force: true });
  });

  it('should load every json file in lexical order', async () => {
    writeFileSync(join(directory, 'c.json'), JSON.stringify({ scripts: [{ script: 'c', metric: 'c' }] }));
    writeFileSync(join(directory, 'a.json'), JSON.stringify({ scripts: [{ script: 'a', metric: 'a' }] }));
    writeFileSync(join(directory, 'b.json'), '{ not json');
    writeFileSync(join(directory, 'notes.txt'), 'ignored');

    const jobs = await loadJobs(directory, { logger });

    expect(jobs.map((job) => job.id)).toEqual(['a.json:0', 'c.json:0']);
    expect(logger.getLogsByLevel(LogLevel.Info).map((entry) => entry.message)).toEqual([
      'Loaded config file',
      'Loaded config file',
    ]);
    expect(logger.getLogsByLevel(LogLevel.Error).map((entry) => entry.message)).toEqual(['Skipping config file']);
  });

  it('should return no jobs for a missing directory', async () => {
    const jobs = await loadJobs(join(directory, 'missing'), { logger });

    expect(jobs).toEqual([]);
    expect(logger.getLogsByLevel(LogLevel.Error)[0].message).toBe('Cannot read config directory');
  });

  it('should return no jobs for an unreadable file', async () => {
    const jobs = await loadJobFile(join(directory, 'absent.json'), { logger });

    expect(jobs).toEqual([]);
    expect(logger.getLogsByLevel(LogLevel.Error)[0].message).toBe('Cannot read config file');
  });
});

describe('buildCommand', () => {
  it('should join script and params and split on whitespace', () => {
    expect(buildCommand('/opt/check.sh  --mode fast', ['-n', 3, ' x '])).toEqual([
      '/opt/check.sh',
      '--mode',
      'fast',
      '-n',
      '3',
      'x',
    ]);
  });

  it('should accept a script without params', () => {
    expect(buildCommand('uptime')).toEqual(['uptime']);
  });
});
