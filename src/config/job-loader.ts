/**
 * Loading of job-definition files.
 *
 * Every `*.json` file in the configuration directory holds a `scripts` list
 * and optional `global_labels`:
 *
 * ```json
 * {
 *   "global_labels": { "dc": "eu-1" },
 *   "scripts": [
 *     { "script": "/opt/checks/disk.sh", "params": ["-p", "/var"], "metric": "disk_free_bytes",
 *       "interval": 60, "HELP": "Free disk space", "TYPE": "gauge", "labels": { "team": "storage" } }
 *   ]
 * }
 * ```
 *
 * A broken file is skipped as a whole; a broken entry is skipped on its own.
 */

import { readdir, readFile } from 'fs/promises';
import { basename, join } from 'path';
import { z } from 'zod';
import { MetricKind, type Job, type Labels } from '../types';
import { ConfigurationError, formatError } from '../errors';
import { hasReservedLabel, isValidLabelName, isValidMetricName } from '../labels';
import { NoopLogger, type Logger } from '../observability';
import { defineJob } from './job-definition';

const labelNameSchema = z.string().refine(isValidLabelName, {
  message: 'label names must match [a-zA-Z_][a-zA-Z0-9_]* and not start with __',
});

const labelValueSchema = z
  .union([z.string(), z.number(), z.boolean()])
  .transform((value) => String(value));

const labelsSchema = z.record(labelNameSchema, labelValueSchema);

const intervalSchema = z
  .union([z.number(), z.string().trim().regex(/^\d+$/).transform(Number)])
  .pipe(z.number().int().positive());

const kindSchema = z
  .string()
  .transform((value) => value.toLowerCase())
  .pipe(z.nativeEnum(MetricKind));

/**
 * One entry of a file's `scripts` list
 */
export const scriptEntrySchema = z.object({
  script: z.string().trim().min(1),
  params: z.array(z.union([z.string(), z.number()])).optional(),
  metric: z.string().refine(isValidMetricName, {
    message: 'metric names must match [a-zA-Z_:][a-zA-Z0-9_:]*',
  }),
  interval: intervalSchema.optional(),
  HELP: z.string().min(1).optional(),
  TYPE: kindSchema.optional(),
  labels: labelsSchema.optional(),
  /** Seconds */
  timeout: z.number().positive().optional(),
});

export type ScriptEntry = z.infer<typeof scriptEntrySchema>;

/**
 * Top-level structure of a job-definition file
 */
export const jobFileSchema = z.object({
  global_labels: labelsSchema.optional(),
  scripts: z.array(z.unknown()),
});

export interface JobLoaderOptions {
  /** Process-wide labels, overlaid by each file's `global_labels` */
  defaultLabels?: Labels;
  logger?: Logger;
}

/**
 * Parse the text of one job-definition file.
 *
 * @param source - name used in job ids and log messages
 * @throws ConfigurationError if the text is not JSON or lacks a `scripts` list
 */
export function parseJobFile(content: string, source: string, options: JobLoaderOptions = {}): Job[] {
  const logger = options.logger ?? new NoopLogger();

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ConfigurationError(`Config file ${source} is not a valid JSON file`, {
      context: { source },
      cause: error instanceof Error ? error : undefined,
    });
  }

  const file = jobFileSchema.safeParse(raw);
  if (!file.success) {
    throw new ConfigurationError(`Config file ${source} does not have the proper structure`, {
      context: { source, issues: describeIssues(file.error) },
    });
  }

  const globalLabels: Labels = { ...options.defaultLabels, ...file.data.global_labels };
  if (hasReservedLabel(globalLabels)) {
    logger.warn('Found <component> label in global labels, it will be renamed to <user_defined_component>', {
      source,
    });
  }

  const jobs: Job[] = [];
  file.data.scripts.forEach((item, index) => {
    const id = `${source}:${index}`;
    const entry = scriptEntrySchema.safeParse(item);
    if (!entry.success) {
      logger.error('Skipping invalid script entry', { jobId: id, issues: describeIssues(entry.error) });
      return;
    }

    if (entry.data.labels && hasReservedLabel(entry.data.labels)) {
      logger.warn('Found <component> label defined in config file, it will be renamed to <user_defined_component>', {
        jobId: id,
      });
    }

    try {
      jobs.push(toJob(id, entry.data, globalLabels));
    } catch (error) {
      logger.error('Skipping invalid script entry', { jobId: id, error: formatError(error) });
    }
  });

  return jobs;
}

/**
 * Read and parse one file. Failures are logged and yield no jobs.
 */
export async function loadJobFile(path: string, options: JobLoaderOptions = {}): Promise<Job[]> {
  const logger = options.logger ?? new NoopLogger();

  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    logger.error('Cannot read config file', { path, error: formatError(error) });
    return [];
  }

  try {
    const jobs = parseJobFile(content, basename(path), options);
    logger.info('Loaded config file', { path, jobs: jobs.length });
    return jobs;
  } catch (error) {
    logger.error('Skipping config file', { path, error: formatError(error) });
    return [];
  }
}

/**
 * Load every `*.json` file of a directory, in lexical order.
 */
export async function loadJobs(directory: string, options: JobLoaderOptions = {}): Promise<Job[]> {
  const logger = options.logger ?? new NoopLogger();

  let names: string[];
  try {
    names = await readdir(directory);
  } catch (error) {
    logger.error('Cannot read config directory', { directory, error: formatError(error) });
    return [];
  }

  const files = names.filter((name) => name.endsWith('.json')).sort();
  const jobs: Job[] = [];
  for (const name of files) {
    jobs.push(...(await loadJobFile(join(directory, name), options)));
  }
  return jobs;
}

/**
 * Argv of an entry: `script` and `params` joined, then split on whitespace.
 */
export function buildCommand(script: string, params: ReadonlyArray<string | number> = []): string[] {
  return [script, ...params.map(String)]
    .join(' ')
    .split(/\s+/)
    .filter((part) => part.length > 0);
}

function toJob(id: string, entry: ScriptEntry, globalLabels: Labels): Job {
  return defineJob({
    id,
    command: buildCommand(entry.script, entry.params),
    metric: entry.metric,
    globalLabels,
    ...(entry.interval !== undefined ? { interval: entry.interval } : {}),
    ...(entry.HELP !== undefined ? { help: entry.HELP } : {}),
    ...(entry.TYPE !== undefined ? { kind: entry.TYPE } : {}),
    ...(entry.labels !== undefined ? { labels: entry.labels } : {}),
    ...(entry.timeout !== undefined ? { timeoutMs: Math.round(entry.timeout * 1000) } : {}),
  });
}

function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
}
