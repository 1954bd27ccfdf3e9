/**
 * Core type definitions for the command exporter.
 *
 * Defines jobs, observations, parsed command output and the snapshot
 * structures handed to the exposition layer.
 */

/**
 * Label types - key-value pairs for metric dimensions
 */
export type Labels = Record<string, string>;

/**
 * Metric kinds a job may declare
 */
export enum MetricKind {
  Gauge = 'gauge',
  Counter = 'counter',
}

/**
 * A configured external command with its own interval and metric identity.
 */
export interface Job {
  /** Stable identifier, `<file>:<index>` for jobs loaded from files */
  readonly id: string;
  /** Program followed by its arguments */
  readonly command: readonly string[];
  /** Seconds between two runs */
  readonly interval: number;
  /** Metric name (must match [a-zA-Z_:][a-zA-Z0-9_:]*) */
  readonly metric: string;
  readonly help: string;
  readonly kind: MetricKind;
  /** Static labels declared on the job itself */
  readonly labels: Readonly<Labels>;
  /** Global labels in effect for this job (process defaults overlaid by file globals) */
  readonly globalLabels: Readonly<Labels>;
  /** Per-job timeout in milliseconds; falls back to the executor default */
  readonly timeoutMs?: number;
}

/**
 * One (component, value) result from a single job execution.
 */
export interface Observation {
  component: string;
  value: number;
}

/**
 * Classification of a command's captured stdout.
 */
export type ParsedOutput =
  | { kind: 'numeric'; value: number }
  | { kind: 'labelled'; values: Array<[string, number]> }
  | { kind: 'parse-failure'; reason: string };

/**
 * A single labelled value inside a family snapshot.
 */
export interface Sample {
  labels: Labels;
  value: number;
}

/**
 * Read-only copy of one metric family, as handed to readers.
 */
export interface MetricFamilySnapshot {
  name: string;
  help: string;
  type: MetricKind;
  samples: Sample[];
}

/**
 * Source of extra families appended to every registry snapshot.
 */
export interface Collector {
  /** Name used in logs when the collector fails */
  readonly name: string;
  /** Names of every family `collect` may return */
  describe(): readonly string[];
  collect(): MetricFamilySnapshot[];
}

/**
 * Type for operation results.
 */
export type Result<T, E> =
  | { success: true; data: T }
  | { success: false; error: E };

/**
 * Creates a successful result.
 */
export function ok<T>(data: T): Result<T, never> {
  return { success: true, data };
}

/**
 * Creates a failed result.
 */
export function err<E>(error: E): Result<never, E> {
  return { success: false, error };
}

/** Component assigned to scalar command output */
export const MAIN_COMPONENT = 'main';

/** Runtime label carrying the observation's component */
export const COMPONENT_LABEL = 'component';

/** Name a user-supplied `component` label is moved to */
export const USER_COMPONENT_LABEL = 'user_defined_component';

/** Seconds between runs when a job does not set an interval */
export const DEFAULT_INTERVAL_SECONDS = 600;

/** Help text used when a job does not set one */
export const DEFAULT_METRIC_HELP = 'Generic metric HELP';
