import type { Labels, MetricFamilySnapshot, MetricKind, Sample } from '../types';

/**
 * How a series is written: `observed` values come from job output, `counted`
 * series are error counters maintained by the exporter.
 */
export type SeriesOrigin = 'observed' | 'counted';

interface SeriesValue {
  labels: Labels;
  value: number;
}

/**
 * Schema and latest values of one metric name.
 *
 * The label keys of the first observation become canonical; every later
 * observation must carry exactly the same keys.
 */
export class MetricSeries {
  readonly name: string;
  readonly help: string;
  readonly kind: MetricKind;
  readonly origin: SeriesOrigin;
  /** Canonical label names, in the order of the first observation */
  readonly labelNames: readonly string[];
  private readonly signature: string;
  private readonly values: Map<string, SeriesValue> = new Map();

  constructor(
    name: string,
    help: string,
    kind: MetricKind,
    origin: SeriesOrigin,
    labelNames: readonly string[]
  ) {
    this.name = name;
    this.help = help;
    this.kind = kind;
    this.origin = origin;
    this.labelNames = [...labelNames];
    this.signature = labelSignature(labelNames);
  }

  /**
   * Whether a label set carries exactly the canonical keys.
   */
  accepts(labels: Labels): boolean {
    return labelSignature(Object.keys(labels)) === this.signature;
  }

  set(labels: Labels, value: number): void {
    const key = this.valueKey(labels);
    const existing = this.values.get(key);
    if (existing) {
      existing.value = value;
      return;
    }
    this.values.set(key, { labels: this.canonicalLabels(labels), value });
  }

  add(labels: Labels, amount: number): void {
    const key = this.valueKey(labels);
    const existing = this.values.get(key);
    if (existing) {
      existing.value += amount;
      return;
    }
    this.values.set(key, { labels: this.canonicalLabels(labels), value: amount });
  }

  get(labels: Labels): number | undefined {
    return this.values.get(this.valueKey(labels))?.value;
  }

  collect(): MetricFamilySnapshot {
    const samples: Sample[] = [];
    for (const entry of this.values.values()) {
      samples.push({ labels: { ...entry.labels }, value: entry.value });
    }
    return {
      name: this.name,
      help: this.help,
      type: this.kind,
      samples,
    };
  }

  private valueKey(labels: Labels): string {
    return this.labelNames.map((name) => labels[name]).join('\0');
  }

  private canonicalLabels(labels: Labels): Labels {
    const result: Labels = {};
    for (const name of this.labelNames) {
      result[name] = labels[name];
    }
    return result;
  }
}

/**
 * Order-independent identity of a set of label names.
 */
export function labelSignature(names: readonly string[]): string {
  return [...names].sort().join('\0');
}
