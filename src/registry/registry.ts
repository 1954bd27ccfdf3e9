import type { Collector, Labels, MetricFamilySnapshot } from '../types';
import { MetricKind } from '../types';
import { LabelMismatchError, RegistrationError, formatError } from '../errors';
import { NoopLogger, type Logger } from '../observability';
import { PrometheusTextSerializer } from '../serialization/prometheus-text';
import { MetricSeries, type SeriesOrigin } from './series';

export interface RegistryConfig {
  logger?: Logger;
}

const ORIGIN_NAMES: Readonly<Record<SeriesOrigin, string>> = {
  observed: 'job output',
  counted: 'an error counter',
};

/**
 * Central registry holding the latest value of every exported series.
 *
 * Series are created lazily by the first observation of a metric name and
 * are never deleted. All methods are synchronous: on the single JavaScript
 * thread an observation write or a snapshot read runs to completion before
 * any other registry call, so readers never see a partially written series.
 */
export class MetricRegistry {
  private readonly series: Map<string, MetricSeries> = new Map();
  private readonly collectors: Map<string, Collector> = new Map();
  private readonly logger: Logger;

  constructor(config: RegistryConfig = {}) {
    this.logger = config.logger ?? new NoopLogger();
  }

  /**
   * Record the latest value of one series.
   *
   * @throws LabelMismatchError if the label keys differ from the metric's canonical keys
   * @throws RegistrationError if the metric is registered with another kind,
   * is an error counter or belongs to a collector
   */
  observe(metricName: string, help: string, kind: MetricKind, labels: Labels, value: number): void {
    const series = this.reconcile(metricName, help, kind, 'observed', labels);
    series.set(labels, value);
  }

  /**
   * Add to a counter series, creating it at `amount` on first use.
   *
   * @throws LabelMismatchError if the label keys differ from the metric's canonical keys
   * @throws RegistrationError if the metric holds job output or belongs to a collector
   */
  increment(metricName: string, help: string, labels: Labels, amount: number = 1): void {
    if (amount < 0) {
      throw new RegistrationError('Counter cannot be decreased', metricName);
    }
    const series = this.reconcile(metricName, help, MetricKind.Counter, 'counted', labels);
    series.add(labels, amount);
  }

  /**
   * Register a collector whose families are appended to every snapshot.
   *
   * @throws RegistrationError if one of its family names is already in use
   */
  register(collector: Collector): void {
    if (this.collectors.has(collector.name)) {
      this.logger.warn('Collector already registered', { collector: collector.name });
      return;
    }
    for (const family of collector.describe()) {
      const owner = this.series.has(family) ? 'a recorded metric' : this.collectorOwning(family)?.name;
      if (owner !== undefined) {
        throw new RegistrationError(
          `Collector ${collector.name} cannot export ${family}: already used by ${owner}`,
          family
        );
      }
    }
    this.collectors.set(collector.name, collector);
  }

  /**
   * Unregister a collector.
   */
  unregister(name: string): boolean {
    return this.collectors.delete(name);
  }

  /**
   * Current value of one series, if it exists.
   */
  getValue(metricName: string, labels: Labels): number | undefined {
    const series = this.series.get(metricName);
    if (!series || !series.accepts(labels)) {
      return undefined;
    }
    return series.get(labels);
  }

  /**
   * Snapshot of a single metric family.
   */
  get(metricName: string): MetricFamilySnapshot | undefined {
    return this.series.get(metricName)?.collect();
  }

  /**
   * Consistent copy of every family, sorted by name.
   */
  snapshot(): MetricFamilySnapshot[] {
    const families: MetricFamilySnapshot[] = [];
    const names = new Set<string>();

    for (const series of this.series.values()) {
      families.push(series.collect());
      names.add(series.name);
    }

    for (const collector of this.collectors.values()) {
      try {
        for (const family of collector.collect()) {
          if (names.has(family.name)) {
            this.logger.error('Duplicate metric family skipped', {
              collector: collector.name,
              metric: family.name,
            });
            continue;
          }
          names.add(family.name);
          families.push(family);
        }
      } catch (error) {
        this.logger.error('Collector failed', {
          collector: collector.name,
          error: formatError(error),
        });
      }
    }

    families.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    return families;
  }

  /**
   * Get metrics as Prometheus text format.
   */
  metrics(): string {
    return new PrometheusTextSerializer().serialize(this.snapshot());
  }

  /**
   * Number of registered metric names (collectors excluded).
   */
  get size(): number {
    return this.series.size;
  }

  /**
   * Clear all series and collectors.
   */
  clear(): void {
    this.series.clear();
    this.collectors.clear();
  }

  private collectorOwning(metricName: string): Collector | undefined {
    for (const collector of this.collectors.values()) {
      if (collector.describe().includes(metricName)) {
        return collector;
      }
    }
    return undefined;
  }

  private reconcile(
    metricName: string,
    help: string,
    kind: MetricKind,
    origin: SeriesOrigin,
    labels: Labels
  ): MetricSeries {
    const existing = this.series.get(metricName);

    if (!existing) {
      const collector = this.collectorOwning(metricName);
      if (collector) {
        throw new RegistrationError(
          `Metric ${metricName} is exported by collector ${collector.name}`,
          metricName
        );
      }
      const created = new MetricSeries(metricName, help, kind, origin, Object.keys(labels));
      this.series.set(metricName, created);
      this.logger.debug('Registered metric', {
        metric: metricName,
        kind,
        labelNames: created.labelNames,
      });
      return created;
    }

    if (existing.kind !== kind) {
      throw new RegistrationError(
        `Metric ${metricName} already registered as ${existing.kind}, cannot record it as ${kind}`,
        metricName
      );
    }

    if (existing.origin !== origin) {
      throw new RegistrationError(
        `Metric ${metricName} already holds ${ORIGIN_NAMES[existing.origin]}, cannot record ${ORIGIN_NAMES[origin]} in it`,
        metricName
      );
    }

    if (!existing.accepts(labels)) {
      throw new LabelMismatchError(metricName, existing.labelNames, Object.keys(labels));
    }

    return existing;
  }
}
