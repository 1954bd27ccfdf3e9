/**
 * Process metrics collector - exposes the exporter's own CPU, memory and
 * file descriptor usage:
 * - process_cpu_user_seconds_total
 * - process_cpu_system_seconds_total
 * - process_resident_memory_bytes
 * - process_heap_bytes
 * - process_open_fds (Linux only)
 * - process_max_fds (Linux only)
 * - process_start_time_seconds
 */

import { readdirSync, readFileSync } from 'fs';
import { MetricKind, type Collector, type MetricFamilySnapshot } from '../types';

const FAMILY_SUFFIXES = [
  'cpu_user_seconds_total',
  'cpu_system_seconds_total',
  'resident_memory_bytes',
  'heap_bytes',
  'start_time_seconds',
  'open_fds',
  'max_fds',
] as const;

type FamilySuffix = (typeof FAMILY_SUFFIXES)[number];

/**
 * Process collector configuration.
 */
export interface ProcessCollectorConfig {
  /** Prefix for metric names (default: 'process') */
  prefix?: string;
  /** Directory exposing the process's file descriptors (default: /proc/self) */
  procDir?: string;
}

/**
 * Collector for process-level metrics, read at every snapshot.
 */
export class ProcessCollector implements Collector {
  readonly name = 'process';
  private readonly prefix: string;
  private readonly procDir: string;
  private readonly startTimeSeconds: number;

  constructor(config: ProcessCollectorConfig = {}) {
    this.prefix = config.prefix ?? 'process';
    this.procDir = config.procDir ?? '/proc/self';
    this.startTimeSeconds = Math.round(Date.now() / 1000 - process.uptime());
  }

  describe(): readonly string[] {
    return FAMILY_SUFFIXES.map((suffix) => `${this.prefix}_${suffix}`);
  }

  collect(): MetricFamilySnapshot[] {
    const cpu = process.cpuUsage();
    const memory = process.memoryUsage();

    const families: MetricFamilySnapshot[] = [
      this.family('cpu_user_seconds_total', 'Total user CPU time spent in seconds', MetricKind.Counter, cpu.user / 1e6),
      this.family('cpu_system_seconds_total', 'Total system CPU time spent in seconds', MetricKind.Counter, cpu.system / 1e6),
      this.family('resident_memory_bytes', 'Resident memory size in bytes', MetricKind.Gauge, memory.rss),
      this.family('heap_bytes', 'Process heap size in bytes', MetricKind.Gauge, memory.heapUsed),
      this.family(
        'start_time_seconds',
        'Start time of the process since unix epoch in seconds',
        MetricKind.Gauge,
        this.startTimeSeconds
      ),
    ];

    const openFds = this.readOpenFds();
    if (openFds !== undefined) {
      families.push(this.family('open_fds', 'Number of open file descriptors', MetricKind.Gauge, openFds));
    }

    const maxFds = this.readMaxFds();
    if (maxFds !== undefined) {
      families.push(this.family('max_fds', 'Maximum number of open file descriptors', MetricKind.Gauge, maxFds));
    }

    return families;
  }

  private family(suffix: FamilySuffix, help: string, type: MetricKind, value: number): MetricFamilySnapshot {
    return {
      name: `${this.prefix}_${suffix}`,
      help,
      type,
      samples: [{ labels: {}, value }],
    };
  }

  private readOpenFds(): number | undefined {
    if (process.platform !== 'linux') {
      return undefined;
    }
    try {
      return readdirSync(`${this.procDir}/fd`).length;
    } catch {
      // /proc not mounted
      return undefined;
    }
  }

  private readMaxFds(): number | undefined {
    if (process.platform !== 'linux') {
      return undefined;
    }
    try {
      const limits = readFileSync(`${this.procDir}/limits`, 'utf-8');
      const match = limits.match(/Max open files\s+(\d+)/);
      return match ? parseInt(match[1], 10) : undefined;
    } catch {
      return undefined;
    }
  }
}
