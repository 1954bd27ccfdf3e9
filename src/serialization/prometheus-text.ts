import type { Labels, MetricFamilySnapshot, Sample } from '../types';

/** Content type of the text exposition format */
export const PROMETHEUS_CONTENT_TYPE = 'text/plain; version=0.0.4; charset=utf-8';

const HELP_ESCAPES: Record<string, string> = { '\\': '\\\\', '\n': '\\n' };
const LABEL_ESCAPES: Record<string, string> = { '\\': '\\\\', '\n': '\\n', '"': '\\"' };

/**
 * Renders registry snapshots in the Prometheus text exposition format v0.0.4.
 * See: https://prometheus.io/docs/instrumenting/exposition_formats/
 *
 * Each family is written as its HELP and TYPE lines followed by one line
 * per sample, then a blank line.
 */
export class PrometheusTextSerializer {
  serialize(families: readonly MetricFamilySnapshot[]): string {
    return families.map((family) => this.renderFamily(family).join('\n') + '\n\n').join('');
  }

  private renderFamily(family: MetricFamilySnapshot): string[] {
    return [
      `# HELP ${family.name} ${escapeHelpText(family.help)}`,
      `# TYPE ${family.name} ${family.type}`,
      ...family.samples.map((sample) => renderSample(family.name, sample)),
    ];
  }
}

function renderSample(name: string, sample: Sample): string {
  return `${name}${formatLabels(sample.labels)} ${formatValue(sample.value)}`;
}

/**
 * Escape backslashes and newlines of a HELP text.
 */
export function escapeHelpText(text: string): string {
  return text.replace(/[\\\n]/g, (char) => HELP_ESCAPES[char]);
}

/**
 * Escape backslashes, double quotes and newlines of a label value.
 */
export function escapeLabelValue(value: string): string {
  return value.replace(/[\\\n"]/g, (char) => LABEL_ESCAPES[char]);
}

/**
 * `{a="1",b="2"}` with keys sorted, or an empty string for no labels.
 */
export function formatLabels(labels: Labels): string {
  const pairs = Object.keys(labels)
    .sort()
    .map((key) => `${key}="${escapeLabelValue(labels[key])}"`);
  return pairs.length > 0 ? `{${pairs.join(',')}}` : '';
}

/**
 * Sample value as Prometheus spells it: `NaN`, `+Inf`, `-Inf` or a JS number.
 */
export function formatValue(value: number): string {
  if (Number.isNaN(value)) {
    return 'NaN';
  }
  if (value === Infinity) {
    return '+Inf';
  }
  if (value === -Infinity) {
    return '-Inf';
  }
  return String(value);
}
