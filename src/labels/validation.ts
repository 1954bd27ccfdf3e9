/**
 * Prometheus naming rules for metric and label names.
 */

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

const LABEL_NAME = /^[a-zA-Z_][a-zA-Z0-9_]*$/;
const METRIC_NAME = /^[a-zA-Z_:][a-zA-Z0-9_:]*$/;
const RESERVED_PREFIX = '__';

/**
 * `[a-zA-Z_][a-zA-Z0-9_]*`, without the reserved `__` prefix.
 *
 * @example
 * ```typescript
 * isValidLabelName('team')      // true
 * isValidLabelName('__address') // false
 * ```
 */
export function isValidLabelName(name: string): boolean {
  return !name.startsWith(RESERVED_PREFIX) && LABEL_NAME.test(name);
}

/**
 * `[a-zA-Z_:][a-zA-Z0-9_:]*`, e.g. `disk_free_bytes` or `node_cpu:rate`.
 */
export function isValidMetricName(name: string): boolean {
  return METRIC_NAME.test(name);
}

/**
 * Check every key of a label set; one message per invalid key.
 */
export function validateLabelSet(labels: Readonly<Record<string, string>>): ValidationResult {
  const errors = Object.keys(labels)
    .filter((key) => !isValidLabelName(key))
    .map((key) => `Invalid label name: ${describeInvalidName(key)}`);
  return { valid: errors.length === 0, errors };
}

function describeInvalidName(key: string): string {
  if (key.length === 0) {
    return 'empty string';
  }
  if (key.startsWith(RESERVED_PREFIX)) {
    return `${key} (reserved prefix)`;
  }
  if (!/^[a-zA-Z_]/.test(key)) {
    return `${key} (must start with letter or underscore)`;
  }
  return `${key} (contains invalid characters)`;
}
