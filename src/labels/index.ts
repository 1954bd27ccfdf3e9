/**
 * Label utilities: resolution of per-observation label sets and name validation.
 */

export { resolveLabels, hasReservedLabel } from './resolver';
export {
  isValidLabelName,
  isValidMetricName,
  validateLabelSet,
  type ValidationResult,
} from './validation';
