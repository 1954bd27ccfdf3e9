/**
 * Serialization module for the Prometheus text format.
 */

export {
  PrometheusTextSerializer,
  PROMETHEUS_CONTENT_TYPE,
  escapeHelpText,
  escapeLabelValue,
  formatLabels,
  formatValue,
} from './prometheus-text';
