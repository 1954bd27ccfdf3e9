import { formatError } from '../errors';
import { NoopLogger, type Logger } from '../observability';
import { PROMETHEUS_CONTENT_TYPE, PrometheusTextSerializer } from '../serialization';
import type { MetricFamilySnapshot } from '../types';
import { DEFAULT_COMPRESSION_THRESHOLD, acceptsGzip, compressIfNeeded, type EncodedBody } from './compression';

/**
 * Metrics request interface.
 */
export interface MetricsRequest {
  acceptEncoding?: string;
}

/**
 * Framework-agnostic response.
 */
export interface MetricsResponse {
  status: number;
  headers: Record<string, string>;
  body: string | Buffer;
}

/**
 * Handler configuration.
 */
export interface HandlerConfig {
  /** Bodies larger than this many bytes are gzipped when the client accepts it (default: 1024) */
  compressionThreshold?: number;
  logger?: Logger;
}

/**
 * Source of the families to expose, normally a {@link MetricRegistry}.
 */
export interface SnapshotSource {
  snapshot(): MetricFamilySnapshot[];
}

/**
 * HTTP handler for the metrics endpoint.
 */
export class MetricsHandler {
  private readonly registry: SnapshotSource;
  private readonly serializer: PrometheusTextSerializer;
  private readonly compressionThreshold: number;
  private readonly logger: Logger;

  constructor(registry: SnapshotSource, serializer = new PrometheusTextSerializer(), config: HandlerConfig = {}) {
    this.registry = registry;
    this.serializer = serializer;
    this.compressionThreshold = config.compressionThreshold ?? DEFAULT_COMPRESSION_THRESHOLD;
    this.logger = config.logger ?? new NoopLogger();
  }

  /**
   * Handle a metrics scrape request.
   */
  handle(request: MetricsRequest = {}): MetricsResponse {
    let content: string;
    try {
      content = this.serializer.serialize(this.registry.snapshot());
    } catch (error) {
      this.logger.error('Failed to render metrics', { error: formatError(error) });
      return {
        status: 500,
        headers: { 'Content-Type': 'text/plain' },
        body: `Error gathering metrics: ${error instanceof Error ? error.message : 'Unknown error'}`,
      };
    }

    const encoded: EncodedBody = acceptsGzip(request.acceptEncoding)
      ? compressIfNeeded(content, this.compressionThreshold)
      : { encoding: 'identity', data: content };

    const headers: Record<string, string> = { 'Content-Type': PROMETHEUS_CONTENT_TYPE };
    if (encoded.encoding === 'gzip') {
      headers['Content-Encoding'] = 'gzip';
      headers['Vary'] = 'Accept-Encoding';
    }

    return { status: 200, headers, body: encoded.data };
  }
}
