/**
 * HTTP module: metrics and health handlers and the listener serving them.
 */

export { MetricsHandler, type MetricsRequest, type MetricsResponse, type HandlerConfig, type SnapshotSource } from './handler';
export { handleHealth, handleReady, type HealthResponse, type DispatchState } from './health';
export { compressIfNeeded, acceptsGzip, DEFAULT_COMPRESSION_THRESHOLD, type EncodedBody } from './compression';
export { MetricsServer, type MetricsServerConfig, type IncomingRequest } from './server';
