/**
 * HTTP listener exposing the metrics, health and readiness endpoints.
 */

import http from 'http';
import type { AddressInfo } from 'net';
import { formatError } from '../errors';
import { NoopLogger, type Logger } from '../observability';
import { MetricsHandler, type MetricsResponse, type SnapshotSource } from './handler';
import { handleHealth, handleReady, type DispatchState } from './health';

export interface MetricsServerConfig {
  registry: SnapshotSource;
  /** Readiness source, normally the scheduler */
  readiness: DispatchState;
  port?: number;
  host?: string;
  /** Path of the metrics endpoint (default: /metrics) */
  path?: string;
  compressionThreshold?: number;
  logger?: Logger;
}

/**
 * Request attributes the router looks at.
 */
export interface IncomingRequest {
  method?: string;
  url?: string;
  acceptEncoding?: string;
}

export class MetricsServer {
  private readonly handler: MetricsHandler;
  private readonly readiness: DispatchState;
  private readonly port: number;
  private readonly host: string;
  private readonly path: string;
  private readonly logger: Logger;
  private server: http.Server | null = null;

  constructor(config: MetricsServerConfig) {
    this.logger = config.logger ?? new NoopLogger();
    this.handler = new MetricsHandler(config.registry, undefined, {
      compressionThreshold: config.compressionThreshold,
      logger: this.logger,
    });
    this.readiness = config.readiness;
    this.port = config.port ?? 8000;
    this.host = config.host ?? '0.0.0.0';
    this.path = config.path ?? '/metrics';
  }

  /**
   * Route one request to its endpoint.
   */
  route(request: IncomingRequest): MetricsResponse {
    if (request.method !== 'GET') {
      return {
        status: 405,
        headers: { 'Content-Type': 'text/plain', Allow: 'GET' },
        body: 'Method Not Allowed',
      };
    }

    const pathname = (request.url ?? '/').split('?')[0];
    switch (pathname) {
      case this.path:
        return this.handler.handle({ acceptEncoding: request.acceptEncoding });
      case '/health':
        return handleHealth();
      case '/ready':
        return handleReady(this.readiness);
      default:
        return {
          status: 404,
          headers: { 'Content-Type': 'text/plain' },
          body: 'Not Found',
        };
    }
  }

  /**
   * Start listening; resolves with the bound address.
   */
  listen(): Promise<AddressInfo> {
    if (this.server) {
      return Promise.reject(new Error('Metrics server is already listening'));
    }

    const server = http.createServer((req, res) => {
      const response = this.route({
        method: req.method,
        url: req.url,
        acceptEncoding: req.headers['accept-encoding'],
      });
      this.logger.trace('HTTP request', { method: req.method, url: req.url, status: response.status });
      res.writeHead(response.status, response.headers);
      res.end(response.body);
    });
    server.on('clientError', (error, socket) => {
      this.logger.debug('HTTP client error', { error: formatError(error) });
      socket.destroy();
    });
    this.server = server;

    return new Promise((resolve, reject) => {
      server.once('error', (error) => {
        this.server = null;
        reject(error);
      });
      server.listen(this.port, this.host, () => {
        const address = server.address();
        if (address === null || typeof address === 'string') {
          reject(new Error('Metrics server has no TCP address'));
          return;
        }
        this.logger.info('Metrics server listening', {
          host: address.address,
          port: address.port,
          path: this.path,
        });
        resolve(address);
      });
    });
  }

  /**
   * Stop accepting connections and wait for open ones to end.
   */
  close(): Promise<void> {
    const server = this.server;
    if (!server) {
      return Promise.resolve();
    }
    this.server = null;

    return new Promise((resolve, reject) => {
      server.close((error) => {
        if (error) {
          reject(error);
          return;
        }
        this.logger.info('Metrics server closed');
        resolve();
      });
      server.closeIdleConnections();
    });
  }

  get isListening(): boolean {
    return this.server !== null;
  }
}
