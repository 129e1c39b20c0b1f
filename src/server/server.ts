/**
 * Fastify server setup for manual-metric.
 */

import Fastify, { type FastifyInstance } from 'fastify';
import type { ManualMetricConfig } from '../config/types.js';
import { isAuthEnabled } from '../config/loader.js';
import { TransportError, errorMessage } from '../common/errors.js';
import { serverLog } from '../common/logger.js';
import type { Measurement } from '../metrics/measurement.js';
import { registerBasicAuth } from './auth.js';
import { registerRoutes } from './routes.js';

/**
 * Options for creating a metric server.
 */
export interface MetricServerOptions {
  /** Full configuration */
  config: ManualMetricConfig;
  /** The measurement to expose, shared with the input loop */
  measurement: Measurement;
  /** Called when the listener fails after it started */
  onFatal?: (error: TransportError) => void;
}

/**
 * Metric server instance.
 */
export interface MetricServer {
  /** The Fastify instance */
  app: FastifyInstance;
  /** Start listening; resolves with the bound address */
  start(): Promise<string>;
  /** Stop the server */
  stop(): Promise<void>;
}

/**
 * Create the scrape server.
 */
export function createMetricServer(options: MetricServerOptions): MetricServer {
  const { config, measurement, onFatal } = options;

  serverLog('Creating metric server');

  const app = Fastify({
    logger: config.logging.level === 'debug',
    requestTimeout: config.server.requestTimeout,
  });

  if (isAuthEnabled(config)) {
    registerBasicAuth(app, {
      username: config.auth.username ?? '',
      password: config.auth.password ?? '',
    });
    serverLog('Basic authentication enabled');
  }

  registerRoutes(app, measurement, config.server.metricsPath);
  serverLog('Routes registered, metrics at %s', config.server.metricsPath);

  // Server control
  const start = async () => {
    let address: string;
    try {
      address = await app.listen({
        host: config.host,
        port: config.port,
      });
    } catch (err) {
      throw new TransportError(
        `Failed to listen on ${config.host}:${config.port}: ${errorMessage(err)}`,
        err
      );
    }
    serverLog('Server listening at %s', address);

    app.server.on('error', (err: Error) => {
      serverLog('Listener error: %O', err);
      onFatal?.(new TransportError(`HTTP listener failed: ${err.message}`, err));
    });

    return address;
  };

  const stop = async () => {
    serverLog('Stopping server');
    await app.close();
    serverLog('Server stopped');
  };

  return { app, start, stop };
}
