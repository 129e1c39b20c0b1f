/**
 * manual-metric - one hand-driven Prometheus metric behind a scrape endpoint.
 *
 * @example
 * ```typescript
 * import { createMetricServer, loadConfig, measurementFromConfig } from 'manual-metric';
 *
 * const config = loadConfig({ overrides: { metric: { type: 'histogram' } } });
 * const measurement = measurementFromConfig(config);
 * const server = createMetricServer({ config, measurement });
 * await server.start();
 * measurement.update('0.3');
 * ```
 */

// Configuration
export {
  type ManualMetricConfig,
  type PartialManualMetricConfig,
  type MetricSettings,
  type HistogramSettings,
  type AuthConfig,
  type ServerSettings,
  type LoggingConfig,
  DEFAULT_CONFIG,
  loadConfig,
  loadConfigFile,
  loadEnvConfig,
  resolveConfig,
  splitHostPort,
} from './config/index.js';

// Measurement core
export {
  type Measurement,
  type MeasurementOptions,
  type MeasurementSnapshot,
  type MetricDescriptor,
  type MetricKind,
  type HistogramType,
  type UpdateResult,
  GaugeMeasurement,
  CounterMeasurement,
  HistogramMeasurement,
  createMeasurement,
  measurementFromConfig,
  formatExposition,
  formatOpenMetrics,
  encodeMetricFamily,
  negotiateFormat,
  type ExpositionFormat,
  parseSample,
  DEFAULT_BUCKETS,
} from './metrics/index.js';

// Server
export {
  createMetricServer,
  type MetricServer,
  type MetricServerOptions,
} from './server/index.js';

// Console
export { InputLoop, type InputLoopOptions } from './console/index.js';

// Errors and logging
export {
  ManualMetricError,
  ConfigurationError,
  ParseError,
  AuthenticationError,
  TransportError,
  createLogger,
} from './common/index.js';

export {
  createProgram,
  runInteractive,
  type CliRuntime,
  type CliOptions,
  type InteractiveOptions,
  type InteractiveSession,
} from './cli.js';
