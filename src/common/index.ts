/**
 * Common utilities for manual-metric.
 */

export {
  createLogger,
  enableLogging,
  serverLog,
  httpLog,
  authLog,
  configLog,
  metricsLog,
  consoleLog,
} from './logger.js';

export {
  ManualMetricError,
  ConfigurationError,
  ParseError,
  AuthenticationError,
  TransportError,
  errorMessage,
} from './errors.js';
