/**
 * Configuration module exports.
 */

export {
  type ManualMetricConfig,
  type PartialManualMetricConfig,
  type MetricSettings,
  type HistogramSettings,
  type AuthConfig,
  type ServerSettings,
  type LoggingConfig,
  DEFAULT_CONFIG,
  DEFAULT_METRIC_IDENTITY,
  DEFAULT_PORT,
  ANY_ADDRESS,
} from './types.js';

export {
  loadConfig,
  loadConfigFile,
  loadEnvConfig,
  readConfigObject,
  mergeConfig,
  resolveConfig,
  splitHostPort,
  parseNumber,
  parseBucketList,
  isAuthEnabled,
} from './loader.js';
