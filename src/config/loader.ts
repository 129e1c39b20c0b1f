/**
 * Configuration loading from multiple sources.
 *
 * Priority (highest to lowest):
 * 1. CLI arguments / programmatic overrides
 * 2. Environment variables
 * 3. Config file
 * 4. Defaults
 */

import { readFileSync, existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { ConfigurationError, ParseError } from '../common/errors.js';
import { configLog } from '../common/logger.js';
import { parseHistogramTypes, parseMetricKind, normalizeBuckets } from '../metrics/measurement.js';
import { validateNativeOptions } from '../metrics/native-histogram.js';
import { parseSample } from '../metrics/parse.js';
import type { NativeHistogramOptions } from '../metrics/types.js';
import { STATUS_PATH } from '../server/routes.js';
import {
  type LoggingConfig,
  type ManualMetricConfig,
  type PartialManualMetricConfig,
  ANY_ADDRESS,
  DEFAULT_CONFIG,
  DEFAULT_METRIC_IDENTITY,
  DEFAULT_PORT,
} from './types.js';

const DEFAULT_CONFIG_FILE = 'manual-metric.json';
const LOG_LEVELS: readonly LoggingConfig['level'][] = ['debug', 'info', 'warn', 'error'];

function isLogLevel(value: string): value is LoggingConfig['level'] {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

function parseLogLevel(value: string): LoggingConfig['level'] {
  if (!isLogLevel(value)) {
    throw new ConfigurationError(`unknown log level ${value}`);
  }
  return value;
}

/**
 * Parse a numeric setting.
 */
export function parseNumber(setting: string, text: string): number {
  try {
    return parseSample(text);
  } catch (err) {
    if (err instanceof ParseError) {
      throw new ConfigurationError(`${setting} must be a number, got ${JSON.stringify(text)}`, err);
    }
    throw err;
  }
}

/**
 * Parse a comma separated list of bucket bounds, e.g. "0.1,1,10".
 */
export function parseBucketList(text: string): number[] {
  return text.split(',').map(entry => parseNumber('bucket bound', entry));
}

/**
 * Split a `host:port` bind address.
 *
 * An empty host means any interface and resolves to 0.0.0.0; an empty port falls
 * back to the default. IPv6 hosts are written in brackets.
 */
export function splitHostPort(address: string): { host: string; port: number } {
  let host: string;
  let portText: string;

  if (address.startsWith('[')) {
    const end = address.indexOf(']');
    if (end < 0) {
      throw new ConfigurationError(`address ${address}: missing ']' in address`);
    }
    if (address[end + 1] !== ':') {
      throw new ConfigurationError(`address ${address}: missing port in address`);
    }
    host = address.slice(1, end);
    portText = address.slice(end + 2);
  } else {
    const colon = address.lastIndexOf(':');
    if (colon < 0) {
      throw new ConfigurationError(`address ${address}: missing port in address`);
    }
    host = address.slice(0, colon);
    portText = address.slice(colon + 1);
    if (host.includes(':')) {
      throw new ConfigurationError(`address ${address}: too many colons in address`);
    }
  }

  if (portText === '') {
    return { host: host || ANY_ADDRESS, port: DEFAULT_PORT };
  }
  const port = /^\d+$/.test(portText) ? parseInt(portText, 10) : NaN;
  if (!(port >= 0 && port <= 65535)) {
    throw new ConfigurationError(`address ${address}: invalid port ${portText}`);
  }
  return { host: host || ANY_ADDRESS, port };
}

function isNumberArray(value: unknown): value is number[] {
  return Array.isArray(value) && value.every(entry => typeof entry === 'number');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringField(source: Record<string, unknown>, key: string, path: string): string | undefined {
  const value = source[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'string') {
    throw new ConfigurationError(`config field ${path}${key} must be a string`);
  }
  return value;
}

function numberField(source: Record<string, unknown>, key: string, path: string): number | undefined {
  const value = source[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'number') {
    throw new ConfigurationError(`config field ${path}${key} must be a number`);
  }
  return value;
}

function section(source: Record<string, unknown>, key: string): Record<string, unknown> | undefined {
  const value = source[key];
  if (value === undefined) return undefined;
  if (!isRecord(value)) {
    throw new ConfigurationError(`config field ${key} must be an object`);
  }
  return value;
}

/**
 * Check the shape of a parsed config file and keep the known fields.
 */
export function readConfigObject(value: unknown): PartialManualMetricConfig {
  if (!isRecord(value)) {
    throw new ConfigurationError('config file must contain a JSON object');
  }

  const config: PartialManualMetricConfig = {
    bind: stringField(value, 'bind', ''),
    metricsPath: stringField(value, 'metricsPath', ''),
    requestTimeout: numberField(value, 'requestTimeout', ''),
  };

  const metric = section(value, 'metric');
  if (metric) {
    config.metric = {
      type: stringField(metric, 'type', 'metric.'),
      namespace: stringField(metric, 'namespace', 'metric.'),
      name: stringField(metric, 'name', 'metric.'),
      help: stringField(metric, 'help', 'metric.'),
    };
  }

  const histogram = section(value, 'histogram');
  if (histogram) {
    const rawTypes = histogram.types;
    const rawBuckets = histogram.buckets;
    let buckets: number[] | undefined;
    if (rawBuckets !== undefined) {
      if (!isNumberArray(rawBuckets)) {
        throw new ConfigurationError('config field histogram.buckets must be an array of numbers');
      }
      buckets = rawBuckets;
    }
    config.histogram = {
      types: Array.isArray(rawTypes) ? rawTypes.map(String).join(',') : stringField(histogram, 'types', 'histogram.'),
      buckets,
    };
    const native = section(histogram, 'native');
    if (native) {
      config.histogram.native = {
        bucketFactor: numberField(native, 'bucketFactor', 'histogram.native.'),
        maxBucketNumber: numberField(native, 'maxBucketNumber', 'histogram.native.'),
        minResetDuration: numberField(native, 'minResetDuration', 'histogram.native.'),
        zeroThreshold: numberField(native, 'zeroThreshold', 'histogram.native.'),
      };
    }
  }

  const auth = section(value, 'auth');
  if (auth) {
    config.auth = {
      username: stringField(auth, 'username', 'auth.'),
      password: stringField(auth, 'password', 'auth.'),
    };
  }

  const logging = section(value, 'logging');
  if (logging) {
    const level = stringField(logging, 'level', 'logging.');
    config.logging = {
      level: level === undefined ? undefined : parseLogLevel(level),
      namespaces: stringField(logging, 'namespaces', 'logging.'),
    };
  }

  return config;
}

/**
 * Load configuration from a JSON file.
 *
 * @throws ConfigurationError when the file is missing or not a JSON object
 */
export function loadConfigFile(configPath: string): PartialManualMetricConfig {
  const resolved = resolve(configPath);
  if (!existsSync(resolved)) {
    throw new ConfigurationError(`Config file not found: ${resolved}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(resolved, 'utf-8'));
  } catch (err) {
    configLog('Failed to parse config file %s: %O', resolved, err);
    throw new ConfigurationError(`Failed to parse config file: ${resolved}`, err);
  }
  configLog('Loaded config from %s', resolved);
  return readConfigObject(parsed);
}

/**
 * Load configuration from environment variables.
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): PartialManualMetricConfig {
  const config: PartialManualMetricConfig = {};

  if (env.MANUAL_METRIC_BIND) {
    config.bind = env.MANUAL_METRIC_BIND;
  }
  if (env.MANUAL_METRIC_METRICS_PATH) {
    config.metricsPath = env.MANUAL_METRIC_METRICS_PATH;
  }
  if (env.MANUAL_METRIC_TYPE) {
    config.metric = { type: env.MANUAL_METRIC_TYPE };
  }

  // Histogram
  if (env.MANUAL_METRIC_HISTOGRAM_TYPE) {
    config.histogram = { types: env.MANUAL_METRIC_HISTOGRAM_TYPE };
  }
  if (env.MANUAL_METRIC_BUCKETS) {
    config.histogram = config.histogram || {};
    config.histogram.buckets = parseBucketList(env.MANUAL_METRIC_BUCKETS);
  }
  const native: Partial<NativeHistogramOptions> = {};
  if (env.MANUAL_METRIC_NATIVE_BUCKET_FACTOR) {
    native.bucketFactor = parseNumber('native bucket factor', env.MANUAL_METRIC_NATIVE_BUCKET_FACTOR);
  }
  if (env.MANUAL_METRIC_NATIVE_MAX_BUCKETS) {
    native.maxBucketNumber = parseNumber('native max buckets', env.MANUAL_METRIC_NATIVE_MAX_BUCKETS);
  }
  if (env.MANUAL_METRIC_NATIVE_MIN_RESET) {
    native.minResetDuration = parseNumber('native min reset', env.MANUAL_METRIC_NATIVE_MIN_RESET) * 1000;
  }
  if (Object.keys(native).length > 0) {
    config.histogram = config.histogram || {};
    config.histogram.native = native;
  }

  // Auth
  if (env.MANUAL_METRIC_USERNAME) {
    config.auth = { username: env.MANUAL_METRIC_USERNAME };
  }
  if (env.MANUAL_METRIC_PASSWORD) {
    config.auth = config.auth || {};
    config.auth.password = env.MANUAL_METRIC_PASSWORD;
  }

  // Logging
  if (env.MANUAL_METRIC_LOG_LEVEL) {
    config.logging = { level: parseLogLevel(env.MANUAL_METRIC_LOG_LEVEL) };
  }

  return config;
}

/**
 * Deep merge configuration objects. Undefined fields never override a lower source.
 */
export function mergeConfig(
  base: PartialManualMetricConfig,
  ...overrides: PartialManualMetricConfig[]
): PartialManualMetricConfig {
  let result: PartialManualMetricConfig = { ...base };

  for (const override of overrides) {
    const { metric, histogram, auth, logging } = result;
    const native = histogram?.native;

    result = {
      bind: override.bind ?? result.bind,
      metricsPath: override.metricsPath ?? result.metricsPath,
      requestTimeout: override.requestTimeout ?? result.requestTimeout,
      metric: {
        type: override.metric?.type ?? metric?.type,
        namespace: override.metric?.namespace ?? metric?.namespace,
        name: override.metric?.name ?? metric?.name,
        help: override.metric?.help ?? metric?.help,
      },
      histogram: {
        types: override.histogram?.types ?? histogram?.types,
        buckets: override.histogram?.buckets ?? histogram?.buckets,
        native: {
          bucketFactor: override.histogram?.native?.bucketFactor ?? native?.bucketFactor,
          maxBucketNumber: override.histogram?.native?.maxBucketNumber ?? native?.maxBucketNumber,
          minResetDuration: override.histogram?.native?.minResetDuration ?? native?.minResetDuration,
          zeroThreshold: override.histogram?.native?.zeroThreshold ?? native?.zeroThreshold,
        },
      },
      auth: {
        username: override.auth?.username ?? auth?.username,
        password: override.auth?.password ?? auth?.password,
      },
      logging: {
        level: override.logging?.level ?? logging?.level,
        namespaces: override.logging?.namespaces ?? logging?.namespaces,
      },
    };
  }

  return result;
}

/**
 * Validate merged configuration.
 *
 * @throws ConfigurationError on the first invalid setting
 */
export function resolveConfig(raw: PartialManualMetricConfig): ManualMetricConfig {
  const { host, port } = splitHostPort(raw.bind ?? DEFAULT_CONFIG.bind);

  const type = parseMetricKind(raw.metric?.type ?? DEFAULT_CONFIG.metric.type);
  const identity = DEFAULT_METRIC_IDENTITY[type];

  const rawNative = raw.histogram?.native;
  const defaults = DEFAULT_CONFIG.histogram.native;
  const native: NativeHistogramOptions = {
    bucketFactor: rawNative?.bucketFactor ?? defaults.bucketFactor,
    maxBucketNumber: rawNative?.maxBucketNumber ?? defaults.maxBucketNumber,
    minResetDuration: rawNative?.minResetDuration ?? defaults.minResetDuration,
    zeroThreshold: rawNative?.zeroThreshold,
  };
  validateNativeOptions(native);

  const metricsPath = raw.metricsPath ?? DEFAULT_CONFIG.metricsPath;
  if (!metricsPath.startsWith('/')) {
    throw new ConfigurationError(`metrics path must start with '/', got ${metricsPath}`);
  }
  if (metricsPath === STATUS_PATH) {
    throw new ConfigurationError(`metrics path ${STATUS_PATH} is reserved for the status route`);
  }

  const requestTimeout = raw.requestTimeout ?? DEFAULT_CONFIG.requestTimeout;
  if (!Number.isInteger(requestTimeout) || requestTimeout < 0) {
    throw new ConfigurationError(`request timeout must be a non-negative integer, got ${requestTimeout}`);
  }

  return {
    host,
    port,
    server: { metricsPath, requestTimeout },
    metric: {
      type,
      namespace: raw.metric?.namespace ?? identity.namespace,
      name: raw.metric?.name ?? identity.name,
      help: raw.metric?.help ?? identity.help,
    },
    histogram: {
      types: parseHistogramTypes(raw.histogram?.types ?? DEFAULT_CONFIG.histogram.types),
      buckets: normalizeBuckets(raw.histogram?.buckets ?? DEFAULT_CONFIG.histogram.buckets),
      native,
    },
    auth: {
      username: raw.auth?.username,
      password: raw.auth?.password,
    },
    logging: {
      level: raw.logging?.level ?? DEFAULT_CONFIG.logging.level,
      namespaces: raw.logging?.namespaces,
    },
  };
}

/**
 * Load full configuration from all sources.
 */
export function loadConfig(options: {
  configPath?: string;
  overrides?: PartialManualMetricConfig;
  env?: NodeJS.ProcessEnv;
} = {}): ManualMetricConfig {
  const sources: PartialManualMetricConfig[] = [];

  // Load from file if specified or default exists
  const configPath = options.configPath || DEFAULT_CONFIG_FILE;
  if (options.configPath || existsSync(configPath)) {
    sources.push(loadConfigFile(configPath));
  }

  // Load from environment
  sources.push(loadEnvConfig(options.env));

  // Apply programmatic overrides
  if (options.overrides) {
    sources.push(options.overrides);
  }

  const config = resolveConfig(mergeConfig(DEFAULT_CONFIG, ...sources));
  configLog('Final config: %O', { ...config, auth: { enabled: isAuthEnabled(config) } });

  return config;
}

/**
 * Basic auth is active only when both username and password are set.
 */
export function isAuthEnabled(config: Pick<ManualMetricConfig, 'auth'>): boolean {
  return Boolean(config.auth.username) && Boolean(config.auth.password);
}
