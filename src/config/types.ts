/**
 * Configuration types for manual-metric.
 */

import {
  type HistogramType,
  type MetricKind,
  type NativeHistogramOptions,
  DEFAULT_BUCKETS,
  DEFAULT_NATIVE_OPTIONS,
} from '../metrics/types.js';

/** Port used when the bind address leaves it empty. */
export const DEFAULT_PORT = 5001;

/** Address used for "any interface" so labels stay meaningful. */
export const ANY_ADDRESS = '0.0.0.0';

/**
 * Identity of the exported metric.
 */
export interface MetricSettings {
  type: MetricKind;
  namespace: string;
  name: string;
  help: string;
}

/**
 * Histogram bucketing.
 */
export interface HistogramSettings {
  /** Active bucketing strategies */
  types: HistogramType[];
  /** Classic bucket upper bounds */
  buckets: number[];
  native: NativeHistogramOptions;
}

/**
 * Basic authentication; enabled only when both fields are non-empty.
 */
export interface AuthConfig {
  username?: string;
  password?: string;
}

export interface ServerSettings {
  /** Path of the scrape endpoint */
  metricsPath: string;
  /** Upper bound on one request's lifetime in ms */
  requestTimeout: number;
}

/**
 * Logging configuration.
 */
export interface LoggingConfig {
  /** Log level */
  level: 'debug' | 'info' | 'warn' | 'error';
  /** Debug namespace filter (e.g., 'manual-metric:*') */
  namespaces?: string;
}

/**
 * Full, validated configuration.
 */
export interface ManualMetricConfig {
  // Server settings
  /** Resolved host to bind to; never empty */
  host: string;
  /** Resolved port to listen on */
  port: number;
  server: ServerSettings;

  // Measurement
  metric: MetricSettings;
  histogram: HistogramSettings;

  // Authentication
  auth: AuthConfig;

  // Logging
  logging: LoggingConfig;
}

/** Default name and help text per metric kind. */
export const DEFAULT_METRIC_IDENTITY: Readonly<Record<MetricKind, Omit<MetricSettings, 'type'>>> = {
  gauge: {
    namespace: 'manual',
    name: 'gauge',
    help: 'This is my manual gauge',
  },
  counter: {
    namespace: 'manual',
    name: 'counter_total',
    help: 'This is a manual counter',
  },
  histogram: {
    namespace: 'http',
    name: 'request_seconds',
    help: 'This is a histogram with manually selected parameters',
  },
};

/**
 * Unvalidated configuration as it arrives from files, environment and CLI.
 * Strings are kept raw until `resolveConfig` checks them.
 */
export type PartialManualMetricConfig = {
  /** `host:port`, either side may be empty */
  bind?: string;
  metricsPath?: string;
  requestTimeout?: number;
  metric?: {
    type?: string;
    namespace?: string;
    name?: string;
    help?: string;
  };
  histogram?: {
    /** Comma separated, e.g. "classic,native" */
    types?: string;
    buckets?: number[];
    native?: Partial<NativeHistogramOptions>;
  };
  auth?: Partial<AuthConfig>;
  logging?: Partial<LoggingConfig>;
};

/**
 * Default raw configuration values.
 */
export const DEFAULT_CONFIG = {
  bind: `:${DEFAULT_PORT}`,
  metricsPath: '/metrics',
  requestTimeout: 30_000,
  metric: {
    type: 'gauge',
  },
  histogram: {
    types: 'classic',
    buckets: [...DEFAULT_BUCKETS],
    native: { ...DEFAULT_NATIVE_OPTIONS },
  },
  auth: {},
  logging: {
    level: 'info',
  },
} satisfies PartialManualMetricConfig;
