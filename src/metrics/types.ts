/**
 * Metrics types and interfaces.
 */

import type { ParseError } from '../common/errors.js';

/** The kinds of measurement that can be driven by hand. */
export type MetricKind = 'gauge' | 'counter' | 'histogram';

/** Histogram bucketing strategies; both may be active at once. */
export type HistogramType = 'classic' | 'native';

export const METRIC_KINDS: readonly MetricKind[] = ['gauge', 'counter', 'histogram'];
export const HISTOGRAM_TYPES: readonly HistogramType[] = ['classic', 'native'];

/**
 * Labels for identifying a metric.
 */
export interface MetricLabels {
  [key: string]: string;
}

/**
 * Immutable identity of the single exported measurement.
 */
export interface MetricDescriptor {
  readonly namespace: string;
  readonly name: string;
  readonly help: string;
  readonly constLabels: Readonly<MetricLabels>;
}

/**
 * Histogram bucket for classic (cumulative) histograms.
 */
export interface HistogramBucket {
  readonly le: number; // "less than or equal"
  readonly count: number;
}

/**
 * One populated native bucket. Counts are per bucket, not cumulative.
 */
export interface NativeBucketSpan {
  readonly index: number;
  readonly count: number;
}

/**
 * Native (exponential) histogram settings.
 */
export interface NativeHistogramOptions {
  /** Maximum growth factor between adjacent bucket boundaries; must be > 1 */
  bucketFactor: number;
  /** Upper limit on populated buckets; 0 disables the limit */
  maxBucketNumber: number;
  /** Minimum time in ms between resets forced by the bucket limit; 0 never resets */
  minResetDuration: number;
  /** Observations with an absolute value at or below this land in the zero bucket */
  zeroThreshold?: number;
}

export interface NativeHistogramSnapshot {
  readonly schema: number;
  readonly zeroThreshold: number;
  readonly zeroCount: number;
  readonly positive: readonly NativeBucketSpan[];
  readonly negative: readonly NativeBucketSpan[];
}

export interface GaugeSnapshot {
  readonly kind: 'gauge';
  readonly value: number;
}

export interface CounterSnapshot {
  readonly kind: 'counter';
  readonly value: number;
}

export interface HistogramSnapshot {
  readonly kind: 'histogram';
  /** Classic buckets, cumulative, in increasing `le` order (without +Inf) */
  readonly buckets: readonly HistogramBucket[];
  readonly sum: number;
  readonly count: number;
  readonly native?: NativeHistogramSnapshot;
}

export type MeasurementSnapshot = GaugeSnapshot | CounterSnapshot | HistogramSnapshot;

/**
 * Outcome of feeding one line of operator text to a measurement.
 */
export type UpdateResult<S extends MeasurementSnapshot> =
  | { readonly ok: true; readonly value: number; readonly snapshot: S }
  | { readonly ok: false; readonly error: ParseError };

interface MeasurementOptionsBase {
  descriptor: MetricDescriptor;
}

export interface GaugeOptions extends MeasurementOptionsBase {
  kind: 'gauge';
}

export interface CounterOptions extends MeasurementOptionsBase {
  kind: 'counter';
  /** Time source for the creation timestamp, in ms */
  clock?: () => number;
}

export interface HistogramOptions extends MeasurementOptionsBase {
  kind: 'histogram';
  /** Classic bucket upper bounds */
  buckets?: readonly number[];
  /** Native bucketing; omitted for classic-only histograms */
  native?: NativeHistogramOptions;
  /** Time source for the creation timestamp and native resets, in ms */
  clock?: () => number;
}

export type MeasurementOptions = GaugeOptions | CounterOptions | HistogramOptions;

/**
 * Default classic histogram buckets (in seconds).
 */
export const DEFAULT_BUCKETS: readonly number[] = [
  0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10,
];

/**
 * Native bucketing used when the native histogram type is selected without overrides.
 */
export const DEFAULT_NATIVE_OPTIONS: Readonly<NativeHistogramOptions> = {
  bucketFactor: 1.1,
  maxBucketNumber: 100,
  minResetDuration: 60 * 60 * 1000, // 1 hour
};

/** 2^-128 */
export const DEFAULT_NATIVE_ZERO_THRESHOLD = 2.938735877055719e-39;
