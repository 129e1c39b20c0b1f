/**
 * The single manually driven measurement: a gauge, a counter or a histogram.
 *
 * Every mutation is synchronous, so one update (all histogram fields included)
 * completes before any scrape on the event loop can read the state.
 */

import { ConfigurationError, ParseError } from '../common/errors.js';
import { metricsLog } from '../common/logger.js';
import { NativeBuckets } from './native-histogram.js';
import { parseSample, splitGaugeInput } from './parse.js';
import {
  type CounterOptions,
  type CounterSnapshot,
  type GaugeOptions,
  type GaugeSnapshot,
  type HistogramBucket,
  type HistogramOptions,
  type HistogramSnapshot,
  type HistogramType,
  type MeasurementOptions,
  type MeasurementSnapshot,
  type MetricDescriptor,
  type MetricKind,
  type UpdateResult,
  DEFAULT_BUCKETS,
  HISTOGRAM_TYPES,
  METRIC_KINDS,
} from './types.js';

const METRIC_NAME = /^[a-zA-Z_:][a-zA-Z0-9_:]*$/;
const LABEL_NAME = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

function isMetricKind(value: string): value is MetricKind {
  return (METRIC_KINDS as readonly string[]).includes(value);
}

function isHistogramType(value: string): value is HistogramType {
  return (HISTOGRAM_TYPES as readonly string[]).includes(value);
}

/**
 * Resolve a metric kind name.
 *
 * @throws ConfigurationError for anything but gauge, counter or histogram
 */
export function parseMetricKind(value: string): MetricKind {
  if (!isMetricKind(value)) {
    throw new ConfigurationError(`unknown metric type ${value}`);
  }
  return value;
}

/**
 * Resolve a comma separated list of histogram types, e.g. "classic,native".
 */
export function parseHistogramTypes(value: string): HistogramType[] {
  const types: HistogramType[] = [];
  for (const entry of value.split(',')) {
    const name = entry.trim();
    if (!isHistogramType(name)) {
      throw new ConfigurationError(`unknown histogram type ${name}`);
    }
    if (!types.includes(name)) types.push(name);
  }
  return types;
}

/**
 * Exposed metric name: `namespace_name`, or `name` alone without a namespace.
 */
export function fullName(descriptor: MetricDescriptor): string {
  return descriptor.namespace ? `${descriptor.namespace}_${descriptor.name}` : descriptor.name;
}

function validateDescriptor(descriptor: MetricDescriptor, reserved: readonly string[]): void {
  const name = fullName(descriptor);
  if (!METRIC_NAME.test(name)) {
    throw new ConfigurationError(`invalid metric name ${JSON.stringify(name)}`);
  }
  for (const label of Object.keys(descriptor.constLabels)) {
    if (!LABEL_NAME.test(label) || label.startsWith('__')) {
      throw new ConfigurationError(`invalid label name ${JSON.stringify(label)}`);
    }
    if (reserved.includes(label)) {
      throw new ConfigurationError(`label name ${JSON.stringify(label)} is reserved`);
    }
  }
}

function freezeDescriptor(descriptor: MetricDescriptor): MetricDescriptor {
  return Object.freeze({
    namespace: descriptor.namespace,
    name: descriptor.name,
    help: descriptor.help,
    constLabels: Object.freeze({ ...descriptor.constLabels }),
  });
}

/**
 * Validate classic bucket bounds. A trailing +Inf is implicit and dropped.
 */
export function normalizeBuckets(buckets: readonly number[]): number[] {
  const bounds = [...buckets];
  if (bounds.length > 0 && bounds[bounds.length - 1] === Infinity) {
    bounds.pop();
  }
  for (let i = 0; i < bounds.length; i++) {
    if (!Number.isFinite(bounds[i])) {
      throw new ConfigurationError(`histogram bucket bounds must be finite, got ${bounds[i]}`);
    }
    if (i > 0 && bounds[i] <= bounds[i - 1]) {
      throw new ConfigurationError(
        `histogram buckets must be in strictly increasing order: ${bounds[i - 1]} >= ${bounds[i]}`
      );
    }
  }
  return bounds;
}

function parseFailure(error: unknown): { ok: false; error: ParseError } {
  if (error instanceof ParseError) {
    metricsLog('Ignoring input: %s', error.message);
    return { ok: false, error };
  }
  throw error;
}

/**
 * Gauge - value that can go up and down.
 */
export class GaugeMeasurement {
  readonly kind = 'gauge' as const;
  readonly descriptor: MetricDescriptor;
  private value = 0;

  constructor(options: Omit<GaugeOptions, 'kind'>) {
    validateDescriptor(options.descriptor, []);
    this.descriptor = freezeDescriptor(options.descriptor);
  }

  set(value: number): void {
    this.value = value;
  }

  add(delta: number): void {
    this.value += delta;
  }

  /**
   * `x` sets the gauge, `+x` adds to it.
   */
  update(raw: string): UpdateResult<GaugeSnapshot> {
    const { mode, text } = splitGaugeInput(raw);
    let value: number;
    try {
      value = parseSample(text);
    } catch (err) {
      return parseFailure(err);
    }

    if (mode === 'add') {
      this.add(value);
    } else {
      this.set(value);
    }
    return { ok: true, value, snapshot: this.snapshot() };
  }

  snapshot(): GaugeSnapshot {
    return Object.freeze({ kind: this.kind, value: this.value });
  }
}

/**
 * Counter - monotonically increasing value.
 *
 * Operator input only triggers an increment: each accepted number adds exactly one,
 * whatever its sign or magnitude.
 */
export class CounterMeasurement {
  readonly kind = 'counter' as const;
  readonly descriptor: MetricDescriptor;
  /** Creation time in ms, exposed as the `_created` sample */
  readonly createdAt: number;
  private value = 0;

  constructor(options: Omit<CounterOptions, 'kind'>) {
    validateDescriptor(options.descriptor, []);
    this.descriptor = freezeDescriptor(options.descriptor);
    this.createdAt = (options.clock ?? Date.now)();
  }

  inc(): void {
    this.value += 1;
  }

  update(raw: string): UpdateResult<CounterSnapshot> {
    let value: number;
    try {
      value = parseSample(raw);
    } catch (err) {
      return parseFailure(err);
    }

    this.inc();
    return { ok: true, value, snapshot: this.snapshot() };
  }

  snapshot(): CounterSnapshot {
    return Object.freeze({ kind: this.kind, value: this.value });
  }
}

/**
 * Histogram - distribution of observed values.
 */
export class HistogramMeasurement {
  readonly kind = 'histogram' as const;
  readonly descriptor: MetricDescriptor;
  readonly bucketBoundaries: readonly number[];
  /** Creation time in ms, exposed as the `_created` sample */
  readonly createdAt: number;

  private counts: number[];
  private sum = 0;
  private count = 0;
  private readonly native?: NativeBuckets;
  private readonly clock: () => number;

  constructor(options: Omit<HistogramOptions, 'kind'>) {
    validateDescriptor(options.descriptor, ['le']);
    this.descriptor = freezeDescriptor(options.descriptor);
    this.clock = options.clock ?? Date.now;
    this.createdAt = this.clock();

    const buckets = options.buckets ?? (options.native ? [] : DEFAULT_BUCKETS);
    this.bucketBoundaries = Object.freeze(normalizeBuckets(buckets));
    this.counts = this.bucketBoundaries.map(() => 0);

    if (options.native) {
      this.native = new NativeBuckets(options.native, this.clock());
    }
  }

  observe(value: number): void {
    this.record(value);

    const native = this.native;
    if (!native?.overLimit) return;

    const now = this.clock();
    if (native.canReset(now)) {
      metricsLog('Native bucket limit exceeded, resetting histogram');
      this.resetCounts();
      native.reset(now);
      this.record(value);
    } else {
      const steps = native.reduceResolution();
      metricsLog('Native bucket limit exceeded, schema lowered by %d to %d', steps, native.schema);
    }
  }

  update(raw: string): UpdateResult<HistogramSnapshot> {
    let value: number;
    try {
      value = parseSample(raw);
    } catch (err) {
      return parseFailure(err);
    }

    this.observe(value);
    return { ok: true, value, snapshot: this.snapshot() };
  }

  snapshot(): HistogramSnapshot {
    const buckets: HistogramBucket[] = this.bucketBoundaries.map((le, i) =>
      Object.freeze({ le, count: this.counts[i] })
    );
    return Object.freeze({
      kind: this.kind,
      buckets: Object.freeze(buckets),
      sum: this.sum,
      count: this.count,
      ...(this.native ? { native: this.native.snapshot() } : {}),
    });
  }

  private record(value: number): void {
    this.sum += value;
    this.count += 1;

    for (let i = 0; i < this.bucketBoundaries.length; i++) {
      if (value <= this.bucketBoundaries[i]) {
        this.counts[i] += 1;
      }
    }

    this.native?.observe(value);
  }

  private resetCounts(): void {
    this.counts = this.bucketBoundaries.map(() => 0);
    this.sum = 0;
    this.count = 0;
  }
}

export type Measurement = GaugeMeasurement | CounterMeasurement | HistogramMeasurement;

/**
 * Create the process's measurement.
 *
 * @throws ConfigurationError on an invalid name, label or histogram layout
 */
export function createMeasurement(options: GaugeOptions): GaugeMeasurement;
export function createMeasurement(options: CounterOptions): CounterMeasurement;
export function createMeasurement(options: HistogramOptions): HistogramMeasurement;
export function createMeasurement(options: MeasurementOptions): Measurement;
export function createMeasurement(options: MeasurementOptions): Measurement {
  switch (options.kind) {
    case 'gauge':
      return new GaugeMeasurement(options);
    case 'counter':
      return new CounterMeasurement(options);
    case 'histogram':
      return new HistogramMeasurement(options);
  }
}

/** Format the current value for a prompt. */
export function describeSnapshot(snapshot: MeasurementSnapshot): string {
  switch (snapshot.kind) {
    case 'gauge':
    case 'counter':
      return String(snapshot.value);
    case 'histogram':
      return `count ${snapshot.count}, sum ${snapshot.sum}`;
  }
}
