/**
 * Sparse exponential ("native") histogram buckets.
 *
 * Bucket `i` at schema `s` covers `(2^((i-1)·2^-s), 2^(i·2^-s)]`. Higher schemas
 * mean finer buckets. When too many buckets are populated the schema is lowered,
 * merging neighbouring buckets pairwise.
 */

import { ConfigurationError } from '../common/errors.js';
import {
  type NativeBucketSpan,
  type NativeHistogramOptions,
  type NativeHistogramSnapshot,
  DEFAULT_NATIVE_ZERO_THRESHOLD,
} from './types.js';

export const MIN_SCHEMA = -4;
export const MAX_SCHEMA = 8;

/** Index used for infinite observations. */
const INFINITE_INDEX = 2 ** 31 - 1;

/**
 * Pick the finest schema whose growth factor does not exceed `bucketFactor`.
 */
export function pickSchema(bucketFactor: number): number {
  if (!(bucketFactor > 1)) {
    throw new ConfigurationError(`native bucket factor must be greater than 1, got ${bucketFactor}`);
  }
  const floor = Math.floor(Math.log2(Math.log2(bucketFactor)));
  if (floor <= -MAX_SCHEMA) return MAX_SCHEMA;
  if (floor >= -MIN_SCHEMA) return MIN_SCHEMA;
  return floor === 0 ? 0 : -floor;
}

/**
 * Upper bound of bucket `index` at `schema`.
 */
export function bucketUpperBound(index: number, schema: number): number {
  return 2 ** (index * 2 ** -schema);
}

/**
 * Index of the bucket holding the positive, non-NaN `magnitude` at `schema`.
 */
export function bucketIndex(magnitude: number, schema: number): number {
  if (magnitude === Infinity) return INFINITE_INDEX;

  let index = Math.ceil(Math.log2(magnitude) * 2 ** schema);
  // log2 rounding can land one bucket off near a boundary
  if (bucketUpperBound(index - 1, schema) >= magnitude) {
    index -= 1;
  } else if (bucketUpperBound(index, schema) < magnitude) {
    index += 1;
  }
  return index;
}

/**
 * Check native bucketing settings.
 *
 * @throws ConfigurationError on a factor <= 1 or a negative limit
 */
export function validateNativeOptions(options: NativeHistogramOptions): void {
  pickSchema(options.bucketFactor);
  if (!Number.isInteger(options.maxBucketNumber) || options.maxBucketNumber < 0) {
    throw new ConfigurationError(
      `native max bucket number must be a non-negative integer, got ${options.maxBucketNumber}`
    );
  }
  if (!Number.isFinite(options.minResetDuration) || options.minResetDuration < 0) {
    throw new ConfigurationError(
      `native min reset duration must be a non-negative number, got ${options.minResetDuration}`
    );
  }
  const zero = options.zeroThreshold;
  if (zero !== undefined && (!Number.isFinite(zero) || zero < 0)) {
    throw new ConfigurationError(`native zero threshold must be a non-negative number, got ${zero}`);
  }
}

function toSpans(buckets: Map<number, number>): NativeBucketSpan[] {
  return [...buckets.entries()]
    .sort(([a], [b]) => a - b)
    .map(([index, count]) => Object.freeze({ index, count }));
}

function mergePairs(buckets: Map<number, number>): Map<number, number> {
  const merged = new Map<number, number>();
  for (const [index, count] of buckets) {
    const target = Math.ceil(index / 2);
    merged.set(target, (merged.get(target) ?? 0) + count);
  }
  return merged;
}

/**
 * Native bucket state for one histogram.
 *
 * Only bucket placement and resolution live here; the owning histogram decides
 * when a reset happens since a reset clears its classic buckets too.
 */
export class NativeBuckets {
  private readonly initialSchema: number;
  private readonly maxBucketNumber: number;
  private readonly minResetDuration: number;
  readonly zeroThreshold: number;

  private schemaValue: number;
  private zeroCount = 0;
  private positive = new Map<number, number>();
  private negative = new Map<number, number>();
  private lastResetAt: number;

  constructor(options: NativeHistogramOptions, now: number) {
    validateNativeOptions(options);
    this.initialSchema = pickSchema(options.bucketFactor);
    this.schemaValue = this.initialSchema;
    this.maxBucketNumber = options.maxBucketNumber;
    this.minResetDuration = options.minResetDuration;
    this.zeroThreshold = options.zeroThreshold ?? DEFAULT_NATIVE_ZERO_THRESHOLD;
    this.lastResetAt = now;
  }

  get schema(): number {
    return this.schemaValue;
  }

  /** Number of populated buckets, zero bucket excluded. */
  get bucketCount(): number {
    return this.positive.size + this.negative.size;
  }

  get overLimit(): boolean {
    return this.maxBucketNumber > 0 && this.bucketCount > this.maxBucketNumber;
  }

  observe(value: number): void {
    if (Number.isNaN(value)) return;

    const magnitude = Math.abs(value);
    if (magnitude <= this.zeroThreshold) {
      this.zeroCount += 1;
      return;
    }

    const buckets = value > 0 ? this.positive : this.negative;
    const index = bucketIndex(magnitude, this.schemaValue);
    buckets.set(index, (buckets.get(index) ?? 0) + 1);
  }

  /** Whether enough time has passed since the last reset to allow another. */
  canReset(now: number): boolean {
    return this.minResetDuration > 0 && now - this.lastResetAt >= this.minResetDuration;
  }

  /** Clear all counts and return to the configured resolution. */
  reset(now: number): void {
    this.schemaValue = this.initialSchema;
    this.zeroCount = 0;
    this.positive = new Map();
    this.negative = new Map();
    this.lastResetAt = now;
  }

  /**
   * Halve the resolution until the bucket limit holds or the schema bottoms out.
   * Returns the number of schema steps taken.
   */
  reduceResolution(): number {
    let steps = 0;
    while (this.overLimit && this.schemaValue > MIN_SCHEMA) {
      this.positive = mergePairs(this.positive);
      this.negative = mergePairs(this.negative);
      this.schemaValue -= 1;
      steps += 1;
    }
    return steps;
  }

  snapshot(): NativeHistogramSnapshot {
    return Object.freeze({
      schema: this.schemaValue,
      zeroThreshold: this.zeroThreshold,
      zeroCount: this.zeroCount,
      positive: Object.freeze(toSpans(this.positive)),
      negative: Object.freeze(toSpans(this.negative)),
    });
  }
}
