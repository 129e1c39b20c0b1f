/**
 * Protobuf exposition: one length-delimited io.prometheus.client.MetricFamily.
 *
 * This is the only format that carries native histogram buckets to a scraper.
 */

import { existsSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import protobuf from 'protobufjs';
import type { Type } from 'protobufjs';
import { ManualMetricError } from '../common/errors.js';
import { metricsLog } from '../common/logger.js';
import { sortedLabels } from './exposition.js';
import { fullName, type Measurement } from './measurement.js';
import type { NativeBucketSpan, NativeHistogramSnapshot } from './types.js';

export const PROTOBUF_CONTENT_TYPE =
  'application/vnd.google.protobuf; proto=io.prometheus.client.MetricFamily; encoding=delimited';

// Relative to src/metrics under tsx, and to dist/src/metrics once built
const PROTO_LOCATIONS = ['../../proto/metrics.proto', '../../../proto/metrics.proto'];

export type LabelPairMessage = { name: string; value: string };
export type TimestampMessage = { seconds: number; nanos: number };
export type BucketSpanMessage = { offset: number; length: number };

export type HistogramMessage = {
  sampleCount: number;
  sampleSum: number;
  bucket: Array<{ cumulativeCount: number; upperBound: number }>;
  createdTimestamp: TimestampMessage;
  schema?: number;
  zeroThreshold?: number;
  zeroCount?: number;
  positiveSpan?: BucketSpanMessage[];
  positiveDelta?: number[];
  negativeSpan?: BucketSpanMessage[];
  negativeDelta?: number[];
};

type NativeHistogramFields = Required<Pick<HistogramMessage,
  'schema' | 'zeroThreshold' | 'zeroCount' | 'positiveSpan' | 'positiveDelta' | 'negativeSpan' | 'negativeDelta'
>>;

export type MetricMessage = {
  label: LabelPairMessage[];
  gauge?: { value: number };
  counter?: { value: number; createdTimestamp: TimestampMessage };
  histogram?: HistogramMessage;
};

export type MetricFamilyMessage = {
  name: string;
  help: string;
  type: 'COUNTER' | 'GAUGE' | 'HISTOGRAM';
  metric: MetricMessage[];
};

let metricFamily: Type | undefined;

/**
 * The MetricFamily message type, loaded from metrics.proto on first use.
 */
export function metricFamilyType(): Type {
  if (!metricFamily) {
    const path = PROTO_LOCATIONS
      .map(location => fileURLToPath(new URL(location, import.meta.url)))
      .find(candidate => existsSync(candidate));
    if (!path) {
      throw new ManualMetricError('metrics.proto not found');
    }
    metricFamily = protobuf.loadSync(path).lookupType('io.prometheus.client.MetricFamily');
    metricsLog('Loaded protobuf schema from %s', path);
  }
  return metricFamily;
}

function timestamp(ms: number): TimestampMessage {
  const seconds = Math.floor(ms / 1000);
  return { seconds, nanos: Math.round((ms - seconds * 1000) * 1e6) };
}

/**
 * Spans and count deltas for populated native buckets in index order.
 * Gaps of up to two buckets are filled with empty buckets rather than opening a new span.
 */
export function encodeNativeBuckets(
  buckets: readonly NativeBucketSpan[]
): { spans: BucketSpanMessage[]; deltas: number[] } {
  const spans: BucketSpanMessage[] = [];
  const deltas: number[] = [];
  let previousCount = 0;
  let nextIndex = 0;

  const append = (count: number) => {
    spans[spans.length - 1].length += 1;
    deltas.push(count - previousCount);
    previousCount = count;
  };

  for (const { index, count } of buckets) {
    const gap = index - nextIndex;
    if (spans.length === 0 || gap > 2) {
      spans.push({ offset: gap, length: 0 });
    } else {
      for (let i = 0; i < gap; i++) append(0);
    }
    append(count);
    nextIndex = index + 1;
  }

  return { spans, deltas };
}

function nativeFields(native: NativeHistogramSnapshot): NativeHistogramFields {
  const positive = encodeNativeBuckets(native.positive);
  const negative = encodeNativeBuckets(native.negative);
  const empty = positive.spans.length === 0 && negative.spans.length === 0 && native.zeroCount === 0;

  return {
    schema: native.schema,
    zeroThreshold: native.zeroThreshold,
    zeroCount: native.zeroCount,
    // An empty span still marks the histogram as native
    positiveSpan: empty ? [{ offset: 0, length: 0 }] : positive.spans,
    positiveDelta: positive.deltas,
    negativeSpan: negative.spans,
    negativeDelta: negative.deltas,
  };
}

/**
 * The measurement's current state as a MetricFamily message.
 */
export function toMetricFamily(measurement: Measurement): MetricFamilyMessage {
  const family = {
    name: fullName(measurement.descriptor),
    help: measurement.descriptor.help,
  };
  const label = sortedLabels(measurement.descriptor.constLabels).map(([name, value]) => ({ name, value }));

  switch (measurement.kind) {
    case 'gauge':
      return {
        ...family,
        type: 'GAUGE',
        metric: [{ label, gauge: { value: measurement.snapshot().value } }],
      };
    case 'counter':
      return {
        ...family,
        type: 'COUNTER',
        metric: [{
          label,
          counter: {
            value: measurement.snapshot().value,
            createdTimestamp: timestamp(measurement.createdAt),
          },
        }],
      };
    case 'histogram': {
      const snapshot = measurement.snapshot();
      return {
        ...family,
        type: 'HISTOGRAM',
        metric: [{
          label,
          histogram: {
            sampleCount: snapshot.count,
            sampleSum: snapshot.sum,
            bucket: snapshot.buckets.map(b => ({ cumulativeCount: b.count, upperBound: b.le })),
            createdTimestamp: timestamp(measurement.createdAt),
            ...(snapshot.native ? nativeFields(snapshot.native) : {}),
          },
        }],
      };
    }
  }
}

/**
 * Encode the measurement as a length-delimited MetricFamily.
 */
export function encodeMetricFamily(measurement: Measurement): Uint8Array {
  const type = metricFamilyType();
  return type.encodeDelimited(type.fromObject(toMetricFamily(measurement))).finish();
}
