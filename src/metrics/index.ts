/**
 * Metrics module exports.
 */

export {
  type MetricKind,
  type HistogramType,
  type MetricLabels,
  type MetricDescriptor,
  type HistogramBucket,
  type NativeBucketSpan,
  type NativeHistogramOptions,
  type NativeHistogramSnapshot,
  type GaugeSnapshot,
  type CounterSnapshot,
  type HistogramSnapshot,
  type MeasurementSnapshot,
  type UpdateResult,
  type GaugeOptions,
  type CounterOptions,
  type HistogramOptions,
  type MeasurementOptions,
  METRIC_KINDS,
  HISTOGRAM_TYPES,
  DEFAULT_BUCKETS,
  DEFAULT_NATIVE_OPTIONS,
  DEFAULT_NATIVE_ZERO_THRESHOLD,
} from './types.js';

export {
  type Measurement,
  GaugeMeasurement,
  CounterMeasurement,
  HistogramMeasurement,
  createMeasurement,
  parseMetricKind,
  parseHistogramTypes,
  normalizeBuckets,
  fullName,
  describeSnapshot,
} from './measurement.js';

export { parseSample, splitGaugeInput } from './parse.js';

export {
  NativeBuckets,
  pickSchema,
  validateNativeOptions,
  bucketIndex,
  bucketUpperBound,
  MIN_SCHEMA,
  MAX_SCHEMA,
} from './native-histogram.js';

export {
  formatExposition,
  formatValue,
  EXPOSITION_CONTENT_TYPE,
} from './exposition.js';

export {
  formatOpenMetrics,
  formatOpenMetricsValue,
  OPENMETRICS_CONTENT_TYPE,
} from './openmetrics.js';

export {
  encodeMetricFamily,
  encodeNativeBuckets,
  toMetricFamily,
  metricFamilyType,
  PROTOBUF_CONTENT_TYPE,
  type MetricFamilyMessage,
} from './protobuf.js';

export {
  negotiateFormat,
  renderExposition,
  type ExpositionFormat,
  type RenderedExposition,
} from './negotiate.js';

export { measurementFromConfig, endpointLabels } from './factory.js';
