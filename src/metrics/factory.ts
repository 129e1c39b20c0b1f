/**
 * Build the process's measurement from resolved configuration.
 */

import type { ManualMetricConfig } from '../config/types.js';
import { createMeasurement, type Measurement } from './measurement.js';
import type { MetricDescriptor, MetricLabels } from './types.js';

/**
 * Constant labels that identify this instance's endpoint.
 */
export function endpointLabels(config: ManualMetricConfig): MetricLabels {
  return {
    address: config.host,
    port: String(config.port),
  };
}

/**
 * Create the single measurement described by `config`.
 *
 * @param clock - Time source for creation timestamps and native histogram resets
 */
export function measurementFromConfig(
  config: ManualMetricConfig,
  clock?: () => number
): Measurement {
  const descriptor: MetricDescriptor = {
    namespace: config.metric.namespace,
    name: config.metric.name,
    help: config.metric.help,
    constLabels: endpointLabels(config),
  };

  switch (config.metric.type) {
    case 'gauge':
      return createMeasurement({ kind: 'gauge', descriptor });
    case 'counter':
      return createMeasurement({ kind: 'counter', descriptor, clock });
    case 'histogram': {
      const { types, buckets, native } = config.histogram;
      return createMeasurement({
        kind: 'histogram',
        descriptor,
        buckets: types.includes('classic') ? buckets : [],
        native: types.includes('native') ? native : undefined,
        clock,
      });
    }
  }
}
