/**
 * Prometheus text exposition (format version 0.0.4) of the measurement.
 */

import { fullName, type Measurement } from './measurement.js';
import type { MetricLabels } from './types.js';

export const EXPOSITION_CONTENT_TYPE = 'text/plain; version=0.0.4; charset=utf-8';

/**
 * Format a sample value the way Prometheus clients do: shortest round-trip
 * digits, exponent form below 1e-4 and from 1e6 on, and the exposition
 * spellings for non-finite values.
 */
export function formatValue(value: number): string {
  if (Number.isNaN(value)) return 'NaN';
  if (value === Infinity) return '+Inf';
  if (value === -Infinity) return '-Inf';
  if (value === 0) return Object.is(value, -0) ? '-0' : '0';

  const exponential = value.toExponential();
  const e = exponential.indexOf('e');
  const exponent = Number(exponential.slice(e + 1));
  if (exponent < -4 || exponent >= 6) {
    const digits = String(Math.abs(exponent)).padStart(2, '0');
    return `${exponential.slice(0, e)}e${exponent < 0 ? '-' : '+'}${digits}`;
  }
  return String(value);
}

export function escapeLabelValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/\n/g, '\\n').replace(/"/g, '\\"');
}

function escapeHelp(help: string): string {
  return help.replace(/\\/g, '\\\\').replace(/\n/g, '\\n');
}

/**
 * Label pairs ordered by label name.
 */
export function sortedLabels(labels: Readonly<MetricLabels>): Array<[string, string]> {
  return Object.entries(labels).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
}

/**
 * Serialize labels to a string key, sorted by label name.
 */
export function labelsToKey(labels: Readonly<MetricLabels>): string {
  return sortedLabels(labels)
    .map(([k, v]) => `${k}="${escapeLabelValue(v)}"`)
    .join(',');
}

/**
 * Format labels for Prometheus output.
 */
export function formatLabels(labelKey: string): string {
  return labelKey ? `{${labelKey}}` : '';
}

/**
 * Render the measurement's current snapshot.
 */
export function formatExposition(measurement: Measurement): string {
  const name = fullName(measurement.descriptor);
  const labelKey = labelsToKey(measurement.descriptor.constLabels);
  const snapshot = measurement.snapshot();
  const lines: string[] = [];

  lines.push(`# HELP ${name} ${escapeHelp(measurement.descriptor.help)}`);
  lines.push(`# TYPE ${name} ${snapshot.kind}`);

  switch (snapshot.kind) {
    case 'gauge':
    case 'counter':
      lines.push(`${name}${formatLabels(labelKey)} ${formatValue(snapshot.value)}`);
      break;
    case 'histogram': {
      const labelPrefix = labelKey ? `${labelKey},` : '';
      for (const bucket of snapshot.buckets) {
        lines.push(`${name}_bucket{${labelPrefix}le="${formatValue(bucket.le)}"} ${formatValue(bucket.count)}`);
      }
      lines.push(`${name}_bucket{${labelPrefix}le="+Inf"} ${formatValue(snapshot.count)}`);
      lines.push(`${name}_sum${formatLabels(labelKey)} ${formatValue(snapshot.sum)}`);
      lines.push(`${name}_count${formatLabels(labelKey)} ${formatValue(snapshot.count)}`);
      break;
    }
  }

  lines.push('');
  return lines.join('\n');
}
