/**
 * OpenMetrics 1.0 text exposition of the measurement, `_created` samples included.
 */

import { escapeLabelValue, formatLabels, formatValue, labelsToKey } from './exposition.js';
import { fullName, type Measurement } from './measurement.js';

export const OPENMETRICS_CONTENT_TYPE = 'application/openmetrics-text; version=1.0.0; charset=utf-8';

/**
 * Floats always carry a decimal point or an exponent in OpenMetrics.
 */
export function formatOpenMetricsValue(value: number): string {
  if (value === 0) return '0.0';
  const text = formatValue(value);
  if (!Number.isFinite(value) || text.includes('e') || text.includes('.')) return text;
  return `${text}.0`;
}

function familyHeader(family: string, help: string, type: string): string[] {
  return [`# HELP ${family} ${escapeLabelValue(help)}`, `# TYPE ${family} ${type}`];
}

/**
 * Render the measurement's current snapshot, terminated by `# EOF`.
 */
export function formatOpenMetrics(measurement: Measurement): string {
  const name = fullName(measurement.descriptor);
  const { help, constLabels } = measurement.descriptor;
  const labelKey = labelsToKey(constLabels);
  const labels = formatLabels(labelKey);
  const lines: string[] = [];

  switch (measurement.kind) {
    case 'gauge': {
      lines.push(...familyHeader(name, help, 'gauge'));
      lines.push(`${name}${labels} ${formatOpenMetricsValue(measurement.snapshot().value)}`);
      break;
    }
    case 'counter': {
      // Counter families are named without the _total suffix their sample carries
      const family = name.endsWith('_total') ? name.slice(0, -'_total'.length) : name;
      lines.push(...familyHeader(family, help, 'counter'));
      lines.push(`${family}_total${labels} ${formatOpenMetricsValue(measurement.snapshot().value)}`);
      lines.push(`${family}_created${labels} ${formatOpenMetricsValue(measurement.createdAt / 1000)}`);
      break;
    }
    case 'histogram': {
      const snapshot = measurement.snapshot();
      const labelPrefix = labelKey ? `${labelKey},` : '';
      lines.push(...familyHeader(name, help, 'histogram'));
      for (const bucket of snapshot.buckets) {
        lines.push(`${name}_bucket{${labelPrefix}le="${formatOpenMetricsValue(bucket.le)}"} ${bucket.count}`);
      }
      lines.push(`${name}_bucket{${labelPrefix}le="+Inf"} ${snapshot.count}`);
      lines.push(`${name}_sum${labels} ${formatOpenMetricsValue(snapshot.sum)}`);
      lines.push(`${name}_count${labels} ${snapshot.count}`);
      lines.push(`${name}_created${labels} ${formatOpenMetricsValue(measurement.createdAt / 1000)}`);
      break;
    }
  }

  lines.push('# EOF', '');
  return lines.join('\n');
}
