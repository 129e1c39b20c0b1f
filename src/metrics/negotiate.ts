/**
 * Choice of exposition format from a scraper's Accept header.
 */

import { EXPOSITION_CONTENT_TYPE, formatExposition } from './exposition.js';
import type { Measurement } from './measurement.js';
import { OPENMETRICS_CONTENT_TYPE, formatOpenMetrics } from './openmetrics.js';
import { PROTOBUF_CONTENT_TYPE, encodeMetricFamily } from './protobuf.js';

export type ExpositionFormat = 'text' | 'openmetrics' | 'protobuf';

interface MediaRange {
  type: string;
  params: Map<string, string>;
  q: number;
}

function parseAccept(header: string): MediaRange[] {
  const ranges: MediaRange[] = [];

  for (const entry of header.split(',')) {
    const [type, ...rawParams] = entry.split(';').map(part => part.trim());
    if (!type) continue;

    const params = new Map<string, string>();
    let q = 1;
    for (const param of rawParams) {
      const eq = param.indexOf('=');
      if (eq < 0) continue;
      const key = param.slice(0, eq).trim().toLowerCase();
      const value = param.slice(eq + 1).trim().replace(/^"(.*)"$/, '$1');
      if (key === 'q') {
        const weight = Number(value);
        q = Number.isFinite(weight) ? weight : 0;
      } else {
        params.set(key, value);
      }
    }
    ranges.push({ type: type.toLowerCase(), params, q });
  }

  // sort is stable, so equal weights keep header order
  return ranges.sort((a, b) => b.q - a.q);
}

/**
 * Pick the format for a scrape. Parameters other than the ones each format
 * is identified by (such as `escaping`) are ignored; anything unrecognised
 * gets the 0.0.4 text format.
 */
export function negotiateFormat(accept: string | undefined): ExpositionFormat {
  if (!accept) return 'text';

  for (const range of parseAccept(accept)) {
    if (range.q <= 0) continue;
    const version = range.params.get('version');

    switch (range.type) {
      case 'application/vnd.google.protobuf':
        if (
          range.params.get('proto') === 'io.prometheus.client.MetricFamily' &&
          range.params.get('encoding') === 'delimited'
        ) {
          return 'protobuf';
        }
        break;
      case 'application/openmetrics-text':
        if (version === undefined || version === '1.0.0' || version === '0.0.1') {
          return 'openmetrics';
        }
        break;
      case 'text/plain':
        if (version === undefined || version === '0.0.4') {
          return 'text';
        }
        break;
    }
  }

  return 'text';
}

export interface RenderedExposition {
  contentType: string;
  body: string | Buffer;
}

/**
 * Render the measurement's current state in `format`.
 */
export function renderExposition(measurement: Measurement, format: ExpositionFormat): RenderedExposition {
  switch (format) {
    case 'protobuf':
      return { contentType: PROTOBUF_CONTENT_TYPE, body: Buffer.from(encodeMetricFamily(measurement)) };
    case 'openmetrics':
      return { contentType: OPENMETRICS_CONTENT_TYPE, body: formatOpenMetrics(measurement) };
    case 'text':
      return { contentType: EXPOSITION_CONTENT_TYPE, body: formatExposition(measurement) };
  }
}
