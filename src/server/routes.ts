/**
 * HTTP routes: the negotiated scrape endpoint and a JSON status view.
 */

import type { FastifyInstance } from 'fastify';
import { httpLog } from '../common/logger.js';
import { fullName, type Measurement } from '../metrics/measurement.js';
import { negotiateFormat, renderExposition } from '../metrics/negotiate.js';

export const STATUS_PATH = '/status';

/**
 * Register the scrape and status routes for `measurement`.
 */
export function registerRoutes(
  app: FastifyInstance,
  measurement: Measurement,
  metricsPath: string
): void {
  // GET /metrics - Prometheus exposition in the format the scraper asks for
  app.get(metricsPath, async (request, reply) => {
    const format = negotiateFormat(request.headers.accept);
    httpLog('GET %s as %s', metricsPath, format);
    const { contentType, body } = renderExposition(measurement, format);
    return reply.header('Content-Type', contentType).send(body);
  });

  // GET /status - Snapshot as JSON, native buckets included
  app.get(STATUS_PATH, async (_request, reply) => {
    httpLog('GET %s', STATUS_PATH);
    return reply.send({
      ok: true,
      data: {
        kind: measurement.kind,
        name: fullName(measurement.descriptor),
        labels: measurement.descriptor.constLabels,
        snapshot: measurement.snapshot(),
      },
    });
  });
}
