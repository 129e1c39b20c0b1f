/**
 * Server module exports.
 */

export {
  createMetricServer,
  type MetricServer,
  type MetricServerOptions,
} from './server.js';

export { registerRoutes, STATUS_PATH } from './routes.js';

export {
  registerBasicAuth,
  authenticate,
  parseBasicAuth,
  credentialsMatch,
  AUTH_CHALLENGE,
  type BasicCredentials,
} from './auth.js';
