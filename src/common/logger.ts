/**
 * Debug logger setup for manual-metric.
 *
 * Uses the 'debug' library for configurable, namespace-based logging.
 */

import debug from 'debug';

const ROOT_NAMESPACE = 'manual-metric';

/**
 * Create a namespaced logger.
 *
 * @param namespace - Sub-namespace (e.g., 'server', 'console')
 */
export function createLogger(namespace: string): debug.Debugger {
  return debug(`${ROOT_NAMESPACE}:${namespace}`);
}

/** Turn on logging for the given namespace filter (e.g. 'manual-metric:*'). */
export function enableLogging(namespaces: string): void {
  debug.enable(namespaces);
}

export const serverLog = createLogger('server');
export const httpLog = createLogger('http');
export const authLog = createLogger('auth');
export const configLog = createLogger('config');
export const metricsLog = createLogger('metrics');
export const consoleLog = createLogger('console');
