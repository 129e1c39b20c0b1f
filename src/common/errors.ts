/**
 * Error taxonomy for manual-metric.
 */

/**
 * Base class for all manual-metric errors.
 */
export class ManualMetricError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'ManualMetricError';

    // Maintain stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * Invalid startup configuration: unknown metric kind, bad buckets, bad bind address.
 * Always fatal; the process exits before a socket is bound.
 */
export class ConfigurationError extends ManualMetricError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = 'ConfigurationError';
  }
}

/**
 * Operator input that is not a number. The input loop ignores the line and reprompts.
 */
export class ParseError extends ManualMetricError {
  public readonly input: string;

  constructor(message: string, input: string) {
    super(message);
    this.name = 'ParseError';
    this.input = input;
  }
}

/**
 * Missing or wrong basic-auth credentials on a scrape.
 */
export class AuthenticationError extends ManualMetricError {
  constructor(message = 'Unauthorized') {
    super(message);
    this.name = 'AuthenticationError';
  }
}

/**
 * The HTTP listener could not bind or failed while serving.
 */
export class TransportError extends ManualMetricError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = 'TransportError';
  }
}

/**
 * Render an unknown thrown value as a message.
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
