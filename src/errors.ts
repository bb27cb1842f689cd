/**
 * Custom Error Classes
 *
 * Provides a hierarchy of error types for the metrics bridge.
 */

/**
 * Base error class for all bridge errors
 */
export class BridgeError extends Error {
  /** HTTP status code (if applicable) */
  readonly statusCode: number;
  /** Machine-readable error code */
  readonly code: string;
  /** Additional error details */
  readonly details?: Record<string, unknown>;
  /** Original cause of the error */
  readonly cause?: Error;

  constructor(
    message: string,
    statusCode: number = 0,
    code: string = 'UNKNOWN_ERROR',
    details?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message);
    this.name = 'BridgeError';
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
    this.cause = cause;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /** Whether the caller may retry the failed call */
  isRetryable(): boolean {
    return false;
  }

  /** Convert to plain object for logging */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      statusCode: this.statusCode,
      code: this.code,
      details: this.details,
    };
  }
}

/**
 * Configuration error
 * Thrown when settings, secrets or transport options are missing or invalid.
 * Fatal to bridge construction.
 */
export class ConfigurationError extends BridgeError {
  constructor(
    message: string = 'Invalid configuration',
    code: string = 'CONFIGURATION_ERROR',
    details?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message, 0, code, details, cause);
    this.name = 'ConfigurationError';
  }
}

/**
 * Validation error
 * Thrown when caller input (a query batch or payload) is malformed
 */
export class ValidationError extends BridgeError {
  constructor(
    message: string = 'Validation failed',
    code: string = 'VALIDATION_ERROR',
    details?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message, 400, code, details, cause);
    this.name = 'ValidationError';
  }
}

/** Local failures that a retry would only repeat */
const NON_RETRYABLE_TRANSPORT_CODES: ReadonlySet<string> = new Set(['ABORTED', 'INVALID_REQUEST']);

/**
 * Transport error
 * Thrown when a monitored endpoint cannot be reached or answers with a non-2xx status
 */
export class TransportError extends BridgeError {
  constructor(
    message: string = 'Transport failure',
    statusCode: number = 0,
    code: string = 'TRANSPORT_ERROR',
    details?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message, statusCode, code, details, cause);
    this.name = 'TransportError';
  }

  override isRetryable(): boolean {
    if (this.statusCode === 0) {
      return !NON_RETRYABLE_TRANSPORT_CODES.has(this.code);
    }
    return this.statusCode >= 500;
  }
}

/**
 * Network error
 * Thrown when a request fails without a response
 */
export class NetworkError extends TransportError {
  constructor(message: string = 'Network request failed', cause?: Error) {
    super(message, 0, 'NETWORK_ERROR', undefined, cause);
    this.name = 'NetworkError';
  }
}

/**
 * Timeout error
 * Thrown when a request exceeds the transport timeout
 */
export class TimeoutError extends TransportError {
  /** Timeout duration in milliseconds */
  readonly timeoutMs: number;

  constructor(message: string = 'Request timed out', timeoutMs: number = 0) {
    super(message, 0, 'TIMEOUT', { timeoutMs });
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Metric not found error
 * Thrown by callers that prefer an exception over the `not_found` scrape outcome
 */
export class MetricNotFoundError extends BridgeError {
  /** Name of the metric that was requested */
  readonly metricName: string;

  constructor(metricName: string) {
    super(`metric ${metricName} not found`, 404, 'METRIC_NOT_FOUND', { metricName });
    this.name = 'MetricNotFoundError';
    this.metricName = metricName;
  }
}

/**
 * Check if an error is a BridgeError instance
 */
export function isBridgeError(error: unknown): error is BridgeError {
  return error instanceof BridgeError;
}

/**
 * Check if an error is retryable
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof BridgeError) {
    return error.isRetryable();
  }
  // Network errors from fetch are typically retryable
  if (error instanceof TypeError) {
    return true;
  }
  return false;
}

/**
 * Extract a message from an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
