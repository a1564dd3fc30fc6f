/**
 * Base error class with error codes
 * @module @kuberoute/shared/errors/base-error
 */

/**
 * Error codes for categorization
 */
export enum ErrorCode {
  // General errors (1xxx)
  UNKNOWN = 1000,
  INTERNAL = 1001,
  TIMEOUT = 1003,

  // Validation errors (2xxx)
  VALIDATION_FAILED = 2000,
  INVALID_INPUT = 2001,
  MISSING_REQUIRED_FIELD = 2002,
  INVALID_FORMAT = 2003,
  OUT_OF_RANGE = 2004,

  // Configuration errors (3xxx)
  CONFIGURATION_INVALID = 3000,
  CONFIGURATION_NOT_FOUND = 3001,
  UNKNOWN_DNS_BACKEND = 3002,
  UNKNOWN_AUTH_KIND = 3003,

  // Cluster API errors (4xxx)
  CLUSTER_UNREACHABLE = 4000,
  CLUSTER_REQUEST_FAILED = 4001,

  // DNS backend errors (5xxx)
  DNS_UPDATE_FAILED = 5000,
  DNS_ZONE_NOT_FOUND = 5001,
  DNS_BACKEND_UNREACHABLE = 5003,

  // Status reporting errors (6xxx)
  STATUS_REPORT_FAILED = 6000,
}

/**
 * Error metadata for additional context
 */
export interface ErrorMeta {
  /** Resource type involved */
  resourceType?: string;
  /** Resource name involved */
  resourceName?: string;
  /** Field that caused the error */
  field?: string;
  /** Additional context */
  [key: string]: unknown;
}

/**
 * Base error class for all kuberoute errors
 */
export class KuberouteError extends Error {
  /** Error code for categorization */
  public readonly code: ErrorCode;
  /** HTTP status code equivalent */
  public readonly statusCode: number;
  /** Error metadata */
  public readonly meta: ErrorMeta;
  /** Timestamp when error occurred */
  public readonly timestamp: Date;
  /** Correlation ID for tracing */
  public correlationId?: string;
  /** Original error if this wraps another */
  public override readonly cause?: Error;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN,
    meta: ErrorMeta = {},
    cause?: Error,
  ) {
    super(message);
    this.name = 'KuberouteError';
    this.code = code;
    this.meta = meta;
    this.timestamp = new Date();
    this.cause = cause;
    this.statusCode = statusCodeFor(code);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Set correlation ID for tracing
   */
  withCorrelationId(correlationId: string): this {
    this.correlationId = correlationId;
    return this;
  }

  /**
   * Convert to JSON for API responses
   */
  toJSON(): Record<string, unknown> {
    return {
      error: {
        name: this.name,
        code: this.code,
        message: this.message,
        meta: this.meta,
        timestamp: this.timestamp.toISOString(),
        correlationId: this.correlationId,
      },
    };
  }

  /**
   * Convert to log-friendly format
   */
  toLog(): Record<string, unknown> {
    return {
      error: this.name,
      code: this.code,
      message: this.message,
      meta: this.meta,
      timestamp: this.timestamp.toISOString(),
      correlationId: this.correlationId,
      stack: this.stack,
      cause: this.cause?.message,
    };
  }

  /**
   * Check if this error is retryable on the next pass
   */
  isRetryable(): boolean {
    return [
      ErrorCode.TIMEOUT,
      ErrorCode.CLUSTER_UNREACHABLE,
      ErrorCode.DNS_BACKEND_UNREACHABLE,
    ].includes(this.code);
  }
}

/**
 * Map an error code to its HTTP status code equivalent
 */
export function statusCodeFor(code: ErrorCode): number {
  switch (Math.floor(code / 1000)) {
    case 2: // Validation
      return 400;
    case 4: // Cluster API
      return code === ErrorCode.CLUSTER_UNREACHABLE ? 503 : 502;
    case 5: // DNS backend
    case 6: // Status reporting
      return 502;
    default:
      return code === ErrorCode.TIMEOUT ? 504 : 500;
  }
}

/**
 * Check if an error is a KuberouteError
 */
export function isKuberouteError(error: unknown): error is KuberouteError {
  return error instanceof KuberouteError;
}

/**
 * Wrap an unknown error as a KuberouteError
 */
export function wrapError(error: unknown, code: ErrorCode = ErrorCode.UNKNOWN): KuberouteError {
  if (isKuberouteError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new KuberouteError(error.message, code, {}, error);
  }

  return new KuberouteError(String(error), code);
}

/**
 * Error message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
