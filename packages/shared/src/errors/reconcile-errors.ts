/**
 * Errors raised by the reconciliation collaborators
 * @module @kuberoute/shared/errors/reconcile-errors
 */

import { KuberouteError, ErrorCode, type ErrorMeta } from './base-error.js';
import type { ValidationErrorDetail } from './validation-error.js';

/**
 * How a cluster API call failed.
 * `unreachable` covers lost connectivity, timeouts and server-side 5xx;
 * `failed` covers every answer the API did give (401, 403, 404 and the like).
 */
export type ClusterFailureKind = 'unreachable' | 'failed';

/**
 * Failure talking to the Kubernetes API
 */
export class ClusterApiError extends KuberouteError {
  public readonly kind: ClusterFailureKind;

  constructor(message: string, kind: ClusterFailureKind, meta: ErrorMeta = {}, cause?: Error) {
    super(
      message,
      kind === 'unreachable' ? ErrorCode.CLUSTER_UNREACHABLE : ErrorCode.CLUSTER_REQUEST_FAILED,
      meta,
      cause,
    );
    this.name = 'ClusterApiError';
    this.kind = kind;
  }

  static unreachable(message: string, meta: ErrorMeta = {}, cause?: Error): ClusterApiError {
    return new ClusterApiError(message, 'unreachable', meta, cause);
  }

  static failed(message: string, meta: ErrorMeta = {}, cause?: Error): ClusterApiError {
    return new ClusterApiError(message, 'failed', meta, cause);
  }

  get isUnreachable(): boolean {
    return this.kind === 'unreachable';
  }
}

/**
 * Failure updating a single DNS record
 */
export class DnsBackendError extends KuberouteError {
  /** Backend that reported the failure */
  public readonly backend: string;
  /** Record name the update targeted */
  public readonly recordName: string;

  constructor(
    message: string,
    backend: string,
    recordName: string,
    code: ErrorCode = ErrorCode.DNS_UPDATE_FAILED,
    cause?: Error,
  ) {
    super(message, code, { resourceType: 'dns-record', resourceName: recordName, backend }, cause);
    this.name = 'DnsBackendError';
    this.backend = backend;
    this.recordName = recordName;
  }
}

/**
 * Failure writing the status document
 */
export class StatusReportError extends KuberouteError {
  constructor(message: string, meta: ErrorMeta = {}, cause?: Error) {
    super(message, ErrorCode.STATUS_REPORT_FAILED, meta, cause);
    this.name = 'StatusReportError';
  }
}

/**
 * Invalid or missing configuration; fatal at startup
 */
export class ConfigurationError extends KuberouteError {
  public readonly details: ValidationErrorDetail[];

  constructor(
    message: string,
    details: ValidationErrorDetail[] = [],
    code: ErrorCode = ErrorCode.CONFIGURATION_INVALID,
    cause?: Error,
  ) {
    super(message, code, {}, cause);
    this.name = 'ConfigurationError';
    this.details = details;
  }
}

export function isClusterApiError(error: unknown): error is ClusterApiError {
  return error instanceof ClusterApiError;
}

export function isDnsBackendError(error: unknown): error is DnsBackendError {
  return error instanceof DnsBackendError;
}

export function isConfigurationError(error: unknown): error is ConfigurationError {
  return error instanceof ConfigurationError;
}
