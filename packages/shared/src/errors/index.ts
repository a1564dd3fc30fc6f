/**
 * Error classes for kuberoute
 * @module @kuberoute/shared/errors
 */

export {
  KuberouteError,
  ErrorCode,
  isKuberouteError,
  wrapError,
  errorMessage,
  statusCodeFor,
} from './base-error.js';

export type { ErrorMeta } from './base-error.js';

export {
  ValidationError,
  isValidationError,
  validResult,
  invalidResult,
} from './validation-error.js';

export type { ValidationErrorDetail, ValidationResult } from './validation-error.js';

export {
  ClusterApiError,
  DnsBackendError,
  StatusReportError,
  ConfigurationError,
  isClusterApiError,
  isDnsBackendError,
  isConfigurationError,
} from './reconcile-errors.js';

export type { ClusterFailureKind } from './reconcile-errors.js';
