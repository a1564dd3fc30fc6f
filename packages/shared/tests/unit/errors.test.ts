/**
 * Unit tests for error classes
 * @module @kuberoute/shared/tests/unit/errors
 */

import { describe, it, expect } from 'vitest';
import {
  ClusterApiError,
  ConfigurationError,
  DnsBackendError,
  ErrorCode,
  KuberouteError,
  StatusReportError,
  ValidationError,
  errorMessage,
  isClusterApiError,
  isDnsBackendError,
  isKuberouteError,
  statusCodeFor,
  wrapError,
} from '../../src/errors/index.js';

describe('KuberouteError', () => {
  it('derives the HTTP status from the code', () => {
    expect(statusCodeFor(ErrorCode.VALIDATION_FAILED)).toBe(400);
    expect(statusCodeFor(ErrorCode.CLUSTER_UNREACHABLE)).toBe(503);
    expect(statusCodeFor(ErrorCode.CLUSTER_REQUEST_FAILED)).toBe(502);
    expect(statusCodeFor(ErrorCode.DNS_UPDATE_FAILED)).toBe(502);
    expect(statusCodeFor(ErrorCode.STATUS_REPORT_FAILED)).toBe(502);
    expect(statusCodeFor(ErrorCode.TIMEOUT)).toBe(504);
    expect(statusCodeFor(ErrorCode.CONFIGURATION_INVALID)).toBe(500);
  });

  it('serializes for responses with the correlation ID', () => {
    const error = new KuberouteError('broken', ErrorCode.INTERNAL, { field: 'x' }).withCorrelationId('abc');
    const json = error.toJSON();

    expect(json.error).toMatchObject({
      name: 'KuberouteError',
      code: ErrorCode.INTERNAL,
      message: 'broken',
      meta: { field: 'x' },
      correlationId: 'abc',
    });
  });

  it('includes the cause message in log output', () => {
    const error = new KuberouteError('outer', ErrorCode.UNKNOWN, {}, new Error('inner'));
    expect(error.toLog().cause).toBe('inner');
  });
});

describe('wrapError', () => {
  it('returns kuberoute errors unchanged', () => {
    const original = new StatusReportError('no bucket');
    expect(wrapError(original)).toBe(original);
  });

  it('wraps plain errors and keeps the cause', () => {
    const cause = new Error('socket hang up');
    const wrapped = wrapError(cause, ErrorCode.INTERNAL);

    expect(isKuberouteError(wrapped)).toBe(true);
    expect(wrapped.message).toBe('socket hang up');
    expect(wrapped.code).toBe(ErrorCode.INTERNAL);
    expect(wrapped.cause).toBe(cause);
  });

  it('wraps non-error values', () => {
    expect(wrapError('plain').message).toBe('plain');
    expect(errorMessage(17)).toBe('17');
  });
});

describe('ClusterApiError', () => {
  it('maps unreachable failures to CLUSTER_UNREACHABLE', () => {
    const error = ClusterApiError.unreachable('connection refused');

    expect(isClusterApiError(error)).toBe(true);
    expect(error.kind).toBe('unreachable');
    expect(error.isUnreachable).toBe(true);
    expect(error.code).toBe(ErrorCode.CLUSTER_UNREACHABLE);
    expect(error.isRetryable()).toBe(true);
  });

  it('maps answered failures to CLUSTER_REQUEST_FAILED', () => {
    const error = ClusterApiError.failed('forbidden', { operation: 'list pods' });

    expect(error.isUnreachable).toBe(false);
    expect(error.code).toBe(ErrorCode.CLUSTER_REQUEST_FAILED);
    expect(error.meta.operation).toBe('list pods');
    expect(error.isRetryable()).toBe(false);
  });
});

describe('DnsBackendError', () => {
  it('names the backend and record', () => {
    const error = new DnsBackendError('No hosted zone found for app.example.com', 'route53', 'app.example.com', ErrorCode.DNS_ZONE_NOT_FOUND);

    expect(isDnsBackendError(error)).toBe(true);
    expect(error.backend).toBe('route53');
    expect(error.recordName).toBe('app.example.com');
    expect(error.code).toBe(ErrorCode.DNS_ZONE_NOT_FOUND);
    expect(error.meta).toEqual({ resourceType: 'dns-record', resourceName: 'app.example.com', backend: 'route53' });
  });
});

describe('ValidationError', () => {
  it('collects field errors', () => {
    const error = ValidationError.multiple([
      { field: 'dns.backend', message: 'dns.backend is required', rule: 'required' },
      { field: 'server.port', message: 'out of range', rule: 'range' },
    ]);

    expect(error.message).toBe('Validation failed for fields: dns.backend, server.port');
    expect(error.hasFieldError('dns.backend')).toBe(true);
    expect(error.hasFieldError('namespaces')).toBe(false);
  });

  it('builds a required-field error', () => {
    const error = ValidationError.required('status.bucket');

    expect(error.code).toBe(ErrorCode.MISSING_REQUIRED_FIELD);
    expect(error.statusCode).toBe(400);
  });
});

describe('ConfigurationError', () => {
  it('keeps the validation details', () => {
    const error = new ConfigurationError('bad config', [{ field: 'dns', message: 'missing' }]);

    expect(error.code).toBe(ErrorCode.CONFIGURATION_INVALID);
    expect(error.details).toHaveLength(1);
    expect(error.name).toBe('ConfigurationError');
  });
});
