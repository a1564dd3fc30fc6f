/**
 * Unit tests for the trigger API handlers
 * @module @kuberoute/server/tests/unit/api-router
 *
 * Handlers are called directly with mock requests and responses; the cycle
 * is a stub returning canned outcomes.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { Request, Response } from 'express';
import type { CycleOutcome } from '@kuberoute/core';
import { ClusterApiError, type StatusReport } from '@kuberoute/shared';
import {
  CORRELATION_HEADER,
  TriggerState,
  correlationIdOf,
  createApiRouter,
  createReadinessCheck,
  createReconcileHandler,
  createStatusHandler,
  healthCheck,
  notFoundHandler,
} from '../../src/api/router.js';

/**
 * Create a mock Express request
 */
function createMockRequest(overrides: Partial<Request> = {}, headers: Record<string, string> = {}): Request {
  return {
    method: 'POST',
    path: '/reconcile',
    body: {},
    params: {},
    query: {},
    headers,
    get(name: string) {
      return headers[name.toLowerCase()];
    },
    ...overrides,
  } as Request;
}

/**
 * Create a mock Express response with spy functions
 */
function createMockResponse(): Response & {
  _json: unknown;
  _status: number;
  _body: unknown;
  _type: string | null;
  _headers: Record<string, string>;
} {
  const res = {
    _json: null as unknown,
    _status: 200,
    _body: null as unknown,
    _type: null as string | null,
    _headers: {} as Record<string, string>,
    status(code: number) {
      this._status = code;
      return this;
    },
    json(data: unknown) {
      this._json = data;
      return this;
    },
    send(body: unknown) {
      this._body = body;
      return this;
    },
    type(value: string) {
      this._type = value;
      return this;
    },
    setHeader(name: string, value: string) {
      this._headers[name] = value;
      return this;
    },
    getHeader(name: string) {
      return this._headers[name];
    },
  };
  return res as Response & {
    _json: unknown;
    _status: number;
    _body: unknown;
    _type: string | null;
    _headers: Record<string, string>;
  };
}

const report: StatusReport = {
  available: true,
  generatedAt: '2024-05-01T10:07:00.000Z',
  observedAt: '2024-05-01T10:07:00.000Z',
  records: [],
  nodes: [],
};

const done: CycleOutcome = {
  status: 'done',
  stage: 'DONE',
  correlationId: 'corr-1',
  message: 'Reconciliation complete: 1 records across 1 domains',
  updates: [],
  report,
};

const fallback: CycleOutcome = {
  status: 'fallback',
  stage: 'FALLBACK',
  correlationId: 'corr-2',
  message: 'Reconciliation failed at FETCHING: cluster API unreachable (connection refused)',
  error: ClusterApiError.unreachable('connection refused'),
  report: { ...report, available: false },
};

const failed: CycleOutcome = {
  status: 'failed',
  stage: 'FETCHING',
  correlationId: 'corr-3',
  message: 'Reconciliation failed at FETCHING: list pods failed with HTTP 403',
  error: ClusterApiError.failed('list pods failed with HTTP 403'),
};

describe('Trigger API Handlers', () => {
  let run: ReturnType<typeof vi.fn>;
  let state: TriggerState;

  beforeEach(() => {
    run = vi.fn();
    state = new TriggerState();
  });

  describe('GET /health', () => {
    it('answers without running a pass', () => {
      const res = createMockResponse();

      healthCheck(createMockRequest(), res);

      expect(res._status).toBe(200);
      expect(res._json).toMatchObject({ alive: true });
      expect(run).not.toHaveBeenCalled();
    });
  });

  describe('POST /reconcile', () => {
    it('confirms a completed pass with 200 text', async () => {
      run.mockResolvedValue(done);
      const res = createMockResponse();

      await createReconcileHandler({ run }, state)(createMockRequest(), res);

      expect(res._status).toBe(200);
      expect(res._type).toBe('text/plain');
      expect(res._body).toBe('Reconciliation complete: 1 records across 1 domains');
    });

    it('answers 503 CLUSTER_UNREACHABLE naming FETCHING on fallback', async () => {
      run.mockResolvedValue(fallback);
      const res = createMockResponse();

      await createReconcileHandler({ run }, state)(createMockRequest({}, { 'x-correlation-id': 'corr-2' }), res);

      expect(res._status).toBe(503);
      expect(res._json).toEqual({
        success: false,
        error: {
          code: 'CLUSTER_UNREACHABLE',
          message: 'Reconciliation failed at FETCHING: cluster API unreachable (connection refused)',
          details: { stage: 'FETCHING', correlationId: 'corr-2' },
        },
      });
    });

    it('answers 502 SNAPSHOT_FAILED when the API refused', async () => {
      run.mockResolvedValue(failed);
      const res = createMockResponse();

      await createReconcileHandler({ run }, state)(createMockRequest(), res);

      expect(res._status).toBe(502);
      expect(res._json).toMatchObject({ error: { code: 'SNAPSHOT_FAILED', details: { stage: 'FETCHING' } } });
    });

    it('answers 500 when the pass throws', async () => {
      run.mockRejectedValue(new Error('boom'));
      const res = createMockResponse();

      await createReconcileHandler({ run }, state)(createMockRequest(), res);

      expect(res._status).toBe(500);
      expect(res._json).toMatchObject({ error: { code: 'INTERNAL_ERROR', message: 'An unexpected error occurred' } });
    });

    it('runs the pass under the request correlation ID', async () => {
      run.mockResolvedValue(done);
      const res = createMockResponse();
      res.setHeader(CORRELATION_HEADER, 'from-middleware');

      await createReconcileHandler({ run }, state)(createMockRequest(), res);

      expect(run).toHaveBeenCalledWith('from-middleware');
    });
  });

  describe('GET /ready', () => {
    it('reports no pass before the first trigger', () => {
      const res = createMockResponse();

      createReadinessCheck(state)(createMockRequest(), res);

      expect(res._json).toMatchObject({ ready: true, lastCycle: null });
    });

    it('reports the last pass', async () => {
      run.mockResolvedValue(fallback);
      await createReconcileHandler({ run }, state)(createMockRequest(), createMockResponse());
      const res = createMockResponse();

      createReadinessCheck(state)(createMockRequest(), res);

      expect(res._json).toMatchObject({
        ready: true,
        lastCycle: { status: 'fallback', stage: 'FALLBACK', correlationId: 'corr-2' },
      });
    });
  });

  describe('GET /status', () => {
    it('answers 404 before any report', () => {
      const res = createMockResponse();

      createStatusHandler(state)(createMockRequest(), res);

      expect(res._status).toBe(404);
    });

    it('returns the last report, including fallback reports', async () => {
      run.mockResolvedValueOnce(done).mockResolvedValueOnce(fallback).mockResolvedValueOnce(failed);
      const handler = createReconcileHandler({ run }, state);
      await handler(createMockRequest(), createMockResponse());
      await handler(createMockRequest(), createMockResponse());
      await handler(createMockRequest(), createMockResponse());
      const res = createMockResponse();

      createStatusHandler(state)(createMockRequest(), res);

      expect(res._status).toBe(200);
      expect(res._json).toEqual({ ...report, available: false });
    });
  });

  describe('correlationIdOf', () => {
    it('prefers the assigned header, then the request header', () => {
      const assigned = createMockResponse();
      assigned.setHeader(CORRELATION_HEADER, 'assigned');
      expect(correlationIdOf(createMockRequest({}, { 'x-correlation-id': 'incoming' }), assigned)).toBe('assigned');
      expect(correlationIdOf(createMockRequest({}, { 'x-correlation-id': 'incoming' }), createMockResponse())).toBe(
        'incoming',
      );
    });
  });

  describe('notFoundHandler', () => {
    it('names the route', () => {
      const res = createMockResponse();

      notFoundHandler(createMockRequest({ method: 'DELETE', path: '/records' }), res);

      expect(res._status).toBe(404);
      expect(res._json).toEqual({
        success: false,
        error: { code: 'NOT_FOUND', message: 'Route DELETE /records not found' },
      });
    });
  });

  describe('createApiRouter', () => {
    it('registers the trigger routes', () => {
      const router = createApiRouter({ cycle: { run }, enableLogging: false });
      const routes = router.stack.flatMap((layer) =>
        layer.route ? [layer.route.path] : [],
      );

      expect(routes).toEqual(['/health', '/ready', '/reconcile', '/reconcile', '/status']);
    });
  });
});
