/**
 * Trigger API Router
 *
 * Health probes plus the reconciliation trigger.
 * - GET /health - Liveness, never reconciles
 * - GET /ready - Readiness with the last pass
 * - GET|POST /reconcile - Run one pass
 * - GET /status - Last status document built by this process
 *
 * @module @kuberoute/server/api/router
 */

import { Router, type NextFunction, type Request, type Response } from 'express';
import type { CycleOutcome, CycleStage } from '@kuberoute/core';
import {
  createServiceLogger,
  generateCorrelationId,
  type Logger,
  type StatusReport,
} from '@kuberoute/shared';

/**
 * Header carrying the correlation ID in both directions
 */
export const CORRELATION_HEADER = 'X-Correlation-ID';

// ============================================================================
// Response Types
// ============================================================================

/**
 * API error response
 */
interface ApiErrorResponse {
  success: false;
  error: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
  };
}

/**
 * Helper to send error response
 */
function sendError(
  res: Response,
  code: string,
  message: string,
  statusCode: number,
  details?: Record<string, unknown>,
): void {
  const response: ApiErrorResponse = {
    success: false,
    error: { code, message, ...(details && { details }) },
  };
  res.status(statusCode).json(response);
}

// ============================================================================
// Trigger State
// ============================================================================

/**
 * Anything that runs passes
 */
export interface CycleRunner {
  run(correlationId?: string): Promise<CycleOutcome>;
}

/**
 * Summary of the most recent pass
 */
export interface LastCycle {
  status: CycleOutcome['status'];
  stage: CycleStage;
  correlationId: string;
  message: string;
  finishedAt: string;
}

/**
 * What the trigger remembers between requests
 */
export class TriggerState {
  lastCycle: LastCycle | null = null;
  lastReport: StatusReport | null = null;

  record(outcome: CycleOutcome, finishedAt: Date): void {
    this.lastCycle = {
      status: outcome.status,
      stage: outcome.stage,
      correlationId: outcome.correlationId,
      message: outcome.message,
      finishedAt: finishedAt.toISOString(),
    };
    if (outcome.status !== 'failed') {
      this.lastReport = outcome.report;
    }
  }
}

/**
 * API router configuration options
 */
export interface ApiRouterOptions {
  cycle: CycleRunner;
  /** Shared between routers; a fresh one by default */
  state?: TriggerState;
  /** Enable request logging (default: true) */
  enableLogging?: boolean;
  logger?: Logger;
}

function defaultLogger(): Logger {
  return createServiceLogger({ level: 'info' }, { component: 'api-router' });
}

/**
 * Correlation ID of a request: the response header set by the logging
 * middleware, then the request header, then a new one
 */
export function correlationIdOf(req: Request, res: Response): string {
  const assigned = res.getHeader(CORRELATION_HEADER);
  if (typeof assigned === 'string' && assigned) {
    return assigned;
  }
  return req.get(CORRELATION_HEADER) || generateCorrelationId();
}

// ============================================================================
// Route Handlers
// ============================================================================

/**
 * Server start time for uptime calculation
 */
const startTime = Date.now();

/**
 * GET /health - Liveness check
 */
export function healthCheck(_req: Request, res: Response): void {
  res.status(200).json({
    alive: true,
    timestamp: new Date().toISOString(),
    uptime: Math.floor((Date.now() - startTime) / 1000),
  });
}

/**
 * GET /ready - Readiness check with the last pass
 */
export function createReadinessCheck(state: TriggerState) {
  return (_req: Request, res: Response): void => {
    res.status(200).json({
      ready: true,
      timestamp: new Date().toISOString(),
      lastCycle: state.lastCycle,
    });
  };
}

/**
 * GET|POST /reconcile - Run one pass and map its outcome to a response
 */
export function createReconcileHandler(cycle: CycleRunner, state: TriggerState, logger: Logger = defaultLogger()) {
  return async (req: Request, res: Response): Promise<void> => {
    const correlationId = correlationIdOf(req, res);
    const requestLogger = logger.withCorrelationId(correlationId);

    try {
      const outcome = await cycle.run(correlationId);
      state.record(outcome, new Date());

      switch (outcome.status) {
        case 'done':
          res.status(200).type('text/plain').send(outcome.message);
          return;
        case 'fallback':
          sendError(res, 'CLUSTER_UNREACHABLE', outcome.message, 503, {
            stage: 'FETCHING',
            correlationId,
          });
          return;
        case 'failed':
          sendError(res, 'SNAPSHOT_FAILED', outcome.message, 502, {
            stage: outcome.stage,
            correlationId,
          });
          return;
      }
    } catch (error) {
      requestLogger.error('Reconciliation threw', error instanceof Error ? error : undefined);
      sendError(res, 'INTERNAL_ERROR', 'An unexpected error occurred', 500, { correlationId });
    }
  };
}

/**
 * GET /status - Last status document
 */
export function createStatusHandler(state: TriggerState) {
  return (_req: Request, res: Response): void => {
    if (!state.lastReport) {
      sendError(res, 'NOT_FOUND', 'No reconciliation has produced a status report yet', 404);
      return;
    }
    res.status(200).json(state.lastReport);
  };
}

// ============================================================================
// Middleware
// ============================================================================

/**
 * Request logging middleware
 */
export function createRequestLoggingMiddleware(logger: Logger = defaultLogger()) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const correlationId = req.get(CORRELATION_HEADER) || generateCorrelationId();
    const requestStart = Date.now();

    res.setHeader(CORRELATION_HEADER, correlationId);

    const requestLogger = logger.withCorrelationId(correlationId);
    requestLogger.info('Incoming request', {
      method: req.method,
      path: req.path,
      userAgent: req.get('user-agent'),
      ip: req.ip || req.socket.remoteAddress,
    });

    res.on('finish', () => {
      const meta = {
        method: req.method,
        path: req.path,
        statusCode: res.statusCode,
        duration: Date.now() - requestStart,
      };
      if (res.statusCode >= 400) {
        requestLogger.warn('Request completed', meta);
      } else {
        requestLogger.info('Request completed', meta);
      }
    });

    next();
  };
}

/**
 * Error handling middleware
 */
export function createErrorHandlingMiddleware(logger: Logger = defaultLogger()) {
  return (err: Error, req: Request, res: Response, _next: NextFunction): void => {
    const correlationId = correlationIdOf(req, res);
    logger.withCorrelationId(correlationId).error('Unhandled error', err, {
      method: req.method,
      path: req.path,
    });

    const isProduction = process.env.NODE_ENV === 'production';
    sendError(res, 'INTERNAL_ERROR', isProduction ? 'An internal error occurred' : err.message, 500);
  };
}

/**
 * 404 Not Found handler
 */
export function notFoundHandler(req: Request, res: Response): void {
  sendError(res, 'NOT_FOUND', `Route ${req.method} ${req.path} not found`, 404);
}

/**
 * Create the trigger router
 */
export function createApiRouter(options: ApiRouterOptions): Router {
  const { cycle, state = new TriggerState(), enableLogging = true } = options;
  const logger = options.logger ?? defaultLogger();

  const router = Router();

  if (enableLogging) {
    router.use(createRequestLoggingMiddleware(logger));
  }

  router.get('/health', healthCheck);
  router.get('/ready', createReadinessCheck(state));

  const reconcile = createReconcileHandler(cycle, state, logger);
  router.get('/reconcile', reconcile);
  router.post('/reconcile', reconcile);

  router.get('/status', createStatusHandler(state));

  router.use(notFoundHandler);
  router.use(createErrorHandlingMiddleware(logger));

  logger.info('API router initialized', {
    routes: ['/health', '/ready', '/reconcile', '/status'],
  });

  return router;
}

export default createApiRouter;
