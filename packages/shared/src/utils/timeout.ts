/**
 * Promise timeouts
 * @module @kuberoute/shared/utils/timeout
 */

import { KuberouteError, ErrorCode } from '../errors/index.js';

/**
 * Raised when an operation does not settle within its bound
 */
export class TimeoutError extends KuberouteError {
  public readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`, ErrorCode.TIMEOUT, { operation, timeoutMs });
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export function isTimeoutError(error: unknown): error is TimeoutError {
  return error instanceof TimeoutError;
}

/**
 * Race a promise against a timer. The timer is cleared once the promise
 * settles, so nothing is left pending.
 */
export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, operation: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(operation, timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
