/**
 * Cluster snapshot source
 * @module @kuberoute/server/kubernetes/snapshot-source
 *
 * Fetches services and pods of every configured namespace plus all nodes,
 * concurrently, each call bounded by a timeout. Failures are classified so
 * the cycle can tell a lost cluster API (fall back, touch nothing) from an
 * API that answered with an error.
 */

import { ApiException } from '@kubernetes/client-node';
import {
  ClusterApiError,
  createServiceLogger,
  errorMessage,
  isClusterApiError,
  isTimeoutError,
  withTimeout,
  DEFAULT_TIMEOUT_MS,
  type ClusterApi,
  type ClusterSnapshot,
  type Logger,
  type SnapshotResult,
  type SnapshotSource,
} from '@kuberoute/shared';

/**
 * System error codes that mean the API server could not be reached
 */
const NETWORK_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'EAI_AGAIN',
  'ETIMEDOUT',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'EPIPE',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_SOCKET',
]);

function systemErrorCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null) {
    return undefined;
  }
  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }
  if ('cause' in error) {
    return systemErrorCode(error.cause);
  }
  return undefined;
}

/**
 * Classify a failed cluster API call
 */
export function classifyClusterError(error: unknown, operation: string): ClusterApiError {
  if (isClusterApiError(error)) {
    return error;
  }

  const cause = error instanceof Error ? error : undefined;

  if (isTimeoutError(error)) {
    return ClusterApiError.unreachable(`${operation} timed out`, { operation }, cause);
  }

  if (error instanceof ApiException) {
    const meta = { operation, statusCode: error.code };
    if (error.code >= 500) {
      return ClusterApiError.unreachable(`${operation} failed with HTTP ${error.code}`, meta, cause);
    }
    return ClusterApiError.failed(`${operation} failed with HTTP ${error.code}`, meta, cause);
  }

  const code = systemErrorCode(error);
  if (code !== undefined && NETWORK_ERROR_CODES.has(code)) {
    return ClusterApiError.unreachable(`${operation} failed: ${code}`, { operation, systemCode: code }, cause);
  }

  if (error instanceof TypeError && error.message === 'fetch failed') {
    return ClusterApiError.unreachable(`${operation} failed: ${error.message}`, { operation }, cause);
  }

  return ClusterApiError.failed(`${operation} failed: ${errorMessage(error)}`, { operation }, cause);
}

/**
 * Snapshot source options
 */
export interface SnapshotSourceOptions {
  /** Bound on every API call (default: 10000) */
  timeoutMs?: number;
  logger?: Logger;
}

/**
 * SnapshotSource reading from a ClusterApi
 */
export class ClusterSnapshotSource implements SnapshotSource {
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(
    private readonly api: ClusterApi,
    options: SnapshotSourceOptions = {},
  ) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.logger = options.logger ?? createServiceLogger({ level: 'info' }, { component: 'snapshot-source' });
  }

  private async call<T>(operation: string, request: () => Promise<T>): Promise<T> {
    try {
      return await withTimeout(request(), this.timeoutMs, operation);
    } catch (error) {
      throw classifyClusterError(error, operation);
    }
  }

  async fetch(namespaces: readonly string[]): Promise<SnapshotResult> {
    const startTime = Date.now();

    try {
      const [perNamespace, nodes] = await Promise.all([
        Promise.all(
          namespaces.map(async (namespace) => {
            const [services, pods] = await Promise.all([
              this.call(`list services in ${namespace}`, () => this.api.listServices(namespace)),
              this.call(`list pods in ${namespace}`, () => this.api.listPods(namespace)),
            ]);
            return { services, pods };
          }),
        ),
        this.call('list nodes', () => this.api.listNodes()),
      ]);

      const snapshot: ClusterSnapshot = {
        services: perNamespace.flatMap((entry) => entry.services),
        pods: perNamespace.flatMap((entry) => entry.pods),
        nodes,
      };

      this.logger.debug('Cluster snapshot fetched', {
        namespaces: [...namespaces],
        services: snapshot.services.length,
        pods: snapshot.pods.length,
        nodes: snapshot.nodes.length,
        duration: Date.now() - startTime,
      });

      return { data: snapshot, error: null };
    } catch (error) {
      const classified = classifyClusterError(error, 'fetch cluster snapshot');
      this.logger.warn('Cluster snapshot fetch failed', {
        kind: classified.kind,
        error: classified.message,
        duration: Date.now() - startTime,
      });
      return { data: null, error: classified };
    }
  }
}

/**
 * Create a snapshot source over a ClusterApi
 */
export function createSnapshotSource(api: ClusterApi, options?: SnapshotSourceOptions): ClusterSnapshotSource {
  return new ClusterSnapshotSource(api, options);
}
