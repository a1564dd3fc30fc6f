/**
 * Interfaces of the collaborators the reconciliation cycle drives
 * @module @kuberoute/shared/types/collaborators
 */

import type { ClusterApiError, DnsBackendError } from '../errors/index.js';
import type { RecordType } from './record.js';
import type { ClusterSnapshot, NodeSnapshot, PodSnapshot, ServiceSnapshot } from './snapshot.js';
import type { StatusReport } from './status.js';

/**
 * Result type for collaborator operations
 */
export type OperationResult<T, E extends Error> =
  | { data: T; error: null }
  | { data: null; error: E };

/**
 * Result of fetching a cluster snapshot
 */
export type SnapshotResult = OperationResult<ClusterSnapshot, ClusterApiError>;

/**
 * Read-only view of the cluster API. Calls reject on failure and
 * resolve to an empty list when the namespace legitimately has nothing.
 */
export interface ClusterApi {
  listServices(namespace: string): Promise<ServiceSnapshot[]>;
  listPods(namespace: string): Promise<PodSnapshot[]>;
  listNodes(): Promise<NodeSnapshot[]>;
}

/**
 * Source of one pass's cluster snapshot
 */
export interface SnapshotSource {
  fetch(namespaces: readonly string[]): Promise<SnapshotResult>;
}

/**
 * One DNS record write
 */
export interface DnsUpdate {
  /** Fully qualified name without trailing dot */
  name: string;
  values: string[];
  ttl: number;
  recordType: RecordType;
}

/**
 * Result of one DNS record write
 */
export type DnsUpdateResult = OperationResult<true, DnsBackendError>;

/**
 * Authoritative DNS backend. Implementations never throw from
 * `updateRecord`; failures come back as the result's error.
 */
export interface DnsBackend {
  /** Backend identifier used in logs and errors */
  readonly name: string;
  updateRecord(update: DnsUpdate): Promise<DnsUpdateResult>;
}

/**
 * Destination of the status document. `write` rejects on failure.
 */
export interface StatusReporter {
  write(report: StatusReport): Promise<void>;
}
