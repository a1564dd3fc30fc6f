/**
 * Status document written after every reconciliation pass
 * @module @kuberoute/shared/types/status
 */

import type { RecordType } from './record.js';

/**
 * Health of one planned record
 */
export interface RecordStatus {
  domain: string;
  name: string;
  fqdn: string;
  service: string;
  namespace: string;
  recordType: RecordType;
  addresses: string[];
  quotaPercent: number | null;
  failoverTarget: string | null;
  alive: boolean;
  servingNodes: number;
  totalNodes: number;
  /** Share of cluster nodes serving the record, 0-100 */
  coveragePercent: number;
}

/**
 * Summary of one cluster node
 */
export interface NodeStatusSummary {
  name: string;
  address: string | null;
  ready: boolean;
}

/**
 * Status document
 */
export interface StatusReport {
  /** False when the cluster API was unreachable and the cached pass is reported */
  available: boolean;
  /** When this document was built (ISO 8601) */
  generatedAt: string;
  /** When the reported cluster state was observed (ISO 8601); null without any */
  observedAt: string | null;
  records: RecordStatus[];
  nodes: NodeStatusSummary[];
}
