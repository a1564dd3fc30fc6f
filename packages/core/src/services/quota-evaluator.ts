/**
 * Quota Evaluator
 * @module @kuberoute/core/services/quota-evaluator
 */

import type { DnsRecord, NodeSnapshot } from '@kuberoute/shared';

/**
 * Quota decision for one record
 */
export interface QuotaEvaluation {
  alive: boolean;
  /** Distinct nodes hosting a ready pod of the record */
  servingNodes: number;
  /** Every node the cluster API listed, ready or not */
  totalNodes: number;
  /** servingNodes / totalNodes in percent, 0 without nodes */
  coveragePercent: number;
}

/**
 * Evaluate a record against the current node list.
 *
 * Alive when the record has at least one address and, if a quota is set,
 * the serving share of all cluster nodes reaches it (the boundary counts).
 */
export function evaluateQuota(record: DnsRecord, nodes: readonly NodeSnapshot[]): QuotaEvaluation {
  const servingNodes = record.nodeNames.length;
  const totalNodes = nodes.length;
  const coveragePercent = totalNodes === 0 ? 0 : (servingNodes * 100) / totalNodes;

  let alive = record.addresses.length > 0;
  if (alive && record.quotaPercent !== undefined) {
    // Cross-multiplied so that e.g. 29 of 100 nodes meets a 29% quota exactly
    alive = servingNodes * 100 >= record.quotaPercent * totalNodes;
  }

  return { alive, servingNodes, totalNodes, coveragePercent };
}

/**
 * Whether the record's service counts as alive
 */
export function isRecordAlive(record: DnsRecord, nodes: readonly NodeSnapshot[]): boolean {
  return evaluateQuota(record, nodes).alive;
}
