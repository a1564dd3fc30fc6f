/**
 * Status report builder
 * @module @kuberoute/core/services/status-report
 */

import {
  recordFqdn,
  type NodeSnapshot,
  type NodeStatusSummary,
  type ReconciliationSnapshot,
  type RecordStatus,
  type StatusReport,
} from '@kuberoute/shared';
import { evaluateQuota } from './quota-evaluator.js';

/**
 * Round a percentage to two decimals
 */
function roundPercent(value: number): number {
  return Math.round(value * 100) / 100;
}

function summarizeNode(node: NodeSnapshot): NodeStatusSummary {
  return {
    name: node.name,
    address: node.address ?? null,
    ready: node.ready,
  };
}

/**
 * Per-record health of a reconciled pass
 */
export function summarizeRecords(snapshot: ReconciliationSnapshot): RecordStatus[] {
  const statuses: RecordStatus[] = [];

  for (const records of snapshot.recordsByDomain.values()) {
    for (const record of records) {
      const evaluation = evaluateQuota(record, snapshot.nodes);
      statuses.push({
        domain: record.domain,
        name: record.name,
        fqdn: recordFqdn(record),
        service: record.service,
        namespace: record.namespace,
        recordType: record.recordType,
        addresses: [...record.addresses],
        quotaPercent: record.quotaPercent ?? null,
        failoverTarget: record.failoverTarget ?? null,
        alive: evaluation.alive,
        servingNodes: evaluation.servingNodes,
        totalNodes: evaluation.totalNodes,
        coveragePercent: roundPercent(evaluation.coveragePercent),
      });
    }
  }

  return statuses;
}

/**
 * Build the status document for a pass. A null snapshot (nothing cached yet)
 * reports no records and no nodes.
 */
export function buildStatusReport(
  snapshot: ReconciliationSnapshot | null,
  available: boolean,
  generatedAt: Date,
): StatusReport {
  return {
    available,
    generatedAt: generatedAt.toISOString(),
    observedAt: snapshot ? snapshot.observedAt.toISOString() : null,
    records: snapshot ? summarizeRecords(snapshot) : [],
    nodes: snapshot ? snapshot.nodes.map(summarizeNode) : [],
  };
}
