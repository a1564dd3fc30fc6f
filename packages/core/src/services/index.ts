/**
 * Services for kuberoute core
 * @module @kuberoute/core/services
 */

export { planRecords, selectPods, parseQuotaPercent } from './record-planner.js';

export { evaluateQuota, isRecordAlive } from './quota-evaluator.js';
export type { QuotaEvaluation } from './quota-evaluator.js';

export { buildStatusReport, summarizeRecords } from './status-report.js';

export {
  ReconciliationCycle,
  createReconciliationCycle,
  formatHeartbeatStamp,
  failoverFqdn,
  HEARTBEAT_NAME,
  FAILOVER_SUFFIX,
} from './reconciliation-cycle.js';

export type {
  CycleStage,
  CycleOutcome,
  UpdateKind,
  UpdateOutcome,
  ReconciliationCycleOptions,
} from './reconciliation-cycle.js';
