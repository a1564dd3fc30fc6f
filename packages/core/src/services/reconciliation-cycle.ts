/**
 * Reconciliation Cycle
 * @module @kuberoute/core/services/reconciliation-cycle
 *
 * One externally triggered pass:
 *
 *   FETCHING -> PLANNING -> APPLYING -> REPORTING -> DONE
 *       \
 *        -> FALLBACK (cluster API unreachable)
 *
 * DNS is only written once a complete snapshot was fetched. When the cluster
 * API is unreachable the cached pass is reported with `available: false` and
 * nothing is published: an incomplete service list would look exactly like a
 * mass pod failure and fail every record over.
 */

import {
  DnsBackendError,
  ErrorCode,
  countRecords,
  createServiceLogger,
  errorMessage,
  generateCorrelationId,
  inferRecordType,
  recordFqdn,
  DEFAULT_RECORD_TTL,
  type ClusterApiError,
  type DnsBackend,
  type DnsRecord,
  type DnsUpdate,
  type LabelNames,
  type Logger,
  type ReconciliationSnapshot,
  type SnapshotSource,
  type StatusReport,
  type StatusReporter,
} from '@kuberoute/shared';
import type { FallbackCache } from '../stores/fallback-cache.js';
import { planRecords } from './record-planner.js';
import { evaluateQuota } from './quota-evaluator.js';
import { buildStatusReport } from './status-report.js';

/**
 * Stages of a pass
 */
export type CycleStage = 'FETCHING' | 'PLANNING' | 'APPLYING' | 'REPORTING' | 'DONE' | 'FALLBACK';

/**
 * Name published for each domain once all of its records were written
 */
export const HEARTBEAT_NAME = 'kuberoute-alive';

/**
 * Suffix of the stable failover alias published next to each record
 */
export const FAILOVER_SUFFIX = '-failover';

/**
 * Why a DNS update was issued
 */
export type UpdateKind = 'failover' | 'primary' | 'heartbeat';

/**
 * One issued DNS update and its result
 */
export interface UpdateOutcome {
  domain: string;
  kind: UpdateKind;
  update: DnsUpdate;
  error: DnsBackendError | null;
}

/**
 * Result of a pass, returned to the trigger
 */
export type CycleOutcome =
  | {
      status: 'done';
      stage: 'DONE';
      correlationId: string;
      message: string;
      updates: UpdateOutcome[];
      report: StatusReport;
    }
  | {
      status: 'fallback';
      stage: 'FALLBACK';
      correlationId: string;
      message: string;
      error: ClusterApiError;
      report: StatusReport;
    }
  | {
      status: 'failed';
      stage: 'FETCHING';
      correlationId: string;
      message: string;
      error: ClusterApiError;
    };

/**
 * Reconciliation cycle options
 */
export interface ReconciliationCycleOptions {
  source: SnapshotSource;
  backend: DnsBackend;
  cache: FallbackCache;
  /** Optional; without one status reporting is skipped */
  reporter?: StatusReporter;
  labelNames: LabelNames;
  namespaces: readonly string[];
  /** TTL of every published record in seconds (default: 60) */
  ttl?: number;
  /** Clock used for heartbeats and report timestamps */
  clock?: () => Date;
  logger?: Logger;
}

/**
 * Heartbeat stamp, `YYYY-MM-DD-HH-mm` in UTC
 */
export function formatHeartbeatStamp(date: Date): string {
  const pad = (value: number): string => String(value).padStart(2, '0');
  return [
    date.getUTCFullYear(),
    pad(date.getUTCMonth() + 1),
    pad(date.getUTCDate()),
    pad(date.getUTCHours()),
    pad(date.getUTCMinutes()),
  ].join('-');
}

/**
 * Name of the failover alias of a record
 */
export function failoverFqdn(record: Pick<DnsRecord, 'name' | 'domain'>): string {
  return `${record.name}${FAILOVER_SUFFIX}.${record.domain}`;
}

/**
 * Runs reconciliation passes against fixed collaborators
 */
export class ReconciliationCycle {
  private readonly options: ReconciliationCycleOptions;
  private readonly ttl: number;
  private readonly clock: () => Date;
  private readonly logger: Logger;

  constructor(options: ReconciliationCycleOptions) {
    this.options = options;
    this.ttl = options.ttl ?? DEFAULT_RECORD_TTL;
    this.clock = options.clock ?? (() => new Date());
    this.logger =
      options.logger ?? createServiceLogger({ level: 'info' }, { component: 'reconciliation-cycle' });
  }

  /**
   * Run one complete pass
   */
  async run(correlationId: string = generateCorrelationId()): Promise<CycleOutcome> {
    const log = this.logger.withCorrelationId(correlationId);
    const { source, cache, namespaces, labelNames } = this.options;

    log.debug('Entering stage', { stage: 'FETCHING', namespaces: [...namespaces] });
    const fetched = await source.fetch(namespaces);

    if (fetched.error !== null) {
      if (fetched.error.isUnreachable) {
        return this.fallback(fetched.error, correlationId, log);
      }
      log.error('Cluster snapshot could not be fetched', fetched.error, { stage: 'FETCHING' });
      return {
        status: 'failed',
        stage: 'FETCHING',
        correlationId,
        message: `Reconciliation failed at FETCHING: ${fetched.error.message}`,
        error: fetched.error,
      };
    }

    const snapshot = fetched.data;
    const observedAt = this.clock();

    log.debug('Entering stage', { stage: 'PLANNING' });
    const recordsByDomain = planRecords(snapshot, labelNames);
    const current: ReconciliationSnapshot = { recordsByDomain, nodes: snapshot.nodes, observedAt };

    log.info('Planned records', {
      services: snapshot.services.length,
      pods: snapshot.pods.length,
      nodes: snapshot.nodes.length,
      domains: recordsByDomain.size,
      records: countRecords(recordsByDomain),
    });

    log.debug('Entering stage', { stage: 'APPLYING' });
    const perDomain = await Promise.all(
      [...recordsByDomain].map(([domain, records]) => this.applyDomain(domain, records, current, log)),
    );
    const updates = perDomain.flat();
    cache.replace(current);

    log.debug('Entering stage', { stage: 'REPORTING' });
    const report = buildStatusReport(current, true, this.clock());
    await this.sendReport(report, log);

    const failed = updates.filter((outcome) => outcome.error !== null).length;
    let message = `Reconciliation complete: ${countRecords(recordsByDomain)} records across ${recordsByDomain.size} domains`;
    if (failed > 0) {
      message += ` (${failed} of ${updates.length} DNS updates failed)`;
    }

    log.info(message, { stage: 'DONE', updates: updates.length, failedUpdates: failed });
    return { status: 'done', stage: 'DONE', correlationId, message, updates, report };
  }

  /**
   * Report the cached pass as unavailable; DNS stays untouched
   */
  private async fallback(error: ClusterApiError, correlationId: string, log: Logger): Promise<CycleOutcome> {
    const cached = this.options.cache.read();

    log.warn('Cluster API unreachable, reporting last known-good state', {
      stage: 'FALLBACK',
      error: error.message,
      cachedObservedAt: cached?.observedAt.toISOString() ?? null,
    });

    const report = buildStatusReport(cached, false, this.clock());
    await this.sendReport(report, log);

    return {
      status: 'fallback',
      stage: 'FALLBACK',
      correlationId,
      message: `Reconciliation failed at FETCHING: cluster API unreachable (${error.message})`,
      error,
      report,
    };
  }

  /**
   * Publish every record of a domain in order, then its heartbeat
   */
  private async applyDomain(
    domain: string,
    records: readonly DnsRecord[],
    current: ReconciliationSnapshot,
    log: Logger,
  ): Promise<UpdateOutcome[]> {
    const outcomes: UpdateOutcome[] = [];

    for (const record of records) {
      const { alive, servingNodes, totalNodes } = evaluateQuota(record, current.nodes);

      if (record.failoverTarget) {
        outcomes.push(
          await this.apply(domain, 'failover', {
            name: failoverFqdn(record),
            values: [record.failoverTarget],
            ttl: this.ttl,
            recordType: inferRecordType([record.failoverTarget]),
          }, log),
        );
      }

      let primary: DnsUpdate;
      if (alive) {
        primary = {
          name: recordFqdn(record),
          values: [...record.addresses],
          ttl: this.ttl,
          recordType: record.recordType,
        };
      } else if (record.failoverTarget) {
        primary = {
          name: recordFqdn(record),
          values: [record.failoverTarget],
          ttl: this.ttl,
          recordType: inferRecordType([record.failoverTarget]),
        };
      } else {
        primary = { name: recordFqdn(record), values: [], ttl: this.ttl, recordType: record.recordType };
      }

      if (!alive) {
        log.warn('Record below quota, publishing failover', {
          fqdn: primary.name,
          servingNodes,
          totalNodes,
          quotaPercent: record.quotaPercent ?? null,
          failoverTarget: record.failoverTarget ?? null,
        });
      }

      outcomes.push(await this.apply(domain, 'primary', primary, log));
    }

    outcomes.push(
      await this.apply(domain, 'heartbeat', {
        name: `${HEARTBEAT_NAME}.${domain}`,
        values: [`${formatHeartbeatStamp(this.clock())}.${domain}`],
        ttl: this.ttl,
        recordType: 'CNAME',
      }, log),
    );

    return outcomes;
  }

  /**
   * Issue one update; a failure is recorded and never stops the pass
   */
  private async apply(domain: string, kind: UpdateKind, update: DnsUpdate, log: Logger): Promise<UpdateOutcome> {
    const { backend } = this.options;
    let error: DnsBackendError | null;

    try {
      const result = await backend.updateRecord(update);
      error = result.error;
    } catch (thrown) {
      error = new DnsBackendError(
        errorMessage(thrown),
        backend.name,
        update.name,
        ErrorCode.DNS_UPDATE_FAILED,
        thrown instanceof Error ? thrown : undefined,
      );
    }

    if (error) {
      log.error('DNS update failed', error, { backend: backend.name, kind, name: update.name });
    } else {
      log.debug('DNS record updated', {
        backend: backend.name,
        kind,
        name: update.name,
        recordType: update.recordType,
        values: update.values,
      });
    }

    return { domain, kind, update, error };
  }

  /**
   * Hand the report to the reporter, if any; failures are only logged
   */
  private async sendReport(report: StatusReport, log: Logger): Promise<void> {
    const { reporter } = this.options;
    if (!reporter) {
      return;
    }

    try {
      await reporter.write(report);
      log.debug('Status report written', { available: report.available, records: report.records.length });
    } catch (error) {
      log.error('Status report could not be written', error instanceof Error ? error : { error: String(error) });
    }
  }
}

/**
 * Create a reconciliation cycle
 */
export function createReconciliationCycle(options: ReconciliationCycleOptions): ReconciliationCycle {
  return new ReconciliationCycle(options);
}
