/**
 * plan command
 *
 * Fetches the cluster, plans records and shows what a pass would publish.
 * Nothing is written to DNS.
 * @module @kuberoute/cli/commands/plan
 */

import { Command } from 'commander';
import { planRecords, summarizeRecords } from '@kuberoute/core';
import {
  createKubeConfig,
  createSnapshotSource,
  KubernetesClusterApi,
  loadConfig,
} from '@kuberoute/server';
import type { ClusterSnapshot, LabelNames, RecordStatus } from '@kuberoute/shared';
import { aliveBadge, error, getOutputFormat, isOutputFormat, setOutputFormat, table } from '../output.js';
import { reportFailure, withConfigOption, type ConfigOption } from './options.js';

/**
 * One planned record and the values a pass would publish for it
 */
export interface PlanEntry extends RecordStatus {
  publish: string[];
}

/**
 * Plan a fetched snapshot
 */
export function buildPlan(snapshot: ClusterSnapshot, labelNames: LabelNames, observedAt: Date = new Date()): PlanEntry[] {
  const recordsByDomain = planRecords(snapshot, labelNames);
  return summarizeRecords({ recordsByDomain, nodes: snapshot.nodes, observedAt }).map((status) => {
    let publish: string[] = [];
    if (status.alive) {
      publish = [...status.addresses];
    } else if (status.failoverTarget) {
      publish = [status.failoverTarget];
    }
    return { ...status, publish };
  });
}

/**
 * Flatten plan entries for the table format
 */
export function planTableRows(entries: readonly PlanEntry[]): Array<Record<'fqdn' | 'type' | 'nodes' | 'quota' | 'health' | 'publish', string>> {
  return entries.map((entry) => ({
    fqdn: entry.fqdn,
    type: entry.recordType,
    nodes: `${entry.servingNodes}/${entry.totalNodes} (${entry.coveragePercent}%)`,
    quota: entry.quotaPercent === null ? '-' : `${entry.quotaPercent}%`,
    health: aliveBadge(entry.alive),
    publish: entry.publish.length > 0 ? entry.publish.join(',') : '(empty)',
  }));
}

async function planHandler(options: ConfigOption & { output?: string }): Promise<void> {
  if (options.output !== undefined) {
    if (!isOutputFormat(options.output)) {
      error(`Unknown output format: ${options.output}`);
      process.exitCode = 1;
      return;
    }
    setOutputFormat(options.output);
  }

  try {
    const config = await loadConfig({ path: options.config });
    const source = createSnapshotSource(KubernetesClusterApi.fromKubeConfig(createKubeConfig(config.kubernetes)), {
      timeoutMs: config.kubernetes.timeoutMs,
    });

    const fetched = await source.fetch(config.namespaces);
    if (fetched.error !== null) {
      error(fetched.error.message, { kind: fetched.error.kind });
      process.exitCode = 1;
      return;
    }

    const entries = buildPlan(fetched.data, config.labels);
    if (getOutputFormat() === 'json') {
      console.log(JSON.stringify(entries, null, 2));
      return;
    }
    table(planTableRows(entries), [
      { key: 'fqdn', header: 'Name' },
      { key: 'type', header: 'Type' },
      { key: 'nodes', header: 'Nodes' },
      { key: 'quota', header: 'Quota' },
      { key: 'health', header: 'Health' },
      { key: 'publish', header: 'Publish' },
    ]);
  } catch (err) {
    reportFailure(err);
  }
}

export function createPlanCommand(): Command {
  return withConfigOption(new Command('plan'))
    .description('Show the records a pass would publish, without touching DNS')
    .option('-o, --output <format>', 'Output format: json, table')
    .action(planHandler);
}
