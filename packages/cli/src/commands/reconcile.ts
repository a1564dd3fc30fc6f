/**
 * reconcile command
 *
 * Runs a single pass against the configured cluster and DNS backend.
 * @module @kuberoute/cli/commands/reconcile
 */

import { Command } from 'commander';
import type { CycleOutcome } from '@kuberoute/core';
import { createRuntime, loadConfig } from '@kuberoute/server';
import { error, success, table, warn } from '../output.js';
import { reportFailure, withConfigOption, type ConfigOption } from './options.js';

/**
 * Failed DNS updates of a pass, one row each
 */
export function failedUpdateRows(outcome: CycleOutcome): Array<{ name: string; kind: string; error: string }> {
  if (outcome.status !== 'done') {
    return [];
  }
  return outcome.updates.flatMap((entry) =>
    entry.error ? [{ name: entry.update.name, kind: entry.kind, error: entry.error.message }] : [],
  );
}

/**
 * Print an outcome; returns the process exit code
 */
export function printOutcome(outcome: CycleOutcome): number {
  switch (outcome.status) {
    case 'done': {
      success(outcome.message);
      const failures = failedUpdateRows(outcome);
      if (failures.length > 0) {
        warn('Some DNS updates failed');
        table(failures, [
          { key: 'name', header: 'Name' },
          { key: 'kind', header: 'Kind' },
          { key: 'error', header: 'Error' },
        ]);
      }
      return 0;
    }
    case 'fallback':
      error(outcome.message, { stage: outcome.stage, code: 'CLUSTER_UNREACHABLE' });
      return 1;
    case 'failed':
      error(outcome.message, { stage: outcome.stage, code: 'SNAPSHOT_FAILED' });
      return 1;
  }
}

async function reconcileHandler(options: ConfigOption): Promise<void> {
  try {
    const config = await loadConfig({ path: options.config });
    const runtime = createRuntime(config);
    const outcome = await runtime.cycle.run();
    process.exitCode = printOutcome(outcome);
  } catch (err) {
    reportFailure(err);
  }
}

export function createReconcileCommand(): Command {
  return withConfigOption(new Command('reconcile'))
    .description('Run one reconciliation pass and exit')
    .action(reconcileHandler);
}
