/**
 * CLI commands
 * @module @kuberoute/cli/commands
 */

export { createServeCommand } from './serve.js';
export { createReconcileCommand, printOutcome, failedUpdateRows } from './reconcile.js';
export { createPlanCommand, buildPlan, planTableRows, type PlanEntry } from './plan.js';
export { createCheckConfigCommand, summarizeConfig } from './check-config.js';
