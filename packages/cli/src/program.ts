/**
 * CLI program definition
 * @module @kuberoute/cli/program
 */

import { Command } from 'commander';
import chalk from 'chalk';
import {
  createCheckConfigCommand,
  createPlanCommand,
  createReconcileCommand,
  createServeCommand,
} from './commands/index.js';

/**
 * CLI version from package.json
 */
export const VERSION = '0.1.0';

const DESCRIPTION = `
kuberoute

Publishes DNS records for labelled Kubernetes services, failing a record
over when too few nodes run its pods.

Commands:
  serve         Start the HTTP trigger server
  reconcile     Run one reconciliation pass
  plan          Show what a pass would publish
  check-config  Validate the configuration file

Examples:
  $ kuberoute serve --config ./kuberoute.yaml
  $ kuberoute plan -o json
`;

/**
 * Creates and configures the main CLI program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('kuberoute')
    .version(VERSION, '-v, --version', 'Display CLI version')
    .description(DESCRIPTION)
    .option('--no-color', 'Disable colored output')
    .hook('preAction', (thisCommand) => {
      if (thisCommand.opts().color === false) {
        chalk.level = 0;
      }
    });

  program.addCommand(createServeCommand());
  program.addCommand(createReconcileCommand());
  program.addCommand(createPlanCommand());
  program.addCommand(createCheckConfigCommand());

  return program;
}
