/**
 * Options shared by every command
 * @module @kuberoute/cli/commands/options
 */

import type { Command } from 'commander';
import { isConfigurationError, errorMessage } from '@kuberoute/shared';
import { error } from '../output.js';

export interface ConfigOption {
  config?: string;
}

/**
 * Add the --config option
 */
export function withConfigOption(command: Command): Command {
  return command.option(
    '-c, --config <path>',
    'Configuration file (default: $KUBEROUTE_CONFIG or /etc/kuberoute/config.yaml)',
  );
}

/**
 * Print a command failure and mark the process as failed
 */
export function reportFailure(err: unknown): void {
  if (isConfigurationError(err)) {
    error(err.message, err.details.length > 0 ? err.details : undefined);
  } else {
    error(errorMessage(err));
  }
  process.exitCode = 1;
}

