/**
 * serve command
 * @module @kuberoute/cli/commands/serve
 */

import { Command } from 'commander';
import { runServer } from '@kuberoute/server';
import { reportFailure, withConfigOption, type ConfigOption } from './options.js';

async function serveHandler(options: ConfigOption): Promise<void> {
  try {
    await runServer(options.config);
  } catch (err) {
    reportFailure(err);
  }
}

export function createServeCommand(): Command {
  return withConfigOption(new Command('serve'))
    .description('Start the HTTP trigger server')
    .action(serveHandler);
}
