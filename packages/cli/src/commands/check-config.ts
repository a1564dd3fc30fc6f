/**
 * check-config command
 * @module @kuberoute/cli/commands/check-config
 */

import { Command } from 'commander';
import { loadConfig, resolveConfigPath } from '@kuberoute/server';
import type { KuberouteConfig } from '@kuberoute/shared';
import { keyValue, success } from '../output.js';
import { reportFailure, withConfigOption, type ConfigOption } from './options.js';

/**
 * Summary printed for a valid configuration
 */
export function summarizeConfig(config: KuberouteConfig): Record<string, unknown> {
  return {
    listen: `${config.server.host}:${config.server.port}`,
    namespaces: config.namespaces,
    kubernetesAuth: config.kubernetes.auth,
    dnsBackend: config.dns.backend,
    ttl: config.dns.ttl,
    statusReport: config.status ? `s3://${config.status.bucket}/${config.status.key}` : null,
    labels: Object.values(config.labels),
  };
}

async function checkConfigHandler(options: ConfigOption): Promise<void> {
  const path = resolveConfigPath(options.config);
  try {
    const config = await loadConfig({ path });
    success(`Configuration valid: ${path}`);
    keyValue(summarizeConfig(config));
  } catch (err) {
    reportFailure(err);
  }
}

export function createCheckConfigCommand(): Command {
  return withConfigOption(new Command('check-config'))
    .description('Validate the configuration file')
    .action(checkConfigHandler);
}
