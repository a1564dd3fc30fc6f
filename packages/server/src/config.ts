/**
 * Configuration loading
 * @module @kuberoute/server/config
 *
 * Reads the YAML configuration file, applies environment overrides and
 * validates the result. Any problem is a `ConfigurationError`, fatal at
 * startup.
 */

import { readFile } from 'node:fs/promises';
import yaml from 'js-yaml';
import {
  ConfigurationError,
  ErrorCode,
  errorMessage,
  isRecord,
  validateConfig,
  type KuberouteConfig,
} from '@kuberoute/shared';

/**
 * Configuration file used when neither --config nor KUBEROUTE_CONFIG is set
 */
export const DEFAULT_CONFIG_PATH = '/etc/kuberoute/config.yaml';

/**
 * Pick the configuration file: explicit path, then KUBEROUTE_CONFIG, then the default
 */
export function resolveConfigPath(explicit?: string, env: NodeJS.ProcessEnv = process.env): string {
  return explicit || env.KUBEROUTE_CONFIG || DEFAULT_CONFIG_PATH;
}

/**
 * Apply PORT, HOST and LOG_LEVEL on top of the parsed document
 */
export function applyEnvOverrides(document: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
  if (!isRecord(document)) {
    return document;
  }

  const result: Record<string, unknown> = { ...document };
  const server: Record<string, unknown> = isRecord(document.server) ? { ...document.server } : {};
  const logging: Record<string, unknown> = isRecord(document.logging) ? { ...document.logging } : {};

  if (env.PORT) {
    const port = Number(env.PORT);
    // Left as text when not numeric so validation reports it
    server.port = Number.isNaN(port) ? env.PORT : port;
  }
  if (env.HOST) {
    server.host = env.HOST;
  }
  if (env.LOG_LEVEL) {
    logging.level = env.LOG_LEVEL;
  }

  if (Object.keys(server).length > 0) {
    result.server = server;
  }
  if (Object.keys(logging).length > 0) {
    result.logging = logging;
  }
  return result;
}

/**
 * Parse and validate configuration text
 */
export function parseConfig(text: string, env: NodeJS.ProcessEnv = process.env, source = 'configuration'): KuberouteConfig {
  let document: unknown;
  try {
    // An empty file is an empty mapping
    document = yaml.load(text) ?? {};
  } catch (error) {
    throw new ConfigurationError(
      `${source} is not valid YAML: ${errorMessage(error)}`,
      [],
      ErrorCode.CONFIGURATION_INVALID,
      error instanceof Error ? error : undefined,
    );
  }

  const result = validateConfig(applyEnvOverrides(document, env));
  if (!result.valid) {
    throw new ConfigurationError(`Invalid ${source}: ${result.error.message}`, result.error.details);
  }
  return result.value;
}

/**
 * Load the configuration file
 */
export async function loadConfig(
  options: { path?: string; env?: NodeJS.ProcessEnv } = {},
): Promise<KuberouteConfig> {
  const env = options.env ?? process.env;
  const path = resolveConfigPath(options.path, env);

  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(
      `Cannot read configuration file ${path}: ${errorMessage(error)}`,
      [],
      ErrorCode.CONFIGURATION_NOT_FOUND,
      error instanceof Error ? error : undefined,
    );
  }

  return parseConfig(text, env, path);
}
