/**
 * Runtime wiring
 * @module @kuberoute/server/runtime
 *
 * Builds the collaborators named by the configuration and the cycle that
 * drives them. One runtime owns one fallback cache for the life of the
 * process.
 */

import {
  FallbackCache,
  ReconciliationCycle,
  createFallbackCache,
  createReconciliationCycle,
} from '@kuberoute/core';
import {
  createServiceLogger,
  type DnsBackend,
  type KuberouteConfig,
  type Logger,
  type SnapshotSource,
  type StatusReporter,
} from '@kuberoute/shared';
import { createKubeConfig, createSnapshotSource, KubernetesClusterApi } from './kubernetes/index.js';
import { createDnsBackend } from './dns/index.js';
import { createS3Reporter } from './status/index.js';

/**
 * Collaborators that replace the configured ones
 */
export interface RuntimeOverrides {
  source?: SnapshotSource;
  backend?: DnsBackend;
  /** `null` disables reporting even when configured */
  reporter?: StatusReporter | null;
  cache?: FallbackCache;
  clock?: () => Date;
  logger?: Logger;
}

/**
 * Everything a trigger needs to run passes
 */
export interface Runtime {
  config: KuberouteConfig;
  logger: Logger;
  source: SnapshotSource;
  backend: DnsBackend;
  reporter: StatusReporter | null;
  cache: FallbackCache;
  cycle: ReconciliationCycle;
}

/**
 * Logger configured from the `logging` section
 */
export function createRuntimeLogger(config: KuberouteConfig): Logger {
  return createServiceLogger({ level: config.logging.level, pretty: config.logging.pretty });
}

/**
 * Wire a runtime from configuration
 */
export function createRuntime(config: KuberouteConfig, overrides: RuntimeOverrides = {}): Runtime {
  const logger = overrides.logger ?? createRuntimeLogger(config);

  const source =
    overrides.source ??
    createSnapshotSource(KubernetesClusterApi.fromKubeConfig(createKubeConfig(config.kubernetes)), {
      timeoutMs: config.kubernetes.timeoutMs,
      logger: logger.child({ component: 'snapshot-source' }),
    });

  const backend = overrides.backend ?? createDnsBackend(config.dns, logger.child({ component: `dns-${config.dns.backend}` }));

  let reporter: StatusReporter | null = null;
  if (overrides.reporter !== undefined) {
    reporter = overrides.reporter;
  } else if (config.status) {
    reporter = createS3Reporter(config.status, config.dns.timeoutMs, logger.child({ component: 's3-reporter' }));
  }

  const cache = overrides.cache ?? createFallbackCache();

  const cycle = createReconciliationCycle({
    source,
    backend,
    cache,
    ...(reporter && { reporter }),
    labelNames: config.labels,
    namespaces: config.namespaces,
    ttl: config.dns.ttl,
    ...(overrides.clock && { clock: overrides.clock }),
    logger: logger.child({ component: 'reconciliation-cycle' }),
  });

  logger.info('Runtime created', {
    namespaces: config.namespaces,
    dnsBackend: backend.name,
    statusReporting: reporter !== null,
  });

  return { config, logger, source, backend, reporter, cache, cycle };
}
