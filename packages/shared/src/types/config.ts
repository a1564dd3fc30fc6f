/**
 * Runtime configuration
 * @module @kuberoute/shared/types/config
 */

import type { LabelNames } from './labels.js';
import type { LogLevel } from '../logging/logger.js';

/**
 * How the Kubernetes API session is obtained
 */
export type KubernetesAuthKind = 'in-cluster' | 'kubeconfig' | 'token';

/**
 * All Kubernetes auth kinds
 */
export const ALL_AUTH_KINDS: readonly KubernetesAuthKind[] = ['in-cluster', 'kubeconfig', 'token'];

/**
 * Kubernetes connection settings
 */
export interface KubernetesConfig {
  auth: KubernetesAuthKind;
  /** kubeconfig file (kubeconfig auth); default lookup when absent */
  kubeconfigPath?: string;
  /** kubeconfig context (kubeconfig auth) */
  context?: string;
  /** API server URL (token auth) */
  server?: string;
  /** Bearer token (token auth) */
  token?: string;
  /** CA bundle for the API server (token auth) */
  caFile?: string;
  skipTLSVerify: boolean;
  /** Bound on every API call in milliseconds */
  timeoutMs: number;
}

/**
 * DNS backend identifiers
 */
export type DnsBackendKind = 'route53' | 'skydns' | 'test';

/**
 * All DNS backend identifiers
 */
export const ALL_DNS_BACKENDS: readonly DnsBackendKind[] = ['route53', 'skydns', 'test'];

/**
 * Route53 settings
 */
export interface Route53Config {
  region?: string;
  /** Hosted zone IDs keyed by domain; zones not listed are looked up by name */
  hostedZones: Record<string, string>;
}

/**
 * SkyDNS-over-etcd settings
 */
export interface SkyDnsConfig {
  /** etcd client URL, e.g. http://127.0.0.1:2379 */
  endpoint: string;
  /** Key prefix SkyDNS reads from */
  prefix: string;
}

/**
 * DNS settings
 */
export interface DnsConfig {
  backend: DnsBackendKind;
  /** TTL of every published record in seconds */
  ttl: number;
  /** Bound on every backend call in milliseconds */
  timeoutMs: number;
  route53?: Route53Config;
  skydns?: SkyDnsConfig;
}

/**
 * Status document destination
 */
export interface StatusConfig {
  bucket: string;
  key: string;
  region?: string;
}

/**
 * HTTP trigger server settings
 */
export interface ServerSettings {
  host: string;
  port: number;
}

/**
 * Logging settings
 */
export interface LoggingConfig {
  level: LogLevel;
  pretty: boolean;
}

/**
 * Complete, validated configuration
 */
export interface KuberouteConfig {
  server: ServerSettings;
  labels: LabelNames;
  namespaces: string[];
  kubernetes: KubernetesConfig;
  dns: DnsConfig;
  /** Absent disables status reporting */
  status?: StatusConfig;
  logging: LoggingConfig;
}

/**
 * Defaults applied to every optional setting
 */
export const DEFAULT_SERVER_SETTINGS: ServerSettings = { host: '0.0.0.0', port: 8080 };
export const DEFAULT_NAMESPACES: readonly string[] = ['default'];
export const DEFAULT_RECORD_TTL = 60;
export const DEFAULT_TIMEOUT_MS = 10_000;
export const DEFAULT_SKYDNS_PREFIX = '/skydns';
export const DEFAULT_STATUS_KEY = 'status.json';
