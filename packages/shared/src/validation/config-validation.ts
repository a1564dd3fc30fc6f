/**
 * Configuration validation
 *
 * Turns the parsed configuration document into a complete `KuberouteConfig`,
 * filling defaults and collecting every problem found in one pass.
 * @module @kuberoute/shared/validation/config-validation
 */

import {
  ValidationError,
  validResult,
  invalidResult,
  type ValidationErrorDetail,
  type ValidationResult,
} from '../errors/index.js';
import {
  DEFAULT_LABEL_NAMES,
  LABEL_NAME_KEYS,
  isValidLabelKey,
  type LabelNames,
} from '../types/labels.js';
import {
  ALL_AUTH_KINDS,
  ALL_DNS_BACKENDS,
  DEFAULT_NAMESPACES,
  DEFAULT_RECORD_TTL,
  DEFAULT_SERVER_SETTINGS,
  DEFAULT_SKYDNS_PREFIX,
  DEFAULT_STATUS_KEY,
  DEFAULT_TIMEOUT_MS,
  type DnsBackendKind,
  type DnsConfig,
  type KubernetesAuthKind,
  type KubernetesConfig,
  type KuberouteConfig,
  type LoggingConfig,
  type Route53Config,
  type ServerSettings,
  type SkyDnsConfig,
  type StatusConfig,
} from '../types/config.js';
import { ALL_LOG_LEVELS, isLogLevel } from '../logging/logger.js';

/**
 * Namespace name pattern (RFC 1123 label)
 */
const NAMESPACE_PATTERN = /^[a-z0-9]([-a-z0-9]{0,61}[a-z0-9])?$/;

/**
 * Domain name pattern for hosted zone keys
 */
const DOMAIN_PATTERN = /^([a-zA-Z0-9]([-a-zA-Z0-9]{0,61}[a-zA-Z0-9])?\.)+[a-zA-Z]{2,63}$/;

type Section = Record<string, unknown>;

/**
 * Check if a value is a plain object
 */
export function isRecord(value: unknown): value is Section {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Collects details while a document is walked
 */
class DetailCollector {
  readonly details: ValidationErrorDetail[] = [];

  add(field: string, message: string, rule: string, received?: unknown): void {
    this.details.push({ field, message, rule, received });
  }

  section(parent: Section, key: string): Section | undefined {
    const value = parent[key];
    if (value === undefined || value === null) {
      return undefined;
    }
    if (!isRecord(value)) {
      this.add(key, `${key} must be a mapping`, 'type', value);
      return undefined;
    }
    return value;
  }

  string(section: Section, key: string, field: string): string | undefined {
    const value = section[key];
    if (value === undefined || value === null) {
      return undefined;
    }
    if (typeof value !== 'string' || value.trim() === '') {
      this.add(field, `${field} must be a non-empty string`, 'type', value);
      return undefined;
    }
    return value.trim();
  }

  boolean(section: Section, key: string, field: string, fallback: boolean): boolean {
    const value = section[key];
    if (value === undefined || value === null) {
      return fallback;
    }
    if (typeof value !== 'boolean') {
      this.add(field, `${field} must be a boolean`, 'type', value);
      return fallback;
    }
    return value;
  }

  integer(
    section: Section,
    key: string,
    field: string,
    fallback: number,
    min: number,
    max: number,
  ): number {
    const value = section[key];
    if (value === undefined || value === null) {
      return fallback;
    }
    if (typeof value !== 'number' || !Number.isInteger(value)) {
      this.add(field, `${field} must be an integer`, 'type', value);
      return fallback;
    }
    if (value < min || value > max) {
      this.add(field, `${field} must be between ${min} and ${max}`, 'range', value);
      return fallback;
    }
    return value;
  }
}

function validateServer(doc: Section, c: DetailCollector): ServerSettings {
  const section = c.section(doc, 'server') ?? {};
  return {
    host: c.string(section, 'host', 'server.host') ?? DEFAULT_SERVER_SETTINGS.host,
    port: c.integer(section, 'port', 'server.port', DEFAULT_SERVER_SETTINGS.port, 1, 65535),
  };
}

function validateLabelNames(doc: Section, c: DetailCollector): LabelNames {
  const section = c.section(doc, 'labels') ?? {};
  const labels: LabelNames = { ...DEFAULT_LABEL_NAMES };

  for (const key of LABEL_NAME_KEYS) {
    const value = c.string(section, key, `labels.${key}`);
    if (value === undefined) {
      continue;
    }
    if (!isValidLabelKey(value)) {
      c.add(`labels.${key}`, `labels.${key} is not a valid label key`, 'format', value);
      continue;
    }
    labels[key] = value;
  }

  return labels;
}

function validateNamespaces(doc: Section, c: DetailCollector): string[] {
  const value = doc.namespaces;
  if (value === undefined || value === null) {
    return [...DEFAULT_NAMESPACES];
  }
  if (!Array.isArray(value) || value.length === 0) {
    c.add('namespaces', 'namespaces must be a non-empty list', 'type', value);
    return [];
  }

  const namespaces: string[] = [];
  value.forEach((entry: unknown, index) => {
    if (typeof entry !== 'string' || !NAMESPACE_PATTERN.test(entry)) {
      c.add(`namespaces[${index}]`, 'namespace must be a valid namespace name', 'format', entry);
      return;
    }
    if (!namespaces.includes(entry)) {
      namespaces.push(entry);
    }
  });
  return namespaces;
}

function isAuthKind(value: unknown): value is KubernetesAuthKind {
  return ALL_AUTH_KINDS.some((kind) => kind === value);
}

function isDnsBackendKind(value: unknown): value is DnsBackendKind {
  return ALL_DNS_BACKENDS.some((kind) => kind === value);
}

function validateKubernetes(doc: Section, c: DetailCollector): KubernetesConfig {
  const section = c.section(doc, 'kubernetes') ?? {};
  const rawAuth = section.auth ?? 'in-cluster';
  let auth: KubernetesAuthKind = 'in-cluster';

  if (isAuthKind(rawAuth)) {
    auth = rawAuth;
  } else {
    c.add('kubernetes.auth', `kubernetes.auth must be one of: ${ALL_AUTH_KINDS.join(', ')}`, 'enum', rawAuth);
  }

  const config: KubernetesConfig = {
    auth,
    kubeconfigPath: c.string(section, 'kubeconfigPath', 'kubernetes.kubeconfigPath'),
    context: c.string(section, 'context', 'kubernetes.context'),
    server: c.string(section, 'server', 'kubernetes.server'),
    token: c.string(section, 'token', 'kubernetes.token'),
    caFile: c.string(section, 'caFile', 'kubernetes.caFile'),
    skipTLSVerify: c.boolean(section, 'skipTLSVerify', 'kubernetes.skipTLSVerify', false),
    timeoutMs: c.integer(section, 'timeoutMs', 'kubernetes.timeoutMs', DEFAULT_TIMEOUT_MS, 100, 600_000),
  };

  if (auth === 'token') {
    if (!config.server) {
      c.add('kubernetes.server', 'kubernetes.server is required for token auth', 'required');
    }
    if (!config.token) {
      c.add('kubernetes.token', 'kubernetes.token is required for token auth', 'required');
    }
  }

  return config;
}

function validateRoute53(section: Section, c: DetailCollector): Route53Config {
  const zones = c.section(section, 'hostedZones') ?? {};
  const hostedZones: Record<string, string> = {};

  for (const [domain, zoneId] of Object.entries(zones)) {
    const field = `dns.route53.hostedZones.${domain}`;
    if (!DOMAIN_PATTERN.test(domain)) {
      c.add(field, 'hosted zone key must be a domain name', 'format', domain);
      continue;
    }
    if (typeof zoneId !== 'string' || zoneId.trim() === '') {
      c.add(field, 'hosted zone ID must be a non-empty string', 'type', zoneId);
      continue;
    }
    hostedZones[domain.toLowerCase()] = zoneId.trim();
  }

  return {
    region: c.string(section, 'region', 'dns.route53.region'),
    hostedZones,
  };
}

function validateSkyDns(section: Section | undefined, c: DetailCollector): SkyDnsConfig | undefined {
  const endpoint = section ? c.string(section, 'endpoint', 'dns.skydns.endpoint') : undefined;
  if (!endpoint) {
    c.add('dns.skydns.endpoint', 'dns.skydns.endpoint is required for the skydns backend', 'required');
    return undefined;
  }
  if (!/^https?:\/\//.test(endpoint)) {
    c.add('dns.skydns.endpoint', 'dns.skydns.endpoint must be an http(s) URL', 'format', endpoint);
    return undefined;
  }

  const prefix = (section && c.string(section, 'prefix', 'dns.skydns.prefix')) ?? DEFAULT_SKYDNS_PREFIX;
  return {
    endpoint: endpoint.replace(/\/+$/, ''),
    prefix: `/${prefix.replace(/^\/+|\/+$/g, '')}`,
  };
}

function validateDns(doc: Section, c: DetailCollector): DnsConfig {
  const section = c.section(doc, 'dns') ?? {};
  const rawBackend = section.backend;
  let backend: DnsBackendKind = 'test';

  if (rawBackend === undefined || rawBackend === null) {
    c.add('dns.backend', 'dns.backend is required', 'required');
  } else if (isDnsBackendKind(rawBackend)) {
    backend = rawBackend;
  } else {
    c.add('dns.backend', `dns.backend must be one of: ${ALL_DNS_BACKENDS.join(', ')}`, 'enum', rawBackend);
  }

  const config: DnsConfig = {
    backend,
    ttl: c.integer(section, 'ttl', 'dns.ttl', DEFAULT_RECORD_TTL, 1, 86_400),
    timeoutMs: c.integer(section, 'timeoutMs', 'dns.timeoutMs', DEFAULT_TIMEOUT_MS, 100, 600_000),
  };

  if (backend === 'route53') {
    config.route53 = validateRoute53(c.section(section, 'route53') ?? {}, c);
  } else if (backend === 'skydns') {
    config.skydns = validateSkyDns(c.section(section, 'skydns'), c);
  }

  return config;
}

function validateStatus(doc: Section, c: DetailCollector): StatusConfig | undefined {
  const section = c.section(doc, 'status');
  if (!section) {
    return undefined;
  }

  const bucket = c.string(section, 'bucket', 'status.bucket');
  if (!bucket) {
    c.add('status.bucket', 'status.bucket is required when status reporting is configured', 'required');
    return undefined;
  }

  return {
    bucket,
    key: c.string(section, 'key', 'status.key') ?? DEFAULT_STATUS_KEY,
    region: c.string(section, 'region', 'status.region'),
  };
}

function validateLogging(doc: Section, c: DetailCollector): LoggingConfig {
  const section = c.section(doc, 'logging') ?? {};
  const level = section.level ?? 'info';

  if (!isLogLevel(level)) {
    c.add('logging.level', `logging.level must be one of: ${ALL_LOG_LEVELS.join(', ')}`, 'enum', level);
  }

  return {
    level: isLogLevel(level) ? level : 'info',
    pretty: c.boolean(section, 'pretty', 'logging.pretty', false),
  };
}

/**
 * Validate a parsed configuration document
 */
export function validateConfig(document: unknown): ValidationResult<KuberouteConfig> {
  if (!isRecord(document)) {
    return invalidResult(ValidationError.invalidFormat('config', 'a mapping at the document root', document));
  }

  const collector = new DetailCollector();
  const config: KuberouteConfig = {
    server: validateServer(document, collector),
    labels: validateLabelNames(document, collector),
    namespaces: validateNamespaces(document, collector),
    kubernetes: validateKubernetes(document, collector),
    dns: validateDns(document, collector),
    logging: validateLogging(document, collector),
  };

  const status = validateStatus(document, collector);
  if (status) {
    config.status = status;
  }

  if (collector.details.length > 0) {
    return invalidResult(ValidationError.multiple(collector.details));
  }

  return validResult(config);
}
