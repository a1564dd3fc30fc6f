/**
 * Shared types for kuberoute
 * @module @kuberoute/shared/types
 */

export type { Labels, LabelNames } from './labels.js';

export {
  DEFAULT_LABEL_NAMES,
  LABEL_NAME_KEYS,
  matchesLabels,
  readLabel,
  isValidLabelKey,
} from './labels.js';

export type {
  ServiceSnapshot,
  PodSnapshot,
  NodeSnapshot,
  ClusterSnapshot,
} from './snapshot.js';

export type {
  RecordType,
  DnsRecord,
  RecordsByDomain,
  ReconciliationSnapshot,
} from './record.js';

export { isIpAddress, inferRecordType, recordFqdn, countRecords } from './record.js';

export type { RecordStatus, NodeStatusSummary, StatusReport } from './status.js';

export type {
  OperationResult,
  SnapshotResult,
  ClusterApi,
  SnapshotSource,
  DnsUpdate,
  DnsUpdateResult,
  DnsBackend,
  StatusReporter,
} from './collaborators.js';

export type {
  KubernetesAuthKind,
  KubernetesConfig,
  DnsBackendKind,
  Route53Config,
  SkyDnsConfig,
  DnsConfig,
  StatusConfig,
  ServerSettings,
  LoggingConfig,
  KuberouteConfig,
} from './config.js';

export {
  ALL_AUTH_KINDS,
  ALL_DNS_BACKENDS,
  DEFAULT_SERVER_SETTINGS,
  DEFAULT_NAMESPACES,
  DEFAULT_RECORD_TTL,
  DEFAULT_TIMEOUT_MS,
  DEFAULT_SKYDNS_PREFIX,
  DEFAULT_STATUS_KEY,
} from './config.js';
