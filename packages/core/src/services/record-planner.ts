/**
 * Record Planner
 * @module @kuberoute/core/services/record-planner
 *
 * Turns one cluster snapshot into the DNS records to publish, grouped per
 * domain. Missing or malformed data never fails the plan: a service without
 * usable labels is skipped and a pod that cannot be placed on an addressed
 * node simply contributes nothing.
 */

import {
  inferRecordType,
  matchesLabels,
  readLabel,
  type ClusterSnapshot,
  type DnsRecord,
  type LabelNames,
  type NodeSnapshot,
  type PodSnapshot,
  type RecordsByDomain,
  type ServiceSnapshot,
} from '@kuberoute/shared';

/**
 * Parse the quota label. Non-numeric values count as absent;
 * numeric values are clamped into [0, 100].
 */
export function parseQuotaPercent(value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const trimmed = value.trim().replace(/%$/, '');
  if (!/^\d+(\.\d+)?$/.test(trimmed)) {
    return undefined;
  }
  return Math.min(100, Math.max(0, Number(trimmed)));
}

/**
 * Pods of the service's own namespace whose labels carry its whole selector.
 * An empty selector selects every pod of the namespace.
 */
export function selectPods(service: ServiceSnapshot, pods: readonly PodSnapshot[]): PodSnapshot[] {
  return pods.filter(
    (pod) => pod.namespace === service.namespace && matchesLabels(pod.labels, service.selector),
  );
}

/**
 * Build the record for one candidate service
 */
function buildRecord(
  service: ServiceSnapshot,
  domain: string,
  name: string,
  pods: readonly PodSnapshot[],
  nodesByName: ReadonlyMap<string, NodeSnapshot>,
  labelNames: LabelNames,
): DnsRecord {
  const addresses = new Set<string>();
  const nodeNames = new Set<string>();

  for (const pod of selectPods(service, pods)) {
    if (!pod.ready || !pod.nodeName) {
      continue;
    }
    const address = nodesByName.get(pod.nodeName)?.address?.trim();
    if (!address) {
      continue;
    }
    addresses.add(address);
    nodeNames.add(pod.nodeName);
  }

  const sortedAddresses = [...addresses].sort();
  const record: DnsRecord = {
    domain,
    name,
    recordType: inferRecordType(sortedAddresses),
    addresses: sortedAddresses,
    nodeNames: [...nodeNames].sort(),
    service: service.name,
    namespace: service.namespace,
  };

  const quotaPercent = parseQuotaPercent(readLabel(service.labels, labelNames.quota));
  if (quotaPercent !== undefined) {
    record.quotaPercent = quotaPercent;
  }

  const failoverTarget = readLabel(service.labels, labelNames.failover);
  if (failoverTarget !== undefined) {
    record.failoverTarget = failoverTarget;
  }

  return record;
}

/**
 * Plan the records of a snapshot, grouped per domain in service discovery order
 */
export function planRecords(snapshot: ClusterSnapshot, labelNames: LabelNames): RecordsByDomain {
  const nodesByName = new Map(snapshot.nodes.map((node) => [node.name, node]));
  const recordsByDomain: RecordsByDomain = new Map();

  for (const service of snapshot.services) {
    const domain = readLabel(service.labels, labelNames.domain)?.toLowerCase().replace(/\.$/, '');
    const name = readLabel(service.labels, labelNames.name)?.toLowerCase();
    if (!domain || !name) {
      continue;
    }

    const record = buildRecord(service, domain, name, snapshot.pods, nodesByName, labelNames);
    const records = recordsByDomain.get(domain);
    if (records) {
      records.push(record);
    } else {
      recordsByDomain.set(domain, [record]);
    }
  }

  return recordsByDomain;
}
