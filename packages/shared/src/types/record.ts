/**
 * DNS records derived from a cluster snapshot
 * @module @kuberoute/shared/types/record
 */

import { isIP } from 'node:net';
import type { NodeSnapshot } from './snapshot.js';

/**
 * Supported record types
 */
export type RecordType = 'A' | 'CNAME';

/**
 * A planned DNS record for one labeled service
 */
export interface DnsRecord {
  /** Zone, e.g. `example.com` */
  domain: string;
  /** Subdomain part, e.g. `app` */
  name: string;
  recordType: RecordType;
  /** Deduplicated, sorted, never contains the empty string */
  addresses: string[];
  /** Distinct nodes that contributed an address */
  nodeNames: string[];
  /** Minimum node coverage in percent (0-100); absent skips the quota check */
  quotaPercent?: number;
  failoverTarget?: string;
  /** Service the record was derived from */
  service: string;
  namespace: string;
}

/**
 * Records grouped per domain, in service discovery order
 */
export type RecordsByDomain = Map<string, DnsRecord[]>;

/**
 * Last known-good pass, held by the fallback cache
 */
export interface ReconciliationSnapshot {
  recordsByDomain: RecordsByDomain;
  nodes: NodeSnapshot[];
  observedAt: Date;
}

/**
 * Check if a value is an IPv4 or IPv6 literal
 */
export function isIpAddress(value: string): boolean {
  return isIP(value) !== 0;
}

/**
 * Infer the record type for a set of values: any hostname makes it a CNAME
 */
export function inferRecordType(values: readonly string[]): RecordType {
  return values.some((value) => !isIpAddress(value)) ? 'CNAME' : 'A';
}

/**
 * Fully qualified name of a record
 */
export function recordFqdn(record: Pick<DnsRecord, 'name' | 'domain'>): string {
  return `${record.name}.${record.domain}`;
}

/**
 * Count records across all domains
 */
export function countRecords(recordsByDomain: RecordsByDomain): number {
  let total = 0;
  for (const records of recordsByDomain.values()) {
    total += records.length;
  }
  return total;
}
