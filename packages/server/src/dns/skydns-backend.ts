/**
 * SkyDNS backend
 * @module @kuberoute/server/dns/skydns-backend
 *
 * SkyDNS serves records out of etcd. A name maps to a directory of the
 * reversed labels under the prefix; each value is one JSON message in it:
 *
 *   app.example.com -> <prefix>/com/example/app/<value key> = {"host":"10.0.0.1","ttl":60}
 *
 * Writes go through the etcd v2 keys API. After the values are written, keys
 * of the directory that no longer carry a value are deleted; child
 * directories belong to other names and are left alone.
 */

import axios, { type AxiosInstance } from 'axios';
import {
  DnsBackendError,
  ErrorCode,
  createServiceLogger,
  errorMessage,
  type DnsBackend,
  type DnsUpdate,
  type DnsUpdateResult,
  type Logger,
  type SkyDnsConfig,
} from '@kuberoute/shared';

/**
 * SkyDNS message stored per value
 */
export interface SkyDnsMessage {
  host: string;
  ttl: number;
}

/**
 * etcd v2 answer to a directory read
 */
interface EtcdDirectoryResponse {
  node?: {
    key: string;
    dir?: boolean;
    nodes?: Array<{ key: string; dir?: boolean }>;
  };
}

/**
 * etcd directory for a record name
 */
export function skydnsPath(prefix: string, name: string): string {
  const labels = name.toLowerCase().replace(/\.$/, '').split('.').filter(Boolean).reverse();
  return [prefix.replace(/\/+$/, ''), ...labels].join('/');
}

/**
 * Key of one value inside a record directory
 */
export function valueKey(value: string): string {
  return value.toLowerCase().replace(/[^a-z0-9-]/g, '-');
}

/**
 * SkyDNS backend over the etcd v2 keys API
 */
export class SkyDnsBackend implements DnsBackend {
  readonly name = 'skydns';
  private readonly http: AxiosInstance;
  private readonly prefix: string;
  private readonly logger: Logger;

  constructor(config: SkyDnsConfig, options: { timeoutMs: number; http?: AxiosInstance; logger?: Logger }) {
    this.prefix = config.prefix;
    this.http =
      options.http ??
      axios.create({
        baseURL: `${config.endpoint}/v2/keys`,
        timeout: options.timeoutMs,
      });
    this.logger = options.logger ?? createServiceLogger({ level: 'info' }, { component: 'dns-skydns' });
  }

  async updateRecord(update: DnsUpdate): Promise<DnsUpdateResult> {
    const directory = skydnsPath(this.prefix, update.name);

    try {
      const existing = await this.listValueKeys(directory);
      const written = new Set<string>();

      for (const value of update.values) {
        const message: SkyDnsMessage = { host: value, ttl: update.ttl };
        const body = new URLSearchParams({ value: JSON.stringify(message), ttl: String(update.ttl) });
        const key = valueKey(value);
        await this.http.put(`${directory}/${key}`, body.toString(), {
          headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        });
        written.add(key);
      }

      const stale = existing.filter((key) => !written.has(key));
      for (const key of stale) {
        await this.http.delete(`${directory}/${key}`);
      }

      this.logger.debug('SkyDNS record written', { name: update.name, directory, values: update.values, removed: stale });
      return { data: true, error: null };
    } catch (error) {
      return { data: null, error: this.toBackendError(update.name, error) };
    }
  }

  /**
   * Value keys currently stored for a record; none when the directory is missing
   */
  private async listValueKeys(directory: string): Promise<string[]> {
    try {
      const response = await this.http.get<EtcdDirectoryResponse>(directory);
      return (response.data.node?.nodes ?? [])
        .filter((node) => !node.dir)
        .map((node) => node.key.slice(node.key.lastIndexOf('/') + 1));
    } catch (error) {
      if (axios.isAxiosError(error) && error.response?.status === 404) {
        return [];
      }
      throw error;
    }
  }

  private toBackendError(recordName: string, error: unknown): DnsBackendError {
    const cause = error instanceof Error ? error : undefined;

    if (axios.isAxiosError(error)) {
      if (!error.response) {
        return new DnsBackendError(
          `etcd unreachable while writing ${recordName}: ${error.message}`,
          this.name,
          recordName,
          ErrorCode.DNS_BACKEND_UNREACHABLE,
          cause,
        );
      }
      return new DnsBackendError(
        `etcd rejected ${recordName} with HTTP ${error.response.status}`,
        this.name,
        recordName,
        ErrorCode.DNS_UPDATE_FAILED,
        cause,
      );
    }

    return new DnsBackendError(
      `SkyDNS update of ${recordName} failed: ${errorMessage(error)}`,
      this.name,
      recordName,
      ErrorCode.DNS_UPDATE_FAILED,
      cause,
    );
  }
}
