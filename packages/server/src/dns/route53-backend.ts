/**
 * Route53 DNS backend
 * @module @kuberoute/server/dns/route53-backend
 */

import {
  ChangeResourceRecordSetsCommand,
  ListHostedZonesByNameCommand,
  ListResourceRecordSetsCommand,
  Route53Client,
  type HostedZone,
} from '@aws-sdk/client-route-53';
import {
  DnsBackendError,
  ErrorCode,
  createServiceLogger,
  errorMessage,
  type DnsBackend,
  type DnsUpdate,
  type DnsUpdateResult,
  type Logger,
  type RecordType,
  type Route53Config,
} from '@kuberoute/shared';

/**
 * One record set as Route53 stores it; names are absolute
 */
export interface RecordSet {
  name: string;
  type: RecordType;
  ttl: number;
  values: string[];
}

/**
 * One entry of a change batch
 */
export interface RecordSetChange {
  action: 'UPSERT' | 'DELETE';
  recordSet: RecordSet;
}

/**
 * The slice of Route53 the backend needs
 */
export interface HostedZoneApi {
  /** Apply the changes as one atomic batch */
  changeRecordSets(hostedZoneId: string, changes: RecordSetChange[]): Promise<void>;
  /** The A or CNAME set published at `name`, or null */
  findRecordSet(hostedZoneId: string, name: string): Promise<RecordSet | null>;
  /** Zones in name order starting at `dnsName` */
  listHostedZonesByName(dnsName: string): Promise<HostedZone[]>;
}

/**
 * HostedZoneApi over the AWS SDK client
 */
export function createHostedZoneApi(client: Pick<Route53Client, 'send'>): HostedZoneApi {
  return {
    async changeRecordSets(hostedZoneId, changes) {
      await client.send(
        new ChangeResourceRecordSetsCommand({
          HostedZoneId: hostedZoneId,
          ChangeBatch: {
            Comment: 'kuberoute reconciliation',
            Changes: changes.map(({ action, recordSet }) => ({
              Action: action,
              ResourceRecordSet: {
                Name: recordSet.name,
                Type: recordSet.type,
                TTL: recordSet.ttl,
                ResourceRecords: recordSet.values.map((value) => ({ Value: value })),
              },
            })),
          },
        }),
      );
    },

    async findRecordSet(hostedZoneId, name) {
      const output = await client.send(
        new ListResourceRecordSetsCommand({ HostedZoneId: hostedZoneId, StartRecordName: name, MaxItems: 1 }),
      );
      const set = output.ResourceRecordSets?.[0];
      // Listing starts at the name but returns whatever follows it when absent
      if (!set?.Name || absoluteName(set.Name) !== name || set.TTL === undefined || !set.ResourceRecords) {
        return null;
      }
      const type = set.Type === 'A' || set.Type === 'CNAME' ? set.Type : null;
      if (!type) {
        return null;
      }
      return {
        name,
        type,
        ttl: set.TTL,
        values: set.ResourceRecords.flatMap((record) => (record.Value === undefined ? [] : [record.Value])),
      };
    },

    async listHostedZonesByName(dnsName) {
      const output = await client.send(new ListHostedZonesByNameCommand({ DNSName: dnsName, MaxItems: 100 }));
      return output.HostedZones ?? [];
    },
  };
}

/**
 * Changes taking a name from its published set to the desired one.
 * A null `desired` withdraws the name. A set of the other type is deleted in
 * the same batch, since a CNAME cannot share its name with an A set.
 */
export function planRecordSetChanges(existing: RecordSet | null, desired: RecordSet | null): RecordSetChange[] {
  if (!desired) {
    return existing ? [{ action: 'DELETE', recordSet: existing }] : [];
  }
  if (existing && existing.type !== desired.type) {
    return [
      { action: 'DELETE', recordSet: existing },
      { action: 'UPSERT', recordSet: desired },
    ];
  }
  return [{ action: 'UPSERT', recordSet: desired }];
}

/**
 * Make a name absolute (trailing dot), lower-cased
 */
export function absoluteName(name: string): string {
  const lower = name.toLowerCase();
  return lower.endsWith('.') ? lower : `${lower}.`;
}

/**
 * Route53 backend: one change batch per update
 */
export class Route53DnsBackend implements DnsBackend {
  readonly name = 'route53';
  private readonly zoneIds = new Map<string, string>();
  private readonly logger: Logger;

  constructor(
    private readonly api: HostedZoneApi,
    config: Route53Config = { hostedZones: {} },
    logger?: Logger,
  ) {
    for (const [domain, zoneId] of Object.entries(config.hostedZones)) {
      this.zoneIds.set(absoluteName(domain), zoneId);
    }
    this.logger = logger ?? createServiceLogger({ level: 'info' }, { component: 'dns-route53' });
  }

  /**
   * Hosted zone for a record name: configured zones first, then a lookup of
   * the longest matching public zone. Lookups are memoized per zone name.
   */
  async resolveHostedZone(recordName: string): Promise<string | null> {
    const labels = absoluteName(recordName).split('.').filter(Boolean);

    for (let i = 0; i < labels.length - 1; i++) {
      const zoneName = `${labels.slice(i).join('.')}.`;
      const configured = this.zoneIds.get(zoneName);
      if (configured) {
        return configured;
      }
    }

    for (let i = 0; i < labels.length - 1; i++) {
      const zoneName = `${labels.slice(i).join('.')}.`;
      const zones = await this.api.listHostedZonesByName(zoneName);
      const match = zones.find((zone) => zone.Name === zoneName && zone.Config?.PrivateZone !== true);
      if (match?.Id) {
        const zoneId = match.Id.replace(/^\/hostedzone\//, '');
        this.zoneIds.set(zoneName, zoneId);
        this.logger.info('Resolved hosted zone', { zoneName, zoneId });
        return zoneId;
      }
    }

    return null;
  }

  async updateRecord(update: DnsUpdate): Promise<DnsUpdateResult> {
    try {
      const zoneId = await this.resolveHostedZone(update.name);
      if (!zoneId) {
        return {
          data: null,
          error: new DnsBackendError(
            `No hosted zone found for ${update.name}`,
            this.name,
            update.name,
            ErrorCode.DNS_ZONE_NOT_FOUND,
          ),
        };
      }

      const name = absoluteName(update.name);
      const desired: RecordSet | null =
        update.values.length === 0
          ? null
          : {
              name,
              type: update.recordType,
              ttl: update.ttl,
              // Route53 accepts a single value for CNAME record sets
              values: update.recordType === 'CNAME' ? update.values.slice(0, 1).map(absoluteName) : update.values,
            };

      const existing = await this.api.findRecordSet(zoneId, name);
      const changes = planRecordSetChanges(existing, desired);
      if (changes.length === 0) {
        return { data: true, error: null };
      }

      await this.api.changeRecordSets(zoneId, changes);

      if (changes.some((change) => change.action === 'DELETE')) {
        this.logger.info('Replaced Route53 record set', {
          name,
          removed: existing?.type ?? null,
          published: desired?.type ?? null,
        });
      }
      return { data: true, error: null };
    } catch (error) {
      return {
        data: null,
        error: new DnsBackendError(
          `Route53 update of ${update.name} failed: ${errorMessage(error)}`,
          this.name,
          update.name,
          ErrorCode.DNS_UPDATE_FAILED,
          error instanceof Error ? error : undefined,
        ),
      };
    }
  }
}

/**
 * Create a Route53 backend from configuration
 */
export function createRoute53Backend(config: Route53Config, timeoutMs: number, logger?: Logger): Route53DnsBackend {
  const client = new Route53Client({
    ...(config.region && { region: config.region }),
    requestHandler: { requestTimeout: timeoutMs },
  });
  return new Route53DnsBackend(createHostedZoneApi(client), config, logger);
}
