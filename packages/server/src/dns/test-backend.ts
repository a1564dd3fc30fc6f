/**
 * In-memory DNS backend
 * @module @kuberoute/server/dns/test-backend
 *
 * Accepts every update, including empty value sets, and keeps the latest
 * values per name. Used for dry runs and tests.
 */

import type { DnsBackend, DnsUpdate, DnsUpdateResult } from '@kuberoute/shared';

export class TestDnsBackend implements DnsBackend {
  readonly name = 'test';
  private readonly records = new Map<string, DnsUpdate>();
  private readonly history: DnsUpdate[] = [];

  async updateRecord(update: DnsUpdate): Promise<DnsUpdateResult> {
    const copy: DnsUpdate = { ...update, values: [...update.values] };
    this.records.set(update.name, copy);
    this.history.push(copy);
    return { data: true, error: null };
  }

  /** Latest update for a name */
  getRecord(name: string): DnsUpdate | undefined {
    return this.records.get(name);
  }

  /** Every update in arrival order */
  get updates(): readonly DnsUpdate[] {
    return this.history;
  }

  clear(): void {
    this.records.clear();
    this.history.length = 0;
  }
}
