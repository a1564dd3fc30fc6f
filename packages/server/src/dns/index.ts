/**
 * DNS backends
 * @module @kuberoute/server/dns
 */

import {
  ConfigurationError,
  ErrorCode,
  type DnsBackend,
  type DnsConfig,
  type Logger,
} from '@kuberoute/shared';
import { createRoute53Backend } from './route53-backend.js';
import { SkyDnsBackend } from './skydns-backend.js';
import { TestDnsBackend } from './test-backend.js';

export * from './route53-backend.js';
export * from './skydns-backend.js';
export * from './test-backend.js';

/**
 * Build the backend named by the configuration
 */
export function createDnsBackend(config: DnsConfig, logger?: Logger): DnsBackend {
  switch (config.backend) {
    case 'route53':
      return createRoute53Backend(config.route53 ?? { hostedZones: {} }, config.timeoutMs, logger);
    case 'skydns':
      if (!config.skydns) {
        throw new ConfigurationError('dns.skydns is required for the skydns backend', [
          { field: 'dns.skydns', message: 'dns.skydns is required for the skydns backend', rule: 'required' },
        ]);
      }
      return new SkyDnsBackend(config.skydns, { timeoutMs: config.timeoutMs, logger });
    case 'test':
      return new TestDnsBackend();
    default:
      throw new ConfigurationError(
        `Unknown DNS backend: ${String(config.backend)}`,
        [],
        ErrorCode.UNKNOWN_DNS_BACKEND,
      );
  }
}
