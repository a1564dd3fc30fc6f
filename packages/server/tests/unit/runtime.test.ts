/**
 * Unit tests for runtime wiring
 * @module @kuberoute/server/tests/unit/runtime
 */

import { describe, it, expect, vi } from 'vitest';
import { createFallbackCache } from '@kuberoute/core';
import {
  ClusterApiError,
  DEFAULT_LABEL_NAMES,
  type ClusterSnapshot,
  type KuberouteConfig,
  type SnapshotResult,
  type SnapshotSource,
} from '@kuberoute/shared';
import { createRuntime } from '../../src/runtime.js';
import { S3StatusReporter } from '../../src/status/s3-reporter.js';
import { TestDnsBackend } from '../../src/dns/test-backend.js';

const config: KuberouteConfig = {
  server: { host: '127.0.0.1', port: 8080 },
  labels: DEFAULT_LABEL_NAMES,
  namespaces: ['default'],
  kubernetes: {
    auth: 'token',
    server: 'https://k8s.example.test:6443',
    token: 'test-token',
    skipTLSVerify: false,
    timeoutMs: 1000,
  },
  dns: { backend: 'test', ttl: 30, timeoutMs: 1000 },
  logging: { level: 'error', pretty: false },
};

const snapshot: ClusterSnapshot = {
  services: [
    {
      name: 'web',
      namespace: 'default',
      selector: { app: 'web' },
      labels: { kuberoute_domain: 'example.com', kuberoute_name: 'app' },
    },
  ],
  pods: [{ name: 'web-1', namespace: 'default', labels: { app: 'web' }, nodeName: 'node-a', ready: true }],
  nodes: [{ name: 'node-a', address: '203.0.113.10', ready: true }],
};

function sourceOf(...results: SnapshotResult[]): SnapshotSource & { fetch: ReturnType<typeof vi.fn> } {
  const fetch = vi.fn();
  for (const result of results) {
    fetch.mockResolvedValueOnce(result);
  }
  return { fetch };
}

const clock = () => new Date('2024-05-01T10:07:00Z');

describe('createRuntime', () => {
  it('builds the configured backend and skips reporting without a status section', () => {
    const runtime = createRuntime(config, { source: sourceOf() });

    expect(runtime.backend).toBeInstanceOf(TestDnsBackend);
    expect(runtime.reporter).toBeNull();
  });

  it('builds an S3 reporter when status is configured', () => {
    const runtime = createRuntime(
      { ...config, status: { bucket: 'kuberoute-status', key: 'status.json', region: 'us-east-1' } },
      { source: sourceOf() },
    );

    expect(runtime.reporter).toBeInstanceOf(S3StatusReporter);
  });

  it('lets null disable a configured reporter', () => {
    const runtime = createRuntime(
      { ...config, status: { bucket: 'kuberoute-status', key: 'status.json' } },
      { source: sourceOf(), reporter: null },
    );

    expect(runtime.reporter).toBeNull();
  });

  it('runs passes against the wired collaborators with the configured TTL', async () => {
    const source = sourceOf({ data: snapshot, error: null });
    const backend = new TestDnsBackend();
    const runtime = createRuntime(config, { source, backend, clock });

    const outcome = await runtime.cycle.run('corr-1');

    expect(outcome.status).toBe('done');
    expect(source.fetch).toHaveBeenCalledWith(['default']);
    expect(backend.getRecord('app.example.com')).toEqual({
      name: 'app.example.com',
      values: ['203.0.113.10'],
      ttl: 30,
      recordType: 'A',
    });
    expect(backend.getRecord('kuberoute-alive.example.com')?.values).toEqual(['2024-05-01-10-07.example.com']);
  });

  it('keeps one cache across passes for the fallback path', async () => {
    const cache = createFallbackCache();
    const source = sourceOf(
      { data: snapshot, error: null },
      { data: null, error: ClusterApiError.unreachable('connection refused') },
    );
    const write = vi.fn().mockResolvedValue(undefined);
    const runtime = createRuntime(config, { source, cache, clock, backend: new TestDnsBackend(), reporter: { write } });

    await runtime.cycle.run();
    const outcome = await runtime.cycle.run();

    expect(outcome.status).toBe('fallback');
    expect(cache.hasSnapshot.value).toBe(true);
    expect(write).toHaveBeenCalledTimes(2);
    expect(write.mock.calls[1]?.[0]).toMatchObject({
      available: false,
      records: [{ fqdn: 'app.example.com', alive: true, addresses: ['203.0.113.10'] }],
    });
  });
});
