/**
 * Unit tests for configuration loading
 * @module @kuberoute/server/tests/unit/config
 */

import { describe, it, expect } from 'vitest';
import { fileURLToPath } from 'node:url';
import { ConfigurationError, ErrorCode } from '@kuberoute/shared';
import {
  DEFAULT_CONFIG_PATH,
  applyEnvOverrides,
  loadConfig,
  parseConfig,
  resolveConfigPath,
} from '../../src/config.js';

const fixturePath = fileURLToPath(new URL('../fixtures/kuberoute.yaml', import.meta.url));

async function rejection(promise: Promise<unknown>): Promise<unknown> {
  return promise.then(
    () => undefined,
    (error: unknown) => error,
  );
}

describe('resolveConfigPath', () => {
  it('prefers the explicit path, then KUBEROUTE_CONFIG, then the default', () => {
    expect(resolveConfigPath('/tmp/a.yaml', { KUBEROUTE_CONFIG: '/tmp/b.yaml' })).toBe('/tmp/a.yaml');
    expect(resolveConfigPath(undefined, { KUBEROUTE_CONFIG: '/tmp/b.yaml' })).toBe('/tmp/b.yaml');
    expect(resolveConfigPath(undefined, {})).toBe(DEFAULT_CONFIG_PATH);
  });
});

describe('applyEnvOverrides', () => {
  it('applies PORT, HOST and LOG_LEVEL', () => {
    expect(
      applyEnvOverrides({ server: { port: 8080 }, dns: { backend: 'test' } }, { PORT: '9000', HOST: '127.0.0.1', LOG_LEVEL: 'debug' }),
    ).toEqual({
      server: { port: 9000, host: '127.0.0.1' },
      dns: { backend: 'test' },
      logging: { level: 'debug' },
    });
  });

  it('leaves the document alone without overrides', () => {
    const document = { dns: { backend: 'test' } };
    expect(applyEnvOverrides(document, {})).toEqual(document);
  });
});

describe('parseConfig', () => {
  it('parses and validates YAML', () => {
    const config = parseConfig('dns:\n  backend: test\nnamespaces: [default, web]\n', {});

    expect(config.dns.backend).toBe('test');
    expect(config.namespaces).toEqual(['default', 'web']);
    expect(config.server.port).toBe(8080);
  });

  it('lets the environment override the file', () => {
    const config = parseConfig('server:\n  port: 8080\ndns:\n  backend: test\n', { PORT: '9100', LOG_LEVEL: 'warn' });

    expect(config.server.port).toBe(9100);
    expect(config.logging.level).toBe('warn');
  });

  it('reports a non-numeric PORT', () => {
    expect(() => parseConfig('dns:\n  backend: test\n', { PORT: 'eighty' })).toThrow(ConfigurationError);
  });

  it('reports validation details', () => {
    let thrown: unknown;
    try {
      parseConfig('dns:\n  backend: bind\n', {});
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(ConfigurationError);
    if (thrown instanceof ConfigurationError) {
      expect(thrown.details.map((detail) => detail.field)).toEqual(['dns.backend']);
      expect(thrown.message).toBe('Invalid configuration: Validation failed for fields: dns.backend');
    }
  });

  it('reports malformed YAML', () => {
    expect(() => parseConfig('dns: [unclosed\n', {})).toThrow(/is not valid YAML/);
  });

  it('treats an empty file as an empty document', () => {
    expect(() => parseConfig('', {})).toThrow('Invalid configuration: Validation failed for fields: dns.backend');
  });
});

describe('loadConfig', () => {
  it('loads the file named by the path', async () => {
    const config = await loadConfig({ path: fixturePath, env: {} });

    expect(config.server).toEqual({ host: '0.0.0.0', port: 9090 });
    expect(config.namespaces).toEqual(['default', 'web']);
    expect(config.kubernetes).toMatchObject({ auth: 'token', server: 'https://k8s.example.test:6443', token: 'test-token' });
    expect(config.dns.route53).toEqual({ region: 'us-east-1', hostedZones: { 'example.com': 'ZEXAMPLE' } });
    expect(config.status).toEqual({ bucket: 'kuberoute-status', key: 'status.json', region: undefined });
  });

  it('finds the file through KUBEROUTE_CONFIG', async () => {
    const config = await loadConfig({ env: { KUBEROUTE_CONFIG: fixturePath } });
    expect(config.server.port).toBe(9090);
  });

  it('fails with CONFIGURATION_NOT_FOUND for a missing file', async () => {
    const error = await rejection(loadConfig({ path: '/nonexistent/kuberoute.yaml', env: {} }));

    expect(error).toBeInstanceOf(ConfigurationError);
    if (error instanceof ConfigurationError) {
      expect(error.code).toBe(ErrorCode.CONFIGURATION_NOT_FOUND);
    }
  });
});
