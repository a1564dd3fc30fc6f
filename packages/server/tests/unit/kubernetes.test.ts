/**
 * Unit tests for the Kubernetes mapping and session setup
 * @module @kuberoute/server/tests/unit/kubernetes
 */

import { describe, it, expect, vi } from 'vitest';
import type { V1Node, V1Pod, V1Service } from '@kubernetes/client-node';
import { ConfigurationError, ErrorCode } from '@kuberoute/shared';
import {
  KubernetesClusterApi,
  hasTrueCondition,
  mapNode,
  mapPod,
  mapService,
  type CoreV1Lister,
} from '../../src/kubernetes/cluster-api.js';
import { createKubeConfig } from '../../src/kubernetes/kube-config.js';

const service: V1Service = {
  metadata: {
    name: 'testapp',
    namespace: 'default',
    labels: { kuberoute_domain: 'example.com', kuberoute_name: 'testapp' },
  },
  spec: { selector: { app: 'testapp' } },
};

function pod(phase: string, ready: string, nodeName?: string): V1Pod {
  return {
    metadata: { name: 'testapp-1', namespace: 'default', labels: { app: 'testapp' } },
    spec: { containers: [], ...(nodeName !== undefined ? { nodeName } : {}) },
    status: { phase, conditions: [{ type: 'Ready', status: ready }] },
  };
}

const node: V1Node = {
  metadata: { name: 'n1' },
  status: {
    conditions: [{ type: 'Ready', status: 'True' }],
    addresses: [
      { type: 'InternalIP', address: '192.168.0.10' },
      { type: 'ExternalIP', address: '203.0.113.10' },
      { type: 'ExternalIP', address: '203.0.113.11' },
    ],
  },
};

describe('hasTrueCondition', () => {
  it('finds a true condition of the given type', () => {
    expect(hasTrueCondition([{ type: 'Ready', status: 'True' }], 'Ready')).toBe(true);
    expect(hasTrueCondition([{ type: 'Ready', status: 'False' }], 'Ready')).toBe(false);
    expect(hasTrueCondition(undefined, 'Ready')).toBe(false);
  });
});

describe('mapService', () => {
  it('copies name, namespace, selector and labels', () => {
    expect(mapService(service)).toEqual({
      name: 'testapp',
      namespace: 'default',
      selector: { app: 'testapp' },
      labels: { kuberoute_domain: 'example.com', kuberoute_name: 'testapp' },
    });
  });

  it('treats a missing selector as empty', () => {
    expect(mapService({ metadata: { name: 'headless', namespace: 'default' } }).selector).toEqual({});
  });
});

describe('mapPod', () => {
  it('marks running pods with a true Ready condition as ready', () => {
    expect(mapPod(pod('Running', 'True', 'n1'))).toEqual({
      name: 'testapp-1',
      namespace: 'default',
      labels: { app: 'testapp' },
      nodeName: 'n1',
      ready: true,
    });
  });

  it('does not count pods that are not ready or not running', () => {
    expect(mapPod(pod('Running', 'False', 'n1')).ready).toBe(false);
    expect(mapPod(pod('Pending', 'True', 'n1')).ready).toBe(false);
  });

  it('leaves the node out for unscheduled pods', () => {
    expect(mapPod(pod('Pending', 'False')).nodeName).toBeUndefined();
  });
});

describe('mapNode', () => {
  it('uses the first external address', () => {
    expect(mapNode(node)).toEqual({ name: 'n1', address: '203.0.113.10', ready: true });
  });

  it('has no address without an external one', () => {
    const internal: V1Node = {
      metadata: { name: 'n2' },
      status: { addresses: [{ type: 'InternalIP', address: '192.168.0.11' }] },
    };
    expect(mapNode(internal)).toEqual({ name: 'n2', ready: false });
  });
});

describe('KubernetesClusterApi', () => {
  it('lists and maps through the CoreV1 API', async () => {
    const coreApi: CoreV1Lister = {
      listNamespacedService: vi.fn().mockResolvedValue({ items: [service] }),
      listNamespacedPod: vi.fn().mockResolvedValue({ items: [pod('Running', 'True', 'n1')] }),
      listNode: vi.fn().mockResolvedValue({ items: [node] }),
    };
    const api = new KubernetesClusterApi(coreApi);

    expect(await api.listServices('default')).toHaveLength(1);
    expect((await api.listPods('default'))[0]?.nodeName).toBe('n1');
    expect((await api.listNodes())[0]?.address).toBe('203.0.113.10');
    expect(coreApi.listNamespacedService).toHaveBeenCalledWith({ namespace: 'default' });
    expect(coreApi.listNamespacedPod).toHaveBeenCalledWith({ namespace: 'default' });
  });
});

describe('createKubeConfig', () => {
  it('builds a session from an explicit server and token', () => {
    const kc = createKubeConfig({
      auth: 'token',
      server: 'https://k8s.example.test:6443',
      token: 'test-token',
      skipTLSVerify: true,
      timeoutMs: 1000,
    });

    expect(kc.getCurrentCluster()?.server).toBe('https://k8s.example.test:6443');
    expect(kc.getCurrentCluster()?.skipTLSVerify).toBe(true);
    expect(kc.getCurrentUser()?.token).toBe('test-token');
  });

  it('rejects token auth without a token', () => {
    expect(() =>
      createKubeConfig({ auth: 'token', server: 'https://k8s.example.test', skipTLSVerify: false, timeoutMs: 1000 }),
    ).toThrow(ConfigurationError);
  });

  it('wraps a missing kubeconfig file as a configuration error', () => {
    let thrown: unknown;
    try {
      createKubeConfig({
        auth: 'kubeconfig',
        kubeconfigPath: '/nonexistent/kubeconfig.yaml',
        skipTLSVerify: false,
        timeoutMs: 1000,
      });
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(ConfigurationError);
    if (thrown instanceof ConfigurationError) {
      expect(thrown.code).toBe(ErrorCode.CONFIGURATION_INVALID);
      expect(thrown.message).toMatch(/^Could not set up Kubernetes kubeconfig auth: /);
    }
  });
});
