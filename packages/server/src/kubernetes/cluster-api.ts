/**
 * Kubernetes implementation of ClusterApi
 * @module @kuberoute/server/kubernetes/cluster-api
 */

import * as k8s from '@kubernetes/client-node';
import type {
  ClusterApi,
  NodeSnapshot,
  PodSnapshot,
  ServiceSnapshot,
} from '@kuberoute/shared';

/**
 * Whether a condition of the given type is reported as True
 */
export function hasTrueCondition(
  conditions: ReadonlyArray<{ type: string; status: string }> | undefined,
  type: string,
): boolean {
  return conditions?.some((condition) => condition.type === type && condition.status === 'True') ?? false;
}

export function mapService(service: k8s.V1Service): ServiceSnapshot {
  return {
    name: service.metadata?.name ?? '',
    namespace: service.metadata?.namespace ?? '',
    selector: { ...(service.spec?.selector ?? {}) },
    labels: { ...(service.metadata?.labels ?? {}) },
  };
}

export function mapPod(pod: k8s.V1Pod): PodSnapshot {
  const snapshot: PodSnapshot = {
    name: pod.metadata?.name ?? '',
    namespace: pod.metadata?.namespace ?? '',
    labels: { ...(pod.metadata?.labels ?? {}) },
    ready: pod.status?.phase === 'Running' && hasTrueCondition(pod.status.conditions, 'Ready'),
  };
  if (pod.spec?.nodeName) {
    snapshot.nodeName = pod.spec.nodeName;
  }
  return snapshot;
}

/**
 * Nodes publish their first ExternalIP; nodes with only internal
 * addresses are not publicly routable and get none.
 */
export function mapNode(node: k8s.V1Node): NodeSnapshot {
  const snapshot: NodeSnapshot = {
    name: node.metadata?.name ?? '',
    ready: hasTrueCondition(node.status?.conditions, 'Ready'),
  };
  const external = node.status?.addresses?.find((address) => address.type === 'ExternalIP' && address.address);
  if (external) {
    snapshot.address = external.address;
  }
  return snapshot;
}

/**
 * The list calls of the CoreV1 API the snapshot needs
 */
export type CoreV1Lister = Pick<k8s.CoreV1Api, 'listNamespacedService' | 'listNamespacedPod' | 'listNode'>;

/**
 * ClusterApi backed by the CoreV1 API
 */
export class KubernetesClusterApi implements ClusterApi {
  constructor(private readonly coreApi: CoreV1Lister) {}

  static fromKubeConfig(kubeConfig: k8s.KubeConfig): KubernetesClusterApi {
    return new KubernetesClusterApi(kubeConfig.makeApiClient(k8s.CoreV1Api));
  }

  async listServices(namespace: string): Promise<ServiceSnapshot[]> {
    const list = await this.coreApi.listNamespacedService({ namespace });
    return list.items.map(mapService);
  }

  async listPods(namespace: string): Promise<PodSnapshot[]> {
    const list = await this.coreApi.listNamespacedPod({ namespace });
    return list.items.map(mapPod);
  }

  async listNodes(): Promise<NodeSnapshot[]> {
    const list = await this.coreApi.listNode();
    return list.items.map(mapNode);
  }
}
