/**
 * Kubernetes collaborators
 * @module @kuberoute/server/kubernetes
 */

export { createKubeConfig } from './kube-config.js';
export { KubernetesClusterApi, mapService, mapPod, mapNode, hasTrueCondition } from './cluster-api.js';
export type { CoreV1Lister } from './cluster-api.js';
export {
  ClusterSnapshotSource,
  createSnapshotSource,
  classifyClusterError,
} from './snapshot-source.js';
export type { SnapshotSourceOptions } from './snapshot-source.js';
