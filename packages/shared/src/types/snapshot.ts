/**
 * Cluster snapshot model
 *
 * Plain values built fresh from the cluster API on every reconciliation pass
 * and discarded once the pass completes.
 * @module @kuberoute/shared/types/snapshot
 */

import type { Labels } from './labels.js';

/**
 * A Kubernetes service as seen by the planner
 */
export interface ServiceSnapshot {
  name: string;
  namespace: string;
  /** Pod selector; empty when the service has none */
  selector: Labels;
  labels: Labels;
}

/**
 * A pod as seen by the planner
 */
export interface PodSnapshot {
  name: string;
  namespace: string;
  labels: Labels;
  /** Hosting node; absent while the pod is unscheduled */
  nodeName?: string;
  /** Running with the Ready condition set */
  ready: boolean;
}

/**
 * A cluster node as seen by the planner
 */
export interface NodeSnapshot {
  name: string;
  /** Publicly routable address; absent when the node reports none */
  address?: string;
  /** Ready condition set */
  ready: boolean;
}

/**
 * One pass's observed services, pods and nodes
 */
export interface ClusterSnapshot {
  services: ServiceSnapshot[];
  pods: PodSnapshot[];
  nodes: NodeSnapshot[];
}
