// SPDX-License-Identifier: Apache-2.0

export interface PodItem {
  readonly name: string;
  readonly phase: string;
  /** The pod reports the Ready condition as True. */
  readonly ready: boolean;
}

/**
 * The subset of the Kubernetes API the deployment and status probes need.
 */
export interface KubeClient {
  /** True when the API server of the current context answers. */
  isReachable(): Promise<boolean>;

  namespaceExists(namespace: string): Promise<boolean>;

  /** Creates the namespace; an existing namespace is left as it is. */
  createNamespace(namespace: string): Promise<void>;

  /** Deletes the namespace; a missing namespace is not an error. */
  deleteNamespace(namespace: string): Promise<void>;

  listPods(namespace: string, labelSelector?: string): Promise<PodItem[]>;
}
