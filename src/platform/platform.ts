/**
 * Platform access.
 *
 * Everything the reconciler needs from Kubernetes, behind one interface so the
 * core runs against an in-memory fake in tests. Implementations map API
 * failures onto the error taxonomy: 404 on reads → null, 409 → ConflictError,
 * 429/5xx/timeouts → TransientPlatformError.
 */

import type {
  ChildKind,
  ChildObject,
  ClusterEvent,
  ClusterHeader,
  ClusterKey,
  ClusterResource,
  ClusterStatus,
  MemberPod,
} from '../types.js';

export interface ClusterPlatform {
  listClusterKeys(): Promise<ClusterKey[]>;
  /** Throws InvalidResourceError when the stored spec does not parse */
  getCluster(key: ClusterKey): Promise<ClusterResource | null>;
  /**
   * Writes the status subresource against cluster.metadata.resourceVersion.
   * Resolves with `cluster` carrying the written metadata and status.
   */
  replaceClusterStatus<T extends ClusterHeader>(cluster: T, status: ClusterStatus): Promise<T>;

  getChild(kind: ChildKind, namespace: string, name: string): Promise<ChildObject | null>;
  createChild(child: ChildObject): Promise<ChildObject>;
  /** Fails with ConflictError when child.body.metadata.resourceVersion is stale */
  replaceChild(child: ChildObject): Promise<ChildObject>;

  listMemberPods(key: ClusterKey): Promise<MemberPod[]>;
  deletePod(namespace: string, name: string): Promise<void>;

  /** Decoded string data of a Secret, null when absent */
  readSecret(namespace: string, name: string): Promise<Record<string, string> | null>;

  recordEvent(cluster: ClusterHeader, event: ClusterEvent): Promise<void>;
}

export type ChildStore = Pick<ClusterPlatform, 'getChild' | 'createChild' | 'replaceChild'>;
export type StatusStore = Pick<ClusterPlatform, 'getCluster' | 'replaceClusterStatus'>;

/** Delivers "something about this cluster changed" notifications */
export interface ClusterWatcher {
  start(onChange: (key: ClusterKey) => void): Promise<void>;
  stop(): void;
}
