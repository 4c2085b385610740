import type { V1ConfigMap, V1Service, V1StatefulSet } from '@kubernetes/client-node';
import type { ClusterSpec } from './api/cluster-resource.js';

/** Lifecycle phase reported on the cluster resource */
export type Phase = 'Pending' | 'Forming' | 'Ready' | 'Degraded' | 'Failed' | 'Upgrading';

export const PHASES = ['Pending', 'Forming', 'Ready', 'Degraded', 'Failed', 'Upgrading'] as const satisfies readonly Phase[];

export type ConditionStatus = 'True' | 'False' | 'Unknown';

/** Typed health signal. At most one per type on a status. */
export interface Condition {
  type: string;
  status: ConditionStatus;
  reason: string;
  message: string;
  observedGeneration: number;
  /** RFC 3339, seconds precision */
  lastTransitionTime: string;
}

/** One row of SHOW SERVERS */
export interface ServerDiagnostic {
  name: string;
  address: string;
  state: string;
  health: string;
  hostingCount: number;
}

/** One row of SHOW DATABASES */
export interface DatabaseDiagnostic {
  name: string;
  status: string;
  requestedStatus: string;
  role: string;
  isDefault: boolean;
}

export interface ClusterDiagnostics {
  servers: ServerDiagnostic[];
  databases: DatabaseDiagnostic[];
  lastCollected: string | null;
  /** Empty when both queries succeeded */
  collectionError: string;
}

export interface ClusterReplicas {
  primaries: number;
  secondaries: number;
  ready: number;
}

export interface ClusterEndpoints {
  bolt: string;
  http: string;
  https?: string;
  internal: {
    headless: string;
    client: string;
  };
}

export interface ClusterStatus {
  phase?: Phase;
  message?: string;
  conditions: Condition[];
  replicas?: ClusterReplicas;
  endpoints?: ClusterEndpoints;
  diagnostics: ClusterDiagnostics | null;
  observedGeneration: number;
  lastSplitBrainCheck: string | null;
}

export interface ClusterMetadata {
  name: string;
  namespace: string;
  uid: string;
  generation: number;
  resourceVersion: string;
  labels?: Record<string, string>;
  annotations?: Record<string, string>;
}

/** Neo4jEnterpriseCluster as the reconciler sees it */
export interface ClusterResource {
  apiVersion: string;
  kind: string;
  metadata: ClusterMetadata;
  spec: ClusterSpec;
  status: ClusterStatus;
}

/** Everything but the spec; what is left of a resource whose spec does not parse */
export type ClusterHeader = Omit<ClusterResource, 'spec'>;

/** Namespaced identity of a cluster resource; the work queue key */
export interface ClusterKey {
  namespace: string;
  name: string;
}

export function keyString(key: ClusterKey): string {
  return `${key.namespace}/${key.name}`;
}

export function parseKey(value: string): ClusterKey {
  const slash = value.indexOf('/');
  return { namespace: value.slice(0, slash), name: value.slice(slash + 1) };
}

export function keyOf(cluster: Pick<ClusterResource, 'metadata'>): ClusterKey {
  return { namespace: cluster.metadata.namespace, name: cluster.metadata.name };
}

/** Child objects the reconciler owns */
export type ChildObject =
  | { kind: 'StatefulSet'; body: V1StatefulSet }
  | { kind: 'Service'; body: V1Service }
  | { kind: 'ConfigMap'; body: V1ConfigMap };

export type ChildKind = ChildObject['kind'];

export interface ObjectRef {
  kind: ChildKind;
  namespace: string;
  name: string;
}

export function refOf(child: ChildObject): ObjectRef {
  return {
    kind: child.kind,
    namespace: child.body.metadata?.namespace ?? '',
    name: child.body.metadata?.name ?? '',
  };
}

export function refString(ref: ObjectRef): string {
  return `${ref.kind}/${ref.namespace}/${ref.name}`;
}

/** Clustering pod of a cluster, as listed from the platform */
export interface MemberPod {
  name: string;
  namespace: string;
  phase: string;
  ready: boolean;
}

export type EventType = 'Normal' | 'Warning';

/** Operator event recorded against a cluster */
export interface ClusterEvent {
  type: EventType;
  reason: string;
  message: string;
}

export const EventReason = {
  TopologyWarning: 'TopologyWarning',
  ValidationFailed: 'ValidationFailed',
  ClusterReady: 'ClusterReady',
  ConfigurationDeferred: 'ConfigurationDeferred',
  SplitBrainDetected: 'SplitBrainDetected',
  SplitBrainRepaired: 'SplitBrainRepaired',
  SplitBrainRepairFailed: 'SplitBrainRepairFailed',
} as const;
