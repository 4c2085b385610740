/**
 * In-memory ClusterPlatform for tests.
 *
 * Enforces resourceVersion checks on every replace so optimistic-concurrency
 * behaviour can be exercised without an API server.
 */

import type { ClusterPlatform } from '../platform/platform.js';
import {
  keyOf,
  keyString,
  refOf,
  refString,
  type ChildKind,
  type ChildObject,
  type ClusterEvent,
  type ClusterHeader,
  type ClusterKey,
  type ClusterResource,
  type ClusterStatus,
  type MemberPod,
} from '../types.js';
import { clusterSpecSchema, emptyStatus, parseClusterResource, API_VERSION, KIND } from '../api/cluster-resource.js';
import { ConflictError, OperatorError, ResourceNotFoundError, TransientPlatformError } from '../errors.js';

export interface RecordedWrite {
  op: 'create' | 'replace';
  ref: string;
}

export class FakePlatform implements ClusterPlatform {
  readonly clusters = new Map<string, ClusterResource>();
  /** Stored as written by a user, spec unparsed */
  readonly rawClusters = new Map<string, { header: ClusterHeader; spec: unknown }>();
  readonly children = new Map<string, ChildObject>();
  readonly pods = new Map<string, MemberPod[]>();
  readonly secrets = new Map<string, Record<string, string>>();

  readonly writes: RecordedWrite[] = [];
  readonly events: ClusterEvent[] = [];
  readonly deletedPods: string[] = [];
  statusWrites = 0;
  statusConflicts = 0;

  /** Pod names whose deletion fails */
  readonly failPodDeletes = new Set<string>();
  /** Force this many upcoming status writes to conflict */
  conflictNextStatusWrites = 0;

  private version = 100;

  private nextVersion(): string {
    this.version += 1;
    return String(this.version);
  }

  // --- test setup --------------------------------------------------------

  addCluster(cluster: ClusterResource): ClusterResource {
    const stored = structuredClone(cluster);
    stored.metadata.resourceVersion = this.nextVersion();
    this.clusters.set(keyString(keyOf(stored)), stored);
    return structuredClone(stored);
  }

  /** A resource whose spec is taken as-is; getCluster parses it on every read. */
  addRawCluster(header: ClusterHeader, spec: unknown): void {
    const stored = structuredClone(header);
    stored.metadata.resourceVersion = this.nextVersion();
    this.rawClusters.set(keyString(keyOf(stored)), { header: stored, spec: structuredClone(spec) });
  }

  /** Simulates a user edit: bumps generation and resourceVersion. */
  editSpec(key: ClusterKey, edit: (cluster: ClusterResource) => void): void {
    const stored = this.clusters.get(keyString(key));
    if (!stored) throw new Error(`no cluster ${keyString(key)}`);
    edit(stored);
    stored.metadata.generation += 1;
    stored.metadata.resourceVersion = this.nextVersion();
  }

  removeCluster(key: ClusterKey): void {
    this.clusters.delete(keyString(key));
  }

  setPods(key: ClusterKey, pods: MemberPod[]): void {
    this.pods.set(keyString(key), pods);
  }

  addChild(child: ChildObject): void {
    const stored = structuredClone(child);
    const meta = stored.body.metadata ?? {};
    meta.resourceVersion = this.nextVersion();
    stored.body.metadata = meta;
    this.children.set(refString(refOf(stored)), stored);
  }

  child(kind: ChildKind, namespace: string, name: string): ChildObject | undefined {
    return this.children.get(`${kind}/${namespace}/${name}`);
  }

  status(key: ClusterKey): ClusterStatus {
    const stored = this.clusters.get(keyString(key)) ?? this.rawClusters.get(keyString(key))?.header;
    return structuredClone(stored?.status ?? emptyStatus());
  }

  // --- ClusterPlatform ---------------------------------------------------

  async listClusterKeys(): Promise<ClusterKey[]> {
    return [...this.clusters.values()].map(keyOf);
  }

  async getCluster(key: ClusterKey): Promise<ClusterResource | null> {
    const raw = this.rawClusters.get(keyString(key));
    if (raw) return parseClusterResource({ ...structuredClone(raw.header), spec: structuredClone(raw.spec) });
    const stored = this.clusters.get(keyString(key));
    return stored ? structuredClone(stored) : null;
  }

  async replaceClusterStatus<T extends ClusterHeader>(cluster: T, status: ClusterStatus): Promise<T> {
    const key = keyString(keyOf(cluster));
    const stored = this.clusters.get(key) ?? this.rawClusters.get(key)?.header;
    if (!stored) throw new ResourceNotFoundError(`cluster ${key} not found`);

    if (this.conflictNextStatusWrites > 0) {
      this.conflictNextStatusWrites -= 1;
      this.statusConflicts += 1;
      throw new ConflictError(`injected conflict on ${key}`);
    }
    if (stored.metadata.resourceVersion !== cluster.metadata.resourceVersion) {
      this.statusConflicts += 1;
      throw new ConflictError(`cluster ${key} was modified; have ${cluster.metadata.resourceVersion}, now ${stored.metadata.resourceVersion}`);
    }

    stored.status = structuredClone(status);
    stored.metadata.resourceVersion = this.nextVersion();
    this.statusWrites += 1;
    return { ...cluster, metadata: structuredClone(stored.metadata), status: structuredClone(stored.status) };
  }

  async getChild(kind: ChildKind, namespace: string, name: string): Promise<ChildObject | null> {
    const stored = this.child(kind, namespace, name);
    return stored ? structuredClone(stored) : null;
  }

  async createChild(child: ChildObject): Promise<ChildObject> {
    const ref = refString(refOf(child));
    if (this.children.has(ref)) throw new OperatorError(`${ref} already exists`);
    this.addChild(child);
    this.writes.push({ op: 'create', ref });
    return structuredClone(this.children.get(ref) ?? child);
  }

  async replaceChild(child: ChildObject): Promise<ChildObject> {
    const ref = refString(refOf(child));
    const stored = this.children.get(ref);
    if (!stored) throw new ResourceNotFoundError(`${ref} not found`);
    if (stored.body.metadata?.resourceVersion !== child.body.metadata?.resourceVersion) {
      throw new ConflictError(`${ref} was modified`);
    }
    this.addChild(child);
    this.writes.push({ op: 'replace', ref });
    return structuredClone(this.children.get(ref) ?? child);
  }

  async listMemberPods(key: ClusterKey): Promise<MemberPod[]> {
    return structuredClone(this.pods.get(keyString(key)) ?? []);
  }

  async deletePod(namespace: string, name: string): Promise<void> {
    if (this.failPodDeletes.has(name)) {
      throw new TransientPlatformError(`pods "${name}" could not be deleted`, 503);
    }
    this.deletedPods.push(`${namespace}/${name}`);
  }

  async readSecret(namespace: string, name: string): Promise<Record<string, string> | null> {
    return this.secrets.get(`${namespace}/${name}`) ?? null;
  }

  async recordEvent(_cluster: ClusterHeader, event: ClusterEvent): Promise<void> {
    this.events.push(event);
  }
}

/** A parsed cluster resource with defaults applied */
export function makeCluster(options: {
  name?: string;
  namespace?: string;
  generation?: number;
  spec?: unknown;
} = {}): ClusterResource {
  return {
    apiVersion: API_VERSION,
    kind: KIND,
    metadata: {
      name: options.name ?? 'graph',
      namespace: options.namespace ?? 'db',
      uid: 'uid-graph',
      generation: options.generation ?? 1,
      resourceVersion: '1',
    },
    spec: clusterSpecSchema.parse(options.spec ?? { topology: { primaries: 3 } }),
    status: emptyStatus(),
  };
}
