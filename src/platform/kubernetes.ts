/**
 * ClusterPlatform over the Kubernetes API.
 *
 * Custom resources come back as untyped JSON and are parsed through the zod
 * schemas; typed children (ConfigMap, Service, StatefulSet) use the client's
 * model classes directly.
 */

import {
  ApiException,
  AppsV1Api,
  CoreV1Api,
  CustomObjectsApi,
  KubeConfig,
  type CoreV1Event,
  type V1Pod,
} from '@kubernetes/client-node';
import { z } from 'zod';
import type { ClusterPlatform } from './platform.js';
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
import { GROUP, PLURAL, VERSION, parseClusterHeader, parseClusterResource } from '../api/cluster-resource.js';
import { MANAGER_NAME, memberSelector } from '../resources/labels.js';
import {
  ConflictError,
  OperatorError,
  ResourceNotFoundError,
  TransientPlatformError,
  errorText,
} from '../errors.js';
import { log } from '../logger.js';

const itemsSchema = z.object({ items: z.array(z.unknown()).default([]) });
const keyItemSchema = z.object({ metadata: z.object({ name: z.string(), namespace: z.string() }) });

/** Map a client failure onto the error taxonomy */
export function mapApiError(err: unknown, what: string): Error {
  if (err instanceof ApiException) {
    const code = err.code;
    if (code === 404) return new ResourceNotFoundError(`${what}: not found`, { cause: err });
    if (code === 409) return new ConflictError(`${what}: conflict`, { cause: err });
    if (code === 429 || code >= 500) {
      return new TransientPlatformError(`${what}: HTTP ${code}`, code, { cause: err });
    }
    return new OperatorError(`${what}: HTTP ${code} ${errorText(err)}`, { cause: err });
  }
  // Socket errors and timeouts never reached the API server
  return new TransientPlatformError(`${what}: ${errorText(err)}`, undefined, { cause: err });
}

function isNotFound(err: unknown): boolean {
  return err instanceof ApiException && err.code === 404;
}

export function toMemberPod(pod: V1Pod): MemberPod {
  const ready = pod.status?.conditions?.some(c => c.type === 'Ready' && c.status === 'True') ?? false;
  return {
    name: pod.metadata?.name ?? '',
    namespace: pod.metadata?.namespace ?? '',
    phase: pod.status?.phase ?? 'Unknown',
    ready,
  };
}

export function decodeSecretData(data: Record<string, string> | undefined): Record<string, string> {
  const decoded: Record<string, string> = {};
  for (const [k, v] of Object.entries(data ?? {})) {
    decoded[k] = Buffer.from(v, 'base64').toString('utf8');
  }
  return decoded;
}

export class KubernetesPlatform implements ClusterPlatform {
  private readonly core: CoreV1Api;
  private readonly apps: AppsV1Api;
  private readonly custom: CustomObjectsApi;

  constructor(kc: KubeConfig, private readonly watchNamespace = '') {
    this.core = kc.makeApiClient(CoreV1Api);
    this.apps = kc.makeApiClient(AppsV1Api);
    this.custom = kc.makeApiClient(CustomObjectsApi);
  }

  async listClusterKeys(): Promise<ClusterKey[]> {
    try {
      const response: unknown = this.watchNamespace
        ? await this.custom.listNamespacedCustomObject({ group: GROUP, version: VERSION, namespace: this.watchNamespace, plural: PLURAL })
        : await this.custom.listClusterCustomObject({ group: GROUP, version: VERSION, plural: PLURAL });
      return itemsSchema.parse(response).items.flatMap(item => {
        const parsed = keyItemSchema.safeParse(item);
        return parsed.success ? [{ namespace: parsed.data.metadata.namespace, name: parsed.data.metadata.name }] : [];
      });
    } catch (err) {
      throw mapApiError(err, `list ${PLURAL}`);
    }
  }

  async getCluster(key: ClusterKey): Promise<ClusterResource | null> {
    let raw: unknown;
    try {
      raw = await this.custom.getNamespacedCustomObject({
        group: GROUP, version: VERSION, plural: PLURAL, namespace: key.namespace, name: key.name,
      });
    } catch (err) {
      if (isNotFound(err)) return null;
      throw mapApiError(err, `get ${key.namespace}/${key.name}`);
    }
    return parseClusterResource(raw);
  }

  async replaceClusterStatus<T extends ClusterHeader>(cluster: T, status: ClusterStatus): Promise<T> {
    const { namespace, name } = cluster.metadata;
    try {
      const written: unknown = await this.custom.replaceNamespacedCustomObjectStatus({
        group: GROUP, version: VERSION, plural: PLURAL, namespace, name,
        body: {
          apiVersion: cluster.apiVersion,
          kind: cluster.kind,
          metadata: { name, namespace, resourceVersion: cluster.metadata.resourceVersion },
          status,
        },
      });
      const header = parseClusterHeader(written);
      return { ...cluster, metadata: header.metadata, status: header.status };
    } catch (err) {
      if (err instanceof OperatorError) throw err;
      throw mapApiError(err, `update status of ${namespace}/${name}`);
    }
  }

  async getChild(kind: ChildKind, namespace: string, name: string): Promise<ChildObject | null> {
    try {
      switch (kind) {
        case 'ConfigMap':
          return { kind, body: await this.core.readNamespacedConfigMap({ name, namespace }) };
        case 'Service':
          return { kind, body: await this.core.readNamespacedService({ name, namespace }) };
        case 'StatefulSet':
          return { kind, body: await this.apps.readNamespacedStatefulSet({ name, namespace }) };
      }
    } catch (err) {
      if (isNotFound(err)) return null;
      throw mapApiError(err, `get ${kind} ${namespace}/${name}`);
    }
  }

  async createChild(child: ChildObject): Promise<ChildObject> {
    const namespace = child.body.metadata?.namespace ?? '';
    try {
      switch (child.kind) {
        case 'ConfigMap':
          return { kind: child.kind, body: await this.core.createNamespacedConfigMap({ namespace, body: child.body }) };
        case 'Service':
          return { kind: child.kind, body: await this.core.createNamespacedService({ namespace, body: child.body }) };
        case 'StatefulSet':
          return { kind: child.kind, body: await this.apps.createNamespacedStatefulSet({ namespace, body: child.body }) };
      }
    } catch (err) {
      throw mapApiError(err, `create ${child.kind} ${namespace}/${child.body.metadata?.name ?? ''}`);
    }
  }

  async replaceChild(child: ChildObject): Promise<ChildObject> {
    const namespace = child.body.metadata?.namespace ?? '';
    const name = child.body.metadata?.name ?? '';
    try {
      switch (child.kind) {
        case 'ConfigMap':
          return { kind: child.kind, body: await this.core.replaceNamespacedConfigMap({ name, namespace, body: child.body }) };
        case 'Service':
          return { kind: child.kind, body: await this.core.replaceNamespacedService({ name, namespace, body: child.body }) };
        case 'StatefulSet':
          return { kind: child.kind, body: await this.apps.replaceNamespacedStatefulSet({ name, namespace, body: child.body }) };
      }
    } catch (err) {
      throw mapApiError(err, `replace ${child.kind} ${namespace}/${name}`);
    }
  }

  async listMemberPods(key: ClusterKey): Promise<MemberPod[]> {
    try {
      const list = await this.core.listNamespacedPod({ namespace: key.namespace, labelSelector: memberSelector(key.name) });
      return list.items.map(toMemberPod).sort((a, b) => a.name.localeCompare(b.name));
    } catch (err) {
      throw mapApiError(err, `list pods of ${key.namespace}/${key.name}`);
    }
  }

  async deletePod(namespace: string, name: string): Promise<void> {
    try {
      await this.core.deleteNamespacedPod({ name, namespace });
    } catch (err) {
      // Already gone is what we wanted
      if (isNotFound(err)) return;
      throw mapApiError(err, `delete pod ${namespace}/${name}`);
    }
  }

  async readSecret(namespace: string, name: string): Promise<Record<string, string> | null> {
    try {
      const secret = await this.core.readNamespacedSecret({ name, namespace });
      return decodeSecretData(secret.data);
    } catch (err) {
      if (isNotFound(err)) return null;
      throw mapApiError(err, `read secret ${namespace}/${name}`);
    }
  }

  async recordEvent(cluster: ClusterHeader, event: ClusterEvent): Promise<void> {
    const { namespace, name, uid, resourceVersion } = cluster.metadata;
    const now = new Date();
    const body: CoreV1Event = {
      metadata: { generateName: `${name}.`, namespace },
      involvedObject: {
        apiVersion: cluster.apiVersion,
        kind: cluster.kind,
        name,
        namespace,
        uid,
        resourceVersion,
      },
      type: event.type,
      reason: event.reason,
      message: event.message,
      source: { component: MANAGER_NAME },
      reportingComponent: MANAGER_NAME,
      firstTimestamp: now,
      lastTimestamp: now,
      count: 1,
    };
    try {
      await this.core.createNamespacedEvent({ namespace, body });
    } catch (err) {
      throw mapApiError(err, `record event on ${namespace}/${name}`);
    }
  }
}

/** Kubeconfig from the pod's service account, or ~/.kube/config outside a cluster */
export function loadKubeConfig(): KubeConfig {
  const kc = new KubeConfig();
  kc.loadFromDefault();
  log(`[Platform] Using context ${kc.getCurrentContext() || 'in-cluster'}`);
  return kc;
}
