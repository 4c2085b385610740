/**
 * Change notifications from the Kubernetes watch API.
 *
 * Three streams feed the queue: the cluster resources themselves, the server
 * StatefulSets this manager created, and the clustering pods. Children map
 * back to their cluster through the neo4j.com/cluster label. A stream that
 * ends (the API server closes watches every few minutes) is reopened after
 * restartDelayMs.
 */

import { Watch, type KubeConfig } from '@kubernetes/client-node';
import { z } from 'zod';
import type { ClusterWatcher } from './platform.js';
import type { ClusterKey } from '../types.js';
import { GROUP, PLURAL, VERSION } from '../api/cluster-resource.js';
import { LABEL_CLUSTER, LABEL_CLUSTERING, MANAGER_NAME } from '../resources/labels.js';
import { errorText } from '../errors.js';
import { log, debug } from '../logger.js';

const watchedObjectSchema = z.object({
  metadata: z.object({
    name: z.string(),
    namespace: z.string(),
    labels: z.record(z.string()).optional(),
  }),
});

export interface WatchStream {
  name: string;
  path: string;
  labelSelector?: string;
  /** Cluster the object belongs to, null to ignore it */
  keyOf(object: z.infer<typeof watchedObjectSchema>): ClusterKey | null;
}

function byClusterLabel(object: z.infer<typeof watchedObjectSchema>): ClusterKey | null {
  const cluster = object.metadata.labels?.[LABEL_CLUSTER];
  return cluster ? { namespace: object.metadata.namespace, name: cluster } : null;
}

function scoped(namespace: string, group: string, resource: string): string {
  return namespace ? `${group}/namespaces/${namespace}/${resource}` : `${group}/${resource}`;
}

export function watchStreams(namespace: string): WatchStream[] {
  return [
    {
      name: PLURAL,
      path: scoped(namespace, `/apis/${GROUP}/${VERSION}`, PLURAL),
      keyOf: (o) => ({ namespace: o.metadata.namespace, name: o.metadata.name }),
    },
    {
      name: 'statefulsets',
      path: scoped(namespace, '/apis/apps/v1', 'statefulsets'),
      labelSelector: `app.kubernetes.io/managed-by=${MANAGER_NAME}`,
      keyOf: byClusterLabel,
    },
    {
      name: 'pods',
      path: scoped(namespace, '/api/v1', 'pods'),
      labelSelector: `${LABEL_CLUSTERING}=true`,
      keyOf: byClusterLabel,
    },
  ];
}

/** Key for one watch event, null when the object is unusable or unowned */
export function keyForEvent(stream: WatchStream, phase: string, object: unknown): ClusterKey | null {
  if (phase === 'BOOKMARK' || phase === 'ERROR') return null;
  const parsed = watchedObjectSchema.safeParse(object);
  if (!parsed.success) return null;
  return stream.keyOf(parsed.data);
}

export class KubernetesWatcher implements ClusterWatcher {
  private readonly watch: Watch;
  private readonly controllers = new Map<string, AbortController>();
  private readonly restartTimers = new Set<NodeJS.Timeout>();
  private stopped = false;

  constructor(
    kc: KubeConfig,
    private readonly namespace = '',
    private readonly restartDelayMs = 5000,
  ) {
    this.watch = new Watch(kc);
  }

  async start(onChange: (key: ClusterKey) => void): Promise<void> {
    this.stopped = false;
    await Promise.all(watchStreams(this.namespace).map(stream => this.open(stream, onChange)));
  }

  private async open(stream: WatchStream, onChange: (key: ClusterKey) => void): Promise<void> {
    if (this.stopped) return;

    const query: Record<string, string> = {};
    if (stream.labelSelector) query.labelSelector = stream.labelSelector;

    try {
      const controller = await this.watch.watch(
        stream.path,
        query,
        (phase: string, object: unknown) => {
          const key = keyForEvent(stream, phase, object);
          if (!key) return;
          debug(`[Watch] ${stream.name} ${phase} → ${key.namespace}/${key.name}`);
          onChange(key);
        },
        (err: unknown) => {
          this.controllers.delete(stream.name);
          if (this.stopped) return;
          if (err) log(`[Watch] ${stream.name} stream ended: ${errorText(err)}`);
          this.scheduleRestart(stream, onChange);
        },
      );
      this.controllers.set(stream.name, controller);
      log(`[Watch] Watching ${stream.path}${stream.labelSelector ? ` (${stream.labelSelector})` : ''}`);
    } catch (err) {
      log(`[Watch] Failed to open ${stream.name}: ${errorText(err)}`);
      this.scheduleRestart(stream, onChange);
    }
  }

  private scheduleRestart(stream: WatchStream, onChange: (key: ClusterKey) => void): void {
    const timer = setTimeout(() => {
      this.restartTimers.delete(timer);
      void this.open(stream, onChange);
    }, this.restartDelayMs);
    this.restartTimers.add(timer);
  }

  stop(): void {
    this.stopped = true;
    for (const timer of this.restartTimers) clearTimeout(timer);
    this.restartTimers.clear();
    for (const controller of this.controllers.values()) controller.abort();
    this.controllers.clear();
  }
}
