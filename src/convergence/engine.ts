/**
 * Resource Convergence
 *
 * Diffs desired child objects against live ones by content hash and issues
 * the smallest set of writes that brings the live objects in line:
 *
 * - hash recorded on the live object matches → no write
 * - live object missing → create
 * - hash differs → replace against the live resourceVersion
 *
 * ConfigMap updates are debounced so bursts of edits cause one rolling
 * restart. The server StatefulSet's pod template carries the hash of the
 * ConfigMap content that is actually live, so an applied ConfigMap change
 * rolls the pods and a deferred one does not.
 */

import type { V1Service, V1StatefulSet } from '@kubernetes/client-node';
import type { ChildStore } from '../platform/platform.js';
import type { ChildObject, ObjectRef } from '../types.js';
import { refOf, refString } from '../types.js';
import type { ScaleTransition } from '../validation/topology.js';
import {
  ANNOTATION_BOOTSTRAP_RESTART,
  ANNOTATION_CONFIG_HASH,
  ANNOTATION_CONTENT_HASH,
} from '../resources/labels.js';
import { contentHash } from './hash.js';
import { ConfigDebouncer } from './debounce.js';
import { log } from '../logger.js';

/** Live children keyed by refString() */
export type LiveChildren = ReadonlyMap<string, ChildObject>;

export interface DeferredChange {
  ref: ObjectRef;
  remainingMs: number;
}

export interface ConvergeResult {
  applied: ObjectRef[];
  skipped: ObjectRef[];
  deferred: DeferredChange[];
  /** Existing members were told to re-bootstrap */
  restarted: boolean;
}

export interface ConvergeOptions {
  transition?: ScaleTransition;
  now?: number;
}

export function recordedHash(child: ChildObject): string | undefined {
  return child.body.metadata?.annotations?.[ANNOTATION_CONTENT_HASH];
}

/** Read the live counterpart of every desired child. */
export async function readLiveChildren(store: ChildStore, desired: ChildObject[]): Promise<Map<string, ChildObject>> {
  const live = new Map<string, ChildObject>();
  const found = await Promise.all(desired.map(child => {
    const ref = refOf(child);
    return store.getChild(ref.kind, ref.namespace, ref.name);
  }));
  for (const child of found) {
    if (child) live.set(refString(refOf(child)), child);
  }
  return live;
}

function withHash(child: ChildObject, hash: string): ChildObject {
  const copy = structuredClone(child);
  const meta = copy.body.metadata ?? {};
  meta.annotations = { ...meta.annotations, [ANNOTATION_CONTENT_HASH]: hash };
  copy.body.metadata = meta;
  return copy;
}

/** Server-assigned Service fields that a replace must carry over */
function preserveServiceFields(desired: V1Service, live: V1Service): void {
  if (!desired.spec || !live.spec) return;
  if (desired.spec.clusterIP === undefined && live.spec.clusterIP !== undefined) {
    desired.spec.clusterIP = live.spec.clusterIP;
  }
  if (desired.spec.clusterIPs === undefined && live.spec.clusterIPs !== undefined) {
    desired.spec.clusterIPs = live.spec.clusterIPs;
  }
}

function forReplace(desired: ChildObject, live: ChildObject): ChildObject {
  const next = structuredClone(desired);
  const meta = next.body.metadata ?? {};
  meta.resourceVersion = live.body.metadata?.resourceVersion;
  next.body.metadata = meta;
  if (next.kind === 'Service' && live.kind === 'Service') {
    preserveServiceFields(next.body, live.body);
  }
  return next;
}

function templateAnnotations(sts: V1StatefulSet): Record<string, string> {
  const template = sts.spec?.template;
  if (!template) return {};
  template.metadata = template.metadata ?? {};
  template.metadata.annotations = template.metadata.annotations ?? {};
  return template.metadata.annotations;
}

export class ConvergenceEngine {
  constructor(
    private readonly store: ChildStore,
    private readonly debouncer: ConfigDebouncer,
  ) {}

  async converge(desired: ChildObject[], live: LiveChildren, options: ConvergeOptions = {}): Promise<ConvergeResult> {
    const transition = options.transition ?? 'None';
    const now = options.now ?? Date.now();
    const result: ConvergeResult = { applied: [], skipped: [], deferred: [], restarted: false };

    // Hash of the ConfigMap content live after this pass, per ConfigMap name
    const liveConfigHash = new Map<string, string>();

    for (const original of desired) {
      const ref = refOf(original);
      const key = refString(ref);
      const current = live.get(key);
      const child = structuredClone(original);

      if (child.kind === 'StatefulSet') {
        const restarted = this.stampPodTemplate(child.body, current, liveConfigHash, transition, now);
        result.restarted = result.restarted || restarted;
      }

      const hash = contentHash(child.body);

      if (!current) {
        await this.store.createChild(withHash(child, hash));
        log(`[Converge] Created ${key}`);
        this.debouncer.clear(key);
        if (child.kind === 'ConfigMap') liveConfigHash.set(ref.name, hash);
        result.applied.push(ref);
        continue;
      }

      const previous = recordedHash(current);
      if (previous === hash) {
        // Content is back where it was; nothing parked for it survives
        this.debouncer.clear(key);
        if (child.kind === 'ConfigMap') liveConfigHash.set(ref.name, hash);
        result.skipped.push(ref);
        continue;
      }

      if (child.kind === 'ConfigMap' && transition !== 'ScaleUpSingleToMulti') {
        const decision = this.debouncer.observe(key, hash, now);
        if (!decision.ready) {
          log(`[Converge] Deferring ${key} (${Math.ceil(decision.remainingMs / 1000)}s left in quiet window)`);
          if (previous !== undefined) liveConfigHash.set(ref.name, previous);
          result.skipped.push(ref);
          result.deferred.push({ ref, remainingMs: decision.remainingMs });
          continue;
        }
      }

      await this.store.replaceChild(withHash(forReplace(child, current), hash));
      log(`[Converge] Updated ${key} (${previous ?? 'untracked'} → ${hash})`);
      this.debouncer.clear(key);
      if (child.kind === 'ConfigMap') liveConfigHash.set(ref.name, hash);
      result.applied.push(ref);
    }

    return result;
  }

  /**
   * Pod template annotations that trigger rolling restarts. The bootstrap
   * stamp is carried over from the live object so later passes hash the same.
   * Returns true when a new bootstrap restart was stamped.
   */
  private stampPodTemplate(
    sts: V1StatefulSet,
    current: ChildObject | undefined,
    liveConfigHash: ReadonlyMap<string, string>,
    transition: ScaleTransition,
    now: number,
  ): boolean {
    const annotations = templateAnnotations(sts);

    const configName = sts.spec?.template.spec?.volumes?.find(v => v.configMap)?.configMap?.name;
    const configHash = configName ? liveConfigHash.get(configName) : undefined;
    if (configHash) annotations[ANNOTATION_CONFIG_HASH] = configHash;

    const liveStamp = current?.kind === 'StatefulSet'
      ? current.body.spec?.template.metadata?.annotations?.[ANNOTATION_BOOTSTRAP_RESTART]
      : undefined;

    // Nothing is running yet on first creation; new members bootstrap as multi-primary
    if (transition === 'ScaleUpSingleToMulti' && current) {
      annotations[ANNOTATION_BOOTSTRAP_RESTART] = new Date(now).toISOString();
      log(`[Converge] Single → multi-primary transition: restarting existing members of ${sts.metadata?.name}`);
      return true;
    }
    if (liveStamp) annotations[ANNOTATION_BOOTSTRAP_RESTART] = liveStamp;
    return false;
  }
}
