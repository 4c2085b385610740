/**
 * Cluster Reconciler
 *
 * One pass over one Neo4jEnterpriseCluster:
 *
 *   load → validate topology → converge children → check formation
 *        → write phase → (Ready) diagnostics + split-brain → requeue
 *
 * Every status write goes through the StatusUpdater. Platform failures
 * propagate so the work queue retries with backoff; protocol failures only
 * degrade conditions and never abort the pass.
 */

import type { ClusterPlatform } from '../platform/platform.js';
import type { StatusUpdater } from '../status/updater.js';
import type { ConvergenceEngine, ConvergeResult } from '../convergence/engine.js';
import type { ConfigDebouncer } from '../convergence/debounce.js';
import type { ClientFactory } from '../protocol/client-factory.js';
import type { BreakerRegistry } from '../protocol/circuit-breaker.js';
import type { GraphClient } from '../protocol/client.js';
import type { DiagnosticsCollector } from '../diagnostics/collector.js';
import type { RepairOrchestrator } from '../restart/orchestrator.js';
import type { OperatorMetrics } from '../metrics/registry.js';
import type { EventPublisher } from '../services/events.js';
import type { HandlerResult } from './work-queue.js';
import type { Config } from '../config.js';
import type { V1StatefulSet } from '@kubernetes/client-node';
import { readLiveChildren } from '../convergence/engine.js';
import { desiredChildren } from '../resources/builder.js';
import { desiredServerCount, previousPrimaries, validateTopology } from '../validation/topology.js';
import { detectSplitBrain, type SplitBrainAnalysis } from '../conditions/split-brain.js';
import { isServerHealthy } from '../diagnostics/collector.js';
import { ConditionType, Reason, rfc3339, setCondition, setPhase } from '../conditions/conditions.js';
import {
  HTTPS_PORT,
  HTTP_PORT,
  clientBoltUri,
  clientServiceName,
  configMapName,
  headlessServiceName,
  serverStatefulSetName,
} from '../resources/labels.js';
import {
  EventReason,
  keyOf,
  keyString,
  refString,
  type ChildObject,
  type ClusterEndpoints,
  type ClusterKey,
  type ClusterReplicas,
  type ClusterResource,
  type Phase,
} from '../types.js';
import {
  ExternalProtocolError,
  InvalidResourceError,
  ResourceNotFoundError,
  StructuralValidationError,
  TransientPlatformError,
  errorText,
} from '../errors.js';
import { debug, log } from '../logger.js';

export type ReconcilerConfig = Pick<
  Config,
  | 'maxClusterServers'
  | 'resyncSeconds'
  | 'configDebounceSeconds'
  | 'memberQueryTimeoutSeconds'
  | 'splitBrainIntervalSeconds'
>;

/** Starts and stops the periodic health refresh of a cluster */
export interface RefreshControl {
  ensure(key: string): void;
  stop(key: string): void;
}

export interface ReconcilerDeps {
  platform: ClusterPlatform;
  updater: StatusUpdater;
  engine: ConvergenceEngine;
  debouncer: ConfigDebouncer;
  clients: ClientFactory;
  breakers: BreakerRegistry;
  diagnostics: DiagnosticsCollector;
  repairs: RepairOrchestrator;
  metrics: OperatorMetrics;
  events: EventPublisher;
  refresher: RefreshControl;
  config: ReconcilerConfig;
  now?: () => Date;
}

interface Formation {
  phase: Phase;
  message: string;
}

function containerImage(sts: V1StatefulSet | undefined): string | undefined {
  return sts?.spec?.template.spec?.containers[0]?.image;
}

/** The controller has rolled every replica onto the current template */
export function rolloutComplete(sts: V1StatefulSet | undefined): boolean {
  const replicas = sts?.spec?.replicas ?? 0;
  const status = sts?.status;
  return (status?.updatedReplicas ?? 0) === replicas && (status?.readyReplicas ?? 0) === replicas;
}

export function clusterEndpoints(cluster: ClusterResource): ClusterEndpoints {
  const { name, namespace } = cluster.metadata;
  const client = `${clientServiceName(name)}.${namespace}.svc.cluster.local`;
  const endpoints: ClusterEndpoints = {
    bolt: clientBoltUri(name, namespace),
    http: `http://${client}:${HTTP_PORT}`,
    internal: {
      headless: `${headlessServiceName(name)}.${namespace}.svc.cluster.local`,
      client,
    },
  };
  if (cluster.spec.tls.mode === 'cert-manager') endpoints.https = `https://${client}:${HTTPS_PORT}`;
  return endpoints;
}

export class ClusterReconciler {
  private readonly now: () => Date;

  constructor(private readonly deps: ReconcilerDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  /** Work queue handler */
  async reconcile(key: ClusterKey): Promise<HandlerResult> {
    const { platform, metrics } = this.deps;
    const name = keyString(key);

    let found: ClusterResource | null;
    try {
      found = await platform.getCluster(key);
    } catch (err) {
      if (!(err instanceof InvalidResourceError)) throw err;
      await this.rejectResource(err);
      metrics.recordReconcile(key, 'invalid');
      return {};
    }
    if (!found) {
      this.forget(key);
      return {};
    }
    let cluster = found;
    // observedGeneration moves with every phase write, so read it first
    const firstPassForGeneration = found.status.observedGeneration !== found.metadata.generation;

    try {
      if (!cluster.status.phase) {
        cluster = await this.writePhase(key, 'Pending', 'Reconciliation started');
      }

      // --- Topology ---------------------------------------------------------
      const desired = desiredChildren(cluster);
      const live = await readLiveChildren(platform, desired);
      const stsRef = refString({ kind: 'StatefulSet', namespace: key.namespace, name: serverStatefulSetName(key.name) });
      const liveSts = statefulSetOf(live.get(stsRef));

      const validation = validateTopology(cluster.spec.topology, {
        previousPrimaries: previousPrimaries(liveSts),
        maxServers: this.deps.config.maxClusterServers,
      });

      if (firstPassForGeneration) {
        for (const warning of validation.warnings) {
          await this.deps.events.publish(cluster, { type: 'Warning', reason: EventReason.TopologyWarning, message: warning });
        }
      }

      if (!validation.ok) {
        await this.rejectTopology(cluster, new StructuralValidationError(validation.errors), firstPassForGeneration);
        metrics.recordReconcile(key, 'invalid');
        return {};
      }

      // --- Converge ---------------------------------------------------------
      const desiredSts = statefulSetOf(desired.find(c => c.kind === 'StatefulSet'));
      const liveImage = containerImage(liveSts);
      const imageChanged = liveImage !== undefined && liveImage !== containerImage(desiredSts);

      let converged: ConvergeResult;
      try {
        converged = await this.deps.engine.converge(desired, live, {
          transition: validation.transition,
          now: this.now().getTime(),
        });
      } catch (err) {
        if (!(err instanceof TransientPlatformError)) {
          await this.writePhase(key, 'Failed', `Failed to apply resources: ${errorText(err)}`);
        }
        throw err;
      }
      await this.announceDeferred(cluster, converged);

      // --- Formation --------------------------------------------------------
      const pods = await platform.listMemberPods(key);
      const ready = pods.filter(p => p.ready).length;
      const replicas: ClusterReplicas = {
        primaries: cluster.spec.topology.primaries,
        secondaries: cluster.spec.topology.secondaries,
        ready,
      };

      const upgrading = imageChanged || (cluster.status.phase === 'Upgrading' && !rolloutComplete(liveSts));

      let client: GraphClient | null = null;
      try {
        let formation: Formation;
        if (upgrading) {
          formation = { phase: 'Upgrading', message: `Rolling out ${containerImage(desiredSts) ?? 'new image'}` };
        } else {
          const result = await this.checkFormation(cluster, ready);
          formation = result.formation;
          client = result.client;
        }

        const previousPhase = cluster.status.phase;

        // A partition shows up as missing servers from whichever side the
        // client service reaches; a formed cluster is checked for a split before it is
        // written back to Forming.
        const formed = previousPhase === 'Ready' || previousPhase === 'Degraded';
        if (client && formed && formation.phase === 'Forming' && ready >= desiredServerCount(cluster.spec.topology)
          && this.splitBrainDue(cluster)) {
          const analysis = await this.checkSplitBrain(cluster);
          if (analysis.verdict === 'split') {
            formation = { phase: 'Degraded', message: `Split-brain detected: ${analysis.details}` };
          }
        }

        cluster = await this.deps.updater.update(key, (status, latest) => {
          const generation = latest.metadata.generation;
          setPhase(status, formation.phase, formation.message, generation, this.now());
          setCondition(status, {
            type: ConditionType.TopologyValid,
            status: 'True',
            reason: Reason.TopologyValid,
            message: `${desiredServerCount(latest.spec.topology)} servers (${latest.spec.topology.primaries} primaries)`,
            observedGeneration: generation,
          }, this.now());
          status.replicas = replicas;
          status.endpoints = clusterEndpoints(latest);
        });

        if (formation.phase === 'Ready' && previousPhase !== 'Ready') {
          await this.deps.events.publish(cluster, { type: 'Normal', reason: EventReason.ClusterReady, message: formation.message });
        }

        // --- Ready or Degraded: health -------------------------------------
        if ((formation.phase === 'Ready' || formation.phase === 'Degraded') && client) {
          await this.collectHealth(cluster, client);
          this.deps.refresher.ensure(name);
        } else {
          this.deps.refresher.stop(name);
        }
      } finally {
        if (client) await client.close();
      }

      metrics.recordReconcile(key, 'success');
      return { requeueAfterMs: this.requeueDelay(converged) };
    } catch (err) {
      if (err instanceof ResourceNotFoundError) {
        this.forget(key);
        return {};
      }
      metrics.recordReconcile(key, err instanceof TransientPlatformError ? 'requeue' : 'error');
      log(`[Reconcile] ${name} failed: ${errorText(err)}`);
      throw err;
    }
  }

  /**
   * Periodic refresh of a Ready or Degraded cluster: diagnostics and, when
   * due, split-brain detection. Stops its own refresher once the cluster is
   * gone or in any other phase.
   */
  async refreshHealth(key: ClusterKey): Promise<void> {
    const name = keyString(key);
    let cluster: ClusterResource | null = null;
    try {
      cluster = await this.deps.platform.getCluster(key);
    } catch (err) {
      // The next reconcile pass reports it
      if (!(err instanceof InvalidResourceError)) throw err;
    }
    if (!cluster || (cluster.status.phase !== 'Ready' && cluster.status.phase !== 'Degraded')) {
      this.deps.refresher.stop(name);
      return;
    }

    const client = await this.deps.clients.forCluster(cluster);
    try {
      await this.collectHealth(cluster, client);
    } finally {
      await client.close();
    }
  }

  /** Split-brain detection now, regardless of the interval */
  async checkSplitBrain(cluster: ClusterResource): Promise<SplitBrainAnalysis> {
    const { platform, clients, updater, metrics, events, repairs } = this.deps;
    const key = { namespace: cluster.metadata.namespace, name: cluster.metadata.name };
    const memberTimeoutMs = this.deps.config.memberQueryTimeoutSeconds * 1000;

    const pods = await platform.listMemberPods(key);
    const analysis = await detectSplitBrain(pods, desiredServerCount(cluster.spec.topology), async pod => {
      const member = await clients.forMember(cluster, pod);
      try {
        return await member.listServers(memberTimeoutMs);
      } finally {
        await member.close();
      }
    });

    const checkedAt = rfc3339(this.now());
    const latest = await updater.update(key, (status, current) => {
      status.lastSplitBrainCheck = checkedAt;
      if (analysis.verdict === 'split') {
        setPhase(status, 'Degraded', `Split-brain detected: ${analysis.details}`, current.metadata.generation, this.now());
      }
    });

    if (analysis.verdict !== 'split') return analysis;

    metrics.recordSplitBrain(key);
    await events.publish(latest, { type: 'Warning', reason: EventReason.SplitBrainDetected, message: analysis.details });

    const outcome = await repairs.repair(key, analysis.minority);
    if (outcome.status === 'repaired') {
      await events.publish(latest, {
        type: 'Normal',
        reason: EventReason.SplitBrainRepaired,
        message: `Deleted minority pods ${outcome.record.deleted.join(', ')}`,
      });
    } else if (outcome.status === 'failed') {
      await events.publish(latest, {
        type: 'Warning',
        reason: EventReason.SplitBrainRepairFailed,
        message: outcome.record.error ?? 'repair failed',
      });
    } else {
      log(`[Reconcile] ${keyString(key)} repair skipped: ${outcome.reason}`);
    }
    return analysis;
  }

  // ---------------------------------------------------------------------------

  private async collectHealth(cluster: ClusterResource, client: GraphClient): Promise<void> {
    await this.deps.diagnostics.collect(cluster, client);
    if (this.splitBrainDue(cluster)) await this.checkSplitBrain(cluster);
  }

  private splitBrainDue(cluster: ClusterResource): boolean {
    const last = cluster.status.lastSplitBrainCheck;
    if (!last) return true;
    const elapsed = this.now().getTime() - Date.parse(last);
    return Number.isNaN(elapsed) || elapsed >= this.deps.config.splitBrainIntervalSeconds * 1000;
  }

  /**
   * Ready once every pod is ready and the cluster reports at least the
   * desired number of available servers. The returned client stays open for
   * the rest of the pass.
   */
  private async checkFormation(
    cluster: ClusterResource,
    readyPods: number,
  ): Promise<{ formation: Formation; client: GraphClient | null }> {
    const expected = desiredServerCount(cluster.spec.topology);
    if (readyPods < expected) {
      return { formation: { phase: 'Forming', message: `Waiting for pods: ${readyPods}/${expected} ready` }, client: null };
    }

    let client: GraphClient | null = null;
    try {
      client = await this.deps.clients.forCluster(cluster);
      const servers = await client.listServers();
      const available = servers.filter(isServerHealthy).length;
      if (available >= expected) {
        return { formation: { phase: 'Ready', message: `Cluster is ready with ${available} servers` }, client };
      }
      return { formation: { phase: 'Forming', message: `${available}/${expected} servers available` }, client };
    } catch (err) {
      if (client) await client.close();
      if (!(err instanceof ExternalProtocolError)) throw err;
      debug(`[Reconcile] ${keyString({ namespace: cluster.metadata.namespace, name: cluster.metadata.name })} not accepting connections: ${errorText(err)}`);
      return { formation: { phase: 'Forming', message: 'Waiting for Neo4j to accept connections' }, client: null };
    }
  }

  private async rejectTopology(cluster: ClusterResource, error: StructuralValidationError, announce: boolean): Promise<void> {
    const key = { namespace: cluster.metadata.namespace, name: cluster.metadata.name };
    log(`[Reconcile] ${keyString(key)} ${error.message}`);
    const latest = await this.deps.updater.update(key, (status, current) => {
      const generation = current.metadata.generation;
      setPhase(status, 'Failed', error.message, generation, this.now());
      setCondition(status, {
        type: ConditionType.TopologyValid,
        status: 'False',
        reason: Reason.InvalidTopology,
        message: error.errors.join('; '),
        observedGeneration: generation,
      }, this.now());
    });
    this.deps.refresher.stop(keyString(key));
    if (announce) {
      await this.deps.events.publish(latest, { type: 'Warning', reason: EventReason.ValidationFailed, message: error.errors.join('; ') });
    }
  }

  /** Failed + TopologyValid=False for a resource whose spec does not parse; no requeue */
  private async rejectResource(error: InvalidResourceError): Promise<void> {
    const { resource } = error;
    const key = keyOf(resource);
    const generation = resource.metadata.generation;
    log(`[Reconcile] ${keyString(key)} ${error.message}`);

    const latest = await this.deps.updater.writeOnce(resource, status => {
      setPhase(status, 'Failed', error.message, generation, this.now());
      setCondition(status, {
        type: ConditionType.TopologyValid,
        status: 'False',
        reason: Reason.InvalidTopology,
        message: error.errors.join('; '),
        observedGeneration: generation,
      }, this.now());
    });
    this.deps.refresher.stop(keyString(key));
    if (resource.status.observedGeneration !== generation) {
      await this.deps.events.publish(latest, { type: 'Warning', reason: EventReason.ValidationFailed, message: error.errors.join('; ') });
    }
  }

  private async announceDeferred(cluster: ClusterResource, converged: ConvergeResult): Promise<void> {
    const windowMs = this.deps.config.configDebounceSeconds * 1000;
    for (const change of converged.deferred) {
      // Only the first observation of a change starts a full window
      if (change.remainingMs < windowMs) continue;
      await this.deps.events.publish(cluster, {
        type: 'Normal',
        reason: EventReason.ConfigurationDeferred,
        message: `Configuration change to ${change.ref.name} will be applied in ${Math.ceil(change.remainingMs / 1000)}s`,
      });
    }
  }

  private requeueDelay(converged: ConvergeResult): number {
    const resyncMs = this.deps.config.resyncSeconds * 1000;
    const soonest = Math.min(...converged.deferred.map(d => d.remainingMs));
    return Number.isFinite(soonest) ? Math.min(resyncMs, soonest) : resyncMs;
  }

  private async writePhase(key: ClusterKey, phase: Phase, message: string): Promise<ClusterResource> {
    return this.deps.updater.update(key, (status, current) => {
      setPhase(status, phase, message, current.metadata.generation, this.now());
    });
  }

  /** Drop every piece of in-memory state held for a deleted cluster */
  private forget(key: ClusterKey): void {
    const name = keyString(key);
    log(`[Reconcile] ${name} is gone, releasing its state`);
    this.deps.refresher.stop(name);
    this.deps.breakers.forget(name);
    this.deps.debouncer.clear(refString({ kind: 'ConfigMap', namespace: key.namespace, name: configMapName(key.name) }));
    this.deps.repairs.forget(key);
    this.deps.metrics.forget(key);
  }
}

function statefulSetOf(child: ChildObject | undefined): V1StatefulSet | undefined {
  return child?.kind === 'StatefulSet' ? child.body : undefined;
}
