/**
 * Operator metrics.
 *
 * One Registry, built at startup and passed by reference. Metrics are
 * registered if absent so a second OperatorMetrics on the same registry
 * (tests, a restarted manager) reuses the existing collectors.
 */

import { Counter, Gauge, Registry } from 'prom-client';
import { keyString, type ClusterKey, type ServerDiagnostic } from '../types.js';

export const RECONCILE_RESULTS = ['success', 'error', 'requeue', 'invalid'] as const;
export type ReconcileResult = (typeof RECONCILE_RESULTS)[number];

type ServerLabel = 'cluster_name' | 'namespace' | 'server_name' | 'server_address';
type ClusterLabel = 'cluster_name' | 'namespace';

function gauge<T extends string>(registry: Registry, name: string, help: string, labelNames: readonly T[]): Gauge<T> {
  const existing = registry.getSingleMetric(name);
  if (existing instanceof Gauge) return existing;
  return new Gauge({ name, help, labelNames, registers: [registry] });
}

function counter<T extends string>(registry: Registry, name: string, help: string, labelNames: readonly T[]): Counter<T> {
  const existing = registry.getSingleMetric(name);
  if (existing instanceof Counter) return existing;
  return new Counter({ name, help, labelNames, registers: [registry] });
}

export class OperatorMetrics {
  readonly serverHealth: Gauge<ServerLabel>;
  readonly reconcileTotal: Counter<ClusterLabel | 'result'>;
  readonly statusConflicts: Counter<'namespace'>;
  readonly splitBrainDetected: Counter<ClusterLabel>;

  // Server samples per cluster, so a cluster's series can be replaced or dropped
  private readonly serverSeries = new Map<string, Array<Record<ServerLabel, string>>>();

  constructor(readonly registry: Registry = new Registry()) {
    this.serverHealth = gauge(registry, 'neo4j_operator_server_health',
      'Whether a Neo4j server is Enabled and Available (1) or not (0)',
      ['cluster_name', 'namespace', 'server_name', 'server_address']);
    this.reconcileTotal = counter(registry, 'neo4j_operator_reconcile_total',
      'Reconcile passes by result',
      ['cluster_name', 'namespace', 'result']);
    this.statusConflicts = counter(registry, 'neo4j_operator_status_conflicts_total',
      'Status writes rejected for a stale resourceVersion',
      ['namespace']);
    this.splitBrainDetected = counter(registry, 'neo4j_operator_split_brain_detected_total',
      'Partitions found by split-brain detection',
      ['cluster_name', 'namespace']);
  }

  /** Replace the server samples of one cluster with `servers`. */
  recordServers(key: ClusterKey, servers: ServerDiagnostic[]): void {
    this.dropServers(key);
    const series = servers.map(s => {
      const labels = { cluster_name: key.name, namespace: key.namespace, server_name: s.name, server_address: s.address };
      this.serverHealth.set(labels, s.state === 'Enabled' && s.health === 'Available' ? 1 : 0);
      return labels;
    });
    this.serverSeries.set(keyString(key), series);
  }

  private dropServers(key: ClusterKey): void {
    for (const labels of this.serverSeries.get(keyString(key)) ?? []) {
      this.serverHealth.remove(labels);
    }
    this.serverSeries.delete(keyString(key));
  }

  recordReconcile(key: ClusterKey, result: ReconcileResult): void {
    this.reconcileTotal.inc({ cluster_name: key.name, namespace: key.namespace, result });
  }

  recordConflict(key: ClusterKey): void {
    this.statusConflicts.inc({ namespace: key.namespace });
  }

  recordSplitBrain(key: ClusterKey): void {
    this.splitBrainDetected.inc({ cluster_name: key.name, namespace: key.namespace });
  }

  /** Drop every sample of a deleted cluster */
  forget(key: ClusterKey): void {
    this.dropServers(key);
    for (const result of RECONCILE_RESULTS) {
      this.reconcileTotal.remove({ cluster_name: key.name, namespace: key.namespace, result });
    }
    this.splitBrainDetected.remove({ cluster_name: key.name, namespace: key.namespace });
  }
}
