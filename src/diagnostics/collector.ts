/**
 * Diagnostics Collector
 *
 * Reads SHOW SERVERS and SHOW DATABASES through the cluster's client, turns
 * them into the ServersHealthy and DatabasesHealthy conditions and writes the
 * snapshot and both conditions in a single status mutation.
 *
 * Protocol failures never propagate: a failed query leaves its condition
 * Unknown and its error text in diagnostics.collectionError.
 */

import type { GraphClient } from '../protocol/client.js';
import type { StatusUpdater } from '../status/updater.js';
import type { OperatorMetrics } from '../metrics/registry.js';
import { ConditionType, Reason, rfc3339, setCondition, type ConditionInput } from '../conditions/conditions.js';
import {
  keyOf,
  keyString,
  type ClusterDiagnostics,
  type ClusterResource,
  type DatabaseDiagnostic,
  type ServerDiagnostic,
} from '../types.js';
import { errorText } from '../errors.js';
import { log } from '../logger.js';

type Outcome<T> = { ok: true; value: T } | { ok: false; error: string };

export function isServerHealthy(server: ServerDiagnostic): boolean {
  return server.state === 'Enabled' && server.health === 'Available';
}

export function evaluateServersCondition(outcome: Outcome<ServerDiagnostic[]>, generation: number): ConditionInput {
  const base = { type: ConditionType.ServersHealthy, observedGeneration: generation };

  if (!outcome.ok) {
    return { ...base, status: 'Unknown', reason: Reason.DiagnosticsUnavailable, message: `Server diagnostics unavailable: ${outcome.error}` };
  }
  const servers = outcome.value;
  if (servers.length === 0) {
    return { ...base, status: 'Unknown', reason: Reason.DiagnosticsUnavailable, message: 'No servers reported' };
  }

  const degraded = servers.filter(s => !isServerHealthy(s));
  if (degraded.length > 0) {
    const list = degraded.map(s => `${s.name} (state=${s.state}, health=${s.health})`).join(', ');
    return { ...base, status: 'False', reason: Reason.ServerDegraded, message: `Degraded servers: ${list}` };
  }

  return { ...base, status: 'True', reason: Reason.AllServersHealthy, message: `All ${servers.length} servers are Enabled and Available` };
}

/**
 * The system database is excluded, and so is any database an administrator
 * asked to be offline.
 */
export function evaluateDatabasesCondition(outcome: Outcome<DatabaseDiagnostic[]>, generation: number): ConditionInput {
  const base = { type: ConditionType.DatabasesHealthy, observedGeneration: generation };

  if (!outcome.ok) {
    return { ...base, status: 'Unknown', reason: Reason.DiagnosticsUnavailable, message: `Database diagnostics unavailable: ${outcome.error}` };
  }
  const user = outcome.value.filter(db => db.name !== 'system');
  if (user.length === 0) {
    return { ...base, status: 'Unknown', reason: Reason.DiagnosticsUnavailable, message: 'No databases reported' };
  }

  const expectedOnline = user.filter(db => db.requestedStatus === 'online');
  const offline = expectedOnline.filter(db => db.status !== 'online');
  if (offline.length > 0) {
    const list = offline.map(db => `${db.name} (status=${db.status}, requested=${db.requestedStatus})`).join(', ');
    return { ...base, status: 'False', reason: Reason.DatabaseOffline, message: `Offline databases: ${list}` };
  }

  return { ...base, status: 'True', reason: Reason.AllDatabasesOnline, message: `All ${expectedOnline.length} databases are online` };
}

async function settle<T>(work: Promise<T>): Promise<Outcome<T>> {
  try {
    return { ok: true, value: await work };
  } catch (err) {
    return { ok: false, error: errorText(err) };
  }
}

export class DiagnosticsCollector {
  constructor(
    private readonly updater: StatusUpdater,
    private readonly metrics: OperatorMetrics,
    private readonly options: { timeoutMs: number },
    private readonly now: () => Date = () => new Date(),
  ) {}

  /**
   * Collect and record diagnostics. Resolves with the snapshot written.
   * Rejects only when the status write itself fails.
   */
  async collect(cluster: ClusterResource, client: GraphClient): Promise<ClusterDiagnostics> {
    const key = keyOf(cluster);
    const [servers, databases] = await Promise.all([
      settle(client.listServers(this.options.timeoutMs)),
      settle(client.listDatabases(this.options.timeoutMs)),
    ]);

    const errors = [servers, databases].flatMap(o => (o.ok ? [] : [o.error]));
    const at = this.now();
    const snapshot: ClusterDiagnostics = {
      servers: servers.ok ? servers.value : [],
      databases: databases.ok ? databases.value : [],
      lastCollected: rfc3339(at),
      collectionError: errors.join('; '),
    };
    if (errors.length > 0) log(`[Diagnostics] ${keyString(key)}: ${snapshot.collectionError}`);

    // A failed listing leaves no samples rather than the previous ones
    this.metrics.recordServers(key, servers.ok ? servers.value : []);

    await this.updater.update(key, (status, latest) => {
      const generation = latest.metadata.generation;
      status.diagnostics = snapshot;
      setCondition(status, evaluateServersCondition(servers, generation), at);
      setCondition(status, evaluateDatabasesCondition(databases, generation), at);
    });

    return snapshot;
  }
}
