/**
 * Condition model.
 *
 * Conditions are upserted by type. lastTransitionTime moves only when the
 * status or the reason changes; message and observedGeneration are refreshed
 * in place.
 */

import type { ClusterStatus, Condition, ConditionStatus, Phase } from '../types.js';

export const ConditionType = {
  Ready: 'Ready',
  ServersHealthy: 'ServersHealthy',
  DatabasesHealthy: 'DatabasesHealthy',
  TopologyValid: 'TopologyValid',
} as const;

export const Reason = {
  // ServersHealthy
  AllServersHealthy: 'AllServersHealthy',
  ServerDegraded: 'ServerDegraded',
  // DatabasesHealthy
  AllDatabasesOnline: 'AllDatabasesOnline',
  DatabaseOffline: 'DatabaseOffline',
  // Both diagnostics conditions
  DiagnosticsUnavailable: 'DiagnosticsUnavailable',
  // Ready
  ClusterReady: 'ClusterReady',
  ClusterForming: 'ClusterForming',
  ReconciliationFailed: 'ReconciliationFailed',
  UpgradeInProgress: 'UpgradeInProgress',
  Pending: 'Pending',
  // TopologyValid
  TopologyValid: 'TopologyValid',
  InvalidTopology: 'InvalidTopology',
} as const;

export type ConditionInput = Omit<Condition, 'lastTransitionTime'>;

/** Kubernetes metav1.Time: RFC 3339 without fractional seconds */
export function rfc3339(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

export function findCondition(status: ClusterStatus, type: string): Condition | undefined {
  return status.conditions.find(c => c.type === type);
}

/**
 * Insert or update a condition on the status.
 * Any duplicates of a type left by another writer are collapsed to the first.
 */
export function setCondition(status: ClusterStatus, input: ConditionInput, now: Date = new Date()): void {
  const existing = findCondition(status, input.type);

  if (existing && existing.status === input.status && existing.reason === input.reason) {
    existing.message = input.message;
    existing.observedGeneration = input.observedGeneration;
  } else {
    const next: Condition = { ...input, lastTransitionTime: rfc3339(now) };
    const index = existing ? status.conditions.indexOf(existing) : -1;
    if (index >= 0) {
      status.conditions[index] = next;
    } else {
      status.conditions.push(next);
    }
  }

  status.conditions = status.conditions.filter(
    (c, i, all) => all.findIndex(other => other.type === c.type) === i,
  );
}

/** Ready condition implied by a phase */
export function phaseToReadyCondition(phase: Phase | undefined): { status: ConditionStatus; reason: string } {
  switch (phase) {
    case 'Ready':
      return { status: 'True', reason: Reason.ClusterReady };
    case 'Failed':
    case 'Degraded':
      return { status: 'False', reason: Reason.ReconciliationFailed };
    case 'Upgrading':
      return { status: 'Unknown', reason: Reason.UpgradeInProgress };
    case 'Forming':
      return { status: 'Unknown', reason: Reason.ClusterForming };
    default:
      return { status: 'Unknown', reason: Reason.Pending };
  }
}

/**
 * Set phase and message, and keep the Ready condition and observedGeneration in
 * step with them. Returns true when the phase changed.
 */
export function setPhase(
  status: ClusterStatus,
  phase: Phase,
  message: string,
  generation: number,
  now: Date = new Date(),
): boolean {
  const changed = status.phase !== phase;
  status.phase = phase;
  status.message = message;
  status.observedGeneration = generation;

  const ready = phaseToReadyCondition(phase);
  setCondition(status, {
    type: ConditionType.Ready,
    status: ready.status,
    reason: ready.reason,
    message,
    observedGeneration: generation,
  }, now);

  return changed;
}
