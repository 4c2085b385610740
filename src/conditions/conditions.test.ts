import { describe, it, expect } from 'vitest';
import {
  setCondition,
  setPhase,
  findCondition,
  phaseToReadyCondition,
  rfc3339,
  ConditionType,
  Reason,
} from './conditions.js';
import { emptyStatus } from '../api/cluster-resource.js';
import type { ClusterStatus } from '../types.js';

const T0 = new Date('2026-03-01T10:00:00.250Z');
const T1 = new Date('2026-03-01T10:05:00.000Z');

function serversHealthy(status: ClusterStatus, now: Date, message = 'All 3 servers are Enabled and Available') {
  setCondition(status, {
    type: ConditionType.ServersHealthy,
    status: 'True',
    reason: Reason.AllServersHealthy,
    message,
    observedGeneration: 1,
  }, now);
}

describe('rfc3339()', () => {
  it('drops fractional seconds', () => {
    expect(rfc3339(T0)).toBe('2026-03-01T10:00:00Z');
  });
});

describe('setCondition()', () => {
  it('appends a condition that does not exist yet', () => {
    const status = emptyStatus();
    serversHealthy(status, T0);

    expect(status.conditions).toEqual([{
      type: 'ServersHealthy',
      status: 'True',
      reason: 'AllServersHealthy',
      message: 'All 3 servers are Enabled and Available',
      observedGeneration: 1,
      lastTransitionTime: '2026-03-01T10:00:00Z',
    }]);
  });

  it('keeps lastTransitionTime when status and reason are unchanged', () => {
    const status = emptyStatus();
    serversHealthy(status, T0);
    setCondition(status, {
      type: ConditionType.ServersHealthy,
      status: 'True',
      reason: Reason.AllServersHealthy,
      message: 'All 5 servers are Enabled and Available',
      observedGeneration: 4,
    }, T1);

    expect(status.conditions).toHaveLength(1);
    expect(status.conditions[0].lastTransitionTime).toBe('2026-03-01T10:00:00Z');
    expect(status.conditions[0].message).toBe('All 5 servers are Enabled and Available');
    expect(status.conditions[0].observedGeneration).toBe(4);
  });

  it('moves lastTransitionTime when the status flips', () => {
    const status = emptyStatus();
    serversHealthy(status, T0);
    setCondition(status, {
      type: ConditionType.ServersHealthy,
      status: 'False',
      reason: Reason.ServerDegraded,
      message: 'Degraded servers: s1 (state=Cordoned, health=Available)',
      observedGeneration: 1,
    }, T1);

    expect(status.conditions).toHaveLength(1);
    expect(status.conditions[0].status).toBe('False');
    expect(status.conditions[0].lastTransitionTime).toBe('2026-03-01T10:05:00Z');
  });

  it('moves lastTransitionTime when only the reason changes', () => {
    const status = emptyStatus();
    setPhase(status, 'Forming', 'waiting', 1, T0);
    setPhase(status, 'Upgrading', 'rolling', 1, T1);

    const ready = findCondition(status, ConditionType.Ready);
    expect(ready?.status).toBe('Unknown');
    expect(ready?.reason).toBe('UpgradeInProgress');
    expect(ready?.lastTransitionTime).toBe('2026-03-01T10:05:00Z');
  });

  it('collapses duplicates written by another actor', () => {
    const status = emptyStatus();
    status.conditions = [
      { type: 'Ready', status: 'True', reason: 'ClusterReady', message: 'a', observedGeneration: 1, lastTransitionTime: 'x' },
      { type: 'Ready', status: 'False', reason: 'ReconciliationFailed', message: 'b', observedGeneration: 1, lastTransitionTime: 'y' },
    ];
    setCondition(status, {
      type: 'Ready', status: 'True', reason: 'ClusterReady', message: 'c', observedGeneration: 2,
    }, T1);

    expect(status.conditions).toHaveLength(1);
    expect(status.conditions[0].message).toBe('c');
    expect(status.conditions[0].lastTransitionTime).toBe('x');
  });

  it('keeps other condition types untouched', () => {
    const status = emptyStatus();
    serversHealthy(status, T0);
    setCondition(status, {
      type: ConditionType.DatabasesHealthy,
      status: 'True',
      reason: Reason.AllDatabasesOnline,
      message: 'All 1 databases are online',
      observedGeneration: 1,
    }, T1);

    expect(status.conditions.map(c => c.type)).toEqual(['ServersHealthy', 'DatabasesHealthy']);
  });
});

describe('phaseToReadyCondition()', () => {
  it.each([
    ['Ready', 'True', 'ClusterReady'],
    ['Failed', 'False', 'ReconciliationFailed'],
    ['Degraded', 'False', 'ReconciliationFailed'],
    ['Upgrading', 'Unknown', 'UpgradeInProgress'],
    ['Forming', 'Unknown', 'ClusterForming'],
    ['Pending', 'Unknown', 'Pending'],
  ] as const)('%s → %s/%s', (phase, status, reason) => {
    expect(phaseToReadyCondition(phase)).toEqual({ status, reason });
  });

  it('treats an unset phase as Pending', () => {
    expect(phaseToReadyCondition(undefined)).toEqual({ status: 'Unknown', reason: 'Pending' });
  });
});

describe('setPhase()', () => {
  it('reports whether the phase changed and records observedGeneration', () => {
    const status = emptyStatus();
    expect(setPhase(status, 'Ready', 'Cluster is ready', 3, T0)).toBe(true);
    expect(setPhase(status, 'Ready', 'Cluster is ready', 3, T1)).toBe(false);
    expect(status.observedGeneration).toBe(3);
    expect(status.message).toBe('Cluster is ready');
    expect(findCondition(status, 'Ready')?.lastTransitionTime).toBe('2026-03-01T10:00:00Z');
  });
});
