/**
 * Repair Orchestrator
 *
 * Heals a partitioned cluster by deleting its minority pods; the StatefulSet
 * recreates them and they rejoin through discovery. Majority pods are never
 * touched.
 *
 * Tracks repair history per cluster to prevent restart loops: a cooldown
 * between repairs and a cap on repairs per hour.
 */

import type { ClusterPlatform } from '../platform/platform.js';
import { keyString, type ClusterKey } from '../types.js';
import { errorText } from '../errors.js';
import { log } from '../logger.js';

export interface RepairLimits {
  cooldownMinutes: number;
  maxPerHour: number;
}

export interface RepairRecord {
  timestamp: string;
  cluster: string;
  pods: string[];
  deleted: string[];
  success: boolean;
  error?: string;
}

export type RepairOutcome =
  | { status: 'skipped'; reason: string }
  | { status: 'repaired'; record: RepairRecord }
  | { status: 'failed'; record: RepairRecord };

export class RepairOrchestrator {
  private readonly history = new Map<string, RepairRecord[]>();

  constructor(
    private readonly platform: Pick<ClusterPlatform, 'deletePod'>,
    private readonly limits: RepairLimits,
    private readonly now: () => number = Date.now,
  ) {}

  recentRepairCount(key: ClusterKey, minutes: number): number {
    const cutoff = this.now() - minutes * 60_000;
    return (this.history.get(keyString(key)) ?? [])
      .filter(r => new Date(r.timestamp).getTime() > cutoff).length;
  }

  /**
   * Delete the given minority pods. Each deletion is independent; pods that
   * fail are reported and left for the next detection cycle.
   */
  async repair(key: ClusterKey, minority: string[]): Promise<RepairOutcome> {
    const cluster = keyString(key);
    if (minority.length === 0) return { status: 'skipped', reason: 'no minority members' };

    // Rate limit
    const recentCount = this.recentRepairCount(key, 60);
    if (recentCount >= this.limits.maxPerHour) {
      const reason = `Repair loop detected (${recentCount} repairs in 1h). Manual intervention required.`;
      log(`[Repair] ${cluster}: ${reason}`);
      return { status: 'skipped', reason };
    }

    // Cooldown check
    const records = this.history.get(cluster) ?? [];
    const last = records[records.length - 1];
    if (last) {
      const sinceLastMs = this.now() - new Date(last.timestamp).getTime();
      if (sinceLastMs < this.limits.cooldownMinutes * 60_000) {
        const reason = `Cooldown active (${(sinceLastMs / 60_000).toFixed(1)}m since last repair)`;
        log(`[Repair] ${cluster}: ${reason}`);
        return { status: 'skipped', reason };
      }
    }

    log(`[Repair] ${cluster}: deleting minority pods ${minority.join(', ')}`);

    const settled = await Promise.allSettled(minority.map(pod => this.platform.deletePod(key.namespace, pod)));

    const deleted: string[] = [];
    const failures: string[] = [];
    settled.forEach((outcome, i) => {
      if (outcome.status === 'fulfilled') {
        deleted.push(minority[i]);
      } else {
        failures.push(`${minority[i]}: ${errorText(outcome.reason)}`);
        log(`[Repair] ${cluster}: failed to delete ${minority[i]}: ${errorText(outcome.reason)}`);
      }
    });

    const record: RepairRecord = {
      timestamp: new Date(this.now()).toISOString(),
      cluster,
      pods: [...minority],
      deleted,
      success: failures.length === 0,
    };
    if (failures.length > 0) record.error = failures.join('; ');

    records.push(record);
    this.history.set(cluster, records);

    log(`[Repair] ${cluster}: ${record.success ? 'repair complete' : `repair incomplete (${deleted.length}/${minority.length} deleted)`}`);
    return { status: record.success ? 'repaired' : 'failed', record };
  }

  /** Recent repair history (for debugging) */
  getHistory(key: ClusterKey): RepairRecord[] {
    return [...(this.history.get(keyString(key)) ?? [])];
  }

  forget(key: ClusterKey): void {
    this.history.delete(keyString(key));
  }
}
