/**
 * Conflict-Retry Status Updater
 *
 * The single writer of cluster status. Each attempt re-reads the resource,
 * runs the mutation on a fresh copy of its status and writes it back against
 * the resourceVersion it read. A conflict (or any other transient platform
 * error) throws the attempt away and starts over from a new read; stale data
 * is never patched over.
 */

import type { StatusStore } from '../platform/platform.js';
import { keyOf, keyString, type ClusterHeader, type ClusterKey, type ClusterResource, type ClusterStatus } from '../types.js';
import { ConflictError, ResourceNotFoundError, TransientPlatformError, errorText } from '../errors.js';
import { stableStringify } from '../convergence/hash.js';
import { log } from '../logger.js';

/** Mutates `status` in place. May run several times; must not have side effects. */
export type StatusMutation = (status: ClusterStatus, cluster: ClusterResource) => void;

export interface StatusUpdaterOptions {
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  /** Called on each conflict, for metrics */
  onConflict?: (key: ClusterKey) => void;
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export class StatusUpdater {
  private readonly maxAttempts: number;
  private readonly baseDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly random: () => number;
  private readonly onConflict?: (key: ClusterKey) => void;

  constructor(private readonly store: StatusStore, options: StatusUpdaterOptions = {}) {
    this.maxAttempts = Math.max(1, options.maxAttempts ?? 5);
    this.baseDelayMs = options.baseDelayMs ?? 20;
    this.maxDelayMs = options.maxDelayMs ?? 1_000;
    this.sleep = options.sleep ?? sleep;
    this.random = options.random ?? Math.random;
    this.onConflict = options.onConflict;
  }

  /** Full-jitter exponential backoff before attempt `attempt + 1` */
  backoffMs(attempt: number): number {
    const ceiling = Math.min(this.maxDelayMs, this.baseDelayMs * 2 ** (attempt - 1));
    return Math.floor(this.random() * ceiling);
  }

  /**
   * Apply `mutate` to the latest status of `key`.
   *
   * Resolves with the resource as written (or as read, when the mutation
   * changed nothing). Rejects with ResourceNotFoundError when the resource is
   * gone and TransientPlatformError once the attempt budget is spent.
   */
  async update(key: ClusterKey, mutate: StatusMutation): Promise<ClusterResource> {
    let lastError: unknown;

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      try {
        const cluster = await this.store.getCluster(key);
        if (!cluster) throw new ResourceNotFoundError(`cluster ${keyString(key)} not found`);

        const next = structuredClone(cluster.status);
        mutate(next, cluster);

        if (stableStringify(next) === stableStringify(cluster.status)) return cluster;

        return await this.store.replaceClusterStatus(cluster, next);
      } catch (err) {
        if (!(err instanceof TransientPlatformError)) throw err;

        lastError = err;
        if (err instanceof ConflictError) this.onConflict?.(key);

        if (attempt < this.maxAttempts) {
          const delay = this.backoffMs(attempt);
          log(`[Status] ${keyString(key)} attempt ${attempt} failed (${errorText(err)}), retrying in ${delay}ms`);
          await this.sleep(delay);
        }
      }
    }

    throw new TransientPlatformError(
      `status update for ${keyString(key)} gave up after ${this.maxAttempts} attempts: ${errorText(lastError)}`,
      undefined,
      { cause: lastError },
    );
  }

  /**
   * A single write against `cluster` as it was read. For resources the schema
   * rejects, which update() cannot re-read; a conflict propagates so the whole
   * pass starts over from a fresh read.
   */
  async writeOnce<T extends ClusterHeader>(cluster: T, mutate: (status: ClusterStatus) => void): Promise<T> {
    const next = structuredClone(cluster.status);
    mutate(next);
    if (stableStringify(next) === stableStringify(cluster.status)) return cluster;

    try {
      return await this.store.replaceClusterStatus(cluster, next);
    } catch (err) {
      if (err instanceof ConflictError) this.onConflict?.(keyOf(cluster));
      throw err;
    }
  }
}
