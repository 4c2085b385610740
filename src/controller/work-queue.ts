/**
 * Deduplicating work queue.
 *
 * - A key is queued at most once.
 * - A key is never processed by two workers at the same time; re-adding it
 *   while it runs schedules exactly one more run after the current one.
 * - At most `concurrency` keys are processed at once.
 * - A failed run requeues with per-key exponential backoff; a successful run
 *   resets it.
 */

import { errorText } from '../errors.js';
import { debug, log } from '../logger.js';

export interface HandlerResult {
  /** Run again after this delay even though this run succeeded */
  requeueAfterMs?: number;
}

export type KeyHandler = (key: string) => Promise<HandlerResult | void>;

export interface WorkQueueOptions {
  concurrency: number;
  baseBackoffMs?: number;
  maxBackoffMs?: number;
}

interface Delayed {
  timer: NodeJS.Timeout;
  due: number;
}

export class WorkQueue {
  private readonly pending: string[] = [];
  private readonly queued = new Set<string>();
  private readonly processing = new Set<string>();
  /** Re-added while processing */
  private readonly dirty = new Set<string>();
  private readonly delayed = new Map<string, Delayed>();
  private readonly failures = new Map<string, number>();
  private readonly idleWaiters: Array<() => void> = [];
  private readonly concurrency: number;
  private readonly baseBackoffMs: number;
  private readonly maxBackoffMs: number;
  private stopped = false;

  constructor(private readonly handler: KeyHandler, options: WorkQueueOptions) {
    this.concurrency = Math.max(1, options.concurrency);
    this.baseBackoffMs = options.baseBackoffMs ?? 1_000;
    this.maxBackoffMs = options.maxBackoffMs ?? 5 * 60_000;
  }

  get length(): number {
    return this.pending.length;
  }

  get active(): number {
    return this.processing.size;
  }

  /** Keys waiting on a delayed add */
  get scheduled(): number {
    return this.delayed.size;
  }

  add(key: string): void {
    if (this.stopped) return;
    if (this.processing.has(key)) {
      this.dirty.add(key);
      return;
    }
    if (this.queued.has(key)) return;

    this.queued.add(key);
    this.pending.push(key);
    this.pump();
  }

  /** Add `key` after `ms`. An earlier pending delayed add for the key wins. */
  addAfter(key: string, ms: number): void {
    if (this.stopped) return;
    if (ms <= 0) {
      this.add(key);
      return;
    }

    const due = Date.now() + ms;
    const existing = this.delayed.get(key);
    if (existing && existing.due <= due) return;
    if (existing) clearTimeout(existing.timer);

    const timer = setTimeout(() => {
      this.delayed.delete(key);
      this.add(key);
    }, ms);
    this.delayed.set(key, { timer, due });
  }

  backoffMs(key: string): number {
    const attempts = this.failures.get(key) ?? 0;
    if (attempts === 0) return 0;
    return Math.min(this.maxBackoffMs, this.baseBackoffMs * 2 ** (attempts - 1));
  }

  /** Forget a key's backoff and any delayed add (the resource is gone) */
  forget(key: string): void {
    this.failures.delete(key);
    const existing = this.delayed.get(key);
    if (existing) {
      clearTimeout(existing.timer);
      this.delayed.delete(key);
    }
  }

  /** Resolves once nothing is queued or running. Delayed adds are not waited for. */
  drain(): Promise<void> {
    if (this.isIdle()) return Promise.resolve();
    return new Promise(resolve => this.idleWaiters.push(resolve));
  }

  /** Cancel every delayed add, stop accepting keys and wait for in-flight runs. */
  async shutdown(): Promise<void> {
    this.stopped = true;
    for (const { timer } of this.delayed.values()) clearTimeout(timer);
    this.delayed.clear();
    this.pending.length = 0;
    this.queued.clear();
    this.dirty.clear();
    await this.drain();
  }

  private isIdle(): boolean {
    return this.pending.length === 0 && this.processing.size === 0;
  }

  private pump(): void {
    while (!this.stopped && this.processing.size < this.concurrency && this.pending.length > 0) {
      const key = this.pending.shift();
      if (key === undefined) break;
      this.queued.delete(key);
      this.processing.add(key);
      void this.process(key);
    }
  }

  private async process(key: string): Promise<void> {
    try {
      const result = await this.handler(key);
      this.failures.delete(key);
      if (result?.requeueAfterMs !== undefined) this.addAfter(key, result.requeueAfterMs);
    } catch (err) {
      const attempts = (this.failures.get(key) ?? 0) + 1;
      this.failures.set(key, attempts);
      const delay = this.backoffMs(key);
      log(`[Queue] ${key} failed (attempt ${attempts}): ${errorText(err)}; retrying in ${delay}ms`);
      this.addAfter(key, delay);
    } finally {
      this.processing.delete(key);
      if (this.dirty.delete(key)) {
        debug(`[Queue] ${key} changed while running, requeued`);
        this.add(key);
      }
      this.pump();
      if (this.isIdle()) {
        for (const resolve of this.idleWaiters.splice(0)) resolve();
      }
    }
  }
}
