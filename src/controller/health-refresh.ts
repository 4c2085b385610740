/**
 * Health refresher: one interval timer per Ready cluster.
 *
 * A tick that fires while the previous tick for the same cluster is still
 * running is skipped. stop/stopAll clear the timers; nothing keeps running
 * after the manager shuts down.
 */

import { errorText } from '../errors.js';
import { debug, log } from '../logger.js';

export type RefreshTick = (key: string) => Promise<void>;

interface Entry {
  timer: NodeJS.Timeout;
  running: boolean;
}

export class HealthRefresher {
  private readonly entries = new Map<string, Entry>();

  constructor(
    private readonly tick: RefreshTick,
    private readonly intervalMs: number,
  ) {}

  /** Start refreshing `key` unless already running. */
  ensure(key: string): void {
    if (this.entries.has(key) || this.intervalMs <= 0) return;

    const entry: Entry = {
      running: false,
      timer: setInterval(() => {
        void this.run(key, entry);
      }, this.intervalMs),
    };
    this.entries.set(key, entry);
    debug(`[Refresh] started ${key} every ${this.intervalMs}ms`);
  }

  stop(key: string): void {
    const entry = this.entries.get(key);
    if (!entry) return;
    clearInterval(entry.timer);
    this.entries.delete(key);
    debug(`[Refresh] stopped ${key}`);
  }

  stopAll(): void {
    for (const key of [...this.entries.keys()]) this.stop(key);
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  get size(): number {
    return this.entries.size;
  }

  private async run(key: string, entry: Entry): Promise<void> {
    if (entry.running) {
      debug(`[Refresh] ${key} previous tick still running, skipped`);
      return;
    }
    entry.running = true;
    try {
      await this.tick(key);
    } catch (err) {
      log(`[Refresh] ${key} failed: ${errorText(err)}`);
    } finally {
      entry.running = false;
    }
  }
}
