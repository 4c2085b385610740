/**
 * Quiet-window tracker for configuration changes.
 *
 * A changed hash is parked until the same hash has been observed for the full
 * window. Any different hash restarts the window. State is in-memory and keyed
 * per object.
 */

export interface DebounceDecision {
  ready: boolean;
  /** Time left in the window; 0 when ready */
  remainingMs: number;
}

interface PendingChange {
  hash: string;
  firstSeen: number;
}

export class ConfigDebouncer {
  private pending = new Map<string, PendingChange>();

  constructor(private readonly quietMs: number) {}

  /** Record that `hash` is the desired content for `key` and ask whether it may be applied. */
  observe(key: string, hash: string, now = Date.now()): DebounceDecision {
    const prev = this.pending.get(key);

    if (!prev || prev.hash !== hash) {
      if (this.quietMs <= 0) return { ready: true, remainingMs: 0 };
      this.pending.set(key, { hash, firstSeen: now });
      return { ready: false, remainingMs: this.quietMs };
    }

    const elapsed = now - prev.firstSeen;
    if (elapsed >= this.quietMs) return { ready: true, remainingMs: 0 };
    return { ready: false, remainingMs: this.quietMs - elapsed };
  }

  /** Drop any parked change, e.g. once applied or reverted. */
  clear(key: string): void {
    this.pending.delete(key);
  }
}
