/**
 * Per-cluster circuit breaker for database calls.
 *
 * closed → open after maxFailures consecutive failures; open rejects every
 * call until resetTimeoutMs has passed; half-open lets up to halfOpenMaxCalls
 * trial calls through, closing on the first success and reopening on any
 * failure.
 *
 * The reconcile path and the health refresher share one breaker per cluster.
 * All state transitions happen synchronously between awaits, so the two can
 * never interleave inside a transition.
 */

import { CircuitOpenError, QueryError } from '../errors.js';
import { log } from '../logger.js';

export type BreakerState = 'closed' | 'open' | 'half-open';

export interface CircuitBreakerConfig {
  /** Consecutive failures before the circuit opens. Default 5. */
  maxFailures: number;
  /** How long the circuit stays open before a trial. Default 30_000 (30 seconds). */
  resetTimeoutMs: number;
  /** Concurrent trial calls allowed while half-open. Default 3. */
  halfOpenMaxCalls: number;
}

export const DEFAULT_CIRCUIT_BREAKER_CONFIG: CircuitBreakerConfig = {
  maxFailures: 5,
  resetTimeoutMs: 30_000,
  halfOpenMaxCalls: 3,
};

export class CircuitBreaker {
  private state: BreakerState = 'closed';
  private failures = 0;
  private lastFailureAt = 0;
  private halfOpenCalls = 0;
  private readonly config: CircuitBreakerConfig;

  constructor(
    readonly name: string,
    config: Partial<CircuitBreakerConfig> = {},
    private readonly now: () => number = Date.now,
  ) {
    this.config = { ...DEFAULT_CIRCUIT_BREAKER_CONFIG, ...config };
  }

  get currentState(): BreakerState {
    if (this.state === 'open' && this.now() - this.lastFailureAt >= this.config.resetTimeoutMs) {
      this.state = 'half-open';
      this.halfOpenCalls = 0;
      log(`[Breaker] ${this.name} half-open`);
    }
    return this.state;
  }

  get failureCount(): number {
    return this.failures;
  }

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    const state = this.currentState;
    if (state === 'open') {
      throw new CircuitOpenError(`circuit for ${this.name} is open after ${this.failures} failures`);
    }
    if (state === 'half-open') {
      if (this.halfOpenCalls >= this.config.halfOpenMaxCalls) {
        throw new CircuitOpenError(`circuit for ${this.name} is half-open and at its trial limit`);
      }
      this.halfOpenCalls++;
    }

    try {
      const result = await fn();
      this.recordSuccess();
      return result;
    } catch (err) {
      this.recordFailure(err);
      throw err;
    }
  }

  private recordSuccess(): void {
    if (this.state !== 'closed') log(`[Breaker] ${this.name} closed`);
    this.state = 'closed';
    this.failures = 0;
    this.halfOpenCalls = 0;
  }

  private recordFailure(err: unknown): void {
    // A rejected statement says nothing about the server's availability
    if (err instanceof QueryError) return;

    this.failures++;
    this.lastFailureAt = this.now();
    if (this.state === 'half-open' || this.failures >= this.config.maxFailures) {
      if (this.state !== 'open') log(`[Breaker] ${this.name} open (${this.failures} failures)`);
      this.state = 'open';
      this.halfOpenCalls = 0;
    }
  }
}

/** Breakers keyed by cluster (or cluster member), created on first use */
export class BreakerRegistry {
  private breakers = new Map<string, CircuitBreaker>();

  constructor(
    private readonly config: Partial<CircuitBreakerConfig> = {},
    private readonly now: () => number = Date.now,
  ) {}

  get(key: string): CircuitBreaker {
    let breaker = this.breakers.get(key);
    if (!breaker) {
      breaker = new CircuitBreaker(key, this.config, this.now);
      this.breakers.set(key, breaker);
    }
    return breaker;
  }

  /** Drop the breaker for `key` and any scoped under it (`key/...`). */
  forget(key: string): void {
    for (const k of [...this.breakers.keys()]) {
      if (k === key || k.startsWith(`${key}/`)) this.breakers.delete(k);
    }
  }

  get size(): number {
    return this.breakers.size;
  }
}
