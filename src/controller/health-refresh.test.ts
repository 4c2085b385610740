import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { HealthRefresher } from './health-refresh.js';

beforeEach(() => {
  vi.useFakeTimers();
});

afterEach(() => {
  vi.useRealTimers();
});

describe('HealthRefresher', () => {
  it('ticks every interval', async () => {
    const ticks: string[] = [];
    const refresher = new HealthRefresher(async key => { ticks.push(key); }, 60_000);

    refresher.ensure('db/graph');
    await vi.advanceTimersByTimeAsync(180_000);

    expect(ticks).toEqual(['db/graph', 'db/graph', 'db/graph']);
    refresher.stopAll();
  });

  it('keeps one timer when ensure is called repeatedly', () => {
    const refresher = new HealthRefresher(async () => undefined, 60_000);
    refresher.ensure('db/graph');
    refresher.ensure('db/graph');
    refresher.ensure('db/graph');

    expect(refresher.size).toBe(1);
    expect(vi.getTimerCount()).toBe(1);
    refresher.stopAll();
  });

  it('leaves no timer behind after repeated start and stop', () => {
    const refresher = new HealthRefresher(async () => undefined, 60_000);
    for (let i = 0; i < 10; i++) {
      refresher.ensure('db/a');
      refresher.ensure('db/b');
      refresher.stop('db/a');
    }
    expect(vi.getTimerCount()).toBe(1);

    refresher.stopAll();
    expect(vi.getTimerCount()).toBe(0);
    expect(refresher.has('db/b')).toBe(false);
  });

  it('skips a tick while the previous one is still running', async () => {
    let started = 0;
    let release: () => void = () => undefined;
    const refresher = new HealthRefresher(() => {
      started++;
      return new Promise<void>(resolve => { release = resolve; });
    }, 1_000);

    refresher.ensure('db/graph');
    await vi.advanceTimersByTimeAsync(3_000);
    expect(started).toBe(1);

    release();
    await vi.advanceTimersByTimeAsync(1_000);
    expect(started).toBe(2);
    refresher.stopAll();
  });

  it('keeps ticking after a failed tick', async () => {
    let calls = 0;
    const refresher = new HealthRefresher(async () => {
      calls++;
      throw new Error('circuit open');
    }, 1_000);

    refresher.ensure('db/graph');
    await vi.advanceTimersByTimeAsync(2_000);
    expect(calls).toBe(2);
    refresher.stopAll();
  });
});
