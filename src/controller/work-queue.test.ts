import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { WorkQueue, type HandlerResult } from './work-queue.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Handler whose runs stay open until released */
function gatedHandler() {
  const runs: string[] = [];
  const gates: Array<() => void> = [];
  let running = 0;
  let maxRunning = 0;

  const handler = (key: string) => {
    runs.push(key);
    running++;
    maxRunning = Math.max(maxRunning, running);
    return new Promise<void>(resolve => gates.push(() => {
      running--;
      resolve();
    }));
  };

  return {
    handler,
    runs,
    get maxRunning() { return maxRunning; },
    releaseAll: async () => {
      for (const release of gates.splice(0)) release();
      await vi.advanceTimersByTimeAsync(0);
    },
  };
}

beforeEach(() => {
  vi.useFakeTimers();
});

afterEach(() => {
  vi.useRealTimers();
});

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('WorkQueue', () => {
  it('runs a key re-added while it is processing exactly once more', async () => {
    const h = gatedHandler();
    const queue = new WorkQueue(h.handler, { concurrency: 4 });

    queue.add('db/graph');
    queue.add('db/graph');
    queue.add('db/graph');
    expect(h.runs).toEqual(['db/graph']);

    await h.releaseAll();
    expect(h.runs).toEqual(['db/graph', 'db/graph']);

    await h.releaseAll();
    await queue.drain();
    expect(h.runs).toHaveLength(2);
  });

  it('queues a waiting key at most once', async () => {
    const h = gatedHandler();
    const queue = new WorkQueue(h.handler, { concurrency: 1 });

    queue.add('db/a');
    queue.add('db/b');
    queue.add('db/b');
    expect(queue.length).toBe(1);

    await h.releaseAll();
    await h.releaseAll();
    await queue.drain();
    expect(h.runs).toEqual(['db/a', 'db/b']);
  });

  it('bounds concurrency', async () => {
    const h = gatedHandler();
    const queue = new WorkQueue(h.handler, { concurrency: 2 });

    for (const key of ['db/a', 'db/b', 'db/c', 'db/d']) queue.add(key);
    expect(queue.active).toBe(2);
    expect(queue.length).toBe(2);

    await h.releaseAll();
    await h.releaseAll();
    await queue.drain();
    expect(h.runs).toEqual(['db/a', 'db/b', 'db/c', 'db/d']);
    expect(h.maxRunning).toBe(2);
  });

  it('retries failures with exponential backoff and resets on success', async () => {
    let calls = 0;
    const queue = new WorkQueue(async () => {
      calls++;
      if (calls <= 2) throw new Error('apiserver unavailable');
    }, { concurrency: 1 });

    queue.add('db/graph');
    await vi.advanceTimersByTimeAsync(0);
    expect(calls).toBe(1);
    expect(queue.backoffMs('db/graph')).toBe(1_000);

    await vi.advanceTimersByTimeAsync(999);
    expect(calls).toBe(1);
    await vi.advanceTimersByTimeAsync(1);
    expect(calls).toBe(2);
    expect(queue.backoffMs('db/graph')).toBe(2_000);

    await vi.advanceTimersByTimeAsync(2_000);
    expect(calls).toBe(3);
    expect(queue.backoffMs('db/graph')).toBe(0);
    expect(queue.scheduled).toBe(0);
  });

  it('caps the backoff', async () => {
    const queue = new WorkQueue(async () => { throw new Error('down'); }, { concurrency: 1, baseBackoffMs: 1_000, maxBackoffMs: 4_000 });
    queue.add('db/graph');
    await vi.advanceTimersByTimeAsync(0);
    await vi.advanceTimersByTimeAsync(1_000);
    await vi.advanceTimersByTimeAsync(2_000);
    await vi.advanceTimersByTimeAsync(4_000);
    expect(queue.backoffMs('db/graph')).toBe(4_000);
    await queue.shutdown();
  });

  it('honours requeueAfter from a successful run', async () => {
    const runs: number[] = [];
    const queue = new WorkQueue(async (): Promise<HandlerResult> => {
      runs.push(Date.now());
      return { requeueAfterMs: 30_000 };
    }, { concurrency: 1 });

    queue.add('db/graph');
    await vi.advanceTimersByTimeAsync(30_000);
    expect(runs).toHaveLength(2);
    expect(runs[1] - runs[0]).toBe(30_000);
    await queue.shutdown();
  });

  it('keeps the earlier of two delayed adds', async () => {
    const runs: string[] = [];
    const queue = new WorkQueue(async key => { runs.push(key); }, { concurrency: 1 });

    queue.addAfter('db/graph', 5_000);
    queue.addAfter('db/graph', 10_000);
    expect(queue.scheduled).toBe(1);

    await vi.advanceTimersByTimeAsync(5_000);
    expect(runs).toEqual(['db/graph']);
    expect(queue.scheduled).toBe(0);
  });

  it('cancels delayed adds and waits for in-flight work on shutdown', async () => {
    const h = gatedHandler();
    const queue = new WorkQueue(h.handler, { concurrency: 1 });

    queue.add('db/a');
    queue.addAfter('db/b', 1_000);

    let stopped = false;
    const shutdown = queue.shutdown().then(() => { stopped = true; });
    await vi.advanceTimersByTimeAsync(0);
    expect(stopped).toBe(false);

    await h.releaseAll();
    await shutdown;
    expect(stopped).toBe(true);

    await vi.advanceTimersByTimeAsync(5_000);
    queue.add('db/c');
    expect(h.runs).toEqual(['db/a']);
    expect(vi.getTimerCount()).toBe(0);
  });
});
