import { describe, it, expect } from 'vitest';
import { ConfigDebouncer } from './debounce.js';

describe('ConfigDebouncer', () => {
  it('holds a new hash for the full window', () => {
    const d = new ConfigDebouncer(120_000);
    expect(d.observe('cm', 'h1', 0)).toEqual({ ready: false, remainingMs: 120_000 });
    expect(d.observe('cm', 'h1', 119_999)).toEqual({ ready: false, remainingMs: 1 });
    expect(d.observe('cm', 'h1', 120_000)).toEqual({ ready: true, remainingMs: 0 });
  });

  it('restarts the window when the hash changes', () => {
    const d = new ConfigDebouncer(1_000);
    d.observe('cm', 'h1', 0);
    expect(d.observe('cm', 'h2', 900)).toEqual({ ready: false, remainingMs: 1_000 });
    expect(d.observe('cm', 'h2', 1_500)).toEqual({ ready: false, remainingMs: 400 });
  });

  it('passes everything through with a zero window', () => {
    const d = new ConfigDebouncer(0);
    expect(d.observe('cm', 'h1', 0).ready).toBe(true);
    expect(d.observe('cm', 'h2', 0).ready).toBe(true);
  });

  it('restarts the full window for a cleared key only', () => {
    const d = new ConfigDebouncer(1_000);
    d.observe('ConfigMap/db/a-config', 'h1', 0);
    d.observe('ConfigMap/db/b-config', 'h1', 0);
    d.clear('ConfigMap/db/a-config');
    expect(d.observe('ConfigMap/db/a-config', 'h1', 500)).toEqual({ ready: false, remainingMs: 1_000 });
    expect(d.observe('ConfigMap/db/b-config', 'h1', 500)).toEqual({ ready: false, remainingMs: 500 });
  });
});
