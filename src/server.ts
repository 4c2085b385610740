/**
 * HTTP surface: Prometheus scrape endpoint and kubelet health endpoints.
 */

import { Hono } from 'hono';
import type { Registry } from 'prom-client';

export interface ReadinessSource {
  /** Ready once the manager has listed and queued existing clusters */
  ready(): boolean;
}

export function createApp(registry: Registry, readiness: ReadinessSource): Hono {
  const app = new Hono();

  app.get('/healthz', (c) => c.json({ status: 'ok' }));

  app.get('/readyz', (c) =>
    readiness.ready() ? c.json({ status: 'ready' }) : c.json({ status: 'starting' }, 503),
  );

  app.get('/metrics', async (c) => {
    const body = await registry.metrics();
    return c.text(body, 200, { 'Content-Type': registry.contentType });
  });

  return app;
}
