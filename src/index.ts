/**
 * Neo4j Cluster Reconciler
 *
 * Keeps Neo4jEnterpriseCluster resources converged: owns their StatefulSet,
 * Services and ConfigMap, reports formation and health in status, and
 * repairs split-brain partitions by restarting minority members.
 *
 * Usage:
 *   npx tsx src/index.ts --daemon   # Watch and reconcile continuously
 *   npx tsx src/index.ts --once     # Reconcile every cluster once and exit
 *
 * Data Flow:
 *   watch / resync → work queue → reconciler → Kubernetes API
 *                                      ↘ Neo4j (Bolt) diagnostics
 */

import { serve } from '@hono/node-server';
import { loadConfig } from './config.js';
import { KubernetesPlatform, loadKubeConfig } from './platform/kubernetes.js';
import { KubernetesWatcher } from './platform/watcher.js';
import { Manager } from './controller/manager.js';
import { createApp } from './server.js';
import { errorText } from './errors.js';
import { log } from './logger.js';

async function main(): Promise<void> {
  const config = loadConfig();
  const kc = loadKubeConfig();
  const platform = new KubernetesPlatform(kc, config.watchNamespace);
  const daemon = config.daemon && !config.once;

  const manager = new Manager(config, {
    platform,
    watcher: daemon ? new KubernetesWatcher(kc, config.watchNamespace) : undefined,
  });

  log('Neo4j cluster reconciler starting');
  log(`Namespace: ${config.watchNamespace || '(all)'}`);
  log(`Mode: ${daemon ? 'daemon' : 'single pass'}`);
  log(`Workers: ${config.maxConcurrentReconciles}, resync: ${config.resyncSeconds}s`);
  log(`Config debounce: ${config.configDebounceSeconds}s, split-brain interval: ${config.splitBrainIntervalSeconds}s`);

  if (!daemon) {
    await manager.runOnce();
    await manager.events.close();
    return;
  }

  const server = config.metricsPort > 0
    ? serve({ fetch: createApp(manager.metrics.registry, { ready: () => manager.ready }).fetch, port: config.metricsPort }, () => {
        log(`[Server] Listening on :${config.metricsPort} (/metrics, /healthz, /readyz)`);
      })
    : null;

  // Handle graceful shutdown
  let stopping = false;
  const shutdown = async () => {
    if (stopping) return;
    stopping = true;
    log('[Reconciler] Shutting down...');
    server?.close();
    await manager.stop();
    await manager.events.close();
    process.exit(0);
  };
  process.on('SIGINT', () => void shutdown());
  process.on('SIGTERM', () => void shutdown());

  await manager.start();
}

main().catch(err => {
  console.error('Fatal error:', errorText(err));
  process.exit(1);
});
