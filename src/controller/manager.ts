/**
 * Manager
 *
 * Wires the reconciler to its inputs: watch notifications and a periodic
 * resync feed the work queue, the queue runs reconcile passes, and the
 * health refresher re-checks Ready clusters between passes.
 */

import type { ClusterPlatform, ClusterWatcher } from '../platform/platform.js';
import type { Config } from '../config.js';
import type { Connector } from '../protocol/client.js';
import { ClusterReconciler } from './reconciler.js';
import { WorkQueue } from './work-queue.js';
import { HealthRefresher } from './health-refresh.js';
import { StatusUpdater } from '../status/updater.js';
import { ConvergenceEngine } from '../convergence/engine.js';
import { ConfigDebouncer } from '../convergence/debounce.js';
import { ClientFactory } from '../protocol/client-factory.js';
import { BreakerRegistry } from '../protocol/circuit-breaker.js';
import { DiagnosticsCollector } from '../diagnostics/collector.js';
import { RepairOrchestrator } from '../restart/orchestrator.js';
import { OperatorMetrics } from '../metrics/registry.js';
import { EventPublisher } from '../services/events.js';
import { keyString, parseKey } from '../types.js';
import { errorText } from '../errors.js';
import { log } from '../logger.js';

export interface ManagerDeps {
  platform: ClusterPlatform;
  /** Absent in --once mode */
  watcher?: ClusterWatcher;
  metrics?: OperatorMetrics;
  events?: EventPublisher;
  connector?: Connector;
}

export class Manager {
  readonly queue: WorkQueue;
  readonly refresher: HealthRefresher;
  readonly reconciler: ClusterReconciler;
  readonly metrics: OperatorMetrics;
  readonly events: EventPublisher;

  private resyncTimer: NodeJS.Timeout | null = null;
  private started = false;

  constructor(
    private readonly config: Config,
    private readonly deps: ManagerDeps,
  ) {
    const { platform } = deps;
    this.metrics = deps.metrics ?? new OperatorMetrics();
    this.events = deps.events ?? new EventPublisher(platform, { postgresUrl: config.postgresUrl });

    const breakers = new BreakerRegistry({
      maxFailures: config.breakerMaxFailures,
      resetTimeoutMs: config.breakerResetSeconds * 1000,
      halfOpenMaxCalls: config.breakerHalfOpenMaxCalls,
    });
    const updater = new StatusUpdater(platform, {
      maxAttempts: config.statusRetryAttempts,
      onConflict: key => this.metrics.recordConflict(key),
    });
    const debouncer = new ConfigDebouncer(config.configDebounceSeconds * 1000);

    this.refresher = new HealthRefresher(
      key => this.reconciler.refreshHealth(parseKey(key)),
      config.healthRefreshSeconds * 1000,
    );

    this.reconciler = new ClusterReconciler({
      platform,
      updater,
      engine: new ConvergenceEngine(platform, debouncer),
      debouncer,
      clients: new ClientFactory(platform, breakers, {
        connectTimeoutMs: config.connectTimeoutSeconds * 1000,
        queryTimeoutMs: config.diagnosticsTimeoutSeconds * 1000,
        connector: deps.connector,
      }),
      breakers,
      diagnostics: new DiagnosticsCollector(updater, this.metrics, {
        timeoutMs: config.diagnosticsTimeoutSeconds * 1000,
      }),
      repairs: new RepairOrchestrator(platform, {
        cooldownMinutes: config.restartCooldownMinutes,
        maxPerHour: config.maxRestartsPerHour,
      }),
      metrics: this.metrics,
      events: this.events,
      refresher: this.refresher,
      config,
    });

    this.queue = new WorkQueue(
      key => this.reconciler.reconcile(parseKey(key)),
      { concurrency: config.maxConcurrentReconciles },
    );
  }

  /** True once the first listing has been queued */
  get ready(): boolean {
    return this.started;
  }

  /** Queue every existing cluster; returns how many were found */
  async resync(): Promise<number> {
    const keys = await this.deps.platform.listClusterKeys();
    for (const key of keys) this.queue.add(keyString(key));
    return keys.length;
  }

  /** One pass over every cluster, then stop */
  async runOnce(): Promise<void> {
    const count = await this.resync();
    log(`[Manager] Reconciling ${count} cluster(s) once`);
    this.started = true;
    await this.queue.drain();
    await this.stop();
  }

  /** Start watching and resyncing until stop() */
  async start(): Promise<void> {
    if (this.deps.watcher) {
      await this.deps.watcher.start(key => this.queue.add(keyString(key)));
    }
    const count = await this.resync();
    log(`[Manager] Started with ${count} cluster(s)`);
    this.started = true;

    if (this.config.resyncSeconds > 0) {
      this.resyncTimer = setInterval(() => {
        this.resync().catch(err => log(`[Manager] Resync failed: ${errorText(err)}`));
      }, this.config.resyncSeconds * 1000);
    }
  }

  async stop(): Promise<void> {
    log('[Manager] Stopping');
    this.started = false;
    if (this.resyncTimer) {
      clearInterval(this.resyncTimer);
      this.resyncTimer = null;
    }
    this.deps.watcher?.stop();
    this.refresher.stopAll();
    await this.queue.shutdown();
  }
}
