/**
 * Reconciler configuration.
 *
 * All values can be overridden via environment variables.
 */

export interface Config {
  /** Namespace to watch; empty watches every namespace */
  watchNamespace: string;

  /** Upper bound on servers (primaries + secondaries) per cluster */
  maxClusterServers: number;

  /** Work queue */
  maxConcurrentReconciles: number;
  resyncSeconds: number;

  /** Quiet window before a changed ConfigMap is applied */
  configDebounceSeconds: number;

  /** Status writes */
  statusRetryAttempts: number;

  /** Protocol deadlines */
  diagnosticsTimeoutSeconds: number;
  memberQueryTimeoutSeconds: number;
  connectTimeoutSeconds: number;

  /** Periodic checks while a cluster is Ready */
  healthRefreshSeconds: number;
  splitBrainIntervalSeconds: number;

  /** Split-brain repair limits */
  restartCooldownMinutes: number;
  maxRestartsPerHour: number;

  /** Circuit breaker */
  breakerMaxFailures: number;
  breakerResetSeconds: number;
  breakerHalfOpenMaxCalls: number;

  /** Optional Postgres mirror of operator events */
  postgresUrl?: string;

  /** HTTP port for /metrics, /healthz and /readyz (0 disables) */
  metricsPort: number;

  /** Run mode */
  daemon: boolean;
  once: boolean;
}

export function loadConfig(): Config {
  return {
    watchNamespace: process.env.WATCH_NAMESPACE ?? '',

    maxClusterServers: int(process.env.MAX_CLUSTER_SERVERS, 27),

    maxConcurrentReconciles: int(process.env.MAX_CONCURRENT_RECONCILES, 4),
    resyncSeconds: int(process.env.RESYNC_SECONDS, 30),

    configDebounceSeconds: int(process.env.CONFIG_DEBOUNCE_SECONDS, 120),

    statusRetryAttempts: int(process.env.STATUS_RETRY_ATTEMPTS, 5),

    diagnosticsTimeoutSeconds: int(process.env.DIAGNOSTICS_TIMEOUT_SECONDS, 10),
    memberQueryTimeoutSeconds: int(process.env.MEMBER_QUERY_TIMEOUT_SECONDS, 10),
    connectTimeoutSeconds: int(process.env.CONNECT_TIMEOUT_SECONDS, 10),

    healthRefreshSeconds: int(process.env.HEALTH_REFRESH_SECONDS, 60),
    splitBrainIntervalSeconds: int(process.env.SPLIT_BRAIN_INTERVAL_SECONDS, 300),

    restartCooldownMinutes: int(process.env.RESTART_COOLDOWN_MINUTES, 10),
    maxRestartsPerHour: int(process.env.MAX_RESTARTS_PER_HOUR, 6),

    breakerMaxFailures: int(process.env.BREAKER_MAX_FAILURES, 5),
    breakerResetSeconds: int(process.env.BREAKER_RESET_SECONDS, 30),
    breakerHalfOpenMaxCalls: int(process.env.BREAKER_HALF_OPEN_MAX_CALLS, 3),

    postgresUrl: process.env.POSTGRES_URL,  // e.g., postgres://operator@localhost:5432/audit

    metricsPort: int(process.env.METRICS_PORT, 8080),

    daemon: process.argv.includes('--daemon'),
    once: process.argv.includes('--once'),
  };
}

function int(val: string | undefined, fallback: number): number {
  if (!val) return fallback;
  const parsed = parseInt(val, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}
