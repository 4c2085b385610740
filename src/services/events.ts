/**
 * Event Publisher
 *
 * Records operator events as Kubernetes Events on the cluster resource and,
 * when POSTGRES_URL is set, mirrors them into the operator_events table for
 * audit.
 *
 * Publishing never throws: a lost event must not fail a reconcile.
 */

import pg from 'pg';
import type { ClusterPlatform } from '../platform/platform.js';
import { keyOf, keyString, type ClusterEvent, type ClusterHeader } from '../types.js';
import { errorText } from '../errors.js';
import { log } from '../logger.js';

const { Pool } = pg;

/** The slice of pg.Pool the publisher uses */
export interface EventPool {
  query(text: string, values: unknown[]): Promise<unknown>;
  end(): Promise<void>;
}

export interface EventPublisherOptions {
  postgresUrl?: string;
  /** Overrides the pool built from postgresUrl */
  pool?: EventPool;
}

export class EventPublisher {
  private pool: EventPool | null = null;
  private postgresAvailable = true;

  constructor(
    private readonly platform: Pick<ClusterPlatform, 'recordEvent'>,
    options: EventPublisherOptions = {},
  ) {
    this.initPostgres(options);
  }

  private initPostgres(options: EventPublisherOptions): void {
    if (options.pool) {
      this.pool = options.pool;
      return;
    }
    if (!options.postgresUrl) {
      log('[Events] No Postgres URL configured, audit mirror disabled');
      this.postgresAvailable = false;
      return;
    }

    const pool = new Pool({
      connectionString: options.postgresUrl,
      max: 5,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 5000,
    });
    pool.on('error', (err) => {
      log(`[Events] Postgres pool error: ${err.message}`);
      this.postgresAvailable = false;
    });
    this.pool = pool;
  }

  async publish(cluster: ClusterHeader, event: ClusterEvent): Promise<void> {
    const name = keyString(keyOf(cluster));
    log(`[Events] ${name} ${event.type} ${event.reason}: ${event.message}`);

    try {
      await this.platform.recordEvent(cluster, event);
    } catch (err) {
      log(`[Events] Failed to record ${event.reason} on ${name}: ${errorText(err)}`);
    }

    await this.mirror(cluster, event);
  }

  private async mirror(cluster: ClusterHeader, event: ClusterEvent): Promise<void> {
    if (!this.pool || !this.postgresAvailable) return;

    try {
      await this.pool.query(
        `INSERT INTO operator_events
         (namespace, cluster_name, cluster_uid, event_type, reason, message, generation)
         VALUES ($1, $2, $3, $4, $5, $6, $7)`,
        [
          cluster.metadata.namespace,
          cluster.metadata.name,
          cluster.metadata.uid,
          event.type,
          event.reason,
          event.message,
          cluster.metadata.generation,
        ],
      );
    } catch (err) {
      // Check for table not exists error
      if (err instanceof Error && err.message.includes('does not exist')) {
        log('[Events] operator_events table does not exist, audit mirror disabled');
        this.postgresAvailable = false;
      } else {
        log(`[Events] Failed to mirror event: ${errorText(err)}`);
      }
    }
  }

  async close(): Promise<void> {
    if (this.pool) {
      await this.pool.end();
      this.pool = null;
    }
  }
}
