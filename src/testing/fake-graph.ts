/**
 * In-memory stand-in for Neo4j servers, addressed by Bolt URI.
 *
 * `connector` plugs into ClientFactory; every runner it hands out answers
 * SHOW SERVERS / SHOW DATABASES from the endpoint registered for its URI.
 */

import type { Connector, Credentials, QueryRunner, Row, RunOptions } from '../protocol/client.js';
import { SHOW_DATABASES, SHOW_SERVERS } from '../protocol/client.js';

export interface FakeEndpoint {
  servers?: Row[];
  databases?: Row[];
  /** Thrown by every call to this endpoint */
  fail?: unknown;
  /** Thrown by SHOW DATABASES only */
  failDatabases?: unknown;
}

export interface Connection {
  uri: string;
  credentials: Credentials;
}

export class FakeGraph {
  readonly endpoints = new Map<string, FakeEndpoint>();
  readonly connections: Connection[] = [];
  readonly statements: Array<{ uri: string; statement: string; options: RunOptions }> = [];
  closed = 0;

  set(uri: string, endpoint: FakeEndpoint): void {
    this.endpoints.set(uri, endpoint);
  }

  readonly connector: Connector = (uri, credentials) => {
    this.connections.push({ uri, credentials });
    return new FakeRunner(this, uri);
  };

  endpoint(uri: string): FakeEndpoint {
    const endpoint = this.endpoints.get(uri);
    if (!endpoint) throw new Error(`connect ECONNREFUSED ${uri}`);
    return endpoint;
  }
}

class FakeRunner implements QueryRunner {
  constructor(private readonly graph: FakeGraph, private readonly uri: string) {}

  async run(statement: string, options: RunOptions): Promise<Row[]> {
    this.graph.statements.push({ uri: this.uri, statement, options });
    const endpoint = this.graph.endpoint(this.uri);
    if (endpoint.fail) throw endpoint.fail;
    if (statement === SHOW_SERVERS) return endpoint.servers ?? [];
    if (statement === SHOW_DATABASES) {
      if (endpoint.failDatabases) throw endpoint.failDatabases;
      return endpoint.databases ?? [];
    }
    return [];
  }

  async close(): Promise<void> {
    this.graph.closed += 1;
  }
}

/** A SHOW SERVERS row for pod `pod` of cluster `cluster` */
export function serverRow(
  pod: string,
  cluster = 'graph',
  overrides: Partial<{ name: string; state: string; health: string; hosting: string[] }> = {},
): Row {
  return {
    name: overrides.name ?? `id-${pod}`,
    address: `${pod}.${cluster}-headless.db.svc.cluster.local:7687`,
    state: overrides.state ?? 'Enabled',
    health: overrides.health ?? 'Available',
    hosting: overrides.hosting ?? ['neo4j', 'system'],
  };
}

export function databaseRow(name: string, currentStatus = 'online', requestedStatus = 'online'): Row {
  return { name, currentStatus, requestedStatus, role: 'primary', default: name === 'neo4j', home: name === 'neo4j' };
}
