/**
 * Database protocol client.
 *
 * GraphClient wraps a QueryRunner (neo4j-driver over Bolt in production, a
 * fake in tests) with the cluster's circuit breaker and a deadline on every
 * call. Driver failures are mapped onto the protocol error classes.
 */

import { auth, driver as createDriver, session as accessMode, Neo4jError, type Driver } from 'neo4j-driver';
import { z } from 'zod';
import type { DatabaseDiagnostic, ServerDiagnostic } from '../types.js';
import type { CircuitBreaker } from './circuit-breaker.js';
import {
  AuthError,
  ConnectionError,
  ExternalProtocolError,
  QueryError,
  TimeoutError,
  errorText,
} from '../errors.js';

export type Row = Record<string, unknown>;

export interface Credentials {
  username: string;
  password: string;
}

export interface RunOptions {
  database: string;
  timeoutMs: number;
}

/** Minimal transport the client needs */
export interface QueryRunner {
  run(statement: string, options: RunOptions): Promise<Row[]>;
  close(): Promise<void>;
}

export const SHOW_SERVERS = 'SHOW SERVERS YIELD name, address, state, health, hosting RETURN name, address, state, health, hosting';
export const SHOW_DATABASES =
  'SHOW DATABASES YIELD name, currentStatus, default, home, role, requestedStatus RETURN name, currentStatus, default, home, role, requestedStatus';

export const VERIFY_CONNECTIVITY = 'CALL dbms.components() YIELD name, versions RETURN name, versions[0] AS version LIMIT 1';

const DEFAULT_QUERY_TIMEOUT_MS = 10_000;

// ---------------------------------------------------------------------------
// Error mapping
// ---------------------------------------------------------------------------

const CONNECTION_CODES = new Set(['ServiceUnavailable', 'SessionExpired']);

export function mapDriverError(err: unknown): ExternalProtocolError {
  if (err instanceof ExternalProtocolError) return err;
  if (err instanceof Neo4jError) {
    const code = err.code;
    if (code.startsWith('Neo.ClientError.Security.')) return new AuthError(err.message, { cause: err });
    if (CONNECTION_CODES.has(code)) return new ConnectionError(err.message, { cause: err });
    if (code.includes('TransactionTimedOut')) return new TimeoutError(err.message, { cause: err });
    return new QueryError(`${code}: ${err.message}`, { cause: err });
  }
  return new ConnectionError(errorText(err), { cause: err });
}

/** Reject with TimeoutError if `work` has not settled within `ms`. */
export function withDeadline<T>(work: Promise<T>, ms: number, what: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(`${what} timed out after ${ms}ms`)), ms);
  });
  return Promise.race([work, deadline]).finally(() => clearTimeout(timer));
}

// ---------------------------------------------------------------------------
// Bolt transport
// ---------------------------------------------------------------------------

class BoltRunner implements QueryRunner {
  constructor(private readonly driver: Driver) {}

  async run(statement: string, options: RunOptions): Promise<Row[]> {
    const session = this.driver.session({ database: options.database, defaultAccessMode: accessMode.READ });
    try {
      const result = await session.run(statement, {}, { timeout: options.timeoutMs });
      return result.records.map(record => record.toObject());
    } finally {
      await session.close();
    }
  }

  async close(): Promise<void> {
    await this.driver.close();
  }
}

export interface BoltOptions {
  connectTimeoutMs: number;
}

export type Connector = (uri: string, credentials: Credentials, options: BoltOptions) => QueryRunner;

export const connectBolt: Connector = (uri, credentials, options) => {
  const driver = createDriver(uri, auth.basic(credentials.username, credentials.password), {
    connectionTimeout: options.connectTimeoutMs,
    connectionAcquisitionTimeout: options.connectTimeoutMs,
    maxConnectionPoolSize: 4,
    disableLosslessIntegers: true,
  });
  return new BoltRunner(driver);
};

// ---------------------------------------------------------------------------
// Row parsing
// ---------------------------------------------------------------------------

const text = z.string().nullish().transform(v => v ?? '');

const serverRowSchema = z.object({
  name: z.string(),
  address: text,
  state: text,
  health: text,
  hosting: z.array(z.unknown()).nullish().transform(v => v ?? []),
});

const databaseRowSchema = z.object({
  name: z.string(),
  currentStatus: text,
  requestedStatus: text,
  role: text,
  default: z.boolean().nullish().transform(v => v ?? false),
});

function parseRows<T>(rows: Row[], schema: z.ZodType<T, z.ZodTypeDef, unknown>, what: string): T[] {
  return rows.map((row, i) => {
    const parsed = schema.safeParse(row);
    if (!parsed.success) {
      throw new QueryError(`unexpected ${what} row ${i}: ${parsed.error.issues.map(issue => issue.message).join(', ')}`);
    }
    return parsed.data;
  });
}

// ---------------------------------------------------------------------------
// Client
// ---------------------------------------------------------------------------

export interface QueryOptions {
  database?: string;
  timeoutMs?: number;
}

export class GraphClient {
  private readonly timeoutMs: number;

  constructor(
    private readonly runner: QueryRunner,
    private readonly breaker: CircuitBreaker,
    options: { queryTimeoutMs?: number } = {},
  ) {
    this.timeoutMs = options.queryTimeoutMs ?? DEFAULT_QUERY_TIMEOUT_MS;
  }

  async query(statement: string, options: QueryOptions = {}): Promise<Row[]> {
    const timeoutMs = options.timeoutMs ?? this.timeoutMs;
    const database = options.database ?? 'system';
    return this.breaker.execute(async () => {
      try {
        return await withDeadline(this.runner.run(statement, { database, timeoutMs }), timeoutMs, 'query');
      } catch (err) {
        throw mapDriverError(err);
      }
    });
  }

  /** Round-trip a trivial read; fails with the mapped error when the server is unreachable */
  async verifyConnectivity(timeoutMs?: number): Promise<void> {
    await this.query(VERIFY_CONNECTIVITY, { timeoutMs });
  }

  async listServers(timeoutMs?: number): Promise<ServerDiagnostic[]> {
    const rows = await this.query(SHOW_SERVERS, { timeoutMs });
    return parseRows(rows, serverRowSchema, 'SHOW SERVERS').map(r => ({
      name: r.name,
      address: r.address,
      state: r.state,
      health: r.health,
      hostingCount: r.hosting.length,
    }));
  }

  async listDatabases(timeoutMs?: number): Promise<DatabaseDiagnostic[]> {
    const rows = await this.query(SHOW_DATABASES, { timeoutMs });
    return parseRows(rows, databaseRowSchema, 'SHOW DATABASES').map(r => ({
      name: r.name,
      status: r.currentStatus,
      requestedStatus: r.requestedStatus,
      role: r.role,
      isDefault: r.default,
    }));
  }

  async close(): Promise<void> {
    await this.runner.close();
  }
}
