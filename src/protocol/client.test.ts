import { describe, it, expect, vi, afterEach } from 'vitest';
import { newError } from 'neo4j-driver-core';
import { GraphClient, SHOW_DATABASES, SHOW_SERVERS, VERIFY_CONNECTIVITY, mapDriverError, withDeadline, type QueryRunner, type Row, type RunOptions } from './client.js';
import { CircuitBreaker } from './circuit-breaker.js';
import { AuthError, CircuitOpenError, ConnectionError, QueryError, TimeoutError } from '../errors.js';

// ---------------------------------------------------------------------------
// Fake runner
// ---------------------------------------------------------------------------

class FakeRunner implements QueryRunner {
  calls: Array<{ statement: string; options: RunOptions }> = [];
  results = new Map<string, Row[]>();
  failWith: unknown = null;
  closed = false;

  async run(statement: string, options: RunOptions): Promise<Row[]> {
    this.calls.push({ statement, options });
    if (this.failWith) throw this.failWith;
    return this.results.get(statement) ?? [];
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

afterEach(() => {
  vi.useRealTimers();
});

// ---------------------------------------------------------------------------
// Error mapping
// ---------------------------------------------------------------------------

describe('mapDriverError', () => {
  it('maps security codes to AuthError', () => {
    const err = mapDriverError(newError('bad credentials', 'Neo.ClientError.Security.Unauthorized'));
    expect(err).toBeInstanceOf(AuthError);
    expect(err.message).toBe('bad credentials');
  });

  it('maps an unavailable service to ConnectionError', () => {
    expect(mapDriverError(newError('no route', 'ServiceUnavailable'))).toBeInstanceOf(ConnectionError);
    expect(mapDriverError(newError('gone', 'SessionExpired'))).toBeInstanceOf(ConnectionError);
  });

  it('maps a server-side timeout to TimeoutError', () => {
    const err = mapDriverError(newError('too slow', 'Neo.ClientError.Transaction.TransactionTimedOut'));
    expect(err).toBeInstanceOf(TimeoutError);
  });

  it('keeps the code of any other server error', () => {
    const err = mapDriverError(newError('Invalid input', 'Neo.ClientError.Statement.SyntaxError'));
    expect(err).toBeInstanceOf(QueryError);
    expect(err.message).toBe('Neo.ClientError.Statement.SyntaxError: Invalid input');
  });

  it('treats non-driver errors as connection failures', () => {
    const err = mapDriverError(new Error('ECONNREFUSED'));
    expect(err).toBeInstanceOf(ConnectionError);
    expect(err.message).toBe('ECONNREFUSED');
  });
});

describe('withDeadline', () => {
  it('rejects with TimeoutError when the work outlives the deadline', async () => {
    vi.useFakeTimers();
    const never = new Promise<string>(() => undefined);
    const raced = withDeadline(never, 500, 'query');
    const check = expect(raced).rejects.toThrow('query timed out after 500ms');
    await vi.advanceTimersByTimeAsync(500);
    await check;
  });

  it('passes the result through', async () => {
    await expect(withDeadline(Promise.resolve(7), 500, 'query')).resolves.toBe(7);
  });
});

// ---------------------------------------------------------------------------
// GraphClient
// ---------------------------------------------------------------------------

describe('GraphClient', () => {
  it('lists servers from the system database', async () => {
    const runner = new FakeRunner();
    runner.results.set(SHOW_SERVERS, [
      { name: 'a1', address: 'graph-server-0.graph-headless:7687', state: 'Enabled', health: 'Available', hosting: ['neo4j', 'system'] },
      { name: 'b2', address: 'graph-server-1.graph-headless:7687', state: 'Cordoned', health: null, hosting: null },
    ]);
    const client = new GraphClient(runner, new CircuitBreaker('db/graph'), { queryTimeoutMs: 2_000 });

    const servers = await client.listServers();

    expect(servers).toEqual([
      { name: 'a1', address: 'graph-server-0.graph-headless:7687', state: 'Enabled', health: 'Available', hostingCount: 2 },
      { name: 'b2', address: 'graph-server-1.graph-headless:7687', state: 'Cordoned', health: '', hostingCount: 0 },
    ]);
    expect(runner.calls[0].options).toEqual({ database: 'system', timeoutMs: 2_000 });
  });

  it('lists databases', async () => {
    const runner = new FakeRunner();
    runner.results.set(SHOW_DATABASES, [
      { name: 'neo4j', currentStatus: 'online', requestedStatus: 'online', role: 'primary', default: true, home: true },
      { name: 'system', currentStatus: 'online', requestedStatus: 'online', role: 'primary', default: false, home: false },
    ]);
    const client = new GraphClient(runner, new CircuitBreaker('db/graph'));

    const databases = await client.listDatabases(3_000);

    expect(databases[0]).toEqual({ name: 'neo4j', status: 'online', requestedStatus: 'online', role: 'primary', isDefault: true });
    expect(databases[1].isDefault).toBe(false);
    expect(runner.calls[0].options.timeoutMs).toBe(3_000);
  });

  it('rejects a malformed row with QueryError', async () => {
    const runner = new FakeRunner();
    runner.results.set(SHOW_SERVERS, [{ address: 'x:7687' }]);
    const client = new GraphClient(runner, new CircuitBreaker('db/graph'));

    await expect(client.listServers()).rejects.toBeInstanceOf(QueryError);
  });

  it('verifies connectivity with a read against the system database', async () => {
    const runner = new FakeRunner();
    const client = new GraphClient(runner, new CircuitBreaker('db/graph'));

    await client.verifyConnectivity(1_500);

    expect(runner.calls).toEqual([{ statement: VERIFY_CONNECTIVITY, options: { database: 'system', timeoutMs: 1_500 } }]);
  });

  it('maps driver failures and trips the breaker', async () => {
    const runner = new FakeRunner();
    runner.failWith = newError('no route', 'ServiceUnavailable');
    const breaker = new CircuitBreaker('db/graph', { maxFailures: 2 });
    const client = new GraphClient(runner, breaker);

    await expect(client.listServers()).rejects.toBeInstanceOf(ConnectionError);
    await expect(client.listServers()).rejects.toBeInstanceOf(ConnectionError);
    await expect(client.listServers()).rejects.toBeInstanceOf(CircuitOpenError);
    expect(runner.calls).toHaveLength(2);
  });

  it('closes the runner', async () => {
    const runner = new FakeRunner();
    await new GraphClient(runner, new CircuitBreaker('db/graph')).close();
    expect(runner.closed).toBe(true);
  });
});
