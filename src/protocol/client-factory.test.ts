import { describe, it, expect } from 'vitest';
import { ClientFactory, parseCredentials } from './client-factory.js';
import { BreakerRegistry } from './circuit-breaker.js';
import { AuthError, ConnectionError } from '../errors.js';
import { SHOW_SERVERS, VERIFY_CONNECTIVITY } from './client.js';
import { FakePlatform, makeCluster } from '../testing/fake-platform.js';
import { FakeGraph, serverRow } from '../testing/fake-graph.js';

describe('parseCredentials', () => {
  it('reads NEO4J_AUTH as user/password', () => {
    expect(parseCredentials({ NEO4J_AUTH: 'neo4j/test-secret' }, 'admin')).toEqual({ username: 'neo4j', password: 'test-secret' });
  });

  it('keeps slashes in the password', () => {
    expect(parseCredentials({ NEO4J_AUTH: 'admin/a/b' }, 'admin')).toEqual({ username: 'admin', password: 'a/b' });
  });

  it('prefers NEO4J_AUTH over separate keys', () => {
    const creds = parseCredentials({ NEO4J_AUTH: 'neo4j/test-secret', username: 'other', password: 'other-secret' }, 'admin');
    expect(creds.username).toBe('neo4j');
  });

  it('falls back to username/password, defaulting the user', () => {
    expect(parseCredentials({ password: 'test-secret' }, 'admin')).toEqual({ username: 'neo4j', password: 'test-secret' });
    expect(parseCredentials({ username: 'ops', password: 'test-secret' }, 'admin')).toEqual({ username: 'ops', password: 'test-secret' });
  });

  it('rejects a missing secret or unusable data', () => {
    expect(() => parseCredentials(null, 'admin')).toThrow('admin secret admin not found');
    expect(() => parseCredentials({ NEO4J_AUTH: 'none' }, 'admin')).toThrow(AuthError);
    expect(() => parseCredentials({ username: 'neo4j' }, 'admin')).toThrow('admin secret admin has neither NEO4J_AUTH nor password');
  });
});

describe('ClientFactory', () => {
  function setup() {
    const platform = new FakePlatform();
    platform.secrets.set('db/neo4j-admin-secret', { NEO4J_AUTH: 'neo4j/test-secret' });
    const graph = new FakeGraph();
    const breakers = new BreakerRegistry();
    const factory = new ClientFactory(platform, breakers, {
      connectTimeoutMs: 1_000,
      queryTimeoutMs: 2_000,
      connector: graph.connector,
    });
    return { platform, graph, breakers, factory };
  }

  it('connects to the client service with the admin credentials', async () => {
    const { graph, factory } = setup();
    const uri = 'bolt://graph-client.db.svc.cluster.local:7687';
    graph.set(uri, { servers: [serverRow('graph-server-0')] });

    const client = await factory.forCluster(makeCluster());
    const servers = await client.listServers();

    expect(servers).toHaveLength(1);
    expect(graph.connections).toEqual([{ uri, credentials: { username: 'neo4j', password: 'test-secret' } }]);
    expect(graph.statements.map(s => [s.statement, s.options.timeoutMs])).toEqual([
      [VERIFY_CONNECTIVITY, 1_000],
      [SHOW_SERVERS, 2_000],
    ]);
  });

  it('closes a client whose connectivity check fails', async () => {
    const { graph, breakers, factory } = setup();

    await expect(factory.forCluster(makeCluster())).rejects.toBeInstanceOf(ConnectionError);

    expect(graph.connections).toHaveLength(1);
    expect(graph.closed).toBe(1);
    expect(breakers.get('db/graph').failureCount).toBe(1);
  });

  it('pins member clients to the headless address with their own breaker', async () => {
    const { graph, breakers, factory } = setup();
    const cluster = makeCluster();
    graph.set('bolt://graph-client.db.svc.cluster.local:7687', {});
    graph.set('bolt://graph-server-1.graph-headless.db.svc.cluster.local:7687', {});

    await factory.forCluster(cluster);
    await factory.forMember(cluster, 'graph-server-1');

    expect(graph.connections[1].uri).toBe('bolt://graph-server-1.graph-headless.db.svc.cluster.local:7687');
    expect(breakers.size).toBe(2);
  });

  it('fails with AuthError when the admin secret is missing', async () => {
    const { platform, factory } = setup();
    platform.secrets.clear();
    await expect(factory.forCluster(makeCluster())).rejects.toBeInstanceOf(AuthError);
  });
});
