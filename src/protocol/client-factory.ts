/**
 * Builds GraphClients for a cluster's client service or a single member.
 *
 * Credentials come from the admin Secret named in spec.auth.adminSecret. A
 * client is opened per operation, verified before it is handed out, and closed
 * by the caller; the breaker it carries outlives it (one per cluster, one per
 * member for direct queries).
 */

import type { ClusterPlatform } from '../platform/platform.js';
import { keyOf, keyString, type ClusterResource } from '../types.js';
import { clientBoltUri, memberBoltUri } from '../resources/labels.js';
import { AuthError } from '../errors.js';
import type { BreakerRegistry } from './circuit-breaker.js';
import { GraphClient, connectBolt, type Connector, type Credentials } from './client.js';

const DEFAULT_USERNAME = 'neo4j';

/**
 * Reads credentials from Secret data. `NEO4J_AUTH` ("user/password", the
 * format the server image takes) wins over separate username/password keys.
 */
export function parseCredentials(data: Record<string, string> | null, secretName: string): Credentials {
  if (!data) throw new AuthError(`admin secret ${secretName} not found`);

  const combined = data.NEO4J_AUTH;
  if (combined) {
    const slash = combined.indexOf('/');
    if (slash <= 0 || slash === combined.length - 1) {
      throw new AuthError(`admin secret ${secretName}: NEO4J_AUTH must be "user/password"`);
    }
    return { username: combined.slice(0, slash), password: combined.slice(slash + 1) };
  }

  if (data.password) {
    return { username: data.username || DEFAULT_USERNAME, password: data.password };
  }

  throw new AuthError(`admin secret ${secretName} has neither NEO4J_AUTH nor password`);
}

export interface ClientFactoryOptions {
  connectTimeoutMs: number;
  queryTimeoutMs: number;
  connector?: Connector;
}

export class ClientFactory {
  private readonly connect: Connector;

  constructor(
    private readonly secrets: Pick<ClusterPlatform, 'readSecret'>,
    private readonly breakers: BreakerRegistry,
    private readonly options: ClientFactoryOptions,
  ) {
    this.connect = options.connector ?? connectBolt;
  }

  private async credentials(cluster: ClusterResource): Promise<Credentials> {
    const name = cluster.spec.auth.adminSecret;
    const data = await this.secrets.readSecret(cluster.metadata.namespace, name);
    return parseCredentials(data, name);
  }

  /** Client through the load-balanced client service */
  async forCluster(cluster: ClusterResource): Promise<GraphClient> {
    const { name, namespace } = cluster.metadata;
    return this.open(cluster, clientBoltUri(name, namespace), keyString(keyOf(cluster)));
  }

  /** Client pinned to one member pod through the headless service */
  async forMember(cluster: ClusterResource, pod: string): Promise<GraphClient> {
    const { name, namespace } = cluster.metadata;
    return this.open(cluster, memberBoltUri(pod, name, namespace), `${keyString(keyOf(cluster))}/${pod}`);
  }

  private async open(cluster: ClusterResource, uri: string, breakerKey: string): Promise<GraphClient> {
    const credentials = await this.credentials(cluster);
    const runner = this.connect(uri, credentials, { connectTimeoutMs: this.options.connectTimeoutMs });
    const client = new GraphClient(runner, this.breakers.get(breakerKey), {
      queryTimeoutMs: this.options.queryTimeoutMs,
    });
    try {
      await client.verifyConnectivity(this.options.connectTimeoutMs);
    } catch (err) {
      await client.close();
      throw err;
    }
    return client;
  }
}
