/**
 * Desired child objects for a cluster.
 *
 * Every builder is a pure function of the cluster's identity and spec: no
 * clocks, no random values, map keys emitted in sorted order. The convergence
 * engine hashes the output, so identical input must give identical bytes.
 */

import type {
  V1ConfigMap,
  V1EnvVar,
  V1ObjectMeta,
  V1OwnerReference,
  V1Service,
  V1StatefulSet,
} from '@kubernetes/client-node';
import type { ClusterResource, ChildObject } from '../types.js';
import { desiredServerCount } from '../validation/topology.js';
import {
  ANNOTATION_PRIMARIES,
  BOLT_PORT,
  HTTPS_PORT,
  HTTP_PORT,
  LABEL_CLUSTER,
  LABEL_CLUSTERING,
  MANAGER_NAME,
  clientServiceName,
  configMapName,
  headlessServiceName,
  serverStatefulSetName,
} from './labels.js';

/** The parts of the cluster resource the builders may read */
export type BuildInput = Pick<ClusterResource, 'apiVersion' | 'kind' | 'metadata' | 'spec'>;

const CLUSTER_PORT = 5000;
const DISCOVERY_PORT = 6000;
const ROUTING_PORT = 7688;
const RAFT_PORT = 7000;
const CONFIG_DIR = '/config';

function baseLabels(input: BuildInput): Record<string, string> {
  return {
    'app.kubernetes.io/instance': input.metadata.name,
    'app.kubernetes.io/managed-by': MANAGER_NAME,
    'app.kubernetes.io/name': 'neo4j',
    [LABEL_CLUSTER]: input.metadata.name,
  };
}

function ownerReference(input: BuildInput): V1OwnerReference {
  return {
    apiVersion: input.apiVersion,
    kind: input.kind,
    name: input.metadata.name,
    uid: input.metadata.uid,
    controller: true,
    blockOwnerDeletion: true,
  };
}

function objectMeta(input: BuildInput, name: string, component: string): V1ObjectMeta {
  return {
    name,
    namespace: input.metadata.namespace,
    labels: { ...baseLabels(input), 'app.kubernetes.io/component': component },
    ownerReferences: [ownerReference(input)],
  };
}

function podFqdnSuffix(input: BuildInput): string {
  return `${headlessServiceName(input.metadata.name)}.${input.metadata.namespace}.svc.cluster.local`;
}

// ---------------------------------------------------------------------------
// neo4j.conf
// ---------------------------------------------------------------------------

function discoverySettings(input: BuildInput): string[] {
  const selector = `${LABEL_CLUSTER}=${input.metadata.name},${LABEL_CLUSTERING}=true`;
  const lines = [
    'dbms.cluster.discovery.resolver_type=K8S',
    `dbms.kubernetes.label_selector=${selector}`,
    'dbms.kubernetes.cluster_domain=cluster.local',
  ];
  // Calendar-versioned releases dropped the v2 prefix and made V2_ONLY the default
  if (/^20\d\d\./.test(input.spec.image.tag)) {
    lines.push('dbms.kubernetes.discovery.service_port_name=tcp-discovery');
  } else {
    lines.push('dbms.kubernetes.discovery.v2.service_port_name=tcp-discovery');
    lines.push('dbms.cluster.discovery.version=V2_ONLY');
  }
  return lines;
}

/**
 * Bootstrap parameters. A single-primary cluster forms its system database
 * alone; adding primaries later requires every member to restart with these.
 */
function bootstrapSettings(input: BuildInput): string[] {
  const { primaries } = input.spec.topology;
  const secondaries = Math.max(desiredServerCount(input.spec.topology) - primaries, 0);
  return [
    `dbms.cluster.minimum_initial_system_primaries_count=${primaries}`,
    `initial.dbms.default_primaries_count=${primaries}`,
    `initial.dbms.default_secondaries_count=${secondaries}`,
  ];
}

function tlsSettings(): string[] {
  const lines = [
    'server.https.enabled=true',
    `server.https.listen_address=0.0.0.0:${HTTPS_PORT}`,
    'server.bolt.tls_level=OPTIONAL',
  ];
  for (const scope of ['bolt', 'https', 'cluster']) {
    lines.push(
      `dbms.ssl.policy.${scope}.enabled=true`,
      `dbms.ssl.policy.${scope}.base_directory=/ssl`,
      `dbms.ssl.policy.${scope}.private_key=tls.key`,
      `dbms.ssl.policy.${scope}.public_certificate=tls.crt`,
      `dbms.ssl.policy.${scope}.client_auth=NONE`,
      `dbms.ssl.policy.${scope}.tls_versions=TLSv1.3,TLSv1.2`,
    );
  }
  return lines;
}

function queryMonitoringSettings(threshold: string): string[] {
  return [
    'db.logs.query.enabled=INFO',
    `db.logs.query.threshold=${threshold}`,
    'db.logs.query.parameter_logging_enabled=true',
    'db.track_query_cpu_time=true',
  ];
}

export function buildNeo4jConf(input: BuildInput): string {
  const { spec } = input;
  const sections: string[][] = [
    [
      'server.default_listen_address=0.0.0.0',
      `server.bolt.listen_address=0.0.0.0:${BOLT_PORT}`,
      `server.http.listen_address=0.0.0.0:${HTTP_PORT}`,
      `server.cluster.listen_address=0.0.0.0:${CLUSTER_PORT}`,
      `server.routing.listen_address=0.0.0.0:${ROUTING_PORT}`,
      `server.cluster.raft.listen_address=0.0.0.0:${RAFT_PORT}`,
      'server.directories.data=/data',
      'server.directories.logs=/logs',
      'server.config.strict_validation.enabled=false',
      'db.format=block',
    ],
    discoverySettings(input),
    bootstrapSettings(input),
  ];

  if (spec.tls.mode === 'cert-manager') sections.push(tlsSettings());
  if (spec.queryMonitoring.enabled) sections.push(queryMonitoringSettings(spec.queryMonitoring.threshold));

  const userKeys = Object.keys(spec.config).sort();
  if (userKeys.length > 0) sections.push(userKeys.map(k => `${k}=${spec.config[k]}`));

  return sections.map(lines => lines.join('\n')).join('\n\n') + '\n';
}

export function buildConfigMap(input: BuildInput): V1ConfigMap {
  return {
    apiVersion: 'v1',
    kind: 'ConfigMap',
    metadata: objectMeta(input, configMapName(input.metadata.name), 'config'),
    data: { 'neo4j.conf': buildNeo4jConf(input) },
  };
}

// ---------------------------------------------------------------------------
// Services
// ---------------------------------------------------------------------------

export function buildHeadlessService(input: BuildInput): V1Service {
  return {
    apiVersion: 'v1',
    kind: 'Service',
    metadata: objectMeta(input, headlessServiceName(input.metadata.name), 'headless'),
    spec: {
      clusterIP: 'None',
      publishNotReadyAddresses: true,
      selector: { [LABEL_CLUSTER]: input.metadata.name, [LABEL_CLUSTERING]: 'true' },
      ports: [
        { name: 'bolt', port: BOLT_PORT, targetPort: BOLT_PORT },
        { name: 'http', port: HTTP_PORT, targetPort: HTTP_PORT },
        { name: 'tcp-discovery', port: CLUSTER_PORT, targetPort: CLUSTER_PORT },
        { name: 'tcp-tx', port: DISCOVERY_PORT, targetPort: DISCOVERY_PORT },
        { name: 'routing', port: ROUTING_PORT, targetPort: ROUTING_PORT },
        { name: 'raft', port: RAFT_PORT, targetPort: RAFT_PORT },
      ],
    },
  };
}

export function buildClientService(input: BuildInput): V1Service {
  const ports = [
    { name: 'bolt', port: BOLT_PORT, targetPort: BOLT_PORT },
    { name: 'http', port: HTTP_PORT, targetPort: HTTP_PORT },
  ];
  if (input.spec.tls.mode === 'cert-manager') {
    ports.push({ name: 'https', port: HTTPS_PORT, targetPort: HTTPS_PORT });
  }
  return {
    apiVersion: 'v1',
    kind: 'Service',
    metadata: objectMeta(input, clientServiceName(input.metadata.name), 'client'),
    spec: {
      type: 'ClusterIP',
      selector: { [LABEL_CLUSTER]: input.metadata.name, [LABEL_CLUSTERING]: 'true' },
      ports,
    },
  };
}

export function buildServices(input: BuildInput): V1Service[] {
  return [buildHeadlessService(input), buildClientService(input)];
}

// ---------------------------------------------------------------------------
// StatefulSet
// ---------------------------------------------------------------------------

function serverEnv(input: BuildInput): V1EnvVar[] {
  return [
    { name: 'POD_NAME', valueFrom: { fieldRef: { fieldPath: 'metadata.name' } } },
    { name: 'NEO4J_ACCEPT_LICENSE_AGREEMENT', value: 'yes' },
    { name: 'NEO4J_CONF', value: CONFIG_DIR },
    { name: 'NEO4J_EDITION', value: 'ENTERPRISE' },
    {
      name: 'NEO4J_AUTH',
      valueFrom: { secretKeyRef: { name: input.spec.auth.adminSecret, key: 'NEO4J_AUTH', optional: true } },
    },
    {
      name: 'NEO4J_server_default__advertised__address',
      value: `$(POD_NAME).${podFqdnSuffix(input)}`,
    },
  ];
}

export function buildStatefulSet(input: BuildInput): V1StatefulSet {
  const { spec, metadata } = input;
  const name = metadata.name;
  const podLabels = { ...baseLabels(input), 'app.kubernetes.io/component': 'server', [LABEL_CLUSTERING]: 'true' };
  const tls = spec.tls.mode === 'cert-manager';

  const meta = objectMeta(input, serverStatefulSetName(name), 'server');
  meta.annotations = { [ANNOTATION_PRIMARIES]: String(spec.topology.primaries) };

  return {
    apiVersion: 'apps/v1',
    kind: 'StatefulSet',
    metadata: meta,
    spec: {
      serviceName: headlessServiceName(name),
      replicas: desiredServerCount(spec.topology),
      podManagementPolicy: 'Parallel',
      persistentVolumeClaimRetentionPolicy: {
        whenDeleted: spec.storage.retentionPolicy,
        whenScaled: 'Retain',
      },
      selector: { matchLabels: { [LABEL_CLUSTER]: name, [LABEL_CLUSTERING]: 'true' } },
      template: {
        metadata: { labels: podLabels },
        spec: {
          terminationGracePeriodSeconds: 120,
          securityContext: { runAsUser: 7474, runAsGroup: 7474, fsGroup: 7474 },
          containers: [{
            name: 'neo4j',
            image: `${spec.image.repo}:${spec.image.tag}`,
            imagePullPolicy: spec.image.pullPolicy,
            env: serverEnv(input),
            ports: [
              { name: 'bolt', containerPort: BOLT_PORT },
              { name: 'http', containerPort: HTTP_PORT },
              ...(tls ? [{ name: 'https', containerPort: HTTPS_PORT }] : []),
              { name: 'tcp-discovery', containerPort: CLUSTER_PORT },
              { name: 'tcp-tx', containerPort: DISCOVERY_PORT },
              { name: 'routing', containerPort: ROUTING_PORT },
              { name: 'raft', containerPort: RAFT_PORT },
            ],
            readinessProbe: {
              tcpSocket: { port: BOLT_PORT },
              initialDelaySeconds: 10,
              periodSeconds: 10,
            },
            volumeMounts: [
              { name: 'data', mountPath: '/data' },
              { name: 'config', mountPath: CONFIG_DIR },
              ...(tls ? [{ name: 'tls', mountPath: '/ssl', readOnly: true }] : []),
            ],
          }],
          volumes: [
            { name: 'config', configMap: { name: configMapName(name) } },
            ...(tls ? [{ name: 'tls', secret: { secretName: spec.tls.secretName ?? `${name}-tls` } }] : []),
          ],
        },
      },
      volumeClaimTemplates: [{
        metadata: { name: 'data' },
        spec: {
          accessModes: ['ReadWriteOnce'],
          storageClassName: spec.storage.className,
          resources: { requests: { storage: spec.storage.size } },
        },
      }],
    },
  };
}

/** All desired children, configuration first so pods start against it */
export function desiredChildren(input: BuildInput): ChildObject[] {
  return [
    { kind: 'ConfigMap', body: buildConfigMap(input) },
    ...buildServices(input).map((body): ChildObject => ({ kind: 'Service', body })),
    { kind: 'StatefulSet', body: buildStatefulSet(input) },
  ];
}
