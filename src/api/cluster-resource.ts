/**
 * Neo4jEnterpriseCluster custom resource.
 *
 * The API server hands back untyped JSON; everything the reconciler reads goes
 * through these schemas so defaults are applied in one place.
 */

import { z } from 'zod';
import { PHASES, type ClusterHeader, type ClusterResource, type ClusterStatus } from '../types.js';
import { InvalidResourceError, OperatorError } from '../errors.js';

export const GROUP = 'neo4j.neo4j.com';
export const VERSION = 'v1alpha1';
export const PLURAL = 'neo4jenterpriseclusters';
export const KIND = 'Neo4jEnterpriseCluster';
export const API_VERSION = `${GROUP}/${VERSION}`;

export const DEFAULT_IMAGE_REPO = 'neo4j';
export const DEFAULT_IMAGE_TAG = '5.26-enterprise';

const imageSchema = z.object({
  repo: z.string().default(DEFAULT_IMAGE_REPO),
  tag: z.string().default(DEFAULT_IMAGE_TAG),
  pullPolicy: z.enum(['Always', 'IfNotPresent', 'Never']).default('IfNotPresent'),
});

// Bounds are checked by the topology validator so that a bad count becomes a
// status condition instead of a parse failure.
const topologySchema = z.object({
  primaries: z.number().int(),
  secondaries: z.number().int().default(0),
  serverCount: z.number().int().optional(),
});

const storageSchema = z.object({
  className: z.string().optional(),
  size: z.string().default('10Gi'),
  /** What happens to the data claims when the cluster is deleted */
  retentionPolicy: z.enum(['Delete', 'Retain']).default('Delete'),
});

const authSchema = z.object({
  adminSecret: z.string().default('neo4j-admin-secret'),
});

const tlsSchema = z.object({
  mode: z.enum(['disabled', 'cert-manager']).default('disabled'),
  /** Secret holding tls.crt/tls.key, issued by cert-manager; defaults to <name>-tls */
  secretName: z.string().optional(),
});

const queryMonitoringSchema = z.object({
  enabled: z.boolean().default(false),
  threshold: z.string().default('5s'),
});

export const clusterSpecSchema = z.object({
  image: imageSchema.default({}),
  topology: topologySchema,
  storage: storageSchema.default({}),
  auth: authSchema.default({}),
  tls: tlsSchema.default({}),
  queryMonitoring: queryMonitoringSchema.default({}),
  config: z.record(z.string()).default({}),
});

export type ClusterSpec = z.infer<typeof clusterSpecSchema>;
export type ClusterTopology = ClusterSpec['topology'];
export type TlsMode = ClusterSpec['tls']['mode'];

const conditionSchema = z.object({
  type: z.string(),
  status: z.enum(['True', 'False', 'Unknown']),
  reason: z.string().default(''),
  message: z.string().default(''),
  observedGeneration: z.number().default(0),
  lastTransitionTime: z.string().default(''),
});

const diagnosticsSchema = z.object({
  servers: z.array(z.object({
    name: z.string(),
    address: z.string().default(''),
    state: z.string().default(''),
    health: z.string().default(''),
    hostingCount: z.number().default(0),
  })).default([]),
  databases: z.array(z.object({
    name: z.string(),
    status: z.string().default(''),
    requestedStatus: z.string().default(''),
    role: z.string().default(''),
    isDefault: z.boolean().default(false),
  })).default([]),
  lastCollected: z.string().nullable().default(null),
  collectionError: z.string().default(''),
});

export const clusterStatusSchema: z.ZodType<ClusterStatus, z.ZodTypeDef, unknown> = z.object({
  // An unrecognised phase from an older writer reads as unset
  phase: z.enum(PHASES).optional().catch(undefined),
  message: z.string().optional(),
  conditions: z.array(conditionSchema).default([]),
  replicas: z.object({
    primaries: z.number(),
    secondaries: z.number(),
    ready: z.number(),
  }).optional(),
  endpoints: z.object({
    bolt: z.string(),
    http: z.string(),
    https: z.string().optional(),
    internal: z.object({ headless: z.string(), client: z.string() }),
  }).optional(),
  diagnostics: diagnosticsSchema.nullable().default(null),
  observedGeneration: z.number().default(0),
  lastSplitBrainCheck: z.string().nullable().default(null),
});

const metadataSchema = z.object({
  name: z.string(),
  namespace: z.string(),
  uid: z.string().default(''),
  generation: z.number().default(1),
  resourceVersion: z.string().default(''),
  labels: z.record(z.string()).optional(),
  annotations: z.record(z.string()).optional(),
});

export const clusterResourceSchema: z.ZodType<ClusterResource, z.ZodTypeDef, unknown> = z.object({
  apiVersion: z.string().default(API_VERSION),
  kind: z.string().default(KIND),
  metadata: metadataSchema,
  spec: clusterSpecSchema,
  status: z.preprocess(value => value ?? {}, clusterStatusSchema),
});

const clusterHeaderSchema: z.ZodType<ClusterHeader, z.ZodTypeDef, unknown> = z.object({
  apiVersion: z.string().default(API_VERSION),
  kind: z.string().default(KIND),
  metadata: metadataSchema,
  status: z.preprocess(value => value ?? {}, clusterStatusSchema).catch(() => emptyStatus()),
});

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
}

/**
 * Parse a cluster as returned by the API server. A resource whose spec does
 * not match the schema throws InvalidResourceError with its header, so the
 * failure can still be reported on its status.
 */
export function parseClusterResource(raw: unknown): ClusterResource {
  const parsed = clusterResourceSchema.safeParse(raw);
  if (parsed.success) return parsed.data;
  throw new InvalidResourceError(formatIssues(parsed.error), parseClusterHeader(raw));
}

/** Metadata and status only; the spec is not looked at */
export function parseClusterHeader(raw: unknown): ClusterHeader {
  const parsed = clusterHeaderSchema.safeParse(raw);
  if (parsed.success) return parsed.data;
  throw new OperatorError(`malformed ${KIND}: ${formatIssues(parsed.error).join('; ')}`);
}

export function emptyStatus(): ClusterStatus {
  return {
    conditions: [],
    diagnostics: null,
    observedGeneration: 0,
    lastSplitBrainCheck: null,
  };
}
