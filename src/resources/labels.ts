/** Names, labels and annotations shared by the builder, the engine and the detector. */

export const MANAGER_NAME = 'neo4j-cluster-reconciler';

export const LABEL_CLUSTER = 'neo4j.com/cluster';
export const LABEL_CLUSTERING = 'neo4j.com/clustering';

/** Hash of the applied desired object, written on every child */
export const ANNOTATION_CONTENT_HASH = 'neo4j.com/content-hash';
/** Primaries count the server StatefulSet was built for */
export const ANNOTATION_PRIMARIES = 'neo4j.com/primaries';
/** Pod template: hash of the ConfigMap content the pods run with */
export const ANNOTATION_CONFIG_HASH = 'neo4j.com/config-hash';
/** Pod template: set when existing members must re-bootstrap */
export const ANNOTATION_BOOTSTRAP_RESTART = 'neo4j.com/bootstrap-restart';

export const BOLT_PORT = 7687;
export const HTTP_PORT = 7474;
export const HTTPS_PORT = 7473;

export function serverStatefulSetName(cluster: string): string {
  return `${cluster}-server`;
}

export function configMapName(cluster: string): string {
  return `${cluster}-config`;
}

export function headlessServiceName(cluster: string): string {
  return `${cluster}-headless`;
}

export function clientServiceName(cluster: string): string {
  return `${cluster}-client`;
}

export function memberSelector(cluster: string): string {
  return `${LABEL_CLUSTER}=${cluster},${LABEL_CLUSTERING}=true`;
}

/** Load-balanced front door; may route to any partition */
export function clientBoltUri(cluster: string, namespace: string): string {
  return `bolt://${clientServiceName(cluster)}.${namespace}.svc.cluster.local:${BOLT_PORT}`;
}

/** A single member's own address through the headless service */
export function memberBoltUri(pod: string, cluster: string, namespace: string): string {
  return `bolt://${pod}.${headlessServiceName(cluster)}.${namespace}.svc.cluster.local:${BOLT_PORT}`;
}
