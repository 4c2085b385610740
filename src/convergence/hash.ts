import { createHash } from 'crypto';
import { ANNOTATION_CONTENT_HASH } from '../resources/labels.js';

/** Metadata the API server fills in; never part of the desired content */
const SERVER_METADATA_FIELDS = [
  'resourceVersion',
  'uid',
  'generation',
  'creationTimestamp',
  'deletionTimestamp',
  'deletionGracePeriodSeconds',
  'managedFields',
  'selfLink',
];

/** Labels added by controllers after the fact */
const GENERATED_LABELS = [
  'controller-revision-hash',
  'pod-template-hash',
  'statefulset.kubernetes.io/pod-name',
];

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

/** JSON with object keys sorted at every level; undefined members are dropped */
export function stableStringify(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map(v => (v === undefined ? 'null' : stableStringify(v))).join(',')}]`;
  }
  if (value instanceof Date) {
    return JSON.stringify(value.toISOString());
  }
  if (isRecord(value)) {
    const parts = Object.keys(value)
      .sort()
      .filter(k => value[k] !== undefined)
      .map(k => `${JSON.stringify(k)}:${stableStringify(value[k])}`);
    return `{${parts.join(',')}}`;
  }
  return JSON.stringify(value) ?? 'null';
}

function without(record: Record<string, unknown>, keys: string[]): Record<string, unknown> {
  const copy = { ...record };
  for (const k of keys) delete copy[k];
  return copy;
}

/** The object minus status, server-populated metadata and our own hash annotation */
export function semanticView(body: object): Record<string, unknown> {
  const view = without({ ...body }, ['status']);
  const meta = view.metadata;
  if (!isRecord(meta)) return view;

  const cleaned = without(meta, SERVER_METADATA_FIELDS);
  if (isRecord(cleaned.annotations)) {
    cleaned.annotations = without(cleaned.annotations, [ANNOTATION_CONTENT_HASH]);
  }
  if (isRecord(cleaned.labels)) {
    cleaned.labels = without(cleaned.labels, GENERATED_LABELS);
  }
  view.metadata = cleaned;
  return view;
}

/** First 16 hex chars of SHA-256 over the semantic view */
export function contentHash(body: object): string {
  return createHash('sha256').update(stableStringify(semanticView(body))).digest('hex').slice(0, 16);
}
