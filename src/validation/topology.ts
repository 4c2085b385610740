/**
 * Topology Validation
 *
 * Checks the structural invariants of a desired topology and classifies the
 * scaling transition relative to what is running.
 *
 * This is a PURE FUNCTION.
 */

import type { V1StatefulSet } from '@kubernetes/client-node';
import type { ClusterTopology } from '../api/cluster-resource.js';
import { ANNOTATION_PRIMARIES } from '../resources/labels.js';

export type ScaleTransition = 'None' | 'ScaleUpSingleToMulti';

export interface TopologyValidation {
  ok: boolean;
  errors: string[];
  warnings: string[];
  transition: ScaleTransition;
}

export interface TopologyOptions {
  /** Primaries the running servers were built for, when known */
  previousPrimaries?: number;
  maxServers: number;
}

export function desiredServerCount(topology: ClusterTopology): number {
  return topology.serverCount ?? topology.primaries + topology.secondaries;
}

export function validateTopology(topology: ClusterTopology, options: TopologyOptions): TopologyValidation {
  const { primaries, secondaries } = topology;
  const servers = desiredServerCount(topology);
  const errors: string[] = [];
  const warnings: string[] = [];

  if (primaries < 1) {
    errors.push(`primaries must be at least 1 (got ${primaries})`);
  }
  if (secondaries < 0) {
    errors.push(`secondaries must not be negative (got ${secondaries})`);
  }
  if (topology.serverCount !== undefined && topology.serverCount < primaries) {
    errors.push(`serverCount ${topology.serverCount} is smaller than primaries ${primaries}`);
  }
  if (servers > options.maxServers) {
    errors.push(`${servers} servers exceeds the maximum of ${options.maxServers}`);
  }

  if (primaries % 2 === 0) {
    warnings.push(`primaries=${primaries} is even; an odd count is needed for an unambiguous quorum majority`);
  }

  const transition: ScaleTransition =
    options.previousPrimaries === 1 && primaries > 1 ? 'ScaleUpSingleToMulti' : 'None';

  return { ok: errors.length === 0, errors, warnings, transition };
}

/** Primaries count recorded on a live server StatefulSet, if any */
export function previousPrimaries(statefulSet: V1StatefulSet | undefined): number | undefined {
  const raw = statefulSet?.metadata?.annotations?.[ANNOTATION_PRIMARIES];
  if (raw === undefined) return undefined;
  const parsed = parseInt(raw, 10);
  return Number.isNaN(parsed) ? undefined : parsed;
}
