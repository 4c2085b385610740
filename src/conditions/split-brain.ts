/**
 * Split-Brain Detection
 *
 * Asks every clustering member, at its own address, which servers it sees as
 * Enabled and Available. Members that agree share a view; if the members
 * fall into disjoint views the cluster is partitioned, and the members
 * outside the largest view are the minority to repair.
 *
 * analyzeViews is a pure function over the collected views; detectSplitBrain
 * does the fan-out.
 */

import { createHash } from 'crypto';
import type { MemberPod, ServerDiagnostic } from '../types.js';
import { errorText } from '../errors.js';
import { log } from '../logger.js';

export type SplitBrainVerdict = 'healthy' | 'split' | 'unknown';

/** What a single member reports */
export interface MemberView {
  pod: string;
  reachable: boolean;
  /** Sorted pod names this member sees as Enabled + Available */
  view: string[];
  hash: string;
  error?: string;
}

export interface ViewGroup {
  hash: string;
  view: string[];
  members: string[];
}

export interface SplitBrainAnalysis {
  verdict: SplitBrainVerdict;
  groups: ViewGroup[];
  majority: string[];
  minority: string[];
  unreachable: string[];
  details: string;
}

/** Reads SHOW SERVERS from one member */
export type ViewQuery = (pod: string) => Promise<ServerDiagnostic[]>;

/** Pod name from a server address (`pod.svc.ns.svc.cluster.local:7687`) */
export function podOfAddress(address: string): string {
  const host = address.split(':')[0] ?? '';
  return host.split('.')[0] ?? '';
}

export function viewOf(servers: ServerDiagnostic[]): string[] {
  return servers
    .filter(s => s.state === 'Enabled' && s.health === 'Available')
    .map(s => podOfAddress(s.address))
    .filter(pod => pod !== '')
    .sort();
}

/**
 * Hash a member's view for comparison.
 * Sorted so order doesn't matter.
 */
export function hashClusterView(view: string[]): string {
  return createHash('sha256').update(JSON.stringify([...view].sort())).digest('hex').slice(0, 12);
}

function groupViews(views: MemberView[]): ViewGroup[] {
  const groups = new Map<string, ViewGroup>();
  for (const v of views) {
    const group = groups.get(v.hash);
    if (group) group.members.push(v.pod);
    else groups.set(v.hash, { hash: v.hash, view: v.view, members: [v.pod] });
  }
  return [...groups.values()];
}

function disjoint(a: string[], b: string[]): boolean {
  const seen = new Set(a);
  return !b.some(pod => seen.has(pod));
}

function result(
  verdict: SplitBrainVerdict,
  details: string,
  parts: Partial<Omit<SplitBrainAnalysis, 'verdict' | 'details'>> = {},
): SplitBrainAnalysis {
  return {
    verdict,
    details,
    groups: parts.groups ?? [],
    majority: parts.majority ?? [],
    minority: parts.minority ?? [],
    unreachable: parts.unreachable ?? [],
  };
}

/**
 * Decide whether the collected views show a partition.
 *
 * `expected` is the desired server count; fewer than a quorum of answers,
 * overlapping views and a tie for the largest view all return `unknown`.
 */
export function analyzeViews(views: MemberView[], expected: number): SplitBrainAnalysis {
  const unreachable = views.filter(v => !v.reachable).map(v => v.pod);

  if (expected <= 1) return result('healthy', 'single server', { unreachable });

  const reachable = views.filter(v => v.reachable);
  const quorum = Math.floor(expected / 2) + 1;
  if (reachable.length < quorum) {
    return result('unknown', `only ${reachable.length} of ${expected} members answered (need ${quorum})`, { unreachable });
  }

  const groups = groupViews(reachable);
  if (groups.length === 1) {
    return result('healthy', `${reachable.length} members agree`, { groups, majority: groups[0].members, unreachable });
  }

  const partitioned = groups.some((g, i) => groups.slice(i + 1).some(other => disjoint(g.view, other.view)));
  if (!partitioned) {
    return result('unknown', 'member views overlap; membership still converging', { groups, unreachable });
  }

  const bySize = [...groups].sort((a, b) => b.view.length - a.view.length);
  if (bySize[0].view.length === bySize[1].view.length) {
    return result('unknown', `no majority: largest views tie at ${bySize[0].view.length} servers`, { groups, unreachable });
  }

  const majorityGroup = bySize[0];
  const minority = reachable.filter(v => v.hash !== majorityGroup.hash).map(v => v.pod).sort();
  return result('split', `partitioned; minority members: ${minority.join(', ')}`, {
    groups,
    majority: majorityGroup.members,
    minority,
    unreachable,
  });
}

/**
 * Ask every member for its view concurrently and analyse the views.
 * Pods that are not Running count as unreachable without a query.
 */
export async function detectSplitBrain(
  members: MemberPod[],
  expected: number,
  queryView: ViewQuery,
): Promise<SplitBrainAnalysis> {
  const settled = await Promise.allSettled(members.map(async (pod): Promise<MemberView> => {
    if (pod.phase !== 'Running') {
      return { pod: pod.name, reachable: false, view: [], hash: '', error: `pod is ${pod.phase}` };
    }
    const view = viewOf(await queryView(pod.name));
    return { pod: pod.name, reachable: true, view, hash: hashClusterView(view) };
  }));

  const views = settled.map((outcome, i): MemberView => outcome.status === 'fulfilled'
    ? outcome.value
    : { pod: members[i].name, reachable: false, view: [], hash: '', error: errorText(outcome.reason) });

  const analysis = analyzeViews(views, expected);

  if (analysis.verdict !== 'healthy') {
    log(`[SplitBrain] ${analysis.verdict}: ${analysis.details}`);
    for (const v of views) {
      log(`[SplitBrain]   ${v.pod}: view=${v.hash || '-'} reachable=${v.reachable}${v.error ? ` error=${v.error}` : ''}`);
    }
  }

  return analysis;
}
