/**
 * k-th nearest node query
 *
 * Brute force over the whole arena. Candidates are ranked by
 * (distanceSq, id) so equidistant nodes always resolve to the smaller
 * id. When k exceeds the candidate count the query clamps to the
 * last-ranked (farthest) candidate.
 *
 * Modes:
 * - global: every node is a candidate; the caller applies its radius
 *   afterwards, so an out-of-radius node can be selected and rejected.
 * - local: only nodes within `radius` are candidates.
 */

import type { NeighborMode, NodeId, Vec2 } from '@arbor/core';
import { v2 } from '@arbor/core';

export interface Neighbor {
  id: NodeId;
  distanceSq: number;
}

export interface NearestOptions {
  mode?: NeighborMode;
  /** Candidate radius for local mode */
  radius?: number;
}

interface Positioned {
  readonly id: NodeId;
  readonly position: Vec2;
}

export function compareNeighbors(a: Neighbor, b: Neighbor): number {
  return a.distanceSq - b.distanceSq || a.id - b.id;
}

export function kthNearest(
  point: Vec2,
  nodes: readonly Positioned[],
  k: number,
  options: NearestOptions = {}
): Neighbor | null {
  if (!Number.isInteger(k) || k < 1) {
    throw new Error(`k must be a positive integer, got ${k}`);
  }

  const mode = options.mode ?? 'global';
  if (mode === 'local' && options.radius === undefined) {
    throw new Error('local neighbor mode requires a radius');
  }
  const radiusSq =
    mode === 'local' && options.radius !== undefined
      ? options.radius * options.radius
      : Number.POSITIVE_INFINITY;

  // Best `k` candidates, sorted. With fewer than k candidates this holds
  // all of them, so the last slot is the farthest.
  const best: Neighbor[] = [];
  for (const node of nodes) {
    const candidate: Neighbor = {
      id: node.id,
      distanceSq: v2.distanceSq(point, node.position),
    };
    // NaN distances are unrankable
    if (!(candidate.distanceSq <= radiusSq)) {
      continue;
    }
    insertBounded(best, candidate, k);
  }

  if (best.length === 0) {
    return null;
  }
  return best[best.length - 1];
}

export function nearest(point: Vec2, nodes: readonly Positioned[]): Neighbor | null {
  return kthNearest(point, nodes, 1);
}

function insertBounded(best: Neighbor[], candidate: Neighbor, k: number): void {
  if (best.length === k && compareNeighbors(candidate, best[k - 1]) >= 0) {
    return;
  }
  let i = best.length;
  while (i > 0 && compareNeighbors(candidate, best[i - 1]) < 0) {
    i--;
  }
  best.splice(i, 0, candidate);
  if (best.length > k) {
    best.pop();
  }
}

