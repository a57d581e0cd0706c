/**
 * GROWTH Phase
 *
 * Input: InfluenceBuffer from ATTRACTION
 * Output: new nodes appended to the Tree
 *
 * This stage handles:
 * - Direction: normalize(mean influence + tropism)
 * - Degenerate directions (node skipped for this cycle)
 * - Sibling spacing (candidates too close to an existing child are dropped)
 * - Commit in ascending parent id order (influencedIndices order)
 */

import type { NodeId, SimulationConfig, Vec2 } from '@arbor/core';
import { v2 } from '@arbor/core';
import type { Tree } from '../tree';
import type { InfluenceBuffer } from '../influence-buffer';

export type GrowthConfig = Pick<SimulationConfig, 'stepLen' | 'tropism' | 'minChildSpacing'>;

export interface GrowthReport {
  /** Ids of appended nodes, ascending */
  added: NodeId[];
  /** Influenced nodes whose direction cancelled out */
  skippedDegenerate: NodeId[];
  /** Influenced nodes whose candidate sat on an existing child */
  skippedCrowded: NodeId[];
}

interface Candidate {
  parent: NodeId;
  position: Vec2;
  radius: number;
}

export function growthDirection(buffer: InfluenceBuffer, id: NodeId, tropism: Vec2): Vec2 {
  return v2.normalizeOrZero(v2.add(buffer.avgDir(id), tropism));
}

export function growthPhase(
  tree: Tree,
  buffer: InfluenceBuffer,
  config: GrowthConfig
): GrowthReport {
  const candidates: Candidate[] = [];
  const skippedDegenerate: NodeId[] = [];
  const skippedCrowded: NodeId[] = [];

  for (const id of buffer.influencedIndices()) {
    const dir = growthDirection(buffer, id, config.tropism);
    if (v2.isZero(dir)) {
      skippedDegenerate.push(id);
      continue;
    }

    const parent = tree.get(id);
    const position = v2.add(parent.position, v2.scale(dir, config.stepLen));

    if (tree.hasChildNear(id, position, config.minChildSpacing)) {
      skippedCrowded.push(id);
      continue;
    }

    candidates.push({ parent: id, position, radius: parent.radius });
  }

  const added = candidates.map(c => tree.addChild(c.parent, c.position, c.radius));

  return { added, skippedDegenerate, skippedCrowded };
}
