/**
 * ATTRACTION Phase
 *
 * Input: Tree, alive attractors
 * Output: InfluenceBuffer filled for this cycle, attractor owners updated
 *
 * Each alive attractor looks up its k-th nearest node. When that node is
 * inside the influence radius the attractor is owned by it and adds the
 * unit vector node -> attractor to the node's slot. Otherwise the owner
 * is cleared and the attractor stays alive.
 */

import type { NodeId, SimulationConfig } from '@arbor/core';
import { v2 } from '@arbor/core';
import type { Tree } from '../tree';
import type { AttractorSet } from '../attractor-set';
import type { InfluenceBuffer } from '../influence-buffer';
import { kthNearest } from '../nearest';

export type AttractionConfig = Pick<
  SimulationConfig,
  'attractFromKn' | 'influenceRadius' | 'neighborMode'
>;

export interface AttractionReport {
  /** Nodes with at least one contributor, ascending */
  influencedNodes: NodeId[];
  /** Alive attractors that found an owner this cycle */
  ownedAttractors: number;
}

export function attractionPhase(
  tree: Tree,
  attractors: AttractorSet,
  config: AttractionConfig,
  buffer: InfluenceBuffer
): AttractionReport {
  const radiusSq = config.influenceRadius * config.influenceRadius;
  const nodes = tree.all();
  let owned = 0;

  buffer.ensureLen(tree.size);

  for (let i = 0; i < attractors.size; i++) {
    const attractor = attractors.get(i);
    if (!attractor.alive) {
      attractors.setOwner(i, null);
      continue;
    }

    const hit = kthNearest(attractor.position, nodes, config.attractFromKn, {
      mode: config.neighborMode,
      radius: config.influenceRadius,
    });

    if (hit === null || !(hit.distanceSq <= radiusSq)) {
      attractors.setOwner(i, null);
      continue;
    }

    const node = tree.get(hit.id);
    buffer.add(hit.id, v2.normalizeOrZero(v2.sub(attractor.position, node.position)));
    attractors.setOwner(i, hit.id);
    owned++;
  }

  return { influencedNodes: buffer.influencedIndices(), ownedAttractors: owned };
}
