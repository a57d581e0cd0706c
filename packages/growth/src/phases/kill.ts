/**
 * KILL Phase
 *
 * Runs after GROWTH in the same cycle, so nodes grown this cycle can
 * remove the attractors they reach. Always ranks globally: restricting
 * candidates to the kill radius yields the same decision.
 */

import type { SimulationConfig } from '@arbor/core';
import type { Tree } from '../tree';
import type { AttractorSet } from '../attractor-set';
import { kthNearest } from '../nearest';

export type KillConfig = Pick<SimulationConfig, 'killFromKn' | 'killRadius'>;

export interface KillReport {
  /** Indices of attractors killed this cycle, ascending */
  killed: number[];
}

export function killPhase(
  tree: Tree,
  attractors: AttractorSet,
  config: KillConfig
): KillReport {
  const radiusSq = config.killRadius * config.killRadius;
  const nodes = tree.all();
  const killed: number[] = [];

  for (const index of [...attractors.aliveIndices()]) {
    const hit = kthNearest(attractors.get(index).position, nodes, config.killFromKn);
    if (hit !== null && hit.distanceSq <= radiusSq && attractors.kill(index)) {
      killed.push(index);
    }
  }

  return { killed };
}
