/**
 * Phase-cycle: ATTRACTION -> GROWTH -> KILL
 */

import type { SimulationConfig } from '@arbor/core';
import type { Tree } from '../tree';
import type { AttractorSet } from '../attractor-set';
import type { InfluenceBuffer } from '../influence-buffer';
import { attractionPhase, type AttractionReport } from './attraction';
import { growthPhase, type GrowthReport } from './growth';
import { killPhase, type KillReport } from './kill';

export * from './attraction';
export * from './growth';
export * from './kill';

export interface CycleReport {
  attraction: AttractionReport;
  growth: GrowthReport;
  kill: KillReport;
}

export function runPhaseCycle(
  tree: Tree,
  attractors: AttractorSet,
  config: SimulationConfig,
  buffer: InfluenceBuffer
): CycleReport {
  const attraction = attractionPhase(tree, attractors, config, buffer);
  const growth = growthPhase(tree, buffer, config);
  const kill = killPhase(tree, attractors, config);
  return { attraction, growth, kill };
}
