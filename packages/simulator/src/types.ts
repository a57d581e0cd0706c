/**
 * @arbor/simulator/types - Driver-facing types
 *
 * @module
 */

import type { NodeId, Vec2 } from '@arbor/core';

/**
 * Why the driver stopped advancing
 */
export type TerminalCondition =
  | 'stopped'        // External stop request
  | 'exhausted'      // No attractor left alive
  | 'max-iterations' // Phase-cycle budget spent
  | 'stalled';       // No kill for stallWindow consecutive cycles

/**
 * Result of one runTick() call
 */
export interface TickSummary {
  /** 1-based tick counter; ticks that run no cycles do not advance it */
  tick: number;
  /** Phase-cycles executed during this tick */
  cycles: number;
  /** Ids of nodes appended during the tick, ascending */
  nodesAdded: NodeId[];
  /** Attractors killed during the tick */
  attractorsKilled: number;
  /** Kill count of each executed phase-cycle */
  killsPerCycle: number[];
  terminal?: TerminalCondition;
}

export interface SimulationStats {
  ticks: number;
  iterations: number;
  nodeCount: number;
  attractorCount: number;
  aliveAttractors: number;
  /** Consecutive phase-cycles without a kill */
  cyclesWithoutKill: number;
  lastAdded: NodeId[];
  terminal: TerminalCondition | null;
}

export interface NodeView {
  id: NodeId;
  position: Vec2;
  radius: number;
  parent: NodeId | null;
  children: NodeId[];
}

export interface AttractorView {
  index: number;
  position: Vec2;
  alive: boolean;
  owner: NodeId | null;
}

export interface SimulationSnapshot {
  nodes: NodeView[];
  edges: Array<[parent: NodeId, child: NodeId]>;
  attractors: AttractorView[];
  stats: SimulationStats;
}

export type TickListener = (summary: TickSummary) => void;
