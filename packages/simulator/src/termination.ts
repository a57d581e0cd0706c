/**
 * Termination policy
 *
 * Evaluated after every tick. Conditions are checked in a fixed order so
 * that when several hold at once the report is predictable.
 */

import type { SimulationConfig } from '@arbor/core';
import type { TerminalCondition } from './types';

export interface TerminationInput {
  stopRequested: boolean;
  aliveAttractors: number;
  iterations: number;
  cyclesWithoutKill: number;
}

export type TerminationPolicy = Pick<SimulationConfig, 'maxIterations' | 'stallWindow'>;

export function evaluateTermination(
  input: TerminationInput,
  policy: TerminationPolicy
): TerminalCondition | null {
  if (input.stopRequested) {
    return 'stopped';
  }
  if (input.aliveAttractors === 0) {
    return 'exhausted';
  }
  if (input.iterations >= policy.maxIterations) {
    return 'max-iterations';
  }
  if (input.cyclesWithoutKill >= policy.stallWindow) {
    return 'stalled';
  }
  return null;
}

/**
 * Whether spawning new roots or attractors lifts a latched condition.
 * A new root can end a stall; only new attractors end exhaustion.
 */
export function isReleasedBySpawn(
  spawned: 'root' | 'attractors',
  condition: TerminalCondition
): boolean {
  if (condition === 'stalled') {
    return true;
  }
  return spawned === 'attractors' && condition === 'exhausted';
}
