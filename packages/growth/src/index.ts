/**
 * @arbor/growth - Space-colonization structure and algorithm
 *
 * - Tree: flat node arena (forest)
 * - AttractorSet: tombstoned attractor storage
 * - InfluenceBuffer: per-cycle direction accumulator
 * - kthNearest: deterministic brute-force neighbor query
 * - Phases: ATTRACTION -> GROWTH -> KILL
 * - Spawn: attractor cloud sampling
 */

export * from './tree';
export * from './attractor-set';
export * from './influence-buffer';
export * from './nearest';
export * from './phases';
export * from './spawn';
