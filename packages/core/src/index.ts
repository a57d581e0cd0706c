/**
 * @arbor/core - Primitives for the space-colonization engine
 *
 * - Geometry: Vec2 and helpers
 * - Config: zod schema, defaults, validation
 * - Result: explicit success/failure values
 * - Random: seeded sources for spawning
 * - Context: per-tick trace entries
 */

export * from './types';
export * as v2 from './vec2';
export * from './result';
export * from './config';
export * from './random';
export * from './context';
