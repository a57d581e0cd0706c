/**
 * Attractor cloud sampling
 *
 * Uniform samples inside a rectangle, oval, circle or annulus. Area
 * sampling uses the square-root radius trick so points do not bunch up
 * at the center.
 */

import type { Rng, SimulationConfig, SpawnShape, SpawnTool, Vec2 } from '@arbor/core';
import { SpawnShapeSchema, Vec2Schema, uniform, v2 } from '@arbor/core';

export function sampleShape(shape: SpawnShape, rng: Rng): Vec2[] {
  const points: Vec2[] = [];
  for (let i = 0; i < shape.count; i++) {
    points.push(samplePoint(shape, rng));
  }
  return points;
}

function samplePoint(shape: SpawnShape, rng: Rng): Vec2 {
  const { center } = shape;
  switch (shape.kind) {
    case 'rect':
      return v2.vec2(
        uniform(rng, center.x - shape.halfExtents.x, center.x + shape.halfExtents.x),
        uniform(rng, center.y - shape.halfExtents.y, center.y + shape.halfExtents.y)
      );
    case 'oval': {
      const unit = unitDisk(rng, 0, 1);
      return v2.vec2(center.x + unit.x * shape.radii.x, center.y + unit.y * shape.radii.y);
    }
    case 'circle':
      return v2.add(center, v2.scale(unitDisk(rng, 0, 1), shape.radius));
    case 'annulus': {
      const ratio = shape.innerRadius / shape.outerRadius;
      return v2.add(center, v2.scale(unitDisk(rng, ratio, 1), shape.outerRadius));
    }
  }
}

/**
 * Uniform point in the unit-scaled ring inner <= r < outer
 */
function unitDisk(rng: Rng, inner: number, outer: number): Vec2 {
  const theta = 2 * Math.PI * rng();
  const r = Math.sqrt(uniform(rng, inner * inner, outer * outer));
  return v2.vec2(r * Math.cos(theta), r * Math.sin(theta));
}

/**
 * Shape for an interactive spawn tool, sized from the active config
 */
export function shapeForTool(
  tool: SpawnTool,
  center: Vec2,
  config: Pick<SimulationConfig, 'spawnRectHalfExtents' | 'spawnOvalRadii' | 'spawnCount'>
): SpawnShape {
  if (tool === 'rect') {
    return { kind: 'rect', center, halfExtents: config.spawnRectHalfExtents, count: config.spawnCount };
  }
  return { kind: 'oval', center, radii: config.spawnOvalRadii, count: config.spawnCount };
}

/**
 * Validate an untyped spawn request
 */
export function parseShape(input: unknown): SpawnShape {
  const parsed = SpawnShapeSchema.safeParse(input);
  if (!parsed.success) {
    const detail = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid spawn shape: ${detail}`);
  }
  return parsed.data;
}

/**
 * Validate an untyped position (finite x and y)
 */
export function parsePosition(input: unknown): Vec2 {
  const parsed = Vec2Schema.safeParse(input);
  if (!parsed.success) {
    const detail = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid position: ${detail}`);
  }
  return parsed.data;
}
