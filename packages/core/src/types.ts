/**
 * Core types for the Arbor growth engine
 */

import { z } from 'zod';

// =============================================================================
// Geometry
// =============================================================================

export const Vec2Schema = z.object({
  x: z.number().finite(),
  y: z.number().finite(),
});

export interface Vec2 {
  readonly x: number;
  readonly y: number;
}

/**
 * Index into a tree's node arena. Assigned monotonically from 0.
 */
export type NodeId = number;

// =============================================================================
// Neighbor Evaluation
// =============================================================================

export const NeighborModeSchema = z.enum([
  'global', // Rank every node, radius checked afterwards
  'local',  // Rank only nodes inside the radius
]);

export type NeighborMode = z.infer<typeof NeighborModeSchema>;

// =============================================================================
// Spawn Shapes
// =============================================================================

const countSchema = z.number().int().nonnegative();

export const RectSpawnSchema = z.object({
  kind: z.literal('rect'),
  center: Vec2Schema,
  halfExtents: Vec2Schema,
  count: countSchema,
});

export const OvalSpawnSchema = z.object({
  kind: z.literal('oval'),
  center: Vec2Schema,
  radii: Vec2Schema,
  count: countSchema,
});

export const CircleSpawnSchema = z.object({
  kind: z.literal('circle'),
  center: Vec2Schema,
  radius: z.number().finite().positive(),
  count: countSchema,
});

export const AnnulusSpawnSchema = z.object({
  kind: z.literal('annulus'),
  center: Vec2Schema,
  innerRadius: z.number().finite().nonnegative(),
  outerRadius: z.number().finite().positive(),
  count: countSchema,
});

export const SpawnShapeSchema = z
  .discriminatedUnion('kind', [
    RectSpawnSchema,
    OvalSpawnSchema,
    CircleSpawnSchema,
    AnnulusSpawnSchema,
  ])
  .superRefine((shape, ctx) => {
    if (shape.kind === 'annulus' && shape.innerRadius >= shape.outerRadius) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'innerRadius must be smaller than outerRadius',
        path: ['innerRadius'],
      });
    }
  });

export type SpawnShape = z.infer<typeof SpawnShapeSchema>;
export type SpawnKind = SpawnShape['kind'];

/**
 * Interactive spawn tools read their extents from the active config
 */
export type SpawnTool = 'rect' | 'oval';

// =============================================================================
// Random Source
// =============================================================================

/**
 * Uniform source in [0, 1)
 */
export type Rng = () => number;
