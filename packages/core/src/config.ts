/**
 * Simulation configuration
 *
 * A single zod schema covers the phase parameters, the spawn tool
 * settings and the tick driver policy. Every field has a default, so an
 * empty object validates to DEFAULT_CONFIG.
 */

import { z } from 'zod';
import { NeighborModeSchema, Vec2Schema } from './types';
import { ok, err, type Result } from './result';

const positive = () => z.number().finite().positive();
const positiveInt = () => z.number().int().positive();

const PositiveVec2Schema = z.object({
  x: positive(),
  y: positive(),
});

export const SimulationConfigSchema = z.object({
  // Neighbor ranks (k-th nearest, 1 = nearest)
  attractFromKn: positiveInt().default(1),
  killFromKn: positiveInt().default(1),

  // Geometry
  influenceRadius: positive().default(40),
  killRadius: positive().default(4),
  stepLen: positive().default(2),
  tropism: Vec2Schema.default({ x: 0, y: 0 }),
  minChildSpacing: z.number().finite().nonnegative().default(0.1),
  rootRadius: positive().default(1),
  neighborMode: NeighborModeSchema.default('global'),

  // Spawn tool
  spawnRectHalfExtents: PositiveVec2Schema.default({ x: 50, y: 50 }),
  spawnOvalRadii: PositiveVec2Schema.default({ x: 100, y: 100 }),
  spawnCount: positiveInt().default(1000),

  // Tick driver
  cyclesPerTick: positiveInt().default(1),
  maxIterations: positiveInt().default(100_000),
  stallWindow: positiveInt().default(50),
  seed: z.number().int().default(1),
  trace: z.boolean().default(false),
});

export type SimulationConfig = z.infer<typeof SimulationConfigSchema>;
export type SimulationConfigInput = z.input<typeof SimulationConfigSchema>;

export const DEFAULT_CONFIG: SimulationConfig = SimulationConfigSchema.parse({});

// =============================================================================
// Validation
// =============================================================================

export interface ConfigIssue {
  path: string;
  message: string;
}

export class InvalidConfigError extends Error {
  readonly kind = 'InvalidConfig';

  constructor(readonly issues: ConfigIssue[]) {
    super(`Invalid config: ${issues.map(i => `${i.path || '<root>'}: ${i.message}`).join('; ')}`);
    this.name = 'InvalidConfigError';
  }
}

/**
 * Validate raw input into a complete config.
 *
 * Missing fields take their defaults; nothing is merged from any
 * previously active config.
 */
export function validateConfig(input: unknown): Result<SimulationConfig, InvalidConfigError> {
  const parsed = SimulationConfigSchema.safeParse(input ?? {});
  if (parsed.success) {
    return ok(parsed.data);
  }
  return err(
    new InvalidConfigError(
      parsed.error.issues.map(issue => ({
        path: issue.path.join('.'),
        message: issue.message,
      }))
    )
  );
}
