/**
 * Simulation configuration schema - RoadVoid
 * Runtime validation with Zod + TypeScript types
 */

import { z } from 'zod';
import { ConfigurationError, GEOMETRY_EPSILON } from '@roadvoid/shared';

// ============================================================================
// Base Schemas
// ============================================================================

/** Closed sampling range [min, max]; ordering is checked by validateConfig */
export const RangeSchema = z.tuple([z.number(), z.number()]);

/**
 * Material properties.
 * A bare number is the relative permittivity; conductivity then falls back to
 * the per-layer default.
 */
export const MaterialInputSchema = z.union([
  z.number().positive(),
  z.object({
    permittivity: z.number().positive(),
    conductivity: z.number().min(0).optional(),
    permeability: z.number().positive().default(1),
    magneticLoss: z.number().min(0).default(0),
  }),
]);

// ============================================================================
// Road Cross-Section
// ============================================================================

/** Layer thicknesses in meters, top to bottom */
export const RoadSchema = z.object({
  airThickness: z.number().positive(),
  surfaceAsphaltThickness: z.number().positive(),
  baseAsphaltThickness: z.number().positive(),
  upperSubbaseThickness: z.number().positive(),
  lowerSubbaseThickness: z.number().positive(),
  subgradeThickness: z.number().positive(),
});

/** Electromagnetic properties of every layer plus the void */
export const MaterialsSchema = z.object({
  air: MaterialInputSchema,
  surfaceAsphalt: MaterialInputSchema,
  baseAsphalt: MaterialInputSchema,
  upperSubbase: MaterialInputSchema,
  lowerSubbase: MaterialInputSchema,
  subgrade: MaterialInputSchema,
  void: MaterialInputSchema,
});

// ============================================================================
// GPR Survey
// ============================================================================

/** Antenna, source and B-scan settings */
export const GprSchema = z.object({
  frequency: z.number().positive(), // MHz
  timeWindow: z.number().positive(), // ns
  spatialResolution: z.number().positive(), // m
  numTraces: z.number().int().min(1).default(50),
  scanStartXRatio: z.number().min(0).max(1).default(0.1),
  scanEndXRatio: z.number().min(0).max(1).default(0.9),
  waveform: z.enum(['ricker', 'gaussian', 'gaussiandot']).default('ricker'),
  polarisation: z.enum(['x', 'y', 'z']).default('z'),
});

// ============================================================================
// Void Parameters
// ============================================================================

/**
 * Sampling ranges for the void's initial pose and growth law.
 *
 * With units 'ratio', positions and sizes are fractions of the domain (x, y)
 * or of the road depth (depth, size z), and upward movement is a fraction of
 * the initial depth. With units 'absolute', every range is in meters except
 * the growth rate multiplier.
 */
export const VoidSchema = z.object({
  units: z.enum(['ratio', 'absolute']).default('ratio'),
  shape: z.enum(['box', 'cylinder']).default('box'),
  initialXPositionRange: RangeSchema,
  initialYPositionRange: RangeSchema,
  initialDepthRange: RangeSchema,
  initialSizeXRange: RangeSchema,
  initialSizeYRange: RangeSchema,
  initialSizeZRange: RangeSchema,
  growthRateRange: RangeSchema,
  upwardMovementRange: RangeSchema,
});

// ============================================================================
// Domain, Scene & Generation
// ============================================================================

/** Simulation volume; sizeZ is derived from the road when omitted */
export const DomainSchema = z.object({
  sizeX: z.number().positive(),
  sizeY: z.number().positive(),
  sizeZ: z.number().positive().optional(),
});

/** Scene composition options */
export const SceneOptionsSchema = z.object({
  frame: z.enum(['surface-relative', 'depth-from-bottom']).default('surface-relative'),
  geometryView: z.boolean().default(true),
  geometryPolicy: z.enum(['ignore', 'warn', 'clamp', 'reject']).default('warn'),
});

/** Sequence counts and write scheduling */
export const GenerationSchema = z.object({
  numSequences: z.number().int().min(1),
  stagesPerSequence: z.number().int().min(1),
  seedOffset: z.number().int().default(0),
  writeConcurrency: z.number().int().min(1).default(1),
});

// ============================================================================
// Complete Configuration Schema
// ============================================================================

export const SimulationConfigSchema = z.object({
  outputDir: z.string().min(1).default('data/simulations'),
  road: RoadSchema,
  gpr: GprSchema,
  void: VoidSchema,
  materials: MaterialsSchema,
  domain: DomainSchema,
  scene: SceneOptionsSchema.default({}),
  generation: GenerationSchema,
});

// ============================================================================
// TypeScript Type Exports
// ============================================================================

export type Range = z.infer<typeof RangeSchema>;
export type MaterialInput = z.infer<typeof MaterialInputSchema>;
export type RoadConfig = z.infer<typeof RoadSchema>;
export type MaterialsConfig = z.infer<typeof MaterialsSchema>;
export type GprConfig = z.infer<typeof GprSchema>;
export type VoidConfig = z.infer<typeof VoidSchema>;
export type DomainConfig = z.infer<typeof DomainSchema>;
export type SceneOptions = z.infer<typeof SceneOptionsSchema>;
export type GenerationConfig = z.infer<typeof GenerationSchema>;
export type SimulationConfig = z.infer<typeof SimulationConfigSchema>;
export type SimulationConfigInput = z.input<typeof SimulationConfigSchema>;

/** Keys of the void ranges, in sampling order */
export const VOID_RANGE_KEYS = [
  'initialXPositionRange',
  'initialYPositionRange',
  'initialDepthRange',
  'initialSizeXRange',
  'initialSizeYRange',
  'initialSizeZRange',
  'growthRateRange',
  'upwardMovementRange',
] as const;

export type VoidRangeKey = (typeof VOID_RANGE_KEYS)[number];

// ============================================================================
// Validation Functions
// ============================================================================

/** Total road height including air, in meters */
export function totalRoadDepth(road: RoadConfig): number {
  return (
    road.airThickness +
    road.surfaceAsphaltThickness +
    road.baseAsphaltThickness +
    road.upperSubbaseThickness +
    road.lowerSubbaseThickness +
    road.subgradeThickness
  );
}

function formatIssuePath(path: (string | number)[]): string {
  return path.length > 0 ? path.join('.') : '(root)';
}

/**
 * Cross-field checks that a per-field schema cannot express
 */
export function collectConfigViolations(config: SimulationConfig): string[] {
  const violations: string[] = [];

  for (const key of VOID_RANGE_KEYS) {
    const [min, max] = config.void[key];
    if (min > max) {
      violations.push(`void.${key}: min ${min} is greater than max ${max}`);
    }
    if (min < 0) {
      violations.push(`void.${key}: values must not be negative`);
    }
  }

  const [growthMin] = config.void.growthRateRange;
  if (growthMin < 1) {
    violations.push(`void.growthRateRange: growth rate must be at least 1, got ${growthMin}`);
  }

  if (config.void.units === 'ratio') {
    for (const key of VOID_RANGE_KEYS) {
      if (key === 'growthRateRange') continue;
      const [, max] = config.void[key];
      if (max > 1) {
        violations.push(`void.${key}: ratios must lie in [0, 1], got max ${max}`);
      }
    }
  }

  if (config.gpr.scanEndXRatio < config.gpr.scanStartXRatio) {
    violations.push(
      `gpr.scanEndXRatio (${config.gpr.scanEndXRatio}) is smaller than gpr.scanStartXRatio (${config.gpr.scanStartXRatio})`
    );
  }

  if (config.domain.sizeZ !== undefined) {
    const depth = totalRoadDepth(config.road);
    if (Math.abs(config.domain.sizeZ - depth) > GEOMETRY_EPSILON) {
      violations.push(
        `domain.sizeZ (${config.domain.sizeZ}) does not match the road cross-section depth (${depth})`
      );
    }
  }

  return violations;
}

/**
 * Validate a configuration object, throwing a ConfigurationError that lists
 * every violation found
 */
export function validateConfig(data: unknown): SimulationConfig {
  const result = SimulationConfigSchema.safeParse(data);
  if (!result.success) {
    throw new ConfigurationError(
      result.error.issues.map((issue) => `${formatIssuePath(issue.path)}: ${issue.message}`)
    );
  }

  const violations = collectConfigViolations(result.data);
  if (violations.length > 0) {
    throw new ConfigurationError(violations);
  }
  return result.data;
}
