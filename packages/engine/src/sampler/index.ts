/**
 * Parameter sampler - draws the frozen initial void parameters of a sequence
 */

import createDebug from 'debug';
import { ConfigurationError, createRandomSource, type RandomSource } from '@roadvoid/shared';
import { VOID_RANGE_KEYS, type Range, type VoidRangeKey } from '@roadvoid/core';
import type { SamplingExtent, VoidInitialParameters, VoidRanges } from '../api/index.js';

const log = createDebug('roadvoid:sampler');

/**
 * Check every range before any draw happens
 */
export function assertRanges(ranges: VoidRanges): void {
  const violations: string[] = [];
  for (const key of VOID_RANGE_KEYS) {
    const [min, max] = ranges[key];
    if (!Number.isFinite(min) || !Number.isFinite(max)) {
      violations.push(`void.${key}: bounds must be finite numbers`);
    } else if (min > max) {
      violations.push(`void.${key}: min ${min} is greater than max ${max}`);
    }
  }
  if (ranges.growthRateRange[0] < 1) {
    violations.push(`void.growthRateRange: growth rate must be at least 1, got ${ranges.growthRateRange[0]}`);
  }
  if (ranges.upwardMovementRange[0] < 0) {
    violations.push('void.upwardMovementRange: upward movement must not be negative');
  }
  if (violations.length > 0) {
    throw new ConfigurationError(violations);
  }
}

function draw(rng: RandomSource, range: Range): number {
  const [min, max] = range;
  return rng.uniform(min, max);
}

/**
 * Draw the initial parameters of one sequence.
 *
 * A fresh random source seeded with `sequenceSeed` is created for every call,
 * so the same seed always yields the same parameters. Draws happen in
 * VOID_RANGE_KEYS order.
 *
 * @throws ConfigurationError when a range is inverted
 */
export function sampleInitial(
  sequenceSeed: number,
  ranges: VoidRanges,
  extent: SamplingExtent
): VoidInitialParameters {
  assertRanges(ranges);

  const rng = createRandomSource(sequenceSeed);
  // Property order fixes the draw order
  const draws: Record<VoidRangeKey, number> = {
    initialXPositionRange: draw(rng, ranges.initialXPositionRange),
    initialYPositionRange: draw(rng, ranges.initialYPositionRange),
    initialDepthRange: draw(rng, ranges.initialDepthRange),
    initialSizeXRange: draw(rng, ranges.initialSizeXRange),
    initialSizeYRange: draw(rng, ranges.initialSizeYRange),
    initialSizeZRange: draw(rng, ranges.initialSizeZRange),
    growthRateRange: draw(rng, ranges.growthRateRange),
    upwardMovementRange: draw(rng, ranges.upwardMovementRange),
  };

  const params =
    ranges.units === 'ratio' ? resolveRatios(draws, extent) : resolveAbsolute(draws);

  log(
    'seed %d: center=(%d, %d) depth=%d growth<=%d rise<=%d',
    sequenceSeed,
    params.centerX,
    params.centerY,
    params.initialDepth,
    params.maxGrowthRate,
    params.maxUpwardMovement
  );

  return Object.freeze({
    seed: sequenceSeed,
    units: ranges.units,
    draws: Object.freeze(draws),
    ...params,
  });
}

type ResolvedParameters = Omit<VoidInitialParameters, 'seed' | 'units' | 'draws'>;

/** Ratios of the domain (x, y) and of the road depth (depth, size z) */
function resolveRatios(draws: Record<VoidRangeKey, number>, extent: SamplingExtent): ResolvedParameters {
  const initialDepth = draws.initialDepthRange * extent.roadDepth;
  return {
    centerX: draws.initialXPositionRange * extent.domainX,
    centerY: draws.initialYPositionRange * extent.domainY,
    initialDepth,
    sizeX: draws.initialSizeXRange * extent.domainX,
    sizeY: draws.initialSizeYRange * extent.domainY,
    sizeZ: draws.initialSizeZRange * extent.roadDepth,
    maxGrowthRate: draws.growthRateRange,
    // Upward movement is a fraction of the initial depth
    maxUpwardMovement: draws.upwardMovementRange * initialDepth,
  };
}

function resolveAbsolute(draws: Record<VoidRangeKey, number>): ResolvedParameters {
  return {
    centerX: draws.initialXPositionRange,
    centerY: draws.initialYPositionRange,
    initialDepth: draws.initialDepthRange,
    sizeX: draws.initialSizeXRange,
    sizeY: draws.initialSizeYRange,
    sizeZ: draws.initialSizeZRange,
    maxGrowthRate: draws.growthRateRange,
    maxUpwardMovement: draws.upwardMovementRange,
  };
}
