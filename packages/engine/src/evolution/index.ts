/**
 * Void evolution model
 *
 * Maps (initial parameters, stage, total stages) to the void geometry at
 * that stage. Pure: nothing is cached between calls, so any stage can be
 * evaluated on its own.
 *
 *   progress   = stage / (totalStages - 1), or 0 for a single stage
 *   growth     = 1 + progress^1.5 · (maxGrowthRate - 1)
 *   size x, y  = initial · growth
 *   size z     = initial · growth^0.8   (vertical growth is damped)
 *   depth      = initialDepth - progress · maxUpwardMovement
 */

import { GROWTH_EXPONENT, VERTICAL_GROWTH_EXPONENT } from '@roadvoid/shared';
import type { VoidInitialParameters, VoidState } from '../api/index.js';

/**
 * Normalized progress of a stage in [0, 1]
 */
export function progressAt(stage: number, totalStages: number): number {
  if (!Number.isInteger(totalStages) || totalStages < 1) {
    throw new RangeError(`totalStages must be a positive integer, got ${totalStages}`);
  }
  if (!Number.isInteger(stage) || stage < 0 || stage >= totalStages) {
    throw new RangeError(`stage must be an integer in [0, ${totalStages - 1}], got ${stage}`);
  }
  return totalStages > 1 ? stage / (totalStages - 1) : 0;
}

/**
 * Growth multiplier at a given progress. Super-linear: 1 at progress 0,
 * maxGrowthRate at progress 1.
 */
export function growthRateAt(progress: number, maxGrowthRate: number): number {
  return 1 + Math.pow(progress, GROWTH_EXPONENT) * (maxGrowthRate - 1);
}

/**
 * Void geometry at one stage
 */
export function evolve(
  initial: VoidInitialParameters,
  stage: number,
  totalStages: number
): VoidState {
  const progress = progressAt(stage, totalStages);
  const growthRate = growthRateAt(progress, initial.maxGrowthRate);
  const depth = initial.initialDepth - progress * initial.maxUpwardMovement;

  return Object.freeze({
    stage,
    progress,
    growthRate,
    center: Object.freeze({ x: initial.centerX, y: initial.centerY, z: depth }),
    size: Object.freeze({
      x: initial.sizeX * growthRate,
      y: initial.sizeY * growthRate,
      z: initial.sizeZ * Math.pow(growthRate, VERTICAL_GROWTH_EXPONENT),
    }),
  });
}

/**
 * Every stage of a sequence, in order
 */
export function evolveSequence(initial: VoidInitialParameters, totalStages: number): VoidState[] {
  if (!Number.isInteger(totalStages) || totalStages < 1) {
    throw new RangeError(`totalStages must be a positive integer, got ${totalStages}`);
  }
  const states: VoidState[] = [];
  for (let stage = 0; stage < totalStages; stage++) {
    states.push(evolve(initial, stage, totalStages));
  }
  return states;
}
