import { describe, it, expect } from 'vitest';
import { evolve, evolveSequence, growthRateAt, progressAt } from '../src/evolution/index.js';
import type { VoidInitialParameters } from '../src/api/index.js';

function initial(overrides: Partial<VoidInitialParameters> = {}): VoidInitialParameters {
  return {
    seed: 0,
    units: 'absolute',
    draws: {
      initialXPositionRange: 1,
      initialYPositionRange: 0.5,
      initialDepthRange: 0.6,
      initialSizeXRange: 0.2,
      initialSizeYRange: 0.1,
      initialSizeZRange: 0.05,
      growthRateRange: 3,
      upwardMovementRange: 0.4,
    },
    centerX: 1,
    centerY: 0.5,
    initialDepth: 0.6,
    sizeX: 0.2,
    sizeY: 0.1,
    sizeZ: 0.05,
    maxGrowthRate: 3,
    maxUpwardMovement: 0.4,
    ...overrides,
  };
}

describe('progressAt', () => {
  it('spans [0, 1] over the stages', () => {
    expect(progressAt(0, 5)).toBe(0);
    expect(progressAt(2, 5)).toBe(0.5);
    expect(progressAt(4, 5)).toBe(1);
  });

  it('is 0 for a single-stage sequence', () => {
    expect(progressAt(0, 1)).toBe(0);
  });

  it('rejects stages outside the sequence', () => {
    expect(() => progressAt(5, 5)).toThrow(RangeError);
    expect(() => progressAt(-1, 5)).toThrow(RangeError);
    expect(() => progressAt(1.5, 5)).toThrow(RangeError);
    expect(() => progressAt(0, 0)).toThrow(RangeError);
  });
});

describe('growthRateAt', () => {
  it('accelerates super-linearly', () => {
    expect(growthRateAt(0, 3)).toBe(1);
    expect(growthRateAt(1, 3)).toBe(3);
    expect(growthRateAt(0.25, 3)).toBeCloseTo(1.25, 12);
  });
});

describe('evolve', () => {
  it('starts at the initial pose for any sequence length', () => {
    for (const total of [2, 5, 10]) {
      const state = evolve(initial(), 0, total);
      expect(state.growthRate).toBe(1);
      expect(state.center.z).toBe(0.6);
      expect(state.size).toEqual({ x: 0.2, y: 0.1, z: 0.05 });
    }
  });

  it('reaches the maximum growth rate at the final stage', () => {
    for (const total of [2, 5, 10]) {
      const state = evolve(initial(), total - 1, total);
      expect(state.growthRate).toBeCloseTo(3, 12);
      expect(state.center.z).toBeCloseTo(0.2, 12);
    }
  });

  it('damps vertical growth', () => {
    const state = evolve(initial(), 4, 5);
    expect(state.size.x).toBeCloseTo(0.6, 12);
    expect(state.size.y).toBeCloseTo(0.3, 12);
    expect(state.size.z).toBeCloseTo(0.05 * Math.pow(3, 0.8), 12);
  });

  it('keeps the lateral center fixed', () => {
    const state = evolve(initial(), 3, 5);
    expect(state.center.x).toBe(1);
    expect(state.center.y).toBe(0.5);
  });

  it('never deepens the void over a sequence', () => {
    for (const rise of [0, 0.1, 0.4]) {
      const depths = evolveSequence(initial({ maxUpwardMovement: rise }), 8).map((s) => s.center.z);
      for (let i = 1; i < depths.length; i++) {
        expect(depths[i]).toBeLessThanOrEqual(depths[i - 1]);
      }
    }
  });

  it('handles a single-stage sequence', () => {
    const state = evolve(initial(), 0, 1);
    expect(state.progress).toBe(0);
    expect(state.growthRate).toBe(1);
  });

  it('returns frozen states', () => {
    const state = evolve(initial(), 1, 5);
    expect(Object.isFrozen(state)).toBe(true);
    expect(Object.isFrozen(state.center)).toBe(true);
  });
});

describe('evolveSequence', () => {
  it('evaluates every stage in order', () => {
    const states = evolveSequence(initial(), 4);
    expect(states.map((s) => s.stage)).toEqual([0, 1, 2, 3]);
    expect(states[2]).toEqual(evolve(initial(), 2, 4));
  });

  it('rejects an empty sequence', () => {
    expect(() => evolveSequence(initial(), 0)).toThrow(RangeError);
  });
});
