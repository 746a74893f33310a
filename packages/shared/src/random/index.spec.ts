import { describe, it, expect } from 'vitest';
import { createRandomSource, mulberry32 } from './index.js';

describe('mulberry32', () => {
  it('is deterministic for a seed', () => {
    const a = mulberry32(42);
    const b = mulberry32(42);
    const seqA = [a(), a(), a(), a()];
    const seqB = [b(), b(), b(), b()];
    expect(seqA).toEqual(seqB);
  });

  it('differs across seeds', () => {
    expect(mulberry32(1)()).not.toBe(mulberry32(2)());
  });

  it('stays in [0, 1)', () => {
    const next = mulberry32(7);
    for (let i = 0; i < 1000; i++) {
      const v = next();
      expect(v).toBeGreaterThanOrEqual(0);
      expect(v).toBeLessThan(1);
    }
  });
});

describe('createRandomSource', () => {
  it('draws uniform values inside the range', () => {
    const rng = createRandomSource(3);
    for (let i = 0; i < 200; i++) {
      const v = rng.uniform(0.2, 0.4);
      expect(v).toBeGreaterThanOrEqual(0.2);
      expect(v).toBeLessThan(0.4);
    }
  });

  it('returns the bound for an empty range', () => {
    const rng = createRandomSource(3);
    expect(rng.uniform(0.5, 0.5)).toBe(0.5);
  });

  it('independent sources with the same seed agree', () => {
    const first = createRandomSource(11);
    const other = createRandomSource(99);
    other.next();
    other.next();
    const second = createRandomSource(11);
    expect(first.next()).toBe(second.next());
    expect(first.seed).toBe(11);
  });

  it('rejects non-integer seeds', () => {
    expect(() => createRandomSource(1.5)).toThrow(RangeError);
  });
});
