/**
 * Unit tests for @roadvoid/shared utils
 */

import { describe, it, expect } from 'vitest';
import {
  formatNumber,
  formatFixed,
  zeroPad,
  scenarioStem,
  scenarioFileName,
} from './index.js';

// ============================================================================
// formatNumber
// ============================================================================

describe('formatNumber', () => {
  it('keeps a decimal point on integral values', () => {
    expect(formatNumber(2)).toBe('2.0');
    expect(formatNumber(0)).toBe('0.0');
    expect(formatNumber(-3)).toBe('-3.0');
  });

  it('removes binary noise', () => {
    expect(formatNumber(0.1 + 0.2)).toBe('0.3');
    expect(formatNumber(0.3 + 0.3)).toBe('0.6');
  });

  it('keeps at least six significant digits', () => {
    expect(formatNumber(0.123456789)).toBe('0.123456789');
    expect(formatNumber(1.0000001)).toBe('1.0000001');
  });

  it('writes small values in exponent form', () => {
    expect(formatNumber(50 * 1e-9)).toBe('5e-8');
  });

  it('normalizes negative zero', () => {
    expect(formatNumber(-0)).toBe('0.0');
  });

  it('rejects non-finite values', () => {
    expect(() => formatNumber(Number.NaN)).toThrow(RangeError);
    expect(() => formatNumber(Infinity)).toThrow(RangeError);
  });
});

describe('formatFixed', () => {
  it('rounds to the requested decimals', () => {
    expect(formatFixed(0.456)).toBe('0.46');
    expect(formatFixed(1.2, 3)).toBe('1.200');
  });
});

// ============================================================================
// File naming
// ============================================================================

describe('scenario file names', () => {
  it('pads sequence and stage', () => {
    expect(zeroPad(7, 3)).toBe('007');
    expect(scenarioStem(3, 7)).toBe('seq_0003_stage_07');
    expect(scenarioFileName(12, 4)).toBe('seq_0012_stage_04.in');
  });

  it('does not truncate wide values', () => {
    expect(scenarioFileName(12345, 123)).toBe('seq_12345_stage_123.in');
  });
});
