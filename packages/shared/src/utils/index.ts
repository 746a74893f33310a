/**
 * Shared utility functions
 */

import { SCENARIO_EXTENSION, SCENARIO_SIGNIFICANT_DIGITS } from '../constants/index.js';

// ============================================================================
// Number Formatting
// ============================================================================

/**
 * Format a number for a scenario file.
 *
 * Values are rounded to 12 significant digits, which removes binary noise
 * such as 0.30000000000000004 while keeping far more precision than any grid
 * step. Integral values keep a trailing ".0" (e.g. 2 -> "2.0").
 */
export function formatNumber(value: number, digits = SCENARIO_SIGNIFICANT_DIGITS): string {
  if (!Number.isFinite(value)) {
    throw new RangeError(`Cannot format non-finite number ${value}`);
  }
  const rounded = Number(value.toPrecision(digits));
  // Normalize -0
  const normalized = rounded === 0 ? 0 : rounded;
  if (Number.isInteger(normalized) && Math.abs(normalized) < 1e21) {
    return normalized.toFixed(1);
  }
  return normalized.toString();
}

/**
 * Format with a fixed number of decimals, for human-readable output
 */
export function formatFixed(value: number, decimals = 2): string {
  return value.toFixed(decimals);
}

// ============================================================================
// File Naming
// ============================================================================

/**
 * Left-pad a non-negative integer with zeros
 */
export function zeroPad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

/**
 * Base name (without extension) of the scenario for a sequence stage,
 * e.g. `seq_0003_stage_07`
 */
export function scenarioStem(sequenceId: number, stage: number): string {
  return `seq_${zeroPad(sequenceId, 4)}_stage_${zeroPad(stage, 2)}`;
}

/**
 * Scenario file name for a sequence stage, e.g. `seq_0003_stage_07.in`
 */
export function scenarioFileName(sequenceId: number, stage: number): string {
  return `${scenarioStem(sequenceId, stage)}${SCENARIO_EXTENSION}`;
}
