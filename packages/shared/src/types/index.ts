/**
 * Shared type definitions
 */

// ============================================================================
// Unit Types (Branded for type safety)
// ============================================================================

/** Time in seconds */
export type Seconds = number & { readonly __brand: 'Seconds' };

/** Frequency in Hz */
export type Hertz = number & { readonly __brand: 'Hertz' };

// ============================================================================
// Scene Options
// ============================================================================

/**
 * Vertical reference frame of the emitted scenario.
 *
 * - 'surface-relative': z grows with depth below the road surface, shifted by
 *   the air thickness so that the air layer starts at z = 0
 * - 'depth-from-bottom': z = 0 is the subgrade floor and z grows upward
 */
export type VerticalFrameKind = 'surface-relative' | 'depth-from-bottom';

/** What to do when a void escapes the road extent */
export type GeometryPolicy = 'ignore' | 'warn' | 'clamp' | 'reject';

/** Void primitive emitted into the scenario */
export type VoidShape = 'box' | 'cylinder';

/** How void parameter ranges are expressed */
export type VoidRangeUnits = 'ratio' | 'absolute';

/** Source waveform shapes understood by the solver */
export type WaveformShape = 'ricker' | 'gaussian' | 'gaussiandot';

/** Dipole polarisation axis */
export type Polarisation = 'x' | 'y' | 'z';

// ============================================================================
// Warning Types
// ============================================================================

/** Warning severity levels */
export type WarningSeverity = 'info' | 'warning';

/** Non-fatal finding raised while composing a scene */
export interface SceneWarning {
  code: string;
  message: string;
  severity: WarningSeverity;
  context?: Record<string, unknown>;
}

// ============================================================================
// Helper creators
// ============================================================================

/** Create a branded Seconds value */
export function seconds(value: number): Seconds {
  return value as Seconds;
}

/** Create a branded Hertz value */
export function hz(value: number): Hertz {
  return value as Hertz;
}
