/**
 * Physical units and conversions for GPR survey settings
 */

import {
  SPEED_OF_LIGHT,
  CELLS_PER_WAVELENGTH,
  hz,
  seconds,
  type Hertz,
  type Seconds,
} from '@roadvoid/shared';

// ============================================================================
// Unit Conversions
// ============================================================================

/**
 * Convert megahertz to hertz
 */
export function mhzToHz(frequency: number): Hertz {
  return hz(frequency * 1e6);
}

/**
 * Convert nanoseconds to seconds
 */
export function nsToSeconds(time: number): Seconds {
  return seconds(time * 1e-9);
}

/**
 * Convert seconds to nanoseconds
 */
export function secondsToNs(time: Seconds | number): number {
  return time * 1e9;
}

// ============================================================================
// Wave Propagation in Layered Media
// ============================================================================

/**
 * Propagation velocity in a low-loss medium (m/s)
 * v = c / sqrt(εr · μr)
 * @param permittivity - Relative permittivity εr
 * @param permeability - Relative permeability μr
 */
export function waveVelocity(permittivity: number, permeability = 1): number {
  return SPEED_OF_LIGHT / Math.sqrt(permittivity * permeability);
}

/**
 * Wavelength in a medium (m)
 * @param frequencyHz - Frequency in Hz
 * @param permittivity - Relative permittivity εr
 * @param permeability - Relative permeability μr
 */
export function wavelengthInMedium(
  frequencyHz: number,
  permittivity: number,
  permeability = 1
): number {
  return waveVelocity(permittivity, permeability) / frequencyHz;
}

/**
 * Time for a pulse to reach a depth and return (s)
 */
export function twoWayTravelTime(depth: number, permittivity: number, permeability = 1): Seconds {
  return seconds((2 * depth) / waveVelocity(permittivity, permeability));
}

/** Minimal description of a medium for propagation estimates */
export interface Medium {
  permittivity: number;
  permeability: number;
}

/**
 * Shortest wavelength among a set of media (m)
 */
export function shortestWavelength(frequencyHz: number, media: readonly Medium[]): number {
  if (media.length === 0) {
    throw new RangeError('At least one medium is required');
  }
  return Math.min(
    ...media.map((m) => wavelengthInMedium(frequencyHz, m.permittivity, m.permeability))
  );
}

/**
 * Largest cell size that keeps CELLS_PER_WAVELENGTH cells per shortest
 * wavelength (m)
 */
export function maxCellSize(frequencyHz: number, media: readonly Medium[]): number {
  return shortestWavelength(frequencyHz, media) / CELLS_PER_WAVELENGTH;
}
