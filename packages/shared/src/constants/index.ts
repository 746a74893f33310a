/**
 * Physical and application constants
 */

// ============================================================================
// Physical Constants
// ============================================================================

/** Speed of light in vacuum (m/s) */
export const SPEED_OF_LIGHT = 299_792_458;

// ============================================================================
// Calculation Constants
// ============================================================================

/** Geometry epsilon for extent checks and comparisons (m) */
export const GEOMETRY_EPSILON = 0.001;

/** Significant digits used when writing numbers into scenario files */
export const SCENARIO_SIGNIFICANT_DIGITS = 12;

/** Cells per shortest wavelength the solver needs for a stable grid */
export const CELLS_PER_WAVELENGTH = 10;

/** Exponent of the super-linear growth law */
export const GROWTH_EXPONENT = 1.5;

/** Damping exponent applied to vertical growth */
export const VERTICAL_GROWTH_EXPONENT = 0.8;

// ============================================================================
// Road Layers
// ============================================================================

/** Road cross-section layers, top to bottom */
export const LAYER_NAMES = [
  'air',
  'surface_asphalt',
  'base_asphalt',
  'upper_subbase',
  'lower_subbase',
  'subgrade',
] as const;

/** Name of a road layer */
export type LayerName = (typeof LAYER_NAMES)[number];

/** Material identifier of the void */
export const VOID_MATERIAL = 'void';

/** Conductivity (S/m) used when a material is configured by permittivity alone */
export const DEFAULT_CONDUCTIVITY: Readonly<Record<LayerName | typeof VOID_MATERIAL, number>> = {
  air: 0,
  surface_asphalt: 0.01,
  base_asphalt: 0.01,
  upper_subbase: 0.02,
  lower_subbase: 0.02,
  subgrade: 0.05,
  void: 0,
};

// ============================================================================
// Files & Environment
// ============================================================================

/** Extension of scenario files read by the solver */
export const SCENARIO_EXTENSION = '.in';

/** Manifest file written next to the scenario files */
export const MANIFEST_FILE_NAME = 'metadata.yaml';

/** Configuration file used when no path is given */
export const DEFAULT_CONFIG_PATH = 'config/simulation.yaml';

/** Environment variable naming the configuration file */
export const CONFIG_PATH_ENV = 'ROADVOID_CONFIG';

/** Environment variable overriding the output directory */
export const OUTPUT_DIR_ENV = 'ROADVOID_OUTPUT_DIR';

/** Identifier of the source waveform inside a scenario */
export const WAVEFORM_ID = 'my_pulse';
