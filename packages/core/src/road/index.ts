/**
 * Road cross-section and simulation domain
 *
 * Layers are kept top to bottom. Depths are measured below the road surface,
 * so the air layer spans [-airThickness, 0].
 */

import {
  ConfigurationError,
  DEFAULT_CONDUCTIVITY,
  GEOMETRY_EPSILON,
  LAYER_NAMES,
  VOID_MATERIAL,
  type LayerName,
} from '@roadvoid/shared';
import type {
  MaterialInput,
  MaterialsConfig,
  RoadConfig,
  SimulationConfig,
} from '../schema/index.js';

// ============================================================================
// Types
// ============================================================================

/** Electromagnetic material as written to a scenario */
export interface Material {
  name: string;
  permittivity: number;
  conductivity: number;
  permeability: number;
  magneticLoss: number;
}

/** One layer of the cross-section */
export interface RoadLayer {
  name: string;
  thickness: number;
  material: Material;
}

/** Ordered road cross-section */
export interface RoadCrossSection {
  layers: readonly RoadLayer[];
  /** Sum of all thicknesses, air included (m) */
  totalDepth: number;
  airThickness: number;
  /** Road below the surface, air excluded (m) */
  roadDepth: number;
}

/** Depth interval occupied by a layer */
export interface LayerInterval {
  name: string;
  topDepth: number;
  bottomDepth: number;
}

/** Simulation volume and grid step */
export interface DomainSpec {
  sizeX: number;
  sizeY: number;
  sizeZ: number;
  dx: number;
}

// ============================================================================
// Config Key Mapping
// ============================================================================

/** Config keys for each layer */
const LAYER_KEYS: Record<LayerName, { thickness: keyof RoadConfig; material: keyof MaterialsConfig }> = {
  air: { thickness: 'airThickness', material: 'air' },
  surface_asphalt: { thickness: 'surfaceAsphaltThickness', material: 'surfaceAsphalt' },
  base_asphalt: { thickness: 'baseAsphaltThickness', material: 'baseAsphalt' },
  upper_subbase: { thickness: 'upperSubbaseThickness', material: 'upperSubbase' },
  lower_subbase: { thickness: 'lowerSubbaseThickness', material: 'lowerSubbase' },
  subgrade: { thickness: 'subgradeThickness', material: 'subgrade' },
};

// ============================================================================
// Materials
// ============================================================================

/**
 * Resolve a configured material into the four solver properties
 */
export function resolveMaterial(
  name: LayerName | typeof VOID_MATERIAL,
  input: MaterialInput
): Material {
  if (typeof input === 'number') {
    return {
      name,
      permittivity: input,
      conductivity: DEFAULT_CONDUCTIVITY[name],
      permeability: 1,
      magneticLoss: 0,
    };
  }
  return {
    name,
    permittivity: input.permittivity,
    conductivity: input.conductivity ?? DEFAULT_CONDUCTIVITY[name],
    permeability: input.permeability,
    magneticLoss: input.magneticLoss,
  };
}

/**
 * Material of the void
 */
export function voidMaterialFromConfig(config: SimulationConfig): Material {
  return resolveMaterial(VOID_MATERIAL, config.materials.void);
}

// ============================================================================
// Cross-Section
// ============================================================================

/**
 * Build a cross-section from ordered layers.
 * The first layer must be air; thicknesses must be positive and names unique.
 */
export function buildCrossSection(layers: readonly RoadLayer[]): RoadCrossSection {
  const violations: string[] = [];
  const seen = new Set<string>();

  if (layers.length < 2) {
    violations.push('cross-section needs an air layer and at least one road layer');
  } else if (layers[0].name !== 'air') {
    violations.push(`first layer must be air, got ${layers[0].name}`);
  }

  for (const layer of layers) {
    if (!(layer.thickness > 0)) {
      violations.push(`layer ${layer.name}: thickness must be positive, got ${layer.thickness}`);
    }
    if (seen.has(layer.name)) {
      violations.push(`layer ${layer.name}: duplicate layer name`);
    }
    if (layer.material.name === VOID_MATERIAL) {
      violations.push(`layer ${layer.name}: material name "${VOID_MATERIAL}" is reserved`);
    }
    seen.add(layer.name);
  }

  const materialNames = new Set(layers.map((l) => l.material.name));
  if (materialNames.size !== layers.length) {
    violations.push('material names must be unique across layers');
  }

  if (violations.length > 0) {
    throw new ConfigurationError(violations);
  }

  const totalDepth = layers.reduce((sum, layer) => sum + layer.thickness, 0);
  const airThickness = layers[0].thickness;

  return {
    layers: Object.freeze([...layers]),
    totalDepth,
    airThickness,
    roadDepth: totalDepth - airThickness,
  };
}

/**
 * Build the standard six-layer cross-section from configuration
 */
export function crossSectionFromConfig(config: Pick<SimulationConfig, 'road' | 'materials'>): RoadCrossSection {
  return buildCrossSection(
    LAYER_NAMES.map((name) => ({
      name,
      thickness: config.road[LAYER_KEYS[name].thickness],
      material: resolveMaterial(name, config.materials[LAYER_KEYS[name].material]),
    }))
  );
}

/**
 * Depth interval of every layer, top to bottom. Adjacent intervals share
 * their boundary exactly.
 */
export function layerIntervals(section: RoadCrossSection): LayerInterval[] {
  const intervals: LayerInterval[] = [];
  let top = -section.airThickness;
  for (const layer of section.layers) {
    const bottom = layer.name === 'air' ? 0 : top + layer.thickness;
    intervals.push({ name: layer.name, topDepth: top, bottomDepth: bottom });
    top = bottom;
  }
  return intervals;
}

// ============================================================================
// Domain
// ============================================================================

/**
 * Domain from configuration. sizeZ is derived from the cross-section, or
 * checked against it when configured.
 */
export function domainFromConfig(config: SimulationConfig, section: RoadCrossSection): DomainSpec {
  const { sizeX, sizeY, sizeZ } = config.domain;
  if (sizeZ !== undefined && Math.abs(sizeZ - section.totalDepth) > GEOMETRY_EPSILON) {
    throw new ConfigurationError([
      `domain.sizeZ (${sizeZ}) does not match the road cross-section depth (${section.totalDepth})`,
    ]);
  }
  return {
    sizeX,
    sizeY,
    sizeZ: section.totalDepth,
    dx: config.gpr.spatialResolution,
  };
}
