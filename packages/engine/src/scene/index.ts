/**
 * Scene composer
 *
 * Places the layered road, the void and the B-scan antenna path into solver
 * coordinates. All arithmetic happens on depths below the road surface; the
 * vertical frame is applied once per primitive, so the same offset reaches
 * layer boundaries, void bounds, antenna and receiver heights and the
 * geometry preview.
 */

import createDebug from 'debug';
import {
  ConfigurationError,
  GeometryError,
  formatFixed,
  type GeometryPolicy,
  type SceneWarning,
  type VoidShape,
} from '@roadvoid/shared';
import {
  boxCenter,
  boxContains,
  boxFromCenter,
  boxSize,
  createVerticalFrame,
  crossSectionFromConfig,
  domainFromConfig,
  intersectBoxes,
  layerIntervals,
  maxCellSize,
  mhzToHz,
  nsToSeconds,
  twoWayTravelTime,
  voidMaterialFromConfig,
  type Box3D,
  type DomainSpec,
  type SimulationConfig,
  type VerticalFrame,
} from '@roadvoid/core';
import type {
  ComposeSceneInput,
  ComposedScene,
  LayerPrimitive,
  SamplingExtent,
  ScanPath,
  ScanSettings,
  SceneSettings,
  VoidPrimitive,
  VoidState,
} from '../api/index.js';

const log = createDebug('roadvoid:scene');

// ============================================================================
// Settings
// ============================================================================

/**
 * Resolve everything a scene needs from a validated configuration
 */
export function sceneSettingsFromConfig(config: SimulationConfig): SceneSettings {
  const crossSection = crossSectionFromConfig(config);
  return {
    domain: domainFromConfig(config, crossSection),
    crossSection,
    voidMaterial: voidMaterialFromConfig(config),
    shape: config.void.shape,
    scan: {
      numTraces: config.gpr.numTraces,
      startXRatio: config.gpr.scanStartXRatio,
      endXRatio: config.gpr.scanEndXRatio,
    },
    source: {
      waveform: config.gpr.waveform,
      amplitude: 1,
      frequencyHz: mhzToHz(config.gpr.frequency),
      polarisation: config.gpr.polarisation,
      timeWindowSeconds: nsToSeconds(config.gpr.timeWindow),
    },
    frame: config.scene.frame,
    geometryPolicy: config.scene.geometryPolicy,
    geometryView: config.scene.geometryView,
  };
}

/**
 * Extents the sampler resolves ratio draws against
 */
export function samplingExtentOf(settings: Pick<SceneSettings, 'domain' | 'crossSection'>): SamplingExtent {
  return {
    domainX: settings.domain.sizeX,
    domainY: settings.domain.sizeY,
    roadDepth: settings.crossSection.roadDepth,
  };
}

// ============================================================================
// Scan Path
// ============================================================================

/**
 * Antenna path along x at half the domain width, at the road surface.
 *
 * @param surfaceZ - Solver z of the road surface
 * @throws ConfigurationError for a trace count below one or inverted ratios
 */
export function computeScanPath(
  domain: Pick<DomainSpec, 'sizeX' | 'sizeY'>,
  surfaceZ: number,
  scan: ScanSettings
): { path: ScanPath; warnings: SceneWarning[] } {
  const violations: string[] = [];
  if (!Number.isInteger(scan.numTraces) || scan.numTraces < 1) {
    violations.push(`gpr.numTraces must be an integer >= 1, got ${scan.numTraces}`);
  }
  for (const [name, ratio] of [
    ['gpr.scanStartXRatio', scan.startXRatio],
    ['gpr.scanEndXRatio', scan.endXRatio],
  ] as const) {
    if (!(ratio >= 0 && ratio <= 1)) {
      violations.push(`${name} must lie in [0, 1], got ${ratio}`);
    }
  }
  if (scan.endXRatio < scan.startXRatio) {
    violations.push(
      `gpr.scanEndXRatio (${scan.endXRatio}) is smaller than gpr.scanStartXRatio (${scan.startXRatio})`
    );
  }
  if (violations.length > 0) {
    throw new ConfigurationError(violations);
  }

  const startX = scan.startXRatio * domain.sizeX;
  const endX = scan.endXRatio * domain.sizeX;
  const y = domain.sizeY / 2;
  const length = endX - startX;
  const stepSize = scan.numTraces > 1 ? length / (scan.numTraces - 1) : 0;

  const warnings: SceneWarning[] = [];
  if (scan.numTraces === 1) {
    warnings.push({
      code: 'single-trace-scan',
      severity: 'warning',
      message: 'Scan has a single trace; the scenario records one A-scan at the start position',
    });
  } else if (length === 0) {
    warnings.push({
      code: 'zero-length-scan',
      severity: 'warning',
      message: `Scan start and end coincide at x = ${startX}; all ${scan.numTraces} traces share one position`,
    });
  }

  return {
    path: {
      start: { x: startX, y, z: surfaceZ },
      end: { x: scan.numTraces > 1 ? endX : startX, y, z: surfaceZ },
      step: { x: stepSize, y: 0, z: 0 },
      stepSize,
      length: scan.numTraces > 1 ? length : 0,
      numTraces: scan.numTraces,
      degenerate: scan.numTraces === 1 || length === 0,
    },
    warnings,
  };
}

// ============================================================================
// Void Bounds
// ============================================================================

function describeBox(box: Box3D): string {
  const span = (a: number, b: number) => `[${formatFixed(a, 3)}, ${formatFixed(b, 3)}]`;
  return `x ${span(box.min.x, box.max.x)}, y ${span(box.min.y, box.max.y)}, depth ${span(box.min.z, box.max.z)}`;
}

/**
 * Bounding volume of the void in the depth frame (z = depth below surface)
 */
export function voidBounds(state: VoidState, shape: VoidShape): Box3D {
  if (shape === 'cylinder') {
    const diameter = Math.min(state.size.x, state.size.y);
    return boxFromCenter(state.center, { x: diameter, y: diameter, z: state.size.z });
  }
  return boxFromCenter(state.center, state.size);
}

/**
 * Road extent in the depth frame: the full domain footprint, from the
 * surface down to the subgrade floor
 */
export function roadExtent(domain: Pick<DomainSpec, 'sizeX' | 'sizeY'>, roadDepth: number): Box3D {
  return { min: { x: 0, y: 0, z: 0 }, max: { x: domain.sizeX, y: domain.sizeY, z: roadDepth } };
}

/**
 * Check the void against the road extent and apply the policy.
 *
 * @returns The (possibly clipped) bounds and any warnings
 * @throws GeometryError under 'reject', or under 'clamp' when nothing is left
 */
export function applyGeometryPolicy(
  bounds: Box3D,
  extent: Box3D,
  policy: GeometryPolicy
): { bounds: Box3D; warnings: SceneWarning[] } {
  if (policy === 'ignore' || boxContains(extent, bounds)) {
    return { bounds, warnings: [] };
  }

  const detail = `void ${describeBox(bounds)} exceeds road extent ${describeBox(extent)}`;
  switch (policy) {
    case 'warn':
      return {
        bounds,
        warnings: [
          { code: 'void-out-of-bounds', severity: 'warning', message: `Unchecked geometry: ${detail}`, context: { bounds, extent } },
        ],
      };
    case 'reject':
      throw new GeometryError(`Rejected geometry: ${detail}`);
    case 'clamp': {
      const clipped = intersectBoxes(bounds, extent);
      if (!clipped) {
        throw new GeometryError(`Cannot clamp void lying entirely outside the road: ${detail}`);
      }
      return {
        bounds: clipped,
        warnings: [
          { code: 'void-clamped', severity: 'info', message: `Clamped geometry: ${detail}`, context: { bounds, clipped } },
        ],
      };
    }
  }
}

function voidPrimitive(bounds: Box3D, shape: VoidShape, material: string, frame: VerticalFrame): VoidPrimitive {
  if (shape === 'cylinder') {
    const center = boxCenter(bounds);
    const size = boxSize(bounds);
    const z = frame.toSolverInterval(bounds.min.z, bounds.max.z);
    return {
      kind: 'cylinder',
      material,
      start: { x: center.x, y: center.y, z: z.min },
      end: { x: center.x, y: center.y, z: z.max },
      radius: Math.min(size.x, size.y) / 2,
    };
  }
  return { kind: 'box', material, box: frame.toSolverBox(bounds) };
}

// ============================================================================
// Discretization Advisories
// ============================================================================

/**
 * Warn when the grid step or the time window looks too small for the
 * configured materials. Advisory only.
 */
export function checkDiscretization(settings: SceneSettings): SceneWarning[] {
  const warnings: SceneWarning[] = [];
  const { crossSection, domain, source } = settings;
  const media = [...crossSection.layers.map((l) => l.material), settings.voidMaterial];

  const limit = maxCellSize(source.frequencyHz, media);
  if (domain.dx > limit) {
    warnings.push({
      code: 'coarse-discretization',
      severity: 'warning',
      message: `Grid step ${domain.dx} m exceeds ${formatFixed(limit, 4)} m, one tenth of the shortest wavelength`,
      context: { dx: domain.dx, limit },
    });
  }

  const roadLayers = crossSection.layers.filter((l) => l.name !== 'air');
  const travel = Math.max(
    ...roadLayers.map((l) =>
      twoWayTravelTime(crossSection.roadDepth, l.material.permittivity, l.material.permeability)
    )
  );
  if (source.timeWindowSeconds < travel) {
    warnings.push({
      code: 'short-time-window',
      severity: 'warning',
      message: `Time window ${formatFixed(source.timeWindowSeconds * 1e9, 1)} ns is shorter than the ${formatFixed(travel * 1e9, 1)} ns two-way travel time to the road floor`,
      context: { timeWindow: source.timeWindowSeconds, travel },
    });
  }

  return warnings;
}

// ============================================================================
// Scene Composition
// ============================================================================

/**
 * Compose the full scene for one void state. Pure; throws GeometryError or
 * ConfigurationError before anything is serialized.
 */
export function composeScene(input: ComposeSceneInput): ComposedScene {
  const { domain, crossSection, voidState } = input;
  const frame = createVerticalFrame(input.frame, {
    airThickness: crossSection.airThickness,
    totalDepth: crossSection.totalDepth,
  });

  const layers: LayerPrimitive[] = layerIntervals(crossSection).map((interval, i) => {
    const z = frame.toSolverInterval(interval.topDepth, interval.bottomDepth);
    return {
      name: interval.name,
      material: crossSection.layers[i].material.name,
      box: { min: { x: 0, y: 0, z: z.min }, max: { x: domain.sizeX, y: domain.sizeY, z: z.max } },
    };
  });

  const checked = applyGeometryPolicy(
    voidBounds(voidState, input.shape),
    roadExtent(domain, crossSection.roadDepth),
    input.geometryPolicy
  );

  const scan = computeScanPath(domain, frame.surfaceZ, input.scan);
  const warnings = [...checked.warnings, ...scan.warnings];
  for (const w of warnings) {
    log('%s stage %d: %s', input.label, voidState.stage, w.message);
  }

  return {
    title: `Road void evolution stage ${voidState.stage} (B-scan)`,
    label: input.label,
    frame: input.frame,
    offset: frame.offset,
    domain,
    materials: [...crossSection.layers.map((l) => l.material), input.voidMaterial],
    layers,
    void: voidPrimitive(checked.bounds, input.shape, input.voidMaterial.name, frame),
    voidState,
    source: { ...input.source, position: { ...scan.path.start } },
    receiver: { ...scan.path.start },
    scan: scan.path,
    geometryView: input.geometryView
      ? {
          box: { min: { x: 0, y: 0, z: 0 }, max: { x: domain.sizeX, y: domain.sizeY, z: domain.sizeZ } },
          resolution: domain.dx,
          fileName: `${input.label}_geometry`,
        }
      : null,
    warnings,
  };
}
