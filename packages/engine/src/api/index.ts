/**
 * Engine API - types shared by the sampler, evolution model, scene composer
 * and scenario builder
 */

import type {
  GeometryPolicy,
  Polarisation,
  SceneWarning,
  VerticalFrameKind,
  VoidRangeUnits,
  VoidShape,
  WaveformShape,
} from '@roadvoid/shared';
import type {
  Box3D,
  DomainSpec,
  Material,
  Point3D,
  RoadCrossSection,
  VoidConfig,
  VoidRangeKey,
} from '@roadvoid/core';

// ============================================================================
// Void Parameters
// ============================================================================

/** Sampling ranges for one sequence */
export type VoidRanges = Pick<VoidConfig, 'units' | VoidRangeKey>;

/** Extents that ratio draws are resolved against */
export interface SamplingExtent {
  domainX: number;
  domainY: number;
  /** Road depth below the surface, air excluded */
  roadDepth: number;
}

/**
 * Initial void parameters, drawn once per sequence and frozen.
 * All absolute values are in meters, depths measured below the road surface.
 */
export interface VoidInitialParameters {
  readonly seed: number;
  readonly units: VoidRangeUnits;
  /** Raw draws in the configured units, keyed by range name */
  readonly draws: Readonly<Record<VoidRangeKey, number>>;
  readonly centerX: number;
  readonly centerY: number;
  readonly initialDepth: number;
  readonly sizeX: number;
  readonly sizeY: number;
  readonly sizeZ: number;
  /** Growth multiplier reached at the final stage (>= 1) */
  readonly maxGrowthRate: number;
  /** Total rise toward the surface over the sequence (>= 0) */
  readonly maxUpwardMovement: number;
}

/** Void geometry at one stage. center.z is the depth below the road surface. */
export interface VoidState {
  readonly stage: number;
  readonly progress: number;
  readonly growthRate: number;
  readonly center: Readonly<Point3D>;
  readonly size: Readonly<Point3D>;
}

// ============================================================================
// Scene Types
// ============================================================================

/** B-scan settings */
export interface ScanSettings {
  numTraces: number;
  startXRatio: number;
  endXRatio: number;
}

/** Antenna path in solver coordinates */
export interface ScanPath {
  start: Point3D;
  end: Point3D;
  step: Point3D;
  stepSize: number;
  length: number;
  numTraces: number;
  /** True when the path collapses to a single position */
  degenerate: boolean;
}

/** Source waveform and survey timing */
export interface SourceSettings {
  waveform: WaveformShape;
  amplitude: number;
  frequencyHz: number;
  polarisation: Polarisation;
  timeWindowSeconds: number;
}

/** Everything a scene needs besides the void state */
export interface SceneSettings {
  domain: DomainSpec;
  crossSection: RoadCrossSection;
  voidMaterial: Material;
  shape: VoidShape;
  scan: ScanSettings;
  source: SourceSettings;
  frame: VerticalFrameKind;
  geometryPolicy: GeometryPolicy;
  geometryView: boolean;
}

/** Input to composeScene */
export interface ComposeSceneInput extends SceneSettings {
  voidState: VoidState;
  /** Stem used for the geometry preview file, e.g. seq_0000_stage_00 */
  label: string;
}

/** Layer box in solver coordinates */
export interface LayerPrimitive {
  name: string;
  material: string;
  box: Box3D;
}

/** Void primitive in solver coordinates */
export type VoidPrimitive =
  | { kind: 'box'; material: string; box: Box3D }
  | { kind: 'cylinder'; material: string; start: Point3D; end: Point3D; radius: number };

/** Geometry preview request */
export interface GeometryView {
  box: Box3D;
  resolution: number;
  fileName: string;
}

/** Fully resolved scene, ready for serialization */
export interface ComposedScene {
  title: string;
  label: string;
  frame: VerticalFrameKind;
  /** Constant added to every depth before emission */
  offset: number;
  domain: DomainSpec;
  materials: Material[];
  layers: LayerPrimitive[];
  void: VoidPrimitive;
  voidState: VoidState;
  source: SourceSettings & { position: Point3D };
  receiver: Point3D;
  scan: ScanPath;
  geometryView: GeometryView | null;
  warnings: SceneWarning[];
}
