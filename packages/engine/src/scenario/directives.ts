/**
 * Typed scenario directives, one record per line of the solver input
 */

import type { Polarisation, WaveformShape } from '@roadvoid/shared';
import type { Box3D, Point3D } from '@roadvoid/core';

export type TitleDirective = { keyword: 'title'; text: string };
export type DomainDirective = { keyword: 'domain'; size: Point3D };
export type DiscretizationDirective = { keyword: 'dx_dy_dz'; step: Point3D };
export type TimeWindowDirective = { keyword: 'time_window'; seconds: number };

export type MaterialDirective = {
  keyword: 'material';
  permittivity: number;
  conductivity: number;
  permeability: number;
  magneticLoss: number;
  name: string;
};

export type BoxDirective = { keyword: 'box'; box: Box3D; material: string };

export type CylinderDirective = {
  keyword: 'cylinder';
  start: Point3D;
  end: Point3D;
  radius: number;
  material: string;
};

export type WaveformDirective = {
  keyword: 'waveform';
  shape: WaveformShape;
  amplitude: number;
  frequency: number;
  id: string;
};

export type HertzianDipoleDirective = {
  keyword: 'hertzian_dipole';
  polarisation: Polarisation;
  position: Point3D;
  waveform: string;
};

export type ReceiverDirective = { keyword: 'rx'; position: Point3D };
export type SourceStepsDirective = { keyword: 'src_steps'; step: Point3D };
export type ReceiverStepsDirective = { keyword: 'rx_steps'; step: Point3D };

export type GeometryViewDirective = {
  keyword: 'geometry_view';
  box: Box3D;
  resolution: Point3D;
  fileName: string;
  /** 'n' for a per-cell view, 'f' for a fine per-edge view */
  mode: 'n' | 'f';
};

export type Directive =
  | TitleDirective
  | DomainDirective
  | DiscretizationDirective
  | TimeWindowDirective
  | MaterialDirective
  | BoxDirective
  | CylinderDirective
  | WaveformDirective
  | HertzianDipoleDirective
  | ReceiverDirective
  | SourceStepsDirective
  | ReceiverStepsDirective
  | GeometryViewDirective;

export type DirectiveKeyword = Directive['keyword'];

/** Every keyword the solver recognizes, in the order a document lists them */
export const DIRECTIVE_KEYWORDS: readonly DirectiveKeyword[] = [
  'title',
  'domain',
  'dx_dy_dz',
  'time_window',
  'material',
  'box',
  'cylinder',
  'waveform',
  'hertzian_dipole',
  'rx',
  'src_steps',
  'rx_steps',
  'geometry_view',
];

/** Serialized scenario: an ordered, immutable directive list */
export interface ScenarioDocument {
  readonly directives: readonly Directive[];
}

/** Geometry primitives that reference a material */
export type PrimitiveDirective = BoxDirective | CylinderDirective;

export function isPrimitive(directive: Directive): directive is PrimitiveDirective {
  return directive.keyword === 'box' || directive.keyword === 'cylinder';
}

export function isDirectiveKeyword(value: string): value is DirectiveKeyword {
  return DIRECTIVE_KEYWORDS.some((keyword) => keyword === value);
}
