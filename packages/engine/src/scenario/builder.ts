/**
 * Scenario builder - collects directives in solver order and checks that
 * every reference points at something declared earlier
 */

import { ScenarioFormatError, WAVEFORM_ID, type Polarisation, type WaveformShape } from '@roadvoid/shared';
import type { Box3D, Material, Point3D } from '@roadvoid/core';
import type { ComposedScene } from '../api/index.js';
import type { Directive, DirectiveKeyword, ScenarioDocument } from './directives.js';

/** Directives a document cannot do without */
const REQUIRED: readonly DirectiveKeyword[] = ['domain', 'dx_dy_dz', 'time_window'];

/** Directives that may appear at most once */
const SINGLETONS: readonly DirectiveKeyword[] = [
  'title',
  'domain',
  'dx_dy_dz',
  'time_window',
  'src_steps',
  'rx_steps',
];

export class ScenarioBuilder {
  private directives: Directive[] = [];
  private materials = new Set<string>();
  private waveforms = new Set<string>();
  private seen = new Set<DirectiveKeyword>();

  /**
   * Append a directive.
   * @param line - Source line, reported in errors when parsing
   * @throws ScenarioFormatError on duplicates or undeclared references
   */
  add(directive: Directive, line?: number): this {
    if (SINGLETONS.includes(directive.keyword) && this.seen.has(directive.keyword)) {
      throw new ScenarioFormatError(`duplicate #${directive.keyword} directive`, line);
    }

    switch (directive.keyword) {
      case 'material':
        if (this.materials.has(directive.name)) {
          throw new ScenarioFormatError(`material "${directive.name}" declared twice`, line);
        }
        this.materials.add(directive.name);
        break;
      case 'box':
      case 'cylinder':
        if (!this.materials.has(directive.material)) {
          throw new ScenarioFormatError(
            `#${directive.keyword} references undeclared material "${directive.material}"`,
            line
          );
        }
        break;
      case 'waveform':
        if (this.waveforms.has(directive.id)) {
          throw new ScenarioFormatError(`waveform "${directive.id}" declared twice`, line);
        }
        this.waveforms.add(directive.id);
        break;
      case 'hertzian_dipole':
        if (!this.waveforms.has(directive.waveform)) {
          throw new ScenarioFormatError(
            `#hertzian_dipole references undeclared waveform "${directive.waveform}"`,
            line
          );
        }
        break;
      default:
        break;
    }

    this.seen.add(directive.keyword);
    this.directives.push(directive);
    return this;
  }

  title(text: string): this {
    return this.add({ keyword: 'title', text });
  }

  domain(size: Point3D): this {
    return this.add({ keyword: 'domain', size: { ...size } });
  }

  discretization(dx: number, dy = dx, dz = dx): this {
    return this.add({ keyword: 'dx_dy_dz', step: { x: dx, y: dy, z: dz } });
  }

  timeWindow(seconds: number): this {
    return this.add({ keyword: 'time_window', seconds });
  }

  material(material: Material): this {
    return this.add({
      keyword: 'material',
      permittivity: material.permittivity,
      conductivity: material.conductivity,
      permeability: material.permeability,
      magneticLoss: material.magneticLoss,
      name: material.name,
    });
  }

  box(box: Box3D, material: string): this {
    return this.add({ keyword: 'box', box: cloneBox(box), material });
  }

  cylinder(start: Point3D, end: Point3D, radius: number, material: string): this {
    return this.add({ keyword: 'cylinder', start: { ...start }, end: { ...end }, radius, material });
  }

  waveform(shape: WaveformShape, amplitude: number, frequency: number, id: string): this {
    return this.add({ keyword: 'waveform', shape, amplitude, frequency, id });
  }

  hertzianDipole(polarisation: Polarisation, position: Point3D, waveform: string): this {
    return this.add({ keyword: 'hertzian_dipole', polarisation, position: { ...position }, waveform });
  }

  receiver(position: Point3D): this {
    return this.add({ keyword: 'rx', position: { ...position } });
  }

  sourceSteps(step: Point3D): this {
    return this.add({ keyword: 'src_steps', step: { ...step } });
  }

  receiverSteps(step: Point3D): this {
    return this.add({ keyword: 'rx_steps', step: { ...step } });
  }

  geometryView(box: Box3D, resolution: number, fileName: string, mode: 'n' | 'f' = 'f'): this {
    return this.add({
      keyword: 'geometry_view',
      box: cloneBox(box),
      resolution: { x: resolution, y: resolution, z: resolution },
      fileName,
      mode,
    });
  }

  /**
   * Freeze the collected directives into a document
   * @throws ScenarioFormatError when domain, grid step or time window is missing
   */
  build(): ScenarioDocument {
    const missing = REQUIRED.filter((keyword) => !this.seen.has(keyword));
    if (missing.length > 0) {
      throw new ScenarioFormatError(`scenario is missing ${missing.map((k) => `#${k}`).join(', ')}`);
    }
    return Object.freeze({ directives: Object.freeze([...this.directives]) });
  }
}

function cloneBox(box: Box3D): Box3D {
  return { min: { ...box.min }, max: { ...box.max } };
}

export interface BuildScenarioOptions {
  /** Identifier linking the source to its waveform */
  waveformId?: string;
}

/**
 * Directive list for a composed scene: header, materials (layers then void),
 * layer boxes, void primitive, source and receiver, scan steps for
 * multi-trace scans, and the optional geometry preview
 */
export function buildScenario(scene: ComposedScene, options: BuildScenarioOptions = {}): ScenarioDocument {
  const waveformId = options.waveformId ?? WAVEFORM_ID;
  const builder = new ScenarioBuilder()
    .title(scene.title)
    .domain({ x: scene.domain.sizeX, y: scene.domain.sizeY, z: scene.domain.sizeZ })
    .discretization(scene.domain.dx)
    .timeWindow(scene.source.timeWindowSeconds);

  for (const material of scene.materials) {
    builder.material(material);
  }

  for (const layer of scene.layers) {
    builder.box(layer.box, layer.material);
  }

  const cavity = scene.void;
  if (cavity.kind === 'cylinder') {
    builder.cylinder(cavity.start, cavity.end, cavity.radius, cavity.material);
  } else {
    builder.box(cavity.box, cavity.material);
  }

  builder
    .waveform(scene.source.waveform, scene.source.amplitude, scene.source.frequencyHz, waveformId)
    .hertzianDipole(scene.source.polarisation, scene.source.position, waveformId)
    .receiver(scene.receiver);

  if (scene.scan.numTraces > 1) {
    builder.sourceSteps(scene.scan.step).receiverSteps(scene.scan.step);
  }

  if (scene.geometryView) {
    builder.geometryView(scene.geometryView.box, scene.geometryView.resolution, scene.geometryView.fileName);
  }

  return builder.build();
}
