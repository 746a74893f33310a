/**
 * Scenario text input - reads solver input back into a directive list
 */

import { ScenarioFormatError, type Polarisation, type WaveformShape } from '@roadvoid/shared';
import type { Box3D, Point3D } from '@roadvoid/core';
import { ScenarioBuilder } from './builder.js';
import { isDirectiveKeyword, isPrimitive, type Directive, type DirectiveKeyword, type ScenarioDocument } from './directives.js';

const WAVEFORM_SHAPES: readonly WaveformShape[] = ['ricker', 'gaussian', 'gaussiandot'];
const POLARISATIONS: readonly Polarisation[] = ['x', 'y', 'z'];

/** Cursor over the whitespace-separated arguments of one line */
class ArgumentReader {
  private index = 0;

  constructor(
    private readonly keyword: DirectiveKeyword,
    private readonly tokens: string[],
    private readonly line: number
  ) {}

  private error(message: string): ScenarioFormatError {
    return new ScenarioFormatError(`#${this.keyword}: ${message}`, this.line);
  }

  word(): string {
    const token = this.tokens[this.index];
    if (token === undefined) {
      throw this.error(`expected more than ${this.index} argument(s)`);
    }
    this.index++;
    return token;
  }

  number(): number {
    const token = this.word();
    const value = Number(token);
    if (token.trim() === '' || !Number.isFinite(value)) {
      throw this.error(`"${token}" is not a number`);
    }
    return value;
  }

  point(): Point3D {
    return { x: this.number(), y: this.number(), z: this.number() };
  }

  box(): Box3D {
    return { min: this.point(), max: this.point() };
  }

  oneOf<T extends string>(allowed: readonly T[]): T {
    const token = this.word();
    const match = allowed.find((candidate) => candidate === token);
    if (match === undefined) {
      throw this.error(`"${token}" is not one of ${allowed.join(', ')}`);
    }
    return match;
  }

  end(): void {
    if (this.index !== this.tokens.length) {
      throw this.error(`expected ${this.index} argument(s), got ${this.tokens.length}`);
    }
  }
}

function readDirective(keyword: DirectiveKeyword, args: string, line: number): Directive {
  if (keyword === 'title') {
    return { keyword, text: args };
  }
  const reader = new ArgumentReader(keyword, args.split(/\s+/).filter((t) => t.length > 0), line);
  const directive = readArguments(keyword, reader);
  reader.end();
  return directive;
}

function readArguments(keyword: Exclude<DirectiveKeyword, 'title'>, reader: ArgumentReader): Directive {
  switch (keyword) {
    case 'domain':
      return { keyword, size: reader.point() };
    case 'dx_dy_dz':
      return { keyword, step: reader.point() };
    case 'time_window':
      return { keyword, seconds: reader.number() };
    case 'material':
      return {
        keyword,
        permittivity: reader.number(),
        conductivity: reader.number(),
        permeability: reader.number(),
        magneticLoss: reader.number(),
        name: reader.word(),
      };
    case 'box':
      return { keyword, box: reader.box(), material: reader.word() };
    case 'cylinder':
      return {
        keyword,
        start: reader.point(),
        end: reader.point(),
        radius: reader.number(),
        material: reader.word(),
      };
    case 'waveform':
      return {
        keyword,
        shape: reader.oneOf(WAVEFORM_SHAPES),
        amplitude: reader.number(),
        frequency: reader.number(),
        id: reader.word(),
      };
    case 'hertzian_dipole':
      return {
        keyword,
        polarisation: reader.oneOf(POLARISATIONS),
        position: reader.point(),
        waveform: reader.word(),
      };
    case 'rx':
      return { keyword, position: reader.point() };
    case 'src_steps':
    case 'rx_steps':
      return { keyword, step: reader.point() };
    case 'geometry_view':
      return {
        keyword,
        box: reader.box(),
        resolution: reader.point(),
        fileName: reader.word(),
        mode: reader.oneOf(['n', 'f'] as const),
      };
  }
}

/**
 * Parse solver input text. Blank lines and lines not starting with `#` are
 * skipped.
 *
 * @throws ScenarioFormatError with the 1-based line number of the offending line
 */
export function parseScenario(text: string): ScenarioDocument {
  const builder = new ScenarioBuilder();
  const lines = text.split(/\r?\n/);

  lines.forEach((raw, i) => {
    const line = raw.trim();
    if (!line.startsWith('#')) {
      return;
    }
    const colon = line.indexOf(':');
    if (colon < 0) {
      throw new ScenarioFormatError(`missing ":" after directive keyword`, i + 1);
    }
    const keyword = line.slice(1, colon).trim();
    if (!isDirectiveKeyword(keyword)) {
      throw new ScenarioFormatError(`unknown directive #${keyword}`, i + 1);
    }
    builder.add(readDirective(keyword, line.slice(colon + 1).trim(), i + 1), i + 1);
  });

  return builder.build();
}

// ============================================================================
// Summary
// ============================================================================

export interface ScenarioSummary {
  title: string | null;
  domain: Point3D;
  discretization: Point3D;
  timeWindowSeconds: number;
  materials: string[];
  primitiveCount: number;
  /** Primitive count per material, in first-use order */
  primitives: Record<string, number>;
  source: Point3D | null;
  receiver: Point3D | null;
  /** Trace step, or null for a single-trace scenario */
  step: Point3D | null;
  geometryView: string | null;
}

/**
 * Condensed view of a document, for inspection output
 */
export function summarizeScenario(document: ScenarioDocument): ScenarioSummary {
  const summary: ScenarioSummary = {
    title: null,
    domain: { x: 0, y: 0, z: 0 },
    discretization: { x: 0, y: 0, z: 0 },
    timeWindowSeconds: 0,
    materials: [],
    primitiveCount: 0,
    primitives: {},
    source: null,
    receiver: null,
    step: null,
    geometryView: null,
  };

  for (const directive of document.directives) {
    if (isPrimitive(directive)) {
      summary.primitiveCount++;
      summary.primitives[directive.material] = (summary.primitives[directive.material] ?? 0) + 1;
      continue;
    }
    switch (directive.keyword) {
      case 'title':
        summary.title = directive.text;
        break;
      case 'domain':
        summary.domain = directive.size;
        break;
      case 'dx_dy_dz':
        summary.discretization = directive.step;
        break;
      case 'time_window':
        summary.timeWindowSeconds = directive.seconds;
        break;
      case 'material':
        summary.materials.push(directive.name);
        break;
      case 'hertzian_dipole':
        summary.source = directive.position;
        break;
      case 'rx':
        summary.receiver = directive.position;
        break;
      case 'src_steps':
        summary.step = directive.step;
        break;
      case 'geometry_view':
        summary.geometryView = directive.fileName;
        break;
      default:
        break;
    }
  }

  return summary;
}
