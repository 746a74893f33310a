/**
 * Scenario text output - one `#keyword: args` line per directive
 */

import { formatNumber } from '@roadvoid/shared';
import type { Box3D, Point3D } from '@roadvoid/core';
import type { Directive, DirectiveKeyword, ScenarioDocument } from './directives.js';

type DirectiveGroup = 'header' | 'materials' | 'geometry' | 'source' | 'steps' | 'view';

const GROUP_OF: Record<DirectiveKeyword, DirectiveGroup> = {
  title: 'header',
  domain: 'header',
  dx_dy_dz: 'header',
  time_window: 'header',
  material: 'materials',
  box: 'geometry',
  cylinder: 'geometry',
  waveform: 'source',
  hertzian_dipole: 'source',
  rx: 'source',
  src_steps: 'steps',
  rx_steps: 'steps',
  geometry_view: 'view',
};

function point(p: Point3D): string {
  return `${formatNumber(p.x)} ${formatNumber(p.y)} ${formatNumber(p.z)}`;
}

function box(b: Box3D): string {
  return `${point(b.min)} ${point(b.max)}`;
}

/**
 * Argument text of a single directive
 */
export function formatDirectiveArgs(directive: Directive): string {
  switch (directive.keyword) {
    case 'title':
      return directive.text;
    case 'domain':
      return point(directive.size);
    case 'dx_dy_dz':
      return point(directive.step);
    case 'time_window':
      return formatNumber(directive.seconds);
    case 'material':
      return [
        formatNumber(directive.permittivity),
        formatNumber(directive.conductivity),
        formatNumber(directive.permeability),
        formatNumber(directive.magneticLoss),
        directive.name,
      ].join(' ');
    case 'box':
      return `${box(directive.box)} ${directive.material}`;
    case 'cylinder':
      return `${point(directive.start)} ${point(directive.end)} ${formatNumber(directive.radius)} ${directive.material}`;
    case 'waveform':
      return `${directive.shape} ${formatNumber(directive.amplitude)} ${formatNumber(directive.frequency)} ${directive.id}`;
    case 'hertzian_dipole':
      return `${directive.polarisation} ${point(directive.position)} ${directive.waveform}`;
    case 'rx':
      return point(directive.position);
    case 'src_steps':
    case 'rx_steps':
      return point(directive.step);
    case 'geometry_view':
      return `${box(directive.box)} ${point(directive.resolution)} ${directive.fileName} ${directive.mode}`;
  }
}

export function formatDirective(directive: Directive): string {
  return `#${directive.keyword}: ${formatDirectiveArgs(directive)}`;
}

/**
 * Render a document as solver input text. Related directives are grouped,
 * groups are separated by a blank line and the text ends with a newline.
 */
export function serializeScenario(document: ScenarioDocument): string {
  const lines: string[] = [];
  let previous: DirectiveGroup | undefined;

  for (const directive of document.directives) {
    const group = GROUP_OF[directive.keyword];
    if (previous !== undefined && group !== previous) {
      lines.push('');
    }
    lines.push(formatDirective(directive));
    previous = group;
  }

  return `${lines.join('\n')}\n`;
}
