/**
 * Text output for the command line
 */

import { formatFixed, type SceneWarning } from '@roadvoid/shared';
import { secondsToNs } from '@roadvoid/core';
import type { ScenarioSummary, VoidState } from '@roadvoid/engine';
import type { SequencePlan } from '@roadvoid/pipeline';

/** Progress line printed after each stage is written */
export function formatStageLine(sequenceId: number, state: VoidState): string {
  return `  Sequence ${sequenceId} stage ${state.stage}: depth=${formatFixed(state.center.z)}m, size_x=${formatFixed(state.size.x)}m`;
}

export function formatWarning(warning: SceneWarning, where?: { sequenceId: number; stage: number }): string {
  const prefix = where ? `[seq ${where.sequenceId} stage ${where.stage}] ` : '';
  return `${warning.severity}: ${prefix}${warning.message}`;
}

function row(cells: string[], widths: number[]): string {
  return cells.map((cell, i) => cell.padStart(widths[i])).join('  ');
}

/**
 * Evolution table of one planned sequence
 */
export function formatPlanTable(plan: SequencePlan): string[] {
  const header = ['stage', 'progress', 'growth', 'depth', 'size_x', 'size_y', 'size_z', 'warnings'];
  const rows = plan.stages.map(({ scene }) => {
    const state = scene.voidState;
    return [
      String(state.stage),
      formatFixed(state.progress, 3),
      formatFixed(state.growthRate, 3),
      formatFixed(state.center.z, 3),
      formatFixed(state.size.x, 3),
      formatFixed(state.size.y, 3),
      formatFixed(state.size.z, 3),
      String(scene.warnings.length),
    ];
  });
  const widths = header.map((h, i) => Math.max(h.length, ...rows.map((r) => r[i].length)));

  const { initial } = plan;
  return [
    `Sequence ${plan.sequenceId} (seed ${plan.seed})`,
    `  center (${formatFixed(initial.centerX, 3)}, ${formatFixed(initial.centerY, 3)}) m, ` +
      `max growth ${formatFixed(initial.maxGrowthRate, 3)}, max rise ${formatFixed(initial.maxUpwardMovement, 3)} m`,
    row(header, widths),
    ...rows.map((r) => row(r, widths)),
  ];
}

function point(p: { x: number; y: number; z: number }): string {
  return `(${p.x}, ${p.y}, ${p.z})`;
}

/**
 * Scenario summary printed by `inspect`
 */
export function formatSummary(path: string, summary: ScenarioSummary): string[] {
  const primitives = Object.entries(summary.primitives)
    .map(([material, count]) => `${material} x${count}`)
    .join(', ');
  return [
    path,
    `  title:       ${summary.title ?? '(none)'}`,
    `  domain:      ${point(summary.domain)} m`,
    `  grid step:   ${point(summary.discretization)} m`,
    `  time window: ${formatFixed(secondsToNs(summary.timeWindowSeconds), 1)} ns`,
    `  materials:   ${summary.materials.join(', ')}`,
    `  primitives:  ${summary.primitiveCount} (${primitives})`,
    `  traces:      ${summary.step ? `stepping ${point(summary.step)} m` : 'single trace'}`,
    `  geometry:    ${summary.geometryView ?? '(no view)'}`,
  ];
}
