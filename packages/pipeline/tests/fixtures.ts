import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { validateConfig, type SimulationConfig, type SimulationConfigInput } from '@roadvoid/core';

export const CONFIG_YAML = `outputDir: data/simulations
road:
  airThickness: 0.3
  surfaceAsphaltThickness: 0.05
  baseAsphaltThickness: 0.1
  upperSubbaseThickness: 0.2
  lowerSubbaseThickness: 0.25
  subgradeThickness: 0.6
gpr:
  frequency: 400
  timeWindow: 40
  spatialResolution: 0.01
  numTraces: 20
void:
  initialXPositionRange: [0.4, 0.6]
  initialYPositionRange: [0.4, 0.6]
  initialDepthRange: [0.3, 0.5]
  initialSizeXRange: [0.03, 0.06]
  initialSizeYRange: [0.05, 0.1]
  initialSizeZRange: [0.03, 0.06]
  growthRateRange: [1.5, 2.5]
  upwardMovementRange: [0.1, 0.3]
materials:
  air: 1
  surfaceAsphalt: 6
  baseAsphalt: 5
  upperSubbase: 8
  lowerSubbase: 10
  subgrade: 15
  void: 1
domain:
  sizeX: 2
  sizeY: 1
generation:
  numSequences: 2
  stagesPerSequence: 3
`;

export function configInput(): SimulationConfigInput {
  return {
    outputDir: 'data/simulations',
    road: {
      airThickness: 0.3,
      surfaceAsphaltThickness: 0.05,
      baseAsphaltThickness: 0.1,
      upperSubbaseThickness: 0.2,
      lowerSubbaseThickness: 0.25,
      subgradeThickness: 0.6,
    },
    gpr: { frequency: 400, timeWindow: 40, spatialResolution: 0.01, numTraces: 20 },
    void: {
      initialXPositionRange: [0.4, 0.6],
      initialYPositionRange: [0.4, 0.6],
      initialDepthRange: [0.3, 0.5],
      initialSizeXRange: [0.03, 0.06],
      initialSizeYRange: [0.05, 0.1],
      initialSizeZRange: [0.03, 0.06],
      growthRateRange: [1.5, 2.5],
      upwardMovementRange: [0.1, 0.3],
    },
    materials: {
      air: 1,
      surfaceAsphalt: 6,
      baseAsphalt: 5,
      upperSubbase: 8,
      lowerSubbase: 10,
      subgrade: 15,
      void: 1,
    },
    domain: { sizeX: 2, sizeY: 1 },
    generation: { numSequences: 2, stagesPerSequence: 3 },
  };
}

export function testConfig(patch: (input: SimulationConfigInput) => void = () => {}): SimulationConfig {
  const input = configInput();
  patch(input);
  return validateConfig(input);
}

/** Fresh directory under the OS temp dir, with its cleanup */
export async function tempDir(): Promise<{ path: string; cleanup: () => Promise<void> }> {
  const path = await mkdtemp(join(tmpdir(), 'roadvoid-'));
  return { path, cleanup: () => rm(path, { recursive: true, force: true }) };
}
