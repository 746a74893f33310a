import { validateConfig, type SimulationConfig, type SimulationConfigInput } from '@roadvoid/core';
import { composeScene, samplingExtentOf, sceneSettingsFromConfig } from '../src/scene/index.js';
import { sampleInitial } from '../src/sampler/index.js';
import { evolve } from '../src/evolution/index.js';
import type { ComposedScene, SceneSettings, VoidInitialParameters } from '../src/api/index.js';

/**
 * 2.0 x 1.0 x 1.5 m domain: 0.3 m of air over 1.2 m of road. Every void
 * range is pinned, so any seed yields a void centered at (1.0, 0.5) at a
 * depth of 0.3 m with a lateral size of 0.3 x 0.2 m.
 */
export function configInput(): SimulationConfigInput {
  return {
    outputDir: 'out',
    road: {
      airThickness: 0.3,
      surfaceAsphaltThickness: 0.05,
      baseAsphaltThickness: 0.1,
      upperSubbaseThickness: 0.2,
      lowerSubbaseThickness: 0.25,
      subgradeThickness: 0.6,
    },
    gpr: { frequency: 400, timeWindow: 40, spatialResolution: 0.02, numTraces: 50 },
    void: {
      initialXPositionRange: [0.5, 0.5],
      initialYPositionRange: [0.5, 0.5],
      initialDepthRange: [0.25, 0.25],
      initialSizeXRange: [0.15, 0.15],
      initialSizeYRange: [0.2, 0.2],
      initialSizeZRange: [0.1, 0.1],
      growthRateRange: [2, 2],
      upwardMovementRange: [0.5, 0.5],
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
    generation: { numSequences: 1, stagesPerSequence: 5 },
  };
}

export function testConfig(patch: (input: SimulationConfigInput) => void = () => {}): SimulationConfig {
  const input = configInput();
  patch(input);
  return validateConfig(input);
}

export function testSettings(patch?: (input: SimulationConfigInput) => void): SceneSettings {
  return sceneSettingsFromConfig(testConfig(patch));
}

export function testInitial(settings: SceneSettings = testSettings(), seed = 0): VoidInitialParameters {
  const config = testConfig();
  return sampleInitial(seed, config.void, samplingExtentOf(settings));
}

export function testScene(
  settings: SceneSettings = testSettings(),
  stage = 0,
  totalStages = 5
): ComposedScene {
  const state = evolve(testInitial(settings), stage, totalStages);
  return composeScene({ ...settings, voidState: state, label: 'seq_0000_stage_00' });
}
