/**
 * Sequence generator
 *
 * Runs in two phases. Planning samples every sequence, evolves every stage and
 * composes every scene in memory, so configuration and geometry errors
 * surface before anything touches the disk. Writing then emits the scenario
 * files, several sequences at a time but the stages of one sequence strictly
 * in order, followed by the manifest.
 */

import { resolve, join } from 'node:path';
import createDebug from 'debug';
import {
  ConfigurationError,
  GeometryError,
  MANIFEST_FILE_NAME,
  scenarioFileName,
  scenarioStem,
  type SceneWarning,
} from '@roadvoid/shared';
import type { SimulationConfig } from '@roadvoid/core';
import {
  buildScenario,
  checkDiscretization,
  composeScene,
  evolveSequence,
  sampleInitial,
  samplingExtentOf,
  sceneSettingsFromConfig,
  type ComposedScene,
  type ScenarioDocument,
  type SceneSettings,
  type VoidInitialParameters,
} from '@roadvoid/engine';
import { writeScenario } from '../writer/index.js';
import { writeManifest, type SequenceMetadataEntry } from '../manifest/index.js';

const log = createDebug('roadvoid:generator');

// ============================================================================
// Types
// ============================================================================

export interface StagePlan {
  sequenceId: number;
  stage: number;
  fileName: string;
  scene: ComposedScene;
  document: ScenarioDocument;
}

export interface SequencePlan {
  sequenceId: number;
  seed: number;
  initial: VoidInitialParameters;
  stages: StagePlan[];
}

/** Scene warning tagged with where it came from */
export interface StageWarning extends SceneWarning {
  sequenceId: number;
  stage: number;
}

export interface GenerationResult {
  outputDir: string;
  manifestPath: string;
  /** Manifest entries, ordered by sequence then stage */
  entries: SequenceMetadataEntry[];
  /** Absolute paths of every scenario written */
  files: string[];
  warnings: StageWarning[];
  /** Run-level discretization advisories */
  advisories: SceneWarning[];
}

export interface SequenceGeneratorOptions {
  /** Output directory (default: config.outputDir, resolved against the cwd) */
  outputDir?: string;
  /** Sequences written in parallel (default: config.generation.writeConcurrency) */
  writeConcurrency?: number;
  /** Called after each stage's scenario is on disk */
  onStage?: (entry: SequenceMetadataEntry, scene: ComposedScene) => void;
}

function assertCount(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigurationError([`${name} must be an integer >= 1, got ${value}`]);
  }
}

// ============================================================================
// Generator
// ============================================================================

export class SequenceGenerator {
  readonly settings: SceneSettings;
  readonly outputDir: string;
  private readonly writeConcurrency: number;
  private readonly onStage?: SequenceGeneratorOptions['onStage'];

  constructor(
    private readonly config: SimulationConfig,
    options: SequenceGeneratorOptions = {}
  ) {
    this.settings = sceneSettingsFromConfig(config);
    this.outputDir = resolve(options.outputDir ?? config.outputDir);
    this.writeConcurrency = options.writeConcurrency ?? config.generation.writeConcurrency;
    this.onStage = options.onStage;
    assertCount('writeConcurrency', this.writeConcurrency);
  }

  /** Grid and time window advisories for the configured materials */
  advisories(): SceneWarning[] {
    return checkDiscretization(this.settings);
  }

  /**
   * Sample, evolve and compose every stage of one sequence without writing
   * @throws GeometryError tagged with the sequence and stage
   */
  planSequence(sequenceId: number, stagesPerSequence = this.config.generation.stagesPerSequence): SequencePlan {
    assertCount('stagesPerSequence', stagesPerSequence);
    const seed = this.config.generation.seedOffset + sequenceId;
    const initial = sampleInitial(seed, this.config.void, samplingExtentOf(this.settings));

    const stages = evolveSequence(initial, stagesPerSequence).map((voidState): StagePlan => {
      const location = { sequenceId, stage: voidState.stage };
      let scene: ComposedScene;
      try {
        scene = composeScene({
          ...this.settings,
          voidState,
          label: scenarioStem(sequenceId, voidState.stage),
        });
      } catch (error) {
        throw error instanceof GeometryError ? error.at(location) : error;
      }
      return {
        sequenceId,
        stage: voidState.stage,
        fileName: scenarioFileName(sequenceId, voidState.stage),
        scene,
        document: buildScenario(scene),
      };
    });

    return { sequenceId, seed, initial, stages };
  }

  /**
   * Plan every sequence of a run
   */
  plan(numSequences: number, stagesPerSequence: number): SequencePlan[] {
    assertCount('numSequences', numSequences);
    assertCount('stagesPerSequence', stagesPerSequence);
    const plans: SequencePlan[] = [];
    for (let id = 0; id < numSequences; id++) {
      plans.push(this.planSequence(id, stagesPerSequence));
    }
    return plans;
  }

  /**
   * Plan, write every scenario, then write the manifest
   * @throws ConfigurationError or GeometryError before any file is written
   * @throws IOError naming the sequence and stage that failed; no manifest is written
   */
  async generate(
    numSequences = this.config.generation.numSequences,
    stagesPerSequence = this.config.generation.stagesPerSequence
  ): Promise<GenerationResult> {
    const plans = this.plan(numSequences, stagesPerSequence);
    const advisories = this.advisories();
    for (const advisory of advisories) {
      log('advisory: %s', advisory.message);
    }

    const warnings: StageWarning[] = plans.flatMap((plan) =>
      plan.stages.flatMap((stage) =>
        stage.scene.warnings.map((w) => ({ ...w, sequenceId: stage.sequenceId, stage: stage.stage }))
      )
    );

    log('writing %d sequence(s) to %s, %d at a time', plans.length, this.outputDir, this.writeConcurrency);
    const written = await this.writeAll(plans);

    const entries = written.flat();
    const manifestPath = await writeManifest(entries, join(this.outputDir, MANIFEST_FILE_NAME));
    log('manifest %s: %d entries', manifestPath, entries.length);

    return {
      outputDir: this.outputDir,
      manifestPath,
      entries,
      files: entries.map((e) => join(this.outputDir, e.inputFile)),
      warnings,
      advisories,
    };
  }

  /**
   * Write sequences through a fixed number of lanes. After the first failure
   * no lane starts another sequence; the first error is rethrown once every
   * lane has stopped.
   */
  private async writeAll(plans: SequencePlan[]): Promise<SequenceMetadataEntry[][]> {
    const results: SequenceMetadataEntry[][] = plans.map(() => []);
    const run: { next: number; failed: boolean; error?: unknown } = { next: 0, failed: false };

    const lane = async (): Promise<void> => {
      while (!run.failed && run.next < plans.length) {
        const index = run.next++;
        const plan = plans[index];
        try {
          results[index] = await this.writeSequence(plan);
        } catch (error) {
          if (!run.failed) {
            run.failed = true;
            run.error = error;
          }
          log('sequence %d aborted: %s', plan.sequenceId, error instanceof Error ? error.message : error);
        }
      }
    };

    const lanes = Math.min(this.writeConcurrency, plans.length);
    await Promise.all(Array.from({ length: lanes }, () => lane()));

    if (run.failed) {
      throw run.error;
    }
    return results;
  }

  private async writeSequence(plan: SequencePlan): Promise<SequenceMetadataEntry[]> {
    const entries: SequenceMetadataEntry[] = [];
    for (const stage of plan.stages) {
      const location = { sequenceId: plan.sequenceId, stage: stage.stage };
      await writeScenario(stage.document, join(this.outputDir, stage.fileName), location);

      const entry: SequenceMetadataEntry = {
        sequenceId: plan.sequenceId,
        stage: stage.stage,
        inputFile: stage.fileName,
        voidState: stage.scene.voidState,
      };
      entries.push(entry);
      this.onStage?.(entry, stage.scene);
    }
    log('sequence %d: %d stage(s) written', plan.sequenceId, entries.length);
    return entries;
  }
}
