/**
 * roadvoid command line
 */

import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { Command, InvalidArgumentError, Option } from 'commander';
import { IOError, type GeometryPolicy, type VerticalFrameKind } from '@roadvoid/shared';
import { parseScenario, summarizeScenario } from '@roadvoid/engine';
import { loadConfig, SequenceGenerator } from '@roadvoid/pipeline';
import { formatPlanTable, formatStageLine, formatSummary, formatWarning } from './format.js';

/** Where command output goes */
export interface Output {
  log: (line: string) => void;
  error: (line: string) => void;
}

const consoleOutput: Output = {
  log: (line) => console.log(line),
  error: (line) => console.error(line),
};

interface GenerateOptions {
  config?: string;
  outputDir?: string;
  sequences?: number;
  stages?: number;
  seedOffset?: number;
  concurrency?: number;
  frame?: VerticalFrameKind;
  geometryPolicy?: GeometryPolicy;
}

interface PreviewOptions {
  config?: string;
  sequence: number;
  stages?: number;
}

function parseCount(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected an integer >= 1.');
  }
  return parsed;
}

function parseIndex(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected an integer >= 0.');
  }
  return parsed;
}

export function createProgram(out: Output = consoleOutput): Command {
  const program = new Command();

  program
    .name('roadvoid')
    .description('Generate GPR scenarios of evolving voids under a layered road')
    .version('0.1.0');

  program
    .command('generate')
    .description('Write every scenario of a run and its metadata.yaml')
    .option('-c, --config <path>', 'configuration file (YAML or JSON)')
    .option('-o, --output-dir <dir>', 'output directory')
    .option('-n, --sequences <count>', 'number of sequences', parseCount)
    .option('-s, --stages <count>', 'stages per sequence', parseCount)
    .option('--seed-offset <n>', 'seed of sequence 0', parseIndex)
    .option('--concurrency <count>', 'sequences written in parallel', parseCount)
    .addOption(new Option('--frame <kind>', 'vertical frame').choices(['surface-relative', 'depth-from-bottom']))
    .addOption(
      new Option('--geometry-policy <policy>', 'voids escaping the road').choices(['ignore', 'warn', 'clamp', 'reject'])
    )
    .action((options: GenerateOptions) => generate(options, out));

  program
    .command('preview')
    .description('Print the evolution of one sequence without writing files')
    .option('-c, --config <path>', 'configuration file (YAML or JSON)')
    .option('--sequence <id>', 'sequence to preview', parseIndex, 0)
    .option('-s, --stages <count>', 'stages per sequence', parseCount)
    .action((options: PreviewOptions) => preview(options, out));

  program
    .command('inspect')
    .description('Parse a scenario file and summarize it')
    .argument('<file>', 'scenario file (.in)')
    .action((file: string) => inspect(file, out));

  return program;
}

async function generate(options: GenerateOptions, out: Output): Promise<void> {
  const { config, path } = await loadConfig({
    path: options.config,
    overrides: {
      outputDir: options.outputDir,
      numSequences: options.sequences,
      stagesPerSequence: options.stages,
      seedOffset: options.seedOffset,
      writeConcurrency: options.concurrency,
      frame: options.frame,
      geometryPolicy: options.geometryPolicy,
    },
  });

  const { numSequences, stagesPerSequence } = config.generation;
  out.log(`Loaded configuration from ${path}`);
  out.log(`Generating ${numSequences} sequence(s) with ${stagesPerSequence} stage(s) each`);

  const generator = new SequenceGenerator(config, {
    onStage: (entry) => out.log(formatStageLine(entry.sequenceId, entry.voidState)),
  });
  const result = await generator.generate(numSequences, stagesPerSequence);

  for (const advisory of result.advisories) {
    out.error(formatWarning(advisory));
  }
  for (const warning of result.warnings) {
    out.error(formatWarning(warning, warning));
  }
  out.log(`Metadata saved to ${result.manifestPath}`);
  out.log(`Total input files generated: ${result.entries.length}`);
}

async function preview(options: PreviewOptions, out: Output): Promise<void> {
  const { config } = await loadConfig({ path: options.config, overrides: { stagesPerSequence: options.stages } });
  const generator = new SequenceGenerator(config);

  for (const advisory of generator.advisories()) {
    out.error(formatWarning(advisory));
  }
  const plan = generator.planSequence(options.sequence);
  for (const line of formatPlanTable(plan)) {
    out.log(line);
  }
  for (const stage of plan.stages) {
    for (const warning of stage.scene.warnings) {
      out.error(formatWarning(warning, stage));
    }
  }
}

async function inspect(file: string, out: Output): Promise<void> {
  const path = resolve(file);
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    throw new IOError(path, error, {}, 'read');
  }
  for (const line of formatSummary(path, summarizeScenario(parseScenario(text)))) {
    out.log(line);
  }
}
