/**
 * Configuration file loading.
 * Loads YAML or JSON from an explicit path, ROADVOID_CONFIG, or
 * config/simulation.yaml, applies environment and command line overrides,
 * then validates the result.
 */

import { readFile } from 'node:fs/promises';
import { extname, resolve } from 'node:path';
import createDebug from 'debug';
import { parse as parseYaml } from 'yaml';
import {
  CONFIG_PATH_ENV,
  ConfigurationError,
  DEFAULT_CONFIG_PATH,
  IOError,
  OUTPUT_DIR_ENV,
  type GeometryPolicy,
  type VerticalFrameKind,
} from '@roadvoid/shared';
import { validateConfig, type SimulationConfig } from '@roadvoid/core';

const log = createDebug('roadvoid:config');

/** Values given on the command line; they win over the file and the environment */
export interface ConfigOverrides {
  outputDir?: string;
  numSequences?: number;
  stagesPerSequence?: number;
  seedOffset?: number;
  writeConcurrency?: number;
  frame?: VerticalFrameKind;
  geometryPolicy?: GeometryPolicy;
}

export interface LoadConfigOptions {
  /** Explicit configuration file */
  path?: string;
  /** Base directory for relative paths (default: process.cwd()) */
  cwd?: string;
  env?: Record<string, string | undefined>;
  overrides?: ConfigOverrides;
}

export interface LoadedConfig {
  config: SimulationConfig;
  /** Absolute path of the file the configuration came from */
  path: string;
}

/**
 * Pick the configuration file: explicit path, then the environment, then the
 * default location
 */
export function resolveConfigPath(options: Pick<LoadConfigOptions, 'path' | 'cwd' | 'env'> = {}): string {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  const candidate = options.path ?? env[CONFIG_PATH_ENV] ?? DEFAULT_CONFIG_PATH;
  return resolve(cwd, candidate);
}

/**
 * Parse configuration text by file extension (.json, otherwise YAML)
 * @throws ConfigurationError when the text is not well-formed
 */
export function parseConfigText(text: string, path: string): unknown {
  try {
    return extname(path).toLowerCase() === '.json' ? JSON.parse(text) : parseYaml(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError([`${path}: ${reason}`]);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(data: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = data[key];
  return isRecord(value) ? value : {};
}

function withDefined(target: Record<string, unknown>, values: Record<string, unknown>): Record<string, unknown> {
  const merged = { ...target };
  for (const [key, value] of Object.entries(values)) {
    if (value !== undefined) merged[key] = value;
  }
  return merged;
}

/**
 * Merge environment and command line overrides into raw configuration data.
 * Non-object data is returned unchanged for the validator to report.
 */
export function applyOverrides(
  data: unknown,
  overrides: ConfigOverrides = {},
  env: Record<string, string | undefined> = {}
): unknown {
  if (!isRecord(data)) {
    return data;
  }

  const outputDir = overrides.outputDir ?? env[OUTPUT_DIR_ENV];
  const merged = withDefined(data, { outputDir });

  const generation = {
    numSequences: overrides.numSequences,
    stagesPerSequence: overrides.stagesPerSequence,
    seedOffset: overrides.seedOffset,
    writeConcurrency: overrides.writeConcurrency,
  };
  if (Object.values(generation).some((v) => v !== undefined)) {
    merged.generation = withDefined(section(data, 'generation'), generation);
  }

  const scene = { frame: overrides.frame, geometryPolicy: overrides.geometryPolicy };
  if (Object.values(scene).some((v) => v !== undefined)) {
    merged.scene = withDefined(section(data, 'scene'), scene);
  }

  return merged;
}

/**
 * Load, override and validate the configuration
 * @throws IOError when the file cannot be read
 * @throws ConfigurationError listing every violation
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<LoadedConfig> {
  const env = options.env ?? process.env;
  const path = resolveConfigPath({ ...options, env });

  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    throw new IOError(path, error, {}, 'read');
  }

  const config = validateConfig(applyOverrides(parseConfigText(text, path), options.overrides, env));
  log('loaded %s: %d sequence(s) x %d stage(s)', path, config.generation.numSequences, config.generation.stagesPerSequence);
  return { config, path };
}
