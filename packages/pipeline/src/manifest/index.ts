/**
 * Manifest persistence
 *
 * metadata.yaml lists one record per generated stage with the parameters
 * that produced it, in snake_case for downstream analysis tools:
 *
 *   - sequence_id: 0
 *     stage: 0
 *     input_file: seq_0000_stage_00.in
 *     void_params: { center_x, center_y, center_z, size_x, size_y, size_z,
 *                    stage, progress, growth_rate }
 */

import { readFile } from 'node:fs/promises';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import { z } from 'zod';
import { IOError, RoadVoidError } from '@roadvoid/shared';
import type { VoidState } from '@roadvoid/engine';
import { writeTextFile } from '../writer/index.js';

/** One generated stage */
export interface SequenceMetadataEntry {
  sequenceId: number;
  stage: number;
  /** Scenario file name relative to the output directory */
  inputFile: string;
  voidState: VoidState;
}

// ============================================================================
// Schema
// ============================================================================

const VoidParamsRecordSchema = z.object({
  center_x: z.number(),
  center_y: z.number(),
  center_z: z.number(),
  size_x: z.number(),
  size_y: z.number(),
  size_z: z.number(),
  stage: z.number().int().min(0),
  progress: z.number().min(0).max(1),
  growth_rate: z.number().min(1),
});

export const ManifestRecordSchema = z.object({
  sequence_id: z.number().int().min(0),
  stage: z.number().int().min(0),
  input_file: z.string().min(1),
  void_params: VoidParamsRecordSchema,
});

export const ManifestSchema = z.array(ManifestRecordSchema);

export type ManifestRecord = z.infer<typeof ManifestRecordSchema>;

// ============================================================================
// Conversion
// ============================================================================

export function toManifestRecord(entry: SequenceMetadataEntry): ManifestRecord {
  const { voidState } = entry;
  return {
    sequence_id: entry.sequenceId,
    stage: entry.stage,
    input_file: entry.inputFile,
    void_params: {
      center_x: voidState.center.x,
      center_y: voidState.center.y,
      center_z: voidState.center.z,
      size_x: voidState.size.x,
      size_y: voidState.size.y,
      size_z: voidState.size.z,
      stage: voidState.stage,
      progress: voidState.progress,
      growth_rate: voidState.growthRate,
    },
  };
}

export function fromManifestRecord(record: ManifestRecord): SequenceMetadataEntry {
  const params = record.void_params;
  return {
    sequenceId: record.sequence_id,
    stage: record.stage,
    inputFile: record.input_file,
    voidState: {
      stage: params.stage,
      progress: params.progress,
      growthRate: params.growth_rate,
      center: { x: params.center_x, y: params.center_y, z: params.center_z },
      size: { x: params.size_x, y: params.size_y, z: params.size_z },
    },
  };
}

// ============================================================================
// Persistence
// ============================================================================

/**
 * Write the manifest as a YAML list
 * @throws IOError when the file cannot be written
 */
export async function writeManifest(entries: readonly SequenceMetadataEntry[], path: string): Promise<string> {
  return writeTextFile(path, stringifyYaml(entries.map(toManifestRecord)));
}

/**
 * Read a manifest back
 * @throws IOError when the file cannot be read
 * @throws RoadVoidError (code MANIFEST_FORMAT) when it does not match the schema
 */
export async function readManifest(path: string): Promise<SequenceMetadataEntry[]> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    throw new IOError(path, error, {}, 'read');
  }

  let data: unknown;
  try {
    data = parseYaml(text);
  } catch (error) {
    throw new RoadVoidError('MANIFEST_FORMAT', `${path}: not valid YAML`, { cause: error });
  }

  const result = ManifestSchema.safeParse(data ?? []);
  if (!result.success) {
    const first = result.error.issues[0];
    const where = first && first.path.length > 0 ? first.path.join('.') : '(root)';
    throw new RoadVoidError('MANIFEST_FORMAT', `${path}: ${where}: ${first?.message ?? 'invalid manifest'}`);
  }
  return result.data.map(fromManifestRecord);
}
