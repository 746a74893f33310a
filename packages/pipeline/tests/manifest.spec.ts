import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { IOError, RoadVoidError } from '@roadvoid/shared';
import {
  readManifest,
  toManifestRecord,
  writeManifest,
  type SequenceMetadataEntry,
} from '../src/manifest/index.js';
import { tempDir } from './fixtures.js';

function entry(sequenceId: number, stage: number): SequenceMetadataEntry {
  return {
    sequenceId,
    stage,
    inputFile: `seq_000${sequenceId}_stage_0${stage}.in`,
    voidState: {
      stage,
      progress: stage / 2,
      growthRate: 1 + stage * 0.25,
      center: { x: 1, y: 0.5, z: 0.30000000000000004 },
      size: { x: 0.1, y: 0.2, z: 0.05 },
    },
  };
}

describe('toManifestRecord', () => {
  it('flattens the void state into snake_case keys', () => {
    expect(toManifestRecord(entry(1, 2))).toEqual({
      sequence_id: 1,
      stage: 2,
      input_file: 'seq_0001_stage_02.in',
      void_params: {
        center_x: 1,
        center_y: 0.5,
        center_z: 0.30000000000000004,
        size_x: 0.1,
        size_y: 0.2,
        size_z: 0.05,
        stage: 2,
        progress: 1,
        growth_rate: 1.5,
      },
    });
  });
});

describe('manifest files', () => {
  let dir: { path: string; cleanup: () => Promise<void> };

  beforeEach(async () => {
    dir = await tempDir();
  });

  afterEach(async () => {
    await dir.cleanup();
  });

  it('writes a YAML list and reads it back', async () => {
    const entries = [entry(0, 0), entry(0, 1), entry(1, 0)];
    const path = join(dir.path, 'metadata.yaml');
    await writeManifest(entries, path);

    const text = await readFile(path, 'utf-8');
    expect(text.startsWith('- sequence_id: 0\n  stage: 0\n  input_file: seq_0000_stage_00.in\n  void_params:\n')).toBe(
      true
    );
    expect(await readManifest(path)).toEqual(entries);
  });

  it('reads an empty manifest as no entries', async () => {
    const path = join(dir.path, 'metadata.yaml');
    await writeFile(path, '');
    expect(await readManifest(path)).toEqual([]);
  });

  it('rejects records that do not match the schema', async () => {
    const path = join(dir.path, 'metadata.yaml');
    await writeFile(path, '- sequence_id: -1\n  stage: 0\n  input_file: a.in\n');

    const error = await readManifest(path).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(RoadVoidError);
    if (!(error instanceof RoadVoidError)) return;
    expect(error.code).toBe('MANIFEST_FORMAT');
    expect(error.message.startsWith(`${path}: 0.sequence_id: `)).toBe(true);
  });

  it('reports a missing manifest as a read error', async () => {
    const error = await readManifest(join(dir.path, 'none.yaml')).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(IOError);
  });
});
