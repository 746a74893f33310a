/**
 * Scenario writer - serializes a document to disk.
 * Text goes to a sibling temporary file first and is renamed into place, so
 * a failed write never leaves a truncated scenario behind.
 */

import { mkdir, rename, rm, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import createDebug from 'debug';
import { IOError, type StageLocation } from '@roadvoid/shared';
import { serializeScenario, type ScenarioDocument } from '@roadvoid/engine';

const log = createDebug('roadvoid:writer');

/**
 * Write text to a file, creating parent directories
 * @throws IOError tagged with the location
 */
export async function writeTextFile(path: string, text: string, location: StageLocation = {}): Promise<string> {
  const temp = `${path}.tmp`;
  try {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(temp, text, 'utf-8');
    await rename(temp, path);
  } catch (error) {
    try {
      await rm(temp, { force: true });
    } catch (cleanupError) {
      log('could not remove %s: %O', temp, cleanupError);
    }
    throw new IOError(path, error, location);
  }
  return path;
}

/**
 * Serialize and write one scenario
 * @returns The path written
 * @throws IOError when the file or its directory cannot be written
 */
export async function writeScenario(
  document: ScenarioDocument,
  path: string,
  location: StageLocation = {}
): Promise<string> {
  await writeTextFile(path, serializeScenario(document), location);
  log('wrote %s (%d directives)', path, document.directives.length);
  return path;
}
