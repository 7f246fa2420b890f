import { randomBytes } from 'node:crypto';
import { rename, rm, writeFile } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';
import { OutputWriteError } from '../errors.js';
import type { Point } from '../types.js';
import { formatPoints } from './format.js';

/**
 * Writes the formatted points to `path`. The text goes to a temporary file
 * in the same directory first and is renamed into place, so `path` either
 * holds the complete output or is left untouched.
 */
export async function writeOutput(path: string, points: readonly Point[]): Promise<void> {
  const tmpPath = join(dirname(path), `.${basename(path)}.${randomBytes(6).toString('hex')}.tmp`);
  try {
    await writeFile(tmpPath, formatPoints(points), 'utf8');
    await rename(tmpPath, path);
  } catch (err) {
    await rm(tmpPath, { force: true }).catch(() => undefined);
    throw new OutputWriteError(path, err);
  }
}
