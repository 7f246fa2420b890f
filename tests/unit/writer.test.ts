import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { mkdtemp, readdir, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { writeOutput } from '../../src/output/writer.js';
import { OutputWriteError } from '../../src/errors.js';
import { pt } from './helpers.js';

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'region-query-out-'));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe('writeOutput', () => {
  it('writes one line per point', async () => {
    const path = join(dir, 'output.txt');
    await writeOutput(path, [pt(1, 6, 6), pt(2, 0.5, 7)]);
    expect(await readFile(path, 'utf8')).toBe('6 6\n0.5 7\n');
  });

  it('writes an empty file for no points', async () => {
    const path = join(dir, 'output.txt');
    await writeOutput(path, []);
    expect(await readFile(path, 'utf8')).toBe('');
  });

  it('replaces an existing file and leaves no temporary file behind', async () => {
    const path = join(dir, 'output.txt');
    await writeFile(path, 'stale\n');
    await writeOutput(path, [pt(1, 1, 2)]);
    expect(await readFile(path, 'utf8')).toBe('1 2\n');
    expect(await readdir(dir)).toEqual(['output.txt']);
  });

  it('throws OutputWriteError when the directory does not exist', async () => {
    const path = join(dir, 'missing', 'output.txt');
    const err = await writeOutput(path, [pt(1, 1, 2)]).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(OutputWriteError);
    expect(err instanceof OutputWriteError && err.stage).toBe('write');
    expect(await readdir(dir)).toEqual([]);
  });
});
