import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { DataFormatError, InputNotFoundError } from '../errors.js';
import type { Point } from '../types.js';

export const POINTS_FILE = 'points.txt';
export const CATEGORIES_FILE = 'categories.txt';
export const GROUPS_FILE = 'groups.txt';

const INTEGER_PATTERN = /^[+-]?\d+$/;

interface NumberedLine {
  text: string;
  line: number;
}

async function readLines(dir: string, file: string): Promise<NumberedLine[]> {
  const path = join(dir, file);
  let content: string;
  try {
    content = await readFile(path, 'utf8');
  } catch (err) {
    if (typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT') {
      throw new InputNotFoundError(path, err);
    }
    throw err;
  }
  return content
    .split(/\r?\n/)
    .map((text, i) => ({ text: text.trim(), line: i + 1 }))
    .filter((l) => l.text !== '');
}

function parseInteger(l: NumberedLine, file: string): number {
  const n = Number(l.text);
  if (!INTEGER_PATTERN.test(l.text) || !Number.isSafeInteger(n)) {
    throw new DataFormatError(`expected an integer, got "${l.text}"`, file, l.line);
  }
  return n;
}

function parseCoordinate(l: NumberedLine, file: string): [number, number] {
  const fields = l.text.split(/\s+/);
  const [x, y] = fields.map(Number);
  if (fields.length !== 2 || x === undefined || y === undefined || !Number.isFinite(x) || !Number.isFinite(y)) {
    throw new DataFormatError(`expected "<x> <y>", got "${l.text}"`, file, l.line);
  }
  return [x, y];
}

/**
 * Reads a bulk-load data directory of three aligned files: points.txt
 * (`x y` per line), categories.txt and groups.txt (one integer per line).
 * Blank lines are skipped; the n-th non-blank line of each file describes
 * the point with id n.
 */
export async function readDataDirectory(dir: string): Promise<Point[]> {
  const [pointLines, categoryLines, groupLines] = await Promise.all([
    readLines(dir, POINTS_FILE),
    readLines(dir, CATEGORIES_FILE),
    readLines(dir, GROUPS_FILE),
  ]);

  if (pointLines.length !== categoryLines.length || pointLines.length !== groupLines.length) {
    throw new DataFormatError(
      `line counts differ: ${POINTS_FILE} has ${pointLines.length}, `
        + `${CATEGORIES_FILE} has ${categoryLines.length}, ${GROUPS_FILE} has ${groupLines.length}`,
      dir,
    );
  }

  const coordinates = pointLines.map((l) => parseCoordinate(l, POINTS_FILE));
  const categories = categoryLines.map((l) => parseInteger(l, CATEGORIES_FILE));
  const groups = groupLines.map((l) => parseInteger(l, GROUPS_FILE));

  return coordinates.map(([x, y], i) => ({
    id: i + 1,
    groupId: groups[i] ?? 0,
    x,
    y,
    category: categories[i] ?? 0,
  }));
}
