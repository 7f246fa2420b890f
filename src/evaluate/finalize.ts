import type { Point } from '../types.js';
import type { ResultSet } from './result-set.js';

/** Orders points by y, then x, then id, all ascending. */
export function comparePoints(a: Point, b: Point): number {
  if (a.y !== b.y) return a.y < b.y ? -1 : 1;
  if (a.x !== b.x) return a.x < b.x ? -1 : 1;
  return a.id - b.id;
}

export function finalize(result: ResultSet): Point[] {
  return result.points().sort(comparePoints);
}
