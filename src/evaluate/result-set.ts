import type { Point } from '../types.js';

/**
 * Immutable set of points keyed by point id. Never holds two entries with
 * the same id; the first point seen for an id is kept.
 */
export class ResultSet {
  static readonly empty = new ResultSet(new Map());

  private constructor(private readonly byId: ReadonlyMap<number, Point>) {}

  static of(points: Iterable<Point>): ResultSet {
    const byId = new Map<number, Point>();
    for (const point of points) {
      if (!byId.has(point.id)) byId.set(point.id, point);
    }
    return byId.size === 0 ? ResultSet.empty : new ResultSet(byId);
  }

  get size(): number {
    return this.byId.size;
  }

  has(id: number): boolean {
    return this.byId.has(id);
  }

  ids(): number[] {
    return [...this.byId.keys()];
  }

  points(): Point[] {
    return [...this.byId.values()];
  }

  intersect(other: ResultSet): ResultSet {
    // Iterate the smaller side
    const [small, large] = this.size <= other.size ? [this, other] : [other, this];
    const byId = new Map<number, Point>();
    for (const [id, point] of small.byId) {
      if (large.byId.has(id)) byId.set(id, point);
    }
    return byId.size === 0 ? ResultSet.empty : new ResultSet(byId);
  }

  union(other: ResultSet): ResultSet {
    if (other.size === 0) return this;
    if (this.size === 0) return other;
    const byId = new Map(this.byId);
    for (const [id, point] of other.byId) {
      if (!byId.has(id)) byId.set(id, point);
    }
    return new ResultSet(byId);
  }

  static intersectAll(sets: readonly ResultSet[]): ResultSet {
    const [first, ...rest] = sets;
    if (first === undefined) return ResultSet.empty;
    let acc = first;
    for (const set of rest) {
      if (acc.size === 0) break;
      acc = acc.intersect(set);
    }
    return acc;
  }

  static unionAll(sets: readonly ResultSet[]): ResultSet {
    return sets.reduce((acc, set) => acc.union(set), ResultSet.empty);
  }
}
