import pino from 'pino';
import type { Box, Point, PointStore, RangeScanFilter } from '../../src/types.js';
import { containsPoint } from '../../src/types.js';

export function pt(id: number, x: number, y: number, category = 0, groupId = id): Point {
  return { id, groupId, x, y, category };
}

export function box(minX: number, minY: number, maxX: number, maxY: number): Box {
  return { min: { x: minX, y: minY }, max: { x: maxX, y: maxY } };
}

export function sortedIds(points: Iterable<Point>): number[] {
  return [...points].map((p) => p.id).sort((a, b) => a - b);
}

/**
 * In-process point store without a containment primitive; the evaluator has
 * to fall back to pointsByGroup().
 */
export class MemoryPointStore implements PointStore {
  readonly calls: string[] = [];

  constructor(readonly points: readonly Point[]) {}

  async rangeScan(b: Box, filter: RangeScanFilter = {}): Promise<Point[]> {
    this.calls.push('rangeScan');
    const groups = filter.groupIds !== undefined && filter.groupIds.length > 0
      ? new Set(filter.groupIds)
      : null;
    return this.points.filter((p) =>
      containsPoint(b, p.x, p.y)
      && (filter.category === undefined || p.category === filter.category)
      && (groups === null || groups.has(p.groupId)));
  }

  async pointsByGroup(groupId: number): Promise<Point[]> {
    this.calls.push(`pointsByGroup:${groupId}`);
    return this.points.filter((p) => p.groupId === groupId);
  }
}

/** In-process point store that answers containment directly. */
export class ContainmentMemoryStore extends MemoryPointStore {
  async fullyContainedGroups(b: Box, candidateGroupIds?: readonly number[]): Promise<Set<number>> {
    this.calls.push('fullyContainedGroups');
    const outside = new Set(this.points.filter((p) => !containsPoint(b, p.x, p.y)).map((p) => p.groupId));
    const all = candidateGroupIds ?? this.points.map((p) => p.groupId);
    return new Set(all.filter((g) => !outside.has(g)));
  }
}

/** pino logger collecting parsed JSON lines in memory. */
export function memoryLogger(level = 'debug') {
  const lines: Record<string, unknown>[] = [];
  const logger = pino({ level }, {
    write(msg: string) {
      const entry: Record<string, unknown> = JSON.parse(msg);
      lines.push(entry);
    },
  });
  return { logger, lines };
}
