import { StoreError } from '../errors.js';
import type { Point } from '../types.js';

export interface RegionRow {
  id: string;         // pg returns BIGINT as string by default
  group_id: string;
  coord_x: number;    // DOUBLE PRECISION is parsed to number
  coord_y: number;
  category: number;
}

export interface GroupIdRow {
  group_id: string;
}

/** Converts a BIGINT column value to a number, refusing values that would lose precision. */
export function toSafeInteger(value: string | number, column: string): number {
  const n = typeof value === 'number' ? value : Number(value);
  if (!Number.isSafeInteger(n)) {
    throw new StoreError(`Column ${column} holds ${String(value)}, outside the safe integer range`);
  }
  return n;
}

export function mapRow(row: RegionRow): Point {
  return {
    id: toSafeInteger(row.id, 'id'),
    groupId: toSafeInteger(row.group_id, 'group_id'),
    x: row.coord_x,
    y: row.coord_y,
    category: row.category,
  };
}
