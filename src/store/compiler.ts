import type { Box, RangeScanFilter } from '../types.js';

export interface CompiledQuery {
  sql: string;
  params: unknown[];
}

const POINT_COLUMNS = 'id, group_id, coord_x, coord_y, category';

/**
 * Appends a parameter and returns its placeholder.
 * Uses a shared counter object so every fragment of one query shares the same sequence.
 */
function bind(value: unknown, params: unknown[], counter: { n: number }): string {
  params.push(value);
  counter.n += 1;
  return `$${counter.n}`;
}

/** Inclusive box condition on the coordinate columns of single points. */
function compileBoxCondition(box: Box, params: unknown[], counter: { n: number }): string {
  const minX = bind(box.min.x, params, counter);
  const maxX = bind(box.max.x, params, counter);
  const minY = bind(box.min.y, params, counter);
  const maxY = bind(box.max.y, params, counter);
  return `coord_x >= ${minX} AND coord_x <= ${maxX} AND coord_y >= ${minY} AND coord_y <= ${maxY}`;
}

/**
 * Compiles a box scan with optional exact category and group membership filters.
 */
export function compileRangeScan(box: Box, filter: RangeScanFilter = {}): CompiledQuery {
  const params: unknown[] = [];
  const counter = { n: 0 };
  const conditions = [compileBoxCondition(box, params, counter)];

  if (filter.category !== undefined) {
    conditions.push(`category = ${bind(filter.category, params, counter)}`);
  }
  if (filter.groupIds !== undefined && filter.groupIds.length > 0) {
    conditions.push(`group_id = ANY(${bind([...filter.groupIds], params, counter)}::bigint[])`);
  }

  const sql = [
    `SELECT ${POINT_COLUMNS}`,
    'FROM inspection_region',
    `WHERE ${conditions.join(' AND ')}`,
    'ORDER BY id ASC',
  ].join('\n');

  return { sql, params };
}

/**
 * Compiles the containment check: ids of groups whose every member lies in
 * the box. Computed over complete group membership, never over a filtered
 * subset. When candidates are given only those groups are aggregated.
 */
export function compileContainedGroups(box: Box, candidateGroupIds?: readonly number[]): CompiledQuery {
  const params: unknown[] = [];
  const counter = { n: 0 };

  const where = candidateGroupIds !== undefined
    ? `WHERE group_id = ANY(${bind([...candidateGroupIds], params, counter)}::bigint[])`
    : null;

  const minX = bind(box.min.x, params, counter);
  const maxX = bind(box.max.x, params, counter);
  const minY = bind(box.min.y, params, counter);
  const maxY = bind(box.max.y, params, counter);

  const lines = [
    'SELECT group_id',
    'FROM inspection_region',
    ...(where !== null ? [where] : []),
    'GROUP BY group_id',
    `HAVING MIN(coord_x) >= ${minX} AND MAX(coord_x) <= ${maxX}`
      + ` AND MIN(coord_y) >= ${minY} AND MAX(coord_y) <= ${maxY}`,
  ];

  return { sql: lines.join('\n'), params };
}

/** Compiles a lookup of every member of one group. */
export function compilePointsByGroup(groupId: number): CompiledQuery {
  const sql = [
    `SELECT ${POINT_COLUMNS}`,
    'FROM inspection_region',
    'WHERE group_id = $1',
    'ORDER BY id ASC',
  ].join('\n');

  return { sql, params: [groupId] };
}

export interface InsertBatch {
  ids: number[];
  groupIds: number[];
  xs: number[];
  ys: number[];
  categories: number[];
}

export const INSERT_GROUPS_SQL = `
INSERT INTO inspection_group (id)
SELECT DISTINCT unnest($1::bigint[])
ON CONFLICT (id) DO NOTHING
`.trim();

export const INSERT_POINTS_SQL = `
INSERT INTO inspection_region (id, group_id, coord_x, coord_y, category)
SELECT * FROM unnest($1::bigint[], $2::bigint[], $3::float8[], $4::float8[], $5::int[])
ON CONFLICT (id) DO NOTHING
`.trim();

/** Compiles one column-wise batch insert of points. */
export function compileInsertPoints(batch: InsertBatch): CompiledQuery {
  return {
    sql: INSERT_POINTS_SQL,
    params: [batch.ids, batch.groupIds, batch.xs, batch.ys, batch.categories],
  };
}
