import type pg from 'pg';
import type { Box, Point, PointStore, RangeScanFilter, SnapshotPointStore } from '../types.js';
import {
  compileContainedGroups,
  compileInsertPoints,
  compilePointsByGroup,
  compileRangeScan,
  INSERT_GROUPS_SQL,
  type CompiledQuery,
} from './compiler.js';
import { storeFailure } from './failure.js';
import { mapRow, toSafeInteger, type GroupIdRow, type RegionRow } from './row-mapper.js';
import { applySchema } from './schema.js';

type RunQuery = <R extends pg.QueryResultRow>(sql: string, params: unknown[]) => Promise<pg.QueryResult<R>>;

export interface PointStoreConfig {
  pool: pg.Pool;
  /** Per-statement timeout inside snapshots. 0 or absent leaves the server default. */
  statementTimeoutMs?: number;
  /** Rows per INSERT during bulk load. */
  loadBatchSize?: number;
}

/** Primitive point queries over whatever connection `run` is bound to. */
class PostgresPointReader implements PointStore {
  constructor(private readonly run: RunQuery) {}

  async rangeScan(box: Box, filter: RangeScanFilter = {}): Promise<Point[]> {
    return this.selectPoints(compileRangeScan(box, filter), 'scan region');
  }

  async fullyContainedGroups(box: Box, candidateGroupIds?: readonly number[]): Promise<Set<number>> {
    if (candidateGroupIds !== undefined && candidateGroupIds.length === 0) return new Set();
    const { sql, params } = compileContainedGroups(box, candidateGroupIds);
    let result: pg.QueryResult<GroupIdRow>;
    try {
      result = await this.run<GroupIdRow>(sql, params);
    } catch (err) {
      throw storeFailure('check group containment', err);
    }
    return new Set(result.rows.map((row) => toSafeInteger(row.group_id, 'group_id')));
  }

  async pointsByGroup(groupId: number): Promise<Point[]> {
    return this.selectPoints(compilePointsByGroup(groupId), `load group ${groupId}`);
  }

  private async selectPoints({ sql, params }: CompiledQuery, action: string): Promise<Point[]> {
    let result: pg.QueryResult<RegionRow>;
    try {
      result = await this.run<RegionRow>(sql, params);
    } catch (err) {
      throw storeFailure(action, err);
    }
    return result.rows.map(mapRow);
  }
}

export class PostgresPointStore extends PostgresPointReader implements SnapshotPointStore {
  private readonly pool: pg.Pool;
  private readonly statementTimeoutMs: number;
  private readonly loadBatchSize: number;

  constructor(config: PointStoreConfig) {
    super(<R extends pg.QueryResultRow>(sql: string, params: unknown[]) => config.pool.query<R>(sql, params));
    this.pool = config.pool;
    this.statementTimeoutMs = config.statementTimeoutMs ?? 0;
    this.loadBatchSize = config.loadBatchSize ?? 5_000;
  }

  private async connect(stage: 'evaluate' | 'load'): Promise<pg.PoolClient> {
    try {
      return await this.pool.connect();
    } catch (err) {
      throw storeFailure('connect', err, stage);
    }
  }

  async initializeSchema(): Promise<void> {
    const client = await this.connect('load');
    try {
      await applySchema(client);
    } catch (err) {
      throw storeFailure('apply schema', err, 'load');
    } finally {
      client.release();
    }
  }

  /**
   * Runs `fn` inside a read-only REPEATABLE READ transaction on one pooled
   * client, so every primitive it calls sees the same snapshot.
   */
  async withSnapshot<T>(fn: (store: PointStore) => Promise<T>): Promise<T> {
    const client = await this.connect('evaluate');
    try {
      try {
        await client.query('BEGIN ISOLATION LEVEL REPEATABLE READ READ ONLY');
        if (this.statementTimeoutMs > 0) {
          await client.query("SELECT set_config('statement_timeout', $1, true)", [String(this.statementTimeoutMs)]);
        }
      } catch (err) {
        throw storeFailure('open snapshot', err);
      }

      const view = new PostgresPointReader(
        <R extends pg.QueryResultRow>(sql: string, params: unknown[]) => client.query<R>(sql, params),
      );
      const result = await fn(view);

      try {
        await client.query('COMMIT');
      } catch (err) {
        throw storeFailure('close snapshot', err);
      }
      return result;
    } catch (err) {
      await client.query('ROLLBACK').catch(() => undefined);
      throw err;
    } finally {
      client.release();
    }
  }

  /**
   * Inserts points and their groups in one transaction. Existing ids are
   * left untouched. Returns the number of points inserted.
   */
  async load(points: readonly Point[]): Promise<number> {
    const client = await this.connect('load');
    try {
      await client.query('BEGIN');

      const groupIds = [...new Set(points.map((p) => p.groupId))];
      await client.query(INSERT_GROUPS_SQL, [groupIds]);

      let inserted = 0;
      for (let start = 0; start < points.length; start += this.loadBatchSize) {
        const batch = points.slice(start, start + this.loadBatchSize);
        const { sql, params } = compileInsertPoints({
          ids: batch.map((p) => p.id),
          groupIds: batch.map((p) => p.groupId),
          xs: batch.map((p) => p.x),
          ys: batch.map((p) => p.y),
          categories: batch.map((p) => p.category),
        });
        const result = await client.query(sql, params);
        inserted += result.rowCount ?? 0;
      }

      await client.query('COMMIT');
      return inserted;
    } catch (err) {
      await client.query('ROLLBACK').catch(() => undefined);
      throw storeFailure('load points', err, 'load');
    } finally {
      client.release();
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
