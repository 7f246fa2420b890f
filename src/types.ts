export interface Point {
  readonly id: number;
  readonly groupId: number;
  readonly x: number;
  readonly y: number;
  readonly category: number;
}

export interface Coordinate {
  readonly x: number;
  readonly y: number;
}

/** Axis-aligned box, inclusive on every edge. `min` never exceeds `max` on either axis. */
export interface Box {
  readonly min: Coordinate;
  readonly max: Coordinate;
}

export interface RangeScanFilter {
  category?: number;
  /** Empty or absent means no group restriction. */
  groupIds?: readonly number[];
}

/**
 * Read-only access to the stored points. Implementations must answer every
 * call of one query from the same consistent view of the data.
 */
export interface PointStore {
  rangeScan(box: Box, filter?: RangeScanFilter): Promise<Point[]>;
  /**
   * Ids of the groups whose every member lies within `box`. When
   * `candidateGroupIds` is given only those groups are considered.
   * Optional: the evaluator falls back to pointsByGroup().
   */
  fullyContainedGroups?(box: Box, candidateGroupIds?: readonly number[]): Promise<Set<number>>;
  pointsByGroup(groupId: number): Promise<Point[]>;
}

export interface SnapshotPointStore extends PointStore {
  /** Runs `fn` against a store view pinned to one snapshot of the data. */
  withSnapshot<T>(fn: (store: PointStore) => Promise<T>): Promise<T>;
}

export function isSnapshotPointStore(store: PointStore): store is SnapshotPointStore {
  return 'withSnapshot' in store && typeof store.withSnapshot === 'function';
}

export function containsPoint(box: Box, x: number, y: number): boolean {
  return x >= box.min.x && x <= box.max.x && y >= box.min.y && y <= box.max.y;
}
