export { buildQuery, buildPredicate, parseQueryText } from './query/builder.js';
export { predicate } from './query/predicate.js';
export type { CropOptions } from './query/predicate.js';
export { canonicalKey } from './query/canonical.js';
export type { PredicateNode, CropFilter, CropNode, AndNode, OrNode } from './query/types.js';
export { evaluate } from './evaluate/evaluator.js';
export type { EvaluateOptions } from './evaluate/evaluator.js';
export { ResultSet } from './evaluate/result-set.js';
export { finalize, comparePoints } from './evaluate/finalize.js';
export { formatNumber, formatPoints } from './output/format.js';
export { writeOutput } from './output/writer.js';
export { runQuery, readQueryFile } from './run-query.js';
export type { RunQueryOptions } from './run-query.js';
export type {
  Point,
  Box,
  Coordinate,
  RangeScanFilter,
  PointStore,
  SnapshotPointStore,
} from './types.js';
export { PostgresPointStore } from './store/point-store.js';
export type { PointStoreConfig } from './store/point-store.js';
export { readDataDirectory } from './store/loader.js';
export { loadConfig } from './config.js';
export type { Config } from './config.js';
export { createLogger } from './logger.js';
export {
  RegionQueryError,
  InputNotFoundError,
  MalformedQueryError,
  UnknownOperatorError,
  StoreUnavailableError,
  StoreError,
  QueryAbortedError,
  OutputWriteError,
  DataFormatError,
  ConfigError,
} from './errors.js';
export type { Stage } from './errors.js';
