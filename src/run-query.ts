import { readFile } from 'node:fs/promises';
import type { Logger } from 'pino';
import { InputNotFoundError } from './errors.js';
import { evaluate } from './evaluate/evaluator.js';
import { finalize } from './evaluate/finalize.js';
import type { ResultSet } from './evaluate/result-set.js';
import { writeOutput } from './output/writer.js';
import { parseQueryText } from './query/builder.js';
import { canonicalKey } from './query/canonical.js';
import type { PredicateNode } from './query/types.js';
import { isSnapshotPointStore, type Point, type PointStore } from './types.js';

export interface RunQueryOptions {
  queryPath: string;
  outputPath: string;
  store: PointStore;
  logger?: Logger;
  parallel?: boolean;
  signal?: AbortSignal;
}

/** Reads and builds the predicate tree stored at `path`. */
export async function readQueryFile(path: string): Promise<PredicateNode> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (err) {
    throw new InputNotFoundError(path, err);
  }
  return parseQueryText(text);
}

/**
 * Reads a query description, evaluates it against one snapshot of the store,
 * and writes the ordered result. Nothing is written when any step fails.
 */
export async function runQuery(options: RunQueryOptions): Promise<Point[]> {
  const { store, logger } = options;

  const tree = await readQueryFile(options.queryPath);
  logger?.debug({ query: canonicalKey(tree) }, 'query built');

  const evaluateOptions = {
    parallel: options.parallel ?? false,
    ...(options.signal !== undefined ? { signal: options.signal } : {}),
    ...(logger !== undefined ? { logger } : {}),
  };
  const result: ResultSet = isSnapshotPointStore(store)
    ? await store.withSnapshot((view) => evaluate(tree, view, evaluateOptions))
    : await evaluate(tree, store, evaluateOptions);

  const points = finalize(result);
  await writeOutput(options.outputPath, points);
  logger?.info({ output: options.outputPath, points: points.length }, 'output written');
  return points;
}
