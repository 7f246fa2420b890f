import type { Logger } from 'pino';
import { QueryAbortedError } from '../errors.js';
import { canonicalKey } from '../query/canonical.js';
import type { CropFilter, PredicateNode } from '../query/types.js';
import { containsPoint, type Box, type PointStore, type RangeScanFilter } from '../types.js';
import { ResultSet } from './result-set.js';

export interface EvaluateOptions {
  /**
   * Evaluate the children of and/or nodes concurrently. The result is the
   * same as sequential evaluation; sequential and-nodes additionally stop at
   * the first empty child. A failing child aborts its siblings.
   */
  parallel?: boolean;
  /** Checked before every store call. */
  signal?: AbortSignal;
  logger?: Logger;
}

function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new QueryAbortedError(signal.reason);
  }
}

/**
 * Ids of the candidate groups whose every member lies within `box`. Uses
 * the store's containment primitive when it has one, otherwise loads each
 * group's full membership.
 */
export async function containedGroups(
  store: PointStore,
  box: Box,
  candidates: readonly number[],
  signal?: AbortSignal,
): Promise<Set<number>> {
  if (candidates.length === 0) return new Set();

  throwIfAborted(signal);
  if (store.fullyContainedGroups !== undefined) {
    return store.fullyContainedGroups(box, candidates);
  }

  const contained = new Set<number>();
  for (const groupId of candidates) {
    throwIfAborted(signal);
    const members = await store.pointsByGroup(groupId);
    if (members.every((p) => containsPoint(box, p.x, p.y))) {
      contained.add(groupId);
    }
  }
  return contained;
}

async function evaluateCrop(
  filter: CropFilter,
  store: PointStore,
  options: EvaluateOptions,
): Promise<ResultSet> {
  const scanFilter: RangeScanFilter = {
    ...(filter.category !== undefined ? { category: filter.category } : {}),
    ...(filter.oneOfGroups !== undefined ? { groupIds: filter.oneOfGroups } : {}),
  };

  throwIfAborted(options.signal);
  const matches = await store.rangeScan(filter.box, scanFilter);
  if (!filter.proper || matches.length === 0) {
    return ResultSet.of(matches);
  }

  // Containment is judged on whole groups, not only on the matching members
  const candidates = [...new Set(matches.map((p) => p.groupId))];
  const contained = await containedGroups(store, filter.box, candidates, options.signal);
  return ResultSet.of(matches.filter((p) => contained.has(p.groupId)));
}

/**
 * Evaluates siblings concurrently. The first failure aborts the others at
 * their next store call, and the promise settles only once every sibling
 * has stopped, so no store call outlives the evaluation.
 */
async function evaluateConcurrently(
  children: readonly PredicateNode[],
  store: PointStore,
  options: EvaluateOptions,
): Promise<ResultSet[]> {
  const controller = new AbortController();
  const parent = options.signal;
  const forwardAbort = (): void => controller.abort(parent?.reason);
  if (parent?.aborted) forwardAbort();
  parent?.addEventListener('abort', forwardAbort, { once: true });

  const failures: unknown[] = [];
  const childOptions: EvaluateOptions = { ...options, signal: controller.signal };
  try {
    const settled = await Promise.allSettled(children.map((child) =>
      evaluateNode(child, store, childOptions).catch((error: unknown) => {
        failures.push(error);
        controller.abort(error);
        throw error;
      })));

    // Report the failure that started the abort
    if (failures.length > 0) throw failures[0];
    return settled.flatMap((outcome) => (outcome.status === 'fulfilled' ? [outcome.value] : []));
  } finally {
    parent?.removeEventListener('abort', forwardAbort);
  }
}

async function evaluateChildren(
  children: readonly PredicateNode[],
  store: PointStore,
  options: EvaluateOptions,
  stopOnEmpty: boolean,
): Promise<ResultSet[]> {
  if (options.parallel) {
    return evaluateConcurrently(children, store, options);
  }
  const results: ResultSet[] = [];
  for (const child of children) {
    const result = await evaluateNode(child, store, options);
    results.push(result);
    if (stopOnEmpty && result.size === 0) break;
  }
  return results;
}

async function evaluateOperator(
  node: PredicateNode,
  store: PointStore,
  options: EvaluateOptions,
): Promise<ResultSet> {
  switch (node.kind) {
    case 'crop':
      return evaluateCrop(node.filter, store, options);
    case 'and':
      return ResultSet.intersectAll(await evaluateChildren(node.children, store, options, true));
    case 'or':
      return ResultSet.unionAll(await evaluateChildren(node.children, store, options, false));
  }
}

async function evaluateNode(
  node: PredicateNode,
  store: PointStore,
  options: EvaluateOptions,
): Promise<ResultSet> {
  const result = await evaluateOperator(node, store, options);
  options.logger?.debug({ node: canonicalKey(node), size: result.size }, 'evaluated node');
  return result;
}

/**
 * Evaluates a predicate tree against a point store. Store failures propagate
 * unchanged and no partial result is returned.
 */
export async function evaluate(
  node: PredicateNode,
  store: PointStore,
  options: EvaluateOptions = {},
): Promise<ResultSet> {
  return evaluateNode(node, store, options);
}
