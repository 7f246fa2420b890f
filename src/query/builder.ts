import type { ZodError } from 'zod';
import { MalformedQueryError, UnknownOperatorError } from '../errors.js';
import type { Box } from '../types.js';
import { CropDescriptionSchema, OperandListSchema } from './schema.js';
import { OPERATOR_KEYS, type CropFilter, type PredicateNode } from './types.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function keyPath(path: string, key: string): string {
  return path === '' ? key : `${path}.${key}`;
}

function indexPath(path: string, index: number): string {
  return `${path}[${index}]`;
}

/** Converts the first zod issue into a MalformedQueryError rooted at `path`. */
function fromZodError(error: ZodError, path: string): MalformedQueryError {
  const issue = error.issues[0];
  if (issue === undefined) {
    return new MalformedQueryError('invalid value', path);
  }
  const issuePath = issue.path.reduce<string>(
    (acc, segment) => (typeof segment === 'number' ? indexPath(acc, segment) : keyPath(acc, segment)),
    path,
  );
  return new MalformedQueryError(issue.message, issuePath);
}

/**
 * Rejects non-finite bounds and inverted boxes. A box with min > max on
 * either axis is a caller error, not an empty region.
 */
export function validateBox(box: Box, path: string): Box {
  const bounds = [
    ['p_min.x', box.min.x],
    ['p_min.y', box.min.y],
    ['p_max.x', box.max.x],
    ['p_max.y', box.max.y],
  ] as const;
  for (const [name, value] of bounds) {
    if (!Number.isFinite(value)) {
      throw new MalformedQueryError(`${name} must be a finite number, got ${value}`, path);
    }
  }
  if (box.min.x > box.max.x) {
    throw new MalformedQueryError(`p_min.x (${box.min.x}) exceeds p_max.x (${box.max.x})`, path);
  }
  if (box.min.y > box.max.y) {
    throw new MalformedQueryError(`p_min.y (${box.min.y}) exceeds p_max.y (${box.max.y})`, path);
  }
  return box;
}

/** Removes repeated group ids, keeping the order of first occurrence. */
export function uniqueGroups(groups: readonly number[]): number[] {
  return [...new Set(groups)];
}

function buildCrop(operand: unknown, path: string): PredicateNode {
  const parsed = CropDescriptionSchema.safeParse(operand);
  if (!parsed.success) {
    throw fromZodError(parsed.error, path);
  }
  const { region, category, one_of_groups: groups, proper } = parsed.data;
  const box = validateBox(
    { min: { x: region.p_min.x, y: region.p_min.y }, max: { x: region.p_max.x, y: region.p_max.y } },
    keyPath(path, 'region'),
  );

  const filter: CropFilter = {
    box,
    proper: proper ?? false,
    ...(category != null ? { category } : {}),
    ...(groups != null && groups.length > 0 ? { oneOfGroups: uniqueGroups(groups) } : {}),
  };
  return { kind: 'crop', filter };
}

function buildChildren(operand: unknown, path: string): PredicateNode[] {
  const parsed = OperandListSchema.safeParse(operand);
  if (!parsed.success) {
    throw fromZodError(parsed.error, path);
  }
  return parsed.data.map((child, i) => buildPredicate(child, indexPath(path, i)));
}

/**
 * Translates one operator node of a query description into a PredicateNode.
 * Performs structural validation only: no I/O, no evaluation.
 */
export function buildPredicate(node: unknown, path = ''): PredicateNode {
  if (!isRecord(node)) {
    throw new MalformedQueryError('operator node must be a JSON object', path);
  }

  const [operator, ...extra] = OPERATOR_KEYS.filter((key) => key in node);
  if (operator === undefined) {
    throw new UnknownOperatorError(path, Object.keys(node));
  }
  if (extra.length > 0) {
    throw new MalformedQueryError(
      `node has more than one operator key (${[operator, ...extra].join(', ')})`,
      path,
    );
  }

  const operandPath = keyPath(path, operator);
  const operand = node[operator];
  switch (operator) {
    case 'operator_crop':
      return buildCrop(operand, operandPath);
    case 'operator_and':
      return { kind: 'and', children: buildChildren(operand, operandPath) };
    case 'operator_or':
      return { kind: 'or', children: buildChildren(operand, operandPath) };
  }
}

/** Builds the predicate tree of a parsed `{ "query": <operator-node> }` document. */
export function buildQuery(document: unknown): PredicateNode {
  if (!isRecord(document)) {
    throw new MalformedQueryError('query document must be a JSON object', '');
  }
  if (!('query' in document)) {
    throw new MalformedQueryError('missing "query" key', '');
  }
  return buildPredicate(document['query'], 'query');
}

/** Parses query description text and builds its predicate tree. */
export function parseQueryText(text: string): PredicateNode {
  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new MalformedQueryError(`invalid JSON: ${detail}`, '', 'parse', err);
  }
  return buildQuery(document);
}
