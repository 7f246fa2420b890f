import { MalformedQueryError } from '../errors.js';
import type { Box } from '../types.js';
import { uniqueGroups, validateBox } from './builder.js';
import type { AndNode, CropNode, OrNode, PredicateNode } from './types.js';

export interface CropOptions {
  category?: number;
  oneOfGroups?: readonly number[];
  proper?: boolean;
}

function requireChildren(operator: 'and' | 'or', children: PredicateNode[]): PredicateNode[] {
  if (children.length === 0) {
    throw new MalformedQueryError(`${operator}() needs at least one operand`, '');
  }
  return children;
}

/**
 * Programmatic entry point for building predicate trees. Applies the same
 * validation as the JSON builder.
 *
 * @example
 * predicate.and(
 *   predicate.crop({ min: { x: 0, y: 0 }, max: { x: 10, y: 10 } }),
 *   predicate.crop({ min: { x: 5, y: 5 }, max: { x: 15, y: 15 } }, { category: 2 }),
 * )
 */
export const predicate = {
  crop(box: Box, options: CropOptions = {}): CropNode {
    if (options.category !== undefined && !Number.isInteger(options.category)) {
      throw new MalformedQueryError(`category must be an integer, got ${options.category}`, '');
    }
    const groups = options.oneOfGroups ?? [];
    if (!groups.every((g) => Number.isInteger(g))) {
      throw new MalformedQueryError('oneOfGroups must contain integers only', '');
    }
    return {
      kind: 'crop',
      filter: {
        box: validateBox(box, ''),
        proper: options.proper ?? false,
        ...(options.category !== undefined ? { category: options.category } : {}),
        ...(groups.length > 0 ? { oneOfGroups: uniqueGroups(groups) } : {}),
      },
    };
  },

  and(...children: PredicateNode[]): AndNode {
    return { kind: 'and', children: requireChildren('and', children) };
  },

  or(...children: PredicateNode[]): OrNode {
    return { kind: 'or', children: requireChildren('or', children) };
  },
};
