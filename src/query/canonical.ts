import type { PredicateNode } from './types.js';

/**
 * Stable string form of a predicate tree, used to identify nodes in logs and
 * diagnostics. Child order is kept as written.
 */
export function canonicalKey(node: PredicateNode): string {
  function canonical(n: PredicateNode): unknown {
    if (n.kind === 'crop') {
      const { box, category, oneOfGroups, proper } = n.filter;
      return {
        crop: [box.min.x, box.min.y, box.max.x, box.max.y],
        category: category ?? null,
        groups: oneOfGroups ?? null,
        proper,
      };
    }
    return { [n.kind]: n.children.map(canonical) };
  }

  return JSON.stringify(canonical(node));
}
