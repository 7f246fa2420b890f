import type { Box } from '../types.js';

export interface CropFilter {
  readonly box: Box;
  /** Absent means any category. */
  readonly category?: number;
  /** Absent or empty means any group. */
  readonly oneOfGroups?: readonly number[];
  /** Keep a group's points only if the whole group lies within `box`. */
  readonly proper: boolean;
}

export type PredicateNode =
  | { readonly kind: 'crop'; readonly filter: CropFilter }
  | { readonly kind: 'and';  readonly children: readonly PredicateNode[] }
  | { readonly kind: 'or';   readonly children: readonly PredicateNode[] };

export type CropNode = Extract<PredicateNode, { kind: 'crop' }>;
export type AndNode = Extract<PredicateNode, { kind: 'and' }>;
export type OrNode = Extract<PredicateNode, { kind: 'or' }>;

/** Operator keys of the JSON query description, in lookup order. */
export const OPERATOR_KEYS = ['operator_crop', 'operator_and', 'operator_or'] as const;
