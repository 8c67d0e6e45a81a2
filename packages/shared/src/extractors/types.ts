/**
 * Field Extractor Types
 *
 * A document schema maps each field to an anchor key and the strategy used to
 * find the field's value relative to that anchor:
 * - 'keyValueSet': follow a KEY block's VALUE relationship (positional fallback)
 * - 'nextLine': the LINE right after a LINE equal to the anchor
 * - 'sameLine': the text after the colon on a LINE containing the anchor
 * - 'table': the CELL to the right of a CELL containing the anchor
 */

import type { BlockGraph } from './block-graph';

export const STRATEGY_NAMES = ['keyValueSet', 'nextLine', 'sameLine', 'table'] as const;

export type StrategyName = (typeof STRATEGY_NAMES)[number];

/**
 * Resolves one anchor key against a block graph.
 * Returns undefined when nothing matches; a miss is never an error.
 */
export type FieldResolver = (graph: BlockGraph, anchorKey: string) => string | undefined;

/**
 * Outcome of resolving one declared field
 */
export interface FieldResolution {
  /** Field name from the schema */
  field: string;
  /** Anchor key searched for */
  key: string;
  /** Strategy name as declared (may be unknown) */
  strategy: string;
  /** Resolved value; absent when the field was not found */
  value?: string;
}

export function isStrategyName(name: string): name is StrategyName {
  return (STRATEGY_NAMES as readonly string[]).includes(name);
}
