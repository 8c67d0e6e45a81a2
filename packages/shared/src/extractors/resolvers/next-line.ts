/**
 * Next Line Resolver
 *
 * Value is the LINE immediately after the LINE whose text equals the anchor.
 *
 * Only the first matching LINE is considered: if the block after it is not a
 * usable LINE the field is not found, even when the anchor recurs later.
 */

import { BLOCK_TYPES } from '../../types';
import type { BlockGraph } from '../block-graph';

export function resolveNextLine(graph: BlockGraph, anchorKey: string): string | undefined {
  const index = graph.blocks.findIndex(
    (block) => block.blockType === BLOCK_TYPES.LINE && block.text === anchorKey
  );
  if (index === -1) return undefined;

  const next = graph.at(index + 1);
  if (next?.blockType === BLOCK_TYPES.LINE && next.text !== undefined) {
    return next.text;
  }
  return undefined;
}
