/**
 * Table Resolver
 *
 * Finds the first CELL containing the anchor that has grid coordinates, then
 * returns the text of the cell directly to its right (same row, next column).
 */

import { BLOCK_TYPES } from '../../types';
import type { BlockGraph } from '../block-graph';

export function resolveTable(graph: BlockGraph, anchorKey: string): string | undefined {
  const anchor = graph.blocks.find(
    (block) =>
      block.blockType === BLOCK_TYPES.CELL &&
      block.text?.includes(anchorKey) &&
      block.rowIndex !== undefined &&
      block.columnIndex !== undefined
  );
  if (!anchor) return undefined;

  const { rowIndex, columnIndex } = anchor;
  if (rowIndex === undefined || columnIndex === undefined) return undefined;

  const neighbour = graph.blocks.find(
    (block) =>
      block.blockType === BLOCK_TYPES.CELL &&
      block.rowIndex === rowIndex &&
      block.columnIndex === columnIndex + 1 &&
      block.text !== undefined
  );
  return neighbour?.text;
}
