/**
 * Key/Value Set Resolver
 *
 * Finds the first KEY block whose text equals the anchor and returns the text
 * of the block its VALUE relationship points at. Some layouts carry no
 * relationship; for those the block right after the key is used when it is a
 * LINE with text (positional fallback, relies on graph order).
 */

import type { Block } from '../../types';
import { BLOCK_TYPES, ENTITY_TYPES, RELATIONSHIP_TYPES } from '../../types';
import type { BlockGraph } from '../block-graph';

function isKeyBlock(block: Block): boolean {
  return (
    block.blockType === BLOCK_TYPES.KEY_VALUE_SET &&
    block.entityTypes.length > 0 &&
    block.entityTypes[0] === ENTITY_TYPES.KEY
  );
}

/**
 * Text of the first VALUE target that exists and has text.
 * Dangling ids are skipped.
 */
export function followValueRelationships(graph: BlockGraph, block: Block): string | undefined {
  for (const relationship of block.relationships) {
    if (relationship.type !== RELATIONSHIP_TYPES.VALUE) continue;

    for (const id of relationship.ids) {
      const valueBlock = graph.findById(id);
      if (valueBlock?.text !== undefined) {
        return valueBlock.text;
      }
    }
  }
  return undefined;
}

export function resolveKeyValueSet(graph: BlockGraph, anchorKey: string): string | undefined {
  const index = graph.blocks.findIndex((block) => isKeyBlock(block) && block.text === anchorKey);
  if (index === -1) return undefined;

  const value = followValueRelationships(graph, graph.blocks[index]);
  if (value !== undefined) return value;

  const next = graph.at(index + 1);
  if (next?.blockType === BLOCK_TYPES.LINE && next.text !== undefined) {
    return next.text;
  }
  return undefined;
}
