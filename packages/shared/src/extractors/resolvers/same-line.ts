/**
 * Same Line Resolver
 *
 * Matches "Label: value" lines. The first LINE containing the anchor as a
 * substring is split on its first colon and the trimmed remainder returned.
 * Containment, not equality: short anchors can match unrelated lines.
 * Only that first match is tried: if it has no colon the field is not found,
 * even when a later line would have matched with one.
 */

import { BLOCK_TYPES } from '../../types';
import type { BlockGraph } from '../block-graph';

const SEPARATOR = ':';

export function resolveSameLine(graph: BlockGraph, anchorKey: string): string | undefined {
  const line = graph.blocks.find(
    (block) => block.blockType === BLOCK_TYPES.LINE && block.text?.includes(anchorKey)
  );
  const text = line?.text;
  if (text === undefined) return undefined;

  const separatorAt = text.indexOf(SEPARATOR);
  if (separatorAt === -1) return undefined;

  return text.slice(separatorAt + SEPARATOR.length).trim();
}
