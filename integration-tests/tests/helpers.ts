/**
 * Test Helpers
 *
 * Builders for blocks and graphs, plus fixture paths.
 */

import path from 'path';
import { BlockGraph, SchemaRegistry, type Block, type DocumentSchema } from '@docfields/shared';

export const FIXTURES_DIR = path.join(__dirname, '../../fixtures');

export function fixturePath(...segments: string[]): string {
  return path.join(FIXTURES_DIR, ...segments);
}

export function line(id: string, text?: string): Block {
  return { id, blockType: 'LINE', text, entityTypes: [], relationships: [] };
}

export function keyBlock(id: string, text: string, valueIds: string[] = []): Block {
  return {
    id,
    blockType: 'KEY_VALUE_SET',
    text,
    entityTypes: ['KEY'],
    relationships: valueIds.length > 0 ? [{ type: 'VALUE', ids: valueIds }] : [],
  };
}

export function valueBlock(id: string, text?: string): Block {
  return { id, blockType: 'KEY_VALUE_SET', text, entityTypes: ['VALUE'], relationships: [] };
}

export function cell(id: string, rowIndex: number | undefined, columnIndex: number | undefined, text?: string): Block {
  return { id, blockType: 'CELL', text, entityTypes: [], relationships: [], rowIndex, columnIndex };
}

export function graphOf(...blocks: Block[]): BlockGraph {
  return new BlockGraph(blocks);
}

/**
 * Registry with a single document type whose fields are given inline.
 */
export function registryWith(
  documentType: string,
  fields: DocumentSchema['fields']
): SchemaRegistry {
  return new SchemaRegistry({ [documentType]: { type: documentType, fields } });
}
