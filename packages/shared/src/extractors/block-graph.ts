/**
 * Block Graph
 *
 * Read-only view over the blocks of one analysed document, in the order the
 * analysis service returned them. Built fresh for every document and
 * discarded after extraction.
 *
 * Graph order only approximates reading order. The positional fallbacks in
 * the resolvers (the "next block" checks) depend on it and nothing else.
 */

import type { AnalysisResponse, Block } from '../types';
import { validateAnalysisResponse } from '../schemas';
import { decodeBlocks } from './analysis-response';
import { InvalidAnalysisResponseError } from './errors';

export class BlockGraph {
  readonly blocks: readonly Block[];
  readonly pages: number | undefined;

  private readonly positionById = new Map<string, number>();

  constructor(blocks: readonly Block[], pages?: number) {
    this.blocks = Object.freeze([...blocks]);
    this.pages = pages;

    this.blocks.forEach((block, index) => {
      // First occurrence wins, same as a front-to-back scan
      if (block.id !== undefined && !this.positionById.has(block.id)) {
        this.positionById.set(block.id, index);
      }
    });
  }

  /**
   * Validate a raw analysis response and build a graph from it.
   *
   * @throws InvalidAnalysisResponseError if the payload violates the contract
   */
  static fromAnalysisResponse(data: unknown): BlockGraph {
    const result = validateAnalysisResponse(data);
    if (!result.valid) {
      throw new InvalidAnalysisResponseError(result.errors);
    }
    return BlockGraph.fromDecoded(result.value);
  }

  static fromDecoded(response: AnalysisResponse): BlockGraph {
    return new BlockGraph(decodeBlocks(response), response.DocumentMetadata?.Pages ?? undefined);
  }

  get size(): number {
    return this.blocks.length;
  }

  at(index: number): Block | undefined {
    return index >= 0 && index < this.blocks.length ? this.blocks[index] : undefined;
  }

  /**
   * Look up a block by id. Unknown and dangling ids give undefined.
   */
  findById(id: string): Block | undefined {
    const position = this.positionById.get(id);
    return position === undefined ? undefined : this.blocks[position];
  }

  blocksOfType(blockType: string): Block[] {
    return this.blocks.filter((block) => block.blockType === blockType);
  }

  /**
   * Blocks that carry text, for diagnostics dumps.
   */
  textBlocks(): Array<{ blockType: string; text: string }> {
    const result: Array<{ blockType: string; text: string }> = [];
    for (const block of this.blocks) {
      if (block.text !== undefined) {
        result.push({ blockType: block.blockType, text: block.text });
      }
    }
    return result;
  }
}
