/**
 * Block Graph Tests
 *
 * Indexing, filtering and decoding of analysis responses.
 */

import fs from 'fs';
import {
  BlockGraph,
  FieldExtractor,
  InvalidAnalysisResponseError,
  decodeBlock,
} from '@docfields/shared';
import { cell, fixturePath, graphOf, keyBlock, line, registryWith } from './helpers';

describe('BlockGraph', () => {
  describe('findById', () => {
    it('should find blocks by id', () => {
      const graph = graphOf(line('a', 'first'), line('b', 'second'));

      expect(graph.findById('b')?.text).toBe('second');
    });

    it('should return undefined for unknown ids', () => {
      const graph = graphOf(line('a', 'first'));

      expect(graph.findById('missing')).toBeUndefined();
    });

    it('should return the first block when ids repeat', () => {
      const graph = graphOf(line('dup', 'first'), line('dup', 'second'));

      expect(graph.findById('dup')?.text).toBe('first');
    });

    it('should ignore blocks without an id', () => {
      const graph = graphOf({ blockType: 'WORD', text: 'loose', entityTypes: [], relationships: [] });

      expect(graph.size).toBe(1);
      expect(graph.findById('undefined')).toBeUndefined();
    });
  });

  describe('blocksOfType', () => {
    it('should filter by type and keep graph order', () => {
      const graph = graphOf(
        line('l1', 'one'),
        cell('c1', 1, 1, 'A'),
        line('l2', 'two'),
        keyBlock('k1', 'Key')
      );

      expect(graph.blocksOfType('LINE').map((b) => b.id)).toEqual(['l1', 'l2']);
      expect(graph.blocksOfType('CELL').map((b) => b.id)).toEqual(['c1']);
      expect(graph.blocksOfType('SIGNATURE')).toEqual([]);
    });
  });

  describe('at', () => {
    it('should return undefined outside the sequence', () => {
      const graph = graphOf(line('a', 'only'));

      expect(graph.at(0)?.id).toBe('a');
      expect(graph.at(1)).toBeUndefined();
      expect(graph.at(-1)).toBeUndefined();
    });
  });

  describe('immutability', () => {
    it('should not be affected by later changes to the input array', () => {
      const blocks = [line('a', 'first')];
      const graph = new BlockGraph(blocks);

      blocks.push(line('b', 'second'));

      expect(graph.size).toBe(1);
      expect(graph.findById('b')).toBeUndefined();
      expect(Object.isFrozen(graph.blocks)).toBe(true);
    });
  });

  describe('textBlocks', () => {
    it('should list only blocks that carry text', () => {
      const graph = graphOf(line('a', 'Hello'), line('b'), cell('c', 1, 1, 'Qty'));

      expect(graph.textBlocks()).toEqual([
        { blockType: 'LINE', text: 'Hello' },
        { blockType: 'CELL', text: 'Qty' },
      ]);
    });
  });
});

describe('Analysis response decoding', () => {
  it('should decode the receipt fixture', () => {
    const raw: unknown = JSON.parse(
      fs.readFileSync(fixturePath('analysis', 'receipt.analysis.json'), 'utf-8')
    );

    const graph = BlockGraph.fromAnalysisResponse(raw);

    expect(graph.size).toBe(13);
    expect(graph.pages).toBe(1);
    expect(graph.findById('kv-key-1')?.relationships).toEqual([
      { type: 'VALUE', ids: ['kv-value-1'] },
      { type: 'CHILD', ids: ['word-missing'] },
    ]);
    expect(graph.findById('table-1')?.relationships).toEqual([{ type: 'CHILD', ids: [] }]);
    expect(graph.findById('cell-4')).toMatchObject({ rowIndex: 2, columnIndex: 2, text: '1.67' });
    expect(graph.findById('line-1')?.geometry).toEqual({
      boundingBox: { width: 0.41, height: 0.03, left: 0.12, top: 0.08 },
      polygon: [],
    });
  });

  it('should accept a response without blocks', () => {
    const graph = BlockGraph.fromAnalysisResponse({ DocumentMetadata: { Pages: 0 } });

    expect(graph.size).toBe(0);
  });

  it('should default list fields when optional data is absent', () => {
    expect(decodeBlock({ BlockType: 'LINE' })).toEqual({
      id: undefined,
      blockType: 'LINE',
      text: undefined,
      entityTypes: [],
      relationships: [],
      rowIndex: undefined,
      columnIndex: undefined,
      rowSpan: undefined,
      columnSpan: undefined,
      confidence: undefined,
      geometry: undefined,
      selectionStatus: undefined,
      page: undefined,
    });
  });

  it('should treat null optional fields as absent', () => {
    const nulls = {
      Id: null,
      Text: null,
      RowIndex: null,
      ColumnIndex: null,
      Relationships: null,
      EntityTypes: null,
      Geometry: null,
      Confidence: null,
    };

    const graph = BlockGraph.fromAnalysisResponse({
      DocumentMetadata: { Pages: null },
      Blocks: [
        { BlockType: 'PAGE', ...nulls },
        { ...nulls, BlockType: 'LINE', Id: 'l1', Text: 'Customer: Jane Doe' },
        { BlockType: 'KEY_VALUE_SET', Id: 'k1', Relationships: [{ Type: 'VALUE', Ids: null }] },
      ],
    });

    expect(graph.pages).toBeUndefined();
    expect(graph.at(0)).toMatchObject({ id: undefined, text: undefined, entityTypes: [], relationships: [] });
    expect(graph.findById('k1')?.relationships).toEqual([{ type: 'VALUE', ids: [] }]);

    const extractor = new FieldExtractor(
      registryWith('invoice', { customer: { key: 'Customer', strategy: 'sameLine' } })
    );
    expect(extractor.extract('invoice', graph)).toEqual({ customer: 'Jane Doe' });
  });

  it('should reject a block without BlockType', () => {
    expect(() => BlockGraph.fromAnalysisResponse({ Blocks: [{ Text: 'orphan' }] })).toThrow(
      InvalidAnalysisResponseError
    );
  });

  it('should report where the payload is invalid', () => {
    let thrown: unknown;
    try {
      BlockGraph.fromAnalysisResponse({ Blocks: [{ BlockType: 'CELL', RowIndex: 'one' }] });
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(InvalidAnalysisResponseError);
    if (thrown instanceof InvalidAnalysisResponseError) {
      expect(thrown.code).toBe('invalid_analysis_response');
      expect(thrown.errors).toEqual(['/Blocks/0/RowIndex: must be integer,null']);
    }
  });

  it('should reject non-object payloads', () => {
    expect(() => BlockGraph.fromAnalysisResponse('not json')).toThrow(InvalidAnalysisResponseError);
  });
});
