/**
 * Analysis Response Decoding
 *
 * Converts the analysis service's PascalCase wire blocks into the Block
 * model. Every optional field may be missing or null; list fields default
 * to empty and the rest to undefined.
 */

import type {
  AnalysisResponse,
  Block,
  Geometry,
  RawBlock,
  RawGeometry,
  Relationship,
} from '../types';

function decodeGeometry(raw: RawGeometry): Geometry {
  const box = raw.BoundingBox;
  return {
    boundingBox: box
      ? {
          width: box.Width ?? 0,
          height: box.Height ?? 0,
          left: box.Left ?? 0,
          top: box.Top ?? 0,
        }
      : undefined,
    polygon: (raw.Polygon ?? []).map((p) => ({ x: p.X ?? 0, y: p.Y ?? 0 })),
  };
}

export function decodeBlock(raw: RawBlock): Block {
  const relationships: Relationship[] = (raw.Relationships ?? []).map((rel) => ({
    type: rel.Type,
    ids: rel.Ids ?? [],
  }));

  return {
    id: raw.Id ?? undefined,
    blockType: raw.BlockType,
    text: raw.Text ?? undefined,
    entityTypes: raw.EntityTypes ?? [],
    relationships,
    rowIndex: raw.RowIndex ?? undefined,
    columnIndex: raw.ColumnIndex ?? undefined,
    rowSpan: raw.RowSpan ?? undefined,
    columnSpan: raw.ColumnSpan ?? undefined,
    confidence: raw.Confidence ?? undefined,
    geometry: raw.Geometry ? decodeGeometry(raw.Geometry) : undefined,
    selectionStatus: raw.SelectionStatus ?? undefined,
    page: raw.Page ?? undefined,
  };
}

export function decodeBlocks(response: AnalysisResponse): Block[] {
  return (response.Blocks ?? []).map(decodeBlock);
}
