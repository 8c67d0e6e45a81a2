/**
 * Shared TypeScript Types
 *
 * Wire types for the document-analysis response (matching
 * docs/contracts/analysis_response.schema.json), the block model the
 * extractors work on, and the document schema set
 * (docs/contracts/document_schemas.schema.json).
 */

// ============================================================================
// Analysis Response (wire format, as returned by the analysis service)
// ============================================================================

export interface RawBoundingBox {
  Width?: number | null;
  Height?: number | null;
  Left?: number | null;
  Top?: number | null;
}

export interface RawPoint {
  X?: number | null;
  Y?: number | null;
}

export interface RawGeometry {
  BoundingBox?: RawBoundingBox | null;
  Polygon?: RawPoint[] | null;
}

export interface RawRelationship {
  Type: string;
  Ids?: string[] | null;
}

export interface RawBlock {
  BlockType: string;
  Confidence?: number | null;
  Text?: string | null;
  RowIndex?: number | null;
  ColumnIndex?: number | null;
  RowSpan?: number | null;
  ColumnSpan?: number | null;
  Geometry?: RawGeometry | null;
  Id?: string | null;
  Relationships?: RawRelationship[] | null;
  EntityTypes?: string[] | null;
  SelectionStatus?: string | null;
  Page?: number | null;
}

export interface AnalysisResponse {
  DocumentMetadata?: {
    Pages?: number | null;
  } | null;
  Blocks?: RawBlock[] | null;
}

// ============================================================================
// Block Model
// ============================================================================

/**
 * Block types emitted by the analysis service. The set is open: blocks of
 * any other type are carried through and simply never matched.
 */
export const BLOCK_TYPES = {
  PAGE: 'PAGE',
  LINE: 'LINE',
  WORD: 'WORD',
  KEY_VALUE_SET: 'KEY_VALUE_SET',
  TABLE: 'TABLE',
  CELL: 'CELL',
  MERGED_CELL: 'MERGED_CELL',
  SELECTION_ELEMENT: 'SELECTION_ELEMENT',
  TITLE: 'TITLE',
  QUERY: 'QUERY',
  QUERY_RESULT: 'QUERY_RESULT',
  SIGNATURE: 'SIGNATURE',
  TABLE_TITLE: 'TABLE_TITLE',
  TABLE_FOOTER: 'TABLE_FOOTER',
} as const;

export const ENTITY_TYPES = {
  KEY: 'KEY',
  VALUE: 'VALUE',
} as const;

export const RELATIONSHIP_TYPES = {
  VALUE: 'VALUE',
  CHILD: 'CHILD',
  MERGED_CELL: 'MERGED_CELL',
  TITLE: 'TITLE',
  ANSWER: 'ANSWER',
} as const;

export interface BoundingBox {
  width: number;
  height: number;
  left: number;
  top: number;
}

export interface Point {
  x: number;
  y: number;
}

export interface Geometry {
  boundingBox?: BoundingBox;
  polygon: Point[];
}

export interface Relationship {
  type: string;
  ids: string[];
}

export interface Block {
  id?: string;
  blockType: string;
  text?: string;
  /** Entity role for KEY_VALUE_SET blocks; the first entry is KEY or VALUE */
  entityTypes: string[];
  relationships: Relationship[];
  /** Grid coordinates, present on table cells only (1-based) */
  rowIndex?: number;
  columnIndex?: number;
  rowSpan?: number;
  columnSpan?: number;
  // Passthrough, never used for extraction
  confidence?: number;
  geometry?: Geometry;
  selectionStatus?: string;
  page?: number;
}

// ============================================================================
// Document Schemas
// ============================================================================

export interface FieldStrategy {
  /** Anchor text the strategy searches for */
  key: string;
  /** Strategy name; unknown names resolve to "not found" */
  strategy: string;
}

export interface DocumentSchema {
  type: string;
  fields: Record<string, FieldStrategy>;
}

/** Schema set file contents, keyed by document type */
export type DocumentSchemaSet = Record<string, DocumentSchema>;

/** Field name to extracted value. Fields that were not found are absent. */
export type ExtractedInfo = Record<string, string>;

// ============================================================================
// Error Envelope
// ============================================================================

export interface ErrorEnvelope {
  error: {
    code: string;
    message: string;
    correlation_id: string;
  };
}
