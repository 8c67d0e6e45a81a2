/**
 * Field Extractors Module
 *
 * Schema-driven extraction of named fields from an analysed document's
 * block graph.
 *
 * Strategies:
 * - 'keyValueSet': KEY block -> VALUE relationship, next-LINE fallback
 * - 'nextLine': LINE following the anchor LINE
 * - 'sameLine': text after the colon on the anchor LINE
 * - 'table': CELL right of the anchor CELL
 */

// Core types
export {
  STRATEGY_NAMES,
  isStrategyName,
  type StrategyName,
  type FieldResolver,
  type FieldResolution,
} from './types';

// Block graph
export { BlockGraph } from './block-graph';
export { decodeBlock, decodeBlocks } from './analysis-response';

// Resolvers
export {
  RESOLVERS,
  resolveField,
  resolveKeyValueSet,
  followValueRelationships,
  resolveNextLine,
  resolveSameLine,
  resolveTable,
} from './resolvers';

// Schema registry
export {
  SchemaRegistry,
  loadSchemaRegistry,
  getSchemaRegistry,
  setSchemaRegistry,
  resetSchemaRegistry,
  type SchemaRegistryStats,
} from './schema-registry';

// Orchestrator
export { FieldExtractor, resolveFields } from './field-extractor';

// Errors
export {
  ExtractionError,
  SchemaNotFoundError,
  NothingExtractedError,
  InvalidAnalysisResponseError,
  InvalidSchemaConfigError,
  isExtractionError,
  toErrorEnvelope,
  type ExtractionErrorCode,
} from './errors';
