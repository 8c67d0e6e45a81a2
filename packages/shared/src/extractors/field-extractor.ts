/**
 * Field Extractor
 *
 * Runs every field a document schema declares through the resolver named by
 * its strategy and collects the values that were found. A document where no
 * field resolves at all is reported as NothingExtractedError.
 */

import type { DocumentSchema, ExtractedInfo } from '../types';
import { runWithDocumentType } from '../context';
import { logger, isLevelEnabled } from '../logger';
import { extractionsCounter, fieldResolutionsCounter, extractionDurationHistogram } from '../metrics';
import type { BlockGraph } from './block-graph';
import { NothingExtractedError, SchemaNotFoundError } from './errors';
import { resolveField } from './resolvers';
import type { SchemaRegistry } from './schema-registry';
import { isStrategyName, type FieldResolution } from './types';

const UNKNOWN_LABEL = 'unknown';

/**
 * Resolve every field of a schema against a graph, in declaration order.
 * Empty-string values count as not found.
 */
export function resolveFields(schema: DocumentSchema, graph: BlockGraph): FieldResolution[] {
  const resolutions: FieldResolution[] = [];

  for (const [field, strategy] of Object.entries(schema.fields)) {
    logger.debug('Resolving field', {
      field,
      key: strategy.key,
      strategy: strategy.strategy,
    });

    const value = resolveField(graph, strategy);
    const found = value !== undefined && value !== '';

    fieldResolutionsCounter.inc({
      strategy: isStrategyName(strategy.strategy) ? strategy.strategy : UNKNOWN_LABEL,
      outcome: found ? 'found' : 'not_found',
    });

    if (found) {
      logger.debug('Field resolved', { field, value });
      resolutions.push({ field, key: strategy.key, strategy: strategy.strategy, value });
    } else {
      logger.debug('Field not found', { field, key: strategy.key, strategy: strategy.strategy });
      resolutions.push({ field, key: strategy.key, strategy: strategy.strategy });
    }
  }

  return resolutions;
}

export class FieldExtractor {
  constructor(private readonly registry: SchemaRegistry) {}

  /**
   * Extract the fields declared for `documentType` from a block graph.
   *
   * @throws SchemaNotFoundError if the document type has no schema
   * @throws NothingExtractedError if no field resolved; carries the graph
   */
  extract(documentType: string, graph: BlockGraph): ExtractedInfo {
    return runWithDocumentType(documentType, () => this.extractInContext(documentType, graph));
  }

  private extractInContext(documentType: string, graph: BlockGraph): ExtractedInfo {
    const startTime = process.hrtime.bigint();

    const schema = this.registry.getSchema(documentType);
    if (!schema) {
      extractionsCounter.inc({ document_type: UNKNOWN_LABEL, status: 'schema_not_found' });
      logger.warn('No schema for document type');
      throw new SchemaNotFoundError(documentType);
    }

    logger.info('Starting extraction', {
      field_count: Object.keys(schema.fields).length,
      block_count: graph.size,
    });

    const resolutions = resolveFields(schema, graph);

    const entries: Array<[string, string]> = [];
    for (const resolution of resolutions) {
      if (resolution.value !== undefined) {
        entries.push([resolution.field, resolution.value]);
      }
    }
    const extracted: ExtractedInfo = Object.fromEntries(entries);

    const durationSeconds = Number(process.hrtime.bigint() - startTime) / 1e9;
    extractionDurationHistogram.observe({ document_type: documentType }, durationSeconds);

    const foundCount = Object.keys(extracted).length;
    if (foundCount === 0) {
      extractionsCounter.inc({ document_type: documentType, status: 'nothing_extracted' });
      logger.warn('No information extracted', {
        field_count: resolutions.length,
        block_count: graph.size,
      });
      if (isLevelEnabled('debug')) {
        logger.debug('Text blocks of unresolved document', { blocks: graph.textBlocks() });
      }
      throw new NothingExtractedError(documentType, graph, resolutions);
    }

    extractionsCounter.inc({ document_type: documentType, status: 'success' });
    logger.info('Extraction complete', {
      found_count: foundCount,
      missing_fields: resolutions.filter((r) => r.value === undefined).map((r) => r.field),
      duration_ms: Math.round(durationSeconds * 1000),
    });

    return extracted;
  }
}
