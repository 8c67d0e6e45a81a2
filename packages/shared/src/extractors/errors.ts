/**
 * Extraction Errors
 *
 * Every failure the engine reports carries a stable `code` so hosts can map
 * it onto their own response format. A field that cannot be found is NOT an
 * error; only whole-document outcomes are.
 */

import type { ErrorEnvelope } from '../types';
import type { BlockGraph } from './block-graph';
import type { FieldResolution } from './types';

export type ExtractionErrorCode =
  | 'schema_not_found'
  | 'nothing_extracted'
  | 'invalid_analysis_response'
  | 'invalid_schema_config';

export abstract class ExtractionError extends Error {
  abstract readonly code: ExtractionErrorCode;
}

/**
 * No schema is registered for the requested document type.
 */
export class SchemaNotFoundError extends ExtractionError {
  readonly code = 'schema_not_found';

  constructor(readonly documentType: string) {
    super(`Schema not found for document type: ${documentType}`);
    this.name = 'SchemaNotFoundError';
  }
}

/**
 * The schema was valid but not a single field resolved.
 * Carries the original graph so callers can return it for manual inspection.
 */
export class NothingExtractedError extends ExtractionError {
  readonly code = 'nothing_extracted';

  constructor(
    readonly documentType: string,
    readonly graph: BlockGraph,
    readonly resolutions: FieldResolution[]
  ) {
    super(`No information could be extracted from the document (type: ${documentType})`);
    this.name = 'NothingExtractedError';
  }
}

export class InvalidAnalysisResponseError extends ExtractionError {
  readonly code = 'invalid_analysis_response';

  constructor(readonly errors: string[]) {
    super(`Invalid analysis response: ${errors.join('; ')}`);
    this.name = 'InvalidAnalysisResponseError';
  }
}

export class InvalidSchemaConfigError extends ExtractionError {
  readonly code = 'invalid_schema_config';

  constructor(
    message: string,
    readonly errors: string[] = [],
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'InvalidSchemaConfigError';
  }
}

export function isExtractionError(value: unknown): value is ExtractionError {
  return value instanceof ExtractionError;
}

/**
 * Render any thrown value as an ErrorEnvelope.
 */
export function toErrorEnvelope(error: unknown, correlationId: string): ErrorEnvelope {
  if (isExtractionError(error)) {
    return {
      error: {
        code: error.code,
        message: error.message,
        correlation_id: correlationId,
      },
    };
  }

  return {
    error: {
      code: 'internal_error',
      message: error instanceof Error ? error.message : 'Unknown error',
      correlation_id: correlationId,
    },
  };
}
