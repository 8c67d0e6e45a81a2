/**
 * JSON Schema Validation
 *
 * Schema validation using Ajv for analysis responses and the document
 * schema set file.
 */

import fs from 'fs';
import path from 'path';
import Ajv2020 from 'ajv/dist/2020';
import type { SchemaObject, ValidateFunction } from 'ajv';
import { config } from './config';
import { logger } from './logger';
import type { AnalysisResponse, DocumentSchemaSet } from './types';

// Initialize Ajv with 2020-12 draft support
const ajv = new Ajv2020({
  strict: false, // Allow additional keywords from JSON Schema draft
  allErrors: true,
  verbose: true,
});

// Validators - compiled lazily on first use
let analysisResponseValidator: ValidateFunction<AnalysisResponse> | null = null;
let documentSchemasValidator: ValidateFunction<DocumentSchemaSet> | null = null;

function loadSchema(schemaName: string): SchemaObject {
  // Try multiple paths for schema resolution
  const possiblePaths = [
    // Explicit override
    ...(config.contractsDir ? [path.join(config.contractsDir, schemaName)] : []),
    // Relative to shared package sources
    path.join(__dirname, '../../../docs/contracts', schemaName),
    // Relative to shared package dist
    path.join(__dirname, '../../../../docs/contracts', schemaName),
    // Relative to project root
    path.join(process.cwd(), 'docs/contracts', schemaName),
  ];

  for (const schemaPath of possiblePaths) {
    if (fs.existsSync(schemaPath)) {
      const content = fs.readFileSync(schemaPath, 'utf-8');
      return JSON.parse(content);
    }
  }

  // Return a permissive schema if file not found (for container environments)
  logger.warn(`Schema file not found: ${schemaName}, using permissive validation`);
  return { type: 'object' };
}

function getAnalysisResponseValidator(): ValidateFunction<AnalysisResponse> {
  if (!analysisResponseValidator) {
    analysisResponseValidator = ajv.compile<AnalysisResponse>(
      loadSchema('analysis_response.schema.json')
    );
  }
  return analysisResponseValidator;
}

function getDocumentSchemasValidator(): ValidateFunction<DocumentSchemaSet> {
  if (!documentSchemasValidator) {
    documentSchemasValidator = ajv.compile<DocumentSchemaSet>(
      loadSchema('document_schemas.schema.json')
    );
  }
  return documentSchemasValidator;
}

export type ValidationResult<T> =
  | { valid: true; value: T }
  | { valid: false; errors: string[] };

function runValidator<T>(
  validate: ValidateFunction<T>,
  data: unknown,
  label: string
): ValidationResult<T> {
  if (validate(data)) {
    return { valid: true, value: data };
  }

  const errors = (validate.errors ?? []).map((e) => `${e.instancePath || '/'}: ${e.message}`);
  logger.warn(`${label} validation failed`, { errors });
  return { valid: false, errors };
}

/**
 * Validate a raw analysis response against analysis_response.schema.json
 */
export function validateAnalysisResponse(data: unknown): ValidationResult<AnalysisResponse> {
  return runValidator(getAnalysisResponseValidator(), data, 'AnalysisResponse');
}

/**
 * Validate a document schema set against document_schemas.schema.json
 */
export function validateDocumentSchemas(data: unknown): ValidationResult<DocumentSchemaSet> {
  return runValidator(getDocumentSchemasValidator(), data, 'DocumentSchemaSet');
}
