/**
 * Schema Registry
 *
 * Immutable lookup of document schemas by document type. Loaded once at
 * startup (from config.schemaFile unless a registry is installed explicitly)
 * and shared read-only by every extraction.
 */

import fs from 'fs';
import type { DocumentSchema, DocumentSchemaSet, FieldStrategy } from '../types';
import { validateDocumentSchemas } from '../schemas';
import { config } from '../config';
import { logger } from '../logger';
import { InvalidSchemaConfigError, SchemaNotFoundError } from './errors';
import { isStrategyName } from './types';

export interface SchemaRegistryStats {
  totalSchemas: number;
  totalFields: number;
  byStrategy: Record<string, number>;
  documentTypes: string[];
}

function freezeSchema(schema: DocumentSchema): DocumentSchema {
  const fields: Record<string, FieldStrategy> = Object.fromEntries(
    Object.entries(schema.fields).map(([name, field]): [string, FieldStrategy] => [
      name,
      Object.freeze({ key: field.key, strategy: field.strategy }),
    ])
  );
  return Object.freeze({ type: schema.type, fields: Object.freeze(fields) });
}

export class SchemaRegistry {
  private readonly schemas: ReadonlyMap<string, DocumentSchema>;

  constructor(schemas: DocumentSchemaSet) {
    const entries = new Map<string, DocumentSchema>();
    for (const [documentType, schema] of Object.entries(schemas)) {
      entries.set(documentType, freezeSchema(schema));
    }
    this.schemas = entries;
  }

  /**
   * Build a registry from parsed JSON, validating it against
   * document_schemas.schema.json.
   *
   * @throws InvalidSchemaConfigError if the data violates the contract
   */
  static fromJson(data: unknown): SchemaRegistry {
    const result = validateDocumentSchemas(data);
    if (!result.valid) {
      throw new InvalidSchemaConfigError('Invalid document schema set', result.errors);
    }

    for (const [documentType, schema] of Object.entries(result.value)) {
      if (schema.type !== documentType) {
        logger.warn('Schema type differs from its key, key wins', {
          document_type: documentType,
          declared_type: schema.type,
        });
      }
      for (const [field, strategy] of Object.entries(schema.fields)) {
        if (!isStrategyName(strategy.strategy)) {
          logger.warn('Unknown strategy, field will never resolve', {
            document_type: documentType,
            field,
            strategy: strategy.strategy,
          });
        }
      }
    }

    return new SchemaRegistry(result.value);
  }

  /**
   * Get the schema for a document type, or undefined if not registered.
   */
  getSchema(documentType: string): DocumentSchema | undefined {
    return this.schemas.get(documentType);
  }

  /**
   * @throws SchemaNotFoundError if no schema is registered for that type
   */
  getSchemaOrThrow(documentType: string): DocumentSchema {
    const schema = this.schemas.get(documentType);
    if (!schema) {
      throw new SchemaNotFoundError(documentType);
    }
    return schema;
  }

  hasSchema(documentType: string): boolean {
    return this.schemas.has(documentType);
  }

  getDocumentTypes(): string[] {
    return Array.from(this.schemas.keys());
  }

  getStats(): SchemaRegistryStats {
    const byStrategy: Record<string, number> = {};
    let totalFields = 0;

    for (const schema of this.schemas.values()) {
      for (const field of Object.values(schema.fields)) {
        byStrategy[field.strategy] = (byStrategy[field.strategy] || 0) + 1;
        totalFields++;
      }
    }

    return {
      totalSchemas: this.schemas.size,
      totalFields,
      byStrategy,
      documentTypes: this.getDocumentTypes(),
    };
  }
}

/**
 * Read a schema set file and build a registry from it.
 *
 * @throws InvalidSchemaConfigError if the file cannot be read, parsed or validated
 */
export function loadSchemaRegistry(filePath: string): SchemaRegistry {
  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new InvalidSchemaConfigError(
      `Failed to load document schemas from ${filePath}`,
      [error instanceof Error ? error.message : String(error)],
      { cause: error }
    );
  }

  const registry = SchemaRegistry.fromJson(data);
  const stats = registry.getStats();

  logger.info('Loaded document schemas', {
    file: filePath,
    schema_count: stats.totalSchemas,
    field_count: stats.totalFields,
    document_types: stats.documentTypes,
  });

  return registry;
}

let defaultRegistry: SchemaRegistry | null = null;

/**
 * Process-wide registry, loaded from config.schemaFile on first use.
 */
export function getSchemaRegistry(): SchemaRegistry {
  if (!defaultRegistry) {
    defaultRegistry = loadSchemaRegistry(config.schemaFile);
  }
  return defaultRegistry;
}

/**
 * Install the process-wide registry (at startup, or in tests).
 */
export function setSchemaRegistry(registry: SchemaRegistry): void {
  defaultRegistry = registry;
}

/**
 * Forget the process-wide registry; the next getSchemaRegistry() reloads it.
 * Useful for testing.
 */
export function resetSchemaRegistry(): void {
  defaultRegistry = null;
}
