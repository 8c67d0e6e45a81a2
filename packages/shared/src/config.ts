/**
 * Centralized Configuration
 *
 * All configuration values can be tuned via environment variables.
 */

import path from 'path';

export interface Config {
  // Document schemas (keyed by document type)
  schemaFile: string;

  // JSON contracts directory override; unset means the default search paths
  contractsDir: string | undefined;
}

export const config: Config = {
  // Document schemas
  schemaFile:
    process.env.DOCUMENT_SCHEMAS_FILE ||
    path.join(process.cwd(), 'config', 'document-schemas.json'),

  // Contracts
  contractsDir: process.env.CONTRACTS_DIR || undefined,
};
