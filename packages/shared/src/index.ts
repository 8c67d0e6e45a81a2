/**
 * Shared Package - Main Export
 */

// Context
export {
  getContext,
  getCorrelationId,
  runWithContext,
  runWithDocumentType,
  type RequestContext,
} from './context';

// Logger
export { logger, isLevelEnabled, type LogContext, type LogLevel } from './logger';

// Config
export { config, type Config } from './config';

// Types
export * from './types';

// Metrics
export {
  register,
  extractionsCounter,
  fieldResolutionsCounter,
  extractionDurationHistogram,
  getMetrics,
  getMetricsContentType,
} from './metrics';

// Schemas
export { validateAnalysisResponse, validateDocumentSchemas, type ValidationResult } from './schemas';

// Field extraction
export * from './extractors';
