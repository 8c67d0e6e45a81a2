/**
 * Prometheus Metrics
 *
 * Counters and timings for field extraction. The host process decides how
 * (and whether) to expose them; see getMetrics().
 */

import * as promClient from 'prom-client';

// Create a Registry for metrics
export const register = new promClient.Registry();

// ============================================================================
// Extraction Metrics
// ============================================================================

export const extractionsCounter = new promClient.Counter({
  name: 'docfields_extractions_total',
  help: 'Total number of extraction passes by document type and outcome',
  labelNames: ['document_type', 'status'],
  registers: [register],
});

export const fieldResolutionsCounter = new promClient.Counter({
  name: 'docfields_field_resolutions_total',
  help: 'Field resolution attempts by strategy and outcome',
  labelNames: ['strategy', 'outcome'],
  registers: [register],
});

export const extractionDurationHistogram = new promClient.Histogram({
  name: 'docfields_extraction_duration_seconds',
  help: 'Duration of a single extraction pass',
  labelNames: ['document_type'],
  buckets: [0.0005, 0.001, 0.005, 0.01, 0.05, 0.1, 0.5],
  registers: [register],
});

/**
 * Get metrics in Prometheus format
 */
export async function getMetrics(): Promise<string> {
  return register.metrics();
}

/**
 * Get content type for metrics endpoint
 */
export function getMetricsContentType(): string {
  return register.contentType;
}
