/**
 * Prometheus Metrics
 *
 * Metrics for book-in report extraction: documents, records, warnings,
 * progress stalls and extraction duration.
 */

import * as promClient from 'prom-client';

// Create a Registry for metrics
export const register = new promClient.Registry();

// ============================================================================
// Extraction Metrics
// ============================================================================

export const documentsParsedCounter = new promClient.Counter({
  name: 'bookin_documents_parsed_total',
  help: 'Total number of documents run through an extraction strategy',
  labelNames: ['strategy', 'outcome'],
  registers: [register],
});

export const recordsExtractedCounter = new promClient.Counter({
  name: 'bookin_records_extracted_total',
  help: 'Total number of arrest records extracted',
  labelNames: ['strategy'],
  registers: [register],
});

export const parseWarningsCounter = new promClient.Counter({
  name: 'bookin_parse_warnings_total',
  help: 'Total number of parse warnings attached to records or documents',
  registers: [register],
});

export const progressStallsCounter = new promClient.Counter({
  name: 'bookin_progress_stalls_total',
  help: 'Total number of lines skipped by the progress guard',
  registers: [register],
});

export const extractionDurationHistogram = new promClient.Histogram({
  name: 'bookin_extraction_duration_seconds',
  help: 'Duration of document extraction',
  labelNames: ['strategy'],
  buckets: [0.001, 0.005, 0.01, 0.05, 0.1, 0.5, 1, 5],
  registers: [register],
});

/**
 * Get Prometheus metrics
 */
export async function getMetrics(): Promise<string> {
  return register.metrics();
}

/**
 * Get content type for Prometheus metrics
 */
export function getMetricsContentType(): string {
  return register.contentType;
}
