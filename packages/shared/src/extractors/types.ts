/**
 * Record Extractor Types
 *
 * Defines interfaces for the ranked extraction strategy chain.
 * Each extractor turns a book-in document into arrest records or reports why
 * it could not; the chain tries extractors in rank order and the first
 * success wins.
 */

import type { ArrestRecord, BookInDocument } from '../types';
import type { ParseOptions } from './book-in-report/parser';

/**
 * Context passed to extractors during extraction
 */
export interface ExtractionContext {
  /** Correlation ID for tracing */
  correlationId: string;
  /** Overrides for the text parser's configuration */
  parseOptions?: ParseOptions;
}

/**
 * Metadata about an extraction operation
 */
export interface ExtractorMetadata {
  /** Algorithm version (for algorithmic extraction) */
  algorithmVersion?: string;
  /** Duration of extraction in milliseconds */
  durationMs?: number;
  /** Lines scanned after preprocessing */
  lines?: number;
  /** Lines skipped by the progress guard */
  stalls?: number;
}

export interface ExtractorSuccess {
  ok: true;
  records: ArrestRecord[];
  /** Document-level warnings not attached to any record */
  warnings: string[];
  metadata: ExtractorMetadata;
}

export interface ExtractorFailure {
  ok: false;
  reason: string;
  warnings: string[];
  metadata: ExtractorMetadata;
}

/**
 * Result returned by an extractor
 */
export type ExtractorResult = ExtractorSuccess | ExtractorFailure;

/**
 * Interface for record extractors.
 */
export interface DocumentExtractor {
  /** Unique name, also the `strategy` metric label */
  readonly name: string;

  /** Human-readable description of what this extractor does */
  readonly description: string;

  /** Lower ranks are tried first */
  readonly rank: number;

  extract(document: BookInDocument, ctx: ExtractionContext): Promise<ExtractorResult>;
}
