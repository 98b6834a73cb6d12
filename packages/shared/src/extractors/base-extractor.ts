/**
 * Base Record Extractor
 *
 * Abstract base class providing the common envelope for extractors: logging,
 * timing, metrics, and conversion of unexpected exceptions into failures.
 */

import type { BookInDocument } from '../types';
import type { DocumentExtractor, ExtractionContext, ExtractorResult } from './types';
import { logger } from '../logger';
import {
  documentsParsedCounter,
  recordsExtractedCounter,
  parseWarningsCounter,
  progressStallsCounter,
  extractionDurationHistogram,
} from '../metrics';

function countWarnings(result: ExtractorResult): number {
  const recordWarnings = result.ok
    ? result.records.reduce((sum, record) => sum + record.parse_warnings.length, 0)
    : 0;
  return result.warnings.length + recordWarnings;
}

/**
 * Abstract base class for record extractors.
 * Subclasses implement extractImpl; extract never throws.
 */
export abstract class BaseExtractor implements DocumentExtractor {
  abstract readonly name: string;
  abstract readonly description: string;
  abstract readonly rank: number;

  async extract(document: BookInDocument, ctx: ExtractionContext): Promise<ExtractorResult> {
    const startTime = Date.now();
    const endTimer = extractionDurationHistogram.startTimer({ strategy: this.name });

    logger.info('Starting extraction', {
      strategy: this.name,
      document_id: document.document_id,
      page_count: document.pages.length,
    });

    try {
      const result = await this.extractImpl(document, ctx);

      const durationMs = Date.now() - startTime;
      result.metadata.durationMs = durationMs;
      endTimer();

      documentsParsedCounter.inc({ strategy: this.name, outcome: result.ok ? 'success' : 'failure' });
      if (result.ok && result.records.length > 0) {
        recordsExtractedCounter.inc({ strategy: this.name }, result.records.length);
      }
      const warningCount = countWarnings(result);
      if (warningCount > 0) parseWarningsCounter.inc(warningCount);
      if (result.metadata.stalls) progressStallsCounter.inc(result.metadata.stalls);

      logger.info('Extraction complete', {
        strategy: this.name,
        document_id: document.document_id,
        outcome: result.ok ? 'success' : 'failure',
        record_count: result.ok ? result.records.length : 0,
        warning_count: warningCount,
        duration_ms: durationMs,
      });

      return result;
    } catch (error) {
      endTimer();
      documentsParsedCounter.inc({ strategy: this.name, outcome: 'error' });
      logger.error('Extraction failed', error, {
        strategy: this.name,
        document_id: document.document_id,
      });

      return {
        ok: false,
        reason: error instanceof Error ? error.message : String(error),
        warnings: [],
        metadata: { durationMs: Date.now() - startTime },
      };
    }
  }

  /**
   * Extraction implementation. May throw; extract() converts it into a failure.
   */
  protected abstract extractImpl(
    document: BookInDocument,
    ctx: ExtractionContext
  ): Promise<ExtractorResult>;
}
