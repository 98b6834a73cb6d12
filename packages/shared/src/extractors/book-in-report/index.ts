/**
 * Book-In Report Extractor
 *
 * Text strategy for daily book-in reports: preprocess the extracted pages
 * (drop headers and footers, split columns), then run the line-to-record
 * state machine. A document that yields no records is a failure so the chain
 * can try the next strategy.
 */

import { BaseExtractor } from '../base-extractor';
import type { ExtractionContext, ExtractorResult } from '../types';
import type { BookInDocument } from '../../types';
import { config } from '../../config';
import { logger } from '../../logger';
import { compileHeaderPatterns, preprocessPages } from './preprocess';
import { parseTaggedLines, ALGORITHM_VERSION } from './parser';

export class TextStateMachineExtractor extends BaseExtractor {
  readonly name = 'text_state_machine';
  readonly description = 'Book-in report text - line classifier and extraction state machine';
  readonly rank = 10;

  private readonly headerPatterns: RegExp[];

  constructor(headerPatterns: readonly string[] = config.headerPatterns) {
    super();
    this.headerPatterns = compileHeaderPatterns(headerPatterns);
  }

  protected async extractImpl(document: BookInDocument, ctx: ExtractionContext): Promise<ExtractorResult> {
    const lines = preprocessPages(document.pages, this.headerPatterns);
    const { records, warnings, stats } = parseTaggedLines(lines, ctx.parseOptions);

    logger.debug('Book-in text parse result', {
      document_id: document.document_id,
      lines: stats.lines,
      iterations: stats.iterations,
      stalls: stats.stalls,
      records: records.length,
    });

    const metadata = {
      algorithmVersion: ALGORITHM_VERSION,
      lines: stats.lines,
      stalls: stats.stalls,
    };

    if (records.length === 0) {
      return {
        ok: false,
        reason: lines.length === 0 ? 'No report lines after preprocessing' : 'No records found',
        warnings,
        metadata,
      };
    }

    return { ok: true, records, warnings, metadata };
  }
}

export const textStateMachineExtractor = new TextStateMachineExtractor();

// Re-export the engine for direct use and testing
export * from './patterns';
export * from './classifier';
export * from './accumulator';
export * from './splitter';
export * from './transitions';
export * from './progress-guard';
export * from './reclassifier';
export * from './preprocess';
export * from './parser';
