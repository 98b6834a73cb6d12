/**
 * Record Extractors Module
 *
 * Ranked chain of extraction strategies behind one interface. Extractors are
 * tried in rank order; the first one that returns records wins. A strategy
 * that throws or finds nothing is logged and the next one is tried.
 *
 * Built-in strategies:
 * - 'text_state_machine': line classifier + extraction state machine
 */

import type { ArrestRecord, BookInDocument } from '../types';
import type { ExtractionContext } from './types';
import type { ParseOptions } from './book-in-report/parser';
import { createDocumentContext, runWithContextAsync } from '../context';
import { logger } from '../logger';
import { validateArrestRecords } from '../schemas';
import { getExtractors, registerExtractor, hasExtractor } from './registry';
import { textStateMachineExtractor } from './book-in-report';

// Core types and interfaces
export type {
  DocumentExtractor,
  ExtractionContext,
  ExtractorResult,
  ExtractorSuccess,
  ExtractorFailure,
  ExtractorMetadata,
} from './types';

// Base classes
export { BaseExtractor } from './base-extractor';

// Registry
export {
  registerExtractor,
  unregisterExtractor,
  getExtractor,
  getExtractorOrThrow,
  hasExtractor,
  getExtractors,
  clearRegistry,
  getRegistryStats,
} from './registry';

// Book-in report engine
export * from './book-in-report';

export interface ExtractorFailureReport {
  extractor: string;
  reason: string;
}

export interface ChainResult {
  records: ArrestRecord[];
  /** Name of the extractor that produced the records, or null if all failed */
  extractor: string | null;
  warnings: string[];
  failures: ExtractorFailureReport[];
  /** Schema violations in the returned records; logged, never thrown */
  validationErrors: string[];
}

/**
 * Register all built-in extractors.
 * Safe to call more than once.
 */
export function registerAllExtractors(): void {
  if (!hasExtractor(textStateMachineExtractor.name)) {
    registerExtractor(textStateMachineExtractor);
  }
}

/**
 * Run the registered extractors in rank order until one returns records.
 */
export async function extractWithFallback(
  document: BookInDocument,
  parseOptions?: ParseOptions
): Promise<ChainResult> {
  const context = createDocumentContext(document.document_id, document.source_filename);

  return runWithContextAsync(context, async () => {
    const ctx: ExtractionContext = { correlationId: context.correlationId, parseOptions };
    const failures: ExtractorFailureReport[] = [];

    for (const extractor of getExtractors()) {
      const result = await extractor.extract(document, ctx);

      if (result.ok && result.records.length > 0) {
        const validation = validateArrestRecords(result.records);
        return {
          records: result.records,
          extractor: extractor.name,
          warnings: result.warnings,
          failures,
          validationErrors: validation.errors ?? [],
        };
      }

      const reason = result.ok ? 'No records found' : result.reason;
      failures.push({ extractor: extractor.name, reason });
      logger.warn('Extractor failed, trying next', { strategy: extractor.name, reason });
    }

    logger.warn('All extractors failed', {
      document_id: document.document_id,
      attempted: failures.map((f) => f.extractor),
    });

    return { records: [], extractor: null, warnings: [], failures, validationErrors: [] };
  });
}

// Auto-register built-in extractors on module load
registerAllExtractors();
