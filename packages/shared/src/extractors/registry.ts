/**
 * Extractor Registry
 *
 * Registry pattern for record extractors, keyed by name and read back in rank
 * order for the fallback chain.
 */

import type { DocumentExtractor } from './types';
import { DuplicateExtractorError, ExtractorNotFoundError } from '../errors';
import { logger } from '../logger';

/**
 * Map of extractor names to extractors
 */
const extractorRegistry = new Map<string, DocumentExtractor>();

/**
 * Register an extractor.
 *
 * @throws DuplicateExtractorError if the name is already taken
 */
export function registerExtractor(extractor: DocumentExtractor): void {
  if (extractorRegistry.has(extractor.name)) {
    throw new DuplicateExtractorError(extractor.name);
  }
  extractorRegistry.set(extractor.name, extractor);

  logger.debug('Registered extractor', {
    strategy: extractor.name,
    rank: extractor.rank,
    description: extractor.description,
  });
}

/**
 * Remove an extractor. Returns false if it was not registered.
 */
export function unregisterExtractor(name: string): boolean {
  return extractorRegistry.delete(name);
}

export function getExtractor(name: string): DocumentExtractor | undefined {
  return extractorRegistry.get(name);
}

/**
 * @throws ExtractorNotFoundError if no extractor has that name
 */
export function getExtractorOrThrow(name: string): DocumentExtractor {
  const extractor = extractorRegistry.get(name);
  if (!extractor) {
    throw new ExtractorNotFoundError(name);
  }
  return extractor;
}

export function hasExtractor(name: string): boolean {
  return extractorRegistry.has(name);
}

/**
 * All registered extractors, lowest rank first. Equal ranks keep registration order.
 */
export function getExtractors(): DocumentExtractor[] {
  return Array.from(extractorRegistry.values()).sort((a, b) => a.rank - b.rank);
}

/**
 * Clear all registered extractors.
 * Useful for testing.
 */
export function clearRegistry(): void {
  extractorRegistry.clear();
}

/**
 * Get registry statistics
 */
export function getRegistryStats(): {
  totalExtractors: number;
  names: string[];
} {
  const extractors = getExtractors();
  return {
    totalExtractors: extractors.length,
    names: extractors.map((e) => e.name),
  };
}
