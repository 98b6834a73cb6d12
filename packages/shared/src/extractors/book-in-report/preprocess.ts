/**
 * Line Preprocessing
 *
 * Flattens extracted pages into page-tagged lines ready for the scan:
 * whitespace is collapsed, blank lines and report furniture (titles, column
 * headers, page footers, dash rules) are dropped, and columnar lines joined
 * with " | " are split into separate lines.
 */

import type { PageLines, TaggedLine } from '../../types';
import { collapseWhitespace } from './patterns';

export const DEFAULT_HEADER_PATTERNS: readonly string[] = [
  '^Daily Booked In Report$',
  '^Inmates Booked In During the Past 24 Hours\\b',
  '^Inmate Name\\s+Identifier(?:\\s+CID)?\\s+Book In Date\\s+Booking No\\.?\\s+Description$',
  '^Page:?\\s*\\d+\\s+of\\s+\\d+$',
  '^Page:$',
  '^\\d+\\s+of\\s+\\d+$',
  '^[-\\s]{5,}$',
  '^Report Date:',
];

/**
 * Column header words that some extractions emit one per line.
 */
const SPLIT_HEADER_TOKENS = new Set([
  'INMATE NAME',
  'IDENTIFIER',
  'CID',
  'BOOK IN DATE',
  'BOOKING NO.',
  'DESCRIPTION',
]);

const COLUMN_SEPARATOR = /\s+\|\s+/;

export function compileHeaderPatterns(sources: readonly string[]): RegExp[] {
  return sources.map((source) => new RegExp(source, 'i'));
}

const DEFAULT_COMPILED = compileHeaderPatterns(DEFAULT_HEADER_PATTERNS);

export function isHeaderOrFooter(line: string, patterns: readonly RegExp[] = DEFAULT_COMPILED): boolean {
  const text = collapseWhitespace(line);
  if (text === '') return true;
  if (SPLIT_HEADER_TOKENS.has(text.toUpperCase())) return true;
  return patterns.some((p) => p.test(text));
}

export function splitColumns(line: string): string[] {
  return line
    .split(COLUMN_SEPARATOR)
    .map(collapseWhitespace)
    .filter((part) => part !== '');
}

export function preprocessPages(
  pages: readonly PageLines[],
  headerPatterns: readonly RegExp[] = DEFAULT_COMPILED
): TaggedLine[] {
  const tagged: TaggedLine[] = [];

  for (const page of pages) {
    for (const raw of page.lines) {
      if (isHeaderOrFooter(raw, headerPatterns)) continue;
      for (const part of splitColumns(raw)) {
        if (!isHeaderOrFooter(part, headerPatterns)) {
          tagged.push({ text: part, page: page.pageNumber });
        }
      }
    }
  }

  return tagged;
}
