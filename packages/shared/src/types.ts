/**
 * Shared TypeScript Types
 *
 * Types for the book-in report extraction pipeline, matching JSON schemas in docs/contracts/
 */

// ============================================================================
// Input
// ============================================================================

/**
 * One page of already-extracted text, in visual reading order.
 */
export interface PageLines {
  pageNumber: number;
  lines: readonly string[];
}

/**
 * A single line of the flattened document, tagged with the page it came from.
 */
export interface TaggedLine {
  text: string;
  page: number;
}

export interface BookInDocument {
  document_id: string;
  source_filename: string;
  pages: readonly PageLines[];
}

// ============================================================================
// Output
// ============================================================================

export interface Charge {
  /** Booking number: two digits, dash, 6-7 digits (e.g. 25-0240350) */
  readonly booking_no: string;
  readonly description: string;
}

export interface ArrestRecord {
  /** Name as printed: "LAST, FIRST MIDDLE" */
  readonly name: string;
  /** "First Middle Last" */
  readonly name_normalized: string;
  /** 0-3 free-text address lines */
  readonly address: readonly string[];
  /** Facility-assigned person identifier, 5-8 digits */
  readonly identifier: string | null;
  /** ISO 8601 date (YYYY-MM-DD) */
  readonly book_in_date: string | null;
  readonly charges: readonly Charge[];
  /** [first page touched, last page touched] */
  readonly source_page_span: readonly [number, number];
  readonly parse_warnings: readonly string[];
}

export interface ParseStats {
  lines: number;
  iterations: number;
  stalls: number;
}

export interface ParseResult {
  records: ArrestRecord[];
  /** Diagnostics raised while no record was open */
  warnings: string[];
  stats: ParseStats;
}

// ============================================================================
// Validation
// ============================================================================

export interface ValidationResult {
  valid: boolean;
  errors?: string[];
}
