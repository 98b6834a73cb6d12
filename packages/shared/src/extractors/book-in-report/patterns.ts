/**
 * Book-In Report Patterns
 *
 * Regular expressions and recognizers for the lines of a daily book-in report:
 * inmate names, identifier/book-in date pairs, booking (charge) lines and
 * address lines.
 *
 * Name recognizers come in two variants. Strict accepts upper-case tokens only
 * and is always tried first; tolerant accepts mixed case and is consulted only
 * when the caller allows it. Every other recognizer is case-independent.
 */

import { parse, isValid, format } from 'date-fns';

// ============================================================================
// Captures
// ============================================================================

export interface NameMatch {
  /** The name exactly as printed, e.g. "ADAMS, NINA KISHA" */
  raw: string;
  last: string;
  firstMiddle: string;
  /** True when only the mixed-case variant matched */
  tolerant: boolean;
}

export interface IdDatePair {
  identifier: string;
  /** Date as printed, M/D/YYYY */
  rawDate: string;
}

export interface IdDateMatch extends IdDatePair {
  before: string;
  after: string;
}

export interface NameStart {
  name: NameMatch;
  /** Present when the identifier and date share the name's line */
  idDate: IdDatePair | null;
}

export interface BookingMatch {
  bookingNo: string;
  description: string;
}

export interface EmbeddedNameMatch {
  before: string;
  name: NameMatch;
  after: string;
}

// ============================================================================
// Name pattern tables
// ============================================================================

export type PatternVariant = 'strict' | 'tolerant';

export interface PatternLibrary {
  readonly variant: PatternVariant;
  /** Whole line is "LAST, FIRST MIDDLE" */
  readonly name: RegExp;
  /** Whole line is "LAST, FIRST 1234567 10/15/2025" */
  readonly nameIdDate: RegExp;
  /** "LAST, FIRST" anywhere, preceded by start of line or whitespace (global) */
  readonly embeddedName: RegExp;
}

/**
 * The libraries consulted for a parse, in order.
 */
export interface PatternSet {
  readonly primary: PatternLibrary;
  readonly fallback: PatternLibrary | null;
}

/**
 * Build the name recognizers for one variant.
 */
export function buildPatternLibrary(variant: PatternVariant): PatternLibrary {
  const L = variant === 'strict' ? 'A-Z' : 'A-Za-z';
  const token = `[${L}][${L}\\-.']*`;
  const spaced = `[${L}][${L}\\-.' ]*`;
  const cityStateZip = `(?:${token} )*[A-Z]{2}\\s+\\d{5}(?!\\d)`;

  return Object.freeze({
    variant,
    name: new RegExp(`^(?<last>${spaced}),\\s+(?<firstMiddle>${spaced})$`),
    nameIdDate: new RegExp(
      `^(?<name>(?<last>${spaced}),\\s+(?<firstMiddle>${spaced}))\\s+` +
        `(?<identifier>\\d{5,8})(?:\\s+\\d{4,10})?\\s+(?<date>\\d{1,2}\\/\\d{1,2}\\/\\d{4})$`
    ),
    // Last name is the single token before the comma; first/middle runs over
    // letter tokens and stops before a run of words ending in "ST 12345".
    embeddedName: new RegExp(
      `(?<!\\S)(?<last>${token}),\\s+(?<firstMiddle>${token}(?: (?!${cityStateZip})${token})*)(?=\\s|$)`,
      'g'
    ),
  });
}

export const STRICT_PATTERNS = buildPatternLibrary('strict');
export const TOLERANT_PATTERNS = buildPatternLibrary('tolerant');

const STRICT_ONLY: PatternSet = Object.freeze({ primary: STRICT_PATTERNS, fallback: null });
const STRICT_THEN_TOLERANT: PatternSet = Object.freeze({
  primary: STRICT_PATTERNS,
  fallback: TOLERANT_PATTERNS,
});

export function resolvePatternSet(strict: boolean): PatternSet {
  return strict ? STRICT_ONLY : STRICT_THEN_TOLERANT;
}

// ============================================================================
// Case-independent recognizers
// ============================================================================

/**
 * Identifier followed by a book-in date, with an optional CID column between.
 * Five digits right after a two-letter word are a ZIP code, not an identifier.
 * Examples: "1234567 10/15/2025", "1234567 1063442 10/15/2025",
 * "FORT WORTH TX 76104 1234567 10/15/2025"
 */
export const ID_DATE_PATTERN =
  /(?<!\S)(?<identifier>(?<!(?<!\S)[A-Z]{2}\s+)\d{5}(?!\d)|\d{6,8})(?:\s+(?<cid>\d{4,10}))?\s+(?<date>\d{1,2}\/\d{1,2}\/\d{4})(?!\S)/;

export const IDENTIFIER_ONLY_PATTERN = /^(?<identifier>\d{5,8})$/;

export const DATE_ONLY_PATTERN = /^(?<date>\d{1,2}\/\d{1,2}\/\d{4})$/;

/**
 * Booking line: booking number at line start, the rest is the charge.
 * Example: "25-0240350 NO VALID DL"
 */
export const BOOKING_PATTERN = /^(?<bookingNo>\d{2}-\d{6,7})(?:\s+(?<description>.*))?$/;

export const BOOKING_NUMBER_PATTERN = /^\d{2}-\d{6,7}$/;

/**
 * Starts like a booking number but is not one, e.g. "25-12 BAD".
 */
const MALFORMED_BOOKING_PATTERN = /^\d{1,4}-\d{1,10}(?=\s|$)/;

/** "123 MAIN ST" */
export const STREET_ADDRESS_PATTERN = /^\d+\s+[A-Za-z0-9\s.,#\-']+$/;

/** "ORLANDO, FL 32801" */
export const STATE_ZIP_PATTERN = /\b[A-Z]{2}\s+\d{5}(?:-\d{4})?$/;

const ZIP_AT_START = /^\d{5}(?:-\d{4})?\b/;
const STATE_CODE = /^[A-Z]{2}$/;

// ============================================================================
// Normalization
// ============================================================================

/**
 * Title-case every word, capitalizing after any non-letter
 * (O'BRIEN -> O'Brien, SMITH-JONES -> Smith-Jones).
 */
function titleCase(value: string): string {
  return value
    .toLowerCase()
    .replace(/(^|[^a-z])([a-z])/g, (_m, prefix: string, letter: string) => prefix + letter.toUpperCase());
}

export function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

/**
 * "ADAMS", "NINA KISHA" -> "Nina Kisha Adams"
 */
export function normalizeName(name: Pick<NameMatch, 'last' | 'firstMiddle'>): string {
  return collapseWhitespace(`${titleCase(name.firstMiddle)} ${titleCase(name.last)}`);
}

/**
 * Normalize a M/D/YYYY book-in date to YYYY-MM-DD.
 * Returns null for dates that do not exist on the calendar (e.g. 2/30/2025).
 */
export function normalizeBookInDate(rawDate: string): string | null {
  const parsed = parse(rawDate.trim(), 'M/d/yyyy', new Date(0));
  if (!isValid(parsed)) return null;
  return format(parsed, 'yyyy-MM-dd');
}

export function isBookingNumber(value: string): boolean {
  return BOOKING_NUMBER_PATTERN.test(value);
}

// ============================================================================
// Recognizers
// ============================================================================

function toNameMatch(raw: string, last: string, firstMiddle: string, tolerant: boolean): NameMatch {
  return {
    raw: collapseWhitespace(raw),
    last: last.trim(),
    firstMiddle: firstMiddle.trim(),
    tolerant,
  };
}

function matchNameStartWith(line: string, library: PatternLibrary): NameStart | null {
  const tolerant = library.variant === 'tolerant';

  const withIdDate = library.nameIdDate.exec(line);
  if (withIdDate?.groups) {
    const { name, last, firstMiddle, identifier, date } = withIdDate.groups;
    return {
      name: toNameMatch(name, last, firstMiddle, tolerant),
      idDate: { identifier, rawDate: date },
    };
  }

  const bare = library.name.exec(line);
  if (bare?.groups) {
    return {
      name: toNameMatch(line, bare.groups.last, bare.groups.firstMiddle, tolerant),
      idDate: null,
    };
  }

  return null;
}

/**
 * Match a name that owns the whole line, optionally followed by identifier and date.
 */
export function matchNameStart(line: string, patterns: PatternSet): NameStart | null {
  const strict = matchNameStartWith(line, patterns.primary);
  if (strict) return strict;
  return patterns.fallback ? matchNameStartWith(line, patterns.fallback) : null;
}

function findEmbeddedNameWith(line: string, library: PatternLibrary): EmbeddedNameMatch | null {
  const tolerant = library.variant === 'tolerant';

  for (const match of line.matchAll(library.embeddedName)) {
    if (!match.groups || match.index === undefined) continue;
    const { last, firstMiddle } = match.groups;
    const end = match.index + match[0].length;
    const after = line.slice(end).trim();

    // "ORLANDO, FL 32801" is a city line, not a person
    if (STATE_CODE.test(firstMiddle) && ZIP_AT_START.test(after)) continue;

    return {
      before: line.slice(0, match.index).trim(),
      name: toNameMatch(match[0], last, firstMiddle, tolerant),
      after,
    };
  }

  return null;
}

/**
 * Find a name signature anywhere in a line.
 */
export function findEmbeddedName(line: string, patterns: PatternSet): EmbeddedNameMatch | null {
  const strict = findEmbeddedNameWith(line, patterns.primary);
  if (strict) return strict;
  return patterns.fallback ? findEmbeddedNameWith(line, patterns.fallback) : null;
}

export function matchIdDate(line: string): IdDateMatch | null {
  const match = ID_DATE_PATTERN.exec(line);
  if (!match?.groups) return null;
  return {
    identifier: match.groups.identifier,
    rawDate: match.groups.date,
    before: line.slice(0, match.index).trim(),
    after: line.slice(match.index + match[0].length).trim(),
  };
}

export function matchIdentifierOnly(line: string): string | null {
  return IDENTIFIER_ONLY_PATTERN.exec(line)?.groups?.identifier ?? null;
}

export function matchDateOnly(line: string): string | null {
  return DATE_ONLY_PATTERN.exec(line)?.groups?.date ?? null;
}

export function matchBooking(line: string): BookingMatch | null {
  const match = BOOKING_PATTERN.exec(line);
  if (!match?.groups) return null;
  return {
    bookingNo: match.groups.bookingNo,
    description: (match.groups.description ?? '').trim(),
  };
}

export function isMalformedBooking(line: string): boolean {
  return MALFORMED_BOOKING_PATTERN.test(line) && !BOOKING_PATTERN.test(line);
}

export function isAddressShape(line: string): boolean {
  return STREET_ADDRESS_PATTERN.test(line) || STATE_ZIP_PATTERN.test(line);
}
