/**
 * Record Accumulator & Finalizer
 *
 * Owns every piece of mutable scan state: the record being built, its open
 * charge and an identifier/date pair seen just before a name. Records leave
 * the accumulator frozen.
 */

import type { ArrestRecord, Charge } from '../../types';
import {
  normalizeName,
  normalizeBookInDate,
  isBookingNumber,
  collapseWhitespace,
  type NameMatch,
  type IdDatePair,
} from './patterns';

export const ADDRESS_LINE_LIMIT = 3;

export const WARNINGS = {
  missingIdentifier: 'Missing identifier',
  missingBookInDate: 'Missing book-in date',
  noCharges: 'No charges found',
  emptyDescription: (bookingNo: string) => `Empty description for booking ${bookingNo}`,
  malformedBookingNumber: (bookingNo: string) => `Malformed booking number dropped: ${bookingNo}`,
  malformedBookingLine: (line: string) => `Malformed booking line dropped: "${line}"`,
  orphanText: (line: string) => `Orphan text with no open charge: "${line}"`,
  addressDropped: (line: string) => `Address line dropped (limit ${ADDRESS_LINE_LIMIT}): "${line}"`,
  lowConfidenceName: (line: string) => `Low-confidence name match: "${line}"`,
  invalidDate: (raw: string) => `Invalid book-in date: "${raw}"`,
  conflictingIdDate: (identifier: string, rawDate: string) =>
    `Conflicting identifier and date ignored: "${identifier} ${rawDate}"`,
  noProgress: (lineNumber: number, line: string) =>
    `No progress at line ${lineNumber} ("${line}"); line skipped`,
} as const;

/**
 * The mutable form of a record, alive only while it is current.
 */
export interface DraftRecord {
  name: string;
  name_normalized: string;
  address: string[];
  identifier: string | null;
  book_in_date: string | null;
  charges: Array<{ booking_no: string; description: string }>;
  firstPage: number;
  lastPage: number;
  warnings: string[];
}

function pushUnique(list: string[], warning: string): void {
  if (!list.includes(warning)) list.push(warning);
}

/**
 * Seal a draft into an immutable record, appending the end-of-record warnings.
 * Never throws.
 */
export function finalizeRecord(draft: DraftRecord): ArrestRecord {
  const warnings = [...draft.warnings];
  const charges: Charge[] = [];

  for (const charge of draft.charges) {
    if (!isBookingNumber(charge.booking_no)) continue;
    charges.push(Object.freeze({ booking_no: charge.booking_no, description: collapseWhitespace(charge.description) }));
  }

  if (draft.identifier === null) pushUnique(warnings, WARNINGS.missingIdentifier);
  if (draft.book_in_date === null) pushUnique(warnings, WARNINGS.missingBookInDate);
  if (charges.length === 0) pushUnique(warnings, WARNINGS.noCharges);

  for (const charge of charges) {
    if (charge.description === '') pushUnique(warnings, WARNINGS.emptyDescription(charge.booking_no));
  }
  for (const charge of draft.charges) {
    if (!isBookingNumber(charge.booking_no)) {
      pushUnique(warnings, WARNINGS.malformedBookingNumber(charge.booking_no));
    }
  }

  const span: readonly [number, number] = [
    Math.min(draft.firstPage, draft.lastPage),
    Math.max(draft.firstPage, draft.lastPage),
  ];

  return Object.freeze({
    name: draft.name,
    name_normalized: draft.name_normalized,
    address: Object.freeze([...draft.address]),
    identifier: draft.identifier,
    book_in_date: draft.book_in_date,
    charges: Object.freeze(charges),
    source_page_span: Object.freeze(span),
    parse_warnings: Object.freeze(warnings),
  });
}

export class RecordAccumulator {
  private draft: DraftRecord | null = null;
  private openChargeIndex: number | null = null;
  private deferred: IdDatePair | null = null;
  private readonly finalized: ArrestRecord[] = [];
  private readonly documentWarnings: string[] = [];

  get current(): Readonly<DraftRecord> | null {
    return this.draft;
  }

  get hasOpenCharge(): boolean {
    return this.openChargeIndex !== null;
  }

  get deferredIdDate(): IdDatePair | null {
    return this.deferred;
  }

  get identifiersComplete(): boolean {
    return this.draft !== null && this.draft.identifier !== null && this.draft.book_in_date !== null;
  }

  /**
   * True when the pair agrees with the identifier and date already set.
   */
  matchesIdDate(pair: IdDatePair): boolean {
    if (!this.draft) return false;
    return (
      this.draft.identifier === pair.identifier &&
      this.draft.book_in_date === normalizeBookInDate(pair.rawDate)
    );
  }

  get records(): readonly ArrestRecord[] {
    return this.finalized;
  }

  get warnings(): readonly string[] {
    return this.documentWarnings;
  }

  /**
   * Finalize the current record (if any) and start a new one.
   */
  open(name: NameMatch, page: number, idDate: IdDatePair | null = null): void {
    this.finalizeCurrent();
    this.draft = {
      name: name.raw,
      name_normalized: normalizeName(name),
      address: [],
      identifier: null,
      book_in_date: null,
      charges: [],
      firstPage: page,
      lastPage: page,
      warnings: [],
    };
    if (name.tolerant) this.warn(WARNINGS.lowConfidenceName(name.raw));
    if (idDate) this.seedIdDate(idDate);
  }

  /**
   * Record that the current record spans `page`.
   */
  touch(page: number): void {
    if (!this.draft) return;
    this.draft.firstPage = Math.min(this.draft.firstPage, page);
    this.draft.lastPage = Math.max(this.draft.lastPage, page);
  }

  /**
   * Attach a warning to the current record, or to the document when none is open.
   */
  warn(warning: string): void {
    pushUnique(this.draft ? this.draft.warnings : this.documentWarnings, warning);
  }

  /**
   * Fill whichever of identifier and book-in date is still unset.
   */
  seedIdDate(pair: Partial<IdDatePair>): void {
    if (!this.draft) return;
    if (pair.identifier !== undefined && this.draft.identifier === null) {
      this.draft.identifier = pair.identifier;
    }
    if (pair.rawDate !== undefined && this.draft.book_in_date === null) {
      const normalized = normalizeBookInDate(pair.rawDate);
      if (normalized) {
        this.draft.book_in_date = normalized;
      } else {
        this.warn(WARNINGS.invalidDate(pair.rawDate));
      }
    }
  }

  appendAddress(line: string): void {
    if (!this.draft) return;
    const text = collapseWhitespace(line);
    if (text === '') return;
    if (this.draft.address.length >= ADDRESS_LINE_LIMIT) {
      this.warn(WARNINGS.addressDropped(text));
      return;
    }
    this.draft.address.push(text);
  }

  openCharge(bookingNo: string, description: string): void {
    if (!this.draft) return;
    this.draft.charges.push({ booking_no: bookingNo, description: collapseWhitespace(description) });
    this.openChargeIndex = this.draft.charges.length - 1;
  }

  closeCharge(): void {
    this.openChargeIndex = null;
  }

  /**
   * Join a wrapped line onto the open charge's description.
   * Returns false when there is no open charge.
   */
  appendToOpenCharge(text: string): boolean {
    if (!this.draft || this.openChargeIndex === null) return false;
    const charge = this.draft.charges[this.openChargeIndex];
    if (!charge) return false;
    charge.description = collapseWhitespace(`${charge.description} ${text}`);
    return true;
  }

  defer(pair: IdDatePair): void {
    this.deferred = { identifier: pair.identifier, rawDate: pair.rawDate };
  }

  clearDeferred(): void {
    this.deferred = null;
  }

  /**
   * Seal the current record into the output list. Safe to call with no record open.
   */
  finalizeCurrent(): void {
    if (this.draft) {
      this.finalized.push(finalizeRecord(this.draft));
    }
    this.draft = null;
    this.openChargeIndex = null;
  }
}
