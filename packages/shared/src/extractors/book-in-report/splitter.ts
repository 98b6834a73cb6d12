/**
 * Embedded-Entity Splitter
 *
 * Upstream text extraction sometimes glues the start of the next inmate onto
 * the previous charge line:
 *
 *   25-0123456 NO VALID DL WYATT, JOSH 9876543 10/12/2025
 *
 * The text before the name belongs to the open charge; the name starts a new
 * record and whatever follows it (identifier/date, address, a booking line,
 * even another name) belongs to that new record.
 */

import type { RecordAccumulator } from './accumulator';
import { WARNINGS } from './accumulator';
import {
  findEmbeddedName,
  matchIdDate,
  matchBooking,
  type EmbeddedNameMatch,
  type PatternSet,
} from './patterns';
import type { ParserState } from './transitions';

/**
 * Place a fragment that belongs to the current record: a booking fragment
 * opens a charge, anything else is address text.
 */
function placeFragment(acc: RecordAccumulator, fragment: string): void {
  const booking = matchBooking(fragment);
  if (booking) {
    acc.openCharge(booking.bookingNo, booking.description);
  } else {
    acc.appendAddress(fragment);
  }
}

function absorb(acc: RecordAccumulator, text: string, page: number, patterns: PatternSet): void {
  const rest = text.trim();
  if (rest === '') return;

  const nested = findEmbeddedName(rest, patterns);
  if (nested) {
    absorb(acc, nested.before, page, patterns);
    acc.open(nested.name, page);
    absorb(acc, nested.after, page, patterns);
    return;
  }

  const pair = matchIdDate(rest);
  if (pair) {
    if (pair.before) placeFragment(acc, pair.before);
    acc.seedIdDate(pair);
    absorb(acc, pair.after, page, patterns);
    return;
  }

  placeFragment(acc, rest);
}

/**
 * Split a line around an embedded name and return the state to continue in.
 */
export function splitEmbeddedEntity(
  acc: RecordAccumulator,
  match: EmbeddedNameMatch,
  page: number,
  patterns: PatternSet
): ParserState {
  // The prefix belongs to the record being closed, so it spans this page too.
  acc.touch(page);
  if (match.before && !acc.appendToOpenCharge(match.before)) {
    acc.warn(WARNINGS.orphanText(match.before));
  }

  acc.open(match.name, page);
  absorb(acc, match.after, page, patterns);

  return acc.hasOpenCharge ? 'CAPTURE_CHARGES' : 'CAPTURE_ADDRESS';
}
