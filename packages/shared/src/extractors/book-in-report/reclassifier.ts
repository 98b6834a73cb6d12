/**
 * Post-Processing Reclassifier
 *
 * One pass over finalized records that repairs fields the scan put in the
 * wrong place:
 * - an address glued onto the end of the last charge moves to `address`
 * - booking lines that landed in `address` move to `charges`
 *
 * Records are never mutated; corrected copies are returned.
 */

import type { ArrestRecord, Charge } from '../../types';
import { ADDRESS_LINE_LIMIT, WARNINGS } from './accumulator';
import { collapseWhitespace, matchBooking } from './patterns';

// A street-name word starts with a letter or is an ordinal ("5TH").
// House number to tail with no other bare number in between, so the suffix
// starts at the number nearest the tail and never at a count like "PG 1".
const WORD = String.raw`(?:[A-Za-z#][A-Za-z0-9.,#'\-]*|\d+(?:ST|ND|RD|TH))`;
const STREET_TYPE = String.raw`(?:ST|AVE|BLVD|DR|LN|RD|CT|WAY|CIR|TRL|PKWY|HWY|FWY)\.?`;

/** "... 123 MAIN ST ORLANDO FL 32801" */
const STATE_ZIP_SUFFIX = new RegExp(String.raw`(?:^|\s)(\d+(?:\s+${WORD})+?\s+[A-Z]{2}\s+\d{5}(?:-\d{4})?)$`);

/** "... 123 MAIN ST"; at least one street-name word, so "2 CT" stays a charge */
const STREET_SUFFIX = new RegExp(String.raw`(?:^|\s)(\d+(?:\s+${WORD})+?\s+${STREET_TYPE})$`);

export const addressSuffixWarning = (suffix: string) =>
  `Address suffix left in charge (address full): "${suffix}"`;

export interface AddressSuffix {
  /** Description with the suffix removed */
  remainder: string;
  suffix: string;
}

/**
 * Split an address-shaped tail off a charge description.
 * Returns null unless both the tail and the text before it are non-empty.
 */
export function findAddressSuffix(description: string): AddressSuffix | null {
  const text = collapseWhitespace(description);

  for (const pattern of [STATE_ZIP_SUFFIX, STREET_SUFFIX]) {
    const match = pattern.exec(text);
    if (!match) continue;
    const suffix = match[1].trim();
    const remainder = text.slice(0, text.length - match[1].length).trim();
    if (remainder !== '' && suffix !== '') return { remainder, suffix };
  }

  return null;
}

function reclassifyRecord(record: ArrestRecord): ArrestRecord {
  const warnings = [...record.parse_warnings];
  const address: string[] = [];
  const recovered: Charge[] = [];

  for (const line of record.address) {
    const text = collapseWhitespace(line);
    const booking = matchBooking(text);
    if (booking) {
      recovered.push({ booking_no: booking.bookingNo, description: booking.description });
    } else if (text !== '') {
      address.push(text);
    }
  }

  const charges: Charge[] = [
    ...recovered,
    ...record.charges.map((c) => ({ booking_no: c.booking_no, description: collapseWhitespace(c.description) })),
  ];

  const last = charges[charges.length - 1];
  const suffix = last ? findAddressSuffix(last.description) : null;
  if (last && suffix) {
    if (address.length < ADDRESS_LINE_LIMIT) {
      charges[charges.length - 1] = { booking_no: last.booking_no, description: suffix.remainder };
      address.push(suffix.suffix);
    } else if (!warnings.includes(addressSuffixWarning(suffix.suffix))) {
      warnings.push(addressSuffixWarning(suffix.suffix));
    }
  }

  const cleanedWarnings =
    charges.length > 0 ? warnings.filter((w) => w !== WARNINGS.noCharges) : warnings;

  return Object.freeze({
    ...record,
    name: collapseWhitespace(record.name),
    address: Object.freeze(address),
    charges: Object.freeze(charges.map((c) => Object.freeze(c))),
    parse_warnings: Object.freeze(cleanedWarnings),
  });
}

export function reclassifyRecords(records: readonly ArrestRecord[]): ArrestRecord[] {
  return records.map(reclassifyRecord);
}
