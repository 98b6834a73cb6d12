/**
 * Line Classifier
 *
 * Runs every recognizer of the pattern library over one line. The state
 * machine needs more than the winning match (a booking line may also carry an
 * embedded name), so all captures are returned alongside `primary`.
 */

import {
  matchNameStart,
  matchBooking,
  isMalformedBooking,
  matchIdDate,
  matchIdentifierOnly,
  matchDateOnly,
  findEmbeddedName,
  isAddressShape,
  type PatternSet,
  type NameStart,
  type BookingMatch,
  type IdDateMatch,
  type EmbeddedNameMatch,
} from './patterns';

/**
 * Kinds in priority order: the first one that matches becomes `primary`.
 */
export const LINE_KINDS = [
  'name_id_date',
  'name',
  'booking',
  'malformed_booking',
  'id_date',
  'identifier',
  'date',
  'embedded_name',
  'address',
  'text',
] as const;

export type LineKind = (typeof LINE_KINDS)[number];

export interface LineFeatures {
  text: string;
  primary: LineKind;
  /** Text left over once the primary match is removed */
  residual: string;
  nameStart: NameStart | null;
  booking: BookingMatch | null;
  malformedBooking: boolean;
  idDate: IdDateMatch | null;
  identifierOnly: string | null;
  dateOnly: string | null;
  embeddedName: EmbeddedNameMatch | null;
  addressShape: boolean;
}

function primaryOf(f: Omit<LineFeatures, 'primary' | 'residual'>): { primary: LineKind; residual: string } {
  if (f.nameStart?.idDate) return { primary: 'name_id_date', residual: '' };
  if (f.nameStart) return { primary: 'name', residual: '' };
  if (f.booking) return { primary: 'booking', residual: f.booking.description };
  if (f.malformedBooking) return { primary: 'malformed_booking', residual: f.text };
  if (f.idDate) {
    return {
      primary: 'id_date',
      residual: [f.idDate.before, f.idDate.after].filter(Boolean).join(' '),
    };
  }
  if (f.identifierOnly) return { primary: 'identifier', residual: '' };
  if (f.dateOnly) return { primary: 'date', residual: '' };
  if (f.embeddedName) {
    return {
      primary: 'embedded_name',
      residual: [f.embeddedName.before, f.embeddedName.after].filter(Boolean).join(' '),
    };
  }
  if (f.addressShape) return { primary: 'address', residual: f.text };
  return { primary: 'text', residual: f.text };
}

export function classifyLine(line: string, patterns: PatternSet): LineFeatures {
  const text = line.trim();
  const nameStart = matchNameStart(text, patterns);

  const captures = {
    text,
    nameStart,
    booking: matchBooking(text),
    malformedBooking: isMalformedBooking(text),
    idDate: matchIdDate(text),
    identifierOnly: matchIdentifierOnly(text),
    dateOnly: matchDateOnly(text),
    // A name that owns the line is not "embedded"
    embeddedName: nameStart ? null : findEmbeddedName(text, patterns),
    addressShape: isAddressShape(text),
  };

  return { ...captures, ...primaryOf(captures) };
}
