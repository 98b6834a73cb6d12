/**
 * Extraction State Machine: transition table
 *
 * Each state owns an ordered list of named rules. The first rule whose guard
 * holds fires and returns the next state plus how many lines it consumed;
 * `advance: 0` re-dispatches the same line in the next state.
 *
 *   SEEK_NAME -> CAPTURE_ADDRESS -> SEEK_ID_DATE -> CAPTURE_CHARGES
 *
 * A name at line start always wins over charge continuation.
 */

import type { TaggedLine } from '../../types';
import type { LineFeatures } from './classifier';
import { WARNINGS, type RecordAccumulator } from './accumulator';
import { splitEmbeddedEntity } from './splitter';
import { findEmbeddedName, type IdDateMatch, type PatternSet } from './patterns';

export const PARSER_STATES = ['SEEK_NAME', 'CAPTURE_ADDRESS', 'SEEK_ID_DATE', 'CAPTURE_CHARGES'] as const;

export type ParserState = (typeof PARSER_STATES)[number];

export interface ScannedLine {
  line: TaggedLine;
  features: LineFeatures;
}

export interface ScanContext extends ScannedLine {
  /** Look ahead without consuming; null past the end of input */
  peek(offset: number): ScannedLine | null;
  acc: RecordAccumulator;
  patterns: PatternSet;
  allowTwoLineIdDate: boolean;
}

export interface Step {
  next: ParserState;
  advance: number;
  /** Keep a deferred identifier/date alive for the next line */
  keepDeferred?: boolean;
}

export interface TransitionRule {
  readonly on: string;
  apply(ctx: ScanContext): Step | null;
}

export type TransitionTable = Readonly<Record<ParserState, readonly TransitionRule[]>>;

// ============================================================================
// Helpers
// ============================================================================

function placeAroundPair(acc: RecordAccumulator, pair: IdDateMatch): void {
  acc.appendAddress(pair.before);
  acc.appendAddress(pair.after);
}

function isWholeLinePair(f: LineFeatures): boolean {
  return f.idDate !== null && f.idDate.before === '' && f.idDate.after === '';
}

function openFromNameLine({ features, line, acc }: ScanContext): Step | null {
  if (!features.nameStart) return null;
  acc.open(features.nameStart.name, line.page, features.nameStart.idDate ?? acc.deferredIdDate);
  return { next: 'CAPTURE_ADDRESS', advance: 1 };
}

// ============================================================================
// Shared rules
// ============================================================================

const newName: TransitionRule = {
  on: 'new name',
  apply: openFromNameLine,
};

/** Whole-line identifier/date directly above a name belongs to that name */
function deferBeforeName(state: ParserState): TransitionRule {
  return {
    on: 'identifier and date before name',
    apply: (ctx) => {
      const { features, acc } = ctx;
      if (!features.idDate || !isWholeLinePair(features) || !ctx.peek(1)?.features.nameStart) return null;
      acc.defer(features.idDate);
      return { next: state, advance: 1, keepDeferred: true };
    },
  };
}

/** A pair on an address line after identifier and date are set: keep only the address text */
function knownPairAsAddress(state: ParserState): TransitionRule {
  return {
    on: 'identifier and date already set',
    apply: ({ features, acc }) => {
      if (features.primary !== 'id_date' || !features.idDate || !acc.identifiersComplete) return null;
      if (!acc.matchesIdDate(features.idDate)) {
        acc.warn(WARNINGS.conflictingIdDate(features.idDate.identifier, features.idDate.rawDate));
      }
      placeAroundPair(acc, features.idDate);
      return { next: state, advance: 1 };
    },
  };
}

const bookingStartsCharges: TransitionRule = {
  on: 'booking',
  apply: ({ features }) =>
    features.booking || features.malformedBooking ? { next: 'CAPTURE_CHARGES', advance: 0 } : null,
};

function afterIdentifiers(ctx: ScanContext, lookahead: number): ParserState {
  return ctx.peek(lookahead)?.features.booking ? 'CAPTURE_CHARGES' : 'SEEK_ID_DATE';
}

// ============================================================================
// SEEK_NAME
// ============================================================================

const SEEK_NAME: readonly TransitionRule[] = [
  {
    on: 'name with identifier and date',
    apply: (ctx) => (ctx.features.nameStart?.idDate ? openFromNameLine(ctx) : null),
  },
  {
    on: 'name after deferred identifier and date',
    apply: (ctx) => (ctx.features.nameStart && ctx.acc.deferredIdDate ? openFromNameLine(ctx) : null),
  },
  {
    on: 'name',
    apply: openFromNameLine,
  },
  {
    on: 'identifier and date before name',
    apply: ({ features, acc }) => {
      if (!features.idDate) return null;
      acc.defer(features.idDate);
      return { next: 'SEEK_NAME', advance: 1, keepDeferred: true };
    },
  },
  {
    on: 'noise',
    apply: () => ({ next: 'SEEK_NAME', advance: 1 }),
  },
];

// ============================================================================
// CAPTURE_ADDRESS
// ============================================================================

const CAPTURE_ADDRESS: readonly TransitionRule[] = [
  newName,
  {
    on: 'identifier and date',
    apply: (ctx) => {
      const { features, acc } = ctx;
      if (features.primary !== 'id_date' || !features.idDate || acc.identifiersComplete) return null;
      acc.seedIdDate(features.idDate);
      placeAroundPair(acc, features.idDate);
      return { next: afterIdentifiers(ctx, 1), advance: 1 };
    },
  },
  deferBeforeName('CAPTURE_ADDRESS'),
  knownPairAsAddress('CAPTURE_ADDRESS'),
  bookingStartsCharges,
  {
    on: 'two-line identifier and date',
    apply: (ctx) => {
      const { features, acc } = ctx;
      const dateLine = ctx.peek(1);
      if (!ctx.allowTwoLineIdDate || !features.identifierOnly || !dateLine?.features.dateOnly) return null;
      acc.seedIdDate({ identifier: features.identifierOnly, rawDate: dateLine.features.dateOnly });
      return { next: afterIdentifiers(ctx, 2), advance: 2 };
    },
  },
  {
    on: 'identifier only',
    apply: ({ features, acc, allowTwoLineIdDate }) => {
      if (!allowTwoLineIdDate || !features.identifierOnly) return null;
      acc.seedIdDate({ identifier: features.identifierOnly });
      return { next: 'SEEK_ID_DATE', advance: 1 };
    },
  },
  {
    on: 'date only',
    apply: ({ features, acc, allowTwoLineIdDate }) => {
      if (!allowTwoLineIdDate || !features.dateOnly) return null;
      acc.seedIdDate({ rawDate: features.dateOnly });
      return { next: 'SEEK_ID_DATE', advance: 1 };
    },
  },
  {
    on: 'address',
    apply: ({ features, acc }) => {
      acc.appendAddress(features.text);
      return { next: 'CAPTURE_ADDRESS', advance: 1 };
    },
  },
];

// ============================================================================
// SEEK_ID_DATE
// ============================================================================

const SEEK_ID_DATE: readonly TransitionRule[] = [
  newName,
  bookingStartsCharges,
  {
    on: 'identifier and date',
    apply: ({ features, acc }) => {
      if (features.primary !== 'id_date' || !features.idDate || acc.identifiersComplete) return null;
      acc.seedIdDate(features.idDate);
      placeAroundPair(acc, features.idDate);
      return { next: 'SEEK_ID_DATE', advance: 1 };
    },
  },
  deferBeforeName('SEEK_ID_DATE'),
  knownPairAsAddress('SEEK_ID_DATE'),
  {
    on: 'identifier only',
    apply: ({ features, acc, allowTwoLineIdDate }) => {
      if (!allowTwoLineIdDate || !features.identifierOnly || acc.current?.identifier != null) return null;
      acc.seedIdDate({ identifier: features.identifierOnly });
      return { next: 'SEEK_ID_DATE', advance: 1 };
    },
  },
  {
    on: 'date only',
    apply: ({ features, acc, allowTwoLineIdDate }) => {
      if (!allowTwoLineIdDate || !features.dateOnly || acc.current?.book_in_date != null) return null;
      acc.seedIdDate({ rawDate: features.dateOnly });
      return { next: 'SEEK_ID_DATE', advance: 1 };
    },
  },
  {
    on: 'address shape',
    apply: ({ features, acc }) => {
      if (!features.addressShape) return null;
      acc.appendAddress(features.text);
      return { next: 'SEEK_ID_DATE', advance: 1 };
    },
  },
  {
    on: 'identifiers complete',
    apply: ({ acc }) => (acc.identifiersComplete ? { next: 'CAPTURE_CHARGES', advance: 0 } : null),
  },
  {
    on: 'address',
    apply: ({ features, acc }) => {
      acc.appendAddress(features.text);
      return { next: 'SEEK_ID_DATE', advance: 1 };
    },
  },
];

// ============================================================================
// CAPTURE_CHARGES
// ============================================================================

const CAPTURE_CHARGES: readonly TransitionRule[] = [
  newName,
  {
    on: 'booking',
    apply: ({ features, line, acc, patterns }) => {
      if (!features.booking) return null;
      const { bookingNo, description } = features.booking;
      const embedded = findEmbeddedName(description, patterns);
      if (!embedded) {
        acc.openCharge(bookingNo, description);
        return { next: 'CAPTURE_CHARGES', advance: 1 };
      }
      acc.openCharge(bookingNo, embedded.before);
      const next = splitEmbeddedEntity(acc, { ...embedded, before: '' }, line.page, patterns);
      return { next, advance: 1 };
    },
  },
  {
    on: 'malformed booking',
    apply: ({ features, acc }) => {
      if (!features.malformedBooking) return null;
      acc.warn(WARNINGS.malformedBookingLine(features.text));
      acc.closeCharge();
      return { next: 'CAPTURE_CHARGES', advance: 1 };
    },
  },
  deferBeforeName('CAPTURE_CHARGES'),
  {
    on: 'embedded name',
    apply: ({ features, line, acc, patterns }) => {
      if (!features.embeddedName) return null;
      return { next: splitEmbeddedEntity(acc, features.embeddedName, line.page, patterns), advance: 1 };
    },
  },
  {
    on: 'continuation',
    apply: ({ features, acc }) =>
      acc.appendToOpenCharge(features.text) ? { next: 'CAPTURE_CHARGES', advance: 1 } : null,
  },
  {
    on: 'orphan',
    apply: ({ features, acc }) => {
      acc.warn(WARNINGS.orphanText(features.text));
      return { next: 'CAPTURE_CHARGES', advance: 1 };
    },
  },
];

export const TRANSITIONS: TransitionTable = Object.freeze({
  SEEK_NAME,
  CAPTURE_ADDRESS,
  SEEK_ID_DATE,
  CAPTURE_CHARGES,
});

/**
 * Find a rule by state and label. Used to exercise rules in isolation.
 */
export function getRule(state: ParserState, on: string, table: TransitionTable = TRANSITIONS): TransitionRule | undefined {
  return table[state].find((rule) => rule.on === on);
}

/**
 * Run the first rule of `state` that fires. A table with no matching rule
 * holds position; the progress guard resolves it.
 */
export function dispatch(state: ParserState, ctx: ScanContext, table: TransitionTable = TRANSITIONS): Step & { rule: string | null } {
  for (const rule of table[state]) {
    const step = rule.apply(ctx);
    if (step) return { ...step, rule: rule.on };
  }
  return { next: state, advance: 0, rule: null };
}
