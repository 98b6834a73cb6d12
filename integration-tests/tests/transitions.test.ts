/**
 * Extraction State Machine Transition Tests
 *
 * Each rule is exercised by state and label.
 */

import {
  RecordAccumulator,
  TRANSITIONS,
  PARSER_STATES,
  classifyLine,
  dispatch,
  getRule,
  resolvePatternSet,
  type ParserState,
  type ScanContext,
  type ScannedLine,
  type TransitionRule,
} from '@bookin/shared';

const patterns = resolvePatternSet(true);
const JANE = { raw: 'DOE, JANE', last: 'DOE', firstMiddle: 'JANE', tolerant: false };

function rule(state: ParserState, on: string): TransitionRule {
  const found = getRule(state, on);
  if (!found) throw new Error(`no rule "${on}" in ${state}`);
  return found;
}

function context(lines: string[], acc: RecordAccumulator, allowTwoLineIdDate = true): ScanContext {
  const scanned: ScannedLine[] = lines.map((text) => ({
    line: { text, page: 1 },
    features: classifyLine(text, patterns),
  }));
  return {
    ...scanned[0],
    peek: (offset) => scanned[offset] ?? null,
    acc,
    patterns,
    allowTwoLineIdDate,
  };
}

function withJane(idDate: { identifier: string; rawDate: string } | null = null): RecordAccumulator {
  const acc = new RecordAccumulator();
  acc.open(JANE, 1, idDate);
  return acc;
}

describe('Transition table', () => {
  it('should define an ordered rule list for every state', () => {
    for (const state of PARSER_STATES) {
      expect(TRANSITIONS[state].length).toBeGreaterThan(0);
    }
    expect(TRANSITIONS.SEEK_NAME.map((r) => r.on)).toEqual([
      'name with identifier and date',
      'name after deferred identifier and date',
      'name',
      'identifier and date before name',
      'noise',
    ]);
  });

  it('should report which rule fired', () => {
    const acc = withJane();
    acc.openCharge('25-0240350', 'POSS CS');

    const step = dispatch('CAPTURE_CHARGES', context(['LT 1G'], acc));

    expect(step).toEqual({ next: 'CAPTURE_CHARGES', advance: 1, rule: 'continuation' });
  });

  it('should hold position when no rule in a custom table matches', () => {
    const table = { ...TRANSITIONS, SEEK_NAME: [] };

    expect(dispatch('SEEK_NAME', context(['X'], new RecordAccumulator()), table)).toEqual({
      next: 'SEEK_NAME',
      advance: 0,
      rule: null,
    });
  });
});

describe('SEEK_NAME rules', () => {
  it('name with identifier and date: seeds the record from the name line', () => {
    const acc = new RecordAccumulator();

    const step = rule('SEEK_NAME', 'name with identifier and date').apply(
      context(['AGUILAR, JUAN 1234567 10/15/2025'], acc)
    );

    expect(step).toEqual({ next: 'CAPTURE_ADDRESS', advance: 1 });
    expect(acc.current?.name).toBe('AGUILAR, JUAN');
    expect(acc.current?.identifier).toBe('1234567');
    expect(acc.current?.book_in_date).toBe('2025-10-15');
  });

  it('name after deferred identifier and date: seeds from the deferred pair', () => {
    const acc = new RecordAccumulator();
    const r = rule('SEEK_NAME', 'name after deferred identifier and date');

    expect(r.apply(context(['DOE, JANE'], acc))).toBeNull();

    acc.defer({ identifier: '7654321', rawDate: '10/16/2025' });
    expect(r.apply(context(['DOE, JANE'], acc))).toEqual({ next: 'CAPTURE_ADDRESS', advance: 1 });
    expect(acc.current?.identifier).toBe('7654321');
  });

  it('name: opens a record with nothing seeded', () => {
    const acc = new RecordAccumulator();

    expect(rule('SEEK_NAME', 'name').apply(context(['DOE, JANE'], acc))).toEqual({
      next: 'CAPTURE_ADDRESS',
      advance: 1,
    });
    expect(acc.current?.identifier).toBeNull();
  });

  it('identifier and date before name: defers the pair', () => {
    const acc = new RecordAccumulator();

    const step = rule('SEEK_NAME', 'identifier and date before name').apply(
      context(['1234567 10/15/2025', 'DOE, JANE'], acc)
    );

    expect(step).toEqual({ next: 'SEEK_NAME', advance: 1, keepDeferred: true });
    expect(acc.deferredIdDate).toEqual({ identifier: '1234567', rawDate: '10/15/2025' });
  });

  it('noise: skips anything else', () => {
    expect(rule('SEEK_NAME', 'noise').apply(context(['Report Date: 10/15/2025'], new RecordAccumulator()))).toEqual({
      next: 'SEEK_NAME',
      advance: 1,
    });
  });
});

describe('CAPTURE_ADDRESS rules', () => {
  it('new name: finalizes the current record', () => {
    const acc = withJane();

    expect(rule('CAPTURE_ADDRESS', 'new name').apply(context(['ROE, JOHN'], acc))).toEqual({
      next: 'CAPTURE_ADDRESS',
      advance: 1,
    });
    expect(acc.records.map((r) => r.name)).toEqual(['DOE, JANE']);
    expect(acc.current?.name).toBe('ROE, JOHN');
  });

  it('identifier and date: fills fields and looks ahead for a booking line', () => {
    const r = rule('CAPTURE_ADDRESS', 'identifier and date');

    const acc = withJane();
    expect(r.apply(context(['1234567 10/15/2025', '25-0240350 THEFT'], acc))).toEqual({
      next: 'CAPTURE_CHARGES',
      advance: 1,
    });
    expect(acc.current?.book_in_date).toBe('2025-10-15');

    const other = withJane();
    expect(r.apply(context(['ORLANDO FL 32801 1234567 10/15/2025', 'APT 4'], other))).toEqual({
      next: 'SEEK_ID_DATE',
      advance: 1,
    });
    expect(other.current?.address).toEqual(['ORLANDO FL 32801']);
  });

  it('identifier and date: does not fire once both fields are known', () => {
    const acc = withJane({ identifier: '1234567', rawDate: '10/15/2025' });

    expect(rule('CAPTURE_ADDRESS', 'identifier and date').apply(context(['7654321 10/16/2025'], acc))).toBeNull();
  });

  it('identifier and date already set: keeps the address text around a conflicting pair', () => {
    const acc = withJane({ identifier: '1234567', rawDate: '10/15/2025' });

    const step = rule('CAPTURE_ADDRESS', 'identifier and date already set').apply(
      context(['123 MAIN ST 7654321 10/16/2025 APT 4'], acc)
    );

    expect(step).toEqual({ next: 'CAPTURE_ADDRESS', advance: 1 });
    expect(acc.current?.identifier).toBe('1234567');
    expect(acc.current?.address).toEqual(['123 MAIN ST', 'APT 4']);
    expect(acc.current?.warnings).toEqual(['Conflicting identifier and date ignored: "7654321 10/16/2025"']);
  });

  it('identifier and date already set: a repeated pair adds no warning', () => {
    const acc = withJane({ identifier: '1234567', rawDate: '10/15/2025' });

    rule('CAPTURE_ADDRESS', 'identifier and date already set').apply(context(['123 MAIN ST 1234567 10/15/2025'], acc));

    expect(acc.current?.address).toEqual(['123 MAIN ST']);
    expect(acc.current?.warnings).toEqual([]);
  });

  it('identifier and date before name: defers a whole-line pair above a name', () => {
    const acc = withJane({ identifier: '1234567', rawDate: '10/15/2025' });

    const step = rule('CAPTURE_ADDRESS', 'identifier and date before name').apply(
      context(['7654321 10/16/2025', 'ROE, JOHN'], acc)
    );

    expect(step).toEqual({ next: 'CAPTURE_ADDRESS', advance: 1, keepDeferred: true });
    expect(acc.deferredIdDate?.identifier).toBe('7654321');
  });

  it('booking: re-dispatches valid and malformed booking lines into charges', () => {
    const r = rule('CAPTURE_ADDRESS', 'booking');

    expect(r.apply(context(['25-0240350 THEFT'], withJane()))).toEqual({ next: 'CAPTURE_CHARGES', advance: 0 });
    expect(r.apply(context(['25-12 BAD'], withJane()))).toEqual({ next: 'CAPTURE_CHARGES', advance: 0 });
  });

  it('two-line identifier and date: consumes both lines', () => {
    const r = rule('CAPTURE_ADDRESS', 'two-line identifier and date');
    const lines = ['1234567', '10/15/2025', '25-0240350 THEFT'];

    const acc = withJane();
    expect(r.apply(context(lines, acc))).toEqual({ next: 'CAPTURE_CHARGES', advance: 2 });
    expect(acc.identifiersComplete).toBe(true);

    expect(r.apply(context(lines, withJane(), false))).toBeNull();
  });

  it('identifier only: sets the identifier and waits for the date', () => {
    const acc = withJane();

    expect(rule('CAPTURE_ADDRESS', 'identifier only').apply(context(['1234567', 'APT 4'], acc))).toEqual({
      next: 'SEEK_ID_DATE',
      advance: 1,
    });
    expect(acc.current?.identifier).toBe('1234567');
  });

  it('date only: sets the date', () => {
    const acc = withJane();

    expect(rule('CAPTURE_ADDRESS', 'date only').apply(context(['10/15/2025'], acc))).toEqual({
      next: 'SEEK_ID_DATE',
      advance: 1,
    });
    expect(acc.current?.book_in_date).toBe('2025-10-15');
  });

  it('address: appends the line verbatim', () => {
    const acc = withJane();

    rule('CAPTURE_ADDRESS', 'address').apply(context(['APT 4'], acc));

    expect(acc.current?.address).toEqual(['APT 4']);
  });
});

describe('SEEK_ID_DATE rules', () => {
  it('booking: re-dispatches into charges', () => {
    expect(rule('SEEK_ID_DATE', 'booking').apply(context(['25-0240350 THEFT'], withJane()))).toEqual({
      next: 'CAPTURE_CHARGES',
      advance: 0,
    });
  });

  it('identifier only: ignored once the identifier is known', () => {
    const acc = withJane();
    acc.seedIdDate({ identifier: '1234567' });

    expect(rule('SEEK_ID_DATE', 'identifier only').apply(context(['7654321'], acc))).toBeNull();
  });

  it('date only: fills the missing date', () => {
    const acc = withJane();
    acc.seedIdDate({ identifier: '1234567' });

    rule('SEEK_ID_DATE', 'date only').apply(context(['10/15/2025'], acc));

    expect(acc.identifiersComplete).toBe(true);
  });

  it('address shape: keeps address lines even after both fields are known', () => {
    const acc = withJane({ identifier: '1234567', rawDate: '10/15/2025' });

    expect(rule('SEEK_ID_DATE', 'address shape').apply(context(['123 MAIN ST'], acc))).toEqual({
      next: 'SEEK_ID_DATE',
      advance: 1,
    });
    expect(acc.current?.address).toEqual(['123 MAIN ST']);
  });

  it('identifier and date already set: splits the pair out of an address line', () => {
    const acc = withJane({ identifier: '1234567', rawDate: '10/15/2025' });

    expect(
      rule('SEEK_ID_DATE', 'identifier and date already set').apply(context(['ORLANDO FL 32801 1234567 10/15/2025'], acc))
    ).toEqual({ next: 'SEEK_ID_DATE', advance: 1 });
    expect(acc.current?.address).toEqual(['ORLANDO FL 32801']);
  });

  it('identifiers complete: re-dispatches other text into charges', () => {
    const r = rule('SEEK_ID_DATE', 'identifiers complete');

    expect(r.apply(context(['THEFT'], withJane()))).toBeNull();
    expect(r.apply(context(['THEFT'], withJane({ identifier: '1234567', rawDate: '10/15/2025' })))).toEqual({
      next: 'CAPTURE_CHARGES',
      advance: 0,
    });
  });

  it('address: other text is address while a field is missing', () => {
    const acc = withJane();

    rule('SEEK_ID_DATE', 'address').apply(context(['APT 4'], acc));

    expect(acc.current?.address).toEqual(['APT 4']);
  });
});

describe('CAPTURE_CHARGES rules', () => {
  it('booking: opens a new charge', () => {
    const acc = withJane();

    expect(rule('CAPTURE_CHARGES', 'booking').apply(context(['25-0240350 THEFT'], acc))).toEqual({
      next: 'CAPTURE_CHARGES',
      advance: 1,
    });
    expect(acc.current?.charges).toEqual([{ booking_no: '25-0240350', description: 'THEFT' }]);
  });

  it('booking: splits off a name embedded in the description', () => {
    const acc = withJane();

    const step = rule('CAPTURE_CHARGES', 'booking').apply(
      context(['25-0123456 NO VALID DL WYATT, JOSH 9876543 10/12/2025'], acc)
    );

    expect(step).toEqual({ next: 'CAPTURE_ADDRESS', advance: 1 });
    expect(acc.records[0].charges).toEqual([{ booking_no: '25-0123456', description: 'NO VALID DL' }]);
    expect(acc.current?.name).toBe('WYATT, JOSH');
  });

  it('malformed booking: warns and closes the open charge', () => {
    const acc = withJane();
    acc.openCharge('25-0240350', 'THEFT');

    rule('CAPTURE_CHARGES', 'malformed booking').apply(context(['25-12 BAD'], acc));

    expect(acc.current?.warnings).toEqual(['Malformed booking line dropped: "25-12 BAD"']);
    expect(acc.hasOpenCharge).toBe(false);
  });

  it('identifier and date before name: defers the pair', () => {
    const acc = withJane({ identifier: '1234567', rawDate: '10/15/2025' });

    const step = rule('CAPTURE_CHARGES', 'identifier and date before name').apply(
      context(['7654321 10/16/2025', 'ROE, JOHN'], acc)
    );

    expect(step).toEqual({ next: 'CAPTURE_CHARGES', advance: 1, keepDeferred: true });
  });

  it('embedded name: hands the line to the splitter', () => {
    const acc = withJane();
    acc.openCharge('25-0240350', 'DWI');

    const step = rule('CAPTURE_CHARGES', 'embedded name').apply(context(['2ND OFFENSE DOE, JOHN'], acc));

    expect(step).toEqual({ next: 'CAPTURE_ADDRESS', advance: 1 });
    expect(acc.records[0].charges).toEqual([{ booking_no: '25-0240350', description: 'DWI 2ND OFFENSE' }]);
  });

  it('continuation: appends to the open charge only', () => {
    const r = rule('CAPTURE_CHARGES', 'continuation');

    expect(r.apply(context(['LT 1G'], withJane()))).toBeNull();
  });

  it('orphan: warns and discards the line', () => {
    const acc = withJane();

    expect(rule('CAPTURE_CHARGES', 'orphan').apply(context(['LT 1G'], acc))).toEqual({
      next: 'CAPTURE_CHARGES',
      advance: 1,
    });
    expect(acc.current?.warnings).toEqual(['Orphan text with no open charge: "LT 1G"']);
  });
});
