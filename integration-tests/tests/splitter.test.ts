/**
 * Embedded-Entity Splitter Tests
 */

import {
  RecordAccumulator,
  splitEmbeddedEntity,
  findEmbeddedName,
  resolvePatternSet,
  type EmbeddedNameMatch,
} from '@bookin/shared';

const patterns = resolvePatternSet(true);
const SMITH = { raw: 'SMITH, JOHN', last: 'SMITH', firstMiddle: 'JOHN', tolerant: false };

function embedded(line: string): EmbeddedNameMatch {
  const match = findEmbeddedName(line, patterns);
  if (!match) throw new Error(`expected an embedded name in: ${line}`);
  return match;
}

describe('splitEmbeddedEntity', () => {
  let acc: RecordAccumulator;

  beforeEach(() => {
    acc = new RecordAccumulator();
  });

  it('should give the prefix to the open charge and seed the new record', () => {
    acc.open(SMITH, 1, { identifier: '1111111', rawDate: '10/01/2025' });
    acc.openCharge('25-0000001', 'THEFT');

    const next = splitEmbeddedEntity(acc, embedded('UNDER $100 WYATT, JOSH 9876543 10/12/2025'), 1, patterns);
    acc.finalizeCurrent();

    expect(next).toBe('CAPTURE_ADDRESS');
    expect(acc.records[0].charges).toEqual([{ booking_no: '25-0000001', description: 'THEFT UNDER $100' }]);
    expect(acc.records[1]).toMatchObject({
      name: 'WYATT, JOSH',
      name_normalized: 'Josh Wyatt',
      identifier: '9876543',
      book_in_date: '2025-10-12',
      address: [],
    });
  });

  it('should warn about a prefix when no charge is open', () => {
    const next = splitEmbeddedEntity(acc, embedded('DWI 2ND DOE, JANE ANN 123 MAIN ST'), 1, patterns);

    expect(next).toBe('CAPTURE_ADDRESS');
    expect(acc.warnings).toEqual(['Orphan text with no open charge: "DWI 2ND"']);
    expect(acc.current?.name).toBe('DOE, JANE ANN');
    expect(acc.current?.address).toEqual(['123 MAIN ST']);
  });

  it('should turn text around the pair into address lines', () => {
    splitEmbeddedEntity(acc, embedded('X DOE, JANE 123 MAIN ST 1234567 10/15/2025 APT 2'), 1, patterns);

    expect(acc.current?.identifier).toBe('1234567');
    expect(acc.current?.address).toEqual(['123 MAIN ST', 'APT 2']);
  });

  it('should open a charge when the suffix carries a booking line', () => {
    const next = splitEmbeddedEntity(
      acc,
      embedded('X WYATT, JOSH 9876543 10/12/2025 25-0000002 DWI'),
      1,
      patterns
    );
    acc.finalizeCurrent();

    expect(next).toBe('CAPTURE_CHARGES');
    expect(acc.records[0].charges).toEqual([{ booking_no: '25-0000002', description: 'DWI' }]);
  });

  it('should split a suffix that carries another name', () => {
    const next = splitEmbeddedEntity(acc, embedded('X WYATT, JOSH ROE, ANN 1111111 1/2/2025'), 3, patterns);
    acc.finalizeCurrent();

    expect(next).toBe('CAPTURE_ADDRESS');
    expect(acc.records.map((r) => r.name)).toEqual(['WYATT, JOSH', 'ROE, ANN']);
    expect(acc.records[0].parse_warnings).toEqual(['Missing identifier', 'Missing book-in date', 'No charges found']);
    expect(acc.records[1]).toMatchObject({
      identifier: '1111111',
      book_in_date: '2025-01-02',
      source_page_span: [3, 3],
    });
  });
});
