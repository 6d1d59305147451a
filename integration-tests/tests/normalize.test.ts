/**
 * Field Normalization Tests
 */

import { coerceFiscalYear, coerceMillions, emptyRecord, padIdentifier } from '@ledgerlens/shared';

describe('padIdentifier', () => {
  it.each([
    ['320193', '0000320193'],
    ['0000320193', '0000320193'],
    [320193, '0000320193'],
    ['CIK 0000320193', '0000320193'],
    ['0000-320-193', '0000320193'],
  ])('pads %p to %p', (raw, expected) => {
    expect(padIdentifier(raw)).toBe(expected);
  });

  it.each([['12345678901'], [''], ['none'], [null], [undefined], [-5], [3.5]])(
    'treats %p as absent',
    (raw) => {
      expect(padIdentifier(raw)).toBeNull();
    }
  );

  it('pads to a custom width', () => {
    expect(padIdentifier('42', 4)).toBe('0042');
  });
});

describe('coerceMillions', () => {
  it.each([
    [383285, 383285],
    [-12.5, -12.5],
    ['383285', 383285],
    ['$383,285', 383285],
    ['(1,234)', -1234],
    ['-42', -42],
    ['USD 96,995', 96995],
    ['2.5 million', 2.5],
    ['1.5 billion', 1500],
    ['12b', 12000],
    ['3 trillion', 3000000],
  ])('coerces %p to %p', (raw, expected) => {
    expect(coerceMillions(raw)).toBe(expected);
  });

  it('scales thousands down to millions', () => {
    expect(coerceMillions('750 thousand')).toBeCloseTo(0.75);
    expect(coerceMillions('$1.2bn')).toBeCloseTo(1200);
  });

  it.each([['n/a'], ['N/A'], ['-'], [''], ['null'], ['about five'], ['12 apples'], [Number.NaN], [Infinity], [true]])(
    'treats %p as absent',
    (raw) => {
      expect(coerceMillions(raw)).toBeNull();
    }
  );
});

describe('coerceFiscalYear', () => {
  it.each([
    [2023, 2023],
    ['2023', 2023],
    ['FY2023', 2023],
    ['fy 2021', 2021],
  ])('reads %p as %p', (raw, expected) => {
    expect(coerceFiscalYear(raw)).toBe(expected);
  });

  it.each([[1800], [2023.5], ['2023-24'], ['twenty'], [null]])('rejects %p', (raw) => {
    expect(coerceFiscalYear(raw)).toBeNull();
  });
});

describe('emptyRecord', () => {
  it('keys an all-null record by ticker', () => {
    expect(emptyRecord('EXMP')).toEqual({
      company_ticker: 'EXMP',
      fiscal_year: null,
      cik: null,
      total_revenue: null,
      net_income: null,
      north_america_revenue: null,
      depreciation_amortization: null,
      lease_liabilities: null,
    });
  });
});
