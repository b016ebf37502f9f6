import { describe, expect, it } from 'vitest';
import * as cheerio from 'cheerio';
import { Decimal } from 'decimal.js';
import {
  classifyAddressState,
  cleanText,
  extractCurrency,
  extractDate,
  extractDateField,
  extractFlag,
  formatCurrency,
  isOutOfState,
  looksLikeCurrency,
  parseAddress,
  sumAmounts,
} from './extractors.js';

describe('extractCurrency', () => {
  it('strips dollar signs, commas and whitespace', () => {
    expect(extractCurrency('  $1,234.56 ').toFixed(2)).toBe('1234.56');
    expect(extractCurrency('$50').toFixed(2)).toBe('50.00');
  });

  it('reads parenthesized and signed negatives', () => {
    expect(extractCurrency('(1,234.56)').equals(new Decimal('-1234.56'))).toBe(true);
    expect(extractCurrency('($20.00)').toFixed(2)).toBe('-20.00');
    expect(extractCurrency('-$5.00').toFixed(2)).toBe('-5.00');
    expect(extractCurrency('$-5.00').toFixed(2)).toBe('-5.00');
  });

  it('maps empty and non-numeric text to zero', () => {
    for (const input of ['', '--', 'N/A', '$', 'twelve', undefined, null]) {
      expect(extractCurrency(input).isZero()).toBe(true);
    }
  });

  it('rounds to cents', () => {
    expect(extractCurrency('10.005').toFixed(2)).toBe('10.01');
    expect(extractCurrency('0.1').plus(extractCurrency('0.2')).toFixed(2)).toBe('0.30');
  });

  it('round-trips formatted amounts', () => {
    for (const cents of [0, 1, 99, 100, 123456, 100000000, -1, -123456]) {
      const amount = new Decimal(cents).dividedBy(100);
      expect(extractCurrency(formatCurrency(amount)).equals(amount)).toBe(true);
    }
  });
});

describe('formatCurrency', () => {
  it('groups thousands and keeps two decimals', () => {
    expect(formatCurrency(new Decimal('1234567.8'))).toBe('$1,234,567.80');
    expect(formatCurrency(new Decimal(0))).toBe('$0.00');
  });

  it('wraps negatives in parentheses', () => {
    expect(formatCurrency(new Decimal('-1234.56'))).toBe('($1,234.56)');
  });
});

describe('sumAmounts', () => {
  it('is zero for no items', () => {
    expect(sumAmounts([]).isZero()).toBe(true);
  });

  it('adds without floating point drift', () => {
    const items = [{ amount: new Decimal('0.10') }, { amount: new Decimal('0.20') }];
    expect(sumAmounts(items).toFixed(2)).toBe('0.30');
  });
});

describe('looksLikeCurrency', () => {
  it('recognizes amount cells only', () => {
    expect(looksLikeCurrency('$1.00')).toBe(true);
    expect(looksLikeCurrency('1,000')).toBe(true);
    expect(looksLikeCurrency('1/2/2024')).toBe(false);
    expect(looksLikeCurrency('Jane Doe')).toBe(false);
    expect(looksLikeCurrency('')).toBe(false);
  });
});

describe('extractDate', () => {
  it('parses US dates with or without leading zeros', () => {
    expect(extractDate('3/7/2024')).toBe('2024-03-07');
    expect(extractDate('03/07/2024')).toBe('2024-03-07');
    expect(extractDate('12/31/2023 12:00:00 AM')).toBe('2023-12-31');
  });

  it('parses ISO dates and month names', () => {
    expect(extractDate('2024-02-29')).toBe('2024-02-29');
    expect(extractDate('January 5, 2024')).toBe('2024-01-05');
    expect(extractDate('Sept 15, 2022')).toBe('2022-09-15');
    expect(extractDate('Dec. 1 2021')).toBe('2021-12-01');
  });

  it('returns null for impossible or placeholder dates', () => {
    expect(extractDate('2/30/2024')).toBeNull();
    expect(extractDate('2023-02-29')).toBeNull();
    expect(extractDate('13/01/2024')).toBeNull();
    expect(extractDate('1/1/0001')).toBeNull();
    expect(extractDate('Ma 1, 2024')).toBeNull();
    expect(extractDate('--')).toBeNull();
    expect(extractDate('soon')).toBeNull();
    expect(extractDate(undefined)).toBeNull();
  });
});

describe('extractDateField', () => {
  it('keeps the raw text when the date cannot be parsed', () => {
    expect(extractDateField(' Spring  2024 ')).toEqual({ date: null, dateRaw: 'Spring 2024' });
    expect(extractDateField('4/1/2024')).toEqual({ date: '2024-04-01', dateRaw: '4/1/2024' });
  });
});

describe('extractFlag', () => {
  const $ = cheerio.load(`
    <table><tr>
      <td id="anchor"><a class="anchorLink" href="#">X</a></td>
      <td id="empty-anchor"><a class="anchorLink" href="#"></a></td>
      <td id="yes">Yes</td>
      <td id="glyph">&#10003;</td>
      <td id="checkbox"><input type="checkbox" checked></td>
      <td id="blank"></td>
      <td id="other">No</td>
    </tr></table>
  `);

  it('is true for marker links, checkboxes and marker tokens', () => {
    expect(extractFlag($('#anchor'))).toBe(true);
    expect(extractFlag($('#yes'))).toBe(true);
    expect(extractFlag($('#glyph'))).toBe(true);
    expect(extractFlag($('#checkbox'))).toBe(true);
  });

  it('is false for blank cells, other text and missing columns', () => {
    expect(extractFlag($('#empty-anchor'))).toBe(false);
    expect(extractFlag($('#blank'))).toBe(false);
    expect(extractFlag($('#other'))).toBe(false);
    expect(extractFlag($('#missing'))).toBe(false);
    expect(extractFlag(undefined)).toBe(false);
  });
});

describe('cleanText', () => {
  it('collapses whitespace', () => {
    expect(cleanText('  Salt\n  Lake City ')).toBe('Salt Lake City');
    expect(cleanText(null)).toBe('');
  });
});

describe('parseAddress', () => {
  it('splits street, city, state and zip', () => {
    expect(parseAddress('123 Main St, Salt Lake City, UT 84101')).toEqual({
      streetAddress: '123 Main St',
      city: 'Salt Lake City',
      state: 'UT',
      zipCode: '84101',
    });
  });

  it('keeps extra street segments together', () => {
    expect(parseAddress('PO Box 9, Suite 4, Provo, ut 84601-1234')).toEqual({
      streetAddress: 'PO Box 9, Suite 4',
      city: 'Provo',
      state: 'UT',
      zipCode: '84601-1234',
    });
  });

  it('handles city-only and single-part addresses', () => {
    expect(parseAddress('Ogden, UT 84401')).toEqual({ streetAddress: '', city: 'Ogden', state: 'UT', zipCode: '84401' });
    expect(parseAddress('General Delivery')).toEqual({ streetAddress: 'General Delivery', city: '', state: '', zipCode: '' });
    expect(parseAddress('')).toEqual({ streetAddress: '', city: '', state: '', zipCode: '' });
  });
});

describe('classifyAddressState', () => {
  it('finds a trailing state code with or without zip', () => {
    expect(classifyAddressState('1 Elm St, Boise, ID 83702')).toBe('ID');
    expect(classifyAddressState('1 Elm St, Reno, nv')).toBe('NV');
    expect(classifyAddressState('1 Elm St, Provo, UT 84601-0001')).toBe('UT');
  });

  it('returns null when nothing matches', () => {
    expect(classifyAddressState('Somewhere abroad')).toBeNull();
    expect(classifyAddressState('')).toBeNull();
  });

  it('only counts recognized non-home states as out of state', () => {
    expect(isOutOfState('1 Elm St, Boise, ID 83702')).toBe(true);
    expect(isOutOfState('1 Elm St, Provo, UT 84601')).toBe(false);
    expect(isOutOfState('Unknown')).toBe(false);
  });
});
