/**
 * Field extractors
 *
 * Pure conversions from raw cell text to typed values. None of these throw:
 * malformed input maps to zero, null or false and the caller decides whether
 * to log it.
 */

import { Decimal } from 'decimal.js';
import type { Cheerio } from 'cheerio';
import type { Element } from 'domhandler';
import type { IsoDate, PostalAddress } from '../types/index.js';

export const ZERO = new Decimal(0);

const NUMBER_PATTERN = /^(\d+(\.\d*)?|\.\d+)$/;

/**
 * Collapse runs of whitespace (including non-breaking spaces) into one space.
 */
export function cleanText(text: string | null | undefined): string {
  if (!text) return '';
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Parse a currency string such as `$1,234.56`, `(1,234.56)` or `-$5.00`.
 * Anything unparsable is zero. The result always has two fractional digits.
 */
export function extractCurrency(text: string | null | undefined): Decimal {
  if (!text) return ZERO;

  let cleaned = text.replace(/\s+/g, '');
  if (!cleaned || cleaned === '--') return ZERO;

  let negative = false;
  const parenthesized = /^\((.*)\)$/.exec(cleaned);
  if (parenthesized) {
    negative = true;
    cleaned = parenthesized[1];
  }

  cleaned = cleaned.replace(/[$,]/g, '');
  if (cleaned.startsWith('-')) {
    negative = !negative;
    cleaned = cleaned.slice(1);
  }

  if (!NUMBER_PATTERN.test(cleaned)) return ZERO;

  const value = new Decimal(cleaned).toDecimalPlaces(2, Decimal.ROUND_HALF_UP);
  if (value.isZero()) return ZERO;
  return negative ? value.negated() : value;
}

/**
 * Format an amount as `$1,234.56`; negatives use accounting parentheses.
 */
export function formatCurrency(amount: Decimal): string {
  const [integerPart, fraction] = amount.abs().toFixed(2).split('.');
  const grouped = integerPart.replace(/\B(?=(\d{3})+(?!\d))/g, ',');
  const body = `$${grouped}.${fraction}`;
  return amount.isNegative() && !amount.isZero() ? `(${body})` : body;
}

export function sumAmounts(items: ReadonlyArray<{ amount: Decimal }>): Decimal {
  return items.reduce((total, item) => total.plus(item.amount), ZERO);
}

/** True when the text looks like an amount column value. */
export function looksLikeCurrency(text: string): boolean {
  const cleaned = text.replace(/\s+/g, '');
  if (!cleaned) return false;
  if (cleaned.includes('$')) return true;
  return NUMBER_PATTERN.test(cleaned.replace(/[,()-]/g, ''));
}

// ============================================
// Dates
// ============================================

const MONTH_NAMES = [
  'january', 'february', 'march', 'april', 'may', 'june',
  'july', 'august', 'september', 'october', 'november', 'december',
];

// The source renders unset dates as 1/1/0001
const EARLIEST_YEAR = 1800;

function toIsoDate(year: number, month: number, day: number): IsoDate | null {
  if (year < EARLIEST_YEAR || month < 1 || month > 12 || day < 1) return null;
  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
  if (day > daysInMonth) return null;
  return `${year}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
}

/**
 * Parse `M/D/YYYY`, `YYYY-MM-DD`, `Month D, YYYY` or `Mon D, YYYY`.
 * A trailing time of day is ignored.
 */
export function extractDate(text: string | null | undefined): IsoDate | null {
  const value = cleanText(text);
  if (!value || value === '--') return null;

  const us = /^(\d{1,2})\/(\d{1,2})\/(\d{4})(?:\s+\d{1,2}:\d{2}(?::\d{2})?(?:\s*[AP]M)?)?$/i.exec(value);
  if (us) {
    return toIsoDate(Number(us[3]), Number(us[1]), Number(us[2]));
  }

  const iso = /^(\d{4})-(\d{2})-(\d{2})(?:[T ].*)?$/.exec(value);
  if (iso) {
    return toIsoDate(Number(iso[1]), Number(iso[2]), Number(iso[3]));
  }

  const named = /^([A-Za-z]+)\.?\s+(\d{1,2}),?\s+(\d{4})$/.exec(value);
  if (named) {
    const key = named[1].toLowerCase();
    // Full names and abbreviations of at least three letters ("Sept", "Jan")
    const index = key.length >= 3 ? MONTH_NAMES.findIndex(name => name.startsWith(key)) : -1;
    if (index === -1) return null;
    return toIsoDate(Number(named[3]), index + 1, Number(named[2]));
  }

  return null;
}

export function extractDateField(text: string | null | undefined): { date: IsoDate | null; dateRaw: string } {
  const dateRaw = cleanText(text);
  return { date: extractDate(dateRaw), dateRaw };
}

// ============================================
// Flags
// ============================================

const FLAG_MARKERS = new Set(['yes', 'y', 'x', 'true', '✓', '✔', '☑', '☒']);

/**
 * A flag cell is set when it holds a marker link, a checked box or a marker
 * token. A missing cell (the column is absent) is false.
 */
export function extractFlag(cell: Cheerio<Element> | undefined): boolean {
  if (!cell || cell.length === 0) return false;

  const text = cleanText(cell.text());
  if (text && cell.find('a.anchorLink').length > 0) return true;
  if (cell.find('input[type="checkbox"][checked]').length > 0) return true;
  if (cell.hasClass('checked') || cell.find('.checked').length > 0) return true;

  return FLAG_MARKERS.has(text.toLowerCase());
}

// ============================================
// Addresses
// ============================================

const STATE_ZIP = /^([A-Za-z]{2})\s+(\d{5}(?:-\d{4})?)\b/;

/**
 * Split `street, city, ST 12345` into its parts. Missing parts are empty.
 */
export function parseAddress(text: string | null | undefined): PostalAddress {
  const result: PostalAddress = { streetAddress: '', city: '', state: '', zipCode: '' };
  const value = cleanText(text);
  if (!value) return result;

  const parts = value.split(',').map(part => part.trim()).filter(Boolean);
  if (parts.length === 1) {
    result.streetAddress = parts[0];
    return result;
  }

  const stateZip = STATE_ZIP.exec(parts[parts.length - 1]);
  if (stateZip) {
    result.state = stateZip[1].toUpperCase();
    result.zipCode = stateZip[2];
  }
  result.city = parts[parts.length - 2];
  result.streetAddress = parts.slice(0, parts.length - 2).join(', ');
  return result;
}

const US_STATE_CODES = (
  'AL AK AZ AR CA CO CT DE FL GA HI ID IL IN IA KS KY LA ME MD MA MI MN MS MO ' +
  'MT NE NV NH NJ NM NY NC ND OH OK OR PA RI SC SD TN TX UT VT VA WA WV WI WY DC'
).split(' ');

const TRAILING_STATE = new RegExp(
  `\\b(${US_STATE_CODES.join('|')})(?:\\s+\\d{5}(?:-\\d{4})?)?\\s*$`,
  'i'
);

/**
 * Best-effort guess at the state of a free-text address: a state code,
 * optionally followed by a ZIP, at the very end. Street names ending in a
 * word like "Me" or "Or" produce false positives; treat the output as a hint.
 */
export function classifyAddressState(address: string | null | undefined): string | null {
  const value = cleanText(address);
  if (!value) return null;
  const match = TRAILING_STATE.exec(value);
  return match ? match[1].toUpperCase() : null;
}

export function isOutOfState(address: string | null | undefined, homeState = 'UT'): boolean {
  const state = classifyAddressState(address);
  return state !== null && state !== homeState.toUpperCase();
}
