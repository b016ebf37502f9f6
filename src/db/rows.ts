/**
 * Typed readers for untyped result rows, and the money conversions between
 * Decimal amounts and integer cents.
 */

import { Decimal } from 'decimal.js';
import type { Row } from './db-adapter.js';

export function toCents(amount: Decimal): number {
  return amount.times(100).toDecimalPlaces(0, Decimal.ROUND_HALF_UP).toNumber();
}

export function fromCents(cents: number): Decimal {
  return new Decimal(cents).dividedBy(100);
}

/** Cents rendered as a two-decimal string, the shape the API returns. */
export function centsToAmount(cents: number): string {
  return fromCents(cents).toFixed(2);
}

export function readString(row: Row, column: string): string {
  const value = row[column];
  if (value === null || value === undefined) return '';
  return String(value);
}

export function readNullableString(row: Row, column: string): string | null {
  const value = row[column];
  if (value === null || value === undefined) return null;
  return String(value);
}

/** Numbers, bigints and numeric strings; anything else reads as zero. */
export function readNumber(row: Row, column: string): number {
  const value = row[column];
  if (typeof value === 'number') return value;
  if (typeof value === 'bigint') return Number(value);
  if (typeof value === 'string' && value.trim() !== '' && !Number.isNaN(Number(value))) return Number(value);
  return 0;
}

export function readBoolean(row: Row, column: string): boolean {
  return readNumber(row, column) !== 0;
}

export function readJsonObject(row: Row, column: string): Record<string, string> {
  const text = readString(row, column);
  if (!text) return {};
  try {
    const parsed: unknown = JSON.parse(text);
    if (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed)) return {};
    const result: Record<string, string> = {};
    for (const [key, value] of Object.entries(parsed)) {
      if (typeof value === 'string') result[key] = value;
    }
    return result;
  } catch (error) {
    console.warn(`Ignoring malformed JSON in ${column}:`, error);
    return {};
  }
}

/** Map labels to a JSON object string, in insertion order. */
export function metadataToJson(metadata: Map<string, string>): string {
  return JSON.stringify(Object.fromEntries(metadata));
}

export function flag(value: boolean): number {
  return value ? 1 : 0;
}
