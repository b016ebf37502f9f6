/**
 * Campaign disclosure report parser
 *
 * Turns a fetched report page into a ParsedReport. A page with no labeled
 * metadata field is a ParseFailure; a page with metadata but no line items is
 * a valid, empty report.
 */

import * as cheerio from 'cheerio';
import type { Cheerio, CheerioAPI } from 'cheerio';
import type { Decimal } from 'decimal.js';
import type { Element } from 'domhandler';
import type {
  ContributionRecord,
  ExpenditureRecord,
  PageContext,
  ParsedReport,
  ParseResult,
  RawMetadata,
  ReportPeriod,
} from '../types/index.js';
import { ZERO, cleanText, extractCurrency, extractDate, extractDateField } from './extractors.js';
import { readLineItems, type RawLineItem } from './line-items.js';
import { extractPageMetadata, normalizeLabel, pickField } from './metadata.js';
import { classifyTables } from './table-classifier.js';

// ============================================
// Balance summary
// ============================================

export type BalanceField = 'balanceBeginning' | 'totalContributions' | 'totalExpenditures' | 'balanceEnding';

const BALANCE_LABELS: Array<[RegExp, BalanceField]> = [
  [/^(balance at beginning|beginning balance)/i, 'balanceBeginning'],
  [/^total contributions/i, 'totalContributions'],
  [/^total expenditures/i, 'totalExpenditures'],
  [/^(ending balance|balance at end)/i, 'balanceEnding'],
];

export function balanceFieldForLabel(label: string): BalanceField | null {
  for (const [pattern, field] of BALANCE_LABELS) {
    if (pattern.test(label)) return field;
  }
  return null;
}

export interface BalanceRow {
  label: string;
  amount: Decimal;
}

/**
 * Rows are `[label, value]` or `[line, label, value, ...]`. Labels lose a
 * trailing colon and any parenthetical note.
 */
export function readBalanceRows($: CheerioAPI, table: Cheerio<Element>): BalanceRow[] {
  const rows: BalanceRow[] = [];

  for (const row of table.find('tr').toArray()) {
    if ($(row).children('td').length === 0) continue;
    const cells = $(row)
      .children('td, th')
      .toArray()
      .map(cell => cleanText($(cell).text()));
    if (cells.length < 2) continue;

    const [labelText, valueText] = cells.length === 2 ? [cells[0], cells[1]] : [cells[1], cells[2]];
    const label = normalizeLabel(labelText.replace(/\([^)]*\)/g, ''));
    if (!label || /^\d+$/.test(label)) continue;

    rows.push({ label, amount: extractCurrency(valueText) });
  }

  return rows;
}

export interface BalanceSummary {
  balanceBeginning: Decimal;
  totalContributions: Decimal;
  totalExpenditures: Decimal;
  balanceEnding: Decimal;
  /** Labels with no mapped field. */
  unmatched: BalanceRow[];
}

export function summarizeBalance(rows: BalanceRow[]): BalanceSummary {
  const summary: BalanceSummary = {
    balanceBeginning: ZERO,
    totalContributions: ZERO,
    totalExpenditures: ZERO,
    balanceEnding: ZERO,
    unmatched: [],
  };

  for (const row of rows) {
    const field = balanceFieldForLabel(row.label);
    if (field) {
      summary[field] = row.amount;
    } else {
      summary.unmatched.push(row);
    }
  }
  return summary;
}

// ============================================
// Shared helpers
// ============================================

export function readReportPeriod(fields: RawMetadata, defaultType = ''): ReportPeriod {
  return {
    reportType: pickField(fields, 'Report Type') || defaultType,
    beginDate: extractDate(fields.get('Begin Date')),
    endDate: extractDate(fields.get('End Date')),
    dueDate: extractDate(fields.get('Due Date')),
    submitDate: extractDate(fields.get('Submit Date')),
  };
}

export function toExpenditure(item: RawLineItem): ExpenditureRecord {
  const { date, dateRaw } = extractDateField(item.dateText);
  return {
    date,
    dateRaw,
    recipientName: item.name,
    purpose: item.purpose,
    location: item.location,
    amount: extractCurrency(item.amountText),
    isInKind: item.isInKind,
    isLoan: item.isLoan,
    isAmendment: item.isAmendment,
  };
}

function toContribution(item: RawLineItem): ContributionRecord {
  const { date, dateRaw } = extractDateField(item.dateText);
  return {
    date,
    dateRaw,
    contributorName: item.name,
    address: item.address,
    amount: extractCurrency(item.amountText),
    isInKind: item.isInKind,
    isLoan: item.isLoan,
    isAmendment: item.isAmendment,
  };
}

export function emptyPageFailure<T>(html: string): ParseResult<T> | null {
  if (!html.trim()) {
    return { ok: false, failure: { reason: 'empty_page', message: 'Page body is empty' } };
  }
  return null;
}

export function noMetadataFailure<T>(context: PageContext): ParseResult<T> {
  return {
    ok: false,
    failure: { reason: 'no_metadata', message: `No labeled metadata found for ${context.id}` },
  };
}

/** Rows whose date text was present but unreadable. */
export function dateWarnings(kind: string, records: ReadonlyArray<{ date: string | null; dateRaw: string }>): string[] {
  return records
    .filter(record => record.date === null && record.dateRaw !== '')
    .map(record => `Unparsable ${kind} date "${record.dateRaw}"`);
}

export function skippedRowWarnings(kind: string, skipped: number): string[] {
  return skipped > 0 ? [`Skipped ${skipped} unreadable ${kind} row${skipped === 1 ? '' : 's'}`] : [];
}

// ============================================
// Report parser
// ============================================

export function parseDisclosureReport(html: string, context: PageContext): ParseResult<ParsedReport> {
  const empty = emptyPageFailure<ParsedReport>(html);
  if (empty) return empty;

  const $ = cheerio.load(html);
  const metadata = extractPageMetadata($);
  if (metadata.fields.size === 0) return noMetadataFailure(context);

  const tables = classifyTables($);
  const warnings = [...tables.warnings];
  const rawMetadata: RawMetadata = new Map(metadata.fields);

  const balance = summarizeBalance(tables.balanceSummary ? readBalanceRows($, tables.balanceSummary) : []);
  for (const row of balance.unmatched) {
    if (!rawMetadata.has(row.label)) {
      rawMetadata.set(row.label, row.amount.toFixed(2));
    }
  }

  if (!tables.balanceSummary) {
    warnings.push('No "Balance Summary" table; balances default to 0.00');
  }

  const contributionRows = tables.contributions
    ? readLineItems($, tables.contributions, 'contribution')
    : { items: [], skipped: 0 };
  const expenditureRows = tables.expenditures
    ? readLineItems($, tables.expenditures, 'expenditure')
    : { items: [], skipped: 0 };
  const contributions = contributionRows.items.map(toContribution);
  const expenditures = expenditureRows.items.map(toExpenditure);

  warnings.push(
    ...skippedRowWarnings('contribution', contributionRows.skipped),
    ...skippedRowWarnings('expenditure', expenditureRows.skipped),
    ...dateWarnings('contribution', contributions),
    ...dateWarnings('expenditure', expenditures)
  );

  const report: ParsedReport = {
    reportId: context.id,
    sourceUrl: context.sourceUrl,
    title: metadata.title,
    organizationName: pickField(metadata.fields, 'Name', 'Organization Name', 'Entity Name'),
    organizationType: metadata.organizationType,
    ...readReportPeriod(metadata.fields),
    balanceBeginning: balance.balanceBeginning,
    totalContributions: balance.totalContributions,
    totalExpenditures: balance.totalExpenditures,
    balanceEnding: balance.balanceEnding,
    contributions,
    expenditures,
    rawMetadata,
    warnings,
  };

  return { ok: true, value: report };
}

/**
 * A report is usable when it carries any nonzero balance amount or any line
 * item. Blank report IDs on the source render a shell page that fails this.
 */
export function isUsableReport(report: ParsedReport): boolean {
  const balances = [report.balanceBeginning, report.totalContributions, report.totalExpenditures, report.balanceEnding];
  return (
    balances.some(amount => !amount.isZero()) ||
    report.contributions.length > 0 ||
    report.expenditures.length > 0
  );
}
