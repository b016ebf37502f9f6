/**
 * Lobbyist expenditure report parser
 *
 * Same page skeleton as campaign reports, with one expenditures table
 * (Date, Recipient, Location, Purpose, A, Amount) and a principal block.
 */

import * as cheerio from 'cheerio';
import type { PageContext, ParsedLobbyistReport, ParseResult, RawMetadata } from '../types/index.js';
import { sumAmounts } from './extractors.js';
import { readLineItems } from './line-items.js';
import { extractPageMetadata, pickField } from './metadata.js';
import {
  dateWarnings,
  emptyPageFailure,
  noMetadataFailure,
  readBalanceRows,
  readReportPeriod,
  skippedRowWarnings,
  summarizeBalance,
  toExpenditure,
} from './report-parser.js';
import { classifyTables } from './table-classifier.js';

export function parseLobbyistReport(html: string, context: PageContext): ParseResult<ParsedLobbyistReport> {
  const empty = emptyPageFailure<ParsedLobbyistReport>(html);
  if (empty) return empty;

  const $ = cheerio.load(html);
  const metadata = extractPageMetadata($, { prefixPrincipalLabels: true });
  if (metadata.fields.size === 0) return noMetadataFailure(context);

  const tables = classifyTables($);
  const warnings = [...tables.warnings];
  const rawMetadata: RawMetadata = new Map(metadata.fields);

  const rows = tables.expenditures ? readLineItems($, tables.expenditures, 'lobbyist') : { items: [], skipped: 0 };
  const expenditures = rows.items.map(toExpenditure);
  warnings.push(...skippedRowWarnings('expenditure', rows.skipped), ...dateWarnings('expenditure', expenditures));

  const balance = summarizeBalance(tables.balanceSummary ? readBalanceRows($, tables.balanceSummary) : []);
  for (const row of balance.unmatched) {
    if (!rawMetadata.has(row.label)) {
      rawMetadata.set(row.label, row.amount.toFixed(2));
    }
  }

  // Pages without a summary table still list their rows
  const totalExpenditures = tables.balanceSummary ? balance.totalExpenditures : sumAmounts(expenditures);

  const fields = metadata.fields;
  const report: ParsedLobbyistReport = {
    reportId: context.id,
    sourceUrl: context.sourceUrl,
    title: metadata.title || 'Lobbyist Expenditure Report',
    principalName: pickField(fields, 'Principal Name', 'Name'),
    principalPhone: pickField(fields, 'Principal Phone', 'Phone'),
    principalStreetAddress: pickField(fields, 'Principal Street Address', 'Principal Address'),
    principalCity: pickField(fields, 'Principal City'),
    principalState: pickField(fields, 'Principal State'),
    principalZip: pickField(fields, 'Principal Zip', 'Principal Zip Code'),
    ...readReportPeriod(fields, 'Lobbyist Expenditure'),
    totalExpenditures,
    expenditures,
    rawMetadata,
    warnings,
  };

  return { ok: true, value: report };
}

export function isUsableLobbyistReport(report: ParsedLobbyistReport): boolean {
  return !report.totalExpenditures.isZero() || report.expenditures.length > 0;
}
