/**
 * Disclosure report importer
 *
 * Writes a parsed report and its line items. An update replaces every
 * child row inside the same transaction that updates the report, so a
 * failure part-way leaves the previous version intact.
 */

import type { DbClient, DbExecutor, SqlParam } from '../db/db-adapter.js';
import { flag, metadataToJson, toCents } from '../db/rows.js';
import { sumAmounts } from '../parser/extractors.js';
import type { ImportOptions, ParsedReport, ReportImportResult, ReportImportWritten } from '../types/index.js';
import { insertedId, upsertParent, type ParentTable } from './upsert.js';

export const REPORTS: ParentTable = { table: 'disclosure_reports', keyColumn: 'report_id' };

function reportColumns(report: ParsedReport): SqlParam[] {
  return [
    report.sourceUrl,
    report.title,
    report.organizationName,
    report.organizationType,
    report.reportType,
    report.beginDate,
    report.endDate,
    report.dueDate,
    report.submitDate,
    toCents(report.balanceBeginning),
    toCents(report.totalContributions),
    toCents(report.totalExpenditures),
    toCents(report.balanceEnding),
    metadataToJson(report.rawMetadata),
  ];
}

async function insertLineItems(tx: DbExecutor, reportRowId: number, report: ParsedReport): Promise<void> {
  for (const [position, item] of report.contributions.entries()) {
    await tx.execute(
      `INSERT INTO contributions (
        report_id, position, date_received, date_received_raw, contributor_name, address,
        is_in_kind, is_loan, is_amendment, amount_cents
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      [
        reportRowId,
        position,
        item.date,
        item.dateRaw,
        item.contributorName,
        item.address,
        flag(item.isInKind),
        flag(item.isLoan),
        flag(item.isAmendment),
        toCents(item.amount),
      ]
    );
  }

  for (const [position, item] of report.expenditures.entries()) {
    await tx.execute(
      `INSERT INTO expenditures (
        report_id, position, date, date_raw, recipient_name, purpose,
        is_in_kind, is_loan, is_amendment, amount_cents
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      [
        reportRowId,
        position,
        item.date,
        item.dateRaw,
        item.recipientName,
        item.purpose,
        flag(item.isInKind),
        flag(item.isLoan),
        flag(item.isAmendment),
        toCents(item.amount),
      ]
    );
  }
}

export async function importDisclosureReport(
  db: DbClient,
  report: ParsedReport,
  options: ImportOptions
): Promise<ReportImportResult> {
  return upsertParent<ReportImportWritten>(db, REPORTS, report.reportId, options, async (tx, existing, timestamp) => {
    let reportRowId: number;

    if (existing) {
      await tx.execute(
        `UPDATE disclosure_reports SET
          source_url = ?, title = ?, organization_name = ?, organization_type = ?, report_type = ?,
          begin_date = ?, end_date = ?, due_date = ?, submit_date = ?,
          balance_beginning_cents = ?, total_contributions_cents = ?, total_expenditures_cents = ?,
          balance_ending_cents = ?, report_info = ?, updated_at = ?, last_scraped_at = ?
        WHERE id = ?`,
        [...reportColumns(report), timestamp, timestamp, existing.id]
      );
      await tx.execute('DELETE FROM contributions WHERE report_id = ?', [existing.id]);
      await tx.execute('DELETE FROM expenditures WHERE report_id = ?', [existing.id]);
      reportRowId = existing.id;
    } else {
      const inserted = await tx.execute(
        `INSERT INTO disclosure_reports (
          source_url, title, organization_name, organization_type, report_type,
          begin_date, end_date, due_date, submit_date,
          balance_beginning_cents, total_contributions_cents, total_expenditures_cents,
          balance_ending_cents, report_info, created_at, updated_at, last_scraped_at, report_id
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        [...reportColumns(report), timestamp, timestamp, timestamp, report.reportId]
      );
      reportRowId = await insertedId(tx, REPORTS, report.reportId, inserted.lastId);
    }

    await insertLineItems(tx, reportRowId, report);

    return {
      status: existing ? 'updated' : 'created',
      id: report.reportId,
      contributionsInserted: report.contributions.length,
      expendituresInserted: report.expenditures.length,
      contributionsTotal: sumAmounts(report.contributions),
      expendituresTotal: sumAmounts(report.expenditures),
    };
  });
}
