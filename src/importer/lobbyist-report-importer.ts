/**
 * Lobbyist report importer
 */

import type { DbClient, DbExecutor, SqlParam } from '../db/db-adapter.js';
import { flag, metadataToJson, toCents } from '../db/rows.js';
import { sumAmounts, ZERO } from '../parser/extractors.js';
import type {
  ImportOptions,
  ParsedLobbyistReport,
  ReportImportResult,
  ReportImportWritten,
} from '../types/index.js';
import { insertedId, upsertParent, type ParentTable } from './upsert.js';

export const LOBBYIST_REPORTS: ParentTable = { table: 'lobbyist_reports', keyColumn: 'report_id' };

function reportColumns(report: ParsedLobbyistReport): SqlParam[] {
  return [
    report.sourceUrl,
    report.title,
    report.principalName,
    report.principalPhone,
    report.principalStreetAddress,
    report.principalCity,
    report.principalState,
    report.principalZip,
    report.reportType,
    report.beginDate,
    report.endDate,
    report.dueDate,
    report.submitDate,
    toCents(report.totalExpenditures),
    metadataToJson(report.rawMetadata),
  ];
}

async function insertExpenditures(tx: DbExecutor, reportRowId: number, report: ParsedLobbyistReport): Promise<void> {
  for (const [position, item] of report.expenditures.entries()) {
    await tx.execute(
      `INSERT INTO lobbyist_expenditures (
        report_id, position, date, date_raw, recipient_name, location, purpose, is_amendment, amount_cents
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      [
        reportRowId,
        position,
        item.date,
        item.dateRaw,
        item.recipientName,
        item.location,
        item.purpose,
        flag(item.isAmendment),
        toCents(item.amount),
      ]
    );
  }
}

export async function importLobbyistReport(
  db: DbClient,
  report: ParsedLobbyistReport,
  options: ImportOptions
): Promise<ReportImportResult> {
  return upsertParent<ReportImportWritten>(db, LOBBYIST_REPORTS, report.reportId, options, async (tx, existing, timestamp) => {
    let reportRowId: number;

    if (existing) {
      await tx.execute(
        `UPDATE lobbyist_reports SET
          source_url = ?, title = ?, principal_name = ?, principal_phone = ?,
          principal_street_address = ?, principal_city = ?, principal_state = ?, principal_zip = ?,
          report_type = ?, begin_date = ?, end_date = ?, due_date = ?, submit_date = ?,
          total_expenditures_cents = ?, report_info = ?, updated_at = ?, last_scraped_at = ?
        WHERE id = ?`,
        [...reportColumns(report), timestamp, timestamp, existing.id]
      );
      await tx.execute('DELETE FROM lobbyist_expenditures WHERE report_id = ?', [existing.id]);
      reportRowId = existing.id;
    } else {
      const inserted = await tx.execute(
        `INSERT INTO lobbyist_reports (
          source_url, title, principal_name, principal_phone,
          principal_street_address, principal_city, principal_state, principal_zip,
          report_type, begin_date, end_date, due_date, submit_date,
          total_expenditures_cents, report_info, created_at, updated_at, last_scraped_at, report_id
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        [...reportColumns(report), timestamp, timestamp, timestamp, report.reportId]
      );
      reportRowId = await insertedId(tx, LOBBYIST_REPORTS, report.reportId, inserted.lastId);
    }

    await insertExpenditures(tx, reportRowId, report);

    return {
      status: existing ? 'updated' : 'created',
      id: report.reportId,
      contributionsInserted: 0,
      expendituresInserted: report.expenditures.length,
      contributionsTotal: ZERO,
      expendituresTotal: sumAmounts(report.expenditures),
    };
  });
}
