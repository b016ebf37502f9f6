/**
 * Lobbyist views: expenditure reports by principal, and registrations with
 * the principals each lobbyist represents.
 */

import type { DbExecutor, Row, SqlParam } from './db-adapter.js';
import { countOf, like, pageWindow, toPage, toStats, yearClause, type AmountStats, type Page, type PageOptions, type YearOption } from './queries.js';
import { centsToAmount, readBoolean, readJsonObject, readNullableString, readNumber, readString } from './rows.js';

// ============================================
// Reports
// ============================================

export interface LobbyistReportSummary {
  reportId: string;
  title: string;
  principalName: string;
  reportType: string;
  beginDate: string | null;
  endDate: string | null;
  totalExpenditures: string;
}

export interface LobbyistExpenditureRow {
  date: string | null;
  dateRaw: string;
  recipientName: string;
  location: string;
  purpose: string;
  amount: string;
  isAmendment: boolean;
}

export interface LobbyistReportDetail {
  report: LobbyistReportSummary & {
    sourceUrl: string;
    principalPhone: string;
    principalAddress: string;
    dueDate: string | null;
    submitDate: string | null;
    reportInfo: Record<string, string>;
    lastScrapedAt: string;
  };
  stats: AmountStats;
  expenditures: LobbyistExpenditureRow[];
}

export interface ListLobbyistReportsOptions extends PageOptions, YearOption {
  /** Matches the principal, the title or the report ID. */
  search?: string;
}

function toLobbyistReportSummary(row: Row): LobbyistReportSummary {
  return {
    reportId: readString(row, 'report_id'),
    title: readString(row, 'title'),
    principalName: readString(row, 'principal_name'),
    reportType: readString(row, 'report_type'),
    beginDate: readNullableString(row, 'begin_date'),
    endDate: readNullableString(row, 'end_date'),
    totalExpenditures: centsToAmount(readNumber(row, 'total_expenditures_cents')),
  };
}

function principalAddress(row: Row): string {
  const street = readString(row, 'principal_street_address');
  const locality = [readString(row, 'principal_city'), readString(row, 'principal_state')]
    .filter(Boolean)
    .join(', ');
  const zip = readString(row, 'principal_zip');
  return [street, [locality, zip].filter(Boolean).join(' ')].filter(Boolean).join(', ');
}

export async function listLobbyistReports(
  db: DbExecutor,
  options: ListLobbyistReportsOptions = {}
): Promise<Page<LobbyistReportSummary>> {
  const window = pageWindow(options, 25);
  const params: SqlParam[] = [];
  let where = `WHERE 1 = 1${yearClause('end_date', options.year, params)}`;
  if (options.search) {
    where += ' AND (principal_name LIKE ? OR title LIKE ? OR report_id LIKE ?)';
    const pattern = like(options.search);
    params.push(pattern, pattern, pattern);
  }

  const total = await countOf(db, `SELECT COUNT(*) AS count FROM lobbyist_reports ${where}`, params);
  const rows = await db.query(
    `SELECT * FROM lobbyist_reports ${where} ORDER BY end_date DESC, id DESC LIMIT ? OFFSET ?`,
    [...params, window.pageSize, window.offset]
  );
  return toPage(rows.map(toLobbyistReportSummary), total, window);
}

export async function getLobbyistReportDetail(db: DbExecutor, reportId: string): Promise<LobbyistReportDetail | null> {
  const rows = await db.query('SELECT * FROM lobbyist_reports WHERE report_id = ?', [reportId]);
  if (rows.length === 0) return null;
  const report = rows[0];
  const id = readNumber(report, 'id');

  const [stats] = await db.query(
    `SELECT COALESCE(SUM(amount_cents), 0) AS total_cents, COUNT(*) AS count
     FROM lobbyist_expenditures WHERE report_id = ?`,
    [id]
  );
  const expenditures = await db.query('SELECT * FROM lobbyist_expenditures WHERE report_id = ? ORDER BY position', [id]);

  return {
    report: {
      ...toLobbyistReportSummary(report),
      sourceUrl: readString(report, 'source_url'),
      principalPhone: readString(report, 'principal_phone'),
      principalAddress: principalAddress(report),
      dueDate: readNullableString(report, 'due_date'),
      submitDate: readNullableString(report, 'submit_date'),
      reportInfo: readJsonObject(report, 'report_info'),
      lastScrapedAt: readString(report, 'last_scraped_at'),
    },
    stats: toStats(stats),
    expenditures: expenditures.map(row => ({
      date: readNullableString(row, 'date'),
      dateRaw: readString(row, 'date_raw'),
      recipientName: readString(row, 'recipient_name'),
      location: readString(row, 'location'),
      purpose: readString(row, 'purpose'),
      amount: centsToAmount(readNumber(row, 'amount_cents')),
      isAmendment: readBoolean(row, 'is_amendment'),
    })),
  };
}

// ============================================
// Registrations
// ============================================

export interface LobbyistSummary {
  entityId: string;
  name: string;
  organizationName: string;
  principalName: string;
  registrationDate: string | null;
}

export interface PrincipalRecord {
  name: string;
  contact: string;
  phone: string;
  address: string;
}

export interface LobbyistDetail extends LobbyistSummary {
  sourceUrl: string;
  firstName: string;
  lastName: string;
  phone: string;
  organizationPhone: string;
  streetAddress: string;
  city: string;
  state: string;
  zipCode: string;
  lobbyingPurposes: string;
  rawData: Record<string, string>;
  lastScrapedAt: string;
  principals: PrincipalRecord[];
  /** Expenditure reports filed under any of the lobbyist's principals. */
  reports: LobbyistReportSummary[];
}

export interface ListLobbyistsOptions extends PageOptions {
  /** Matches the lobbyist, the organization or the principal. */
  search?: string;
}

function toLobbyistSummary(row: Row): LobbyistSummary {
  return {
    entityId: readString(row, 'entity_id'),
    name: readString(row, 'name'),
    organizationName: readString(row, 'organization_name'),
    principalName: readString(row, 'principal_name'),
    registrationDate: readNullableString(row, 'registration_date'),
  };
}

export async function listLobbyists(db: DbExecutor, options: ListLobbyistsOptions = {}): Promise<Page<LobbyistSummary>> {
  const window = pageWindow(options, 50);
  const params: SqlParam[] = [];
  let where = '';
  if (options.search) {
    where = 'WHERE name LIKE ? OR organization_name LIKE ? OR principal_name LIKE ?';
    const pattern = like(options.search);
    params.push(pattern, pattern, pattern);
  }

  const total = await countOf(db, `SELECT COUNT(*) AS count FROM lobbyist_registrations ${where}`, params);
  const rows = await db.query(
    `SELECT * FROM lobbyist_registrations ${where} ORDER BY name, id LIMIT ? OFFSET ?`,
    [...params, window.pageSize, window.offset]
  );
  return toPage(rows.map(toLobbyistSummary), total, window);
}

export async function getLobbyistDetail(db: DbExecutor, entityId: string): Promise<LobbyistDetail | null> {
  const rows = await db.query('SELECT * FROM lobbyist_registrations WHERE entity_id = ?', [entityId]);
  if (rows.length === 0) return null;
  const lobbyist = rows[0];

  const principals = await db.query('SELECT * FROM lobbyist_principals WHERE registration_id = ? ORDER BY position', [
    readNumber(lobbyist, 'id'),
  ]);
  const principalNames = principals.map(row => readString(row, 'name'));

  let reports: Row[] = [];
  if (principalNames.length > 0) {
    const placeholders = principalNames.map(() => '?').join(', ');
    reports = await db.query(
      `SELECT * FROM lobbyist_reports WHERE principal_name COLLATE NOCASE IN (${placeholders})
       ORDER BY end_date DESC, id DESC`,
      principalNames
    );
  }

  return {
    ...toLobbyistSummary(lobbyist),
    sourceUrl: readString(lobbyist, 'source_url'),
    firstName: readString(lobbyist, 'first_name'),
    lastName: readString(lobbyist, 'last_name'),
    phone: readString(lobbyist, 'phone'),
    organizationPhone: readString(lobbyist, 'organization_phone'),
    streetAddress: readString(lobbyist, 'street_address'),
    city: readString(lobbyist, 'city'),
    state: readString(lobbyist, 'state'),
    zipCode: readString(lobbyist, 'zip_code'),
    lobbyingPurposes: readString(lobbyist, 'lobbying_purposes'),
    rawData: readJsonObject(lobbyist, 'raw_data'),
    lastScrapedAt: readString(lobbyist, 'last_scraped_at'),
    principals: principals.map(row => ({
      name: readString(row, 'name'),
      contact: readString(row, 'contact'),
      phone: readString(row, 'phone'),
      address: readString(row, 'address'),
    })),
    reports: reports.map(toLobbyistReportSummary),
  };
}
