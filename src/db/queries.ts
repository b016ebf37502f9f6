/**
 * Read queries behind the JSON API
 *
 * Each function runs fixed SQL and returns a fixed shape. Money leaves this
 * module as two-decimal strings built from integer cents.
 *
 * Aggregates over no matching rows come back as `{ total: '0.00', count: 0 }`.
 * The count is what tells "nothing matched" apart from "matched rows that sum
 * to zero".
 */

import { classifyAddressState } from '../parser/extractors.js';
import type { DbExecutor, Row, SqlParam } from './db-adapter.js';
import {
  centsToAmount,
  readBoolean,
  readJsonObject,
  readNullableString,
  readNumber,
  readString,
} from './rows.js';

// ============================================
// Result shapes
// ============================================

export interface AmountStats {
  total: string;
  count: number;
  average: string;
}

export interface NameTotal {
  name: string;
  total: string;
  count: number;
}

export interface TimelinePoint {
  date: string;
  amount: string;
  count: number;
}

export interface Timeline {
  contributions: TimelinePoint[];
  expenditures: TimelinePoint[];
}

export interface ReportSummary {
  reportId: string;
  title: string;
  organizationName: string;
  organizationType: string;
  reportType: string;
  beginDate: string | null;
  endDate: string | null;
  totalContributions: string;
  totalExpenditures: string;
  balanceEnding: string;
}

export interface ReportRecord extends ReportSummary {
  sourceUrl: string;
  dueDate: string | null;
  submitDate: string | null;
  balanceBeginning: string;
  reportInfo: Record<string, string>;
  lastScrapedAt: string;
}

export interface ContributionRow {
  date: string | null;
  dateRaw: string;
  contributorName: string;
  address: string;
  amount: string;
  isInKind: boolean;
  isLoan: boolean;
  isAmendment: boolean;
}

export interface ExpenditureRow {
  date: string | null;
  dateRaw: string;
  recipientName: string;
  purpose: string;
  amount: string;
  isInKind: boolean;
  isLoan: boolean;
  isAmendment: boolean;
}

export interface Page<T> {
  page: number;
  pageSize: number;
  total: number;
  totalPages: number;
  items: T[];
}

export interface PageOptions {
  page?: number;
  pageSize?: number;
}

export interface YearOption {
  /** Filters on the report's end date. */
  year?: number;
}

export const MAX_PAGE_SIZE = 100;
export const DETAIL_ROW_LIMIT = 100;
export const TOP_LIMIT = 10;

// ============================================
// Row mapping
// ============================================

export function toStats(row: Row | undefined): AmountStats {
  const cents = row ? readNumber(row, 'total_cents') : 0;
  const count = row ? readNumber(row, 'count') : 0;
  return {
    total: centsToAmount(cents),
    count,
    average: count > 0 ? centsToAmount(Math.round(cents / count)) : centsToAmount(0),
  };
}

export function toNameTotal(row: Row): NameTotal {
  return {
    name: readString(row, 'name'),
    total: centsToAmount(readNumber(row, 'total_cents')),
    count: readNumber(row, 'count'),
  };
}

export function toTimelinePoint(row: Row): TimelinePoint {
  return {
    date: readString(row, 'day'),
    amount: centsToAmount(readNumber(row, 'total_cents')),
    count: readNumber(row, 'count'),
  };
}

export function toReportSummary(row: Row): ReportSummary {
  return {
    reportId: readString(row, 'report_id'),
    title: readString(row, 'title'),
    organizationName: readString(row, 'organization_name'),
    organizationType: readString(row, 'organization_type'),
    reportType: readString(row, 'report_type'),
    beginDate: readNullableString(row, 'begin_date'),
    endDate: readNullableString(row, 'end_date'),
    totalContributions: centsToAmount(readNumber(row, 'total_contributions_cents')),
    totalExpenditures: centsToAmount(readNumber(row, 'total_expenditures_cents')),
    balanceEnding: centsToAmount(readNumber(row, 'balance_ending_cents')),
  };
}

function toReportRecord(row: Row): ReportRecord {
  return {
    ...toReportSummary(row),
    sourceUrl: readString(row, 'source_url'),
    dueDate: readNullableString(row, 'due_date'),
    submitDate: readNullableString(row, 'submit_date'),
    balanceBeginning: centsToAmount(readNumber(row, 'balance_beginning_cents')),
    reportInfo: readJsonObject(row, 'report_info'),
    lastScrapedAt: readString(row, 'last_scraped_at'),
  };
}

function toContribution(row: Row): ContributionRow {
  return {
    date: readNullableString(row, 'date_received'),
    dateRaw: readString(row, 'date_received_raw'),
    contributorName: readString(row, 'contributor_name'),
    address: readString(row, 'address'),
    amount: centsToAmount(readNumber(row, 'amount_cents')),
    isInKind: readBoolean(row, 'is_in_kind'),
    isLoan: readBoolean(row, 'is_loan'),
    isAmendment: readBoolean(row, 'is_amendment'),
  };
}

function toExpenditure(row: Row): ExpenditureRow {
  return {
    date: readNullableString(row, 'date'),
    dateRaw: readString(row, 'date_raw'),
    recipientName: readString(row, 'recipient_name'),
    purpose: readString(row, 'purpose'),
    amount: centsToAmount(readNumber(row, 'amount_cents')),
    isInKind: readBoolean(row, 'is_in_kind'),
    isLoan: readBoolean(row, 'is_loan'),
    isAmendment: readBoolean(row, 'is_amendment'),
  };
}

// ============================================
// Helpers
// ============================================

export function pageWindow(options: PageOptions, defaultSize: number): { page: number; pageSize: number; offset: number } {
  const pageSize = Math.min(Math.max(Math.trunc(options.pageSize ?? defaultSize), 1), MAX_PAGE_SIZE);
  const page = Math.max(Math.trunc(options.page ?? 1), 1);
  return { page, pageSize, offset: (page - 1) * pageSize };
}

export function toPage<T>(items: T[], total: number, window: { page: number; pageSize: number }): Page<T> {
  return {
    page: window.page,
    pageSize: window.pageSize,
    total,
    totalPages: Math.ceil(total / window.pageSize),
    items,
  };
}

/** `substr(end_date, 1, 4) = ?` when a year is given. */
export function yearClause(column: string, year: number | undefined, params: SqlParam[]): string {
  if (year === undefined) return '';
  params.push(String(year));
  return ` AND substr(${column}, 1, 4) = ?`;
}

export function like(text: string): string {
  return `%${text}%`;
}

export async function countOf(db: DbExecutor, sql: string, params: SqlParam[]): Promise<number> {
  const rows = await db.query(sql, params);
  return rows.length > 0 ? readNumber(rows[0], 'count') : 0;
}

async function reportRowId(db: DbExecutor, reportId: string): Promise<number | null> {
  const rows = await db.query('SELECT id FROM disclosure_reports WHERE report_id = ?', [reportId]);
  return rows.length > 0 ? readNumber(rows[0], 'id') : null;
}

export const REPORT_SUMMARY_COLUMNS = `report_id, title, organization_name, organization_type, report_type,
  begin_date, end_date, total_contributions_cents, total_expenditures_cents, balance_ending_cents`;

// ============================================
// Overview
// ============================================

export interface OverviewStats {
  totalReports: number;
  contributions: AmountStats;
  expenditures: AmountStats;
  recentReports: ReportSummary[];
  topContributors: NameTotal[];
  topRecipients: NameTotal[];
}

export async function getOverviewStats(db: DbExecutor, options: YearOption = {}): Promise<OverviewStats> {
  const reportParams: SqlParam[] = [];
  const reportYear = yearClause('end_date', options.year, reportParams);
  const childParams: SqlParam[] = [];
  const childYear = yearClause('r.end_date', options.year, childParams);

  const totalReports = await countOf(db, `SELECT COUNT(*) AS count FROM disclosure_reports WHERE 1 = 1${reportYear}`, reportParams);

  const [contributionStats] = await db.query(
    `SELECT COALESCE(SUM(c.amount_cents), 0) AS total_cents, COUNT(c.id) AS count
     FROM contributions c JOIN disclosure_reports r ON r.id = c.report_id
     WHERE 1 = 1${childYear}`,
    childParams
  );
  const [expenditureStats] = await db.query(
    `SELECT COALESCE(SUM(e.amount_cents), 0) AS total_cents, COUNT(e.id) AS count
     FROM expenditures e JOIN disclosure_reports r ON r.id = e.report_id
     WHERE 1 = 1${childYear}`,
    childParams
  );

  const recentReports = await db.query(
    `SELECT ${REPORT_SUMMARY_COLUMNS} FROM disclosure_reports
     WHERE 1 = 1${reportYear}
     ORDER BY created_at DESC, id DESC LIMIT ${TOP_LIMIT}`,
    reportParams
  );

  const topContributors = await db.query(
    `SELECT c.contributor_name AS name, SUM(c.amount_cents) AS total_cents, COUNT(c.id) AS count
     FROM contributions c JOIN disclosure_reports r ON r.id = c.report_id
     WHERE 1 = 1${childYear}
     GROUP BY c.contributor_name ORDER BY total_cents DESC, name LIMIT ${TOP_LIMIT}`,
    childParams
  );
  const topRecipients = await db.query(
    `SELECT e.recipient_name AS name, SUM(e.amount_cents) AS total_cents, COUNT(e.id) AS count
     FROM expenditures e JOIN disclosure_reports r ON r.id = e.report_id
     WHERE 1 = 1${childYear}
     GROUP BY e.recipient_name ORDER BY total_cents DESC, name LIMIT ${TOP_LIMIT}`,
    childParams
  );

  return {
    totalReports,
    contributions: toStats(contributionStats),
    expenditures: toStats(expenditureStats),
    recentReports: recentReports.map(toReportSummary),
    topContributors: topContributors.map(toNameTotal),
    topRecipients: topRecipients.map(toNameTotal),
  };
}

// ============================================
// Reports
// ============================================

export type ReportSort =
  | 'created_at'
  | '-created_at'
  | 'ending_balance'
  | '-ending_balance'
  | 'report_id'
  | '-report_id'
  | 'organization_name'
  | '-organization_name';

const REPORT_SORTS: Record<ReportSort, string> = {
  created_at: 'created_at ASC, id ASC',
  '-created_at': 'created_at DESC, id DESC',
  ending_balance: 'balance_ending_cents ASC, id ASC',
  '-ending_balance': 'balance_ending_cents DESC, id DESC',
  report_id: 'CAST(report_id AS INTEGER) ASC',
  '-report_id': 'CAST(report_id AS INTEGER) DESC',
  organization_name: 'organization_name ASC, id ASC',
  '-organization_name': 'organization_name DESC, id DESC',
};

export function isReportSort(value: string): value is ReportSort {
  return Object.keys(REPORT_SORTS).includes(value);
}

export interface ListReportsOptions extends PageOptions, YearOption {
  /** Substring match, case-insensitive. */
  organizationType?: string;
  search?: string;
  sort?: ReportSort;
}

export interface ReportList extends Page<ReportSummary> {
  organizationTypes: string[];
}

export async function listReports(db: DbExecutor, options: ListReportsOptions = {}): Promise<ReportList> {
  const window = pageWindow(options, 25);
  const params: SqlParam[] = [];
  let where = 'WHERE 1 = 1';
  where += yearClause('end_date', options.year, params);
  if (options.organizationType) {
    where += ' AND organization_type LIKE ?';
    params.push(like(options.organizationType));
  }
  if (options.search) {
    where += ' AND (title LIKE ? OR report_id LIKE ? OR organization_name LIKE ?)';
    params.push(like(options.search), like(options.search), like(options.search));
  }

  const total = await countOf(db, `SELECT COUNT(*) AS count FROM disclosure_reports ${where}`, params);
  const rows = await db.query(
    `SELECT ${REPORT_SUMMARY_COLUMNS} FROM disclosure_reports ${where}
     ORDER BY ${REPORT_SORTS[options.sort ?? '-created_at']}
     LIMIT ? OFFSET ?`,
    [...params, window.pageSize, window.offset]
  );
  const types = await db.query(
    `SELECT DISTINCT organization_type FROM disclosure_reports
     WHERE organization_type != '' ORDER BY organization_type`
  );

  return {
    ...toPage(rows.map(toReportSummary), total, window),
    organizationTypes: types.map(row => readString(row, 'organization_type')),
  };
}

export interface ReportDetail {
  report: ReportRecord;
  contributions: ContributionRow[];
  expenditures: ExpenditureRow[];
  contributionStats: AmountStats;
  expenditureStats: AmountStats;
}

/** Null when no report has this ID. Line items are capped at 100 each. */
export async function getReportDetail(db: DbExecutor, reportId: string): Promise<ReportDetail | null> {
  const reports = await db.query('SELECT * FROM disclosure_reports WHERE report_id = ?', [reportId]);
  if (reports.length === 0) return null;
  const report = reports[0];
  const id = readNumber(report, 'id');

  const contributions = await db.query(
    `SELECT * FROM contributions WHERE report_id = ? ORDER BY position LIMIT ${DETAIL_ROW_LIMIT}`,
    [id]
  );
  const expenditures = await db.query(
    `SELECT * FROM expenditures WHERE report_id = ? ORDER BY position LIMIT ${DETAIL_ROW_LIMIT}`,
    [id]
  );
  const [contributionStats] = await db.query(
    'SELECT COALESCE(SUM(amount_cents), 0) AS total_cents, COUNT(*) AS count FROM contributions WHERE report_id = ?',
    [id]
  );
  const [expenditureStats] = await db.query(
    'SELECT COALESCE(SUM(amount_cents), 0) AS total_cents, COUNT(*) AS count FROM expenditures WHERE report_id = ?',
    [id]
  );

  return {
    report: toReportRecord(report),
    contributions: contributions.map(toContribution),
    expenditures: expenditures.map(toExpenditure),
    contributionStats: toStats(contributionStats),
    expenditureStats: toStats(expenditureStats),
  };
}

/** Daily totals for one report. Undated line items are left out. */
export async function getReportTimeline(db: DbExecutor, reportId: string): Promise<Timeline | null> {
  const id = await reportRowId(db, reportId);
  if (id === null) return null;

  const contributions = await db.query(
    `SELECT date_received AS day, SUM(amount_cents) AS total_cents, COUNT(*) AS count
     FROM contributions WHERE report_id = ? AND date_received IS NOT NULL
     GROUP BY date_received ORDER BY date_received`,
    [id]
  );
  const expenditures = await db.query(
    `SELECT date AS day, SUM(amount_cents) AS total_cents, COUNT(*) AS count
     FROM expenditures WHERE report_id = ? AND date IS NOT NULL
     GROUP BY date ORDER BY date`,
    [id]
  );

  return {
    contributions: contributions.map(toTimelinePoint),
    expenditures: expenditures.map(toTimelinePoint),
  };
}

export async function getTopContributors(db: DbExecutor, reportId: string, limit = TOP_LIMIT): Promise<NameTotal[] | null> {
  const id = await reportRowId(db, reportId);
  if (id === null) return null;
  const rows = await db.query(
    `SELECT contributor_name AS name, SUM(amount_cents) AS total_cents, COUNT(*) AS count
     FROM contributions WHERE report_id = ?
     GROUP BY contributor_name ORDER BY total_cents DESC, name LIMIT ?`,
    [id, limit]
  );
  return rows.map(toNameTotal);
}

export async function getTopRecipients(db: DbExecutor, reportId: string, limit = TOP_LIMIT): Promise<NameTotal[] | null> {
  const id = await reportRowId(db, reportId);
  if (id === null) return null;
  const rows = await db.query(
    `SELECT recipient_name AS name, SUM(amount_cents) AS total_cents, COUNT(*) AS count
     FROM expenditures WHERE report_id = ?
     GROUP BY recipient_name ORDER BY total_cents DESC, name LIMIT ?`,
    [id, limit]
  );
  return rows.map(toNameTotal);
}

// ============================================
// Contributors
// ============================================

export interface ContributorSummary {
  name: string;
  address: string;
  total: string;
  count: number;
  lastContribution: string | null;
}

export interface ListContributorsOptions extends PageOptions, YearOption {
  search?: string;
}

/** Grouped by name and address, largest total first. */
export async function listContributors(
  db: DbExecutor,
  options: ListContributorsOptions = {}
): Promise<Page<ContributorSummary>> {
  const window = pageWindow(options, 50);
  const params: SqlParam[] = [];
  let where = 'WHERE 1 = 1';
  where += yearClause('r.end_date', options.year, params);
  if (options.search) {
    where += ' AND (c.contributor_name LIKE ? OR c.address LIKE ?)';
    params.push(like(options.search), like(options.search));
  }

  const grouped = `
    SELECT c.contributor_name AS name, c.address AS address,
           SUM(c.amount_cents) AS total_cents, COUNT(c.id) AS count,
           MAX(c.date_received) AS last_contribution
    FROM contributions c JOIN disclosure_reports r ON r.id = c.report_id
    ${where}
    GROUP BY c.contributor_name, c.address`;

  const total = await countOf(db, `SELECT COUNT(*) AS count FROM (${grouped})`, params);
  const rows = await db.query(
    `${grouped} ORDER BY total_cents DESC, name LIMIT ? OFFSET ?`,
    [...params, window.pageSize, window.offset]
  );

  const items = rows.map(row => ({
    name: readString(row, 'name'),
    address: readString(row, 'address'),
    total: centsToAmount(readNumber(row, 'total_cents')),
    count: readNumber(row, 'count'),
    lastContribution: readNullableString(row, 'last_contribution'),
  }));
  return toPage(items, total, window);
}

export interface ContributorContribution extends ContributionRow {
  reportId: string;
  organizationName: string;
}

export interface ContributorDetail {
  name: string;
  address: string;
  stats: AmountStats & { firstContribution: string | null; lastContribution: string | null };
  byOrganization: Array<{ organizationName: string; organizationType: string; total: string; count: number }>;
  byYear: Array<{ year: string; total: string; count: number }>;
  contributions: ContributorContribution[];
  timeline: TimelinePoint[];
}

/** Exact name match. Null when the name never appears. */
export async function getContributorDetail(db: DbExecutor, name: string): Promise<ContributorDetail | null> {
  const contributions = await db.query(
    `SELECT c.*, r.report_id AS public_report_id, r.organization_name
     FROM contributions c JOIN disclosure_reports r ON r.id = c.report_id
     WHERE c.contributor_name = ?
     ORDER BY c.date_received DESC, c.id DESC`,
    [name]
  );
  if (contributions.length === 0) return null;

  const [stats] = await db.query(
    `SELECT COALESCE(SUM(amount_cents), 0) AS total_cents, COUNT(*) AS count,
            MIN(date_received) AS first_contribution, MAX(date_received) AS last_contribution
     FROM contributions WHERE contributor_name = ?`,
    [name]
  );
  const byOrganization = await db.query(
    `SELECT r.organization_name, r.organization_type, SUM(c.amount_cents) AS total_cents, COUNT(*) AS count
     FROM contributions c JOIN disclosure_reports r ON r.id = c.report_id
     WHERE c.contributor_name = ?
     GROUP BY r.organization_name, r.organization_type
     ORDER BY total_cents DESC, r.organization_name`,
    [name]
  );
  const byYear = await db.query(
    `SELECT substr(date_received, 1, 4) AS year, SUM(amount_cents) AS total_cents, COUNT(*) AS count
     FROM contributions WHERE contributor_name = ? AND date_received IS NOT NULL
     GROUP BY year ORDER BY year DESC`,
    [name]
  );
  const timeline = await db.query(
    `SELECT date_received AS day, SUM(amount_cents) AS total_cents, COUNT(*) AS count
     FROM contributions WHERE contributor_name = ? AND date_received IS NOT NULL
     GROUP BY date_received ORDER BY date_received`,
    [name]
  );

  return {
    name,
    address: readString(contributions[0], 'address'),
    stats: {
      ...toStats(stats),
      firstContribution: readNullableString(stats, 'first_contribution'),
      lastContribution: readNullableString(stats, 'last_contribution'),
    },
    byOrganization: byOrganization.map(row => ({
      organizationName: readString(row, 'organization_name'),
      organizationType: readString(row, 'organization_type'),
      total: centsToAmount(readNumber(row, 'total_cents')),
      count: readNumber(row, 'count'),
    })),
    byYear: byYear.map(row => ({
      year: readString(row, 'year'),
      total: centsToAmount(readNumber(row, 'total_cents')),
      count: readNumber(row, 'count'),
    })),
    contributions: contributions.slice(0, DETAIL_ROW_LIMIT).map(row => ({
      ...toContribution(row),
      reportId: readString(row, 'public_report_id'),
      organizationName: readString(row, 'organization_name'),
    })),
    timeline: timeline.map(toTimelinePoint),
  };
}

// ============================================
// Recipients
// ============================================

export interface RecipientSummary {
  name: string;
  purpose: string;
  total: string;
  count: number;
  lastExpenditure: string | null;
}

export interface ListRecipientsOptions extends PageOptions, YearOption {
  /** Matches the recipient name or the purpose. */
  search?: string;
}

/** Expenditures grouped by recipient and purpose, largest total first. */
export async function listRecipients(
  db: DbExecutor,
  options: ListRecipientsOptions = {}
): Promise<Page<RecipientSummary>> {
  const window = pageWindow(options, 50);
  const params: SqlParam[] = [];
  let where = 'WHERE 1 = 1';
  where += yearClause('r.end_date', options.year, params);
  if (options.search) {
    where += ' AND (e.recipient_name LIKE ? OR e.purpose LIKE ?)';
    params.push(like(options.search), like(options.search));
  }

  const grouped = `
    SELECT e.recipient_name AS name, e.purpose AS purpose,
           SUM(e.amount_cents) AS total_cents, COUNT(e.id) AS count,
           MAX(e.date) AS last_expenditure
    FROM expenditures e JOIN disclosure_reports r ON r.id = e.report_id
    ${where}
    GROUP BY e.recipient_name, e.purpose`;

  const total = await countOf(db, `SELECT COUNT(*) AS count FROM (${grouped})`, params);
  const rows = await db.query(
    `${grouped} ORDER BY total_cents DESC, name, purpose LIMIT ? OFFSET ?`,
    [...params, window.pageSize, window.offset]
  );

  const items = rows.map(row => ({
    name: readString(row, 'name'),
    purpose: readString(row, 'purpose'),
    total: centsToAmount(readNumber(row, 'total_cents')),
    count: readNumber(row, 'count'),
    lastExpenditure: readNullableString(row, 'last_expenditure'),
  }));
  return toPage(items, total, window);
}

// ============================================
// Organizations
// ============================================

export const DEFAULT_ORGANIZATION_TYPE = 'Political Action Committee';

export interface OrganizationSummary {
  organizationName: string;
  organizationType: string;
  totalContributions: string;
  totalExpenditures: string;
  reportCount: number;
  latestReport: string | null;
}

export interface ListOrganizationsOptions extends PageOptions, YearOption {
  /** Substring match on the report's organization type. */
  organizationType?: string;
  search?: string;
}

export interface OrganizationList extends Page<OrganizationSummary> {
  totalContributions: string;
  totalExpenditures: string;
}

/** Report totals summed per organization. */
export async function listOrganizations(
  db: DbExecutor,
  options: ListOrganizationsOptions = {}
): Promise<OrganizationList> {
  const window = pageWindow(options, 25);
  const params: SqlParam[] = [like(options.organizationType ?? DEFAULT_ORGANIZATION_TYPE)];
  let where = 'WHERE organization_type LIKE ?';
  where += yearClause('end_date', options.year, params);

  const [totals] = await db.query(
    `SELECT COALESCE(SUM(total_contributions_cents), 0) AS contributions_cents,
            COALESCE(SUM(total_expenditures_cents), 0) AS expenditures_cents
     FROM disclosure_reports ${where}`,
    params
  );

  if (options.search) {
    where += ' AND organization_name LIKE ?';
    params.push(like(options.search));
  }

  const grouped = `
    SELECT organization_name, organization_type,
           SUM(total_contributions_cents) AS contributions_cents,
           SUM(total_expenditures_cents) AS expenditures_cents,
           COUNT(*) AS report_count, MAX(end_date) AS latest_report
    FROM disclosure_reports ${where}
    GROUP BY organization_name, organization_type`;

  const total = await countOf(db, `SELECT COUNT(*) AS count FROM (${grouped})`, params);
  const rows = await db.query(
    `${grouped} ORDER BY contributions_cents DESC, organization_name LIMIT ? OFFSET ?`,
    [...params, window.pageSize, window.offset]
  );

  const items = rows.map(row => ({
    organizationName: readString(row, 'organization_name'),
    organizationType: readString(row, 'organization_type'),
    totalContributions: centsToAmount(readNumber(row, 'contributions_cents')),
    totalExpenditures: centsToAmount(readNumber(row, 'expenditures_cents')),
    reportCount: readNumber(row, 'report_count'),
    latestReport: readNullableString(row, 'latest_report'),
  }));

  return {
    ...toPage(items, total, window),
    totalContributions: centsToAmount(totals ? readNumber(totals, 'contributions_cents') : 0),
    totalExpenditures: centsToAmount(totals ? readNumber(totals, 'expenditures_cents') : 0),
  };
}

export interface FlowDiagram {
  nodes: Array<{ name: string }>;
  links: Array<{ source: number; target: number; value: string }>;
}

export interface OrganizationDetail {
  organizationName: string;
  organizationType: string;
  stats: {
    totalContributions: string;
    totalExpenditures: string;
    netBalance: string;
    reportCount: number;
    earliestReport: string | null;
    latestReport: string | null;
  };
  contributionStats: AmountStats;
  expenditureStats: AmountStats;
  reports: ReportSummary[];
  topContributors: NameTotal[];
  topRecipients: NameTotal[];
  flow: FlowDiagram;
  entity: EntitySummary | null;
}

const FLOW_LIMIT = 15;

/**
 * Money in from contributors, through the organization, out to recipients.
 * A name on both sides gets a role suffix so the graph stays acyclic.
 */
export function buildFlowDiagram(organizationName: string, inflows: NameTotal[], outflows: NameTotal[]): FlowDiagram {
  const contributorNames = new Set(inflows.map(item => item.name));
  const both = new Set(outflows.map(item => item.name).filter(name => contributorNames.has(name)));

  const nodes: Array<{ name: string }> = [];
  const index = new Map<string, number>();
  const nodeFor = (name: string): number => {
    const existing = index.get(name);
    if (existing !== undefined) return existing;
    index.set(name, nodes.length);
    nodes.push({ name });
    return nodes.length - 1;
  };

  const sourceName = (name: string) => (both.has(name) ? `${name} (Contributor)` : name);
  const targetName = (name: string) => (both.has(name) ? `${name} (Recipient)` : name);

  for (const item of inflows) nodeFor(sourceName(item.name));
  const center = nodes.length;
  nodes.push({ name: organizationName });
  for (const item of outflows) nodeFor(targetName(item.name));

  const links = [
    ...inflows.map(item => ({ source: nodeFor(sourceName(item.name)), target: center, value: item.total })),
    ...outflows.map(item => ({ source: center, target: nodeFor(targetName(item.name)), value: item.total })),
  ];
  return { nodes, links };
}

export async function getOrganizationDetail(
  db: DbExecutor,
  organizationName: string,
  options: YearOption = {}
): Promise<OrganizationDetail | null> {
  const first = await db.query(
    'SELECT organization_type FROM disclosure_reports WHERE organization_name = ? ORDER BY end_date DESC LIMIT 1',
    [organizationName]
  );
  if (first.length === 0) return null;

  const params: SqlParam[] = [organizationName];
  const year = yearClause('r.end_date', options.year, params);
  const scope = `r.organization_name = ?${year}`;

  const [stats] = await db.query(
    `SELECT COALESCE(SUM(total_contributions_cents), 0) AS contributions_cents,
            COALESCE(SUM(total_expenditures_cents), 0) AS expenditures_cents,
            COUNT(*) AS report_count, MIN(begin_date) AS earliest_report, MAX(end_date) AS latest_report
     FROM disclosure_reports r WHERE ${scope}`,
    params
  );
  const [contributionStats] = await db.query(
    `SELECT COALESCE(SUM(c.amount_cents), 0) AS total_cents, COUNT(c.id) AS count
     FROM contributions c JOIN disclosure_reports r ON r.id = c.report_id WHERE ${scope}`,
    params
  );
  const [expenditureStats] = await db.query(
    `SELECT COALESCE(SUM(e.amount_cents), 0) AS total_cents, COUNT(e.id) AS count
     FROM expenditures e JOIN disclosure_reports r ON r.id = e.report_id WHERE ${scope}`,
    params
  );
  const reports = await db.query(
    `SELECT ${REPORT_SUMMARY_COLUMNS} FROM disclosure_reports r WHERE ${scope}
     ORDER BY end_date DESC, id DESC LIMIT ${TOP_LIMIT}`,
    params
  );
  const topContributors = await db.query(
    `SELECT c.contributor_name AS name, SUM(c.amount_cents) AS total_cents, COUNT(c.id) AS count
     FROM contributions c JOIN disclosure_reports r ON r.id = c.report_id WHERE ${scope}
     GROUP BY c.contributor_name ORDER BY total_cents DESC, name LIMIT ${FLOW_LIMIT}`,
    params
  );
  const topRecipients = await db.query(
    `SELECT e.recipient_name AS name, SUM(e.amount_cents) AS total_cents, COUNT(e.id) AS count
     FROM expenditures e JOIN disclosure_reports r ON r.id = e.report_id WHERE ${scope}
     GROUP BY e.recipient_name ORDER BY total_cents DESC, name LIMIT ${FLOW_LIMIT}`,
    params
  );

  const contributionsCents = stats ? readNumber(stats, 'contributions_cents') : 0;
  const expendituresCents = stats ? readNumber(stats, 'expenditures_cents') : 0;
  const inflows = topContributors.map(toNameTotal);
  const outflows = topRecipients.map(toNameTotal);

  return {
    organizationName,
    organizationType: readString(first[0], 'organization_type'),
    stats: {
      totalContributions: centsToAmount(contributionsCents),
      totalExpenditures: centsToAmount(expendituresCents),
      netBalance: centsToAmount(contributionsCents - expendituresCents),
      reportCount: stats ? readNumber(stats, 'report_count') : 0,
      earliestReport: stats ? readNullableString(stats, 'earliest_report') : null,
      latestReport: stats ? readNullableString(stats, 'latest_report') : null,
    },
    contributionStats: toStats(contributionStats),
    expenditureStats: toStats(expenditureStats),
    reports: reports.map(toReportSummary),
    topContributors: inflows.slice(0, TOP_LIMIT),
    topRecipients: outflows.slice(0, TOP_LIMIT),
    flow: buildFlowDiagram(
      organizationName,
      inflows.filter(item => item.name !== organizationName),
      outflows.filter(item => item.name !== organizationName)
    ),
    entity: await findEntityByName(db, organizationName),
  };
}

// ============================================
// Global views
// ============================================

/** Monthly totals across every report, keyed by the first day of the month. */
export async function getGlobalTimeline(db: DbExecutor): Promise<Timeline> {
  const contributions = await db.query(
    `SELECT substr(date_received, 1, 7) || '-01' AS day, SUM(amount_cents) AS total_cents, COUNT(*) AS count
     FROM contributions WHERE date_received IS NOT NULL
     GROUP BY day ORDER BY day`
  );
  const expenditures = await db.query(
    `SELECT substr(date, 1, 7) || '-01' AS day, SUM(amount_cents) AS total_cents, COUNT(*) AS count
     FROM expenditures WHERE date IS NOT NULL
     GROUP BY day ORDER BY day`
  );
  return {
    contributions: contributions.map(toTimelinePoint),
    expenditures: expenditures.map(toTimelinePoint),
  };
}

export interface StateTotal {
  state: string;
  total: string;
  contributionCount: number;
  contributorCount: number;
}

export interface OutOfStateSummary {
  homeState: string;
  total: string;
  count: number;
  states: StateTotal[];
  topContributors: Array<{ name: string; address: string; state: string; total: string; count: number }>;
}

/**
 * Contributions whose address ends in another state's code. The state is
 * read from free text with a heuristic, so the totals are estimates.
 */
export async function getOutOfStateSummary(
  db: DbExecutor,
  options: YearOption & { homeState?: string } = {}
): Promise<OutOfStateSummary> {
  const homeState = (options.homeState ?? 'UT').toUpperCase();
  const params: SqlParam[] = [];
  const year = yearClause('r.end_date', options.year, params);
  const rows = await db.query(
    `SELECT c.contributor_name, c.address, c.amount_cents
     FROM contributions c JOIN disclosure_reports r ON r.id = c.report_id
     WHERE c.address != ''${year}`,
    params
  );

  const byState = new Map<string, { cents: number; count: number; contributors: Set<string> }>();
  const byContributor = new Map<string, { name: string; address: string; state: string; cents: number; count: number }>();
  let totalCents = 0;
  let totalCount = 0;

  for (const row of rows) {
    const address = readString(row, 'address');
    const state = classifyAddressState(address);
    if (state === null || state === homeState) continue;

    const name = readString(row, 'contributor_name');
    const cents = readNumber(row, 'amount_cents');
    totalCents += cents;
    totalCount += 1;

    const stateEntry = byState.get(state) ?? { cents: 0, count: 0, contributors: new Set<string>() };
    stateEntry.cents += cents;
    stateEntry.count += 1;
    stateEntry.contributors.add(name);
    byState.set(state, stateEntry);

    const key = `${name}\u0000${address}`;
    const contributorEntry = byContributor.get(key) ?? { name, address, state, cents: 0, count: 0 };
    contributorEntry.cents += cents;
    contributorEntry.count += 1;
    byContributor.set(key, contributorEntry);
  }

  const states = [...byState.entries()]
    .sort((a, b) => b[1].cents - a[1].cents || a[0].localeCompare(b[0]))
    .map(([state, entry]) => ({
      state,
      total: centsToAmount(entry.cents),
      contributionCount: entry.count,
      contributorCount: entry.contributors.size,
    }));

  const topContributors = [...byContributor.values()]
    .sort((a, b) => b.cents - a.cents || a.name.localeCompare(b.name))
    .slice(0, 20)
    .map(entry => ({
      name: entry.name,
      address: entry.address,
      state: entry.state,
      total: centsToAmount(entry.cents),
      count: entry.count,
    }));

  return { homeState, total: centsToAmount(totalCents), count: totalCount, states, topContributors };
}

export interface StateContribution {
  contributorName: string;
  address: string;
  amount: string;
  date: string | null;
  organizationName: string;
  reportId: string;
}

export interface StateContributions {
  state: string;
  total: string;
  count: number;
  /** Newest first, at most 100. */
  contributions: StateContribution[];
}

/** Every contribution whose address ends in the given state's code. */
export async function getStateContributions(
  db: DbExecutor,
  stateCode: string,
  options: YearOption = {}
): Promise<StateContributions> {
  const state = stateCode.toUpperCase();
  const params: SqlParam[] = [like(state)];
  const year = yearClause('r.end_date', options.year, params);
  const rows = await db.query(
    `SELECT c.contributor_name, c.address, c.amount_cents, c.date_received,
            r.organization_name, r.report_id AS public_report_id
     FROM contributions c JOIN disclosure_reports r ON r.id = c.report_id
     WHERE c.address LIKE ?${year}
     ORDER BY c.date_received DESC, c.amount_cents DESC, c.id`,
    params
  );

  const matching = rows.filter(row => classifyAddressState(readString(row, 'address')) === state);
  const totalCents = matching.reduce((sum, row) => sum + readNumber(row, 'amount_cents'), 0);

  return {
    state,
    total: centsToAmount(totalCents),
    count: matching.length,
    contributions: matching.slice(0, DETAIL_ROW_LIMIT).map(row => ({
      contributorName: readString(row, 'contributor_name'),
      address: readString(row, 'address'),
      amount: centsToAmount(readNumber(row, 'amount_cents')),
      date: readNullableString(row, 'date_received'),
      organizationName: readString(row, 'organization_name'),
      reportId: readString(row, 'public_report_id'),
    })),
  };
}

/** Cents by where the money came from. Weighted tallies may hold fractions. */
export interface StateTally {
  inState: number;
  outOfState: number;
  unknown: number;
}

export interface StateShare {
  homeState: string;
  inStatePercent: number;
  outOfStatePercent: number;
  unknownPercent: number;
  inStateAmount: string;
  outOfStateAmount: string;
  unknownAmount: string;
  totalAmount: string;
}

export interface StateShareOptions extends YearOption {
  homeState?: string;
}

export function tallyByState(rows: Row[], homeState: string): StateTally {
  const tally: StateTally = { inState: 0, outOfState: 0, unknown: 0 };
  for (const row of rows) {
    const cents = readNumber(row, 'amount_cents');
    const state = classifyAddressState(readString(row, 'address'));
    if (state === null) tally.unknown += cents;
    else if (state === homeState) tally.inState += cents;
    else tally.outOfState += cents;
  }
  return tally;
}

/** Percentages to one decimal place; all zero when nothing was given. */
export function toStateShare(tally: StateTally, homeState: string): StateShare {
  const total = tally.inState + tally.outOfState + tally.unknown;
  const percent = (part: number) => (total > 0 ? Math.round((part / total) * 1000) / 10 : 0);
  return {
    homeState,
    inStatePercent: percent(tally.inState),
    outOfStatePercent: percent(tally.outOfState),
    unknownPercent: percent(tally.unknown),
    inStateAmount: centsToAmount(Math.round(tally.inState)),
    outOfStateAmount: centsToAmount(Math.round(tally.outOfState)),
    unknownAmount: centsToAmount(Math.round(tally.unknown)),
    totalAmount: centsToAmount(Math.round(total)),
  };
}

/** Contributions to one organization split by in-state, out-of-state and unknown. */
export async function getInStateShare(
  db: DbExecutor,
  organizationName: string,
  options: StateShareOptions = {}
): Promise<StateShare | null> {
  const homeState = (options.homeState ?? 'UT').toUpperCase();
  const params: SqlParam[] = [organizationName];
  const scope = `r.organization_name = ?${yearClause('r.end_date', options.year, params)}`;
  const reports = await countOf(db, `SELECT COUNT(*) AS count FROM disclosure_reports r WHERE ${scope}`, params);
  if (reports === 0) return null;

  const rows = await db.query(
    `SELECT c.address, c.amount_cents
     FROM contributions c JOIN disclosure_reports r ON r.id = c.report_id
     WHERE ${scope}`,
    params
  );
  return toStateShare(tallyByState(rows, homeState), homeState);
}

// ============================================
// Search and entities
// ============================================

export interface EntitySummary {
  entityId: string;
  name: string;
  alsoKnownAs: string;
  entityType: string;
  status: string;
}

export interface SearchResults {
  query: string;
  reports: ReportSummary[];
  entities: EntitySummary[];
  contributors: Array<{ name: string; address: string; total: string; count: number }>;
  expenditures: Array<{ name: string; purpose: string; total: string; count: number }>;
  totalResults: number;
}

const SEARCH_LIMIT = 20;

function toEntitySummary(row: Row): EntitySummary {
  return {
    entityId: readString(row, 'entity_id'),
    name: readString(row, 'name'),
    alsoKnownAs: readString(row, 'also_known_as'),
    entityType: readString(row, 'entity_type'),
    status: readString(row, 'status'),
  };
}

async function findEntityByName(db: DbExecutor, name: string): Promise<EntitySummary | null> {
  const rows = await db.query(
    'SELECT * FROM entity_registrations WHERE name = ? COLLATE NOCASE ORDER BY id LIMIT 1',
    [name]
  );
  return rows.length > 0 ? toEntitySummary(rows[0]) : null;
}

/** Substring search over reports, entities, contributors and recipients. */
export async function search(db: DbExecutor, text: string): Promise<SearchResults> {
  const query = text.trim();
  if (!query) {
    return { query: '', reports: [], entities: [], contributors: [], expenditures: [], totalResults: 0 };
  }
  const pattern = like(query);

  const reports = await db.query(
    `SELECT ${REPORT_SUMMARY_COLUMNS} FROM disclosure_reports
     WHERE report_id LIKE ? OR title LIKE ? OR organization_name LIKE ?
     ORDER BY id DESC LIMIT ${SEARCH_LIMIT}`,
    [pattern, pattern, pattern]
  );
  const entities = await db.query(
    `SELECT * FROM entity_registrations
     WHERE entity_id LIKE ? OR name LIKE ? OR also_known_as LIKE ?
     ORDER BY name LIMIT ${SEARCH_LIMIT}`,
    [pattern, pattern, pattern]
  );
  const contributors = await db.query(
    `SELECT contributor_name AS name, address, SUM(amount_cents) AS total_cents, COUNT(*) AS count
     FROM contributions WHERE contributor_name LIKE ? OR address LIKE ?
     GROUP BY contributor_name, address ORDER BY total_cents DESC, name LIMIT ${SEARCH_LIMIT}`,
    [pattern, pattern]
  );
  const expenditures = await db.query(
    `SELECT recipient_name AS name, purpose, SUM(amount_cents) AS total_cents, COUNT(*) AS count
     FROM expenditures WHERE recipient_name LIKE ? OR purpose LIKE ?
     GROUP BY recipient_name, purpose ORDER BY total_cents DESC, name LIMIT ${SEARCH_LIMIT}`,
    [pattern, pattern]
  );

  return {
    query,
    reports: reports.map(toReportSummary),
    entities: entities.map(toEntitySummary),
    contributors: contributors.map(row => ({
      name: readString(row, 'name'),
      address: readString(row, 'address'),
      total: centsToAmount(readNumber(row, 'total_cents')),
      count: readNumber(row, 'count'),
    })),
    expenditures: expenditures.map(row => ({
      name: readString(row, 'name'),
      purpose: readString(row, 'purpose'),
      total: centsToAmount(readNumber(row, 'total_cents')),
      count: readNumber(row, 'count'),
    })),
    totalResults: reports.length + entities.length + contributors.length + expenditures.length,
  };
}

export interface OfficerRecord {
  name: string;
  title: string;
  occupation: string;
  phone: string;
  email: string;
  streetAddress: string;
  suitePoBox: string;
  city: string;
  state: string;
  zipCode: string;
  isTreasurer: boolean;
}

export interface EntityDetail extends EntitySummary {
  sourceUrl: string;
  dateCreated: string | null;
  streetAddress: string;
  suitePoBox: string;
  city: string;
  state: string;
  zipCode: string;
  rawData: Record<string, string>;
  lastScrapedAt: string;
  officers: OfficerRecord[];
  reportCount: number;
}

export async function getEntityDetail(db: DbExecutor, entityId: string): Promise<EntityDetail | null> {
  const rows = await db.query('SELECT * FROM entity_registrations WHERE entity_id = ?', [entityId]);
  if (rows.length === 0) return null;
  const entity = rows[0];

  const officers = await db.query('SELECT * FROM entity_officers WHERE entity_id = ? ORDER BY position', [
    readNumber(entity, 'id'),
  ]);
  const reportCount = await countOf(
    db,
    'SELECT COUNT(*) AS count FROM disclosure_reports WHERE organization_name = ? COLLATE NOCASE',
    [readString(entity, 'name')]
  );

  return {
    ...toEntitySummary(entity),
    sourceUrl: readString(entity, 'source_url'),
    dateCreated: readNullableString(entity, 'date_created'),
    streetAddress: readString(entity, 'street_address'),
    suitePoBox: readString(entity, 'suite_po_box'),
    city: readString(entity, 'city'),
    state: readString(entity, 'state'),
    zipCode: readString(entity, 'zip_code'),
    rawData: readJsonObject(entity, 'raw_data'),
    lastScrapedAt: readString(entity, 'last_scraped_at'),
    officers: officers.map(row => ({
      name: readString(row, 'name'),
      title: readString(row, 'title'),
      occupation: readString(row, 'occupation'),
      phone: readString(row, 'phone'),
      email: readString(row, 'email'),
      streetAddress: readString(row, 'street_address'),
      suitePoBox: readString(row, 'suite_po_box'),
      city: readString(row, 'city'),
      state: readString(row, 'state'),
      zipCode: readString(row, 'zip_code'),
      isTreasurer: readBoolean(row, 'is_treasurer'),
    })),
    reportCount,
  };
}
