/**
 * Candidate views
 *
 * Candidates are the organizations filing as "Candidates & Office Holders".
 * Their money flow looks one step further back than an organization's:
 * a contributor that itself files as a political action committee is shown
 * with that committee's own top contributors behind it.
 */

import type { DbExecutor, Row, SqlParam } from './db-adapter.js';
import {
  DETAIL_ROW_LIMIT,
  REPORT_SUMMARY_COLUMNS,
  TOP_LIMIT,
  countOf,
  like,
  pageWindow,
  tallyByState,
  toPage,
  toReportSummary,
  toStateShare,
  toTimelinePoint,
  yearClause,
  type FlowDiagram,
  type Page,
  type PageOptions,
  type ReportSummary,
  type StateShare,
  type StateShareOptions,
  type StateTally,
  type TimelinePoint,
  type YearOption,
} from './queries.js';
import { centsToAmount, readJsonObject, readNullableString, readNumber, readString } from './rows.js';

export const CANDIDATE_ORGANIZATION_TYPE = 'Candidates & Office Holders';
const PAC_TYPE = like('Political Action Committee');

const DIRECT_FLOW_LIMIT = 10;
const UPSTREAM_FLOW_LIMIT = 5;
const RANKING_LIMIT = 20;

// ============================================
// List
// ============================================

export interface CandidateSummary {
  name: string;
  totalRaised: string;
  totalSpent: string;
  reportCount: number;
  firstReport: string | null;
  latestReport: string | null;
}

export interface CandidateList extends Page<CandidateSummary> {
  stats: {
    candidateCount: number;
    totalRaised: string;
    totalSpent: string;
    reportCount: number;
  };
}

export interface ListCandidatesOptions extends PageOptions, YearOption {
  search?: string;
}

/** Report totals summed per candidate, most raised first. */
export async function listCandidates(db: DbExecutor, options: ListCandidatesOptions = {}): Promise<CandidateList> {
  const window = pageWindow(options, 50);
  const params: SqlParam[] = [CANDIDATE_ORGANIZATION_TYPE];
  let where = `WHERE organization_type = ?${yearClause('end_date', options.year, params)}`;

  const [stats] = await db.query(
    `SELECT COUNT(DISTINCT organization_name) AS candidate_count,
            COALESCE(SUM(total_contributions_cents), 0) AS raised_cents,
            COALESCE(SUM(total_expenditures_cents), 0) AS spent_cents,
            COUNT(*) AS report_count
     FROM disclosure_reports ${where}`,
    params
  );

  if (options.search) {
    where += ' AND organization_name LIKE ?';
    params.push(like(options.search));
  }

  const grouped = `
    SELECT organization_name,
           SUM(total_contributions_cents) AS raised_cents,
           SUM(total_expenditures_cents) AS spent_cents,
           COUNT(*) AS report_count, MIN(end_date) AS first_report, MAX(end_date) AS latest_report
    FROM disclosure_reports ${where}
    GROUP BY organization_name`;

  const total = await countOf(db, `SELECT COUNT(*) AS count FROM (${grouped})`, params);
  const rows = await db.query(
    `${grouped} ORDER BY raised_cents DESC, organization_name LIMIT ? OFFSET ?`,
    [...params, window.pageSize, window.offset]
  );

  const items = rows.map(row => ({
    name: readString(row, 'organization_name'),
    totalRaised: centsToAmount(readNumber(row, 'raised_cents')),
    totalSpent: centsToAmount(readNumber(row, 'spent_cents')),
    reportCount: readNumber(row, 'report_count'),
    firstReport: readNullableString(row, 'first_report'),
    latestReport: readNullableString(row, 'latest_report'),
  }));

  return {
    ...toPage(items, total, window),
    stats: {
      candidateCount: stats ? readNumber(stats, 'candidate_count') : 0,
      totalRaised: centsToAmount(stats ? readNumber(stats, 'raised_cents') : 0),
      totalSpent: centsToAmount(stats ? readNumber(stats, 'spent_cents') : 0),
      reportCount: stats ? readNumber(stats, 'report_count') : 0,
    },
  };
}

// ============================================
// Committee matching
// ============================================

/**
 * The committee a contributor name refers to: an exact name match among
 * reports filed as a political action committee, or else the first committee
 * whose name holds every significant word of the contributor's name.
 */
export async function findCommitteeName(db: DbExecutor, name: string, year?: number): Promise<string | null> {
  const exactParams: SqlParam[] = [name, PAC_TYPE];
  const exact = await db.query(
    `SELECT organization_name FROM disclosure_reports
     WHERE organization_name = ? AND organization_type LIKE ?${yearClause('end_date', year, exactParams)}
     ORDER BY id LIMIT 1`,
    exactParams
  );
  if (exact.length > 0) return readString(exact[0], 'organization_name');

  const words = name
    .replace(/ PAC| Committee| Fund/g, '')
    .trim()
    .split(/\s+/)
    .filter(word => word.length > 2);
  if (words.length === 0) return null;

  const params: SqlParam[] = [PAC_TYPE, ...words.map(like)];
  const wordClauses = words.map(() => ' AND organization_name LIKE ?').join('');
  const fuzzy = await db.query(
    `SELECT organization_name FROM disclosure_reports
     WHERE organization_type LIKE ?${wordClauses}${yearClause('end_date', year, params)}
     ORDER BY id LIMIT 1`,
    params
  );
  return fuzzy.length > 0 ? readString(fuzzy[0], 'organization_name') : null;
}

// ============================================
// Flow
// ============================================

interface CentsTotal {
  name: string;
  cents: number;
}

function toCentsTotal(row: Row): CentsTotal {
  return { name: readString(row, 'name'), cents: readNumber(row, 'total_cents') };
}

async function topContributorsTo(
  db: DbExecutor,
  organizationName: string,
  exclude: string[],
  limit: number,
  year?: number
): Promise<CentsTotal[]> {
  const params: SqlParam[] = [organizationName, ...exclude];
  const excluded = exclude.map(() => ' AND c.contributor_name != ?').join('');
  const rows = await db.query(
    `SELECT c.contributor_name AS name, SUM(c.amount_cents) AS total_cents
     FROM contributions c JOIN disclosure_reports r ON r.id = c.report_id
     WHERE r.organization_name = ?${excluded}${yearClause('r.end_date', year, params)}
     GROUP BY c.contributor_name ORDER BY total_cents DESC, name LIMIT ${limit}`,
    params
  );
  return rows.map(toCentsTotal);
}

/**
 * Contributors → committee → candidate, and contributors → candidate.
 * A committee whose own contributors are unknown is drawn as a direct
 * contributor. Two contributor names resolving to one committee add up.
 */
export async function buildCandidateFlow(db: DbExecutor, candidateName: string, year?: number): Promise<FlowDiagram> {
  const direct = await topContributorsTo(db, candidateName, [candidateName], DIRECT_FLOW_LIMIT, year);

  const committees = new Map<string, { upstream: CentsTotal[]; toCandidateCents: number }>();
  const directOnly: CentsTotal[] = [];

  for (const contributor of direct) {
    const committeeName = await findCommitteeName(db, contributor.name, year);
    if (committeeName === null) {
      directOnly.push(contributor);
      continue;
    }

    const known = committees.get(committeeName);
    if (known) {
      known.toCandidateCents += contributor.cents;
      continue;
    }

    const exclude = [...new Set([contributor.name, candidateName, committeeName])];
    const upstream = await topContributorsTo(db, committeeName, exclude, UPSTREAM_FLOW_LIMIT, year);
    if (upstream.length === 0) {
      directOnly.push(contributor);
    } else {
      committees.set(committeeName, { upstream, toCandidateCents: contributor.cents });
    }
  }

  const nodes: Array<{ name: string }> = [];
  const index = new Map<string, number>();
  const nodeFor = (name: string): number => {
    const existing = index.get(name);
    if (existing !== undefined) return existing;
    index.set(name, nodes.length);
    nodes.push({ name });
    return nodes.length - 1;
  };

  for (const committee of committees.values()) {
    for (const item of committee.upstream) nodeFor(item.name);
  }
  for (const item of directOnly) nodeFor(item.name);
  for (const committeeName of committees.keys()) nodeFor(committeeName);
  const candidate = nodeFor(candidateName);

  const links: FlowDiagram['links'] = [];
  for (const [committeeName, committee] of committees) {
    for (const item of committee.upstream) {
      links.push({ source: nodeFor(item.name), target: nodeFor(committeeName), value: centsToAmount(item.cents) });
    }
  }
  for (const [committeeName, committee] of committees) {
    links.push({ source: nodeFor(committeeName), target: candidate, value: centsToAmount(committee.toCandidateCents) });
  }
  for (const item of directOnly) {
    links.push({ source: nodeFor(item.name), target: candidate, value: centsToAmount(item.cents) });
  }

  return { nodes, links };
}

// ============================================
// Detail
// ============================================

export interface OfficeInfo {
  office?: string;
  /** Present when the reports name more than one office. */
  allOffices?: Array<{ name: string; count: number }>;
  district?: string;
  allDistricts?: string[];
  party?: string;
  county?: string;
}

export interface CandidateDetail {
  name: string;
  stats: {
    totalRaised: string;
    totalSpent: string;
    contributionCount: number;
    expenditureCount: number;
    contributorCount: number;
    reportCount: number;
    /** Ending balance of the latest report. */
    cashOnHand: string;
  };
  campaignYears: string[];
  officeInfo: OfficeInfo;
  reports: ReportSummary[];
  topContributors: Array<{ name: string; address: string; total: string; count: number }>;
  topRecipients: Array<{ name: string; purpose: string; total: string; count: number }>;
  monthlyContributions: TimelinePoint[];
  monthlyExpenditures: TimelinePoint[];
  flow: FlowDiagram;
}

/** Values by how often they occur; ties keep first-seen order. */
function byFrequency(values: string[]): Array<{ name: string; count: number }> {
  const counts = new Map<string, number>();
  for (const value of values) counts.set(value, (counts.get(value) ?? 0) + 1);
  return [...counts.entries()]
    .map(([name, count]) => ({ name, count }))
    .sort((a, b) => b.count - a.count);
}

const NON_COUNTIES = new Set(['Multi-', 'Statewide', '']);

export function summarizeOffice(reportInfos: Array<Record<string, string>>): OfficeInfo {
  const values = (key: string) => reportInfos.flatMap(info => (key in info ? [info[key]] : []));
  const info: OfficeInfo = {};

  const offices = byFrequency(values('Office'));
  if (offices.length > 0) {
    info.office = offices[0].name;
    if (offices.length > 1) info.allOffices = offices;
  }

  const districts = byFrequency(values('District'));
  if (districts.length > 0) {
    info.district = districts[0].name;
    if (districts.length > 1) info.allDistricts = districts.map(district => district.name);
  }

  const parties = byFrequency(values('Party'));
  if (parties.length > 0) info.party = parties[0].name;

  const counties = byFrequency(values('County'));
  if (counties.length > 0 && !NON_COUNTIES.has(counties[0].name)) info.county = counties[0].name;

  return info;
}

/** Null unless the name has filed as a candidate (in that year, when given). */
export async function getCandidateDetail(
  db: DbExecutor,
  candidateName: string,
  options: YearOption = {}
): Promise<CandidateDetail | null> {
  const params: SqlParam[] = [CANDIDATE_ORGANIZATION_TYPE, candidateName];
  const scope = `r.organization_type = ? AND r.organization_name = ?${yearClause('r.end_date', options.year, params)}`;

  const reports = await db.query(
    `SELECT ${REPORT_SUMMARY_COLUMNS}, report_info FROM disclosure_reports r WHERE ${scope}
     ORDER BY end_date DESC, id DESC`,
    params
  );
  if (reports.length === 0) return null;

  const [contributionStats] = await db.query(
    `SELECT COALESCE(SUM(c.amount_cents), 0) AS total_cents, COUNT(c.id) AS count,
            COUNT(DISTINCT c.contributor_name) AS contributor_count
     FROM contributions c JOIN disclosure_reports r ON r.id = c.report_id WHERE ${scope}`,
    params
  );
  const [expenditureStats] = await db.query(
    `SELECT COALESCE(SUM(e.amount_cents), 0) AS total_cents, COUNT(e.id) AS count
     FROM expenditures e JOIN disclosure_reports r ON r.id = e.report_id WHERE ${scope}`,
    params
  );
  const topContributors = await db.query(
    `SELECT c.contributor_name AS name, c.address, SUM(c.amount_cents) AS total_cents, COUNT(c.id) AS count
     FROM contributions c JOIN disclosure_reports r ON r.id = c.report_id WHERE ${scope}
     GROUP BY c.contributor_name, c.address ORDER BY total_cents DESC, name LIMIT ${RANKING_LIMIT}`,
    params
  );
  const topRecipients = await db.query(
    `SELECT e.recipient_name AS name, e.purpose, SUM(e.amount_cents) AS total_cents, COUNT(e.id) AS count
     FROM expenditures e JOIN disclosure_reports r ON r.id = e.report_id WHERE ${scope}
     GROUP BY e.recipient_name, e.purpose ORDER BY total_cents DESC, name LIMIT ${RANKING_LIMIT}`,
    params
  );
  const monthlyContributions = await db.query(
    `SELECT substr(c.date_received, 1, 7) || '-01' AS day, SUM(c.amount_cents) AS total_cents, COUNT(c.id) AS count
     FROM contributions c JOIN disclosure_reports r ON r.id = c.report_id
     WHERE ${scope} AND c.date_received IS NOT NULL
     GROUP BY day ORDER BY day`,
    params
  );
  const monthlyExpenditures = await db.query(
    `SELECT substr(e.date, 1, 7) || '-01' AS day, SUM(e.amount_cents) AS total_cents, COUNT(e.id) AS count
     FROM expenditures e JOIN disclosure_reports r ON r.id = e.report_id
     WHERE ${scope} AND e.date IS NOT NULL
     GROUP BY day ORDER BY day`,
    params
  );

  const campaignYears = [
    ...new Set(
      reports.flatMap(row => {
        const endDate = readNullableString(row, 'end_date');
        return endDate ? [endDate.slice(0, 4)] : [];
      })
    ),
  ].sort();

  return {
    name: candidateName,
    stats: {
      totalRaised: centsToAmount(contributionStats ? readNumber(contributionStats, 'total_cents') : 0),
      totalSpent: centsToAmount(expenditureStats ? readNumber(expenditureStats, 'total_cents') : 0),
      contributionCount: contributionStats ? readNumber(contributionStats, 'count') : 0,
      expenditureCount: expenditureStats ? readNumber(expenditureStats, 'count') : 0,
      contributorCount: contributionStats ? readNumber(contributionStats, 'contributor_count') : 0,
      reportCount: reports.length,
      cashOnHand: centsToAmount(readNumber(reports[0], 'balance_ending_cents')),
    },
    campaignYears,
    officeInfo: summarizeOffice(reports.map(row => readJsonObject(row, 'report_info'))),
    reports: reports.slice(0, TOP_LIMIT).map(toReportSummary),
    topContributors: topContributors.map(row => ({
      name: readString(row, 'name'),
      address: readString(row, 'address'),
      total: centsToAmount(readNumber(row, 'total_cents')),
      count: readNumber(row, 'count'),
    })),
    topRecipients: topRecipients.map(row => ({
      name: readString(row, 'name'),
      purpose: readString(row, 'purpose'),
      total: centsToAmount(readNumber(row, 'total_cents')),
      count: readNumber(row, 'count'),
    })),
    monthlyContributions: monthlyContributions.slice(0, DETAIL_ROW_LIMIT).map(toTimelinePoint),
    monthlyExpenditures: monthlyExpenditures.slice(0, DETAIL_ROW_LIMIT).map(toTimelinePoint),
    flow: await buildCandidateFlow(db, candidateName, options.year),
  };
}

// ============================================
// In-state share
// ============================================

async function contributionsTo(db: DbExecutor, scope: string, params: SqlParam[]): Promise<Row[]> {
  return db.query(
    `SELECT c.contributor_name, c.address, c.amount_cents
     FROM contributions c JOIN disclosure_reports r ON r.id = c.report_id WHERE ${scope}`,
    params
  );
}

/**
 * In-state share of a candidate's money. A contribution from a committee is
 * split by that committee's own in-state share; a committee with no
 * contributions on file counts as unknown.
 */
export async function getCandidateInStateShare(
  db: DbExecutor,
  candidateName: string,
  options: StateShareOptions = {}
): Promise<StateShare | null> {
  const homeState = (options.homeState ?? 'UT').toUpperCase();
  const params: SqlParam[] = [CANDIDATE_ORGANIZATION_TYPE, candidateName];
  const scope = `r.organization_type = ? AND r.organization_name = ?${yearClause('r.end_date', options.year, params)}`;

  const reports = await countOf(db, `SELECT COUNT(*) AS count FROM disclosure_reports r WHERE ${scope}`, params);
  if (reports === 0) return null;

  const committeeTallies = new Map<string, StateTally | null>();
  const committeeTally = async (contributorName: string): Promise<StateTally | null> => {
    if (committeeTallies.has(contributorName)) return committeeTallies.get(contributorName) ?? null;
    const committeeName = await findCommitteeName(db, contributorName, options.year);
    let tally: StateTally | null = null;
    if (committeeName !== null) {
      const committeeParams: SqlParam[] = [committeeName];
      const committeeScope = `r.organization_name = ?${yearClause('r.end_date', options.year, committeeParams)}`;
      tally = tallyByState(await contributionsTo(db, committeeScope, committeeParams), homeState);
    }
    committeeTallies.set(contributorName, tally);
    return tally;
  };

  const total: StateTally = { inState: 0, outOfState: 0, unknown: 0 };
  for (const row of await contributionsTo(db, scope, params)) {
    const cents = readNumber(row, 'amount_cents');
    const committee = await committeeTally(readString(row, 'contributor_name'));

    if (committee === null) {
      const direct = tallyByState([row], homeState);
      total.inState += direct.inState;
      total.outOfState += direct.outOfState;
      total.unknown += direct.unknown;
      continue;
    }

    const committeeCents = committee.inState + committee.outOfState + committee.unknown;
    if (committeeCents > 0) {
      total.inState += cents * (committee.inState / committeeCents);
      total.outOfState += cents * (committee.outOfState / committeeCents);
      total.unknown += cents * (committee.unknown / committeeCents);
    } else {
      total.unknown += cents;
    }
  }

  return toStateShare(total, homeState);
}
