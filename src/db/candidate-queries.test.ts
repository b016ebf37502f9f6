import { Decimal } from 'decimal.js';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { importDisclosureReport } from '../importer/report-importer.js';
import type { ContributionRecord, ParsedReport } from '../types/index.js';
import {
  CANDIDATE_ORGANIZATION_TYPE,
  buildCandidateFlow,
  findCommitteeName,
  getCandidateDetail,
  getCandidateInStateShare,
  listCandidates,
  summarizeOffice,
} from './candidate-queries.js';
import { createMemoryDb, type DbClient } from './database.js';
import { getInStateShare } from './queries.js';

const UTAH_ADDRESS = '100 Main St, Salt Lake City, UT 84101';
const IDAHO_ADDRESS = '12 Oak Ave, Boise, ID 83702';
const NEVADA_ADDRESS = '9 Elm St, Reno, NV 89501';

const CANDIDATE = 'Alex Rivera';
const OTHER_CANDIDATE = 'Blair Stone';
const COMMITTEE = 'Friends of Testing';
const EMPTY_COMMITTEE = 'Valley Fund';

function contribution(date: string, name: string, address: string, amount: string): ContributionRecord {
  return {
    date,
    dateRaw: date,
    contributorName: name,
    address,
    amount: new Decimal(amount),
    isInKind: false,
    isLoan: false,
    isAmendment: false,
  };
}

function report(fields: Partial<ParsedReport> & Pick<ParsedReport, 'reportId'>): ParsedReport {
  return {
    sourceUrl: `https://disclosures.example/Search/PublicSearch/Report/${fields.reportId}`,
    title: `Report ${fields.reportId}`,
    organizationName: CANDIDATE,
    organizationType: CANDIDATE_ORGANIZATION_TYPE,
    reportType: 'Year End',
    beginDate: null,
    endDate: null,
    dueDate: null,
    submitDate: null,
    balanceBeginning: new Decimal(0),
    totalContributions: new Decimal(0),
    totalExpenditures: new Decimal(0),
    balanceEnding: new Decimal(0),
    contributions: [],
    expenditures: [],
    rawMetadata: new Map(),
    warnings: [],
    ...fields,
  };
}

async function seed(db: DbClient): Promise<void> {
  const reports = [
    report({
      reportId: '5001',
      endDate: '2024-06-30',
      totalContributions: new Decimal('500.00'),
      totalExpenditures: new Decimal('80.00'),
      balanceEnding: new Decimal('420.00'),
      rawMetadata: new Map([
        ['Office', 'State Senate'],
        ['District', '12'],
        ['Party', 'Independent'],
        ['County', 'Salt Lake'],
      ]),
      contributions: [
        contribution('2024-05-01', 'Jordan Lee', UTAH_ADDRESS, '100.00'),
        contribution('2024-05-10', 'Casey Park', IDAHO_ADDRESS, '50.00'),
        contribution('2024-06-01', 'Friends of Testing PAC', '', '300.00'),
        contribution('2024-06-02', CANDIDATE, UTAH_ADDRESS, '50.00'),
      ],
      expenditures: [
        {
          date: '2024-06-10',
          dateRaw: '6/10/2024',
          recipientName: 'Print Shop',
          purpose: 'Mailers',
          location: '',
          amount: new Decimal('80.00'),
          isInKind: false,
          isLoan: false,
          isAmendment: false,
        },
      ],
    }),
    report({
      reportId: '5002',
      endDate: '2025-03-31',
      totalContributions: new Decimal('25.00'),
      balanceEnding: new Decimal('400.00'),
      rawMetadata: new Map([
        ['Office', 'State Senate'],
        ['District', '14'],
        ['Party', 'Independent'],
        ['County', 'Statewide'],
      ]),
      contributions: [contribution('2025-02-01', 'Jordan Lee', UTAH_ADDRESS, '25.00')],
    }),
    report({
      reportId: '5201',
      organizationName: OTHER_CANDIDATE,
      endDate: '2024-09-30',
      totalContributions: new Decimal('10.00'),
      balanceEnding: new Decimal('10.00'),
      contributions: [contribution('2024-09-01', EMPTY_COMMITTEE, '', '10.00')],
    }),
    report({
      reportId: '5101',
      organizationName: COMMITTEE,
      organizationType: 'Political Action Committee',
      endDate: '2024-05-31',
      totalContributions: new Decimal('80.00'),
      contributions: [
        contribution('2024-04-01', 'Sam Ortiz', UTAH_ADDRESS, '60.00'),
        contribution('2024-04-02', 'Riley Chen', NEVADA_ADDRESS, '20.00'),
      ],
    }),
    report({
      reportId: '5102',
      organizationName: EMPTY_COMMITTEE,
      organizationType: 'Political Action Committee',
      endDate: '2024-08-31',
    }),
  ];
  for (const parsed of reports) {
    await importDisclosureReport(db, parsed, { updateExisting: false });
  }
}

describe('candidate queries', () => {
  let db: DbClient;

  beforeEach(async () => {
    db = await createMemoryDb();
    await seed(db);
  });

  afterEach(async () => {
    await db.close();
  });

  describe('listCandidates', () => {
    it('sums report totals per candidate, most raised first', async () => {
      const list = await listCandidates(db);

      expect(list.stats).toEqual({ candidateCount: 2, totalRaised: '535.00', totalSpent: '80.00', reportCount: 3 });
      expect(list.items).toEqual([
        {
          name: CANDIDATE,
          totalRaised: '525.00',
          totalSpent: '80.00',
          reportCount: 2,
          firstReport: '2024-06-30',
          latestReport: '2025-03-31',
        },
        {
          name: OTHER_CANDIDATE,
          totalRaised: '10.00',
          totalSpent: '0.00',
          reportCount: 1,
          firstReport: '2024-09-30',
          latestReport: '2024-09-30',
        },
      ]);
    });

    it('keeps the overall stats when searching', async () => {
      const list = await listCandidates(db, { search: 'blair' });

      expect(list.total).toBe(1);
      expect(list.items.map(item => item.name)).toEqual([OTHER_CANDIDATE]);
      expect(list.stats.candidateCount).toBe(2);
    });

    it('filters by year', async () => {
      const list = await listCandidates(db, { year: 2025 });

      expect(list.stats).toEqual({ candidateCount: 1, totalRaised: '25.00', totalSpent: '0.00', reportCount: 1 });
      expect(list.items.map(item => [item.name, item.reportCount])).toEqual([[CANDIDATE, 1]]);
    });
  });

  describe('findCommitteeName', () => {
    it('matches a committee by exact name', async () => {
      expect(await findCommitteeName(db, EMPTY_COMMITTEE)).toBe(EMPTY_COMMITTEE);
    });

    it('matches a committee holding every significant word of the name', async () => {
      expect(await findCommitteeName(db, 'Friends of Testing PAC')).toBe(COMMITTEE);
    });

    it('returns null for a person', async () => {
      expect(await findCommitteeName(db, 'Jordan Lee')).toBeNull();
    });
  });

  describe('buildCandidateFlow', () => {
    it('draws committee contributors behind the committee', async () => {
      expect(await buildCandidateFlow(db, CANDIDATE)).toEqual({
        nodes: [
          { name: 'Sam Ortiz' },
          { name: 'Riley Chen' },
          { name: 'Jordan Lee' },
          { name: 'Casey Park' },
          { name: COMMITTEE },
          { name: CANDIDATE },
        ],
        links: [
          { source: 0, target: 4, value: '60.00' },
          { source: 1, target: 4, value: '20.00' },
          { source: 4, target: 5, value: '300.00' },
          { source: 2, target: 5, value: '125.00' },
          { source: 3, target: 5, value: '50.00' },
        ],
      });
    });

    it('draws a committee with no contributors on file as a direct contributor', async () => {
      expect(await buildCandidateFlow(db, OTHER_CANDIDATE)).toEqual({
        nodes: [{ name: EMPTY_COMMITTEE }, { name: OTHER_CANDIDATE }],
        links: [{ source: 0, target: 1, value: '10.00' }],
      });
    });
  });

  describe('getCandidateDetail', () => {
    it('returns stats, office, rankings and monthly totals', async () => {
      const detail = await getCandidateDetail(db, CANDIDATE);

      expect(detail?.stats).toEqual({
        totalRaised: '525.00',
        totalSpent: '80.00',
        contributionCount: 5,
        expenditureCount: 1,
        contributorCount: 4,
        reportCount: 2,
        cashOnHand: '400.00',
      });
      expect(detail?.campaignYears).toEqual(['2024', '2025']);
      expect(detail?.officeInfo).toEqual({
        office: 'State Senate',
        district: '14',
        allDistricts: ['14', '12'],
        party: 'Independent',
      });
      expect(detail?.reports.map(item => item.reportId)).toEqual(['5002', '5001']);
      expect(detail?.topContributors.map(item => [item.name, item.total, item.count])).toEqual([
        ['Friends of Testing PAC', '300.00', 1],
        ['Jordan Lee', '125.00', 2],
        [CANDIDATE, '50.00', 1],
        ['Casey Park', '50.00', 1],
      ]);
      expect(detail?.topRecipients).toEqual([{ name: 'Print Shop', purpose: 'Mailers', total: '80.00', count: 1 }]);
      expect(detail?.monthlyContributions).toEqual([
        { date: '2024-05-01', amount: '150.00', count: 2 },
        { date: '2024-06-01', amount: '350.00', count: 2 },
        { date: '2025-02-01', amount: '25.00', count: 1 },
      ]);
      expect(detail?.monthlyExpenditures).toEqual([{ date: '2024-06-01', amount: '80.00', count: 1 }]);
      expect(detail?.flow.nodes).toHaveLength(6);
    });

    it('returns null for a name that never filed as a candidate', async () => {
      expect(await getCandidateDetail(db, COMMITTEE)).toBeNull();
      expect(await getCandidateDetail(db, CANDIDATE, { year: 2023 })).toBeNull();
    });
  });

  describe('in-state share', () => {
    it('splits an organization by contributor state', async () => {
      expect(await getInStateShare(db, COMMITTEE)).toEqual({
        homeState: 'UT',
        inStatePercent: 75,
        outOfStatePercent: 25,
        unknownPercent: 0,
        inStateAmount: '60.00',
        outOfStateAmount: '20.00',
        unknownAmount: '0.00',
        totalAmount: '80.00',
      });
      expect(await getInStateShare(db, 'Nobody')).toBeNull();
    });

    it('weights committee money by the committee share', async () => {
      // 100 + 50 + 25 from Utah, 50 from Idaho, and 300 from a committee that is 75% Utah
      expect(await getCandidateInStateShare(db, CANDIDATE)).toEqual({
        homeState: 'UT',
        inStatePercent: 76.2,
        outOfStatePercent: 23.8,
        unknownPercent: 0,
        inStateAmount: '400.00',
        outOfStateAmount: '125.00',
        unknownAmount: '0.00',
        totalAmount: '525.00',
      });
    });

    it('counts money from a committee with no contributions as unknown', async () => {
      expect(await getCandidateInStateShare(db, OTHER_CANDIDATE)).toMatchObject({
        inStatePercent: 0,
        outOfStatePercent: 0,
        unknownPercent: 100,
        unknownAmount: '10.00',
      });
    });

    it('returns null for an unknown candidate', async () => {
      expect(await getCandidateInStateShare(db, 'Nobody')).toBeNull();
    });
  });
});

describe('summarizeOffice', () => {
  it('takes the most frequent values and lists every office when they differ', () => {
    expect(
      summarizeOffice([
        { Office: 'House', Party: 'Green', County: 'Multi-' },
        { Office: 'Senate', Party: 'Green', County: 'Multi-' },
        { Office: 'Senate', County: 'Weber' },
      ])
    ).toEqual({
      office: 'Senate',
      allOffices: [
        { name: 'Senate', count: 2 },
        { name: 'House', count: 1 },
      ],
      party: 'Green',
    });
  });
});
