import { Decimal } from 'decimal.js';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { importLobbyistRegistration } from '../importer/entity-importer.js';
import { importLobbyistReport } from '../importer/lobbyist-report-importer.js';
import { loadFixture } from '../parser/__fixtures__/index.js';
import { parseLobbyistEntity } from '../parser/lobbyist-entity-parser.js';
import { parseLobbyistReport } from '../parser/lobbyist-report-parser.js';
import type { ParsedLobbyistReport } from '../types/index.js';
import { createMemoryDb, type DbClient } from './database.js';
import { getLobbyistDetail, getLobbyistReportDetail, listLobbyistReports, listLobbyists } from './lobbyist-queries.js';

function widgetReport(): ParsedLobbyistReport {
  const result = parseLobbyistReport(loadFixture('lobbyist-report.html'), {
    id: '77',
    sourceUrl: 'https://lobbyist.example/Search/PublicSearch/Report/77',
  });
  if (!result.ok) throw new Error(result.failure.message);
  return result.value;
}

async function seed(db: DbClient): Promise<void> {
  const widget = widgetReport();
  await importLobbyistReport(db, widget, { updateExisting: false });
  // Filed under a principal of the registered lobbyist, spelled in lower case
  await importLobbyistReport(
    db,
    {
      ...widget,
      reportId: '78',
      sourceUrl: 'https://lobbyist.example/Search/PublicSearch/Report/78',
      principalName: 'utah orchard growers',
      beginDate: '2025-01-01',
      endDate: '2025-03-31',
      totalExpenditures: new Decimal(0),
      expenditures: [],
    },
    { updateExisting: false }
  );

  const lobbyist = parseLobbyistEntity(loadFixture('lobbyist-entity.html'), {
    id: '1410867',
    sourceUrl: 'https://lobbyist.example/Registration/EntityDetails/1410867',
  });
  if (!lobbyist.ok) throw new Error(lobbyist.failure.message);
  await importLobbyistRegistration(db, lobbyist.value, { updateExisting: false });
}

describe('lobbyist queries', () => {
  let db: DbClient;

  beforeEach(async () => {
    db = await createMemoryDb();
    await seed(db);
  });

  afterEach(async () => {
    await db.close();
  });

  describe('listLobbyistReports', () => {
    it('lists the newest period first', async () => {
      const page = await listLobbyistReports(db);

      expect(page).toMatchObject({ page: 1, pageSize: 25, total: 2, totalPages: 1 });
      expect(page.items.map(item => item.reportId)).toEqual(['78', '77']);
      expect(page.items[1]).toEqual({
        reportId: '77',
        title: 'Q2 Expenditure Report For Lobbyist',
        principalName: 'Utah Widget Association',
        reportType: 'Q2',
        beginDate: '2024-04-01',
        endDate: '2024-06-30',
        totalExpenditures: '130.10',
      });
    });

    it('filters by year and by principal, title or report ID', async () => {
      expect((await listLobbyistReports(db, { year: 2024 })).items.map(item => item.reportId)).toEqual(['77']);
      expect((await listLobbyistReports(db, { search: 'widget' })).items.map(item => item.reportId)).toEqual(['77']);
      expect((await listLobbyistReports(db, { search: '78' })).items.map(item => item.reportId)).toEqual(['78']);
      expect((await listLobbyistReports(db, { search: 'nothing like this' })).total).toBe(0);
    });
  });

  describe('getLobbyistReportDetail', () => {
    it('returns the principal, the expenditures with their locations, and stats', async () => {
      const detail = await getLobbyistReportDetail(db, '77');

      expect(detail?.report).toMatchObject({
        principalName: 'Utah Widget Association',
        principalPhone: '801-555-0142',
        principalAddress: '50 State St, Salt Lake City, UT 84111',
      });
      expect(detail?.stats).toEqual({ total: '130.10', count: 2, average: '65.05' });
      expect(detail?.expenditures.map(row => [row.recipientName, row.location, row.amount, row.isAmendment])).toEqual([
        ['Sen. Example', 'Capitol Cafe', '42.10', true],
        ['Rep. Sample', 'Hotel Utah', '88.00', false],
      ]);
    });

    it('gives zero stats for a report with no rows', async () => {
      expect((await getLobbyistReportDetail(db, '78'))?.stats).toEqual({ total: '0.00', count: 0, average: '0.00' });
    });

    it('returns null for an unknown report', async () => {
      expect(await getLobbyistReportDetail(db, '404')).toBeNull();
    });
  });

  describe('lobbyists', () => {
    it('lists registrations and searches the principal', async () => {
      const all = await listLobbyists(db);
      expect(all.items).toEqual([
        {
          entityId: '1410867',
          name: 'Robin Ortega',
          organizationName: 'Ortega Strategies',
          principalName: 'Utah Orchard Growers',
          registrationDate: '2024-01-08',
        },
      ]);

      expect((await listLobbyists(db, { search: 'orchard' })).total).toBe(1);
      expect((await listLobbyists(db, { search: 'widget' })).total).toBe(0);
    });

    it('details a lobbyist with the reports filed under its principals', async () => {
      const detail = await getLobbyistDetail(db, '1410867');

      expect(detail?.principals.map(principal => principal.name)).toEqual(['Utah Orchard Growers', 'Canyon Water Users']);
      expect(detail?.principals[0]).toEqual({
        name: 'Utah Orchard Growers',
        contact: 'Dana Fields',
        phone: '801-555-0155',
        address: '5 Farm Ln, Logan, UT 84321',
      });
      expect(detail?.reports.map(report => report.reportId)).toEqual(['78']);
    });

    it('returns null for an unknown lobbyist', async () => {
      expect(await getLobbyistDetail(db, '1')).toBeNull();
    });
  });
});
