import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createMemoryDb, type DbClient, type DbExecutor } from '../db/database.js';
import { readNumber, readString } from '../db/rows.js';
import { PersistenceError } from '../errors.js';
import { loadFixture } from '../parser/__fixtures__/index.js';
import { parseDisclosureReport } from '../parser/report-parser.js';
import type { ParsedReport } from '../types/index.js';
import { importDisclosureReport } from './report-importer.js';

const context = { id: '1001', sourceUrl: 'https://disclosures.example/Search/PublicSearch/Report/1001' };

function parseFixture(name: string): ParsedReport {
  const result = parseDisclosureReport(loadFixture(name), context);
  if (!result.ok) throw new Error(result.failure.message);
  return result.value;
}

/** Wraps a client so the Nth statement matching `pattern` inside a transaction throws. */
function failingOn(db: DbClient, pattern: string, failAt: number): DbClient {
  let seen = 0;
  const wrap = (tx: DbExecutor): DbExecutor => ({
    query: (sql, params) => tx.query(sql, params),
    execute: async (sql, params) => {
      if (sql.includes(pattern)) {
        seen += 1;
        if (seen === failAt) throw new Error('simulated write failure');
      }
      return tx.execute(sql, params);
    },
  });

  return {
    kind: db.kind,
    query: (sql, params) => db.query(sql, params),
    execute: (sql, params) => db.execute(sql, params),
    executeRaw: sql => db.executeRaw(sql),
    transaction<T>(work: (tx: DbExecutor) => Promise<T>): Promise<T> {
      return db.transaction(tx => work(wrap(tx)));
    },
    close: () => db.close(),
  };
}

async function reportRow(db: DbClient) {
  const rows = await db.query('SELECT * FROM disclosure_reports WHERE report_id = ?', ['1001']);
  return rows[0];
}

async function childRows(db: DbClient) {
  const contributions = await db.query(
    `SELECT position, date_received, date_received_raw, contributor_name, address,
            is_in_kind, is_loan, is_amendment, amount_cents
     FROM contributions ORDER BY position`
  );
  const expenditures = await db.query(
    `SELECT position, date, date_raw, recipient_name, purpose,
            is_in_kind, is_loan, is_amendment, amount_cents
     FROM expenditures ORDER BY position`
  );
  return { contributions, expenditures };
}

describe('importDisclosureReport', () => {
  let db: DbClient;

  beforeEach(async () => {
    db = await createMemoryDb();
  });

  afterEach(async () => {
    await db.close();
  });

  it('creates the report with its line items', async () => {
    const result = await importDisclosureReport(db, parseFixture('report-basic.html'), { updateExisting: false });

    expect(result.status).toBe('created');
    if (result.status === 'skipped') return;
    expect(result.contributionsInserted).toBe(3);
    expect(result.expendituresInserted).toBe(2);
    expect(result.contributionsTotal.toFixed(2)).toBe('150.00');
    expect(result.expendituresTotal.toFixed(2)).toBe('75.00');

    const row = await reportRow(db);
    expect(readString(row, 'organization_name')).toBe('Friends of Testing');
    expect(readNumber(row, 'balance_beginning_cents')).toBe(10000);
    expect(readNumber(row, 'total_contributions_cents')).toBe(15000);
    expect(readNumber(row, 'total_expenditures_cents')).toBe(7500);
    expect(readNumber(row, 'balance_ending_cents')).toBe(17500);

    const { contributions, expenditures } = await childRows(db);
    expect(contributions.map(c => readString(c, 'contributor_name'))).toEqual(['Jane Doe', 'Acme Corp', 'Sam Smith']);
    expect(contributions.map(c => readNumber(c, 'is_in_kind'))).toEqual([0, 1, 0]);
    expect(contributions.map(c => readNumber(c, 'is_amendment'))).toEqual([0, 0, 1]);
    expect(expenditures.map(e => readNumber(e, 'amount_cents'))).toEqual([2500, 5000]);
    expect(expenditures.map(e => readNumber(e, 'is_loan'))).toEqual([0, 1]);
  });

  it('skips an existing report without writing when update is off', async () => {
    await importDisclosureReport(db, parseFixture('report-basic.html'), { updateExisting: false });
    const result = await importDisclosureReport(db, parseFixture('report-updated.html'), { updateExisting: false });

    expect(result).toEqual({ status: 'skipped', id: '1001', reason: 'already_exists' });
    expect(readNumber(await reportRow(db), 'total_contributions_cents')).toBe(15000);
    expect((await childRows(db)).contributions).toHaveLength(3);
  });

  it('yields identical rows when the same page is imported twice with update', async () => {
    const report = parseFixture('report-basic.html');
    await importDisclosureReport(db, report, { updateExisting: true });
    const firstRow = await reportRow(db);
    const firstChildren = await childRows(db);

    const again = await importDisclosureReport(db, report, { updateExisting: true });
    expect(again.status).toBe('updated');

    const secondRow = await reportRow(db);
    for (const column of ['id', 'total_contributions_cents', 'total_expenditures_cents', 'balance_ending_cents', 'report_info']) {
      expect(secondRow[column]).toEqual(firstRow[column]);
    }
    expect(await childRows(db)).toEqual(firstChildren);
  });

  it('replaces children on update so a re-import never duplicates them', async () => {
    await importDisclosureReport(db, parseFixture('report-basic.html'), { updateExisting: true });
    const result = await importDisclosureReport(db, parseFixture('report-updated.html'), { updateExisting: true });

    expect(result.status).toBe('updated');
    const row = await reportRow(db);
    expect(readString(row, 'report_type')).toBe('Year End Amended');
    expect(readNumber(row, 'total_contributions_cents')).toBe(18000);
    expect(readNumber(row, 'balance_ending_cents')).toBe(20500);

    const { contributions, expenditures } = await childRows(db);
    expect(contributions).toHaveLength(4);
    expect(expenditures).toHaveLength(2);
    expect(contributions.map(c => readNumber(c, 'position'))).toEqual([0, 1, 2, 3]);
  });

  it('leaves the previous version intact when a child insert fails', async () => {
    await importDisclosureReport(db, parseFixture('report-basic.html'), { updateExisting: false });
    const before = await childRows(db);

    const flaky = failingOn(db, 'INSERT INTO contributions', 2);
    await expect(
      importDisclosureReport(flaky, parseFixture('report-updated.html'), { updateExisting: true })
    ).rejects.toBeInstanceOf(PersistenceError);

    const row = await reportRow(db);
    expect(readString(row, 'report_type')).toBe('Year End');
    expect(readNumber(row, 'total_contributions_cents')).toBe(15000);
    expect(await childRows(db)).toEqual(before);
  });

  it('rolls back a fresh insert as a whole', async () => {
    const flaky = failingOn(db, 'INSERT INTO expenditures', 1);
    await expect(
      importDisclosureReport(flaky, parseFixture('report-basic.html'), { updateExisting: false })
    ).rejects.toThrow('Writing disclosure_reports 1001');

    expect(await db.query('SELECT id FROM disclosure_reports')).toHaveLength(0);
    expect(await db.query('SELECT id FROM contributions')).toHaveLength(0);
  });

  it('honors the refresh age for existing reports', async () => {
    const report = parseFixture('report-basic.html');
    await importDisclosureReport(db, report, { updateExisting: false, now: new Date('2025-01-01T00:00:00Z') });

    const recent = await importDisclosureReport(db, report, {
      updateExisting: true,
      refreshAfterDays: 30,
      now: new Date('2025-01-15T00:00:00Z'),
    });
    expect(recent).toEqual({ status: 'skipped', id: '1001', reason: 'recently_scraped' });

    const stale = await importDisclosureReport(db, report, {
      updateExisting: true,
      refreshAfterDays: 30,
      now: new Date('2025-03-01T00:00:00Z'),
    });
    expect(stale.status).toBe('updated');
    expect(readString(await reportRow(db), 'last_scraped_at')).toBe('2025-03-01T00:00:00.000Z');
  });

  it('stores records with no line items', async () => {
    const result = parseDisclosureReport(loadFixture('report-empty.html'), { id: '2002', sourceUrl: 'https://disclosures.example/r/2002' });
    if (!result.ok) throw new Error(result.failure.message);

    const imported = await importDisclosureReport(db, result.value, { updateExisting: false });
    expect(imported).toMatchObject({ status: 'created', contributionsInserted: 0, expendituresInserted: 0 });
    expect(await db.query('SELECT id FROM disclosure_reports WHERE report_id = ?', ['2002'])).toHaveLength(1);
  });
});
