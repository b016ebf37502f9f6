/**
 * Shared upsert plumbing: existence checks, the refresh-age gate and error
 * wrapping. Every importer follows the same shape: look up the parent by its
 * public ID, decide skip/update/create, then write parent and children in
 * one transaction.
 */

import { PersistenceError } from '../errors.js';
import type { DbClient, DbExecutor } from '../db/db-adapter.js';
import { readNumber, readString } from '../db/rows.js';
import type { ImportOptions, ImportSkipped } from '../types/index.js';

export interface ParentTable {
  table: 'disclosure_reports' | 'lobbyist_reports' | 'entity_registrations' | 'lobbyist_registrations';
  keyColumn: 'report_id' | 'entity_id';
}

export interface ExistingParent {
  id: number;
  lastScrapedAt: string;
}

const DAY_MS = 24 * 60 * 60 * 1000;

export async function findParent(db: DbExecutor, parent: ParentTable, key: string): Promise<ExistingParent | null> {
  const rows = await db.query(
    `SELECT id, last_scraped_at FROM ${parent.table} WHERE ${parent.keyColumn} = ?`,
    [key]
  );
  if (rows.length === 0) return null;
  return { id: readNumber(rows[0], 'id'), lastScrapedAt: readString(rows[0], 'last_scraped_at') };
}

/** Accepts ISO timestamps and SQLite's `YYYY-MM-DD HH:MM:SS` (UTC). */
export function parseTimestamp(value: string): number {
  const iso = value.includes('T') ? value : `${value.replace(' ', 'T')}Z`;
  return Date.parse(iso);
}

/**
 * Decide whether an existing record is left alone. Null means write it.
 */
export function skipDecision(
  key: string,
  existing: ExistingParent | null,
  options: ImportOptions
): ImportSkipped | null {
  if (!existing) return null;
  if (!options.updateExisting) {
    return { status: 'skipped', id: key, reason: 'already_exists' };
  }

  if (options.refreshAfterDays !== undefined) {
    const scrapedAt = parseTimestamp(existing.lastScrapedAt);
    const now = (options.now ?? new Date()).getTime();
    if (!Number.isNaN(scrapedAt) && now - scrapedAt < options.refreshAfterDays * DAY_MS) {
      return { status: 'skipped', id: key, reason: 'recently_scraped' };
    }
  }
  return null;
}

/**
 * Look up the parent, apply the skip rules, then run `write` in a
 * transaction. Storage failures surface as PersistenceError.
 */
export async function upsertParent<T>(
  db: DbClient,
  parent: ParentTable,
  key: string,
  options: ImportOptions,
  write: (tx: DbExecutor, existing: ExistingParent | null, timestamp: string) => Promise<T>
): Promise<T | ImportSkipped> {
  let existing: ExistingParent | null;
  try {
    existing = await findParent(db, parent, key);
  } catch (error) {
    throw new PersistenceError(`Looking up ${parent.table} ${key}`, error);
  }

  const skipped = skipDecision(key, existing, options);
  if (skipped) return skipped;

  const timestamp = (options.now ?? new Date()).toISOString();
  try {
    return await db.transaction(tx => write(tx, existing, timestamp));
  } catch (error) {
    if (error instanceof PersistenceError) throw error;
    throw new PersistenceError(`Writing ${parent.table} ${key}`, error);
  }
}

/** Row ID of a freshly inserted parent. */
export async function insertedId(
  tx: DbExecutor,
  parent: ParentTable,
  key: string,
  lastId: number | undefined
): Promise<number> {
  if (lastId !== undefined) return lastId;
  const found = await findParent(tx, parent, key);
  if (!found) {
    throw new PersistenceError(`Inserting ${parent.table} ${key}`, new Error('row not found after insert'));
  }
  return found.id;
}
