/**
 * Crawl targets
 *
 * One item per cursor step: fetch the page for an ID, parse it, and hand it
 * to the matching importer. The report-search target walks result pages
 * instead and imports every report each page links to.
 */

import type { SourceConfig } from '../config/env.js';
import type { DbClient } from '../db/db-adapter.js';
import { PersistenceError } from '../errors.js';
import { ENTITIES, LOBBYISTS, importEntityRegistration, importLobbyistRegistration } from '../importer/entity-importer.js';
import { LOBBYIST_REPORTS, importLobbyistReport } from '../importer/lobbyist-report-importer.js';
import { REPORTS, importDisclosureReport } from '../importer/report-importer.js';
import { findParent, skipDecision, type ExistingParent, type ParentTable } from '../importer/upsert.js';
import { consoleLogger, type Logger } from '../logger.js';
import { parseEntityRegistration } from '../parser/entity-parser.js';
import { parseLobbyistEntity } from '../parser/lobbyist-entity-parser.js';
import { isUsableLobbyistReport, parseLobbyistReport } from '../parser/lobbyist-report-parser.js';
import { isUsableReport, parseDisclosureReport } from '../parser/report-parser.js';
import type { PageFetcher } from '../scraper/fetch-page.js';
import { extractReportIds, pageUrl, reportSearchUrl, type DataType } from '../scraper/sources.js';
import type {
  EntityImportResult,
  EntityImportWritten,
  ImportOptions,
  ImportSkipped,
  PageContext,
  ParseResult,
  ReportImportResult,
  ReportImportWritten,
} from '../types/index.js';
import type { CrawlTarget, ItemCounts, ItemOutcome } from './crawl-driver.js';

export interface TargetDeps {
  db: DbClient;
  fetchPage: PageFetcher;
  sources: SourceConfig;
  importOptions: ImportOptions;
  logger?: Logger;
}

export interface ImportFlags {
  update: boolean;
  skipExisting: boolean;
  /** Only applies with `update`. */
  refreshAfterDays?: number;
}

/** `skipExisting` wins over `update`. */
export function resolveImportOptions(flags: ImportFlags): ImportOptions {
  const updateExisting = flags.update && !flags.skipExisting;
  return {
    updateExisting,
    refreshAfterDays: updateExisting ? flags.refreshAfterDays : undefined,
  };
}

// ============================================
// Per-type handlers
// ============================================

interface ItemPipeline<T> {
  parent: ParentTable;
  noun: string;
  parse(html: string, context: PageContext): ParseResult<T>;
  isUsable(item: T): boolean;
  /** Data-quality notes the parser attached to the item. */
  warnings?(item: T): readonly string[];
  save(db: DbClient, item: T, options: ImportOptions): Promise<ReportImportResult | EntityImportResult>;
}

interface PageHandler {
  parent: ParentTable;
  noun: string;
  importPage(deps: TargetDeps, html: string, context: PageContext, requireUsable: boolean): Promise<ItemOutcome>;
}

function describeWritten(result: ReportImportWritten | EntityImportWritten, noun: string): string {
  const verb = result.status === 'created' ? 'Created' : 'Updated';
  if ('childrenInserted' in result) {
    return `${verb} ${noun.toLowerCase()} ${result.id}: ${result.childrenInserted} related records`;
  }
  return `${verb} ${noun.toLowerCase()} ${result.id}: ${result.contributionsInserted} contributions, ${result.expendituresInserted} expenditures`;
}

export function skipMessage(noun: string, skipped: ImportSkipped): string {
  return skipped.reason === 'already_exists'
    ? `${noun} ${skipped.id} already exists (skipped)`
    : `${noun} ${skipped.id} was scraped recently (skipped)`;
}

function definePipeline<T>(pipeline: ItemPipeline<T>): PageHandler {
  return {
    parent: pipeline.parent,
    noun: pipeline.noun,
    async importPage(deps, html, context, requireUsable) {
      const parsed = pipeline.parse(html, context);
      if (!parsed.ok) {
        return { kind: 'missing', reason: 'parse_failure', message: parsed.failure.message };
      }
      if (requireUsable && !pipeline.isUsable(parsed.value)) {
        return {
          kind: 'missing',
          reason: 'invalid',
          message: `${pipeline.noun} ${context.id} appears to be invalid (no data)`,
        };
      }

      const logger = deps.logger ?? consoleLogger;
      for (const warning of pipeline.warnings?.(parsed.value) ?? []) {
        logger.warn(`${pipeline.noun} ${context.id}: ${warning}`);
      }

      let result: ReportImportResult | EntityImportResult;
      try {
        result = await pipeline.save(deps.db, parsed.value, deps.importOptions);
      } catch (error) {
        if (error instanceof PersistenceError) return { kind: 'persistence_error', error };
        throw error;
      }

      if (result.status === 'skipped') {
        return { kind: 'skipped', reason: result.reason, message: skipMessage(pipeline.noun, result) };
      }
      return {
        kind: 'imported',
        counts: {
          created: result.status === 'created' ? 1 : 0,
          updated: result.status === 'updated' ? 1 : 0,
          skipped: 0,
          failed: 0,
        },
        message: describeWritten(result, pipeline.noun),
      };
    },
  };
}

const HANDLERS: Record<DataType, PageHandler> = {
  reports: definePipeline({
    parent: REPORTS,
    noun: 'Report',
    parse: parseDisclosureReport,
    isUsable: isUsableReport,
    warnings: report => report.warnings,
    save: importDisclosureReport,
  }),
  'lobbyist-reports': definePipeline({
    parent: LOBBYIST_REPORTS,
    noun: 'Lobbyist report',
    parse: parseLobbyistReport,
    isUsable: isUsableLobbyistReport,
    warnings: report => report.warnings,
    save: importLobbyistReport,
  }),
  entities: definePipeline({
    parent: ENTITIES,
    noun: 'Entity',
    parse: parseEntityRegistration,
    isUsable: () => true,
    save: importEntityRegistration,
  }),
  'lobbyist-entities': definePipeline({
    parent: LOBBYISTS,
    noun: 'Lobbyist',
    parse: parseLobbyistEntity,
    isUsable: () => true,
    save: importLobbyistRegistration,
  }),
};

// ============================================
// Single item
// ============================================

export interface ImportItemOptions {
  /** Page to fetch instead of the one derived from the ID. */
  sourceUrl?: string;
  /** Treat a parsed page with no amounts and no line items as invalid. */
  requireUsable?: boolean;
  signal?: AbortSignal;
}

/**
 * Fetch, parse and store one item. Existing rows are checked before the
 * fetch so skipped items cost no request.
 */
export async function importItem(
  deps: TargetDeps,
  type: DataType,
  id: string,
  options: ImportItemOptions = {}
): Promise<ItemOutcome> {
  const handler = HANDLERS[type];

  let existing: ExistingParent | null;
  try {
    existing = await findParent(deps.db, handler.parent, id);
  } catch (error) {
    return { kind: 'persistence_error', error: new PersistenceError(`Looking up ${handler.parent.table} ${id}`, error) };
  }
  const skipped = skipDecision(id, existing, deps.importOptions);
  if (skipped) {
    return { kind: 'skipped', reason: skipped.reason, message: skipMessage(handler.noun, skipped) };
  }

  const url = options.sourceUrl ?? pageUrl(deps.sources, type, id);
  const page = await deps.fetchPage(url, options.signal);
  if (page.kind === 'not_found') {
    return { kind: 'missing', reason: 'not_found', message: `${handler.noun} ${id} not found (HTTP ${page.status})` };
  }
  if (page.kind === 'error') {
    return { kind: 'missing', reason: 'fetch_error', message: `Error fetching ${handler.noun.toLowerCase()} ${id}: ${page.error.message}` };
  }

  return handler.importPage(deps, page.html, { id, sourceUrl: url }, options.requireUsable ?? false);
}

// ============================================
// Targets
// ============================================

export function createItemTarget(type: DataType, deps: TargetDeps): CrawlTarget {
  return {
    name: type,
    processItem: (cursor, signal) => importItem(deps, type, String(cursor), { requireUsable: true, signal }),
  };
}

/**
 * Walks search result pages. Each page is one cursor step; a page that
 * lists no reports counts as missing. Once started, a page is finished even
 * if the crawl is interrupted, so the summary's last page is complete. A
 * report that cannot be stored is counted as failed and the rest of the page
 * is still imported; the page then reports the first storage error.
 */
export function createReportSearchTarget(deps: TargetDeps): CrawlTarget {
  const logger = deps.logger ?? consoleLogger;

  return {
    name: 'report-search',
    async processItem(pageNumber, signal) {
      const page = await deps.fetchPage(reportSearchUrl(deps.sources, pageNumber), signal);
      if (page.kind === 'not_found') {
        return { kind: 'missing', reason: 'not_found', message: `Search page ${pageNumber} not found (HTTP ${page.status})` };
      }
      if (page.kind === 'error') {
        return { kind: 'missing', reason: 'fetch_error', message: `Error fetching search page ${pageNumber}: ${page.error.message}` };
      }

      const ids = extractReportIds(page.html);
      if (ids.length === 0) {
        return { kind: 'missing', reason: 'invalid', message: `Search page ${pageNumber} lists no reports` };
      }

      const counts: ItemCounts = { created: 0, updated: 0, skipped: 0, failed: 0 };
      let storageError: PersistenceError | undefined;
      for (const id of ids) {
        const outcome = await importItem(deps, 'reports', id, { requireUsable: true });
        switch (outcome.kind) {
          case 'imported':
            counts.created += outcome.counts.created;
            counts.updated += outcome.counts.updated;
            logger.info(`  ${outcome.message}`);
            break;
          case 'skipped':
            counts.skipped += 1;
            logger.info(`  ${outcome.message}`);
            break;
          case 'missing':
            counts.failed += 1;
            logger.warn(`  ${outcome.message}`);
            break;
          case 'persistence_error':
            counts.failed += 1;
            storageError ??= outcome.error;
            logger.error(`  ${outcome.error.message}`);
            break;
        }
      }

      if (storageError) {
        return { kind: 'persistence_error', error: storageError, counts };
      }

      return {
        kind: 'imported',
        counts,
        message: `Search page ${pageNumber}: ${ids.length} reports listed, ${counts.created} created, ${counts.updated} updated, ${counts.skipped} skipped, ${counts.failed} failed`,
      };
    },
  };
}
