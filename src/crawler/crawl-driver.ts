/**
 * Crawl driver
 *
 * Walks a cursor (an item ID or a search page number) one step at a time,
 * sleeping between steps. Stops at the end boundary, after too many
 * consecutive unusable items, on abort, or when storage keeps failing.
 * A summary is logged and returned on every exit path so the run can be
 * resumed from `lastCursor + 1`.
 */

import type { PersistenceError } from '../errors.js';
import { consoleLogger, type Logger } from '../logger.js';
import { sleep, type Sleeper } from '../scraper/throttle.js';
import type { SkipReason } from '../types/index.js';

export type CrawlState =
  | 'running'
  | 'stopped_by_limit'
  | 'stopped_by_failure_streak'
  | 'stopped_by_user'
  | 'stopped_by_fatal_error';

export type MissingReason = 'not_found' | 'fetch_error' | 'parse_failure' | 'invalid';

export interface ItemCounts {
  created: number;
  updated: number;
  skipped: number;
  failed: number;
}

export type ItemOutcome =
  | { kind: 'imported'; counts: ItemCounts; message: string }
  | { kind: 'skipped'; reason: SkipReason; message: string }
  | { kind: 'missing'; reason: MissingReason; message: string }
  | {
      kind: 'persistence_error';
      /** The first storage failure. */
      error: PersistenceError;
      /** Tallies of a multi-report step, failures included. */
      counts?: ItemCounts;
    };

export interface CrawlTarget {
  /** Shown in log lines, e.g. "reports". */
  readonly name: string;
  processItem(cursor: number, signal?: AbortSignal): Promise<ItemOutcome>;
}

export interface CrawlOptions {
  start: number;
  /** Inclusive. Unbounded when absent. */
  end?: number;
  delayMs: number;
  maxFailures: number;
  maxPersistenceFailures?: number;
  ignoreFailureStreak?: boolean;
  signal?: AbortSignal;
  logger?: Logger;
  sleep?: Sleeper;
  now?: () => number;
}

export interface CrawlSummary {
  state: Exclude<CrawlState, 'running'>;
  created: number;
  updated: number;
  skipped: number;
  /** Fetch errors, not-found pages and storage failures. */
  failed: number;
  /** Pages that were fetched but held no usable item. */
  invalid: number;
  lastCursor: number;
  failureStreak: number;
  elapsedMs: number;
}

export const DEFAULT_MAX_PERSISTENCE_FAILURES = 3;

export async function runCrawl(target: CrawlTarget, options: CrawlOptions): Promise<CrawlSummary> {
  const logger = options.logger ?? consoleLogger;
  const wait = options.sleep ?? sleep;
  const now = options.now ?? Date.now;
  const maxPersistenceFailures = options.maxPersistenceFailures ?? DEFAULT_MAX_PERSISTENCE_FAILURES;
  const startedAt = now();

  const totals = { created: 0, updated: 0, skipped: 0, failed: 0, invalid: 0 };
  let cursor = options.start;
  let lastCursor = options.start - 1;
  let failureStreak = 0;
  let persistenceStreak = 0;
  let state: CrawlState;

  const addCounts = (counts: ItemCounts) => {
    totals.created += counts.created;
    totals.updated += counts.updated;
    totals.skipped += counts.skipped;
    totals.failed += counts.failed;
  };

  const stopCondition = (): CrawlState => {
    if (persistenceStreak >= maxPersistenceFailures) {
      logger.error(`Stopping after ${persistenceStreak} consecutive storage failures`);
      return 'stopped_by_fatal_error';
    }
    if (options.signal?.aborted) {
      logger.warn('Crawl interrupted by user');
      return 'stopped_by_user';
    }
    if (options.end !== undefined && cursor > options.end) {
      logger.info(`Reached end ${options.end}`);
      return 'stopped_by_limit';
    }
    if (!options.ignoreFailureStreak && failureStreak >= options.maxFailures) {
      logger.warn(`Stopping after ${failureStreak} consecutive invalid items`);
      return 'stopped_by_failure_streak';
    }
    return 'running';
  };

  logger.info(`Starting ${target.name} crawl at ${options.start}`);
  if (options.end !== undefined) {
    logger.info(`Will stop at ${options.end}`);
  } else if (options.ignoreFailureStreak) {
    logger.info('Will continue indefinitely (ignoring consecutive failures)');
  } else {
    logger.info(`Will continue until ${options.maxFailures} consecutive invalid items`);
  }
  logger.info(`Delay between requests: ${options.delayMs / 1000}s`);

  state = stopCondition();
  while (state === 'running') {
    let outcome: ItemOutcome;
    try {
      outcome = await target.processItem(cursor, options.signal);
    } catch (error) {
      logger.error(`[${cursor}] Unexpected error, stopping`, error);
      state = 'stopped_by_fatal_error';
      break;
    }

    switch (outcome.kind) {
      case 'imported':
        addCounts(outcome.counts);
        failureStreak = 0;
        persistenceStreak = 0;
        logger.info(`[${cursor}] ${outcome.message}`);
        break;
      case 'skipped':
        totals.skipped += 1;
        failureStreak = 0;
        persistenceStreak = 0;
        logger.info(`[${cursor}] ${outcome.message}`);
        break;
      case 'missing':
        if (outcome.reason === 'parse_failure' || outcome.reason === 'invalid') {
          totals.invalid += 1;
        } else {
          totals.failed += 1;
        }
        failureStreak += 1;
        logger.warn(`[${cursor}] ${outcome.message} (consecutive failures: ${failureStreak})`);
        break;
      case 'persistence_error':
        // A search page's counts already include its failed reports
        if (outcome.counts) addCounts(outcome.counts);
        else totals.failed += 1;
        failureStreak += 1;
        persistenceStreak += 1;
        logger.error(`[${cursor}] ${outcome.error.message}`);
        break;
    }

    lastCursor = cursor;
    cursor += 1;

    state = stopCondition();
    if (state === 'running' && options.delayMs > 0) {
      await wait(options.delayMs, options.signal);
      state = stopCondition();
    }
  }

  const summary: CrawlSummary = {
    state,
    ...totals,
    lastCursor,
    failureStreak,
    elapsedMs: now() - startedAt,
  };
  logSummary(logger, target.name, summary);
  return summary;
}

export function logSummary(logger: Logger, name: string, summary: CrawlSummary): void {
  logger.info('='.repeat(60));
  logger.info(`${name.toUpperCase()} CRAWL SUMMARY (${summary.state})`);
  logger.info('='.repeat(60));
  logger.info(`Created: ${summary.created}`);
  logger.info(`Updated: ${summary.updated}`);
  logger.info(`Skipped: ${summary.skipped}`);
  logger.info(`Failed: ${summary.failed}`);
  logger.info(`Invalid: ${summary.invalid}`);
  logger.info(`Last processed: ${summary.lastCursor}`);
  logger.info(`Time elapsed: ${(summary.elapsedMs / 1000).toFixed(1)}s`);
  logger.info('='.repeat(60));
}
