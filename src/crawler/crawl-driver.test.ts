import { describe, expect, it, vi } from 'vitest';
import { PersistenceError } from '../errors.js';
import type { Logger } from '../logger.js';
import type { Sleeper } from '../scraper/throttle.js';
import { runCrawl, type CrawlTarget, type ItemOutcome } from './crawl-driver.js';

function recorder(): Logger & { lines: string[] } {
  const lines: string[] = [];
  return {
    lines,
    info: message => lines.push(message),
    warn: message => lines.push(message),
    error: message => lines.push(message),
  };
}

function targetOf(outcomeFor: (cursor: number) => ItemOutcome | Promise<ItemOutcome>) {
  const processItem = vi.fn<CrawlTarget['processItem']>(async cursor => outcomeFor(cursor));
  const target: CrawlTarget = { name: 'reports', processItem };
  return { target, processItem };
}

const invalid: ItemOutcome = { kind: 'missing', reason: 'invalid', message: 'no data' };
const created: ItemOutcome = {
  kind: 'imported',
  counts: { created: 1, updated: 0, skipped: 0, failed: 0 },
  message: 'created',
};

const noSleep = vi.fn<Sleeper>(async () => {});

describe('runCrawl', () => {
  it('stops after exactly max-failures invalid items', async () => {
    const { target, processItem } = targetOf(() => invalid);
    const summary = await runCrawl(target, {
      start: 1,
      delayMs: 0,
      maxFailures: 10,
      logger: recorder(),
    });

    expect(processItem).toHaveBeenCalledTimes(10);
    expect(summary.state).toBe('stopped_by_failure_streak');
    expect(summary.lastCursor).toBe(10);
    expect(summary.failureStreak).toBe(10);
    expect(summary.invalid).toBe(10);
    expect(summary.failed).toBe(0);
  });

  it('does not count skipped items toward the streak', async () => {
    const { target } = targetOf(() => ({ kind: 'skipped', reason: 'already_exists', message: 'exists' }));
    const summary = await runCrawl(target, { start: 5, end: 9, delayMs: 0, maxFailures: 2, logger: recorder() });

    expect(summary).toMatchObject({ state: 'stopped_by_limit', skipped: 5, created: 0, failureStreak: 0, lastCursor: 9 });
  });

  it('resets the streak on a successful import', async () => {
    const { target } = targetOf(cursor => (cursor === 3 ? created : invalid));
    const summary = await runCrawl(target, { start: 1, delayMs: 0, maxFailures: 3, logger: recorder() });

    // 1, 2 invalid; 3 created; 4, 5, 6 invalid
    expect(summary.lastCursor).toBe(6);
    expect(summary.created).toBe(1);
    expect(summary.invalid).toBe(5);
  });

  it('keeps going past the streak when told to ignore it', async () => {
    const { target } = targetOf(() => ({ kind: 'missing', reason: 'not_found', message: '404' }));
    const summary = await runCrawl(target, {
      start: 1,
      end: 20,
      delayMs: 0,
      maxFailures: 3,
      ignoreFailureStreak: true,
      logger: recorder(),
    });

    expect(summary.state).toBe('stopped_by_limit');
    expect(summary.failed).toBe(20);
    expect(summary.failureStreak).toBe(20);
  });

  it('reports start - 1 when nothing was processed', async () => {
    const { target, processItem } = targetOf(() => created);
    const summary = await runCrawl(target, { start: 50, end: 49, delayMs: 0, maxFailures: 3, logger: recorder() });

    expect(processItem).not.toHaveBeenCalled();
    expect(summary.state).toBe('stopped_by_limit');
    expect(summary.lastCursor).toBe(49);
  });

  it('finishes the in-flight item when interrupted', async () => {
    const controller = new AbortController();
    const { target, processItem } = targetOf(cursor => {
      if (cursor === 3) controller.abort();
      return created;
    });

    const summary = await runCrawl(target, {
      start: 1,
      delayMs: 1000,
      maxFailures: 10,
      signal: controller.signal,
      sleep: noSleep,
      logger: recorder(),
    });

    expect(processItem).toHaveBeenCalledTimes(3);
    expect(summary).toMatchObject({ state: 'stopped_by_user', created: 3, lastCursor: 3 });
  });

  it('sleeps the configured delay between items but not after the last', async () => {
    const sleep = vi.fn<Sleeper>(async () => {});
    const { target } = targetOf(() => created);
    await runCrawl(target, { start: 1, end: 3, delayMs: 1500, maxFailures: 10, sleep, logger: recorder() });

    expect(sleep).toHaveBeenCalledTimes(2);
    expect(sleep.mock.calls[0][0]).toBe(1500);
  });

  it('stops as fatal after repeated storage failures', async () => {
    const { target, processItem } = targetOf(() => ({
      kind: 'persistence_error',
      error: new PersistenceError('Writing disclosure_reports 1', new Error('disk I/O error')),
    }));
    const logger = recorder();
    const summary = await runCrawl(target, {
      start: 1,
      delayMs: 0,
      maxFailures: 10,
      maxPersistenceFailures: 3,
      logger,
    });

    expect(processItem).toHaveBeenCalledTimes(3);
    expect(summary).toMatchObject({ state: 'stopped_by_fatal_error', failed: 3, lastCursor: 3 });
    expect(logger.lines).toContain('[1] Writing disclosure_reports 1 failed: disk I/O error');
  });

  it('treats an isolated storage failure as one failed item', async () => {
    const { target } = targetOf(cursor =>
      cursor === 2
        ? { kind: 'persistence_error', error: new PersistenceError('Writing x', new Error('locked')) }
        : created
    );
    const summary = await runCrawl(target, { start: 1, end: 4, delayMs: 0, maxFailures: 10, logger: recorder() });

    expect(summary).toMatchObject({ state: 'stopped_by_limit', created: 3, failed: 1, failureStreak: 0 });
  });

  it('takes failures from the counts of a partly stored step', async () => {
    const { target } = targetOf(() => ({
      kind: 'persistence_error',
      error: new PersistenceError('Writing disclosure_reports 11', new Error('locked')),
      counts: { created: 2, updated: 0, skipped: 0, failed: 1 },
    }));
    const summary = await runCrawl(target, { start: 1, end: 1, delayMs: 0, maxFailures: 10, logger: recorder() });

    expect(summary).toMatchObject({ state: 'stopped_by_limit', created: 2, failed: 1, failureStreak: 1 });
  });

  it('stops as fatal when the target throws', async () => {
    const { target } = targetOf(cursor => {
      if (cursor === 2) throw new Error('boom');
      return created;
    });
    const summary = await runCrawl(target, { start: 1, delayMs: 0, maxFailures: 10, logger: recorder() });

    expect(summary).toMatchObject({ state: 'stopped_by_fatal_error', created: 1, lastCursor: 1 });
  });

  it('logs a summary on every exit', async () => {
    const logger = recorder();
    const { target } = targetOf(() => created);
    const summary = await runCrawl(target, { start: 1, end: 2, delayMs: 0, maxFailures: 10, logger, now: () => 0 });

    expect(summary.elapsedMs).toBe(0);
    expect(logger.lines).toContain('REPORTS CRAWL SUMMARY (stopped_by_limit)');
    expect(logger.lines).toContain('Created: 2');
    expect(logger.lines).toContain('Last processed: 2');
  });
});
