/**
 * Runs one crawl target for the CLI. SIGINT stops the crawl after the item
 * in flight; only a fatal stop turns into a failing exit code.
 */

import { runCrawl, type CrawlSummary, type CrawlTarget } from '../crawler/crawl-driver.js';
import { consoleLogger, type Logger } from '../logger.js';

export interface CrawlRunOptions {
  start: number;
  end?: number;
  delaySeconds: number;
  maxFailures: number;
  ignoreFailures: boolean;
}

export type CrawlRunner = typeof runCrawl;

export function exitCodeFor(summary: CrawlSummary): number {
  return summary.state === 'stopped_by_fatal_error' ? 1 : 0;
}

export async function crawlUntilInterrupted(
  target: CrawlTarget,
  options: CrawlRunOptions,
  run: CrawlRunner = runCrawl,
  logger: Logger = consoleLogger
): Promise<number> {
  const controller = new AbortController();
  const onSigint = () => {
    logger.info('\nInterrupted, finishing the current item...');
    controller.abort();
  };
  process.once('SIGINT', onSigint);

  try {
    // runCrawl logs its own summary
    const summary = await run(target, {
      start: options.start,
      end: options.end,
      delayMs: options.delaySeconds * 1000,
      maxFailures: options.maxFailures,
      ignoreFailureStreak: options.ignoreFailures,
      signal: controller.signal,
      logger,
    });
    return exitCodeFor(summary);
  } finally {
    process.removeListener('SIGINT', onSigint);
  }
}
