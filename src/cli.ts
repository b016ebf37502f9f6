#!/usr/bin/env node
/**
 * Command-line entry point: single imports, sequential crawls and the API
 * server. Exits 0 on completion or interrupt, 1 on a fatal error or a
 * failed single import.
 */

import { startServer } from './api/server.js';
import {
  USAGE,
  parseCliArgs,
  refreshAfterDaysFor,
  type CliCommand,
  type CrawlCommand,
  type ImportCommand,
  type SearchCrawlCommand,
} from './cli/args.js';
import { crawlUntilInterrupted } from './cli/crawl-command.js';
import { loadConfig, loadEnvFiles, type AppConfig } from './config/env.js';
import {
  createItemTarget,
  createReportSearchTarget,
  importItem,
  resolveImportOptions,
  type TargetDeps,
} from './crawler/targets.js';
import { initializeDb } from './db/database.js';
import { ValidationError, errorMessage } from './errors.js';
import { consoleLogger } from './logger.js';
import { createPageFetcher } from './scraper/fetch-page.js';
import { parseItemId } from './scraper/sources.js';
import { RequestThrottle } from './scraper/throttle.js';

async function withDeps<T>(
  config: AppConfig,
  delaySeconds: number,
  importOptions: TargetDeps['importOptions'],
  work: (deps: TargetDeps) => Promise<T>
): Promise<T> {
  const db = await initializeDb(config);
  const throttle = new RequestThrottle({ minIntervalMs: delaySeconds * 1000 });
  try {
    return await work({
      db,
      fetchPage: createPageFetcher(config.fetch, throttle),
      sources: config.sources,
      importOptions,
      logger: consoleLogger,
    });
  } finally {
    await db.close();
  }
}

async function runImport(config: AppConfig, command: ImportCommand): Promise<number> {
  const id = command.reportId ? parseItemId(command.reportId) : parseItemId(command.urlOrId);
  const sourceUrl = /^https?:\/\//i.test(command.urlOrId.trim()) ? command.urlOrId.trim() : undefined;
  const importOptions = resolveImportOptions({ update: command.update, skipExisting: false });

  const outcome = await withDeps(config, 0, importOptions, deps =>
    importItem(deps, command.type, id, { sourceUrl })
  );

  switch (outcome.kind) {
    case 'imported':
    case 'skipped':
      console.log(outcome.message);
      return 0;
    case 'missing':
      console.error(outcome.message);
      return 1;
    case 'persistence_error':
      console.error(outcome.error.message);
      return 1;
  }
}

async function runItemCrawl(config: AppConfig, command: CrawlCommand): Promise<number> {
  const importOptions = resolveImportOptions({
    update: command.update,
    skipExisting: command.skipExisting,
    refreshAfterDays: refreshAfterDaysFor(command.type),
  });

  console.log(`Crawling ${command.type} from ${command.start}${command.end ? ` to ${command.end}` : ''}`);
  console.log(`Delay: ${command.delaySeconds}s, max failures: ${command.maxFailures}`);

  return withDeps(config, command.delaySeconds, importOptions, deps =>
    crawlUntilInterrupted(createItemTarget(command.type, deps), {
      start: command.start,
      end: command.end,
      delaySeconds: command.delaySeconds,
      maxFailures: command.maxFailures,
      ignoreFailures: command.ignoreFailures,
    })
  );
}

async function runSearchCrawl(config: AppConfig, command: SearchCrawlCommand): Promise<number> {
  const importOptions = resolveImportOptions({ update: command.update, skipExisting: command.skipExisting });
  const end = command.maxPages === undefined ? undefined : command.startPage + command.maxPages - 1;

  console.log(`Crawling report search pages from ${command.startPage}${end ? ` to ${end}` : ''}`);

  return withDeps(config, command.delaySeconds, importOptions, deps =>
    crawlUntilInterrupted(createReportSearchTarget(deps), {
      start: command.startPage,
      end,
      delaySeconds: command.delaySeconds,
      maxFailures: command.maxFailures,
      ignoreFailures: false,
    })
  );
}

async function main(): Promise<number> {
  loadEnvFiles();

  let command: CliCommand;
  try {
    command = parseCliArgs(process.argv.slice(2));
  } catch (error) {
    if (error instanceof ValidationError) {
      console.error(error.message);
      console.error(USAGE);
      return 1;
    }
    throw error;
  }

  const config = loadConfig();

  switch (command.command) {
    case 'help':
      console.log(USAGE);
      return 0;
    case 'serve':
      await startServer(config);
      return 0;
    case 'import':
      return runImport(config, command);
    case 'crawl':
      return runItemCrawl(config, command);
    case 'crawl-search':
      return runSearchCrawl(config, command);
  }
}

main()
  .then(code => {
    process.exitCode = code;
  })
  .catch(error => {
    console.error(`Fatal: ${errorMessage(error)}`);
    process.exitCode = 1;
  });
