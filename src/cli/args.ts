/**
 * Command-line parsing
 *
 *   import <type> <url-or-id> [--update] [--report-id ID]
 *   crawl  <type> [--start N] [--end N] [--delay S] [--max-failures N]
 *          [--skip-existing] [--update] [--ignore-failures]
 *   crawl  report-search [--start-page N] [--max-pages N] [--delay S]
 *          [--max-failures N] [--skip-existing] [--update]
 *   serve
 */

import { ValidationError } from '../errors.js';
import { DATA_TYPES, isDataType, type DataType } from '../scraper/sources.js';

export interface ImportCommand {
  command: 'import';
  type: DataType;
  urlOrId: string;
  update: boolean;
  /** ID to store the page under when the URL does not end in one. */
  reportId?: string;
}

export interface CrawlFlags {
  delaySeconds: number;
  maxFailures: number;
  skipExisting: boolean;
  update: boolean;
}

export interface CrawlCommand extends CrawlFlags {
  command: 'crawl';
  type: DataType;
  start: number;
  end?: number;
  ignoreFailures: boolean;
}

export interface SearchCrawlCommand extends CrawlFlags {
  command: 'crawl-search';
  startPage: number;
  maxPages?: number;
}

export type CliCommand =
  | ImportCommand
  | CrawlCommand
  | SearchCrawlCommand
  | { command: 'serve' }
  | { command: 'help' };

export const DEFAULT_DELAY_SECONDS: Record<DataType, number> = {
  reports: 1.0,
  'lobbyist-reports': 1.0,
  entities: 2.0,
  'lobbyist-entities': 2.0,
};

export const DEFAULT_MAX_FAILURES: Record<DataType, number> = {
  reports: 10,
  'lobbyist-reports': 50,
  entities: 50,
  'lobbyist-entities': 100,
};

export const USAGE = `Usage:
  import <${DATA_TYPES.join('|')}> <url-or-id> [--update] [--report-id ID]
  crawl  <${DATA_TYPES.join('|')}> [--start N] [--end N] [--delay S]
         [--max-failures N] [--skip-existing] [--update] [--ignore-failures]
  crawl  report-search [--start-page N] [--max-pages N] [--delay S]
         [--max-failures N] [--skip-existing] [--update]
  serve`;

/** Flags and their values, in order; bare words are positionals. */
class ArgReader {
  private readonly flags = new Map<string, string | true>();
  readonly positionals: string[] = [];

  constructor(args: string[], private readonly valueFlags: ReadonlySet<string>) {
    for (let i = 0; i < args.length; i++) {
      const arg = args[i];
      if (!arg.startsWith('--')) {
        this.positionals.push(arg);
        continue;
      }
      if (valueFlags.has(arg)) {
        const value = args[i + 1];
        if (value === undefined || value.startsWith('--')) {
          throw new ValidationError(`${arg} needs a value`);
        }
        this.flags.set(arg, value);
        i++;
      } else {
        this.flags.set(arg, true);
      }
    }
  }

  assertKnown(booleanFlags: ReadonlySet<string>): void {
    for (const flag of this.flags.keys()) {
      if (!this.valueFlags.has(flag) && !booleanFlags.has(flag)) {
        throw new ValidationError(`Unknown option ${flag}`);
      }
    }
  }

  has(flag: string): boolean {
    return this.flags.get(flag) === true;
  }

  string(flag: string): string | undefined {
    const value = this.flags.get(flag);
    return typeof value === 'string' ? value : undefined;
  }

  positiveInt(flag: string): number | undefined {
    const value = this.string(flag);
    if (value === undefined) return undefined;
    if (!/^\d+$/.test(value) || Number(value) < 1) {
      throw new ValidationError(`${flag} must be a positive integer, got "${value}"`);
    }
    return Number(value);
  }

  seconds(flag: string): number | undefined {
    const value = this.string(flag);
    if (value === undefined) return undefined;
    const seconds = Number(value);
    if (value.trim() === '' || !Number.isFinite(seconds) || seconds < 0) {
      throw new ValidationError(`${flag} must be a non-negative number of seconds, got "${value}"`);
    }
    return seconds;
  }
}

const CRAWL_VALUE_FLAGS = new Set(['--start', '--end', '--delay', '--max-failures', '--start-page', '--max-pages']);
const CRAWL_BOOLEAN_FLAGS = new Set(['--skip-existing', '--update', '--ignore-failures']);

function dataType(value: string | undefined): DataType {
  if (value === undefined || !isDataType(value)) {
    throw new ValidationError(`Expected one of ${DATA_TYPES.join(', ')}, got "${value ?? ''}"`);
  }
  return value;
}

function parseImport(args: string[]): ImportCommand {
  const reader = new ArgReader(args, new Set(['--report-id']));
  reader.assertKnown(new Set(['--update']));
  const [type, urlOrId, ...extra] = reader.positionals;
  if (urlOrId === undefined || extra.length > 0) {
    throw new ValidationError('import takes a type and one URL or ID');
  }
  return {
    command: 'import',
    type: dataType(type),
    urlOrId,
    update: reader.has('--update'),
    reportId: reader.string('--report-id'),
  };
}

function parseCrawl(args: string[]): CrawlCommand | SearchCrawlCommand {
  const reader = new ArgReader(args, CRAWL_VALUE_FLAGS);
  reader.assertKnown(CRAWL_BOOLEAN_FLAGS);
  const [target, ...extra] = reader.positionals;
  if (extra.length > 0) {
    throw new ValidationError(`Unexpected argument "${extra[0]}"`);
  }

  if (target === 'report-search') {
    return {
      command: 'crawl-search',
      startPage: reader.positiveInt('--start-page') ?? 1,
      maxPages: reader.positiveInt('--max-pages'),
      delaySeconds: reader.seconds('--delay') ?? DEFAULT_DELAY_SECONDS.reports,
      maxFailures: reader.positiveInt('--max-failures') ?? DEFAULT_MAX_FAILURES.reports,
      skipExisting: reader.has('--skip-existing'),
      update: reader.has('--update'),
    };
  }

  const type = dataType(target);
  const start = reader.positiveInt('--start') ?? 1;
  const end = reader.positiveInt('--end');
  if (end !== undefined && end < start) {
    throw new ValidationError(`--end ${end} is before --start ${start}`);
  }
  return {
    command: 'crawl',
    type,
    start,
    end,
    delaySeconds: reader.seconds('--delay') ?? DEFAULT_DELAY_SECONDS[type],
    maxFailures: reader.positiveInt('--max-failures') ?? DEFAULT_MAX_FAILURES[type],
    skipExisting: reader.has('--skip-existing'),
    update: reader.has('--update'),
    ignoreFailures: reader.has('--ignore-failures'),
  };
}

/** @throws ValidationError on unknown commands, options or bad values */
export function parseCliArgs(argv: string[]): CliCommand {
  const [command, ...rest] = argv;
  switch (command) {
    case 'import':
      return parseImport(rest);
    case 'crawl':
      return parseCrawl(rest);
    case 'serve':
      return { command: 'serve' };
    case undefined:
    case 'help':
    case '--help':
    case '-h':
      return { command: 'help' };
    default:
      throw new ValidationError(`Unknown command "${command}"`);
  }
}

/**
 * Registrations and lobbyist reports are refreshed only once their last
 * scrape is this old. Campaign reports are refreshed on every update crawl.
 */
export const REFRESH_AFTER_DAYS = 30;

export function refreshAfterDaysFor(type: DataType): number | undefined {
  return type === 'reports' ? undefined : REFRESH_AFTER_DAYS;
}
