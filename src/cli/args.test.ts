import { describe, expect, it } from 'vitest';
import { ValidationError } from '../errors.js';
import { parseCliArgs, refreshAfterDaysFor } from './args.js';

describe('parseCliArgs', () => {
  it('parses a single import', () => {
    expect(parseCliArgs(['import', 'reports', '12345', '--update'])).toEqual({
      command: 'import',
      type: 'reports',
      urlOrId: '12345',
      update: true,
      reportId: undefined,
    });
  });

  it('takes an explicit report ID alongside a URL', () => {
    const command = parseCliArgs(['import', 'reports', 'https://disclosures.example/custom', '--report-id', '77']);
    expect(command).toMatchObject({ urlOrId: 'https://disclosures.example/custom', reportId: '77', update: false });
  });

  it('applies per-type crawl defaults', () => {
    expect(parseCliArgs(['crawl', 'reports'])).toEqual({
      command: 'crawl',
      type: 'reports',
      start: 1,
      end: undefined,
      delaySeconds: 1,
      maxFailures: 10,
      skipExisting: false,
      update: false,
      ignoreFailures: false,
    });
    expect(parseCliArgs(['crawl', 'entities'])).toMatchObject({ delaySeconds: 2, maxFailures: 50 });
    expect(parseCliArgs(['crawl', 'lobbyist-entities'])).toMatchObject({ delaySeconds: 2, maxFailures: 100 });
    expect(parseCliArgs(['crawl', 'lobbyist-reports'])).toMatchObject({ delaySeconds: 1, maxFailures: 50 });
  });

  it('reads crawl options', () => {
    const command = parseCliArgs([
      'crawl', 'reports', '--start', '100', '--end', '200', '--delay', '0.5',
      '--max-failures', '3', '--skip-existing', '--ignore-failures',
    ]);
    expect(command).toMatchObject({
      start: 100,
      end: 200,
      delaySeconds: 0.5,
      maxFailures: 3,
      skipExisting: true,
      ignoreFailures: true,
    });
  });

  it('parses the report search crawl', () => {
    expect(parseCliArgs(['crawl', 'report-search', '--start-page', '3', '--max-pages', '2'])).toEqual({
      command: 'crawl-search',
      startPage: 3,
      maxPages: 2,
      delaySeconds: 1,
      maxFailures: 10,
      skipExisting: false,
      update: false,
    });
  });

  it('treats no arguments as help', () => {
    expect(parseCliArgs([])).toEqual({ command: 'help' });
    expect(parseCliArgs(['serve'])).toEqual({ command: 'serve' });
  });

  it('rejects bad input', () => {
    expect(() => parseCliArgs(['crawl', 'candidates'])).toThrow(ValidationError);
    expect(() => parseCliArgs(['crawl', 'reports', '--start', 'abc'])).toThrow(
      '--start must be a positive integer, got "abc"'
    );
    expect(() => parseCliArgs(['crawl', 'reports', '--start', '10', '--end', '5'])).toThrow(
      '--end 5 is before --start 10'
    );
    expect(() => parseCliArgs(['crawl', 'reports', '--delay'])).toThrow('--delay needs a value');
    expect(() => parseCliArgs(['crawl', 'reports', '--verbose'])).toThrow('Unknown option --verbose');
    expect(() => parseCliArgs(['import', 'reports'])).toThrow('import takes a type and one URL or ID');
    expect(() => parseCliArgs(['publish'])).toThrow('Unknown command "publish"');
  });
});

describe('refreshAfterDaysFor', () => {
  it('ages out registrations and lobbyist reports but not campaign reports', () => {
    expect(refreshAfterDaysFor('entities')).toBe(30);
    expect(refreshAfterDaysFor('lobbyist-entities')).toBe(30);
    expect(refreshAfterDaysFor('lobbyist-reports')).toBe(30);
    expect(refreshAfterDaysFor('reports')).toBeUndefined();
  });
});
