/**
 * Source URLs
 * Every page the pipeline reads is addressed by a numeric ID under one of
 * the two configured base URLs.
 */

import * as cheerio from 'cheerio';
import type { SourceConfig } from '../config/env.js';
import { ValidationError } from '../errors.js';

export type DataType = 'reports' | 'lobbyist-reports' | 'entities' | 'lobbyist-entities';

export const DATA_TYPES: readonly DataType[] = ['reports', 'lobbyist-reports', 'entities', 'lobbyist-entities'];

/** Reports shown per search results page. */
export const REPORT_SEARCH_PAGE_SIZE = 50;

const REPORT_LINK = /\/Search\/PublicSearch\/Report\/(\d+)/;

export function isDataType(value: string): value is DataType {
  return DATA_TYPES.some(type => type === value);
}

export function pageUrl(sources: SourceConfig, type: DataType, id: string): string {
  switch (type) {
    case 'reports':
      return `${sources.disclosuresBaseUrl}/Search/PublicSearch/Report/${id}`;
    case 'lobbyist-reports':
      return `${sources.lobbyistBaseUrl}/Search/PublicSearch/Report/${id}`;
    case 'entities':
      return `${sources.disclosuresBaseUrl}/Registration/EntityDetails/${id}`;
    case 'lobbyist-entities':
      return `${sources.lobbyistBaseUrl}/Registration/EntityDetails/${id}`;
  }
}

export function reportSearchUrl(sources: SourceConfig, page: number): string {
  const skip = (page - 1) * REPORT_SEARCH_PAGE_SIZE;
  return `${sources.disclosuresBaseUrl}/Search/PublicSearch?Skip=${skip}`;
}

/**
 * Accepts a bare numeric ID or a page URL ending in one.
 * @throws ValidationError when no positive integer ID can be read
 */
export function parseItemId(urlOrId: string): string {
  const value = urlOrId.trim();
  if (/^\d+$/.test(value)) return normalizeId(value, urlOrId);

  let pathname: string;
  try {
    pathname = new URL(value).pathname;
  } catch {
    throw new ValidationError(`Not a report ID or URL: "${urlOrId}"`);
  }

  const match = /\/(\d+)\/?$/.exec(pathname);
  if (!match) {
    throw new ValidationError(`No numeric ID at the end of ${value}`);
  }
  return normalizeId(match[1], urlOrId);
}

function normalizeId(digits: string, input: string): string {
  const id = digits.replace(/^0+(?=\d)/, '');
  if (id === '0') {
    throw new ValidationError(`ID must be positive: "${input}"`);
  }
  return id;
}

/**
 * Report IDs linked from a search results page, in page order, deduplicated.
 */
export function extractReportIds(html: string): string[] {
  const $ = cheerio.load(html);
  const ids: string[] = [];

  for (const link of $('a[href]').toArray()) {
    const match = REPORT_LINK.exec($(link).attr('href') ?? '');
    if (match && !ids.includes(match[1])) {
      ids.push(match[1]);
    }
  }
  return ids;
}
