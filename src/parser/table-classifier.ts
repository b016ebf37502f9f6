/**
 * Table classifier
 *
 * Disclosure pages carry several tables in no reliable order. Tables are
 * told apart by their header text, and the balance summary by the heading
 * that precedes it.
 */

import type { Cheerio, CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import { cleanText } from './extractors.js';

export interface ClassifiedTables {
  contributions: Cheerio<Element> | null;
  expenditures: Cheerio<Element> | null;
  balanceSummary: Cheerio<Element> | null;
  warnings: string[];
}

const BALANCE_SUMMARY = /balance\s+summary/i;

/**
 * Header text of a table: its thead, or the th cells of its first row when
 * there is no thead, or its caption.
 */
export function tableHeaderText($: CheerioAPI, table: Element): string {
  const $table = $(table);

  const joinCells = (cells: Element[]) => cleanText(cells.map(cell => $(cell).text()).join(' '));

  const thead = $table.children('thead');
  if (thead.length > 0) {
    return joinCells(thead.find('th, td').toArray());
  }

  const headerCells = $table.find('tr').first().children('th').toArray();
  if (headerCells.length > 0) {
    return joinCells(headerCells);
  }

  return cleanText($table.children('caption').text());
}

/**
 * The innermost elements whose own text mentions "Balance Summary".
 */
function findBalanceSummaryHeadings($: CheerioAPI): Element[] {
  return $.root()
    .find('body *')
    .toArray()
    .filter(el => el.tagName !== 'table' && el.tagName !== 'tbody' && el.tagName !== 'tr')
    .filter(el => BALANCE_SUMMARY.test($(el).text()))
    .filter(el => !$(el).children().toArray().some(child => BALANCE_SUMMARY.test($(child).text())));
}

/**
 * The table that follows the "Balance Summary" heading in document order,
 * or the table that contains it when the heading is a caption or header cell.
 */
export function findBalanceSummaryTable($: CheerioAPI, warnings: string[] = []): Cheerio<Element> | null {
  const headings = findBalanceSummaryHeadings($);
  if (headings.length === 0) return null;
  if (headings.length > 1) {
    warnings.push(`Found ${headings.length} "Balance Summary" headings; using the first`);
  }

  const heading = headings[0];
  const enclosing = $(heading).parents('table').first();
  if (enclosing.length > 0) return enclosing;

  const ordered = $.root().find('body *').toArray();
  const start = ordered.indexOf(heading);
  for (let i = start + 1; i < ordered.length; i++) {
    if (ordered[i].tagName === 'table') {
      return $(ordered[i]);
    }
  }
  return null;
}

/**
 * Locate the contributions, expenditures and balance-summary tables.
 * A missing category is null. When several tables match a category the first
 * one wins and a warning is recorded.
 */
export function classifyTables($: CheerioAPI): ClassifiedTables {
  const warnings: string[] = [];
  const balanceSummary = findBalanceSummaryTable($, warnings);
  const balanceElement = balanceSummary?.get(0);

  const contributionTables: Element[] = [];
  const expenditureTables: Element[] = [];

  for (const table of $('table').toArray()) {
    if (table === balanceElement) continue;

    const header = tableHeaderText($, table).toLowerCase();
    if (header.includes('expenditure')) {
      expenditureTables.push(table);
    } else if (header.includes('contribution')) {
      contributionTables.push(table);
    }
  }

  if (contributionTables.length > 1) {
    warnings.push(`Found ${contributionTables.length} contribution tables; using the first`);
  }
  if (expenditureTables.length > 1) {
    warnings.push(`Found ${expenditureTables.length} expenditure tables; using the first`);
  }

  return {
    contributions: contributionTables.length > 0 ? $(contributionTables[0]) : null,
    expenditures: expenditureTables.length > 0 ? $(expenditureTables[0]) : null,
    balanceSummary,
    warnings,
  };
}

/**
 * All tables whose header mentions the keyword (case-insensitive), in
 * document order.
 */
export function findTablesByHeader($: CheerioAPI, keyword: string): Cheerio<Element>[] {
  const needle = keyword.toLowerCase();
  return $('table')
    .toArray()
    .filter(table => tableHeaderText($, table).toLowerCase().includes(needle))
    .map(table => $(table));
}
