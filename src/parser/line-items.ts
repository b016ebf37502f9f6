/**
 * Line-item rows
 *
 * Reads the body rows of a contributions or expenditures table into raw
 * cell values. Columns are located by header label where the header names
 * them; otherwise the positional layout applies: date, name, detail column,
 * then the flag columns and the amount at the end.
 */

import type { Cheerio, CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import { cleanText, extractFlag, looksLikeCurrency } from './extractors.js';

export type ColumnRole =
  | 'date'
  | 'name'
  | 'address'
  | 'purpose'
  | 'location'
  | 'inKind'
  | 'publicService'
  | 'loan'
  | 'amendment'
  | 'amount';

export type ColumnMap = Partial<Record<ColumnRole, number>>;

export interface HeaderColumns {
  roles: ColumnMap;
  /** Indexes of header cells with no text, such as unlabeled flag columns. */
  blank: Set<number>;
}

export interface RawLineItem {
  dateText: string;
  name: string;
  address: string;
  purpose: string;
  location: string;
  amountText: string;
  isInKind: boolean;
  isLoan: boolean;
  isAmendment: boolean;
}

export type LineItemLayout = 'contribution' | 'expenditure' | 'lobbyist';

const MIN_POSITIONAL_CELLS: Record<LineItemLayout, number> = {
  contribution: 7,
  expenditure: 7,
  lobbyist: 6,
};

export function roleForHeader(text: string): ColumnRole | null {
  const label = cleanText(text).toLowerCase().replace(/[:.]/g, '');
  if (!label) return null;

  if (label === 'i' || /in[- ]?kind/.test(label)) return 'inKind';
  if (label === 'p' || label.includes('public service')) return 'publicService';
  if (label === 'l' || label.startsWith('loan')) return 'loan';
  if (label === 'a' || label.startsWith('amend')) return 'amendment';
  if (label.includes('amount')) return 'amount';
  if (label.includes('date')) return 'date';
  if (label.includes('address')) return 'address';
  if (label.includes('purpose') || label.includes('description')) return 'purpose';
  if (label.includes('location')) return 'location';
  if (/name|contributor|recipient|payee/.test(label)) return 'name';
  return null;
}

/** Rows of `th` cells, and every row inside `thead` whatever its cells. */
function isHeaderRow($: CheerioAPI, row: Element): boolean {
  return $(row).children('td').length === 0 || $(row).closest('thead').length > 0;
}

/**
 * Column map from the table header: the header row with the most cells,
 * with `colspan` expanded. Returns null unless the header names the amount.
 */
export function resolveColumns($: CheerioAPI, table: Cheerio<Element>): HeaderColumns | null {
  const headerRows = table
    .find('tr')
    .toArray()
    .filter(row => isHeaderRow($, row));
  if (headerRows.length === 0) return null;

  const widest = headerRows.reduce((best, row) =>
    $(row).children().length > $(best).children().length ? row : best
  );

  const roles: ColumnMap = {};
  const blank = new Set<number>();
  let index = 0;
  for (const cell of $(widest).children('th, td').toArray()) {
    const span = Math.max(1, Number($(cell).attr('colspan') ?? '1') || 1);
    const text = cleanText($(cell).text());
    const role = roleForHeader(text);
    if (role && roles[role] === undefined) {
      roles[role] = index;
    }
    if (!text) {
      for (let i = index; i < index + span; i++) blank.add(i);
    }
    index += span;
  }

  return roles.amount === undefined ? null : { roles, blank };
}

const FLAG_OFFSETS = { amendment: 1, loan: 2, inKind: 3 } as const;

/**
 * Flag columns the header leaves unlabeled take their positional place
 * before the amount.
 */
function withPositionalFlags(columns: HeaderColumns, layout: LineItemLayout): ColumnMap {
  const roles: ColumnMap = { ...columns.roles };
  const amount = columns.roles.amount;
  if (amount === undefined) return roles;

  const flags = layout === 'lobbyist' ? (['amendment'] as const) : (['amendment', 'loan', 'inKind'] as const);
  for (const flag of flags) {
    const index = amount - FLAG_OFFSETS[flag];
    if (roles[flag] === undefined && columns.blank.has(index)) {
      roles[flag] = index;
    }
  }
  return roles;
}

function isTotalsRow(texts: string[]): boolean {
  const filled = texts.filter(Boolean);
  if (filled.length === 0) return true;
  return /^(grand\s+)?totals?:?$/i.test(filled[0]);
}

function readWithColumns($: CheerioAPI, cells: Element[], columns: ColumnMap): RawLineItem | null {
  const at = (role: ColumnRole): Cheerio<Element> | undefined => {
    const index = columns[role];
    return index === undefined || index >= cells.length ? undefined : $(cells[index]);
  };
  const text = (role: ColumnRole): string => cleanText(at(role)?.text());

  if (columns.amount === undefined || columns.amount >= cells.length) return null;

  return {
    dateText: text('date'),
    name: text('name'),
    address: text('address'),
    purpose: text('purpose'),
    location: text('location'),
    amountText: text('amount'),
    isInKind: extractFlag(at('inKind')),
    isLoan: extractFlag(at('loan')),
    isAmendment: extractFlag(at('amendment')),
  };
}

function readPositional($: CheerioAPI, cells: Element[], layout: LineItemLayout): RawLineItem | null {
  if (cells.length < MIN_POSITIONAL_CELLS[layout]) return null;

  const texts = cells.map(cell => cleanText($(cell).text()));
  let amountIndex = texts.length - 1;
  for (let i = texts.length - 1; i >= 2; i--) {
    if (looksLikeCurrency(texts[i])) {
      amountIndex = i;
      break;
    }
  }

  const flag = (offset: number): boolean => {
    const index = amountIndex - offset;
    return index >= 2 ? extractFlag($(cells[index])) : false;
  };

  const base = {
    dateText: texts[0],
    name: texts[1],
    amountText: texts[amountIndex],
    isAmendment: flag(1),
  };

  if (layout === 'lobbyist') {
    return { ...base, address: '', location: texts[2], purpose: texts[3], isInKind: false, isLoan: false };
  }

  // Date, Name, Address|Purpose, In Kind, Loan, Amendment, Amount
  return {
    ...base,
    address: layout === 'contribution' ? texts[2] : '',
    purpose: layout === 'expenditure' ? texts[2] : '',
    location: '',
    isInKind: flag(3),
    isLoan: flag(2),
  };
}

export interface LineItemRows {
  items: RawLineItem[];
  /** Data rows that could not be read, such as rows too short for the layout. */
  skipped: number;
}

/**
 * Body rows of a line-item table. Header, totals and empty rows are passed
 * over; rows too short for the layout are skipped and counted.
 */
export function readLineItems($: CheerioAPI, table: Cheerio<Element>, layout: LineItemLayout): LineItemRows {
  const header = resolveColumns($, table);
  const columns = header ? withPositionalFlags(header, layout) : null;
  const items: RawLineItem[] = [];
  let skipped = 0;

  for (const row of table.find('tr').toArray()) {
    if (isHeaderRow($, row)) continue;

    const cells = $(row).children('td').toArray();
    const texts = cells.map(cell => cleanText($(cell).text()));
    if (isTotalsRow(texts)) continue;

    const item = columns ? readWithColumns($, cells, columns) : readPositional($, cells, layout);
    if (item) {
      items.push(item);
    } else {
      skipped++;
    }
  }

  return { items, skipped };
}
