/**
 * Label/value metadata found on report and registration pages.
 */

import type { CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import type { RawMetadata } from '../types/index.js';
import { cleanText } from './extractors.js';

export interface PageMetadata {
  /** Text after the first " - " in the document title. */
  title: string;
  /** Text after "For " in the title, else the "X Information" legend. */
  organizationType: string;
  fields: RawMetadata;
}

export interface MetadataOptions {
  /** Prefix labels inside fieldsets whose legend mentions "Principal". */
  prefixPrincipalLabels?: boolean;
}

export function normalizeLabel(text: string): string {
  return cleanText(text).replace(/:$/, '').trim();
}

function setIfAbsent(fields: RawMetadata, label: string, value: string): void {
  if (label && value && !fields.has(label)) {
    fields.set(label, value);
  }
}

/** Text of an element with its label children removed. */
function textWithoutLabels($: CheerioAPI, el: Element): string {
  const copy = $(el).clone();
  copy.find('label').remove();
  return cleanText(copy.text());
}

function readTitle($: CheerioAPI): { title: string; organizationType: string } {
  const raw = cleanText($('title').first().text());
  if (!raw) return { title: '', organizationType: '' };

  const dash = raw.indexOf(' - ');
  const title = dash === -1 ? raw : raw.slice(dash + 3).trim();
  const forIndex = title.lastIndexOf('For ');
  const organizationType = forIndex === -1 ? '' : title.slice(forIndex + 4).trim();
  return { title, organizationType };
}

/**
 * Collect page metadata. Fieldset cells are read first; `div.row` pairs only
 * fill labels the fieldsets did not provide.
 */
export function extractPageMetadata($: CheerioAPI, options: MetadataOptions = {}): PageMetadata {
  const { title, organizationType: titleType } = readTitle($);
  const fields: RawMetadata = new Map();
  let legendType = '';

  for (const fieldset of $('fieldset').toArray()) {
    const legend = cleanText($(fieldset).children('legend').first().text());
    const information = /^(.+?)\s+Information$/i.exec(legend);
    if (information && !legendType) {
      legendType = information[1];
    }

    const prefix = options.prefixPrincipalLabels && /principal/i.test(legend) ? 'Principal ' : '';

    for (const cell of $(fieldset).find('div.dis-cell').toArray()) {
      const label = normalizeLabel($(cell).find('label').first().text());
      if (!label) continue;
      const fullLabel = prefix && !label.startsWith('Principal') ? `${prefix}${label}` : label;
      setIfAbsent(fields, fullLabel, textWithoutLabels($, cell));
    }
  }

  for (const row of $('div.row').toArray()) {
    const cells = $(row)
      .find('div')
      .toArray()
      .filter(div => /\bcol-md-\d+\b/.test($(div).attr('class') ?? ''));

    for (let i = 0; i + 1 < cells.length; i += 2) {
      const label = normalizeLabel($(cells[i]).text());
      const value = cleanText($(cells[i + 1]).text());
      // A value holding a colon is another label; the pair is misaligned
      if (value.includes(':')) continue;
      setIfAbsent(fields, label, value);
    }
  }

  return { title, organizationType: titleType || legendType, fields };
}

export interface LabeledField {
  label: string;
  value: string;
}

/**
 * The value of a label is the text of its enclosing div after the label
 * text. Labels whose div text does not start with them carry no value.
 */
export function readLabel($: CheerioAPI, labelEl: Element): LabeledField | null {
  const labelText = cleanText($(labelEl).text());
  const container = $(labelEl).closest('div');
  if (!labelText || container.length === 0) return null;

  const containerText = cleanText(container.text());
  if (!containerText.startsWith(labelText)) return null;

  return {
    label: normalizeLabel(labelText),
    value: cleanText(containerText.slice(labelText.length)),
  };
}

/**
 * Label/value pairs from every `label` on the page. The first occurrence of
 * a label wins; labels without a value are left out.
 */
export function extractLabeledFields($: CheerioAPI, labels: Element[] = $('label').toArray()): RawMetadata {
  const fields: RawMetadata = new Map();

  for (const labelEl of labels) {
    const field = readLabel($, labelEl);
    if (field) setIfAbsent(fields, field.label, field.value);
  }

  return fields;
}

/** Value of the first label accepted by the predicate. */
export function findField(fields: RawMetadata, predicate: (label: string) => boolean): string {
  for (const [label, value] of fields) {
    if (predicate(label)) return value;
  }
  return '';
}

/** First non-empty value among the given labels. */
export function pickField(fields: RawMetadata, ...labels: string[]): string {
  for (const label of labels) {
    const value = fields.get(label);
    if (value) return value;
  }
  return '';
}
