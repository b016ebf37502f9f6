/**
 * Entity registration parser
 *
 * Registration pages are label/value divs. Officers sit under bold
 * "Name of ..." headings, each followed by their own labels.
 */

import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import type { PageContext, ParsedEntity, ParsedOfficer, ParseResult } from '../types/index.js';
import { cleanText, extractDate, parseAddress } from './extractors.js';
import { extractLabeledFields, pickField, readLabel } from './metadata.js';
import { emptyPageFailure, noMetadataFailure } from './report-parser.js';

const OFFICER_HEADINGS = ['Name of Primary Officer', 'Name of additional', 'Name of the PAC Chief Financial Officer'];

function isBoldHeading($: CheerioAPI, el: Element): boolean {
  if (el.tagName === 'strong' || el.tagName === 'b') return true;
  const style = ($(el).attr('style') ?? '').replace(/\s+/g, '');
  return el.tagName === 'span' && style.includes('font-weight:bold');
}

function isOfficerHeading(text: string): boolean {
  return OFFICER_HEADINGS.some(heading => text.includes(heading));
}

interface OfficerDraft {
  heading: string;
  labels: Element[];
}

/**
 * Split the document into officer blocks: each officer heading collects the
 * labels after it up to the next bold heading.
 */
function collectOfficerBlocks($: CheerioAPI): OfficerDraft[] {
  const blocks: OfficerDraft[] = [];
  let current: OfficerDraft | null = null;

  for (const el of $.root().find('body *').toArray()) {
    if (isBoldHeading($, el)) {
      const text = cleanText($(el).text());
      if (isOfficerHeading(text)) {
        current = { heading: text, labels: [] };
        blocks.push(current);
      } else {
        current = null;
      }
      continue;
    }
    if (current && el.tagName === 'label') {
      current.labels.push(el);
    }
  }

  return blocks;
}

function buildOfficer($: CheerioAPI, block: OfficerDraft, order: number): ParsedOfficer | null {
  const officer: ParsedOfficer = {
    name: '',
    title: '',
    occupation: '',
    phone: '',
    email: '',
    streetAddress: '',
    suitePoBox: '',
    city: '',
    state: '',
    zipCode: '',
    order,
    isTreasurer: /Chief Financial Officer|Treasurer/.test(block.heading),
  };
  const nameParts = { first: '', middle: '', last: '' };

  for (const labelEl of block.labels) {
    const field = readLabel($, labelEl);
    if (!field || !field.value) continue;
    const { label, value } = field;

    if (label.includes('First')) nameParts.first = value;
    else if (label.includes('Middle')) nameParts.middle = value;
    else if (label.includes('Last')) nameParts.last = value;
    else if (label === 'Title') officer.title = value;
    else if (label === 'Occupation') officer.occupation = value;
    else if (label === 'Phone') officer.phone = value;
    else if (label === 'Email') officer.email = value;
    else if (label === 'Suite/PO Box') officer.suitePoBox = value;
    else if (label.includes('Address')) Object.assign(officer, parseAddress(value));
  }

  officer.name = [nameParts.first, nameParts.middle, nameParts.last].filter(Boolean).join(' ');
  return officer.name ? officer : null;
}

export function parseEntityRegistration(html: string, context: PageContext): ParseResult<ParsedEntity> {
  const empty = emptyPageFailure<ParsedEntity>(html);
  if (empty) return empty;

  const $ = cheerio.load(html);
  const fields = extractLabeledFields($);
  const name = pickField(fields, 'Name');
  if (!name && fields.size === 0) return noMetadataFailure(context);

  const officers: ParsedOfficer[] = [];
  for (const block of collectOfficerBlocks($)) {
    const officer = buildOfficer($, block, officers.length);
    if (officer) officers.push(officer);
  }

  const entity: ParsedEntity = {
    entityId: context.id,
    sourceUrl: context.sourceUrl,
    name,
    alsoKnownAs: pickField(fields, 'Also known as'),
    entityType: pickField(fields, 'Type', 'Entity Type', 'Registration Type'),
    status: pickField(fields, 'Status'),
    dateCreated: extractDate(fields.get('Date Created')),
    streetAddress: pickField(fields, 'Street Address'),
    suitePoBox: pickField(fields, 'Suite/PO Box'),
    city: pickField(fields, 'City'),
    state: pickField(fields, 'State'),
    zipCode: pickField(fields, 'Zip'),
    rawMetadata: fields,
    officers,
  };

  return { ok: true, value: entity };
}
