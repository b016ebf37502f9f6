/**
 * Lobbyist registration parser
 */

import * as cheerio from 'cheerio';
import type { PageContext, ParsedLobbyistEntity, ParsedPrincipal, ParseResult } from '../types/index.js';
import { cleanText, extractDate } from './extractors.js';
import { extractLabeledFields, findField, pickField } from './metadata.js';
import { emptyPageFailure, noMetadataFailure } from './report-parser.js';
import { findTablesByHeader } from './table-classifier.js';

export function parseLobbyistEntity(html: string, context: PageContext): ParseResult<ParsedLobbyistEntity> {
  const empty = emptyPageFailure<ParsedLobbyistEntity>(html);
  if (empty) return empty;

  const $ = cheerio.load(html);
  const fields = extractLabeledFields($);
  if (fields.size === 0) return noMetadataFailure(context);

  const has = (needle: string) => (label: string) => label.includes(needle);

  const firstName = findField(fields, has('First Name'));
  const lastName = findField(fields, has('Last Name'));
  const organizationName = findField(fields, has('Organization Name'));
  const principalName = findField(fields, has('Principal Name'));

  let name = '';
  if (firstName && lastName) name = `${firstName} ${lastName}`;
  else name = organizationName || principalName;

  const principals: ParsedPrincipal[] = [];
  for (const table of findTablesByHeader($, 'Principal')) {
    for (const row of table.find('tr').toArray()) {
      const cells = $(row)
        .children('td')
        .toArray()
        .map(cell => cleanText($(cell).text()));
      if (cells.length < 2 || !cells[0]) continue;

      principals.push({
        name: cells[0],
        contact: cells[1],
        phone: cells[2] ?? '',
        address: cells[3] ?? '',
        order: principals.length,
      });
    }
  }

  const entity: ParsedLobbyistEntity = {
    entityId: context.id,
    sourceUrl: context.sourceUrl,
    firstName,
    lastName,
    name,
    phone: pickField(fields, 'Telephone', 'Phone'),
    registrationDate: extractDate(findField(fields, has('Registration Date'))),
    organizationName,
    organizationPhone: pickField(fields, 'Organization Phone', 'Organization Telephone'),
    streetAddress: pickField(fields, 'Street Address'),
    city: pickField(fields, 'City'),
    state: pickField(fields, 'State'),
    zipCode: pickField(fields, 'Zip'),
    principalName,
    principalPhone: pickField(fields, 'Principal Phone', 'Principal Telephone'),
    principalAddress: pickField(fields, 'Principal Address'),
    lobbyingPurposes: findField(fields, label => label.includes('General Purposes') || label.includes('Nature')),
    rawMetadata: fields,
    principals,
  };

  return { ok: true, value: entity };
}
