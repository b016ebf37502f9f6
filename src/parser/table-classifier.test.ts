import { describe, expect, it } from 'vitest';
import * as cheerio from 'cheerio';
import { classifyTables, findTablesByHeader, tableHeaderText } from './table-classifier.js';

function page(body: string) {
  return cheerio.load(`<html><body>${body}</body></html>`);
}

const contributions = (id: string) => `
  <table id="${id}">
    <thead><tr><th>Date</th><th>Contributor Name</th><th>Amount</th></tr></thead>
    <tbody><tr><td>1/2/2024</td><td>Jane</td><td>$10.00</td></tr></tbody>
  </table>`;

const expenditures = `
  <table id="exp">
    <thead><tr><th colspan="3">Itemized Expenditures</th></tr></thead>
    <tbody></tbody>
  </table>`;

describe('classifyTables', () => {
  it('classifies by header text regardless of position', () => {
    const $ = page(`${expenditures}${contributions('con')}`);
    const result = classifyTables($);

    expect(result.expenditures?.attr('id')).toBe('exp');
    expect(result.contributions?.attr('id')).toBe('con');
    expect(result.balanceSummary).toBeNull();
    expect(result.warnings).toEqual([]);
  });

  it('puts tables naming both kinds with expenditures', () => {
    const $ = page(`
      <table id="both"><tr><th>Contributions and Expenditures</th></tr></table>
    `);
    const result = classifyTables($);

    expect(result.contributions).toBeNull();
    expect(result.expenditures?.attr('id')).toBe('both');
  });

  it('takes the first of several matches and warns', () => {
    const $ = page(`${contributions('first')}${contributions('second')}`);
    const result = classifyTables($);

    expect(result.contributions?.attr('id')).toBe('first');
    expect(result.warnings).toEqual(['Found 2 contribution tables; using the first']);
  });

  it('finds tables that have no body rows', () => {
    const $ = page(expenditures);
    expect(classifyTables($).expenditures?.find('tbody tr')).toHaveLength(0);
    expect(classifyTables($).expenditures?.attr('id')).toBe('exp');
  });

  it('takes the table after the Balance Summary heading and keeps it out of the other categories', () => {
    const $ = page(`
      <div><h3><strong>Balance Summary</strong></h3></div>
      <table id="balance">
        <thead><tr><th>Line</th><th>Contributions and Expenditures</th><th>Amount</th></tr></thead>
        <tr><td>1</td><td>Ending Balance</td><td>$5.00</td></tr>
      </table>
      ${contributions('con')}
    `);
    const result = classifyTables($);

    expect(result.balanceSummary?.attr('id')).toBe('balance');
    expect(result.expenditures).toBeNull();
    expect(result.contributions?.attr('id')).toBe('con');
  });

  it('uses the enclosing table when the heading is its caption', () => {
    const $ = page(`
      <table id="balance"><caption>Balance Summary</caption><tr><td>Ending Balance</td><td>1</td></tr></table>
    `);
    expect(classifyTables($).balanceSummary?.attr('id')).toBe('balance');
  });

  it('leaves every category empty for a page without tables', () => {
    const result = classifyTables(page('<p>Nothing here</p>'));
    expect(result).toEqual({ contributions: null, expenditures: null, balanceSummary: null, warnings: [] });
  });
});

describe('tableHeaderText', () => {
  it('falls back to the first row header cells', () => {
    const $ = page('<table id="t"><tr><th>Name</th><th>Phone</th></tr><tr><td>a</td><td>b</td></tr></table>');
    expect(tableHeaderText($, $('#t').toArray()[0])).toBe('Name Phone');
  });
});

describe('findTablesByHeader', () => {
  it('matches case-insensitively in document order', () => {
    const $ = page(`
      <table id="a"><tr><th>Principal Name</th></tr></table>
      <table id="b"><tr><th>Other</th></tr></table>
      <table id="c"><thead><tr><th>PRINCIPALS</th></tr></thead></table>
    `);
    expect(findTablesByHeader($, 'principal').map(t => t.attr('id'))).toEqual(['a', 'c']);
  });
});
