import { describe, expect, it } from 'vitest';
import { loadFixture } from './__fixtures__/index.js';
import { isUsableLobbyistReport, parseLobbyistReport } from './lobbyist-report-parser.js';

const context = { id: '77', sourceUrl: 'https://lobbyist.example/Search/PublicSearch/Report/77' };

describe('parseLobbyistReport', () => {
  it('prefixes principal fieldset labels and reads the principal block', () => {
    const result = parseLobbyistReport(loadFixture('lobbyist-report.html'), context);
    if (!result.ok) throw new Error(result.failure.message);
    const report = result.value;

    expect(report.title).toBe('Q2 Expenditure Report For Lobbyist');
    expect(report.principalName).toBe('Utah Widget Association');
    expect(report.principalPhone).toBe('801-555-0142');
    expect(report.principalStreetAddress).toBe('50 State St');
    expect(report.principalCity).toBe('Salt Lake City');
    expect(report.principalState).toBe('UT');
    expect(report.principalZip).toBe('84111');
    expect(report.rawMetadata.get('Name')).toBe('Morgan Advocate');
    expect(report.reportType).toBe('Q2');
    expect(report.beginDate).toBe('2024-04-01');
    expect(report.endDate).toBe('2024-06-30');
  });

  it('reads location, purpose and the unlabeled amendment column', () => {
    const result = parseLobbyistReport(loadFixture('lobbyist-report.html'), context);
    if (!result.ok) throw new Error(result.failure.message);
    const [lunch, dinner] = result.value.expenditures;

    expect(result.value.expenditures).toHaveLength(2);
    expect(lunch).toMatchObject({
      recipientName: 'Sen. Example',
      location: 'Capitol Cafe',
      purpose: 'Lunch',
      date: '2024-04-12',
      isAmendment: true,
      isInKind: false,
      isLoan: false,
    });
    expect(dinner.isAmendment).toBe(false);
    expect(dinner.amount.toFixed(2)).toBe('88.00');
  });

  it('totals the rows when the page has no balance summary', () => {
    const result = parseLobbyistReport(loadFixture('lobbyist-report.html'), context);
    if (!result.ok) throw new Error(result.failure.message);

    expect(result.value.totalExpenditures.toFixed(2)).toBe('130.10');
    expect(isUsableLobbyistReport(result.value)).toBe(true);
  });

  it('uses the default report type and title when the page gives none', () => {
    const html = `<html><body><fieldset><div class="dis-cell"><label>Name:</label> Solo</div></fieldset></body></html>`;
    const result = parseLobbyistReport(html, context);
    if (!result.ok) throw new Error(result.failure.message);

    expect(result.value.reportType).toBe('Lobbyist Expenditure');
    expect(result.value.title).toBe('Lobbyist Expenditure Report');
    expect(result.value.principalName).toBe('Solo');
    expect(isUsableLobbyistReport(result.value)).toBe(false);
  });

  it('fails without metadata', () => {
    const result = parseLobbyistReport('<html><body><p>Not found</p></body></html>', context);
    expect(result.ok).toBe(false);
  });
});
