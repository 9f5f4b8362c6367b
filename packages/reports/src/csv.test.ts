import { describe, expect, it } from 'vitest';
import { buildQueryErrorCsv, buildQueryResultCsv, toCsvValue } from './csv.ts';

describe('toCsvValue', () => {
  it('leaves plain values unquoted', () => {
    expect(toCsvValue('Drama')).toBe('Drama');
    expect(toCsvValue(1234567.89)).toBe('1234567.89');
    expect(toCsvValue(null)).toBe('');
  });

  it('quotes commas, quotes and line breaks', () => {
    expect(toCsvValue('USA, UK')).toBe('"USA, UK"');
    expect(toCsvValue('The "Quiet" Orchard')).toBe('"The ""Quiet"" Orchard"');
    expect(toCsvValue('line one\nline two')).toBe('"line one\nline two"');
    expect(toCsvValue('carriage\rreturn')).toBe('"carriage\rreturn"');
  });
});

describe('buildQueryResultCsv', () => {
  it('writes a header and cells in column order', () => {
    const csv = buildQueryResultCsv({
      id: 'Q08',
      segment: 1,
      label: 'Movies in English and at least one other language',
      columns: ['title', 'languages'],
      rows: [
        { languages: 'English, French', title: 'Harbor Lights' },
        { languages: 'Hindi, English', title: 'The Quiet Orchard' },
      ],
    });

    expect(csv).toBe(
      ['title,languages', 'Harbor Lights,"English, French"', 'The Quiet Orchard,"Hindi, English"'].join('\n'),
    );
  });

  it('writes only the header for empty results', () => {
    const csv = buildQueryResultCsv({ id: 'Q06', segment: 1, label: 'Movies a given actor acted in', columns: ['title', 'year'], rows: [] });
    expect(csv).toBe('title,year');
  });
});

describe('buildQueryErrorCsv', () => {
  it('writes the error message and the query text under an error,query header', () => {
    const csv = buildQueryErrorCsv('no such column: mv.budget', 'SELECT title, budget\nFROM movie mv');
    expect(csv).toBe('error,query\nno such column: mv.budget,"SELECT title, budget\nFROM movie mv"');
  });
});
