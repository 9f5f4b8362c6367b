import type { QueryCell, QueryResult } from '@reelstats/core';

export function toCsvValue(value: QueryCell): string {
  if (value === null) {
    return '';
  }
  const text = String(value);
  if (text.includes(',') || text.includes('"') || text.includes('\n') || text.includes('\r')) {
    return `"${text.replaceAll('"', '""')}"`;
  }
  return text;
}

export function toCsv(rows: ReadonlyArray<ReadonlyArray<QueryCell>>): string {
  return rows.map((row) => row.map((value) => toCsvValue(value)).join(',')).join('\n');
}

/** Header line followed by one line per row, cells in column order. */
export function buildQueryResultCsv(result: QueryResult): string {
  const body = result.rows.map((row) => result.columns.map((column) => row[column] ?? null));
  return toCsv([result.columns, ...body]);
}

export function buildQueryErrorCsv(message: string, sql: string): string {
  return toCsv([
    ['error', 'query'],
    [message, sql],
  ]);
}
