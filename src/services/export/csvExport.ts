import type { ParseResult } from '../../types';

export const CSV_COLUMNS = [
  'index',
  'status',
  'authors',
  'title',
  'year',
  'venue',
  'volume',
  'issue',
  'pages',
  'publisher',
  'doi',
  'urls',
  'raw',
  'error',
] as const;

function escapeCell(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

function row(result: ParseResult): string[] {
  const index = String(result.candidate.index + 1);
  if (!result.ok) {
    const { failure } = result;
    return [index, 'failed', '', '', '', '', '', '', '', '', '', '', failure.raw, `${failure.kind}: ${failure.message}`];
  }
  const r = result.record;
  return [
    index,
    'ok',
    r.authors.join('; '),
    r.title,
    r.year !== undefined ? String(r.year) : '',
    r.venue ?? '',
    r.volume ?? '',
    r.issue ?? '',
    r.pages ?? '',
    r.publisher ?? '',
    r.doi ?? '',
    r.urls.join(' '),
    r.raw,
    '',
  ];
}

/**
 * One CSV row per parse result, header first, CRLF line endings
 */
export function resultsToCsv(results: readonly ParseResult[]): string {
  const lines = [CSV_COLUMNS.join(','), ...results.map(r => row(r).map(escapeCell).join(','))];
  return `${lines.join('\r\n')}\r\n`;
}
