import { RawSessionRow } from '../types';

const COLUMNS: ReadonlyArray<keyof RawSessionRow> = [
  'sessionId',
  'type',
  'startTime',
  'endTime',
  'plannedMinutes',
  'actualMinutes',
  'completed',
  'focusScore',
  'efficiencyScore',
  'interruptions',
  'interactions',
];

/**
 * Escape CSV field
 */
export function escapeCSV(value: string | number | boolean | undefined): string {
  if (value === undefined) {
    return '';
  }

  const str = String(value);

  // If field contains comma, quote, or newline, wrap in quotes and escape quotes
  if (str.includes(',') || str.includes('"') || str.includes('\n')) {
    return `"${str.replace(/"/g, '""')}"`;
  }

  return str;
}

/**
 * Format session rows as CSV with a header line
 */
export function formatCsvSessions(rows: readonly RawSessionRow[]): string {
  const lines = [COLUMNS.join(',')];
  for (const row of rows) {
    lines.push(COLUMNS.map((column) => escapeCSV(row[column])).join(','));
  }
  return lines.join('\n');
}
