/**
 * Output Formatting for CLI Commands
 *
 * Status-count tables and JSON output shared by `verify` and `summary`.
 *
 * @module cli/lib/output
 */

import { VERIFICATION_STATUSES, type VerificationStatus } from '../../core/types.js';

/**
 * Column definition for table output
 */
export interface TableColumn {
  readonly key: string;
  readonly header: string;
  readonly align?: 'left' | 'right';
}

/**
 * Format data as a table
 */
export function formatTable<T extends Record<string, unknown>>(
  data: readonly T[],
  columns: readonly TableColumn[]
): string {
  if (data.length === 0) {
    return 'No entries found.';
  }

  const widths = columns.map((col) =>
    Math.max(col.header.length, ...data.map((row) => String(row[col.key] ?? '').length))
  );

  const headerRow = columns
    .map((col, i) => padCell(col.header, widths[i], col.align ?? 'left'))
    .join(' | ');

  const separator = widths.map((w) => '-'.repeat(w)).join('-+-');

  const dataRows = data.map((row) =>
    columns
      .map((col, i) => padCell(String(row[col.key] ?? ''), widths[i], col.align ?? 'left'))
      .join(' | ')
  );

  return [headerRow, separator, ...dataRows].join('\n');
}

function padCell(value: string, width: number, align: 'left' | 'right'): string {
  return align === 'right' ? value.padStart(width) : value.padEnd(width);
}

/**
 * Format data as JSON
 */
export function formatJson<T>(data: T, pretty = true): string {
  return pretty ? JSON.stringify(data, null, 2) : JSON.stringify(data);
}

/**
 * One row per status, in persistence order, with its share of the total
 */
export function formatStatusTable(counts: Readonly<Record<VerificationStatus, number>>): string {
  const total = VERIFICATION_STATUSES.reduce((sum, status) => sum + counts[status], 0);

  const rows: { status: string; count: number; share: string }[] = VERIFICATION_STATUSES.map((status) => ({
    status,
    count: counts[status],
    share: total === 0 ? '0.0%' : `${((counts[status] / total) * 100).toFixed(1)}%`,
  }));
  rows.push({ status: 'total', count: total, share: total === 0 ? '0.0%' : '100.0%' });

  return formatTable(rows, [
    { key: 'status', header: 'Status' },
    { key: 'count', header: 'Count', align: 'right' },
    { key: 'share', header: 'Share', align: 'right' },
  ]);
}

/**
 * Print output to console
 */
export function printOutput(output: string): void {
  console.log(output);
}

/**
 * Print error to stderr
 */
export function printError(message: string): void {
  console.error(`Error: ${message}`);
}
