import type { FormattedRow } from './types.ts';

function toCells(row: FormattedRow): string[] {
  return [
    row.hostname,
    row.notBeforeDisplay,
    row.notAfterDisplay,
    String(row.daysRemaining),
    row.status,
  ];
}

/**
 * Whitespace-aligned table, one row per line, no header.
 * Columns are padded to their widest cell and joined by two spaces.
 */
export function renderTable(rows: readonly FormattedRow[]): string {
  if (rows.length === 0) return '';

  const cells = rows.map(toCells);
  const widths = cells[0].map((_, col) => Math.max(...cells.map((line) => line[col].length)));

  return cells
    .map((line) =>
      line
        .map((cell, col) => (col === line.length - 1 ? cell : cell.padEnd(widths[col])))
        .join('  ')
    )
    .join('\n') + '\n';
}

export function renderNames(rows: readonly FormattedRow[]): string {
  if (rows.length === 0) return '';
  return rows.map((row) => row.hostname).join('\n') + '\n';
}
