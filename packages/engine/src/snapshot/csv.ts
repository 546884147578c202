import type { SnapshotRow, SnapshotValue } from '../core/types/regime.types.js';

function escapeCell(value: SnapshotValue | undefined): string {
  if (value === undefined) return '';
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

/**
 * Column order: keys in first-seen order across all rows
 */
export function snapshotColumns(rows: readonly SnapshotRow[]): string[] {
  const columns: string[] = [];
  const seen = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row)) {
      if (!seen.has(key)) {
        seen.add(key);
        columns.push(key);
      }
    }
  }
  return columns;
}

/**
 * Render snapshot rows as CSV text with a trailing newline
 */
export function formatSnapshotCsv(rows: readonly SnapshotRow[]): string {
  const columns = snapshotColumns(rows);
  const lines = [columns.map(c => escapeCell(c)).join(',')];
  for (const row of rows) {
    lines.push(columns.map(c => escapeCell(row[c])).join(','));
  }
  return `${lines.join('\n')}\n`;
}
