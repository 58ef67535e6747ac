import type { CsvCell, CsvRow } from '../types';

function escape_cell(v: CsvCell): string {
  if (v === null) return '';
  const s = String(v);
  return /[",\r\n]/.test(s) ? `"${s.replace(/"/g, '""')}"` : s;
}

export function csv_line(cells: readonly CsvCell[]): string {
  return cells.map(escape_cell).join(',') + '\n';
}

/** 表头取第一行的键；空行集返回空串 */
export function to_csv(rows: readonly CsvRow[]): string {
  if (rows.length === 0) return '';
  const keys = Object.keys(rows[0]);
  let out = csv_line(keys);
  for (const r of rows) {
    out += csv_line(keys.map((k) => r[k] ?? null));
  }
  return out;
}
