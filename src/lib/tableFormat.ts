/**
 * Plain-text tables and CSV for the command-line scripts
 */

export type Align = 'left' | 'right';

export interface Column {
  header: string;
  align?: Align;
}

export function formatNumber(value: number | null | undefined, decimals: number = 2): string {
  if (value === null || value === undefined || !Number.isFinite(value)) return '--';
  return value.toFixed(decimals);
}

export function formatSigned(value: number | null | undefined, decimals: number = 2): string {
  if (value === null || value === undefined || !Number.isFinite(value)) return '--';
  const text = value.toFixed(decimals);
  return value > 0 ? `+${text}` : text;
}

export function formatTable(columns: readonly Column[], rows: readonly (readonly string[])[]): string {
  const widths = columns.map((column, i) =>
    Math.max(column.header.length, ...rows.map((row) => (row[i] ?? '').length))
  );
  const pad = (text: string, i: number) =>
    columns[i].align === 'right' ? text.padStart(widths[i]) : text.padEnd(widths[i]);

  const lines = [
    columns.map((column, i) => pad(column.header, i)).join('  '),
    widths.map((w) => '-'.repeat(w)).join('  '),
    ...rows.map((row) => columns.map((_, i) => pad(row[i] ?? '', i)).join('  ')),
  ];
  return lines.map((line) => line.trimEnd()).join('\n');
}

function csvCell(value: string): string {
  return /[",\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function toCsv(headers: readonly string[], rows: readonly (readonly string[])[]): string {
  return [headers, ...rows].map((row) => row.map(csvCell).join(',')).join('\n') + '\n';
}
