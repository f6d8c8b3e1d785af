/**
 * Table output format: human-readable terminal output.
 */

import chalk from 'chalk';

type TableRow = Record<string, unknown>;

const MAX_CELL = 80;

function isRow(value: unknown): value is TableRow {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Format data as a human-readable table.
 */
export function formatTable(data: unknown): string {
  if (data === null || data === undefined) {
    return '';
  }

  if (Array.isArray(data)) {
    if (data.length === 0) return 'No results.\n';
    const rows = data.filter(isRow);
    if (rows.length === data.length) {
      return renderObjectTable(rows);
    }
    return data.map(String).join('\n') + '\n';
  }

  if (isRow(data)) {
    return renderKeyValue(data);
  }

  return String(data) + '\n';
}

/**
 * Columns are the union of every row's keys, in first-seen order.
 */
export function renderObjectTable(rows: TableRow[]): string {
  const keys: string[] = [];
  for (const row of rows) {
    for (const key of Object.keys(row)) {
      if (!keys.includes(key)) keys.push(key);
    }
  }
  const widths = keys.map((k) =>
    Math.max(k.length, ...rows.map((r) => formatCellValue(r[k]).length))
  );
  const widthAt = (i: number): number => widths[i] ?? 0;

  const lines: string[] = [];

  // Header
  lines.push(chalk.bold(keys.map((k, i) => k.padEnd(widthAt(i))).join('  ')));
  lines.push(chalk.dim(widths.map((w) => '─'.repeat(w)).join('──')));

  for (const row of rows) {
    lines.push(keys.map((k, i) => formatCellValue(row[k]).padEnd(widthAt(i))).join('  '));
  }

  return lines.join('\n') + '\n';
}

/**
 * Arrays of objects are shown as counts, long strings truncated.
 */
export function formatCellValue(v: unknown): string {
  if (v === null || v === undefined) return '';
  if (Array.isArray(v)) {
    if (v.length === 0) return '0';
    if (v.every((item) => typeof item !== 'object' || item === null)) return v.join(', ');
    return String(v.length);
  }
  if (typeof v === 'number' && !Number.isInteger(v)) return v.toFixed(3);
  if (typeof v === 'object') return JSON.stringify(v);
  const s = String(v);
  if (s.length > MAX_CELL) return s.slice(0, MAX_CELL - 3) + '...';
  return s;
}

function renderKeyValue(obj: TableRow): string {
  const entries = Object.entries(obj);
  if (entries.length === 0) return 'No data.\n';

  const maxKeyLen = Math.max(...entries.map(([k]) => k.length));
  return (
    entries.map(([k, v]) => `${chalk.cyan(k.padEnd(maxKeyLen))}  ${formatValue(v)}`).join('\n') +
    '\n'
  );
}

function formatValue(v: unknown): string {
  if (v === null || v === undefined) return '—';
  if (Array.isArray(v) && v.length > 0 && v.every(isRow)) {
    return '\n' + renderObjectTable(v).trimEnd();
  }
  if (typeof v === 'object') return JSON.stringify(v);
  return String(v);
}
