import type { InstallStats } from '../types/index.js';

/**
 * Formatting utilities for consistent display across commands
 */

const SIZE_UNITS = ['', 'Ki', 'Mi', 'Gi', 'Ti', 'Pi', 'Ei', 'Zi'] as const;

/**
 * Human-readable binary size, e.g. `512.0B`, `1.5KiB`, `3.0MiB`.
 */
export function formatSize(bytes: number, suffix: string = 'B'): string {
  let value = bytes;
  for (const unit of SIZE_UNITS) {
    if (Math.abs(value) < 1024) {
      return `${value.toFixed(1)}${unit}${suffix}`;
    }
    value /= 1024;
  }
  return `${value.toFixed(1)}Yi${suffix}`;
}

/**
 * Size and entry count of an install, e.g. `1.5KiB in 3 files`
 */
export function formatStatsSummary(stats: InstallStats): string {
  return `${formatSize(stats.size)} in ${stats.nFiles} files`;
}

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Install timestamp as `dd/mm/yy, HH:MM` (UTC). Unparseable input is
 * returned unchanged.
 */
export function formatInstalledAt(isoTimestamp: string): string {
  const date = new Date(isoTimestamp);
  if (Number.isNaN(date.getTime())) {
    return isoTimestamp;
  }
  return `${pad2(date.getUTCDate())}/${pad2(date.getUTCMonth() + 1)}/${pad2(date.getUTCFullYear() % 100)}, ` +
    `${pad2(date.getUTCHours())}:${pad2(date.getUTCMinutes())}`;
}

export type ColumnAlign = 'left' | 'right';

export interface TableColumn<T> {
  header: string;
  accessor: (item: T) => string;
  align?: ColumnAlign;
}

/**
 * Render items as a bordered ASCII table. Column widths follow the widest
 * cell.
 */
export function renderTable<T>(items: readonly T[], columns: ReadonlyArray<TableColumn<T>>): string {
  const rows = items.map(item => columns.map(col => col.accessor(item)));
  const widths = columns.map((col, index) =>
    Math.max(col.header.length, ...rows.map(row => (row[index] ?? '').length))
  );

  const fit = (text: string, index: number): string => {
    const width = widths[index] ?? text.length;
    return columns[index]?.align === 'right' ? text.padStart(width) : text.padEnd(width);
  };
  const border = `+${widths.map(width => '-'.repeat(width + 2)).join('+')}+`;
  const header = `| ${columns.map((col, index) => col.header.padEnd(widths[index] ?? 0)).join(' | ')} |`;
  const body = rows.map(row => `| ${row.map((cell, index) => fit(cell, index)).join(' | ')} |`);

  return [border, header, border, ...body, border].join('\n');
}
