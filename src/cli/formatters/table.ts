/**
 * Table Formatters
 *
 * Fixed-width column helpers for list commands.
 *
 * @module cli/formatters/table
 */

import chalk from 'chalk';

/**
 * A table column: header text and width (including gap).
 */
export interface TableColumn {
  header: string;
  width: number;
}

/**
 * Truncate a string to a maximum length.
 *
 * @param str - String to truncate
 * @param maxLen - Maximum length
 * @returns Truncated string
 */
export function truncate(str: string, maxLen: number): string {
  if (str.length <= maxLen) return str;
  return str.slice(0, maxLen - 3) + '...';
}

/**
 * Pad a string to a fixed width.
 *
 * @param str - String to pad
 * @param width - Target width
 * @returns Padded string
 */
export function padRight(str: string, width: number): string {
  // Account for ANSI codes by calculating visible length
  const visibleLength = str.replace(/\x1b\[[0-9;]*m/g, '').length;
  const padding = Math.max(0, width - visibleLength);
  return str + ' '.repeat(padding);
}

/**
 * Render rows under a bold header and dim dividers.
 *
 * Cells longer than their column (minus a one-space gap) are truncated.
 */
export function formatTable(columns: readonly TableColumn[], rows: ReadonlyArray<readonly string[]>): string {
  const totalWidth = columns.reduce((sum, column) => sum + column.width, 0);
  const divider = chalk.dim('-'.repeat(totalWidth));

  const renderRow = (cells: readonly string[]): string =>
    columns
      .map((column, i) => padRight(truncate(cells[i] ?? '', column.width - 1), column.width))
      .join('')
      .trimEnd();

  const lines = [
    chalk.bold(renderRow(columns.map((column) => column.header))),
    divider,
    ...rows.map(renderRow),
    divider,
  ];
  return lines.join('\n');
}
