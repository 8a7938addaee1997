/**
 * Box-drawn tables for CLI output.
 */

import chalk from 'chalk';

export type Alignment = 'left' | 'right';

export interface Column {
  header: string;
  key: string;
  /** @default 'left' */
  align?: Alignment;
}

export type Row = Record<string, string | number | undefined>;

// eslint-disable-next-line no-control-regex
const ANSI = /\x1B\[[0-9;]*m/g;

function visibleLength(text: string): number {
  return text.replace(ANSI, '').length;
}

function pad(text: string, width: number, align: Alignment): string {
  const fill = ' '.repeat(Math.max(0, width - visibleLength(text)));
  return align === 'right' ? fill + text : text + fill;
}

/**
 * @example
 * ```
 * ┌───┬───────┐
 * │ # │ Title │
 * ├───┼───────┤
 * │ 1 │ Intro │
 * └───┴───────┘
 * ```
 */
export function formatTable(columns: Column[], rows: Row[]): string {
  if (columns.length === 0) return '';

  const cells = rows.map((row) => columns.map((column) => String(row[column.key] ?? '')));
  const widths = columns.map((column, i) =>
    Math.max(visibleLength(column.header), ...cells.map((values) => visibleLength(values[i] ?? '')))
  );

  const rule = (left: string, middle: string, right: string): string =>
    left + widths.map((width) => '─'.repeat(width + 2)).join(middle) + right;

  const line = (values: string[], style: (text: string) => string = (text) => text): string =>
    '│' +
    columns
      .map((column, i) => ` ${style(pad(values[i] ?? '', widths[i] ?? 0, column.align ?? 'left'))} `)
      .join('│') +
    '│';

  return [
    rule('┌', '┬', '┐'),
    line(
      columns.map((column) => column.header),
      (text) => chalk.bold(text)
    ),
    rule('├', '┼', '┤'),
    ...cells.map((values) => line(values)),
    rule('└', '┴', '┘'),
  ].join('\n');
}
