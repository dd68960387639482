/**
 * Tabular output for report results.
 *
 * Columns come from the first row's key order. Every cell is left-justified
 * to a fixed minimum width and never truncated, so long values push the
 * rest of their line to the right.
 *
 * @module cli/lib/output
 */

export const BANNER_WIDTH = 60;
export const MIN_COLUMN_WIDTH = 15;
export const NO_RESULTS = 'No results found.';

/**
 * Per-column cell formatter, keyed by column name
 */
export type ColumnFormatters = Readonly<Record<string, (value: unknown) => string>>;

/**
 * Line sink; the CLI passes console.log, tests collect into an array
 */
export type Writer = (text: string) => void;

/**
 * Default cell text
 */
export function formatCell(value: unknown): string {
  if (value === null || value === undefined) return '-';
  return String(value);
}

/**
 * Common column formatters
 */
export const formatters = {
  /**
   * Fixed two-decimal number (rates and percentages)
   */
  fixed2: (value: unknown): string => {
    return typeof value === 'number' ? value.toFixed(2) : formatCell(value);
  },
};

function banner(title: string): string[] {
  const rule = '='.repeat(BANNER_WIDTH);
  return ['', rule, title, rule];
}

/**
 * Ordered column/value pairs of a row; the only place rows lose their type
 */
export function toDisplayRow(row: object): [string, unknown][] {
  const cells: [string, unknown][] = Object.entries(row);
  return cells;
}

/**
 * Render rows as a titled fixed-width table with a record count.
 *
 * @example
 * ```typescript
 * console.log(renderTable(activeComplaints(store), 'Active Complaints'));
 * ```
 */
export function renderTable(
  rows: readonly object[],
  title: string,
  columnFormatters: ColumnFormatters = {}
): string {
  const lines = banner(title);

  const [first] = rows;
  if (first === undefined) {
    lines.push(NO_RESULTS);
    return lines.join('\n');
  }

  const columns = toDisplayRow(first).map(([column]) => column);
  const header = columns.map((column) => column.padEnd(MIN_COLUMN_WIDTH)).join(' | ');
  lines.push(header);
  lines.push('-'.repeat(header.length));

  for (const row of rows) {
    const cells = new Map(toDisplayRow(row));
    lines.push(
      columns
        .map((column) => {
          const value = cells.get(column);
          const format = columnFormatters[column] ?? formatCell;
          return format(value).padEnd(MIN_COLUMN_WIDTH);
        })
        .join(' | ')
    );
  }

  lines.push('', `Total records: ${rows.length}`);
  return lines.join('\n');
}

/**
 * Render labelled fields under a banner, one `Label: value` per line.
 */
export function renderRecord(
  fields: ReadonlyArray<readonly [string, unknown]>,
  title: string
): string {
  const lines = banner(title);
  for (const [label, value] of fields) {
    lines.push(`${label}: ${formatCell(value)}`);
  }
  return lines.join('\n');
}
