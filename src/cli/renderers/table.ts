/**
 * Plain ASCII table layout for the text report.
 *
 *   +-------+-------+
 *   | Level | Count |
 *   +-------+-------+
 *   | INFO  | 3     |
 *   +-------+-------+
 */

/** Optional hook to decorate a cell after padding (e.g. colors). */
export type CellDecorator = (padded: string, columnIndex: number) => string;

export function renderTable(
  headers: readonly string[],
  rows: ReadonlyArray<readonly string[]>,
  decorate?: CellDecorator,
): string {
  const widths = headers.map((header, col) =>
    Math.max(header.length, ...rows.map(row => (row[col] ?? '').length)),
  );

  const border = '+' + widths.map(w => '-'.repeat(w + 2)).join('+') + '+';
  const line = (cells: readonly string[], decorated: boolean): string =>
    '| '
    + widths
      .map((w, col) => {
        const padded = (cells[col] ?? '').padEnd(w);
        return decorated && decorate ? decorate(padded, col) : padded;
      })
      .join(' | ')
    + ' |';

  return [
    border,
    line(headers, false),
    border,
    ...rows.map(row => line(row, true)),
    border,
  ].join('\n');
}
