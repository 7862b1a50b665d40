import { TableInvariantError } from '../errors';
import type { Column, RowFormat } from '../types';

/**
 * Turns column-major data back into rows: row `i` takes the `i`-th value of
 * every column, in column order.
 */
export function rowsFromColumns(columns: readonly Column[], rowCount: number): string[][] {
  columns.forEach((column, idx) => {
    if (column.length !== rowCount) {
      throw new TableInvariantError(`column ${idx} has ${column.length} values, expected ${rowCount}`);
    }
  });

  const rows: string[][] = [];
  for (let i = 0; i < rowCount; i += 1) {
    rows.push(columns.map((column) => column[i]));
  }
  return rows;
}

export function putsOneLineInColumns(fields: readonly string[], format: RowFormat): string {
  return format.render(fields);
}

export function putsInColumns(columns: readonly Column[], format: RowFormat, rowCount: number): string[] {
  return rowsFromColumns(columns, rowCount).map((row) => putsOneLineInColumns(row, format));
}

/** Header line, separator rule, then one line per record; every line ends with the format's line break. */
export function writeTable(
  headers: readonly string[],
  format: RowFormat,
  separatorLine: string,
  columns: readonly Column[],
  rowCount: number
): string[] {
  return [
    putsOneLineInColumns(headers, format),
    separatorLine + format.lineBreak,
    ...putsInColumns(columns, format, rowCount)
  ];
}
