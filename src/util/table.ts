import { EmptyInputError } from '../errors';
import { DEFAULT_MISSING_FIELD_POLICY, splitIntoColumns } from '../table/columns';
import { formatFor, separator } from '../table/format';
import { widthsOf } from '../table/widths';
import { writeTable } from '../table/writer';
import type { PrintOptions, RenderOptions, TableRecord } from '../types';

/**
 * Renders records as a fixed-width table: header line, separator rule and one
 * line per record. Column widths come from the data values only, so a header
 * longer than its data overflows its column.
 */
export function renderTable(
  records: readonly TableRecord[],
  headers: readonly string[],
  options: RenderOptions = {}
): string {
  if (records.length === 0) throw new EmptyInputError();

  const columns = splitIntoColumns(records, headers, options.onMissingField ?? DEFAULT_MISSING_FIELD_POLICY);
  const widths = widthsOf(columns);
  const format = formatFor(widths, options.lineBreak);
  const lines = writeTable(headers, format, separator(widths), columns, records.length);

  options.logger?.debug?.(`fixed-width-table: rendered ${records.length} rows x ${headers.length} columns`);
  return lines.join('');
}

export function printTableForColumns(
  records: readonly TableRecord[],
  headers: readonly string[],
  options: PrintOptions = {}
): void {
  const text = renderTable(records, headers, options);
  (options.sink ?? process.stdout).write(text);
}
