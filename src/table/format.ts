import { TableInvariantError } from '../errors';
import type { LineBreak, RowFormat } from '../types';

export const COLUMN_SEPARATOR = ' | ';
export const RULE_CONNECTOR = '-+-';

function describe(widths: readonly number[], lineBreak: LineBreak): string {
  const escaped = lineBreak === '\r\n' ? '\\r\\n' : '\\n';
  return widths.map((width) => `%-${width}s`).join(COLUMN_SEPARATOR) + escaped;
}

/**
 * Row template for the given column widths. Each field is left-justified to
 * its column width; longer fields overflow rather than being cut.
 */
export function formatFor(widths: readonly number[], lineBreak: LineBreak = '\n'): RowFormat {
  const fixed = [...widths];
  return {
    widths: fixed,
    columnSeparator: COLUMN_SEPARATOR,
    lineBreak,
    pattern: describe(fixed, lineBreak),
    render(fields) {
      if (fields.length !== fixed.length) {
        throw new TableInvariantError(`row has ${fields.length} fields but the format has ${fixed.length} columns`);
      }
      return fields.map((field, idx) => field.padEnd(fixed[idx], ' ')).join(COLUMN_SEPARATOR) + lineBreak;
    }
  };
}

export function separator(widths: readonly number[]): string {
  return widths.map((width) => '-'.repeat(width)).join(RULE_CONNECTOR);
}
