import { MissingFieldError } from '../errors';
import type { CellValue, Column, MissingFieldPolicy, TableRecord } from '../types';
import { cellText, toCellValue } from './printable';

export const DEFAULT_MISSING_FIELD_POLICY: MissingFieldPolicy = { kind: 'placeholder', text: '' };

function lookup(record: TableRecord, header: string): CellValue {
  if (!Object.prototype.hasOwnProperty.call(record, header)) return { kind: 'missing' };
  return toCellValue(record[header]);
}

/**
 * Projects records into one column per header, in header order. Each column
 * holds the display text of `record[header]` for every record, in record order.
 */
export function splitIntoColumns(
  records: readonly TableRecord[],
  headers: readonly string[],
  policy: MissingFieldPolicy = DEFAULT_MISSING_FIELD_POLICY
): Column[] {
  return headers.map((header) =>
    records.map((record, recordIndex) => {
      const cell = lookup(record, header);
      if (cell.kind === 'missing') {
        if (policy.kind === 'fail') throw new MissingFieldError(header, recordIndex);
        return policy.text;
      }
      return cellText(cell);
    })
  );
}
