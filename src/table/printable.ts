import type { CellInput, CellValue } from '../types';

export function toCellValue(input: CellInput): CellValue {
  if (input === null || input === undefined) return { kind: 'missing' };
  if (typeof input === 'string') return { kind: 'text', value: input };
  if (typeof input === 'boolean') return { kind: 'boolean', value: input };
  if (typeof input === 'bigint' || Number.isInteger(input)) return { kind: 'integer', value: input };
  return { kind: 'float', value: input };
}

export function cellText(cell: CellValue, placeholder = ''): string {
  switch (cell.kind) {
    case 'text':
      return cell.value;
    case 'integer':
      // BigInt keeps every digit of integral doubles past 1e21.
      return BigInt(cell.value).toString(10);
    case 'float':
      return String(cell.value);
    case 'boolean':
      return cell.value ? 'true' : 'false';
    case 'missing':
      return placeholder;
  }
}

/**
 * Display string for a single value. Strings pass through unchanged, numbers
 * and booleans become their canonical text, and null/undefined become
 * `placeholder`.
 */
export function printable(value: CellInput, placeholder = ''): string {
  return cellText(toCellValue(value), placeholder);
}
