import { EmptyInputError } from '../errors';
import type { Column } from '../types';

export function widthsOf(columns: readonly Column[]): number[] {
  return columns.map((column) => {
    if (column.length === 0) throw new EmptyInputError('column values');
    return column.reduce((max, value) => Math.max(max, value.length), 0);
  });
}
