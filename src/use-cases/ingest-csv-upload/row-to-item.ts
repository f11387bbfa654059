import { CsvRow, TableItem } from '@dto/table-item';

import { RowValidationError } from '@errors/row-validation-error';

// copy each configured column onto the item under the same attribute name;
// every column must be present and non empty
export function rowToItem(
  row: CsvRow,
  columns: string[],
  rowNumber: number
): TableItem {
  const missingColumns = columns.filter(
    (column) => !Object.hasOwn(row, column) || row[column] === ''
  );

  if (missingColumns.length) {
    throw new RowValidationError(rowNumber, missingColumns);
  }

  return Object.fromEntries(columns.map((column) => [column, row[column]]));
}
