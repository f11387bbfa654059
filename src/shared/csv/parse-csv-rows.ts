import { CsvError, parse } from 'csv-parse';

import { CsvRow } from '@dto/table-item';
import { DecodeError } from '@errors/decode-error';

// lazily yields rows keyed by the header line; short rows are kept so the
// caller can reject just that row
export async function* parseCsvRows(text: string): AsyncGenerator<CsvRow> {
  const parser = parse(text, {
    columns: true,
    skip_empty_lines: true,
    relax_column_count: true,
  });

  try {
    for await (const record of parser) {
      yield toCsvRow(record);
    }
  } catch (error) {
    if (error instanceof CsvError) {
      throw new DecodeError(`unable to parse csv: ${error.message}`, {
        cause: error,
      });
    }
    throw error;
  }
}

function toCsvRow(record: unknown): CsvRow {
  const row: CsvRow = {};

  if (typeof record !== 'object' || record === null) return row;

  for (const [column, cell] of Object.entries(record)) {
    if (typeof cell === 'string') row[column] = cell;
  }

  return row;
}
