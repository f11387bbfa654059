// one parsed csv line keyed by the header row
export type CsvRow = Record<string, string>;

// attribute name to value, one attribute per configured column
export type TableItem = Record<string, string>;

export type WriteMode = 'overwrite' | 'if-not-exists';

export type WriteOutcome = 'written' | 'duplicate';

export const writeModes: readonly WriteMode[] = ['overwrite', 'if-not-exists'];

export function isWriteMode(value: string): value is WriteMode {
  return writeModes.some((mode) => mode === value);
}
