import { IngestionErrorKind } from '@errors/ingestion-error';

export type RowFailure = {
  rowNumber: number;
  kind: IngestionErrorKind;
  message: string;
};

export type IngestionSummary = {
  bucketName: string;
  objectKey: string;
  rowCount: number;
  written: number;
  duplicates: number;
  failures: RowFailure[];
};
