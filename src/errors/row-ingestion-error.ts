import { IngestionSummary } from '@dto/ingestion-summary';

import { IngestionError } from './ingestion-error';

// thrown once the whole file has been read so that the invocation
// fails and the platform retry and dead letter policy applies
export class RowIngestionError extends IngestionError {
  readonly kind = 'row-ingestion';

  constructor(readonly summary: IngestionSummary) {
    const rowNumbers = summary.failures.map(({ rowNumber }) => rowNumber);
    super(
      `${rowNumbers.length} of ${summary.rowCount} rows failed in s3://${
        summary.bucketName
      }/${summary.objectKey}: rows ${rowNumbers.join(', ')}`
    );
  }
}
