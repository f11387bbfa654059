import { decodeNotificationEvent, decodeUtf8, logger, parseCsvRows } from '@shared';
import { getObjectBytes, putAssetReading } from '@adapters/secondary';

import { IngestionSummary } from '@dto/ingestion-summary';
import { WriteMode } from '@dto/table-item';
import { RowValidationError } from '@errors/row-validation-error';
import { RowWriteError } from '@errors/row-write-error';
import { rowToItem } from './row-to-item';

// rows logged in full as a sanity check of the upload
const previewRowCount = 5;

export type IngestionOptions = {
  tableName: string;
  columns: string[];
  keyColumns: string[];
  writeMode: WriteMode;
};

export async function ingestCsvUploadUseCase(
  event: unknown,
  { tableName, columns, keyColumns, writeMode }: IngestionOptions
): Promise<IngestionSummary> {
  const { bucketName, objectKey } = decodeNotificationEvent(event);

  logger.info(`bucket: ${bucketName}, key: ${objectKey}`);

  const content = decodeUtf8(await getObjectBytes(bucketName, objectKey));

  const summary: IngestionSummary = {
    bucketName,
    objectKey,
    rowCount: 0,
    written: 0,
    duplicates: 0,
    failures: [],
  };

  // rows are written one at a time in file order
  for await (const row of parseCsvRows(content)) {
    const rowNumber = ++summary.rowCount;

    if (rowNumber <= previewRowCount) {
      logger.info(`row ${rowNumber}: ${JSON.stringify(row)}`);
    }

    try {
      const item = rowToItem(row, columns, rowNumber);
      const outcome = await putAssetReading(item, {
        tableName,
        writeMode,
        keyColumns,
      });

      if (outcome === 'duplicate') summary.duplicates++;
      else summary.written++;
    } catch (error) {
      // a bad row is recorded and the rest of the file still loads
      if (
        !(error instanceof RowValidationError) &&
        !(error instanceof RowWriteError)
      ) {
        throw error;
      }

      logger.error(`row ${rowNumber} not written: ${error.message}`);
      summary.failures.push({
        rowNumber,
        kind: error.kind,
        message: error.message,
      });
    }
  }

  logger.info(`processed ${summary.rowCount} rows into ${tableName}`, {
    written: summary.written,
    duplicates: summary.duplicates,
    failed: summary.failures.length,
  });

  return summary;
}
