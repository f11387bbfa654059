import { IngestionOptions, ingestCsvUploadUseCase } from '@use-cases/ingest-csv-upload';
import { MetricUnit, Metrics } from '@aws-lambda-powertools/metrics';

import { injectLambdaContext } from '@aws-lambda-powertools/logger/middleware';
import { logMetrics } from '@aws-lambda-powertools/metrics/middleware';
import { Tracer } from '@aws-lambda-powertools/tracer';
import { captureLambdaHandler } from '@aws-lambda-powertools/tracer/middleware';
import { config } from '@config';
import { IngestionSummary } from '@dto/ingestion-summary';
import { isWriteMode } from '@dto/table-item';
import { ConfigurationError } from '@errors/configuration-error';
import { RowIngestionError } from '@errors/row-ingestion-error';
import middy from '@middy/core';
import { logger } from '@shared';
import { S3Event } from 'aws-lambda';

const tracer = new Tracer();
const metrics = new Metrics();

export function ingestionOptions(): IngestionOptions {
  const tableName = config.get('tableName');
  const writeMode = config.get('writeMode');

  if (!tableName) {
    throw new ConfigurationError('no table name configured (TABLE_NAME)');
  }
  if (!isWriteMode(writeMode)) {
    throw new ConfigurationError(`unknown write mode: ${writeMode}`);
  }

  const columns = columnList('columns', 'CSV_COLUMNS');
  const keyColumns = columnList('keyColumns', 'KEY_COLUMNS');

  const unknownKeyColumns = keyColumns.filter(
    (column) => !columns.includes(column)
  );
  if (unknownKeyColumns.length) {
    throw new ConfigurationError(
      `key columns not in the csv columns: ${unknownKeyColumns.join(', ')}`
    );
  }

  return { tableName, writeMode, columns, keyColumns };
}

// convict turns an empty env value into [''] so blank names are rejected here
function columnList(
  key: 'columns' | 'keyColumns',
  env: string
): string[] {
  const columns = config.get(key);

  if (!columns.length || columns.some((column) => !column.trim())) {
    throw new ConfigurationError(`blank column name configured (${env})`);
  }

  return columns;
}

// we parse the uploaded csv file and write each row to the asset readings table
export const ingestUploadAdapter = async (
  event: S3Event
): Promise<IngestionSummary> => {
  try {
    const summary = await ingestCsvUploadUseCase(event, ingestionOptions());

    metrics.addMetric('CsvRowsWritten', MetricUnit.Count, summary.written);
    metrics.addMetric(
      'CsvRowsFailed',
      MetricUnit.Count,
      summary.failures.length
    );

    if (summary.failures.length) {
      throw new RowIngestionError(summary);
    }

    metrics.addMetric('CsvUploadIngestSuccess', MetricUnit.Count, 1);

    return summary;
  } catch (error) {
    let errorMessage = 'Unknown error';
    if (error instanceof Error) errorMessage = error.message;
    logger.error(errorMessage);

    metrics.addMetric('CsvUploadIngestError', MetricUnit.Count, 1);

    throw error;
  }
};

export const handler = middy(ingestUploadAdapter)
  .use(injectLambdaContext(logger))
  .use(captureLambdaHandler(tracer))
  .use(logMetrics(metrics));
