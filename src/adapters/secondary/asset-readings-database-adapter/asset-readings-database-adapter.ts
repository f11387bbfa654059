import {
  DynamoDBClient,
  PutItemCommand,
  PutItemCommandInput,
} from '@aws-sdk/client-dynamodb';
import { TableItem, WriteMode, WriteOutcome } from '@dto/table-item';
import { RowWriteError, RowWriteFailure } from '@errors/row-write-error';

import { marshall } from '@aws-sdk/util-dynamodb';
import { logger } from '@shared';

const dynamoDb = new DynamoDBClient({});

const throttlingErrors = [
  'ProvisionedThroughputExceededException',
  'RequestLimitExceeded',
  'ThrottlingException',
];

export type PutAssetReadingOptions = {
  tableName: string;
  writeMode: WriteMode;
  keyColumns: string[];
};

export async function putAssetReading(
  item: TableItem,
  { tableName, writeMode, keyColumns }: PutAssetReadingOptions
): Promise<WriteOutcome> {
  const params: PutItemCommandInput = {
    TableName: tableName,
    Item: marshall(item),
  };

  // only write when no item with the same key exists so a replayed upload
  // does not write its rows a second time
  if (writeMode === 'if-not-exists') {
    const names = keyColumns.map((_, index) => `#k${index}`);

    params.ConditionExpression = names
      .map((name) => `attribute_not_exists(${name})`)
      .join(' AND ');
    params.ExpressionAttributeNames = Object.fromEntries(
      keyColumns.map((column, index) => [names[index], column])
    );
  }

  const identity = keyColumns.map((column) => item[column]).join('#');

  try {
    await dynamoDb.send(new PutItemCommand(params));

    logger.debug(`asset reading ${identity} written into ${tableName}`);

    return 'written';
  } catch (error) {
    if (error instanceof Error) {
      if (error.name === 'ConditionalCheckFailedException') {
        logger.info(`asset reading ${identity} already in ${tableName}`);
        return 'duplicate';
      }

      const reason: RowWriteFailure = throttlingErrors.includes(error.name)
        ? 'throttled'
        : 'unavailable';

      throw new RowWriteError(
        reason,
        `unable to write asset reading ${identity} into ${tableName}: ${error.message}`,
        { cause: error }
      );
    }

    throw new RowWriteError(
      'unavailable',
      `unable to write asset reading ${identity} into ${tableName}`,
      { cause: error }
    );
  }
}
