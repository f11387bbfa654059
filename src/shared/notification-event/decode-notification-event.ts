import { NotificationRecord, ObjectLocation } from '@dto/notification-event';
import { eventSchema, recordSchema } from '@schemas/notification-event';

import { MalformedEventError } from '@errors/malformed-event-error';
import { ValidationError } from '@errors/validation-error';
import { logger } from '../logger';
import { schemaValidator } from '../schema-validator';
import { decodeObjectKey } from './decode-object-key';

export function decodeNotificationEvent(event: unknown): ObjectLocation {
  try {
    schemaValidator<{ Records: unknown[] }>(eventSchema, event);

    const [record] = event.Records;
    schemaValidator<NotificationRecord>(recordSchema, record);

    logger.debug(
      `incoming bucket: ${record.s3.bucket.name}, key: ${record.s3.object.key}`
    );

    // note: one upload per invocation, any further records are not processed
    if (event.Records.length > 1) {
      logger.warn(
        `event has ${event.Records.length} records, only the first is processed`
      );
    }

    return {
      bucketName: record.s3.bucket.name,
      objectKey: decodeObjectKey(record.s3.object.key),
    };
  } catch (error) {
    if (error instanceof ValidationError) {
      throw new MalformedEventError(`malformed event: ${error.message}`, {
        cause: error,
      });
    }
    throw error;
  }
}
