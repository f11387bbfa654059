import { GetObjectCommand, S3Client } from '@aws-sdk/client-s3';

import { ObjectFetchError, ObjectFetchFailure } from '@errors/object-fetch-error';
import { logger } from '@shared';

const s3Client = new S3Client({});

export async function getObjectBytes(
  bucketName: string,
  objectKey: string
): Promise<Uint8Array> {
  const getObjectCommand = new GetObjectCommand({
    Bucket: bucketName,
    Key: objectKey,
  });

  try {
    const { Body: body } = await s3Client.send(getObjectCommand);

    if (!body) {
      throw new ObjectFetchError(
        'empty-body',
        `empty body returned from s3://${bucketName}/${objectKey}`
      );
    }

    const bytes = await body.transformToByteArray();

    logger.info(
      `read ${bytes.byteLength} bytes from s3://${bucketName}/${objectKey}`
    );

    return bytes;
  } catch (error) {
    if (error instanceof ObjectFetchError) throw error;

    const reason = fetchFailure(error);
    logger.error(`error retrieving s3://${bucketName}/${objectKey}: ${reason}`);

    throw new ObjectFetchError(
      reason,
      `unable to get s3://${bucketName}/${objectKey} (${reason})`,
      { cause: error }
    );
  }
}

function fetchFailure(error: unknown): ObjectFetchFailure {
  if (!(error instanceof Error)) return 'unavailable';

  switch (error.name) {
    case 'NoSuchKey':
    case 'NotFound':
      return 'not-found';
    case 'AccessDenied':
    case 'Forbidden':
      return 'access-denied';
    default:
      return 'unavailable';
  }
}
