// the subset of an s3 object created notification that we read
export type NotificationRecord = {
  s3: {
    bucket: { name: string };
    object: { key: string };
  };
};

export type NotificationEvent = {
  Records: NotificationRecord[];
};

export type ObjectLocation = {
  bucketName: string;
  objectKey: string;
};
